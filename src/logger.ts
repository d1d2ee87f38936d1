/**
 * Pino logger factory. JSON to stdout; silenced under Vitest and NODE_ENV=test.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export function makeLogger(
  bindings?: Record<string, unknown>,
  level: string = process.env.LOG_LEVEL ?? 'info'
): Logger {
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const isTestTooling = process.env.VITEST === 'true' || nodeEnv === 'test';

  return pino({
    level,
    enabled: !isTestTooling,
    base: { ...bindings, service: 'tiered-staking' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * For tests - keeps the Logger type, emits nothing
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
