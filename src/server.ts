import { serve } from '@hono/node-server';
import { createApp, createEngine } from './app';
import { ConfigError, loadConfig } from './config';
import { makeLogger } from './logger';

function start() {
  const config = loadConfig();
  const logger = makeLogger({ module: 'server' }, config.logLevel);

  const { engine } = createEngine(config, logger);
  logger.info({ accounts: config.genesisBalances.length }, 'Asset ledger seeded');

  const app = createApp({ engine, logger });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port, owner: config.owner }, 'Staking API listening');
  });

  const shutdown = (signal: string) => {
    logger.warn({ signal }, 'Shutting down');
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (error) {
  const message = error instanceof ConfigError ? error.message : String(error);
  console.error(`[SERVER] Failed to start: ${message}`);
  process.exit(1);
}
