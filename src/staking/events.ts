/**
 * Staking Notifications
 *
 * Emitted after a mutating operation commits. Kept in an in-memory history
 * and pushed to subscribers.
 */

import type { Logger } from 'pino';
import type { Principal } from './errors';
import type { TierId } from './tiers';

// ============ Types ============

export type StakingEvent =
  | {
      type: 'TierUpdated';
      tierId: TierId;
      rewardRateBasisPoints: number;
      lockDuration: number;
    }
  | {
      type: 'WhitelistChanged';
      principal: Principal;
      approved: boolean;
    }
  | {
      type: 'Deposited';
      principal: Principal;
      tierId: TierId;
      amount: bigint;
      reward: bigint;
      unlockTimestamp: number;
    }
  | {
      type: 'Claimed';
      principal: Principal;
      tierId: TierId;
      payout: bigint;
    };

export type StakingEventListener = (event: StakingEvent) => void;

export const DEFAULT_MAX_HISTORY = 1000;

// ============ Event Log ============

export class StakingEventLog {
  private history: StakingEvent[] = [];
  private listeners: Set<StakingEventListener> = new Set();

  constructor(
    private readonly logger: Logger,
    private readonly maxHistory: number = DEFAULT_MAX_HISTORY
  ) {}

  emit(event: StakingEvent): void {
    this.history.push(event);
    // Oldest entries drop off once the cap is reached
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
    this.logger.info(plainFields(event), event.type);

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Staking event listener failed');
      }
    }
  }

  subscribe(listener: StakingEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  all(): StakingEvent[] {
    return [...this.history];
  }
}

/**
 * Shallow copy with bigint values as decimal strings, safe for JSON
 */
export function plainFields(source: object): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    fields[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return fields;
}
