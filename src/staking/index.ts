/**
 * Staking Module
 *
 * Tiered staking ledger with whitelist access, deposit cooldown and
 * lock-gated claims.
 */

export * from './errors';
export * from './tiers';
export * from './access';
export * from './cooldown';
export * from './ledger';
export * from './transfer';
export * from './events';
export * from './queue';
export * from './engine';
