/**
 * Staking Tiers
 *
 * Each tier pays a fixed reward rate (in basis points) on the deposited
 * amount and locks the stake for a fixed duration.
 *
 * Defaults:
 * 1 - 5% reward,  7 day lock
 * 2 - 10% reward, 14 day lock
 * 3 - 15% reward, 30 day lock
 */

import { err, ok, type Result } from './errors';

// ============ Types ============

export type TierId = number;

export interface Tier {
  rewardRateBasisPoints: number;
  lockDuration: number;       // Seconds
}

// ============ Configuration ============

export const BASIS_POINTS = 10_000n;

const DAY = 24 * 60 * 60;

export const DEFAULT_TIERS: ReadonlyArray<[TierId, Tier]> = [
  [1, { rewardRateBasisPoints: 500, lockDuration: 7 * DAY }],
  [2, { rewardRateBasisPoints: 1000, lockDuration: 14 * DAY }],
  [3, { rewardRateBasisPoints: 1500, lockDuration: 30 * DAY }],
];

const EMPTY_TIER: Tier = Object.freeze({ rewardRateBasisPoints: 0, lockDuration: 0 });

export function isValidTierId(tierId: number): boolean {
  return Number.isSafeInteger(tierId) && tierId > 0;
}

const isNonNegativeInteger = (value: number): boolean => Number.isSafeInteger(value) && value >= 0;

export function isValidTier(tier: Tier): boolean {
  return isNonNegativeInteger(tier.rewardRateBasisPoints) && isNonNegativeInteger(tier.lockDuration);
}

// ============ Reward Calculator ============

/**
 * amount * rate / 10000, truncated. bigint arithmetic has no upper bound.
 */
export function computeReward(amount: bigint, tier: Tier): bigint {
  return (amount * BigInt(tier.rewardRateBasisPoints)) / BASIS_POINTS;
}

// ============ Tier Registry ============

export class TierRegistry {
  private tiers: Map<TierId, Tier> = new Map();

  constructor(seed: ReadonlyArray<[TierId, Tier]> = DEFAULT_TIERS) {
    for (const [tierId, tier] of seed) {
      if (!isValidTierId(tierId) || !isValidTier(tier)) {
        throw new RangeError(`Invalid seed tier ${tierId}`);
      }
      this.tiers.set(tierId, { ...tier });
    }
  }

  /**
   * Overwrite a tier. Caller must already have passed the owner check.
   */
  setTier(tierId: TierId, tier: Tier): Result<Tier> {
    if (!isValidTierId(tierId) || !isValidTier(tier)) {
      return err({ kind: 'InvalidTier', tierId });
    }
    const stored = { ...tier };
    this.tiers.set(tierId, stored);
    return ok({ ...stored });
  }

  /**
   * Zero-value tier when never set; lockDuration 0 means not configured.
   */
  getTier(tierId: TierId): Tier {
    const tier = this.tiers.get(tierId);
    return tier ? { ...tier } : { ...EMPTY_TIER };
  }

  isConfigured(tierId: TierId): boolean {
    return isValidTierId(tierId) && this.getTier(tierId).lockDuration > 0;
  }

  listTiers(): Array<{ tierId: TierId } & Tier> {
    return Array.from(this.tiers.entries())
      .filter(([tierId]) => this.isConfigured(tierId))
      .sort(([a], [b]) => a - b)
      .map(([tierId, tier]) => ({ tierId, ...tier }));
  }
}
