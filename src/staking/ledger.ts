/**
 * Stake Ledger
 *
 * Per (principal, tier) stake records plus the per-principal claimed flag.
 *
 * Deposits combine additively into the existing record, including the
 * previous unlock timestamp:
 *   unlockTimestamp' = unlockTimestamp + now + lockDuration
 * so repeated deposits push the unlock time out by more than the lock
 * duration each time.
 *
 * The claimed flag is global per principal: once any tier is claimed,
 * every other tier for that principal is blocked.
 */

import { err, ok, type Principal, type Result } from './errors';
import type { TierId } from './tiers';

// ============ Types ============

export interface StakeRecord {
  stakedAmount: bigint;
  accruedReward: bigint;
  unlockTimestamp: number;
  claimed: boolean;
}

export interface DepositEntry {
  principal: Principal;
  tierId: TierId;
  amount: bigint;
  reward: bigint;
  now: number;
  lockDuration: number;
}

export interface ClaimPlan {
  principal: Principal;
  tierId: TierId;
  payout: bigint;
}

// ============ Ledger ============

const recordKey = (principal: Principal, tierId: TierId): string => `${principal}:${tierId}`;

export const emptyRecord = (): StakeRecord => ({
  stakedAmount: 0n,
  accruedReward: 0n,
  unlockTimestamp: 0,
  claimed: false,
});

export class StakeLedger {
  private records: Map<string, StakeRecord> = new Map();
  private claimedPrincipals: Set<Principal> = new Set();

  getRecord(principal: Principal, tierId: TierId): StakeRecord {
    const record = this.records.get(recordKey(principal, tierId));
    return record ? { ...record } : emptyRecord();
  }

  hasClaimed(principal: Principal): boolean {
    return this.claimedPrincipals.has(principal);
  }

  /**
   * Record that would result from a deposit, without writing it.
   */
  previewDeposit(entry: DepositEntry): StakeRecord {
    const current = this.getRecord(entry.principal, entry.tierId);
    return {
      stakedAmount: current.stakedAmount + entry.amount,
      accruedReward: current.accruedReward + entry.reward,
      unlockTimestamp: current.unlockTimestamp + entry.now + entry.lockDuration,
      claimed: false,
    };
  }

  applyDeposit(entry: DepositEntry): StakeRecord {
    const next = this.previewDeposit(entry);
    this.records.set(recordKey(entry.principal, entry.tierId), next);
    return { ...next };
  }

  /**
   * Validate a claim and compute its payout. Nothing is written.
   */
  checkClaim(principal: Principal, tierId: TierId, now: number): Result<ClaimPlan> {
    const record = this.getRecord(principal, tierId);

    if (record.stakedAmount === 0n) {
      return err({ kind: 'NoActiveStake', principal, tierId });
    }
    if (this.hasClaimed(principal)) {
      return err({ kind: 'StakeAlreadyClaimed', principal });
    }
    if (now <= record.unlockTimestamp) {
      return err({
        kind: 'StakeStillLocked',
        principal,
        tierId,
        unlockTimestamp: record.unlockTimestamp,
      });
    }

    return ok({ principal, tierId, payout: record.stakedAmount + record.accruedReward });
  }

  /**
   * Validate, then zero the record and set the principal's claimed flag.
   */
  applyClaim(principal: Principal, tierId: TierId, now: number): Result<bigint> {
    const plan = this.checkClaim(principal, tierId, now);
    if (!plan.ok) return plan;

    this.records.set(recordKey(principal, tierId), { ...emptyRecord(), claimed: true });
    this.claimedPrincipals.add(principal);
    return ok(plan.value.payout);
  }
}
