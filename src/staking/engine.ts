/**
 * Staking Engine
 *
 * The only public entry point to the staking ledger. Mutating operations go
 * through a single serial queue, so none of them interleave. Each one runs
 * its guards, calls the asset transfer, and only writes local state once
 * the transfer has succeeded: a failed transfer leaves nothing behind.
 */

import type { Logger } from 'pino';
import { makeLogger } from '../logger';
import { AccessControl } from './access';
import { CooldownGuard, DEFAULT_COOLDOWN_PERIOD } from './cooldown';
import { err, ok, type Principal, type Result } from './errors';
import {
  plainFields,
  StakingEventLog,
  type StakingEvent,
  type StakingEventListener,
} from './events';
import { StakeLedger, type StakeRecord } from './ledger';
import { SerialQueue } from './queue';
import { computeReward, DEFAULT_TIERS, TierRegistry, type Tier, type TierId } from './tiers';
import type { AssetTransfer } from './transfer';

// ============ Types ============

/** Current time in seconds. */
export type Clock = () => number;

export interface StakingEngineOptions {
  owner: Principal;
  custody: Principal;         // Account that holds deposited funds
  transfer: AssetTransfer;
  clock?: Clock;
  cooldownPeriod?: number;
  tiers?: ReadonlyArray<[TierId, Tier]>;
  maxEventHistory?: number;   // Notifications kept for events()
  logger?: Logger;
}

export interface DepositReceipt {
  principal: Principal;
  tierId: TierId;
  amount: bigint;
  reward: bigint;
  unlockTimestamp: number;
  record: StakeRecord;
}

export interface ClaimReceipt {
  principal: Principal;
  tierId: TierId;
  payout: bigint;
}

export interface PrincipalState {
  approved: boolean;
  lastDepositTime: number | null;
  hasClaimed: boolean;
}

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

// ============ Engine ============

export class StakingEngine {
  private readonly access: AccessControl;
  private readonly tiers: TierRegistry;
  private readonly cooldown: CooldownGuard;
  private readonly ledger = new StakeLedger();
  private readonly queue = new SerialQueue();
  private readonly eventLog: StakingEventLog;
  private readonly transfer: AssetTransfer;
  private readonly custody: Principal;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: StakingEngineOptions) {
    this.access = new AccessControl(options.owner);
    this.tiers = new TierRegistry(options.tiers ?? DEFAULT_TIERS);
    this.cooldown = new CooldownGuard(options.cooldownPeriod ?? DEFAULT_COOLDOWN_PERIOD);
    this.transfer = options.transfer;
    this.custody = options.custody;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? makeLogger({ module: 'staking-engine' });
    this.eventLog = new StakingEventLog(this.logger, options.maxEventHistory);
  }

  // ============ Admin ============

  setTier(
    caller: Principal,
    tierId: TierId,
    rewardRateBasisPoints: number,
    lockDuration: number
  ): Promise<Result<Tier>> {
    return this.serialize<Tier>('setTier', async () => {
      const owner = this.access.requireOwner(caller);
      if (!owner.ok) return owner;

      const updated = this.tiers.setTier(tierId, { rewardRateBasisPoints, lockDuration });
      if (!updated.ok) return updated;

      this.eventLog.emit({ type: 'TierUpdated', tierId, ...updated.value });
      return updated;
    });
  }

  setApproval(caller: Principal, principal: Principal, approved: boolean): Promise<Result<void>> {
    return this.serialize<void>('setApproval', async () => {
      const owner = this.access.requireOwner(caller);
      if (!owner.ok) return owner;

      this.access.setApproval(principal, approved);
      this.eventLog.emit({ type: 'WhitelistChanged', principal, approved });
      return ok();
    });
  }

  // ============ Staking ============

  deposit(caller: Principal, tierId: TierId, amount: bigint): Promise<Result<DepositReceipt>> {
    return this.serialize<DepositReceipt>('deposit', async () => {
      const now = this.clock();

      const approved = this.access.requireApproved(caller);
      if (!approved.ok) return approved;

      const cooldown = this.cooldown.check(caller, now);
      if (!cooldown.ok) return cooldown;

      if (!this.tiers.isConfigured(tierId)) {
        return err({ kind: 'InvalidTier', tierId });
      }
      if (amount <= 0n) {
        return err({ kind: 'ZeroAmount' });
      }

      const tier = this.tiers.getTier(tierId);
      const reward = computeReward(amount, tier);
      const entry = { principal: caller, tierId, amount, reward, now, lockDuration: tier.lockDuration };

      const moved = await this.attemptTransfer('in', caller, amount, () =>
        this.transfer.transferIn(caller, this.custody, amount)
      );
      if (!moved.ok) return moved;

      // Commit: nothing below awaits
      const record = this.ledger.applyDeposit(entry);
      this.cooldown.record(caller, now);

      const receipt: DepositReceipt = {
        principal: caller,
        tierId,
        amount,
        reward,
        unlockTimestamp: record.unlockTimestamp,
        record,
      };
      this.eventLog.emit({
        type: 'Deposited',
        principal: caller,
        tierId,
        amount,
        reward,
        unlockTimestamp: record.unlockTimestamp,
      });
      return ok(receipt);
    });
  }

  claim(caller: Principal, tierId: TierId): Promise<Result<ClaimReceipt>> {
    return this.serialize<ClaimReceipt>('claim', async () => {
      const now = this.clock();

      const approved = this.access.requireApproved(caller);
      if (!approved.ok) return approved;

      const plan = this.ledger.checkClaim(caller, tierId, now);
      if (!plan.ok) return plan;

      const { payout } = plan.value;
      const moved = await this.attemptTransfer('out', caller, payout, () =>
        this.transfer.transferOut(caller, payout)
      );
      if (!moved.ok) return moved;

      const claimed = this.ledger.applyClaim(caller, tierId, now);
      if (!claimed.ok) return claimed;

      this.eventLog.emit({ type: 'Claimed', principal: caller, tierId, payout: claimed.value });
      return ok({ principal: caller, tierId, payout: claimed.value });
    });
  }

  // ============ Reads ============

  getStakeDetails(principal: Principal, tierId: TierId): StakeRecord {
    return this.ledger.getRecord(principal, tierId);
  }

  getTier(tierId: TierId): Tier {
    return this.tiers.getTier(tierId);
  }

  listTiers(): Array<{ tierId: TierId } & Tier> {
    return this.tiers.listTiers();
  }

  isApproved(principal: Principal): boolean {
    return this.access.isApproved(principal);
  }

  getPrincipalState(principal: Principal): PrincipalState {
    return {
      approved: this.access.isApproved(principal),
      lastDepositTime: this.cooldown.lastDepositTime(principal),
      hasClaimed: this.ledger.hasClaimed(principal),
    };
  }

  owner(): Principal {
    return this.access.owner;
  }

  cooldownPeriod(): number {
    return this.cooldown.period;
  }

  events(): StakingEvent[] {
    return this.eventLog.all();
  }

  subscribe(listener: StakingEventListener): () => void {
    return this.eventLog.subscribe(listener);
  }

  // ============ Internals ============

  private async attemptTransfer(
    direction: 'in' | 'out',
    principal: Principal,
    amount: bigint,
    call: () => Promise<boolean>
  ): Promise<Result<void>> {
    try {
      if (await call()) return ok();
      return err({ kind: 'TransferFailed', direction, principal, amount });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err({ kind: 'TransferFailed', direction, principal, amount, reason });
    }
  }

  private serialize<T>(operation: string, task: () => Promise<Result<T>>): Promise<Result<T>> {
    return this.queue.run(async () => {
      const result = await task();
      if (!result.ok) {
        this.logger.warn({ operation, ...plainFields(result.error) }, 'Staking operation rejected');
      }
      return result;
    });
  }
}
