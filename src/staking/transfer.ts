/**
 * Asset Transfer
 *
 * The engine never keeps token balances itself. It asks an external ledger
 * to move funds into its custody on deposit and out to the principal on
 * claim. Either call may report failure.
 */

import type { Principal } from './errors';

export interface AssetTransfer {
  transferIn(from: Principal, to: Principal, amount: bigint): Promise<boolean>;
  transferOut(to: Principal, amount: bigint): Promise<boolean>;
}

/**
 * In-process asset ledger. Transfers fail on insufficient balance.
 */
export class InMemoryAssetLedger implements AssetTransfer {
  private balances: Map<Principal, bigint> = new Map();

  constructor(readonly custody: Principal) {}

  balanceOf(account: Principal): bigint {
    return this.balances.get(account) ?? 0n;
  }

  credit(account: Principal, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  async transferIn(from: Principal, to: Principal, amount: bigint): Promise<boolean> {
    return this.move(from, to, amount);
  }

  async transferOut(to: Principal, amount: bigint): Promise<boolean> {
    return this.move(this.custody, to, amount);
  }

  private move(from: Principal, to: Principal, amount: bigint): boolean {
    const available = this.balanceOf(from);
    if (amount < 0n || available < amount) {
      return false;
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }
}
