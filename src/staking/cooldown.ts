import { err, ok, type Principal, type Result } from './errors';

export const DEFAULT_COOLDOWN_PERIOD = 24 * 60 * 60;

/**
 * Minimum gap between deposits by the same principal, across all tiers.
 */
export class CooldownGuard {
  private lastDeposit: Map<Principal, number> = new Map();

  constructor(readonly period: number = DEFAULT_COOLDOWN_PERIOD) {}

  // Principals that never deposited have no cooldown
  check(principal: Principal, now: number): Result<void> {
    const last = this.lastDeposit.get(principal);
    if (last === undefined) return ok();

    const availableAt = last + this.period;
    if (now < availableAt) {
      return err({ kind: 'CooldownActive', principal, availableAt });
    }
    return ok();
  }

  record(principal: Principal, now: number): void {
    this.lastDeposit.set(principal, now);
  }

  lastDepositTime(principal: Principal): number | null {
    return this.lastDeposit.get(principal) ?? null;
  }
}
