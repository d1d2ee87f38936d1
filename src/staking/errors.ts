/**
 * Staking Errors
 *
 * Every failure the engine can report, as a closed union keyed on `kind`.
 * Operations return a Result instead of throwing.
 */

export type Principal = string;

export type StakingError =
  | { kind: 'NotOwner'; caller: Principal }
  | { kind: 'NotApproved'; caller: Principal }
  | { kind: 'InvalidTier'; tierId: number }
  | { kind: 'ZeroAmount' }
  | { kind: 'CooldownActive'; principal: Principal; availableAt: number }
  | { kind: 'NoActiveStake'; principal: Principal; tierId: number }
  | { kind: 'StakeAlreadyClaimed'; principal: Principal }
  | { kind: 'StakeStillLocked'; principal: Principal; tierId: number; unlockTimestamp: number }
  | {
      kind: 'TransferFailed';
      direction: 'in' | 'out';
      principal: Principal;
      amount: bigint;
      reason?: string;
    };

export type StakingErrorKind = StakingError['kind'];

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: StakingError };

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok<T>(value?: T): Result<T | undefined> {
  return { ok: true, value };
}

export function err<T = never>(error: StakingError): Result<T> {
  return { ok: false, error };
}

/**
 * Human readable message for logs and HTTP responses
 */
export function describeError(error: StakingError): string {
  switch (error.kind) {
    case 'NotOwner':
      return `${error.caller} is not the owner`;
    case 'NotApproved':
      return `${error.caller} is not whitelisted`;
    case 'InvalidTier':
      return `Tier ${error.tierId} is not configured`;
    case 'ZeroAmount':
      return 'Amount must be greater than zero';
    case 'CooldownActive':
      return `Deposit cooldown active until ${error.availableAt}`;
    case 'NoActiveStake':
      return `No active stake in tier ${error.tierId}`;
    case 'StakeAlreadyClaimed':
      return `${error.principal} has already claimed`;
    case 'StakeStillLocked':
      return `Stake locked until ${error.unlockTimestamp}`;
    case 'TransferFailed':
      return error.reason
        ? `Transfer ${error.direction} of ${error.amount} failed: ${error.reason}`
        : `Transfer ${error.direction} of ${error.amount} failed`;
  }
}
