/**
 * Access Control
 *
 * One immutable owner plus a flat whitelist. No roles, no ownership transfer.
 */

import { err, ok, type Principal, type Result } from './errors';

export class AccessControl {
  private approved: Set<Principal> = new Set();

  constructor(readonly owner: Principal) {}

  requireOwner(caller: Principal): Result<void> {
    return caller === this.owner ? ok() : err({ kind: 'NotOwner', caller });
  }

  requireApproved(caller: Principal): Result<void> {
    return this.approved.has(caller) ? ok() : err({ kind: 'NotApproved', caller });
  }

  setApproval(principal: Principal, approved: boolean): void {
    if (approved) {
      this.approved.add(principal);
    } else {
      this.approved.delete(principal);
    }
  }

  isApproved(principal: Principal): boolean {
    return this.approved.has(principal);
  }
}
