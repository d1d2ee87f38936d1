/**
 * Access Control Test Suite
 *
 * Tests for owner/whitelist guards and the deposit cooldown
 */

import { describe, it, expect } from 'vitest';
import { AccessControl, CooldownGuard, DEFAULT_COOLDOWN_PERIOD } from '../src/staking';

describe('AccessControl', () => {
  it('should accept only the owner for admin checks', () => {
    const access = new AccessControl('owner');

    expect(access.requireOwner('owner')).toEqual({ ok: true, value: undefined });
    expect(access.requireOwner('alice')).toEqual({
      ok: false,
      error: { kind: 'NotOwner', caller: 'alice' },
    });
  });

  it('should not whitelist the owner implicitly', () => {
    const access = new AccessControl('owner');

    expect(access.requireApproved('owner').ok).toBe(false);
  });

  it('should follow the latest approval status', () => {
    const access = new AccessControl('owner');
    access.setApproval('alice', true);
    access.setApproval('alice', true);

    expect(access.requireApproved('alice').ok).toBe(true);

    access.setApproval('alice', false);
    expect(access.requireApproved('alice')).toEqual({
      ok: false,
      error: { kind: 'NotApproved', caller: 'alice' },
    });
    expect(access.isApproved('alice')).toBe(false);
  });
});

describe('CooldownGuard', () => {
  it('should default to one day', () => {
    expect(new CooldownGuard().period).toBe(86_400);
    expect(DEFAULT_COOLDOWN_PERIOD).toBe(86_400);
  });

  it('should let a first deposit through at any time', () => {
    const guard = new CooldownGuard();

    expect(guard.check('alice', 0).ok).toBe(true);
    expect(guard.lastDepositTime('alice')).toBeNull();
  });

  it('should block until the period has fully elapsed', () => {
    const guard = new CooldownGuard(100);
    guard.record('alice', 50);

    expect(guard.check('alice', 149)).toEqual({
      ok: false,
      error: { kind: 'CooldownActive', principal: 'alice', availableAt: 150 },
    });
    expect(guard.check('alice', 150).ok).toBe(true);
  });

  it('should track principals independently', () => {
    const guard = new CooldownGuard(100);
    guard.record('alice', 50);

    expect(guard.check('bob', 51).ok).toBe(true);
    expect(guard.lastDepositTime('alice')).toBe(50);
  });
});
