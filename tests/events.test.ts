/**
 * Staking Event Log Test Suite
 */

import { describe, it, expect } from 'vitest';
import { makeNoopLogger } from '../src/logger';
import { DEFAULT_MAX_HISTORY, StakingEventLog, type StakingEvent } from '../src/staking';

const approval = (principal: string): StakingEvent => ({
  type: 'WhitelistChanged',
  principal,
  approved: true,
});

describe('StakingEventLog', () => {
  it('should keep only the newest entries once the cap is reached', () => {
    const log = new StakingEventLog(makeNoopLogger(), 3);
    for (const principal of ['a', 'b', 'c', 'd', 'e']) {
      log.emit(approval(principal));
    }

    expect(log.all()).toEqual([approval('c'), approval('d'), approval('e')]);
  });

  it('should still notify subscribers of events dropped from history', () => {
    const log = new StakingEventLog(makeNoopLogger(), 1);
    const seen: string[] = [];
    log.subscribe((event) => {
      if (event.type === 'WhitelistChanged') seen.push(event.principal);
    });

    log.emit(approval('a'));
    log.emit(approval('b'));

    expect(seen).toEqual(['a', 'b']);
    expect(log.all()).toEqual([approval('b')]);
  });

  it('should default to a bounded history', () => {
    const log = new StakingEventLog(makeNoopLogger());
    for (let i = 0; i < DEFAULT_MAX_HISTORY + 5; i++) {
      log.emit(approval(`p${i}`));
    }

    expect(log.all()).toHaveLength(DEFAULT_MAX_HISTORY);
    expect(log.all()[0]).toEqual(approval('p5'));
  });
});
