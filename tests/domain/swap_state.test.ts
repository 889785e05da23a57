import { describe, expect, it } from 'vitest';
import {
  assertSwapStateTransition,
  canTransitionSwapState,
  isCancellableSwapState,
  isTerminalSwapState
} from '../../src/domain/model/swap_state';

describe('swap state transitions', () => {
  it('allows the happy path and a rebuild after rejection', () => {
    expect(canTransitionSwapState('RECEIVED', 'VALIDATED')).toBe(true);
    expect(canTransitionSwapState('VALIDATED', 'QUOTED')).toBe(true);
    expect(canTransitionSwapState('QUOTED', 'BALANCE_CHECKED')).toBe(true);
    expect(canTransitionSwapState('BALANCE_CHECKED', 'TX_BUILT')).toBe(true);
    expect(canTransitionSwapState('TX_BUILT', 'SIGNED')).toBe(true);
    expect(canTransitionSwapState('SIGNED', 'TX_BUILT')).toBe(true);
    expect(canTransitionSwapState('SIGNED', 'SUBMITTED')).toBe(true);
    expect(canTransitionSwapState('SUBMITTED', 'RECONCILED')).toBe(true);
    expect(canTransitionSwapState('SUBMITTED', 'UNKNOWN_OUTCOME')).toBe(true);
  });

  it('rejects skipping states and cancelling after signing', () => {
    expect(canTransitionSwapState('VALIDATED', 'TX_BUILT')).toBe(false);
    expect(canTransitionSwapState('SIGNED', 'CANCELLED')).toBe(false);
    expect(canTransitionSwapState('RECONCILED', 'FAILED')).toBe(false);
    expect(() => assertSwapStateTransition('QUOTED', 'SUBMITTED')).toThrowError(
      /Invalid swap state transition: QUOTED -> SUBMITTED/
    );
  });

  it('only lets pre-build states be cancelled', () => {
    expect(isCancellableSwapState('BALANCE_CHECKED')).toBe(true);
    expect(isCancellableSwapState('TX_BUILT')).toBe(false);
    expect(isCancellableSwapState('SUBMITTED')).toBe(false);
  });

  it('marks outcome states as terminal', () => {
    expect(isTerminalSwapState('RECONCILED')).toBe(true);
    expect(isTerminalSwapState('UNKNOWN_OUTCOME')).toBe(true);
    expect(isTerminalSwapState('CANCELLED')).toBe(true);
    expect(isTerminalSwapState('SUBMITTED')).toBe(false);
  });
});
