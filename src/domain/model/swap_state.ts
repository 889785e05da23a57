export const SWAP_STATE_VALUES = [
  'RECEIVED',
  'VALIDATED',
  'QUOTED',
  'BALANCE_CHECKED',
  'TX_BUILT',
  'SIGNED',
  'SUBMITTED',
  'RECONCILED',
  'UNKNOWN_OUTCOME',
  'FAILED',
  'CANCELLED'
] as const;

export type SwapState = (typeof SWAP_STATE_VALUES)[number];

const ALLOWED_TRANSITIONS: Record<SwapState, readonly SwapState[]> = {
  RECEIVED: ['VALIDATED', 'FAILED', 'CANCELLED'],
  VALIDATED: ['QUOTED', 'FAILED', 'CANCELLED'],
  QUOTED: ['BALANCE_CHECKED', 'FAILED', 'CANCELLED'],
  BALANCE_CHECKED: ['TX_BUILT', 'FAILED', 'CANCELLED'],
  TX_BUILT: ['SIGNED', 'FAILED'],
  // SIGNED -> TX_BUILT: the node rejected the transaction before accepting it, rebuild.
  SIGNED: ['SUBMITTED', 'TX_BUILT', 'FAILED'],
  SUBMITTED: ['RECONCILED', 'UNKNOWN_OUTCOME', 'FAILED'],
  RECONCILED: [],
  UNKNOWN_OUTCOME: [],
  FAILED: [],
  CANCELLED: []
};

const CANCELLABLE_STATES: readonly SwapState[] = ['RECEIVED', 'VALIDATED', 'QUOTED', 'BALANCE_CHECKED'];

export function canTransitionSwapState(from: SwapState, to: SwapState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertSwapStateTransition(from: SwapState, to: SwapState): void {
  if (!canTransitionSwapState(from, to)) {
    throw new Error(`Invalid swap state transition: ${from} -> ${to}`);
  }
}

export function isCancellableSwapState(state: SwapState): boolean {
  return CANCELLABLE_STATES.includes(state);
}

export function isTerminalSwapState(state: SwapState): boolean {
  return ALLOWED_TRANSITIONS[state].length === 0;
}
