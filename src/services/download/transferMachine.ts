import type { Availability } from '../index/types';
import type { TransferState } from './types';

/**
 * Per-segment transfer state machine.
 *
 *   pending ──run──▶ running ──commit──▶ completed
 *      │                │  └──fail────▶ failed
 *      └──cancel──┬─────┘
 *                 ▼
 *          paused-by-cancel
 *
 * Terminal states accept nothing. A cancel that arrives once the transfer is
 * committing has no transition: completion wins.
 */
export type TransferAction = 'run' | 'commit' | 'fail' | 'cancel';

const TRANSITIONS: Record<TransferState, Partial<Record<TransferAction, TransferState>>> = {
  'pending': { run: 'running', cancel: 'paused-by-cancel', fail: 'failed' },
  'running': { commit: 'completed', fail: 'failed', cancel: 'paused-by-cancel' },
  'paused-by-cancel': {},
  'completed': {},
  'failed': {},
};

/** Next state, or null when the action doesn't apply in `state`. */
export function nextTransferState(state: TransferState, action: TransferAction): TransferState | null {
  return TRANSITIONS[state][action] ?? null;
}

export function isActive(state: TransferState): boolean {
  return state === 'pending' || state === 'running';
}

export function isTerminal(state: TransferState): boolean {
  return !isActive(state);
}

/** Segment availability implied by a transfer in `state`. */
export function availabilityFor(state: TransferState): Availability {
  switch (state) {
    case 'pending':
    case 'running':
      return 'downloading';
    case 'completed':
      return 'available-local';
    case 'paused-by-cancel':
    case 'failed':
      return 'available-remote';
  }
}
