import { InvalidTransitionError } from '../errors/index.js';
import type { SessionState } from './types.js';

/**
 * Allowed state changes. Abort reaches every non-terminal state because it
 * propagates through whole subtrees, pending and retrying sessions included.
 */
export const ALLOWED_TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  pending: ['running', 'skipped', 'aborted'],
  running: ['awaiting_verification', 'aborted'],
  awaiting_verification: ['done', 'retrying', 'aborted'],
  retrying: ['running', 'aborted'],
  done: [],
  aborted: [],
  skipped: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(sessionId: string, from: SessionState, to: SessionState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(sessionId, from, to);
  }
}
