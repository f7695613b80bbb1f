import { PANIC_STATES, type PanicState } from '../config/constants.js';
import { IllegalTransitionError } from '../utils/errors.js';

const { IDLE, DISABLING, CANCELING, FLATTENING, VERIFYING, LOCKED, FAILED_PARTIAL } = PANIC_STATES;

/**
 * Allowed moves. IDLE may jump straight to a terminal state when a persisted lock is restored.
 */
export const PANIC_TRANSITIONS: Readonly<Record<PanicState, readonly PanicState[]>> = {
  IDLE: [DISABLING, LOCKED, FAILED_PARTIAL],
  DISABLING: [CANCELING, FAILED_PARTIAL],
  CANCELING: [FLATTENING, FAILED_PARTIAL],
  FLATTENING: [VERIFYING, FAILED_PARTIAL],
  VERIFYING: [LOCKED, FAILED_PARTIAL],
  LOCKED: [IDLE],
  FAILED_PARTIAL: [IDLE],
};

export function canTransition(from: PanicState, to: PanicState): boolean {
  return PANIC_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PanicState, to: PanicState): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}

export function isRunning(state: PanicState): boolean {
  return state === DISABLING || state === CANCELING || state === FLATTENING || state === VERIFYING;
}

export function isTerminal(state: PanicState): boolean {
  return state === LOCKED || state === FAILED_PARTIAL;
}
