import { InvalidTransitionError } from './errors/InvalidTransitionError';
import { FlowStateKinds, type FlowStateKind } from './types';

const {
  idle,
  scanning,
  tagDetected,
  pinEntry,
  verifying,
  verified,
  profileRevealed,
  error,
} = FlowStateKinds;

/**
 * Allowed successors of each flow state. Every state may return to idle.
 */
export const allowedTransitions: Readonly<
  Record<FlowStateKind, ReadonlyArray<FlowStateKind>>
> = {
  [idle]: [scanning],
  [scanning]: [tagDetected, error, idle],
  [tagDetected]: [pinEntry, error, idle],
  [pinEntry]: [verifying, error, idle],
  [verifying]: [verified, error, idle],
  [verified]: [profileRevealed, error, idle],
  [profileRevealed]: [idle],
  [error]: [idle],
};

export const canTransition = (from: FlowStateKind, to: FlowStateKind) =>
  allowedTransitions[from].includes(to);

export const assertTransition = (
  from: FlowStateKind,
  to: FlowStateKind
): void => {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
};
