import type { CancellationToken } from '@tapconsent/domain';

export const SimulationActionKinds = {
  detectTag: 'detect-tag',
  openPinEntry: 'open-pin-entry',
  enterDigit: 'enter-digit',
  beginVerifying: 'begin-verifying',
  completeVerification: 'complete-verification',
  revealProfile: 'reveal-profile',
} as const;

export type SimulationAction =
  | Readonly<{ kind: typeof SimulationActionKinds.detectTag }>
  | Readonly<{ kind: typeof SimulationActionKinds.openPinEntry }>
  | Readonly<{ kind: typeof SimulationActionKinds.enterDigit; digit: number }>
  | Readonly<{ kind: typeof SimulationActionKinds.beginVerifying }>
  | Readonly<{ kind: typeof SimulationActionKinds.completeVerification }>
  | Readonly<{ kind: typeof SimulationActionKinds.revealProfile }>;

export type SimulationStep = Readonly<{
  /** Wait before the action, measured from the previous step. */
  delayMs: number;
  action: SimulationAction;
}>;

export const SimulationDelays = {
  detectTag: 800,
  openPinEntry: 500,
  digitStagger: 400,
  settle: 300,
  verifyingHold: 1200,
  reveal: 500,
} as const;

export const DEFAULT_SIMULATED_DIGITS: ReadonlyArray<number> = [1, 2, 3, 4];

export const buildSimulationSchedule = (
  digits: ReadonlyArray<number> = DEFAULT_SIMULATED_DIGITS
): ReadonlyArray<SimulationStep> => [
  {
    delayMs: SimulationDelays.detectTag,
    action: { kind: SimulationActionKinds.detectTag },
  },
  {
    delayMs: SimulationDelays.openPinEntry,
    action: { kind: SimulationActionKinds.openPinEntry },
  },
  ...digits.map(
    (digit): SimulationStep => ({
      delayMs: SimulationDelays.digitStagger,
      action: { kind: SimulationActionKinds.enterDigit, digit },
    })
  ),
  {
    delayMs: SimulationDelays.settle,
    action: { kind: SimulationActionKinds.beginVerifying },
  },
  {
    delayMs: SimulationDelays.verifyingHold,
    action: { kind: SimulationActionKinds.completeVerification },
  },
  {
    delayMs: SimulationDelays.reveal,
    action: { kind: SimulationActionKinds.revealProfile },
  },
];

export const scheduleDurationMs = (
  schedule: ReadonlyArray<SimulationStep>
): number => schedule.reduce((total, step) => total + step.delayMs, 0);

/**
 * Runs the steps in order. Stops without performing anything further once
 * the token is cancelled or an action returns `false`. Resolves `true` when
 * every step ran.
 */
export const runSimulationSchedule = async (
  schedule: ReadonlyArray<SimulationStep>,
  perform: (action: SimulationAction) => boolean | Promise<boolean>,
  token: CancellationToken
): Promise<boolean> => {
  for (const step of schedule) {
    const slept = await token.sleep(step.delayMs);
    if (!slept) return false;
    const proceed = await perform(step.action);
    if (!proceed || token.isCancelled) return false;
  }
  return true;
};
