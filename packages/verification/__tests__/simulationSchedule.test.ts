import { afterEach, describe, expect, it, vi } from 'vitest';
import { CancellationToken } from '@tapconsent/domain';
import {
  buildSimulationSchedule,
  runSimulationSchedule,
  scheduleDurationMs,
  type SimulationAction,
} from '../src/simulationSchedule';

afterEach(() => {
  vi.useRealTimers();
});

describe('buildSimulationSchedule', () => {
  it('lays out the scripted timeline', () => {
    const schedule = buildSimulationSchedule([1, 2, 3, 4]);

    expect(schedule.map((step) => step.delayMs)).toEqual([
      800, 500, 400, 400, 400, 400, 300, 1200, 500,
    ]);
    expect(schedule.map((step) => step.action)).toEqual([
      { kind: 'detect-tag' },
      { kind: 'open-pin-entry' },
      { kind: 'enter-digit', digit: 1 },
      { kind: 'enter-digit', digit: 2 },
      { kind: 'enter-digit', digit: 3 },
      { kind: 'enter-digit', digit: 4 },
      { kind: 'begin-verifying' },
      { kind: 'complete-verification' },
      { kind: 'reveal-profile' },
    ]);
    expect(scheduleDurationMs(schedule)).toBe(4900);
  });

  it('staggers one step per scripted digit', () => {
    const schedule = buildSimulationSchedule([7, 7, 7, 7, 7, 7]);
    expect(schedule).toHaveLength(11);
    expect(scheduleDurationMs(schedule)).toBe(5700);
  });
});

describe('runSimulationSchedule', () => {
  it('performs each action after its delay', async () => {
    vi.useFakeTimers();
    const performed: Array<[number, SimulationAction['kind']]> = [];
    const start = Date.now();
    const run = runSimulationSchedule(
      buildSimulationSchedule([5]),
      (action) => {
        performed.push([Date.now() - start, action.kind]);
        return true;
      },
      new CancellationToken()
    );

    await vi.advanceTimersByTimeAsync(3700);

    await expect(run).resolves.toBe(true);
    expect(performed).toEqual([
      [800, 'detect-tag'],
      [1300, 'open-pin-entry'],
      [1700, 'enter-digit'],
      [2000, 'begin-verifying'],
      [3200, 'complete-verification'],
      [3700, 'reveal-profile'],
    ]);
  });

  it('stops when an action declines to continue', async () => {
    vi.useFakeTimers();
    const perform = vi.fn((action: SimulationAction) => action.kind !== 'open-pin-entry');
    const run = runSimulationSchedule(
      buildSimulationSchedule([1]),
      perform,
      new CancellationToken()
    );

    await vi.advanceTimersByTimeAsync(10_000);

    await expect(run).resolves.toBe(false);
    expect(perform).toHaveBeenCalledTimes(2);
  });

  it('performs nothing after cancellation', async () => {
    vi.useFakeTimers();
    const token = new CancellationToken();
    const perform = vi.fn(() => true);
    const run = runSimulationSchedule(
      buildSimulationSchedule([1, 2]),
      perform,
      token
    );

    await vi.advanceTimersByTimeAsync(1300);
    token.cancel();
    await expect(run).resolves.toBe(false);
    await vi.advanceTimersByTimeAsync(10_000);

    expect(perform).toHaveBeenCalledTimes(2);
    expect(vi.getTimerCount()).toBe(0);
  });
});
