import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Job } from '../../packages/shared/src';
import type { RollActionSink } from '../../packages/main/src/services/rollTracker';

import { JobCoordinator, totalRollsFor } from '../../packages/main/src/services/jobCoordinator';

const { pushAppMessage } = vi.hoisted(() => ({ pushAppMessage: vi.fn() }));
vi.mock('../../packages/main/src/services/messages', () => ({ pushAppMessage }));

const baseJob: Job = {
  id: 11,
  customer: 'Acme Foods',
  ticket: 'T-100',
  inlayType: 'UHF',
  quantity: 250,
  labelsPerRoll: 100,
  printerName: 'P1',
  createdAt: '2025-03-04T09:00:00.000Z',
  completed: false
};

function makeCoordinator(job: Partial<Job> = {}) {
  const record = vi.fn<RollActionSink['record']>();
  const updateJobCompletion = vi.fn(async (_id: number, _completed: boolean) => true);
  const coordinator = new JobCoordinator({ ...baseJob, ...job }, { sink: { record }, store: { updateJobCompletion } });
  return { coordinator, record, updateJobCompletion };
}

describe('JobCoordinator', () => {
  beforeEach(() => {
    pushAppMessage.mockClear();
  });

  it('creates one roll per started block of labels, each aiming for labelsPerRoll', () => {
    const { coordinator } = makeCoordinator();
    expect(coordinator.totalRolls).toBe(3);
    expect(coordinator.snapshot().rolls.map((roll) => roll.labelsGoal)).toEqual([100, 100, 100]);
    expect(totalRollsFor({ quantity: 200, labelsPerRoll: 100 })).toBe(2);
    expect(totalRollsFor({ quantity: 1, labelsPerRoll: 500 })).toBe(1);
  });

  it('drives the running roll from its own printer only', () => {
    const { coordinator } = makeCoordinator();
    coordinator.startRoll(1);

    expect(coordinator.routeUpdate('P2', { pass: 9, fail: 0 })).toBeNull();
    coordinator.routeUpdate('P1', { pass: 2, fail: 0 });
    const update = coordinator.routeUpdate('P1', { pass: 102, fail: 0 });

    expect(update?.outcome).toBe('completed');
    expect(coordinator.roll(1)?.state).toBe('completed');
    expect(pushAppMessage).toHaveBeenCalledWith('roll.completed', {
      rollNumber: 1,
      jobId: 11,
      labelsGoal: 100,
      printerName: 'P1'
    });
  });

  it('routes whole snapshots by printer name', () => {
    const { coordinator } = makeCoordinator();
    coordinator.startRoll(2);
    coordinator.routeCounts({ P1: { printerId: 'P1', pass: 5, fail: 1 }, P2: { printerId: 'P2', pass: 50, fail: 0 } });
    coordinator.routeCounts({ P1: { printerId: 'P1', pass: 8, fail: 1 } });
    expect(coordinator.roll(2)?.currentProgress).toBe(3);
    expect(coordinator.routeCounts({ P2: { printerId: 'P2', pass: 60, fail: 0 } })).toBeNull();
  });

  it('allows only one running roll at a time', () => {
    const { coordinator } = makeCoordinator();
    coordinator.startRoll(1);

    const second = coordinator.startRoll(2);
    expect(second._unsafeUnwrapErr().code).toBe('roll.invalidTransition');
    expect(coordinator.roll(2)?.state).toBe('idle');

    coordinator.pauseRoll(1);
    coordinator.startRoll(2);
    expect(coordinator.resumeRoll(1)._unsafeUnwrapErr().code).toBe('roll.invalidTransition');
    expect(coordinator.runningRoll()).toBe(2);
  });

  it('returns roll.notFound for roll numbers outside the job', () => {
    const { coordinator } = makeCoordinator();
    expect(coordinator.startRoll(0)._unsafeUnwrapErr().code).toBe('roll.notFound');
    expect(coordinator.pauseRoll(4)._unsafeUnwrapErr().code).toBe('roll.notFound');
    expect(coordinator.submitNote(1.5, 'x')._unsafeUnwrapErr().code).toBe('roll.notFound');
  });

  it('announces stopped rolls', () => {
    const { coordinator } = makeCoordinator();
    coordinator.startRoll(1);
    coordinator.routeUpdate('P1', { pass: 0, fail: 0 });
    coordinator.routeUpdate('P1', { pass: 37, fail: 0 });

    coordinator.stopRoll(1, { confirmed: true });

    expect(pushAppMessage).toHaveBeenCalledWith('roll.stopped', { rollNumber: 1, jobId: 11, progress: 37, labelsGoal: 100 });
  });

  it('completes the job once confirmed and no roll is running', async () => {
    const { coordinator, record, updateJobCompletion } = makeCoordinator();
    coordinator.startRoll(1);

    expect((await coordinator.completeJob({ confirmed: true }))._unsafeUnwrapErr().code).toBe('job.invalidTransition');
    coordinator.pauseRoll(1);
    expect((await coordinator.completeJob({ confirmed: false }))._unsafeUnwrapErr().code).toBe('confirmation.required');
    expect(updateJobCompletion).not.toHaveBeenCalled();

    const done = (await coordinator.completeJob({ confirmed: true }))._unsafeUnwrap();

    expect(done.completed).toBe(true);
    expect(updateJobCompletion).toHaveBeenCalledWith(11, true);
    expect(record).toHaveBeenLastCalledWith(11, 0, 'job completed', 'Job marked as complete');
    expect((await coordinator.completeJob({ confirmed: true }))._unsafeUnwrapErr().code).toBe('job.invalidTransition');
    expect(coordinator.resumeRoll(1)._unsafeUnwrapErr().code).toBe('roll.invalidTransition');
  });

  it('leaves the job open when the store cannot mark it complete', async () => {
    const { coordinator, record, updateJobCompletion } = makeCoordinator();
    updateJobCompletion.mockRejectedValueOnce(new Error('connection reset'));

    const result = await coordinator.completeJob({ confirmed: true });

    expect(result._unsafeUnwrapErr()).toMatchObject({ code: 'unknown', message: 'connection reset' });
    expect(coordinator.isCompleted()).toBe(false);
    expect(record).not.toHaveBeenCalled();
  });
});
