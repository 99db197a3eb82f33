import { err, ok, ResultAsync, type Result } from 'neverthrow';
import type {
  AppError,
  Confirmation,
  CumulativeCounts,
  Job,
  JobSnapshot,
  PrinterCountsSnapshot,
  RollSnapshot
} from '../../../shared/src';
import { createAppError, ErrorCodes, toAppError } from '../errors';
import { logger } from '../logger';
import type { JobStore } from '../repo/jobStore';
import { pushAppMessage } from './messages';
import { RollTracker, type ProgressUpdate, type RollActionSink } from './rollTracker';

export type JobCoordinatorOptions = {
  sink: RollActionSink;
  store: Pick<JobStore, 'updateJobCompletion'>;
  now?: () => Date;
};

export function totalRollsFor(job: Pick<Job, 'quantity' | 'labelsPerRoll'>): number {
  return Math.ceil(job.quantity / job.labelsPerRoll);
}

/** Owns the rolls of one open job and routes its printer's counters to the roll that is running. */
export class JobCoordinator {
  private readonly rolls: RollTracker[];
  private readonly sink: RollActionSink;
  private readonly store: Pick<JobStore, 'updateJobCompletion'>;
  private jobRecord: Job;

  constructor(job: Job, options: JobCoordinatorOptions) {
    this.jobRecord = { ...job };
    this.sink = options.sink;
    this.store = options.store;
    // Every roll, the last included, aims for labelsPerRoll.
    this.rolls = Array.from(
      { length: totalRollsFor(job) },
      (_, idx) =>
        new RollTracker({
          jobId: job.id,
          rollNumber: idx + 1,
          labelsGoal: job.labelsPerRoll,
          sink: options.sink,
          now: options.now
        })
    );
  }

  get job(): Job {
    return { ...this.jobRecord };
  }

  get printerName(): string {
    return this.jobRecord.printerName;
  }

  get totalRolls(): number {
    return this.rolls.length;
  }

  isCompleted(): boolean {
    return this.jobRecord.completed;
  }

  /** Roll number of the running roll, or null when none is running. */
  runningRoll(): number | null {
    return this.rolls.find((roll) => roll.state === 'running')?.rollNumber ?? null;
  }

  allRollsIdle(): boolean {
    return this.rolls.every((roll) => roll.state === 'idle');
  }

  routeUpdate(printerId: string, cumulative: CumulativeCounts): ProgressUpdate | null {
    if (printerId !== this.jobRecord.printerName) return null;
    const running = this.rolls.find((roll) => roll.state === 'running');
    if (!running) return null;
    const update = running.updateProgress(cumulative);
    if (update.outcome === 'completed') {
      logger.info(
        { jobId: this.jobRecord.id, rollNumber: running.rollNumber, printerName: printerId },
        'jobCoordinator: roll reached its goal'
      );
      pushAppMessage('roll.completed', {
        rollNumber: running.rollNumber,
        jobId: this.jobRecord.id,
        labelsGoal: running.labelsGoal,
        printerName: printerId
      });
    }
    return update;
  }

  routeCounts(counts: PrinterCountsSnapshot): ProgressUpdate | null {
    const entry = counts[this.jobRecord.printerName];
    return entry ? this.routeUpdate(entry.printerId, entry) : null;
  }

  startRoll(rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => {
      const blocked = this.checkNoOtherRunning(roll, 'start');
      return blocked ?? roll.start();
    });
  }

  pauseRoll(rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => roll.pause());
  }

  resumeRoll(rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => {
      const blocked = this.checkNoOtherRunning(roll, 'resume');
      return blocked ?? roll.resume();
    });
  }

  stopRoll(rollNumber: number, confirmation: Confirmation): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => {
      const result = roll.stop(confirmation);
      if (result.isOk()) {
        pushAppMessage('roll.stopped', {
          rollNumber,
          jobId: this.jobRecord.id,
          progress: result.value.currentProgress,
          labelsGoal: result.value.labelsGoal
        });
      }
      return result;
    });
  }

  setNoteDraft(rollNumber: number, text: string): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => roll.setNoteDraft(text));
  }

  submitNote(rollNumber: number, text?: string): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => roll.submitNote(text));
  }

  discardNote(rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withRoll(rollNumber, (roll) => roll.discardNote());
  }

  /**
   * Marks the job complete. The store update must succeed before anything changes here,
   * and once it has the job cannot be reopened.
   */
  async completeJob(confirmation: Confirmation): Promise<Result<JobSnapshot, AppError>> {
    const jobId = this.jobRecord.id;
    if (this.jobRecord.completed) {
      return err(createAppError(ErrorCodes.jobInvalidTransition, `Job ${jobId} is already complete`, { jobId }));
    }
    const running = this.runningRoll();
    if (running !== null) {
      return err(
        createAppError(ErrorCodes.jobInvalidTransition, `Roll ${running} of job ${jobId} is still running`, {
          jobId,
          rollNumber: running
        })
      );
    }
    if (!confirmation.confirmed) {
      return err(
        createAppError(ErrorCodes.confirmationRequired, `Completing job ${jobId} cannot be undone and must be confirmed`)
      );
    }

    const updated = await ResultAsync.fromPromise(this.store.updateJobCompletion(jobId, true), toAppError);
    if (updated.isErr()) {
      logger.error({ jobId, error: updated.error }, 'jobCoordinator: failed to mark job complete');
      return err(updated.error);
    }
    if (!updated.value) {
      return err(createAppError(ErrorCodes.jobNotFound, `Job ${jobId} no longer exists`, { jobId }));
    }

    this.jobRecord = { ...this.jobRecord, completed: true };
    this.sink.record(jobId, 0, 'job completed', 'Job marked as complete');
    logger.info({ jobId }, 'jobCoordinator: job marked complete');
    pushAppMessage('job.completed', { jobId, ticket: this.jobRecord.ticket });
    return ok(this.snapshot());
  }

  roll(rollNumber: number): RollSnapshot | null {
    return this.rolls[rollNumber - 1]?.snapshot() ?? null;
  }

  snapshot(): JobSnapshot {
    return {
      job: this.job,
      totalRolls: this.rolls.length,
      completed: this.jobRecord.completed,
      runningRoll: this.runningRoll(),
      rolls: this.rolls.map((roll) => roll.snapshot())
    };
  }

  private withRoll(
    rollNumber: number,
    fn: (roll: RollTracker) => Result<RollSnapshot, AppError>
  ): Result<RollSnapshot, AppError> {
    const roll = Number.isInteger(rollNumber) ? this.rolls[rollNumber - 1] : undefined;
    if (!roll) {
      return err(
        createAppError(ErrorCodes.rollNotFound, `Job ${this.jobRecord.id} has no roll ${rollNumber}`, {
          jobId: this.jobRecord.id,
          rollNumber,
          totalRolls: this.rolls.length
        })
      );
    }
    return fn(roll);
  }

  private checkNoOtherRunning(roll: RollTracker, verb: string): Result<RollSnapshot, AppError> | null {
    if (this.jobRecord.completed) {
      return err(
        createAppError(ErrorCodes.invalidTransition, `Cannot ${verb} roll ${roll.rollNumber}: job ${roll.jobId} is complete`, {
          jobId: roll.jobId,
          rollNumber: roll.rollNumber
        })
      );
    }
    const running = this.runningRoll();
    if (running !== null && running !== roll.rollNumber) {
      return err(
        createAppError(
          ErrorCodes.invalidTransition,
          `Cannot ${verb} roll ${roll.rollNumber} while roll ${running} of job ${roll.jobId} is running`,
          { jobId: roll.jobId, rollNumber: roll.rollNumber, runningRoll: running }
        )
      );
    }
    return null;
  }
}
