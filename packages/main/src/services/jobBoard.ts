import { err, ok, ResultAsync, type Result } from 'neverthrow';
import {
  JobInputSchema,
  type AppError,
  type Confirmation,
  type Job,
  type JobSnapshot,
  type PrinterCountsSnapshot,
  type RollAction,
  type RollSnapshot
} from '../../../shared/src';
import { createAppError, ErrorCodes, fromZodError, toAppError } from '../errors';
import { logger } from '../logger';
import type { JobStore } from '../repo/jobStore';
import { JobCoordinator, totalRollsFor } from './jobCoordinator';
import { pushAppMessage } from './messages';
import type { RollActionSink } from './rollTracker';

export type JobBoardOptions = {
  store: JobStore;
  sink: RollActionSink;
  /** Refuse to run a roll while another open job's roll is running on the same printer. */
  exclusiveRuns?: boolean;
  now?: () => Date;
};

/**
 * The set of open jobs. Every counts update from the ingest side is fanned out to each open job;
 * the job's coordinator decides whether the update concerns its printer.
 */
export class JobBoard {
  private readonly coordinators = new Map<number, JobCoordinator>();
  private readonly store: JobStore;
  private readonly sink: RollActionSink;
  private readonly exclusiveRuns: boolean;
  private readonly now: (() => Date) | undefined;
  private counts: PrinterCountsSnapshot = {};

  constructor(options: JobBoardOptions) {
    this.store = options.store;
    this.sink = options.sink;
    this.exclusiveRuns = options.exclusiveRuns ?? false;
    this.now = options.now;
  }

  async createJob(input: unknown): Promise<Result<Job, AppError>> {
    const parsed = JobInputSchema.safeParse(input);
    if (!parsed.success) return err(fromZodError(parsed.error));

    const created = await ResultAsync.fromPromise(
      this.store.addJob(parsed.data).then((id) => this.store.getJob(id)),
      toAppError
    );
    if (created.isErr()) {
      logger.error({ error: created.error }, 'jobBoard: failed to add job');
      return err(created.error);
    }
    const job = created.value;
    if (!job) {
      return err(createAppError(ErrorCodes.jobNotFound, 'The new job could not be read back'));
    }
    logger.info({ jobId: job.id, ticket: job.ticket, printerName: job.printerName }, 'jobBoard: job added');
    pushAppMessage('job.created', {
      jobId: job.id,
      ticket: job.ticket,
      customer: job.customer,
      printerName: job.printerName,
      totalRolls: totalRollsFor(job)
    });
    return ok(job);
  }

  async editJob(id: number, input: unknown): Promise<Result<Job, AppError>> {
    const parsed = JobInputSchema.safeParse(input);
    if (!parsed.success) return err(fromZodError(parsed.error));

    const existing = await this.fetchJob(id);
    if (existing.isErr()) return err(existing.error);
    if (existing.value.completed) {
      return err(createAppError(ErrorCodes.jobInvalidTransition, `Job ${id} is complete and cannot be edited`, { jobId: id }));
    }
    const open = this.coordinators.get(id);
    if (open && !open.allRollsIdle()) {
      return err(
        createAppError(ErrorCodes.jobInProgress, `Job ${id} has rolls in progress and cannot be edited`, { jobId: id })
      );
    }

    const saved = await ResultAsync.fromPromise(this.store.updateJob(id, parsed.data), toAppError);
    if (saved.isErr()) {
      logger.error({ jobId: id, error: saved.error }, 'jobBoard: failed to update job');
      return err(saved.error);
    }
    if (!saved.value) {
      return err(createAppError(ErrorCodes.jobNotFound, `Job ${id} not found`, { jobId: id }));
    }

    const job: Job = { ...existing.value, ...parsed.data };
    // The job may have been opened while the update was in flight.
    const current = this.coordinators.get(id);
    if (current) {
      if (current.allRollsIdle()) {
        this.coordinators.set(id, this.buildCoordinator(job));
      } else {
        logger.warn({ jobId: id }, 'jobBoard: job started while being edited; open rolls keep the previous goals');
      }
    }
    logger.info({ jobId: id }, 'jobBoard: job updated');
    pushAppMessage('job.updated', { jobId: id, ticket: job.ticket });
    return ok(job);
  }

  async listActiveJobs(): Promise<Result<Job[], AppError>> {
    return await ResultAsync.fromPromise(this.store.getActiveJobs(), toAppError);
  }

  async listCompletedJobs(): Promise<Result<Job[], AppError>> {
    return await ResultAsync.fromPromise(this.store.getCompletedJobs(), toAppError);
  }

  async listRollActions(jobId: number): Promise<Result<RollAction[], AppError>> {
    return await ResultAsync.fromPromise(this.store.listRollActions(jobId), toAppError);
  }

  async openJob(id: number): Promise<Result<JobSnapshot, AppError>> {
    const existing = this.coordinators.get(id);
    if (existing) return ok(existing.snapshot());

    const fetched = await this.fetchJob(id);
    if (fetched.isErr()) return err(fetched.error);
    const coordinator = this.coordinators.get(id) ?? this.buildCoordinator(fetched.value);
    this.coordinators.set(id, coordinator);
    logger.debug({ jobId: id, totalRolls: coordinator.totalRolls }, 'jobBoard: job opened');
    return ok(coordinator.snapshot());
  }

  /** Forgets the job's rolls. Progress of a roll that is still running is lost. */
  closeJob(id: number): Result<JobSnapshot, AppError> {
    const coordinator = this.coordinators.get(id);
    if (!coordinator) return err(this.notOpen(id));
    const running = coordinator.runningRoll();
    if (running !== null) {
      logger.warn({ jobId: id, rollNumber: running }, 'jobBoard: closing job with a running roll');
    }
    this.coordinators.delete(id);
    return ok(coordinator.snapshot());
  }

  getCoordinator(id: number): JobCoordinator | null {
    return this.coordinators.get(id) ?? null;
  }

  routeCounts(counts: PrinterCountsSnapshot): void {
    this.counts = counts;
    for (const coordinator of this.coordinators.values()) {
      coordinator.routeCounts(counts);
    }
  }

  latestCounts(): PrinterCountsSnapshot {
    return this.counts;
  }

  startRoll(jobId: number, rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => this.runGuarded(coordinator, rollNumber, () => coordinator.startRoll(rollNumber)));
  }

  pauseRoll(jobId: number, rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => coordinator.pauseRoll(rollNumber));
  }

  resumeRoll(jobId: number, rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => this.runGuarded(coordinator, rollNumber, () => coordinator.resumeRoll(rollNumber)));
  }

  stopRoll(jobId: number, rollNumber: number, confirmation: Confirmation): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => coordinator.stopRoll(rollNumber, confirmation));
  }

  setNoteDraft(jobId: number, rollNumber: number, text: string): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => coordinator.setNoteDraft(rollNumber, text));
  }

  submitNote(jobId: number, rollNumber: number, text?: string): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => coordinator.submitNote(rollNumber, text));
  }

  discardNote(jobId: number, rollNumber: number): Result<RollSnapshot, AppError> {
    return this.withCoordinator(jobId, (coordinator) => coordinator.discardNote(rollNumber));
  }

  async completeJob(jobId: number, confirmation: Confirmation): Promise<Result<JobSnapshot, AppError>> {
    const coordinator = this.coordinators.get(jobId);
    if (!coordinator) return err(this.notOpen(jobId));
    return coordinator.completeJob(confirmation);
  }

  private buildCoordinator(job: Job): JobCoordinator {
    return new JobCoordinator(job, { sink: this.sink, store: this.store, now: this.now });
  }

  private async fetchJob(id: number): Promise<Result<Job, AppError>> {
    const fetched = await ResultAsync.fromPromise(this.store.getJob(id), toAppError);
    if (fetched.isErr()) return err(fetched.error);
    if (!fetched.value) return err(createAppError(ErrorCodes.jobNotFound, `Job ${id} not found`, { jobId: id }));
    return ok(fetched.value);
  }

  private withCoordinator<T>(jobId: number, fn: (coordinator: JobCoordinator) => Result<T, AppError>): Result<T, AppError> {
    const coordinator = this.coordinators.get(jobId);
    return coordinator ? fn(coordinator) : err(this.notOpen(jobId));
  }

  private notOpen(jobId: number): AppError {
    return createAppError(ErrorCodes.jobNotOpen, `Job ${jobId} is not open`, { jobId });
  }

  /** Runs a transition that leaves the roll running, checking other open jobs on the same printer first. */
  private runGuarded(
    coordinator: JobCoordinator,
    rollNumber: number,
    transition: () => Result<RollSnapshot, AppError>
  ): Result<RollSnapshot, AppError> {
    const other = this.findOtherRunning(coordinator);
    if (other && this.exclusiveRuns) {
      return err(
        createAppError(
          ErrorCodes.printerBusy,
          `${coordinator.printerName} is already running roll ${other.rollNumber} of job ${other.jobId}`,
          { printerName: coordinator.printerName, otherJobId: other.jobId, otherRollNumber: other.rollNumber }
        )
      );
    }
    const result = transition();
    if (result.isOk() && other) {
      const jobId = coordinator.job.id;
      logger.warn(
        { jobId, rollNumber, otherJobId: other.jobId, printerName: coordinator.printerName },
        'jobBoard: two open jobs are running on the same printer'
      );
      pushAppMessage('printer.sharedRun', {
        rollNumber,
        jobId,
        otherJobId: other.jobId,
        printerName: coordinator.printerName
      });
    }
    return result;
  }

  private findOtherRunning(coordinator: JobCoordinator): { jobId: number; rollNumber: number } | null {
    for (const [jobId, other] of this.coordinators) {
      if (other === coordinator || other.printerName !== coordinator.printerName) continue;
      const rollNumber = other.runningRoll();
      if (rollNumber !== null) return { jobId, rollNumber };
    }
    return null;
  }
}
