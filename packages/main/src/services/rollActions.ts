import { EventEmitter } from 'events';
import type { AppError, RollActionName } from '../../../shared/src';
import { toAppError } from '../errors';
import { logger } from '../logger';
import type { JobStore } from '../repo/jobStore';
import { pushAppMessage } from './messages';
import type { RollActionSink } from './rollTracker';

export type RollActionWriteFailure = {
  jobId: number;
  rollNumber: number;
  action: RollActionName;
  note: string;
  error: AppError;
};

/**
 * Queues audit writes to the store. Callers never wait: the roll has already changed state
 * by the time the row is written, and a failed write is reported instead of undoing it.
 */
export class RollActionRecorder implements RollActionSink {
  private readonly emitter = new EventEmitter();
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly store: JobStore) {}

  record(jobId: number, rollNumber: number, action: RollActionName, note = ''): void {
    const write = Promise.resolve()
      .then(() => this.store.logRollAction(jobId, rollNumber, action, note))
      .then(
        () => {
          logger.debug({ jobId, rollNumber, action }, 'rollActions: recorded');
        },
        (error: unknown) => {
          this.reportFailure({ jobId, rollNumber, action, note, error: toAppError(error) });
        }
      )
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  onError(listener: (failure: RollActionWriteFailure) => void): () => void {
    this.emitter.on('error', listener);
    return () => {
      this.emitter.off('error', listener);
    };
  }

  /** Resolves once every write queued so far has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private reportFailure(failure: RollActionWriteFailure) {
    logger.error(
      { jobId: failure.jobId, rollNumber: failure.rollNumber, action: failure.action, error: failure.error },
      'rollActions: failed to record roll action'
    );
    pushAppMessage(
      'store.writeFailed',
      {
        action: failure.action,
        jobId: failure.jobId,
        rollSuffix: failure.rollNumber > 0 ? ` roll ${failure.rollNumber}` : '',
        reason: failure.error.message
      },
      { source: 'rollActions' }
    );
    // EventEmitter throws on an unhandled 'error' event.
    if (this.emitter.listenerCount('error') > 0) {
      this.emitter.emit('error', failure);
    }
  }
}
