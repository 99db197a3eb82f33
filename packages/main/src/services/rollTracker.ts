import { err, ok, type Result } from 'neverthrow';
import type {
  AppError,
  Confirmation,
  CumulativeCounts,
  RollActionName,
  RollNote,
  RollSnapshot,
  RollState
} from '../../../shared/src';
import { createAppError, ErrorCodes } from '../errors';

export interface RollActionSink {
  record(jobId: number, rollNumber: number, action: RollActionName, note?: string): void;
}

export type RollTrackerOptions = {
  jobId: number;
  rollNumber: number;
  labelsGoal: number;
  sink: RollActionSink;
  now?: () => Date;
};

export type ProgressOutcome = 'ignored' | 'baselineCaptured' | 'progressed' | 'completed';

export type ProgressUpdate = {
  outcome: ProgressOutcome;
  snapshot: RollSnapshot;
};

const pad = (value: number) => String(value).padStart(2, '0');

export function formatNoteTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Progress of one roll. Printer counters are lifetime totals, so a roll measures itself against the
 * totals it first sees after starting (the baseline) rather than against zero.
 */
export class RollTracker {
  readonly jobId: number;
  readonly rollNumber: number;
  readonly labelsGoal: number;

  private currentState: RollState = 'idle';
  private baselinePass: number | null = null;
  private baselineFail: number | null = null;
  private currentProgress = 0;
  private deltaPass = 0;
  private deltaFail = 0;
  private noteEntryOpen = false;
  private noteDraft = '';
  private readonly notes: RollNote[] = [];
  private readonly sink: RollActionSink;
  private readonly now: () => Date;

  constructor(options: RollTrackerOptions) {
    this.jobId = options.jobId;
    this.rollNumber = options.rollNumber;
    this.labelsGoal = options.labelsGoal;
    this.sink = options.sink;
    this.now = options.now ?? (() => new Date());
  }

  get state(): RollState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return this.currentState === 'stopped' || this.currentState === 'completed';
  }

  start(): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'idle') return this.refuse('start');
    this.currentState = 'running';
    this.baselinePass = null;
    this.baselineFail = null;
    this.sink.record(this.jobId, this.rollNumber, 'start');
    return ok(this.snapshot());
  }

  pause(): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'running') return this.refuse('pause');
    this.currentState = 'paused';
    this.noteEntryOpen = true;
    return ok(this.snapshot());
  }

  resume(): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'paused') return this.refuse('resume');
    this.currentState = 'running';
    this.noteEntryOpen = false;
    this.sink.record(this.jobId, this.rollNumber, 'resume');
    return ok(this.snapshot());
  }

  stop(confirmation: Confirmation): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'running' && this.currentState !== 'paused') return this.refuse('stop');
    if (!confirmation.confirmed) {
      return err(
        createAppError(
          ErrorCodes.confirmationRequired,
          `Stopping roll ${this.rollNumber} cannot be undone and must be confirmed`
        )
      );
    }
    this.currentState = 'stopped';
    this.closeNoteEntry();
    this.sink.record(this.jobId, this.rollNumber, 'stop');
    return ok(this.snapshot());
  }

  updateProgress(cumulative: CumulativeCounts): ProgressUpdate {
    if (this.currentState !== 'running') {
      return { outcome: 'ignored', snapshot: this.snapshot() };
    }
    if (this.baselinePass === null || this.baselineFail === null) {
      this.baselinePass = cumulative.pass;
      this.baselineFail = cumulative.fail;
      return { outcome: 'baselineCaptured', snapshot: this.snapshot() };
    }
    this.deltaPass = cumulative.pass - this.baselinePass;
    this.deltaFail = cumulative.fail - this.baselineFail;
    this.currentProgress = Math.max(0, Math.min(this.deltaPass, this.labelsGoal));
    if (this.currentProgress >= this.labelsGoal) {
      this.currentState = 'completed';
      this.closeNoteEntry();
      this.sink.record(this.jobId, this.rollNumber, 'completed', 'Roll complete');
      return { outcome: 'completed', snapshot: this.snapshot() };
    }
    return { outcome: 'progressed', snapshot: this.snapshot() };
  }

  setNoteDraft(text: string): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'paused') return this.refuse('edit a note for');
    this.noteDraft = text;
    return ok(this.snapshot());
  }

  submitNote(text: string = this.noteDraft): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'paused') return this.refuse('add a note to');
    const trimmed = text.trim();
    if (!trimmed) {
      return err(createAppError(ErrorCodes.validation, 'A pause note cannot be empty'));
    }
    const at = this.now();
    const note: RollNote = { timestamp: at.toISOString(), progressAtTime: this.currentProgress, text: trimmed };
    this.notes.push(note);
    this.noteDraft = '';
    const fullNote = `[${formatNoteTimestamp(at)}] Paused at ${this.currentProgress}: ${trimmed}`;
    this.sink.record(this.jobId, this.rollNumber, 'pause note', fullNote);
    return ok(this.snapshot());
  }

  discardNote(): Result<RollSnapshot, AppError> {
    if (this.currentState !== 'paused') return this.refuse('discard a note for');
    this.closeNoteEntry();
    return ok(this.snapshot());
  }

  snapshot(): RollSnapshot {
    return {
      jobId: this.jobId,
      rollNumber: this.rollNumber,
      labelsGoal: this.labelsGoal,
      state: this.currentState,
      baselinePass: this.baselinePass,
      baselineFail: this.baselineFail,
      currentProgress: this.currentProgress,
      deltaPass: this.deltaPass,
      deltaFail: this.deltaFail,
      noteEntryOpen: this.noteEntryOpen,
      noteDraft: this.noteDraft,
      notes: this.notes.map((note) => ({ ...note }))
    };
  }

  private closeNoteEntry() {
    this.noteEntryOpen = false;
    this.noteDraft = '';
  }

  private refuse(verb: string): Result<RollSnapshot, AppError> {
    return err(
      createAppError(ErrorCodes.invalidTransition, `Cannot ${verb} roll ${this.rollNumber} while it is ${this.currentState}`, {
        jobId: this.jobId,
        rollNumber: this.rollNumber,
        state: this.currentState
      })
    );
  }
}
