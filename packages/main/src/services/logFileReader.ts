import { promises as fsp } from 'fs';
import { basename, resolve } from 'path';
import { err, ok, type Result } from 'neverthrow';
import type { AppError, FileCursor, LogEvent } from '../../../shared/src';
import { createAppError, ErrorCodes } from '../errors';
import { logger } from '../logger';
import { completeLines, parseCsvRecords, parseLogRow } from './logRowParser';

export type IngestBatch = {
  filePath: string;
  events: LogEvent[];
  /** Rows consumed by this pass, whether or not they produced an event. */
  rowsRead: number;
  rowsTotal: number;
  skipped: number;
  cursorReset: { previousRows: number } | null;
};

export type LogFileReaderOptions = {
  defaultPrinter?: string;
  /** Cursors carried over from a previous reader, keyed by file path. */
  seed?: Readonly<Record<string, number>>;
};

export type ConsumeOptions = {
  /** The path was just created; any cursor left from an earlier file of the same name is discarded. */
  created?: boolean;
};

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Tracks how many rows of each log file have been consumed and hands back only the rows appended since.
 * Passes over the same path run one at a time; different paths do not wait for each other.
 */
export class LogFileReader {
  private readonly cursorsByPath = new Map<string, number>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly defaultPrinter: string | undefined;

  constructor(options: LogFileReaderOptions = {}) {
    this.defaultPrinter = options.defaultPrinter;
    for (const [path, rows] of Object.entries(options.seed ?? {})) {
      if (Number.isInteger(rows) && rows >= 0) {
        this.cursorsByPath.set(resolve(path), rows);
      }
    }
  }

  consume(filePath: string, options: ConsumeOptions = {}): Promise<Result<IngestBatch, AppError>> {
    const key = resolve(filePath);
    return this.enqueue(key, () => this.runPass(key, options));
  }

  /** Moves the cursor to the end of the file without producing events. */
  prime(filePath: string): Promise<Result<number, AppError>> {
    const key = resolve(filePath);
    return this.enqueue(key, async () => {
      const content = await this.readStable(key);
      if (content.isErr()) return err(content.error);
      const rows = parseCsvRecords(content.value).length;
      this.cursorsByPath.set(key, rows);
      logger.debug({ file: key, rows }, 'logFileReader: cursor primed');
      return ok(rows);
    });
  }

  has(filePath: string): boolean {
    return this.cursorsByPath.has(resolve(filePath));
  }

  cursor(filePath: string): FileCursor | null {
    const key = resolve(filePath);
    const rowsConsumed = this.cursorsByPath.get(key);
    return rowsConsumed === undefined ? null : { filePath: key, rowsConsumed };
  }

  cursors(): Record<string, number> {
    return Object.fromEntries(this.cursorsByPath);
  }

  /** Resolves once every pass queued so far, and any queued while waiting, has finished. */
  async drain(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.values()]);
    }
  }

  private enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const next = previous.then(task);
    const settled: Promise<void> = next.then(
      () => this.release(key, settled),
      () => this.release(key, settled)
    );
    this.queues.set(key, settled);
    return next;
  }

  private release(key: string, settled: Promise<void>) {
    if (this.queues.get(key) === settled) {
      this.queues.delete(key);
    }
  }

  private async readStable(filePath: string): Promise<Result<string, AppError>> {
    try {
      const before = await fsp.stat(filePath);
      if (!before.isFile()) {
        return err(createAppError(ErrorCodes.fileAccess, `${basename(filePath)} is not a regular file`, { filePath }));
      }
      const content = await fsp.readFile(filePath, 'utf8');
      const after = await fsp.stat(filePath);
      if (after.size !== before.size || after.mtimeMs !== before.mtimeMs) {
        return err(createAppError(ErrorCodes.fileAccess, `${basename(filePath)} changed while being read`, { filePath }));
      }
      return ok(completeLines(content));
    } catch (error) {
      const code = errnoCode(error);
      const message = error instanceof Error ? error.message : String(error);
      return err(createAppError(ErrorCodes.fileAccess, message, { filePath, code }));
    }
  }

  private async runPass(filePath: string, options: ConsumeOptions): Promise<Result<IngestBatch, AppError>> {
    if (options.created) {
      this.cursorsByPath.set(filePath, 0);
    }
    const content = await this.readStable(filePath);
    if (content.isErr()) {
      logger.warn({ file: filePath, error: content.error }, 'logFileReader: file not readable yet; will retry on next change');
      return err(content.error);
    }

    // Everything from here to the cursor update runs without yielding.
    const records = parseCsvRecords(content.value);
    const rowsTotal = records.length;
    let start = this.cursorsByPath.get(filePath) ?? 0;
    let cursorReset: IngestBatch['cursorReset'] = null;
    if (rowsTotal < start) {
      logger.warn(
        { file: filePath, previousRows: start, rows: rowsTotal },
        'logFileReader: file shrank; reprocessing from the first row'
      );
      cursorReset = { previousRows: start };
      start = 0;
    }

    const events: LogEvent[] = [];
    let skipped = 0;
    for (const record of records.slice(start)) {
      const parsed = parseLogRow(record, { defaultPrinter: this.defaultPrinter });
      if (parsed.isOk()) {
        events.push(parsed.value);
      } else {
        skipped += 1;
      }
    }
    this.cursorsByPath.set(filePath, rowsTotal);

    const batch: IngestBatch = {
      filePath,
      events,
      rowsRead: rowsTotal - start,
      rowsTotal,
      skipped,
      cursorReset
    };
    if (skipped > 0) {
      logger.debug({ file: filePath, skipped }, 'logFileReader: rows without a pass/fail outcome skipped');
    }
    if (batch.rowsRead > 0) {
      logger.info({ file: filePath, rows: batch.rowsRead, events: events.length }, 'logFileReader: new rows ingested');
    }
    return ok(batch);
  }
}
