import chokidar, { type FSWatcher } from 'chokidar';
import { promises as fsp } from 'fs';
import { basename, extname, join, normalize } from 'path';
import type { AppError, IngestSettings, PrinterCountsSnapshot } from '../../../shared/src';
import { logger } from '../logger';
import type { IngestBatch, LogFileReader } from './logFileReader';
import type { PrinterCounterBoard } from './printerCounters';

const { readdir, stat } = fsp;

export type IngestUpdate = {
  counts: PrinterCountsSnapshot;
  cursors: Record<string, number>;
  file: string;
  newEvents: number;
  rowsRead: number;
  at: string;
};

export type IngestNotice = {
  event: 'ingest.fileBusy' | 'ingest.fileReset' | 'watcher.offline';
  params: Record<string, unknown>;
};

export type LogWatcherOptions = {
  directory: string;
  settings: Pick<IngestSettings, 'extensions' | 'debounceMs' | 'stabilityThresholdMs' | 'pollIntervalMs'>;
  reader: LogFileReader;
  counters: PrinterCounterBoard;
  /** Existing files the reader has no cursor for are skipped to their end instead of counted. */
  primeExisting: boolean;
  onUpdate: (update: IngestUpdate) => void;
  /** Called with every cursor after each file is primed, so a restart does not count those rows. */
  onPrimed?: (cursors: Record<string, number>) => void;
  onNotice?: (notice: IngestNotice) => void;
  onError?: (error: unknown) => void;
  now?: () => Date;
};

type PendingScan = { timer: NodeJS.Timeout; created: boolean };

/** Watches one directory (not its subdirectories) and feeds new log rows into the printer counters. */
export class LogWatcher {
  private watcher: FSWatcher | null = null;
  private readonly pending = new Map<string, PendingScan>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly extensions: Set<string>;
  private closing = false;

  constructor(private readonly options: LogWatcherOptions) {
    this.extensions = new Set(options.settings.extensions.map((ext) => ext.toLowerCase()));
  }

  matches(path: string): boolean {
    return this.extensions.has(extname(path).toLowerCase());
  }

  async start(): Promise<void> {
    const dir = normalize(this.options.directory);
    try {
      const info = await stat(dir);
      if (!info.isDirectory()) throw new Error(`${dir} is not a directory`);
    } catch (error) {
      logger.warn({ err: error, dir }, 'logWatcher: log directory not accessible; waiting for it to appear');
      this.notice('watcher.offline', { watcherName: 'Log watcher', path: dir });
    }

    const watcher = chokidar.watch(dir, {
      ignoreInitial: true,
      depth: 0,
      ignored: (path, stats) => Boolean(stats?.isFile()) && !this.matches(path),
      awaitWriteFinish: {
        stabilityThreshold: this.options.settings.stabilityThresholdMs,
        pollInterval: this.options.settings.pollIntervalMs
      }
    });
    this.watcher = watcher;
    watcher.on('add', (path) => this.schedule(path, true));
    watcher.on('change', (path) => this.schedule(path, false));
    watcher.on('error', (error) => {
      logger.error({ err: error, dir }, 'logWatcher: watcher error');
      this.options.onError?.(error);
    });
    watcher.on('ready', () => {
      logger.info({ dir }, 'logWatcher: watching for log files');
      this.track(this.scanExisting(dir));
    });
  }

  /** Stops watching, runs any debounced scans straight away and waits for every pass to finish. */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
    for (const [path, scan] of this.pending) {
      clearTimeout(scan.timer);
      this.pending.delete(path);
      this.track(this.process(path, scan.created));
    }
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
    await this.options.reader.drain();
  }

  private schedule(path: string, created: boolean) {
    if (this.closing || !this.matches(path)) return;
    const normalizedPath = normalize(path);
    const previous = this.pending.get(normalizedPath);
    if (previous) clearTimeout(previous.timer);
    // A creation followed by a change inside the debounce window is still a new file.
    const wasCreated = created || (previous?.created ?? false);
    const timer = setTimeout(() => {
      this.pending.delete(normalizedPath);
      this.track(this.process(normalizedPath, wasCreated));
    }, this.options.settings.debounceMs);
    this.pending.set(normalizedPath, { timer, created: wasCreated });
  }

  private async scanExisting(dir: string): Promise<void> {
    let names: string[];
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      names = entries.filter((entry) => entry.isFile() && this.matches(entry.name)).map((entry) => entry.name);
    } catch (error) {
      logger.warn({ err: error, dir }, 'logWatcher: failed to list existing log files');
      return;
    }
    names.sort();
    for (const name of names) {
      const path = join(dir, name);
      if (this.options.primeExisting && !this.options.reader.has(path)) {
        const primed = await this.options.reader.prime(path);
        if (primed.isErr()) {
          this.reportBusy(path, primed.error);
        } else {
          logger.info({ file: path, rows: primed.value }, 'logWatcher: existing rows skipped');
          this.options.onPrimed?.(this.options.reader.cursors());
        }
      } else {
        await this.process(path, false);
      }
    }
  }

  private async process(path: string, created: boolean): Promise<void> {
    const result = await this.options.reader.consume(path, { created });
    if (result.isErr()) {
      this.reportBusy(path, result.error);
      return;
    }
    this.publish(result.value);
  }

  private publish(batch: IngestBatch) {
    if (batch.cursorReset) {
      this.notice('ingest.fileReset', {
        fileName: basename(batch.filePath),
        previousRows: batch.cursorReset.previousRows,
        rows: batch.rowsTotal
      });
    }
    if (batch.rowsRead === 0) return;
    this.options.counters.apply(batch.events);
    this.options.onUpdate({
      counts: this.options.counters.snapshot(),
      cursors: this.options.reader.cursors(),
      file: batch.filePath,
      newEvents: batch.events.length,
      rowsRead: batch.rowsRead,
      at: (this.options.now?.() ?? new Date()).toISOString()
    });
  }

  private reportBusy(path: string, error: AppError) {
    this.notice('ingest.fileBusy', { fileName: basename(path), reason: error.message });
  }

  private notice(event: IngestNotice['event'], params: Record<string, unknown>) {
    this.options.onNotice?.({ event, params });
  }

  private track(task: Promise<void>) {
    const tracked = task
      .catch((error: unknown) => {
        logger.error({ err: error }, 'logWatcher: scan failed');
        this.options.onError?.(error);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
