import type { PrinterCountsSnapshot } from '../../../shared/src';
import type { IngestNotice, IngestUpdate } from '../services/logWatcher';

export type SerializableError = {
  message: string;
  stack?: string | null;
};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** State handed to a (re)started worker so counting continues where the previous one stopped. */
export type IngestWorkerSeed = {
  cursors: Record<string, number>;
  counts: PrinterCountsSnapshot;
};

export type IngestWorkerToMainMessage =
  | {
      type: 'log';
      level: LogLevel;
      msg: string;
      context?: Record<string, unknown>;
    }
  | { type: 'watcherReady'; directory: string }
  | { type: 'cursorsPrimed'; cursors: Record<string, number> }
  | ({ type: 'ingestUpdate' } & IngestUpdate)
  | ({ type: 'ingestNotice' } & IngestNotice)
  | {
      type: 'watcherError';
      error: SerializableError;
      context?: Record<string, unknown>;
    };

export type MainToIngestWorkerMessage = { type: 'shutdown'; reason?: string };
