import { parentPort, workerData } from 'worker_threads';
import { logger } from '../logger';
import { loadConfig } from '../services/config';
import { LogFileReader } from '../services/logFileReader';
import { LogWatcher } from '../services/logWatcher';
import { PrinterCounterBoard } from '../services/printerCounters';
import type { IngestWorkerSeed, IngestWorkerToMainMessage, MainToIngestWorkerMessage, SerializableError } from './ingestMessages';

const channel = parentPort;

function postMessageToMain(message: IngestWorkerToMainMessage) {
  if (!channel) {
    logger.debug({ messageType: message.type }, 'ingestWorker: parentPort unavailable; skipping message');
    return;
  }
  try {
    channel.postMessage(message);
  } catch (err) {
    logger.warn({ err }, 'ingestWorker: failed to post message');
  }
}

function serializeError(error: unknown): SerializableError {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack ?? null };
  }
  return { message: typeof error === 'string' ? error : String(error) };
}

function readSeed(data: unknown): IngestWorkerSeed | null {
  if (typeof data !== 'object' || data === null) return null;
  const cursors: Record<string, number> = {};
  const counts: Record<string, { printerId: string; pass: number; fail: number }> = {};
  if ('cursors' in data && typeof data.cursors === 'object' && data.cursors !== null) {
    for (const [path, rows] of Object.entries(data.cursors)) {
      if (typeof rows === 'number') cursors[path] = rows;
    }
  }
  if ('counts' in data && typeof data.counts === 'object' && data.counts !== null) {
    for (const [printerId, entry] of Object.entries(data.counts)) {
      if (typeof entry !== 'object' || entry === null) continue;
      const pass = 'pass' in entry && typeof entry.pass === 'number' ? entry.pass : 0;
      const fail = 'fail' in entry && typeof entry.fail === 'number' ? entry.fail : 0;
      counts[printerId] = { printerId, pass, fail };
    }
  }
  if (Object.keys(cursors).length === 0 && Object.keys(counts).length === 0) return null;
  return { cursors, counts };
}

let watcher: LogWatcher | null = null;
let shuttingDown = false;

async function startIngest() {
  const cfg = loadConfig();
  const directory = cfg.paths.logDir;
  if (!directory) {
    logger.warn('ingestWorker: no log directory configured; nothing to watch');
    return;
  }
  const seed = readSeed(workerData);
  const reader = new LogFileReader({ defaultPrinter: cfg.ingest.defaultPrinter, seed: seed?.cursors });
  const counters = new PrinterCounterBoard(seed?.counts);
  if (seed) {
    logger.info(
      { files: Object.keys(seed.cursors).length, printers: Object.keys(seed.counts).length },
      'ingestWorker: resuming from previous worker state'
    );
  }

  watcher = new LogWatcher({
    directory,
    settings: cfg.ingest,
    reader,
    counters,
    // After a restart, rows the previous worker never saw still belong to the running rolls.
    primeExisting: cfg.ingest.primeExistingFiles && !seed,
    onUpdate: (update) => postMessageToMain({ type: 'ingestUpdate', ...update }),
    onPrimed: (cursors) => postMessageToMain({ type: 'cursorsPrimed', cursors }),
    onNotice: (notice) => postMessageToMain({ type: 'ingestNotice', ...notice }),
    onError: (error) => postMessageToMain({ type: 'watcherError', error: serializeError(error), context: { directory } })
  });
  await watcher.start();
  postMessageToMain({ type: 'watcherReady', directory });
}

async function shutdown(reason?: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ reason }, 'ingestWorker: shutting down');
  if (watcher) {
    try {
      await watcher.close();
    } catch (err) {
      logger.warn({ err }, 'ingestWorker: failed to close log watcher');
    }
  }
}

startIngest().catch((err: unknown) => {
  postMessageToMain({ type: 'watcherError', error: serializeError(err), context: { source: 'ingest:init' } });
  logger.error({ err }, 'ingestWorker: failed to start log watcher');
});

if (channel) {
  channel.on('message', (message: MainToIngestWorkerMessage) => {
    if (message.type === 'shutdown') {
      void shutdown(message.reason).finally(() => process.exit(0));
    }
  });
}

process.on('uncaughtException', (err) => {
  postMessageToMain({ type: 'watcherError', error: serializeError(err), context: { source: 'ingest-worker' } });
  logger.error({ err }, 'ingestWorker: uncaught exception');
});

process.on('unhandledRejection', (reason) => {
  postMessageToMain({ type: 'watcherError', error: serializeError(reason), context: { source: 'ingest-worker' } });
  logger.error({ reason }, 'ingestWorker: unhandled rejection');
});
