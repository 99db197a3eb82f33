import { EventEmitter } from 'events';
import { existsSync } from 'fs';
import { join } from 'path';
import { Worker } from 'worker_threads';
import type { CountsUpdate } from '../../../shared/src';
import { logger } from '../logger';
import { pushAppMessage } from './messages';
import type {
  IngestWorkerSeed,
  IngestWorkerToMainMessage,
  MainToIngestWorkerMessage,
  SerializableError
} from '../workers/ingestMessages';

const RESTART_DELAY_MS = 2_000;
const SHUTDOWN_TIMEOUT_MS = 5_000;

let worker: Worker | null = null;
let shuttingDown = false;
let restartTimer: NodeJS.Timeout | null = null;
// Last state reported by the worker; handed to its replacement.
let seed: IngestWorkerSeed = { cursors: {}, counts: {} };
let hasSeed = false;
const stopping = new WeakSet<Worker>();
const countsEmitter = new EventEmitter();

function resolveWorkerPath() {
  const override = process.env.ROLLTRACK_INGEST_WORKER_PATH?.trim();
  if (override) {
    return override;
  }
  const candidates = [
    join(__dirname, '..', 'workers', 'ingestWorker.js'),
    join(__dirname, 'workers', 'ingestWorker.js'),
    join(process.cwd(), 'dist', 'packages', 'main', 'src', 'workers', 'ingestWorker.js')
  ];
  const existing = candidates.find((candidate) => existsSync(candidate));
  return existing ?? candidates[0];
}

function toError(serialized: SerializableError): Error {
  const err = new Error(serialized.message);
  if (serialized.stack) {
    err.stack = serialized.stack;
  }
  return err;
}

function handleWorkerMessage(message: IngestWorkerToMainMessage) {
  switch (message.type) {
    case 'log': {
      const base = { ...message.context, proc: 'Ingest' };
      logger[message.level](base, message.msg);
      break;
    }
    case 'watcherReady':
      logger.info({ directory: message.directory }, 'watchers: log watcher ready');
      break;
    case 'cursorsPrimed':
      seed = { cursors: message.cursors, counts: seed.counts };
      hasSeed = true;
      break;
    case 'ingestUpdate': {
      seed = { cursors: message.cursors, counts: message.counts };
      hasSeed = true;
      if (message.newEvents > 0) {
        const update: CountsUpdate = {
          counts: message.counts,
          file: message.file,
          newEvents: message.newEvents,
          at: message.at
        };
        countsEmitter.emit('counts', update);
      }
      break;
    }
    case 'ingestNotice':
      pushAppMessage(message.event, message.params, { source: 'ingest' });
      break;
    case 'watcherError': {
      const err = toError(message.error);
      logger.error({ err, ...message.context }, 'watchers: log watcher error');
      break;
    }
    default:
      logger.warn({ message }, 'watchers: received unknown worker message');
  }
}

function scheduleRestart(code: number) {
  if (restartTimer || shuttingDown) return;
  restartTimer = setTimeout(() => {
    restartTimer = null;
    logger.info('watchers: restarting ingest worker after unexpected exit');
    pushAppMessage('watcher.restarted', { code }, { source: 'watchers' });
    spawnWorker();
  }, RESTART_DELAY_MS);
  if (typeof restartTimer.unref === 'function') {
    restartTimer.unref();
  }
}

function spawnWorker() {
  try {
    const script = resolveWorkerPath();
    const instance = hasSeed ? new Worker(script, { workerData: seed }) : new Worker(script);
    worker = instance;
    instance.on('message', handleWorkerMessage);
    instance.on('error', (err) => {
      logger.error({ err }, 'watchers: ingest worker error');
    });
    instance.on('exit', (code) => {
      if (worker === instance) worker = null;
      if (shuttingDown || stopping.has(instance)) {
        return;
      }
      if (code !== 0) {
        logger.error({ code }, 'watchers: ingest worker exited unexpectedly');
        scheduleRestart(code);
      }
    });
    logger.info({ seeded: hasSeed }, 'watchers: ingest worker started');
  } catch (err) {
    logger.error({ err }, 'watchers: failed to start ingest worker');
  }
}

function stopWorker(current: Worker, reason: string, timeoutMs: number): Promise<void> {
  stopping.add(current);
  return new Promise((resolve) => {
    let finished = false;
    const finish = () => {
      if (finished) return;
      finished = true;
      resolve();
    };

    const timeout = setTimeout(() => {
      logger.warn({ reason }, 'watchers: ingest worker did not stop in time; terminating');
      current.terminate().then(finish, finish);
    }, timeoutMs);

    current.once('exit', () => {
      clearTimeout(timeout);
      finish();
    });

    try {
      const message: MainToIngestWorkerMessage = { type: 'shutdown', reason };
      current.postMessage(message);
    } catch (err) {
      logger.warn({ err }, 'watchers: failed to ask ingest worker to stop');
      clearTimeout(timeout);
      current.terminate().then(finish, finish);
    }
  });
}

export function initWatchers() {
  if (worker || shuttingDown) {
    return;
  }
  spawnWorker();
}

export function subscribeCounts(listener: (update: CountsUpdate) => void): () => void {
  countsEmitter.on('counts', listener);
  return () => {
    countsEmitter.off('counts', listener);
  };
}

export async function shutdownWatchers(): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  if (restartTimer) {
    clearTimeout(restartTimer);
    restartTimer = null;
  }
  const current = worker;
  if (!current) {
    return;
  }
  await stopWorker(current, 'app-quit', SHUTDOWN_TIMEOUT_MS);
  worker = null;
}
