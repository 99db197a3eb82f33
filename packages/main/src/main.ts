#!/usr/bin/env node
import { logger } from './logger';
import { startConsole, type OperatorConsole } from './console/operatorConsole';
import { loadConfig, redactSettings, validateDbSettings } from './services/config';
import { resetPool, testConnection } from './services/db';
import { ensureSchema } from './services/dbSchema';
import { JobBoard } from './services/jobBoard';
import { pushAppMessage } from './services/messages';
import { RollActionRecorder } from './services/rollActions';
import { initWatchers, shutdownWatchers, subscribeCounts } from './services/watchers';
import { createPgJobStore } from './repo/jobStore';

function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function waitForDbReady(maxAttempts = 10, initialDelayMs = 500) {
  const maxDelay = 5000;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await testConnection();
    if (result.ok) {
      if (attempt > 1) {
        logger.info({ attempt }, 'main: database connection established after retries');
      }
      return;
    }
    const delayMs = Math.min(initialDelayMs * Math.pow(2, attempt - 1), maxDelay);
    logger.warn({ error: result.error, attempt, maxAttempts, delayMs }, 'main: database not ready, retrying');
    await delay(delayMs);
  }
  throw new Error('main: database not ready after maximum retries');
}

let operatorConsole: OperatorConsole | null = null;
let stopping = false;

async function shutdown(recorder: RollActionRecorder, reason: string) {
  if (stopping) return;
  stopping = true;
  logger.info({ reason }, 'main: shutting down');
  operatorConsole?.close();
  await shutdownWatchers();
  await recorder.flush();
  await resetPool();
}

async function bootstrap() {
  const cfg = loadConfig();
  validateDbSettings(cfg.db);
  logger.info({ settings: redactSettings(cfg) }, 'main: settings loaded');

  await waitForDbReady();
  await ensureSchema();

  const store = createPgJobStore();
  const recorder = new RollActionRecorder(store);
  const board = new JobBoard({ store, sink: recorder, exclusiveRuns: cfg.printers.exclusiveRuns });

  if (!cfg.paths.logDir) {
    logger.warn('main: paths.logDir is not set; printer logs will not be read');
    pushAppMessage('watcher.offline', { watcherName: 'Log watcher', path: '(not configured)' }, { source: 'main' });
  } else {
    subscribeCounts((update) => {
      logger.debug({ file: update.file, newEvents: update.newEvents }, 'main: counts updated');
      board.routeCounts(update.counts);
    });
    initWatchers();
  }

  const stop = (reason: string) => {
    shutdown(recorder, reason)
      .catch((err: unknown) => {
        logger.error({ err }, 'main: shutdown failed');
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };
  operatorConsole = startConsole(board, { onExit: () => stop('console-closed') });
  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));
}

process.on('uncaughtException', (err) => logger.error({ err }, 'Uncaught exception'));
process.on('unhandledRejection', (err) => logger.error({ err }, 'Unhandled rejection'));

void bootstrap().catch(async (err: unknown) => {
  logger.fatal({ err }, 'main: failed to start');
  process.exitCode = 1;
  await resetPool();
});
