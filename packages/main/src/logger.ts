import { createWriteStream, existsSync, mkdirSync, readdirSync, unlinkSync, type WriteStream } from 'fs';
import { join } from 'path';
import { Writable } from 'stream';
import pino, { multistream, type Level, type LevelWithSilent, type Logger, type StreamEntry } from 'pino';
import { isMainThread, parentPort } from 'worker_threads';

const DEFAULT_LOG_DIR = join(process.cwd(), 'logs');
const DEFAULT_RETENTION_DAYS = 14;

function resolveLogDirectory(): string {
  const envDir = process.env.ROLLTRACK_LOG_DIR?.trim();
  return envDir ? envDir : DEFAULT_LOG_DIR;
}

function resolveRetentionDays(): number {
  const fromEnv = Number.parseInt(process.env.ROLLTRACK_LOG_RETENTION ?? '', 10);
  if (Number.isFinite(fromEnv) && fromEnv > 0) return fromEnv;
  return DEFAULT_RETENTION_DAYS;
}

const VALID_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

function resolveLogLevel(): LevelWithSilent {
  const requested = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (isLevel(requested)) {
    return requested;
  }
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function safeWarn(...args: unknown[]) {
  try {
    // eslint-disable-next-line no-console
    console.warn(...args);
  } catch {
    const text = args.map((a) => (a instanceof Error ? a.stack || a.message : String(a))).join(' ');
    process.stderr.write(`[WARN] ${text}\n`);
  }
}

const LEVEL_NAMES: Record<number, Level> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal'
};

const LEVEL_LABELS: Record<number, string> = {
  10: 'TRACE',
  20: 'DEBUG',
  30: 'INFO',
  40: 'WARN',
  50: 'ERROR',
  60: 'FATAL'
};

type LogLine = {
  time?: number;
  level?: number;
  msg?: string;
  err?: unknown;
  proc?: string;
  [key: string]: unknown;
};

function errorMessageOf(value: unknown): string | null {
  if (value && typeof value === 'object' && 'message' in value) {
    const message = (value as { message?: unknown }).message;
    return typeof message === 'string' ? message : null;
  }
  return null;
}

// One line per record: "INFO Main | 14:03:11 02 Mar | message - error"
export function formatLogLine(entry: LogLine, fallbackProc: string): string {
  const date = new Date(typeof entry.time === 'number' ? entry.time : Date.now());
  const hhmmss = date.toLocaleTimeString('en-GB', { hour12: false });
  const day = String(date.getDate()).padStart(2, '0');
  const mon = date.toLocaleString('en-GB', { month: 'short' });
  const levelLabel = typeof entry.level === 'number' ? (LEVEL_LABELS[entry.level] ?? 'INFO') : 'INFO';
  const proc = typeof entry.proc === 'string' ? entry.proc : fallbackProc;
  const errMsg = errorMessageOf(entry.err);
  return `${levelLabel} ${proc} | ${hhmmss} ${day} ${mon} | ${entry.msg ?? ''}${errMsg ? ` - ${errMsg}` : ''}`;
}

const defaultProc = isMainThread ? 'Main' : 'Ingest';

class RotatingFileStream extends Writable {
  private currentDate: string | null = null;
  private stream: WriteStream | null = null;
  private cleanupScheduled = false;
  private pending: Buffer[] = [];

  constructor(private readonly directory: string, private readonly retention: number) {
    super();
  }

  private formatDateKey(epochMs: number) {
    const date = new Date(epochMs);
    const yyyy = date.getFullYear();
    const mm = String(date.getMonth() + 1).padStart(2, '0');
    const dd = String(date.getDate()).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
  }

  private scheduleCleanup() {
    if (this.cleanupScheduled) return;
    this.cleanupScheduled = true;
    const timer = setTimeout(() => {
      this.cleanupScheduled = false;
      try {
        const entries = readdirSync(this.directory)
          .filter((name) => name.endsWith('.log'))
          .sort();
        const allowed = Math.max(this.retention, 1);
        for (const file of entries.slice(0, Math.max(entries.length - allowed, 0))) {
          try {
            unlinkSync(join(this.directory, file));
          } catch (err) {
            safeWarn('logger: failed to prune log file', err);
          }
        }
      } catch (err) {
        safeWarn('logger: failed to enumerate log directory', err);
      }
    }, 1_000);
    timer.unref();
  }

  private openStream(dateKey: string) {
    try {
      if (!existsSync(this.directory)) {
        mkdirSync(this.directory, { recursive: true });
      }
      const target = createWriteStream(join(this.directory, `${dateKey}.log`), { flags: 'a' });
      target.on('error', (err) => {
        safeWarn('logger: file stream error; reopening on next write', err);
        this.stream = null;
      });
      this.stream = target;
      this.currentDate = dateKey;
      this.scheduleCleanup();
    } catch (err) {
      safeWarn('logger: failed to open log file', err);
      this.stream = null;
    }
  }

  private rotateIfNeeded(dateKey: string) {
    if (this.currentDate === dateKey && this.stream) return;
    this.stream?.end();
    this.openStream(dateKey);
  }

  override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding);
    let time = Date.now();
    let line: string;
    try {
      const parsed = JSON.parse(buffer.toString('utf8')) as LogLine;
      if (typeof parsed.time === 'number') time = parsed.time;
      line = formatLogLine(parsed, defaultProc);
    } catch {
      line = buffer.toString('utf8');
    }
    this.rotateIfNeeded(this.formatDateKey(time));
    this.pending.push(Buffer.from(line.endsWith('\n') ? line : `${line}\n`, 'utf8'));
    this.flushPending();
    callback();
  }

  override _final(callback: (error?: Error | null) => void) {
    this.flushPending();
    if (this.stream) {
      this.stream.end(callback);
    } else {
      callback();
    }
  }

  private flushPending() {
    while (this.stream && this.pending.length > 0) {
      const buf = this.pending.shift();
      if (!buf) break;
      if (!this.stream.write(buf)) {
        this.stream.once('drain', () => this.flushPending());
        break;
      }
    }
  }
}

class CleanConsoleStream extends Writable {
  override _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    try {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding);
      const entry = JSON.parse(buffer.toString('utf8')) as LogLine;
      // eslint-disable-next-line no-console
      console.log(formatLogLine(entry, defaultProc));
      callback();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
    }
  }
}

const logDir = resolveLogDirectory();
const level = resolveLogLevel();
const streamLevel: Level = level === 'silent' ? 'fatal' : level;

function makeMainLogger(): Logger {
  const streams: StreamEntry[] = [
    { stream: new CleanConsoleStream(), level: streamLevel },
    { stream: new RotatingFileStream(logDir, resolveRetentionDays()), level: streamLevel }
  ];
  return pino({ level }, multistream(streams));
}

// Worker threads hand their records to the main thread so there is a single writer per log file.
function makeWorkerProxyLogger(): Logger {
  const port = parentPort;
  const stream = new Writable({
    write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      const text = Buffer.isBuffer(chunk) ? chunk.toString('utf8') : Buffer.from(chunk, encoding).toString('utf8');
      try {
        const parsed = JSON.parse(text) as LogLine;
        const { msg, level: numeric, time: _time, pid: _pid, hostname: _hostname, ...context } = parsed;
        const name: Level = typeof numeric === 'number' ? (LEVEL_NAMES[numeric] ?? 'info') : 'info';
        port?.postMessage({ type: 'log', level: name, msg: msg ?? '', context });
      } catch {
        process.stdout.write(text);
      }
      callback();
    }
  });
  return pino({ level }, stream);
}

export const logger: Logger = isMainThread ? makeMainLogger() : makeWorkerProxyLogger();
