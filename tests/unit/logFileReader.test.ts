import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { appendFileSync, mkdirSync, mkdtempSync, promises as fsp, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LogFileReader } from '../../packages/main/src/services/logFileReader';
import { PrinterCounterBoard } from '../../packages/main/src/services/printerCounters';

const HEADER = 'Serial,Printer Name,Failure Message\n';
const row = (serial: number, outcome: 'Pass' | 'Fail', printer = 'P1') => `${serial},${printer},${outcome} (Label)\n`;

describe('LogFileReader', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rolltrack-reader-'));
    file = join(dir, 'printer.csv');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('leaves counters alone for a file without rows', async () => {
    writeFileSync(file, HEADER);
    const reader = new LogFileReader();

    const batch = (await reader.consume(file))._unsafeUnwrap();

    expect(batch.events).toEqual([]);
    expect(batch.rowsRead).toBe(0);
    expect(reader.cursor(file)?.rowsConsumed).toBe(0);
  });

  it('only hands back rows appended since the previous pass', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + row(2, 'Fail') + row(3, 'Pass'));
    const reader = new LogFileReader();
    const counters = new PrinterCounterBoard();

    const first = (await reader.consume(file))._unsafeUnwrap();
    counters.apply(first.events);
    expect(counters.get('P1')).toEqual({ printerId: 'P1', pass: 2, fail: 1 });
    expect(reader.cursor(file)?.rowsConsumed).toBe(3);

    appendFileSync(file, row(4, 'Fail') + row(5, 'Pass'));
    const second = (await reader.consume(file))._unsafeUnwrap();
    counters.apply(second.events);

    expect(second.rowsRead).toBe(2);
    expect(counters.get('P1')).toEqual({ printerId: 'P1', pass: 3, fail: 2 });
    expect(reader.cursor(file)?.rowsConsumed).toBe(5);
  });

  it('reads nothing new for duplicate notifications, even when they overlap', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + row(2, 'Pass'));
    const reader = new LogFileReader();

    const results = await Promise.all([reader.consume(file), reader.consume(file), reader.consume(file)]);
    const events = results.flatMap((result) => result._unsafeUnwrap().events);

    expect(events).toHaveLength(2);
    expect(reader.cursor(file)?.rowsConsumed).toBe(2);
  });

  it('advances past rows that carry no outcome', async () => {
    writeFileSync(file, HEADER + '1,P1,\n' + '2,P1,Void (Label)\n' + row(3, 'Fail'));
    const reader = new LogFileReader();

    const batch = (await reader.consume(file))._unsafeUnwrap();

    expect(batch.events).toEqual([{ printerId: 'P1', outcome: 'fail' }]);
    expect(batch.skipped).toBe(2);
    expect(reader.cursor(file)?.rowsConsumed).toBe(3);
  });

  it('waits for a row that is still being written before counting it', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + '2,P1,Pass (La');
    const reader = new LogFileReader();

    const first = (await reader.consume(file))._unsafeUnwrap();
    expect(first.events).toEqual([{ printerId: 'P1', outcome: 'pass' }]);
    expect(reader.cursor(file)?.rowsConsumed).toBe(1);

    appendFileSync(file, 'bel)\n' + row(3, 'Pass'));
    const second = (await reader.consume(file))._unsafeUnwrap();
    const counters = new PrinterCounterBoard();
    counters.apply([...first.events, ...second.events]);

    expect(second.rowsRead).toBe(2);
    expect(counters.get('P1')).toEqual({ printerId: 'P1', pass: 3, fail: 0 });
  });

  it('does not prime past a partial last row', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + '2,P1,Fa');
    const reader = new LogFileReader();

    expect((await reader.prime(file))._unsafeUnwrap()).toBe(1);
    appendFileSync(file, 'il (Label)\n');
    const batch = (await reader.consume(file))._unsafeUnwrap();

    expect(batch.events).toEqual([{ printerId: 'P1', outcome: 'fail' }]);
  });

  it('leaves the cursor alone when the file changes while it is read', async () => {
    const content = HEADER + row(1, 'Pass');
    writeFileSync(file, content);
    vi.spyOn(fsp, 'readFile').mockImplementationOnce(async () => {
      appendFileSync(file, row(2, 'Pass'));
      return content;
    });
    const reader = new LogFileReader();

    const result = await reader.consume(file);

    const error = result._unsafeUnwrapErr();
    expect(error.code).toBe('ingest.fileAccess');
    expect(error.message).toBe('printer.csv changed while being read');
    expect(reader.cursor(file)).toBeNull();

    const retry = (await reader.consume(file))._unsafeUnwrap();
    expect(retry.rowsRead).toBe(2);
  });

  it('keeps the cursor when the path cannot be read as a file', async () => {
    const folder = join(dir, 'looks-like.csv');
    mkdirSync(folder);
    const reader = new LogFileReader();

    const result = await reader.consume(folder);

    expect(result._unsafeUnwrapErr().code).toBe('ingest.fileAccess');
    expect(reader.cursor(folder)).toBeNull();
  });

  it('reports a vanished file as transient', async () => {
    const reader = new LogFileReader();
    const result = await reader.consume(join(dir, 'gone.csv'));
    const error = result._unsafeUnwrapErr();
    expect(error.code).toBe('ingest.fileAccess');
    expect(error.details).toMatchObject({ code: 'ENOENT' });
  });

  it('starts over when the file shrinks', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + row(2, 'Pass') + row(3, 'Pass'));
    const reader = new LogFileReader();
    await reader.consume(file);

    writeFileSync(file, HEADER + row(1, 'Fail'));
    const batch = (await reader.consume(file))._unsafeUnwrap();

    expect(batch.cursorReset).toEqual({ previousRows: 3 });
    expect(batch.events).toEqual([{ printerId: 'P1', outcome: 'fail' }]);
    expect(reader.cursor(file)?.rowsConsumed).toBe(1);
  });

  it('reads a re-created file from the first row', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + row(2, 'Pass'));
    const reader = new LogFileReader();
    await reader.consume(file);

    writeFileSync(file, HEADER + row(1, 'Fail') + row(2, 'Fail') + row(3, 'Fail'));
    const batch = (await reader.consume(file, { created: true }))._unsafeUnwrap();

    expect(batch.cursorReset).toBeNull();
    expect(batch.events).toHaveLength(3);
  });

  it('primes existing rows without producing events', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + row(2, 'Pass'));
    const reader = new LogFileReader();

    expect((await reader.prime(file))._unsafeUnwrap()).toBe(2);
    appendFileSync(file, row(3, 'Fail'));
    const batch = (await reader.consume(file))._unsafeUnwrap();

    expect(batch.events).toEqual([{ printerId: 'P1', outcome: 'fail' }]);
  });

  it('continues from seeded cursors', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass') + row(2, 'Pass') + row(3, 'Fail'));
    const reader = new LogFileReader({ seed: { [file]: 2 } });

    const batch = (await reader.consume(file))._unsafeUnwrap();

    expect(batch.events).toEqual([{ printerId: 'P1', outcome: 'fail' }]);
    expect(reader.cursors()).toEqual({ [file]: 3 });
  });

  it('uses the configured printer for rows without one', async () => {
    writeFileSync(file, 'Failure Message\nPass (Label)\n');
    const reader = new LogFileReader({ defaultPrinter: 'Bench' });
    const batch = (await reader.consume(file))._unsafeUnwrap();
    expect(batch.events).toEqual([{ printerId: 'Bench', outcome: 'pass' }]);
  });

  it('drain waits for queued passes', async () => {
    writeFileSync(file, HEADER + row(1, 'Pass'));
    const reader = new LogFileReader();
    const pending = reader.consume(file);

    await reader.drain();

    expect(reader.cursor(file)?.rowsConsumed).toBe(1);
    await pending;
  });
});
