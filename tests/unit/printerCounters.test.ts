import { describe, expect, it } from 'vitest';
import type { LogEvent } from '../../packages/shared/src';
import { PrinterCounterBoard } from '../../packages/main/src/services/printerCounters';

const pass = (printerId: string): LogEvent => ({ printerId, outcome: 'pass' });
const fail = (printerId: string): LogEvent => ({ printerId, outcome: 'fail' });

describe('PrinterCounterBoard', () => {
  it('creates printers lazily and reports the ones touched in first-seen order', () => {
    const board = new PrinterCounterBoard();
    expect(board.get('P1')).toBeNull();

    const touched = board.apply([pass('P2'), pass('P1'), fail('P2')]);

    expect(touched).toEqual(['P2', 'P1']);
    expect(board.get('P2')).toEqual({ printerId: 'P2', pass: 1, fail: 1 });
    expect(board.get('P1')).toEqual({ printerId: 'P1', pass: 1, fail: 0 });
  });

  it('ends with the same totals whatever order the batches arrive in', () => {
    const batches = [[pass('P1'), pass('P1')], [fail('P1'), pass('P2')], [pass('P1')]];
    const forward = new PrinterCounterBoard();
    const backward = new PrinterCounterBoard();
    batches.forEach((batch) => forward.apply(batch));
    [...batches].reverse().forEach((batch) => backward.apply(batch));

    expect(forward.snapshot()).toEqual(backward.snapshot());
    expect(forward.get('P1')).toEqual({ printerId: 'P1', pass: 3, fail: 1 });
  });

  it('hands out copies that later batches do not change', () => {
    const board = new PrinterCounterBoard();
    board.apply([pass('P1')]);
    const before = board.snapshot();
    const single = board.get('P1');

    board.apply([pass('P1'), pass('P1')]);

    expect(before.P1.pass).toBe(1);
    expect(single?.pass).toBe(1);
    expect(Object.isFrozen(before)).toBe(true);
    expect(board.get('P1')?.pass).toBe(3);
  });

  it('continues from a seed snapshot', () => {
    const board = new PrinterCounterBoard({ P1: { printerId: 'P1', pass: 40, fail: 2 } });
    board.apply([pass('P1'), fail('P1')]);
    expect(board.get('P1')).toEqual({ printerId: 'P1', pass: 41, fail: 3 });
  });
});
