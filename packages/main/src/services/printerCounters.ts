import type { LogEvent, PrinterCounters, PrinterCountsSnapshot } from '../../../shared/src';

/**
 * Lifetime pass/fail totals per printer. Counters only grow; a printer's record is created
 * the first time one of its events is applied and is never removed.
 */
export class PrinterCounterBoard {
  private readonly counters = new Map<string, PrinterCounters>();

  constructor(seed?: PrinterCountsSnapshot) {
    if (!seed) return;
    for (const [printerId, counts] of Object.entries(seed)) {
      this.counters.set(printerId, {
        printerId,
        pass: Math.max(0, Math.trunc(counts.pass)),
        fail: Math.max(0, Math.trunc(counts.fail))
      });
    }
  }

  /** Applies a batch in one synchronous step and returns the printers it touched, in first-seen order. */
  apply(events: readonly LogEvent[]): string[] {
    const touched: string[] = [];
    for (const event of events) {
      let entry = this.counters.get(event.printerId);
      if (!entry) {
        entry = { printerId: event.printerId, pass: 0, fail: 0 };
        this.counters.set(event.printerId, entry);
      }
      if (event.outcome === 'pass') {
        entry.pass += 1;
      } else {
        entry.fail += 1;
      }
      if (!touched.includes(event.printerId)) touched.push(event.printerId);
    }
    return touched;
  }

  get(printerId: string): PrinterCounters | null {
    const entry = this.counters.get(printerId);
    return entry ? { ...entry } : null;
  }

  snapshot(): PrinterCountsSnapshot {
    const copy: Record<string, Readonly<PrinterCounters>> = {};
    for (const [printerId, entry] of this.counters) {
      copy[printerId] = Object.freeze({ ...entry });
    }
    return Object.freeze(copy);
  }
}
