import { err, ok, type Result } from 'neverthrow';
import { DEFAULT_PRINTER_NAME, type LogEvent, type LogOutcome } from '../../../shared/src';

export const PASS_OUTCOME = 'Pass (Label)';
export const FAIL_OUTCOME = 'Fail (Label)';

// The label printer software writes "Failure Message"; "Outcome Message" is accepted as well.
const OUTCOME_COLUMNS = ['Outcome Message', 'Failure Message'];
const PRINTER_COLUMNS = ['Printer Name'];

export type LogRecord = Readonly<Record<string, string>>;

export type ParseSkip = {
  reason: 'missingOutcome' | 'unrecognizedOutcome';
  value?: string;
};

export type ParseOptions = {
  defaultPrinter?: string;
};

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function pick(record: LogRecord, candidates: string[]): string | null {
  const wanted = new Set(candidates.map(normalizeKey));
  for (const [key, value] of Object.entries(record)) {
    if (!wanted.has(normalizeKey(key))) continue;
    const trimmed = value.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return null;
}

function classify(value: string): LogOutcome | null {
  if (value === PASS_OUTCOME) return 'pass';
  if (value === FAIL_OUTCOME) return 'fail';
  return null;
}

export function parseLogRow(record: LogRecord, options: ParseOptions = {}): Result<LogEvent, ParseSkip> {
  const outcomeText = pick(record, OUTCOME_COLUMNS);
  if (outcomeText == null) {
    return err({ reason: 'missingOutcome' });
  }
  const outcome = classify(outcomeText);
  if (!outcome) {
    return err({ reason: 'unrecognizedOutcome', value: outcomeText });
  }
  const printerId = pick(record, PRINTER_COLUMNS) ?? options.defaultPrinter ?? DEFAULT_PRINTER_NAME;
  return ok({ printerId, outcome });
}

function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if ((ch === ',' || ch === ';' || ch === '\t') && !inQuotes) {
      out.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  out.push(current);
  return out.map((cell) => cell.trim());
}

/** Content up to and including the last newline. A trailing line without one is still being written. */
export function completeLines(content: string): string {
  return content.slice(0, content.lastIndexOf('\n') + 1);
}

/**
 * Decodes a CSV export into header-keyed records. The first non-blank line is the header;
 * blank lines are not rows. A UTF-8 byte-order mark on the header is dropped.
 */
export function parseCsvRecords(content: string): LogRecord[] {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
  if (lines.length === 0) return [];
  const headers = splitCsvLine(lines[0]);
  const records: LogRecord[] = [];
  for (const line of lines.slice(1)) {
    const cells = splitCsvLine(line);
    const record: Record<string, string> = {};
    headers.forEach((header, idx) => {
      if (!header) return;
      record[header] = cells[idx] ?? '';
    });
    records.push(record);
  }
  return records;
}
