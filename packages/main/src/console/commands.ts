import type { Result } from 'neverthrow';
import {
  makeErr,
  makeOk,
  toEnvelope,
  type AppError,
  type Job,
  type JobSnapshot,
  type PrinterCountsSnapshot,
  type ResultEnvelope,
  type RollAction,
  type RollSnapshot
} from '../../../shared/src';
import { createAppError, ErrorCodes } from '../errors';
import type { JobBoard } from '../services/jobBoard';
import { listAppMessages, markAllMessagesRead } from '../services/messages';

export const HELP_TEXT = [
  'jobs                                   list active jobs',
  'done                                   list completed jobs',
  'add <customer>|<ticket>|<inlay>|<qty>|<perRoll>|[printer]',
  'edit <id> <customer>|<ticket>|<inlay>|<qty>|<perRoll>|[printer]',
  'open <id> / close <id> / show <id>     open, close or display a job',
  'start|pause|resume <id> <roll>         roll controls',
  'stop <id> <roll> --yes                 stop a roll (cannot be undone)',
  'draft <id> <roll> <text>               edit the pause note of a paused roll',
  'note <id> <roll> [text]                save the pause note (the draft when no text)',
  'discard <id> <roll>                    discard the pause note',
  'complete <id> --yes                    mark a job complete (cannot be undone)',
  'history <id>                           roll actions recorded for a job',
  'counts                                 printer pass/fail totals',
  'messages                               recent notifications',
  'help                                   this list'
].join('\n');

const CONFIRM_FLAG = '--yes';

function usage(text: string): ResultEnvelope<string> {
  return makeErr(createAppError(ErrorCodes.validation, `Usage: ${text}`));
}

function parseId(token: string | undefined): number | null {
  return token && /^\d+$/.test(token) ? Number(token) : null;
}

function parseJobFields(text: string) {
  const [customer = '', ticket = '', inlayType = '', qty = '', perRoll = '', printerName = ''] = text
    .split('|')
    .map((part) => part.trim());
  return {
    customer,
    ticket,
    inlayType,
    quantity: Number(qty),
    labelsPerRoll: Number(perRoll),
    printerName: printerName || undefined
  };
}

export function formatJob(job: Job): string {
  const inlay = job.inlayType ? ` [${job.inlayType}]` : '';
  return `#${job.id} ${job.ticket} for ${job.customer}${inlay}: ${job.quantity} labels, ${job.labelsPerRoll} per roll on ${job.printerName}`;
}

export function formatRoll(roll: RollSnapshot): string {
  return `Roll ${roll.rollNumber}: ${roll.state} ${roll.currentProgress}/${roll.labelsGoal} (pass +${roll.deltaPass}, fail +${roll.deltaFail})`;
}

export function formatJobSnapshot(snapshot: JobSnapshot): string {
  const lines = [formatJob(snapshot.job), `Status: ${snapshot.completed ? 'complete' : 'active'}, ${snapshot.totalRolls} roll(s)`];
  for (const roll of snapshot.rolls) {
    lines.push(`  ${formatRoll(roll)}`);
    for (const note of roll.notes) {
      lines.push(`    note at ${note.progressAtTime}: ${note.text}`);
    }
    if (roll.noteEntryOpen) {
      lines.push(`    note entry open${roll.noteDraft ? `: ${roll.noteDraft}` : ''}`);
    }
  }
  return lines.join('\n');
}

export function formatCounts(counts: PrinterCountsSnapshot): string {
  const entries = Object.values(counts);
  if (entries.length === 0) return 'No printer activity yet.';
  return entries.map((entry) => `${entry.printerId}: ${entry.pass} pass, ${entry.fail} fail`).join('\n');
}

function formatActions(actions: RollAction[]): string {
  if (actions.length === 0) return 'No roll actions recorded.';
  return actions
    .map((action) => {
      const roll = action.rollNumber > 0 ? `roll ${action.rollNumber}` : 'job';
      return `${action.timestamp} ${roll} ${action.action}${action.note ? `: ${action.note}` : ''}`;
    })
    .join('\n');
}

function formatJobList(jobs: Job[], empty: string): string {
  return jobs.length ? jobs.map(formatJob).join('\n') : empty;
}

function mapResult<T>(result: Result<T, AppError>, format: (value: T) => string): ResultEnvelope<string> {
  const envelope = toEnvelope(result);
  return envelope.ok ? makeOk(format(envelope.value)) : makeErr(envelope.error);
}

type RollCommand = (board: JobBoard, jobId: number, rollNumber: number, rest: string[]) => Result<RollSnapshot, AppError>;

type RollCommandSpec = { usage: string; run: RollCommand };

const ROLL_COMMANDS = new Map<string, RollCommandSpec>([
  ['start', { usage: 'start <id> <roll>', run: (board, jobId, roll) => board.startRoll(jobId, roll) }],
  ['pause', { usage: 'pause <id> <roll>', run: (board, jobId, roll) => board.pauseRoll(jobId, roll) }],
  ['resume', { usage: 'resume <id> <roll>', run: (board, jobId, roll) => board.resumeRoll(jobId, roll) }],
  [
    'stop',
    {
      usage: 'stop <id> <roll> --yes',
      run: (board, jobId, roll, rest) => board.stopRoll(jobId, roll, { confirmed: rest.includes(CONFIRM_FLAG) })
    }
  ],
  [
    'draft',
    { usage: 'draft <id> <roll> <text>', run: (board, jobId, roll, rest) => board.setNoteDraft(jobId, roll, rest.join(' ')) }
  ],
  [
    'note',
    {
      usage: 'note <id> <roll> [text]',
      run: (board, jobId, roll, rest) => board.submitNote(jobId, roll, rest.length ? rest.join(' ') : undefined)
    }
  ],
  ['discard', { usage: 'discard <id> <roll>', run: (board, jobId, roll) => board.discardNote(jobId, roll) }]
]);

/** Runs one console command line against the board and returns the text to print. */
export async function runCommand(board: JobBoard, line: string): Promise<ResultEnvelope<string>> {
  const trimmed = line.trim();
  if (!trimmed) return makeOk('');
  const [name, ...args] = trimmed.split(/\s+/);
  const command = name.toLowerCase();

  const rollCommand = ROLL_COMMANDS.get(command);
  if (rollCommand) {
    const jobId = parseId(args[0]);
    const rollNumber = parseId(args[1]);
    if (jobId === null || rollNumber === null) return usage(rollCommand.usage);
    return mapResult(rollCommand.run(board, jobId, rollNumber, args.slice(2)), formatRoll);
  }

  switch (command) {
    case 'help':
      return makeOk(HELP_TEXT);
    case 'jobs':
      return mapResult(await board.listActiveJobs(), (jobs) => formatJobList(jobs, 'No active jobs.'));
    case 'done':
      return mapResult(await board.listCompletedJobs(), (jobs) => formatJobList(jobs, 'No completed jobs.'));
    case 'add': {
      const fields = trimmed.slice(name.length).trim();
      if (!fields) return usage('add <customer>|<ticket>|<inlay>|<qty>|<perRoll>|[printer]');
      return mapResult(await board.createJob(parseJobFields(fields)), (job) => `Added ${formatJob(job)}`);
    }
    case 'edit': {
      const jobId = parseId(args[0]);
      const fields = args.slice(1).join(' ');
      if (jobId === null || !fields) return usage('edit <id> <customer>|<ticket>|<inlay>|<qty>|<perRoll>|[printer]');
      return mapResult(await board.editJob(jobId, parseJobFields(fields)), (job) => `Updated ${formatJob(job)}`);
    }
    case 'open':
    case 'show': {
      const jobId = parseId(args[0]);
      if (jobId === null) return usage(`${command} <id>`);
      const existing = board.getCoordinator(jobId);
      if (command === 'show' && existing) return makeOk(formatJobSnapshot(existing.snapshot()));
      return mapResult(await board.openJob(jobId), formatJobSnapshot);
    }
    case 'close': {
      const jobId = parseId(args[0]);
      if (jobId === null) return usage('close <id>');
      return mapResult(board.closeJob(jobId), (snapshot) => `Closed job #${snapshot.job.id}`);
    }
    case 'complete': {
      const jobId = parseId(args[0]);
      if (jobId === null) return usage('complete <id> --yes');
      const result = await board.completeJob(jobId, { confirmed: args.includes(CONFIRM_FLAG) });
      return mapResult(result, (snapshot) => `Job #${snapshot.job.id} marked as complete`);
    }
    case 'history': {
      const jobId = parseId(args[0]);
      if (jobId === null) return usage('history <id>');
      return mapResult(await board.listRollActions(jobId), formatActions);
    }
    case 'counts':
      return makeOk(formatCounts(board.latestCounts()));
    case 'messages': {
      const recent = listAppMessages().slice(0, 10);
      markAllMessagesRead();
      if (recent.length === 0) return makeOk('No messages.');
      return makeOk(recent.map((entry) => `[${entry.tone}] ${entry.title}: ${entry.body}`).join('\n'));
    }
    default:
      return makeErr(createAppError(ErrorCodes.unknownCommand, `Unknown command "${name}". Type "help" for a list.`));
  }
}
