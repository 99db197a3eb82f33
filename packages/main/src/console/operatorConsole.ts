import { createInterface } from 'readline';
import type { ResultEnvelope } from '../../../shared/src';
import { ErrorCodes } from '../errors';
import { logger } from '../logger';
import type { JobBoard } from '../services/jobBoard';
import { subscribeAppMessages, type AppMessageEntry } from '../services/messages';
import { runCommand } from './commands';

export type OperatorConsoleOptions = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Called when the operator types `exit` or the input ends. */
  onExit?: () => void;
};

export type OperatorConsole = {
  close(): void;
};

const CONFIRM_PROMPTS: Record<string, (args: string[]) => string> = {
  stop: (args) => `Stop roll ${args[1] ?? '?'} of job ${args[0] ?? '?'}? This cannot be undone. (y/N) `,
  complete: (args) => `Mark job ${args[0] ?? '?'} as complete? This cannot be undone. (y/N) `
};

function formatEnvelope(envelope: ResultEnvelope<string>): string {
  return envelope.ok ? envelope.value : `Error (${envelope.error.code}): ${envelope.error.message}`;
}

function formatMessage(entry: AppMessageEntry): string {
  return `\n[${entry.tone}] ${entry.title}: ${entry.body}`;
}

/** Line-oriented operator console. Destructive commands ask before they run. */
export function startConsole(board: JobBoard, options: OperatorConsoleOptions = {}): OperatorConsole {
  const output = options.output ?? process.stdout;
  const rl = createInterface({ input: options.input ?? process.stdin, output, terminal: false });
  const write = (text: string) => {
    if (text) output.write(`${text}\n`);
  };
  const unsubscribe = subscribeAppMessages((entry) => write(formatMessage(entry)));

  // Lines are taken one at a time, so the answer to a confirmation is the line after the command,
  // even when both arrive in the same chunk.
  const lines: string[] = [];
  let waiting: ((line: string | null) => void) | null = null;
  let ended = false;
  let finished = false;

  const nextLine = (): Promise<string | null> => {
    const line = lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      waiting = resolve;
    });
  };

  const deliver = (line: string | null) => {
    const resolve = waiting;
    waiting = null;
    resolve?.(line);
  };

  const handleLine = async (trimmed: string) => {
    const result = await runCommand(board, trimmed);
    if (!result.ok && result.error.code === ErrorCodes.confirmationRequired) {
      const [name, ...args] = trimmed.split(/\s+/);
      const prompt = CONFIRM_PROMPTS[name.toLowerCase()];
      if (prompt) {
        output.write(prompt(args));
        const answer = (await nextLine()) ?? '';
        write(/^y(es)?$/i.test(answer.trim()) ? formatEnvelope(await runCommand(board, `${trimmed} --yes`)) : 'Cancelled.');
        return;
      }
    }
    write(formatEnvelope(result));
  };

  const finish = () => {
    if (finished) return;
    finished = true;
    unsubscribe();
    rl.close();
    options.onExit?.();
  };

  const processLines = async () => {
    for (let line = await nextLine(); line !== null; line = await nextLine()) {
      const trimmed = line.trim();
      if (trimmed === 'exit' || trimmed === 'quit') break;
      try {
        await handleLine(trimmed);
      } catch (err) {
        logger.error({ err }, 'console: command failed');
      }
    }
    finish();
  };

  rl.on('line', (line) => {
    if (waiting) {
      deliver(line);
    } else {
      lines.push(line);
    }
  });
  rl.on('close', () => {
    ended = true;
    deliver(null);
  });

  write('Type "help" for commands.');
  processLines().catch((err: unknown) => {
    logger.error({ err }, 'console: input loop failed');
    finish();
  });
  return {
    close: () => rl.close()
  };
}
