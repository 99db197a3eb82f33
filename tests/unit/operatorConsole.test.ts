import { PassThrough } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { startConsole, type OperatorConsole } from '../../packages/main/src/console/operatorConsole';
import { JobBoard } from '../../packages/main/src/services/jobBoard';
import { clearAppMessages } from '../../packages/main/src/services/messages';
import { RollActionRecorder } from '../../packages/main/src/services/rollActions';
import { MemoryJobStore } from '../helpers/memoryJobStore';

describe('operator console', () => {
  let store: MemoryJobStore;
  let input: PassThrough;
  let output: string;
  let onExit: Mock<() => void>;
  let operatorConsole: OperatorConsole;

  beforeEach(() => {
    clearAppMessages();
    store = new MemoryJobStore();
    const board = new JobBoard({ store, sink: new RollActionRecorder(store) });
    input = new PassThrough();
    const sink = new PassThrough();
    output = '';
    sink.on('data', (chunk: Buffer) => {
      output += chunk.toString('utf8');
    });
    onExit = vi.fn<() => void>();
    operatorConsole = startConsole(board, { input, output: sink, onExit });
  });

  afterEach(() => {
    operatorConsole.close();
  });

  async function type(line: string, expected: string) {
    input.write(`${line}\n`);
    await vi.waitFor(() => expect(output).toContain(expected));
  }

  it('greets the operator and answers commands', async () => {
    await type('help', 'complete <id> --yes');
    expect(output.startsWith('Type "help" for commands.\n')).toBe(true);

    await type('bogus', 'Error (command.unknown): Unknown command "bogus". Type "help" for a list.');
  });

  it('prints notifications as they are raised', async () => {
    await type('add Acme Foods|T-1|UHF|250|100|P1', 'Added #1 T-1');
    expect(output).toContain('[success] Job Added: Job 1 (T-1 for Acme Foods) added on P1 with 3 roll(s).');
  });

  it('asks before completing a job and runs it once confirmed', async () => {
    await type('add Acme Foods|T-1|UHF|250|100|P1', 'Added #1');
    await type('open 1', 'Status: active, 3 roll(s)');

    await type('complete 1', 'Mark job 1 as complete? This cannot be undone. (y/N) ');
    await type('y', 'Job #1 marked as complete');

    expect(store.jobs.get(1)?.completed).toBe(true);
  });

  it('leaves the roll alone when a stop is not confirmed', async () => {
    await type('add Acme Foods|T-1|UHF|250|100|P1', 'Added #1');
    await type('open 1', 'Status: active');
    await type('start 1 1', 'Roll 1: running');

    await type('stop 1 1', 'Stop roll 1 of job 1? This cannot be undone. (y/N) ');
    await type('', 'Cancelled.');
    await type('show 1', '  Roll 1: running 0/100');
  });

  it('takes the confirmation from the line after the command when both arrive together', async () => {
    input.write('add Acme Foods|T-1|UHF|250|100|P1\nopen 1\nstart 1 1\nstop 1 1\ny\n');

    await vi.waitFor(() => expect(output).toContain('Roll 1: stopped 0/100'));
    expect(output).toContain('Stop roll 1 of job 1? This cannot be undone. (y/N) ');
    expect(output).not.toContain('Unknown command "y"');
  });

  it('calls onExit when the operator quits', async () => {
    input.write('exit\n');
    await vi.waitFor(() => expect(onExit).toHaveBeenCalledTimes(1));
  });
});
