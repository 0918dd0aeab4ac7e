import { EventEmitter } from 'node:events';
import { CommandExitError } from '../../errors';
import { BqCommand, listTablesArgs, showSchemaArgs, showTableArgs } from '../command';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const mockExecFile = jest.fn();
const mockSpawn = jest.fn();

jest.mock('node:child_process', () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

function execResult(error: Error | null, stdout: string, stderr: string) {
  return (_file: string, _args: string[], _options: object, callback: ExecCallback): void => {
    callback(error, stdout, stderr);
  };
}

describe('BqCommand', () => {
  it('resolves with stdout', async () => {
    mockExecFile.mockImplementation(execResult(null, '[]', ''));
    const command = new BqCommand({ binary: '/opt/bq' });

    await expect(command.run(['ls', 'sales'])).resolves.toBe('[]');
    expect(mockExecFile).toHaveBeenCalledWith(
      '/opt/bq',
      ['ls', 'sales'],
      expect.objectContaining({ encoding: 'utf8' }),
      expect.any(Function)
    );
  });

  it('forwards the abort signal', async () => {
    mockExecFile.mockImplementation(execResult(null, '', ''));
    const controller = new AbortController();

    await new BqCommand().run(['ls'], controller.signal);

    expect(mockExecFile).toHaveBeenCalledWith(
      'bq',
      ['ls'],
      expect.objectContaining({ signal: controller.signal }),
      expect.any(Function)
    );
  });

  it('rejects non-zero exits with the captured stderr', async () => {
    const failure = Object.assign(new Error('Command failed'), { code: 2 });
    mockExecFile.mockImplementation(execResult(failure, '', 'ERROR: Not found: Dataset x\n'));

    const error = await new BqCommand().run(['ls']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandExitError);
    if (error instanceof CommandExitError) {
      expect(error.exitCode).toBe(2);
      expect(error.stderr).toBe('ERROR: Not found: Dataset x\n');
      expect(error.message).toBe('bq exited with code 2: Not found: Dataset x');
    }
  });

  it('rejects launch failures as they are', async () => {
    const failure = Object.assign(new Error('spawn bq ENOENT'), { code: 'ENOENT' });
    mockExecFile.mockImplementation(execResult(failure, '', ''));

    await expect(new BqCommand().run(['ls'])).rejects.toBe(failure);
  });

  it('runs attached to the terminal and resolves the exit code', async () => {
    const child = new EventEmitter();
    mockSpawn.mockReturnValue(child);

    const pending = new BqCommand().passthrough(['show', 'sales.orders']);
    child.emit('close', 3);

    await expect(pending).resolves.toBe(3);
    expect(mockSpawn).toHaveBeenCalledWith('bq', ['show', 'sales.orders'], { stdio: 'inherit' });
  });

  it('treats a signal-terminated passthrough as a failure', async () => {
    const child = new EventEmitter();
    mockSpawn.mockReturnValue(child);

    const pending = new BqCommand().passthrough(['show']);
    child.emit('close', null);

    await expect(pending).resolves.toBe(1);
  });
});

describe('argument builders', () => {
  it('lists tables as JSON with a result limit', () => {
    expect(listTablesArgs('test-project', 'sales', 1000)).toEqual([
      'ls',
      '--project_id=test-project',
      '--format=json',
      '--max_results=1000',
      'sales',
    ]);
  });

  it('shows a schema', () => {
    expect(showSchemaArgs('test-project', 'sales', 'orders')).toEqual([
      'show',
      '--project_id=test-project',
      '--schema',
      '--format=json',
      'sales.orders',
    ]);
  });

  it('shows table metadata', () => {
    expect(showTableArgs('test-project', 'sales', 'orders')).toEqual([
      'show',
      '--project_id=test-project',
      '--format=json',
      'sales.orders',
    ]);
  });
});
