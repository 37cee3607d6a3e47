import { ChildProcess, spawn } from 'node:child_process';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { SpawnTimeoutError, spawnAsync } from './spawn-utils';

vi.mock('node:child_process', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:child_process')>()),
  spawn: vi.fn(),
}));

const spawnMock = vi.mocked(spawn);

interface MockProcess {
  proc: ChildProcess;
  stdout: Readable;
  stderr: Readable;
}

function createMockProcess(options?: {
  hasStdout?: boolean;
  hasStderr?: boolean;
}): MockProcess {
  const proc = new ChildProcess();
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });

  proc.stdout = options?.hasStdout === false ? null : stdout;
  proc.stderr = options?.hasStderr === false ? null : stderr;
  vi.spyOn(proc, 'kill').mockReturnValue(true);

  return { proc, stdout, stderr };
}

describe('spawnAsync', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('executes command and captures stdout/stderr', async () => {
    const { proc, stdout, stderr } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('echo', ['hello']);

    stdout.emit('data', Buffer.from('hello'));
    stderr.emit('data', Buffer.from('warning'));
    proc.emit('close', 0);

    expect(spawnMock).toHaveBeenCalledWith('echo', ['hello'], {});
    await expect(promise).resolves.toEqual({
      stdout: 'hello',
      stderr: 'warning',
      code: 0,
    });
  });

  test('passes spawn options through without the capture and timeout flags', async () => {
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdftotext', ['a.pdf', '-'], {
      cwd: '/custom/path',
      captureStderr: false,
      timeoutMs: 1000,
    });
    proc.emit('close', 0);
    await promise;

    expect(spawnMock).toHaveBeenCalledWith('pdftotext', ['a.pdf', '-'], {
      cwd: '/custom/path',
    });
  });

  test('keeps multi-byte characters split across chunks intact', async () => {
    const { proc, stdout } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const bytes = Buffer.from('日本語', 'utf8');
    const promise = spawnAsync('cmd', []);

    stdout.emit('data', bytes.subarray(0, 4));
    stdout.emit('data', bytes.subarray(4));
    proc.emit('close', 0);

    expect((await promise).stdout).toBe('日本語');
  });

  test('accepts string chunks', async () => {
    const { proc, stdout } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', []);
    stdout.emit('data', 'text');
    proc.emit('close', 0);

    expect((await promise).stdout).toBe('text');
  });

  test('does not capture stdout when captureStdout is false', async () => {
    const { proc, stdout } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', [], { captureStdout: false });
    stdout.emit('data', Buffer.from('ignored'));
    proc.emit('close', 0);

    expect((await promise).stdout).toBe('');
  });

  test('handles a process without output streams', async () => {
    const { proc } = createMockProcess({ hasStdout: false, hasStderr: false });
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', []);
    proc.emit('close', 0);

    await expect(promise).resolves.toEqual({ stdout: '', stderr: '', code: 0 });
  });

  test('returns 0 when exit code is null and keeps non-zero codes', async () => {
    const first = createMockProcess();
    const second = createMockProcess();
    spawnMock.mockReturnValueOnce(first.proc).mockReturnValueOnce(second.proc);

    const nullCode = spawnAsync('cmd', []);
    const failing = spawnAsync('cmd', []);
    first.proc.emit('close', null);
    second.proc.emit('close', 1);

    expect((await nullCode).code).toBe(0);
    expect((await failing).code).toBe(1);
  });

  test('rejects on process error', async () => {
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('nonexistent', []);
    proc.emit('error', new Error('ENOENT: command not found'));

    await expect(promise).rejects.toThrow('ENOENT: command not found');
  });

  test('kills the process and rejects when the timeout elapses', async () => {
    vi.useFakeTimers();
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('pdftotext', [], { timeoutMs: 500 });
    const assertion = expect(promise).rejects.toBeInstanceOf(SpawnTimeoutError);

    vi.advanceTimersByTime(500);
    await assertion;

    expect(proc.kill).toHaveBeenCalledTimes(1);

    proc.emit('close', null);
  });

  test('clears the timeout when the process closes first', async () => {
    vi.useFakeTimers();
    const { proc } = createMockProcess();
    spawnMock.mockReturnValue(proc);

    const promise = spawnAsync('cmd', [], { timeoutMs: 500 });
    proc.emit('close', 0);
    vi.advanceTimersByTime(1000);

    await expect(promise).resolves.toEqual({ stdout: '', stderr: '', code: 0 });
    expect(proc.kill).not.toHaveBeenCalled();
  });
});
