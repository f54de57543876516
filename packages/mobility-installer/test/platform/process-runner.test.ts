/**
 * @fileoverview Tests for ProcessRunner
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import type { ChildProcess } from 'child_process';

vi.mock('child_process', () => ({
  spawn: vi.fn(),
}));

import { spawn } from 'child_process';
import { ProcessRunner } from '../../src/platform/process-runner.js';
import { CommandError } from '../../src/errors.js';

const mockSpawn = vi.mocked(spawn);

interface MockProc extends EventEmitter {
  stdout: EventEmitter;
  stderr: EventEmitter;
  kill: ReturnType<typeof vi.fn>;
  killed: boolean;
  exitCode: number | null;
  signalCode: NodeJS.Signals | null;
}

function createMockProcess(
  stdout = '',
  stderr = '',
  exitCode: number | null = 0,
  delay = 5,
  ignoreSigterm = false
): MockProc {
  const proc = new EventEmitter() as MockProc;
  proc.stdout = new EventEmitter();
  proc.stderr = new EventEmitter();
  proc.exitCode = null;
  proc.signalCode = null;
  proc.kill = vi.fn((signal: NodeJS.Signals) => {
    proc.killed = true;
    if (ignoreSigterm && signal === 'SIGTERM') {
      return true;
    }
    proc.signalCode = signal;
    proc.emit('close', null);
    return true;
  });
  proc.killed = false;

  if (delay >= 0) {
    setTimeout(() => {
      if (stdout) proc.stdout.emit('data', Buffer.from(stdout));
      if (stderr) proc.stderr.emit('data', Buffer.from(stderr));
      setTimeout(() => {
        proc.exitCode = exitCode;
        proc.emit('close', exitCode);
      }, delay);
    }, delay);
  }

  return proc;
}

function spawnReturns(proc: MockProc): void {
  mockSpawn.mockReturnValue(proc as unknown as ChildProcess);
}

describe('ProcessRunner', () => {
  let runner: ProcessRunner;

  beforeEach(() => {
    mockSpawn.mockReset();
    runner = new ProcessRunner();
  });

  it('should spawn the command hidden with its arguments', async () => {
    spawnReturns(createMockProcess());

    await runner.run('powershell.exe', ['-Command', 'Get-Printer']);

    expect(mockSpawn).toHaveBeenCalledWith('powershell.exe', ['-Command', 'Get-Printer'], { windowsHide: true });
  });

  it('should return trimmed output and the exit code', async () => {
    spawnReturns(createMockProcess('Running\r\n', 'warning\n', 0));

    await expect(runner.run('powershell.exe', [])).resolves.toEqual({
      stdout: 'Running',
      stderr: 'warning',
      exitCode: 0,
    });
  });

  it('should resolve non-zero exit codes without throwing', async () => {
    spawnReturns(createMockProcess('', 'access denied', 5));

    const result = await runner.run('setup.exe', ['/VERYSILENT']);

    expect(result.exitCode).toBe(5);
  });

  it('should kill the process when it runs past the timeout', async () => {
    const proc = createMockProcess('', '', 0, -1);
    spawnReturns(proc);

    const result = await runner.run('setup.exe', [], { timeoutMs: 20 });

    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result).toEqual({ stdout: '', stderr: '', exitCode: 137, timedOut: true });
  });

  it('should escalate to SIGKILL when the process ignores SIGTERM', async () => {
    const proc = createMockProcess('', '', 0, -1, true);
    spawnReturns(proc);

    const result = await runner.run('setup.exe', [], { timeoutMs: 20 });

    expect(proc.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']]);
    expect(result).toEqual({ stdout: '', stderr: '', exitCode: 137, timedOut: true });
  });

  it('should not escalate once the process has exited', async () => {
    vi.useFakeTimers();
    try {
      const proc = createMockProcess('', '', 0, -1);
      spawnReturns(proc);

      const pending = runner.run('setup.exe', [], { timeoutMs: 20 });
      await vi.advanceTimersByTimeAsync(20);
      await pending;
      await vi.advanceTimersByTimeAsync(5_000);

      expect(proc.kill.mock.calls).toEqual([['SIGTERM']]);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should terminate the process when the signal aborts', async () => {
    const proc = createMockProcess('', '', 0, -1);
    spawnReturns(proc);
    const controller = new AbortController();

    const pending = runner.run('setup.exe', [], { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result).toEqual({ stdout: '', stderr: '', exitCode: 130, interrupted: true });
  });

  it('should terminate at once when the signal is already aborted', async () => {
    const proc = createMockProcess('', '', 0, -1);
    spawnReturns(proc);

    const result = await runner.run('setup.exe', [], { signal: AbortSignal.abort() });

    expect(proc.kill).toHaveBeenCalledWith('SIGTERM');
    expect(result.interrupted).toBe(true);
  });

  it('should reject with CommandError when the process cannot start', async () => {
    const proc = createMockProcess('', '', 0, -1);
    spawnReturns(proc);
    setTimeout(() => proc.emit('error', new Error('spawn setup.exe ENOENT')), 5);

    const error = await runner.run('setup.exe', []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({
      command: 'setup.exe',
      exitCode: null,
      message: 'setup.exe could not be run: spawn setup.exe ENOENT',
    });
  });
});
