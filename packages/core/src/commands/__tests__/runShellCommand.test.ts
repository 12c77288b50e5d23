/* eslint-env jest */
import { describe, expect, jest, test } from '@jest/globals';

import { runShellCommand, type SpawnFn } from '../run.js';

describe('runShellCommand', () => {
  test('captures stdout and trims surrounding whitespace', async () => {
    const result = await runShellCommand("printf '  padded output  \\n\\n'");

    expect(result).toEqual({
      termination: 'exit',
      output: 'padded output',
      exitCode: 0,
      signal: null,
    });
  });

  test('captures stderr into the same output', async () => {
    const result = await runShellCommand('echo problem 1>&2');

    expect(result.output).toBe('problem');
    expect(result.exitCode).toBe(0);
  });

  test('reports a non-zero exit status with its output', async () => {
    const result = await runShellCommand('echo partial; exit 3');

    expect(result).toEqual({
      termination: 'exit',
      output: 'partial',
      exitCode: 3,
      signal: null,
    });
  });

  test('terminates a command that outlives its timeout', async () => {
    const result = await runShellCommand('sleep 5', { timeoutSec: 0.2 });

    expect(result.termination).toBe('timeout');
    expect(result.exitCode).toBeNull();
    expect(result.signal).toBe('SIGTERM');
  });

  test('terminates a running command when the signal aborts', async () => {
    const controller = new AbortController();
    const reason = new Error('stop requested');
    setTimeout(() => controller.abort(reason), 100);

    const result = await runShellCommand('sleep 5', { signal: controller.signal });

    expect(result.termination).toBe('aborted');
    expect(result.cause).toBe(reason);
  });

  test('does not spawn when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('too late'));
    const spawnFn = jest.fn<SpawnFn>();

    const result = await runShellCommand('echo hi', { signal: controller.signal, spawnFn });

    expect(spawnFn).not.toHaveBeenCalled();
    expect(result.termination).toBe('aborted');
    expect(result.output).toBe('');
  });

  test('reports a synchronous spawn failure', async () => {
    const failure = new Error('spawn failed');
    const spawnFn = jest.fn<SpawnFn>(() => {
      throw failure;
    });

    const result = await runShellCommand('echo hi', { spawnFn });

    expect(result).toEqual({
      termination: 'spawn-error',
      output: '',
      exitCode: null,
      signal: null,
      cause: failure,
    });
    expect(spawnFn).toHaveBeenCalledWith(
      '/bin/sh',
      ['-c', 'echo hi'],
      expect.objectContaining({ detached: true }),
    );
  });

  test('reports a missing shell binary as a spawn error', async () => {
    const result = await runShellCommand('echo hi', { shell: '/nonexistent/shell' });

    expect(result.termination).toBe('spawn-error');
  });
});
