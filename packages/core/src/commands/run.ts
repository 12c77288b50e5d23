import { spawn, type ChildProcess } from 'node:child_process';

import { COMMAND_FORCE_KILL_DELAY_MS, DEFAULT_COMMAND_TIMEOUT_SEC } from '../constants.js';
import type { ShellRunOptions, ShellRunResult, ShellTermination } from './commandTypes.js';
export type {
  ShellRunOptions,
  ShellRunResult,
  ShellTermination,
  SpawnFn,
} from './commandTypes.js';

interface RunState {
  child: ChildProcess | null;
  chunks: Buffer[];
  settled: boolean;
  termination: ShellTermination;
  cause?: unknown;
  timeoutHandle?: NodeJS.Timeout;
  forceKillHandle?: NodeJS.Timeout;
  detachAbort?: () => void;
  resolve: (result: ShellRunResult) => void;
}

/**
 * Runs `command` through `sh -c` and resolves once the process closes.
 *
 * stdout and stderr are captured into one buffer in arrival order. The child
 * runs in its own process group; abort and timeout send SIGTERM to the group,
 * then SIGKILL after a grace period. The promise never rejects.
 */
export function runShellCommand(
  command: string,
  options: ShellRunOptions = {},
): Promise<ShellRunResult> {
  const {
    signal,
    timeoutSec = DEFAULT_COMMAND_TIMEOUT_SEC,
    shell = '/bin/sh',
    cwd,
    spawnFn = spawn,
  } = options;

  return new Promise<ShellRunResult>((resolve) => {
    const state: RunState = {
      child: null,
      chunks: [],
      settled: false,
      termination: 'exit',
      resolve,
    };

    if (signal?.aborted) {
      state.termination = 'aborted';
      state.cause = signal.reason;
      finalize(state, null, null);
      return;
    }

    try {
      state.child = spawnFn(shell, ['-c', command], {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true,
      });
    } catch (error) {
      state.termination = 'spawn-error';
      state.cause = error;
      finalize(state, null, null);
      return;
    }

    attachChildListeners(state);
    observeAbort(state, signal);
    registerTimeout(state, timeoutSec);
  });
}

function attachChildListeners(state: RunState): void {
  const { child } = state;
  if (!child) {
    return;
  }

  const collect = (chunk: Buffer | string): void => {
    state.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  };
  child.stdout?.on('data', collect);
  child.stderr?.on('data', collect);

  child.on('error', (error) => {
    if (state.settled) {
      return;
    }
    // A spawn failure surfaces here with no `close` event to follow.
    if (child.pid === undefined) {
      state.termination = 'spawn-error';
      state.cause = error;
      finalize(state, null, null);
    }
  });

  child.on('close', (code, signal) => {
    finalize(state, code, signal);
  });
}

function observeAbort(state: RunState, signal: AbortSignal | undefined): void {
  if (!signal) {
    return;
  }

  const onAbort = (): void => {
    if (state.settled || state.termination !== 'exit') {
      return;
    }
    state.termination = 'aborted';
    state.cause = signal.reason;
    terminateChild(state);
  };

  signal.addEventListener('abort', onAbort, { once: true });
  state.detachAbort = () => signal.removeEventListener('abort', onAbort);
}

function registerTimeout(state: RunState, timeoutSec: number): void {
  const timeoutMs = Math.max(0, timeoutSec * 1000);
  if (timeoutMs <= 0) {
    return;
  }

  state.timeoutHandle = setTimeout(() => {
    if (state.settled || state.termination !== 'exit') {
      return;
    }
    state.termination = 'timeout';
    terminateChild(state);
  }, timeoutMs);
}

function terminateChild(state: RunState): void {
  signalProcessGroup(state.child, 'SIGTERM');

  state.forceKillHandle = setTimeout(() => {
    if (!state.settled) {
      signalProcessGroup(state.child, 'SIGKILL');
    }
  }, COMMAND_FORCE_KILL_DELAY_MS);
}

function signalProcessGroup(child: ChildProcess | null, signal: NodeJS.Signals): void {
  if (!child) {
    return;
  }

  if (child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      // The group is gone (ESRCH) or not ours (EPERM); signal the direct child instead.
      if (!isErrnoException(error)) {
        throw error;
      }
    }
  }

  child.kill(signal);
}

function isErrnoException(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function finalize(state: RunState, code: number | null, signal: NodeJS.Signals | null): void {
  if (state.settled) {
    return;
  }

  state.settled = true;
  if (state.timeoutHandle) {
    clearTimeout(state.timeoutHandle);
  }
  if (state.forceKillHandle) {
    clearTimeout(state.forceKillHandle);
  }
  state.detachAbort?.();

  state.resolve({
    termination: state.termination,
    output: Buffer.concat(state.chunks).toString('utf8').trim(),
    exitCode: code,
    signal,
    ...(state.cause !== undefined ? { cause: state.cause } : {}),
  });
}

export default {
  runShellCommand,
};
