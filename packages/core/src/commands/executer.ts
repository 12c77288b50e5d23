/**
 * Memoizing command executer.
 *
 * Responsibilities:
 * - Serve repeated literal commands from an in-memory cache without touching the shell.
 * - Run cache misses through `sh -c` and classify failures as `timeout` or `failure`.
 * - Cache successful results only, so a failed command can be retried verbatim.
 *
 * Callers are expected to validate commands before handing them over.
 */
import { DEFAULT_COMMAND_TIMEOUT_SEC } from '../constants.js';
import { describeCause, isDeadlineReason } from '../utils/abort.js';
import { runShellCommand } from './run.js';
import type {
  CommandExecuter,
  ExecutionFailure,
  ExecutionResult,
  ShellRunOptions,
  ShellRunResult,
} from './commandTypes.js';

export type ShellRunner = (command: string, options: ShellRunOptions) => Promise<ShellRunResult>;

export interface CachingExecuterOptions {
  commandTimeoutSec?: number;
  shell?: string;
  cwd?: string;
  runner?: ShellRunner;
}

export function classifyShellResult(
  result: ShellRunResult,
  timeoutSec: number,
): ExecutionResult {
  const base: Pick<ExecutionFailure, 'ok' | 'output' | 'exitCode' | 'signal'> = {
    ok: false,
    output: result.output,
    exitCode: result.exitCode,
    signal: result.signal,
  };

  switch (result.termination) {
    case 'exit':
      if (result.exitCode === 0) {
        return { ok: true, output: result.output };
      }
      return {
        ...base,
        kind: 'failure',
        message:
          result.signal !== null
            ? `terminated by signal ${result.signal}`
            : `exit status ${String(result.exitCode)}`,
      };
    case 'timeout':
      return { ...base, kind: 'timeout', message: `command timed out after ${timeoutSec}s` };
    case 'aborted':
      if (isDeadlineReason(result.cause)) {
        return { ...base, kind: 'timeout', message: 'session deadline exceeded' };
      }
      return { ...base, kind: 'failure', message: `canceled: ${describeCause(result.cause)}` };
    case 'spawn-error':
      return { ...base, kind: 'failure', message: describeCause(result.cause) };
  }
}

export class CachingExecuter implements CommandExecuter {
  private readonly cache = new Map<string, ExecutionResult>();

  private readonly runner: ShellRunner;

  private readonly timeoutSec: number;

  private readonly shell: string | undefined;

  private readonly cwd: string | undefined;

  constructor({
    commandTimeoutSec = DEFAULT_COMMAND_TIMEOUT_SEC,
    shell,
    cwd,
    runner = runShellCommand,
  }: CachingExecuterOptions = {}) {
    this.timeoutSec = commandTimeoutSec;
    this.shell = shell;
    this.cwd = cwd;
    this.runner = runner;
  }

  async run(signal: AbortSignal, command: string): Promise<ExecutionResult> {
    const cached = this.cache.get(command);
    if (cached) {
      return cached;
    }

    const raw = await this.runner(command, {
      signal,
      timeoutSec: this.timeoutSec,
      shell: this.shell,
      cwd: this.cwd,
    });
    const result = classifyShellResult(raw, this.timeoutSec);
    if (result.ok) {
      this.cache.set(command, result);
    }
    return result;
  }

  has(command: string): boolean {
    return this.cache.has(command);
  }

  get size(): number {
    return this.cache.size;
  }
}

export const createCachingExecuter = (options?: CachingExecuterOptions): CachingExecuter =>
  new CachingExecuter(options);

export default {
  CachingExecuter,
  createCachingExecuter,
  classifyShellResult,
};
