import type { ChildProcess, SpawnOptions } from 'node:child_process';

export type ExecutionFailureKind = 'timeout' | 'failure';

export interface ExecutionSuccess {
  ok: true;
  output: string;
}

export interface ExecutionFailure {
  ok: false;
  kind: ExecutionFailureKind;
  message: string;
  /** Combined output captured before the command failed, trimmed. */
  output: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

export interface CommandExecuter {
  run(signal: AbortSignal, command: string): Promise<ExecutionResult>;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface ShellRunOptions {
  signal?: AbortSignal;
  /** Upper bound for a single command, in seconds. `0` disables it. */
  timeoutSec?: number;
  shell?: string;
  cwd?: string;
  spawnFn?: SpawnFn;
}

export type ShellTermination = 'exit' | 'timeout' | 'aborted' | 'spawn-error';

export interface ShellRunResult {
  termination: ShellTermination;
  output: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Abort reason when `termination` is `aborted`, spawn error when `spawn-error`. */
  cause?: unknown;
}
