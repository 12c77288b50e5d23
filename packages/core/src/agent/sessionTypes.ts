import type { CommandExecuter } from '../commands/commandTypes.js';
import type { CommandPolicy } from '../services/commandValidator.js';
import type { SessionLogger } from '../utils/logger.js';
import type { CommandApprover } from './approvalManager.js';
import type { ModelTransport } from './modelTransport.js';

export type SessionErrorKind = 'transport' | 'schema' | 'deadline-exceeded' | 'canceled';

export interface SessionError {
  kind: SessionErrorKind;
  message: string;
  cause?: unknown;
}

export type SessionOutcome =
  | { status: 'answer'; answer: string; iterations: number }
  | { status: 'max-iterations'; answer: string; iterations: number }
  | { status: 'error'; error: SessionError; iterations: number };

export type SessionPhase =
  | { name: 'querying' }
  | { name: 'deciding'; command: string }
  | { name: 'executing'; command: string }
  | { name: 'terminal'; outcome: SessionOutcome };

export type ActivePhase = Exclude<SessionPhase, { name: 'terminal' }>;

export interface SessionState {
  phase: SessionPhase;
  /** Number of model calls made so far; 1-based once querying starts. */
  iteration: number;
  /** Prompt for the next model call. */
  prompt: string;
  /** Prompt text produced by each successfully executed command, keyed by the literal command. */
  readonly results: Map<string, string>;
}

export interface StartSessionOptions {
  signal: AbortSignal;
  transport: ModelTransport;
  executer: CommandExecuter;
  policy: CommandPolicy;
  /** Consulted after policy validation. Omit to let the policy alone gate execution. */
  approver?: CommandApprover;
  query: string;
  maxIterations?: number;
  correctionAttempts?: number;
  logger?: SessionLogger;
}
