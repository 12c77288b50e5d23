/**
 * Diagnostic session state machine.
 *
 * querying -> deciding -> executing -> querying, until the model gives an
 * answer, the iteration budget runs out, or the session fails. Rejected,
 * declined and failed commands are reported back to the model as the next
 * prompt; only transport, schema and deadline errors end the session early.
 */
import {
  APPROVAL_FAILED_PREFIX,
  COMMAND_FAILED_PREFIX,
  DEFAULT_CORRECTION_ATTEMPTS,
  DEFAULT_MAX_ITERATIONS,
  INCOMPLETE_ANALYSIS_MESSAGE,
  NEXT_STEP_PROMPT,
  NO_OUTPUT_SENTINEL,
} from '../constants.js';
import type { ExecutionFailure } from '../commands/commandTypes.js';
import { AgentResponseSchema, isFinalAnswer, proposedCommand } from '../contracts/index.js';
import { validateCommand } from '../services/commandValidator.js';
import { describeCause, isDeadlineReason } from '../utils/abort.js';
import { silentLogger, type SessionLogger } from '../utils/logger.js';
import { guidedAsk } from './guidedAsk.js';
import type {
  ActivePhase,
  SessionError,
  SessionOutcome,
  SessionPhase,
  SessionState,
  StartSessionOptions,
} from './sessionTypes.js';

interface SessionContext extends Required<Omit<StartSessionOptions, 'approver' | 'query'>> {
  approver: StartSessionOptions['approver'];
  logger: SessionLogger;
}

const QUERYING: SessionPhase = { name: 'querying' };

export function createSessionState(query: string): SessionState {
  return { phase: QUERYING, iteration: 0, prompt: query, results: new Map() };
}

function abortError(signal: AbortSignal): SessionError {
  if (isDeadlineReason(signal.reason)) {
    return { kind: 'deadline-exceeded', message: 'session deadline exceeded', cause: signal.reason };
  }
  return {
    kind: 'canceled',
    message: `session canceled: ${describeCause(signal.reason)}`,
    cause: signal.reason,
  };
}

export function formatExecutionFailure(result: ExecutionFailure): string {
  const message = `${COMMAND_FAILED_PREFIX}${result.message}`;
  return result.output ? `${message}\n${result.output}` : message;
}

function fail(state: SessionState, error: SessionError): SessionPhase {
  return { name: 'terminal', outcome: { status: 'error', error, iterations: state.iteration } };
}

async function query(context: SessionContext, state: SessionState): Promise<SessionPhase> {
  const { signal, logger } = context;
  if (signal.aborted) {
    return fail(state, abortError(signal));
  }

  state.iteration += 1;
  logger.debug(`Iteration ${state.iteration}/${context.maxIterations}`);

  const result = await guidedAsk(
    context.transport,
    state.prompt,
    context.correctionAttempts,
    AgentResponseSchema,
    { signal, logger },
  );

  if (result.status === 'transport-error') {
    if (signal.aborted) {
      return fail(state, abortError(signal));
    }
    return fail(state, { kind: 'transport', message: result.message, cause: result.cause });
  }
  if (result.status === 'schema-error') {
    return fail(state, { kind: 'schema', message: result.message });
  }

  const response = result.value;
  if (isFinalAnswer(response)) {
    return {
      name: 'terminal',
      outcome: { status: 'answer', answer: response.answer ?? '', iterations: state.iteration },
    };
  }

  if (state.iteration >= context.maxIterations) {
    return {
      name: 'terminal',
      outcome: {
        status: 'max-iterations',
        answer: INCOMPLETE_ANALYSIS_MESSAGE,
        iterations: state.iteration,
      },
    };
  }

  const command = proposedCommand(response);
  if (command === null) {
    logger.debug('Model needs more data but proposed no command.');
    state.prompt = NEXT_STEP_PROMPT;
    return QUERYING;
  }

  logger.info(`Proposed: ${command}`);
  if (response.reason_for_command) {
    logger.debug(`Reason: ${response.reason_for_command}`);
  }
  return { name: 'deciding', command };
}

async function decide(
  context: SessionContext,
  state: SessionState,
  command: string,
): Promise<SessionPhase> {
  const { logger } = context;

  const stored = state.results.get(command);
  if (stored !== undefined) {
    logger.debug('Already executed; reusing its result.');
    state.prompt = stored;
    return QUERYING;
  }

  const validation = validateCommand(command, context.policy);
  if (!validation.ok) {
    logger.warn(`Rejected: ${validation.message}`);
    state.prompt = validation.message;
    return QUERYING;
  }

  if (context.approver) {
    try {
      const verdict = await context.approver.review(command, context.signal);
      if (!verdict.approved) {
        logger.warn(`Not approved: ${verdict.reason}`);
        state.prompt = verdict.reason;
        return QUERYING;
      }
    } catch (error) {
      const message = `${APPROVAL_FAILED_PREFIX}${describeCause(error)}`;
      logger.error(message);
      state.prompt = message;
      return QUERYING;
    }
  }

  return { name: 'executing', command };
}

async function execute(
  context: SessionContext,
  state: SessionState,
  command: string,
): Promise<SessionPhase> {
  const result = await context.executer.run(context.signal, command);

  if (result.ok) {
    const text = result.output || NO_OUTPUT_SENTINEL;
    state.results.set(command, text);
    state.prompt = text;
    return QUERYING;
  }

  context.logger.warn(`Command ${result.kind === 'timeout' ? 'timed out' : 'failed'}: ${result.message}`);
  state.prompt = formatExecutionFailure(result);
  return QUERYING;
}

function advance(context: SessionContext, state: SessionState, phase: ActivePhase): Promise<SessionPhase> {
  switch (phase.name) {
    case 'querying':
      return query(context, state);
    case 'deciding':
      return decide(context, state, phase.command);
    case 'executing':
      return execute(context, state, phase.command);
  }
}

function logOutcome(logger: SessionLogger, outcome: SessionOutcome): void {
  switch (outcome.status) {
    case 'answer':
      logger.success(`Answered after ${outcome.iterations} model call(s).`);
      return;
    case 'max-iterations':
      logger.warn(outcome.answer);
      return;
    case 'error':
      logger.error(`Session failed (${outcome.error.kind}): ${outcome.error.message}`);
  }
}

/**
 * Runs one diagnostic session for `query` and resolves with its outcome. The
 * promise never rejects for model, validation or execution problems.
 */
export async function startSession(options: StartSessionOptions): Promise<SessionOutcome> {
  const context: SessionContext = {
    signal: options.signal,
    transport: options.transport,
    executer: options.executer,
    policy: options.policy,
    approver: options.approver,
    maxIterations: Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS),
    correctionAttempts: options.correctionAttempts ?? DEFAULT_CORRECTION_ATTEMPTS,
    logger: options.logger ?? silentLogger,
  };

  context.logger.info(`Query: ${options.query}`);
  const state = createSessionState(options.query);

  while (true) {
    const { phase } = state;
    if (phase.name === 'terminal') {
      logOutcome(context.logger, phase.outcome);
      return phase.outcome;
    }
    state.phase = await advance(context, state, phase);
  }
}

export default {
  startSession,
  createSessionState,
};
