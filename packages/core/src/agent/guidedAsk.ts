/**
 * Structured-response protocol.
 *
 * Sends a prompt through a {@link ModelTransport}, parses the reply and checks
 * it against a {@link ResponseSchema}. A reply that fails either step is
 * answered with a corrective prompt carrying the parse error and the original
 * prompt, up to `maxAttempts` model calls in total.
 */
import type { ModelTransport } from './modelTransport.js';
import { parseModelReply } from './responseParser.js';
import { formatSchemaIssues, type ResponseSchema } from './responseValidation/index.js';
import { silentLogger, type SessionLogger } from '../utils/logger.js';

export type GuidedAskResult<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'schema-error'; attempts: number; message: string }
  | { status: 'transport-error'; attempts: number; message: string; cause: unknown };

export interface GuidedAskOptions {
  signal?: AbortSignal;
  logger?: SessionLogger;
}

export function buildCorrectivePrompt(error: string, originalPrompt: string): string {
  return (
    'Error: Failed to parse your response. Answer only with the requested JSON format. ' +
    `The error was: ${error}\n\n` +
    `Original prompt: ${originalPrompt}\n` +
    'Do not apologize or mention the formatting error in your response'
  );
}

function interpretReply<T>(raw: string, schema: ResponseSchema<T>): { ok: true; value: T } | { ok: false; error: string } {
  const parsed = parseModelReply(raw);
  if (!parsed.ok) {
    return { ok: false, error: parsed.error };
  }

  const checked = schema.check(parsed.value);
  if (!checked.valid) {
    return { ok: false, error: formatSchemaIssues(checked.issues) };
  }

  return { ok: true, value: checked.value };
}

export async function guidedAsk<T>(
  transport: ModelTransport,
  prompt: string,
  maxAttempts: number,
  schema: ResponseSchema<T>,
  { signal, logger = silentLogger }: GuidedAskOptions = {},
): Promise<GuidedAskResult<T>> {
  const attemptLimit = Math.max(1, Math.floor(maxAttempts));
  let currentPrompt = prompt;

  for (let attempt = 1; attempt <= attemptLimit; attempt += 1) {
    let raw: string;
    try {
      raw = await transport.ask(currentPrompt, signal);
    } catch (error) {
      return {
        status: 'transport-error',
        attempts: attempt,
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      };
    }

    const outcome = interpretReply(raw, schema);
    if (outcome.ok) {
      return { status: 'success', value: outcome.value, attempts: attempt };
    }

    logger.debug(`Malformed ${schema.name} (attempt ${attempt}/${attemptLimit}): ${outcome.error}`);
    currentPrompt = buildCorrectivePrompt(outcome.error, prompt);
  }

  return {
    status: 'schema-error',
    attempts: attemptLimit,
    message: `Failed to get a valid ${schema.name} after ${attemptLimit} attempts`,
  };
}

export default {
  guidedAsk,
  buildCorrectivePrompt,
};
