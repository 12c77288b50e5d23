import {
  escapeBareLineBreaks,
  extractBalancedJson,
  extractFromCodeFence,
} from './responseParser/jsonExtractor.js';

export type RecoveryStrategy = 'direct' | 'code_fence' | 'balanced_slice' | 'escaped_newlines';

export interface ParseAttempt {
  readonly strategy: RecoveryStrategy;
  readonly error: string;
}

export type ReplyParseResult =
  | { readonly ok: true; readonly value: unknown; readonly strategy: RecoveryStrategy }
  | { readonly ok: false; readonly error: string; readonly attempts: readonly ParseAttempt[] };

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function attemptParse(
  text: string,
  strategy: RecoveryStrategy,
  attempts: ParseAttempt[],
): ReplyParseResult | null {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value, strategy };
  } catch (error) {
    attempts.push({ strategy, error: describeError(error) });
    return null;
  }
}

/**
 * Parses a raw model reply into a JSON value. Tries the reply as-is first,
 * then a fenced code block, then the first balanced object in the text, and
 * finally the reply with bare line breaks escaped. The error of the direct
 * attempt is the one reported when every strategy fails.
 */
export function parseModelReply(raw: string): ReplyParseResult {
  const attempts: ParseAttempt[] = [];
  const trimmed = raw.trim();

  if (!trimmed) {
    return { ok: false, error: 'Response was empty.', attempts };
  }

  const candidates: Array<[RecoveryStrategy, string | null]> = [
    ['direct', trimmed],
    ['code_fence', extractFromCodeFence(trimmed)],
    ['balanced_slice', extractBalancedJson(trimmed)],
    ['escaped_newlines', escapeBareLineBreaks(trimmed)],
  ];

  for (const [strategy, text] of candidates) {
    if (text === null) {
      continue;
    }
    const parsed = attemptParse(text, strategy, attempts);
    if (parsed) {
      return parsed;
    }
  }

  const primary = attempts[0]?.error;
  return {
    ok: false,
    error: primary ? `Invalid JSON: ${primary}` : 'Invalid JSON.',
    attempts,
  };
}

export default {
  parseModelReply,
};
