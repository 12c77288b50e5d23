/**
 * Quote-aware scanning shared by the stage splitter, the tokenizer and the
 * token rules:
 *
 * - `'` and `"` open a quote; the other quote character inside it is literal.
 * - A backslash escapes the next character in every quote state.
 * - Characters inside double quotes are reported as `double-quoted` so a strict
 *   policy can still look for `$(` and backticks there.
 */

export type QuoteChar = "'" | '"';

export type ScanContext = 'live' | 'single-quoted' | 'double-quoted' | 'inert';

export interface QuoteState {
  quote: QuoteChar | null;
  escaped: boolean;
}

export const createQuoteState = (): QuoteState => ({ quote: null, escaped: false });

export function consumeChar(state: QuoteState, char: string): ScanContext {
  if (state.escaped) {
    state.escaped = false;
    return 'inert';
  }

  if (char === '\\') {
    state.escaped = true;
    return 'inert';
  }

  if (char === "'" || char === '"') {
    if (state.quote === null) {
      state.quote = char;
      return 'inert';
    }
    if (state.quote === char) {
      state.quote = null;
      return 'inert';
    }
  }

  if (state.quote === "'") {
    return 'single-quoted';
  }
  if (state.quote === '"') {
    return 'double-quoted';
  }
  return 'live';
}

// Line breaks separate commands in `sh`; they stay inside tokens so the token
// rules can reject them instead of silently splitting on them.
const isTokenSeparator = (char: string): boolean =>
  char !== '\n' && char !== '\r' && /\s/.test(char);

/**
 * Splits a command line into pipeline stages on unquoted `|`. Every stage is
 * trimmed; empty stages (`a || b`, a trailing `|`) are kept so the validator can
 * reject them.
 */
export function splitStages(command: string): string[] {
  const stages: string[] = [];
  const state = createQuoteState();
  let current = '';

  for (const char of command) {
    if (consumeChar(state, char) === 'live' && char === '|') {
      stages.push(current.trim());
      current = '';
      continue;
    }
    current += char;
  }

  stages.push(current.trim());
  return stages;
}

/** Splits one stage into tokens on unquoted whitespace. Quotes and escapes are kept verbatim. */
export function splitTokens(stage: string): string[] {
  const tokens: string[] = [];
  const state = createQuoteState();
  let current = '';

  for (const char of stage) {
    if (consumeChar(state, char) === 'live' && isTokenSeparator(char)) {
      if (current) {
        tokens.push(current);
        current = '';
      }
      continue;
    }
    current += char;
  }

  if (current) {
    tokens.push(current);
  }
  return tokens;
}
