import { consumeChar, createQuoteState } from './scanner.js';
import { missingSubCommand, reject } from './rejections.js';
import { RejectionKind, type CommandPolicy, type CommandRejected } from './types.js';

const CHAINING_CHARS = new Set([';', '&', '\n', '\r']);
const REDIRECTION_CHARS = new Set(['>', '<']);

/**
 * Scans one token for shell syntax that could run or write something beyond
 * the allow-listed command. Returns the first violation, or null.
 *
 * Substitution is only looked for outside quotes unless
 * `rejectQuotedSubstitution` is set, which extends it to double quotes.
 */
export function scanToken(token: string, rejectQuotedSubstitution = false): CommandRejected | null {
  const state = createQuoteState();

  for (let index = 0; index < token.length; index += 1) {
    const char = token[index];
    const context = consumeChar(state, char);

    if (context === 'live') {
      if (CHAINING_CHARS.has(char)) {
        return reject(RejectionKind.CommandChaining);
      }
      if (REDIRECTION_CHARS.has(char)) {
        return reject(RejectionKind.Redirection);
      }
    }

    if (context === 'live' || (rejectQuotedSubstitution && context === 'double-quoted')) {
      if (char === '`' || (char === '$' && token[index + 1] === '(')) {
        return reject(RejectionKind.CommandSubstitution);
      }
    }
  }

  if (state.quote !== null) {
    return reject(RejectionKind.UnmatchedQuote);
  }

  return null;
}

export function checkPrimaryStage(
  tokens: readonly string[],
  policy: CommandPolicy,
): CommandRejected | null {
  const [base, subCommand] = tokens;
  if (base === undefined) {
    return reject(RejectionKind.EmptyCommand);
  }

  if (!policy.allowedCommands.includes(base)) {
    return reject(RejectionKind.CommandNotAllowed, base);
  }

  const subCommands = policy.allowedSubCommands ?? [];
  if (subCommands.length === 0) {
    return null;
  }

  if (subCommand === undefined) {
    return missingSubCommand();
  }

  if (!subCommands.includes(subCommand)) {
    return reject(RejectionKind.SubCommandNotAllowed, subCommand);
  }

  return null;
}

export function checkPipedStage(
  tokens: readonly string[],
  policy: CommandPolicy,
): CommandRejected | null {
  const [base] = tokens;
  if (base === undefined) {
    return reject(RejectionKind.EmptyCommand);
  }

  if (!policy.allowedPipedCommands.includes(base)) {
    return reject(RejectionKind.CommandNotAllowed, base);
  }

  return null;
}
