import { RejectionKind, type CommandRejected } from './types.js';

const REJECTION_MESSAGES: Record<RejectionKind, string> = {
  [RejectionKind.EmptyCommand]: 'command is empty',
  [RejectionKind.CommandChaining]: 'command chaining is not allowed',
  [RejectionKind.CommandSubstitution]: 'command substitution is not allowed',
  [RejectionKind.Redirection]: 'redirection is not allowed',
  [RejectionKind.UnmatchedQuote]: 'unmatched quote in argument',
  [RejectionKind.CommandNotAllowed]: 'command is not allowed',
  [RejectionKind.SubCommandNotAllowed]: 'sub command is not allowed',
};

export function reject(kind: RejectionKind, subject?: string): CommandRejected {
  const base = REJECTION_MESSAGES[kind];
  if (subject === undefined) {
    return { ok: false, kind, message: base };
  }
  return { ok: false, kind, message: `${base}: ${subject}`, subject };
}

export function missingSubCommand(): CommandRejected {
  return { ok: false, kind: RejectionKind.SubCommandNotAllowed, message: 'sub command is required' };
}
