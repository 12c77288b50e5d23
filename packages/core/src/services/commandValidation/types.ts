/**
 * Allow-list policy and validation result types for proposed shell commands.
 */

export interface CommandPolicy {
  readonly allowedCommands: readonly string[];
  readonly allowedSubCommands?: readonly string[];
  readonly allowedPipedCommands: readonly string[];
  /** Also reject `$(` and backticks inside double quotes, where `sh` still expands them. */
  readonly rejectQuotedSubstitution?: boolean;
}

export enum RejectionKind {
  EmptyCommand = 'EmptyCommand',
  CommandChaining = 'CommandChaining',
  CommandSubstitution = 'CommandSubstitution',
  Redirection = 'Redirection',
  UnmatchedQuote = 'UnmatchedQuote',
  CommandNotAllowed = 'CommandNotAllowed',
  SubCommandNotAllowed = 'SubCommandNotAllowed',
}

export type CommandStage = readonly string[];

export interface CommandAccepted {
  readonly ok: true;
  readonly stages: CommandStage[];
}

export interface CommandRejected {
  readonly ok: false;
  readonly kind: RejectionKind;
  readonly message: string;
  /** Offending command or subcommand name, when the rejection names one. */
  readonly subject?: string;
}

export type CommandValidationResult = CommandAccepted | CommandRejected;
