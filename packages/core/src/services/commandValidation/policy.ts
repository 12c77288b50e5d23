import type { CommandPolicy } from './types.js';

export interface CommandPolicyInput {
  allowedCommands: readonly string[];
  allowedSubCommands?: readonly string[];
  allowedPipedCommands?: readonly string[];
  rejectQuotedSubstitution?: boolean;
}

/**
 * Builds a frozen policy. The arrays are copied so later edits to the input
 * cannot widen an allow-list that a running session already holds.
 */
export function createCommandPolicy(input: CommandPolicyInput): CommandPolicy {
  const subCommands = input.allowedSubCommands ?? [];
  const policy: CommandPolicy = {
    allowedCommands: Object.freeze([...input.allowedCommands]),
    allowedPipedCommands: Object.freeze([...(input.allowedPipedCommands ?? [])]),
    ...(subCommands.length > 0 ? { allowedSubCommands: Object.freeze([...subCommands]) } : {}),
    ...(input.rejectQuotedSubstitution ? { rejectQuotedSubstitution: true } : {}),
  };
  return Object.freeze(policy);
}
