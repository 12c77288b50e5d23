/**
 * Static allow-list validation for commands proposed by the model.
 *
 * Nothing here executes or expands the command. The text is split into pipeline
 * stages and tokens, the first stage is checked against the primary (and
 * optional subcommand) allow-list, later stages against the piped allow-list,
 * and every token is scanned for chaining, substitution and redirection. The
 * first violation in stage order, then token order, is reported.
 */
import { splitStages, splitTokens } from './commandValidation/scanner.js';
import { reject } from './commandValidation/rejections.js';
import { checkPipedStage, checkPrimaryStage, scanToken } from './commandValidation/tokenRules.js';
import {
  RejectionKind,
  type CommandPolicy,
  type CommandStage,
  type CommandValidationResult,
} from './commandValidation/types.js';

export { createCommandPolicy, type CommandPolicyInput } from './commandValidation/policy.js';
export {
  POLICY_PRESETS,
  POLICY_PRESET_NAMES,
  isPolicyPresetName,
  type PolicyPresetName,
} from './commandValidation/presets.js';
export { splitStages, splitTokens } from './commandValidation/scanner.js';
export {
  RejectionKind,
  type CommandAccepted,
  type CommandPolicy,
  type CommandRejected,
  type CommandStage,
  type CommandValidationResult,
} from './commandValidation/types.js';

export function validateCommand(command: string, policy: CommandPolicy): CommandValidationResult {
  if (command.length === 0) {
    return reject(RejectionKind.EmptyCommand);
  }

  const stages: CommandStage[] = splitStages(command).map((stage) => splitTokens(stage));

  for (let index = 0; index < stages.length; index += 1) {
    const tokens = stages[index];
    const stageRejection =
      index === 0 ? checkPrimaryStage(tokens, policy) : checkPipedStage(tokens, policy);
    if (stageRejection) {
      return stageRejection;
    }

    for (const token of tokens) {
      const tokenRejection = scanToken(token, policy.rejectQuotedSubstitution);
      if (tokenRejection) {
        return tokenRejection;
      }
    }
  }

  return { ok: true, stages };
}

export default {
  validateCommand,
};
