/**
 * Aggregated library entry for the opsprobe core.
 *
 * Responsibilities:
 * - Provide a CLI-agnostic export surface for package consumers.
 * - Surface the session controller, its collaborators, configuration helpers
 *   and shared utilities used by higher level interfaces like the CLI.
 */

import 'dotenv/config';

export * from '../constants.js';
export {
  RejectionKind,
  POLICY_PRESETS,
  POLICY_PRESET_NAMES,
  createCommandPolicy,
  isPolicyPresetName,
  splitStages,
  splitTokens,
  validateCommand,
  type CommandAccepted,
  type CommandPolicy,
  type CommandPolicyInput,
  type CommandRejected,
  type CommandStage,
  type CommandValidationResult,
  type PolicyPresetName,
} from '../services/commandValidator.js';
export { runShellCommand } from '../commands/run.js';
export {
  CachingExecuter,
  classifyShellResult,
  createCachingExecuter,
  type CachingExecuterOptions,
  type ShellRunner,
} from '../commands/executer.js';
export type {
  CommandExecuter,
  ExecutionFailure,
  ExecutionFailureKind,
  ExecutionResult,
  ExecutionSuccess,
  ShellRunOptions,
  ShellRunResult,
  ShellTermination,
  SpawnFn,
} from '../commands/commandTypes.js';
export {
  AGENT_RESPONSE_WIRE_FORMAT,
  AgentResponseSchema,
  COMMAND_REVIEW_WIRE_FORMAT,
  CommandReviewSchema,
  isFinalAnswer,
  proposedCommand,
  serializeAgentResponse,
  type AgentResponse,
  type CommandReview,
} from '../contracts/index.js';
export { parseModelReply, type ReplyParseResult } from '../agent/responseParser.js';
export {
  defineResponseSchema,
  type ResponseSchema,
  type SchemaCheckResult,
  type SchemaIssue,
} from '../agent/responseValidation/index.js';
export { buildCorrectivePrompt, guidedAsk, type GuidedAskResult } from '../agent/guidedAsk.js';
export type { ModelTransport } from '../agent/modelTransport.js';
export {
  HUMAN_DECLINE_REASON,
  HumanApprover,
  ModelApprover,
  type ApprovalVerdict,
  type CommandApprover,
  type HumanApproverOptions,
  type ModelApproverOptions,
} from '../agent/approvalManager.js';
export { startSession } from '../agent/session.js';
export type {
  SessionError,
  SessionErrorKind,
  SessionOutcome,
  StartSessionOptions,
} from '../agent/sessionTypes.js';
export { REVIEW_SYSTEM_PROMPT, buildAgentSystemPrompt } from '../config/systemPrompt.js';
export {
  ConfigError,
  loadConfig,
  resolveConfigPath,
  resolvePolicy,
  type AppConfig,
  type LoadConfigOptions,
  type LoadedConfig,
  type ModelConfig,
} from '../config/configLoader.js';
export { MissingApiKeyError, createLanguageModel, createModelTransport } from '../openai/client.js';
export { AiSdkTransport, type GenerateTextFn, type TokenPricing } from '../openai/transport.js';
export { createConsoleLogger, silentLogger, type SessionLogger } from '../utils/logger.js';
export { StartupFlagError, parseStartupFlags, type StartupFlags } from './startupFlags.js';
