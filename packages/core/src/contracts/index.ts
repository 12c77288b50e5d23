/**
 * Structured reply contracts exchanged with the models.
 *
 * - AgentResponse: the diagnostic agent's per-turn reply.
 * - CommandReview: the review model's verdict on a proposed command.
 */
export {
  AGENT_RESPONSE_WIRE_FORMAT,
  AgentResponseJsonSchema,
  AgentResponseSchema,
  isFinalAnswer,
  normalizeAgentResponse,
  proposedCommand,
  serializeAgentResponse,
  type AgentResponse,
  type AgentResponseWire,
} from './agentResponse.js';
export {
  COMMAND_REVIEW_WIRE_FORMAT,
  CommandReviewJsonSchema,
  CommandReviewSchema,
  type CommandReview,
} from './commandReview.js';
