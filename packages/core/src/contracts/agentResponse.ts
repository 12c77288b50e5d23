import type { JSONSchemaType } from 'ajv';

import { defineResponseSchema } from '../agent/responseValidation/index.js';

/** Reply shape as a model may send it; optional fields can arrive as `null`. */
export interface AgentResponseWire {
  answer?: string | null;
  run_command?: string | null;
  reason_for_command: string;
  need_more_data?: boolean | null;
}

/** Normalized agent reply: absent optional fields are omitted, never `null`. */
export interface AgentResponse {
  answer?: string;
  run_command?: string;
  reason_for_command: string;
  need_more_data?: boolean;
}

/** Shown verbatim to the model in the system prompt. */
export const AGENT_RESPONSE_WIRE_FORMAT =
  '{"answer": string, "run_command": string, "reason_for_command": string, "need_more_data": bool}';

export const AgentResponseJsonSchema: JSONSchemaType<AgentResponseWire> = {
  type: 'object',
  properties: {
    answer: { type: 'string', nullable: true },
    run_command: { type: 'string', nullable: true },
    reason_for_command: { type: 'string' },
    need_more_data: { type: 'boolean', nullable: true },
  },
  required: ['reason_for_command'],
  additionalProperties: false,
};

export function normalizeAgentResponse(wire: AgentResponseWire): AgentResponse {
  const response: AgentResponse = { reason_for_command: wire.reason_for_command };
  if (typeof wire.answer === 'string') {
    response.answer = wire.answer;
  }
  if (typeof wire.run_command === 'string') {
    response.run_command = wire.run_command;
  }
  if (typeof wire.need_more_data === 'boolean') {
    response.need_more_data = wire.need_more_data;
  }
  return response;
}

export function serializeAgentResponse(response: AgentResponse): string {
  return JSON.stringify(normalizeAgentResponse(response));
}

/** Anything other than an explicit `need_more_data: true` ends the session. */
export const isFinalAnswer = (response: AgentResponse): boolean => response.need_more_data !== true;

/** The proposed command, or null when the model proposed none (blank counts as none). */
export function proposedCommand(response: AgentResponse): string | null {
  const command = response.run_command;
  return command !== undefined && command.trim() !== '' ? command : null;
}

export const AgentResponseSchema = defineResponseSchema(
  'agent response',
  AgentResponseJsonSchema,
  normalizeAgentResponse,
);
