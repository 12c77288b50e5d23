import type { JSONSchemaType } from 'ajv';

import { defineResponseSchema } from '../agent/responseValidation/index.js';

/** Verdict of the review model on a single proposed command. */
export interface CommandReview {
  is_read_only: boolean;
  reason: string;
}

export const COMMAND_REVIEW_WIRE_FORMAT = '{"is_read_only": bool, "reason": string}';

export const CommandReviewJsonSchema: JSONSchemaType<CommandReview> = {
  type: 'object',
  properties: {
    is_read_only: { type: 'boolean' },
    reason: { type: 'string' },
  },
  required: ['is_read_only', 'reason'],
  additionalProperties: false,
};

export const CommandReviewSchema = defineResponseSchema(
  'command review',
  CommandReviewJsonSchema,
  (wire: CommandReview): CommandReview => ({ is_read_only: wire.is_read_only, reason: wire.reason }),
);
