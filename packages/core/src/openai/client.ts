/**
 * Model client factory.
 *
 * Responsibilities:
 * - Build an AI SDK language model for any OpenAI-compatible `/chat/completions` endpoint.
 * - Wrap it in an {@link AiSdkTransport} seeded with a system prompt.
 */
import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import type { ModelConfig } from '../config/configLoader.js';
import { AiSdkTransport, type GenerateTextFn } from './transport.js';

const MISSING_API_KEY_GUIDANCE = [
  'How to fix it:',
  '1. Set AGENT_API_KEY (or OPENAI_API_KEY) in the environment or a .env file, or',
  '2. set "auth_token" for the model in the config file.',
].join('\n');

export class MissingApiKeyError extends Error {
  constructor(modelName: string) {
    super(`No API key configured for model "${modelName}".\n\n${MISSING_API_KEY_GUIDANCE}`);
    this.name = 'MissingApiKeyError';
  }
}

export function createLanguageModel(config: ModelConfig): LanguageModel {
  if (!config.auth_token) {
    throw new MissingApiKeyError(config.name);
  }

  const clientOptions = {
    apiKey: config.auth_token,
    baseURL: config.base_url,
  } satisfies Parameters<typeof createOpenAI>[0];

  return createOpenAI(clientOptions).chat(config.name);
}

export interface CreateTransportOptions {
  generateTextFn?: GenerateTextFn;
}

export function createModelTransport(
  config: ModelConfig,
  systemPrompt: string,
  { generateTextFn }: CreateTransportOptions = {},
): AiSdkTransport {
  return new AiSdkTransport({
    model: createLanguageModel(config),
    modelName: config.name,
    systemPrompt,
    pricing: config.pricing,
    requestTimeoutMs: config.request_timeout_ms,
    maxRetries: config.max_retries,
    generateTextFn,
  });
}

export default {
  createLanguageModel,
  createModelTransport,
};
