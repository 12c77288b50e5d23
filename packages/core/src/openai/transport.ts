import { generateText, type LanguageModel, type ModelMessage } from 'ai';

import { DEFAULT_REQUEST_TIMEOUT_MS } from '../constants.js';
import type { ModelTransport } from '../agent/modelTransport.js';

export interface TextGenerationRequest {
  model: LanguageModel;
  system: string;
  messages: ModelMessage[];
  abortSignal?: AbortSignal;
  maxRetries?: number;
}

export interface TextGenerationResult {
  text: string;
  usage: { inputTokens?: number; outputTokens?: number };
}

export type GenerateTextFn = (request: TextGenerationRequest) => Promise<TextGenerationResult>;

const generateWithAiSdk: GenerateTextFn = async (request) => {
  const result = await generateText({
    model: request.model,
    system: request.system,
    messages: request.messages,
    abortSignal: request.abortSignal,
    maxRetries: request.maxRetries,
  });
  return { text: result.text, usage: result.usage };
};

export interface TokenPricing {
  /** Price per 1K input tokens. */
  input: number;
  /** Price per 1K output tokens. */
  output: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface AiSdkTransportOptions {
  model: LanguageModel;
  modelName: string;
  systemPrompt: string;
  pricing?: TokenPricing;
  requestTimeoutMs?: number;
  maxRetries?: number;
  generateTextFn?: GenerateTextFn;
}

interface RequestSignal {
  signal: AbortSignal;
  dispose: () => void;
}

// Links the caller's signal with a per-request timeout.
function createRequestSignal(parent: AbortSignal | undefined, timeoutMs: number): RequestSignal {
  const controller = new AbortController();

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new Error(`model request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * {@link ModelTransport} on the Vercel AI SDK. Keeps the conversation as AI SDK
 * messages and only records an exchange once the model has replied.
 */
export class AiSdkTransport implements ModelTransport {
  private history: ModelMessage[] = [];

  private readonly usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  private readonly model: LanguageModel;

  private readonly modelName: string;

  private readonly systemPrompt: string;

  private readonly pricing: TokenPricing | undefined;

  private readonly requestTimeoutMs: number;

  private readonly maxRetries: number | undefined;

  private readonly generateTextFn: GenerateTextFn;

  constructor({
    model,
    modelName,
    systemPrompt,
    pricing,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    maxRetries,
    generateTextFn = generateWithAiSdk,
  }: AiSdkTransportOptions) {
    this.model = model;
    this.modelName = modelName;
    this.systemPrompt = systemPrompt;
    this.pricing = pricing;
    this.requestTimeoutMs = requestTimeoutMs;
    this.maxRetries = maxRetries;
    this.generateTextFn = generateTextFn;
  }

  async ask(prompt: string, signal?: AbortSignal): Promise<string> {
    const userMessage: ModelMessage = { role: 'user', content: prompt };
    const request = createRequestSignal(signal, this.requestTimeoutMs);

    try {
      const result = await this.generateTextFn({
        model: this.model,
        system: this.systemPrompt,
        messages: [...this.history, userMessage],
        abortSignal: request.signal,
        maxRetries: this.maxRetries,
      });

      this.usage.inputTokens += result.usage.inputTokens ?? 0;
      this.usage.outputTokens += result.usage.outputTokens ?? 0;
      this.history.push(userMessage, { role: 'assistant', content: result.text });
      return result.text;
    } finally {
      request.dispose();
    }
  }

  reset(): void {
    this.history = [];
  }

  getHistory(): readonly ModelMessage[] {
    return this.history;
  }

  getUsage(): TokenUsage {
    return { ...this.usage };
  }

  /** One line in the form `model: 0.0012$ for input(800), 0.0006$ for output(100)`. */
  describeUsage(): string {
    const { inputTokens, outputTokens } = this.usage;
    const inputCost = (inputTokens / 1000) * (this.pricing?.input ?? 0);
    const outputCost = (outputTokens / 1000) * (this.pricing?.output ?? 0);
    return `${this.modelName}: ${inputCost.toFixed(4)}$ for input(${inputTokens}), ${outputCost.toFixed(4)}$ for output(${outputTokens})`;
  }
}

export default {
  AiSdkTransport,
};
