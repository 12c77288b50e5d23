/**
 * The single primitive the agent needs from a language model: send one prompt,
 * get the reply text. Implementations own the conversation history and append
 * each successful exchange to it.
 */
export interface ModelTransport {
  ask(prompt: string, signal?: AbortSignal): Promise<string>;
  /** Drops the conversation history, keeping only the system prompt. */
  reset(): void;
}
