/* eslint-env jest */
import type { CommandExecuter, ExecutionResult } from '../../commands/commandTypes.js';
import type { AgentResponse } from '../../contracts/index.js';
import type { ModelTransport } from '../modelTransport.js';

export type ScriptedReply = string | Error | ((prompt: string) => string);

/** In-memory transport that answers from a fixed script and records every prompt. */
export class ScriptedTransport implements ModelTransport {
  readonly prompts: string[] = [];

  resets = 0;

  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  async ask(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('scripted transport ran out of replies');
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next(prompt) : next;
  }

  reset(): void {
    this.resets += 1;
  }
}

export const reply = (response: AgentResponse): string => JSON.stringify(response);

export const needCommand = (command: string): string =>
  reply({ run_command: command, reason_for_command: `check ${command}`, need_more_data: true });

export const finalAnswer = (answer: string): string =>
  reply({ answer, reason_for_command: '', need_more_data: false });

/** Executer double that records calls and answers from a lookup function. */
export class RecordingExecuter implements CommandExecuter {
  readonly calls: string[] = [];

  private readonly respond: (command: string) => ExecutionResult;

  constructor(respond: (command: string) => ExecutionResult = (command) => ({ ok: true, output: `ran ${command}` })) {
    this.respond = respond;
  }

  async run(_signal: AbortSignal, command: string): Promise<ExecutionResult> {
    this.calls.push(command);
    return this.respond(command);
  }
}
