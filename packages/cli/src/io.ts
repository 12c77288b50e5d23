/**
 * Readline helpers that manage interactive user prompts.
 *
 * Responsibilities:
 * - Expose a factory for the readline interface used by the interactive mode.
 * - Provide a prompt wrapper that highlights questions in the terminal and
 *   resolves `undefined` once input is closed.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

export function createInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: Boolean(process.stdin.isTTY),
  });
}

export function createPrompter(rl: readline.Interface): (prompt: string) => Promise<string | undefined> {
  let closed = false;
  const pending = new Set<(value: string | undefined) => void>();

  rl.once('close', () => {
    closed = true;
    for (const resolve of pending) {
      resolve(undefined);
    }
    pending.clear();
  });

  return (prompt: string) => {
    if (closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<string | undefined>((resolve) => {
      pending.add(resolve);
      rl.question(chalk.bold.blue(prompt), (response: string) => {
        pending.delete(resolve);
        resolve(response.trim());
      });
    });
  };
}

export default {
  createInterface,
  createPrompter,
};
