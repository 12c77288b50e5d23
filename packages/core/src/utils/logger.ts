/**
 * Session logging.
 *
 * The core never writes to the terminal directly; everything goes through a
 * {@link SessionLogger} handed in by the caller.
 */
import chalk from 'chalk';

export interface SessionLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  success(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  debug?: boolean;
  /** Line sink; defaults to `console.error` so stdout stays reserved for answers. */
  write?: (line: string) => void;
}

export function createConsoleLogger({
  debug = false,
  write = (line) => console.error(line),
}: ConsoleLoggerOptions = {}): SessionLogger {
  return {
    debug(message) {
      if (debug) {
        write(chalk.gray(`· ${message}`));
      }
    },
    info(message) {
      write(chalk.cyan(`ℹ ${message}`));
    },
    warn(message) {
      write(chalk.yellow(`⚠ ${message}`));
    },
    success(message) {
      write(chalk.green(`✔ ${message}`));
    },
    error(message) {
      write(chalk.red(`✖ ${message}`));
    },
  };
}

const noop = (): void => {};

export const silentLogger: SessionLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  success: noop,
  error: noop,
};

export default {
  createConsoleLogger,
  silentLogger,
};
