/**
 * Public entry point for the opsprobe CLI package.
 *
 * Responsibilities:
 * - Re-export the core library so consumers need a single import.
 * - Surface the CLI helpers (readline prompter, runner).
 */

import { createInterface, createPrompter } from './src/io.js';
import { CLI_VERSION, runCli, type CliDependencies, type UsageReportingTransport } from './src/runner.js';

export * from '@opsprobe/core';

export { CLI_VERSION, createInterface, createPrompter, runCli };
export type { CliDependencies, UsageReportingTransport };
