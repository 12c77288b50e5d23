/**
 * CLI bootstrap.
 *
 * Wires configuration, the model transports, the approver and the executer
 * into sessions, in one-shot mode (query on the command line) or as an
 * interactive loop. Every collaborator can be swapped through
 * {@link CliDependencies}.
 */
import type { Interface as ReadlineInterface } from 'node:readline';
import chalk from 'chalk';
import {
  ConfigError,
  HumanApprover,
  MissingApiKeyError,
  ModelApprover,
  REVIEW_SYSTEM_PROMPT,
  StartupFlagError,
  buildAgentSystemPrompt,
  createCachingExecuter,
  createConsoleLogger,
  createModelTransport,
  loadConfig,
  parseStartupFlags,
  resolvePolicy,
  startSession,
  type AppConfig,
  type CommandApprover,
  type CommandExecuter,
  type CommandPolicy,
  type LoadConfigOptions,
  type LoadedConfig,
  type ModelConfig,
  type ModelTransport,
  type SessionLogger,
  type SessionOutcome,
  type StartupFlags,
} from '@opsprobe/core';

import { createInterface, createPrompter } from './io.js';

export const CLI_VERSION = '0.1.0';

export const INTERACTIVE_PROMPT = 'opsprobe> ';

type CliIo = {
  stdout?: (message: string) => void;
  stderr?: (message: string) => void;
};

type ResolvedCliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
};

export type UsageReportingTransport = ModelTransport & { describeUsage(): string };

export interface CliDependencies {
  loadConfig?: (options: LoadConfigOptions) => LoadedConfig;
  createTransport?: (config: ModelConfig, systemPrompt: string) => UsageReportingTransport;
  createExecuter?: (config: AppConfig) => CommandExecuter;
  /** Reads one line; `undefined` means input is closed. */
  prompt?: (question: string) => Promise<string | undefined>;
  /** Builds the readline interface used for prompts when `prompt` is not injected. */
  createReadline?: () => ReadlineInterface;
  /** Installs a Ctrl-C handler for the running session and returns its removal. */
  onInterrupt?: (handler: () => void) => () => void;
}

interface CliContext {
  flags: StartupFlags;
  config: AppConfig;
  policy: CommandPolicy;
  transport: UsageReportingTransport;
  approver: CommandApprover | undefined;
  logger: SessionLogger;
  io: ResolvedCliIo;
  createExecuter: (config: AppConfig) => CommandExecuter;
  onInterrupt: (handler: () => void) => () => void;
}

function resolveIo(io?: CliIo): ResolvedCliIo {
  const target = io ?? {};
  const stdout = typeof target.stdout === 'function' ? target.stdout : console.log;
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr };
}

const defaultCreateExecuter = (config: AppConfig): CommandExecuter =>
  createCachingExecuter({ commandTimeoutSec: config.session.command_timeout_sec });

// A terminal readline reads Ctrl-C as a keypress and emits 'SIGINT' on itself
// instead of the process.
const createInterruptListener =
  (rl: ReadlineInterface | null) =>
  (handler: () => void): (() => void) => {
    process.on('SIGINT', handler);
    rl?.on('SIGINT', handler);
    return () => {
      process.removeListener('SIGINT', handler);
      rl?.removeListener('SIGINT', handler);
    };
  };

const isSetupError = (error: unknown): error is Error =>
  error instanceof ConfigError || error instanceof MissingApiKeyError || error instanceof StartupFlagError;

function createApprover(
  flags: StartupFlags,
  config: AppConfig,
  logger: SessionLogger,
  createTransport: NonNullable<CliDependencies['createTransport']>,
  prompt: (question: string) => Promise<string | undefined>,
): { approver: CommandApprover | undefined; reviewTransport: UsageReportingTransport | null } {
  if (flags.autoApprove) {
    return { approver: undefined, reviewTransport: null };
  }

  if (flags.modelReview) {
    if (!config.validation) {
      throw new ConfigError('--model-review requires a "validation" model in the config file.', 'flags');
    }
    const reviewTransport = createTransport(config.validation, REVIEW_SYSTEM_PROMPT);
    return {
      approver: new ModelApprover({
        transport: reviewTransport,
        correctionAttempts: config.session.correction_attempts,
        logger,
      }),
      reviewTransport,
    };
  }

  return { approver: new HumanApprover({ askHuman: prompt, logger }), reviewTransport: null };
}

function createDeadlineError(timeoutSec: number): Error {
  const error = new Error(`session exceeded ${timeoutSec}s`);
  error.name = 'TimeoutError';
  return error;
}

async function runQuery(context: CliContext, query: string): Promise<SessionOutcome> {
  const { config } = context;
  const controller = new AbortController();
  const timeoutSec = config.session.timeout_sec;

  const timer = setTimeout(() => controller.abort(createDeadlineError(timeoutSec)), timeoutSec * 1000);
  const removeInterrupt = context.onInterrupt(() => controller.abort(new Error('interrupted')));

  try {
    return await startSession({
      signal: controller.signal,
      transport: context.transport,
      executer: context.createExecuter(config),
      policy: context.policy,
      approver: context.approver,
      query,
      maxIterations: config.session.max_iterations,
      correctionAttempts: config.session.correction_attempts,
      logger: context.logger,
    });
  } finally {
    clearTimeout(timer);
    removeInterrupt();
  }
}

function reportOutcome(io: ResolvedCliIo, outcome: SessionOutcome): void {
  switch (outcome.status) {
    case 'answer':
      io.stdout(outcome.answer);
      return;
    case 'max-iterations':
      io.stdout(chalk.yellow(outcome.answer));
      return;
    case 'error':
      io.stderr(chalk.red(`Error: ${outcome.error.message}`));
  }
}

async function runInteractive(
  context: CliContext,
  prompt: (question: string) => Promise<string | undefined>,
): Promise<void> {
  const { io } = context;
  io.stdout(chalk.dim('Ask a question, /reset to start over, /exit to quit.'));

  while (true) {
    const line = await prompt(INTERACTIVE_PROMPT);
    if (line === undefined || line === '/exit') {
      return;
    }

    const query = line.trim();
    if (!query) {
      continue;
    }
    if (query === '/reset') {
      context.transport.reset();
      io.stdout(chalk.dim('Conversation reset.'));
      continue;
    }

    reportOutcome(io, await runQuery(context, query));
  }
}

/** Runs the CLI and resolves with the process exit code. */
export async function runCli(
  argv: string[] = process.argv,
  io?: CliIo,
  dependencies: CliDependencies = {},
): Promise<number> {
  const resolvedIo = resolveIo(io);
  const createTransport = dependencies.createTransport ?? createModelTransport;

  let flags: StartupFlags;
  try {
    flags = parseStartupFlags(argv);
  } catch (error) {
    if (error instanceof StartupFlagError) {
      resolvedIo.stderr(chalk.red(error.message));
      return 2;
    }
    throw error;
  }

  if (flags.showVersion) {
    resolvedIo.stdout(CLI_VERSION);
    return 0;
  }

  const logger = createConsoleLogger({ debug: flags.debug, write: resolvedIo.stderr });
  const rl = dependencies.prompt ? null : (dependencies.createReadline ?? createInterface)();
  const prompt = dependencies.prompt ?? (rl ? createPrompter(rl) : async () => undefined);

  try {
    const { config } = (dependencies.loadConfig ?? loadConfig)({ configPath: flags.configPath, logger });
    const policy = resolvePolicy(config.policy, flags.policyPreset);
    const transport = createTransport(config.agent, buildAgentSystemPrompt(policy));
    const { approver, reviewTransport } = createApprover(flags, config, logger, createTransport, prompt);

    const context: CliContext = {
      flags,
      config,
      policy,
      transport,
      approver,
      logger,
      io: resolvedIo,
      createExecuter: dependencies.createExecuter ?? defaultCreateExecuter,
      onInterrupt: dependencies.onInterrupt ?? createInterruptListener(rl),
    };

    let exitCode = 0;
    if (flags.query) {
      const outcome = await runQuery(context, flags.query);
      reportOutcome(resolvedIo, outcome);
      exitCode = outcome.status === 'error' ? 1 : 0;
    } else {
      await runInteractive(context, prompt);
    }

    if (flags.usage) {
      resolvedIo.stdout(transport.describeUsage());
      if (reviewTransport) {
        resolvedIo.stdout(reviewTransport.describeUsage());
      }
    }
    return exitCode;
  } catch (error) {
    if (isSetupError(error)) {
      resolvedIo.stderr(chalk.red(error.message));
      return 1;
    }
    throw error;
  } finally {
    rl?.close();
  }
}

export default {
  runCli,
};
