/**
 * Configuration loading.
 *
 * Responsibilities:
 * - Locate the JSON config file (`$XDG_CONFIG_HOME/opsprobe/config.json` unless a path is given).
 * - Write a default file on first run.
 * - Validate the file with zod and apply environment overrides.
 * - Turn the policy section into a frozen {@link CommandPolicy}.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

import {
  DEFAULT_COMMAND_TIMEOUT_SEC,
  DEFAULT_CORRECTION_ATTEMPTS,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_SESSION_TIMEOUT_SEC,
} from '../constants.js';
import {
  POLICY_PRESETS,
  POLICY_PRESET_NAMES,
  createCommandPolicy,
  isPolicyPresetName,
  type CommandPolicy,
  type PolicyPresetName,
} from '../services/commandValidator.js';
import { silentLogger, type SessionLogger } from '../utils/logger.js';

export const CONFIG_DIR_NAME = 'opsprobe';
export const CONFIG_FILE_NAME = 'config.json';
export const DEFAULT_POLICY_PRESET: PolicyPresetName = 'kubernetes';

const PricingSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
});

const ModelConfigSchema = z.object({
  name: z.string().min(1, 'model name is required'),
  base_url: z.string().url(),
  auth_token: z.string().optional(),
  pricing: PricingSchema.optional(),
  request_timeout_ms: z.number().int().positive().optional(),
  max_retries: z.number().int().nonnegative().optional(),
});

const SessionSettingsSchema = z
  .object({
    max_iterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
    correction_attempts: z.number().int().positive().default(DEFAULT_CORRECTION_ATTEMPTS),
    timeout_sec: z.number().positive().default(DEFAULT_SESSION_TIMEOUT_SEC),
    command_timeout_sec: z.number().positive().default(DEFAULT_COMMAND_TIMEOUT_SEC),
  })
  .default({});

const PolicySettingsSchema = z
  .object({
    preset: z
      .string()
      .refine(isPolicyPresetName, {
        message: `preset must be one of: ${POLICY_PRESET_NAMES.join(', ')}`,
      })
      .optional(),
    allowed_commands: z.array(z.string().min(1)).optional(),
    allowed_sub_commands: z.array(z.string().min(1)).optional(),
    allowed_piped_commands: z.array(z.string().min(1)).optional(),
    reject_quoted_substitution: z.boolean().optional(),
  })
  .default({});

export const ConfigSchema = z.object({
  agent: ModelConfigSchema,
  validation: ModelConfigSchema.optional(),
  session: SessionSettingsSchema,
  policy: PolicySettingsSchema,
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type SessionSettings = z.infer<typeof SessionSettingsSchema>;
export type PolicySettings = z.infer<typeof PolicySettingsSchema>;
export type AppConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_FILE = {
  agent: {
    name: 'gpt-4o-mini',
    base_url: 'https://api.openai.com/v1',
    pricing: { input: 0.00015, output: 0.0006 },
  },
  policy: { preset: DEFAULT_POLICY_PRESET },
} satisfies z.input<typeof ConfigSchema>;

export class ConfigError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = 'ConfigError';
    this.source = source;
  }
}

type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist. */
  configPath?: string;
  env?: Env;
  homeDir?: string;
  logger?: SessionLogger;
}

export interface LoadedConfig {
  config: AppConfig;
  path: string;
}

export function resolveConfigPath(env: Env = process.env, homeDir: string = os.homedir()): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
  return path.join(configHome, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseConfig(raw: unknown, source: string): AppConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatIssues(result.error)}`, source);
  }
  return result.data;
}

function parseIntegerEnv(env: Env, key: string, minimum: number): number | undefined {
  const rawValue = env[key];
  if (rawValue === undefined || rawValue === '') {
    return undefined;
  }

  const parsed = Number.parseInt(rawValue, 10);
  if (!Number.isFinite(parsed) || parsed < minimum) {
    throw new ConfigError(`${key} must be an integer of at least ${minimum}.`, 'environment');
  }
  return parsed;
}

/** Applies AGENT_* / VALIDATION_* environment variables on top of a validated config. */
export function applyEnvOverrides(config: AppConfig, env: Env): AppConfig {
  const agent: ModelConfig = { ...config.agent };

  const agentToken = env.AGENT_API_KEY || env.OPENAI_API_KEY;
  if (agentToken) {
    agent.auth_token = agentToken;
  }
  if (env.AGENT_MODEL) {
    agent.name = env.AGENT_MODEL;
  }
  if (env.AGENT_BASE_URL) {
    agent.base_url = env.AGENT_BASE_URL;
  }

  const timeoutMs = parseIntegerEnv(env, 'AGENT_TIMEOUT_MS', 1);
  if (timeoutMs !== undefined) {
    agent.request_timeout_ms = timeoutMs;
  }
  const maxRetries = parseIntegerEnv(env, 'AGENT_MAX_RETRIES', 0);
  if (maxRetries !== undefined) {
    agent.max_retries = maxRetries;
  }

  let validation = config.validation;
  if (validation && env.VALIDATION_API_KEY) {
    validation = { ...validation, auth_token: env.VALIDATION_API_KEY };
  }

  const merged: AppConfig = { ...config, agent };
  if (validation) {
    merged.validation = validation;
  }
  return parseConfig(merged, 'environment overrides');
}

export function writeDefaultConfig(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(DEFAULT_CONFIG_FILE, null, 2)}\n`, 'utf8');
}

function readJsonFile(filePath: string): unknown {
  const contents = fs.readFileSync(filePath, 'utf8');
  try {
    return JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${message}`, filePath);
  }
}

export function loadConfig({
  configPath,
  env = process.env,
  homeDir = os.homedir(),
  logger = silentLogger,
}: LoadConfigOptions = {}): LoadedConfig {
  let filePath: string;

  if (configPath) {
    filePath = path.resolve(configPath);
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`, filePath);
    }
  } else {
    filePath = resolveConfigPath(env, homeDir);
    if (!fs.existsSync(filePath)) {
      writeDefaultConfig(filePath);
      logger.info(`Created default config file at ${filePath}`);
    }
  }

  const fileConfig = parseConfig(readJsonFile(filePath), filePath);
  return { config: applyEnvOverrides(fileConfig, env), path: filePath };
}

/**
 * Builds the command policy: the named preset (or the configured one, or the
 * default) with any explicit allow-list replacing the preset's list. An
 * explicit primary list drops the preset's subcommand list along with it.
 */
export function resolvePolicy(settings: PolicySettings, presetOverride?: PolicyPresetName): CommandPolicy {
  const presetName = presetOverride ?? settings.preset ?? DEFAULT_POLICY_PRESET;
  const preset: CommandPolicy = POLICY_PRESETS[presetName];
  const presetSubCommands = settings.allowed_commands ? undefined : preset.allowedSubCommands;

  return createCommandPolicy({
    allowedCommands: settings.allowed_commands ?? preset.allowedCommands,
    allowedSubCommands: settings.allowed_sub_commands ?? presetSubCommands,
    allowedPipedCommands: settings.allowed_piped_commands ?? preset.allowedPipedCommands,
    rejectQuotedSubstitution: settings.reject_quoted_substitution,
  });
}

export default {
  loadConfig,
  resolveConfigPath,
  resolvePolicy,
};
