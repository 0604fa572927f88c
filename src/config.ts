import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import type { BackendConfig, BackendMode, CommitType, MessageRules } from './types.js';

const log = createLogger('config');

export const CONFIG_FILE = '.commitsmithrc';
export const DEFAULT_RELAY_URL = 'https://relay.commitsmith.dev';

const commitTypeSchema = z.enum(['feat', 'fix', 'docs', 'style', 'refactor', 'perf', 'test', 'build', 'ci', 'chore']);

export const configFileSchema = z
  .object({
    mode: z.enum(['relay', 'direct']),
    apiKey: z.string().min(1),
    model: z.string().min(1),
    baseUrl: z.string().url(),
    relayUrl: z.string().url(),
    maxDiffSize: z.number().int().positive(),
    maxSubjectLength: z.number().int().min(20),
    timeoutMs: z.number().int().positive(),
    suggestionCount: z.number().int().min(1).max(10),
    defaultType: commitTypeSchema,
    renameThreshold: z.number().int().min(1).max(100)
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface Config {
  mode: BackendMode;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  relayUrl: string;
  maxDiffSize: number;
  maxSubjectLength: number;
  timeoutMs: number;
  suggestionCount: number;
  defaultType: CommitType;
  renameThreshold: number;
}

export const DEFAULT_CONFIG: Config = {
  mode: 'relay',
  model: 'gpt-4o-mini',
  relayUrl: DEFAULT_RELAY_URL,
  maxDiffSize: 1000,
  maxSubjectLength: 72,
  timeoutMs: 30_000,
  suggestionCount: 3,
  defaultType: 'chore',
  renameThreshold: 50
};

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, typically command-line flags. */
  overrides?: ConfigFile;
  loadDotenv?: boolean;
}

function homeConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, CONFIG_FILE);
}

function loadEnvFiles(cwd: string, homeDir: string): void {
  // dotenv never overrides variables that are already set, so the local file wins
  for (const file of [path.join(cwd, '.env'), path.join(homeDir, '.env')]) {
    if (fs.existsSync(file)) {
      dotenv.config({ path: file });
    }
  }
}

export function readConfigFile(file: string): ConfigFile {
  if (!fs.existsSync(file)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file ${file} is not valid JSON`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${file}: ${issues}`);
  }

  log.debug(`Loaded ${file}`);
  return parsed.data;
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv): ConfigFile {
  const parsed = configFileSchema.safeParse({
    mode: env.COMMITSMITH_MODE || undefined,
    apiKey: env.COMMITSMITH_API_KEY || env.OPENAI_API_KEY || undefined,
    model: env.COMMITSMITH_MODEL || undefined,
    baseUrl: env.COMMITSMITH_BASE_URL || undefined,
    relayUrl: env.COMMITSMITH_RELAY_URL || undefined,
    maxDiffSize: parseInteger('COMMITSMITH_MAX_DIFF_SIZE', env.COMMITSMITH_MAX_DIFF_SIZE),
    maxSubjectLength: parseInteger('COMMITSMITH_MAX_SUBJECT_LENGTH', env.COMMITSMITH_MAX_SUBJECT_LENGTH),
    timeoutMs: parseInteger('COMMITSMITH_TIMEOUT_MS', env.COMMITSMITH_TIMEOUT_MS)
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

/** Copies the defined values of `layer` over `base`. */
function assignDefined(base: ConfigFile, layer: ConfigFile): ConfigFile {
  const result: ConfigFile = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

/**
 * Resolves the effective configuration: defaults, home rc file, local rc file,
 * environment, then overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;

  if (options.loadDotenv ?? true) {
    loadEnvFiles(cwd, homeDir);
  }

  const homeFile = homeConfigPath(homeDir);
  const localFile = path.join(cwd, CONFIG_FILE);

  const overrides = configFileSchema.safeParse(options.overrides ?? {});
  if (!overrides.success) {
    throw new ConfigError(`Invalid option: ${overrides.error.issues.map(issue => issue.message).join('; ')}`);
  }

  const merged = [
    readConfigFile(homeFile),
    localFile === homeFile ? {} : readConfigFile(localFile),
    readEnv(env),
    overrides.data
  ].reduce<ConfigFile>(assignDefined, {});

  return {
    mode: merged.mode ?? DEFAULT_CONFIG.mode,
    apiKey: merged.apiKey,
    model: merged.model ?? DEFAULT_CONFIG.model,
    baseUrl: merged.baseUrl,
    relayUrl: merged.relayUrl ?? DEFAULT_CONFIG.relayUrl,
    maxDiffSize: merged.maxDiffSize ?? DEFAULT_CONFIG.maxDiffSize,
    maxSubjectLength: merged.maxSubjectLength ?? DEFAULT_CONFIG.maxSubjectLength,
    timeoutMs: merged.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    suggestionCount: merged.suggestionCount ?? DEFAULT_CONFIG.suggestionCount,
    defaultType: merged.defaultType ?? DEFAULT_CONFIG.defaultType,
    renameThreshold: merged.renameThreshold ?? DEFAULT_CONFIG.renameThreshold
  };
}

export function saveConfig(config: ConfigFile, homeDir?: string): string {
  const file = homeConfigPath(homeDir);
  const existing = readConfigFile(file);
  const merged = configFileSchema.parse(assignDefined(existing, config));

  fs.writeFileSync(file, JSON.stringify(merged, null, 2) + '\n', { mode: 0o600 });
  return file;
}

export function toBackendConfig(config: Config): BackendConfig {
  return {
    mode: config.mode,
    apiKey: config.apiKey,
    model: config.model,
    maxDiffSize: config.maxDiffSize,
    maxSubjectLength: config.maxSubjectLength,
    relayUrl: config.relayUrl,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs
  };
}

export function toMessageRules(config: Config): MessageRules {
  return {
    maxSubjectLength: config.maxSubjectLength,
    defaultType: config.defaultType
  };
}

export function describeConfig(config: Config): string {
  const lines = [
    'Backend:',
    `  Mode: ${config.mode}`,
    `  Model: ${config.model}`,
    `  API Key: ${config.apiKey ? '********' : '<not set>'}`,
    `  Relay URL: ${config.relayUrl}`,
    `  Base URL: ${config.baseUrl ?? '<provider default>'}`,
    `  Timeout: ${config.timeoutMs} ms`,
    '',
    'Commit:',
    `  Max Diff Size: ${config.maxDiffSize} lines`,
    `  Max Subject Length: ${config.maxSubjectLength} characters`,
    `  Default Type: ${config.defaultType}`,
    `  Suggestions: ${config.suggestionCount}`,
    `  Rename Threshold: ${config.renameThreshold}%`
  ];
  return lines.join('\n');
}
