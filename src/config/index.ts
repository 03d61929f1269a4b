/**
 * Settings Module
 *
 * Reads process environment into a validated, immutable settings object.
 * Startup must fail when the LLM or connector-platform keys are absent;
 * the Slack bot token is optional and only degrades chat features.
 *
 * The chat-channel directory is a static JSON file loaded once here.
 */

import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import type { ChannelName } from '../types/index.js';
import type { LogLevel } from '../logger/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ChannelDirectoryEntry {
  name: string;
  id: string;
}

/**
 * Short key -> channel mapping, e.g. { "1": { name: "team", id: "C0..." } }
 */
export type ChannelDirectory = Readonly<Record<string, Readonly<ChannelDirectoryEntry>>>;

export interface Settings {
  projectName: string;
  apiPrefix: string;
  port: number;
  logLevel: LogLevel;
  llm: {
    apiKey: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
  };
  connector: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    authConfigIds: Partial<Record<ChannelName, string>>;
  };
  slack: {
    botToken: string | undefined;
    channels: ChannelDirectory;
  };
}

/**
 * Thrown when mandatory configuration is missing or malformed
 */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Constants
// ============================================================================

export const PROJECT_NAME = 'Outreach Messaging Service';
export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_CHANNELS_FILE = 'config/slack-channels.json';

const REQUIRED_KEYS = ['ANTHROPIC_API_KEY', 'COMPOSIO_API_KEY'] as const;

// ============================================================================
// Schemas
// ============================================================================

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  NODE_ENV: optionalString,
  ANTHROPIC_API_KEY: z.string().trim().min(1),
  ANTHROPIC_MODEL: optionalString,
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  ANTHROPIC_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  COMPOSIO_API_KEY: z.string().trim().min(1),
  COMPOSIO_BASE_URL: z.string().url().default('https://backend.composio.dev'),
  COMPOSIO_GMAIL_AUTH_CONFIG_ID: optionalString,
  COMPOSIO_SLACK_AUTH_CONFIG_ID: optionalString,
  COMPOSIO_WHATSAPP_AUTH_CONFIG_ID: optionalString,
  COMPOSIO_LINKEDIN_AUTH_CONFIG_ID: optionalString,
  CONNECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SLACK_BOT_TOKEN: optionalString,
  SLACK_CHANNELS_FILE: optionalString,
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  API_PREFIX: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, 'API_PREFIX must start with "/"')
    .default('/api/v1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

const ChannelDirectorySchema = z.record(
  z.object({
    name: z.string().min(1),
    id: z.string().min(1),
  })
);

// ============================================================================
// Loaders
// ============================================================================

/**
 * Parse a channel directory from its JSON text
 */
export function parseChannelDirectory(json: string): ChannelDirectory {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(`Channel directory is not valid JSON: ${String(error)}`);
  }

  const result = ChannelDirectorySchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      'Channel directory does not match { key: { name, id } }',
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  return Object.freeze(
    Object.fromEntries(
      Object.entries(result.data).map(([key, entry]) => [key, Object.freeze({ ...entry })])
    )
  );
}

/**
 * Load the channel directory file, relative paths resolving against the working directory
 */
export function loadChannelDirectory(filePath: string = DEFAULT_CHANNELS_FILE): ChannelDirectory {
  const fullPath = isAbsolute(filePath) ? filePath : resolve(process.cwd(), filePath);

  let json: string;
  try {
    json = readFileSync(fullPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read channel directory: ${fullPath} (${String(error)})`);
  }

  return parseChannelDirectory(json);
}

/**
 * Build settings from an environment map
 *
 * @throws ConfigError naming every missing mandatory key
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  readDirectory: (filePath: string) => ChannelDirectory = loadChannelDirectory
): Settings {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing.map((key) => `${key}: required`)
    );
  }

  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const vars = result.data;
  const logLevel: LogLevel = vars.LOG_LEVEL ?? (vars.NODE_ENV === 'development' ? 'debug' : 'info');

  const authConfigIds: Partial<Record<ChannelName, string>> = {};
  if (vars.COMPOSIO_GMAIL_AUTH_CONFIG_ID) authConfigIds.gmail = vars.COMPOSIO_GMAIL_AUTH_CONFIG_ID;
  if (vars.COMPOSIO_SLACK_AUTH_CONFIG_ID) authConfigIds.slack = vars.COMPOSIO_SLACK_AUTH_CONFIG_ID;
  if (vars.COMPOSIO_WHATSAPP_AUTH_CONFIG_ID) authConfigIds.whatsapp = vars.COMPOSIO_WHATSAPP_AUTH_CONFIG_ID;
  if (vars.COMPOSIO_LINKEDIN_AUTH_CONFIG_ID) authConfigIds.linkedin = vars.COMPOSIO_LINKEDIN_AUTH_CONFIG_ID;

  return {
    projectName: PROJECT_NAME,
    apiPrefix: vars.API_PREFIX.replace(/\/+$/, ''),
    port: vars.PORT,
    logLevel,
    llm: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL ?? DEFAULT_MODEL,
      maxTokens: vars.ANTHROPIC_MAX_TOKENS,
      timeoutMs: vars.ANTHROPIC_TIMEOUT_MS,
    },
    connector: {
      apiKey: vars.COMPOSIO_API_KEY,
      baseUrl: vars.COMPOSIO_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: vars.CONNECTOR_TIMEOUT_MS,
      authConfigIds,
    },
    slack: {
      botToken: vars.SLACK_BOT_TOKEN,
      channels: readDirectory(vars.SLACK_CHANNELS_FILE ?? DEFAULT_CHANNELS_FILE),
    },
  };
}
