/**
 * Configuration loading and validation
 *
 * Sources, highest precedence first: environment variables, the YAML config
 * file (WORKLOG_CONFIG_PATH or ~/.config/worklog/config.yaml), built-in defaults.
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';
import type { WorklogConfig } from '../types/index.js';

const storeKindSchema = z.enum(['sqlite', 'memory']);

// Zod schema for the YAML config file
const fileConfigSchema = z.object({
  store: storeKindSchema.optional(),
  db_path: z.string().min(1).optional(),
  owner: z.string().min(1).optional(),
  log_level: z.enum(LOG_LEVEL_NAMES).optional(),
  http: z
    .object({
      enabled: z.boolean().optional(),
      port: z.number().int().positive().optional(),
      cors_origin: z.string().optional(),
    })
    .default({}),
});

// Environment variable schema
const envSchema = z.object({
  WORKLOG_CONFIG_PATH: z.string().optional(),
  WORKLOG_STORE: storeKindSchema.optional(),
  WORKLOG_DB_PATH: z.string().min(1).optional(),
  WORKLOG_OWNER: z.string().min(1).optional(),
  WORKLOG_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
  HTTP_ENABLED: z
    .string()
    .transform((v) => v.toLowerCase() === 'true')
    .optional(),
  HTTP_PORT: z.coerce.number().int().positive().optional(),
  HTTP_CORS_ORIGIN: z.string().optional(),
});

export const DEFAULT_OWNER = 'default';

export const schemas = {
  fileConfigSchema,
  envSchema,
};

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

// Default config file path
function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'worklog', 'config.yaml');
}

function getDefaultDbPath(): string {
  return join(homedir(), '.worklog', 'worklog.sqlite');
}

type FileConfig = z.infer<typeof fileConfigSchema>;

function loadConfigFile(path: string, required: boolean): FileConfig | null {
  if (!existsSync(path)) {
    if (required) {
      throw new Error(`Configuration error:\n  - config file not found: ${path}`);
    }
    return null;
  }

  const result = fileConfigSchema.safeParse(parseYaml(readFileSync(path, 'utf-8')) ?? {});
  if (!result.success) {
    throw new Error(`Invalid config file ${path}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load configuration from the environment and the optional config file
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorklogConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new Error(`Configuration error:\n${formatIssues(result.error)}`);
  }

  const vars = result.data;
  const configPath = vars.WORKLOG_CONFIG_PATH
    ? resolve(vars.WORKLOG_CONFIG_PATH)
    : getDefaultConfigPath();
  const file = loadConfigFile(configPath, Boolean(vars.WORKLOG_CONFIG_PATH));

  const dbPath = vars.WORKLOG_DB_PATH ?? file?.db_path ?? getDefaultDbPath();

  return {
    configPath: file ? configPath : null,
    store: vars.WORKLOG_STORE ?? file?.store ?? 'sqlite',
    dbPath: dbPath === ':memory:' ? dbPath : resolve(dbPath),
    owner: vars.WORKLOG_OWNER ?? file?.owner ?? DEFAULT_OWNER,
    logLevel: vars.WORKLOG_LOG_LEVEL ?? file?.log_level ?? 'info',
    http: {
      enabled: vars.HTTP_ENABLED ?? file?.http.enabled ?? false,
      port: vars.HTTP_PORT ?? file?.http.port ?? 3000,
      corsOrigin: vars.HTTP_CORS_ORIGIN ?? file?.http.cors_origin ?? '*',
    },
  };
}

// Singleton config instance
let configInstance: WorklogConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): WorklogConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
