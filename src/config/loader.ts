/**
 * Configuration loader that handles multiple sources with priority order:
 * 1. Environment variables (highest priority)
 * 2. JSON file named by STRUCTURA_CONFIG_FILE
 * 3. Default values (lowest priority)
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { createLogger } from '../logging-config.js';
import { isRecord } from '../utils.js';
import { AppConfigSchema, type AppConfig } from './schema.js';

// Load environment variables
loadEnv();

const logger = createLogger('structura.config');

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

const string_to_bool = (value: string | undefined, defaultValue = false) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return ['true', '1', 't', 'y', 'yes'].includes(value.toLowerCase());
};

const parse_number = (name: string, value: string | undefined) => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

const non_empty = (value: string | undefined) =>
  value !== undefined && value.trim() !== '' ? value : undefined;

const log_level = (value: string | undefined) => {
  const level = non_empty(value)?.toLowerCase();
  return level === 'warn' ? 'warning' : level;
};

/** Drop undefined entries so they do not shadow file values or defaults. */
const compact = (section: Section): Section =>
  Object.fromEntries(
    Object.entries(section).filter(([, value]) => value !== undefined)
  );

const mergeSection = (base: unknown, overrides: Section): Section => ({
  ...(isRecord(base) ? base : {}),
  ...compact(overrides),
});

/**
 * Apply environment variable overrides to configuration
 */
export function applyEnvironmentOverrides(
  input: Record<string, unknown>,
  env: Env
): Record<string, unknown> {
  return {
    ...input,
    llm: mergeSection(input.llm, {
      apiKey: non_empty(env.LLM_API_KEY) ?? non_empty(env.OPENAI_API_KEY),
      model: non_empty(env.LLM_MODEL),
      baseUrl: non_empty(env.LLM_BASE_URL),
      provider: non_empty(env.LLM_PROVIDER),
      temperature: parse_number('LLM_TEMPERATURE', env.LLM_TEMPERATURE),
      timeoutMs: parse_number('LLM_TIMEOUT_MS', env.LLM_TIMEOUT_MS),
      maxRetries: parse_number('LLM_MAX_RETRIES', env.LLM_MAX_RETRIES),
    }),
    firecrawl: mergeSection(input.firecrawl, {
      apiKey: non_empty(env.FIRECRAWL_API_KEY),
      apiUrl: non_empty(env.FIRECRAWL_API_URL),
      timeoutMs: parse_number('FIRECRAWL_TIMEOUT_MS', env.FIRECRAWL_TIMEOUT_MS),
      maxRetries: parse_number('FIRECRAWL_MAX_RETRIES', env.FIRECRAWL_MAX_RETRIES),
    }),
    store: mergeSection(input.store, {
      projectId: non_empty(env.FIREBASE_PROJECT_ID),
      credentialsJson: non_empty(env.FIREBASE_CREDENTIALS_JSON),
      blueprintCollection: non_empty(env.FIREBASE_COLLECTION),
      apiKeyCollection: non_empty(env.FIREBASE_API_KEY_COLLECTION),
      timeoutMs: parse_number('STORE_TIMEOUT_MS', env.STORE_TIMEOUT_MS),
    }),
    blueprints: mergeSection(input.blueprints, {
      dir: non_empty(env.BLUEPRINTS_DIR),
      cacheTtlMs: parse_number('BLUEPRINT_CACHE_TTL_MS', env.BLUEPRINT_CACHE_TTL_MS),
      staleTtlMs: parse_number('BLUEPRINT_STALE_TTL_MS', env.BLUEPRINT_STALE_TTL_MS),
    }),
    access: mergeSection(input.access, {
      keyCacheTtlMs: parse_number('API_KEY_CACHE_TTL_MS', env.API_KEY_CACHE_TTL_MS),
    }),
    extraction: mergeSection(input.extraction, {
      maxContentChars: parse_number('MAX_CONTENT_CHARS', env.MAX_CONTENT_CHARS),
      maxStructuringAttempts: parse_number(
        'MAX_STRUCTURING_ATTEMPTS',
        env.MAX_STRUCTURING_ATTEMPTS
      ),
      maxValidationRepairs: parse_number(
        'MAX_VALIDATION_REPAIRS',
        env.MAX_VALIDATION_REPAIRS
      ),
    }),
    server: mergeSection(input.server, {
      port: parse_number('PORT', env.PORT),
      verboseErrors:
        env.DEBUG === undefined ? undefined : string_to_bool(env.DEBUG),
    }),
    logging: mergeSection(input.logging, {
      level: log_level(env.STRUCTURA_LOGGING_LEVEL),
    }),
  };
}

/**
 * Load configuration from a JSON file. A missing or unreadable file is an
 * error: it was named explicitly.
 */
async function loadConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const content = await fs.readFile(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  logger.debug(`Loaded configuration file ${configPath}`);
  return parsed;
}

export interface LoadConfigOptions {
  env?: Env;
  configFile?: string;
}

/**
 * Main configuration loader function
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? non_empty(env.STRUCTURA_CONFIG_FILE);

  const fileConfig = configFile
    ? await loadConfigFile(path.resolve(configFile))
    : {};

  const config = AppConfigSchema.parse(applyEnvironmentOverrides(fileConfig, env));
  return {
    ...config,
    blueprints: { ...config.blueprints, dir: path.resolve(config.blueprints.dir) },
  };
}
