/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';

// LLM configuration schema
export const LLMConfigSchema = z.object({
  provider: z.enum(['openai', 'custom']).default('openai'),
  apiKey: z.string().optional(),
  model: z.string().default('gpt-4o-mini'),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.3),
  timeoutMs: z.number().int().min(1000).default(60000),
  maxRetries: z.number().int().min(0).default(2),
  retryDelayMs: z.number().int().min(0).default(1000),
});

// Firecrawl / page fetching configuration schema
export const FirecrawlConfigSchema = z.object({
  apiKey: z.string().optional(),
  apiUrl: z.string().url().default('https://api.firecrawl.dev'),
  timeoutMs: z.number().int().min(1000).default(30000),
  maxRetries: z.number().int().min(0).default(2),
  retryDelayMs: z.number().int().min(0).default(1000),
});

// Remote document store (Firestore) configuration schema
export const StoreConfigSchema = z.object({
  projectId: z.string().optional(),
  credentialsJson: z.string().optional(),
  blueprintCollection: z.string().min(1).default('blueprints'),
  apiKeyCollection: z.string().min(1).default('api_keys'),
  timeoutMs: z.number().int().min(100).default(10000),
});

export const BlueprintsConfigSchema = z.object({
  dir: z.string().default('blueprints'),
  cacheTtlMs: z.number().int().min(0).default(5 * 60 * 1000),
  staleTtlMs: z.number().int().min(0).default(60 * 60 * 1000),
});

export const AccessConfigSchema = z.object({
  keyCacheTtlMs: z.number().int().min(0).default(60 * 1000),
});

export const ExtractionConfigSchema = z.object({
  maxContentChars: z.number().int().min(1).default(20000),
  maxStructuringAttempts: z.number().int().min(1).default(3),
  maxValidationRepairs: z.number().int().min(0).default(2),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  verboseErrors: z.boolean().default(false),
});

// Logging configuration schema
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
});

// Main application configuration schema
export const AppConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  firecrawl: FirecrawlConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  blueprints: BlueprintsConfigSchema.default({}),
  access: AccessConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type FirecrawlConfig = z.infer<typeof FirecrawlConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type BlueprintsConfig = z.infer<typeof BlueprintsConfigSchema>;
export type AccessConfig = z.infer<typeof AccessConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Input configuration types (fields optional for user input)
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});
