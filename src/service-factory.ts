import { AccessController } from './access/service.js';
import { loadOpenBlueprints } from './blueprints/open-blueprints.js';
import { BlueprintStore } from './blueprints/service.js';
import type { Clock } from './cache/ttl-cache.js';
import type { AppConfig } from './config/schema.js';
import { ExtractionService } from './extraction/service.js';
import { FileExtractor } from './extractors/file.js';
import { FirecrawlExtractor } from './extractors/firecrawl.js';
import { HttpMarkdownExtractor } from './extractors/http.js';
import type { ContentExtractor } from './extractors/views.js';
import type { BaseChatModel } from './llm/base.js';
import { ChatOpenAI } from './llm/openai/chat.js';
import { createLogger } from './logging-config.js';
import { PromptBuilder } from './prompts/prompt-builder.js';
import { connectFirestore, FirestoreDocumentStore } from './store/firestore.js';
import type { DocumentStore } from './store/views.js';
import { StructuringEngine } from './structuring/service.js';
import { SchemaValidator } from './validation/service.js';

const logger = createLogger('structura.factory');

/** Collaborators to use instead of the ones built from configuration. */
export interface ServiceOverrides {
  llm?: BaseChatModel;
  extractor?: ContentExtractor;
  /** `null` disables the remote store even when configured. */
  store?: DocumentStore | null;
  now?: Clock;
}

export const createChatModel = (config: AppConfig): BaseChatModel => {
  if (config.llm.provider === 'custom' && !config.llm.baseUrl) {
    throw new Error('LLM_BASE_URL is required for a custom LLM provider');
  }
  return new ChatOpenAI({
    model: config.llm.model,
    provider: config.llm.provider,
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeoutMs,
  });
};

export const createContentExtractor = (config: AppConfig): ContentExtractor => {
  const { apiKey, apiUrl, timeoutMs, maxRetries, retryDelayMs } = config.firecrawl;
  if (apiKey) {
    return new FirecrawlExtractor({ apiKey, apiUrl, timeoutMs, maxRetries, retryDelayMs });
  }
  logger.warning('FIRECRAWL_API_KEY is not set; fetching pages directly');
  return new HttpMarkdownExtractor({ timeoutMs, maxRetries, retryDelayMs });
};

export const createDocumentStore = (config: AppConfig): DocumentStore | null => {
  const { projectId, credentialsJson, timeoutMs } = config.store;
  if (!projectId && !credentialsJson) {
    logger.info('No Firestore project configured; only open blueprints are available');
    return null;
  }
  return new FirestoreDocumentStore(connectFirestore({ projectId, credentialsJson }), timeoutMs);
};

/**
 * Wire the extraction pipeline from configuration. Open blueprints are read
 * from disk once, here.
 */
export async function createExtractionService(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Promise<ExtractionService> {
  const validator = new SchemaValidator();
  const openBlueprints = await loadOpenBlueprints(config.blueprints.dir, validator);
  const store = overrides.store !== undefined ? overrides.store : createDocumentStore(config);

  const accessController = new AccessController({
    store,
    collection: config.store.apiKeyCollection,
    keyCacheTtlMs: config.access.keyCacheTtlMs,
    now: overrides.now,
  });
  const blueprints = new BlueprintStore({
    openBlueprints,
    accessController,
    validator,
    store,
    collection: config.store.blueprintCollection,
    cacheTtlMs: config.blueprints.cacheTtlMs,
    staleTtlMs: config.blueprints.staleTtlMs,
    now: overrides.now,
  });

  const promptBuilder = new PromptBuilder(config.extraction.maxContentChars);
  const engine = new StructuringEngine({
    llm: overrides.llm ?? createChatModel(config),
    systemPrompt: promptBuilder.systemPrompt,
    maxAttempts: config.extraction.maxStructuringAttempts,
    llmMaxRetries: config.llm.maxRetries,
    llmRetryDelayMs: config.llm.retryDelayMs,
  });

  return new ExtractionService({
    blueprints,
    extractor: overrides.extractor ?? createContentExtractor(config),
    fileExtractor: new FileExtractor(),
    promptBuilder,
    engine,
    validator,
    maxValidationRepairs: config.extraction.maxValidationRepairs,
    now: overrides.now,
  });
}
