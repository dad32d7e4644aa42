export * from './config/index.js';
export * from './logging-config.js';
export * from './exceptions.js';
export * from './utils.js';

export * from './cache/ttl-cache.js';
export * from './validation/schema-utils.js';
export * from './validation/views.js';
export * from './validation/service.js';
export * from './services/json-parser.js';

export * from './store/views.js';
export * from './store/firestore.js';
export * from './access/views.js';
export * from './access/service.js';
export * from './blueprints/views.js';
export * from './blueprints/open-blueprints.js';
export * from './blueprints/service.js';

export * from './extractors/views.js';
export * from './extractors/markdown.js';
export * from './extractors/firecrawl.js';
export * from './extractors/http.js';
export * from './extractors/file.js';

export * from './llm/messages.js';
export * from './llm/views.js';
export * from './llm/base.js';
export * from './llm/exceptions.js';
export * from './llm/openai/chat.js';

export * from './prompts/prompt-builder.js';
export * from './structuring/views.js';
export * from './structuring/service.js';
export * from './extraction/views.js';
export * from './extraction/service.js';
export * from './service-factory.js';
