import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import PDFDocument from 'pdfkit';
import { AccessController } from '../src/access/service.js';
import { OpenBlueprintSet } from '../src/blueprints/open-blueprints.js';
import { BlueprintStore } from '../src/blueprints/service.js';
import type { OpenBlueprint } from '../src/blueprints/views.js';
import { ExtractionService } from '../src/extraction/service.js';
import { FileExtractor } from '../src/extractors/file.js';
import type { ContentExtractor, FetchOptions } from '../src/extractors/views.js';
import type { BaseChatModel, ChatInvokeOptions } from '../src/llm/base.js';
import type { Message } from '../src/llm/messages.js';
import { ChatInvokeCompletion } from '../src/llm/views.js';
import { PromptBuilder } from '../src/prompts/prompt-builder.js';
import type { DocumentStore, GetDocumentOptions, StoredDocument } from '../src/store/views.js';
import { StructuringEngine } from '../src/structuring/service.js';
import { rootTypeOf, type JsonSchema } from '../src/validation/schema-utils.js';
import { SchemaValidator } from '../src/validation/service.js';

export const PRODUCT_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    product_name: { type: 'string' },
    price: { type: 'number' },
  },
  required: ['product_name', 'price'],
};

export const MEDICAL_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    condition: { type: 'string' },
    symptoms: { type: 'array', items: { type: 'string' } },
  },
  required: ['condition'],
};

export const openBlueprint = (domain: string, schema: JsonSchema, schemaVersion = 'v1'): OpenBlueprint => ({
  domain,
  schemaVersion,
  schema,
  rootType: rootTypeOf(schema),
  visibility: 'open',
  source: `memory:${domain}.json`,
});

export class ManualClock {
  constructor(public current = 1_700_000_000_000) {}

  now = () => this.current;

  advance(ms: number) {
    this.current += ms;
  }
}

/** In-process stand-in for the remote registry. */
export class MemoryDocumentStore implements DocumentStore {
  readonly name = 'memory';
  readonly reads: string[] = [];
  failure: Error | null = null;
  private readonly collections = new Map<string, Map<string, StoredDocument>>();

  put(collection: string, id: string, document: StoredDocument) {
    const docs = this.collections.get(collection) ?? new Map<string, StoredDocument>();
    docs.set(id, document);
    this.collections.set(collection, docs);
    return this;
  }

  remove(collection: string, id: string) {
    this.collections.get(collection)?.delete(id);
  }

  async getDocument(
    collection: string,
    id: string,
    _options?: GetDocumentOptions
  ): Promise<StoredDocument | null> {
    this.reads.push(`${collection}/${id}`);
    if (this.failure) {
      throw this.failure;
    }
    return this.collections.get(collection)?.get(id) ?? null;
  }
}

type Reply = string | Error;

/** Chat model that plays back scripted replies and records every call. */
export class FakeChatModel implements BaseChatModel {
  model = 'fake-model';
  provider = 'fake';
  readonly calls: { messages: Message[]; options: ChatInvokeOptions }[] = [];
  /** Runs inside every call, before the reply is returned. */
  onCall?: (call: number) => void;
  private readonly replies: Reply[];

  constructor(replies: Reply[] = []) {
    this.replies = [...replies];
  }

  get name() {
    return this.model;
  }

  queue(...replies: Reply[]) {
    this.replies.push(...replies);
    return this;
  }

  async ainvoke(messages: Message[], options: ChatInvokeOptions = {}) {
    this.calls.push({ messages: [...messages], options });
    this.onCall?.(this.calls.length);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('FakeChatModel has no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return new ChatInvokeCompletion(reply, null);
  }
}

export class FakeExtractor implements ContentExtractor {
  readonly name = 'fake';
  readonly urls: string[] = [];

  constructor(
    private readonly markdown: string | Error = '# Widget\n\nPrice: $9.99'
  ) {}

  async fetch(url: string, _options?: FetchOptions) {
    this.urls.push(url);
    if (this.markdown instanceof Error) {
      throw this.markdown;
    }
    return this.markdown;
  }
}

export interface AdapterReply {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

/**
 * Axios adapter answering from `handler`. Non-2xx replies are rejected the way
 * axios' own adapters do; thrown errors become network errors.
 */
export const createAdapter = (
  handler: (config: InternalAxiosRequestConfig) => AdapterReply | Error
) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = handler(config);
    if (reply instanceof Error) {
      throw new AxiosError(reply.message, 'code' in reply ? String(reply.code) : 'ECONNRESET', config);
    }
    const response: AxiosResponse = {
      data: reply.data ?? '',
      status: reply.status ?? 200,
      statusText: String(reply.status ?? 200),
      headers: reply.headers ?? {},
      config,
    };
    if (response.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        response.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
    return response;
  };
  return { adapter, requests };
};

export const networkError = (code: string) => Object.assign(new Error(code), { code });

/** A PDF with one page per entry, each holding the entry as a single line. */
export const createPdf = (pages: string[]) =>
  new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({ autoFirstPage: false });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
    for (const page of pages) {
      doc.addPage();
      doc.fontSize(12).text(page);
    }
    doc.end();
  });

export interface TestPipeline {
  service: ExtractionService;
  llm: FakeChatModel;
  extractor: FakeExtractor;
  store: MemoryDocumentStore;
  clock: ManualClock;
}

export interface TestPipelineOptions {
  replies?: Reply[];
  markdown?: string | Error;
  openBlueprints?: OpenBlueprint[];
  maxAttempts?: number;
  maxValidationRepairs?: number;
  maxContentChars?: number;
}

/**
 * The full pipeline with e-commerce open, `medical` and `legal` protected,
 * and two keys: `legal-key` (legal only) and `admin-key` (wildcard).
 */
export const createTestPipeline = (options: TestPipelineOptions = {}): TestPipeline => {
  const clock = new ManualClock();
  const validator = new SchemaValidator();
  const store = new MemoryDocumentStore()
    .put('blueprints', 'medical', { schema: JSON.stringify(MEDICAL_SCHEMA) })
    .put('blueprints', 'legal', { schema: JSON.stringify(PRODUCT_SCHEMA) })
    .put('api_keys', 'legal-key', { active: true, allowed_domains: ['legal'] })
    .put('api_keys', 'admin-key', { active: true, allowed_domains: ['*'] });

  const accessController = new AccessController({ store, now: clock.now });
  const blueprints = new BlueprintStore({
    openBlueprints: new OpenBlueprintSet(
      options.openBlueprints ?? [openBlueprint('e-commerce', PRODUCT_SCHEMA)]
    ),
    accessController,
    validator,
    store,
    now: clock.now,
  });

  const llm = new FakeChatModel(options.replies);
  const extractor = new FakeExtractor(options.markdown);
  const promptBuilder = new PromptBuilder(options.maxContentChars);
  const engine = new StructuringEngine({
    llm,
    systemPrompt: promptBuilder.systemPrompt,
    maxAttempts: options.maxAttempts ?? 3,
    llmMaxRetries: 0,
    llmRetryDelayMs: 0,
  });

  const service = new ExtractionService({
    blueprints,
    extractor,
    fileExtractor: new FileExtractor(),
    promptBuilder,
    engine,
    validator,
    maxValidationRepairs: options.maxValidationRepairs,
    now: clock.now,
  });

  return { service, llm, extractor, store, clock };
};

/** Await a promise that must reject and hand back what it rejected with. */
export const rejectionOf = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
};
