import { TtlCache, type Clock } from '../cache/ttl-cache.js';
import {
  CancelledError,
  ForbiddenError,
  StoreUnavailableError,
  UnauthenticatedError,
} from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import type { DocumentStore } from '../store/views.js';
import {
  ApiKeyRecordSchema,
  WILDCARD_DOMAIN,
  type ApiKeyRecord,
  type AuthorizeOptions,
} from './views.js';

const logger = createLogger('structura.access');

export interface AccessControllerOptions {
  /** Key registry; without one every key is unknown. */
  store: DocumentStore | null;
  collection?: string;
  /** Revocation takes effect within one TTL. */
  keyCacheTtlMs?: number;
  now?: Clock;
}

const maskKey = (apiKey: string) =>
  apiKey.length <= 4 ? '****' : `${apiKey.slice(0, 4)}****`;

export class AccessController {
  private readonly store: DocumentStore | null;
  private readonly collection: string;
  private readonly now: Clock;
  private readonly cache: TtlCache<string, ApiKeyRecord>;

  constructor(options: AccessControllerOptions) {
    this.store = options.store;
    this.collection = options.collection ?? 'api_keys';
    this.now = options.now ?? Date.now;
    this.cache = new TtlCache({ ttlMs: options.keyCacheTtlMs ?? 60000, now: this.now });
  }

  /**
   * Resolve when `apiKey` is active, unexpired and allowed to use `domain`.
   *
   * @throws UnauthenticatedError when the key is missing or unknown
   * @throws ForbiddenError when the key exists but may not be used here
   * @throws StoreUnavailableError when the key registry cannot be read
   */
  async authorize(
    apiKey: string | undefined,
    domain: string,
    options: AuthorizeOptions = {}
  ): Promise<void> {
    if (!apiKey) {
      throw new UnauthenticatedError(
        `Blueprint '${domain}' is protected and requires an API key`
      );
    }

    const record = await this.lookup(apiKey, options);
    if (!record) {
      logger.info(`Rejected unknown API key ${maskKey(apiKey)}`);
      throw new UnauthenticatedError('Invalid API key');
    }
    if (!record.active) {
      throw new ForbiddenError('API key is inactive');
    }
    if (record.expires_at && record.expires_at.getTime() <= this.now()) {
      throw new ForbiddenError('API key has expired');
    }
    const allowed = record.allowed_domains;
    if (!allowed.includes(WILDCARD_DOMAIN) && !allowed.includes(domain)) {
      throw new ForbiddenError(`API key is not authorized for blueprint '${domain}'`);
    }
    logger.debug(`API key ${maskKey(apiKey)} authorized for ${domain}`);
  }

  private async lookup(apiKey: string, options: AuthorizeOptions): Promise<ApiKeyRecord | null> {
    const cached = this.cache.get(apiKey);
    if (cached) {
      return cached;
    }
    if (!this.store) {
      return null;
    }

    let raw: Record<string, unknown> | null;
    try {
      raw = await this.store.getDocument(this.collection, apiKey, options);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      logger.error(`Key registry lookup failed on ${this.store.name}`, error);
      throw new StoreUnavailableError('API key registry is unavailable', { cause: error });
    }
    if (!raw) {
      return null;
    }

    const parsed = ApiKeyRecordSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error(`Malformed API key record ${maskKey(apiKey)}`, parsed.error.issues);
      throw new StoreUnavailableError('API key record is malformed', { cause: parsed.error });
    }
    this.cache.set(apiKey, parsed.data);
    return parsed.data;
  }
}
