import type { AccessController } from '../access/service.js';
import { TtlCache, type Clock } from '../cache/ttl-cache.js';
import {
  BlueprintNotFoundError,
  CancelledError,
  StoreUnavailableError,
} from '../exceptions.js';
import { createLogger } from '../logging-config.js';
import type { DocumentStore, StoredDocument } from '../store/views.js';
import { isRecord } from '../utils.js';
import { rootTypeOf, UnsupportedSchemaError } from '../validation/schema-utils.js';
import type { SchemaValidator } from '../validation/service.js';
import type { OpenBlueprintSet } from './open-blueprints.js';
import {
  DEFAULT_SCHEMA_VERSION,
  type Blueprint,
  type ProtectedBlueprint,
  type ResolveOptions,
} from './views.js';

const logger = createLogger('structura.blueprints');

export interface BlueprintStoreOptions {
  openBlueprints: OpenBlueprintSet;
  accessController: AccessController;
  validator: SchemaValidator;
  /** Remote registry of protected blueprints; without one only open domains resolve. */
  store?: DocumentStore | null;
  collection?: string;
  cacheTtlMs?: number;
  /** How long a cached entry may still be served while the store is failing. */
  staleTtlMs?: number;
  now?: Clock;
}

/**
 * A stored document is only parsed once a caller has been authorized for its
 * domain; the parsed blueprint is kept alongside it afterwards.
 */
interface ProtectedEntry {
  document: StoredDocument;
  blueprint?: ProtectedBlueprint;
}

type ProtectedLookup = { found: true; entry: ProtectedEntry } | { found: false };

export class BlueprintStore {
  private readonly openBlueprints: OpenBlueprintSet;
  private readonly accessController: AccessController;
  private readonly validator: SchemaValidator;
  private readonly store: DocumentStore | null;
  private readonly collection: string;
  private readonly cache: TtlCache<string, ProtectedEntry>;

  constructor(options: BlueprintStoreOptions) {
    this.openBlueprints = options.openBlueprints;
    this.accessController = options.accessController;
    this.validator = options.validator;
    this.store = options.store ?? null;
    this.collection = options.collection ?? 'blueprints';
    this.cache = new TtlCache({
      ttlMs: options.cacheTtlMs ?? 5 * 60 * 1000,
      staleTtlMs: options.staleTtlMs ?? 60 * 60 * 1000,
      now: options.now,
    });
  }

  /**
   * Resolve `(domain, schemaVersion)` to a blueprint. Open blueprints are
   * returned without consulting the access controller; protected ones are
   * returned only after the key has been authorized for this call.
   */
  async resolve(
    domain: string,
    schemaVersion: string = DEFAULT_SCHEMA_VERSION,
    apiKey?: string,
    options: ResolveOptions = {}
  ): Promise<Blueprint> {
    const open = this.openBlueprints.get(domain, schemaVersion);
    if (open) {
      logger.debug(`Resolved open blueprint ${domain}@${schemaVersion}`);
      return open;
    }

    const lookup = await this.lookupProtected(domain, schemaVersion, options);
    if (!lookup.found) {
      throw new BlueprintNotFoundError(
        `Blueprint not found for domain '${domain}' (version ${schemaVersion})`
      );
    }

    options.onAuthorizing?.();
    await this.accessController.authorize(apiKey, domain, { signal: options.signal });

    const { entry } = lookup;
    entry.blueprint ??= this.toBlueprint(domain, schemaVersion, entry.document);
    return entry.blueprint;
  }

  listOpenDomains(): string[] {
    return this.openBlueprints.domains();
  }

  get hasRemoteStore(): boolean {
    return this.store !== null;
  }

  private async lookupProtected(
    domain: string,
    schemaVersion: string,
    options: ResolveOptions
  ): Promise<ProtectedLookup> {
    if (!this.store) {
      return { found: false };
    }

    const cacheKey = `${domain}@${schemaVersion}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return { found: true, entry: cached };
    }

    let document: StoredDocument | null;
    try {
      document = await this.store.getDocument(this.collection, domain, {
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const stale = this.cache.getStale(cacheKey);
      if (stale) {
        logger.warning(
          `Blueprint store ${this.store.name} failed; serving cached ${cacheKey}`,
          error
        );
        return { found: true, entry: stale };
      }
      logger.error(`Blueprint store ${this.store.name} failed for ${cacheKey}`, error);
      throw new StoreUnavailableError('Blueprint store is unavailable', { cause: error });
    }

    if (!document) {
      return { found: false };
    }
    const storedVersion =
      typeof document.schema_version === 'string' && document.schema_version
        ? document.schema_version
        : DEFAULT_SCHEMA_VERSION;
    if (storedVersion !== schemaVersion) {
      return { found: false };
    }

    const entry: ProtectedEntry = { document };
    this.cache.set(cacheKey, entry);
    return { found: true, entry };
  }

  private toBlueprint(
    domain: string,
    schemaVersion: string,
    document: StoredDocument
  ): ProtectedBlueprint {
    const raw = document.schema;
    if (typeof raw !== 'string') {
      throw new StoreUnavailableError(
        `Blueprint '${domain}' must store its schema as a JSON string in the 'schema' field`
      );
    }

    let schema: unknown;
    try {
      schema = JSON.parse(raw);
    } catch (error) {
      throw new StoreUnavailableError(`Blueprint '${domain}' has an invalid JSON schema`, {
        cause: error,
      });
    }
    if (!isRecord(schema)) {
      throw new StoreUnavailableError(`Blueprint '${domain}' schema must be a JSON object`);
    }

    try {
      this.validator.compile(schema);
    } catch (error) {
      if (error instanceof UnsupportedSchemaError) {
        throw new StoreUnavailableError(
          `Blueprint '${domain}' uses an unsupported schema: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }

    return {
      domain,
      schemaVersion,
      schema,
      rootType: rootTypeOf(schema),
      visibility: 'protected',
    };
  }
}
