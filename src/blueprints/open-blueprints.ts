import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../logging-config.js';
import { isRecord } from '../utils.js';
import { rootTypeOf } from '../validation/schema-utils.js';
import type { SchemaValidator } from '../validation/service.js';
import { DEFAULT_SCHEMA_VERSION, type OpenBlueprint } from './views.js';

const logger = createLogger('structura.blueprints.open');

// Both spellings have been published; they name the same blueprint.
const DOMAIN_ALIASES: Record<string, string> = {
  'e-commerce': 'ecommerce',
  ecommerce: 'e-commerce',
};

const keyOf = (domain: string, schemaVersion: string) => `${domain}@${schemaVersion}`;

/**
 * `<domain>.json` is version v1, `<domain>@<version>.json` an explicit one.
 */
export const parseBlueprintFileName = (
  fileName: string
): { domain: string; schemaVersion: string } | null => {
  if (!fileName.endsWith('.json')) {
    return null;
  }
  const stem = fileName.slice(0, -'.json'.length);
  const at = stem.lastIndexOf('@');
  const domain = at === -1 ? stem : stem.slice(0, at);
  const schemaVersion = at === -1 ? DEFAULT_SCHEMA_VERSION : stem.slice(at + 1);
  if (!domain || !schemaVersion) {
    return null;
  }
  return { domain, schemaVersion };
};

/** The immutable set of open blueprints loaded at start-up. */
export class OpenBlueprintSet {
  private readonly byKey = new Map<string, OpenBlueprint>();

  constructor(blueprints: OpenBlueprint[] = []) {
    for (const blueprint of blueprints) {
      this.byKey.set(keyOf(blueprint.domain, blueprint.schemaVersion), blueprint);
    }
    for (const blueprint of blueprints) {
      const alias = DOMAIN_ALIASES[blueprint.domain];
      const aliasKey = alias ? keyOf(alias, blueprint.schemaVersion) : null;
      if (alias && aliasKey && !this.byKey.has(aliasKey)) {
        this.byKey.set(aliasKey, { ...blueprint, domain: alias });
      }
    }
  }

  get(domain: string, schemaVersion: string): OpenBlueprint | undefined {
    return this.byKey.get(keyOf(domain, schemaVersion));
  }

  has(domain: string, schemaVersion: string): boolean {
    return this.byKey.has(keyOf(domain, schemaVersion));
  }

  /** Sorted, de-duplicated domain names (aliases included). */
  domains(): string[] {
    const names = new Set([...this.byKey.values()].map((blueprint) => blueprint.domain));
    return [...names].sort();
  }

  get size(): number {
    return this.byKey.size;
  }
}

/**
 * Read every `*.json` file in `dir`. Files that are not JSON objects, or whose
 * schema cannot be compiled, are logged and skipped.
 */
export async function loadOpenBlueprints(
  dir: string,
  validator: SchemaValidator
): Promise<OpenBlueprintSet> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    logger.warning(`Blueprints directory not found: ${dir}`, error);
    return new OpenBlueprintSet();
  }

  const blueprints: OpenBlueprint[] = [];
  for (const fileName of entries.sort()) {
    const parsedName = parseBlueprintFileName(fileName);
    if (!parsedName) {
      continue;
    }
    const source = path.join(dir, fileName);
    try {
      const schema: unknown = JSON.parse(await fs.readFile(source, 'utf-8'));
      if (!isRecord(schema)) {
        throw new Error('blueprint must be a JSON object');
      }
      validator.compile(schema);
      blueprints.push({
        ...parsedName,
        schema,
        rootType: rootTypeOf(schema),
        visibility: 'open',
        source,
      });
    } catch (error) {
      logger.error(`Skipping blueprint ${source}`, error);
    }
  }

  const set = new OpenBlueprintSet(blueprints);
  logger.info(`Loaded ${blueprints.length} open blueprint(s): ${set.domains().join(', ') || '(none)'}`);
  return set;
}
