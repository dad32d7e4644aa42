import type { JsonSchema } from '../validation/schema-utils.js';

export const DEFAULT_SCHEMA_VERSION = 'v1';

interface BlueprintBase {
  domain: string;
  schemaVersion: string;
  schema: JsonSchema;
  /** Top-level shape the schema demands, when it names one. */
  rootType: 'object' | 'array' | null;
}

/** Shipped with the service; anyone may use it. */
export interface OpenBlueprint extends BlueprintBase {
  visibility: 'open';
  source: string;
}

/** Held in the remote registry; requires an authorized API key. */
export interface ProtectedBlueprint extends BlueprintBase {
  visibility: 'protected';
}

export type Blueprint = OpenBlueprint | ProtectedBlueprint;

export type BlueprintVisibility = Blueprint['visibility'];

export interface ResolveOptions {
  signal?: AbortSignal;
  /** Called once a protected blueprint has been found, before the key check. */
  onAuthorizing?: () => void;
}
