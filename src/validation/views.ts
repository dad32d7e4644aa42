import type { SchemaViolation } from '../exceptions.js';

export type ValidationOutcome =
  | { valid: true; data: unknown }
  | { valid: false; violations: SchemaViolation[] };
