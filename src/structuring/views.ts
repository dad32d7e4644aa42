import type { SchemaViolation } from '../exceptions.js';

export type RootType = 'object' | 'array' | null;

/** Feedback for a candidate that parsed but failed schema validation. */
export interface StructuringRepair {
  previous: unknown;
  violations: SchemaViolation[];
}

export interface StructureOptions {
  rootType?: RootType;
  repair?: StructuringRepair;
  signal?: AbortSignal;
  /** Called before each model invocation, whether or not it succeeds. */
  onAttempt?: (attempt: number) => void;
}

export interface StructuringOutcome {
  candidate: unknown;
  /** Model invocations spent on this call, parse repairs included. */
  attempts: number;
  raw: string;
}
