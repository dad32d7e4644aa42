export type ErrorKind =
  | 'NotFound'
  | 'Unauthenticated'
  | 'Forbidden'
  | 'InvalidInput'
  | 'FetchFailed'
  | 'LLMUnavailable'
  | 'UnparsableOutput'
  | 'SchemaViolation'
  | 'StoreUnavailable'
  | 'Cancelled'
  | 'Internal';

/** A single way a candidate document fails its schema. */
export interface SchemaViolation {
  /** Dotted path to the offending value; empty for the document root. */
  path: string;
  /** JSON Schema keyword that was violated, e.g. `required` or `type`. */
  rule: string;
  message: string;
}

export class ExtractionError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export class BlueprintNotFoundError extends ExtractionError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'BlueprintNotFoundError';
  }
}

export class UnauthenticatedError extends ExtractionError {
  constructor(message: string) {
    super('Unauthenticated', message);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends ExtractionError {
  constructor(message: string) {
    super('Forbidden', message);
    this.name = 'ForbiddenError';
  }
}

export class InvalidInputError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InvalidInput', message, options);
    this.name = 'InvalidInputError';
  }
}

export class FetchFailedError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FetchFailed', message, options);
    this.name = 'FetchFailedError';
  }
}

export class LLMUnavailableError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LLMUnavailable', message, options);
    this.name = 'LLMUnavailableError';
  }
}

export class UnparsableOutputError extends ExtractionError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super('UnparsableOutput', message, options);
    this.name = 'UnparsableOutputError';
  }
}

export class SchemaViolationError extends ExtractionError {
  constructor(
    message: string,
    public readonly violations: SchemaViolation[]
  ) {
    super('SchemaViolation', message);
    this.name = 'SchemaViolationError';
  }
}

export class StoreUnavailableError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('StoreUnavailable', message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class CancelledError extends ExtractionError {
  constructor(message = 'Extraction was cancelled') {
    super('Cancelled', message);
    this.name = 'CancelledError';
  }
}

export const isExtractionError = (error: unknown): error is ExtractionError =>
  error instanceof ExtractionError;

/** Wrap anything thrown into an ExtractionError, keeping typed errors as-is. */
export const toExtractionError = (error: unknown): ExtractionError => {
  if (isExtractionError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExtractionError('Internal', message, { cause: error });
};
