import { z } from 'zod';
import type { BlueprintVisibility } from '../blueprints/views.js';
import { DEFAULT_SCHEMA_VERSION } from '../blueprints/views.js';
import type { ErrorKind, ExtractionError, SchemaViolation } from '../exceptions.js';

const isHttpUrl = (value: string) => {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

const TargetSchema = z.object({
  domain: z.string().trim().min(1, 'domain is required'),
  schemaVersion: z.string().trim().min(1).default(DEFAULT_SCHEMA_VERSION),
  apiKey: z.string().min(1).optional(),
});

export const ExtractionRequestSchema = TargetSchema.extend({
  url: z.string().refine(isHttpUrl, 'url must be an absolute http(s) URL'),
});

export const FileExtractionRequestSchema = TargetSchema.extend({
  filename: z.string().trim().min(1, 'filename is required'),
  content: z.union([z.string(), z.instanceof(Buffer)]),
});

export type ExtractionRequest = z.input<typeof ExtractionRequestSchema>;
export type FileExtractionRequest = z.input<typeof FileExtractionRequestSchema>;

export type ExtractionState =
  | 'ResolvingBlueprint'
  | 'Authorizing'
  | 'Extracting'
  | 'Structuring'
  | 'Validating'
  | 'Done';

export interface ExtractionDiagnostics {
  /** States visited, in order; Structuring and Validating repeat on repairs. */
  states: ExtractionState[];
  blueprintVisibility: BlueprintVisibility | null;
  markdownLength: number | null;
  truncated: boolean;
  structuringInvocations: number;
  validationRepairs: number;
  elapsedMs: number;
}

export interface ExtractionSuccess {
  success: true;
  data: unknown;
  diagnostics: ExtractionDiagnostics;
}

export interface ExtractionFailure {
  success: false;
  kind: ErrorKind;
  message: string;
  violations?: SchemaViolation[];
  error: ExtractionError;
  diagnostics: ExtractionDiagnostics;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

export interface ExtractOptions {
  signal?: AbortSignal;
}
