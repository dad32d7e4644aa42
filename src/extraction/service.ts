import type { z } from 'zod';
import type { BlueprintStore } from '../blueprints/service.js';
import type { Blueprint } from '../blueprints/views.js';
import {
  InvalidInputError,
  SchemaViolationError,
  toExtractionError,
} from '../exceptions.js';
import type { FileExtractor } from '../extractors/file.js';
import type { ContentExtractor } from '../extractors/views.js';
import { createLogger } from '../logging-config.js';
import type { PromptBuilder } from '../prompts/prompt-builder.js';
import type { StructuringEngine } from '../structuring/service.js';
import type { StructuringRepair } from '../structuring/views.js';
import { throwIfAborted } from '../utils.js';
import type { SchemaValidator } from '../validation/service.js';
import {
  ExtractionRequestSchema,
  FileExtractionRequestSchema,
  type ExtractionDiagnostics,
  type ExtractionRequest,
  type ExtractionResult,
  type ExtractionState,
  type ExtractOptions,
  type FileExtractionRequest,
} from './views.js';

const logger = createLogger('structura.extraction');

export interface ExtractionServiceOptions {
  blueprints: BlueprintStore;
  extractor: ContentExtractor;
  fileExtractor: FileExtractor;
  promptBuilder: PromptBuilder;
  engine: StructuringEngine;
  validator: SchemaValidator;
  /** Re-structuring rounds allowed after a schema violation (default: 2) */
  maxValidationRepairs?: number;
  now?: () => number;
}

interface Target {
  domain: string;
  schemaVersion: string;
  apiKey?: string;
}

type MarkdownSource = (signal?: AbortSignal) => Promise<string>;

class ExtractionRun {
  readonly diagnostics: ExtractionDiagnostics = {
    states: [],
    blueprintVisibility: null,
    markdownLength: null,
    truncated: false,
    structuringInvocations: 0,
    validationRepairs: 0,
    elapsedMs: 0,
  };
  private readonly startedAt: number;

  constructor(
    readonly label: string,
    private readonly now: () => number
  ) {
    this.startedAt = now();
  }

  enter(state: ExtractionState) {
    this.diagnostics.states.push(state);
    logger.debug(`[${this.label}] ${state}`);
  }

  finish(): ExtractionDiagnostics {
    this.diagnostics.elapsedMs = this.now() - this.startedAt;
    if (this.diagnostics.states.at(-1) !== 'Done') {
      this.enter('Done');
    }
    return this.diagnostics;
  }
}

const parseRequest = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidInputError(`Invalid extraction request: ${details}`);
  }
  return parsed.data;
};

/**
 * Runs one extraction: resolve blueprint (authorizing protected ones),
 * extract markdown, then structure and validate with bounded repairs.
 * Every outcome comes back as an ExtractionResult; nothing is thrown.
 */
export class ExtractionService {
  private readonly blueprints: BlueprintStore;
  private readonly extractor: ContentExtractor;
  private readonly fileExtractor: FileExtractor;
  private readonly promptBuilder: PromptBuilder;
  private readonly engine: StructuringEngine;
  private readonly validator: SchemaValidator;
  private readonly maxValidationRepairs: number;
  private readonly now: () => number;

  constructor(options: ExtractionServiceOptions) {
    this.blueprints = options.blueprints;
    this.extractor = options.extractor;
    this.fileExtractor = options.fileExtractor;
    this.promptBuilder = options.promptBuilder;
    this.engine = options.engine;
    this.validator = options.validator;
    this.maxValidationRepairs = Math.max(0, options.maxValidationRepairs ?? 2);
    this.now = options.now ?? Date.now;
  }

  async extract(request: ExtractionRequest, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const run = new ExtractionRun(`${request.domain} ${request.url}`, this.now);
    return this.settle(run, async () => {
      const parsed = parseRequest(ExtractionRequestSchema, request);
      return this.execute(run, parsed, (signal) => this.extractor.fetch(parsed.url, { signal }), options.signal);
    });
  }

  async extractFromFile(
    request: FileExtractionRequest,
    options: ExtractOptions = {}
  ): Promise<ExtractionResult> {
    const run = new ExtractionRun(`${request.domain} file:${request.filename}`, this.now);
    return this.settle(run, async () => {
      const parsed = parseRequest(FileExtractionRequestSchema, request);
      return this.execute(
        run,
        parsed,
        async () => this.fileExtractor.extract(parsed.filename, parsed.content),
        options.signal
      );
    });
  }

  listOpenDomains(): string[] {
    return this.blueprints.listOpenDomains();
  }

  private async settle(run: ExtractionRun, work: () => Promise<unknown>): Promise<ExtractionResult> {
    try {
      const data = await work();
      const diagnostics = run.finish();
      logger.info(
        `[${run.label}] succeeded in ${diagnostics.elapsedMs}ms (${diagnostics.structuringInvocations} model call(s), ${diagnostics.validationRepairs} repair(s))`
      );
      return { success: true, data, diagnostics };
    } catch (thrown) {
      const error = toExtractionError(thrown);
      const diagnostics = run.finish();
      if (error.kind === 'Internal') {
        logger.error(`[${run.label}] failed unexpectedly`, thrown);
      } else {
        logger.warning(`[${run.label}] failed with ${error.kind}: ${error.message}`);
      }
      return {
        success: false,
        kind: error.kind,
        message: error.message,
        ...(error instanceof SchemaViolationError ? { violations: error.violations } : {}),
        error,
        diagnostics,
      };
    }
  }

  private async execute(
    run: ExtractionRun,
    target: Target,
    loadMarkdown: MarkdownSource,
    signal?: AbortSignal
  ): Promise<unknown> {
    throwIfAborted(signal);
    run.enter('ResolvingBlueprint');
    const blueprint = await this.blueprints.resolve(
      target.domain,
      target.schemaVersion,
      target.apiKey,
      { signal, onAuthorizing: () => run.enter('Authorizing') }
    );
    run.diagnostics.blueprintVisibility = blueprint.visibility;

    throwIfAborted(signal);
    run.enter('Extracting');
    const markdown = await loadMarkdown(signal);
    run.diagnostics.markdownLength = markdown.length;
    run.diagnostics.truncated = this.promptBuilder.isTruncated(markdown);
    if (run.diagnostics.truncated) {
      logger.info(`[${run.label}] content truncated from ${markdown.length} characters`);
    }

    const prompt = this.promptBuilder.build(blueprint, markdown);
    return this.structureAndValidate(run, blueprint, prompt, signal);
  }

  private async structureAndValidate(
    run: ExtractionRun,
    blueprint: Blueprint,
    prompt: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    let repair: StructuringRepair | undefined;
    for (let round = 0; ; round++) {
      throwIfAborted(signal);
      run.enter('Structuring');
      const outcome = await this.engine.structure(prompt, {
        rootType: blueprint.rootType,
        repair,
        signal,
        onAttempt: () => {
          run.diagnostics.structuringInvocations += 1;
        },
      });

      throwIfAborted(signal);
      run.enter('Validating');
      const validation = this.validator.validate(outcome.candidate, blueprint.schema);
      if (validation.valid) {
        return validation.data;
      }

      if (round >= this.maxValidationRepairs) {
        throw new SchemaViolationError(
          this.violationMessage(blueprint, validation.violations.length, run.diagnostics.truncated),
          validation.violations
        );
      }
      run.diagnostics.validationRepairs += 1;
      logger.info(
        `[${run.label}] ${validation.violations.length} schema violation(s); repair ${round + 1}/${this.maxValidationRepairs}`
      );
      repair = { previous: outcome.candidate, violations: validation.violations };
    }
  }

  private violationMessage(blueprint: Blueprint, count: number, truncated: boolean) {
    const base = `Extracted data does not match the '${blueprint.domain}' schema (${count} violation(s))`;
    return truncated
      ? `${base}; the page content was truncated before extraction, so some fields may have been cut off`
      : base;
  }
}
