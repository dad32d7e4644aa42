import {
  CancelledError,
  LLMUnavailableError,
  UnparsableOutputError,
} from '../exceptions.js';
import type { BaseChatModel } from '../llm/base.js';
import { isTransientModelError } from '../llm/exceptions.js';
import {
  AssistantMessage,
  SystemMessage,
  UserMessage,
  type Message,
} from '../llm/messages.js';
import { createLogger } from '../logging-config.js';
import {
  buildParseRepairMessage,
  buildViolationRepairMessage,
} from '../prompts/prompt-builder.js';
import { JsonParser } from '../services/json-parser.js';
import { retryAsync, throwIfAborted, truncate } from '../utils.js';
import type {
  RootType,
  StructureOptions,
  StructuringOutcome,
} from './views.js';

const logger = createLogger('structura.structuring');

export interface StructuringEngineOptions {
  llm: BaseChatModel;
  systemPrompt: string;
  /** Model invocations per call when replies do not parse (default: 3) */
  maxAttempts?: number;
  /** Retries after the first call for transient model errors (default: 2) */
  llmMaxRetries?: number;
  llmRetryDelayMs?: number;
}

const matchesRootType = (value: unknown, rootType: RootType) => {
  if (rootType === 'array') {
    return Array.isArray(value);
  }
  if (rootType === 'object') {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
  }
  return true;
};

/**
 * Turns a prompt into a parsed JSON candidate, re-asking the model when its
 * reply does not parse.
 */
export class StructuringEngine {
  private readonly llm: BaseChatModel;
  private readonly systemPrompt: string;
  private readonly maxAttempts: number;
  private readonly llmMaxRetries: number;
  private readonly llmRetryDelayMs: number;

  constructor(options: StructuringEngineOptions) {
    this.llm = options.llm;
    this.systemPrompt = options.systemPrompt;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.llmMaxRetries = Math.max(0, options.llmMaxRetries ?? 2);
    this.llmRetryDelayMs = options.llmRetryDelayMs ?? 1000;
  }

  async structure(prompt: string, options: StructureOptions = {}): Promise<StructuringOutcome> {
    const rootType = options.rootType ?? null;
    let conversation: Message[] = [
      new SystemMessage(this.systemPrompt),
      new UserMessage(prompt),
    ];
    if (options.repair) {
      conversation = [
        ...conversation,
        new AssistantMessage(JSON.stringify(options.repair.previous)),
        new UserMessage(buildViolationRepairMessage(options.repair.violations)),
      ];
    }

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      throwIfAborted(options.signal);
      options.onAttempt?.(attempt);
      const raw = await this.invoke(conversation, rootType, options.signal);
      const parsed = JsonParser.tryParseLenient(raw);
      if (parsed.success && matchesRootType(parsed.value, rootType)) {
        logger.debug(`Model reply parsed on attempt ${attempt}`);
        return { candidate: parsed.value, attempts: attempt, raw };
      }

      logger.warning(
        `Model reply ${parsed.success ? `is not a JSON ${rootType}` : 'is not valid JSON'} (attempt ${attempt}/${this.maxAttempts}): ${truncate(raw, 120)}`
      );
      conversation = [
        ...conversation,
        new AssistantMessage(raw),
        new UserMessage(buildParseRepairMessage(rootType)),
      ];
    }

    throw new UnparsableOutputError(
      `Model output could not be parsed as JSON after ${this.maxAttempts} attempt(s)`,
      this.maxAttempts
    );
  }

  private async invoke(
    messages: Message[],
    rootType: RootType,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      const response = await retryAsync(
        () =>
          this.llm.ainvoke(messages, {
            signal,
            // JSON mode forces an object, which an array schema cannot accept.
            jsonMode: rootType !== 'array',
          }),
        {
          maxAttempts: this.llmMaxRetries + 1,
          delayMs: this.llmRetryDelayMs,
          backoffMultiplier: 2,
          shouldRetry: isTransientModelError,
          onRetry: (error, attempt, nextDelayMs) =>
            logger.warning(
              `Call to ${this.llm.name} failed (attempt ${attempt}); retrying in ${Math.round(nextDelayMs)}ms`,
              error
            ),
          signal,
        }
      );
      return response.completion;
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LLMUnavailableError(`Language model ${this.llm.name} is unavailable: ${message}`, {
        cause: error,
      });
    }
  }
}
