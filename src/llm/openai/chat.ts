import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai';
import { CancelledError } from '../../exceptions.js';
import type { BaseChatModel, ChatInvokeOptions } from '../base.js';
import {
  ModelProviderError,
  ModelRateLimitError,
  ModelTimeoutError,
} from '../exceptions.js';
import type { Message } from '../messages.js';
import { ChatInvokeCompletion } from '../views.js';
import { OpenAIMessageSerializer } from './serializer.js';

export interface ChatOpenAIOptions {
  model?: string;
  /** Reported provider name; 'custom' for other OpenAI-compatible servers. */
  provider?: string;
  apiKey?: string;
  /** OpenAI-compatible endpoint; the public API when omitted. */
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
}

export class ChatOpenAI implements BaseChatModel {
  public model: string;
  public provider: string;
  private client: OpenAI;
  private temperature: number;
  private timeoutMs: number;
  private serializer = new OpenAIMessageSerializer();

  constructor(options: ChatOpenAIOptions = {}) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.provider = options.provider ?? 'openai';
    this.temperature = options.temperature ?? 0.3;
    this.timeoutMs = options.timeoutMs ?? 60000;
    // Retries are owned by the caller so they share one backoff policy.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  get name(): string {
    return this.model;
  }

  async ainvoke(
    messages: Message[],
    options: ChatInvokeOptions = {}
  ): Promise<ChatInvokeCompletion<string>> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: this.serializer.serialize(messages),
          temperature: this.temperature,
          response_format: options.jsonMode ? { type: 'json_object' } : undefined,
        },
        { signal: options.signal, timeout: this.timeoutMs }
      );

      const content = response.choices[0]?.message.content ?? '';
      return new ChatInvokeCompletion(
        content,
        response.usage
          ? {
              prompt_tokens: response.usage.prompt_tokens,
              completion_tokens: response.usage.completion_tokens,
              total_tokens: response.usage.total_tokens,
            }
          : null
      );
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapError(error: unknown): Error {
    if (error instanceof APIUserAbortError) {
      return new CancelledError();
    }
    if (error instanceof APIConnectionTimeoutError) {
      return new ModelTimeoutError(
        `Request to ${this.model} timed out after ${this.timeoutMs}ms`,
        this.model
      );
    }
    if (error instanceof APIConnectionError) {
      return new ModelProviderError(error.message, 503, this.model);
    }
    if (error instanceof RateLimitError) {
      return new ModelRateLimitError(error.message, 429, this.model);
    }
    if (error instanceof APIError) {
      return new ModelProviderError(error.message, error.status ?? 502, this.model);
    }
    if (error instanceof Error) {
      return error;
    }
    return new ModelProviderError(String(error), 502, this.model);
  }
}
