import { beforeEach, describe, expect, it, vi } from 'vitest';

const openaiCreateMock = vi.fn();
const openaiConstructorMock = vi.fn();

vi.mock('openai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('openai')>();
  class OpenAI {
    chat = {
      completions: {
        create: openaiCreateMock,
      },
    };

    constructor(options: unknown) {
      openaiConstructorMock(options);
    }
  }
  return { ...actual, default: OpenAI };
});

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai';
import { CancelledError } from '../src/exceptions.js';
import {
  ModelProviderError,
  ModelRateLimitError,
  ModelTimeoutError,
  isTransientModelError,
} from '../src/llm/exceptions.js';
import { AssistantMessage, SystemMessage, UserMessage } from '../src/llm/messages.js';
import { ChatOpenAI } from '../src/llm/openai/chat.js';
import { rejectionOf } from './helpers.js';

const buildResponse = (content: string | null) => ({
  choices: [{ message: { content } }],
  usage: {
    prompt_tokens: 10,
    completion_tokens: 5,
    total_tokens: 15,
  },
});

describe('ChatOpenAI', () => {
  beforeEach(() => {
    openaiCreateMock.mockReset();
    openaiConstructorMock.mockReset();
    openaiCreateMock.mockResolvedValue(buildResponse('{"ok": true}'));
  });

  it('configures the client without its own retries', () => {
    new ChatOpenAI({ apiKey: 'test-secret', baseUrl: 'http://localhost:11434/v1', timeoutMs: 5000 });

    expect(openaiConstructorMock).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:11434/v1',
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it('sends the conversation with the configured model and temperature', async () => {
    const llm = new ChatOpenAI({ apiKey: 'test-secret' });
    const controller = new AbortController();

    const response = await llm.ainvoke(
      [new SystemMessage('rules'), new UserMessage('page'), new AssistantMessage('{}')],
      { jsonMode: true, signal: controller.signal }
    );

    expect(response.completion).toBe('{"ok": true}');
    expect(response.usage).toEqual({ prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 });
    const [request, requestOptions] = openaiCreateMock.mock.calls[0] ?? [];
    expect(request).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'page' },
        { role: 'assistant', content: '{}' },
      ],
      temperature: 0.3,
      response_format: { type: 'json_object' },
    });
    expect(requestOptions).toEqual({ signal: controller.signal, timeout: 60000 });
  });

  it('leaves response_format unset outside JSON mode', async () => {
    const llm = new ChatOpenAI({ apiKey: 'test-secret', model: 'gpt-4o', temperature: 0 });

    await llm.ainvoke([new UserMessage('page')]);

    const request = openaiCreateMock.mock.calls[0]?.[0] ?? {};
    expect(request.response_format).toBeUndefined();
    expect(request.model).toBe('gpt-4o');
    expect(request.temperature).toBe(0);
  });

  it('returns an empty completion when the model sends no content', async () => {
    openaiCreateMock.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const llm = new ChatOpenAI({ apiKey: 'test-secret' });

    const response = await llm.ainvoke([new UserMessage('page')]);

    expect(response.completion).toBe('');
    expect(response.usage).toBeNull();
  });

  it('reports its provider and name', () => {
    const llm = new ChatOpenAI({ apiKey: 'test-secret', provider: 'custom', model: 'llama3' });
    expect(llm.provider).toBe('custom');
    expect(llm.name).toBe('llama3');
  });

  describe('error mapping', () => {
    const invokeRejectingWith = async (error: unknown) => {
      openaiCreateMock.mockRejectedValue(error);
      return rejectionOf(new ChatOpenAI({ apiKey: 'test-secret' }).ainvoke([new UserMessage('x')]));
    };

    it('maps an aborted request to CancelledError', async () => {
      expect(await invokeRejectingWith(new APIUserAbortError())).toBeInstanceOf(CancelledError);
    });

    it('maps a timeout to a transient ModelTimeoutError', async () => {
      const error = await invokeRejectingWith(new APIConnectionTimeoutError());

      expect(error).toBeInstanceOf(ModelTimeoutError);
      expect(error).toHaveProperty('message', 'Request to gpt-4o-mini timed out after 60000ms');
      expect(isTransientModelError(error)).toBe(true);
    });

    it('maps a connection failure to a 503 provider error', async () => {
      const error = await invokeRejectingWith(
        new APIConnectionError({ message: 'Connection error.' })
      );

      expect(error).toBeInstanceOf(ModelProviderError);
      expect(error).toHaveProperty('statusCode', 503);
    });

    it('maps rate limiting to ModelRateLimitError', async () => {
      const error = await invokeRejectingWith(
        new RateLimitError(429, undefined, 'Too many requests', undefined)
      );

      expect(error).toBeInstanceOf(ModelRateLimitError);
      expect(isTransientModelError(error)).toBe(true);
    });

    it('keeps the status of other API errors', async () => {
      const badRequest = await invokeRejectingWith(
        new APIError(400, undefined, 'Invalid model', undefined)
      );
      expect(badRequest).toHaveProperty('statusCode', 400);
      expect(isTransientModelError(badRequest)).toBe(false);

      const serverError = await invokeRejectingWith(
        new APIError(500, undefined, 'Server error', undefined)
      );
      expect(isTransientModelError(serverError)).toBe(true);
    });
  });
});
