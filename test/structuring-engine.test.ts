import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  LLMUnavailableError,
  UnparsableOutputError,
} from '../src/exceptions.js';
import { ModelProviderError, ModelRateLimitError } from '../src/llm/exceptions.js';
import { StructuringEngine } from '../src/structuring/service.js';
import { FakeChatModel, rejectionOf } from './helpers.js';

const createEngine = (llm: FakeChatModel, options: { maxAttempts?: number; llmMaxRetries?: number } = {}) =>
  new StructuringEngine({
    llm,
    systemPrompt: 'You extract data.',
    maxAttempts: options.maxAttempts ?? 3,
    llmMaxRetries: options.llmMaxRetries ?? 0,
    llmRetryDelayMs: 0,
  });

describe('StructuringEngine', () => {
  it('returns the parsed candidate from the first usable reply', async () => {
    const llm = new FakeChatModel(['```json\n{"title": "Engineer"}\n```']);

    const outcome = await createEngine(llm).structure('PROMPT', { rootType: 'object' });

    expect(outcome).toEqual({
      candidate: { title: 'Engineer' },
      attempts: 1,
      raw: '```json\n{"title": "Engineer"}\n```',
    });
    expect(llm.calls[0].messages.map((message) => [message.role, message.content])).toEqual([
      ['system', 'You extract data.'],
      ['user', 'PROMPT'],
    ]);
    expect(llm.calls[0].options.jsonMode).toBe(true);
  });

  it('continues the conversation with the violations when repairing', async () => {
    const llm = new FakeChatModel(['{"title": "Engineer", "company": "Acme"}']);

    await createEngine(llm).structure('PROMPT', {
      rootType: 'object',
      repair: {
        previous: { title: 'Engineer' },
        violations: [{ path: 'company', rule: 'required', message: 'Required property is missing' }],
      },
    });

    const messages = llm.calls[0].messages;
    expect(messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[2].content).toBe('{"title":"Engineer"}');
    expect(messages[3].content).toContain('- company: Required property is missing [required]');
  });

  it('re-asks when the reply has the wrong root type', async () => {
    const llm = new FakeChatModel(['{"title": "Engineer"}', '[{"title": "Engineer"}]']);

    const outcome = await createEngine(llm).structure('PROMPT', { rootType: 'array' });

    expect(outcome.candidate).toEqual([{ title: 'Engineer' }]);
    expect(outcome.attempts).toBe(2);
    expect(llm.calls[0].options.jsonMode).toBe(false);
    expect(llm.calls[1].messages[3].content).toBe(
      'Your previous reply could not be used: it was not a valid JSON array. Return only valid JSON matching the schema, with no other text.'
    );
  });

  it('accepts any JSON value when the schema has no single root type', async () => {
    const llm = new FakeChatModel(['"just a string"']);

    const outcome = await createEngine(llm).structure('PROMPT');

    expect(outcome.candidate).toBe('just a string');
  });

  it('fails with UnparsableOutputError after the last attempt', async () => {
    const llm = new FakeChatModel(['not json']);

    const error = await rejectionOf(createEngine(llm, { maxAttempts: 1 }).structure('PROMPT'));

    expect(error).toBeInstanceOf(UnparsableOutputError);
    expect(error).toHaveProperty('message', 'Model output could not be parsed as JSON after 1 attempt(s)');
    expect(error).toHaveProperty('attempts', 1);
  });

  it('retries transient model errors within one attempt', async () => {
    const llm = new FakeChatModel([new ModelRateLimitError('slow down'), '{"a": 1}']);

    const outcome = await createEngine(llm, { llmMaxRetries: 1 }).structure('PROMPT');

    expect(outcome.attempts).toBe(1);
    expect(llm.calls).toHaveLength(2);
  });

  it('does not retry permanent model errors', async () => {
    const llm = new FakeChatModel([new ModelProviderError('bad request', 400, 'fake-model'), '{}']);

    const error = await rejectionOf(createEngine(llm, { llmMaxRetries: 2 }).structure('PROMPT'));

    expect(error).toBeInstanceOf(LLMUnavailableError);
    expect(error).toHaveProperty('message', 'Language model fake-model is unavailable: bad request');
    expect(llm.calls).toHaveLength(1);
  });

  it('stops before calling the model once cancelled', async () => {
    const llm = new FakeChatModel(['{}']);
    const controller = new AbortController();
    controller.abort();

    const error = await rejectionOf(
      createEngine(llm).structure('PROMPT', { signal: controller.signal })
    );

    expect(error).toBeInstanceOf(CancelledError);
    expect(llm.calls).toEqual([]);
  });
});
