import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, LlmResponseError } from '../lib/errors.js';
import { createChatModel, GroqChatModel, MockChatModel, type ChatCompletionsClient } from './chat-model.js';
import { buildFactPrompt, buildSummaryPrompt } from './prompts.js';

function fakeClient(content: string | null) {
  const create = vi.fn(async () => ({ choices: [{ message: { content } }] }));
  const client: ChatCompletionsClient = { chat: { completions: { create } } };
  return { client, create };
}

describe('GroqChatModel', () => {
  it('sends one user message with the model and temperature', async () => {
    const { client, create } = fakeClient('hello');
    const model = new GroqChatModel('test-model', 'test-groq-key', client);

    await expect(model.complete('hi', { temperature: 1.5 })).resolves.toBe('hello');
    expect(create).toHaveBeenCalledWith({
      messages: [{ role: 'user', content: 'hi' }],
      model: 'test-model',
      temperature: 1.5,
    });
  });

  it('leaves the temperature to the provider when not given', async () => {
    const { client, create } = fakeClient('hello');

    await new GroqChatModel('test-model', 'test-groq-key', client).complete('hi');

    expect(create).toHaveBeenCalledWith({ messages: [{ role: 'user', content: 'hi' }], model: 'test-model' });
  });

  it('rejects an empty reply', async () => {
    const { client } = fakeClient(null);

    await expect(new GroqChatModel('test-model', 'test-groq-key', client).complete('hi')).rejects.toBeInstanceOf(
      LlmResponseError
    );
  });
});

describe('MockChatModel', () => {
  const model = new MockChatModel();

  it('answers summary prompts with the event title', async () => {
    const reply = JSON.parse(await model.complete(buildSummaryPrompt('Glacier Survey', 'text')));

    expect(reply.summary.title).toBe('Glacier Survey');
  });

  it('answers the fact prompt with a fact', async () => {
    const reply = JSON.parse(await model.complete(buildFactPrompt()));

    expect(typeof reply.fact).toBe('string');
  });
});

describe('createChatModel', () => {
  const base = { model: 'test-model', factTemperature: 1.5, useMock: false };

  it('requires an API key for the real model', () => {
    expect(() => createChatModel(base)).toThrow(ConfigurationError);
  });

  it('uses the mock when asked', () => {
    expect(createChatModel({ ...base, useMock: true })).toBeInstanceOf(MockChatModel);
  });

  it('builds a Groq model with the configured name', () => {
    expect(createChatModel({ ...base, apiKey: 'test-groq-key' }).name).toBe('test-model');
  });
});
