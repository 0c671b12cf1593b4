/**
 * Chat model adapters.
 *
 * GroqChatModel talks to the Groq API; MockChatModel returns canned
 * answers for local runs without an API key (ai.useMock).
 */
import Groq from 'groq-sdk';
import { ConfigurationError, LlmResponseError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { AIConfig } from '../lib/config.js';
import { TITLE_MARKER } from './prompts.js';

const log = createLogger('ai');

export interface CompletionOptions {
  temperature?: number;
}

export interface ChatModel {
  readonly name: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * The slice of the Groq client this module calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        messages: Array<{ role: 'user'; content: string }>;
        model: string;
        temperature?: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export class GroqChatModel implements ChatModel {
  private readonly client: ChatCompletionsClient;

  constructor(
    readonly name: string,
    apiKey: string,
    client?: ChatCompletionsClient
  ) {
    this.client = client ?? new Groq({ apiKey });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    log.debug(`Sending request to Groq (${this.name})`, { promptLength: prompt.length });

    const completion = await this.client.chat.completions.create({
      messages: [{ role: 'user', content: prompt }],
      model: this.name,
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new LlmResponseError('no-json', 'The model returned an empty response.');
    }
    return content;
  }
}

export class MockChatModel implements ChatModel {
  readonly name = 'mock';

  async complete(prompt: string): Promise<string> {
    const titleLine = prompt.split('\n').find((line) => line.startsWith(TITLE_MARKER));
    if (titleLine) {
      const title = titleLine.slice(TITLE_MARKER.length).trim();
      return JSON.stringify({
        summary: {
          title,
          section_text: `- ${title} was in the news today.\n- Details are mocked.\n- No model was called.`,
        },
      });
    }

    return JSON.stringify({
      fact: 'Octopuses have three hearts, and two of them stop beating while they swim.',
    });
  }
}

export function createChatModel(config: AIConfig): ChatModel {
  if (config.useMock) {
    log.warn('Using mock AI responses');
    return new MockChatModel();
  }
  if (!config.apiKey) {
    throw new ConfigurationError('GROQ_API_KEY is required unless ai.useMock is set');
  }
  return new GroqChatModel(config.model, config.apiKey);
}
