/**
 * OpenAI-compatible chat completion client for SQL generation.
 * Any endpoint speaking the OpenAI API (Groq, a local gateway) works through
 * `baseURL`.
 */

import OpenAI from 'openai';
import type { GenerationContext } from '../context/types.js';
import { buildMessages } from './prompt.js';
import type { ChatMessage, SqlGenerator } from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/** Returns the first choice's content, or null/undefined when there is none. */
export type CompletionFn = (request: CompletionRequest) => Promise<string | null | undefined>;

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  maxTokens?: number;
  /** Replaces the HTTP client; used by tests */
  complete?: CompletionFn;
}

function clientCompletion(apiKey: string | undefined, baseURL: string | undefined): CompletionFn {
  if (!apiKey) {
    throw new Error('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell or .env file.');
  }
  const client = new OpenAI({ apiKey, baseURL });

  return async (request) => {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { signal: request.signal },
    );
    return response.choices[0]?.message?.content;
  };
}

export class OpenAIProvider implements SqlGenerator {
  readonly model: string;
  private readonly maxTokens: number;
  private readonly complete: CompletionFn;

  constructor(options: OpenAIProviderOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 4000;
    this.complete = options.complete ?? clientCompletion(options.apiKey, options.baseURL);
  }

  async generate(
    schemaDescription: string,
    recentContext: GenerationContext,
    userQuery: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const messages = buildMessages({ schemaDescription, context: recentContext, userQuery });

    const content = await this.complete({
      model: this.model,
      messages,
      temperature: 0.1,
      maxTokens: this.maxTokens,
      signal,
    });

    const text = content?.trim();
    if (!text) {
      throw new Error('OpenAI returned empty response.');
    }
    return text;
  }
}
