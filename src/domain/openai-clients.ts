/**
 * OpenAI-backed embedding and chat providers
 *
 * Both clients are stateless wrappers around one shared OpenAI client; the SDK's own
 * retries are disabled so the caller's deadline is the only one that applies.
 */

import OpenAI from 'openai';
import { logger } from './logger.js';

/**
 * Turns text into vectors. Must be deterministic for identical input.
 */
export interface EmbeddingProvider {
  readonly name: string;
  encode(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface LlmRequest {
  system: string;
  prompt: string;
}

/**
 * Completes a prompt and returns the raw text of the answer
 */
export interface LlmProvider {
  readonly name: string;
  complete(request: LlmRequest, signal?: AbortSignal): Promise<string>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

/**
 * Create the shared OpenAI client
 */
export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  logger.info('OpenAI client initialized', {
    baseUrl: options.baseUrl ?? 'default',
    timeoutMs: options.timeoutMs,
  });

  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}

export class OpenAIEmbeddingClient implements EmbeddingProvider {
  readonly name = 'openai-embeddings';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly batchSize: number;

  /**
   * @param batchSize - Inputs per request (the API accepts up to 2048)
   */
  constructor(client: OpenAI, model: string, batchSize = 256) {
    this.client = client;
    this.model = model;
    this.batchSize = batchSize;
  }

  async encode(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const response = await this.client.embeddings.create(
        { model: this.model, input: batch },
        { signal, maxRetries: 0 }
      );

      // The API may return items out of order
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) {
        vectors.push(item.embedding);
      }
    }

    return vectors;
  }
}

export class OpenAIChatClient implements LlmProvider {
  readonly name = 'openai-chat';
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(client: OpenAI, model: string) {
    this.client = client;
    this.model = model;
  }

  async complete(request: LlmRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        response_format: { type: 'json_object' },
        temperature: 0.1,
        max_tokens: 200,
      },
      { signal, maxRetries: 0 }
    );

    return response.choices[0]?.message.content ?? '';
  }
}
