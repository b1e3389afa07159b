/**
 * Ollama API Client
 *
 * Talks to a local or remote Ollama server through /api/generate. Streamed
 * responses arrive as newline-delimited JSON objects.
 */

import { z } from 'zod';
import type { GenerationBackend, GenerationOptions } from './base.js';
import { CancelledError, ModelError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  /** Retries for 429/503 before the stream starts */
  maxRetries?: number;
  /** Base delay for exponential back-off, in milliseconds */
  retryDelayMs?: number;
  fetch?: typeof fetch;
}

const generateChunkSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

type GenerateChunk = z.infer<typeof generateChunkSchema>;

const RETRYABLE_STATUSES = new Set([429, 503]);

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/** Wait out a back-off period, ending early with CancelledError on abort. */
function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class OllamaModel implements GenerationBackend {
  private config: Required<Omit<OllamaConfig, 'fetch'>>;
  private fetchImpl: typeof fetch;

  constructor(config: OllamaConfig) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      model: config.model,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
    };
    this.fetchImpl = config.fetch ?? fetch;
  }

  get name(): string {
    return this.config.model;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  async *generate(prompt: string, options: GenerationOptions): AsyncIterable<string> {
    const stream = options.stream ?? true;
    const response = await this.request(prompt, options, stream);

    if (!stream) {
      const chunk = this.parseChunk(await response.text());
      if (chunk.response) {
        yield chunk.response;
      }
      return;
    }

    if (!response.body) {
      throw new ModelError('Ollama returned an empty body', this.config.model);
    }

    for await (const line of this.lines(response.body, options.signal)) {
      const chunk = this.parseChunk(line);
      if (chunk.response) {
        yield chunk.response;
      }
      if (chunk.done) {
        return;
      }
    }
  }

  /**
   * Check that the server is reachable and knows the configured model
   */
  async testConnectivity(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.config.baseUrl}/api/tags`);
      if (!response.ok) {
        logger.warn(`Ollama connectivity check failed (${response.status})`);
        return false;
      }
      const parsed = z
        .object({ models: z.array(z.object({ name: z.string() })).default([]) })
        .safeParse(await response.json());
      if (!parsed.success) {
        logger.warn('Unexpected /api/tags response from Ollama');
        return false;
      }
      const known = parsed.data.models.some(m => m.name === this.config.model || m.name === `${this.config.model}:latest`);
      if (!known) {
        logger.warn(`Model ${this.config.model} is not pulled on ${this.config.baseUrl}`);
      }
      return known;
    } catch (error) {
      logger.warn(`Cannot reach Ollama at ${this.config.baseUrl}: ${errorMessage(error)}`);
      return false;
    }
  }

  private async request(prompt: string, options: GenerationOptions, stream: boolean): Promise<Response> {
    const body = JSON.stringify({
      model: this.config.model,
      prompt,
      stream,
      options: {
        num_predict: options.maxTokens,
        temperature: options.temperature,
      },
    });

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        const waitTime = Math.pow(2, attempt - 1) * this.config.retryDelayMs; // Exponential backoff
        logger.warn(`Retrying after ${waitTime}ms (attempt ${attempt + 1}/${this.config.maxRetries + 1})...`);
        await delay(waitTime, options.signal);
      }
      if (options.signal?.aborted) {
        throw new CancelledError();
      }

      let response: Response;
      try {
        logger.debug(`Ollama request: model=${this.config.model}, prompt length=${prompt.length}`);
        response = await this.fetchImpl(`${this.config.baseUrl}/api/generate`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/x-ndjson' },
          body,
          signal: options.signal,
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw new CancelledError();
        }
        throw new ModelError(
          `Failed to communicate with Ollama: ${errorMessage(error)}`,
          this.config.model
        );
      }

      if (response.ok) {
        return response;
      }

      const errorText = await response.text();
      if (RETRYABLE_STATUSES.has(response.status) && attempt < this.config.maxRetries) {
        logger.warn(`Got ${response.status} from Ollama, will retry...`);
        continue;
      }
      logger.error(`API Error Response (${response.status}):`, errorText);
      throw new ModelError(`Ollama API error (${response.status}): ${errorText}`, this.config.model, response.status);
    }
  }

  /**
   * Split the NDJSON body into non-empty lines. The body is released when
   * the consumer stops early, e.g. after the done chunk.
   */
  private async *lines(body: AsyncIterable<Uint8Array>, signal: AbortSignal | undefined): AsyncGenerator<string> {
    const iterator = body[Symbol.asyncIterator]();
    try {
      yield* this.splitLines(iterator, signal);
    } finally {
      await this.release(iterator);
    }
  }

  private async release(iterator: AsyncIterator<Uint8Array>): Promise<void> {
    try {
      await iterator.return?.();
    } catch (error) {
      logger.debug(`Could not release Ollama response body: ${errorMessage(error)}`);
    }
  }

  private async *splitLines(iterator: AsyncIterator<Uint8Array>, signal: AbortSignal | undefined): AsyncGenerator<string> {
    const decoder = new TextDecoder();
    let buffered = '';

    while (true) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) {
          throw new CancelledError();
        }
        throw new ModelError(`Ollama stream interrupted: ${errorMessage(error)}`, this.config.model);
      }
      if (next.done) {
        break;
      }

      buffered += decoder.decode(next.value, { stream: true });
      const parts = buffered.split('\n');
      buffered = parts.pop() ?? '';

      for (const part of parts) {
        const line = part.trim();
        if (line !== '') {
          yield line;
        }
      }
    }

    const rest = (buffered + decoder.decode()).trim();
    if (rest !== '') {
      yield rest;
    }
  }

  private parseChunk(line: string): GenerateChunk {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new ModelError(`Malformed chunk from Ollama: ${line.slice(0, 200)}`, this.config.model);
    }
    const parsed = generateChunkSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ModelError(`Unexpected chunk from Ollama: ${parsed.error.message}`, this.config.model);
    }
    if (parsed.data.error) {
      throw new ModelError(`Ollama error: ${parsed.data.error}`, this.config.model);
    }
    return parsed.data;
  }
}

/**
 * Factory function to create Ollama model instances
 */
export function createOllamaModel(config: OllamaConfig): OllamaModel {
  return new OllamaModel(config);
}
