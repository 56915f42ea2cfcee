/**
 * Model-backed embedding providers
 *
 * The OpenAI and Ollama SDKs are imported on first use, so a monitor running
 * on the hashing embedder never loads either of them.
 */

import { Logger } from '../../core/logger';
import { errorMessage } from '../../utils/helpers';
import type { EmbeddingConfig } from '../config';
import { EmbeddingError } from '../errors';
import { EmbeddingProvider, HashingEmbeddingProvider } from './embedding-provider';

export const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small';
export const DEFAULT_OLLAMA_MODEL = 'nomic-embed-text';
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/** The part of the OpenAI client the provider calls */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

/** The part of the Ollama client the provider calls */
export interface OllamaEmbeddingsClient {
  embed(request: { model: string; input: string }): Promise<{ embeddings: number[][] }>;
}

async function importOptional<T>(packageName: string, load: () => Promise<T>): Promise<T> {
  try {
    return await load();
  } catch (error) {
    throw new EmbeddingError(
      `${packageName} package could not be loaded (${errorMessage(error)}). Install it: npm install ${packageName}`,
      error
    );
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  /** Requested vector size; the model's native size when omitted */
  dimensions?: number;
  timeoutMs?: number;
  client?: OpenAIEmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;

  private readonly options: OpenAIEmbeddingOptions;
  private client?: Promise<OpenAIEmbeddingsClient>;

  constructor(options: OpenAIEmbeddingOptions) {
    this.options = options;
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    if (options.client) {
      this.client = Promise.resolve(options.client);
    }
  }

  async embed(text: string): Promise<number[]> {
    const client = await this.ensureClient();

    let response: { data: Array<{ embedding: number[] }> };
    try {
      response = await client.embeddings.create({
        model: this.model,
        input: [text],
        ...(this.options.dimensions !== undefined ? { dimensions: this.options.dimensions } : {})
      });
    } catch (error) {
      throw new EmbeddingError(`OpenAI embedding failed: ${errorMessage(error)}`, error);
    }

    const [first] = response.data;
    if (!first) {
      throw new EmbeddingError('OpenAI returned no embedding');
    }
    return first.embedding;
  }

  private ensureClient(): Promise<OpenAIEmbeddingsClient> {
    if (!this.client) {
      const { apiKey, baseUrl, timeoutMs } = this.options;
      const client: Promise<OpenAIEmbeddingsClient> = importOptional('openai', () => import('openai'))
        .then(({ OpenAI }) => new OpenAI({ apiKey, baseURL: baseUrl, timeout: timeoutMs }))
        .catch((error: unknown) => {
          if (this.client === client) this.client = undefined;
          throw error;
        });
      this.client = client;
    }
    return this.client;
  }
}

export interface OllamaEmbeddingOptions {
  host?: string;
  model?: string;
  client?: OllamaEmbeddingsClient;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly host: string;
  readonly model: string;

  private client?: Promise<OllamaEmbeddingsClient>;

  constructor(options: OllamaEmbeddingOptions = {}) {
    this.host = options.host ?? DEFAULT_OLLAMA_HOST;
    this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
    if (options.client) {
      this.client = Promise.resolve(options.client);
    }
  }

  async embed(text: string): Promise<number[]> {
    const client = await this.ensureClient();

    let response: { embeddings: number[][] };
    try {
      response = await client.embed({ model: this.model, input: text });
    } catch (error) {
      throw new EmbeddingError(`Ollama embedding failed: ${errorMessage(error)}`, error);
    }

    const [first] = response.embeddings;
    if (!first) {
      throw new EmbeddingError('Ollama returned no embedding');
    }
    return first;
  }

  private ensureClient(): Promise<OllamaEmbeddingsClient> {
    if (!this.client) {
      const host = this.host;
      const client: Promise<OllamaEmbeddingsClient> = importOptional('ollama', () => import('ollama'))
        .then(({ Ollama }) => new Ollama({ host }))
        .catch((error: unknown) => {
          if (this.client === client) this.client = undefined;
          throw error;
        });
      this.client = client;
    }
    return this.client;
  }
}

const logger = new Logger('EmbeddingFactory');

/**
 * Build the configured backend. `openai` without an API key falls back to
 * the hashing embedder with a warning.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'openai':
      if (!config.apiKey) {
        logger.warn('No OpenAI API key configured, using the hashing embedder');
        return new HashingEmbeddingProvider(config.dimensions);
      }
      return new OpenAIEmbeddingProvider({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        model: config.model,
        dimensions: config.dimensions,
        timeoutMs: config.timeoutMs
      });
    case 'ollama':
      return new OllamaEmbeddingProvider({ host: config.baseUrl, model: config.model });
    case 'hashing':
      return new HashingEmbeddingProvider(config.dimensions);
  }
}
