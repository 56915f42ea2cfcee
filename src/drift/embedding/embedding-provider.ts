/**
 * Embedding capability used by goal-drift detection
 * Given text, return a fixed-length vector
 */

import { Logger } from '../../core/logger';
import { errorMessage } from '../../utils/helpers';
import { EmbeddingError } from '../errors';

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  dispose?(): void | Promise<void>;
}

export type EmbeddingProviderFactory = () => EmbeddingProvider | Promise<EmbeddingProvider>;

/**
 * Builds the wrapped backend on first use and reuses it afterwards.
 * `reset()` tears the backend down so the next call constructs a fresh one.
 */
export class LazyEmbeddingProvider implements EmbeddingProvider {
  private readonly factory: EmbeddingProviderFactory;
  private readonly logger = new Logger('LazyEmbeddingProvider');
  private pending?: Promise<EmbeddingProvider>;

  constructor(factory: EmbeddingProviderFactory) {
    this.factory = factory;
  }

  get isLoaded(): boolean {
    return this.pending !== undefined;
  }

  async embed(text: string): Promise<number[]> {
    const provider = await this.load();
    try {
      return await provider.embed(text);
    } catch (error) {
      throw error instanceof EmbeddingError
        ? error
        : new EmbeddingError(`Embedding failed: ${errorMessage(error)}`, error);
    }
  }

  async reset(): Promise<void> {
    const pending = this.pending;
    this.pending = undefined;
    if (!pending) return;

    const provider = await pending.catch(() => undefined);
    await provider?.dispose?.();
  }

  async dispose(): Promise<void> {
    await this.reset();
  }

  private load(): Promise<EmbeddingProvider> {
    if (this.pending) return this.pending;

    const load: Promise<EmbeddingProvider> = Promise.resolve()
      .then(() => this.factory())
      .then(provider => {
        this.logger.info('Embedding backend loaded');
        return provider;
      })
      .catch((error: unknown) => {
        // A reset() may already have replaced this load
        if (this.pending === load) this.pending = undefined;
        throw new EmbeddingError(`Failed to load embedding backend: ${errorMessage(error)}`, error);
      });
    this.pending = load;
    return load;
  }
}

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Model-free bag-of-words embedder: each lowercase word is hashed into one
 * of `dimensions` buckets. Texts sharing vocabulary score high.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;

  constructor(dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new EmbeddingError(`Embedding dimensions must be a positive integer, got ${dimensions}`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    return vector;
  }
}

/**
 * dot(a, b) / (|a| * |b|); 0 when either vector is all zeros
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const norm = Math.sqrt(normA) * Math.sqrt(normB);
  return norm === 0 ? 0 : dot / norm;
}
