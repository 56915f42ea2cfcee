import { beforeAll, describe, expect, it, jest } from '@jest/globals';
import { Logger } from '../../../core/logger';
import { EmbeddingError } from '../../errors';
import {
  EmbeddingProvider,
  HashingEmbeddingProvider,
  LazyEmbeddingProvider,
  cosineSimilarity
} from '../embedding-provider';

describe('cosineSimilarity', () => {
  it('should measure the angle between vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([1, 1], [-1, -1])).toBeCloseTo(-1, 10);
  });

  it('should return 0 for a zero vector and reject mismatched lengths', () => {
    expect(cosineSimilarity([0, 0], [1, 2])).toBe(0);
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(EmbeddingError);
  });
});

describe('HashingEmbeddingProvider', () => {
  const provider = new HashingEmbeddingProvider(64);

  it('should produce fixed-length vectors', async () => {
    const vector = await provider.embed('Quarterly revenue grew');
    expect(vector).toHaveLength(64);
    expect(vector.reduce((sum, value) => sum + value, 0)).toBe(3);
  });

  it('should score identical vocabulary as identical regardless of case and punctuation', async () => {
    const a = await provider.embed('Revenue, revenue: report!');
    const b = await provider.embed('report revenue REVENUE');
    expect(cosineSimilarity(a, b)).toBeCloseTo(1, 10);
  });

  it('should embed empty text as the zero vector', async () => {
    expect(await provider.embed('   ')).toEqual(new Array(64).fill(0));
  });

  it('should reject invalid dimensions', () => {
    expect(() => new HashingEmbeddingProvider(0)).toThrow(EmbeddingError);
  });
});

describe('LazyEmbeddingProvider', () => {
  beforeAll(() => {
    Logger.setLevel('error');
  });

  function backend(): EmbeddingProvider & { dispose: jest.Mock<() => void> } {
    return {
      embed: async text => [text.length],
      dispose: jest.fn<() => void>()
    };
  }

  it('should build the backend once on first use', async () => {
    const instance = backend();
    const factory = jest.fn(() => instance);
    const lazy = new LazyEmbeddingProvider(factory);

    expect(lazy.isLoaded).toBe(false);
    expect(factory).not.toHaveBeenCalled();

    const [first, second] = await Promise.all([lazy.embed('abc'), lazy.embed('abcd')]);

    expect(first).toEqual([3]);
    expect(second).toEqual([4]);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(lazy.isLoaded).toBe(true);
  });

  it('should retry loading after a failed factory call', async () => {
    const factory = jest
      .fn<() => EmbeddingProvider>()
      .mockImplementationOnce(() => {
        throw new Error('model missing');
      })
      .mockImplementation(backend);
    const lazy = new LazyEmbeddingProvider(factory);

    await expect(lazy.embed('x')).rejects.toThrow('Failed to load embedding backend: model missing');
    await expect(lazy.embed('xy')).resolves.toEqual([2]);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('should wrap backend errors in EmbeddingError', async () => {
    const lazy = new LazyEmbeddingProvider(() => ({
      embed: async () => {
        throw new Error('tokenizer crashed');
      }
    }));

    await expect(lazy.embed('x')).rejects.toBeInstanceOf(EmbeddingError);
  });

  it('should dispose the backend on reset and rebuild it on next use', async () => {
    const instances: ReturnType<typeof backend>[] = [];
    const lazy = new LazyEmbeddingProvider(() => {
      const instance = backend();
      instances.push(instance);
      return instance;
    });

    await lazy.embed('x');
    await lazy.reset();

    expect(lazy.isLoaded).toBe(false);
    expect(instances[0].dispose).toHaveBeenCalledTimes(1);

    await lazy.embed('y');
    expect(instances).toHaveLength(2);
  });

  it('should keep a newer backend when a load started before reset fails', async () => {
    let rejectFirst: (error: Error) => void = () => undefined;
    const factory = jest
      .fn<() => Promise<EmbeddingProvider>>()
      .mockImplementationOnce(
        () =>
          new Promise<EmbeddingProvider>((_, reject) => {
            rejectFirst = reject;
          })
      )
      .mockImplementation(async () => backend());
    const lazy = new LazyEmbeddingProvider(factory);

    const stale = lazy.embed('x');
    await Promise.resolve();
    const resetting = lazy.reset();
    await expect(lazy.embed('xy')).resolves.toEqual([2]);

    rejectFirst(new Error('model missing'));
    await expect(stale).rejects.toBeInstanceOf(EmbeddingError);
    await resetting;

    expect(lazy.isLoaded).toBe(true);
    await expect(lazy.embed('xyz')).resolves.toEqual([3]);
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
