import { describe, expect, it } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StorageError } from '../../errors';
import { SqliteConnectionPool } from '../connection-pool';

describe('SqliteConnectionPool', () => {
  it('should hand out distinct connections and reuse released ones', () => {
    const dir = mkdtempSync(join(tmpdir(), 'drift-pool-'));
    const pool = new SqliteConnectionPool({
      databasePath: join(dir, 'nested', 'pool.db'),
      maxConnections: 2,
      busyTimeoutMs: 100
    });

    try {
      const first = pool.acquire();
      const second = pool.acquire();
      expect(first).not.toBe(second);
      expect(pool.activeCount).toBe(2);
      expect(() => pool.acquire()).toThrow(StorageError);

      pool.release(first);
      expect(pool.acquire()).toBe(first);
      pool.release(first);
      pool.release(second);

      expect(pool.withConnection(db => db.pragma('journal_mode', { simple: true }))).toBe('wal');
      expect(pool.activeCount).toBe(0);
      expect(pool.size).toBe(2);
    } finally {
      pool.close();
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should release the connection when the callback throws', () => {
    const pool = new SqliteConnectionPool({ databasePath: ':memory:', maxConnections: 4, busyTimeoutMs: 100 });

    expect(() =>
      pool.withConnection(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(pool.activeCount).toBe(0);

    pool.close();
    expect(() => pool.acquire()).toThrow(StorageError);
  });

  it('should limit an in-memory database to one connection', () => {
    const pool = new SqliteConnectionPool({ databasePath: ':memory:', maxConnections: 4, busyTimeoutMs: 100 });
    const db = pool.acquire();

    expect(() => pool.acquire()).toThrow(StorageError);
    pool.close();
    pool.release(db);
    expect(db.open).toBe(false);
  });
});
