/**
 * SQLite connection pool
 * Each call context gets its own connection for the duration of the call;
 * a connection is never handed to a second caller until it has been released.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Logger } from '../../core/logger';
import { StorageError } from '../errors';

export interface ConnectionPoolConfig {
  databasePath: string;
  maxConnections: number;
  busyTimeoutMs: number;
}

export class SqliteConnectionPool {
  private readonly config: ConnectionPoolConfig;
  private readonly logger: Logger;
  private readonly idle: Database.Database[] = [];
  private readonly inUse = new Set<Database.Database>();
  private closed = false;

  constructor(config: ConnectionPoolConfig) {
    const inMemory = config.databasePath === ':memory:';
    // Every in-memory connection would be a separate database
    this.config = inMemory ? { ...config, maxConnections: 1 } : config;
    this.logger = new Logger('SqliteConnectionPool');

    if (!inMemory) {
      mkdirSync(dirname(config.databasePath), { recursive: true });
    }
  }

  get size(): number {
    return this.idle.length + this.inUse.size;
  }

  get activeCount(): number {
    return this.inUse.size;
  }

  /**
   * Run `fn` with a connection that no other caller holds; the connection
   * is returned to the pool afterwards, also when `fn` throws.
   */
  withConnection<T>(fn: (db: Database.Database) => T): T {
    const db = this.acquire();
    try {
      return fn(db);
    } finally {
      this.release(db);
    }
  }

  acquire(): Database.Database {
    if (this.closed) {
      throw new StorageError('acquire', new Error('Connection pool is closed'));
    }

    const db = this.idle.pop() ?? this.open();
    this.inUse.add(db);
    return db;
  }

  release(db: Database.Database): void {
    if (!this.inUse.delete(db)) return;

    if (this.closed) {
      db.close();
      return;
    }
    this.idle.push(db);
  }

  close(): void {
    this.closed = true;
    for (const db of this.idle.splice(0)) {
      db.close();
    }
    // Connections still held are closed on release
  }

  private open(): Database.Database {
    if (this.size >= this.config.maxConnections) {
      throw new StorageError(
        'acquire',
        new Error(`Connection pool exhausted (${this.config.maxConnections} connections in use)`)
      );
    }

    try {
      const db = new Database(this.config.databasePath, { timeout: this.config.busyTimeoutMs });

      // WAL keeps readers from blocking on an in-progress writer
      db.exec('PRAGMA journal_mode = WAL');
      db.exec('PRAGMA synchronous = NORMAL');
      db.exec('PRAGMA temp_store = MEMORY');

      this.logger.debug(`Opened connection ${this.size + 1}/${this.config.maxConnections} to ${this.config.databasePath}`);
      return db;
    } catch (error) {
      throw new StorageError('open', error);
    }
  }
}
