/**
 * Durable trace store with SQLite backend
 * Holds trace events, drift events and per-agent baselines
 *
 * Reads degrade to an empty result and a warning; writes throw StorageError.
 */

import type Database from 'better-sqlite3';
import { Logger } from '../../core/logger';
import { StorageError } from '../errors';
import { BaselineStats, DriftEvent, RunStats, Severity, TraceEvent } from '../types';
import { SqliteConnectionPool } from './connection-pool';
import {
  DriftEventRow,
  TraceEventRow,
  deserializeBaseline,
  deserializeDriftEvent,
  deserializeTraceEvent,
  serializeBaseline,
  serializeDriftEvent,
  serializeTraceEvent
} from './serialization';

export interface TraceStoreConfig {
  databasePath: string;
  maxConnections?: number;
  busyTimeoutMs?: number;
}

export interface TraceQuery {
  agentId?: string;
  runId?: string;
  /** Epoch ms, inclusive */
  since?: number;
  limit?: number;
}

export interface DriftQuery {
  agentId?: string;
  since?: number;
  severity?: Severity;
  limit?: number;
}

export interface StorageStats {
  traceCount: number;
  driftCount: number;
  baselineCount: number;
}

type SqlParam = string | number;

interface RunStatsRow {
  event_count: number;
  total_tokens: number | null;
  tool_calls: number | null;
  llm_calls: number | null;
  start_time: number | null;
  end_time: number | null;
  total_duration_ms: number | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS trace_events (
    event_id TEXT PRIMARY KEY,
    agent_id TEXT NOT NULL,
    run_id TEXT NOT NULL,
    action_type TEXT NOT NULL,
    action_name TEXT NOT NULL,
    timestamp REAL NOT NULL,
    token_count INTEGER DEFAULT 0,
    input_data TEXT DEFAULT '{}',
    output_data TEXT DEFAULT '{}',
    duration_ms REAL DEFAULT 0.0,
    metadata TEXT DEFAULT '{}'
  );

  CREATE TABLE IF NOT EXISTS drift_events (
    event_id TEXT PRIMARY KEY,
    agent_id TEXT NOT NULL,
    run_id TEXT NOT NULL,
    detector TEXT NOT NULL,
    severity TEXT NOT NULL,
    score REAL NOT NULL,
    message TEXT NOT NULL,
    suggested_action TEXT NOT NULL,
    timestamp REAL NOT NULL,
    context TEXT DEFAULT '{}'
  );

  CREATE TABLE IF NOT EXISTS baselines (
    agent_id TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    updated_at REAL NOT NULL
  );
`;

const INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_traces_agent_timestamp ON trace_events(agent_id, timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_traces_run_timestamp ON trace_events(run_id, timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_drift_agent_timestamp ON drift_events(agent_id, timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_drift_severity_timestamp ON drift_events(severity, timestamp)'
];

export class TraceStore {
  private readonly pool: SqliteConnectionPool;
  private readonly logger: Logger;
  private readonly databasePath: string;

  constructor(config: TraceStoreConfig) {
    this.databasePath = config.databasePath;
    this.logger = new Logger('TraceStore');
    this.pool = new SqliteConnectionPool({
      databasePath: config.databasePath,
      maxConnections: config.maxConnections ?? 4,
      busyTimeoutMs: config.busyTimeoutMs ?? 5000
    });

    this.initializeDatabase();
  }

  get path(): string {
    return this.databasePath;
  }

  // Trace events

  async saveTrace(event: TraceEvent): Promise<void> {
    this.write('saveTrace', db => {
      const row = serializeTraceEvent(event);
      db.prepare<TraceEventRow>(`
        INSERT OR REPLACE INTO trace_events (
          event_id, agent_id, run_id, action_type, action_name, timestamp,
          token_count, input_data, output_data, duration_ms, metadata
        ) VALUES (
          @event_id, @agent_id, @run_id, @action_type, @action_name, @timestamp,
          @token_count, @input_data, @output_data, @duration_ms, @metadata
        )
      `).run(row);
    });
  }

  /**
   * Newest first
   */
  async getTraces(query: TraceQuery = {}): Promise<TraceEvent[]> {
    let sql = 'SELECT * FROM trace_events WHERE 1=1';
    const params: SqlParam[] = [];

    if (query.agentId) {
      sql += ' AND agent_id = ?';
      params.push(query.agentId);
    }
    if (query.runId) {
      sql += ' AND run_id = ?';
      params.push(query.runId);
    }
    if (query.since !== undefined) {
      sql += ' AND timestamp >= ?';
      params.push(query.since);
    }

    sql += ' ORDER BY timestamp DESC, rowid DESC LIMIT ?';
    params.push(query.limit ?? 100);

    const rows = this.read<TraceEventRow[]>('getTraces', [], db => db.prepare<SqlParam[], TraceEventRow>(sql).all(...params));
    return this.toTraceEvents(rows);
  }

  /**
   * Every trace of one run, oldest first; equal timestamps keep insertion order
   */
  async getRunTraces(agentId: string, runId: string): Promise<TraceEvent[]> {
    const rows = this.read<TraceEventRow[]>('getRunTraces', [], db =>
      db
        .prepare<[string, string], TraceEventRow>(
          'SELECT * FROM trace_events WHERE agent_id = ? AND run_id = ? ORDER BY timestamp ASC, rowid ASC'
        )
        .all(agentId, runId)
    );
    return this.toTraceEvents(rows);
  }

  /**
   * Last `window` tool-call names of a run, oldest first
   */
  async getRecentActions(agentId: string, runId: string, window = 20): Promise<string[]> {
    const rows = this.read<{ action_name: string }[]>('getRecentActions', [], db =>
      db
        .prepare<[string, string, number], { action_name: string }>(`
          SELECT action_name FROM trace_events
          WHERE agent_id = ? AND run_id = ? AND action_type = 'tool_call'
          ORDER BY timestamp DESC, rowid DESC LIMIT ?
        `)
        .all(agentId, runId, window)
    );
    return rows.map(row => row.action_name).reverse();
  }

  /**
   * Distinct run ids of an agent, most recently active first
   */
  async getRunIds(agentId: string, limit = 50): Promise<string[]> {
    const rows = this.read<{ run_id: string }[]>('getRunIds', [], db =>
      db
        .prepare<[string, number], { run_id: string }>(`
          SELECT run_id FROM trace_events
          WHERE agent_id = ?
          GROUP BY run_id
          ORDER BY MAX(timestamp) DESC, MAX(rowid) DESC
          LIMIT ?
        `)
        .all(agentId, limit)
    );
    return rows.map(row => row.run_id);
  }

  async getRunStats(agentId: string, runId: string): Promise<RunStats> {
    const row = this.read<RunStatsRow | undefined>('getRunStats', undefined, db =>
      db
        .prepare<[string, string], RunStatsRow>(`
          SELECT
            COUNT(*) AS event_count,
            SUM(token_count) AS total_tokens,
            SUM(CASE WHEN action_type = 'tool_call' THEN 1 ELSE 0 END) AS tool_calls,
            SUM(CASE WHEN action_type = 'llm_request' THEN 1 ELSE 0 END) AS llm_calls,
            MIN(timestamp) AS start_time,
            MAX(timestamp) AS end_time,
            SUM(duration_ms) AS total_duration_ms
          FROM trace_events WHERE agent_id = ? AND run_id = ?
        `)
        .get(agentId, runId)
    );

    return {
      eventCount: row?.event_count ?? 0,
      totalTokens: row?.total_tokens ?? 0,
      toolCalls: row?.tool_calls ?? 0,
      llmCalls: row?.llm_calls ?? 0,
      startTime: row?.start_time ?? 0,
      endTime: row?.end_time ?? 0,
      totalDurationMs: row?.total_duration_ms ?? 0
    };
  }

  // Drift events

  async saveDrift(event: DriftEvent): Promise<void> {
    this.write('saveDrift', db => {
      const row = serializeDriftEvent(event);
      db.prepare<DriftEventRow>(`
        INSERT OR REPLACE INTO drift_events (
          event_id, agent_id, run_id, detector, severity, score,
          message, suggested_action, timestamp, context
        ) VALUES (
          @event_id, @agent_id, @run_id, @detector, @severity, @score,
          @message, @suggested_action, @timestamp, @context
        )
      `).run(row);
    });
  }

  /**
   * Newest first
   */
  async getDriftEvents(query: DriftQuery = {}): Promise<DriftEvent[]> {
    let sql = 'SELECT * FROM drift_events WHERE 1=1';
    const params: SqlParam[] = [];

    if (query.agentId) {
      sql += ' AND agent_id = ?';
      params.push(query.agentId);
    }
    if (query.since !== undefined) {
      sql += ' AND timestamp >= ?';
      params.push(query.since);
    }
    if (query.severity) {
      sql += ' AND severity = ?';
      params.push(query.severity);
    }

    sql += ' ORDER BY timestamp DESC, rowid DESC LIMIT ?';
    params.push(query.limit ?? 50);

    const rows = this.read<DriftEventRow[]>('getDriftEvents', [], db => db.prepare<SqlParam[], DriftEventRow>(sql).all(...params));
    return rows.flatMap(row => {
      const event = deserializeDriftEvent(row);
      return event ? [event] : [];
    });
  }

  // Baselines

  async saveBaseline(baseline: BaselineStats, updatedAt: number = Date.now()): Promise<void> {
    this.write('saveBaseline', db => {
      const data = serializeBaseline(baseline);
      db.prepare<[string, string, number]>(
        'INSERT OR REPLACE INTO baselines (agent_id, data, updated_at) VALUES (?, ?, ?)'
      ).run(baseline.agentId, data, updatedAt);
    });
  }

  async getBaseline(agentId: string): Promise<BaselineStats | null> {
    const row = this.read<{ data: string } | undefined>('getBaseline', undefined, db =>
      db.prepare<[string], { data: string }>('SELECT data FROM baselines WHERE agent_id = ?').get(agentId)
    );
    return row ? deserializeBaseline(row.data, agentId) : null;
  }

  // Maintenance

  getStorageStats(): StorageStats {
    return this.read<StorageStats>('getStorageStats', { traceCount: 0, driftCount: 0, baselineCount: 0 }, db => {
      const count = (table: string): number =>
        db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

      return {
        traceCount: count('trace_events'),
        driftCount: count('drift_events'),
        baselineCount: count('baselines')
      };
    });
  }

  async close(): Promise<void> {
    this.pool.close();
  }

  // Private methods

  private initializeDatabase(): void {
    this.write('initialize', db => {
      db.exec(SCHEMA);
      INDEXES.forEach(sql => db.exec(sql));
    });
  }

  private read<T>(operation: string, fallback: T, fn: (db: Database.Database) => T): T {
    try {
      return this.pool.withConnection(fn);
    } catch (error) {
      this.logger.warn(`${operation} failed, returning empty result:`, error);
      return fallback;
    }
  }

  private write(operation: string, fn: (db: Database.Database) => void): void {
    try {
      this.pool.withConnection(fn);
    } catch (error) {
      this.logger.error(`${operation} failed:`, error);
      throw error instanceof StorageError ? error : new StorageError(operation, error);
    }
  }

  private toTraceEvents(rows: TraceEventRow[]): TraceEvent[] {
    return rows.flatMap(row => {
      const event = deserializeTraceEvent(row);
      return event ? [event] : [];
    });
  }
}
