/**
 * Row encoding for persisted trace and drift events
 * Structured payloads are stored as JSON text; malformed text decodes to `{}`
 */

import { z } from 'zod';
import { Logger } from '../../core/logger';
import { isPlainObject } from '../../utils/helpers';
import {
  BaselineStats,
  DriftEvent,
  Payload,
  TraceEvent,
  isActionType,
  isDetectorType,
  isSeverity
} from '../types';

export interface TraceEventRow {
  event_id: string;
  agent_id: string;
  run_id: string;
  action_type: string;
  action_name: string;
  timestamp: number;
  token_count: number;
  input_data: string;
  output_data: string;
  duration_ms: number;
  metadata: string;
}

export interface DriftEventRow {
  event_id: string;
  agent_id: string;
  run_id: string;
  detector: string;
  severity: string;
  score: number;
  message: string;
  suggested_action: string;
  timestamp: number;
  context: string;
}

const logger = new Logger('TraceSerialization');

const BaselineStatsSchema = z.object({
  agentId: z.string(),
  calibrationRuns: z.number().default(0),
  meanTokensPerRun: z.number().default(0),
  stdTokensPerRun: z.number().default(0),
  meanToolsPerRun: z.number().default(0),
  stdToolsPerRun: z.number().default(0),
  meanDurationMs: z.number().default(0),
  stdDurationMs: z.number().default(0),
  commonSequences: z.array(z.array(z.string())).default([]),
  meanGoalSimilarity: z.number().default(0),
  stdGoalSimilarity: z.number().default(0),
  isCalibrated: z.boolean().default(false)
});

export function encodePayload(payload: Payload): string {
  return JSON.stringify(payload);
}

export function decodePayload(text: string | null, field: string, recordId: string): Payload {
  if (text === null || text === '') return {};

  try {
    const parsed: unknown = JSON.parse(text);
    if (isPlainObject(parsed)) return parsed;
    logger.warn(`Stored ${field} of ${recordId} is not an object, using empty payload`);
  } catch (error) {
    logger.warn(`Malformed ${field} JSON for ${recordId}, using empty payload:`, error);
  }
  return {};
}

export function serializeTraceEvent(event: TraceEvent): TraceEventRow {
  return {
    event_id: event.eventId,
    agent_id: event.agentId,
    run_id: event.runId,
    action_type: event.actionType,
    action_name: event.actionName,
    timestamp: event.timestamp,
    token_count: event.tokenCount,
    input_data: encodePayload(event.inputData),
    output_data: encodePayload(event.outputData),
    duration_ms: event.durationMs,
    metadata: encodePayload(event.metadata)
  };
}

/**
 * Returns null for a row whose action type is unknown
 */
export function deserializeTraceEvent(row: TraceEventRow): TraceEvent | null {
  if (!isActionType(row.action_type)) {
    logger.warn(`Skipping trace ${row.event_id} with unknown action type '${row.action_type}'`);
    return null;
  }

  return {
    eventId: row.event_id,
    agentId: row.agent_id,
    runId: row.run_id,
    actionType: row.action_type,
    actionName: row.action_name,
    timestamp: row.timestamp,
    tokenCount: row.token_count,
    inputData: decodePayload(row.input_data, 'input_data', row.event_id),
    outputData: decodePayload(row.output_data, 'output_data', row.event_id),
    durationMs: row.duration_ms,
    metadata: decodePayload(row.metadata, 'metadata', row.event_id)
  };
}

export function serializeDriftEvent(event: DriftEvent): DriftEventRow {
  return {
    event_id: event.eventId,
    agent_id: event.agentId,
    run_id: event.runId,
    detector: event.detector,
    severity: event.severity,
    score: event.score,
    message: event.message,
    suggested_action: event.suggestedAction,
    timestamp: event.timestamp,
    context: encodePayload(event.context)
  };
}

/**
 * Returns null for a row whose detector or severity is unknown
 */
export function deserializeDriftEvent(row: DriftEventRow): DriftEvent | null {
  if (!isDetectorType(row.detector) || !isSeverity(row.severity)) {
    logger.warn(`Skipping drift ${row.event_id} with unknown detector/severity '${row.detector}'/'${row.severity}'`);
    return null;
  }

  return {
    eventId: row.event_id,
    agentId: row.agent_id,
    runId: row.run_id,
    detector: row.detector,
    severity: row.severity,
    score: row.score,
    message: row.message,
    suggestedAction: row.suggested_action,
    timestamp: row.timestamp,
    context: decodePayload(row.context, 'context', row.event_id)
  };
}

export function serializeBaseline(baseline: BaselineStats): string {
  return JSON.stringify(baseline);
}

export function deserializeBaseline(text: string, agentId: string): BaselineStats | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    logger.warn(`Malformed baseline JSON for agent '${agentId}':`, error);
    return null;
  }

  const result = BaselineStatsSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn(`Stored baseline for agent '${agentId}' failed validation: ${result.error.message}`);
    return null;
  }
  return result.data;
}
