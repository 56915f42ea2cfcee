/**
 * Core drift-monitoring types
 * Trace and drift events are immutable facts; a baseline is replaced wholesale on calibration
 */

import { generateId } from '../utils/helpers';

export type ActionType = 'tool_call' | 'llm_request' | 'state_transition';

export type DetectorType = 'action_loop' | 'goal_drift' | 'resource_spike';

export type Severity = 'LOW' | 'MED' | 'HIGH' | 'CRITICAL';

export const ACTION_TYPES: readonly ActionType[] = ['tool_call', 'llm_request', 'state_transition'];

export const DETECTOR_TYPES: readonly DetectorType[] = ['action_loop', 'goal_drift', 'resource_spike'];

/** Ascending order: LOW < MED < HIGH < CRITICAL */
export const SEVERITY_ORDER: readonly Severity[] = ['LOW', 'MED', 'HIGH', 'CRITICAL'];

export type Payload = Record<string, unknown>;

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface TraceEvent {
  readonly eventId: string;
  readonly agentId: string;
  readonly runId: string;
  readonly actionType: ActionType;
  readonly actionName: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly tokenCount: number;
  readonly inputData: Payload;
  readonly outputData: Payload;
  readonly durationMs: number;
  readonly metadata: Payload;
}

export interface DriftEvent {
  readonly eventId: string;
  readonly agentId: string;
  readonly runId: string;
  readonly detector: DetectorType;
  readonly severity: Severity;
  /** 0..1, higher is more severe */
  readonly score: number;
  readonly message: string;
  readonly suggestedAction: string;
  readonly timestamp: number;
  readonly context: Payload;
}

export interface BaselineStats {
  agentId: string;
  calibrationRuns: number;
  meanTokensPerRun: number;
  stdTokensPerRun: number;
  meanToolsPerRun: number;
  stdToolsPerRun: number;
  meanDurationMs: number;
  stdDurationMs: number;
  /** Diagnostic only; detection never consults it */
  commonSequences: string[][];
  /** Reserved: calibration does not populate goal similarity */
  meanGoalSimilarity: number;
  stdGoalSimilarity: number;
  isCalibrated: boolean;
}

export interface RunCounter {
  totalTokens: number;
  totalDurationMs: number;
  toolCalls: number;
  llmCalls: number;
  /** Wall-clock time of the first observed event */
  startTime: number;
}

export interface RunStats {
  eventCount: number;
  totalTokens: number;
  toolCalls: number;
  llmCalls: number;
  startTime: number;
  endTime: number;
  totalDurationMs: number;
}

export interface NotificationResult {
  success: boolean;
  channel: string;
  error?: string;
  timestamp: number;
}

export interface TraceEventInit {
  agentId: string;
  runId: string;
  actionType: ActionType;
  actionName: string;
  eventId?: string;
  timestamp?: number;
  tokenCount?: number;
  inputData?: Payload;
  outputData?: Payload;
  durationMs?: number;
  metadata?: Payload;
}

export interface DriftEventInit {
  agentId: string;
  runId: string;
  detector: DetectorType;
  score: number;
  message: string;
  suggestedAction: string;
  context?: Payload;
  eventId?: string;
  timestamp?: number;
}

/**
 * Map a normalized score to its severity: >=0.9 CRITICAL, >=0.7 HIGH, >=0.5 MED, else LOW
 */
export function severityOf(score: number): Severity {
  if (score >= 0.9) return 'CRITICAL';
  if (score >= 0.7) return 'HIGH';
  if (score >= 0.5) return 'MED';
  return 'LOW';
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}

export function isActionType(value: unknown): value is ActionType {
  return typeof value === 'string' && ACTION_TYPES.some(entry => entry === value);
}

export function isDetectorType(value: unknown): value is DetectorType {
  return typeof value === 'string' && DETECTOR_TYPES.some(entry => entry === value);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITY_ORDER.some(entry => entry === value);
}

export function createTraceEvent(init: TraceEventInit, clock: Clock = systemClock): TraceEvent {
  return {
    eventId: init.eventId ?? generateId('trace'),
    agentId: init.agentId,
    runId: init.runId,
    actionType: init.actionType,
    actionName: init.actionName,
    timestamp: init.timestamp ?? clock(),
    tokenCount: init.tokenCount ?? 0,
    inputData: init.inputData ?? {},
    outputData: init.outputData ?? {},
    durationMs: init.durationMs ?? 0,
    metadata: init.metadata ?? {}
  };
}

/**
 * Build a drift event; severity always comes from `severityOf(score)`
 */
export function createDriftEvent(init: DriftEventInit, clock: Clock = systemClock): DriftEvent {
  return {
    eventId: init.eventId ?? generateId('drift'),
    agentId: init.agentId,
    runId: init.runId,
    detector: init.detector,
    severity: severityOf(init.score),
    score: init.score,
    message: init.message,
    suggestedAction: init.suggestedAction,
    timestamp: init.timestamp ?? clock(),
    context: init.context ?? {}
  };
}

export function emptyBaseline(agentId: string): BaselineStats {
  return {
    agentId,
    calibrationRuns: 0,
    meanTokensPerRun: 0,
    stdTokensPerRun: 0,
    meanToolsPerRun: 0,
    stdToolsPerRun: 0,
    meanDurationMs: 0,
    stdDurationMs: 0,
    commonSequences: [],
    meanGoalSimilarity: 0,
    stdGoalSimilarity: 0,
    isCalibrated: false
  };
}
