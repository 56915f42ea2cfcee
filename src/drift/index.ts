/**
 * Drift monitoring - main module exports
 */

// Orchestration
export { DriftMonitor } from './monitor';
export type { DriftCallback, DriftMonitorDependencies, RecordEventOptions } from './monitor';
export { createDriftMonitoringSystem, createTestDriftMonitor } from './factory';
export type { DriftMonitoringSystem, DriftMonitoringSystemOptions } from './factory';

// Storage
export { TraceStore } from './storage/trace-store';
export type { DriftQuery, StorageStats, TraceQuery, TraceStoreConfig } from './storage/trace-store';
export { SqliteConnectionPool } from './storage/connection-pool';

// Detection
export type { DriftDetector } from './detectors/detector';
export { ActionLoopDetector } from './detectors/action-loop';
export { GoalDriftDetector } from './detectors/goal-drift';
export { ResourceSpikeDetector } from './detectors/resource-spike';
export { Calibrator, findCommonSequences, mean, stdDev } from './baseline/calibrator';

// Embeddings
export {
  HashingEmbeddingProvider,
  LazyEmbeddingProvider,
  cosineSimilarity
} from './embedding/embedding-provider';
export type { EmbeddingProvider, EmbeddingProviderFactory } from './embedding/embedding-provider';
export {
  OllamaEmbeddingProvider,
  OpenAIEmbeddingProvider,
  createEmbeddingProvider
} from './embedding/model-providers';
export type {
  OllamaEmbeddingOptions,
  OllamaEmbeddingsClient,
  OpenAIEmbeddingOptions,
  OpenAIEmbeddingsClient
} from './embedding/model-providers';

// Alerting and streaming
export { AlertDispatcher } from './alerts/alert-dispatcher';
export type { AlertStatistics, DispatchRecord } from './alerts/alert-dispatcher';
export { FetchWebhookTransport } from './alerts/webhook-transport';
export type { WebhookTransport } from './alerts/webhook-transport';
export { buildPayload, detectFlavor } from './alerts/payloads';
export type { WebhookFlavor, WebhookPayload } from './alerts/payloads';
export { DriftStreamer } from './streaming/drift-streamer';
export type { StreamingConfig } from './streaming/drift-streamer';

// Configuration, errors and types
export * from './config';
export * from './errors';
export * from './types';
