/**
 * Drift monitor configuration
 * Validated with zod; every field has a default so `{ agentId }` is a complete config
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { Severity } from './types';

export const DEFAULT_DB_PATH = join(homedir(), '.agent-drift-monitor', 'monitor.db');

type SeverityInput = Severity | 'MEDIUM';

/** `MEDIUM` is accepted as a spelling of `MED` */
export function normalizeSeverity(value: SeverityInput): Severity {
  return value === 'MEDIUM' ? 'MED' : value;
}

export const SeveritySchema = z
  .enum(['LOW', 'MED', 'MEDIUM', 'HIGH', 'CRITICAL'])
  .transform(normalizeSeverity);

export const ActionLoopConfigSchema = z.object({
  enabled: z.boolean().default(true),
  windowSize: z.number().int().positive().default(20),
  maxRepeats: z.number().int().min(2).default(4),
  sequenceLength: z.number().int().min(2).default(3)
});

export const GoalDriftConfigSchema = z.object({
  enabled: z.boolean().default(true),
  similarityThreshold: z.number().gt(0).max(1).default(0.5),
  minOutputLength: z.number().int().nonnegative().default(20),
  maxEmbedChars: z.number().int().positive().default(512)
});

export const ResourceSpikeConfigSchema = z.object({
  enabled: z.boolean().default(true),
  spikeMultiplier: z.number().positive().default(2.5),
  absoluteTokenLimit: z.number().int().positive().default(50_000),
  absoluteDurationLimitMs: z.number().positive().default(300_000),
  maxTrackedRuns: z.number().int().positive().default(10)
});

export const AlertConfigSchema = z.object({
  webhookUrl: z.string().url().optional(),
  minSeverity: SeveritySchema.default('MED'),
  cooldownSeconds: z.number().nonnegative().default(60),
  timeoutMs: z.number().int().positive().default(10_000),
  source: z.string().min(1).default('agent-drift-monitor'),
  historySize: z.number().int().positive().default(1000)
});

export const StorageConfigSchema = z.object({
  databasePath: z.string().min(1).default(DEFAULT_DB_PATH),
  maxConnections: z.number().int().positive().default(4),
  busyTimeoutMs: z.number().int().nonnegative().default(5000)
});

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['hashing', 'openai', 'ollama']).default('hashing'),
  /** Model name; each backend has its own default */
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  /** OpenAI-compatible base URL or Ollama host */
  baseUrl: z.string().url().optional(),
  dimensions: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(30_000)
});

export const DriftMonitorConfigSchema = z.object({
  agentId: z.string().min(1),
  goalDescription: z.string().default(''),
  calibrationRuns: z.number().int().positive().default(30),
  storage: StorageConfigSchema.default({}),
  detectors: z
    .object({
      actionLoop: ActionLoopConfigSchema.default({}),
      goalDrift: GoalDriftConfigSchema.default({}),
      resourceSpike: ResourceSpikeConfigSchema.default({})
    })
    .default({}),
  alerts: AlertConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({})
});

export type DriftMonitorConfigInput = z.input<typeof DriftMonitorConfigSchema>;
export type DriftMonitorConfig = z.output<typeof DriftMonitorConfigSchema>;
export type ActionLoopConfig = z.output<typeof ActionLoopConfigSchema>;
export type GoalDriftConfig = z.output<typeof GoalDriftConfigSchema>;
export type ResourceSpikeConfig = z.output<typeof ResourceSpikeConfigSchema>;
export type AlertConfig = z.output<typeof AlertConfigSchema>;
export type StorageConfig = z.output<typeof StorageConfigSchema>;
export type EmbeddingConfig = z.output<typeof EmbeddingConfigSchema>;
export type EmbeddingBackend = EmbeddingConfig['provider'];

export function parseConfig(input: DriftMonitorConfigInput): DriftMonitorConfig {
  const result = DriftMonitorConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid drift monitor configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`Environment variable ${name} must be a number, got '${raw}'`);
  }
  return value;
}

/**
 * Overlay DRIFT_MONITOR_* environment variables onto an explicit config
 */
export function loadConfigFromEnv(
  base: DriftMonitorConfigInput,
  env: NodeJS.ProcessEnv = process.env
): DriftMonitorConfig {
  const minSeverity = env.DRIFT_MONITOR_MIN_SEVERITY;
  const severityResult = minSeverity === undefined ? undefined : SeveritySchema.safeParse(minSeverity);
  if (severityResult && !severityResult.success) {
    throw new ConfigError(`Environment variable DRIFT_MONITOR_MIN_SEVERITY has unknown level '${minSeverity}'`);
  }

  const embeddingProvider = env.DRIFT_MONITOR_EMBEDDING_PROVIDER;
  const providerResult =
    embeddingProvider === undefined ? undefined : EmbeddingConfigSchema.shape.provider.safeParse(embeddingProvider);
  if (providerResult && !providerResult.success) {
    throw new ConfigError(
      `Environment variable DRIFT_MONITOR_EMBEDDING_PROVIDER has unknown backend '${embeddingProvider}'`
    );
  }

  const calibrationRuns = numberFromEnv(env, 'DRIFT_MONITOR_CALIBRATION_RUNS');
  const cooldownSeconds = numberFromEnv(env, 'DRIFT_MONITOR_COOLDOWN_SECONDS');

  return parseConfig({
    ...base,
    calibrationRuns: calibrationRuns ?? base.calibrationRuns,
    storage: {
      ...base.storage,
      databasePath: env.DRIFT_MONITOR_DB_PATH ?? base.storage?.databasePath
    },
    alerts: {
      ...base.alerts,
      webhookUrl: env.DRIFT_MONITOR_WEBHOOK_URL ?? base.alerts?.webhookUrl,
      minSeverity: severityResult?.data ?? base.alerts?.minSeverity,
      cooldownSeconds: cooldownSeconds ?? base.alerts?.cooldownSeconds
    },
    embedding: {
      ...base.embedding,
      provider: providerResult?.data ?? base.embedding?.provider,
      model: env.DRIFT_MONITOR_EMBEDDING_MODEL ?? base.embedding?.model,
      baseUrl: env.DRIFT_MONITOR_EMBEDDING_URL ?? base.embedding?.baseUrl,
      apiKey: env.DRIFT_MONITOR_EMBEDDING_API_KEY ?? env.OPENAI_API_KEY ?? base.embedding?.apiKey
    }
  });
}
