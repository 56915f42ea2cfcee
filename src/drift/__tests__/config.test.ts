import { describe, expect, it } from '@jest/globals';
import { DEFAULT_DB_PATH, loadConfigFromEnv, parseConfig } from '../config';
import { ConfigError } from '../errors';

describe('parseConfig', () => {
  it('should fill every default from an agent id', () => {
    const config = parseConfig({ agentId: 'agent-1' });

    expect(config).toEqual({
      agentId: 'agent-1',
      goalDescription: '',
      calibrationRuns: 30,
      storage: { databasePath: DEFAULT_DB_PATH, maxConnections: 4, busyTimeoutMs: 5000 },
      detectors: {
        actionLoop: { enabled: true, windowSize: 20, maxRepeats: 4, sequenceLength: 3 },
        goalDrift: { enabled: true, similarityThreshold: 0.5, minOutputLength: 20, maxEmbedChars: 512 },
        resourceSpike: {
          enabled: true,
          spikeMultiplier: 2.5,
          absoluteTokenLimit: 50_000,
          absoluteDurationLimitMs: 300_000,
          maxTrackedRuns: 10
        }
      },
      alerts: {
        minSeverity: 'MED',
        cooldownSeconds: 60,
        timeoutMs: 10_000,
        source: 'agent-drift-monitor',
        historySize: 1000
      },
      embedding: { provider: 'hashing', timeoutMs: 30_000 }
    });
  });

  it('should normalise the MEDIUM alias', () => {
    expect(parseConfig({ agentId: 'a', alerts: { minSeverity: 'MEDIUM' } }).alerts.minSeverity).toBe('MED');
  });

  it('should reject invalid values with a ConfigError listing the issues', () => {
    let caught: unknown;
    try {
      parseConfig({ agentId: '', alerts: { webhookUrl: 'not a url' } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: 'CONFIG_ERROR' });
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map(issue => issue.split(':')[0])).toEqual(['agentId', 'alerts.webhookUrl']);
  });
});

describe('loadConfigFromEnv', () => {
  it('should overlay DRIFT_MONITOR_* variables onto the base config', () => {
    const config = loadConfigFromEnv(
      { agentId: 'agent-1', alerts: { cooldownSeconds: 5 } },
      {
        DRIFT_MONITOR_DB_PATH: '/tmp/drift.db',
        DRIFT_MONITOR_WEBHOOK_URL: 'https://alerts.example.test/hook',
        DRIFT_MONITOR_MIN_SEVERITY: 'HIGH',
        DRIFT_MONITOR_CALIBRATION_RUNS: '10'
      }
    );

    expect(config.storage.databasePath).toBe('/tmp/drift.db');
    expect(config.alerts).toMatchObject({
      webhookUrl: 'https://alerts.example.test/hook',
      minSeverity: 'HIGH',
      cooldownSeconds: 5
    });
    expect(config.calibrationRuns).toBe(10);
  });

  it('should keep the base config when variables are absent', () => {
    const config = loadConfigFromEnv({ agentId: 'agent-1', alerts: { minSeverity: 'LOW' } }, {});

    expect(config.alerts.minSeverity).toBe('LOW');
    expect(config.storage.databasePath).toBe(DEFAULT_DB_PATH);
  });

  it('should select the embedding backend from the environment', () => {
    const config = loadConfigFromEnv(
      { agentId: 'agent-1', embedding: { model: 'text-embedding-3-large' } },
      {
        DRIFT_MONITOR_EMBEDDING_PROVIDER: 'openai',
        DRIFT_MONITOR_EMBEDDING_URL: 'https://llm.example.test/v1',
        OPENAI_API_KEY: 'test-secret'
      }
    );

    expect(config.embedding).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-large',
      baseUrl: 'https://llm.example.test/v1',
      apiKey: 'test-secret',
      timeoutMs: 30_000
    });
  });

  it('should prefer the monitor API key over OPENAI_API_KEY', () => {
    const config = loadConfigFromEnv(
      { agentId: 'agent-1' },
      { DRIFT_MONITOR_EMBEDDING_API_KEY: 'test-secret', OPENAI_API_KEY: 'other-secret' }
    );

    expect(config.embedding.apiKey).toBe('test-secret');
  });

  it('should reject an unknown embedding backend', () => {
    expect(() => loadConfigFromEnv({ agentId: 'a' }, { DRIFT_MONITOR_EMBEDDING_PROVIDER: 'word2vec' })).toThrow(
      "Environment variable DRIFT_MONITOR_EMBEDDING_PROVIDER has unknown backend 'word2vec'"
    );
  });

  it('should reject unknown severities and non-numeric numbers', () => {
    expect(() => loadConfigFromEnv({ agentId: 'a' }, { DRIFT_MONITOR_MIN_SEVERITY: 'SEVERE' })).toThrow(ConfigError);
    expect(() => loadConfigFromEnv({ agentId: 'a' }, { DRIFT_MONITOR_COOLDOWN_SECONDS: 'soon' })).toThrow(
      "Environment variable DRIFT_MONITOR_COOLDOWN_SECONDS must be a number, got 'soon'"
    );
  });
});
