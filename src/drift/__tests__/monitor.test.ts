/**
 * Integration tests for DriftMonitor: storage, detectors, alerts and callbacks together
 */

import { afterEach, beforeAll, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger } from '../../core/logger';
import type { WebhookTransport } from '../alerts/webhook-transport';
import type { EmbeddingProvider } from '../embedding/embedding-provider';
import { StorageError } from '../errors';
import { createTestDriftMonitor } from '../factory';
import { DriftMonitor } from '../monitor';
import type { DriftEvent } from '../types';

describe('DriftMonitor', () => {
  let now: number;
  let post: jest.Mock<WebhookTransport['post']>;
  let monitor: DriftMonitor;

  beforeAll(() => {
    Logger.setLevel('error');
  });

  beforeEach(() => {
    now = 1_000_000;
    post = jest.fn<WebhookTransport['post']>().mockResolvedValue(undefined);
    monitor = createTestDriftMonitor(
      {
        calibrationRuns: 2,
        alerts: { webhookUrl: 'https://alerts.example.test/hook' },
        detectors: { resourceSpike: { absoluteTokenLimit: 1000 } }
      },
      { transport: { post }, clock: () => now++ }
    );
  });

  afterEach(async () => {
    await monitor.close();
  });

  it('should persist events and report no drift for ordinary activity', async () => {
    const runId = monitor.startRun('run-1');

    expect(await monitor.recordEvent('tool_call', 'search', { inputData: { q: 'docs' } })).toEqual([]);
    expect(await monitor.recordEvent('llm_request', 'answer', { tokenCount: 120 })).toEqual([]);

    const traces = await monitor.getRunTraces(runId);
    expect(traces.map(trace => [trace.actionType, trace.actionName])).toEqual([
      ['tool_call', 'search'],
      ['llm_request', 'answer']
    ]);
    expect(traces[0].inputData).toEqual({ q: 'docs' });
    expect(traces[1].tokenCount).toBe(120);
    expect(post).not.toHaveBeenCalled();
  });

  it('should detect a tool loop, persist it and alert once within the cooldown', async () => {
    monitor.startRun('run-1');
    const results: DriftEvent[][] = [];
    for (let i = 0; i < 5; i++) {
      results.push(await monitor.recordEvent('tool_call', 'fetch'));
    }

    expect(results.slice(0, 3)).toEqual([[], [], []]);
    expect(results[3].map(drift => [drift.detector, drift.score])).toEqual([['action_loop', 0.5]]);
    expect(results[4].map(drift => [drift.detector, drift.score])).toEqual([['action_loop', 0.625]]);

    const alerts = await monitor.getRecentAlerts();
    expect(alerts.map(alert => alert.eventId)).toEqual([results[4][0].eventId, results[3][0].eventId]);
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('should return drift events in detector order', async () => {
    monitor.startRun('run-1');
    for (let i = 0; i < 3; i++) {
      await monitor.recordEvent('tool_call', 'fetch');
    }

    const drifts = await monitor.recordEvent('tool_call', 'fetch', { tokenCount: 5000 });

    expect(drifts.map(drift => drift.detector)).toEqual(['action_loop', 'resource_spike']);
  });

  it('should isolate failing detectors and callbacks', async () => {
    jest.spyOn(monitor.actionLoop, 'check').mockRejectedValue(new Error('detector exploded'));
    const seen: string[] = [];
    monitor.onDrift(() => {
      throw new Error('callback exploded');
    });
    monitor.onDrift(drift => {
      seen.push(drift.detector);
    });

    const drifts = await monitor.recordEvent('tool_call', 'fetch', { tokenCount: 2000 });

    expect(drifts.map(drift => drift.detector)).toEqual(['resource_spike']);
    expect(seen).toEqual(['resource_spike']);
  });

  it('should emit drift events after the callbacks', async () => {
    const order: string[] = [];
    monitor.onDrift(() => {
      order.push('callback');
    });
    monitor.on('drift', (drift: DriftEvent) => {
      order.push(`event:${drift.detector}`);
    });

    await monitor.recordEvent('llm_request', 'answer', { tokenCount: 5000 });

    expect(order).toEqual(['callback', 'event:resource_spike']);
  });

  it('should stop notifying an unsubscribed callback', async () => {
    const callback = jest.fn();
    const unsubscribe = monitor.onDrift(callback);
    unsubscribe();

    await monitor.recordEvent('llm_request', 'answer', { tokenCount: 5000 });

    expect(callback).not.toHaveBeenCalled();
  });

  it('should keep going when the webhook fails', async () => {
    post.mockRejectedValue(new Error('offline'));

    const drifts = await monitor.recordEvent('llm_request', 'answer', { tokenCount: 5000 });

    expect(drifts).toHaveLength(1);
    expect(await monitor.getRecentAlerts()).toHaveLength(1);
    expect(monitor.alerts.getStatistics().failedAlerts).toBe(1);
  });

  it('should start a run implicitly for an event without one', async () => {
    expect(monitor.activeRunId).toBeNull();

    await monitor.recordEvent('state_transition', 'planning');

    expect(monitor.activeRunId).toMatch(/^run_[0-9a-f]{16}$/);
  });

  it('should record against an explicit run without changing the active run', async () => {
    monitor.startRun('active');
    await monitor.recordEvent('tool_call', 'search', { runId: 'background' });

    expect(monitor.activeRunId).toBe('active');
    expect(await monitor.getRunTraces('background')).toHaveLength(1);
    expect(await monitor.getRunTraces('active')).toHaveLength(0);
  });

  it('should flag output unrelated to the run goal', async () => {
    monitor.startRun('run-1', 'Summarise quarterly revenue figures for the finance team');

    const drifts = await monitor.recordEvent('llm_request', 'answer', {
      outputData: { text: 'Lemon cake recipe with sugar butter eggs and icing' }
    });

    expect(drifts.map(drift => drift.detector)).toEqual(['goal_drift']);
    expect(drifts[0].score).toBeGreaterThan(0.5);
  });

  it('should fail the call when the trace cannot be stored', async () => {
    await monitor.store.close();

    await expect(monitor.recordEvent('tool_call', 'search')).rejects.toBeInstanceOf(StorageError);
  });

  describe('runs and calibration', () => {
    it('should recalibrate and clear the active run on endRun', async () => {
      monitor.startRun('run-1');
      await monitor.recordEvent('llm_request', 'answer', { tokenCount: 100 });
      expect(monitor.resourceSpike.trackedRuns).toEqual(['run-1']);

      const partial = await monitor.endRun();
      expect(partial).toMatchObject({ calibrationRuns: 1, isCalibrated: false, meanTokensPerRun: 100 });
      expect(monitor.activeRunId).toBeNull();
      expect(monitor.resourceSpike.trackedRuns).toEqual([]);

      monitor.startRun('run-2');
      await monitor.recordEvent('llm_request', 'answer', { tokenCount: 300 });
      const full = await monitor.endRun('run-2');

      expect(full).toMatchObject({ calibrationRuns: 2, isCalibrated: true, meanTokensPerRun: 200 });
      expect(monitor.getBaseline()).toEqual(full);
    });

    it('should treat endRun without an active run as a no-op', async () => {
      expect(await monitor.endRun()).toBeNull();
    });

    it('should keep the active run when ending another one', async () => {
      monitor.startRun('active');
      await monitor.endRun('other');

      expect(monitor.activeRunId).toBe('active');
    });
  });
});

describe('DriftMonitor persistence', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'drift-monitor-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load the calibrated baseline saved by an earlier monitor', async () => {
    const databasePath = join(tempDir, 'monitor.db');
    const embedder: EmbeddingProvider = { embed: async () => [1] };

    const first = new DriftMonitor({ agentId: 'agent-1', calibrationRuns: 1, storage: { databasePath } }, { embedder });
    first.startRun('run-1');
    await first.recordEvent('llm_request', 'answer', { tokenCount: 250 });
    await first.endRun();
    await first.close();

    const second = new DriftMonitor({ agentId: 'agent-1', storage: { databasePath } }, { embedder });
    await second.initialize();

    expect(second.getBaseline()).toMatchObject({ isCalibrated: true, calibrationRuns: 1, meanTokensPerRun: 250 });
    await second.close();
  });
});
