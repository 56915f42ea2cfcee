/**
 * Resource spike detection
 * Keeps running totals per run and compares them against the calibrated
 * baseline, with absolute token and wall-clock ceilings as a safety net.
 */

import { Logger } from '../../core/logger';
import type { ResourceSpikeConfig } from '../config';
import { BaselineStats, Clock, DriftEvent, RunCounter, TraceEvent, createDriftEvent, systemClock } from '../types';
import type { DriftDetector } from './detector';

export type ResourceSpikeOptions = Partial<ResourceSpikeConfig> & { clock?: Clock };

interface MetricCheck {
  metric: 'token_burn' | 'duration' | 'tool_calls';
  current: number;
  mean: number;
  std: number;
  unit: string;
}

const DURATION_LIMIT_SCORE = 0.8;
const TOKEN_LIMIT_MIN_SCORE = 0.7;

export class ResourceSpikeDetector implements DriftDetector {
  readonly type = 'resource_spike' as const;
  enabled: boolean;

  readonly spikeMultiplier: number;
  readonly absoluteTokenLimit: number;
  readonly absoluteDurationLimitMs: number;
  readonly maxTrackedRuns: number;

  private readonly clock: Clock;
  private readonly logger = new Logger('ResourceSpikeDetector');
  /** Ordered least- to most-recently touched */
  private readonly counters = new Map<string, RunCounter>();

  constructor(options: ResourceSpikeOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.spikeMultiplier = options.spikeMultiplier ?? 2.5;
    this.absoluteTokenLimit = options.absoluteTokenLimit ?? 50_000;
    this.absoluteDurationLimitMs = options.absoluteDurationLimitMs ?? 300_000;
    this.maxTrackedRuns = options.maxTrackedRuns ?? 10;
    this.clock = options.clock ?? systemClock;
  }

  get trackedRuns(): string[] {
    return [...this.counters.keys()];
  }

  getRunCounter(runId: string): RunCounter | undefined {
    const counter = this.counters.get(runId);
    return counter ? { ...counter } : undefined;
  }

  forgetRun(runId: string): boolean {
    return this.counters.delete(runId);
  }

  async check(event: TraceEvent, baseline: BaselineStats | null): Promise<DriftEvent | null> {
    if (!this.enabled) return null;

    // Counter update is synchronous, so concurrent checks on one run cannot interleave here
    const counter = this.touch(event.runId);
    counter.totalTokens += event.tokenCount;
    counter.totalDurationMs += event.durationMs;
    if (event.actionType === 'tool_call') {
      counter.toolCalls++;
    } else if (event.actionType === 'llm_request') {
      counter.llmCalls++;
    }

    const statistical = baseline?.isCalibrated ? this.checkBaselineSpike(event, baseline, counter) : null;
    // Ceilings are evaluated whether or not the baseline already flagged the run
    const absolute = this.checkAbsoluteLimits(event, counter);

    if (statistical && absolute) {
      return absolute.score > statistical.score ? absolute : statistical;
    }
    return statistical ?? absolute;
  }

  private touch(runId: string): RunCounter {
    const existing = this.counters.get(runId);
    if (existing) {
      this.counters.delete(runId);
      this.counters.set(runId, existing);
      return existing;
    }

    const counter: RunCounter = {
      totalTokens: 0,
      totalDurationMs: 0,
      toolCalls: 0,
      llmCalls: 0,
      startTime: this.clock()
    };
    this.counters.set(runId, counter);

    while (this.counters.size > this.maxTrackedRuns) {
      const oldest = this.counters.keys().next().value;
      if (oldest === undefined) break;
      this.counters.delete(oldest);
      this.logger.debug(`Evicted run counter ${oldest}`);
    }
    return counter;
  }

  private checkBaselineSpike(event: TraceEvent, baseline: BaselineStats, counter: RunCounter): DriftEvent | null {
    const checks: MetricCheck[] = [
      {
        metric: 'token_burn',
        current: counter.totalTokens,
        mean: baseline.meanTokensPerRun,
        std: baseline.stdTokensPerRun,
        unit: 'tokens'
      },
      {
        metric: 'duration',
        current: counter.totalDurationMs,
        mean: baseline.meanDurationMs,
        std: baseline.stdDurationMs,
        unit: 'ms'
      },
      {
        metric: 'tool_calls',
        current: counter.toolCalls,
        mean: baseline.meanToolsPerRun,
        std: baseline.stdToolsPerRun,
        unit: 'calls'
      }
    ];

    for (const { metric, current, mean, std, unit } of checks) {
      if (mean === 0 && std === 0) continue;

      const threshold = mean + this.spikeMultiplier * Math.max(std, mean * 0.1);
      // The 1.5x floor keeps a near-zero std from flagging ordinary runs
      if (current <= threshold || current <= mean * 1.5) continue;

      return createDriftEvent(
        {
          agentId: event.agentId,
          runId: event.runId,
          detector: this.type,
          score: Math.min(1, (current - threshold) / Math.max(threshold, 1)),
          message: `Resource spike: ${metric} at ${current.toFixed(0)} ${unit} (baseline: ${mean.toFixed(0)} ± ${std.toFixed(0)})`,
          suggestedAction: `Check for malformed input or error loops causing elevated ${metric}`,
          context: {
            metric,
            current,
            baselineMean: mean,
            baselineStd: std,
            threshold,
            runTotals: { ...counter }
          }
        },
        this.clock
      );
    }
    return null;
  }

  private checkAbsoluteLimits(event: TraceEvent, counter: RunCounter): DriftEvent | null {
    if (counter.totalTokens > this.absoluteTokenLimit) {
      const overshoot = Math.min(1, (counter.totalTokens - this.absoluteTokenLimit) / this.absoluteTokenLimit);
      return createDriftEvent(
        {
          agentId: event.agentId,
          runId: event.runId,
          detector: this.type,
          score: Math.max(TOKEN_LIMIT_MIN_SCORE, overshoot),
          message: `Resource spike: token count ${counter.totalTokens.toLocaleString('en-US')} exceeds absolute limit (${this.absoluteTokenLimit.toLocaleString('en-US')})`,
          suggestedAction: 'Investigate agent run, token consumption is abnormally high',
          context: {
            metric: 'absolute_token_limit',
            currentTokens: counter.totalTokens,
            limit: this.absoluteTokenLimit
          }
        },
        this.clock
      );
    }

    const elapsedMs = this.clock() - counter.startTime;
    if (elapsedMs > this.absoluteDurationLimitMs) {
      return createDriftEvent(
        {
          agentId: event.agentId,
          runId: event.runId,
          detector: this.type,
          score: DURATION_LIMIT_SCORE,
          message: `Resource spike: run duration ${(elapsedMs / 1000).toFixed(1)}s exceeds limit (${(this.absoluteDurationLimitMs / 1000).toFixed(0)}s)`,
          suggestedAction: 'Agent may be hung or stuck, consider terminating the run',
          context: {
            metric: 'absolute_duration_limit',
            elapsedMs,
            limitMs: this.absoluteDurationLimitMs
          }
        },
        this.clock
      );
    }

    return null;
  }
}
