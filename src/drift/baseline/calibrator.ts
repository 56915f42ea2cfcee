/**
 * Baseline calibration
 * Rebuilds an agent's statistical norms from its most recent runs
 */

import { Logger } from '../../core/logger';
import type { TraceStore } from '../storage/trace-store';
import { BaselineStats, emptyBaseline } from '../types';

export interface CalibratorOptions {
  /** Runs needed before the baseline counts as calibrated */
  requiredRuns?: number;
  /** Tool calls per run considered for sequence mining */
  sequenceWindow?: number;
  topSequences?: number;
}

const MIN_SEQUENCE_LENGTH = 2;
const MAX_SEQUENCE_LENGTH = 4;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Population standard deviation
 */
export function stdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mu = mean(values);
  return Math.sqrt(values.reduce((sum, value) => sum + (value - mu) ** 2, 0) / values.length);
}

/**
 * Most frequent contiguous subsequences (length 2-4) across runs. A
 * subsequence counts once per run; ties keep first-seen order.
 */
export function findCommonSequences(sequences: readonly string[][], topN = 5): string[][] {
  const counts = new Map<string, { sequence: string[]; count: number }>();

  for (const sequence of sequences) {
    const seen = new Set<string>();
    const maxLength = Math.min(sequence.length, MAX_SEQUENCE_LENGTH);

    for (let length = MIN_SEQUENCE_LENGTH; length <= maxLength; length++) {
      for (let start = 0; start + length <= sequence.length; start++) {
        const subsequence = sequence.slice(start, start + length);
        const key = JSON.stringify(subsequence);
        if (seen.has(key)) continue;
        seen.add(key);

        const entry = counts.get(key);
        if (entry) {
          entry.count++;
        } else {
          counts.set(key, { sequence: subsequence, count: 1 });
        }
      }
    }
  }

  return [...counts.values()]
    .sort((a, b) => b.count - a.count)
    .slice(0, topN)
    .map(entry => entry.sequence);
}

export class Calibrator {
  readonly requiredRuns: number;

  private readonly store: Pick<TraceStore, 'getRunIds' | 'getRunStats' | 'getRecentActions' | 'saveBaseline'>;
  private readonly sequenceWindow: number;
  private readonly topSequences: number;
  private readonly logger = new Logger('Calibrator');

  constructor(
    store: Pick<TraceStore, 'getRunIds' | 'getRunStats' | 'getRecentActions' | 'saveBaseline'>,
    options: CalibratorOptions = {}
  ) {
    this.store = store;
    this.requiredRuns = options.requiredRuns ?? 30;
    this.sequenceWindow = options.sequenceWindow ?? 50;
    this.topSequences = options.topSequences ?? 5;
  }

  /**
   * Recompute the baseline from the most recent `requiredRuns` runs and
   * persist it, replacing the previous one
   */
  async updateBaseline(agentId: string): Promise<BaselineStats> {
    const runIds = await this.store.getRunIds(agentId, this.requiredRuns);

    if (runIds.length === 0) {
      const baseline = emptyBaseline(agentId);
      await this.store.saveBaseline(baseline);
      return baseline;
    }

    const tokens: number[] = [];
    const tools: number[] = [];
    const durations: number[] = [];
    const sequences: string[][] = [];

    for (const runId of runIds) {
      const stats = await this.store.getRunStats(agentId, runId);
      tokens.push(stats.totalTokens);
      tools.push(stats.toolCalls);
      durations.push(stats.totalDurationMs);

      const actions = await this.store.getRecentActions(agentId, runId, this.sequenceWindow);
      if (actions.length > 0) sequences.push(actions);
    }

    const baseline: BaselineStats = {
      ...emptyBaseline(agentId),
      calibrationRuns: runIds.length,
      meanTokensPerRun: mean(tokens),
      stdTokensPerRun: stdDev(tokens),
      meanToolsPerRun: mean(tools),
      stdToolsPerRun: stdDev(tools),
      meanDurationMs: mean(durations),
      stdDurationMs: stdDev(durations),
      commonSequences: findCommonSequences(sequences, this.topSequences),
      isCalibrated: runIds.length >= this.requiredRuns
    };

    await this.store.saveBaseline(baseline);

    if (baseline.isCalibrated) {
      this.logger.info(
        `Baseline calibrated for '${agentId}' (${baseline.calibrationRuns} runs, ` +
          `mean tokens=${baseline.meanTokensPerRun.toFixed(0)}, mean tools=${baseline.meanToolsPerRun.toFixed(1)})`
      );
    } else {
      this.logger.info(`Baseline partial for '${agentId}' (${baseline.calibrationRuns}/${this.requiredRuns} runs)`);
    }

    return baseline;
  }
}
