/**
 * Goal drift detection
 * Compares the embedding of each model output with the embedding of the run's
 * stated goal and flags outputs whose cosine similarity falls below threshold.
 */

import { Logger } from '../../core/logger';
import { truncate } from '../../utils/helpers';
import type { GoalDriftConfig } from '../config';
import { EmbeddingProvider, cosineSimilarity } from '../embedding/embedding-provider';
import { BaselineStats, Clock, DriftEvent, TraceEvent, createDriftEvent, systemClock } from '../types';
import type { DriftDetector } from './detector';

export type GoalDriftOptions = Partial<GoalDriftConfig> & {
  goalDescription?: string;
  clock?: Clock;
};

const PREVIEW_LENGTH = 200;
const MIN_BASELINE_STD = 0.05;

export class GoalDriftDetector implements DriftDetector {
  readonly type = 'goal_drift' as const;
  enabled: boolean;

  readonly similarityThreshold: number;
  readonly minOutputLength: number;
  readonly maxEmbedChars: number;

  private readonly embedder: EmbeddingProvider;
  private readonly clock: Clock;
  private readonly logger = new Logger('GoalDriftDetector');
  private goal: string;
  private goalEmbedding?: Promise<number[]>;

  constructor(embedder: EmbeddingProvider, options: GoalDriftOptions = {}) {
    this.embedder = embedder;
    this.enabled = options.enabled ?? true;
    this.similarityThreshold = options.similarityThreshold ?? 0.5;
    this.minOutputLength = options.minOutputLength ?? 20;
    this.maxEmbedChars = options.maxEmbedChars ?? 512;
    this.goal = options.goalDescription ?? '';
    this.clock = options.clock ?? systemClock;
  }

  get goalDescription(): string {
    return this.goal;
  }

  /**
   * Replace the goal; its embedding is recomputed on the next check
   */
  setGoal(goalDescription: string): void {
    if (goalDescription === this.goal) return;
    this.goal = goalDescription;
    this.goalEmbedding = undefined;
  }

  async check(event: TraceEvent, baseline: BaselineStats | null): Promise<DriftEvent | null> {
    if (!this.enabled || event.actionType !== 'llm_request') return null;

    const outputText = this.extractOutputText(event);
    if (outputText === null || !this.goal) return null;

    try {
      const goalVector = await this.getGoalEmbedding();
      const outputVector = await this.embedder.embed(truncate(outputText, this.maxEmbedChars));
      const similarity = cosineSimilarity(goalVector, outputVector);
      const threshold = this.thresholdFor(baseline);

      if (similarity >= threshold) return null;

      const score = Math.min(1, (threshold - similarity) / threshold);
      const baselineInfo =
        baseline && baseline.meanGoalSimilarity > 0 ? ` (baseline: ${baseline.meanGoalSimilarity.toFixed(2)})` : '';

      return createDriftEvent(
        {
          agentId: event.agentId,
          runId: event.runId,
          detector: this.type,
          score,
          message: `Goal drift: similarity dropped to ${similarity.toFixed(2)}${baselineInfo}`,
          suggestedAction: 'Review context window for off-topic injection or prompt degradation',
          context: {
            similarity: Number(similarity.toFixed(4)),
            threshold: Number(threshold.toFixed(4)),
            goalPreview: truncate(this.goal, PREVIEW_LENGTH),
            outputPreview: truncate(outputText, PREVIEW_LENGTH)
          }
        },
        this.clock
      );
    } catch (error) {
      this.logger.warn(`Goal drift check failed for run ${event.runId}:`, error);
      return null;
    }
  }

  /**
   * Configured threshold, raised to `mean - 2 * max(std, 0.05)` when a
   * calibrated baseline carries goal-similarity statistics
   */
  thresholdFor(baseline: BaselineStats | null): number {
    if (baseline?.isCalibrated && baseline.meanGoalSimilarity > 0) {
      return Math.max(
        this.similarityThreshold,
        baseline.meanGoalSimilarity - 2 * Math.max(baseline.stdGoalSimilarity, MIN_BASELINE_STD)
      );
    }
    return this.similarityThreshold;
  }

  private extractOutputText(event: TraceEvent): string | null {
    const { text, output } = event.outputData;
    const candidate = typeof text === 'string' && text ? text : typeof output === 'string' ? output : '';
    return candidate.trim().length >= this.minOutputLength ? candidate : null;
  }

  private getGoalEmbedding(): Promise<number[]> {
    if (!this.goalEmbedding) {
      const pending = this.embedder.embed(this.goal);
      this.goalEmbedding = pending;
      // A failed embedding is not cached
      void pending.catch(() => {
        if (this.goalEmbedding === pending) this.goalEmbedding = undefined;
      });
    }
    return this.goalEmbedding;
  }
}
