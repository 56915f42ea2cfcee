/**
 * Action loop detection
 * Flags a run that keeps calling the same tool, or the same short sequence
 * of tools, within a sliding window of recent tool calls.
 */

import type { ActionLoopConfig } from '../config';
import type { TraceStore } from '../storage/trace-store';
import { BaselineStats, Clock, DriftEvent, TraceEvent, createDriftEvent, systemClock } from '../types';
import type { DriftDetector } from './detector';

export type ActionLoopOptions = Partial<ActionLoopConfig> & { clock?: Clock };

export class ActionLoopDetector implements DriftDetector {
  readonly type = 'action_loop' as const;
  enabled: boolean;

  readonly windowSize: number;
  readonly maxRepeats: number;
  readonly sequenceLength: number;

  private readonly store: Pick<TraceStore, 'getRecentActions'>;
  private readonly clock: Clock;

  constructor(store: Pick<TraceStore, 'getRecentActions'>, options: ActionLoopOptions = {}) {
    this.store = store;
    this.enabled = options.enabled ?? true;
    this.windowSize = options.windowSize ?? 20;
    this.maxRepeats = options.maxRepeats ?? 4;
    this.sequenceLength = options.sequenceLength ?? 3;
    this.clock = options.clock ?? systemClock;
  }

  async check(event: TraceEvent, _baseline: BaselineStats | null): Promise<DriftEvent | null> {
    if (!this.enabled || event.actionType !== 'tool_call') return null;

    const recent = await this.store.getRecentActions(event.agentId, event.runId, this.windowSize);
    if (recent.length < this.maxRepeats) return null;

    return this.checkSingleRepeat(recent, event) ?? this.checkSequenceRepeat(recent, event);
  }

  private checkSingleRepeat(recent: string[], event: TraceEvent): DriftEvent | null {
    const tail = recent.slice(-this.maxRepeats);
    const toolName = tail[0];
    if (!tail.every(action => action === toolName)) return null;

    let repeatCount = 0;
    for (let i = recent.length - 1; i >= 0 && recent[i] === toolName; i--) {
      repeatCount++;
    }

    return createDriftEvent(
      {
        agentId: event.agentId,
        runId: event.runId,
        detector: this.type,
        score: this.score(repeatCount),
        message: `Action loop: ${toolName} called ${repeatCount}x consecutively`,
        suggestedAction: `Check ${toolName} input/output for stale data or error loops`,
        context: {
          toolName,
          repeatCount,
          recentActions: recent.slice(-10)
        }
      },
      this.clock
    );
  }

  /**
   * Repeating blocks such as A→B→A→B or A→B→C→A→B→C; shortest pattern wins
   */
  private checkSequenceRepeat(recent: string[], event: TraceEvent): DriftEvent | null {
    for (let length = 2; length <= this.sequenceLength; length++) {
      if (recent.length < length * this.maxRepeats) continue;

      const pattern = recent.slice(-length);
      let repeatCount = 0;
      for (let start = recent.length - length; start >= 0; start -= length) {
        const block = recent.slice(start, start + length);
        if (!block.every((action, i) => action === pattern[i])) break;
        repeatCount++;
      }

      if (repeatCount >= this.maxRepeats) {
        return createDriftEvent(
          {
            agentId: event.agentId,
            runId: event.runId,
            detector: this.type,
            score: this.score(repeatCount),
            message: `Action loop: sequence [${pattern.join(' → ')}] repeated ${repeatCount}x`,
            suggestedAction: 'Review agent logic for circular tool dependencies',
            context: {
              sequence: pattern,
              repeatCount,
              recentActions: recent.slice(-15)
            }
          },
          this.clock
        );
      }
    }
    return null;
  }

  private score(repeatCount: number): number {
    return Math.min(1, repeatCount / (this.maxRepeats * 2));
  }
}
