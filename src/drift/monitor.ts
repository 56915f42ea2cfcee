/**
 * DriftMonitor - ties storage, detection, calibration and alerting together
 *
 * Every recorded event is persisted first, then run through the detectors in
 * a fixed order (action loop, goal drift, resource spike). Each resulting
 * drift is persisted, offered to the alert dispatcher and handed to the
 * registered callbacks before `recordEvent` resolves.
 */

import { EventEmitter } from 'node:events';
import { Logger } from '../core/logger';
import { generateId } from '../utils/helpers';
import { AlertDispatcher } from './alerts/alert-dispatcher';
import type { WebhookTransport } from './alerts/webhook-transport';
import { Calibrator } from './baseline/calibrator';
import { DriftMonitorConfig, DriftMonitorConfigInput, parseConfig } from './config';
import { ActionLoopDetector } from './detectors/action-loop';
import type { DriftDetector } from './detectors/detector';
import { GoalDriftDetector } from './detectors/goal-drift';
import { ResourceSpikeDetector } from './detectors/resource-spike';
import { EmbeddingProvider, LazyEmbeddingProvider } from './embedding/embedding-provider';
import { createEmbeddingProvider } from './embedding/model-providers';
import { TraceStore } from './storage/trace-store';
import {
  ActionType,
  BaselineStats,
  Clock,
  DriftEvent,
  Payload,
  TraceEvent,
  createTraceEvent,
  systemClock
} from './types';

export interface RecordEventOptions {
  runId?: string;
  tokenCount?: number;
  inputData?: Payload;
  outputData?: Payload;
  durationMs?: number;
  metadata?: Payload;
}

export type DriftCallback = (event: DriftEvent) => void;

export interface DriftMonitorDependencies {
  /** Shared store; when omitted the monitor opens (and closes) its own */
  store?: TraceStore;
  embedder?: EmbeddingProvider;
  transport?: WebhookTransport;
  clock?: Clock;
}

export class DriftMonitor extends EventEmitter {
  readonly agentId: string;
  readonly config: DriftMonitorConfig;
  readonly store: TraceStore;
  readonly calibrator: Calibrator;
  readonly actionLoop: ActionLoopDetector;
  readonly goalDrift: GoalDriftDetector;
  readonly resourceSpike: ResourceSpikeDetector;
  readonly alerts: AlertDispatcher;

  private readonly detectors: readonly DriftDetector[];
  private readonly embedder: EmbeddingProvider;
  private readonly ownsStore: boolean;
  private readonly clock: Clock;
  private readonly logger = new Logger('DriftMonitor');
  private readonly callbacks: DriftCallback[] = [];

  private baseline: BaselineStats | null = null;
  private currentRunId: string | null = null;
  private initialization?: Promise<void>;

  constructor(config: DriftMonitorConfigInput, dependencies: DriftMonitorDependencies = {}) {
    super();
    this.config = parseConfig(config);
    this.agentId = this.config.agentId;
    this.clock = dependencies.clock ?? systemClock;

    this.ownsStore = dependencies.store === undefined;
    this.store = dependencies.store ?? new TraceStore(this.config.storage);
    this.calibrator = new Calibrator(this.store, { requiredRuns: this.config.calibrationRuns });

    const { actionLoop, goalDrift, resourceSpike } = this.config.detectors;
    const embedding = this.config.embedding;
    this.embedder = dependencies.embedder ?? new LazyEmbeddingProvider(() => createEmbeddingProvider(embedding));

    this.actionLoop = new ActionLoopDetector(this.store, { ...actionLoop, clock: this.clock });
    this.goalDrift = new GoalDriftDetector(this.embedder, {
      ...goalDrift,
      goalDescription: this.config.goalDescription,
      clock: this.clock
    });
    this.resourceSpike = new ResourceSpikeDetector({ ...resourceSpike, clock: this.clock });
    this.detectors = [this.actionLoop, this.goalDrift, this.resourceSpike];

    this.alerts = new AlertDispatcher({
      ...this.config.alerts,
      transport: dependencies.transport,
      clock: this.clock
    });
  }

  /**
   * Load the persisted baseline; called implicitly by the first event or run end
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.store.getBaseline(this.agentId).then(baseline => {
        this.baseline = baseline;
        this.logger.info(
          `DriftMonitor initialised for '${this.agentId}' (baseline: ${baseline?.isCalibrated ? 'calibrated' : 'pending'})`
        );
      });
    }
    return this.initialization;
  }

  get activeRunId(): string | null {
    return this.currentRunId;
  }

  getBaseline(): BaselineStats | null {
    return this.baseline;
  }

  setGoal(goalDescription: string): void {
    this.goalDrift.setGoal(goalDescription);
  }

  startRun(runId?: string, goal?: string): string {
    const id = runId ?? generateId('run');
    this.currentRunId = id;
    if (goal) {
      this.goalDrift.setGoal(goal);
    }

    this.logger.debug(`Run started: ${id}`);
    this.emit('run_started', { agentId: this.agentId, runId: id });
    return id;
  }

  /**
   * Close a run and recalibrate the agent's baseline before resolving
   */
  async endRun(runId?: string): Promise<BaselineStats | null> {
    await this.initialize();

    const id = runId ?? this.currentRunId;
    if (!runId || runId === this.currentRunId) {
      this.currentRunId = null;
    }
    if (!id) {
      this.logger.warn('endRun called without an active run');
      return null;
    }

    this.resourceSpike.forgetRun(id);
    this.baseline = await this.calibrator.updateBaseline(this.agentId);

    this.emit('run_ended', { agentId: this.agentId, runId: id, baseline: this.baseline });
    return this.baseline;
  }

  /**
   * Persist one trace event and run it through the detectors.
   * Resolves to the drift events detected for it.
   */
  async recordEvent(actionType: ActionType, actionName: string, options: RecordEventOptions = {}): Promise<DriftEvent[]> {
    await this.initialize();

    const runId = options.runId ?? this.currentRunId ?? this.startRun();
    const event = createTraceEvent(
      {
        agentId: this.agentId,
        runId,
        actionType,
        actionName,
        tokenCount: options.tokenCount,
        inputData: options.inputData,
        outputData: options.outputData,
        durationMs: options.durationMs,
        metadata: options.metadata
      },
      this.clock
    );

    // Persisted before any detector runs
    await this.store.saveTrace(event);

    const drifts: DriftEvent[] = [];
    for (const detector of this.detectors) {
      const drift = await this.runDetector(detector, event);
      if (drift) drifts.push(drift);
    }

    for (const drift of drifts) {
      await this.store.saveDrift(drift);
      this.logger.warn(`DRIFT [${drift.severity}] ${drift.detector}: ${drift.message}`);
      await this.alerts.dispatch(drift);
      this.notify(drift);
    }

    return drifts;
  }

  /**
   * Register a hook fired synchronously, in registration order, for every persisted drift
   */
  onDrift(callback: DriftCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      const index = this.callbacks.indexOf(callback);
      if (index >= 0) this.callbacks.splice(index, 1);
    };
  }

  async getRecentAlerts(hours = 24, limit = 50): Promise<DriftEvent[]> {
    return this.store.getDriftEvents({
      agentId: this.agentId,
      since: this.clock() - hours * 60 * 60 * 1000,
      limit
    });
  }

  async getRunTraces(runId: string): Promise<TraceEvent[]> {
    return this.store.getRunTraces(this.agentId, runId);
  }

  async close(): Promise<void> {
    await this.embedder.dispose?.();
    if (this.ownsStore) {
      await this.store.close();
    }
    this.removeAllListeners();
  }

  // Private methods

  private async runDetector(detector: DriftDetector, event: TraceEvent): Promise<DriftEvent | null> {
    try {
      return await detector.check(event, this.baseline);
    } catch (error) {
      this.logger.error(`Detector '${detector.type}' failed on ${event.eventId}:`, error);
      return null;
    }
  }

  private notify(drift: DriftEvent): void {
    for (const callback of this.callbacks) {
      try {
        callback(drift);
      } catch (error) {
        this.logger.warn('Drift callback error:', error);
      }
    }

    try {
      this.emit('drift', drift);
    } catch (error) {
      this.logger.warn('Drift listener error:', error);
    }
  }
}
