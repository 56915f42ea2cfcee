/**
 * Alert dispatcher
 * Gates drift events on severity and a per agent+detector cooldown, then
 * posts at most one webhook notification per key and window.
 */

import { EventEmitter } from 'node:events';
import { Logger } from '../../core/logger';
import { errorMessage } from '../../utils/helpers';
import type { AlertConfig } from '../config';
import {
  Clock,
  DetectorType,
  DriftEvent,
  NotificationResult,
  Severity,
  compareSeverity,
  systemClock
} from '../types';
import { buildPayload, detectFlavor } from './payloads';
import { FetchWebhookTransport, WebhookTransport } from './webhook-transport';

export type AlertDispatcherOptions = Partial<AlertConfig> & {
  transport?: WebhookTransport;
  clock?: Clock;
};

export interface DispatchRecord {
  event: DriftEvent;
  result: NotificationResult;
}

export interface AlertStatistics {
  totalAlerts: number;
  failedAlerts: number;
  alertsByDetector: Partial<Record<DetectorType, number>>;
  alertsBySeverity: Partial<Record<Severity, number>>;
}

export class AlertDispatcher extends EventEmitter {
  readonly webhookUrl: string | undefined;
  readonly minSeverity: Severity;
  readonly cooldownSeconds: number;
  readonly timeoutMs: number;

  private readonly source: string;
  private readonly historySize: number;
  private readonly transport: WebhookTransport;
  private readonly clock: Clock;
  private readonly logger = new Logger('AlertDispatcher');
  private readonly lastAlertTime = new Map<string, number>();
  private history: DispatchRecord[] = [];

  constructor(options: AlertDispatcherOptions = {}) {
    super();
    this.webhookUrl = options.webhookUrl;
    this.minSeverity = options.minSeverity ?? 'MED';
    this.cooldownSeconds = options.cooldownSeconds ?? 60;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.source = options.source ?? 'agent-drift-monitor';
    this.historySize = options.historySize ?? 1000;
    this.transport = options.transport ?? new FetchWebhookTransport();
    this.clock = options.clock ?? systemClock;
  }

  static cooldownKey(event: Pick<DriftEvent, 'agentId' | 'detector'>): string {
    return `${event.agentId}:${event.detector}`;
  }

  /**
   * Decide whether `event` may be sent. A positive answer starts the
   * cooldown for its key; events below `minSeverity` never touch it.
   */
  shouldAlert(event: DriftEvent): boolean {
    if (!this.webhookUrl) return false;
    if (compareSeverity(event.severity, this.minSeverity) < 0) return false;

    const key = AlertDispatcher.cooldownKey(event);
    const now = this.clock();
    const last = this.lastAlertTime.get(key);
    if (last !== undefined && now - last < this.cooldownSeconds * 1000) return false;

    this.lastAlertTime.set(key, now);
    return true;
  }

  /**
   * Gate and send. Resolves to null when the gate suppressed the event;
   * delivery failures resolve to an unsuccessful result and are never retried.
   */
  async dispatch(event: DriftEvent): Promise<NotificationResult | null> {
    if (!this.shouldAlert(event) || !this.webhookUrl) return null;

    const url = this.webhookUrl;
    const channel = detectFlavor(url);
    let result: NotificationResult;
    let failure: unknown;

    try {
      await this.transport.post(url, buildPayload(url, event, this.source), this.timeoutMs);
      result = { success: true, channel, timestamp: this.clock() };
      this.logger.info(`Alert sent for ${event.agentId}: ${event.message}`);
    } catch (error) {
      failure = error;
      result = { success: false, channel, error: errorMessage(error), timestamp: this.clock() };
      this.logger.warn(`Failed to send alert for ${event.agentId}:`, error);
    }

    this.record({ event, result });
    if (result.success) {
      this.notifyListeners('alert_sent', { event, result });
    } else {
      this.notifyListeners('alert_failed', { event, result, error: failure });
    }
    return result;
  }

  getLastAlertTime(key: string): number | undefined {
    return this.lastAlertTime.get(key);
  }

  resetCooldowns(): void {
    this.lastAlertTime.clear();
  }

  getAlertHistory(limit = 100): DispatchRecord[] {
    return this.history.slice(-limit);
  }

  getStatistics(): AlertStatistics {
    const alertsByDetector: Partial<Record<DetectorType, number>> = {};
    const alertsBySeverity: Partial<Record<Severity, number>> = {};
    let failedAlerts = 0;

    for (const { event, result } of this.history) {
      alertsByDetector[event.detector] = (alertsByDetector[event.detector] ?? 0) + 1;
      alertsBySeverity[event.severity] = (alertsBySeverity[event.severity] ?? 0) + 1;
      if (!result.success) failedAlerts++;
    }

    return {
      totalAlerts: this.history.length,
      failedAlerts,
      alertsByDetector,
      alertsBySeverity
    };
  }

  private notifyListeners(eventName: 'alert_sent' | 'alert_failed', payload: DispatchRecord & { error?: unknown }): void {
    try {
      this.emit(eventName, payload);
    } catch (error) {
      this.logger.warn(`Listener error on ${eventName}:`, error);
    }
  }

  private record(entry: DispatchRecord): void {
    this.history.push(entry);
    if (this.history.length > this.historySize) {
      this.history = this.history.slice(-Math.ceil(this.historySize / 2));
    }
  }
}
