/**
 * Drift monitoring system factory - creates and wires the monitor and its live feed
 */

import { DriftMonitorConfigInput, loadConfigFromEnv } from './config';
import { DriftMonitor, DriftMonitorDependencies } from './monitor';
import { DriftStreamer, StreamingConfig } from './streaming/drift-streamer';

export interface DriftMonitoringSystem {
  monitor: DriftMonitor;
  streamer?: DriftStreamer;
  shutdown(): Promise<void>;
}

export interface DriftMonitoringSystemOptions extends DriftMonitorDependencies {
  config: DriftMonitorConfigInput;
  /** Overlay DRIFT_MONITOR_* environment variables onto `config` */
  useEnvironment?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Live WebSocket feed of drift events; omitted or false disables it */
  streaming?: Partial<StreamingConfig> | false;
}

/**
 * Create a monitor, load its baseline and, when requested, start a streamer fed by `onDrift`
 */
export async function createDriftMonitoringSystem(
  options: DriftMonitoringSystemOptions
): Promise<DriftMonitoringSystem> {
  const { config, useEnvironment = false, env, streaming = false, ...dependencies } = options;

  const resolved = useEnvironment ? loadConfigFromEnv(config, env) : config;
  const monitor = new DriftMonitor(resolved, dependencies);
  await monitor.initialize();

  let streamer: DriftStreamer | undefined;
  if (streaming) {
    const liveFeed = new DriftStreamer(streaming);
    try {
      await liveFeed.start();
    } catch (error) {
      await monitor.close();
      throw error;
    }
    monitor.onDrift(event => {
      liveFeed.broadcastDrift(event);
    });
    streamer = liveFeed;
  }

  return {
    monitor,
    streamer,
    async shutdown() {
      await streamer?.stop();
      await monitor.close();
    }
  };
}

/**
 * Minimal setup for testing: in-memory database, no streaming, no webhook
 */
export function createTestDriftMonitor(
  config: Partial<DriftMonitorConfigInput> = {},
  dependencies: DriftMonitorDependencies = {}
): DriftMonitor {
  return new DriftMonitor(
    {
      agentId: 'test-agent',
      ...config,
      storage: { databasePath: ':memory:', ...config.storage }
    },
    dependencies
  );
}
