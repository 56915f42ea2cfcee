/**
 * Contract shared by the drift detectors
 */

import type { BaselineStats, DetectorType, DriftEvent, TraceEvent } from '../types';

export interface DriftDetector {
  readonly type: DetectorType;
  /** A disabled detector returns null without touching any state */
  enabled: boolean;
  check(event: TraceEvent, baseline: BaselineStats | null): Promise<DriftEvent | null>;
}
