import { afterEach, beforeAll, beforeEach, describe, expect, it } from '@jest/globals';
import { Logger } from '../../../core/logger';
import { TraceStore } from '../../storage/trace-store';
import { ActionType, createTraceEvent, emptyBaseline } from '../../types';
import { Calibrator, findCommonSequences, mean, stdDev } from '../calibrator';

const AGENT = 'agent-1';

describe('statistics helpers', () => {
  it('should compute the mean and population standard deviation', () => {
    expect(mean([])).toBe(0);
    expect(mean([1, 2, 3, 6])).toBe(3);
    expect(stdDev([5])).toBe(0);
    expect(stdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('should rank common subsequences by the number of runs containing them', () => {
    expect(
      findCommonSequences(
        [
          ['a', 'b', 'c'],
          ['a', 'b', 'd']
        ],
        2
      )
    ).toEqual([
      ['a', 'b'],
      ['b', 'c']
    ]);
  });

  it('should count a common subsequence once per run', () => {
    const [top] = findCommonSequences([['x', 'y', 'x', 'y'], ['x', 'y'], ['y', 'x']], 1);
    expect(top).toEqual(['x', 'y']);

    expect(findCommonSequences([['solo']])).toEqual([]);
  });
});

describe('Calibrator', () => {
  let store: TraceStore;
  let calibrator: Calibrator;
  let clock: number;

  async function recordRun(runId: string, actions: Array<[ActionType, string, number]>, durationMs = 10) {
    for (const [actionType, actionName, tokenCount] of actions) {
      clock += 1000;
      await store.saveTrace(
        createTraceEvent({ agentId: AGENT, runId, actionType, actionName, tokenCount, durationMs, timestamp: clock })
      );
    }
  }

  beforeAll(() => {
    Logger.setLevel('error');
  });

  beforeEach(() => {
    clock = 0;
    store = new TraceStore({ databasePath: ':memory:' });
    calibrator = new Calibrator(store, { requiredRuns: 3 });
  });

  afterEach(async () => {
    await store.close();
  });

  it('should store an empty baseline when the agent has no runs', async () => {
    const baseline = await calibrator.updateBaseline(AGENT);

    expect(baseline).toEqual(emptyBaseline(AGENT));
    expect(await store.getBaseline(AGENT)).toEqual(emptyBaseline(AGENT));
  });

  it('should become calibrated exactly at the required number of runs', async () => {
    await recordRun('run-1', [
      ['tool_call', 'search', 0],
      ['tool_call', 'read', 0],
      ['llm_request', 'answer', 100]
    ]);
    await recordRun('run-2', [
      ['tool_call', 'search', 0],
      ['tool_call', 'read', 0],
      ['tool_call', 'search', 0],
      ['tool_call', 'read', 0],
      ['llm_request', 'answer', 300]
    ]);

    const partial = await calibrator.updateBaseline(AGENT);
    expect(partial).toMatchObject({
      calibrationRuns: 2,
      meanTokensPerRun: 200,
      stdTokensPerRun: 100,
      meanToolsPerRun: 3,
      stdToolsPerRun: 1,
      meanDurationMs: 40,
      stdDurationMs: 10,
      isCalibrated: false
    });
    expect(partial.commonSequences[0]).toEqual(['search', 'read']);

    await recordRun('run-3', [['llm_request', 'answer', 200]]);

    const full = await calibrator.updateBaseline(AGENT);
    expect(full.calibrationRuns).toBe(3);
    expect(full.isCalibrated).toBe(true);
    expect(await store.getBaseline(AGENT)).toEqual(full);
  });

  it('should only consider the most recent runs', async () => {
    for (const [runId, tokens] of [
      ['old', 10_000],
      ['run-a', 100],
      ['run-b', 100],
      ['run-c', 100]
    ] as const) {
      await recordRun(runId, [['llm_request', 'answer', tokens]]);
    }

    const baseline = await calibrator.updateBaseline(AGENT);
    expect(baseline.calibrationRuns).toBe(3);
    expect(baseline.meanTokensPerRun).toBe(100);
    expect(baseline.stdTokensPerRun).toBe(0);
  });
});
