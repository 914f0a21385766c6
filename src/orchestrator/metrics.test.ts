import { describe, it, expect } from 'vitest';
import { TrialResult } from '../types.js';
import { TrialMetricsCollector, classifyTrialOutcome } from './metrics.js';

function result(fields: Partial<ConstructorParameters<typeof TrialResult>[0]> = {}): TrialResult {
  return new TrialResult({
    trialId: 't',
    trialName: 't',
    taskId: 'pr-1',
    prUrl: 'https://github.com/o/r/pull/1',
    prNumber: 1,
    trialDir: 'results/t',
    ...fields,
  });
}

describe('classifyTrialOutcome', () => {
  it('separates build failures from infrastructure failures', () => {
    const verification = { success: false, compilationOutput: '', durationSec: 1, errorMessage: 'x', tasksRun: [] };

    expect(classifyTrialOutcome(result({ verificationResult: { ...verification, success: true } }))).toBe('passed');
    expect(classifyTrialOutcome(result({ verificationResult: verification }))).toBe('build_failed');
    expect(classifyTrialOutcome(result({
      exceptionInfo: { exceptionType: 'E', exceptionMessage: 'm', traceback: 't', kind: 'timeout' },
    }))).toBe('timed_out');
    expect(classifyTrialOutcome(result({
      exceptionInfo: { exceptionType: 'E', exceptionMessage: 'm', traceback: 't', kind: 'workspace' },
    }))).toBe('errored');
  });
});

describe('TrialMetricsCollector', () => {
  it('returns zeros when nothing was recorded', () => {
    const metrics = new TrialMetricsCollector().getMetrics();
    expect(metrics.passRate).toBe(0);
    expect(metrics.avgDurationSec).toBe(0);
    expect(metrics.avgAttempts).toBe(0);
  });

  it('computes rates and averages', () => {
    const collector = new TrialMetricsCollector();
    collector.record('passed', 10);
    collector.record('passed', 20, 2);
    collector.record('errored', 30, 3);
    collector.record('timed_out', 40);

    const metrics = collector.getMetrics();
    expect(metrics.totalTrials).toBe(4);
    expect(metrics.passRate).toBe(0.5);
    expect(metrics.infraFailureRate).toBe(0.5);
    expect(metrics.avgDurationSec).toBe(25);
    expect(metrics.avgAttempts).toBe(1.75);

    collector.reset();
    expect(collector.getMetrics().totalTrials).toBe(0);
  });
});
