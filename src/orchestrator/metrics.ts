/**
 * Trial metrics collection for batch reporting
 *
 * In-memory tracking of trial outcomes and durations across one batch.
 */

import type { TrialResult } from '../types.js';

export type TrialOutcome = 'passed' | 'build_failed' | 'errored' | 'cancelled' | 'timed_out';

export interface TrialMetrics {
  totalTrials: number;
  passedCount: number;
  buildFailedCount: number;
  erroredCount: number;
  cancelledCount: number;
  timedOutCount: number;
  totalAttempts: number;
  totalDurationSec: number;
}

export interface ComputedMetrics extends TrialMetrics {
  passRate: number; // passedCount / totalTrials (0-1)
  infraFailureRate: number; // (errored + timedOut) / totalTrials (0-1)
  avgDurationSec: number;
  avgAttempts: number;
}

/**
 * Map a finished trial to its outcome. A verified build failure and an
 * infrastructure exception are distinct outcomes.
 */
export function classifyTrialOutcome(result: TrialResult): TrialOutcome {
  if (result.exceptionInfo) {
    switch (result.exceptionInfo.kind) {
      case 'cancelled':
        return 'cancelled';
      case 'timeout':
        return 'timed_out';
      default:
        return 'errored';
    }
  }
  return result.success ? 'passed' : 'build_failed';
}

function emptyMetrics(): TrialMetrics {
  return {
    totalTrials: 0,
    passedCount: 0,
    buildFailedCount: 0,
    erroredCount: 0,
    cancelledCount: 0,
    timedOutCount: 0,
    totalAttempts: 0,
    totalDurationSec: 0,
  };
}

/**
 * In-memory metrics collector for trials
 *
 * Per-process only; the batch summary is the export.
 */
export class TrialMetricsCollector {
  private metrics: TrialMetrics = emptyMetrics();

  /**
   * Record a trial outcome
   *
   * @param attempts - Attempts the orchestrator made for this trial
   */
  record(outcome: TrialOutcome, durationSec: number, attempts = 1): void {
    this.metrics.totalTrials++;
    this.metrics.totalDurationSec += durationSec;
    this.metrics.totalAttempts += attempts;

    switch (outcome) {
      case 'passed':
        this.metrics.passedCount++;
        break;
      case 'build_failed':
        this.metrics.buildFailedCount++;
        break;
      case 'errored':
        this.metrics.erroredCount++;
        break;
      case 'cancelled':
        this.metrics.cancelledCount++;
        break;
      case 'timed_out':
        this.metrics.timedOutCount++;
        break;
    }
  }

  recordResult(result: TrialResult): void {
    this.record(classifyTrialOutcome(result), result.durationSec ?? 0, result.attempts);
  }

  /**
   * Get raw and computed metrics. All computed values are 0 when nothing
   * has been recorded.
   */
  getMetrics(): ComputedMetrics {
    const { totalTrials } = this.metrics;

    return {
      ...this.metrics,
      passRate: totalTrials > 0 ? this.metrics.passedCount / totalTrials : 0,
      infraFailureRate: totalTrials > 0
        ? (this.metrics.erroredCount + this.metrics.timedOutCount) / totalTrials
        : 0,
      avgDurationSec: totalTrials > 0 ? this.metrics.totalDurationSec / totalTrials : 0,
      avgAttempts: totalTrials > 0 ? this.metrics.totalAttempts / totalTrials : 0,
    };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }
}
