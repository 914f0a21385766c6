import pino from 'pino';
import { getErrorMessage } from '../errors.js';
import type { TrialConfig, TrialResult } from '../types.js';
import { TrialMetricsCollector, type ComputedMetrics } from './metrics.js';
import { runWithConcurrency } from './pool.js';
import { TrialOrchestrator, type TrialOrchestratorOptions } from './trial.js';

/**
 * Runs one trial to completion. The signal fires when the batch is cancelled.
 */
export type TrialRunner = (config: TrialConfig, signal: AbortSignal) => Promise<TrialResult>;

export interface BatchSchedulerOptions {
  concurrency: number;
  logger?: pino.Logger;
  /** Options for the default orchestrator-backed runner */
  orchestrator?: Omit<TrialOrchestratorOptions, 'logger'>;
  /** Replace the orchestrator-backed runner */
  runTrial?: TrialRunner;
  onTrialFinished?: (entry: BatchEntry) => void;
}

export interface BatchEntry {
  key: string;
  success: boolean;
  result: TrialResult | null;
  /** Set when the trial never produced a result */
  error?: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  failedKeys: string[];
  success: boolean;
  metrics: ComputedMetrics;
}

export interface BatchReport {
  results: Map<string, BatchEntry>;
  summary: BatchSummary;
}

/** Identity a trial is reported under */
export function batchKeyFor(config: TrialConfig): string {
  return config.trialName;
}

export function summarizeBatch(
  results: Map<string, BatchEntry>,
  metrics: ComputedMetrics
): BatchSummary {
  const entries = [...results.values()];
  const failedKeys = entries.filter((entry) => !entry.success).map((entry) => entry.key);
  return {
    total: entries.length,
    succeeded: entries.length - failedKeys.length,
    failed: failedKeys.length,
    failedKeys,
    success: failedKeys.length === 0,
    metrics,
  };
}

/**
 * BatchScheduler fans independent trials out over a bounded worker pool.
 *
 * - At most `concurrency` trials run at once
 * - Each trial owns its environment, output directory and failure domain
 * - A throw from the runner itself is recorded against that trial's key only
 */
export class BatchScheduler {
  private options: BatchSchedulerOptions;
  private log: pino.Logger;
  private abortController = new AbortController();

  constructor(options: BatchSchedulerOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.options = options;
    this.log = (options.logger ?? pino({ level: 'silent' })).child({ component: 'batch' });
  }

  /**
   * Cancel running trials and skip the ones not yet started.
   * Called from signal handlers so sandboxes are torn down before exit.
   */
  cancel(): void {
    if (!this.abortController.signal.aborted) {
      this.log.warn('Cancelling batch');
      this.abortController.abort();
    }
  }

  async run(configs: readonly TrialConfig[]): Promise<BatchReport> {
    const keys = new Set<string>();
    for (const config of configs) {
      const key = batchKeyFor(config);
      if (keys.has(key)) {
        throw new Error(`Duplicate trial identity in batch: ${key}`);
      }
      keys.add(key);
    }

    const results = new Map<string, BatchEntry>();
    const metrics = new TrialMetricsCollector();
    const runTrial = this.options.runTrial ?? this.runWithOrchestrator;
    const signal = this.abortController.signal;
    let finished = 0;

    this.log.info({ total: configs.length, concurrency: this.options.concurrency }, 'Batch started');

    await runWithConcurrency(configs, this.options.concurrency, async (config) => {
      const key = batchKeyFor(config);
      let entry: BatchEntry;

      if (signal.aborted) {
        entry = { key, success: false, result: null, error: 'Cancelled before start' };
        metrics.record('cancelled', 0, 0);
      } else {
        try {
          const result = await runTrial(config, signal);
          entry = { key, success: result.success, result };
          metrics.recordResult(result);
        } catch (err) {
          this.log.error({ key, err }, 'Trial crashed outside the orchestrator');
          entry = { key, success: false, result: null, error: getErrorMessage(err) };
          metrics.record('errored', 0, 0);
        }
      }

      results.set(key, entry);
      finished++;
      this.log.info({ key, success: entry.success, finished, total: configs.length }, 'Trial finished');
      this.options.onTrialFinished?.(entry);
    });

    const summary = summarizeBatch(results, metrics.getMetrics());
    this.log.info(
      { total: summary.total, succeeded: summary.succeeded, failed: summary.failed },
      'Batch completed'
    );
    return { results, summary };
  }

  private runWithOrchestrator: TrialRunner = async (config, signal) => {
    const orchestrator = new TrialOrchestrator(config, {
      ...this.options.orchestrator,
      logger: this.log,
    });
    const onAbort = () => orchestrator.cancel('batch cancelled');
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await orchestrator.run();
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  };
}
