import * as fs from 'fs/promises';
import pino from 'pino';
import {
  ProvisioningError,
  TrialCancelledError,
  TrialTimeoutError,
  UnsupportedProjectTypeError,
  WorkspaceError,
  getErrorMessage,
} from '../errors.js';
import { TrialResult, type ExceptionInfo, type ExceptionKind, type TrialConfig, type VerificationResult } from '../types.js';
import {
  trialDirFor,
  writeCompilationLog,
  writeExceptionArtifact,
  writeTrialConfig,
  writeTrialResult,
} from './artifacts.js';
import {
  createEnvironment,
  type EnvironmentFactory,
  type EnvironmentFactoryOptions,
  type ExecutionEnvironment,
} from './environment.js';
import { createVerifier, type VerifierFactory } from './verifier.js';
import { setupPrWorkspace } from './workspace.js';

export type TrialState =
  | 'created'
  | 'environment_starting'
  | 'workspace_setup'
  | 'verifying'
  | 'finalized';

export interface TrialOrchestratorOptions {
  logger?: pino.Logger;
  createEnvironment?: EnvironmentFactory;
  createVerifier?: VerifierFactory;
  environmentOptions?: Omit<EnvironmentFactoryOptions, 'logger'>;
  /** Rebuild the sandbox image before starting */
  forceRebuild?: boolean;
  /** Seconds added to the task timeout to bound the whole trial (default: 600) */
  setupGraceSec?: number;
  onStateChange?: (state: TrialState) => void;
}

const DEFAULT_SETUP_GRACE_SEC = 600;

export function classifyError(error: unknown): ExceptionKind {
  if (error instanceof ProvisioningError) return 'provisioning';
  if (error instanceof WorkspaceError) return 'workspace';
  if (error instanceof UnsupportedProjectTypeError) return 'configuration';
  if (error instanceof TrialCancelledError) return 'cancelled';
  if (error instanceof TrialTimeoutError) return 'timeout';
  return 'unexpected';
}

export function toExceptionInfo(error: unknown): ExceptionInfo {
  if (error instanceof Error) {
    return {
      exceptionType: error.name,
      exceptionMessage: error.message,
      traceback: error.stack ?? `${error.name}: ${error.message}`,
      kind: classifyError(error),
    };
  }
  return {
    exceptionType: typeof error,
    exceptionMessage: String(error),
    traceback: String(error),
    kind: 'unexpected',
  };
}

/** Transient infrastructure failures get a fresh environment; nothing else does. */
function isRetryable(kind: ExceptionKind): boolean {
  return kind === 'provisioning' || kind === 'unexpected';
}

/**
 * Best-effort release: attempt, log, never propagate.
 * Returns whether the environment was torn down without error.
 */
export async function releaseEnvironment(
  environment: ExecutionEnvironment,
  log: pino.Logger
): Promise<boolean> {
  try {
    await environment.stop(true);
    log.info({ environment: environment.name }, 'Environment released');
    return true;
  } catch (err) {
    log.warn({ environment: environment.name, err: getErrorMessage(err) }, 'Environment teardown failed');
    return false;
  }
}

/**
 * TrialOrchestrator runs one verification trial end to end:
 * environment start -> workspace setup -> verification -> teardown.
 *
 * Key guarantees:
 * - config.json is written before any environment exists
 * - Fresh environment per attempt, stopped and deleted on every exit path
 * - Exceptions become ExceptionInfo; nothing propagates past run()
 * - result.json is written exactly once, after finishedAt is stamped
 * - Only provisioning/unexpected failures are retried (up to retryAttempts);
 *   a failed build is a result, not a reason to retry
 */
export class TrialOrchestrator {
  private config: TrialConfig;
  private options: TrialOrchestratorOptions;
  private log: pino.Logger;
  private abortController = new AbortController();
  private state: TrialState = 'created';

  constructor(config: TrialConfig, options: TrialOrchestratorOptions = {}) {
    this.config = config;
    this.options = options;
    this.log = (options.logger ?? pino({ level: 'silent' })).child({
      trialId: config.trialId,
      trialName: config.trialName,
    });
  }

  get currentState(): TrialState {
    return this.state;
  }

  /**
   * Abandon the current step. The environment is torn down by run() and the
   * trial finalizes with a 'cancelled' exception.
   */
  cancel(reason?: string): void {
    if (!this.abortController.signal.aborted) {
      this.log.warn({ reason, state: this.state }, 'Cancelling trial');
      this.abortController.abort(new TrialCancelledError(reason));
    }
  }

  async run(): Promise<TrialResult> {
    const config = this.config;
    const trialDir = trialDirFor(config);
    await fs.mkdir(trialDir, { recursive: true });

    const result = new TrialResult({
      trialId: config.trialId,
      trialName: config.trialName,
      taskId: config.task.taskId,
      prUrl: config.prInfo.prUrl,
      prNumber: config.prInfo.prNumber,
      trialDir,
      startedAt: new Date(),
    });

    await writeTrialConfig(trialDir, config);

    const budgetSec = config.task.timeoutSec + (this.options.setupGraceSec ?? DEFAULT_SETUP_GRACE_SEC);
    const budgetTimer = setTimeout(() => {
      this.log.warn({ budgetSec, state: this.state }, 'Trial budget exhausted');
      this.abortController.abort(new TrialTimeoutError(budgetSec));
    }, budgetSec * 1000);

    this.log.info({ prUrl: config.prInfo.prUrl, retryAttempts: config.retryAttempts }, 'Trial started');

    try {
      const maxAttempts = config.retryAttempts + 1;
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
          const verification = await this.runAttempt(attempt);
          result.verificationResult = verification;
          result.attempts = attempt;
          break;
        } catch (err) {
          const info = toExceptionInfo(err);
          const willRetry = attempt < maxAttempts &&
            isRetryable(info.kind) &&
            !this.abortController.signal.aborted;

          if (willRetry) {
            this.log.warn({ attempt, maxAttempts, kind: info.kind, err: info.exceptionMessage }, 'Attempt failed, retrying with a fresh environment');
            continue;
          }

          this.log.error({ attempt, kind: info.kind, err }, 'Trial failed with exception');
          result.exceptionInfo = info;
          result.attempts = attempt;
          await writeExceptionArtifact(trialDir, info.traceback);
          break;
        }
      }
    } finally {
      clearTimeout(budgetTimer);
      this.transition('finalized');
      result.finishedAt = new Date();
      await writeTrialResult(trialDir, result);
      if (result.verificationResult) {
        await writeCompilationLog(trialDir, result.verificationResult.compilationOutput);
      }
      this.log.info(
        { success: result.success, attempts: result.attempts, durationSec: result.durationSec },
        'Trial completed'
      );
    }

    return result;
  }

  private async runAttempt(attempt: number): Promise<VerificationResult> {
    const signal = this.abortController.signal;
    signal.throwIfAborted();

    const config = this.config;
    const verifier = (this.options.createVerifier ?? createVerifier)(config.verifier, this.log);

    // CRITICAL: fresh environment per attempt, never shared across trials or attempts
    const environment = (this.options.createEnvironment ?? createEnvironment)(config, {
      ...this.options.environmentOptions,
      logger: this.log,
    });
    this.log.info({ attempt, environment: environment.name }, 'Environment created');

    try {
      this.transition('environment_starting');
      await this.guard(environment.start(this.options.forceRebuild ?? false));

      this.transition('workspace_setup');
      const workspace = await this.guard(setupPrWorkspace(environment, config.prInfo, { logger: this.log }));
      this.log.info({ mergeClean: workspace.mergeClean }, 'Workspace ready');

      this.transition('verifying');
      return await this.guard(verifier.verify(environment, config.verifier.timeoutSec));
    } finally {
      await releaseEnvironment(environment, this.log);
    }
  }

  /**
   * Race an in-flight step against cancellation and the trial budget.
   * The abandoned step settles on its own once the environment is stopped.
   */
  private guard<T>(operation: Promise<T>): Promise<T> {
    const signal = this.abortController.signal;
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
      operation.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private transition(next: TrialState): void {
    this.log.debug({ from: this.state, to: next }, 'Trial state changed');
    this.state = next;
    this.options.onStateChange?.(next);
  }
}

/**
 * Convenience wrapper: run a single trial with default collaborators.
 */
export async function runTrial(
  config: TrialConfig,
  options: TrialOrchestratorOptions = {}
): Promise<TrialResult> {
  return new TrialOrchestrator(config, options).run();
}
