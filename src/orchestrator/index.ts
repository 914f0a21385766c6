/**
 * Orchestrator module exports
 *
 * The orchestrator runs on the host and manages:
 * - Sandbox lifecycle (Docker via dockerode)
 * - Mock-merge workspaces and build verification
 * - Trial artifacts, retries and batch scheduling
 */

export { createEnvironment, environmentNameFor } from './environment.js';
export { DockerEnvironment } from './docker-environment.js';
export { setupPrWorkspace, shellQuote, PR_BRANCH, MERGE_BRANCH } from './workspace.js';
export {
  BuildToolVerifier,
  CustomScriptVerifier,
  createVerifier,
  COMPILATION_FAILED_MESSAGE,
} from './verifier.js';
export {
  trialDirFor,
  readTrialConfig,
  readTrialResult,
  CONFIG_ARTIFACT,
  RESULT_ARTIFACT,
  COMPILATION_LOG_ARTIFACT,
  EXCEPTION_ARTIFACT,
} from './artifacts.js';
export { TrialOrchestrator, runTrial, classifyError } from './trial.js';
export { BatchScheduler, batchKeyFor, summarizeBatch } from './scheduler.js';
export { TrialMetricsCollector, classifyTrialOutcome } from './metrics.js';
export { runWithConcurrency } from './pool.js';
export type {
  ExecResult,
  ExecOptions,
  ExecutionEnvironment,
  EnvironmentFactory,
  EnvironmentFactoryOptions,
} from './environment.js';
export type { DockerEnvironmentOptions, ImageBuildConfig } from './docker-environment.js';
export type { WorkspaceSetupOptions, WorkspaceSetupResult } from './workspace.js';
export type { Verifier, VerifierFactory } from './verifier.js';
export type { TrialState, TrialOrchestratorOptions } from './trial.js';
export type { BatchSchedulerOptions, BatchEntry, BatchSummary, BatchReport, TrialRunner } from './scheduler.js';
export type { TrialMetrics, ComputedMetrics, TrialOutcome } from './metrics.js';
