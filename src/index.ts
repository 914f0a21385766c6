export * from './orchestrator/index.js';
export * from './types.js';
export * from './errors.js';
export { TOOLCHAINS, isSupportedProjectType, sandboxImageFor } from './toolchains.js';
export type { SupportedProjectType, Toolchain } from './toolchains.js';
export { loadConfig } from './config.js';
export type { VerifierSettings } from './config.js';
export { GitHubPrProvider, createGitHubClient, parsePrUrl } from './github/client.js';
export { ProjectDetector, detectFromFiles } from './github/detector.js';
export { generateComposeTask, composeTaskName } from './compose/generator.js';
export { runComposeTask, runAllComposeTasks, listComposeTasks, readComposeResult } from './compose/runner.js';
export type { ComposeTask, ComposeTaskOptions } from './compose/generator.js';
export type {
  ComposeBatchReport,
  ComposeResult,
  ComposeRunOutcome,
  ComposeTaskInfo,
  ComposeTaskStatus,
} from './compose/runner.js';
