import {
  buildTrialConfig,
  taskConfigSchema,
  type PRInfo,
  type TaskConfigInput,
  type TrialConfig,
  type TrialConfigOverrides,
} from '../types.js';

export const TARGET_SHA = 'a'.repeat(40);
export const SOURCE_SHA = 'b'.repeat(40);

export function makePrInfo(overrides: Partial<PRInfo> = {}): PRInfo {
  return {
    prUrl: 'https://github.com/acme/widgets/pull/42',
    repoOwner: 'acme',
    repoName: 'widgets',
    prNumber: 42,
    sourceBranch: 'feature/faster-parse',
    sourceCommit: SOURCE_SHA,
    sourceRepoUrl: 'https://github.com/contrib/widgets.git',
    targetBranch: 'main',
    targetCommit: TARGET_SHA,
    targetRepoUrl: 'https://github.com/acme/widgets.git',
    title: 'Speed up the parser',
    state: 'open',
    ...overrides,
  };
}

export function makeTrialConfig(
  task: Partial<TaskConfigInput> = {},
  overrides: TrialConfigOverrides = {}
): TrialConfig {
  const parsedTask = taskConfigSchema.parse({
    taskId: 'pr-42',
    prUrl: 'https://github.com/acme/widgets/pull/42',
    ...task,
  });
  return buildTrialConfig(parsedTask, makePrInfo(), 'pr-verifier/java-gradle:latest', overrides);
}
