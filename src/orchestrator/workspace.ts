import pino from 'pino';
import { WorkspaceError, type WorkspaceStep } from '../errors.js';
import type { PRInfo } from '../types.js';
import type { ExecutionEnvironment } from './environment.js';

/** Local branch holding the PR head */
export const PR_BRANCH = 'pr-source';
/** Throwaway branch at the target commit that receives the mock merge */
export const MERGE_BRANCH = 'mock-merge';

export interface WorkspaceSetupOptions {
  fetchDepth?: number;
  logger?: pino.Logger;
}

export interface WorkspaceSetupResult {
  mergeClean: boolean;
  mergeOutput: string;
}

/**
 * Quote a value for a POSIX shell command line.
 */
export function shellQuote(value: string): string {
  if (/^[\w@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Turn a freshly started environment into a checked-out, PR-merged tree.
 *
 * Runs five commands in order: clone, fetch, checkout, branch, merge.
 * The first four throw WorkspaceError on failure. The merge never throws:
 * a conflicted tree is left as-is so the build surfaces the consequence.
 */
export async function setupPrWorkspace(
  environment: ExecutionEnvironment,
  prInfo: PRInfo,
  options: WorkspaceSetupOptions = {}
): Promise<WorkspaceSetupResult> {
  const log = options.logger ?? pino({ level: 'silent' });
  const fetchDepth = options.fetchDepth ?? 50;
  const workingDir = environment.workingDir;

  const run = async (step: WorkspaceStep, command: string, failure: string, cwd?: string) => {
    log.info({ step }, 'Workspace step started');
    const result = await environment.execute(command, { workingDir: cwd });
    if (result.exitCode !== 0) {
      log.error({ step, exitCode: result.exitCode, stderr: result.stderr }, 'Workspace step failed');
      throw new WorkspaceError(step, `${failure}: ${result.stderr.trim()}`);
    }
  };

  await run(
    'clone',
    `git clone --depth=1 --branch ${shellQuote(prInfo.targetBranch)} ` +
    `${shellQuote(prInfo.targetRepoUrl)} ${shellQuote(workingDir)}`,
    'Failed to clone repository',
    '/'
  );

  await run(
    'fetch',
    `git fetch --depth=${fetchDepth} origin ${shellQuote(prInfo.targetCommit)} && ` +
    `git fetch origin ${shellQuote(`pull/${prInfo.prNumber}/head:${PR_BRANCH}`)}`,
    'Failed to fetch PR'
  );

  await run(
    'checkout',
    `git checkout ${shellQuote(prInfo.targetCommit)}`,
    'Failed to checkout target commit'
  );

  await run(
    'branch',
    `git checkout -b ${MERGE_BRANCH}`,
    'Failed to create merge branch'
  );

  log.info({ step: 'merge' }, 'Workspace step started');
  const merge = await environment.execute(`git merge ${PR_BRANCH} --no-commit --no-edit`);
  const mergeClean = merge.exitCode === 0;
  if (!mergeClean) {
    log.warn(
      { step: 'merge', exitCode: merge.exitCode, stderr: merge.stderr },
      'Merge did not apply cleanly, continuing to verification'
    );
  }

  return {
    mergeClean,
    mergeOutput: `${merge.stdout}${merge.stderr}`,
  };
}
