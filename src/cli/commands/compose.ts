import * as path from 'path';
import pc from 'picocolors';
import { generateComposeTask } from '../../compose/generator.js';
import {
  listComposeTasks,
  runAllComposeTasks,
  runComposeTask,
  type ComposeTaskStatus,
} from '../../compose/runner.js';
import { loadConfig } from '../../config.js';
import { getErrorMessage } from '../../errors.js';
import { GitHubPrProvider, createGitHubClient } from '../../github/client.js';
import { ProjectDetector } from '../../github/detector.js';
import { isSupportedProjectType } from '../../toolchains.js';
import type { ProjectType } from '../../types.js';
import { tailLines } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';

export interface ComposeGenerateOptions {
  prUrl: string;
  projectType?: ProjectType;
  tasksDir?: string;
  token?: string;
  cpus: number;
  memoryMb: number;
  runTests: boolean;
}

export interface ComposeRunCliOptions {
  task: string;
  tasksDir?: string;
  cleanup: boolean;
}

export interface ComposeRunAllOptions {
  tasksDir?: string;
  concurrency: number;
  pattern: string;
  skipVerified: boolean;
}

const STATUS_LABELS: Record<ComposeTaskStatus, string> = {
  passed: pc.green('✓ Passed'),
  failed: pc.red('✗ Failed'),
  not_run: pc.yellow('⋯ Not run'),
};

export async function composeGenerate(options: ComposeGenerateOptions): Promise<number> {
  const settings = loadConfig();
  const logger = createLogger(settings.logLevel).child({ prUrl: options.prUrl });
  const github = createGitHubClient({
    token: options.token ?? settings.githubToken,
    baseUrl: settings.githubApiUrl,
    logger,
  });

  try {
    const prInfo = await new GitHubPrProvider(github).getPrInfo(options.prUrl);
    const projectType = options.projectType
      ?? await new ProjectDetector(github, logger).detect(prInfo.repoOwner, prInfo.repoName, prInfo.targetBranch);
    if (!isSupportedProjectType(projectType)) {
      console.error(pc.red(
        `Error: unable to detect project type for ${prInfo.repoOwner}/${prInfo.repoName}; pass --project-type`
      ));
      return 2;
    }

    const task = await generateComposeTask(prInfo, projectType, {
      tasksDir: options.tasksDir ?? settings.tasksDir,
      cpus: options.cpus,
      memoryMb: options.memoryMb,
      runTests: options.runTests,
    });

    console.log(pc.green('✓ Task generated'));
    console.log(`   Location:  ${task.dir}`);
    console.log(`   Task name: ${task.name}`);
    console.log(`   Type:      ${projectType}`);
    console.log('');
    console.log(pc.bold('Next steps:'));
    console.log(`   1. ${pc.cyan(`pr-verify compose run --task ${task.name}`)}`);
    console.log(`   2. ${pc.cyan(`cd ${task.dir} && docker compose up`)}`);
    return 0;
  } catch (error) {
    console.error(pc.red(`Error: ${getErrorMessage(error)}`));
    return 1;
  }
}

export async function composeRun(options: ComposeRunCliOptions): Promise<number> {
  const settings = loadConfig();
  const logger = createLogger(settings.logLevel);
  const taskDir = path.join(options.tasksDir ?? settings.tasksDir, options.task);

  console.log(pc.bold(`Running task: ${options.task}`));
  try {
    const outcome = await runComposeTask(taskDir, { cleanup: options.cleanup, logger });
    const { result } = outcome;

    if (!result || result.status === 'not_run') {
      console.log(pc.yellow('! No result file found'));
      console.log(pc.dim(tailLines(outcome.output)));
      return 1;
    }

    console.log(outcome.success ? pc.green('✓ Verification PASSED') : pc.red('✗ Verification FAILED'));
    if (result.exitCode !== null) {
      console.log(`   Exit code: ${result.exitCode}`);
    }
    console.log(`   Results:   ${path.join(taskDir, 'logs', 'verifier')}`);
    if (!outcome.success) {
      console.log('');
      console.log(pc.dim(tailLines(outcome.output)));
    }
    return outcome.success ? 0 : 1;
  } catch (error) {
    console.error(pc.red(`Error: ${getErrorMessage(error)}`));
    return 1;
  }
}

export async function composeRunAll(options: ComposeRunAllOptions): Promise<number> {
  const settings = loadConfig();
  const logger = createLogger(settings.logLevel);
  const tasksDir = options.tasksDir ?? settings.tasksDir;

  const report = await runAllComposeTasks(tasksDir, {
    concurrency: options.concurrency,
    pattern: options.pattern,
    skipVerified: options.skipVerified,
    logger,
    onTaskFinished: (outcome) => {
      const mark = outcome.success ? pc.green('✓') : pc.red('✗');
      console.log(outcome.error ? `${mark} ${outcome.task}: ${outcome.error}` : `${mark} ${outcome.task}`);
    },
  });

  if (report.total === 0) {
    console.log(pc.yellow('No tasks found matching criteria'));
    return 0;
  }

  console.log('');
  console.log(pc.bold('Summary:'));
  console.log(`   Total:   ${report.total}`);
  console.log(pc.green(`   Success: ${report.succeeded}`));
  console.log(pc.red(`   Failed:  ${report.failed}`));
  if (report.failedTasks.length > 0) {
    console.log('');
    console.log(pc.bold('Failed tasks:'));
    for (const task of report.failedTasks) {
      console.log(`   - ${task}`);
    }
  }
  return report.failed === 0 ? 0 : 1;
}

export async function composeList(options: { tasksDir?: string; status: boolean }): Promise<number> {
  const settings = loadConfig();
  const tasks = await listComposeTasks(options.tasksDir ?? settings.tasksDir);

  if (tasks.length === 0) {
    console.log(pc.yellow('No tasks found'));
    return 0;
  }

  console.log(pc.bold(`Docker Compose Tasks (${tasks.length})`));
  const width = Math.max(...tasks.map((task) => task.name.length));
  for (const task of tasks) {
    const columns = [pc.cyan(task.name.padEnd(width)), pc.magenta(`#${task.prNumber}`.padEnd(8))];
    if (options.status) {
      columns.push(STATUS_LABELS[task.status]);
    }
    console.log(`   ${columns.join('  ')}`);
  }
  return 0;
}
