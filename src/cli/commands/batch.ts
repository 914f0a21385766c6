import * as fs from 'fs/promises';
import pc from 'picocolors';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { loadConfig } from '../../config.js';
import { getErrorMessage } from '../../errors.js';
import { GitHubPrProvider, createGitHubClient } from '../../github/client.js';
import { runWithConcurrency } from '../../orchestrator/pool.js';
import { BatchScheduler } from '../../orchestrator/scheduler.js';
import { TEMPLATES_DIR } from '../../paths.js';
import { isSupportedProjectType, sandboxImageFor } from '../../toolchains.js';
import { buildTrialConfig, taskConfigSchema, type TaskConfig, type TrialConfig } from '../../types.js';
import { formatBatchSummary, formatDuration } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import { handleShutdown } from '../utils/shutdown.js';

export interface BatchOptions {
  file: string;
  concurrency: number;
  output?: string;
  token?: string;
  retries: number;
  forceRebuild: boolean;
}

const taskFileSchema = z.array(taskConfigSchema).min(1, 'Task file lists no tasks');

/**
 * Load tasks from a JSON or YAML file holding a list of task configurations.
 */
export async function loadTaskFile(file: string): Promise<TaskConfig[]> {
  const raw = await fs.readFile(file, 'utf-8');
  return taskFileSchema.parse(parseYaml(raw));
}

/**
 * Verify every pull request listed in a task file with bounded parallelism.
 *
 * @returns Exit code (0=all verified, 1=any failed, 2=bad input, 130/143 on signals)
 */
export async function runBatch(options: BatchOptions): Promise<number> {
  const settings = loadConfig();
  const logger = createLogger(settings.logLevel);
  const childLogger = logger.child({ taskFile: options.file });

  let tasks: TaskConfig[];
  try {
    tasks = await loadTaskFile(options.file);
  } catch (error) {
    console.error(pc.red(`Error: invalid task file ${options.file}: ${getErrorMessage(error)}`));
    return 2;
  }

  const provider = new GitHubPrProvider(createGitHubClient({
    token: options.token ?? settings.githubToken,
    baseUrl: settings.githubApiUrl,
    logger: childLogger,
  }));

  console.log(pc.bold(`Resolving ${tasks.length} pull requests...`));
  const resolved = await runWithConcurrency(tasks, options.concurrency, async (task) => {
    if (!isSupportedProjectType(task.projectType)) {
      return { task, error: `Unsupported project type '${task.projectType}'` };
    }
    try {
      const prInfo = await provider.getPrInfo(task.prUrl);
      const config = buildTrialConfig(task, prInfo, sandboxImageFor(task.projectType), {
        outputDir: options.output ?? settings.outputDir,
        retryAttempts: options.retries,
      });
      return { task, config };
    } catch (error) {
      return { task, error: getErrorMessage(error) };
    }
  });

  const configs: TrialConfig[] = [];
  const unresolved: string[] = [];
  for (const entry of resolved) {
    if (entry.config) {
      configs.push(entry.config);
    } else {
      unresolved.push(entry.task.taskId);
      console.log(pc.red(`✗ ${entry.task.taskId}: ${entry.error}`));
    }
  }

  const scheduler = new BatchScheduler({
    concurrency: options.concurrency,
    logger: childLogger,
    orchestrator: {
      forceRebuild: options.forceRebuild,
      environmentOptions: { socketPath: settings.dockerSocket, templatesDir: TEMPLATES_DIR },
    },
    onTrialFinished: (entry) => {
      const mark = entry.success ? pc.green('✓') : pc.red('✗');
      const detail = entry.result ? formatDuration(entry.result.durationSec) : entry.error ?? '';
      console.log(`${mark} ${entry.key} ${pc.dim(detail)}`);
    },
  });
  const shutdown = handleShutdown(() => scheduler.cancel(), childLogger);

  try {
    console.log(pc.bold(`Running ${configs.length} trials`) + pc.dim(` (concurrency ${options.concurrency})`));
    const { summary } = await scheduler.run(configs);
    console.log('');
    console.log(formatBatchSummary(summary));
    if (unresolved.length > 0) {
      console.log(pc.red(`   Unresolved: ${unresolved.join(', ')}`));
    }
    return shutdown.exitCode ?? (summary.success && unresolved.length === 0 ? 0 : 1);
  } catch (error) {
    childLogger.error({ err: error }, 'Batch run failed');
    return shutdown.exitCode ?? 1;
  } finally {
    shutdown.dispose();
  }
}
