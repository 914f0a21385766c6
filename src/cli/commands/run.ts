import pc from 'picocolors';
import { loadConfig } from '../../config.js';
import { getErrorMessage } from '../../errors.js';
import { GitHubPrProvider, createGitHubClient } from '../../github/client.js';
import { ProjectDetector } from '../../github/detector.js';
import { TrialOrchestrator } from '../../orchestrator/trial.js';
import { TEMPLATES_DIR } from '../../paths.js';
import { isSupportedProjectType, sandboxImageFor } from '../../toolchains.js';
import { buildTrialConfig, taskConfigSchema, type PRInfo, type ProjectType } from '../../types.js';
import { formatTrialResult } from '../utils/format.js';
import { createLogger } from '../utils/logger.js';
import { handleShutdown } from '../utils/shutdown.js';

export interface RunOptions {
  prUrl: string;
  projectType?: ProjectType;
  output?: string;
  token?: string;
  cpus: number;
  memoryMb: number;
  timeoutSec: number;
  allowInternet: boolean;
  verifyScript?: string;
  retries: number;
  forceRebuild: boolean;
}

/**
 * Verify a single pull request.
 *
 * 1. Fetch PR metadata and detect the project type when not given
 * 2. Build the trial configuration from the task settings
 * 3. Run the trial, cancelling it on SIGINT/SIGTERM
 * 4. Print the report
 *
 * @returns Exit code (0=verified, 1=failed, 2=bad input, 130=SIGINT, 143=SIGTERM)
 */
export async function runSingle(options: RunOptions): Promise<number> {
  const settings = loadConfig();
  const logger = createLogger(settings.logLevel);
  const childLogger = logger.child({ prUrl: options.prUrl });

  const github = createGitHubClient({
    token: options.token ?? settings.githubToken,
    baseUrl: settings.githubApiUrl,
    logger: childLogger,
  });

  let prInfo: PRInfo;
  try {
    prInfo = await new GitHubPrProvider(github).getPrInfo(options.prUrl);
  } catch (error) {
    console.error(pc.red(`Error: could not fetch PR: ${getErrorMessage(error)}`));
    return 2;
  }

  const projectType = options.projectType
    ?? await new ProjectDetector(github, childLogger).detect(prInfo.repoOwner, prInfo.repoName, prInfo.targetBranch);
  if (!isSupportedProjectType(projectType)) {
    console.error(pc.red(
      `Error: unable to detect project type for ${prInfo.repoOwner}/${prInfo.repoName}; pass --project-type`
    ));
    return 2;
  }

  const task = taskConfigSchema.parse({
    taskId: `pr-${prInfo.prNumber}`,
    prUrl: options.prUrl,
    projectType,
    timeoutSec: options.timeoutSec,
    cpus: options.cpus,
    memoryMb: options.memoryMb,
    allowInternet: options.allowInternet,
    customVerifyScript: options.verifyScript ?? null,
  });
  const config = buildTrialConfig(task, prInfo, sandboxImageFor(projectType), {
    outputDir: options.output ?? settings.outputDir,
    retryAttempts: options.retries,
  });

  console.log(pc.bold(`Verifying ${prInfo.repoOwner}/${prInfo.repoName}#${prInfo.prNumber}`) + pc.dim(` (${projectType})`));
  console.log(pc.dim(`   ${prInfo.title}`));

  const orchestrator = new TrialOrchestrator(config, {
    logger: childLogger,
    forceRebuild: options.forceRebuild,
    environmentOptions: { socketPath: settings.dockerSocket, templatesDir: TEMPLATES_DIR },
  });
  const shutdown = handleShutdown(() => orchestrator.cancel('interrupted'), childLogger);

  try {
    const result = await orchestrator.run();
    console.log('');
    console.log(formatTrialResult(result));
    return shutdown.exitCode ?? (result.success ? 0 : 1);
  } catch (error) {
    childLogger.error({ err: error }, 'Trial run failed');
    return shutdown.exitCode ?? 1;
  } finally {
    shutdown.dispose();
  }
}
