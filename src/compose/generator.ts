/**
 * File-based verification tasks
 *
 * Each task is a self-contained directory that `docker compose up` can run
 * without this tool: a compose file, the verify script it mounts, an .env
 * record and a README. Results land in logs/verifier/.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import writeFileAtomic from 'write-file-atomic';
import { stringify } from 'yaml';
import { UnsupportedProjectTypeError } from '../errors.js';
import { TEMPLATES_DIR } from '../paths.js';
import {
  TOOLCHAINS,
  isSupportedProjectType,
  shellBuildCommand,
  shellTestCommand,
  type Toolchain,
} from '../toolchains.js';
import type { PRInfo, ProjectType } from '../types.js';

export const COMPOSE_FILE = 'docker-compose.yaml';
export const VERIFY_SCRIPT = 'verify-pr.sh';
export const RESULT_DIR = path.join('logs', 'verifier');

export interface ComposeTaskOptions {
  tasksDir: string;
  templatesDir?: string;
  cpus?: number;
  memoryMb?: number;
  /** Run the toolchain's tests after a successful build (default: false) */
  runTests?: boolean;
}

export interface ComposeResources {
  cpus: number;
  memoryMb: number;
  runTests?: boolean;
}

export interface ComposeTask {
  name: string;
  dir: string;
}

/** Task directory name: `<repo>_<pr number>` */
export function composeTaskName(prInfo: PRInfo): string {
  return `${prInfo.repoName}_${prInfo.prNumber}`;
}

// Compose interpolates `$` in every value of the file
function escapeCompose(value: string): string {
  return value.split('$').join('$$');
}

/**
 * Render a value for a compose .env file. Single quotes keep it literal;
 * values that contain one fall back to escaped double quotes.
 */
export function dotenvValue(value: string): string {
  if (/^[\w@%+=:,./-]*$/.test(value)) {
    return value;
  }
  if (!value.includes(`'`)) {
    return `'${value}'`;
  }
  return `"${value.replace(/[\\"]/g, '\\$&').split('$').join('$$')}"`;
}

function toolchainFor(projectType: ProjectType): Toolchain {
  if (!isSupportedProjectType(projectType)) {
    throw new UnsupportedProjectTypeError(projectType);
  }
  return TOOLCHAINS[projectType];
}

export function buildTaskEnvironment(
  prInfo: PRInfo,
  projectType: ProjectType,
  runTests = false
): Record<string, string> {
  const toolchain = toolchainFor(projectType);
  return {
    PR_NUMBER: String(prInfo.prNumber),
    REPO_URL: prInfo.targetRepoUrl,
    REPO_NAME: prInfo.repoName,
    REPO_OWNER: prInfo.repoOwner,
    TARGET_BRANCH: prInfo.targetBranch,
    TARGET_COMMIT: prInfo.targetCommit,
    SOURCE_BRANCH: prInfo.sourceBranch,
    SOURCE_COMMIT: prInfo.sourceCommit,
    PROJECT_TYPE: projectType,
    SETUP_COMMAND: toolchain.setup,
    BUILD_COMMAND: shellBuildCommand(toolchain),
    TEST_COMMAND: shellTestCommand(toolchain),
    RUN_TESTS: runTests ? '1' : '0',
  };
}

export function renderComposeFile(
  prInfo: PRInfo,
  projectType: ProjectType,
  resources: ComposeResources
): string {
  const environment = buildTaskEnvironment(prInfo, projectType, resources.runTests);

  const document = {
    services: {
      verifier: {
        image: toolchainFor(projectType).baseImage,
        container_name: `pr_${composeTaskName(prInfo)}`,
        environment: Object.fromEntries(
          Object.entries(environment).map(([key, value]) => [key, escapeCompose(value)])
        ),
        volumes: ['./logs:/logs', `./${VERIFY_SCRIPT}:/${VERIFY_SCRIPT}:ro`],
        command: ['sh', `/${VERIFY_SCRIPT}`],
        cpus: resources.cpus,
        mem_limit: `${resources.memoryMb}m`,
        networks: ['pr-verification'],
      },
    },
    networks: {
      'pr-verification': { driver: 'bridge' },
    },
  };

  return stringify(document);
}

export function renderEnvFile(
  prInfo: PRInfo,
  projectType: ProjectType,
  resources: ComposeResources
): string {
  const environment = buildTaskEnvironment(prInfo, projectType, resources.runTests);
  const lines = Object.entries(environment).map(([key, value]) => `${key}=${dotenvValue(value)}`);
  return [
    '# Pull request and project settings',
    ...lines,
    '',
    '# Resource limits',
    `CPUS=${resources.cpus}`,
    `MEMORY=${resources.memoryMb}m`,
    '',
  ].join('\n');
}

export function renderReadme(prInfo: PRInfo, projectType: ProjectType): string {
  const name = composeTaskName(prInfo);
  const { BUILD_COMMAND, TEST_COMMAND } = buildTaskEnvironment(prInfo, projectType);
  return `# Task: ${name}

## Pull request

- **Repository**: ${prInfo.repoOwner}/${prInfo.repoName}
- **PR**: #${prInfo.prNumber} ${prInfo.title}
- **URL**: ${prInfo.prUrl}
- **Target**: ${prInfo.targetBranch} @ \`${prInfo.targetCommit.slice(0, 7)}\`
- **Source**: ${prInfo.sourceBranch} @ \`${prInfo.sourceCommit.slice(0, 7)}\`

## Project

- **Type**: ${projectType}
- **Build command**: \`${BUILD_COMMAND}\`
- **Test command** (runs after the build when \`RUN_TESTS=1\`): \`${TEST_COMMAND}\`

## Usage

\`\`\`bash
docker compose up --abort-on-container-exit
# or
pr-verify compose run --task ${name}
\`\`\`

\`logs/verifier/result.txt\` holds \`1\` when the merged tree builds and \`0\` otherwise;
\`exit_code.txt\` and \`timestamp.txt\` sit beside it.

Clean up with \`docker compose down\`.
`;
}

/**
 * Write a runnable compose task for one pull request.
 *
 * @throws UnsupportedProjectTypeError for `unknown`
 */
export async function generateComposeTask(
  prInfo: PRInfo,
  projectType: ProjectType,
  options: ComposeTaskOptions
): Promise<ComposeTask> {
  const resources: ComposeResources = {
    cpus: options.cpus ?? 2,
    memoryMb: options.memoryMb ?? 4096,
    runTests: options.runTests ?? false,
  };
  const composeFile = renderComposeFile(prInfo, projectType, resources);

  const name = composeTaskName(prInfo);
  const dir = path.join(options.tasksDir, name);
  await fs.mkdir(path.join(dir, RESULT_DIR), { recursive: true });

  const script = await fs.readFile(path.join(options.templatesDir ?? TEMPLATES_DIR, VERIFY_SCRIPT), 'utf-8');
  await writeFileAtomic(path.join(dir, VERIFY_SCRIPT), script, { mode: 0o755 });
  await writeFileAtomic(path.join(dir, COMPOSE_FILE), composeFile);
  await writeFileAtomic(path.join(dir, '.env'), renderEnvFile(prInfo, projectType, resources));
  await writeFileAtomic(path.join(dir, 'README.md'), renderReadme(prInfo, projectType));

  return { name, dir };
}
