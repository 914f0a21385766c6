import * as fs from 'fs/promises';
import * as path from 'path';
import type { Dirent } from 'fs';
import { execFile } from 'child_process';
import { promisify } from 'util';
import micromatch from 'micromatch';
import pino from 'pino';
import { getErrorMessage } from '../errors.js';
import { runWithConcurrency } from '../orchestrator/pool.js';
import { COMPOSE_FILE, RESULT_DIR } from './generator.js';

const execFileAsync = promisify(execFile);

export interface ComposeCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs `docker compose <args>` inside a task directory */
export type ComposeCommand = (args: string[], cwd: string) => Promise<ComposeCommandResult>;

export type ComposeTaskStatus = 'passed' | 'failed' | 'not_run';

export interface ComposeResult {
  status: ComposeTaskStatus;
  exitCode: number | null;
  timestamp: string | null;
}

export interface ComposeTaskInfo {
  name: string;
  dir: string;
  prNumber: string;
  status: ComposeTaskStatus;
}

export interface ComposeRunOutcome {
  task: string;
  success: boolean;
  result: ComposeResult | null;
  output: string;
  error?: string;
}

export interface ComposeRunOptions {
  compose?: ComposeCommand;
  /** Run `docker compose down` afterwards (default: true) */
  cleanup?: boolean;
  logger?: pino.Logger;
}

export interface ComposeBatchOptions extends ComposeRunOptions {
  concurrency?: number;
  pattern?: string;
  skipVerified?: boolean;
  onTaskFinished?: (outcome: ComposeRunOutcome) => void;
}

export interface ComposeBatchReport {
  outcomes: ComposeRunOutcome[];
  total: number;
  succeeded: number;
  failed: number;
  failedTasks: string[];
}

function commandFailure(error: unknown): ComposeCommandResult | null {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'number') {
    return null;
  }
  return {
    exitCode: error.code,
    stdout: 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '',
    stderr: 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : error.message,
  };
}

/**
 * `docker compose` on the host. A non-zero exit is a result; a missing
 * docker binary is an error.
 */
export const dockerCompose: ComposeCommand = async (args, cwd) => {
  try {
    const { stdout, stderr } = await execFileAsync('docker', ['compose', ...args], {
      cwd,
      maxBuffer: 64 * 1024 * 1024,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    const failure = commandFailure(error);
    if (failure) {
      return failure;
    }
    throw error;
  }
};

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return (await fs.readFile(filePath, 'utf-8')).trim();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Read a task's outcome from logs/verifier. A task counts as verified only
 * when result.txt holds exactly `1`.
 */
export async function readComposeResult(taskDir: string): Promise<ComposeResult> {
  const resultDir = path.join(taskDir, RESULT_DIR);
  const result = await readOptional(path.join(resultDir, 'result.txt'));
  if (result === null) {
    return { status: 'not_run', exitCode: null, timestamp: null };
  }

  const exitCode = await readOptional(path.join(resultDir, 'exit_code.txt'));
  const parsedExit = exitCode === null ? Number.NaN : Number.parseInt(exitCode, 10);
  return {
    status: result === '1' ? 'passed' : 'failed',
    exitCode: Number.isNaN(parsedExit) ? null : parsedExit,
    timestamp: await readOptional(path.join(resultDir, 'timestamp.txt')),
  };
}

/**
 * Task directories under tasksDir holding a compose file, sorted by name.
 */
export async function listComposeTasks(tasksDir: string): Promise<ComposeTaskInfo[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(tasksDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const tasks: ComposeTaskInfo[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const dir = path.join(tasksDir, entry.name);
    if ((await readOptional(path.join(dir, COMPOSE_FILE))) === null) continue;

    const separator = entry.name.lastIndexOf('_');
    tasks.push({
      name: entry.name,
      dir,
      prNumber: separator > 0 ? entry.name.slice(separator + 1) : '?',
      status: (await readComposeResult(dir)).status,
    });
  }

  return tasks.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Bring a task up until its container exits, read the outcome, then tear
 * the project down. A stale result from an earlier run is removed first.
 */
export async function runComposeTask(
  taskDir: string,
  options: ComposeRunOptions = {}
): Promise<ComposeRunOutcome> {
  const compose = options.compose ?? dockerCompose;
  const log = (options.logger ?? pino({ level: 'silent' })).child({ task: path.basename(taskDir) });

  if ((await readOptional(path.join(taskDir, COMPOSE_FILE))) === null) {
    throw new Error(`No ${COMPOSE_FILE} found in ${taskDir}`);
  }
  await fs.rm(path.join(taskDir, RESULT_DIR, 'result.txt'), { force: true });

  try {
    log.info('Starting compose task');
    const up = await compose(['up', '--abort-on-container-exit'], taskDir);
    const result = await readComposeResult(taskDir);
    log.info({ composeExitCode: up.exitCode, status: result.status }, 'Compose task finished');

    return {
      task: path.basename(taskDir),
      success: result.status === 'passed',
      result,
      output: `${up.stdout}${up.stderr}`,
    };
  } finally {
    if (options.cleanup ?? true) {
      try {
        await compose(['down'], taskDir);
      } catch (error) {
        log.warn({ err: getErrorMessage(error) }, 'docker compose down failed');
      }
    }
  }
}

/**
 * Run every matching task with bounded parallelism. A task that throws is
 * recorded as failed; the others keep running.
 */
export async function runAllComposeTasks(
  tasksDir: string,
  options: ComposeBatchOptions = {}
): Promise<ComposeBatchReport> {
  const pattern = options.pattern ?? '*';
  const tasks = (await listComposeTasks(tasksDir)).filter(
    (task) => micromatch.isMatch(task.name, pattern) && !(options.skipVerified && task.status === 'passed')
  );

  const outcomes = await runWithConcurrency(tasks, options.concurrency ?? 4, async (task) => {
    let outcome: ComposeRunOutcome;
    try {
      outcome = await runComposeTask(task.dir, options);
    } catch (error) {
      outcome = { task: task.name, success: false, result: null, output: '', error: getErrorMessage(error) };
    }
    options.onTaskFinished?.(outcome);
    return outcome;
  });

  const failedTasks = outcomes.filter((outcome) => !outcome.success).map((outcome) => outcome.task);
  return {
    outcomes,
    total: outcomes.length,
    succeeded: outcomes.length - failedTasks.length,
    failed: failedTasks.length,
    failedTasks,
  };
}
