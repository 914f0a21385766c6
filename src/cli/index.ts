#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import pc from 'picocolors';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { projectTypeSchema } from '../types.js';
import { runBatch } from './commands/batch.js';
import { composeGenerate, composeList, composeRun, composeRunAll } from './commands/compose.js';
import { runSingle } from './commands/run.js';

const resourceOptions = {
  cpus: z.coerce.number().int().min(1, '--cpus must be at least 1').max(64, '--cpus must be at most 64'),
  memory: z.coerce.number().int().min(512, '--memory must be at least 512 MB'),
};

const runOptionsSchema = z.object({
  prUrl: z.string().min(1),
  projectType: projectTypeSchema.optional(),
  output: z.string().optional(),
  token: z.string().optional(),
  ...resourceOptions,
  timeout: z.coerce.number().int()
    .min(30, '--timeout must be between 30 and 7200 seconds')
    .max(7200, '--timeout must be between 30 and 7200 seconds'),
  internet: z.boolean(),
  verifyScript: z.string().optional(),
  retries: z.coerce.number().int().min(0).max(5, '--retries must be between 0 and 5'),
  forceRebuild: z.boolean().default(false),
});

const batchOptionsSchema = z.object({
  file: z.string().min(1),
  concurrency: z.coerce.number().int().min(1, '--concurrency must be at least 1'),
  output: z.string().optional(),
  token: z.string().optional(),
  retries: z.coerce.number().int().min(0).max(5, '--retries must be between 0 and 5'),
  forceRebuild: z.boolean().default(false),
});

const generateOptionsSchema = z.object({
  prUrl: z.string().min(1),
  projectType: projectTypeSchema.optional(),
  tasksDir: z.string().optional(),
  token: z.string().optional(),
  ...resourceOptions,
  runTests: z.boolean().default(false),
});

const composeRunOptionsSchema = z.object({
  task: z.string().min(1),
  tasksDir: z.string().optional(),
  cleanup: z.boolean(),
});

const runAllOptionsSchema = z.object({
  tasksDir: z.string().optional(),
  concurrency: z.coerce.number().int().min(1, '--concurrency must be at least 1'),
  pattern: z.string().min(1),
  skipVerified: z.boolean().default(false),
});

const listOptionsSchema = z.object({
  tasksDir: z.string().optional(),
  status: z.boolean(),
});

/** Validate commander's untyped options, exiting with 2 on bad input */
function validate<T extends z.ZodTypeAny>(schema: T, options: unknown): z.infer<T> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const flag = issue.path.length > 0
        ? `--${String(issue.path[0]).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}: `
        : '';
      console.error(pc.red(`Error: ${flag}${issue.message}`));
    }
    process.exit(2);
  }
  return parsed.data;
}

async function requireFile(filePath: string, label: string): Promise<string> {
  const resolved = path.resolve(filePath);
  try {
    await fs.access(resolved);
  } catch {
    console.error(pc.red(`Error: ${label} does not exist: ${filePath}`));
    process.exit(2);
  }
  return resolved;
}

const program = new Command();

program
  .name('pr-verify')
  .description('Verify pull requests by building a mock merge in a disposable Docker sandbox')
  .version('0.1.0');

program
  .command('run')
  .description('Verify a single pull request')
  .requiredOption('-u, --pr-url <url>', 'Pull request URL (https://github.com/<owner>/<repo>/pull/<n>)')
  .option('-p, --project-type <type>', 'Project type (detected from the repository when omitted)')
  .option('-o, --output <dir>', 'Directory for trial artifacts')
  .option('--token <token>', 'GitHub token (default: GITHUB_TOKEN)')
  .option('--cpus <number>', 'CPU limit for the sandbox', '2')
  .option('--memory <mb>', 'Memory limit for the sandbox in MB', '4096')
  .option('--timeout <seconds>', 'Verification timeout in seconds', '1800')
  .option('--no-internet', 'Run the sandbox without network access')
  .option('--verify-script <path>', 'Script to run instead of the build tool')
  .option('--retries <number>', 'Retry attempts for infrastructure failures', '2')
  .option('--force-rebuild', 'Rebuild the sandbox image even if it exists')
  .action(async (rawOptions: unknown) => {
    const options = validate(runOptionsSchema, rawOptions);
    const verifyScript = options.verifyScript
      ? await requireFile(options.verifyScript, 'Verify script')
      : undefined;

    const exitCode = await runSingle({
      prUrl: options.prUrl,
      projectType: options.projectType,
      output: options.output,
      token: options.token,
      cpus: options.cpus,
      memoryMb: options.memory,
      timeoutSec: options.timeout,
      allowInternet: options.internet,
      verifyScript,
      retries: options.retries,
      forceRebuild: options.forceRebuild,
    });
    process.exit(exitCode);
  });

program
  .command('batch')
  .description('Verify every pull request listed in a JSON or YAML task file')
  .requiredOption('-f, --file <path>', 'Task file')
  .option('-c, --concurrency <number>', 'Trials to run at once', '4')
  .option('-o, --output <dir>', 'Directory for trial artifacts')
  .option('--token <token>', 'GitHub token (default: GITHUB_TOKEN)')
  .option('--retries <number>', 'Retry attempts for infrastructure failures', '2')
  .option('--force-rebuild', 'Rebuild sandbox images even if they exist')
  .action(async (rawOptions: unknown) => {
    const options = validate(batchOptionsSchema, rawOptions);
    const exitCode = await runBatch({
      file: await requireFile(options.file, 'Task file'),
      concurrency: options.concurrency,
      output: options.output,
      token: options.token,
      retries: options.retries,
      forceRebuild: options.forceRebuild,
    });
    process.exit(exitCode);
  });

const compose = program
  .command('compose')
  .description('Generate and run self-contained docker compose verification tasks');

compose
  .command('generate')
  .description('Write a compose task directory for a pull request')
  .requiredOption('-u, --pr-url <url>', 'Pull request URL')
  .option('-p, --project-type <type>', 'Project type (detected from the repository when omitted)')
  .option('--tasks-dir <dir>', 'Directory holding compose tasks')
  .option('--token <token>', 'GitHub token (default: GITHUB_TOKEN)')
  .option('--cpus <number>', 'CPU limit for the verifier service', '2')
  .option('--memory <mb>', 'Memory limit for the verifier service in MB', '4096')
  .option('--run-tests', 'Run the project tests after a successful build')
  .action(async (rawOptions: unknown) => {
    const options = validate(generateOptionsSchema, rawOptions);
    if (options.projectType === 'unknown') {
      console.error(pc.red('Error: --project-type must name a supported project type'));
      process.exit(2);
    }
    const exitCode = await composeGenerate({
      prUrl: options.prUrl,
      projectType: options.projectType,
      tasksDir: options.tasksDir,
      token: options.token,
      cpus: options.cpus,
      memoryMb: options.memory,
      runTests: options.runTests,
    });
    process.exit(exitCode);
  });

compose
  .command('run')
  .description('Run one compose task and report its result')
  .requiredOption('-t, --task <name>', 'Task directory name (e.g. widgets_42)')
  .option('--tasks-dir <dir>', 'Directory holding compose tasks')
  .option('--no-cleanup', 'Leave containers in place after the run')
  .action(async (rawOptions: unknown) => {
    const options = validate(composeRunOptionsSchema, rawOptions);
    process.exit(await composeRun(options));
  });

compose
  .command('run-all')
  .description('Run every compose task with bounded parallelism')
  .option('--tasks-dir <dir>', 'Directory holding compose tasks')
  .option('-c, --concurrency <number>', 'Tasks to run at once', '4')
  .option('--pattern <glob>', 'Only run tasks whose name matches', '*')
  .option('--skip-verified', 'Skip tasks whose last run passed')
  .action(async (rawOptions: unknown) => {
    const options = validate(runAllOptionsSchema, rawOptions);
    process.exit(await composeRunAll(options));
  });

compose
  .command('list')
  .description('List compose tasks')
  .option('--tasks-dir <dir>', 'Directory holding compose tasks')
  .option('--no-status', 'Hide the last result of each task')
  .action(async (rawOptions: unknown) => {
    const options = validate(listOptionsSchema, rawOptions);
    process.exit(await composeList(options));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(pc.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
