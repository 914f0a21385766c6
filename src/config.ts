import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  GITHUB_TOKEN: z.string().min(1).optional(),
  GITHUB_API_URL: z.string().url().optional(),
  DOCKER_SOCKET: z.string().min(1).default('/var/run/docker.sock'),
  VERIFIER_OUTPUT_DIR: z.string().min(1).default('results'),
  VERIFIER_TASKS_DIR: z.string().min(1).default('tasks'),
});

export interface VerifierSettings {
  logLevel: (typeof LOG_LEVELS)[number];
  githubToken?: string;
  githubApiUrl?: string;
  dockerSocket: string;
  outputDir: string;
  tasksDir: string;
}

/**
 * Read settings from the process environment. Empty strings count as unset.
 *
 * @throws ZodError naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VerifierSettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = configSchema.parse(present);
  return {
    logLevel: parsed.LOG_LEVEL,
    githubToken: parsed.GITHUB_TOKEN,
    githubApiUrl: parsed.GITHUB_API_URL,
    dockerSocket: parsed.DOCKER_SOCKET,
    outputDir: parsed.VERIFIER_OUTPUT_DIR,
    tasksDir: parsed.VERIFIER_TASKS_DIR,
  };
}
