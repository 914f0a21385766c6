import * as crypto from 'crypto';
import { z } from 'zod';

export const PROJECT_TYPES = [
  'java-gradle',
  'java-maven',
  'nodejs-npm',
  'nodejs-yarn',
  'python-pip',
  'python-poetry',
  'rust-cargo',
  'go-mod',
  'dotnet',
  'ruby-bundler',
  'unknown',
] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

export const projectTypeSchema = z.enum(PROJECT_TYPES);

const commitSha = z.string().regex(/^[0-9a-f]{40}$/i, 'Expected a full commit SHA');

/**
 * Pull request metadata as returned by the PR provider.
 * Immutable once fetched.
 */
export const prInfoSchema = z.object({
  prUrl: z.string().min(1),
  repoOwner: z.string().min(1),
  repoName: z.string().min(1),
  prNumber: z.number().int().positive(),

  sourceBranch: z.string().min(1),
  sourceCommit: commitSha,
  sourceRepoUrl: z.string().min(1),

  targetBranch: z.string().min(1),
  targetCommit: commitSha,
  targetRepoUrl: z.string().min(1),

  title: z.string(),
  state: z.string(),
});

export type PRInfo = z.infer<typeof prInfoSchema>;

export const taskConfigSchema = z.object({
  taskId: z.string().min(1),
  prUrl: z.string().min(1),
  projectType: projectTypeSchema.default('java-gradle'),
  timeoutSec: z.number().positive().default(1800),
  cpus: z.number().int().positive().default(2),
  memoryMb: z.number().int().positive().default(4096),
  allowInternet: z.boolean().default(true),
  customVerifyScript: z.string().nullable().default(null),
  priority: z.enum(['low', 'medium', 'high']).default('medium'),
});

export type TaskConfig = z.infer<typeof taskConfigSchema>;
export type TaskConfigInput = z.input<typeof taskConfigSchema>;

export const environmentConfigSchema = z.object({
  kind: z.enum(['docker']).default('docker'),
  image: z.string().min(1),
  cpus: z.number().int().positive().default(2),
  memoryMb: z.number().int().positive().default(4096),
  allowInternet: z.boolean().default(true),
  workingDir: z.string().default('/workspace'),
});

export type EnvironmentConfig = z.infer<typeof environmentConfigSchema>;

export const verifierConfigSchema = z.object({
  timeoutSec: z.number().positive().default(1800),
  projectType: projectTypeSchema.default('java-gradle'),
  customScript: z.string().nullable().default(null),
});

export type VerifierConfig = z.infer<typeof verifierConfigSchema>;

/**
 * The unit of work handed to the orchestrator. Never mutated once a trial starts.
 */
export const trialConfigSchema = z.object({
  trialId: z.string().uuid(),
  trialName: z.string().min(1),
  task: taskConfigSchema,
  prInfo: prInfoSchema,
  environment: environmentConfigSchema,
  verifier: verifierConfigSchema,
  outputDir: z.string().default('results'),
  retryAttempts: z.number().int().min(0).default(2),
});

export type TrialConfig = z.infer<typeof trialConfigSchema>;

export const verificationResultSchema = z.object({
  success: z.boolean(),
  compilationOutput: z.string().default(''),
  durationSec: z.number().min(0),
  errorMessage: z.string().nullable().default(null),
  tasksRun: z.array(z.string()).default([]),
});

export type VerificationResult = z.infer<typeof verificationResultSchema>;

export const EXCEPTION_KINDS = [
  'provisioning',
  'workspace',
  'configuration',
  'cancelled',
  'timeout',
  'unexpected',
] as const;

export type ExceptionKind = (typeof EXCEPTION_KINDS)[number];

export const exceptionInfoSchema = z.object({
  exceptionType: z.string(),
  exceptionMessage: z.string(),
  traceback: z.string(),
  kind: z.enum(EXCEPTION_KINDS).default('unexpected'),
});

export type ExceptionInfo = z.infer<typeof exceptionInfoSchema>;

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .nullable();

export const trialResultSchema = z.object({
  trialId: z.string(),
  trialName: z.string(),
  taskId: z.string(),
  prUrl: z.string(),
  prNumber: z.number().int(),
  verificationResult: verificationResultSchema.nullable().default(null),
  exceptionInfo: exceptionInfoSchema.nullable().default(null),
  startedAt: timestamp.default(null),
  finishedAt: timestamp.default(null),
  trialDir: z.string(),
  attempts: z.number().int().min(0).default(0),
});

export interface TrialResultFields {
  trialId: string;
  trialName: string;
  taskId: string;
  prUrl: string;
  prNumber: number;
  trialDir: string;
  verificationResult?: VerificationResult | null;
  exceptionInfo?: ExceptionInfo | null;
  startedAt?: Date | null;
  finishedAt?: Date | null;
  attempts?: number;
}

/**
 * Accumulates the outcome of one trial. Owned by the orchestrator while the
 * trial runs and treated as read-only once persisted.
 */
export class TrialResult {
  trialId: string;
  trialName: string;
  taskId: string;
  prUrl: string;
  prNumber: number;
  trialDir: string;
  verificationResult: VerificationResult | null;
  exceptionInfo: ExceptionInfo | null;
  startedAt: Date | null;
  finishedAt: Date | null;
  attempts: number;

  constructor(fields: TrialResultFields) {
    this.trialId = fields.trialId;
    this.trialName = fields.trialName;
    this.taskId = fields.taskId;
    this.prUrl = fields.prUrl;
    this.prNumber = fields.prNumber;
    this.trialDir = fields.trialDir;
    this.verificationResult = fields.verificationResult ?? null;
    this.exceptionInfo = fields.exceptionInfo ?? null;
    this.startedAt = fields.startedAt ?? null;
    this.finishedAt = fields.finishedAt ?? null;
    this.attempts = fields.attempts ?? 0;
  }

  /** Seconds between start and finish, or null until both are stamped. */
  get durationSec(): number | null {
    if (!this.startedAt || !this.finishedAt) {
      return null;
    }
    return (this.finishedAt.getTime() - this.startedAt.getTime()) / 1000;
  }

  get success(): boolean {
    return (
      this.exceptionInfo === null &&
      this.verificationResult !== null &&
      this.verificationResult.success
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      trialId: this.trialId,
      trialName: this.trialName,
      taskId: this.taskId,
      prUrl: this.prUrl,
      prNumber: this.prNumber,
      verificationResult: this.verificationResult,
      exceptionInfo: this.exceptionInfo,
      startedAt: this.startedAt?.toISOString() ?? null,
      finishedAt: this.finishedAt?.toISOString() ?? null,
      trialDir: this.trialDir,
      attempts: this.attempts,
      success: this.success,
      durationSec: this.durationSec,
    };
  }

  /**
   * Rebuild a result from its serialized form. Derived values in the input
   * (`success`, `durationSec`) are ignored and recomputed.
   */
  static fromJSON(data: unknown): TrialResult {
    return new TrialResult(trialResultSchema.parse(data));
  }
}

export interface TrialConfigOverrides {
  trialId?: string;
  trialName?: string;
  outputDir?: string;
  retryAttempts?: number;
  workingDir?: string;
}

/**
 * Derive a full trial configuration from a task and its PR. Sandbox resources
 * and verifier settings are copied from the task so the trial never reads the
 * task again after it starts.
 */
export function buildTrialConfig(
  task: TaskConfig,
  prInfo: PRInfo,
  image: string,
  overrides: TrialConfigOverrides = {}
): TrialConfig {
  const trialId = overrides.trialId ?? crypto.randomUUID();
  return trialConfigSchema.parse({
    trialId,
    trialName: overrides.trialName ?? `${task.taskId}__trial-${trialId.slice(0, 8)}`,
    task,
    prInfo,
    environment: {
      kind: 'docker',
      image,
      cpus: task.cpus,
      memoryMb: task.memoryMb,
      allowInternet: task.allowInternet,
      workingDir: overrides.workingDir,
    },
    verifier: {
      timeoutSec: task.timeoutSec,
      projectType: task.projectType,
      customScript: task.customVerifyScript,
    },
    outputDir: overrides.outputDir,
    retryAttempts: overrides.retryAttempts,
  });
}
