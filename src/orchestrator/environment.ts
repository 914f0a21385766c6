import pino from 'pino';
import { DockerEnvironment } from './docker-environment.js';
import { TOOLCHAINS, isSupportedProjectType } from '../toolchains.js';
import type { TrialConfig } from '../types.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationSec: number;
  timedOut?: boolean;
}

export interface ExecOptions {
  workingDir?: string;
  env?: Record<string, string>;
  timeoutSec?: number;
}

/**
 * An isolated, resource-limited sandbox owned by exactly one trial.
 *
 * Backends must never throw from execute() for transport failures: those come
 * back as a synthetic ExecResult with exitCode 1 and the failure in stderr.
 * A stop() issued while start() is still running must release whatever that
 * start() goes on to create.
 */
export interface ExecutionEnvironment {
  readonly name: string;
  readonly workingDir: string;
  start(forceRebuild?: boolean): Promise<void>;
  stop(deleteStorage?: boolean): Promise<void>;
  execute(command: string, options?: ExecOptions): Promise<ExecResult>;
  uploadFile(localPath: string, remotePath: string): Promise<void>;
  downloadFile(remotePath: string, localPath: string): Promise<void>;
}

export interface EnvironmentFactoryOptions {
  socketPath?: string;
  templatesDir?: string;
  logger?: pino.Logger;
}

export type EnvironmentFactory = (
  config: TrialConfig,
  options: EnvironmentFactoryOptions
) => ExecutionEnvironment;

/** Sandbox identity derived from the trial id, unique across concurrent trials. */
export function environmentNameFor(trialId: string): string {
  return `prv-${trialId}`;
}

export const createEnvironment: EnvironmentFactory = (config, options) => {
  const { environment } = config;
  const projectType = config.verifier.projectType;
  const toolchain = isSupportedProjectType(projectType) ? TOOLCHAINS[projectType] : undefined;

  switch (environment.kind) {
    case 'docker':
      return new DockerEnvironment({
        name: environmentNameFor(config.trialId),
        image: environment.image,
        cpus: environment.cpus,
        memoryMb: environment.memoryMb,
        allowInternet: environment.allowInternet,
        workingDir: environment.workingDir,
        socketPath: options.socketPath,
        build: toolchain && options.templatesDir
          ? {
            contextDir: options.templatesDir,
            buildArgs: { BASE_IMAGE: toolchain.baseImage, SETUP: toolchain.setup },
          }
          : undefined,
        logger: options.logger,
      });
  }
};
