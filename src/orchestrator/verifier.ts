import * as path from 'path';
import pino from 'pino';
import { UnsupportedProjectTypeError, getErrorMessage } from '../errors.js';
import {
  TOOLCHAINS,
  isSupportedProjectType,
  type SupportedProjectType,
  type Toolchain,
} from '../toolchains.js';
import type { VerificationResult, VerifierConfig } from '../types.js';
import type { ExecutionEnvironment } from './environment.js';
import { shellQuote } from './workspace.js';

/**
 * Runs the build for one ecosystem and judges pass/fail.
 *
 * verify() never throws: infrastructure failures and non-zero exits both
 * come back as `success: false` with differing errorMessage text.
 */
export interface Verifier {
  readonly label: string;
  verify(environment: ExecutionEnvironment, timeoutSec: number): Promise<VerificationResult>;
}

const PROBE_TIMEOUT_SEC = 10;

export const COMPILATION_FAILED_MESSAGE = 'Compilation failed - see output';

function elapsedSec(startTime: number): number {
  return (Date.now() - startTime) / 1000;
}

/**
 * Verifier for a build-tool family from the toolchain table. Prefers the
 * repository's wrapper script over the system tool when one is checked in.
 */
export class BuildToolVerifier implements Verifier {
  readonly label: string;
  private toolchain: Toolchain;
  private log: pino.Logger;

  constructor(projectType: SupportedProjectType, logger?: pino.Logger) {
    this.label = projectType;
    this.toolchain = TOOLCHAINS[projectType];
    this.log = (logger ?? pino({ level: 'silent' })).child({ verifier: projectType });
  }

  async verify(environment: ExecutionEnvironment, timeoutSec: number): Promise<VerificationResult> {
    const startTime = Date.now();
    let tasksRun: string[] = [];

    try {
      let tool = this.toolchain.tool;
      const { wrapper } = this.toolchain;

      if (wrapper) {
        const wrapperCheck = await environment.execute(
          `test -f ${wrapper} && echo 'yes' || echo 'no'`,
          { timeoutSec: PROBE_TIMEOUT_SEC }
        );

        if (wrapperCheck.stdout.trim() === 'yes') {
          const chmod = await environment.execute(`chmod +x ${wrapper}`, { timeoutSec: PROBE_TIMEOUT_SEC });
          if (chmod.exitCode !== 0) {
            this.log.error({ wrapper, stderr: chmod.stderr }, 'Failed to make wrapper executable');
            return {
              success: false,
              compilationOutput: chmod.stderr,
              durationSec: elapsedSec(startTime),
              errorMessage: `Failed to make ${wrapper} executable`,
              tasksRun: [],
            };
          }
          tool = wrapper;
        }
      }

      tasksRun = [...this.toolchain.tasks];
      const command = this.toolchain.buildCommand(tool);
      this.log.info({ command, timeoutSec }, 'Running build');

      const result = await environment.execute(command, { timeoutSec });
      const success = result.exitCode === 0;
      this.log.info({ exitCode: result.exitCode, durationSec: result.durationSec }, 'Build finished');

      return {
        success,
        compilationOutput: `${result.stdout}\n${result.stderr}`,
        durationSec: elapsedSec(startTime),
        errorMessage: success
          ? null
          : result.timedOut
            ? `Build timed out after ${timeoutSec}s`
            : COMPILATION_FAILED_MESSAGE,
        tasksRun,
      };
    } catch (error) {
      this.log.error({ err: error }, 'Verifier crashed');
      return {
        success: false,
        compilationOutput: getErrorMessage(error),
        durationSec: elapsedSec(startTime),
        errorMessage: `Verification exception: ${getErrorMessage(error)}`,
        tasksRun,
      };
    }
  }
}

/**
 * Verifier that runs a user-supplied script inside the merged workspace.
 * The script is copied into the sandbox before it runs.
 */
export class CustomScriptVerifier implements Verifier {
  readonly label = 'custom';
  private scriptPath: string;
  private log: pino.Logger;

  constructor(scriptPath: string, logger?: pino.Logger) {
    this.scriptPath = scriptPath;
    this.log = (logger ?? pino({ level: 'silent' })).child({ verifier: 'custom' });
  }

  async verify(environment: ExecutionEnvironment, timeoutSec: number): Promise<VerificationResult> {
    const startTime = Date.now();
    let tasksRun: string[] = [];
    const remotePath = `/tmp/verify/${path.basename(this.scriptPath)}`;

    try {
      await environment.uploadFile(this.scriptPath, remotePath);

      const chmod = await environment.execute(`chmod +x ${shellQuote(remotePath)}`, {
        timeoutSec: PROBE_TIMEOUT_SEC,
      });
      if (chmod.exitCode !== 0) {
        return {
          success: false,
          compilationOutput: chmod.stderr,
          durationSec: elapsedSec(startTime),
          errorMessage: `Failed to make ${remotePath} executable`,
          tasksRun: [],
        };
      }

      tasksRun = ['custom'];
      this.log.info({ script: remotePath, timeoutSec }, 'Running custom verify script');
      const result = await environment.execute(shellQuote(remotePath), { timeoutSec });
      const success = result.exitCode === 0;

      return {
        success,
        compilationOutput: `${result.stdout}\n${result.stderr}`,
        durationSec: elapsedSec(startTime),
        errorMessage: success
          ? null
          : result.timedOut
            ? `Verify script timed out after ${timeoutSec}s`
            : `Verify script exited with code ${result.exitCode}`,
        tasksRun,
      };
    } catch (error) {
      this.log.error({ err: error }, 'Verifier crashed');
      return {
        success: false,
        compilationOutput: getErrorMessage(error),
        durationSec: elapsedSec(startTime),
        errorMessage: `Verification exception: ${getErrorMessage(error)}`,
        tasksRun,
      };
    }
  }
}

export type VerifierFactory = (config: VerifierConfig, logger?: pino.Logger) => Verifier;

/**
 * Select the verifier for a trial. A custom script takes precedence over the
 * project type.
 *
 * @throws UnsupportedProjectTypeError when the project type is unknown
 */
export const createVerifier: VerifierFactory = (config, logger) => {
  if (config.customScript) {
    return new CustomScriptVerifier(config.customScript, logger);
  }
  if (!isSupportedProjectType(config.projectType)) {
    throw new UnsupportedProjectTypeError(config.projectType);
  }
  return new BuildToolVerifier(config.projectType, logger);
};
