import Docker from 'dockerode';
import * as path from 'path';
import * as fs from 'fs/promises';
import { Duplex, Writable } from 'stream';
import pino from 'pino';
import writeFileAtomic from 'write-file-atomic';
import {
  FileTransferError,
  NotStartedError,
  ProvisioningError,
  getErrorMessage,
} from '../errors.js';
import type { ExecOptions, ExecResult, ExecutionEnvironment } from './environment.js';

/**
 * Type guard for Docker API errors which have a statusCode property
 */
function isDockerError(error: unknown): error is { statusCode: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

function hasStatus(error: unknown, ...codes: number[]): boolean {
  return isDockerError(error) && codes.includes(error.statusCode);
}

export interface ImageBuildConfig {
  /** Directory holding the Dockerfile */
  contextDir: string;
  buildArgs: Record<string, string>;
}

export interface DockerEnvironmentOptions {
  name: string;
  image: string;
  cpus: number;
  memoryMb: number;
  allowInternet: boolean;
  workingDir?: string;
  socketPath?: string;
  stopGraceSec?: number;
  build?: ImageBuildConfig;
  logger?: pino.Logger;
}

interface DrainedOutput {
  stdout: Buffer;
  stderr: Buffer;
  timedOut: boolean;
}

/**
 * Docker-backed sandbox: one long-lived container per trial, commands run
 * through the exec API, files moved over exec stdio.
 */
export class DockerEnvironment implements ExecutionEnvironment {
  readonly name: string;
  readonly workingDir: string;
  private docker: Docker;
  private container: Docker.Container | null = null;
  /** Set by stop() while start() is in flight */
  private stopRequested = false;
  private options: DockerEnvironmentOptions;
  private log: pino.Logger;

  constructor(options: DockerEnvironmentOptions) {
    this.options = options;
    this.name = options.name;
    this.workingDir = options.workingDir ?? '/workspace';
    this.docker = new Docker({ socketPath: options.socketPath ?? '/var/run/docker.sock' });
    this.log = (options.logger ?? pino({ level: 'silent' })).child({ container: options.name });
  }

  /**
   * Verify Docker daemon is running and accessible.
   *
   * @throws ProvisioningError with actionable message if Docker is not available
   */
  async checkHealth(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (error) {
      throw new ProvisioningError(
        'Docker daemon is not running or not accessible. ' +
        'Please ensure Docker is installed and running. ' +
        'Try: docker ps',
        { cause: error }
      );
    }
  }

  /**
   * A stop() that arrives while start() is still running is honoured here:
   * a container created after it is stopped and removed, and start() rejects.
   */
  async start(forceRebuild = false): Promise<void> {
    this.stopRequested = false;
    await this.checkHealth();
    await this.ensureImage(forceRebuild);
    await this.removeExisting();
    this.abortIfStopped();

    const { cpus, memoryMb, allowInternet, image } = this.options;
    try {
      this.container = await this.docker.createContainer({
        name: this.name,
        Image: image,
        WorkingDir: this.workingDir,
        Cmd: ['sleep', 'infinity'],
        HostConfig: {
          NetworkMode: allowInternet ? 'bridge' : 'none',
          Memory: memoryMb * 1024 * 1024,
          NanoCpus: cpus * 1e9,
        },
      });
      this.log.info({ containerId: this.container.id, image }, 'Container created');
      await this.discardIfStopped();

      await this.container.start();
      this.log.info({ containerId: this.container.id }, 'Container started');
      await this.discardIfStopped();
    } catch (error) {
      if (error instanceof ProvisioningError) {
        throw error;
      }
      throw new ProvisioningError(
        `Failed to start container ${this.name}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private abortIfStopped(): void {
    if (this.stopRequested) {
      throw new ProvisioningError(`Environment ${this.name} was stopped while starting`);
    }
  }

  private async discardIfStopped(): Promise<void> {
    if (!this.stopRequested) {
      return;
    }
    this.log.warn('Stop requested during start, removing container');
    await this.stop(true);
    this.abortIfStopped();
  }

  private async ensureImage(forceRebuild: boolean): Promise<void> {
    if (!forceRebuild && await this.imageExists()) {
      return;
    }

    try {
      if (this.options.build) {
        await this.buildImage(this.options.build);
      } else {
        await this.pullImage();
      }
    } catch (error) {
      throw new ProvisioningError(
        `Failed to prepare image ${this.options.image}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async imageExists(): Promise<boolean> {
    try {
      await this.docker.getImage(this.options.image).inspect();
      return true;
    } catch (error) {
      if (hasStatus(error, 404)) {
        return false;
      }
      throw new ProvisioningError(
        `Failed to inspect image ${this.options.image}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async buildImage(build: ImageBuildConfig): Promise<void> {
    this.log.info({ image: this.options.image, context: build.contextDir }, 'Building image');
    const stream = await this.docker.buildImage(
      { context: build.contextDir, src: ['Dockerfile'] },
      { t: this.options.image, buildargs: build.buildArgs, rm: true }
    );
    await this.followProgress(stream);
    this.log.info({ image: this.options.image }, 'Image built');
  }

  private async pullImage(): Promise<void> {
    this.log.info({ image: this.options.image }, 'Pulling image');
    const stream = await this.docker.pull(this.options.image);
    await this.followProgress(stream);
  }

  private followProgress(stream: NodeJS.ReadableStream): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (error: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Stop and remove a leftover container carrying this environment's name.
   */
  private async removeExisting(): Promise<void> {
    const existing = this.docker.getContainer(this.name);
    try {
      await existing.stop({ t: this.options.stopGraceSec ?? 10 });
    } catch (error) {
      if (hasStatus(error, 404)) {
        return;
      }
      if (!hasStatus(error, 304)) {
        this.log.warn({ err: getErrorMessage(error) }, 'Failed to stop existing container');
      }
    }

    try {
      await existing.remove({ force: true });
      this.log.info('Removed existing container with the same name');
    } catch (error) {
      if (!hasStatus(error, 404)) {
        throw new ProvisioningError(
          `Failed to remove existing container ${this.name}: ${getErrorMessage(error)}`,
          { cause: error }
        );
      }
    }
  }

  /**
   * Execute a shell command in the container with timeout protection
   *
   * @param command - Shell command line, run through `bash -c`
   * @returns Exit status and captured output. Backend failures are reported
   *   as exitCode 1 with the failure text in stderr; a timeout as exitCode 124.
   */
  async execute(command: string, options: ExecOptions = {}): Promise<ExecResult> {
    const container = this.requireContainer();
    const startTime = Date.now();
    const elapsed = () => (Date.now() - startTime) / 1000;

    try {
      const exec = await container.exec({
        Cmd: ['bash', '-c', command],
        AttachStdout: true,
        AttachStderr: true,
        WorkingDir: options.workingDir ?? this.workingDir,
        Env: Object.entries(options.env ?? {}).map(([key, value]) => `${key}=${value}`),
      });

      const stream = await exec.start({ hijack: true, stdin: false });
      const timeoutMs = options.timeoutSec !== undefined ? options.timeoutSec * 1000 : undefined;
      const output = await this.drain(stream, timeoutMs);

      if (output.timedOut) {
        this.log.warn({ command, timeoutSec: options.timeoutSec }, 'Command timed out');
        return {
          stdout: output.stdout.toString('utf-8'),
          stderr: `${output.stderr.toString('utf-8')}\nCommand timed out after ${options.timeoutSec}s`,
          exitCode: 124,
          durationSec: elapsed(),
          timedOut: true,
        };
      }

      const inspection = await exec.inspect();
      return {
        stdout: output.stdout.toString('utf-8'),
        stderr: output.stderr.toString('utf-8'),
        exitCode: inspection.ExitCode ?? 1,
        durationSec: elapsed(),
      };
    } catch (error) {
      this.log.warn({ command, err: getErrorMessage(error) }, 'Failed to execute command');
      return {
        stdout: '',
        stderr: getErrorMessage(error),
        exitCode: 1,
        durationSec: elapsed(),
      };
    }
  }

  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    const container = this.requireContainer();

    try {
      const content = await fs.readFile(localPath);
      const exec = await container.exec({
        Cmd: ['sh', '-c', 'mkdir -p "$(dirname "$1")" && cat > "$1"', 'sh', remotePath],
        AttachStdin: true,
        AttachStdout: true,
        AttachStderr: true,
      });
      const stream = await exec.start({ hijack: true, stdin: true });
      const drained = this.drain(stream);
      stream.end(content);
      const output = await drained;

      const { ExitCode } = await exec.inspect();
      if (ExitCode !== 0) {
        throw new Error(output.stderr.toString('utf-8').trim() || `exit code ${ExitCode}`);
      }
      this.log.debug({ localPath, remotePath, bytes: content.length }, 'File uploaded');
    } catch (error) {
      throw new FileTransferError(
        `Failed to upload ${localPath} to ${this.name}:${remotePath}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async downloadFile(remotePath: string, localPath: string): Promise<void> {
    const container = this.requireContainer();

    try {
      const exec = await container.exec({
        Cmd: ['cat', remotePath],
        AttachStdout: true,
        AttachStderr: true,
      });
      const stream = await exec.start({ hijack: true, stdin: false });
      const output = await this.drain(stream);

      const { ExitCode } = await exec.inspect();
      if (ExitCode !== 0) {
        throw new Error(output.stderr.toString('utf-8').trim() || `exit code ${ExitCode}`);
      }

      await fs.mkdir(path.dirname(localPath), { recursive: true });
      await writeFileAtomic(localPath, output.stdout);
      this.log.debug({ remotePath, localPath, bytes: output.stdout.length }, 'File downloaded');
    } catch (error) {
      throw new FileTransferError(
        `Failed to download ${this.name}:${remotePath} to ${localPath}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Stop the container within the grace period and, when deleteStorage is
   * set, remove it with its anonymous volumes. "Not found" and "already
   * stopped" count as success. The container is forgotten only once it is
   * gone, so a failed removal can be retried; after that a call is a no-op.
   * Called before a start() has created anything, it makes that start()
   * discard its container.
   */
  async stop(deleteStorage = true): Promise<void> {
    this.stopRequested = true;
    if (!this.container) {
      return;
    }
    const container = this.container;

    try {
      await container.stop({ t: this.options.stopGraceSec ?? 10 });
      this.log.info('Container stopped gracefully');
    } catch (error: unknown) {
      if (hasStatus(error, 304)) {
        this.log.info('Container already stopped');
      } else if (hasStatus(error, 404)) {
        this.log.info('Container already gone');
        this.container = null;
        return;
      } else {
        this.log.warn({ err: getErrorMessage(error) }, 'Failed to stop container gracefully, forcing kill');
        try {
          await container.kill({ signal: 'SIGKILL' });
          this.log.info('Container killed forcefully');
        } catch (killError) {
          if (!hasStatus(killError, 404, 409)) {
            throw new Error(`Failed to kill container: ${getErrorMessage(killError)}`);
          }
        }
      }
    }

    if (!deleteStorage) {
      this.container = null;
      return;
    }

    try {
      await container.remove({ force: true, v: true });
      this.log.info('Container removed');
    } catch (error: unknown) {
      if (!hasStatus(error, 404)) {
        throw new Error(`Failed to remove container: ${getErrorMessage(error)}`);
      }
      this.log.info('Container already removed');
    }
    this.container = null;
  }

  private requireContainer(): Docker.Container {
    if (!this.container) {
      throw new NotStartedError(this.name);
    }
    return this.container;
  }

  /**
   * Demultiplex an attached exec stream into stdout/stderr buffers.
   * Resolves early with timedOut set when timeoutMs elapses first.
   */
  private async drain(stream: Duplex, timeoutMs?: number): Promise<DrainedOutput> {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const sink = (chunks: Buffer[]) => new Writable({
      write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        callback();
      }
    });

    const finished = new Promise<'done'>((resolve, reject) => {
      this.docker.modem.demuxStream(stream, sink(stdout), sink(stderr));
      stream.on('end', () => resolve('done'));
      stream.on('error', reject);
    });

    let outcome: 'done' | 'timeout' = 'done';
    if (timeoutMs === undefined) {
      await finished;
    } else {
      let timeoutId: NodeJS.Timeout | undefined;
      const timeout = new Promise<'timeout'>((resolve) => {
        timeoutId = setTimeout(() => resolve('timeout'), timeoutMs);
      });
      try {
        outcome = await Promise.race([finished, timeout]);
      } finally {
        clearTimeout(timeoutId);
      }
      if (outcome === 'timeout') {
        stream.destroy();
      }
    }

    return {
      stdout: Buffer.concat(stdout),
      stderr: Buffer.concat(stderr),
      timedOut: outcome === 'timeout',
    };
  }
}
