/**
 * Custom error classes for typed error handling.
 * Use instanceof checks instead of fragile string matching.
 */

export class ProvisioningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisioningError';
  }
}

export class NotStartedError extends Error {
  constructor(environmentName: string) {
    super(`Environment ${environmentName} is not started. Call start() first.`);
    this.name = 'NotStartedError';
  }
}

export type WorkspaceStep = 'clone' | 'fetch' | 'checkout' | 'branch' | 'merge';

export class WorkspaceError extends Error {
  readonly step: WorkspaceStep;

  constructor(step: WorkspaceStep, message: string) {
    super(message);
    this.name = 'WorkspaceError';
    this.step = step;
  }
}

export class FileTransferError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileTransferError';
  }
}

export class UnsupportedProjectTypeError extends Error {
  constructor(projectType: string) {
    super(
      `No verifier available for project type '${projectType}'. ` +
      'Pass --project-type explicitly or provide a custom verify script.'
    );
    this.name = 'UnsupportedProjectTypeError';
  }
}

export class TrialCancelledError extends Error {
  constructor(reason?: string) {
    super(reason ? `Trial cancelled: ${reason}` : 'Trial cancelled');
    this.name = 'TrialCancelledError';
  }
}

export class TrialTimeoutError extends Error {
  constructor(budgetSec: number) {
    super(`Trial exceeded its wall-clock budget of ${budgetSec}s`);
    this.name = 'TrialTimeoutError';
  }
}

export class InvalidUrlError extends Error {
  constructor(url: string) {
    super(`Invalid GitHub PR URL: ${url}`);
    this.name = 'InvalidUrlError';
  }
}

/**
 * Extract error message safely from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
