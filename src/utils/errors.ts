/**
 * Error taxonomy for the backup flow.
 *
 * SnapshotError aborts a backup attempt before anything is recorded.
 * UploadError and CredentialMissingError are scoped to one destination and
 * never abort sibling uploads. StoreError is a rejected write.
 */

import type { Provider } from './location.js';

export class SnapshotError extends Error {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stdout = '', stderr = '') {
    super(message);
    this.name = 'SnapshotError';
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class UploadError extends Error {
  readonly provider: string;
  /** Timestamped adapter log lines leading up to the failure */
  executionLog?: string;

  constructor(provider: Provider | string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UploadError';
    this.provider = provider;
  }
}

export class CredentialMissingError extends UploadError {
  constructor(provider: Provider | string) {
    super(provider, `No ${provider} credentials configured`);
    this.name = 'CredentialMissingError';
  }
}

export class StoreError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}

export class BackupInProgressError extends Error {
  readonly jobId: number;

  constructor(jobId: number) {
    super(`A backup for job ${jobId} is already running`);
    this.name = 'BackupInProgressError';
    this.jobId = jobId;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
