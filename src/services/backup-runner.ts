/**
 * Backup Runner
 *
 * Produces one artifact with the external snapshot command, then fans it out
 * to every destination in the job's config, one adapter at a time.
 * Upload failures are recorded per destination and never abort siblings.
 * A snapshot failure aborts the attempt before anything is recorded.
 */
import { mkdir, stat } from 'fs/promises';
import path from 'path';
import { getDestinationConfig } from '../db/backup-jobs.js';
import { getCredentials } from '../db/cloud-credentials.js';
import { recordBackupHistory, type UploadOutcome, type UploadResult } from '../db/backup-history.js';
import { runCommand, type CommandResult, type CommandRunner } from '../utils/command.js';
import { CredentialMissingError, SnapshotError, UploadError, getErrorMessage } from '../utils/errors.js';
import { isProvider } from '../utils/location.js';
import { defaultUploadAdapters, type UploadAdapterRegistry } from './uploads/index.js';
import { JobLock } from './job-lock.js';

const TEMP_BACKUP_DIR = process.env.BACKUP_TEMP_DIR || '/tmp/hostkeeper-backups';
const SNAPSHOT_COMMAND = process.env.SNAPSHOT_COMMAND || 'hostctl';
const SNAPSHOT_TIMEOUT_MS = parseInt(process.env.SNAPSHOT_TIMEOUT_MS || '3600000');

export interface BackupRunnerOptions {
  commandRunner?: CommandRunner;
  adapters?: UploadAdapterRegistry;
  /** Clock used for artifact names and history timestamps */
  now?: () => Date;
  tempDir?: string;
  snapshotCommand?: string;
  snapshotTimeoutMs?: number;
  jobLock?: JobLock;
}

export interface BackupRunResult {
  artifactPath: string;
  sizeBytes: number;
  /** Successful location URIs only, in upload order */
  locations: string[];
  uploads: UploadResult[];
  historyId: number;
}

export interface BackupRunner {
  createBackup(ownerId: number, jobId?: number | null): Promise<BackupRunResult>;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * backup-YYYYMMDD-HHMMSS-mmm.tar.gz, in UTC
 */
export function formatArtifactName(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `backup-${day}-${time}-${pad(date.getUTCMilliseconds(), 3)}.tar.gz`;
}

export function summarizeUploads(uploads: UploadResult[]): { outcome: UploadOutcome; message: string | null } {
  if (uploads.length === 0) {
    return { outcome: 'none', message: null };
  }

  const failed = uploads.flatMap(u => (u.success ? [] : [`${u.provider}: ${u.error}`]));
  if (failed.length === 0) {
    return { outcome: 'full', message: null };
  }

  const message = `Upload failed for ${failed.join('; ')}`;
  return {
    outcome: failed.length === uploads.length ? 'failed' : 'partial',
    message,
  };
}

export function createBackupRunner(options: BackupRunnerOptions = {}): BackupRunner {
  const commandRunner = options.commandRunner ?? runCommand;
  const adapters = options.adapters ?? defaultUploadAdapters;
  const now = options.now ?? (() => new Date());
  const tempDir = options.tempDir ?? TEMP_BACKUP_DIR;
  const snapshotCommand = options.snapshotCommand ?? SNAPSHOT_COMMAND;
  const snapshotTimeoutMs = options.snapshotTimeoutMs ?? SNAPSHOT_TIMEOUT_MS;
  const jobLock = options.jobLock ?? new JobLock();

  // Artifact timestamps never repeat within one runner, even on a coarse or stalled clock
  let lastStamp = 0;
  function nextArtifactPath(): string {
    const stamp = Math.max(now().getTime(), lastStamp + 1);
    lastStamp = stamp;
    return path.join(tempDir, formatArtifactName(new Date(stamp)));
  }

  async function produceSnapshot(artifactPath: string): Promise<number> {
    let result: CommandResult;
    try {
      result = await commandRunner(snapshotCommand, ['backup', '--output', artifactPath], {
        timeoutMs: snapshotTimeoutMs,
      });
    } catch (error) {
      throw new SnapshotError(getErrorMessage(error), null);
    }

    if (result.timedOut) {
      throw new SnapshotError(
        `Snapshot command timed out after ${snapshotTimeoutMs}ms`,
        result.exitCode,
        result.stdout,
        result.stderr
      );
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim();
      throw new SnapshotError(
        `Snapshot command exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        result.exitCode,
        result.stdout,
        result.stderr
      );
    }

    try {
      const stats = await stat(artifactPath);
      return stats.size;
    } catch (error) {
      throw new SnapshotError(
        `Snapshot command produced no artifact at ${artifactPath}: ${getErrorMessage(error)}`,
        result.exitCode,
        result.stdout,
        result.stderr
      );
    }
  }

  async function uploadToDestination(
    ownerId: number,
    provider: string,
    providerConfig: Record<string, unknown>,
    artifactPath: string
  ): Promise<UploadResult> {
    if (!isProvider(provider)) {
      console.error(`Failed to upload to ${provider}: unsupported provider`);
      return { provider, success: false, error: `Unsupported provider: ${provider}` };
    }

    try {
      const adapter = adapters[provider];
      const credentials = await getCredentials(ownerId, provider);
      if (adapter.requiresCredentials && !credentials) {
        throw new CredentialMissingError(provider);
      }
      const receipt = await adapter.upload(artifactPath, providerConfig, credentials);
      console.log(`Backup uploaded to ${provider}: ${receipt.location}`);
      return {
        provider,
        success: true,
        location: receipt.location,
        execution_log: receipt.executionLog,
      };
    } catch (error) {
      console.error(`Failed to upload to ${provider}:`, error);
      return {
        provider,
        success: false,
        error: getErrorMessage(error),
        execution_log: error instanceof UploadError ? error.executionLog : undefined,
      };
    }
  }

  async function run(ownerId: number, jobId: number | null): Promise<BackupRunResult> {
    const startTime = now();
    const artifactPath = nextArtifactPath();
    await mkdir(tempDir, { recursive: true });

    console.log(`Starting backup${jobId !== null ? ` for job ${jobId}` : ''}: ${artifactPath}`);
    const sizeBytes = await produceSnapshot(artifactPath);

    const destinations = jobId !== null ? await getDestinationConfig(ownerId, jobId) : null;
    const uploads: UploadResult[] = [];
    for (const [provider, providerConfig] of Object.entries(destinations ?? {})) {
      uploads.push(await uploadToDestination(ownerId, provider, providerConfig, artifactPath));
    }

    const locations = uploads.flatMap(u => (u.success ? [u.location] : []));
    const { outcome, message } = summarizeUploads(uploads);

    const entry = await recordBackupHistory({
      jobId,
      ownerId,
      artifactPath,
      startTime,
      endTime: now(),
      sizeBytes,
      status: 'completed',
      uploadOutcome: outcome,
      message,
      locations,
      uploads,
    });

    console.log(`Backup completed: ${artifactPath} (${sizeBytes} bytes, ${locations.length}/${uploads.length} uploads)`);

    return { artifactPath, sizeBytes, locations, uploads, historyId: entry.id };
  }

  return {
    async createBackup(ownerId, jobId = null) {
      if (jobId === null) {
        return run(ownerId, null);
      }

      const release = jobLock.acquire(jobId);
      try {
        return await run(ownerId, jobId);
      } finally {
        release();
      }
    },
  };
}
