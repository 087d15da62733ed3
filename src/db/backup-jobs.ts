import { getPool, toStoreError } from './index.js';

export type BackupJobType = 'full' | 'files' | 'database';
export type BackupJobStatus = 'active' | 'paused' | 'deleted';

/**
 * Provider tag -> provider-specific upload parameters.
 * Kept free-form here; each upload adapter validates its own entry.
 */
export type DestinationConfig = Record<string, Record<string, unknown>>;

export interface BackupJob {
  id: number;
  owner_id: number;
  name: string;
  type: BackupJobType;
  source: string | null;
  destination: DestinationConfig;
  /** Stored and validated, never evaluated */
  schedule: string | null;
  /** Stored, not enforced */
  retention_days: number;
  status: BackupJobStatus;
  created_at: Date;
  updated_at: Date;
}

type BackupJobRow = {
  id: number;
  owner_id: number;
  name: string;
  type: BackupJobType;
  source: string | null;
  destination: DestinationConfig | null;
  schedule: string | null;
  retention_days: number;
  status: BackupJobStatus;
  created_at: Date;
  updated_at: Date;
};

function toBackupJob(row: BackupJobRow): BackupJob {
  return { ...row, destination: row.destination ?? {} };
}

export interface NewBackupJob {
  name: string;
  type: BackupJobType;
  source?: string | null;
  destination?: DestinationConfig;
  schedule?: string | null;
  retention_days?: number;
}

export async function createBackupJob(ownerId: number, job: NewBackupJob): Promise<BackupJob> {
  try {
    const result = await getPool().query<BackupJobRow>(
      `INSERT INTO backup_jobs (owner_id, name, type, source, destination, schedule, retention_days)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [
        ownerId,
        job.name,
        job.type,
        job.source ?? null,
        JSON.stringify(job.destination ?? {}),
        job.schedule ?? null,
        job.retention_days ?? 30,
      ]
    );
    return toBackupJob(result.rows[0]);
  } catch (error) {
    throw toStoreError(error);
  }
}

/**
 * A job visible to its owner; soft-deleted jobs are not
 */
export async function getBackupJobForOwner(ownerId: number, id: number): Promise<BackupJob | null> {
  const result = await getPool().query<BackupJobRow>(
    `SELECT * FROM backup_jobs WHERE id = $1 AND owner_id = $2 AND status <> 'deleted'`,
    [id, ownerId]
  );
  return result.rows[0] ? toBackupJob(result.rows[0]) : null;
}

export async function listBackupJobsByOwner(ownerId: number): Promise<BackupJob[]> {
  const result = await getPool().query<BackupJobRow>(
    `SELECT * FROM backup_jobs WHERE owner_id = $1 AND status <> 'deleted'
     ORDER BY created_at DESC, id DESC`,
    [ownerId]
  );
  return result.rows.map(toBackupJob);
}

/**
 * Status toggling is the only mutation; 'deleted' is a soft delete
 */
export async function setBackupJobStatus(
  ownerId: number,
  id: number,
  status: BackupJobStatus
): Promise<BackupJob | null> {
  const result = await getPool().query<BackupJobRow>(
    `UPDATE backup_jobs SET status = $1, updated_at = NOW()
     WHERE id = $2 AND owner_id = $3 AND status <> 'deleted'
     RETURNING *`,
    [status, id, ownerId]
  );
  return result.rows[0] ? toBackupJob(result.rows[0]) : null;
}

/**
 * Destination config of one of the owner's live jobs.
 * null when the job is unknown, deleted or belongs to someone else.
 */
export async function getDestinationConfig(ownerId: number, jobId: number): Promise<DestinationConfig | null> {
  const result = await getPool().query<{ destination: DestinationConfig | null }>(
    `SELECT destination FROM backup_jobs WHERE id = $1 AND owner_id = $2 AND status <> 'deleted'`,
    [jobId, ownerId]
  );
  const row = result.rows[0];
  return row ? row.destination ?? {} : null;
}
