import { getPool, toStoreError } from './index.js';

/**
 * The runner writes 'completed' whenever the snapshot step succeeded,
 * whatever happened to the uploads. upload_outcome carries the detail.
 */
export type BackupHistoryStatus = 'completed';

export type UploadOutcome = 'none' | 'full' | 'partial' | 'failed';

export type UploadResult =
  | { provider: string; success: true; location: string; execution_log?: string }
  | { provider: string; success: false; error: string; execution_log?: string };

export interface BackupHistoryEntry {
  id: number;
  job_id: number | null;
  owner_id: number;
  artifact_path: string;
  start_time: Date;
  end_time: Date;
  size_bytes: number;
  status: BackupHistoryStatus;
  upload_outcome: UploadOutcome;
  message: string | null;
  /** Successful location URIs, in upload order */
  locations: string[];
  uploads: UploadResult[];
}

type BackupHistoryRow = Omit<BackupHistoryEntry, 'size_bytes' | 'locations' | 'uploads'> & {
  // BIGINT comes back from pg as a string
  size_bytes: string | number;
  locations: string[] | null;
  uploads: UploadResult[] | null;
};

function toBackupHistoryEntry(row: BackupHistoryRow): BackupHistoryEntry {
  return {
    ...row,
    size_bytes: Number(row.size_bytes),
    locations: row.locations ?? [],
    uploads: row.uploads ?? [],
  };
}

export interface NewBackupHistoryEntry {
  jobId: number | null;
  ownerId: number;
  artifactPath: string;
  startTime: Date;
  endTime: Date;
  sizeBytes: number;
  status: BackupHistoryStatus;
  uploadOutcome: UploadOutcome;
  message: string | null;
  locations: string[];
  uploads: UploadResult[];
}

/**
 * Append one entry. History rows are never updated afterwards.
 */
export async function recordBackupHistory(entry: NewBackupHistoryEntry): Promise<BackupHistoryEntry> {
  try {
    const result = await getPool().query<BackupHistoryRow>(
      `INSERT INTO backup_history
         (job_id, owner_id, artifact_path, start_time, end_time, size_bytes, status,
          upload_outcome, message, locations, uploads)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       RETURNING *`,
      [
        entry.jobId,
        entry.ownerId,
        entry.artifactPath,
        entry.startTime.toISOString(),
        entry.endTime.toISOString(),
        entry.sizeBytes,
        entry.status,
        entry.uploadOutcome,
        entry.message,
        JSON.stringify(entry.locations),
        JSON.stringify(entry.uploads),
      ]
    );
    return toBackupHistoryEntry(result.rows[0]);
  } catch (error) {
    throw toStoreError(error);
  }
}

export async function listRecentBackupHistory(ownerId: number, limit: number = 50): Promise<BackupHistoryEntry[]> {
  const result = await getPool().query<BackupHistoryRow>(
    `SELECT * FROM backup_history
     WHERE owner_id = $1
     ORDER BY start_time DESC, id DESC
     LIMIT $2`,
    [ownerId, limit]
  );
  return result.rows.map(toBackupHistoryEntry);
}

export async function listBackupHistoryByJob(
  ownerId: number,
  jobId: number,
  limit: number = 50
): Promise<BackupHistoryEntry[]> {
  const result = await getPool().query<BackupHistoryRow>(
    `SELECT * FROM backup_history
     WHERE owner_id = $1 AND job_id = $2
     ORDER BY start_time DESC, id DESC
     LIMIT $3`,
    [ownerId, jobId, limit]
  );
  return result.rows.map(toBackupHistoryEntry);
}
