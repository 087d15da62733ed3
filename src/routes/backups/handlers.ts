/**
 * Backup route handlers
 */

import { Response } from 'express';
import { listRecentBackupHistory } from '../../db/backup-history.js';
import { getBackupJobForOwner } from '../../db/backup-jobs.js';
import { AuthRequest } from '../../middleware/auth.js';
import type { CreateBackupInput } from '../../schemas/backup-jobs.js';
import type { BackupRunner } from '../../services/backup-runner.js';
import { requireOwner, sendError } from '../helpers/responses.js';

export function createBackupHandlers(runner: BackupRunner) {
  /**
   * POST / - Run a backup now and wait for it
   */
  async function createBackup(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    const input: CreateBackupInput = req.body;
    const jobId = input.job_id ?? null;
    try {
      if (jobId !== null && !(await getBackupJobForOwner(ownerId, jobId))) {
        res.status(404).json({ error: 'Backup job not found' });
        return;
      }

      const result = await runner.createBackup(ownerId, jobId);
      res.json({
        success: true,
        file: result.artifactPath,
        size: result.sizeBytes,
        locations: result.locations,
        uploads: result.uploads,
        historyId: result.historyId,
      });
    } catch (error) {
      sendError(res, error, 'Failed to create backup');
    }
  }

  /**
   * GET / - Most recent backup attempts of the owner
   */
  async function listBackups(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    try {
      res.json(await listRecentBackupHistory(ownerId, 50));
    } catch (error) {
      sendError(res, error, 'Failed to fetch backup history');
    }
  }

  return { createBackup, listBackups };
}
