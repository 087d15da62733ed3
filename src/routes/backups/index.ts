/**
 * Backups Router
 *
 * Endpoints:
 * - POST /   Run a backup synchronously (optional job_id)
 * - GET  /   Recent backup history
 */

import { Router } from 'express';
import { validate } from '../../middleware/validate.js';
import { createBackupSchema } from '../../schemas/backup-jobs.js';
import type { BackupRunner } from '../../services/backup-runner.js';
import { createBackupHandlers } from './handlers.js';

export function createBackupsRouter(runner: BackupRunner) {
  const router = Router();
  const { createBackup, listBackups } = createBackupHandlers(runner);

  router.get('/', listBackups);
  router.post('/', validate(createBackupSchema), createBackup);

  return router;
}
