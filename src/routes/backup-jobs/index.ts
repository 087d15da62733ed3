/**
 * Backup Jobs Router
 *
 * Endpoints:
 * - GET    /                 List the owner's backup jobs
 * - GET    /:id              Get single backup job
 * - GET    /:id/history      Get backup job history
 * - POST   /                 Create backup job
 * - PATCH  /:id/status       Set status (active, paused, deleted)
 * - POST   /:id/run          Trigger background backup
 */

import { Router } from 'express';
import { validate, validateParams } from '../../middleware/validate.js';
import { createBackupJobSchema, updateBackupJobStatusSchema } from '../../schemas/backup-jobs.js';
import type { EnqueueOperation } from '../../queue/operations-queue.js';
import { idParamSchema } from '../helpers/responses.js';
import { createBackupJobHandlers } from './handlers.js';

export function createBackupJobsRouter(enqueueOperation: EnqueueOperation) {
  const router = Router();
  const { listJobs, getJob, createJob, updateStatus, getHistory, runJob } =
    createBackupJobHandlers(enqueueOperation);

  // List routes
  router.get('/', listJobs);
  router.post('/', validate(createBackupJobSchema), createJob);

  // Single job routes
  router.get('/:id', validateParams(idParamSchema), getJob);
  router.get('/:id/history', validateParams(idParamSchema), getHistory);
  router.patch('/:id/status', validateParams(idParamSchema), validate(updateBackupJobStatusSchema), updateStatus);

  // Action routes
  router.post('/:id/run', validateParams(idParamSchema), runJob);

  return router;
}
