/**
 * Backup jobs route handlers
 */

import { Response } from 'express';
import {
  createBackupJob as dbCreateBackupJob,
  getBackupJobForOwner,
  listBackupJobsByOwner,
  setBackupJobStatus,
  type DestinationConfig,
} from '../../db/backup-jobs.js';
import { listBackupHistoryByJob } from '../../db/backup-history.js';
import { AuthRequest } from '../../middleware/auth.js';
import type { CreateBackupJobInput, UpdateBackupJobStatusInput } from '../../schemas/backup-jobs.js';
import type { EnqueueOperation } from '../../queue/operations-queue.js';
import { requireOwner, sendError } from '../helpers/responses.js';

/**
 * Destination config as stored: one entry per configured provider
 */
export function toDestinationConfig(input: CreateBackupJobInput['destination']): DestinationConfig {
  const config: DestinationConfig = {};
  if (input.s3) config.s3 = input.s3;
  if (input.gdrive) config.gdrive = input.gdrive;
  if (input.rclone) config.rclone = input.rclone;
  return config;
}

export function createBackupJobHandlers(enqueueOperation: EnqueueOperation) {
  /**
   * GET / - Jobs of the owner, newest first
   */
  async function listJobs(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    try {
      res.json(await listBackupJobsByOwner(ownerId));
    } catch (error) {
      sendError(res, error, 'Failed to fetch backup jobs');
    }
  }

  /**
   * GET /:id - Get single backup job
   */
  async function getJob(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    try {
      const job = await getBackupJobForOwner(ownerId, parseInt(req.params.id));
      if (!job) {
        res.status(404).json({ error: 'Backup job not found' });
        return;
      }
      res.json(job);
    } catch (error) {
      sendError(res, error, 'Failed to fetch backup job');
    }
  }

  /**
   * POST / - Create backup job
   */
  async function createJob(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    const input: CreateBackupJobInput = req.body;
    try {
      const job = await dbCreateBackupJob(ownerId, {
        name: input.name,
        type: input.type,
        source: input.source,
        destination: toDestinationConfig(input.destination),
        schedule: input.schedule,
        retention_days: input.retention_days,
      });
      console.log(`Created backup job ${job.id} (${job.name}) for owner ${ownerId}`);
      res.status(201).json(job);
    } catch (error) {
      sendError(res, error, 'Failed to create backup job');
    }
  }

  /**
   * PATCH /:id/status - Pause, resume or soft-delete a job
   */
  async function updateStatus(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    const { status }: UpdateBackupJobStatusInput = req.body;
    try {
      const job = await setBackupJobStatus(ownerId, parseInt(req.params.id), status);
      if (!job) {
        res.status(404).json({ error: 'Backup job not found' });
        return;
      }
      res.json(job);
    } catch (error) {
      sendError(res, error, 'Failed to update backup job status');
    }
  }

  /**
   * GET /:id/history - Backup attempts of one job
   */
  async function getHistory(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    try {
      const id = parseInt(req.params.id);
      const job = await getBackupJobForOwner(ownerId, id);
      if (!job) {
        res.status(404).json({ error: 'Backup job not found' });
        return;
      }
      res.json(await listBackupHistoryByJob(ownerId, id));
    } catch (error) {
      sendError(res, error, 'Failed to fetch backup history');
    }
  }

  /**
   * POST /:id/run - Trigger a background backup; completion is pushed as an event
   */
  async function runJob(req: AuthRequest, res: Response) {
    const ownerId = requireOwner(req, res);
    if (ownerId === null) return;

    try {
      const job = await getBackupJobForOwner(ownerId, parseInt(req.params.id));
      if (!job) {
        res.status(404).json({ error: 'Backup job not found' });
        return;
      }

      const operationId = await enqueueOperation(ownerId, job.id);
      console.log(`Queued backup of job ${job.id} as operation ${operationId}`);
      res.status(202).json({ operationId });
    } catch (error) {
      sendError(res, error, 'Failed to queue backup job');
    }
  }

  return { listJobs, getJob, createJob, updateStatus, getHistory, runJob };
}
