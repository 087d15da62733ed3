/**
 * Backup Jobs API tests
 *
 * Tests creation, validation, status toggling, history and background runs
 */

import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { generateAccessToken } from '../src/utils/jwt.js';
import { createBackupJob } from '../src/db/backup-jobs.js';
import { recordBackupHistory } from '../src/db/backup-history.js';
import type { EnqueueOperation } from '../src/queue/operations-queue.js';

const OWNER = 1;
const OTHER_OWNER = 2;

let app: Express;
let authToken: string;
const enqueueOperation = vi.fn<EnqueueOperation>(async () => 'op-test');

beforeAll(() => {
  app = createApp({ skipRateLimiting: true, enqueueOperation });
  authToken = generateAccessToken({ userId: OWNER, email: 'operator@example.com' });
});

beforeEach(() => {
  enqueueOperation.mockClear();
});

describe('Backup Jobs API', () => {
  describe('Authentication', () => {
    it('should require authentication for all endpoints', async () => {
      const responses = await Promise.all([
        request(app).get('/api/backups/jobs'),
        request(app).post('/api/backups/jobs'),
        request(app).get('/api/backups/jobs/1'),
        request(app).patch('/api/backups/jobs/1/status'),
        request(app).get('/api/backups/jobs/1/history'),
        request(app).post('/api/backups/jobs/1/run'),
      ]);

      for (const response of responses) {
        expect(response.status).toBe(401);
        expect(response.body.error).toBe('No token provided');
      }
    });

    it('should reject an invalid token', async () => {
      const response = await request(app)
        .get('/api/backups/jobs')
        .set('Authorization', 'Bearer not-a-token')
        .expect(401);

      expect(response.body.error).toBe('Invalid token');
    });
  });

  describe('GET /api/backups/jobs', () => {
    it('should return empty array when no jobs exist', async () => {
      const response = await request(app)
        .get('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(200);

      expect(response.body).toEqual([]);
    });

    it('should list only the owner\'s live jobs, newest first', async () => {
      const older = await createBackupJob(OWNER, { name: 'Older', type: 'full' });
      const newer = await createBackupJob(OWNER, { name: 'Newer', type: 'files' });
      const deleted = await createBackupJob(OWNER, { name: 'Gone', type: 'full' });
      await createBackupJob(OTHER_OWNER, { name: 'Not mine', type: 'full' });

      await request(app)
        .patch(`/api/backups/jobs/${deleted.id}/status`)
        .set('Authorization', `Bearer ${authToken}`)
        .send({ status: 'deleted' })
        .expect(200);

      const response = await request(app)
        .get('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(200);

      expect(response.body.map((job: { id: number }) => job.id)).toEqual([newer.id, older.id]);
    });
  });

  describe('POST /api/backups/jobs', () => {
    it('should create a job with defaults applied', async () => {
      const response = await request(app)
        .post('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .send({
          name: 'Nightly',
          source: '/var/www',
          destination: { s3: { bucket: 'nightly' }, rclone: { remote: 'offsite', path: 'web' } },
          schedule: '0 2 * * *',
        })
        .expect(201);

      expect(response.body).toMatchObject({
        owner_id: OWNER,
        name: 'Nightly',
        type: 'full',
        source: '/var/www',
        destination: {
          s3: { bucket: 'nightly', prefix: '' },
          rclone: { remote: 'offsite', path: 'web' },
        },
        schedule: '0 2 * * *',
        retention_days: 30,
        status: 'active',
      });
    });

    it('should store an empty destination config when none is given', async () => {
      const response = await request(app)
        .post('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ name: 'Local only' })
        .expect(201);

      expect(response.body.destination).toEqual({});
    });

    it('should reject an invalid cron expression', async () => {
      const response = await request(app)
        .post('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ name: 'Bad schedule', schedule: '99 * * * *' })
        .expect(400);

      expect(response.body.error).toBe('Validation failed');
      expect(response.body.details).toHaveLength(1);
      expect(response.body.details[0]).toMatch(/^schedule: Invalid cron expression: /);
    });

    it('should reject an unknown destination provider', async () => {
      const response = await request(app)
        .post('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ name: 'Unknown', destination: { dropbox: { path: '/' } } })
        .expect(400);

      expect(response.body.error).toBe('Validation failed');
    });

    it('should require a name', async () => {
      const response = await request(app)
        .post('/api/backups/jobs')
        .set('Authorization', `Bearer ${authToken}`)
        .send({ type: 'files' })
        .expect(400);

      expect(response.body.details).toEqual(['name: Required']);
    });
  });

  describe('GET /api/backups/jobs/:id', () => {
    it('should return the owner\'s job', async () => {
      const job = await createBackupJob(OWNER, { name: 'Mine', type: 'database' });

      const response = await request(app)
        .get(`/api/backups/jobs/${job.id}`)
        .set('Authorization', `Bearer ${authToken}`)
        .expect(200);

      expect(response.body.id).toBe(job.id);
      expect(response.body.type).toBe('database');
    });

    it('should return 404 for another owner\'s job', async () => {
      const job = await createBackupJob(OTHER_OWNER, { name: 'Theirs', type: 'full' });

      await request(app)
        .get(`/api/backups/jobs/${job.id}`)
        .set('Authorization', `Bearer ${authToken}`)
        .expect(404);
    });

    it('should reject a non-numeric id', async () => {
      const response = await request(app)
        .get('/api/backups/jobs/abc')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(400);

      expect(response.body.error).toBe('Invalid parameters');
    });
  });

  describe('PATCH /api/backups/jobs/:id/status', () => {
    it('should pause a job', async () => {
      const job = await createBackupJob(OWNER, { name: 'Pausable', type: 'full' });

      const response = await request(app)
        .patch(`/api/backups/jobs/${job.id}/status`)
        .set('Authorization', `Bearer ${authToken}`)
        .send({ status: 'paused' })
        .expect(200);

      expect(response.body.status).toBe('paused');
    });

    it('should hide a soft-deleted job', async () => {
      const job = await createBackupJob(OWNER, { name: 'Deletable', type: 'full' });

      await request(app)
        .patch(`/api/backups/jobs/${job.id}/status`)
        .set('Authorization', `Bearer ${authToken}`)
        .send({ status: 'deleted' })
        .expect(200);

      await request(app)
        .get(`/api/backups/jobs/${job.id}`)
        .set('Authorization', `Bearer ${authToken}`)
        .expect(404);
    });

    it('should reject an unknown status', async () => {
      const job = await createBackupJob(OWNER, { name: 'Job', type: 'full' });

      await request(app)
        .patch(`/api/backups/jobs/${job.id}/status`)
        .set('Authorization', `Bearer ${authToken}`)
        .send({ status: 'archived' })
        .expect(400);
    });
  });

  describe('GET /api/backups/jobs/:id/history', () => {
    it('should return the job\'s attempts, newest first', async () => {
      const job = await createBackupJob(OWNER, { name: 'With history', type: 'full' });
      const base = {
        jobId: job.id,
        ownerId: OWNER,
        sizeBytes: 10,
        status: 'completed' as const,
        uploadOutcome: 'none' as const,
        message: null,
        locations: [],
        uploads: [],
      };
      const first = await recordBackupHistory({
        ...base,
        artifactPath: '/tmp/backup-20260101-000000-000.tar.gz',
        startTime: new Date('2026-01-01T00:00:00.000Z'),
        endTime: new Date('2026-01-01T00:01:00.000Z'),
      });
      const second = await recordBackupHistory({
        ...base,
        artifactPath: '/tmp/backup-20260102-000000-000.tar.gz',
        startTime: new Date('2026-01-02T00:00:00.000Z'),
        endTime: new Date('2026-01-02T00:01:00.000Z'),
      });
      await recordBackupHistory({
        ...base,
        jobId: null,
        artifactPath: '/tmp/backup-20260103-000000-000.tar.gz',
        startTime: new Date('2026-01-03T00:00:00.000Z'),
        endTime: new Date('2026-01-03T00:01:00.000Z'),
      });

      const response = await request(app)
        .get(`/api/backups/jobs/${job.id}/history`)
        .set('Authorization', `Bearer ${authToken}`)
        .expect(200);

      expect(response.body.map((entry: { id: number }) => entry.id)).toEqual([second.id, first.id]);
    });

    it('should return 404 for an unknown job', async () => {
      await request(app)
        .get('/api/backups/jobs/424242/history')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(404);
    });
  });

  describe('POST /api/backups/jobs/:id/run', () => {
    it('should enqueue a background backup and acknowledge with the operation id', async () => {
      const job = await createBackupJob(OWNER, { name: 'Runnable', type: 'full' });

      const response = await request(app)
        .post(`/api/backups/jobs/${job.id}/run`)
        .set('Authorization', `Bearer ${authToken}`)
        .expect(202);

      expect(response.body).toEqual({ operationId: 'op-test' });
      expect(enqueueOperation).toHaveBeenCalledWith(OWNER, job.id);
    });

    it('should not enqueue for an unknown job', async () => {
      await request(app)
        .post('/api/backups/jobs/424242/run')
        .set('Authorization', `Bearer ${authToken}`)
        .expect(404);

      expect(enqueueOperation).not.toHaveBeenCalled();
    });
  });
});
