/**
 * Express app factory - creates and configures the Express application
 * Separated from index.ts to enable testing
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { authMiddleware } from './middleware/auth.js';
import cloudRoutes from './routes/cloud/index.js';
import { createBackupsRouter } from './routes/backups/index.js';
import { createBackupJobsRouter } from './routes/backup-jobs/index.js';
import { createBackupRunner, type BackupRunner } from './services/backup-runner.js';
import { enqueueBackupOperation, type EnqueueOperation } from './queue/operations-queue.js';

export interface CreateAppOptions {
  /** Skip rate limiting (useful for tests) */
  skipRateLimiting?: boolean;
  /** CORS origin override */
  corsOrigin?: string;
  /** Runner behind POST /api/backups */
  backupRunner?: BackupRunner;
  /** Queue behind POST /api/backups/jobs/:id/run */
  enqueueOperation?: EnqueueOperation;
}

export function createApp(options: CreateAppOptions = {}) {
  const app = express();
  const backupRunner = options.backupRunner ?? createBackupRunner();
  const enqueueOperation = options.enqueueOperation ?? enqueueBackupOperation;

  // Trust proxy for running behind reverse proxies (nginx, traefik, etc.)
  app.set('trust proxy', 1);

  app.use(helmet());

  // Rate limiting (can be skipped for tests)
  if (!options.skipRateLimiting) {
    const apiLimiter = rateLimit({
      windowMs: 15 * 60 * 1000,
      max: 1000,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later' },
    });

    // Backups spawn the snapshot command; keep manual triggers rare
    const expensiveOpLimiter = rateLimit({
      windowMs: 60 * 1000,
      max: 10,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many operations, please wait before trying again' },
    });

    app.use('/api/', apiLimiter);
    app.post('/api/backups', expensiveOpLimiter);
    app.post('/api/backups/jobs/:id/run', expensiveOpLimiter);
  }

  app.use(cors({
    origin: options.corsOrigin || process.env.CORS_ORIGIN || 'http://localhost:5173',
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Protected routes; jobs first so /api/backups does not shadow /api/backups/jobs
  app.use('/api/cloud', authMiddleware, cloudRoutes);
  app.use('/api/backups/jobs', authMiddleware, createBackupJobsRouter(enqueueOperation));
  app.use('/api/backups', authMiddleware, createBackupsRouter(backupRunner));

  return app;
}
