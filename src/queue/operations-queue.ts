/**
 * Operations Queue - background backup runs
 *
 * The HTTP trigger enqueues and returns an operation id immediately.
 * The worker runs the backup once (no retry) and publishes a single
 * completion event whether it succeeded or not.
 */
import { Queue, Worker } from 'bullmq';
import { randomUUID } from 'crypto';
import { getConnection } from './connection.js';
import type { BackupRunner, BackupRunResult } from '../services/backup-runner.js';
import type { EventPublisher, OperationEvent } from '../services/event-publisher.js';
import { getErrorMessage } from '../utils/errors.js';

export const OPERATIONS_QUEUE = 'operations';

export interface OperationJobData {
  operationId: string;
  kind: 'backup';
  ownerId: number;
  jobId: number;
}

/**
 * Enqueues a background backup and resolves with its operation id
 */
export type EnqueueOperation = (ownerId: number, jobId: number) => Promise<string>;

export interface OperationDeps {
  runner: BackupRunner;
  publisher: EventPublisher;
}

let operationsQueue: Queue<OperationJobData> | null = null;
let activeWorker: Worker<OperationJobData, OperationEvent> | null = null;

function getOperationsQueue(): Queue<OperationJobData> {
  if (!operationsQueue) {
    operationsQueue = new Queue<OperationJobData>(OPERATIONS_QUEUE, { connection: getConnection() });
  }
  return operationsQueue;
}

export const enqueueBackupOperation: EnqueueOperation = async (ownerId, jobId) => {
  const operationId = randomUUID();
  await getOperationsQueue().add(
    'backup',
    { operationId, kind: 'backup', ownerId, jobId },
    {
      jobId: operationId,
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 500
    }
  );
  return operationId;
};

export function formatBackupOutput(result: BackupRunResult): string {
  const lines = [`Backup created: ${result.artifactPath} (${result.sizeBytes} bytes)`];
  for (const upload of result.uploads) {
    lines.push(upload.success
      ? `${upload.provider}: ${upload.location}`
      : `${upload.provider}: failed (${upload.error})`);
  }
  return lines.join('\n');
}

/**
 * Run one operation and publish its completion event
 */
export async function processOperation(data: OperationJobData, deps: OperationDeps): Promise<OperationEvent> {
  let event: OperationEvent;
  try {
    const result = await deps.runner.createBackup(data.ownerId, data.jobId);
    event = { operationId: data.operationId, success: true, output: formatBackupOutput(result) };
  } catch (error) {
    console.error(`Operation ${data.operationId} failed:`, error);
    event = { operationId: data.operationId, success: false, output: getErrorMessage(error) };
  }

  await deps.publisher.publish(event);
  return event;
}

export function startOperationsWorker(deps: OperationDeps): Worker<OperationJobData, OperationEvent> {
  const worker = new Worker<OperationJobData, OperationEvent>(
    OPERATIONS_QUEUE,
    async (job) => {
      const event = await processOperation(job.data, deps);
      if (!event.success) {
        // Marks the bullmq job failed; attempts: 1 means it is not retried
        throw new Error(event.output);
      }
      return event;
    },
    {
      connection: getConnection(),
      concurrency: 2
    }
  );

  worker.on('completed', (job) => {
    console.log(`Operation ${job.data.operationId} completed`);
  });

  worker.on('failed', (job, err) => {
    console.error(`Operation ${job?.data.operationId} failed:`, err.message);
  });

  activeWorker = worker;
  console.log('Operations worker started');
  return worker;
}

// Graceful shutdown - close() waits for active jobs to finish
export async function shutdownOperations(): Promise<void> {
  if (activeWorker) {
    console.log('Shutting down operations worker gracefully...');
    await activeWorker.close();
    activeWorker = null;
    console.log('Operations worker shut down');
  }

  if (operationsQueue) {
    await operationsQueue.close();
    operationsQueue = null;
  }
}
