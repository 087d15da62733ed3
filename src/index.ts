import { createApp } from './app.js';
import { runMigrations } from './db/migrator.js';
import { getPool } from './db/index.js';
import { closeConnection } from './queue/connection.js';
import { startOperationsWorker, shutdownOperations } from './queue/operations-queue.js';
import { createBackupRunner } from './services/backup-runner.js';
import { createRedisEventPublisher } from './services/event-publisher.js';

// MODE can be: 'api-only', 'worker-only', or undefined (both)
const MODE = process.env.MODE;
const isApiEnabled = MODE !== 'worker-only';
const isWorkerEnabled = MODE !== 'api-only';

const PORT = process.env.PORT || 3000;

async function start() {
  console.log(`Starting in ${MODE || 'combined'} mode...`);

  // Run database migrations (only from API to avoid race conditions)
  if (isApiEnabled) {
    await runMigrations();
  }

  // One runner per process so the per-job lock covers both the API and the worker
  const backupRunner = createBackupRunner();

  if (isWorkerEnabled) {
    startOperationsWorker({ runner: backupRunner, publisher: createRedisEventPublisher() });
  }

  const server = isApiEnabled
    ? createApp({ backupRunner }).listen(PORT, () => {
        console.log(`API server running on port ${PORT}`);
      })
    : null;

  const shutdown = async (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    if (server) {
      server.close(() => {
        console.log('HTTP server closed');
      });
    }

    try {
      await shutdownOperations();
      await closeConnection();
      await getPool().end();
      console.log('Graceful shutdown complete');
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exitCode = 1;
    }
    process.exit();
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

start().catch((error) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
