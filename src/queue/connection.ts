/**
 * Shared Redis connection for the operations queue and the push channel.
 * Created on first use so importing a queue module never opens a socket.
 */
import { Redis as IORedis } from 'ioredis';

let connection: IORedis | null = null;

export function createRedisConnection(): IORedis {
  return new IORedis({
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379'),
    username: process.env.REDIS_USERNAME || undefined,
    password: process.env.REDIS_PASSWORD || undefined,
    maxRetriesPerRequest: null
  });
}

export function getConnection(): IORedis {
  if (!connection) {
    connection = createRedisConnection();
  }
  return connection;
}

export async function closeConnection(): Promise<void> {
  if (!connection) return;
  const current = connection;
  connection = null;
  await current.quit();
}
