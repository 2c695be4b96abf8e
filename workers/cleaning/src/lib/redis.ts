import 'dotenv/config';
import IORedis from 'ioredis';

function requireRedisUrl(): string {
  const url = process.env.REDIS_URL;
  if (!url) {
    throw new Error(
      'REDIS_URL environment variable is required. ' +
        'Set it to a Redis connection string, e.g. redis://localhost:6379',
    );
  }
  return url;
}

const REDIS_URL = requireRedisUrl();

// BullMQ duplicates this connection for its blocking readers (Worker, QueueEvents).
function createRedisConnection(): IORedis {
  return new IORedis(REDIS_URL, {
    maxRetriesPerRequest: null, // required by BullMQ
    enableReadyCheck: false,
  });
}

export const redis = createRedisConnection();

redis.on('error', (err) => {
  console.error('[redis] connection error', err);
});
