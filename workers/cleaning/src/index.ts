/**
 * Cleaning Worker — Entry Point
 *
 * Consumes `namekit-clean-names` batches until SIGTERM / SIGINT.
 */

import {
  CLEAN_NAMES_QUEUE,
  FUZZY_THRESHOLD,
  JOB_LOCK_DURATION_MS,
  WORKER_CONCURRENCY,
} from './config';
import { logger } from './utils/logger';
import { redis } from './lib/redis';
import { cleanNamesQueue } from './queues';
import cleanNamesWorker from './processing/clean-names.worker';

// ── Startup ──────────────────────────────────────────────────────────────

async function main() {
  logger.info(
    {
      queue: CLEAN_NAMES_QUEUE,
      concurrency: WORKER_CONCURRENCY,
      defaultThreshold: FUZZY_THRESHOLD,
      lockDurationMs: JOB_LOCK_DURATION_MS,
    },
    'Cleaning worker starting',
  );

  await cleanNamesWorker.waitUntilReady();

  logger.info({ queue: CLEAN_NAMES_QUEUE }, 'Waiting for name-cleaning batches');
}

// ── Shutdown ─────────────────────────────────────────────────────────────

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info({ signal }, 'Shutdown signal received, finishing batches in progress');

  // Up to WORKER_CONCURRENCY batches may be mid-clean; their results are
  // stored before close() resolves. Waiting batches stay queued for the next start.
  const [workerClosed, queueClosed] = await Promise.allSettled([
    cleanNamesWorker.close(),
    cleanNamesQueue.close(),
  ]);
  for (const outcome of [workerClosed, queueClosed]) {
    if (outcome.status === 'rejected') {
      logger.error({ err: outcome.reason }, 'Error while closing the clean-names queue');
    }
  }
  await redis.quit();

  logger.info('Cleaning worker stopped');
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, exiting without draining');
  process.exit(1);
});

main().catch((err) => {
  logger.fatal({ err, queue: CLEAN_NAMES_QUEUE }, 'Failed to start the cleaning worker');
  process.exit(1);
});
