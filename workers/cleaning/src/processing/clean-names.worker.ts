/**
 * clean-names.worker.ts — BullMQ consumer for name-cleaning batches.
 */

import { Worker } from 'bullmq';
import type { CleanJobInput } from '@namekit/shared';
import {
  CLEAN_NAMES_QUEUE,
  FUZZY_THRESHOLD,
  JOB_LOCK_DURATION_MS,
  WORKER_CONCURRENCY,
} from '../config';
import { redis } from '../lib/redis';
import { workerLogger } from '../utils/logger';
import { createCleanNamesProcessor, type CleanNamesResult } from './clean-names';

const log = workerLogger('clean-names');

const cleanNamesWorker = new Worker<CleanJobInput, CleanNamesResult>(
  CLEAN_NAMES_QUEUE,
  createCleanNamesProcessor({ defaultThreshold: FUZZY_THRESHOLD, log }),
  {
    connection: redis,
    concurrency: WORKER_CONCURRENCY,
    lockDuration: JOB_LOCK_DURATION_MS,
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 5000 },
  },
);

cleanNamesWorker.on('failed', (job, err) => {
  log.error({ jobId: job?.id, attempts: job?.attemptsMade, err }, 'Name cleaning job failed');
});

export default cleanNamesWorker;
