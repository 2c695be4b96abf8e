import { Queue } from 'bullmq';
import type { CleanJobInput } from '@namekit/shared';
import { CLEAN_NAMES_QUEUE } from './config';
import { redis } from './lib/redis';
import type { CleanNamesResult } from './processing/clean-names';

export const cleanNamesQueue = new Queue<CleanJobInput, CleanNamesResult>(CLEAN_NAMES_QUEUE, {
  connection: redis,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: { age: 24 * 3600 },
    removeOnFail: { age: 7 * 24 * 3600 },
  },
});
