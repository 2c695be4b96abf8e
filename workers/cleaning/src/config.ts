import 'dotenv/config';
import { DEFAULT_FUZZY_THRESHOLD, thresholdSchema } from '@namekit/shared';

// ── Queue ────────────────────────────────────────────────────────────────────

export const CLEAN_NAMES_QUEUE = 'namekit-clean-names';

// ── Worker settings ──────────────────────────────────────────────────────────

export const WORKER_CONCURRENCY = Number(process.env.WORKER_CONCURRENCY) || 3;
export const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

// A batch is cleaned in one synchronous pass, during which the job lock cannot
// be renewed. It has to outlast the largest fuzzy batch.
export const JOB_LOCK_DURATION_MS = Number(process.env.JOB_LOCK_DURATION_MS) || 5 * 60_000;

// ── Cleaning defaults ────────────────────────────────────────────────────────

const thresholdSetting = thresholdSchema.safeParse(
  process.env.FUZZY_THRESHOLD === undefined
    ? DEFAULT_FUZZY_THRESHOLD
    : Number(process.env.FUZZY_THRESHOLD),
);

if (!thresholdSetting.success) {
  throw new Error(
    `FUZZY_THRESHOLD must be an integer between 0 and 100, got "${process.env.FUZZY_THRESHOLD}"`,
  );
}

/** Threshold for jobs that do not set one. */
export const FUZZY_THRESHOLD = thresholdSetting.data;
