import { z } from 'zod';
import { cleanOptionsSchema, thresholdSchema } from './common';

export const MAX_BATCH_ROWS = 50_000;
/** Grouping compares each name with every representative, so fuzzy batches are smaller. */
export const MAX_FUZZY_BATCH_ROWS = 5_000;

// --- Table ---
export const tableSchema = z.object({
  columns: z.array(z.string()).min(1, 'Table must have at least one column'),
  rows: z
    .array(z.record(z.unknown()))
    .max(MAX_BATCH_ROWS, `Batch exceeds ${MAX_BATCH_ROWS} rows`),
});

// --- Clean-names job payload ---
// No threshold default here: the worker falls back to its configured FUZZY_THRESHOLD.
export const cleanJobSchema = cleanOptionsSchema
  .extend({ threshold: thresholdSchema.optional() })
  .merge(tableSchema)
  .refine((job) => !job.fuzzy || job.rows.length <= MAX_FUZZY_BATCH_ROWS, {
    message: `Fuzzy grouping is limited to ${MAX_FUZZY_BATCH_ROWS} rows per batch`,
    path: ['rows'],
  });
export type CleanJobInput = z.input<typeof cleanJobSchema>;
export type CleanJob = z.infer<typeof cleanJobSchema>;
