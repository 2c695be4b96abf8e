/**
 * clean-names — normalize one table's company-name column and, when asked,
 * group near-duplicates under a canonical name.
 *
 * Kept apart from the BullMQ Worker so it can run without a Redis connection.
 */

import { UnrecoverableError, type Job } from 'bullmq';
import {
  cleanJobSchema,
  type CleanJobInput,
  type CleanedTable,
  type CleaningSummary,
  type TableRow,
} from '@namekit/shared';
import { cleanTable, UnknownColumnError, InvalidCleanOptionsError } from '@namekit/business-rules';
import type { Logger } from '../utils/logger';

export interface CleanNamesResult {
  column: string;
  columns: string[];
  rows: TableRow[];
  summary: CleaningSummary;
}

export type CleanNamesJob = Pick<Job<CleanJobInput, CleanNamesResult>, 'id' | 'data' | 'updateProgress'>;

interface ProcessorOptions {
  /** Used when the job payload has no threshold. */
  defaultThreshold: number;
  log: Logger;
}

export function createCleanNamesProcessor({ defaultThreshold, log }: ProcessorOptions) {
  return async function processCleanNames(job: CleanNamesJob): Promise<CleanNamesResult> {
    const parsed = cleanJobSchema.safeParse(job.data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`);
      log.warn({ jobId: job.id, issues }, 'Rejected invalid clean-names payload');
      throw new UnrecoverableError(`Invalid clean-names payload: ${issues.join('; ')}`);
    }

    const { columns, rows, column, fuzzy, threshold, policy } = parsed.data;
    log.info({ jobId: job.id, rows: rows.length, fuzzy }, 'Starting name cleaning');

    let result: CleanedTable;
    try {
      result = cleanTable(
        { columns, rows },
        { column, fuzzy, threshold: threshold ?? defaultThreshold, policy },
      );
    } catch (err) {
      if (err instanceof UnknownColumnError || err instanceof InvalidCleanOptionsError) {
        throw new UnrecoverableError(err.message);
      }
      throw err;
    }

    await job.updateProgress(100);

    log.info(
      { jobId: job.id, column: result.sourceColumn, ...result.summary },
      'Name cleaning complete',
    );

    return {
      column: result.sourceColumn,
      columns: result.columns,
      rows: result.rows,
      summary: result.summary,
    };
  };
}
