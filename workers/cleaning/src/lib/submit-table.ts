/**
 * submit-table — enqueue one cleaning batch, wait for the worker's result and
 * print it. Takes its BullMQ clients as arguments so the flow runs against
 * in-process fakes in tests.
 */

import { tableSchema, type CleanJob, type CleanJobInput, type TableRow } from '@namekit/shared';
import type { CleanNamesResult } from '../processing/clean-names';
import type { Logger } from '../utils/logger';

export const CLEAN_NAMES_JOB = 'clean-names';

function isRowArray(value: unknown): value is TableRow[] {
  return Array.isArray(value) && value.every((row) => typeof row === 'object' && row !== null && !Array.isArray(row));
}

/** Accepts `{ columns, rows }` or a plain array of row objects keyed by the first row's columns. */
export function readTable(content: unknown): Pick<CleanJobInput, 'columns' | 'rows'> {
  if (isRowArray(content)) {
    return { columns: Object.keys(content[0] ?? {}), rows: content };
  }
  return tableSchema.parse(content);
}

interface QueueEventsLike {
  waitUntilReady(): Promise<unknown>;
  close(): Promise<void>;
}

interface SubmittedJob<Events> {
  id?: string;
  waitUntilFinished(queueEvents: Events, ttl?: number): Promise<CleanNamesResult>;
}

export interface SubmitClients<Events extends QueueEventsLike> {
  queue: {
    add(name: string, data: CleanJob): Promise<SubmittedJob<Events>>;
    close(): Promise<void>;
  };
  queueEvents: Events;
  /** Connection handed to the queue and queue events; BullMQ leaves it open on close. */
  connection: { quit(): Promise<unknown> };
}

export interface SubmitOptions {
  log: Logger;
  /** Receives the result JSON and nothing else. */
  write: (text: string) => void;
  timeoutMs?: number;
}

/** Closes every client once the result is in or the submission fails. */
export async function submitTable<Events extends QueueEventsLike>(
  payload: CleanJob,
  clients: SubmitClients<Events>,
  { log, write, timeoutMs }: SubmitOptions,
): Promise<CleanNamesResult> {
  try {
    await clients.queueEvents.waitUntilReady();
    const job = await clients.queue.add(CLEAN_NAMES_JOB, payload);
    log.info({ jobId: job.id, rows: payload.rows.length }, 'Submitted clean-names job');

    const result = await job.waitUntilFinished(clients.queueEvents, timeoutMs);
    log.info({ jobId: job.id, ...result.summary }, 'Clean-names job finished');
    write(`${JSON.stringify(result, null, 2)}\n`);
    return result;
  } finally {
    await clients.queueEvents.close();
    await clients.queue.close();
    await clients.connection.quit();
  }
}
