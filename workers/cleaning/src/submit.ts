/**
 * submit.ts
 *
 * Enqueues one table for cleaning and prints the cleaned table as JSON once
 * the worker finishes it. Logs go to stderr so stdout holds only the result.
 *
 * Input file: { "columns": [...], "rows": [{...}] } or a plain array of row objects.
 *
 * Run: npx tsx workers/cleaning/src/submit.ts table.json --fuzzy --threshold 90 [--column "Company"]
 */

import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { QueueEvents } from 'bullmq';
import { cleanJobSchema } from '@namekit/shared';
import { CLEAN_NAMES_QUEUE } from './config';
import { redis } from './lib/redis';
import { readTable, submitTable } from './lib/submit-table';
import { cleanNamesQueue } from './queues';
import { createLogger } from './utils/logger';

const WAIT_TIMEOUT_MS = 5 * 60_000;

const log = createLogger('cleaning-submit', 2);

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      column: { type: 'string' },
      fuzzy: { type: 'boolean', default: false },
      threshold: { type: 'string' },
    },
  });

  const [file] = positionals;
  if (!file) {
    throw new Error('Usage: submit.ts <table.json> [--column <name>] [--fuzzy] [--threshold <0-100>]');
  }

  const table = readTable(JSON.parse(await readFile(file, 'utf8')));
  const payload = cleanJobSchema.parse({
    ...table,
    column: values.column,
    fuzzy: values.fuzzy,
    threshold: values.threshold === undefined ? undefined : Number(values.threshold),
  });

  await submitTable(
    payload,
    {
      queue: cleanNamesQueue,
      queueEvents: new QueueEvents(CLEAN_NAMES_QUEUE, { connection: redis }),
      connection: redis,
    },
    {
      log,
      write: (text) => {
        process.stdout.write(text);
      },
      timeoutMs: WAIT_TIMEOUT_MS,
    },
  );
}

main().catch((err) => {
  log.fatal({ err }, 'Submit failed');
  process.exit(1);
});
