import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { UnrecoverableError } from 'bullmq';
import { MAX_BATCH_ROWS, MAX_FUZZY_BATCH_ROWS, type CleanJobInput } from '@namekit/shared';
import { createCleanNamesProcessor } from '../processing/clean-names';

const log = pino({ level: 'silent' });

function fakeJob(data: CleanJobInput) {
  return { id: 'job-1', data, updateProgress: vi.fn(async () => undefined) };
}

const table = {
  columns: ['id', 'Company'],
  rows: [
    { id: 1, Company: 'Acme Inc.' },
    { id: 2, Company: 'ACME' },
    { id: 3, Company: 'Other LLC' },
  ],
};

describe('processCleanNames', () => {
  it('returns the cleaned table and summary', async () => {
    const processCleanNames = createCleanNamesProcessor({ defaultThreshold: 92, log });
    const job = fakeJob({ ...table, fuzzy: true });

    const result = await processCleanNames(job);

    expect(result.column).toBe('Company');
    expect(result.columns).toEqual(['id', 'Company', 'Cleaned Company Name', 'Canonical Company Name']);
    expect(result.rows.map((row) => row['Canonical Company Name'])).toEqual(['Acme', 'Acme', 'Other']);
    expect(result.summary).toEqual({ total: 3, blank: 0, changed: 3, distinctNormalized: 2, groups: 2 });
    expect(job.updateProgress).toHaveBeenCalledWith(100);
  });

  it('falls back to the configured threshold', async () => {
    const data = { columns: ['name'], rows: [{ name: 'abcd' }, { name: 'abce' }], fuzzy: true };

    const strict = await createCleanNamesProcessor({ defaultThreshold: 80, log })(fakeJob(data));
    expect(strict.rows.map((row) => row['Canonical Company Name'])).toEqual(['Abcd', 'Abce']);

    const loose = await createCleanNamesProcessor({ defaultThreshold: 80, log })(
      fakeJob({ ...data, threshold: 75 })
    );
    expect(loose.rows.map((row) => row['Canonical Company Name'])).toEqual(['Abcd', 'Abcd']);
  });

  it('fails without retry on an invalid payload', async () => {
    const processCleanNames = createCleanNamesProcessor({ defaultThreshold: 92, log });

    await expect(processCleanNames(fakeJob({ columns: [], rows: [] }))).rejects.toThrow(UnrecoverableError);
    await expect(processCleanNames(fakeJob({ ...table, threshold: 150 }))).rejects.toThrow(
      UnrecoverableError
    );
  });

  it('rejects batches over the row limits', async () => {
    const processCleanNames = createCleanNamesProcessor({ defaultThreshold: 92, log });
    const rowsOf = (count: number) => Array.from({ length: count }, (_, i) => ({ name: `Vendor ${i}` }));

    await expect(
      processCleanNames(fakeJob({ columns: ['name'], rows: rowsOf(MAX_FUZZY_BATCH_ROWS + 1), fuzzy: true }))
    ).rejects.toThrow('Invalid clean-names payload: rows: Fuzzy grouping is limited to 5000 rows per batch');
    await expect(
      processCleanNames(fakeJob({ columns: ['name'], rows: rowsOf(MAX_BATCH_ROWS + 1) }))
    ).rejects.toThrow('Invalid clean-names payload: rows: Batch exceeds 50000 rows');
  });

  it('cleans a large batch when grouping is off', async () => {
    const processCleanNames = createCleanNamesProcessor({ defaultThreshold: 92, log });
    const rows = Array.from({ length: MAX_FUZZY_BATCH_ROWS + 1 }, (_, i) => ({ name: `Vendor ${i} LLC` }));

    const result = await processCleanNames(fakeJob({ columns: ['name'], rows }));

    expect(result.summary.total).toBe(MAX_FUZZY_BATCH_ROWS + 1);
    expect(result.rows[0]['Cleaned Company Name']).toBe('Vendor 0');
  });

  it('fails without retry on an unknown column', async () => {
    const processCleanNames = createCleanNamesProcessor({ defaultThreshold: 92, log });
    const job = fakeJob({ ...table, column: 'Vendor' });

    await expect(processCleanNames(job)).rejects.toThrow('Column "Vendor" not found. Available columns: id, Company');
    expect(job.updateProgress).not.toHaveBeenCalled();
  });
});
