/**
 * Batch cleaning of a company-name column.
 *
 * Every row is normalized independently; fuzzy grouping then runs once over
 * the normalized column in input order.
 */

import {
  cleanOptionsSchema,
  SOURCE_COLUMN_HINT,
  CLEANED_COLUMN,
  CANONICAL_COLUMN,
  type CleanOptionsInput,
  type CleanedRow,
  type CleanedTable,
  type CleaningSummary,
  type Table,
} from '@namekit/shared';
import { InvalidCleanOptionsError, UnknownColumnError } from './errors';
import { coerceName, configFromPolicy, createNormalizer } from './normalize';
import { groupNames } from './group';

/**
 * Picks the column holding company names: the requested one, else the first
 * whose name mentions "company", else the first column.
 */
export function resolveSourceColumn(columns: readonly string[], requested?: string): string {
  if (requested !== undefined) {
    if (!columns.includes(requested)) throw new UnknownColumnError(requested, columns);
    return requested;
  }

  if (columns.length === 0) throw new UnknownColumnError(undefined, columns);

  return columns.find((column) => column.toLowerCase().includes(SOURCE_COLUMN_HINT)) ?? columns[0];
}

function parseOptions(options: CleanOptionsInput) {
  const parsed = cleanOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const { fieldErrors, formErrors } = parsed.error.flatten();
    throw new InvalidCleanOptionsError(fieldErrors, formErrors);
  }
  return parsed.data;
}

export function cleanCompanyNames(
  values: readonly unknown[],
  options: CleanOptionsInput = {}
): CleanedRow[] {
  const { fuzzy, threshold, policy } = parseOptions(options);
  const normalize = createNormalizer(configFromPolicy(policy));

  const normalized = values.map((value) => normalize(value));
  const canonical = fuzzy ? groupNames(normalized, threshold) : null;

  return values.map((original, i) => {
    const row: CleanedRow = { row: i + 1, original, normalized: normalized[i] };
    if (canonical) row.canonical = canonical[i];
    return row;
  });
}

export function summarizeCleaning(rows: readonly CleanedRow[]): CleaningSummary {
  const distinct = new Set<string>();
  const representatives = new Set<string>();
  let blank = 0;
  let changed = 0;
  let grouped = false;

  for (const row of rows) {
    if (row.normalized) distinct.add(row.normalized);
    else blank++;

    if (coerceName(row.original) !== row.normalized) changed++;

    if (row.canonical !== undefined) {
      grouped = true;
      if (row.canonical) representatives.add(row.canonical);
    }
  }

  const summary: CleaningSummary = {
    total: rows.length,
    blank,
    changed,
    distinctNormalized: distinct.size,
  };
  if (grouped) summary.groups = representatives.size;
  return summary;
}

/**
 * Appends "Cleaned Company Name" (and "Canonical Company Name" when fuzzy
 * grouping is on) to every row. Existing columns and row order are kept.
 */
export function cleanTable(table: Table, options: CleanOptionsInput = {}): CleanedTable {
  const parsed = parseOptions(options);
  const sourceColumn = resolveSourceColumn(table.columns, parsed.column);

  const cleaned = cleanCompanyNames(
    table.rows.map((row) => row[sourceColumn]),
    parsed
  );

  const added = parsed.fuzzy ? [CLEANED_COLUMN, CANONICAL_COLUMN] : [CLEANED_COLUMN];
  const columns = [...table.columns.filter((column) => !added.includes(column)), ...added];

  const rows = table.rows.map((row, i) => {
    const out = { ...row, [CLEANED_COLUMN]: cleaned[i].normalized };
    return parsed.fuzzy ? { ...out, [CANONICAL_COLUMN]: cleaned[i].canonical } : out;
  });

  return { columns, rows, sourceColumn, summary: summarizeCleaning(cleaned) };
}
