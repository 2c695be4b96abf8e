export type TableRow = Record<string, unknown>;

export interface Table {
  columns: string[];
  rows: TableRow[];
}

export interface CleanedRow {
  /** 1-based position in the input column. */
  row: number;
  original: unknown;
  normalized: string;
  canonical?: string;
}

export interface CleaningSummary {
  total: number;
  blank: number;
  changed: number;
  distinctNormalized: number;
  groups?: number;
}

export interface CleanedTable extends Table {
  sourceColumn: string;
  summary: CleaningSummary;
}
