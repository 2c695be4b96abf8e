/**
 * Configuration errors raised before a batch starts.
 * Row values never raise; bad rows coerce to an empty name instead.
 */

export class InvalidThresholdError extends RangeError {
  readonly threshold: unknown;

  constructor(threshold: unknown) {
    super(`Similarity threshold must be an integer between 0 and 100, got ${String(threshold)}`);
    this.name = 'InvalidThresholdError';
    this.threshold = threshold;
  }
}

export class UnknownColumnError extends Error {
  readonly column: string | undefined;
  readonly columns: readonly string[];

  constructor(column: string | undefined, columns: readonly string[]) {
    super(
      column === undefined
        ? 'Table has no columns to read company names from'
        : `Column "${column}" not found. Available columns: ${columns.join(', ') || '(none)'}`,
    );
    this.name = 'UnknownColumnError';
    this.column = column;
    this.columns = columns;
  }
}

export class InvalidCleanOptionsError extends Error {
  readonly issues: Record<string, string[] | undefined>;

  constructor(issues: Record<string, string[] | undefined>, formErrors: string[] = []) {
    const details = Object.entries(issues)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join('; ')}`)
      .concat(formErrors);
    super(`Invalid cleaning options: ${details.join(', ')}`);
    this.name = 'InvalidCleanOptionsError';
    this.issues = issues;
  }
}
