/**
 * Word tables consulted by the token casing stage.
 * All entries are lowercase; lookups lowercase the token first.
 */
import usStateCodes from '../data/us-state-codes.json';

export const STOPWORDS: ReadonlySet<string> = new Set([
  'of', 'and', 'the', 'for', 'in', 'on', 'at', 'with', 'to', 'from', 'by',
]);

// Kept as written when fully uppercase, at any length; other all-caps tokens only up to three characters.
export const ACRONYM_EXCEPTIONS: ReadonlySet<string> = new Set([
  'usa', 'ibm', 'ups', 'nasa', 'kpmg', 'hsbc', 'at&t', 'pwc', 'bmw', 'cvs', 'nfl', 'nba', 'ymca',
]);

export const US_STATE_CODES: ReadonlySet<string> = new Set(usStateCodes);

/** Column name fragment used to pick the source column when none is given. */
export const SOURCE_COLUMN_HINT = 'company';

export const CLEANED_COLUMN = 'Cleaned Company Name';
export const CANONICAL_COLUMN = 'Canonical Company Name';
