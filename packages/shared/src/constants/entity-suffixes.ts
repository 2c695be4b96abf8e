/**
 * Legal and professional entity designators stripped from the end of a name.
 *
 * Each entry is a regex source fragment, matched case-insensitively. Dotted
 * forms are listed alongside their spaced forms because punctuation is turned
 * into whitespace before suffixes are stripped ("P.A." arrives as "P A").
 */
export const LEGAL_SUFFIX_PATTERNS: readonly string[] = [
  'incorporated', 'inc\\.?',
  'llc', 'l\\.l\\.c\\.?',
  'company', 'co\\.?', 'corp\\.?', 'corporation',
  'limited', 'ltd\\.?', 'plc',
  'gmbh', 's\\.a\\.?', 'bv', 'b\\.v\\.?', 'ag',
  // Professional / medical markers
  'dds', 'dmd',
  'p\\.a\\.?', 'p\\s*a', 'pa',
  'm\\.d\\.?', 'm\\s*d', 'md',
];

/**
 * Designators kept when they directly follow "&" or "and",
 * so "Eldredge & Co" does not collapse to "Eldredge and".
 */
export const CONNECTIVE_SUFFIX_EXCEPTIONS: readonly string[] = ['co', 'co.', 'company'];

/** Default token-set similarity cutoff for fuzzy grouping (0-100, inclusive). */
export const DEFAULT_FUZZY_THRESHOLD = 92;
