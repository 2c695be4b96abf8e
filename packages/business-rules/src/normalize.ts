/**
 * Company Name Normalization
 *
 * Maps one raw company-name value to its canonical display form. Stages run
 * in a fixed order: text rewrites (apostrophes, ampersands, punctuation,
 * hyphens, whitespace), trailing suffix stripping, then per-token casing.
 *
 * The output is idempotent: normalizing an already normalized name returns it
 * unchanged.
 */

import {
  LEGAL_SUFFIX_PATTERNS,
  CONNECTIVE_SUFFIX_EXCEPTIONS,
  STOPWORDS,
  ACRONYM_EXCEPTIONS,
  US_STATE_CODES,
  type AmpersandPolicy,
  type HyphenPolicy,
  type LeadingStopwordPolicy,
  type NormalizerPolicy,
} from '@namekit/shared';

export interface NormalizerConfig {
  readonly suffixPatterns: readonly string[];
  /** Suffixes kept when they follow "&" or "and". Lowercase. */
  readonly connectiveSuffixes: readonly string[];
  readonly stopwords: ReadonlySet<string>;
  readonly acronyms: ReadonlySet<string>;
  readonly stateCodes: ReadonlySet<string>;
  readonly ampersand: AmpersandPolicy;
  readonly hyphen: HyphenPolicy;
  readonly leadingStopword: LeadingStopwordPolicy;
}

export const DEFAULT_NORMALIZER_CONFIG: NormalizerConfig = Object.freeze({
  suffixPatterns: LEGAL_SUFFIX_PATTERNS,
  connectiveSuffixes: CONNECTIVE_SUFFIX_EXCEPTIONS,
  stopwords: STOPWORDS,
  acronyms: ACRONYM_EXCEPTIONS,
  stateCodes: US_STATE_CODES,
  ampersand: 'spaced',
  hyphen: 'space',
  leadingStopword: 'capitalize',
});

export function createNormalizerConfig(overrides: Partial<NormalizerConfig> = {}): NormalizerConfig {
  return Object.freeze({ ...DEFAULT_NORMALIZER_CONFIG, ...overrides });
}

/** Builds a config from the policy flags accepted by batch options. */
export function configFromPolicy(policy: NormalizerPolicy = {}): NormalizerConfig {
  return createNormalizerConfig({
    ampersand: policy.ampersand ?? DEFAULT_NORMALIZER_CONFIG.ampersand,
    hyphen: policy.hyphen ?? DEFAULT_NORMALIZER_CONFIG.hyphen,
    leadingStopword: policy.leadingStopword ?? DEFAULT_NORMALIZER_CONFIG.leadingStopword,
  });
}

// ── Text rewrite rules ───────────────────────────────────────────────────────

export interface RewriteRule {
  name: string;
  pattern: RegExp;
  replacement: string;
  when?: (config: NormalizerConfig) => boolean;
}

/** Applied top to bottom; rules whose `when` rejects the config are skipped. */
export const REWRITE_RULES: readonly RewriteRule[] = [
  { name: 'apostrophe', pattern: /['‘’]/g, replacement: '' },
  {
    // "A & B" → "A and B"; "H&H" and "AT&T" stay intact
    name: 'ampersand-standalone',
    pattern: /(?<![\p{L}\p{M}\p{N}])&(?![\p{L}\p{M}\p{N}])/gu,
    replacement: ' and ',
    when: (config) => config.ampersand === 'spaced',
  },
  {
    name: 'ampersand-all',
    pattern: /&/g,
    replacement: ' and ',
    when: (config) => config.ampersand === 'always',
  },
  { name: 'punctuation', pattern: /[^\p{L}\p{M}\p{N}\s&-]/gu, replacement: ' ' },
  {
    name: 'hyphen-all',
    pattern: /-/g,
    replacement: ' ',
    when: (config) => config.hyphen === 'space',
  },
  {
    name: 'hyphen-stray',
    pattern: /(?<![\p{L}\p{M}\p{N}])-|-(?![\p{L}\p{M}\p{N}])/gu,
    replacement: ' ',
    when: (config) => config.hyphen === 'preserve',
  },
  { name: 'whitespace', pattern: /\s+/g, replacement: ' ' },
];

// ── Suffix stripping ─────────────────────────────────────────────────────────

/** Matches one trailing designator; group 1 is the designator as written. */
function compileSuffixMatcher(patterns: readonly string[]): RegExp | null {
  if (patterns.length === 0) return null;
  return new RegExp(`(?:^|\\s+)(${patterns.join('|')})\\s*$`, 'i');
}

interface StrippedName {
  text: string;
  /** Designator to re-append after casing ("Co" in "Eldredge & Co"). */
  retained: string | null;
}

// Designators come off one at a time from the right, so "Acme Corp Inc" loses
// both. A single pattern repeating the alternation backtracks exponentially on
// runs like "Pa Pa Pa ... Foods", where `pa` and `p\s*a` overlap.
function stripSuffixes(text: string, matcher: RegExp | null, config: NormalizerConfig): StrippedName {
  if (!matcher) return { text, retained: null };

  let kept = text;
  let innermost: string | null = null;
  for (let match = matcher.exec(kept); match; match = matcher.exec(kept)) {
    kept = kept.slice(0, match.index);
    innermost = match[1];
  }
  if (innermost === null) return { text, retained: null };

  const lastToken = kept.slice(kept.lastIndexOf(' ') + 1).toLowerCase();
  if (
    (lastToken === '&' || lastToken === 'and') &&
    config.connectiveSuffixes.includes(innermost.toLowerCase())
  ) {
    return { text: kept, retained: innermost };
  }

  return { text: kept, retained: null };
}

// ── Casing ───────────────────────────────────────────────────────────────────

function isFullyUppercase(token: string): boolean {
  return token === token.toUpperCase() && token !== token.toLowerCase();
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** Lowercases, then capitalizes the first letter of each "&"/"-" delimited segment. */
export function toTitleCase(token: string): string {
  return token
    .toLowerCase()
    .replace(/(^|[&-])(\p{Ll})/gu, (_, delimiter: string, letter: string) => {
      // "ß" uppercases to "SS"; keep it so a second pass sees the same token
      const upper = letter.toUpperCase();
      return delimiter + (upper.length === 1 ? upper : letter);
    });
}

function caseToken(token: string, isFirst: boolean, config: NormalizerConfig): string {
  const lower = token.toLowerCase();

  if (token.length === 2 && config.stateCodes.has(lower)) return token.toUpperCase();

  if (config.stopwords.has(lower)) {
    return isFirst && config.leadingStopword === 'capitalize' ? capitalize(lower) : lower;
  }

  const upper = isFullyUppercase(token);
  if (upper && config.acronyms.has(lower)) return token;
  if (upper && token.length <= 3) return token;

  return toTitleCase(token);
}

// ── Pipeline ─────────────────────────────────────────────────────────────────

/** Non-string values (null, undefined, numbers, objects) become "". */
export function coerceName(raw: unknown): string {
  return typeof raw === 'string' ? raw : '';
}

export type Normalizer = (raw: unknown) => string;

export function createNormalizer(config: NormalizerConfig = DEFAULT_NORMALIZER_CONFIG): Normalizer {
  const rules = REWRITE_RULES.filter((rule) => !rule.when || rule.when(config));
  const suffixMatcher = compileSuffixMatcher(config.suffixPatterns);

  return (raw: unknown): string => {
    const input = coerceName(raw);
    if (input.length === 0) return '';

    let text = input;
    for (const { pattern, replacement } of rules) {
      text = text.replace(pattern, replacement);
    }
    text = text.trim();

    const stripped = stripSuffixes(text, suffixMatcher, config);
    const tokens = stripped.text
      .split(' ')
      .filter((token) => token.length > 0)
      .map((token, i) => caseToken(token, i === 0, config));

    if (stripped.retained) {
      tokens.push(toTitleCase(stripped.retained));
    } else if (tokens.length > 0 && tokens[tokens.length - 1] === '&') {
      tokens.push('Co');
    }

    return tokens.join(' ');
  };
}

const defaultNormalizer = createNormalizer(DEFAULT_NORMALIZER_CONFIG);

export function normalizeCompanyName(
  raw: unknown,
  config: NormalizerConfig = DEFAULT_NORMALIZER_CONFIG,
): string {
  return config === DEFAULT_NORMALIZER_CONFIG ? defaultNormalizer(raw) : createNormalizer(config)(raw);
}
