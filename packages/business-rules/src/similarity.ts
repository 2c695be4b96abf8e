/**
 * Token-set similarity
 *
 * Order-insensitive comparison of two names on their deduplicated word sets,
 * scored 0-100. Names whose word sets contain one another score 100; other
 * pairs are compared as "<shared words> <remaining words>" strings with an
 * insert/delete edit ratio.
 */

export type SimilarityScorer = (a: string, b: string) => number;

// Reused between calls; grown on demand.
let lcsRow = new Uint32Array(64);

/**
 * Insert/delete edit distance: the number of single-character insertions and
 * deletions turning `a` into `b`, i.e. |a| + |b| - 2·LCS(a, b).
 */
export function indelDistance(a: string, b: string): number {
  const [longer, shorter] = a.length >= b.length ? [a, b] : [b, a];

  if (shorter.length === 0) return longer.length;

  if (lcsRow.length <= shorter.length) {
    lcsRow = new Uint32Array(shorter.length * 2);
  }
  const row = lcsRow;
  row.fill(0, 0, shorter.length + 1);

  // One row of the longest common subsequence table, over the shorter string
  for (let i = 0; i < longer.length; i++) {
    const ch = longer.charCodeAt(i);
    let diagonal = 0;
    for (let j = 1; j <= shorter.length; j++) {
      const above = row[j];
      row[j] = shorter.charCodeAt(j - 1) === ch ? diagonal + 1 : Math.max(above, row[j - 1]);
      diagonal = above;
    }
  }

  return longer.length + shorter.length - 2 * row[shorter.length];
}

/**
 * Normalized indel similarity, 0-100. Two empty strings score 100.
 * Pairs whose lengths alone rule out `scoreCutoff` score 0 without being compared.
 */
export function ratio(a: string, b: string, scoreCutoff = 0): number {
  const lengthSum = a.length + b.length;
  if (lengthSum === 0) return 100;

  const bestCase = ((lengthSum - Math.abs(a.length - b.length)) / lengthSum) * 100;
  if (bestCase < scoreCutoff) return 0;

  return ((lengthSum - indelDistance(a, b)) / lengthSum) * 100;
}

/** Lowercased word set; anything other than letters and digits separates words. */
export function tokenSet(name: string): Set<string> {
  return new Set(
    name
      .toLowerCase()
      .replace(/[^\p{L}\p{M}\p{N}]+/gu, ' ')
      .trim()
      .split(' ')
      .filter((token) => token.length > 0)
  );
}

/** A name's word set, tokenized and sorted once for repeated comparison. */
export interface PreparedName {
  tokens: ReadonlySet<string>;
  sorted: readonly string[];
}

export function prepareName(name: string): PreparedName {
  const tokens = tokenSet(name);
  return { tokens, sorted: [...tokens].sort() };
}

/** ratio(prefix, whole) where `prefix` starts `whole`: their LCS is the prefix. */
function prefixRatio(prefixLength: number, wholeLength: number): number {
  const lengthSum = prefixLength + wholeLength;
  return ((lengthSum - (wholeLength - prefixLength)) / lengthSum) * 100;
}

/**
 * Token-set ratio of two prepared names. A score below `scoreCutoff` may come
 * back lower than its exact value.
 */
export function preparedTokenSetRatio(a: PreparedName, b: PreparedName, scoreCutoff = 0): number {
  if (a.sorted.length === 0 || b.sorted.length === 0) return 0;

  const intersection = a.sorted.filter((token) => b.tokens.has(token));
  const onlyA = a.sorted.filter((token) => !b.tokens.has(token));
  const onlyB = b.sorted.filter((token) => !a.tokens.has(token));

  if (intersection.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 100;
  }

  const sect = intersection.join(' ');
  const combinedA = sect ? `${sect} ${onlyA.join(' ')}` : onlyA.join(' ');
  const combinedB = sect ? `${sect} ${onlyB.join(' ')}` : onlyB.join(' ');

  if (!sect) return ratio(combinedA, combinedB, scoreCutoff);

  const sectScore = Math.max(
    prefixRatio(sect.length, combinedA.length),
    prefixRatio(sect.length, combinedB.length)
  );
  return Math.max(sectScore, ratio(combinedA, combinedB, Math.max(scoreCutoff, sectScore)));
}

export function tokenSetRatio(a: string, b: string): number {
  return preparedTokenSetRatio(prepareName(a), prepareName(b));
}
