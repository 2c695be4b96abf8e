/**
 * Fuzzy Grouping
 *
 * Greedy single pass over normalized names. Each non-empty name is compared
 * with the representatives registered so far; the best one at or above the
 * threshold is reused, otherwise the name becomes a new representative.
 *
 * Membership is not transitive: a name is only ever compared with
 * representatives, never with names that were mapped onto one.
 */

import { thresholdSchema } from '@namekit/shared';
import { InvalidThresholdError } from './errors';
import { prepareName, preparedTokenSetRatio, type PreparedName, type SimilarityScorer } from './similarity';

export interface RepresentativeMatch {
  representative: string;
  score: number;
  /** Insertion position of the representative in the index. */
  position: number;
}

export function assertThreshold(threshold: unknown): asserts threshold is number {
  if (!thresholdSchema.safeParse(threshold).success) {
    throw new InvalidThresholdError(threshold);
  }
}

interface Representative {
  name: string;
  prepared: PreparedName;
}

/**
 * Append-only, insertion-ordered list of representatives.
 *
 * Without a custom scorer, names are compared by token-set ratio and each
 * representative's word set is tokenized once, when it is added.
 */
export class RepresentativeIndex {
  private readonly representatives: Representative[] = [];

  constructor(private readonly scorer?: SimilarityScorer) {}

  get size(): number {
    return this.representatives.length;
  }

  values(): string[] {
    return this.representatives.map((representative) => representative.name);
  }

  add(name: string): void {
    this.representatives.push({ name, prepared: prepareName(name) });
  }

  /**
   * Highest-scoring representative scoring at least `minScore`; ties go to
   * the earliest registered.
   */
  bestMatch(name: string, minScore = 0): RepresentativeMatch | null {
    const prepared = prepareName(name);
    let best: RepresentativeMatch | null = null;

    for (let i = 0; i < this.representatives.length; i++) {
      const candidate = this.representatives[i];
      const cutoff: number = best === null ? minScore : best.score;
      const score: number = this.scorer
        ? this.scorer(name, candidate.name)
        : preparedTokenSetRatio(prepared, candidate.prepared, cutoff);

      if (score >= minScore && (best === null || score > best.score)) {
        best = { representative: candidate.name, score, position: i };
      }
    }

    return best;
  }
}

export function groupNames(
  names: readonly string[],
  threshold: number,
  scorer?: SimilarityScorer
): string[] {
  assertThreshold(threshold);

  const known = new RepresentativeIndex(scorer);

  return names.map((name) => {
    if (!name) return name;

    const match = known.bestMatch(name, threshold);
    if (match) {
      return match.representative;
    }

    known.add(name);
    return name;
  });
}

export interface NameGroup {
  canonicalName: string;
  /** 1-based input positions mapped to this representative. */
  rows: number[];
  /** Distinct member names in first-seen order, the representative first. */
  names: string[];
}

/** Groups in the order their representatives were first seen; empty names are left out. */
export function groupEntities(
  names: readonly string[],
  threshold: number,
  scorer?: SimilarityScorer
): NameGroup[] {
  const canonical = groupNames(names, threshold, scorer);
  const groups = new Map<string, NameGroup>();

  canonical.forEach((representative, i) => {
    if (!representative) return;

    let group = groups.get(representative);
    if (!group) {
      group = { canonicalName: representative, rows: [], names: [] };
      groups.set(representative, group);
    }

    group.rows.push(i + 1);
    if (!group.names.includes(names[i])) {
      group.names.push(names[i]);
    }
  });

  return [...groups.values()];
}
