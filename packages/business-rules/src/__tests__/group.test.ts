import { describe, it, expect } from 'vitest';
import { groupNames, groupEntities, assertThreshold, RepresentativeIndex } from '../group';
import { InvalidThresholdError } from '../errors';

describe('groupNames', () => {
  it('maps a later near-duplicate onto the first occurrence', () => {
    expect(groupNames(['Acme Corp', 'ACME CORP', 'Other'], 90)).toEqual([
      'Acme Corp',
      'Acme Corp',
      'Other',
    ]);
  });

  it('produces identical output on repeated runs', () => {
    const names = ['Acme Widgets', 'Acme Gadgets', 'Widgets Acme', 'Blue Sky', 'Sky Blue Co'];
    expect(groupNames(names, 80)).toEqual(groupNames(names, 80));
  });

  it('compares only against representatives, so groups are not transitive', () => {
    // "Acme Foods" would match "Acme" (100) but only "Acme Holdings" is a representative (69.6)
    expect(groupNames(['Acme Holdings', 'Acme', 'Acme Foods'], 90)).toEqual([
      'Acme Holdings',
      'Acme Holdings',
      'Acme Foods',
    ]);
  });

  it('treats a score equal to the threshold as a match', () => {
    expect(groupNames(['abcd', 'abce'], 75)).toEqual(['abcd', 'abcd']);
    expect(groupNames(['abcd', 'abce'], 76)).toEqual(['abcd', 'abce']);
  });

  it('passes empty names through without registering them', () => {
    expect(groupNames(['', 'Acme', '', 'Acme'], 90)).toEqual(['', 'Acme', '', 'Acme']);
  });

  it('picks the earliest representative on a tie', () => {
    expect(groupNames(['Acme East', 'Acme West', 'Acme'], 95)).toEqual([
      'Acme East',
      'Acme West',
      'Acme East',
    ]);
  });

  it('maps everything onto the first name at threshold 0', () => {
    expect(groupNames(['Alpha', 'Zulu', 'Omega'], 0)).toEqual(['Alpha', 'Alpha', 'Alpha']);
  });

  it('rejects thresholds outside 0-100 before doing any work', () => {
    expect(() => groupNames([], -1)).toThrow(InvalidThresholdError);
    expect(() => groupNames(['Acme'], 101)).toThrow(InvalidThresholdError);
    expect(() => groupNames(['Acme'], 90.5)).toThrow(InvalidThresholdError);
    expect(() => groupNames(['Acme'], Number.NaN)).toThrow(InvalidThresholdError);
  });

  it('accepts a custom scorer', () => {
    const sameInitial = (a: string, b: string) => (a[0] === b[0] ? 100 : 0);
    expect(groupNames(['Apple', 'Avocado', 'Banana'], 100, sameInitial)).toEqual([
      'Apple',
      'Apple',
      'Banana',
    ]);
  });
});

describe('assertThreshold', () => {
  it('accepts integers from 0 to 100', () => {
    expect(() => assertThreshold(0)).not.toThrow();
    expect(() => assertThreshold(100)).not.toThrow();
  });

  it('reports the rejected value', () => {
    expect(() => assertThreshold('90')).toThrow(
      'Similarity threshold must be an integer between 0 and 100, got 90'
    );
  });
});

describe('RepresentativeIndex', () => {
  it('returns null when empty', () => {
    expect(new RepresentativeIndex().bestMatch('Acme')).toBeNull();
  });

  it('returns the best representative with its score and position', () => {
    const index = new RepresentativeIndex();
    index.add('Other');
    index.add('Acme Holdings');

    expect(index.bestMatch('Acme')).toEqual({
      representative: 'Acme Holdings',
      score: 100,
      position: 1,
    });
    expect(index.size).toBe(2);
    expect(index.values()).toEqual(['Other', 'Acme Holdings']);
  });

  it('returns null when no representative reaches the minimum score', () => {
    const index = new RepresentativeIndex();
    index.add('Acme Holdings');
    index.add('Acme Foods');

    expect(index.bestMatch('Acme Widgets', 90)).toBeNull();
    // "acme widgets" vs "acme holdings" share 8 of 25 characters each way
    const match = index.bestMatch('Acme Widgets', 60);
    expect(match?.representative).toBe('Acme Holdings');
    expect(match?.position).toBe(0);
    expect(match?.score).toBeCloseTo(64, 5);
  });
});

// Park-Miller generator so every run sees the same names.
function syntheticNames(count: number): string[] {
  let seed = 20_240_601;
  const word = () => {
    let text = '';
    for (let i = 0; i < 7; i++) {
      seed = (seed * 48_271) % 2_147_483_647;
      text += String.fromCharCode(97 + (seed % 26));
    }
    return text;
  };
  return Array.from({ length: count }, () => `${word()} ${word()} ${word()}`);
}

describe('groupNames on a large batch', () => {
  it('groups two thousand distinct names within a few seconds', () => {
    const names = syntheticNames(2000);
    const started = performance.now();

    const canonical = groupNames(names, 92);

    expect(performance.now() - started).toBeLessThan(8000);
    expect(canonical).toHaveLength(2000);
    expect(canonical[0]).toBe(names[0]);
  }, 30_000);
});

describe('groupEntities', () => {
  it('collects rows and member names per representative', () => {
    const groups = groupEntities(['Acme', 'Acme Holdings', 'Other', '', 'acme'], 90);
    expect(groups).toEqual([
      { canonicalName: 'Acme', rows: [1, 2, 5], names: ['Acme', 'Acme Holdings', 'acme'] },
      { canonicalName: 'Other', rows: [3], names: ['Other'] },
    ]);
  });

  it('handles empty input', () => {
    expect(groupEntities([], 90)).toEqual([]);
  });
});
