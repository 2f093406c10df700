import { describe, expect, it } from 'vitest';
import { canonicalTitle } from '../canonical';

describe('canonicalTitle', () => {
  it('ignores case, accents, whitespace and punctuation', () => {
    expect(canonicalTitle('Café  Society: Part 1')).toBe('cafesocietypart1');
    expect(canonicalTitle('CAFE SOCIETY — part 1!')).toBe('cafesocietypart1');
  });

  it('returns an empty key for missing or symbol-only titles', () => {
    expect(canonicalTitle(null)).toBe('');
    expect(canonicalTitle(' — ')).toBe('');
  });
});
