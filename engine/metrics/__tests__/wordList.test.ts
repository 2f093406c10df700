import { describe, expect, it } from 'vitest';
import { baseForms, isDifficultWord, isKnownWord, loadEasyWords, parseWordList } from '../wordList';

describe('parseWordList', () => {
  it('lowercases entries and ignores comments and blank lines', () => {
    expect(Array.from(parseWordList('# header\nCat\n\n dog # pet\n'))).toEqual(['cat', 'dog']);
  });
});

describe('base forms', () => {
  it('derives simple plural stems', () => {
    expect(baseForms('Cities')).toEqual(['cities', 'city', 'citi', 'citie']);
  });

  it('matches possessives and plurals against their base word', () => {
    const list = new Set(['dog', 'city', 'box']);
    expect(isKnownWord("dog's", list)).toBe(true);
    expect(isKnownWord('Dog’s', list)).toBe(true);
    expect(isKnownWord('cities', list)).toBe(true);
    expect(isKnownWord('boxes', list)).toBe(true);
    expect(isKnownWord('cats', list)).toBe(false);
  });

  it('never treats numbers as difficult', () => {
    expect(isDifficultWord('1999', new Set())).toBe(false);
    expect(isDifficultWord('zeitgeist', new Set())).toBe(true);
  });
});

describe('bundled easy words', () => {
  it('contains common words', () => {
    const list = loadEasyWords();
    for (const word of ['the', 'cat', 'sat', 'dog', 'ran', 'fast']) {
      expect(list.has(word)).toBe(true);
    }
    expect(list.has('zeitgeist')).toBe(false);
  });

  it('carries the full familiar-word list', () => {
    const list = loadEasyWords();
    expect(list.size).toBeGreaterThan(2900);
    for (const word of ['tiger', 'wagon', 'valley', 'bicycle', 'pumpkin', 'railroad', 'grandmother', 'thunder', 'library']) {
      expect(list.has(word)).toBe(true);
    }
  });
});
