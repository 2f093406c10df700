import { MetricsError } from '../../shared/errors';
import type { DaleChallSource } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { tokenize, type Tokens } from '../utils/tokenize';
import { isDifficultWord, loadEasyWords, type WordList } from './wordList';

export interface DaleChallCounts {
  words: number;
  sentences: number;
  difficultWords: number;
}

/** Pluggable Dale–Chall implementation, chosen once at startup. */
export interface DaleChallStrategy {
  readonly source: DaleChallSource;
  /** Familiar-word list difficult words are counted against. */
  readonly words: WordList;
  compute: (text: string) => number;
}

const DIFFICULT_PERCENT_THRESHOLD = 5;
const ADJUSTMENT = 3.6365;

export const daleChallScore = ({ words, sentences, difficultWords }: DaleChallCounts): number => {
  const percentDifficult = (100 * difficultWords) / words;
  const score = 0.1579 * percentDifficult + 0.0496 * (words / sentences);
  return percentDifficult > DIFFICULT_PERCENT_THRESHOLD ? score + ADJUSTMENT : score;
};

export const countDifficultWords = (words: readonly string[], list: WordList): number =>
  words.reduce((count, word) => (isDifficultWord(word, list) ? count + 1 : count), 0);

const tokensOrThrow = (text: string): Tokens => {
  const tokens = tokenize(text);
  if (!tokens.sentences.length) {
    throw new MetricsError();
  }
  return tokens;
};

export const createInternalDaleChall = (list: WordList = loadEasyWords()): DaleChallStrategy => ({
  source: 'internal',
  words: list,
  compute: (text) => {
    const tokens = tokensOrThrow(text);
    return daleChallScore({
      words: tokens.words.length,
      sentences: tokens.sentences.length,
      difficultWords: countDifficultWords(tokens.words, list),
    });
  },
});

export interface DaleChallLibrary {
  words: WordList;
  formula: (counts: { word: number; sentence: number; difficultWord: number }) => number;
}

/** Full reference list and formula from the `dale-chall` / `dale-chall-formula` packages. */
export const createLibraryDaleChall = (library: DaleChallLibrary): DaleChallStrategy => ({
  source: 'library',
  words: library.words,
  compute: (text) => {
    const tokens = tokensOrThrow(text);
    return library.formula({
      word: tokens.words.length,
      sentence: tokens.sentences.length,
      difficultWord: countDifficultWords(tokens.words, library.words),
    });
  },
});

export const loadDaleChallLibrary = async (): Promise<DaleChallLibrary> => {
  const [{ daleChall }, { daleChallFormula }] = await Promise.all([import('dale-chall'), import('dale-chall-formula')]);
  return {
    words: new Set(daleChall.map((word) => word.toLowerCase())),
    formula: daleChallFormula,
  };
};

/**
 * Prefers the library implementation when its packages load; otherwise the
 * internal formula over the bundled list.
 */
export const selectDaleChallStrategy = async (
  logger?: Logger,
  loadLibrary: () => Promise<DaleChallLibrary> = loadDaleChallLibrary,
): Promise<DaleChallStrategy> => {
  try {
    const library = await loadLibrary();
    logger?.debug('Using library Dale–Chall implementation', { words: library.words.size });
    return createLibraryDaleChall(library);
  } catch (error) {
    logger?.info('Dale–Chall library unavailable; using internal formula', {
      error: error instanceof Error ? error.message : String(error),
    });
    return createInternalDaleChall();
  }
};
