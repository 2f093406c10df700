import { MetricsError } from '../../shared/errors';
import type { DaleChallSource, MetricsRecord } from '../../shared/types';
import { tokenize, type Tokens } from '../utils/tokenize';
import { countDifficultWords, createInternalDaleChall, type DaleChallStrategy } from './daleChall';
import { countSyllables, countSyllablesIn } from './syllables';
import { isKnownWord, loadEasyWords, type WordList } from './wordList';

const COMPLEX_SYLLABLES = 3;
const INFLECTION_SUFFIXES = ['ing', 'ed', 'es'];

export const fleschReadingEase = (words: number, sentences: number, syllables: number): number =>
  206.835 - 1.015 * (words / sentences) - 84.6 * (syllables / words);

export const gunningFog = (words: number, sentences: number, complexWords: number): number =>
  0.4 * (words / sentences + (100 * complexWords) / words);

const isProperNoun = (word: string, sentenceInitial: boolean): boolean => !sentenceInitial && /^\p{Lu}/u.test(word);

const isInflectedForm = (lower: string): boolean =>
  INFLECTION_SUFFIXES.some((suffix) => {
    if (!lower.endsWith(suffix)) return false;
    const stem = lower.slice(0, -suffix.length);
    return stem.length >= 2 && countSyllables(stem) < COMPLEX_SYLLABLES;
  });

const isCompound = (lower: string, list: WordList): boolean => {
  if (lower.includes('-')) {
    const parts = lower.split('-').filter(Boolean);
    return parts.length > 1 && parts.every((part) => countSyllables(part) < COMPLEX_SYLLABLES);
  }
  for (let i = 2; i <= lower.length - 2; i += 1) {
    if (isKnownWord(lower.slice(0, i), list) && list.has(lower.slice(i))) {
      return true;
    }
  }
  return false;
};

/**
 * Gunning Fog "complex" word: three or more syllables, not a proper noun, not
 * a suffix-inflected form of a shorter word, not a compound of shorter words.
 */
export const isComplexWord = (word: string, sentenceInitial: boolean, list: WordList): boolean => {
  if (countSyllables(word) < COMPLEX_SYLLABLES) return false;
  if (isProperNoun(word, sentenceInitial)) return false;
  const lower = word.toLowerCase();
  if (isInflectedForm(lower)) return false;
  return !isCompound(lower, list);
};

export const countComplexWords = (tokens: Tokens, list: WordList): number => {
  let count = 0;
  for (const sentence of tokens.sentences) {
    sentence.words.forEach((word, index) => {
      if (isComplexWord(word, index === 0, list)) count += 1;
    });
  }
  return count;
};

export interface MetricsEngine {
  readonly daleChallSource: DaleChallSource;
  compute: (text: string, articleId?: string) => MetricsRecord;
}

export interface MetricsEngineOptions {
  daleChall?: DaleChallStrategy;
  easyWords?: WordList;
}

export const createMetricsEngine = (options: MetricsEngineOptions = {}): MetricsEngine => {
  const easyWords = options.easyWords ?? loadEasyWords();
  const daleChall = options.daleChall ?? createInternalDaleChall(easyWords);

  const compute = (text: string, articleId = ''): MetricsRecord => {
    const tokens = tokenize(text);
    const sentences = tokens.sentences.length;
    const words = tokens.words.length;
    if (!sentences || !words) {
      throw new MetricsError();
    }

    const syllables = countSyllablesIn(tokens.words);
    const complexWords = countComplexWords(tokens, easyWords);
    const difficultWords = countDifficultWords(tokens.words, daleChall.words);

    return {
      articleId,
      gunningFog: gunningFog(words, sentences, complexWords),
      daleChall: daleChall.compute(text),
      flesch: fleschReadingEase(words, sentences, syllables),
      syllableCount: syllables,
      wordCount: words,
      sentenceCount: sentences,
      complexWordCount: complexWords,
      difficultWordCount: difficultWords,
      daleChallSource: daleChall.source,
    };
  };

  return { daleChallSource: daleChall.source, compute };
};
