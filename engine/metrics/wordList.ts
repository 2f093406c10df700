import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

export type WordList = ReadonlySet<string>;

const EASY_WORDS_FILE = fileURLToPath(new URL('./data/dale-chall-easy-words.txt', import.meta.url));

export const parseWordList = (contents: string): WordList =>
  new Set(
    contents
      .split(/\r?\n/)
      .map((line) => line.replace(/#.*$/, '').trim().toLowerCase())
      .filter(Boolean),
  );

let easyWords: WordList | null = null;

/** Bundled easy-word list for the internal Dale–Chall computation. */
export const loadEasyWords = (): WordList => {
  if (!easyWords) {
    easyWords = parseWordList(fs.readFileSync(EASY_WORDS_FILE, 'utf-8'));
  }
  return easyWords;
};

const stripPossessive = (word: string): string => word.replace(/[’']s$/, '').replace(/[’']$/, '');

/**
 * Base forms tried against a word list: the word itself, then simple plural
 * stems ("-ies" → "-y", "-es", "-s").
 */
export const baseForms = (word: string): string[] => {
  const lower = stripPossessive(word.toLowerCase().replace(/’/g, "'"));
  const forms = [lower];
  if (lower.endsWith('ies') && lower.length > 4) forms.push(`${lower.slice(0, -3)}y`);
  if (lower.endsWith('es') && lower.length > 3) forms.push(lower.slice(0, -2));
  if (lower.endsWith('s') && lower.length > 2) forms.push(lower.slice(0, -1));
  return forms;
};

export const isKnownWord = (word: string, list: WordList): boolean => baseForms(word).some((form) => list.has(form));

/** Words with no letters (numbers) are never difficult. */
export const isDifficultWord = (word: string, list: WordList): boolean =>
  /\p{L}/u.test(word) && !isKnownWord(word, list);
