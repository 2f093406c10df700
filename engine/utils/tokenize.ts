/**
 * Sentence and word tokenization shared by extraction (counts) and the
 * readability formulas.
 */

const TITLE_ABBREVIATIONS = new Set([
  'mr',
  'mrs',
  'ms',
  'mx',
  'dr',
  'prof',
  'st',
  'jr',
  'sr',
  'rev',
  'fr',
  'gen',
  'col',
  'capt',
  'lt',
  'sgt',
  'gov',
  'sen',
  'rep',
  'hon',
  'mt',
  'vs',
  'etc',
  'e.g',
  'i.e',
]);

// Terminal punctuation run, optional closing quotes/brackets, then whitespace or end.
const TERMINATOR_RE = /[.!?]+["'”’)\]]*(?=\s|$)/g;
const EDGE_PUNCTUATION_RE = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const HAS_WORD_CHAR_RE = /[\p{L}\p{N}]/u;
// Em and en dashes join clauses, not words.
const WORD_SEPARATOR_RE = /[\s—–]+/;

export interface Sentence {
  text: string;
  words: string[];
}

export interface Tokens {
  sentences: Sentence[];
  words: string[];
}

export const splitWords = (text: string): string[] =>
  text
    .split(WORD_SEPARATOR_RE)
    .map((token) => token.replace(EDGE_PUNCTUATION_RE, ''))
    .filter((token) => HAS_WORD_CHAR_RE.test(token));

const lastToken = (segment: string): string => {
  const parts = segment.trimEnd().split(/\s+/);
  return (parts[parts.length - 1] ?? '').replace(/^[^\p{L}\p{N}]+/u, '');
};

const isAbbreviation = (token: string): boolean => {
  if (!token) return false;
  if (TITLE_ABBREVIATIONS.has(token.toLowerCase())) return true;
  // Single capital initials ("J. K.") but not the pronoun.
  return /^\p{Lu}$/u.test(token) && token !== 'I';
};

export const splitSentences = (text: string): string[] => {
  const sentences: string[] = [];
  let start = 0;
  for (const match of text.matchAll(TERMINATOR_RE)) {
    const index = match.index ?? 0;
    const punctuation = match[0];
    const bare = punctuation.replace(/["'”’)\]]+$/, '');
    if (bare === '.' && isAbbreviation(lastToken(text.slice(start, index)))) {
      continue;
    }
    const end = index + punctuation.length;
    const sentence = text.slice(start, end).trim();
    if (sentence) sentences.push(sentence);
    start = end;
  }
  const tail = text.slice(start).trim();
  if (tail) sentences.push(tail);
  return sentences;
};

/** Sentences that contain at least one word, each with its words. */
export const tokenize = (text: string): Tokens => {
  const sentences: Sentence[] = [];
  const words: string[] = [];
  for (const sentenceText of splitSentences(text)) {
    const sentenceWords = splitWords(sentenceText);
    if (!sentenceWords.length) continue;
    sentences.push({ text: sentenceText, words: sentenceWords });
    words.push(...sentenceWords);
  }
  return { sentences, words };
};
