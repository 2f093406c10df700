const VOWEL_GROUP_RE = /[aeiouy]+/g;

/**
 * Vowel-group syllable estimate: letters only, a trailing silent "e" dropped
 * (except "-le"), at least one syllable per word.
 */
export const countSyllables = (word: string): number => {
  let letters = word.toLowerCase().replace(/[^a-z]/g, '');
  if (!letters) return 1;
  if (letters.length > 2 && letters.endsWith('e') && !letters.endsWith('le')) {
    letters = letters.slice(0, -1);
  }
  const groups = letters.match(VOWEL_GROUP_RE);
  return Math.max(1, groups?.length ?? 0);
};

export const countSyllablesIn = (words: readonly string[]): number =>
  words.reduce((total, word) => total + countSyllables(word), 0);
