/**
 * Case, whitespace and punctuation insensitive title key: NFKD, combining
 * marks removed, lowercased, everything outside `[a-z0-9]` dropped.
 */
export const canonicalTitle = (title: string | null | undefined): string =>
  (title ?? '')
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
