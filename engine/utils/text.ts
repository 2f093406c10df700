const NAMED_ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&lt;': '<',
  '&gt;': '>',
  '&rsquo;': '’',
  '&lsquo;': '‘',
  '&rdquo;': '”',
  '&ldquo;': '“',
  '&mdash;': '—',
  '&ndash;': '–',
  '&hellip;': '…',
};

const MAX_CODE_POINT = 0x10ffff;

// Out-of-range references become U+FFFD, as in HTML parsing.
const fromCodePoint = (code: number): string =>
  Number.isInteger(code) && code > 0 && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : '\uFFFD';

export const decodeEntities = (text: string): string => {
  let out = text.replace(/&#(\d+);/g, (_match, num: string) => fromCodePoint(Number(num)));
  out = out.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) => fromCodePoint(Number.parseInt(hex, 16)));
  for (const [key, value] of Object.entries(NAMED_ENTITIES)) {
    out = out.replaceAll(key, value);
  }
  return out;
};

export const stripTags = (html: string): string =>
  html
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]+>/g, ' ');

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** Visible text of an HTML document, whitespace collapsed. */
export const visibleText = (html: string): string => normalizeWhitespace(decodeEntities(stripTags(html)));
