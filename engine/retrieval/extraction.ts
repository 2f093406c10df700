import { articleIdFor } from '../../shared/crypto';
import { ExtractionError } from '../../shared/errors';
import type { Article, ArticleSource } from '../../shared/types';
import { toCalendarDate, yearOf } from '../utils/dates';
import { decodeEntities, normalizeWhitespace, visibleText } from '../utils/text';
import { tokenize } from '../utils/tokenize';
import { normalizeResourceId } from './urls';

export interface ExtractionInput {
  url: string;
  source: ArticleSource;
  /** Issue date for magazine pages; the article is dated by its issue. */
  issueDate?: string | null;
  /** Used when the page carries no publication date (e.g. sitemap lastmod). */
  fallbackDate?: string | null;
}

export interface PageMeta {
  title: string | null;
  author: string | null;
  section: string | null;
  published: string | null;
}

const CONTAINER_TAGS = ['article', 'main', 'body'];
const MIN_CONTAINER_PARAGRAPHS = 2;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const findMetaContent = (html: string, key: string): string | null => {
  const needle = escapeRegExp(key);
  const metaRe = new RegExp(`<meta[^>]+(?:property|name|itemprop)=["']${needle}["'][^>]*>`, 'i');
  const match = html.match(metaRe);
  if (!match) return null;
  const contentMatch = match[0].match(/content=["']([^"']*)["']/i);
  const content = contentMatch?.[1] ? normalizeWhitespace(decodeEntities(contentMatch[1])) : '';
  return content || null;
};

const findJsonLdField = (html: string, field: string): string | null => {
  const scripts = html.match(/<script[^>]+type=["']application\/ld\+json["'][^>]*>[\s\S]*?<\/script>/gi) || [];
  const re = new RegExp(`"${field}"\\s*:\\s*"([^"]+)"`, 'i');
  for (const script of scripts) {
    const match = script.match(re);
    if (match?.[1]) return match[1];
  }
  return null;
};

const findJsonLdAuthor = (html: string): string | null => {
  const scripts = html.match(/<script[^>]+type=["']application\/ld\+json["'][^>]*>[\s\S]*?<\/script>/gi) || [];
  for (const script of scripts) {
    const match = script.match(/"author"\s*:\s*(?:\[\s*)?\{[^}]*"name"\s*:\s*"([^"]+)"/i);
    if (match?.[1]) return match[1];
  }
  return null;
};

const extractTitle = (html: string): string | null => {
  const ogTitle = findMetaContent(html, 'og:title');
  if (ogTitle) return ogTitle;
  const titleMatch = html.match(/<title[^>]*>([^<]+)<\/title>/i);
  const title = titleMatch ? normalizeWhitespace(decodeEntities(titleMatch[1])) : '';
  return title || null;
};

const extractTagBlock = (html: string, tag: string): string | null => {
  const re = new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)<\\/${tag}>`, 'i');
  const match = html.match(re);
  return match ? match[1] : null;
};

const collectParagraphs = (block: string): string[] => {
  const paragraphs: string[] = [];
  for (const match of block.matchAll(/<p\b[^>]*>([\s\S]*?)<\/p>/gi)) {
    const text = visibleText(match[1]);
    if (text.length > 1) paragraphs.push(text);
  }
  return paragraphs;
};

export const extractMeta = (html: string): PageMeta => ({
  title: extractTitle(html),
  author: findMetaContent(html, 'author') ?? findJsonLdAuthor(html),
  section: findMetaContent(html, 'article:section'),
  published:
    findMetaContent(html, 'article:published_time') ??
    findMetaContent(html, 'og:published_time') ??
    findJsonLdField(html, 'datePublished') ??
    html.match(/<time[^>]+datetime=["']([^"']+)["']/i)?.[1] ??
    null,
});

/**
 * Paragraph text of the first container (article, main, body) holding at
 * least two paragraphs; falls back to every paragraph, then to visible text.
 */
export const extractBodyText = (html: string): string => {
  for (const tag of CONTAINER_TAGS) {
    const block = extractTagBlock(html, tag);
    if (!block) continue;
    const paragraphs = collectParagraphs(block);
    if (paragraphs.length >= MIN_CONTAINER_PARAGRAPHS) {
      return paragraphs.join('\n\n');
    }
  }
  const paragraphs = collectParagraphs(html);
  if (paragraphs.length) return paragraphs.join('\n\n');
  const body = extractTagBlock(html, 'body');
  return body ? visibleText(body) : '';
};

export const extractArticle = (html: string, input: ExtractionInput): Article => {
  let normalizedUrl: string;
  try {
    normalizedUrl = normalizeResourceId(input.url);
  } catch {
    throw new ExtractionError(input.url, 'Invalid article URL');
  }

  const meta = extractMeta(html);
  const text = extractBodyText(html);
  if (!text) {
    throw new ExtractionError(input.url, 'No article text found');
  }

  const issueDate = toCalendarDate(input.issueDate);
  const publishedDate =
    input.source === 'magazine' ? issueDate : toCalendarDate(meta.published) ?? toCalendarDate(input.fallbackDate);
  if (!publishedDate) {
    throw new ExtractionError(
      input.url,
      input.source === 'magazine' ? 'Magazine article without an issue date' : 'No publication date found',
    );
  }

  const tokens = tokenize(text);
  return {
    id: articleIdFor(normalizedUrl),
    url: normalizedUrl,
    source: input.source,
    title: meta.title ?? '',
    author: meta.author,
    section: meta.section,
    issueDate: input.source === 'magazine' ? issueDate : null,
    issueYear: input.source === 'magazine' && issueDate ? yearOf(issueDate) : null,
    publishedDate,
    text,
    wordCount: tokens.words.length,
    sentenceCount: tokens.sentences.length,
  };
};
