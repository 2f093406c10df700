import { dateFromParts, toCalendarDate } from '../utils/dates';
import { decodeEntities } from '../utils/text';
import { toAbsoluteUrl } from './urls';

export interface IssueLink {
  issueDate: string;
  url: string;
}

export interface SitemapUrl {
  url: string;
  lastmod: string | null;
}

const ISSUE_PATH_RE = /^\/magazine\/(\d{4})\/(\d{2})\/(\d{2})\/?$/;
const MAGAZINE_ARTICLE_PATH_RE = /^\/magazine\/(\d{4})\/(\d{2})\/(\d{2})\/[\w-]+\/?$/;

const collectSameHostLinks = (html: string, baseUrl: string): URL[] => {
  const baseHost = new URL(baseUrl).hostname.toLowerCase();
  const links: URL[] = [];
  for (const match of html.matchAll(/<a\b[^>]*\bhref=["']([^"']+)["']/gi)) {
    const absolute = toAbsoluteUrl(decodeEntities(match[1].trim()), baseUrl);
    if (!absolute) continue;
    const url = new URL(absolute);
    if (url.hostname.toLowerCase() !== baseHost) continue;
    url.hash = '';
    url.search = '';
    links.push(url);
  }
  return links;
};

/** Issue pages linked from a yearly archive page, oldest first. */
export const parseIssueLinks = (html: string, baseUrl: string, year?: number): IssueLink[] => {
  const byDate = new Map<string, IssueLink>();
  for (const url of collectSameHostLinks(html, baseUrl)) {
    const match = url.pathname.match(ISSUE_PATH_RE);
    if (!match) continue;
    const issueDate = dateFromParts(Number(match[1]), Number(match[2]), Number(match[3]));
    if (!issueDate) continue;
    if (year !== undefined && Number(match[1]) !== year) continue;
    if (!byDate.has(issueDate)) {
      byDate.set(issueDate, { issueDate, url: url.toString() });
    }
  }
  return Array.from(byDate.values()).sort((a, b) => a.issueDate.localeCompare(b.issueDate));
};

/**
 * Article pages linked from an issue page, sorted and de-duplicated. With
 * `issueDate`, links into other issues are left out.
 */
export const parseIssueArticleLinks = (html: string, baseUrl: string, issueDate?: string): string[] => {
  const urls = new Set<string>();
  for (const url of collectSameHostLinks(html, baseUrl)) {
    const match = url.pathname.match(MAGAZINE_ARTICLE_PATH_RE);
    if (!match) continue;
    if (issueDate !== undefined && `${match[1]}-${match[2]}-${match[3]}` !== issueDate) continue;
    urls.add(url.toString());
  }
  return Array.from(urls).sort();
};

const extractTag = (xml: string, tag: string): string | null => {
  const cdata = new RegExp(`<${tag}[^>]*>\\s*<!\\[CDATA\\[([\\s\\S]*?)\\]\\]>\\s*</${tag}>`, 'i');
  const m1 = xml.match(cdata);
  if (m1?.[1]) return m1[1].trim();
  const plain = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`, 'i');
  const m2 = xml.match(plain);
  if (m2?.[1]) return decodeEntities(m2[1].trim());
  return null;
};

export const parseSitemapIndex = (xml: string): string[] => {
  const locations: string[] = [];
  for (const match of xml.matchAll(/<sitemap\b[^>]*>([\s\S]*?)<\/sitemap>/gi)) {
    const loc = extractTag(match[1], 'loc');
    if (loc) locations.push(loc);
  }
  return locations;
};

export const parseSitemapUrls = (xml: string): SitemapUrl[] => {
  const urls: SitemapUrl[] = [];
  for (const match of xml.matchAll(/<url\b[^>]*>([\s\S]*?)<\/url>/gi)) {
    const loc = extractTag(match[1], 'loc');
    if (!loc) continue;
    urls.push({ url: loc, lastmod: toCalendarDate(extractTag(match[1], 'lastmod')) });
  }
  return urls;
};
