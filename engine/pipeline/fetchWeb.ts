import type { RunSummary } from '../../shared/types';
import { extractArticle } from '../retrieval/extraction';
import { parseSitemapIndex, parseSitemapUrls, type SitemapUrl } from '../retrieval/links';
import { normalizeResourceId } from '../retrieval/urls';
import { mapWithConcurrency } from '../utils/concurrency';
import { addDays } from '../utils/dates';
import type { FetchCommandDeps, YearRange } from './context';
import { createRunRecorder } from './runSummary';

export interface FetchWebOptions extends YearRange {
  refreshIndex?: boolean;
}

export interface DateRange {
  from: string;
  to: string;
}

/** Publication window widened by the alignment window on both ends. */
export const webDateRange = ({ yearStart, yearEnd }: YearRange, windowDays: number): DateRange => ({
  from: addDays(`${yearStart}-01-01`, -windowDays),
  to: addDays(`${yearEnd}-12-31`, windowDays),
});

/** On-site, non-magazine URLs whose lastmod falls in `range`, de-duplicated. */
export const selectWebCandidates = (entries: readonly SitemapUrl[], baseUrl: string, range: DateRange): SitemapUrl[] => {
  const host = new URL(baseUrl).hostname.toLowerCase();
  const seen = new Set<string>();
  const selected: SitemapUrl[] = [];
  for (const entry of entries) {
    if (!entry.lastmod || entry.lastmod < range.from || entry.lastmod > range.to) continue;
    let normalized: string;
    try {
      normalized = normalizeResourceId(entry.url);
    } catch {
      continue;
    }
    const url = new URL(normalized);
    if (url.hostname !== host || url.pathname.startsWith('/magazine/')) continue;
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    selected.push({ url: normalized, lastmod: entry.lastmod });
  }
  return selected;
};

export const fetchWeb = async (deps: FetchCommandDeps, options: FetchWebOptions): Promise<RunSummary> => {
  const { config, fetcher, store, signal } = deps;
  const run = createRunRecorder('fetch-web', deps.logger, deps.clock);
  const refreshIndex = options.refreshIndex ?? false;
  const range = webDateRange(options, config.alignment.windowDays);
  await store.ensureLayout();

  const indexUrl = `${config.periodical.baseUrl}${config.periodical.sitemapIndexPath}`;
  let sitemaps: string[] = [];
  try {
    const { body } = await fetcher.fetch(indexUrl, 'static', { resourceType: 'sitemap', bust: refreshIndex, signal });
    sitemaps = parseSitemapIndex(body);
  } catch (error) {
    if (signal?.aborted) throw error;
    run.fail(error, { url: indexUrl });
  }
  run.count('sitemaps', sitemaps.length);

  const entries: SitemapUrl[] = [];
  for (const sitemapUrl of sitemaps) {
    try {
      const { body } = await fetcher.fetch(sitemapUrl, 'static', { resourceType: 'sitemap', bust: refreshIndex, signal });
      entries.push(...parseSitemapUrls(body));
    } catch (error) {
      if (signal?.aborted) throw error;
      run.fail(error, { url: sitemapUrl });
    }
  }

  const candidates = selectWebCandidates(entries, config.periodical.baseUrl, range);
  run.count('candidates', candidates.length);
  run.logger.info('Sitemaps read', { entries: entries.length, candidates: candidates.length, ...range });

  await mapWithConcurrency(
    candidates,
    config.http.concurrency,
    async ({ url, lastmod }) => {
      try {
        const { body, fromCache } = await fetcher.fetch(url, 'static', { resourceType: 'article', signal });
        run.count(fromCache ? 'cacheHits' : 'downloaded');
        const article = extractArticle(body, { url, source: 'web', fallbackDate: lastmod });
        const saved = await store.saveArticle(article);
        run.count(saved.changed ? 'articlesWritten' : 'articlesUnchanged');
      } catch (error) {
        if (signal?.aborted) throw error;
        run.fail(error, { url });
      }
    },
    signal,
  );

  run.count('networkRequests', fetcher.stats.networkRequests);
  return run.finish(store);
};
