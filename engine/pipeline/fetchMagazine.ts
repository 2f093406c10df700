import type { RunSummary } from '../../shared/types';
import { extractArticle } from '../retrieval/extraction';
import { parseIssueArticleLinks, parseIssueLinks, type IssueLink } from '../retrieval/links';
import { mapWithConcurrency } from '../utils/concurrency';
import { yearsIn, type FetchCommandDeps, type YearRange } from './context';
import { createRunRecorder, type RunRecorder } from './runSummary';

export interface FetchMagazineOptions extends YearRange {
  /** Re-read archive and issue pages instead of using cached copies. */
  refreshIndex?: boolean;
}

export const archiveUrlFor = (baseUrl: string, year: number): string => `${baseUrl}/magazine/${year}`;

const fetchIssueArticles = async (
  deps: FetchCommandDeps,
  run: RunRecorder,
  issue: IssueLink,
  refreshIndex: boolean,
): Promise<void> => {
  const { config, fetcher, store, signal } = deps;
  let links: string[];
  try {
    const { body } = await fetcher.fetch(issue.url, 'static', { resourceType: 'issue', bust: refreshIndex, signal });
    links = parseIssueArticleLinks(body, config.periodical.baseUrl, issue.issueDate);
  } catch (error) {
    if (signal?.aborted) throw error;
    run.fail(error, { url: issue.url });
    return;
  }

  run.count('articleLinks', links.length);
  run.logger.debug('Issue parsed', { issueDate: issue.issueDate, articles: links.length });

  await mapWithConcurrency(
    links,
    config.http.concurrency,
    async (url) => {
      try {
        const { body, fromCache } = await fetcher.fetch(url, 'static', { resourceType: 'article', signal });
        run.count(fromCache ? 'cacheHits' : 'downloaded');
        const article = extractArticle(body, { url, source: 'magazine', issueDate: issue.issueDate });
        const saved = await store.saveArticle(article);
        run.count(saved.changed ? 'articlesWritten' : 'articlesUnchanged');
      } catch (error) {
        if (signal?.aborted) throw error;
        run.fail(error, { url });
      }
    },
    signal,
  );
};

/** Archive page per year → issue pages → article pages → corpus records. */
export const fetchMagazine = async (deps: FetchCommandDeps, options: FetchMagazineOptions): Promise<RunSummary> => {
  const { config, fetcher, store, signal } = deps;
  const run = createRunRecorder('fetch-magazine', deps.logger, deps.clock);
  const refreshIndex = options.refreshIndex ?? false;
  await store.ensureLayout();

  for (const year of yearsIn(options)) {
    const archiveUrl = archiveUrlFor(config.periodical.baseUrl, year);
    let issues: IssueLink[];
    try {
      const { body } = await fetcher.fetch(archiveUrl, 'static', {
        resourceType: 'archive',
        bust: refreshIndex,
        signal,
      });
      issues = parseIssueLinks(body, config.periodical.baseUrl, year);
    } catch (error) {
      if (signal?.aborted) throw error;
      run.fail(error, { url: archiveUrl });
      continue;
    }

    run.count('issues', issues.length);
    run.logger.info('Archive parsed', { year, issues: issues.length });
    for (const issue of issues) {
      await fetchIssueArticles(deps, run, issue, refreshIndex);
    }
  }

  run.count('networkRequests', fetcher.stats.networkRequests);
  return run.finish(store);
};
