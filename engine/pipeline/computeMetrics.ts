import type { ArticleMetricsRow, ArticleSource, RunSummary } from '../../shared/types';
import { align } from '../alignment/align';
import { createMetricsEngine, type MetricsEngine } from '../metrics/readability';
import { perArticleCsv } from '../output/tables';
import type { CommandDeps } from './context';
import { createRunRecorder } from './runSummary';

export const PER_ARTICLE_CSV = 'per_article.csv';
export const PER_ARTICLE_JSON = 'per_article.json';
export const ALIGNMENT_JSON = 'alignment.json';

export interface ComputeMetricsOptions {
  source?: ArticleSource | 'all';
}

export interface MetricsCommandDeps extends CommandDeps {
  engine?: MetricsEngine;
}

const compareRows = (a: ArticleMetricsRow, b: ArticleMetricsRow): number =>
  a.source.localeCompare(b.source) ||
  (a.issueDate ?? a.publishedDate).localeCompare(b.issueDate ?? b.publishedDate) ||
  a.id.localeCompare(b.id);

/**
 * Aligns the stored corpus, scores every retained article and writes the
 * per-article tables plus an alignment report.
 */
export const computeMetrics = async (
  deps: MetricsCommandDeps,
  options: ComputeMetricsOptions = {},
): Promise<RunSummary> => {
  const { config, store } = deps;
  const run = createRunRecorder('compute-metrics', deps.logger, deps.clock);
  const engine = deps.engine ?? createMetricsEngine();
  const source = options.source ?? 'all';
  await store.ensureLayout();

  const { articles, rejected } = await store.loadArticles();
  for (const entry of rejected) {
    run.fail(new Error(entry.message), { stage: 'load', url: entry.location });
  }
  run.count('articles', articles.length);

  const magazine = articles.filter((article) => article.source === 'magazine');
  const web = articles.filter((article) => article.source === 'web');
  const alignment = align(magazine, web, config.alignment.windowDays);
  for (const { article, error } of alignment.rejected) {
    run.fail(error, { url: article.url, articleId: article.id });
  }
  run.count('issues', alignment.issues.length);
  run.count('duplicatesExcluded', alignment.excluded.length);

  const rows: ArticleMetricsRow[] = [];
  for (const article of alignment.aligned) {
    if (source !== 'all' && article.source !== source) continue;
    if (article.source === 'web') {
      run.count(article.issueDate ? 'webAligned' : 'webUnaligned');
    }
    try {
      const metrics = engine.compute(article.text, article.id);
      rows.push({
        id: article.id,
        url: article.url,
        source: article.source,
        title: article.title,
        issueDate: article.issueDate,
        issueYear: article.issueYear,
        publishedDate: article.publishedDate,
        wordCount: metrics.wordCount,
        sentenceCount: metrics.sentenceCount,
        gunningFog: metrics.gunningFog,
        daleChall: metrics.daleChall,
        flesch: metrics.flesch,
        syllableCount: metrics.syllableCount,
        daleChallSource: metrics.daleChallSource,
      });
    } catch (error) {
      run.fail(error, { stage: 'metrics', url: article.url, articleId: article.id });
    }
  }
  rows.sort(compareRows);
  run.count('scored', rows.length);

  await store.writeOutput(PER_ARTICLE_CSV, perArticleCsv(rows));
  await store.writeOutput(PER_ARTICLE_JSON, `${JSON.stringify(rows, null, 2)}\n`);
  await store.writeOutput(
    ALIGNMENT_JSON,
    `${JSON.stringify(
      {
        windowDays: config.alignment.windowDays,
        issues: alignment.issues,
        excluded: alignment.excluded.map(({ article, duplicateOf, reason }) => ({
          articleId: article.id,
          url: article.url,
          title: article.title,
          duplicateOf,
          reason,
        })),
        rejected: alignment.rejected.map(({ article, error }) => ({
          articleId: article.id,
          url: article.url,
          reason: error.reason,
          message: error.message,
        })),
      },
      null,
      2,
    )}\n`,
  );
  run.logger.info('Metrics written', { rows: rows.length, daleChall: engine.daleChallSource });
  return run.finish(store);
};
