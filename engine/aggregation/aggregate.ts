import type { AggregateRecord, AggregateScope, ArticleMetricsRow, ArticleSource } from '../../shared/types';
import { ARTICLE_SOURCES, METRIC_NAMES } from '../../shared/types';
import { yearOf } from '../utils/dates';
import { clipToPercentiles, summarize } from './stats';

export interface AggregateOptions {
  clip?: boolean;
  lowerPercentile?: number;
  upperPercentile?: number;
}

/** Group key for a row, or null when the row does not belong to any group of that scope. */
export const scopeKeyFor = (row: ArticleMetricsRow, scope: AggregateScope): string | null => {
  if (scope === 'issue') return row.issueDate;
  return String(row.issueYear ?? yearOf(row.publishedDate));
};

const groupRows = (rows: readonly ArticleMetricsRow[], scope: AggregateScope) => {
  const groups = new Map<string, { key: string; source: ArticleSource; rows: ArticleMetricsRow[] }>();
  for (const row of rows) {
    const key = scopeKeyFor(row, scope);
    if (key === null) continue;
    const id = `${key}\u0000${row.source}`;
    const group = groups.get(id) ?? { key, source: row.source, rows: [] };
    group.rows.push(row);
    groups.set(id, group);
  }
  return Array.from(groups.values()).sort(
    (a, b) =>
      a.key.localeCompare(b.key) || ARTICLE_SOURCES.indexOf(a.source) - ARTICLE_SOURCES.indexOf(b.source),
  );
};

/**
 * Median and quartiles per (scope key, source, metric). With `clip`, values
 * outside the configured percentile band are dropped first; the input rows are
 * left untouched.
 */
export const aggregate = (
  rows: readonly ArticleMetricsRow[],
  scope: AggregateScope,
  options: AggregateOptions = {},
): AggregateRecord[] => {
  const clip = options.clip ?? false;
  const lower = options.lowerPercentile ?? 1;
  const upper = options.upperPercentile ?? 99;

  const records: AggregateRecord[] = [];
  for (const group of groupRows(rows, scope)) {
    for (const metric of METRIC_NAMES) {
      const values = group.rows.map((row) => row[metric]);
      const summary = summarize(clip ? clipToPercentiles(values, lower, upper) : values);
      records.push({
        scope,
        key: group.key,
        source: group.source,
        metric,
        total: group.rows.length,
        ...summary,
        clipped: clip,
      });
    }
  }
  return records;
};
