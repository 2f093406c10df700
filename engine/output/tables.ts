import type { AggregateRecord, ArticleMetricsRow, MetricName } from '../../shared/types';
import { METRIC_NAMES } from '../../shared/types';
import { toCsv, type CsvValue } from './csv';

export const METRIC_COLUMN: Record<MetricName, string> = {
  gunningFog: 'gunning_fog',
  daleChall: 'dale_chall',
  flesch: 'flesch',
};

const round = (value: number, digits = 4): number | null =>
  Number.isFinite(value) ? Number(value.toFixed(digits)) : null;

export const PER_ARTICLE_COLUMNS = [
  'id',
  'url',
  'source',
  'issue_year',
  'gunning_fog',
  'dale_chall',
  'flesch',
  'word_count',
  'issue_date',
  'published_date',
  'title',
] as const;

export const perArticleCsv = (rows: readonly ArticleMetricsRow[]): string =>
  toCsv(
    PER_ARTICLE_COLUMNS,
    rows.map((row) => ({
      id: row.id,
      url: row.url,
      source: row.source,
      issue_year: row.issueYear,
      gunning_fog: round(row.gunningFog),
      dale_chall: round(row.daleChall),
      flesch: round(row.flesch),
      word_count: row.wordCount,
      issue_date: row.issueDate,
      published_date: row.publishedDate,
      title: row.title,
    })),
  );

export const aggregateColumns = (): string[] => [
  'scope_key',
  'source',
  'n',
  ...METRIC_NAMES.flatMap((metric) => {
    const name = METRIC_COLUMN[metric];
    return [`${name}_n`, `${name}_median`, `${name}_p25`, `${name}_p75`];
  }),
  'clipped',
];

/** One row per (scope key, source) with every metric's statistics side by side. */
export const pivotAggregates = (records: readonly AggregateRecord[]): Record<string, CsvValue>[] => {
  const rows = new Map<string, Record<string, CsvValue>>();
  for (const record of records) {
    const id = `${record.key}\u0000${record.source}`;
    const row = rows.get(id) ?? {
      scope_key: record.key,
      source: record.source,
      n: record.total,
      clipped: record.clipped,
    };
    const name = METRIC_COLUMN[record.metric];
    row[`${name}_n`] = record.n;
    row[`${name}_median`] = round(record.median);
    row[`${name}_p25`] = round(record.p25);
    row[`${name}_p75`] = round(record.p75);
    rows.set(id, row);
  }
  return Array.from(rows.values());
};

export const aggregateCsv = (records: readonly AggregateRecord[]): string =>
  toCsv(aggregateColumns(), pivotAggregates(records));
