export type ArticleSource = 'magazine' | 'web';

export const ARTICLE_SOURCES: readonly ArticleSource[] = ['magazine', 'web'];

export type RenderMode = 'static' | 'rendered';

export type ResourceType = 'archive' | 'issue' | 'sitemap' | 'article';

export type CacheStatus = 'hit' | 'miss' | 'stale';

export interface CookieRecord {
  name: string;
  value: string;
  domain: string;
  path?: string;
}

export interface CacheEntry {
  key: string;
  url: string;
  mode: RenderMode;
  resourceType: ResourceType;
  fetchedAt: string;
  status: CacheStatus;
  payload: Buffer;
  contentHash: string;
  renderedBy: RenderMode;
}

export interface Article {
  id: string;
  url: string;
  source: ArticleSource;
  title: string;
  author?: string | null;
  section?: string | null;
  /** Issue the article was printed in (magazine) or aligned to (web). */
  issueDate: string | null;
  issueYear: number | null;
  publishedDate: string;
  text: string;
  wordCount: number;
  sentenceCount: number;
}

export interface Issue {
  year: number;
  issueDate: string;
  memberArticleIds: string[];
}

export type DaleChallSource = 'internal' | 'library';

export interface MetricsRecord {
  articleId: string;
  gunningFog: number;
  daleChall: number;
  flesch: number;
  syllableCount: number;
  wordCount: number;
  sentenceCount: number;
  complexWordCount: number;
  difficultWordCount: number;
  daleChallSource: DaleChallSource;
}

export type MetricName = 'gunningFog' | 'daleChall' | 'flesch';

export const METRIC_NAMES: readonly MetricName[] = ['gunningFog', 'daleChall', 'flesch'];

export type AggregateScope = 'issue' | 'year';

export interface AggregateRecord {
  scope: AggregateScope;
  key: string;
  source: ArticleSource;
  metric: MetricName;
  /** Articles in the group before clipping. */
  total: number;
  /** Values the statistics were computed over. */
  n: number;
  median: number;
  p25: number;
  p75: number;
  clipped: boolean;
}

/** One per-article row: the article's identity joined with its metrics. */
export interface ArticleMetricsRow {
  id: string;
  url: string;
  source: ArticleSource;
  title: string;
  issueDate: string | null;
  issueYear: number | null;
  publishedDate: string;
  wordCount: number;
  sentenceCount: number;
  gunningFog: number;
  daleChall: number;
  flesch: number;
  syllableCount: number;
  daleChallSource: DaleChallSource;
}

export type FailureStage = 'load' | 'fetch' | 'extract' | 'align' | 'metrics';

export interface FailureRecord {
  stage: FailureStage;
  reason: string;
  message: string;
  url?: string;
  articleId?: string;
}

export type CommandName = 'fetch-magazine' | 'fetch-web' | 'compute-metrics' | 'aggregate' | 'visualize';

export interface RunSummary {
  runId: string;
  command: CommandName;
  startedAt: string;
  finishedAt: string;
  counts: Record<string, number>;
  failures: FailureRecord[];
}
