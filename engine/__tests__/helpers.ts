import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import type { Article, ArticleMetricsRow } from '../../shared/types';
import { buildConfig } from '../config/config';
import { createLogger, type LogLevel, type Logger } from '../obs/logger';

export const makeTempDir = (prefix = 'readability-') => fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

/** Config for tests: no politeness delay, millisecond backoff. */
export const testConfig = (rootDir: string, env: Record<string, string> = {}): AppConfig =>
  buildConfig(
    {
      NODE_ENV: 'test',
      DATA_ROOT: rootDir,
      PERIODICAL_BASE_URL: 'https://mag.example.com',
      HTTP_MIN_INTERVAL_MS: '0',
      HTTP_BACKOFF_BASE_MS: '1',
      HTTP_BACKOFF_MAX_MS: '4',
      HTTP_MIN_USABLE_CHARS: '0',
      LOG_LEVEL: 'debug',
      ...env,
    },
    rootDir,
  );

export interface CapturedLog {
  level: LogLevel;
  entry: Record<string, unknown>;
}

export const capturingLogger = (): { logger: Logger; logs: CapturedLog[] } => {
  const logs: CapturedLog[] = [];
  const logger = createLogger({ observability: { logLevel: 'debug' } }, (level, line) => {
    const parsed: unknown = JSON.parse(line);
    if (parsed && typeof parsed === 'object') {
      logs.push({ level, entry: { ...parsed } });
    }
  });
  return { logger, logs };
};

export const makeArticle = (overrides: Partial<Article> & Pick<Article, 'id' | 'source'>): Article => ({
  url: `https://mag.example.com/${overrides.source === 'magazine' ? 'magazine/2020/01/06' : 'news'}/${overrides.id}`,
  title: `Title ${overrides.id}`,
  author: null,
  section: null,
  issueDate: null,
  issueYear: null,
  publishedDate: '2020-01-06',
  text: 'The cat sat. The dog ran fast.',
  wordCount: 7,
  sentenceCount: 2,
  ...overrides,
});

export const makeRow = (overrides: Partial<ArticleMetricsRow> & Pick<ArticleMetricsRow, 'id'>): ArticleMetricsRow => ({
  url: `https://mag.example.com/news/${overrides.id}`,
  source: 'magazine',
  title: `Title ${overrides.id}`,
  issueDate: '2020-01-06',
  issueYear: 2020,
  publishedDate: '2020-01-06',
  wordCount: 100,
  sentenceCount: 5,
  gunningFog: 10,
  daleChall: 7,
  flesch: 60,
  syllableCount: 140,
  daleChallSource: 'internal',
  ...overrides,
});
