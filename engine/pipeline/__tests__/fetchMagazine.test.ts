import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMemoryArtifactStore } from '../../../shared/artifacts';
import type { AppConfig } from '../../../shared/config';
import { capturingLogger, makeTempDir, removeDir, testConfig } from '../../__tests__/helpers';
import { openCacheStore, type CacheStore } from '../../persistence/cacheStore';
import { createFetcher } from '../../retrieval/fetcher';
import { archiveUrlFor, fetchMagazine } from '../fetchMagazine';

const ARTICLE_HTML = '<html><body><article><p>The cat sat.</p><p>The dog ran fast.</p></article></body></html>';

const SITE: Record<string, string> = {
  'https://mag.example.com/magazine/2020':
    '<a href="/magazine/2020/01/06">Jan 6</a><a href="/magazine/2020/01/13">Jan 13</a><a href="/magazine/2019/12/30">Dec 30</a>',
  'https://mag.example.com/magazine/2020/01/06':
    '<a href="/magazine/2020/01/06/alpha">Alpha</a><a href="/magazine/2020/01/06/beta">Beta</a>',
  'https://mag.example.com/magazine/2020/01/13': '<a href="/magazine/2020/01/13/gamma">Gamma</a>',
  'https://mag.example.com/magazine/2020/01/06/alpha': ARTICLE_HTML,
  'https://mag.example.com/magazine/2020/01/06/beta': ARTICLE_HTML,
  'https://mag.example.com/magazine/2020/01/13/gamma': ARTICLE_HTML,
};

const siteFetch = (pages: Record<string, string>) =>
  vi.fn<typeof fetch>(async (input) => {
    const body = pages[String(input)];
    return body === undefined ? new Response('missing', { status: 404 }) : new Response(body);
  });

describe('archiveUrlFor', () => {
  it('points at the yearly archive page', () => {
    expect(archiveUrlFor('https://mag.example.com', 2021)).toBe('https://mag.example.com/magazine/2021');
  });
});

describe('fetchMagazine', () => {
  let dir: string;
  let config: AppConfig;
  let cache: CacheStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = testConfig(dir);
    cache = await openCacheStore(path.join(dir, 'cache'), { clock: () => 0 });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const run = (store: ReturnType<typeof createMemoryArtifactStore>, fetchImpl: typeof fetch, yearStart = 2020) => {
    const { logger } = capturingLogger();
    const fetcher = createFetcher({ config, cache, logger, fetchImpl, clock: () => 0, sleep: async () => {} });
    return fetchMagazine({ config, logger, store, fetcher, clock: () => 0 }, { yearStart, yearEnd: 2020 });
  };

  it('walks archive, issues and articles into the corpus', async () => {
    const store = createMemoryArtifactStore();
    const summary = await run(store, siteFetch(SITE));

    expect(summary.command).toBe('fetch-magazine');
    expect(summary.failures).toEqual([]);
    expect(summary.counts).toMatchObject({
      issues: 2,
      articleLinks: 3,
      downloaded: 3,
      articlesWritten: 3,
      networkRequests: 6,
    });
    const stored = Array.from(store.articles.values());
    expect(stored.map((article) => article.issueDate).sort()).toEqual(['2020-01-06', '2020-01-06', '2020-01-13']);
    expect(stored.every((article) => article.source === 'magazine' && article.issueYear === 2020)).toBe(true);
    expect(store.runs.has(`${summary.runId}/summary`)).toBe(true);
  });

  it('resumes from the cache without network requests or rewrites', async () => {
    const store = createMemoryArtifactStore();
    await run(store, siteFetch(SITE));

    const offline = siteFetch({});
    const summary = await run(store, offline);

    expect(offline).not.toHaveBeenCalled();
    expect(summary.counts).toMatchObject({ cacheHits: 3, articlesUnchanged: 3, networkRequests: 0 });
    expect(summary.counts.articlesWritten).toBeUndefined();
  });

  it('records a failed article and keeps going', async () => {
    const { 'https://mag.example.com/magazine/2020/01/13/gamma': _missing, ...pages } = SITE;
    const store = createMemoryArtifactStore();
    const summary = await run(store, siteFetch(pages));

    expect(summary.counts).toMatchObject({ articlesWritten: 2, failures: 1 });
    expect(summary.failures).toEqual([
      {
        stage: 'fetch',
        reason: 'permanent',
        message: 'HTTP 404',
        url: 'https://mag.example.com/magazine/2020/01/13/gamma',
      },
    ]);
  });

  it('files an article linked from another issue under its own issue only', async () => {
    const pages = {
      ...SITE,
      'https://mag.example.com/magazine/2019': '<a href="/magazine/2019/12/30">Dec 30</a>',
      'https://mag.example.com/magazine/2019/12/30':
        '<a href="/magazine/2019/12/30/omega">Omega</a><a href="/magazine/2020/01/06/alpha">Coming next week</a>',
      'https://mag.example.com/magazine/2019/12/30/omega': ARTICLE_HTML,
    };
    const store = createMemoryArtifactStore();
    const summary = await run(store, siteFetch(pages), 2019);

    expect(summary.failures).toEqual([]);
    expect(summary.counts).toMatchObject({ issues: 3, articleLinks: 4, articlesWritten: 4 });
    const alpha = Array.from(store.articles.values()).filter((article) => article.url.endsWith('/alpha'));
    expect(alpha.map((article) => article.issueDate)).toEqual(['2020-01-06']);
  });

  it('keeps going past archive links with malformed character references', async () => {
    const archive = 'https://mag.example.com/magazine/2020';
    const store = createMemoryArtifactStore();
    const summary = await run(store, siteFetch({ ...SITE, [archive]: `<a href="/x&#99999999;">x</a>${SITE[archive]}` }));

    expect(summary.failures).toEqual([]);
    expect(summary.counts).toMatchObject({ issues: 2, articlesWritten: 3 });
  });
});
