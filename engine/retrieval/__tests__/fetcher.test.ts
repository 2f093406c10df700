import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchError } from '../../../shared/errors';
import type { CookieRecord } from '../../../shared/types';
import { capturingLogger, makeTempDir, removeDir, testConfig } from '../../__tests__/helpers';
import { openCacheStore, type CacheStore } from '../../persistence/cacheStore';
import { createFetcher, type FetcherDeps } from '../fetcher';
import type { Renderer } from '../renderFallback';

const LONG_TEXT = 'Rendered paragraphs carry the full article body for readers. '.repeat(3);

const html = (body: string, status = 200, headers: Record<string, string> = {}) =>
  new Response(body, { status, headers: { 'content-type': 'text/html', ...headers } });

describe('createFetcher', () => {
  let dir: string;
  let cache: CacheStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    cache = await openCacheStore(path.join(dir, 'cache'), { clock: () => 0 });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const setup = (overrides: Partial<FetcherDeps> = {}, env: Record<string, string> = {}) => {
    const { logger, logs } = capturingLogger();
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal | null) => {});
    const fetchImpl = vi.fn<typeof fetch>(async () => html('<p>alpha</p>'));
    const deps: FetcherDeps = {
      config: testConfig(dir, env),
      cache,
      logger,
      fetchImpl,
      clock: () => 0,
      sleep,
      ...overrides,
    };
    return { fetcher: createFetcher(deps), fetchImpl, sleep, logs };
  };

  it('serves a second request for the same resource from the cache', async () => {
    const { fetcher, fetchImpl } = setup();
    const first = await fetcher.fetch('https://mag.example.com/a');
    const second = await fetcher.fetch('https://mag.example.com/a#comments');

    expect(first.fromCache).toBe(false);
    expect(second.fromCache).toBe(true);
    expect(second.body).toBe('<p>alpha</p>');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetcher.stats).toMatchObject({ cacheHits: 1, networkRequests: 1 });
  });

  it('makes no network requests on a resumed run over a warm cache', async () => {
    await setup().fetcher.fetch('https://mag.example.com/a');

    const reopened = await openCacheStore(path.join(dir, 'cache'));
    const fetchImpl = vi.fn<typeof fetch>(async () => html('<p>changed</p>'));
    const { fetcher } = setup({ cache: reopened, fetchImpl });
    const result = await fetcher.fetch('https://mag.example.com/a');

    expect(result.body).toBe('<p>alpha</p>');
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(fetcher.stats.networkRequests).toBe(0);
  });

  it('shares one retrieval between concurrent requests for a key', async () => {
    const { fetcher, fetchImpl } = setup();
    const [a, b] = await Promise.all([
      fetcher.fetch('https://mag.example.com/a'),
      fetcher.fetch('https://mag.example.com/a'),
    ]);
    expect(a.body).toBe(b.body);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('retries transient statuses with exponential backoff', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementationOnce(async () => html('busy', 503))
      .mockImplementationOnce(async () => html('<p>ok</p>'));
    const { fetcher, sleep } = setup({ fetchImpl });

    const result = await fetcher.fetch('https://mag.example.com/a');
    expect(result.body).toBe('<p>ok</p>');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1, undefined);
    expect(fetcher.stats.retries).toBe(1);
  });

  it('honours Retry-After on 429 responses', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementationOnce(async () => html('slow down', 429, { 'Retry-After': '2' }))
      .mockImplementationOnce(async () => html('<p>ok</p>'));
    const { fetcher, sleep } = setup({ fetchImpl });

    await fetcher.fetch('https://mag.example.com/a');
    expect(sleep).toHaveBeenCalledWith(2000, undefined);
  });

  it('gives up after the attempt limit and caches nothing', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => html('down', 500));
    const { fetcher, sleep } = setup({ fetchImpl });

    const error = await fetcher.fetch('https://mag.example.com/a').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ kind: 'transient', status: 500, attempts: 3 });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1, 2]);
    expect(await cache.get('static:https://mag.example.com/a')).toBeNull();
  });

  it('does not retry permanent failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => html('missing', 404));
    const { fetcher } = setup({ fetchImpl });

    await expect(fetcher.fetch('https://mag.example.com/a')).rejects.toMatchObject({ kind: 'permanent', status: 404 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('treats network errors as transient', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const { fetcher } = setup({ fetchImpl });

    await expect(fetcher.fetch('https://mag.example.com/a')).rejects.toMatchObject({
      kind: 'transient',
      message: 'Network error: fetch failed (gave up after 3 attempts)',
    });
  });

  it('sends cookies only to matching hosts', async () => {
    const cookies: CookieRecord[] = [
      { name: 'session', value: 'test-secret', domain: '.mag.example.com' },
      { name: 'other', value: 'nope', domain: 'elsewhere.example.org' },
    ];
    const { fetcher, fetchImpl } = setup({ cookies });

    await fetcher.fetch('https://mag.example.com/a');
    await fetcher.fetch('https://cdn.example.net/b');

    expect(fetchImpl.mock.calls[0]?.[1]).toMatchObject({ headers: { Cookie: 'session=test-secret' } });
    expect(fetchImpl.mock.calls[1]?.[1]).not.toHaveProperty('headers.Cookie');
  });

  it('spaces requests to one host by the configured interval', async () => {
    let now = 0;
    const sleep = vi.fn(async (ms: number) => {
      now += ms;
    });
    const { fetcher } = setup({ clock: () => now, sleep }, { HTTP_MIN_INTERVAL_MS: '1000' });

    await fetcher.fetch('https://mag.example.com/a');
    await fetcher.fetch('https://mag.example.com/b');
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
  });

  describe('render fallback', () => {
    const renderEnv = { HTTP_MIN_USABLE_CHARS: '50' };

    it('replaces a thin static body with the rendered one and caches it', async () => {
      const renderer: Renderer = {
        name: 'fake',
        render: vi.fn(async () => `<article>${LONG_TEXT}</article>`),
        close: async () => {},
      };
      const fetchImpl = vi.fn<typeof fetch>(async () => html('<p>short</p>'));
      const { fetcher } = setup({ renderer, fetchImpl }, renderEnv);

      const first = await fetcher.fetch('https://mag.example.com/a');
      expect(first.entry.renderedBy).toBe('rendered');
      expect(first.body).toContain('Rendered paragraphs');

      const second = await fetcher.fetch('https://mag.example.com/a');
      expect(second.fromCache).toBe(true);
      expect(second.entry.renderedBy).toBe('rendered');
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(renderer.render).toHaveBeenCalledTimes(1);
    });

    it('keeps the static body when rendering keeps failing', async () => {
      const render = vi.fn(async (): Promise<string> => {
        throw new Error('browser crashed');
      });
      const renderer: Renderer = { name: 'fake', render, close: async () => {} };
      const { fetcher, logs } = setup(
        { renderer, fetchImpl: vi.fn<typeof fetch>(async () => html('<p>short</p>')) },
        renderEnv,
      );

      const result = await fetcher.fetch('https://mag.example.com/a');
      expect(result.body).toBe('<p>short</p>');
      expect(result.entry.renderedBy).toBe('static');
      expect(render).toHaveBeenCalledTimes(3);
      expect(fetcher.stats.renderFailures).toBe(1);
      expect(logs.some(({ level, entry }) => level === 'warn' && entry.message === 'Render fallback failed; keeping static body')).toBe(true);
    });

    it('never renders sitemaps', async () => {
      const render = vi.fn(async () => `<article>${LONG_TEXT}</article>`);
      const { fetcher } = setup(
        { renderer: { name: 'fake', render, close: async () => {} }, fetchImpl: vi.fn<typeof fetch>(async () => html('<urlset/>')) },
        renderEnv,
      );

      const result = await fetcher.fetch('https://mag.example.com/sitemap.xml', 'static', { resourceType: 'sitemap' });
      expect(result.body).toBe('<urlset/>');
      expect(render).not.toHaveBeenCalled();
    });
  });

  it('refetches when asked to bust the cached entry', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementationOnce(async () => html('<p>v1</p>'))
      .mockImplementationOnce(async () => html('<p>v2</p>'));
    const { fetcher } = setup({ fetchImpl });

    await fetcher.fetch('https://mag.example.com/issue', 'static', { resourceType: 'issue' });
    const refreshed = await fetcher.fetch('https://mag.example.com/issue', 'static', { resourceType: 'issue', bust: true });
    expect(refreshed.body).toBe('<p>v2</p>');
    expect(refreshed.fromCache).toBe(false);
  });

  it('rejects invalid identifiers and rendered mode without a renderer as permanent', async () => {
    const { fetcher, fetchImpl } = setup();
    await expect(fetcher.fetch('ftp://mag.example.com/a')).rejects.toMatchObject({ kind: 'permanent' });
    await expect(fetcher.fetch('https://mag.example.com/a', 'rendered')).rejects.toMatchObject({
      kind: 'permanent',
      message: 'No renderer configured',
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
