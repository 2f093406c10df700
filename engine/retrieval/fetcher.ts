import type { AppConfig } from '../../shared/config';
import { FetchError, errorMessage } from '../../shared/errors';
import type { CacheEntry, CookieRecord, RenderMode, ResourceType } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { CacheStore } from '../persistence/cacheStore';
import { sleep as defaultSleep, type Clock, type Sleep } from '../utils/async';
import { visibleText } from '../utils/text';
import { PolitenessGate } from './politeness';
import type { Renderer } from './renderFallback';
import { cacheKeyFor, hostOf, normalizeResourceId } from './urls';

export interface FetchOptions {
  resourceType?: ResourceType;
  /** Mark the cached entry stale first so it is retrieved again. */
  bust?: boolean;
  /** Defaults to true for articles and issue pages, false for archives and sitemaps. */
  allowRender?: boolean;
  signal?: AbortSignal;
}

export interface FetchResult {
  body: string;
  fromCache: boolean;
  entry: CacheEntry;
}

export interface FetcherStats {
  cacheHits: number;
  networkRequests: number;
  retries: number;
  renders: number;
  renderFailures: number;
}

export interface Fetcher {
  fetch: (resourceId: string, mode?: RenderMode, options?: FetchOptions) => Promise<FetchResult>;
  readonly stats: Readonly<FetcherStats>;
}

export interface FetcherDeps {
  config: Pick<AppConfig, 'http' | 'render'>;
  cache: CacheStore;
  logger: Logger;
  cookies?: CookieRecord[];
  renderer?: Renderer | null;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  sleep?: Sleep;
}

const cookieMatchesHost = (cookie: CookieRecord, host: string): boolean => {
  const domain = cookie.domain.replace(/^\./, '').toLowerCase();
  return host === domain || host.endsWith(`.${domain}`);
};

const cookieHeaderFor = (cookies: CookieRecord[], host: string): string | null => {
  const matching = cookies.filter((cookie) => cookieMatchesHost(cookie, host));
  return matching.length ? matching.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ') : null;
};

const parseRetryAfterMs = (value: string | null, now: number): number | undefined => {
  if (!value) return undefined;
  const seconds = Number(value.trim());
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(value);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
};

const isTransientStatus = (status: number): boolean => status === 429 || status >= 500;

export const createFetcher = (deps: FetcherDeps): Fetcher => {
  const { config, cache, logger } = deps;
  const fetchImpl = deps.fetchImpl ?? fetch;
  const clock = deps.clock ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const cookies = deps.cookies ?? [];
  const renderer = deps.renderer ?? null;
  const gate = new PolitenessGate(config.http.minIntervalMs, { clock, sleep });
  const inFlight = new Map<string, Promise<FetchResult>>();
  const stats: FetcherStats = { cacheHits: 0, networkRequests: 0, retries: 0, renders: 0, renderFailures: 0 };

  const fetchOnce = async (url: string, signal?: AbortSignal): Promise<string> => {
    const host = hostOf(url);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.http.requestTimeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const headers: Record<string, string> = {
      'User-Agent': config.http.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
    };
    const cookieHeader = cookieHeaderFor(cookies, host);
    if (cookieHeader) headers.Cookie = cookieHeader;

    stats.networkRequests += 1;
    try {
      const response = await fetchImpl(url, { method: 'GET', headers, redirect: 'follow', signal: controller.signal });
      if (!response.ok) {
        const status = response.status;
        if (isTransientStatus(status)) {
          throw new FetchError('transient', url, `HTTP ${status}`, {
            status,
            retryAfterMs: parseRetryAfterMs(response.headers.get('retry-after'), clock()),
          });
        }
        throw new FetchError('permanent', url, `HTTP ${status}`, { status });
      }
      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (signal?.aborted) throw error;
      const message = controller.signal.aborted
        ? `Timed out after ${config.http.requestTimeoutMs}ms`
        : `Network error: ${errorMessage(error)}`;
      throw new FetchError('transient', url, message, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  };

  const renderOnce = async (url: string): Promise<string> => {
    if (!renderer) {
      throw new FetchError('permanent', url, 'No renderer configured');
    }
    stats.networkRequests += 1;
    stats.renders += 1;
    try {
      return await renderer.render({
        url,
        userAgent: config.http.userAgent,
        cookies: cookies.filter((cookie) => cookieMatchesHost(cookie, hostOf(url))),
        timeoutMs: config.render.timeoutMs,
      });
    } catch (error) {
      throw new FetchError('transient', url, `Render failed: ${errorMessage(error)}`, { cause: error });
    }
  };

  const withRetries = async (url: string, attemptFn: () => Promise<string>, signal?: AbortSignal): Promise<string> => {
    const maxAttempts = Math.max(1, config.http.maxAttempts);
    const host = hostOf(url);
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await gate.run(host, attemptFn, signal);
      } catch (error) {
        if (!(error instanceof FetchError) || error.kind === 'permanent') {
          throw error;
        }
        if (attempt >= maxAttempts) {
          throw new FetchError('transient', url, `${error.message} (gave up after ${attempt} attempts)`, {
            status: error.status,
            attempts: attempt,
            cause: error,
          });
        }
        const backoff = Math.min(config.http.backoffMaxMs, config.http.backoffBaseMs * 2 ** (attempt - 1));
        const delay = Math.max(backoff, error.retryAfterMs ?? 0);
        stats.retries += 1;
        logger.debug('Retrying request', { url, attempt, delayMs: delay, error: error.message });
        await sleep(delay, signal);
      }
    }
  };

  const retrieve = async (
    key: string,
    url: string,
    mode: RenderMode,
    resourceType: ResourceType,
    allowRender: boolean,
    signal?: AbortSignal,
  ): Promise<FetchResult> => {
    if (mode === 'rendered') {
      const body = await withRetries(url, () => renderOnce(url), signal);
      const entry = await cache.put({ key, url, mode, resourceType, payload: Buffer.from(body, 'utf-8'), renderedBy: 'rendered' });
      return { body, fromCache: false, entry };
    }

    let body = await withRetries(url, () => fetchOnce(url, signal), signal);
    let renderedBy: RenderMode = 'static';
    const usableChars = visibleText(body).length;
    if (allowRender && renderer && usableChars < config.http.minUsableChars) {
      try {
        const rendered = await withRetries(url, () => renderOnce(url), signal);
        if (visibleText(rendered).length > usableChars) {
          body = rendered;
          renderedBy = 'rendered';
        }
      } catch (error) {
        stats.renderFailures += 1;
        logger.warn('Render fallback failed; keeping static body', { url, error: errorMessage(error) });
      }
    }
    const entry = await cache.put({ key, url, mode, resourceType, payload: Buffer.from(body, 'utf-8'), renderedBy });
    return { body, fromCache: false, entry };
  };

  const fetchResource = async (resourceId: string, mode: RenderMode = 'static', options: FetchOptions = {}): Promise<FetchResult> => {
    const resourceType = options.resourceType ?? 'article';
    const allowRender = options.allowRender ?? (resourceType === 'article' || resourceType === 'issue');
    let url: string;
    let key: string;
    try {
      url = normalizeResourceId(resourceId);
      key = cacheKeyFor(url, mode);
    } catch (error) {
      throw new FetchError('permanent', resourceId, `Invalid resource identifier: ${errorMessage(error)}`, { cause: error });
    }

    const pending = inFlight.get(key);
    if (pending) return await pending;

    const task = (async (): Promise<FetchResult> => {
      if (options.bust) {
        await cache.invalidate(key);
      }
      const cached = await cache.get(key);
      if (cached && cached.status === 'hit') {
        stats.cacheHits += 1;
        return { body: cached.payload.toString('utf-8'), fromCache: true, entry: cached };
      }
      return await retrieve(key, url, mode, resourceType, allowRender, options.signal);
    })();

    inFlight.set(key, task);
    try {
      return await task;
    } finally {
      inFlight.delete(key);
    }
  };

  return {
    fetch: fetchResource,
    stats,
  };
};
