import { TRACKING_QUERY_PARAMS } from '../../shared/config';
import type { RenderMode } from '../../shared/types';

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);
const DEFAULT_PORTS: Record<string, string> = { 'http:': '80', 'https:': '443' };
const trackingParams = new Set(TRACKING_QUERY_PARAMS);

const isTrackingParam = (name: string): boolean => {
  const lower = name.toLowerCase();
  return lower.startsWith('utm_') || trackingParams.has(lower);
};

/**
 * Normalizes a resource identifier so equivalent URLs map to one cache entry:
 * lowercase scheme and host, no default port, no fragment, tracking parameters
 * removed and the remaining query parameters sorted by name.
 */
export const normalizeResourceId = (rawUrl: string): string => {
  const url = new URL(rawUrl.trim());
  if (!TRUSTED_PROTOCOLS.has(url.protocol)) {
    throw new Error(`Unsupported protocol: ${url.protocol}`);
  }
  url.hostname = url.hostname.toLowerCase();
  if (url.port && DEFAULT_PORTS[url.protocol] === url.port) {
    url.port = '';
  }
  url.hash = '';
  const params = Array.from(url.searchParams.entries())
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  url.search = '';
  for (const [name, value] of params) {
    url.searchParams.append(name, value);
  }
  return url.toString();
};

export const cacheKeyFor = (rawUrl: string, mode: RenderMode): string => `${mode}:${normalizeResourceId(rawUrl)}`;

export const hostOf = (rawUrl: string): string => {
  try {
    return new URL(rawUrl).hostname.toLowerCase();
  } catch {
    return 'unknown';
  }
};

export const toAbsoluteUrl = (href: string, base: string): string | null => {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
};
