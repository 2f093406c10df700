import fs from 'node:fs/promises';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import { ConfigurationError, errorMessage, hasErrorCode } from '../../shared/errors';
import type { CookieRecord } from '../../shared/types';

export const DEFAULT_COOKIES_FILE = 'cookies.json';

const CookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().min(1).optional(),
  path: z.string().min(1).optional(),
});

const CookieFileSchema = z.union([z.array(CookieSchema), z.object({ cookies: z.array(CookieSchema) })]);

/** `.example.com` for `https://www.example.com`. */
export const cookieDomainFor = (baseUrl: string): string => `.${new URL(baseUrl).hostname.replace(/^www\./, '')}`;

export const parseCookies = (contents: string, defaultDomain: string, source = 'cookies'): CookieRecord[] => {
  let raw: unknown;
  try {
    raw = JSON5.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Cookies file ${source} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = CookieFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Cookies file ${source} has an unexpected shape`, { cause: parsed.error });
  }
  const list = Array.isArray(parsed.data) ? parsed.data : parsed.data.cookies;
  return list.map((cookie) => ({
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain ?? defaultDomain,
    ...(cookie.path ? { path: cookie.path } : {}),
  }));
};

export const loadCookies = async (filePath: string, defaultDomain: string): Promise<CookieRecord[]> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ConfigurationError(`Cookies file not found: ${filePath}`, { cause: error });
    }
    throw new ConfigurationError(`Cookies file unreadable: ${filePath}`, { cause: error });
  }
  return parseCookies(contents, defaultDomain, filePath);
};

/**
 * Cookies named on the command line or in config must exist; otherwise a
 * `cookies.json` in the working directory is used when present.
 */
export const resolveCookies = async (options: {
  explicitPath?: string;
  cwd: string;
  defaultDomain: string;
}): Promise<{ cookies: CookieRecord[]; path: string | null }> => {
  if (options.explicitPath) {
    const filePath = path.resolve(options.cwd, options.explicitPath);
    return { cookies: await loadCookies(filePath, options.defaultDomain), path: filePath };
  }
  const fallback = path.join(options.cwd, DEFAULT_COOKIES_FILE);
  try {
    await fs.access(fallback);
  } catch {
    return { cookies: [], path: null };
  }
  return { cookies: await loadCookies(fallback, options.defaultDomain), path: fallback };
};
