import type { AppConfig } from '../../shared/config';
import type { CookieRecord } from '../../shared/types';
import type { Logger } from '../obs/logger';

export interface RenderRequest {
  url: string;
  userAgent: string;
  cookies: CookieRecord[];
  timeoutMs: number;
}

/** Headless-browser retrieval used when a static body carries too little text. */
export interface Renderer {
  readonly name: string;
  render: (request: RenderRequest) => Promise<string>;
  close: () => Promise<void>;
}

type PuppeteerModule = typeof import('puppeteer-core');
type Browser = Awaited<ReturnType<PuppeteerModule['default']['launch']>>;

/**
 * Drives a locally installed Chrome through puppeteer-core. Nothing is
 * downloaded; without CHROME_EXECUTABLE_PATH no renderer is created.
 */
export const createPuppeteerRenderer = (executablePath: string, logger?: Logger): Renderer => {
  let browserPromise: Promise<Browser> | null = null;

  const getBrowser = async (): Promise<Browser> => {
    if (!browserPromise) {
      browserPromise = import('puppeteer-core').then(({ default: puppeteer }) =>
        puppeteer.launch({
          executablePath,
          headless: true,
          args: ['--no-sandbox', '--disable-setuid-sandbox'],
        }),
      );
      browserPromise.catch(() => {
        browserPromise = null;
      });
    }
    return await browserPromise;
  };

  return {
    name: 'puppeteer',
    render: async ({ url, userAgent, cookies, timeoutMs }) => {
      const browser = await getBrowser();
      const page = await browser.newPage();
      try {
        await page.setUserAgent(userAgent);
        if (cookies.length) {
          await page.setCookie(
            ...cookies.map((cookie) => ({
              name: cookie.name,
              value: cookie.value,
              domain: cookie.domain,
              path: cookie.path ?? '/',
            })),
          );
        }
        await page.goto(url, { waitUntil: 'networkidle2', timeout: timeoutMs });
        return await page.content();
      } finally {
        await page.close().catch((error: unknown) => {
          logger?.debug('Render page close failed', { url, error: String(error) });
        });
      }
    },
    close: async () => {
      if (!browserPromise) return;
      const pending = browserPromise;
      browserPromise = null;
      const browser = await pending;
      await browser.close();
    },
  };
};

export const createRendererFromConfig = (config: AppConfig, logger?: Logger): Renderer | null =>
  config.render.executablePath ? createPuppeteerRenderer(config.render.executablePath, logger) : null;
