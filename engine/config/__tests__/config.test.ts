import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../../shared/errors';
import { buildConfig, getPublicConfig } from '../config';

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({}, '/srv/readability');
    expect(config.environment).toBe('development');
    expect(config.periodical.baseUrl).toBe('https://www.newyorker.com');
    expect(config.http).toMatchObject({ maxAttempts: 3, minIntervalMs: 1_000, concurrency: 2 });
    expect(config.alignment.windowDays).toBe(3);
    expect(config.aggregation).toEqual({ clip: false, lowerPercentile: 1, upperPercentile: 99 });
    expect(config.render.executablePath).toBeUndefined();
    expect(config.persistence.cacheDir).toBe(path.join('/srv/readability', 'data', 'cache', 'http'));
    expect(config.persistence.corpusDir).toBe(path.join('/srv/readability', 'data', 'corpus'));
  });

  it('reads overrides from the environment', () => {
    const config = buildConfig(
      {
        NODE_ENV: 'production',
        PERIODICAL_BASE_URL: 'https://mag.example.com///',
        AGGREGATE_CLIP: 'yes',
        ALIGNMENT_WINDOW_DAYS: '5',
        HTTP_TIMEOUT_MS: 'soon',
        COOKIES_PATH: ' cookies.json ',
      },
      '/srv/readability',
    );
    expect(config.environment).toBe('production');
    expect(config.periodical.baseUrl).toBe('https://mag.example.com');
    expect(config.aggregation.clip).toBe(true);
    expect(config.alignment.windowDays).toBe(5);
    expect(config.http.requestTimeoutMs).toBe(30_000);
    expect(config.credentials.cookiesPath).toBe('cookies.json');
  });

  it('rejects invalid settings', () => {
    expect(() => buildConfig({ HTTP_MAX_ATTEMPTS: '50' }, '/srv')).toThrow(ConfigurationError);
    expect(() => buildConfig({ LOG_LEVEL: 'verbose' }, '/srv')).toThrow(ConfigurationError);
    expect(() => buildConfig({ AGGREGATE_CLIP_LOWER: '99', AGGREGATE_CLIP_UPPER: '1' }, '/srv')).toThrow(
      'AGGREGATE_CLIP_LOWER must be below AGGREGATE_CLIP_UPPER',
    );
  });

  it('exposes a public subset', () => {
    expect(getPublicConfig(buildConfig({}, '/srv'))).toEqual({
      baseUrl: 'https://www.newyorker.com',
      windowDays: 3,
      http: { minIntervalMs: 1_000, maxAttempts: 3, concurrency: 2 },
      renderFallback: false,
      clip: false,
    });
  });
});
