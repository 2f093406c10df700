import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppConfig } from '../../../shared/config';
import { makeArticle, makeTempDir, removeDir, testConfig } from '../../__tests__/helpers';
import { createFsArtifactStore } from '../fsStore';

describe('createFsArtifactStore', () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = testConfig(dir);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes corpus records by source and year, skipping identical rewrites', async () => {
    const store = createFsArtifactStore(config);
    await store.ensureLayout();
    const article = makeArticle({ id: 'abc123', source: 'magazine', issueDate: '2020-01-06', issueYear: 2020 });

    const first = await store.saveArticle(article);
    expect(first).toEqual({
      location: path.join(config.persistence.corpusDir, 'magazine', 'year=2020', 'abc123.json'),
      changed: true,
    });
    expect((await store.saveArticle(article)).changed).toBe(false);
    expect((await store.saveArticle({ ...article, title: 'Revised' })).changed).toBe(true);
  });

  it('files web records under their publication year', async () => {
    const store = createFsArtifactStore(config);
    const saved = await store.saveArticle(makeArticle({ id: 'w1', source: 'web', publishedDate: '2019-12-30' }));
    expect(saved.location).toBe(path.join(config.persistence.corpusDir, 'web', 'year=2019', 'w1.json'));
  });

  it('moves a record re-saved under another year', async () => {
    const store = createFsArtifactStore(config);
    const article = makeArticle({ id: 'alpha', source: 'magazine', issueDate: '2019-12-30', issueYear: 2019 });
    await store.saveArticle(article);
    const saved = await store.saveArticle({ ...article, issueDate: '2020-01-06', issueYear: 2020 });

    expect(saved.location).toBe(path.join(config.persistence.corpusDir, 'magazine', 'year=2020', 'alpha.json'));
    const loaded = await store.loadArticles('magazine');
    expect(loaded.articles.map((record) => record.issueDate)).toEqual(['2020-01-06']);
  });

  it('loads valid records and reports invalid ones', async () => {
    const store = createFsArtifactStore(config);
    await store.saveArticle(makeArticle({ id: 'b', source: 'web' }));
    await store.saveArticle(makeArticle({ id: 'a', source: 'magazine', issueDate: '2020-01-06', issueYear: 2020 }));
    const broken = path.join(config.persistence.corpusDir, 'web', 'year=2020', 'zzz.json');
    await fs.writeFile(broken, '{"id": "zzz"}', 'utf-8');

    const all = await store.loadArticles();
    expect(all.articles.map((article) => article.id)).toEqual(['a', 'b']);
    expect(all.rejected).toHaveLength(1);
    expect(all.rejected[0].location).toBe(broken);

    const webOnly = await store.loadArticles('web');
    expect(webOnly.articles.map((article) => article.id)).toEqual(['b']);
  });

  it('keeps outputs and run artifacts inside the data root', async () => {
    const store = createFsArtifactStore(config);
    const location = await store.writeOutput('per_article.csv', 'id\n');
    expect(location).toBe(path.join(config.persistence.metricsDir, 'per_article.csv'));
    expect(await store.readOutput('per_article.csv')).toBe('id\n');
    expect(await store.readOutput('missing.csv')).toBeNull();

    expect(await store.writeOutput('../evil.txt', 'x')).toBe(path.join(config.persistence.metricsDir, '__evil.txt'));

    const run = await store.saveRunArtifact('run-1', 'summary', { ok: true });
    expect(run).toBe(path.join(config.persistence.runsDir, 'run-1', 'summary.json'));
    expect(JSON.parse(await fs.readFile(run, 'utf-8'))).toEqual({ ok: true });
  });
});
