import fs from 'node:fs/promises';
import path from 'node:path';
import type { ArtifactStore, LoadedArticles } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import { StorageError, errorMessage } from '../../shared/errors';
import type { Article } from '../../shared/types';
import { ARTICLE_SOURCES } from '../../shared/types';
import { yearOf } from '../utils/dates';
import { ArticleSchema } from './schemas';
import { guardPath, listJsonFiles, readFileIfExists, sanitizeSegment, writeFileAtomic } from './fsUtils';

const serialize = (data: unknown) => `${JSON.stringify(data, null, 2)}\n`;

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

export const corpusPathFor = (corpusDir: string, article: Article): string => {
  const year = article.issueYear ?? yearOf(article.publishedDate);
  return path.join(corpusDir, article.source, `year=${year}`, `${sanitizeSegment(article.id)}.json`);
};

/**
 * Filesystem layout under the persistence root: corpus records per source and
 * year, command outputs, and one directory of artifacts per run.
 */
export const createFsArtifactStore = (config: Pick<AppConfig, 'persistence'>): ArtifactStore => {
  const { rootDir, corpusDir, metricsDir, runsDir } = config.persistence;

  const withStorage = async <T>(target: string, action: string, task: () => Promise<T>): Promise<T> => {
    try {
      return await task();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(target, `${action}: ${errorMessage(error)}`, { cause: error });
    }
  };

  const ensureLayout = () =>
    withStorage(rootDir, 'Failed to create data directories', async () => {
      for (const dir of [rootDir, corpusDir, metricsDir, runsDir]) {
        await ensureDir(dir);
      }
    });

  // One record per id and source: a copy filed under another year is stale.
  const removeOtherYears = async (target: string) => {
    const sourceDir = path.dirname(path.dirname(target));
    const filename = path.basename(target);
    for (const entry of await fs.readdir(sourceDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || !entry.name.startsWith('year=')) continue;
      const candidate = path.join(sourceDir, entry.name, filename);
      if (candidate !== target) {
        await fs.rm(candidate, { force: true });
      }
    }
  };

  const saveArticle: ArtifactStore['saveArticle'] = (article) => {
    const target = corpusPathFor(corpusDir, article);
    return withStorage(target, 'Failed to write corpus record', async () => {
      guardPath(rootDir, target);
      const contents = serialize(ArticleSchema.parse(article));
      const changed = (await readFileIfExists(target)) !== contents;
      if (changed) {
        await writeFileAtomic(target, contents);
      }
      await removeOtherYears(target);
      return { location: target, changed };
    });
  };

  const loadArticles: ArtifactStore['loadArticles'] = (source) =>
    withStorage(corpusDir, 'Failed to read corpus', async () => {
      const result: LoadedArticles = { articles: [], rejected: [] };
      const sources = source ? [source] : ARTICLE_SOURCES;
      for (const current of sources) {
        for (const file of await listJsonFiles(path.join(corpusDir, current))) {
          let raw: unknown;
          try {
            raw = JSON.parse(await fs.readFile(file, 'utf-8'));
          } catch (error) {
            result.rejected.push({ location: file, message: errorMessage(error) });
            continue;
          }
          const parsed = ArticleSchema.safeParse(raw);
          if (!parsed.success) {
            result.rejected.push({ location: file, message: parsed.error.issues[0]?.message ?? 'Invalid record' });
            continue;
          }
          result.articles.push(parsed.data);
        }
      }
      result.articles.sort((a, b) => a.id.localeCompare(b.id));
      return result;
    });

  const writeOutput: ArtifactStore['writeOutput'] = (filename, contents) => {
    const target = path.join(metricsDir, sanitizeSegment(filename));
    return withStorage(target, 'Failed to write output', async () => {
      guardPath(rootDir, target);
      await writeFileAtomic(target, contents);
      return target;
    });
  };

  const readOutput: ArtifactStore['readOutput'] = (filename) => {
    const target = path.join(metricsDir, sanitizeSegment(filename));
    return withStorage(target, 'Failed to read output', () => readFileIfExists(target));
  };

  const saveRunArtifact: ArtifactStore['saveRunArtifact'] = (runId, kind, data) => {
    const target = path.join(runsDir, sanitizeSegment(runId), `${sanitizeSegment(kind)}.json`);
    return withStorage(target, 'Failed to write run artifact', async () => {
      guardPath(rootDir, target);
      await writeFileAtomic(target, serialize(data));
      return target;
    });
  };

  return { ensureLayout, saveArticle, loadArticles, writeOutput, readOutput, saveRunArtifact };
};
