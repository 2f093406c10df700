import type { Article, ArticleSource } from './types';

export interface SavedArticle {
  location: string;
  /** False when an identical record was already stored. */
  changed: boolean;
}

export interface LoadedArticles {
  articles: Article[];
  rejected: { location: string; message: string }[];
}

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  saveArticle: (article: Article) => Promise<SavedArticle>;
  loadArticles: (source?: ArticleSource) => Promise<LoadedArticles>;
  writeOutput: (filename: string, contents: string) => Promise<string>;
  readOutput: (filename: string) => Promise<string | null>;
  saveRunArtifact: (runId: string, kind: string, data: unknown) => Promise<string>;
}

export const createMemoryArtifactStore = (): ArtifactStore & {
  articles: Map<string, Article>;
  outputs: Map<string, string>;
  runs: Map<string, unknown>;
} => {
  const articles = new Map<string, Article>();
  const outputs = new Map<string, string>();
  const runs = new Map<string, unknown>();
  return {
    articles,
    outputs,
    runs,
    ensureLayout: async () => {},
    saveArticle: async (article) => {
      const location = `${article.source}/${article.id}`;
      const previous = articles.get(location);
      const changed = !previous || JSON.stringify(previous) !== JSON.stringify(article);
      articles.set(location, { ...article });
      return { location, changed };
    },
    loadArticles: async (source) => ({
      articles: Array.from(articles.values())
        .filter((article) => !source || article.source === source)
        .sort((a, b) => a.id.localeCompare(b.id)),
      rejected: [],
    }),
    writeOutput: async (filename, contents) => {
      outputs.set(filename, contents);
      return filename;
    },
    readOutput: async (filename) => outputs.get(filename) ?? null,
    saveRunArtifact: async (runId, kind, data) => {
      const key = `${runId}/${kind}`;
      runs.set(key, data);
      return key;
    },
  };
};
