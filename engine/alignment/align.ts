import { AlignmentError } from '../../shared/errors';
import type { Article, Issue } from '../../shared/types';
import { dayNumber, fromDayNumber, yearOf } from '../utils/dates';
import { canonicalTitle } from './canonical';

export const DEFAULT_WINDOW_DAYS = 3;

export type DuplicateReason = 'url' | 'title';

export interface AlignmentResult {
  /** Magazine articles plus retained web articles, web ones carrying their assigned issue. */
  aligned: Article[];
  excluded: {
    article: Article;
    duplicateOf: string;
    reason: DuplicateReason;
  }[];
  rejected: {
    article: Article;
    error: AlignmentError;
  }[];
  issues: Issue[];
}

interface IssueSlot {
  issueDate: string;
  day: number;
  members: string[];
}

interface TitleEntry {
  id: string;
  day: number;
}

const requireDay = (article: Article, date: string | null): number => {
  const day = date ? dayNumber(date) : null;
  if (day === null) {
    throw new AlignmentError(article.id, `Unparseable date for ${article.url}: ${date ?? 'missing'}`);
  }
  return day;
};

/** Closest issue within the window; ties go to the earlier issue. */
export const findIssue = <T extends { day: number }>(slots: readonly T[], day: number, windowDays: number): T | null => {
  let best: T | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const slot of slots) {
    const distance = Math.abs(day - slot.day);
    if (distance > windowDays) continue;
    if (distance < bestDistance || (distance === bestDistance && best !== null && slot.day < best.day)) {
      best = slot;
      bestDistance = distance;
    }
  }
  return best;
};

export const align = (
  magazine: readonly Article[],
  web: readonly Article[],
  windowDays: number = DEFAULT_WINDOW_DAYS,
): AlignmentResult => {
  const aligned: Article[] = [];
  const excluded: AlignmentResult['excluded'] = [];
  const rejected: AlignmentResult['rejected'] = [];

  const slotsByDate = new Map<string, IssueSlot>();
  const byUrl = new Map<string, string>();
  const byTitle = new Map<string, TitleEntry[]>();
  const seenIds = new Set<string>();

  for (const article of magazine) {
    // a record saved under two issues belongs to the first one only
    if (seenIds.has(article.id)) {
      excluded.push({ article, duplicateOf: article.id, reason: 'url' });
      continue;
    }
    seenIds.add(article.id);

    let day: number;
    try {
      day = requireDay(article, article.issueDate);
    } catch (error) {
      if (!(error instanceof AlignmentError)) throw error;
      rejected.push({ article, error });
      continue;
    }
    const issueDate = fromDayNumber(day);
    const slot = slotsByDate.get(issueDate) ?? { issueDate, day, members: [] };
    slot.members.push(article.id);
    slotsByDate.set(issueDate, slot);

    byUrl.set(article.url, article.id);
    const key = canonicalTitle(article.title);
    if (key) {
      const entries = byTitle.get(key) ?? [];
      entries.push({ id: article.id, day });
      byTitle.set(key, entries);
    }
    aligned.push({ ...article, issueDate, issueYear: yearOf(issueDate) });
  }

  const slots = Array.from(slotsByDate.values()).sort((a, b) => a.day - b.day);

  for (const article of web) {
    const urlMatch = byUrl.get(article.url);
    if (urlMatch) {
      excluded.push({ article, duplicateOf: urlMatch, reason: 'url' });
      continue;
    }

    let day: number;
    try {
      day = requireDay(article, article.publishedDate);
    } catch (error) {
      if (!(error instanceof AlignmentError)) throw error;
      rejected.push({ article, error });
      continue;
    }

    const key = canonicalTitle(article.title);
    const titleMatch = key ? findIssue(byTitle.get(key) ?? [], day, windowDays) : null;
    if (titleMatch) {
      excluded.push({ article, duplicateOf: titleMatch.id, reason: 'title' });
      continue;
    }

    byUrl.set(article.url, article.id);
    const slot = findIssue(slots, day, windowDays);
    if (slot) {
      slot.members.push(article.id);
      aligned.push({ ...article, issueDate: slot.issueDate, issueYear: yearOf(slot.issueDate) });
    } else {
      aligned.push({ ...article, issueDate: null, issueYear: null });
    }
  }

  const issues: Issue[] = slots.map((slot) => ({
    year: yearOf(slot.issueDate),
    issueDate: slot.issueDate,
    memberArticleIds: slot.members,
  }));

  return { aligned, excluded, rejected, issues };
};
