import { z } from 'zod';

const CalendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const Source = z.enum(['magazine', 'web']);
const Metric = z.enum(['gunningFog', 'daleChall', 'flesch']);
// Empty groups serialize their statistics as null.
const Statistic = z
  .number()
  .nullable()
  .transform((value) => value ?? Number.NaN);

export const ArticleSchema = z.object({
  id: z.string().min(1),
  url: z.string().url(),
  source: Source,
  title: z.string(),
  author: z.string().nullable().optional(),
  section: z.string().nullable().optional(),
  issueDate: CalendarDate.nullable(),
  issueYear: z.number().int().nullable(),
  publishedDate: CalendarDate,
  text: z.string(),
  wordCount: z.number().int().nonnegative(),
  sentenceCount: z.number().int().nonnegative(),
});

export const ArticleMetricsRowSchema = z.object({
  id: z.string().min(1),
  url: z.string(),
  source: Source,
  title: z.string(),
  issueDate: CalendarDate.nullable(),
  issueYear: z.number().int().nullable(),
  publishedDate: CalendarDate,
  wordCount: z.number().int().nonnegative(),
  sentenceCount: z.number().int().nonnegative(),
  gunningFog: z.number(),
  daleChall: z.number(),
  flesch: z.number(),
  syllableCount: z.number().int().nonnegative(),
  daleChallSource: z.enum(['internal', 'library']),
});

export const AggregateRecordSchema = z.object({
  scope: z.enum(['issue', 'year']),
  key: z.string().min(1),
  source: Source,
  metric: Metric,
  total: z.number().int().nonnegative(),
  n: z.number().int().nonnegative(),
  median: Statistic,
  p25: Statistic,
  p75: Statistic,
  clipped: z.boolean(),
});
