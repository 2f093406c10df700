const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Calendar date (`YYYY-MM-DD`) of a date or timestamp string. A leading ISO
 * date is taken literally so publisher-local timestamps keep their day.
 */
export const toCalendarDate = (value: string | null | undefined): string | null => {
  if (!value) return null;
  const trimmed = value.trim();
  const prefix = trimmed.match(ISO_DATE_PREFIX_RE);
  if (prefix) {
    const [, year, month, day] = prefix;
    const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
    const check = new Date(ms);
    if (check.getUTCMonth() + 1 !== Number(month) || check.getUTCDate() !== Number(day)) return null;
    return `${year}-${month}-${day}`;
  }
  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed)) return null;
  return new Date(parsed).toISOString().slice(0, 10);
};

/** Days since the epoch for a calendar date, or null when it does not parse. */
export const dayNumber = (calendarDate: string): number | null => {
  const normalized = toCalendarDate(calendarDate);
  if (!normalized) return null;
  const [year, month, day] = normalized.split('-').map(Number);
  return Math.round(Date.UTC(year, month - 1, day) / DAY_MS);
};

export const fromDayNumber = (day: number): string => new Date(day * DAY_MS).toISOString().slice(0, 10);

export const dateFromParts = (year: number, month: number, day: number): string | null =>
  toCalendarDate(`${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`);

export const addDays = (calendarDate: string, days: number): string => {
  const base = dayNumber(calendarDate);
  if (base === null) {
    throw new Error(`Invalid calendar date: ${calendarDate}`);
  }
  return fromDayNumber(base + days);
};

export const yearOf = (calendarDate: string): number => Number(calendarDate.slice(0, 4));
