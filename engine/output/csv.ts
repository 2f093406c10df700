export type CsvValue = string | number | boolean | null | undefined;

const escapeCell = (value: CsvValue): string => {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'number' && !Number.isFinite(value) ? '' : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/** RFC 4180 CSV with a header row and `\n` line endings. */
export const toCsv = (columns: readonly string[], rows: readonly Record<string, CsvValue>[]): string => {
  const lines = [columns.map(escapeCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
};
