import type { AggregateRecord, ArticleSource, MetricName } from '../../shared/types';
import { ARTICLE_SOURCES, METRIC_NAMES } from '../../shared/types';

const PANEL_WIDTH = 360;
const PANEL_HEIGHT = 240;
const MARGIN = { top: 36, right: 16, bottom: 36, left: 48 };

const METRIC_TITLES: Record<MetricName, string> = {
  gunningFog: 'Gunning Fog',
  daleChall: 'Dale–Chall',
  flesch: 'Flesch Reading Ease',
};

const SOURCE_COLORS: Record<ArticleSource, string> = {
  magazine: '#c0392b',
  web: '#2471a3',
};

const escapeXml = (value: string) =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

const fmt = (value: number) => Number(value.toFixed(2)).toString();

interface Point {
  year: number;
  value: number;
}

const seriesFor = (records: readonly AggregateRecord[], metric: MetricName, source: ArticleSource): Point[] =>
  records
    .filter((r) => r.scope === 'year' && r.metric === metric && r.source === source && Number.isFinite(r.median))
    .map((r) => ({ year: Number(r.key), value: r.median }))
    .filter((p) => Number.isFinite(p.year))
    .sort((a, b) => a.year - b.year);

const renderPanel = (records: readonly AggregateRecord[], metric: MetricName, offsetX: number): string => {
  const series = ARTICLE_SOURCES.map((source) => ({ source, points: seriesFor(records, metric, source) }));
  const all = series.flatMap((s) => s.points);
  const parts = [
    `<g transform="translate(${offsetX},0)">`,
    `<text x="${PANEL_WIDTH / 2}" y="20" text-anchor="middle" font-size="14">${escapeXml(METRIC_TITLES[metric])}</text>`,
  ];
  if (!all.length) {
    parts.push(`<text x="${PANEL_WIDTH / 2}" y="${PANEL_HEIGHT / 2}" text-anchor="middle" fill="#888">No data</text>`, '</g>');
    return parts.join('');
  }

  const years = all.map((p) => p.year);
  const values = all.map((p) => p.value);
  const minYear = Math.min(...years);
  const maxYear = Math.max(...years);
  const minValue = Math.min(...values);
  const maxValue = Math.max(...values);
  const plotW = PANEL_WIDTH - MARGIN.left - MARGIN.right;
  const plotH = PANEL_HEIGHT - MARGIN.top - MARGIN.bottom;
  const x = (year: number) => MARGIN.left + (maxYear === minYear ? plotW / 2 : ((year - minYear) / (maxYear - minYear)) * plotW);
  const y = (value: number) =>
    MARGIN.top + (maxValue === minValue ? plotH / 2 : plotH - ((value - minValue) / (maxValue - minValue)) * plotH);

  const bottom = MARGIN.top + plotH;
  parts.push(
    `<line x1="${MARGIN.left}" y1="${bottom}" x2="${MARGIN.left + plotW}" y2="${bottom}" stroke="#444"/>`,
    `<line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${bottom}" stroke="#444"/>`,
    `<text x="${MARGIN.left}" y="${bottom + 16}" font-size="11">${minYear}</text>`,
    `<text x="${MARGIN.left + plotW}" y="${bottom + 16}" font-size="11" text-anchor="end">${maxYear}</text>`,
    `<text x="${MARGIN.left - 4}" y="${MARGIN.top + 4}" font-size="11" text-anchor="end">${fmt(maxValue)}</text>`,
    `<text x="${MARGIN.left - 4}" y="${bottom}" font-size="11" text-anchor="end">${fmt(minValue)}</text>`,
  );

  for (const { source, points } of series) {
    if (!points.length) continue;
    const coords = points.map((p) => `${fmt(x(p.year))},${fmt(y(p.value))}`).join(' ');
    parts.push(
      `<polyline data-source="${source}" fill="none" stroke="${SOURCE_COLORS[source]}" stroke-width="2" points="${coords}"/>`,
    );
  }
  parts.push('</g>');
  return parts.join('');
};

/** Yearly median trends, one panel per metric, one line per source. */
export const renderTrendChart = (records: readonly AggregateRecord[]): string => {
  const width = PANEL_WIDTH * METRIC_NAMES.length;
  const legendY = PANEL_HEIGHT + 16;
  const legend = ARTICLE_SOURCES.map(
    (source, index) =>
      `<g transform="translate(${MARGIN.left + index * 120},${legendY})"><rect width="12" height="12" fill="${SOURCE_COLORS[source]}"/><text x="18" y="11" font-size="12">${source}</text></g>`,
  ).join('');
  const panels = METRIC_NAMES.map((metric, index) => renderPanel(records, metric, index * PANEL_WIDTH)).join('');
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${PANEL_HEIGHT + 40}" font-family="sans-serif">`,
    `<rect width="100%" height="100%" fill="#fff"/>`,
    panels,
    legend,
    '</svg>',
    '',
  ].join('\n');
};
