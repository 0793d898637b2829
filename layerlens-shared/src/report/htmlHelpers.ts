/**
 * Pure utility functions for HTML report generation.
 * Charts are inline SVG strings; colours come from CSS variables so the
 * report theme applies to them too.
 */

export { fmtDuration, fmtNum, fmtPct, fmtDelta } from '../formatters/profileDump';

/** Escape HTML special characters to prevent XSS. */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export interface ChartSeries {
  name: string;
  /** One value per x; null leaves a gap. */
  values: ReadonlyArray<number | null>;
  /** CSS colour, usually a `var(--…)`. */
  color: string;
}

export interface ChartOptions {
  title: string;
  xLabel?: string;
  yLabel?: string;
  /** Dashed horizontal reference line. */
  limit?: number | null;
  width?: number;
  height?: number;
}

export interface ChartBar {
  label: string;
  value: number;
}

const PAD = { top: 28, right: 16, bottom: 34, left: 56 };

/**
 * Line chart over a shared numeric x axis. Returns an empty-state block
 * when there are no points.
 */
export function svgLineChart(xs: readonly number[], series: readonly ChartSeries[], options: ChartOptions): string {
  const width = options.width ?? 640;
  const height = options.height ?? 240;
  const plotW = width - PAD.left - PAD.right;
  const plotH = height - PAD.top - PAD.bottom;

  let yMax = options.limit ?? 0;
  for (const s of series) {
    for (const v of s.values) {
      if (v !== null && Number.isFinite(v) && v > yMax) yMax = v;
    }
  }
  if (xs.length === 0 || yMax <= 0) return emptyChart(options.title, width, height);

  const xMin = xs[0];
  const xMax = xs[xs.length - 1];
  const xSpan = xMax - xMin || 1;
  const sx = (x: number): number => PAD.left + ((x - xMin) / xSpan) * plotW;
  const sy = (y: number): number => PAD.top + plotH - (y / yMax) * plotH;

  const paths = series.map(s => {
    let d = '';
    let penDown = false;
    s.values.forEach((v, i) => {
      if (v === null || !Number.isFinite(v) || i >= xs.length) {
        penDown = false;
        return;
      }
      d += `${penDown ? 'L' : 'M'}${round(sx(xs[i]))},${round(sy(v))} `;
      penDown = true;
    });
    return `<path d="${d.trim()}" fill="none" stroke="${s.color}" stroke-width="1.5"><title>${escapeHtml(s.name)}</title></path>`;
  });

  const limitLine = options.limit !== undefined && options.limit !== null
    ? `<line class="chart-limit" x1="${PAD.left}" x2="${PAD.left + plotW}" y1="${round(sy(options.limit))}" y2="${round(sy(options.limit))}" stroke-dasharray="4 3"><title>limit ${options.limit}</title></line>`
    : '';

  const legend = series.length > 1
    ? series.map((s, i) => `<text x="${PAD.left + 8 + i * 120}" y="${PAD.top + 12}" fill="${s.color}" class="chart-legend">${escapeHtml(s.name)}</text>`).join('')
    : '';

  return `<svg class="chart" viewBox="0 0 ${width} ${height}" role="img" aria-label="${escapeHtml(options.title)}">
  <text x="${PAD.left}" y="16" class="chart-title">${escapeHtml(options.title)}</text>
  ${axes(plotW, plotH, yMax, xMin, xMax, options)}
  ${limitLine}
  ${paths.join('\n  ')}
  ${legend}
</svg>`;
}

/** Vertical bar chart, one bar per entry, labels under the first and last bar. */
export function svgBarChart(bars: readonly ChartBar[], options: ChartOptions): string {
  const width = options.width ?? 640;
  const height = options.height ?? 240;
  const plotW = width - PAD.left - PAD.right;
  const plotH = height - PAD.top - PAD.bottom;

  let yMax = 0;
  for (const b of bars) if (b.value > yMax) yMax = b.value;
  if (bars.length === 0 || yMax <= 0) return emptyChart(options.title, width, height);

  const slot = plotW / bars.length;
  const rects = bars.map((b, i) => {
    const h = (b.value / yMax) * plotH;
    return `<rect class="chart-bar" x="${round(PAD.left + i * slot + 1)}" y="${round(PAD.top + plotH - h)}" width="${round(Math.max(1, slot - 2))}" height="${round(h)}"><title>${escapeHtml(b.label)}: ${b.value}</title></rect>`;
  });

  const first = bars[0].label;
  const last = bars[bars.length - 1].label;
  return `<svg class="chart" viewBox="0 0 ${width} ${height}" role="img" aria-label="${escapeHtml(options.title)}">
  <text x="${PAD.left}" y="16" class="chart-title">${escapeHtml(options.title)}</text>
  <line class="chart-axis" x1="${PAD.left}" x2="${PAD.left + plotW}" y1="${PAD.top + plotH}" y2="${PAD.top + plotH}"/>
  <text x="${PAD.left - 6}" y="${PAD.top + 4}" text-anchor="end" class="chart-tick">${fmtTick(yMax)}</text>
  ${rects.join('\n  ')}
  <text x="${PAD.left}" y="${height - 14}" class="chart-tick">${escapeHtml(first)}</text>
  <text x="${PAD.left + plotW}" y="${height - 14}" text-anchor="end" class="chart-tick">${escapeHtml(last)}</text>
</svg>`;
}

// ── Helpers ──

function axes(plotW: number, plotH: number, yMax: number, xMin: number, xMax: number, options: ChartOptions): string {
  const parts = [
    `<line class="chart-axis" x1="${PAD.left}" x2="${PAD.left}" y1="${PAD.top}" y2="${PAD.top + plotH}"/>`,
    `<line class="chart-axis" x1="${PAD.left}" x2="${PAD.left + plotW}" y1="${PAD.top + plotH}" y2="${PAD.top + plotH}"/>`,
  ];
  for (const frac of [0, 0.5, 1]) {
    const y = PAD.top + plotH - frac * plotH;
    parts.push(`<text x="${PAD.left - 6}" y="${round(y + 4)}" text-anchor="end" class="chart-tick">${fmtTick(frac * yMax)}</text>`);
  }
  const baseY = PAD.top + plotH + 16;
  parts.push(`<text x="${PAD.left}" y="${baseY}" class="chart-tick">${fmtTick(xMin)}</text>`);
  parts.push(`<text x="${PAD.left + plotW}" y="${baseY}" text-anchor="end" class="chart-tick">${fmtTick(xMax)}</text>`);
  if (options.xLabel) {
    parts.push(`<text x="${PAD.left + plotW / 2}" y="${baseY}" text-anchor="middle" class="chart-tick">${escapeHtml(options.xLabel)}</text>`);
  }
  if (options.yLabel) {
    parts.push(`<text x="12" y="${PAD.top + plotH / 2}" transform="rotate(-90 12 ${PAD.top + plotH / 2})" text-anchor="middle" class="chart-tick">${escapeHtml(options.yLabel)}</text>`);
  }
  return parts.join('\n  ');
}

function emptyChart(title: string, width: number, height: number): string {
  return `<svg class="chart" viewBox="0 0 ${width} ${height}" role="img" aria-label="${escapeHtml(title)}">
  <text x="${PAD.left}" y="16" class="chart-title">${escapeHtml(title)}</text>
  <text x="${width / 2}" y="${height / 2}" text-anchor="middle" class="chart-tick">No data</text>
</svg>`;
}

/** @internal Exported for tests. */
export function fmtTick(v: number): string {
  if (v === 0) return '0';
  const abs = Math.abs(v);
  if (abs >= 100) return v.toFixed(0);
  if (abs >= 10) return v.toFixed(1);
  return v.toFixed(2);
}

function round(v: number): number {
  return Math.round(v * 10) / 10;
}
