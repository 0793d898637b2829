/**
 * Generate a self-contained HTML profile report from a ProfileResult.
 *
 * All CSS is inlined and charts are inline SVG, so the output HTML file has
 * zero external dependencies.
 */

import type { CategorySummary, GroupSummary, ProfileResult } from '../aggregation/types';
import type { HtmlReportOptions } from './types';
import type { ProfileComparison } from './compare';
import { buildLegends, DEFAULT_LEGEND_BINS } from './legends';
import type { Legend } from './legends';
import { DEFAULT_TOP_N_SLOWEST, slowestLayers, statOrNull } from './summary';
import { escapeHtml, fmtDelta, fmtDuration, fmtNum, fmtPct, svgBarChart, svgLineChart } from './htmlHelpers';

/**
 * Generate a complete, self-contained HTML report.
 */
export function generateHtmlReport(result: ProfileResult, options: HtmlReportOptions = {}): string {
  const {
    fileName,
    theme = 'dark',
    bins = DEFAULT_LEGEND_BINS,
    legends: showLegends = true,
    topNSlowest = DEFAULT_TOP_N_SLOWEST,
    comparison,
    generatedAt = new Date(),
  } = options;

  const legends = buildLegends(result, bins);

  return `<!DOCTYPE html>
<html lang="en" data-theme="${theme}">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>LayerLens Report${fileName ? ` — ${escapeHtml(fileName)}` : ''}</title>
${generateStyles()}
</head>
<body>
${generateHeader(result, fileName, generatedAt)}
<div class="container">
${generateStatsCards(result)}
${generateCharts(result, legends.flow)}
${comparison ? generateComparison(comparison) : ''}
${generateSlowestLayers(slowestLayers(result.groups, topNSlowest))}
${generateFeatureTypes(result.categories)}
${showLegends ? generateLegendTables([legends.speed, legends.fan, legends.hotend, legends.bed, legends.layerHeight]) : ''}
${generateLayersTable(result.groups)}
${generateIssues(result)}
</div>
</body>
</html>`;
}

function generateStyles(): string {
  return `<style>
:root, [data-theme="dark"] {
  --bg-primary: #0e1116;
  --bg-secondary: #161b22;
  --bg-card: #1c2230;
  --text-primary: #e6edf3;
  --text-secondary: #9da7b3;
  --text-muted: #6e7681;
  --accent: #f0883e;
  --accent-blue: #58a6ff;
  --accent-green: #3fb950;
  --accent-red: #f85149;
  --border-color: #30363d;
  --border-subtle: #21262d;
  --radius: 8px;
  --shadow: 0 2px 8px rgba(0,0,0,0.3);
}
[data-theme="light"] {
  --bg-primary: #ffffff;
  --bg-secondary: #f6f8fa;
  --bg-card: #ffffff;
  --text-primary: #1f2328;
  --text-secondary: #57606a;
  --text-muted: #8c959f;
  --accent: #bc4c00;
  --accent-blue: #0969da;
  --accent-green: #1a7f37;
  --accent-red: #cf222e;
  --border-color: #d0d7de;
  --border-subtle: #eaeef2;
  --shadow: 0 1px 3px rgba(0,0,0,0.08);
}

* { margin: 0; padding: 0; box-sizing: border-box; }

body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
  background: var(--bg-primary);
  color: var(--text-primary);
  line-height: 1.6;
  min-height: 100vh;
}

.container { max-width: 1100px; margin: 0 auto; padding: 20px; }

/* Header */
.header {
  background: linear-gradient(135deg, var(--bg-secondary), var(--bg-card));
  border-bottom: 2px solid var(--accent);
  padding: 24px 0;
}
.header-inner {
  max-width: 1100px;
  margin: 0 auto;
  padding: 0 20px;
  display: flex;
  align-items: center;
  gap: 16px;
  flex-wrap: wrap;
}
.logo-text { font-size: 22px; font-weight: 700; color: var(--accent); }
.header-meta { margin-left: auto; text-align: right; color: var(--text-secondary); font-size: 13px; }
.header-meta .file { font-family: monospace; color: var(--text-muted); }

/* Stats Cards */
.stats-grid {
  display: grid;
  grid-template-columns: repeat(auto-fit, minmax(160px, 1fr));
  gap: 12px;
  margin-bottom: 24px;
}
.stat-card {
  background: var(--bg-card);
  border: 1px solid var(--border-color);
  border-radius: var(--radius);
  padding: 16px;
  box-shadow: var(--shadow);
}
.stat-card .label { color: var(--text-muted); font-size: 12px; text-transform: uppercase; letter-spacing: 0.5px; }
.stat-card .value { font-size: 22px; font-weight: 700; color: var(--accent); margin-top: 4px; }
.stat-card .sub { color: var(--text-secondary); font-size: 12px; margin-top: 2px; }

/* Charts */
.charts { display: grid; grid-template-columns: repeat(auto-fit, minmax(480px, 1fr)); gap: 12px; margin-bottom: 24px; }
.chart { width: 100%; height: auto; background: var(--bg-card); border: 1px solid var(--border-color); border-radius: var(--radius); }
.chart-title { fill: var(--text-primary); font-size: 13px; font-weight: 600; }
.chart-tick, .chart-legend { fill: var(--text-muted); font-size: 11px; }
.chart-axis { stroke: var(--border-color); }
.chart-limit { stroke: var(--accent-red); }
.chart-bar { fill: var(--accent-blue); }

/* Tables */
.section { margin-bottom: 24px; overflow-x: auto; }
.section-title {
  font-size: 16px;
  font-weight: 600;
  margin-bottom: 12px;
  padding-bottom: 8px;
  border-bottom: 1px solid var(--border-color);
}
table {
  width: 100%;
  border-collapse: collapse;
  background: var(--bg-card);
  border-radius: var(--radius);
  overflow: hidden;
  box-shadow: var(--shadow);
}
th {
  background: var(--bg-secondary);
  color: var(--text-secondary);
  font-size: 12px;
  text-transform: uppercase;
  letter-spacing: 0.5px;
  padding: 8px 12px;
  text-align: left;
  font-weight: 600;
}
td { padding: 6px 12px; border-top: 1px solid var(--border-subtle); font-size: 13px; font-variant-numeric: tabular-nums; }
tr:hover td { background: rgba(88,166,255,0.05); }
.over { color: var(--accent-red); font-weight: 600; }
.delta-up { color: var(--accent-red); }
.delta-down { color: var(--accent-green); }
details summary { cursor: pointer; color: var(--text-secondary); margin-bottom: 8px; }

@media (max-width: 640px) {
  .container { padding: 12px; }
  .header-inner { flex-direction: column; align-items: flex-start; }
  .header-meta { margin-left: 0; text-align: left; }
  .stats-grid { grid-template-columns: repeat(2, 1fr); }
  .charts { grid-template-columns: 1fr; }
}
</style>`;
}

function generateHeader(result: ProfileResult, fileName: string | undefined, generatedAt: Date): string {
  return `<div class="header">
  <div class="header-inner">
    <span class="logo-text">LayerLens</span>
    <div class="header-meta">
      <div>Profile Report &middot; ${escapeHtml(generatedAt.toISOString())} &middot; layers: ${escapeHtml(result.boundaryStrategy)}</div>
      ${fileName ? `<div class="file">${escapeHtml(fileName)}</div>` : ''}
    </div>
  </div>
</div>`;
}

function generateStatsCards(result: ProfileResult): string {
  const { totals, overall, config } = result;
  const cards = [
    { label: 'Layers', value: String(totals.layerCount), sub: `${totals.eventCount} moves` },
    { label: 'Print Time', value: fmtDuration(totals.timeS), sub: `${fmtDuration(totals.travelTimeS)} travel` },
    { label: 'Filament', value: `${fmtNum(totals.filamentUsedM)} m`, sub: `${fmtNum(totals.filamentUsedG)} g` },
    {
      label: 'P95 Speed',
      value: `${fmtNum(overall.speed.p95)} mm/s`,
      sub: config.maxPrintSpeedMmS !== null ? `${fmtPct(overall.speed.overLimitFraction)} over ${fmtNum(config.maxPrintSpeedMmS)}` : `peak ${fmtNum(overall.speed.peak)}`,
    },
    {
      label: 'P95 Flow',
      value: `${fmtNum(overall.flow.p95)} mm³/s`,
      sub: config.maxVolumetricFlowMm3S !== null ? `${fmtPct(overall.flow.overLimitFraction)} over ${fmtNum(config.maxVolumetricFlowMm3S)}` : `peak ${fmtNum(overall.flow.peak)}`,
    },
    { label: 'Retractions', value: String(totals.retractCount), sub: `${fmtNum(totals.retractionMm)} mm` },
  ];

  return `<div class="stats-grid">
${cards.map(c => `  <div class="stat-card">
    <div class="label">${c.label}</div>
    <div class="value">${escapeHtml(c.value)}</div>
    ${c.sub ? `<div class="sub">${escapeHtml(c.sub)}</div>` : ''}
  </div>`).join('\n')}
</div>`;
}

function generateCharts(result: ProfileResult, flowLegend: Legend): string {
  const groups = result.groups;
  const zs = groups.map(g => g.z);
  const { config } = result;

  const charts = [
    svgLineChart(zs, [{ name: 'Time (s)', values: groups.map(g => g.timeS), color: 'var(--accent)' }], {
      title: 'Layer time (s) by Z', xLabel: 'Z (mm)',
    }),
    svgLineChart(zs, [{ name: 'P95 speed', values: groups.map(g => statOrNull(g.speed, 'p95')), color: 'var(--accent-blue)' }], {
      title: 'P95 speed (mm/s) by Z', xLabel: 'Z (mm)', limit: config.maxPrintSpeedMmS,
    }),
    svgLineChart(zs, [{ name: 'P95 flow', values: groups.map(g => statOrNull(g.flow, 'p95')), color: 'var(--accent-green)' }], {
      title: 'P95 flow (mm³/s) by Z', xLabel: 'Z (mm)', limit: config.maxVolumetricFlowMm3S,
    }),
    svgBarChart(
      flowLegend.bins.map(b => ({ label: `${fmtNum(b.lo)}–${fmtNum(b.hi)}`, value: b.count })),
      { title: 'Flow distribution (mm³/s, moves per bin)' },
    ),
  ];

  return `<div class="charts">
${charts.join('\n')}
</div>`;
}

function generateComparison(comparison: ProfileComparison): string {
  const rows = comparison.metrics.map(m => {
    const cls = m.delta === null || m.delta === 0 ? '' : m.delta > 0 ? 'delta-up' : 'delta-down';
    const label = m.unit ? `${m.label} (${m.unit})` : m.label;
    return `<tr><td>${escapeHtml(label)}</td><td>${fmtNum(m.a)}</td><td>${fmtNum(m.b)}</td><td class="${cls}">${fmtDelta(m.delta)}</td></tr>`;
  }).join('\n');

  const zs = comparison.alignment.map(r => r.z);
  const chart = svgLineChart(zs, [
    { name: comparison.labelA, values: comparison.alignment.map(r => (r.a ? r.a.timeS : null)), color: 'var(--accent)' },
    { name: comparison.labelB, values: comparison.alignment.map(r => (r.b ? r.b.timeS : null)), color: 'var(--accent-blue)' },
  ], { title: 'Layer time (s) by Z', xLabel: 'Z (mm)' });

  return `<div class="section">
<div class="section-title">Comparison: ${escapeHtml(comparison.labelA)} vs ${escapeHtml(comparison.labelB)}</div>
<table>
<thead><tr><th>Metric</th><th>${escapeHtml(comparison.labelA)}</th><th>${escapeHtml(comparison.labelB)}</th><th>Delta</th></tr></thead>
<tbody>${rows}</tbody>
</table>
<div class="charts" style="margin-top:12px">${chart}</div>
</div>`;
}

function generateSlowestLayers(layers: readonly GroupSummary[]): string {
  if (layers.length === 0) return '';

  const rows = layers.map(g =>
    `<tr><td>${g.index}</td><td>${fmtNum(g.z, 3)}</td><td>${fmtDuration(g.timeS)}</td><td>${fmtNum(statOrNull(g.speed, 'p95'))}</td><td>${fmtNum(statOrNull(g.flow, 'p95'))}</td><td>${g.dynamicsScore}</td></tr>`
  ).join('\n');

  return `<div class="section">
<div class="section-title">Slowest Layers</div>
<table>
<thead><tr><th>Layer</th><th>Z (mm)</th><th>Time</th><th>P95 Speed</th><th>P95 Flow</th><th>Short Fast Moves</th></tr></thead>
<tbody>${rows}</tbody>
</table>
</div>`;
}

function generateFeatureTypes(categories: readonly CategorySummary[]): string {
  if (categories.length === 0) return '';

  const rows = categories.map(c =>
    `<tr><td>${escapeHtml(c.label)}</td><td>${fmtDuration(c.timeS)}</td><td>${fmtPct(c.timeShare)}</td><td>${fmtNum(c.filamentUsedM)}</td><td>${fmtNum(c.filamentUsedG)}</td><td>${fmtNum(statOrNull(c.speed, 'p95'))}</td><td>${fmtNum(statOrNull(c.flow, 'p95'))}</td><td>${fmtNum(c.flowPeakSuppressed)}</td><td>${c.eventCount}</td></tr>`
  ).join('\n');

  return `<div class="section">
<div class="section-title">Feature Types</div>
<table>
<thead><tr><th>Type</th><th>Time</th><th>Share</th><th>Filament (m)</th><th>Filament (g)</th><th>P95 Speed</th><th>P95 Flow</th><th>Peak Flow</th><th>Moves</th></tr></thead>
<tbody>${rows}</tbody>
</table>
</div>`;
}

function generateLegendTables(legends: readonly Legend[]): string {
  const withData = legends.filter(l => l.bins.length > 0);
  if (withData.length === 0) return '';

  const tables = withData.map(l => {
    const rows = l.bins.map((b, i) => `<tr><td>${i + 1}</td><td>${fmtNum(b.lo)} – ${fmtNum(b.hi)}</td><td>${b.count}</td></tr>`).join('\n');
    return `<details>
<summary>${escapeHtml(l.name)} (${escapeHtml(l.unit)})</summary>
<table>
<thead><tr><th>Bin</th><th>Range</th><th>Count</th></tr></thead>
<tbody>${rows}</tbody>
</table>
</details>`;
  });

  return `<div class="section">
<div class="section-title">Legends</div>
${tables.join('\n')}
</div>`;
}

function generateLayersTable(groups: readonly GroupSummary[]): string {
  if (groups.length === 0) {
    return `<div class="section"><div class="section-title">Layers</div><em>No moves found</em></div>`;
  }

  const rows = groups.map(g => {
    const heightCls = g.layerHeightInRange === false ? ' class="over"' : '';
    const flowCls = g.flowHeadroomP99 !== null && g.flowHeadroomP99 < 0 ? ' class="over"' : '';
    const speedCls = g.speedHeadroomP99 !== null && g.speedHeadroomP99 < 0 ? ' class="over"' : '';
    return `<tr><td>${g.index}</td><td>${fmtNum(g.z, 3)}</td><td${heightCls}>${fmtNum(g.layerHeightMm, 3)}</td><td>${fmtDuration(g.timeS)}</td><td>${fmtNum(statOrNull(g.speed, 'p95'))}</td><td${speedCls}>${fmtNum(g.speedHeadroomP99)}</td><td>${fmtNum(statOrNull(g.flow, 'p95'))}</td><td${flowCls}>${fmtNum(g.flowHeadroomP99)}</td><td>${g.retractCount}</td><td>${fmtNum(g.meanFanPct, 0)}</td></tr>`;
  }).join('\n');

  return `<div class="section">
<details>
<summary>Layers (${groups.length})</summary>
<table>
<thead><tr><th>Layer</th><th>Z</th><th>Height</th><th>Time</th><th>P95 Speed</th><th>Speed Headroom</th><th>P95 Flow</th><th>Flow Headroom</th><th>Retracts</th><th>Fan %</th></tr></thead>
<tbody>${rows}</tbody>
</table>
</details>
</div>`;
}

function generateIssues(result: ProfileResult): string {
  const total = Object.values(result.issueCounts).reduce((sum, n) => sum + n, 0);
  if (total === 0) return '';

  const counts = Object.entries(result.issueCounts)
    .filter(([, n]) => n > 0)
    .map(([kind, n]) => `<tr><td>${escapeHtml(kind)}</td><td>${n}</td></tr>`)
    .join('\n');
  const samples = result.issues.slice(0, 50).map(issue => {
    const detail = issue.kind === 'malformed-field' ? `${issue.field.toUpperCase()}${issue.text}` : issue.message;
    return `<tr><td>${issue.lineNumber}</td><td>${escapeHtml(issue.kind)}</td><td>${escapeHtml(detail)}</td></tr>`;
  }).join('\n');

  return `<div class="section">
<div class="section-title">Issues</div>
<table>
<thead><tr><th>Kind</th><th>Count</th></tr></thead>
<tbody>${counts}</tbody>
</table>
<details style="margin-top:12px">
<summary>First ${Math.min(50, result.issues.length)} issues</summary>
<table>
<thead><tr><th>Line</th><th>Kind</th><th>Detail</th></tr></thead>
<tbody>${samples}</tbody>
</table>
</details>
</div>`;
}
