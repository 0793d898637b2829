/**
 * Profile dump formatters for text, markdown and JSON output.
 *
 * Shared by the `summary` and `compare` commands so every surface prints
 * the same numbers from a ProfileResult.
 *
 * @module formatters/profileDump
 */

import type { CategorySummary, MetricStats, ProfileResult } from '../aggregation/types';
import type { AlignedLayer, LayerAlignmentRow, ProfileComparison } from '../report/compare';
import { buildJsonSummary, DEFAULT_TOP_N_SLOWEST, slowestLayers, statOrNull } from '../report/summary';

/** Options for text and markdown formatters. */
export interface ProfileDumpOptions {
  /** Terminal width for text output (default 100). */
  width?: number;
  /** Slowest layers listed (default 10). */
  topNSlowest?: number;
  /** G-code file name shown in the header. */
  fileName?: string;
}

// ── JSON output ──

/**
 * Serialize the regression summary plus per-layer and per-feature rows as
 * pretty-printed JSON. Per-event detail is left out.
 */
export function formatProfileJson(result: ProfileResult, options: ProfileDumpOptions = {}): string {
  const payload = {
    file: options.fileName ?? null,
    summary: buildJsonSummary(result),
    overall: result.overall,
    categories: result.categories,
    slowestLayers: slowestLayers(result.groups, options.topNSlowest ?? DEFAULT_TOP_N_SLOWEST).map(g => g.index),
    layers: result.groups,
    issues: result.issues,
  };
  return JSON.stringify(payload, null, 2) + '\n';
}

// ── Text output ──

/**
 * Format a profile as a plain-text report.
 */
export function formatProfileText(result: ProfileResult, options: ProfileDumpOptions = {}): string {
  const width = options.width ?? 100;
  const topN = options.topNSlowest ?? DEFAULT_TOP_N_SLOWEST;
  const lines: string[] = [];
  const hr = '─'.repeat(Math.min(width, 80));
  const { totals, config } = result;

  lines.push(hr);
  lines.push(formatHeader(result, options.fileName));
  lines.push(hr);
  lines.push('');

  lines.push(`Time: ${fmtDuration(totals.timeS)} (travel ${fmtDuration(totals.travelTimeS)}, extrude ${fmtDuration(totals.extrudeTimeS)})`);
  lines.push(`Filament: ${fmtNum(totals.filamentUsedM)} m, ${fmtNum(totals.filamentUsedG)} g`);
  lines.push(`Retractions: ${totals.retractCount} (${fmtNum(totals.retractionMm)} mm)`);
  lines.push(formatMetricLine('Speed', result.overall.speed, 'mm/s', config.maxPrintSpeedMmS));
  lines.push(formatMetricLine('Flow', result.overall.flow, 'mm³/s', config.maxVolumetricFlowMm3S));
  lines.push('');

  if (result.categories.length > 0) {
    lines.push('Feature types:');
    const labelWidth = Math.min(
      Math.max(...result.categories.map(c => c.label.length)),
      Math.max(10, width - 60),
    );
    for (const c of result.categories) {
      lines.push(`  ${truncateToWidth(c.label, labelWidth).padEnd(labelWidth)}  ${formatCategoryStats(c)}`);
    }
    lines.push('');
  }

  const slowest = slowestLayers(result.groups, topN);
  if (slowest.length > 0) {
    lines.push(`Slowest layers (top ${slowest.length}):`);
    for (const g of slowest) {
      lines.push(
        `  #${String(g.index).padEnd(5)} z=${fmtNum(g.z, 3).padEnd(8)} ${fmtDuration(g.timeS).padEnd(10)}` +
        ` P95 speed ${fmtNum(statOrNull(g.speed, 'p95'))} mm/s, P95 flow ${fmtNum(statOrNull(g.flow, 'p95'))} mm³/s`,
      );
    }
    lines.push('');
  }

  const issueLine = formatIssueCounts(result);
  if (issueLine) {
    lines.push(`Issues: ${issueLine}`);
    lines.push('');
  }

  return lines.join('\n');
}

// ── Markdown output ──

/**
 * Format a profile as a markdown report.
 */
export function formatProfileMarkdown(result: ProfileResult, options: ProfileDumpOptions = {}): string {
  const topN = options.topNSlowest ?? DEFAULT_TOP_N_SLOWEST;
  const { totals, config } = result;
  const lines: string[] = [];

  lines.push('# G-code Profile');
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  if (options.fileName) {
    lines.push(`| File | \`${options.fileName}\` |`);
  }
  lines.push(`| Layers | ${totals.layerCount} |`);
  lines.push(`| Moves | ${totals.eventCount} |`);
  lines.push(`| Total time | ${fmtDuration(totals.timeS)} |`);
  lines.push(`| Travel time | ${fmtDuration(totals.travelTimeS)} |`);
  lines.push(`| Extrude time | ${fmtDuration(totals.extrudeTimeS)} |`);
  lines.push(`| Filament | ${fmtNum(totals.filamentUsedM)} m / ${fmtNum(totals.filamentUsedG)} g |`);
  lines.push(`| Retractions | ${totals.retractCount} (${fmtNum(totals.retractionMm)} mm) |`);
  lines.push(`| Layer detection | ${result.boundaryStrategy} |`);
  lines.push('');

  lines.push('## Speed and Flow');
  lines.push('');
  lines.push('| Metric | Mean | P95 | P99 | Peak | Over limit |');
  lines.push('|--------|------|-----|-----|------|------------|');
  lines.push(formatMetricRow('Speed (mm/s)', result.overall.speed, config.maxPrintSpeedMmS));
  lines.push(formatMetricRow('Flow (mm³/s)', result.overall.flow, config.maxVolumetricFlowMm3S));
  lines.push('');

  if (result.categories.length > 0) {
    lines.push('## Feature Types');
    lines.push('');
    lines.push('| Type | Time | Share | Filament (m) | Filament (g) | P95 flow | Peak flow |');
    lines.push('|------|------|-------|--------------|--------------|----------|-----------|');
    for (const c of result.categories) {
      lines.push(
        `| ${c.label} | ${fmtDuration(c.timeS)} | ${fmtPct(c.timeShare)} | ${fmtNum(c.filamentUsedM)} | ` +
        `${fmtNum(c.filamentUsedG)} | ${fmtNum(statOrNull(c.flow, 'p95'))} | ${fmtNum(c.flowPeakSuppressed)} |`,
      );
    }
    lines.push('');
  }

  const slowest = slowestLayers(result.groups, topN);
  if (slowest.length > 0) {
    lines.push('## Slowest Layers');
    lines.push('');
    lines.push('| Layer | Z (mm) | Time | P95 speed | P95 flow |');
    lines.push('|-------|--------|------|-----------|----------|');
    for (const g of slowest) {
      lines.push(`| ${g.index} | ${fmtNum(g.z, 3)} | ${fmtDuration(g.timeS)} | ${fmtNum(statOrNull(g.speed, 'p95'))} | ${fmtNum(statOrNull(g.flow, 'p95'))} |`);
    }
    lines.push('');
  }

  const issueLine = formatIssueCounts(result);
  if (issueLine) {
    lines.push('## Issues');
    lines.push('');
    lines.push(issueLine);
    lines.push('');
  }

  return lines.join('\n');
}

// ── Comparison output ──

export function formatComparisonText(comparison: ProfileComparison, options: { alignmentRows?: number } = {}): string {
  const lines: string[] = [];
  const { labelA, labelB } = comparison;
  const colA = Math.max(12, labelA.length);
  const colB = Math.max(12, labelB.length);

  lines.push(`${'Metric'.padEnd(24)} ${labelA.padStart(colA)} ${labelB.padStart(colB)} ${'Delta'.padStart(12)}`);
  for (const row of comparison.metrics) {
    const label = row.unit ? `${row.label} (${row.unit})` : row.label;
    lines.push(
      `${label.padEnd(24)} ${fmtNum(row.a).padStart(colA)} ${fmtNum(row.b).padStart(colB)} ${fmtDelta(row.delta).padStart(12)}`,
    );
  }

  const rows = alignmentSlice(comparison, options.alignmentRows);
  if (rows.length > 0) {
    lines.push('');
    lines.push('Layers by Z:');
    lines.push(`  ${'Z (mm)'.padEnd(10)} ${`${labelA} layer`.padEnd(colA + 6)} ${`${labelB} layer`.padEnd(colB + 6)}`);
    for (const row of rows) {
      const a = formatAlignedLayer(row.a);
      const b = formatAlignedLayer(row.b);
      lines.push(`  ${fmtNum(row.z, 3).padEnd(10)} ${a.padEnd(colA + 6)} ${b.padEnd(colB + 6)}`.trimEnd());
    }
  }

  lines.push('');
  return lines.join('\n');
}

export function formatComparisonMarkdown(
  comparison: ProfileComparison,
  options: { alignmentRows?: number } = {},
): string {
  const { labelA, labelB } = comparison;
  const lines: string[] = [];
  lines.push('# G-code Comparison');
  lines.push('');
  lines.push(`| Metric | ${labelA} | ${labelB} | Delta |`);
  lines.push('|--------|------|------|-------|');
  for (const row of comparison.metrics) {
    const label = row.unit ? `${row.label} (${row.unit})` : row.label;
    lines.push(`| ${label} | ${fmtNum(row.a)} | ${fmtNum(row.b)} | ${fmtDelta(row.delta)} |`);
  }
  lines.push('');

  const rows = alignmentSlice(comparison, options.alignmentRows);
  if (rows.length > 0) {
    lines.push('## Layers by Z');
    lines.push('');
    lines.push(`| Z (mm) | ${labelA} layer | ${labelB} layer |`);
    lines.push('|--------|------|------|');
    for (const row of rows) {
      lines.push(`| ${fmtNum(row.z, 3)} | ${formatAlignedLayer(row.a)} | ${formatAlignedLayer(row.b)} |`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

function alignmentSlice(comparison: ProfileComparison, limit: number | undefined): LayerAlignmentRow[] {
  return comparison.alignment.slice(0, limit ?? comparison.alignment.length);
}

function formatAlignedLayer(layer: AlignedLayer | null): string {
  return layer ? `#${layer.index} ${fmtDuration(layer.timeS)}` : '-';
}

// ── Formatting helpers ──

function formatHeader(result: ProfileResult, fileName: string | undefined): string {
  const parts: string[] = [];
  if (fileName) parts.push(fileName);
  parts.push(`${result.totals.layerCount} layers`);
  parts.push(`${result.totals.eventCount} moves`);
  parts.push(fmtDuration(result.totals.timeS));
  parts.push(`layers: ${result.boundaryStrategy}`);
  return parts.join(' | ');
}

function formatMetricLine(name: string, stats: MetricStats, unit: string, limit: number | null): string {
  const base = `${name}: mean ${fmtNum(stats.mean)}, P95 ${fmtNum(stats.p95)}, P99 ${fmtNum(stats.p99)}, peak ${fmtNum(stats.peak)} ${unit}`;
  if (limit === null) return base;
  return `${base} (limit ${fmtNum(limit)}, ${fmtPct(stats.overLimitFraction)} of time over)`;
}

function formatMetricRow(name: string, stats: MetricStats, limit: number | null): string {
  const over = limit === null ? '-' : fmtPct(stats.overLimitFraction);
  return `| ${name} | ${fmtNum(stats.mean)} | ${fmtNum(stats.p95)} | ${fmtNum(stats.p99)} | ${fmtNum(stats.peak)} | ${over} |`;
}

function formatCategoryStats(c: CategorySummary): string {
  return [
    fmtPct(c.timeShare).padStart(6),
    fmtDuration(c.timeS).padStart(10),
    `flow P95 ${fmtNum(statOrNull(c.flow, 'p95'))}`,
    `peak ${fmtNum(c.flowPeakSuppressed)} mm³/s`,
    `${fmtNum(c.filamentUsedM)} m`,
  ].join('  ');
}

function formatIssueCounts(result: ProfileResult): string {
  const parts: string[] = [];
  for (const [kind, count] of Object.entries(result.issueCounts)) {
    if (count > 0) parts.push(`${count} ${kind}`);
  }
  return parts.join(', ');
}

/** @internal Exported for tests. */
export function fmtDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return '0s';
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  if (hours > 0) return `${hours}h ${minutes}m ${secs}s`;
  return `${minutes}m ${secs}s`;
}

/** @internal Exported for tests. */
export function fmtNum(value: number | null, digits = 2): string {
  if (value === null || !Number.isFinite(value)) return '-';
  return value.toFixed(digits);
}

/** @internal Exported for tests. */
export function fmtPct(fraction: number | null, digits = 1): string {
  if (fraction === null || !Number.isFinite(fraction)) return '-';
  return `${(fraction * 100).toFixed(digits)}%`;
}

/** @internal Exported for tests. */
export function fmtDelta(value: number | null, digits = 2): string {
  if (value === null || !Number.isFinite(value)) return '-';
  return value > 0 ? `+${value.toFixed(digits)}` : value.toFixed(digits);
}

function truncateToWidth(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, Math.max(1, maxLen - 3)) + '...';
}
