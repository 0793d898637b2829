/**
 * CSV and JSON sidecar files written next to a report.
 *
 * Builders are pure (rows in, CSV text out); `writeCsvExports` does the
 * file I/O and records a sha256 manifest of everything it wrote.
 *
 * @module report/csvExports
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import type { GroupSummary, ProfileResult } from '../aggregation/types';
import { UNCATEGORIZED_LABEL } from '../aggregation/CategoryAggregator';
import type { MotionEvent } from '../types/motion';
import { timeHistogram } from '../stats/weighted';
import { buildJsonSummary, statOrNull } from './summary';

export const FEATURE_FLOW_BINS = 20;

export type CsvCell = string | number | boolean | null;

export interface FeatureFlowRow {
  type: string;
  binLo: number;
  binHi: number;
  timeS: number;
  /** Share of total extrusion time; null when there was none. */
  timePct: number | null;
}

export interface ManifestEntry {
  path: string;
  bytes: number;
  sha256: string;
}

export interface ExportManifest {
  generatedAt: string;
  input: ManifestEntry | null;
  files: ManifestEntry[];
}

export interface CsvExportOptions {
  /** G-code the profile came from; hashed into the manifest. */
  inputPath?: string;
  /** Skip the per-event CSV. */
  perLayerOnly?: boolean;
  /** Rows in the top-flow-segments CSV (default: all kept). */
  topNSegments?: number;
}

// ── CSV text ──

/** @internal Exported for tests. */
export function csvCell(value: CsvCell): string {
  if (value === null) return '';
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(header: readonly string[], rows: readonly CsvCell[][]): string {
  const lines = [header.map(csvCell).join(',')];
  for (const row of rows) lines.push(row.map(csvCell).join(','));
  return lines.join('\n') + '\n';
}

// ── Builders ──

const LAYER_COLUMNS = [
  'layer', 'z_mm', 'layer_height_mm', 'time_s', 'dist_mm', 'extrusion_mm',
  'avg_speed_mm_s', 'avg_flow_mm3_s',
  'peak_speed_mm_s', 'p95_speed_mm_s', 'p99_speed_mm_s',
  'peak_flow_mm3_s', 'p95_flow_mm3_s', 'p99_flow_mm3_s',
  'flow_headroom_p99_mm3_s', 'speed_headroom_p99_mm_s',
  'travel_time_s', 'travel_dist_mm', 'extrude_time_s',
  'retract_count', 'retract_mm', 'dynamics_score',
  'mean_fan_pct', 'hotend_c', 'bed_c', 'layer_height_in_range',
] as const;

export function buildLayersCsv(groups: readonly GroupSummary[]): string {
  const rows = groups.map((g): CsvCell[] => [
    g.index, g.z, g.layerHeightMm, g.timeS, g.distanceMm, g.extrusionMm,
    statOrNull(g.speed, 'mean'), statOrNull(g.flow, 'mean'),
    statOrNull(g.speed, 'peak'), statOrNull(g.speed, 'p95'), statOrNull(g.speed, 'p99'),
    statOrNull(g.flow, 'peak'), statOrNull(g.flow, 'p95'), statOrNull(g.flow, 'p99'),
    g.flowHeadroomP99, g.speedHeadroomP99,
    g.travelTimeS, g.travelDistanceMm, g.extrudeTimeS,
    g.retractCount, g.retractionMm, g.dynamicsScore,
    g.meanFanPct, g.hotendC, g.bedC, g.layerHeightInRange,
  ]);
  return toCsv(LAYER_COLUMNS, rows);
}

const SEGMENT_COLUMNS = [
  'rank', 'layer', 'type', 'z_mm', 'x0', 'y0', 'x1', 'y1',
  'dist_mm', 'de_mm', 'time_s', 'speed_mm_s', 'flow_mm3_s', 'line',
] as const;

export function buildTopSegmentsCsv(segments: readonly MotionEvent[], limit = segments.length): string {
  const rows = segments.slice(0, Math.max(0, limit)).map((e, i): CsvCell[] => [
    i + 1, e.layer, e.category, e.z, e.from.x, e.from.y, e.to.x, e.to.y,
    e.distanceMm, e.extrusionMm, e.durationS, e.speedMmS, e.flowMm3S, e.lineNumber,
  ]);
  return toCsv(SEGMENT_COLUMNS, rows);
}

const EVENT_COLUMNS = [
  'index', 'line', 'command', 'layer', 'layer_z_mm', 'type',
  'x0', 'y0', 'z0', 'x1', 'y1', 'z1',
  'dist_mm', 'de_mm', 'retract_mm', 'feedrate_mm_min', 'speed_mm_s', 'time_s', 'flow_mm3_s',
  'fan_pct', 'hotend_c', 'bed_c', 'chamber_c',
] as const;

export function buildEventsCsv(events: readonly MotionEvent[]): string {
  const rows = events.map((e): CsvCell[] => [
    e.index, e.lineNumber, e.command, e.layer, e.layerZ, e.category,
    e.from.x, e.from.y, e.from.z, e.to.x, e.to.y, e.to.z,
    e.distanceMm, e.extrusionMm, e.retractionMm, e.feedrateMmPerMin, e.speedMmS, e.durationS, e.flowMm3S,
    e.fanPct, e.hotendC, e.bedC, e.chamberC,
  ]);
  return toCsv(EVENT_COLUMNS, rows);
}

/**
 * Time spent per feature type in each flow bin. Bins span 0 to the larger
 * of the observed peak flow and the configured limit.
 */
export function buildFeatureFlowHistogram(
  events: readonly MotionEvent[],
  flowLimit: number | null,
  binCount = FEATURE_FLOW_BINS,
): FeatureFlowRow[] {
  const byType = new Map<string, Array<{ value: number; weight: number }>>();
  let maxFlow = 0;
  let totalTime = 0;
  for (const e of events) {
    if (e.extrusionMm <= 0 || e.durationS <= 0 || e.flowMm3S <= 0) continue;
    const label = e.category ?? UNCATEGORIZED_LABEL;
    let samples = byType.get(label);
    if (!samples) {
      samples = [];
      byType.set(label, samples);
    }
    samples.push({ value: e.flowMm3S, weight: e.durationS });
    if (e.flowMm3S > maxFlow) maxFlow = e.flowMm3S;
    totalTime += e.durationS;
  }
  if (byType.size === 0) return [];

  const range = { min: 0, max: flowLimit !== null ? Math.max(maxFlow, flowLimit) : maxFlow };
  const ordered = [...byType].sort((a, b) => sumWeights(b[1]) - sumWeights(a[1]));

  const rows: FeatureFlowRow[] = [];
  for (const [type, samples] of ordered) {
    const { binEdges, counts } = timeHistogram(samples, binCount, range);
    counts.forEach((timeS, i) => {
      rows.push({
        type,
        binLo: binEdges[i],
        binHi: binEdges[i + 1],
        timeS,
        timePct: totalTime > 0 ? timeS / totalTime : null,
      });
    });
  }
  return rows;
}

export function buildFeatureFlowCsv(rows: readonly FeatureFlowRow[]): string {
  return toCsv(
    ['type', 'bin_lo', 'bin_hi', 'time_s', 'time_pct'],
    rows.map(r => [r.type, r.binLo, r.binHi, r.timeS, r.timePct]),
  );
}

// ── File output ──

/** Sidecar paths for an output base such as `out/part` → `out/part_layers.csv`. */
export function sidecarPaths(basePath: string): {
  layers: string;
  topSegments: string;
  featureFlow: string;
  events: string;
  summary: string;
  manifest: string;
} {
  return {
    layers: `${basePath}_layers.csv`,
    topSegments: `${basePath}_top_flow_segments.csv`,
    featureFlow: `${basePath}_feature_flow_hist.csv`,
    events: `${basePath}_events.csv`,
    summary: `${basePath}_summary.json`,
    manifest: `${basePath}_manifest.json`,
  };
}

/**
 * Writes every sidecar for `result` next to `basePath` and returns the
 * manifest (also written as `<base>_manifest.json`). The feature-flow and
 * per-event files need `result.events`; they are skipped without it.
 */
export function writeCsvExports(
  result: ProfileResult,
  basePath: string,
  options: CsvExportOptions = {},
): ExportManifest {
  const paths = sidecarPaths(basePath);
  const dir = path.dirname(basePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  const files: ManifestEntry[] = [];
  const write = (filePath: string, content: string): void => {
    fs.writeFileSync(filePath, content, 'utf-8');
    files.push(hashEntry(filePath, Buffer.from(content, 'utf-8')));
  };

  write(paths.layers, buildLayersCsv(result.groups));
  write(paths.topSegments, buildTopSegmentsCsv(result.topFlowSegments, options.topNSegments));
  if (result.events) {
    write(paths.featureFlow, buildFeatureFlowCsv(buildFeatureFlowHistogram(result.events, result.config.maxVolumetricFlowMm3S)));
    if (!options.perLayerOnly) write(paths.events, buildEventsCsv(result.events));
  }
  write(paths.summary, JSON.stringify(buildJsonSummary(result), null, 2) + '\n');

  const manifest: ExportManifest = {
    generatedAt: new Date().toISOString(),
    input: options.inputPath ? hashEntry(options.inputPath, fs.readFileSync(options.inputPath)) : null,
    files,
  };
  fs.writeFileSync(paths.manifest, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
  return manifest;
}

function hashEntry(filePath: string, data: Buffer): ManifestEntry {
  return {
    path: filePath,
    bytes: data.length,
    sha256: crypto.createHash('sha256').update(data).digest('hex'),
  };
}

function sumWeights(samples: ReadonlyArray<{ weight: number }>): number {
  let total = 0;
  for (const s of samples) total += s.weight;
  return total;
}
