/**
 * Side-by-side comparison of two profiles: headline metrics with deltas and
 * a layer alignment by nearest Z.
 *
 * @module report/compare
 */

import type { GroupSummary, ProfileResult } from '../aggregation/types';
import { buildJsonSummary } from './summary';
import type { JsonSummary } from './summary';

export interface CompareMetricRow {
  label: string;
  unit: string;
  a: number | null;
  b: number | null;
  /** `b - a`, null when either side is missing. */
  delta: number | null;
}

export interface LayerAlignmentRow {
  z: number;
  a: AlignedLayer | null;
  b: AlignedLayer | null;
}

export interface AlignedLayer {
  index: number;
  z: number;
  timeS: number;
  p95SpeedMmS: number;
  p95FlowMm3S: number;
}

export interface ProfileComparison {
  labelA: string;
  labelB: string;
  metrics: CompareMetricRow[];
  alignment: LayerAlignmentRow[];
}

const METRICS: ReadonlyArray<{ label: string; unit: string; pick: (s: JsonSummary) => number | null }> = [
  { label: 'Total time', unit: 's', pick: s => s.totalTimeS },
  { label: 'Layers', unit: '', pick: s => s.layers },
  { label: 'Travel time', unit: 's', pick: s => s.totalTravelTimeS },
  { label: 'Extrude time', unit: 's', pick: s => s.totalExtrudeTimeS },
  { label: 'Retractions', unit: '', pick: s => s.totalRetractCount },
  { label: 'Filament', unit: 'm', pick: s => s.filamentUsedM },
  { label: 'Max peak flow', unit: 'mm³/s', pick: s => s.maxPeakFlowMm3S },
  { label: 'Max P95 flow', unit: 'mm³/s', pick: s => s.maxP95FlowMm3S },
  { label: 'Max peak speed', unit: 'mm/s', pick: s => s.maxPeakSpeedMmS },
  { label: 'Max P95 speed', unit: 'mm/s', pick: s => s.maxP95SpeedMmS },
];

export function compareProfiles(
  a: ProfileResult,
  b: ProfileResult,
  labels: { a?: string; b?: string } = {},
): ProfileComparison {
  const summaryA = buildJsonSummary(a);
  const summaryB = buildJsonSummary(b);

  const metrics = METRICS.map(({ label, unit, pick }): CompareMetricRow => {
    const va = pick(summaryA);
    const vb = pick(summaryB);
    return { label, unit, a: va, b: vb, delta: va !== null && vb !== null ? vb - va : null };
  });

  return {
    labelA: labels.a ?? 'A',
    labelB: labels.b ?? 'B',
    metrics,
    alignment: alignLayersByZ(a.groups, b.groups),
  };
}

/**
 * One row per distinct layer Z of either profile, each side holding the
 * layer whose Z is nearest (first wins on ties).
 */
export function alignLayersByZ(a: readonly GroupSummary[], b: readonly GroupSummary[]): LayerAlignmentRow[] {
  const zs = [...new Set([...a.map(g => g.z), ...b.map(g => g.z)])].sort((x, y) => x - y);
  return zs.map(z => ({ z, a: nearestLayer(a, z), b: nearestLayer(b, z) }));
}

export function nearestLayer(groups: readonly GroupSummary[], z: number): AlignedLayer | null {
  let best: GroupSummary | null = null;
  let bestDz = Infinity;
  for (const g of groups) {
    const dz = Math.abs(g.z - z);
    if (dz < bestDz) {
      best = g;
      bestDz = dz;
    }
  }
  if (!best) return null;
  return {
    index: best.index,
    z: best.z,
    timeS: best.timeS,
    p95SpeedMmS: best.speed.p95,
    p95FlowMm3S: best.flow.p95,
  };
}
