/**
 * Legend histograms for the report charts.
 *
 * Speed and flow start at 0 and end at the configured limit when there is
 * one; layer height spans the configured min/max layer height.
 *
 * @module report/legends
 */

import type { ProfileResult } from '../aggregation/types';
import { histogram } from '../stats/weighted';

export const DEFAULT_LEGEND_BINS = 20;

export interface LegendBin {
  lo: number;
  hi: number;
  count: number;
}

export interface Legend {
  name: string;
  unit: string;
  /** Null when there was nothing to bin. */
  min: number | null;
  max: number | null;
  bins: LegendBin[];
}

export type LegendName = 'speed' | 'flow' | 'fan' | 'hotend' | 'bed' | 'layerHeight';

export function buildLegends(result: ProfileResult, binCount = DEFAULT_LEGEND_BINS): Record<LegendName, Legend> {
  const events = result.events ?? [];
  const { config } = result;

  const speeds: number[] = [];
  const flows: number[] = [];
  const fans: number[] = [];
  const hotends: number[] = [];
  const beds: number[] = [];
  for (const e of events) {
    if (e.distanceMm > 0 && e.speedMmS > 0) speeds.push(e.speedMmS);
    if (e.flowMm3S > 0) flows.push(e.flowMm3S);
    if (e.fanPct !== null) fans.push(e.fanPct);
    if (e.hotendC !== null) hotends.push(e.hotendC);
    if (e.bedC !== null) beds.push(e.bedC);
  }
  const heights: number[] = [];
  for (const g of result.groups) {
    if (g.layerHeightMm !== null && g.layerHeightMm > 0) heights.push(g.layerHeightMm);
  }

  return {
    speed: buildLegend('Speed', 'mm/s', speeds, binCount, 0, config.maxPrintSpeedMmS),
    flow: buildLegend('Flow', 'mm³/s', flows, binCount, 0, config.maxVolumetricFlowMm3S),
    fan: buildLegend('Fan', '%', fans, binCount),
    hotend: buildLegend('Hotend', '°C', hotends, binCount),
    bed: buildLegend('Bed', '°C', beds, binCount),
    layerHeight: buildLegend('Layer height', 'mm', heights, binCount, config.minLayerHeightMm, config.maxLayerHeightMm),
  };
}

export function buildLegend(
  name: string,
  unit: string,
  values: readonly number[],
  binCount: number,
  forcedMin: number | null = null,
  forcedMax: number | null = null,
): Legend {
  if (values.length === 0) return { name, unit, min: null, max: null, bins: [] };

  let lo = values[0];
  let hi = values[0];
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }
  let min = forcedMin ?? lo;
  let max = forcedMax ?? hi;
  if (max < min) [min, max] = [max, min];

  const { binEdges, counts } = histogram(values, binCount, { min, max });
  return {
    name,
    unit,
    min,
    max,
    bins: counts.map((count, i) => ({ lo: binEdges[i], hi: binEdges[i + 1], count })),
  };
}
