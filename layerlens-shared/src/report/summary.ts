/**
 * Regression-friendly summary and layer rankings built from a profile.
 *
 * @module report/summary
 */

import type { BoundaryStrategyName } from '../config/profileConfig';
import type { GroupSummary, MetricStats, ProfileResult } from '../aggregation/types';
import type { IssueKind } from '../types/motion';

export const DEFAULT_TOP_N_SLOWEST = 10;

export interface JsonSummary {
  layers: number;
  events: number;
  totalTimeS: number;
  totalTravelTimeS: number;
  totalExtrudeTimeS: number;
  totalRetractCount: number;
  totalRetractMm: number;
  filamentUsedM: number;
  filamentUsedG: number;
  maxPeakSpeedMmS: number | null;
  maxP95SpeedMmS: number | null;
  maxP99SpeedMmS: number | null;
  maxPeakFlowMm3S: number | null;
  maxP95FlowMm3S: number | null;
  maxP99FlowMm3S: number | null;
  config: {
    maxPrintSpeedMmS: number | null;
    maxVolumetricFlowMm3S: number | null;
    filamentDiameterMm: number;
    filamentDensityGCm3: number;
    boundary: BoundaryStrategyName;
  };
  issues: Record<IssueKind, number>;
}

export function buildJsonSummary(result: ProfileResult): JsonSummary {
  const { totals, groups, config } = result;
  return {
    layers: totals.layerCount,
    events: totals.eventCount,
    totalTimeS: totals.timeS,
    totalTravelTimeS: totals.travelTimeS,
    totalExtrudeTimeS: totals.extrudeTimeS,
    totalRetractCount: totals.retractCount,
    totalRetractMm: totals.retractionMm,
    filamentUsedM: totals.filamentUsedM,
    filamentUsedG: totals.filamentUsedG,
    maxPeakSpeedMmS: maxOf(groups, g => g.speed, 'peak'),
    maxP95SpeedMmS: maxOf(groups, g => g.speed, 'p95'),
    maxP99SpeedMmS: maxOf(groups, g => g.speed, 'p99'),
    maxPeakFlowMm3S: maxOf(groups, g => g.flow, 'peak'),
    maxP95FlowMm3S: maxOf(groups, g => g.flow, 'p95'),
    maxP99FlowMm3S: maxOf(groups, g => g.flow, 'p99'),
    config: {
      maxPrintSpeedMmS: config.maxPrintSpeedMmS,
      maxVolumetricFlowMm3S: config.maxVolumetricFlowMm3S,
      filamentDiameterMm: config.filamentDiameterMm,
      filamentDensityGCm3: config.filamentDensityGCm3,
      boundary: result.boundaryStrategy,
    },
    issues: { ...result.issueCounts },
  };
}

/** Layers ranked by time, longest first; ties keep layer order. */
export function slowestLayers(groups: readonly GroupSummary[], count = DEFAULT_TOP_N_SLOWEST): GroupSummary[] {
  if (count <= 0) return [];
  return [...groups]
    .sort((a, b) => b.timeS - a.timeS || a.index - b.index)
    .slice(0, count);
}

/** Stat value, or null when the bucket had no samples for that metric. */
export function statOrNull(stats: MetricStats, key: 'mean' | 'peak' | 'p95' | 'p99'): number | null {
  return stats.sampleCount > 0 ? stats[key] : null;
}

function maxOf(
  groups: readonly GroupSummary[],
  pick: (g: GroupSummary) => MetricStats,
  key: 'peak' | 'p95' | 'p99',
): number | null {
  let max: number | null = null;
  for (const g of groups) {
    const v = statOrNull(pick(g), key);
    if (v !== null && (max === null || v > max)) max = v;
  }
  return max;
}
