/**
 * Summary shapes produced by the layer and feature-type aggregators.
 */

import type { BoundaryStrategyName, ProfileConfig } from '../config/profileConfig';
import type { IssueKind, MotionEvent, ProfileIssue } from '../types/motion';

/** Closed-form summary of one weighted metric (speed or flow). */
export interface MetricStats {
  /** Duration-weighted mean over all timed moves. */
  mean: number;
  /** Maximum, ignoring weight. */
  peak: number;
  p95: number;
  p99: number;
  /** Share of sampled time above the configured limit; null without a limit. */
  overLimitFraction: number | null;
  /** Samples behind peak and percentiles. */
  sampleCount: number;
}

/** Running sums shared by layers and feature types. */
export interface BucketTotals {
  eventCount: number;
  timeS: number;
  distanceMm: number;
  extrusionMm: number;
  retractionMm: number;
  retractCount: number;
  travelTimeS: number;
  travelDistanceMm: number;
  extrudeTimeS: number;
  /** Short (< 0.6 mm), fast (> 50 mm/s) extruding segments. */
  dynamicsScore: number;
}

export interface BucketSummary extends BucketTotals {
  speed: MetricStats;
  flow: MetricStats;
  /** Duration-weighted fan %, null when no event had a fan setpoint. */
  meanFanPct: number | null;
}

/** One finalized layer. */
export interface GroupSummary extends BucketSummary {
  index: number;
  z: number;
  /** Z delta from the previous layer; null for the first. */
  layerHeightMm: number | null;
  /** Against configured min/max layer height; null without limits or height. */
  layerHeightInRange: boolean | null;
  speedHeadroomP99: number | null;
  flowHeadroomP99: number | null;
  hotendC: number | null;
  bedC: number | null;
  chamberC: number | null;
  firstLine: number;
  lastLine: number;
}

/** One finalized feature type. */
export interface CategorySummary extends BucketSummary {
  label: string;
  /** Share of total print time. */
  timeShare: number;
  filamentUsedM: number;
  filamentUsedG: number;
  /** Peak, replaced by P99 when it exceeds 1.5 × P99 (single-segment spikes). */
  speedPeakSuppressed: number;
  flowPeakSuppressed: number;
}

export interface ProfileTotals {
  lineCount: number;
  eventCount: number;
  layerCount: number;
  timeS: number;
  distanceMm: number;
  extrusionMm: number;
  travelTimeS: number;
  extrudeTimeS: number;
  retractCount: number;
  retractionMm: number;
  filamentUsedM: number;
  filamentUsedG: number;
}

export interface ProfileResult {
  config: ProfileConfig;
  boundaryStrategy: BoundaryStrategyName;
  totals: ProfileTotals;
  /** Whole-print speed and flow statistics. */
  overall: BucketSummary;
  /** Ascending by index. */
  groups: GroupSummary[];
  /** Descending by time. */
  categories: CategorySummary[];
  /** Highest-flow extrusion events, descending. */
  topFlowSegments: MotionEvent[];
  /** Every event in order, or null when per-event detail was not kept. */
  events: MotionEvent[] | null;
  /** First `config.issueCap` issues. */
  issues: ProfileIssue[];
  issueCounts: Record<IssueKind, number>;
}
