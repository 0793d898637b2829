/**
 * Per-layer aggregation.
 *
 * At most one layer is open. `boundary()` finalizes it; the next event
 * opens the following layer. A boundary on an empty layer is a no-op, so
 * no empty layer is ever emitted.
 *
 * @module aggregation/GroupAggregator
 */

import type { MotionEvent } from '../types/motion';
import type { ProfileConfig } from '../config/profileConfig';
import { MetricAccumulator } from './MetricAccumulator';
import type { GroupSummary, MetricStats } from './types';

/** Slack on layer-height range checks, absorbs slicer rounding. */
const LAYER_HEIGHT_TOLERANCE_MM = 1e-9;

/** One layer: open until finalized, never reopened. */
export class LayerGroup {
  private readonly metrics: MetricAccumulator;
  private last: MotionEvent | null = null;
  private firstLine = 0;
  private summary: GroupSummary | null = null;

  constructor(
    readonly index: number,
    private readonly config: ProfileConfig,
    private readonly previousZ: number | null,
  ) {
    this.metrics = new MetricAccumulator(config);
  }

  get eventCount(): number {
    return this.metrics.eventCount;
  }

  accumulate(event: MotionEvent): void {
    this.metrics.accumulate(event);
    if (!this.last) this.firstLine = event.lineNumber;
    this.last = event;
  }

  finalize(): GroupSummary {
    if (this.summary) return this.summary;

    const bucket = this.metrics.finalize();
    const last = this.last;
    const z = last ? last.layerZ : this.previousZ ?? 0;
    const layerHeightMm = this.previousZ === null ? null : z - this.previousZ;

    this.summary = {
      ...bucket,
      index: this.index,
      z,
      layerHeightMm,
      layerHeightInRange: checkLayerHeight(layerHeightMm, this.config),
      speedHeadroomP99: headroom(this.config.maxPrintSpeedMmS, bucket.speed),
      flowHeadroomP99: headroom(this.config.maxVolumetricFlowMm3S, bucket.flow),
      hotendC: last ? last.hotendC : null,
      bedC: last ? last.bedC : null,
      chamberC: last ? last.chamberC : null,
      firstLine: this.firstLine,
      lastLine: last ? last.lineNumber : 0,
    };
    return this.summary;
  }
}

export class GroupAggregator {
  private current: LayerGroup | null = null;
  private readonly done: GroupSummary[] = [];
  private closed = false;

  constructor(private readonly config: ProfileConfig) {}

  /** Finalized layers so far, ascending. */
  get groups(): readonly GroupSummary[] {
    return this.done;
  }

  accumulate(event: MotionEvent): void {
    if (this.closed) {
      throw new Error('Cannot accumulate after the aggregator was finalized');
    }
    if (!this.current) {
      const previous = this.done.length > 0 ? this.done[this.done.length - 1] : null;
      this.current = new LayerGroup(this.done.length, this.config, previous ? previous.z : null);
    }
    this.current.accumulate(event);
  }

  /** Closes the open layer. Returns its summary, or null when it was empty. */
  boundary(): GroupSummary | null {
    if (!this.current || this.current.eventCount === 0) return null;
    const summary = this.current.finalize();
    this.done.push(summary);
    this.current = null;
    return summary;
  }

  /** Closes the last layer. Idempotent. */
  finalize(): GroupSummary[] {
    if (!this.closed) {
      this.boundary();
      this.closed = true;
    }
    return [...this.done];
  }
}

// ── Helpers ──

function headroom(limit: number | null, stats: MetricStats): number | null {
  if (limit === null || stats.sampleCount === 0) return null;
  return limit - stats.p99;
}

function checkLayerHeight(height: number | null, config: ProfileConfig): boolean | null {
  const { minLayerHeightMm: min, maxLayerHeightMm: max } = config;
  if (height === null || (min === null && max === null)) return null;
  if (min !== null && height < min - LAYER_HEIGHT_TOLERANCE_MM) return false;
  if (max !== null && height > max + LAYER_HEIGHT_TOLERANCE_MM) return false;
  return true;
}
