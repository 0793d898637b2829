/**
 * Running sums and weighted samples for one bucket (a layer or a feature
 * type).
 *
 * Lifecycle is open → finalized. Finalizing computes the closed-form
 * summary once, caches it, and drops the raw samples.
 *
 * @module aggregation/MetricAccumulator
 */

import type { MotionEvent } from '../types/motion';
import { fractionTimeOver, peak, weightedMean, weightedPercentile } from '../stats/weighted';
import type { WeightedSample } from '../stats/weighted';
import type { BucketSummary, BucketTotals, MetricStats } from './types';

const DYNAMICS_MAX_DISTANCE_MM = 0.6;
const DYNAMICS_MIN_SPEED_MM_S = 50;

export interface MetricLimits {
  maxPrintSpeedMmS: number | null;
  maxVolumetricFlowMm3S: number | null;
}

export class MetricAccumulator {
  private totals: BucketTotals = {
    eventCount: 0,
    timeS: 0,
    distanceMm: 0,
    extrusionMm: 0,
    retractionMm: 0,
    retractCount: 0,
    travelTimeS: 0,
    travelDistanceMm: 0,
    extrudeTimeS: 0,
    dynamicsScore: 0,
  };
  private speedSamples: WeightedSample[] = [];
  private flowSamples: WeightedSample[] = [];
  private fanWeighted = 0;
  private fanWeight = 0;
  private fanSeen = false;
  private summary: BucketSummary | null = null;

  constructor(private readonly limits: MetricLimits) {}

  get eventCount(): number {
    return this.totals.eventCount;
  }

  accumulate(event: MotionEvent): void {
    if (this.summary) {
      throw new Error('Cannot accumulate into a finalized bucket');
    }

    const t = this.totals;
    t.eventCount++;
    t.timeS += event.durationS;
    t.distanceMm += event.distanceMm;
    t.extrusionMm += event.extrusionMm;

    if (event.retractionMm > 0) {
      t.retractCount++;
      t.retractionMm += event.retractionMm;
    } else if (event.extrusionMm === 0 && event.distanceMm > 0) {
      t.travelTimeS += event.durationS;
      t.travelDistanceMm += event.distanceMm;
    }
    if (event.extrusionMm > 0 && event.durationS > 0) {
      t.extrudeTimeS += event.durationS;
    }
    if (
      event.isExtruding &&
      event.distanceMm > 0 &&
      event.distanceMm < DYNAMICS_MAX_DISTANCE_MM &&
      event.speedMmS > DYNAMICS_MIN_SPEED_MM_S
    ) {
      t.dynamicsScore++;
    }

    if (event.distanceMm > 0 && event.speedMmS > 0) {
      this.speedSamples.push({ value: event.speedMmS, weight: event.durationS });
    }
    // Travel counts as zero flow for the mean and the time over the limit.
    if (event.durationS > 0) {
      this.flowSamples.push({ value: event.flowMm3S, weight: event.durationS });
    }
    if (event.fanPct !== null) {
      this.fanSeen = true;
      this.fanWeighted += event.fanPct * event.durationS;
      this.fanWeight += event.durationS;
    }
  }

  /** Idempotent: later calls return the cached summary. */
  finalize(): BucketSummary {
    if (this.summary) return this.summary;

    let meanFanPct: number | null = null;
    if (this.fanSeen) meanFanPct = this.fanWeight > 0 ? this.fanWeighted / this.fanWeight : 0;

    this.summary = {
      ...this.totals,
      speed: summarize(this.speedSamples, this.limits.maxPrintSpeedMmS),
      flow: summarize(
        this.flowSamples,
        this.limits.maxVolumetricFlowMm3S,
        this.flowSamples.filter(s => s.value > 0),
      ),
      meanFanPct,
    };
    this.speedSamples = [];
    this.flowSamples = [];
    return this.summary;
  }
}

/**
 * Mean and time over the limit use every sample; peak and percentiles use
 * `rankSamples`, which defaults to the same list.
 */
export function summarize(
  samples: readonly WeightedSample[],
  limit: number | null,
  rankSamples: readonly WeightedSample[] = samples,
): MetricStats {
  return {
    mean: weightedMean(samples),
    peak: peak(rankSamples),
    p95: weightedPercentile(rankSamples, 95),
    p99: weightedPercentile(rankSamples, 99),
    overLimitFraction: limit === null ? null : fractionTimeOver(samples, limit),
    sampleCount: rankSamples.length,
  };
}
