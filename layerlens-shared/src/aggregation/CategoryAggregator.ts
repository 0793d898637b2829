/**
 * Per-feature-type aggregation across all layers.
 *
 * @module aggregation/CategoryAggregator
 */

import type { MotionEvent } from '../types/motion';
import { filamentAreaMm2 } from '../config/profileConfig';
import type { ProfileConfig } from '../config/profileConfig';
import { MetricAccumulator } from './MetricAccumulator';
import type { CategorySummary, MetricStats } from './types';

/** Bucket label for events emitted before any `;TYPE:` comment. */
export const UNCATEGORIZED_LABEL = '(none)';

/** Peaks above this multiple of P99 are treated as single-segment spikes. */
const SPIKE_RATIO = 1.5;

export class CategoryAggregator {
  private readonly buckets = new Map<string, MetricAccumulator>();
  private summaries: CategorySummary[] | null = null;

  constructor(private readonly config: ProfileConfig) {}

  accumulate(event: MotionEvent): void {
    if (this.summaries) {
      throw new Error('Cannot accumulate after the aggregator was finalized');
    }
    const label = event.category ?? UNCATEGORIZED_LABEL;
    let bucket = this.buckets.get(label);
    if (!bucket) {
      bucket = new MetricAccumulator(this.config);
      this.buckets.set(label, bucket);
    }
    bucket.accumulate(event);
  }

  /** Summaries sorted by time, longest first. Idempotent. */
  finalize(): CategorySummary[] {
    if (this.summaries) return this.summaries;

    const finalized = [...this.buckets].map(([label, bucket]) => ({ label, bucket: bucket.finalize() }));
    let totalTime = 0;
    for (const { bucket } of finalized) totalTime += bucket.timeS;

    const gramsPerMm = filamentAreaMm2(this.config.filamentDiameterMm) / 1000 * this.config.filamentDensityGCm3;

    this.summaries = finalized
      .map(({ label, bucket }): CategorySummary => ({
        ...bucket,
        label,
        timeShare: totalTime > 0 ? bucket.timeS / totalTime : 0,
        filamentUsedM: bucket.extrusionMm / 1000,
        filamentUsedG: bucket.extrusionMm * gramsPerMm,
        speedPeakSuppressed: suppressSpike(bucket.speed),
        flowPeakSuppressed: suppressSpike(bucket.flow),
      }))
      .sort((a, b) => b.timeS - a.timeS || a.label.localeCompare(b.label));
    return this.summaries;
  }
}

export function suppressSpike(stats: MetricStats): number {
  return stats.p99 > 0 && stats.peak > SPIKE_RATIO * stats.p99 ? stats.p99 : stats.peak;
}
