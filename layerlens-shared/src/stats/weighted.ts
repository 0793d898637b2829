/**
 * Time-weighted statistics over `(value, weight)` samples.
 *
 * Pure functions. Empty or degenerate input returns a defined sentinel
 * (0, or empty bins) instead of throwing.
 *
 * @module stats/weighted
 */

export interface WeightedSample {
  value: number;
  /** Duration mass, seconds. */
  weight: number;
}

export interface Histogram {
  /** `counts.length + 1` edges, ascending. Empty when there was nothing to bin. */
  binEdges: number[];
  counts: number[];
}

export interface HistogramRange {
  min: number;
  max: number;
}

/**
 * Value at which the cumulative weight first reaches `p`% of the total,
 * interpolated linearly between the bracketing sorted samples.
 *
 * Zero total weight falls back to equal weights. `p` is clamped to [0, 100].
 */
export function weightedPercentile(samples: readonly WeightedSample[], p: number): number {
  const valid = samples.filter(isUsable);
  if (valid.length === 0) return 0;

  const positive = valid.filter(s => s.weight > 0);
  const pool = positive.length > 0 ? positive : valid.map(s => ({ value: s.value, weight: 1 }));
  if (pool.length === 1) return pool[0].value;

  const sorted = [...pool].sort((a, b) => a.value - b.value);
  let total = 0;
  for (const s of sorted) total += s.weight;

  const fraction = Number.isFinite(p) ? Math.max(0, Math.min(100, p)) / 100 : 0;
  const target = fraction * total;

  let cumulative = 0;
  for (let i = 0; i < sorted.length; i++) {
    const previous = cumulative;
    cumulative += sorted[i].weight;
    if (cumulative >= target) {
      if (i === 0) return sorted[0].value;
      const t = (target - previous) / (cumulative - previous);
      return sorted[i - 1].value + t * (sorted[i].value - sorted[i - 1].value);
    }
  }
  return sorted[sorted.length - 1].value;
}

/** Largest value regardless of weight. */
export function peak(samples: readonly WeightedSample[]): number {
  let max: number | null = null;
  for (const s of samples) {
    if (!Number.isFinite(s.value)) continue;
    if (max === null || s.value > max) max = s.value;
  }
  return max ?? 0;
}

/** `Σ value·weight / Σ weight`, 0 when there is no weight. */
export function weightedMean(samples: readonly WeightedSample[]): number {
  let sum = 0;
  let total = 0;
  for (const s of samples) {
    if (!isUsable(s)) continue;
    sum += s.value * s.weight;
    total += s.weight;
  }
  return total > 0 ? sum / total : 0;
}

/**
 * Share of total weight whose value is strictly above `threshold`.
 * 0 when the threshold is unset or the total weight is 0.
 */
export function fractionTimeOver(
  samples: readonly WeightedSample[],
  threshold: number | null | undefined,
): number {
  if (threshold === null || threshold === undefined || !Number.isFinite(threshold)) return 0;
  let over = 0;
  let total = 0;
  for (const s of samples) {
    if (!isUsable(s)) continue;
    total += s.weight;
    if (s.value > threshold) over += s.weight;
  }
  return total > 0 ? over / total : 0;
}

/**
 * Equal-width bin edges. A degenerate range collapses to a single bin;
 * a reversed range is swapped.
 */
export function makeBinEdges(range: HistogramRange, binCount: number): number[] {
  const bins = Math.max(1, Math.floor(Number.isFinite(binCount) ? binCount : 1));
  let { min, max } = range;
  if (max < min) [min, max] = [max, min];
  if (max - min <= Number.EPSILON * Math.max(1, Math.abs(min), Math.abs(max))) return [min, max];

  const step = (max - min) / bins;
  const edges: number[] = [min];
  for (let i = 1; i < bins; i++) edges.push(min + i * step);
  edges.push(max);
  return edges;
}

/**
 * Bin index for `value`: lower edge inclusive, last bin closed on the right,
 * out-of-range values clamped to the first/last bin.
 */
export function binIndex(edges: readonly number[], value: number): number {
  const last = edges.length - 2;
  if (last < 0) return -1;
  if (value < edges[1] || last === 0) return 0;
  if (value >= edges[last]) return last;

  const step = (edges[edges.length - 1] - edges[0]) / (last + 1);
  let idx = Math.min(last, Math.max(0, Math.floor((value - edges[0]) / step)));
  while (idx > 0 && value < edges[idx]) idx--;
  while (idx < last && value >= edges[idx + 1]) idx++;
  return idx;
}

/**
 * Counts `values` into `binCount` equal-width bins spanning `range`, or the
 * observed min/max when no range is supplied.
 */
export function histogram(
  values: readonly number[],
  binCount: number,
  range: HistogramRange | null = null,
): Histogram {
  const finite = values.filter(v => Number.isFinite(v));
  const span = range ?? observedRange(finite);
  if (!span) return { binEdges: [], counts: [] };

  const binEdges = makeBinEdges(span, binCount);
  const counts = new Array<number>(binEdges.length - 1).fill(0);
  for (const v of finite) counts[binIndex(binEdges, v)]++;
  return { binEdges, counts };
}

/**
 * Like `histogram`, but each bin holds the summed weight of its samples.
 */
export function timeHistogram(
  samples: readonly WeightedSample[],
  binCount: number,
  range: HistogramRange | null = null,
): Histogram {
  const usable = samples.filter(isUsable);
  const span = range ?? observedRange(usable.map(s => s.value));
  if (!span) return { binEdges: [], counts: [] };

  const binEdges = makeBinEdges(span, binCount);
  const counts = new Array<number>(binEdges.length - 1).fill(0);
  for (const s of usable) counts[binIndex(binEdges, s.value)] += s.weight;
  return { binEdges, counts };
}

// ── Helpers ──

function isUsable(s: WeightedSample): boolean {
  return Number.isFinite(s.value) && Number.isFinite(s.weight) && s.weight >= 0;
}

function observedRange(values: readonly number[]): HistogramRange | null {
  if (values.length === 0) return null;
  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}
