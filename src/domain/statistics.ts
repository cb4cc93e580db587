/**
 * Running latency statistics over ReceiveData events, in milliseconds.
 *
 * The standard deviation is the population (biased) estimator. Stored history
 * was produced with this exact formula, so it must not be Bessel-corrected.
 */
export interface LatencyStats {
  avg: number;
  stdDev: number;
  count: number;
}

export const EMPTY_STATS: LatencyStats = Object.freeze({ avg: 0, stdDev: 0, count: 0 });

/**
 * Fold one duration into the running mean and standard deviation in a single pass
 */
export function foldLatency(stats: LatencyStats, durationMs: number): LatencyStats {
  const { avg, stdDev, count } = stats;

  const sum = avg * count + durationMs;
  // Mean of squares recovered from mean and deviation
  const sqAvg = avg * avg + stdDev * stdDev;
  const sqSum = sqAvg * count + durationMs * durationMs;

  const nextCount = count + 1;
  const nextAvg = sum / nextCount;
  const nextSqAvg = sqSum / nextCount;

  // Rounding can push the variance slightly below zero
  const variance = Math.max(nextSqAvg - nextAvg * nextAvg, 0);

  return {
    avg: nextAvg,
    stdDev: Math.sqrt(variance),
    count: nextCount,
  };
}
