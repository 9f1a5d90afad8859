/**
 * Latency summaries for the bench command
 */

export interface LatencySummary {
  min: number;
  median: number;
  avg: number;
  max: number;
}

/**
 * Summarize samples. The median of an even count is the mean of the two
 * middle samples.
 */
export function summarize(samples: readonly number[]): LatencySummary {
  if (samples.length === 0) {
    throw new Error("Cannot summarize an empty sample set");
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  const median = sorted.length % 2 === 1 ? upper : ((sorted[mid - 1] ?? 0) + upper) / 2;

  return {
    min: sorted[0] ?? 0,
    median,
    avg: sorted.reduce((sum, value) => sum + value, 0) / sorted.length,
    max: sorted[sorted.length - 1] ?? 0,
  };
}
