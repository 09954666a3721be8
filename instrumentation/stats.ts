/**
 * Latency statistics over timing samples (milliseconds).
 */

export interface LatencyStats {
  min: number
  max: number
  mean: number
  median: number
  p50: number
  p99: number
  stddev: number
}

export function calculateStats(samples: number[]): LatencyStats {
  if (samples.length === 0) {
    return { min: 0, max: 0, mean: 0, median: 0, p50: 0, p99: 0, stddev: 0 }
  }

  const sorted = [...samples].sort((a, b) => a - b)
  const n = sorted.length

  const min = sorted[0]
  const max = sorted[n - 1]
  const mean = samples.reduce((a, b) => a + b, 0) / n
  const median = sorted[Math.floor(n / 2)]
  const p50 = sorted[Math.floor(n * 0.5)]
  const p99 = sorted[Math.min(n - 1, Math.floor(n * 0.99))]

  const variance = samples.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / n
  const stddev = Math.sqrt(variance)

  return { min, max, mean, median, p50, p99, stddev }
}

/**
 * Time one call of `fn`.
 */
export async function measure<T>(fn: () => Promise<T>): Promise<{ result: T; elapsedMs: number }> {
  const start = performance.now()
  const result = await fn()
  return { result, elapsedMs: performance.now() - start }
}
