/**
 * Seeded pseudo-random helpers (Mulberry32).
 * Same seed, same sequence, on every platform.
 */

export type Rng = () => number

export function createRng(seed: number): Rng {
  let state = seed >>> 0
  return function () {
    let t = (state += 0x6d2b79f5)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function pick<T>(arr: readonly T[], rng: Rng): T {
  if (arr.length === 0) throw new RangeError('pick() from an empty array')
  return arr[Math.floor(rng() * arr.length)]
}

/** Integer in [min, max] */
export function randomInt(min: number, max: number, rng: Rng): number {
  return min + Math.floor(rng() * (max - min + 1))
}

/**
 * `count` distinct elements via a partial Fisher-Yates shuffle.
 */
export function sampleDistinct<T>(arr: readonly T[], count: number, rng: Rng): T[] {
  const pool = [...arr]
  const n = Math.min(count, pool.length)
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(rng() * (pool.length - i))
    const tmp = pool[i]
    pool[i] = pool[j]
    pool[j] = tmp
  }
  return pool.slice(0, n)
}

export function shuffle<T>(arr: T[], rng: Rng): T[] {
  return sampleDistinct(arr, arr.length, rng)
}

export function generateUuid(rng: Rng): string {
  const hex = '0123456789abcdef'
  let uuid = ''
  for (let i = 0; i < 36; i++) {
    if (i === 8 || i === 13 || i === 18 || i === 23) {
      uuid += '-'
    } else if (i === 14) {
      uuid += '4'
    } else if (i === 19) {
      uuid += hex[Math.floor(rng() * 4) + 8]
    } else {
      uuid += hex[Math.floor(rng() * 16)]
    }
  }
  return uuid
}

/**
 * Index into `cumulative` (running totals of non-negative weights) for a
 * draw in [from, cumulative[last]).
 */
export function pickWeightedIndex(cumulative: readonly number[], rng: Rng, fromIndex = 0): number {
  const base = fromIndex === 0 ? 0 : cumulative[fromIndex - 1]
  const target = base + rng() * (cumulative[cumulative.length - 1] - base)

  let lo = fromIndex
  let hi = cumulative.length - 1
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if (cumulative[mid] > target) {
      hi = mid
    } else {
      lo = mid + 1
    }
  }
  return lo
}
