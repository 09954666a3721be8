/**
 * Activity model for message timestamps.
 *
 * The history window is split into UTC hour bins. A bin's weight is
 * `dayWeight * hourWeight`: weekdays weigh 1 and weekend days
 * `weekendWeight`; hours inside `[businessHours.start, businessHours.end)`
 * weigh `businessHourWeight` and all others 1. A timestamp is drawn by
 * picking a bin proportionally to its weight, then a uniform instant in it.
 */

import { pickWeightedIndex, type Rng } from './rng'

export interface ActivityWeighting {
  /** UTC hours, end exclusive */
  businessHours: { start: number; end: number }
  businessHourWeight: number
  weekendWeight: number
}

export const DEFAULT_ACTIVITY: ActivityWeighting = {
  businessHours: { start: 9, end: 18 },
  businessHourWeight: 4,
  weekendWeight: 0.4,
}

const HOUR_MS = 60 * 60 * 1000

export function isWeekend(date: Date): boolean {
  const day = date.getUTCDay()
  return day === 0 || day === 6
}

export function isBusinessHour(date: Date, weighting: ActivityWeighting): boolean {
  const hour = date.getUTCHours()
  return hour >= weighting.businessHours.start && hour < weighting.businessHours.end
}

/**
 * Shares of activity a weighting predicts, next to what a flat distribution gives.
 */
export function expectedShares(weighting: ActivityWeighting): {
  businessHours: number
  weekdays: number
  uniformBusinessHours: number
  uniformWeekdays: number
} {
  const h = weighting.businessHours.end - weighting.businessHours.start
  const w = weighting.businessHourWeight
  return {
    businessHours: (h * w) / (h * w + 24 - h),
    weekdays: 5 / (5 + 2 * weighting.weekendWeight),
    uniformBusinessHours: h / 24,
    uniformWeekdays: 5 / 7,
  }
}

export class ActivityModel {
  private readonly start: number
  private readonly cumulative: number[]

  /**
   * @param windowStart - first instant of the history window
   * @param windowEnd - end of the window (exclusive), normally the run anchor
   */
  constructor(
    readonly windowStart: Date,
    readonly windowEnd: Date,
    readonly weighting: ActivityWeighting = DEFAULT_ACTIVITY
  ) {
    // Align to whole hours so each bin covers exactly one UTC hour
    this.start = Math.floor(windowStart.getTime() / HOUR_MS) * HOUR_MS
    const bins = Math.max(1, Math.ceil((windowEnd.getTime() - this.start) / HOUR_MS))

    this.cumulative = new Array<number>(bins)
    let total = 0
    for (let i = 0; i < bins; i++) {
      const binStart = new Date(this.start + i * HOUR_MS)
      const dayWeight = isWeekend(binStart) ? weighting.weekendWeight : 1
      const hourWeight = isBusinessHour(binStart, weighting) ? weighting.businessHourWeight : 1
      total += dayWeight * hourWeight
      this.cumulative[i] = total
    }
  }

  /**
   * Draw a timestamp at or after `notBefore` and before the window end.
   * A bound past the last bin collapses onto the bound itself.
   */
  sample(rng: Rng, notBefore?: Date): Date {
    const end = this.windowEnd.getTime()
    const lower = Math.max(notBefore?.getTime() ?? this.start, this.start)
    if (lower >= end) return new Date(lower)

    const firstBin = Math.floor((lower - this.start) / HOUR_MS)
    const bin = pickWeightedIndex(this.cumulative, rng, firstBin)

    const binStart = Math.max(this.start + bin * HOUR_MS, lower)
    const binEnd = Math.min(this.start + (bin + 1) * HOUR_MS, end)
    return new Date(binStart + Math.floor(rng() * (binEnd - binStart)))
  }
}
