/**
 * Activity model
 */

import { describe, it, expect } from 'vitest'
import { createRng } from '../generator/rng'
import { ActivityModel, DEFAULT_ACTIVITY, expectedShares, isBusinessHour, isWeekend } from '../generator/temporal'

const MONDAY = new Date('2024-06-03T00:00:00.000Z')
const TUESDAY = new Date('2024-06-04T00:00:00.000Z')

describe('expectedShares', () => {
  it('should weight business hours and weekdays', () => {
    const shares = expectedShares(DEFAULT_ACTIVITY)

    expect(shares.businessHours).toBeCloseTo(36 / 51, 10)
    expect(shares.weekdays).toBeCloseTo(5 / 5.8, 10)
    expect(shares.uniformBusinessHours).toBe(0.375)
    expect(shares.uniformWeekdays).toBeCloseTo(5 / 7, 10)
  })
})

describe('calendar helpers', () => {
  it('should classify UTC days and hours', () => {
    expect(isWeekend(new Date('2024-06-08T12:00:00.000Z'))).toBe(true)
    expect(isWeekend(MONDAY)).toBe(false)
    expect(isBusinessHour(new Date('2024-06-03T09:00:00.000Z'), DEFAULT_ACTIVITY)).toBe(true)
    expect(isBusinessHour(new Date('2024-06-03T18:00:00.000Z'), DEFAULT_ACTIVITY)).toBe(false)
  })
})

describe('ActivityModel', () => {
  it('should keep samples inside the window and after the lower bound', () => {
    const model = new ActivityModel(MONDAY, TUESDAY)
    const rng = createRng(11)
    const notBefore = new Date('2024-06-03T15:20:00.000Z')

    for (let i = 0; i < 1000; i++) {
      const t = model.sample(rng, notBefore).getTime()
      expect(t).toBeGreaterThanOrEqual(notBefore.getTime())
      expect(t).toBeLessThan(TUESDAY.getTime())
    }
  })

  it('should favour business hours', () => {
    const model = new ActivityModel(MONDAY, TUESDAY)
    const rng = createRng(12)
    const samples = 5000
    let business = 0
    for (let i = 0; i < samples; i++) {
      if (isBusinessHour(model.sample(rng), DEFAULT_ACTIVITY)) business++
    }

    // 36/51 of a weekday's weight falls in business hours
    expect(business / samples).toBeGreaterThan(0.65)
    expect(business / samples).toBeLessThan(0.76)
  })

  it('should return the lower bound when it is past the window', () => {
    const model = new ActivityModel(MONDAY, TUESDAY)
    const late = new Date('2024-06-05T00:00:00.000Z')

    expect(model.sample(createRng(1), late)).toEqual(late)
  })
})
