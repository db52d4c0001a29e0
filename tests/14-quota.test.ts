/**
 * Segment 14: Weekly Quota Window
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { weekWindowFor } from '../src/quota'
import { instantToMs, msToInstant } from '../src/timestamps'
import { utcMsToZoned, weekdayIndex } from '../src/time-date'
import { instant } from './helpers/fixtures'

describe('Segment 14: Weekly Quota Window', () => {
  it('spans Monday to Monday in UTC', () => {
    expect(weekWindowFor(instant('2025-06-08T20:00:00Z'), 'UTC')).toEqual({
      start: '2025-06-02T00:00:00.000Z',
      end: '2025-06-09T00:00:00.000Z',
    })
  })

  it('starts a new week exactly at Monday midnight', () => {
    expect(weekWindowFor(instant('2025-06-09T00:00:00Z'), 'UTC').start).toBe('2025-06-09T00:00:00.000Z')
  })

  it('uses the local calendar of the business timezone', () => {
    // Monday 01:00 in Tashkent
    expect(weekWindowFor(instant('2025-06-08T20:00:00Z'), 'Asia/Tashkent')).toEqual({
      start: '2025-06-08T19:00:00.000Z',
      end: '2025-06-15T19:00:00.000Z',
    })
    // Sunday 23:59 in Tashkent
    expect(weekWindowFor(instant('2025-06-08T18:59:00Z'), 'Asia/Tashkent').start).toBe(
      '2025-06-01T19:00:00.000Z'
    )
  })

  it('follows a daylight saving change inside the week', () => {
    expect(weekWindowFor(instant('2025-03-05T12:00:00Z'), 'America/New_York')).toEqual({
      start: '2025-03-03T05:00:00.000Z',
      end: '2025-03-10T04:00:00.000Z',
    })
  })

  it('always contains the instant and starts on a local Monday midnight', () => {
    const minutes = fc.integer({ min: 0, max: 50 * 366 * 24 * 60 })
    fc.assert(
      fc.property(minutes, (offset) => {
        const at = msToInstant(Date.UTC(2000, 0, 1) + offset * 60000)
        const { start, end } = weekWindowFor(at, 'Asia/Tashkent')
        expect(instantToMs(start)).toBeLessThanOrEqual(instantToMs(at))
        expect(instantToMs(end)).toBeGreaterThan(instantToMs(at))
        const local = utcMsToZoned(instantToMs(start), 'Asia/Tashkent')
        expect(local.time).toBe('00:00')
        expect(weekdayIndex(local.date)).toBe(0)
      })
    )
  })
})
