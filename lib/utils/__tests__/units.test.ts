import { describe, it, expect } from 'vitest'
import {
  NOT_AVAILABLE,
  formatDistance,
  formatDuration,
  formatNumber,
  formatPace,
  formatSigned,
  formatZoneTimes,
  toNumber
} from '../units'

describe('toNumber', () => {
  it('accepts finite numbers and numeric strings', () => {
    expect(toNumber(42)).toBe(42)
    expect(toNumber('61.5')).toBe(61.5)
  })

  it('rejects everything else', () => {
    expect(toNumber(null)).toBeNull()
    expect(toNumber(undefined)).toBeNull()
    expect(toNumber('')).toBeNull()
    expect(toNumber('fast')).toBeNull()
    expect(toNumber(Number.NaN)).toBeNull()
    expect(toNumber(true)).toBeNull()
  })
})

describe('formatDuration', () => {
  it('drops the hour part when zero', () => {
    expect(formatDuration(1800)).toBe('30m 0s')
    expect(formatDuration(3725)).toBe('1h 2m 5s')
  })

  it('drops minutes when hours and minutes are both zero', () => {
    expect(formatDuration(45)).toBe('45s')
    expect(formatDuration(0)).toBe('0s')
  })

  it('keeps zero minutes inside an hour', () => {
    expect(formatDuration(3605)).toBe('1h 0m 5s')
  })

  it('floors fractional seconds', () => {
    expect(formatDuration(59.9)).toBe('59s')
  })

  it('returns N/A for missing or negative values', () => {
    expect(formatDuration(undefined)).toBe(NOT_AVAILABLE)
    expect(formatDuration(-1)).toBe(NOT_AVAILABLE)
  })
})

describe('formatDistance', () => {
  it('formats meters as kilometers to 2 decimals', () => {
    expect(formatDistance(12345)).toBe('12.35 km')
    expect(formatDistance(5000)).toBe('5.00 km')
  })

  it('treats zero as missing', () => {
    expect(formatDistance(0)).toBe(NOT_AVAILABLE)
    expect(formatDistance(null)).toBe(NOT_AVAILABLE)
  })
})

describe('formatNumber', () => {
  it('appends the unit after a space', () => {
    expect(formatNumber(150, 0, 'bpm')).toBe('150 bpm')
    expect(formatNumber(72.45, 1, 'kg')).toBe('72.5 kg')
  })

  it('returns N/A without a unit when missing', () => {
    expect(formatNumber(undefined, 0, 'bpm')).toBe(NOT_AVAILABLE)
  })
})

describe('formatSigned', () => {
  it('always carries a sign', () => {
    expect(formatSigned(5)).toBe('+5.0')
    expect(formatSigned(-5)).toBe('-5.0')
    expect(formatSigned(0)).toBe('+0.0')
  })
})

describe('formatPace', () => {
  it('converts m/s to min:ss per km', () => {
    expect(formatPace(4)).toBe('4:10 /km')
    expect(formatPace(1000 / 300)).toBe('5:00 /km')
  })

  it('returns N/A for zero speed', () => {
    expect(formatPace(0)).toBe(NOT_AVAILABLE)
  })
})

describe('formatZoneTimes', () => {
  it('lists only zones with time', () => {
    expect(formatZoneTimes([300, 0, 60])).toBe('Z1: 5m 0s | Z3: 1m 0s')
  })

  it('returns N/A when no zone has time', () => {
    expect(formatZoneTimes([0, 0])).toBe(NOT_AVAILABLE)
    expect(formatZoneTimes('300')).toBe(NOT_AVAILABLE)
  })
})
