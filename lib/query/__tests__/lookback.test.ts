import { describe, it, expect } from 'vitest'
import { parseLookback } from '../lookback'

describe('parseLookback', () => {
  it('converts explicit ranges to days', () => {
    expect(parseLookback('last 10 days', 30)).toEqual({ timeframe: 'days', daysBack: 10 })
    expect(parseLookback('Over the last 3 weeks', 30)).toEqual({ timeframe: 'weeks', daysBack: 21 })
    expect(parseLookback('last 2 months of riding', 30)).toEqual({ timeframe: 'months', daysBack: 60 })
  })

  it('accepts singular units', () => {
    expect(parseLookback('last 1 week', 30)).toEqual({ timeframe: 'weeks', daysBack: 7 })
  })

  it('covers calendar phrasings', () => {
    expect(parseLookback('How was last month?', 30)).toEqual({ timeframe: 'month', daysBack: 60 })
    expect(parseLookback('this month so far', 30)).toEqual({ timeframe: 'month', daysBack: 30 })
    expect(parseLookback('my progress this year', 30)).toEqual({ timeframe: 'year', daysBack: 365 })
  })

  it('falls back to the default window', () => {
    expect(parseLookback('Analyze my last 5 runs', 45)).toEqual({ timeframe: 'default', daysBack: 45 })
    expect(parseLookback('last 0 days', 30)).toEqual({ timeframe: 'default', daysBack: 30 })
  })
})
