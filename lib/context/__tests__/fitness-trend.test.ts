import { describe, it, expect } from 'vitest'
import type { WellnessEntry } from '@/types/training'
import { buildFitnessTrend, renderFitnessTrendTable } from '../fitness-trend'

const WELLNESS: WellnessEntry[] = [
  { id: '2025-10-20', ctl: 40, atl: 35 },
  { id: '2025-10-18', ctl: 38, atl: 41 },
  { id: '2025-10-19', sleepSecs: 27000 },
  { id: '2025-10-21', icu_ctl: 41 }
]

describe('buildFitnessTrend', () => {
  it('sorts oldest first and skips entries without load metrics', () => {
    expect(buildFitnessTrend(WELLNESS)).toEqual([
      { date: '2025-10-18', ctl: 38, atl: 41 },
      { date: '2025-10-20', ctl: 40, atl: 35 },
      { date: '2025-10-21', ctl: 41, atl: null }
    ])
  })

  it('keeps only the most recent points', () => {
    expect(buildFitnessTrend(WELLNESS, 2).map(p => p.date)).toEqual(['2025-10-20', '2025-10-21'])
  })

  it('returns an empty series without wellness', () => {
    expect(buildFitnessTrend([])).toEqual([])
  })
})

describe('renderFitnessTrendTable', () => {
  it('renders a Markdown table with signed form', () => {
    expect(renderFitnessTrendTable(buildFitnessTrend(WELLNESS))).toEqual([
      '| Date | Fitness (CTL) | Fatigue (ATL) | Form (TSB) |',
      '|---|---|---|---|',
      '| 2025-10-18 | 38.0 | 41.0 | -3.0 |',
      '| 2025-10-20 | 40.0 | 35.0 | +5.0 |',
      '| 2025-10-21 | 41.0 | N/A | N/A |'
    ])
  })
})
