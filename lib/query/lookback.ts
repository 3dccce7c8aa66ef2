/**
 * How far back to fetch data for a question.
 *
 * Handles the date-range phrasings ("last 3 weeks", "this month") that the
 * classifier deliberately leaves alone.
 */

export type Timeframe = 'days' | 'weeks' | 'months' | 'month' | 'year' | 'default'

export interface Lookback {
    timeframe: Timeframe
    daysBack: number
}

const RANGE_PATTERN = /last\s+(\d+)\s+(day|week|month)s?\b/
const DAYS_PER_UNIT = { day: 1, week: 7, month: 30 } as const
const TIMEFRAME_BY_UNIT = { day: 'days', week: 'weeks', month: 'months' } as const

function isRangeUnit(unit: string): unit is keyof typeof DAYS_PER_UNIT {
    return unit in DAYS_PER_UNIT
}

export function parseLookback(query: string, defaultDays: number): Lookback {
    const q = query.toLowerCase()

    const match = RANGE_PATTERN.exec(q)
    if (match && isRangeUnit(match[2])) {
        const n = Number.parseInt(match[1], 10)
        if (n > 0) {
            return { timeframe: TIMEFRAME_BY_UNIT[match[2]], daysBack: n * DAYS_PER_UNIT[match[2]] }
        }
    }

    // Last month needs the whole previous calendar month in the window
    if (q.includes('last month')) return { timeframe: 'month', daysBack: 60 }
    if (q.includes('this month')) return { timeframe: 'month', daysBack: 30 }
    if (q.includes('this year')) return { timeframe: 'year', daysBack: 365 }

    return { timeframe: 'default', daysBack: defaultDays }
}
