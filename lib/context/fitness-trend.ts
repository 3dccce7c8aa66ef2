import type { FitnessTrendPoint, WellnessEntry } from '@/types/training'
import { formatNumber, formatSigned, NOT_AVAILABLE } from '../utils/units'
import { WELLNESS_FIELDS, pickNumber, pickString } from './record-fields'

export const DEFAULT_TREND_POINTS = 14

/**
 * CTL/ATL series from wellness entries, oldest first, limited to the most
 * recent `maxPoints` days. Entries carrying neither value are skipped.
 */
export function buildFitnessTrend(
    wellness: readonly WellnessEntry[],
    maxPoints: number = DEFAULT_TREND_POINTS
): FitnessTrendPoint[] {
    const points: FitnessTrendPoint[] = []

    for (const entry of wellness) {
        const date = pickString(entry, WELLNESS_FIELDS.date)
        if (!date) continue
        const ctl = pickNumber(entry, WELLNESS_FIELDS.ctl)
        const atl = pickNumber(entry, WELLNESS_FIELDS.atl)
        if (ctl === null && atl === null) continue
        points.push({ date: date.slice(0, 10), ctl, atl })
    }

    points.sort((a, b) => a.date.localeCompare(b.date))
    return maxPoints > 0 ? points.slice(-maxPoints) : []
}

export function renderFitnessTrendTable(trend: readonly FitnessTrendPoint[]): string[] {
    const lines = [
        '| Date | Fitness (CTL) | Fatigue (ATL) | Form (TSB) |',
        '|---|---|---|---|',
    ]

    for (const point of trend) {
        const tsb = point.ctl !== null && point.atl !== null
            ? formatSigned(point.ctl - point.atl, 1)
            : NOT_AVAILABLE
        lines.push(`| ${point.date} | ${formatNumber(point.ctl, 1)} | ${formatNumber(point.atl, 1)} | ${tsb} |`)
    }

    return lines
}
