/**
 * Training Context Formatter
 *
 * Renders profile, scoped activities, wellness and an optional fitness trend
 * into the Markdown block attached to every analysis prompt. Output is a pure
 * function of the input. Size is bounded by hard caps on the activity detail
 * and wellness sections.
 */

import type {
    Activity,
    AthleteProfile,
    DateRange,
    FitnessTrendPoint,
    WellnessEntry,
} from '@/types/training'
import { formatDistance, formatDuration } from '../utils/units'
import {
    ACTIVITY_RULES,
    FITNESS_RULES,
    IDENTITY_RULES,
    PHYSICAL_RULES,
    THRESHOLD_RULES,
    renderRules,
} from './field-rules'
import { ACTIVITY_FIELDS, activityDate, isPresent, pickNumber, pickString } from './record-fields'
import { renderFitnessTrendTable } from './fitness-trend'

/** Detail cap when the question targets a subset of activities */
export const SCOPED_ACTIVITY_LIMIT = 10
/** Detail cap for unscoped questions over the whole window */
export const FULL_ACTIVITY_LIMIT = 15
export const WELLNESS_LIMIT = 7

export interface TrainingContextInput {
    profile: AthleteProfile
    activities: readonly Activity[]
    wellness: readonly WellnessEntry[]
    scopeDescription: string
    dateRange: DateRange
    fitnessTrend?: readonly FitnessTrendPoint[]
}

export interface TrainingContextOptions {
    maxActivities?: number
}

interface TypeRollup {
    count: number
    distanceMeters: number
    durationSeconds: number
    trainingLoad: number
}

// ---------------------------------------------------------------------------
// Public entry point
// ---------------------------------------------------------------------------

export function formatTrainingContext(
    input: TrainingContextInput,
    options: TrainingContextOptions = {}
): string {
    const maxActivities = options.maxActivities ?? SCOPED_ACTIVITY_LIMIT

    const sections: string[] = [
        buildHeaderSection(input.scopeDescription, input.dateRange),
        buildProfileSection(input.profile),
        buildFitnessTrendSection(input.fitnessTrend),
        buildSummarySection(input.activities),
        buildTypeRollupSection(input.activities),
        buildActivityDetailSection(input.activities, maxActivities),
        buildWellnessSection(input.wellness),
    ]

    return sections.filter(Boolean).join('\n\n')
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function buildHeaderSection(scopeDescription: string, dateRange: DateRange): string {
    return [
        '# Training Data Analysis Context',
        '',
        '## Analysis Scope',
        `Focus: ${scopeDescription}`,
        `Data window: ${dateRange.start} to ${dateRange.end} (${dateRange.days} days)`,
    ].join('\n')
}

function buildProfileSection(profile: AthleteProfile): string {
    const blocks = [
        ['## Athlete Profile', ...renderRules(profile, IDENTITY_RULES)],
        ['### Physical Metrics', ...renderRules(profile, PHYSICAL_RULES)],
        ['### Fitness Metrics', ...renderRules(profile, FITNESS_RULES)],
    ]

    const thresholds = renderRules(profile, THRESHOLD_RULES)
    if (thresholds.length > 0) {
        blocks.push(['### Performance Thresholds', ...thresholds])
    }

    return blocks.map(lines => lines.join('\n')).join('\n\n')
}

function buildFitnessTrendSection(trend: readonly FitnessTrendPoint[] | undefined): string {
    if (!trend || trend.length === 0) return ''
    return ['## Fitness Trend', ...renderFitnessTrendTable(trend)].join('\n')
}

function buildSummarySection(activities: readonly Activity[]): string {
    const totals = rollup(activities)
    const lines = [
        '## Activities Summary',
        `Total activities: ${activities.length}`,
        `Total distance: ${formatDistance(totals.distanceMeters)}`,
        `Total duration: ${formatDuration(totals.durationSeconds)}`,
        `Total training load: ${totals.trainingLoad.toFixed(0)}`,
    ]

    if (activities.length === 0) {
        lines.push('No activities found for this scope.')
    }

    return lines.join('\n')
}

function buildTypeRollupSection(activities: readonly Activity[]): string {
    if (activities.length === 0) return ''

    // Map keeps first-occurrence order
    const groups = new Map<string, Activity[]>()
    for (const activity of activities) {
        const type = activityType(activity)
        const group = groups.get(type)
        if (group) {
            group.push(activity)
        } else {
            groups.set(type, [activity])
        }
    }

    const lines = ['### Activities by Type']
    for (const [type, group] of groups) {
        const totals = rollup(group)
        const noun = totals.count === 1 ? 'activity' : 'activities'
        lines.push(
            `- ${type}: ${totals.count} ${noun} | ${formatDistance(totals.distanceMeters)} | ` +
            `${formatDuration(totals.durationSeconds)} | Load: ${totals.trainingLoad.toFixed(0)}`
        )
    }

    return lines.join('\n')
}

function buildActivityDetailSection(activities: readonly Activity[], maxActivities: number): string {
    if (activities.length === 0) return ''

    const shown = activities.slice(0, Math.max(0, maxActivities))
    const heading = shown.length < activities.length
        ? `## Activity Details (showing ${shown.length} of ${activities.length})`
        : '## Activity Details'

    const blocks = shown.map((activity, i) => {
        const name = pickString(activity, ACTIVITY_FIELDS.name) ?? 'Unnamed'
        const date = activityDate(activity) || 'Unknown date'
        return [
            `### ${i + 1}. ${name} (${activityType(activity)}) - ${date}`,
            ...renderRules(activity, ACTIVITY_RULES),
        ].join('\n')
    })

    return [heading, ...blocks].join('\n\n')
}

function buildWellnessSection(wellness: readonly WellnessEntry[]): string {
    if (wellness.length === 0) {
        return '## Wellness Data\nNo wellness data available.'
    }

    const recent = [...wellness]
        .sort((a, b) => String(b.id).localeCompare(String(a.id)))
        .slice(0, WELLNESS_LIMIT)

    const lines = [
        '## Wellness Data',
        `Records available: ${wellness.length} (showing ${recent.length} most recent)`,
    ]
    for (const entry of recent) {
        lines.push(`- ${entry.id}: ${formatWellnessEntry(entry)}`)
    }

    return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function activityType(activity: Activity): string {
    return pickString(activity, ACTIVITY_FIELDS.type) ?? 'Unknown'
}

function rollup(activities: readonly Activity[]): TypeRollup {
    const totals: TypeRollup = { count: 0, distanceMeters: 0, durationSeconds: 0, trainingLoad: 0 }
    for (const activity of activities) {
        totals.count++
        totals.distanceMeters += pickNumber(activity, ACTIVITY_FIELDS.distance) ?? 0
        totals.durationSeconds += pickNumber(activity, ACTIVITY_FIELDS.movingTime) ?? 0
        totals.trainingLoad += pickNumber(activity, ACTIVITY_FIELDS.trainingLoad) ?? 0
    }
    return totals
}

export function formatWellnessEntry(entry: WellnessEntry): string {
    const parts: string[] = []
    for (const [key, value] of Object.entries(entry)) {
        if (key === 'id' || !isPresent(value)) continue
        parts.push(`${key}: ${formatWellnessValue(value)}`)
    }
    return parts.length > 0 ? parts.join(', ') : 'No data'
}

function formatWellnessValue(value: unknown): string {
    if (typeof value === 'number') {
        return Number.isFinite(value) && !Number.isInteger(value) ? value.toFixed(2) : String(value)
    }
    if (typeof value === 'string' || typeof value === 'boolean') return String(value)
    return JSON.stringify(value)
}
