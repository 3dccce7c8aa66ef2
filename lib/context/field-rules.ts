/**
 * Declarative render rules for profile and activity facts.
 *
 * A rule names its source keys, how to format the value, and whether the line
 * is always shown (`N/A` when missing) or only when the record carries the
 * concept. Rules render in the order they are declared.
 */

import type { ProviderRecord } from '@/types/training'
import {
    NOT_AVAILABLE,
    formatDistance,
    formatDuration,
    formatNumber,
    formatPace,
    formatSigned,
    formatZoneTimes,
    toNumber,
} from '../utils/units'
import {
    ACTIVITY_FIELDS,
    PROFILE_FIELDS,
    type FieldKeys,
    isPresent,
    pickField,
    pickNumber,
} from './record-fields'

export interface FieldRule {
    label: string
    keys: FieldKeys
    format: (value: unknown) => string
    /** Show the line with N/A when the record has no value */
    always?: boolean
    /** Replaces the default non-null presence test */
    present?: (value: unknown) => boolean
}

export interface DerivedRule {
    label: string
    /** Returns null when the inputs are incomplete; the line is then left out */
    derive: (record: ProviderRecord) => string | null
}

export type RenderRule = FieldRule | DerivedRule

function isDerived(rule: RenderRule): rule is DerivedRule {
    return 'derive' in rule
}

export function renderRule(record: ProviderRecord, rule: RenderRule): string | null {
    if (isDerived(rule)) {
        const value = rule.derive(record)
        return value === null ? null : `${rule.label}: ${value}`
    }

    const value = pickField(record, rule.keys)
    const present = rule.present ? rule.present(value) : isPresent(value)
    if (!present) {
        return rule.always ? `${rule.label}: ${NOT_AVAILABLE}` : null
    }
    return `${rule.label}: ${rule.format(value)}`
}

/** Rendered rules as Markdown bullet lines */
export function renderRules(record: ProviderRecord, rules: readonly RenderRule[]): string[] {
    const lines: string[] = []
    for (const rule of rules) {
        const line = renderRule(record, rule)
        if (line !== null) lines.push(`- ${line}`)
    }
    return lines
}

// ---------------------------------------------------------------------------
// Formatters
// ---------------------------------------------------------------------------

const fixed = (decimals: number, unit?: string) => (value: unknown) => formatNumber(value, decimals, unit)

function formatText(value: unknown): string {
    if (typeof value === 'string' || typeof value === 'number') return String(value)
    if (typeof value === 'boolean') return value ? 'Yes' : 'No'
    return NOT_AVAILABLE
}

function formatPercent(value: unknown): string {
    const n = toNumber(value)
    return n === null ? NOT_AVAILABLE : `${n.toFixed(1)}%`
}

function formatRpe(value: unknown): string {
    const n = toNumber(value)
    return n === null ? NOT_AVAILABLE : `${n.toFixed(0)}/10`
}

/** Threshold pace is m/s when numeric; some schemas send preformatted text */
function formatThresholdPace(value: unknown): string {
    return typeof value === 'string' && toNumber(value) === null ? value : formatPace(value)
}

/** Training Stress Balance: fitness minus fatigue */
export function deriveTsb(record: ProviderRecord): string | null {
    const ctl = pickNumber(record, PROFILE_FIELDS.ctl)
    const atl = pickNumber(record, PROFILE_FIELDS.atl)
    if (ctl === null || atl === null) return null
    return formatSigned(ctl - atl, 1)
}

// ---------------------------------------------------------------------------
// Profile
// ---------------------------------------------------------------------------

export const IDENTITY_RULES: readonly RenderRule[] = [
    { label: 'Name', keys: PROFILE_FIELDS.name, format: formatText, always: true },
    { label: 'Athlete ID', keys: PROFILE_FIELDS.athleteId, format: formatText },
    { label: 'Sex', keys: PROFILE_FIELDS.sex, format: formatText },
    { label: 'Timezone', keys: PROFILE_FIELDS.timezone, format: formatText },
]

export const PHYSICAL_RULES: readonly RenderRule[] = [
    { label: 'Weight', keys: PROFILE_FIELDS.weight, format: fixed(1, 'kg'), always: true },
    { label: 'Height', keys: PROFILE_FIELDS.height, format: fixed(2, 'm') },
    { label: 'Resting HR', keys: PROFILE_FIELDS.restingHr, format: fixed(0, 'bpm'), always: true },
    { label: 'Max HR', keys: PROFILE_FIELDS.maxHr, format: fixed(0, 'bpm') },
]

export const FITNESS_RULES: readonly RenderRule[] = [
    { label: 'Fitness (CTL)', keys: PROFILE_FIELDS.ctl, format: fixed(1), always: true },
    { label: 'Fatigue (ATL)', keys: PROFILE_FIELDS.atl, format: fixed(1), always: true },
    { label: 'Form (TSB)', derive: deriveTsb },
    { label: 'Ramp Rate', keys: PROFILE_FIELDS.rampRate, format: fixed(2) },
]

export const THRESHOLD_RULES: readonly RenderRule[] = [
    { label: 'Cycling FTP', keys: PROFILE_FIELDS.ftp, format: fixed(0, 'W') },
    { label: 'Estimated FTP', keys: PROFILE_FIELDS.eftp, format: fixed(0, 'W') },
    { label: 'FTP per kg', keys: PROFILE_FIELDS.wattsPerKg, format: fixed(2, 'W/kg') },
    { label: 'Threshold HR (LTHR)', keys: PROFILE_FIELDS.lthr, format: fixed(0, 'bpm') },
    { label: 'Running Threshold Pace', keys: PROFILE_FIELDS.thresholdPace, format: formatThresholdPace },
]

// ---------------------------------------------------------------------------
// Activities
// ---------------------------------------------------------------------------

export const ACTIVITY_RULES: readonly RenderRule[] = [
    { label: 'Distance', keys: ACTIVITY_FIELDS.distance, format: formatDistance, always: true },
    { label: 'Duration', keys: ACTIVITY_FIELDS.movingTime, format: formatDuration, always: true },
    { label: 'Avg HR', keys: ACTIVITY_FIELDS.averageHr, format: fixed(0, 'bpm'), always: true },
    { label: 'Max HR', keys: ACTIVITY_FIELDS.maxHr, format: fixed(0, 'bpm') },
    { label: 'Avg Power', keys: ACTIVITY_FIELDS.averageWatts, format: fixed(0, 'W') },
    { label: 'Normalized Power', keys: ACTIVITY_FIELDS.normalizedWatts, format: fixed(0, 'W') },
    {
        label: 'Power Meter',
        keys: ACTIVITY_FIELDS.powerMeter,
        format: formatText,
        present: value => isPresent(value) && value !== false && value !== '',
    },
    { label: 'Training Load', keys: ACTIVITY_FIELDS.trainingLoad, format: fixed(0), always: true },
    { label: 'Intensity', keys: ACTIVITY_FIELDS.intensity, format: formatPercent },
    { label: 'Efficiency Factor', keys: ACTIVITY_FIELDS.efficiencyFactor, format: fixed(2) },
    { label: 'Decoupling', keys: ACTIVITY_FIELDS.decoupling, format: formatPercent },
    { label: 'RPE', keys: ACTIVITY_FIELDS.rpe, format: formatRpe },
    { label: 'Avg Cadence', keys: ACTIVITY_FIELDS.cadence, format: fixed(0, 'rpm') },
    { label: 'Elevation Gain', keys: ACTIVITY_FIELDS.elevationGain, format: fixed(0, 'm') },
    { label: 'Calories', keys: ACTIVITY_FIELDS.calories, format: fixed(0, 'kcal') },
    {
        label: 'HR Zones',
        keys: ACTIVITY_FIELDS.hrZoneTimes,
        format: formatZoneTimes,
        present: Array.isArray,
    },
    { label: 'Temperature', keys: ACTIVITY_FIELDS.temperature, format: fixed(1, '°C') },
    { label: 'Device', keys: ACTIVITY_FIELDS.device, format: formatText },
]
