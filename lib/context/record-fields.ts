/**
 * Alias-tolerant field access for provider records.
 *
 * Each concept maps to an ordered list of candidate keys; the first key with a
 * non-null value wins. Provider schema drift is handled by editing these
 * tables, not the formatting code.
 */

import type { ProviderRecord } from '@/types/training'
import { toNumber } from '../utils/units'

export type FieldKeys = readonly string[]

export const PROFILE_FIELDS = {
    name: ['name', 'firstname'],
    athleteId: ['id'],
    sex: ['sex'],
    timezone: ['timezone'],
    weight: ['icu_weight', 'weight'],
    height: ['height'],
    restingHr: ['icu_resting_hr', 'resting_hr'],
    maxHr: ['max_hr', 'icu_max_hr'],
    ctl: ['ctl', 'icu_ctl'],
    atl: ['atl', 'icu_atl'],
    rampRate: ['rampRate', 'ramp_rate'],
    ftp: ['icu_ftp', 'ftp'],
    eftp: ['icu_eftp', 'eftp'],
    wattsPerKg: ['ftpWattsPerKg', 'icu_w_per_kg'],
    lthr: ['lthr', 'icu_lthr'],
    thresholdPace: ['threshold_pace', 'pace'],
} as const satisfies Record<string, FieldKeys>

export const ACTIVITY_FIELDS = {
    name: ['name'],
    type: ['type'],
    startDate: ['start_date_local', 'start_date'],
    distance: ['distance', 'icu_distance'],
    movingTime: ['moving_time', 'elapsed_time'],
    averageHr: ['average_heartrate', 'average_hr', 'icu_average_hr'],
    maxHr: ['max_heartrate', 'max_hr'],
    averageWatts: ['icu_average_watts', 'average_watts'],
    normalizedWatts: ['icu_weighted_avg_watts', 'weighted_average_watts'],
    powerMeter: ['power_meter', 'device_watts'],
    trainingLoad: ['icu_training_load', 'training_load'],
    intensity: ['icu_intensity', 'intensity'],
    efficiencyFactor: ['icu_efficiency_factor', 'efficiency_factor'],
    decoupling: ['decoupling', 'icu_decoupling'],
    rpe: ['perceived_exertion', 'icu_rpe'],
    cadence: ['average_cadence'],
    elevationGain: ['total_elevation_gain', 'icu_elevation_gain'],
    calories: ['calories'],
    hrZoneTimes: ['icu_hr_zone_times', 'hr_zone_times'],
    temperature: ['average_weather_temp', 'average_temp'],
    device: ['device_name'],
} as const satisfies Record<string, FieldKeys>

export const WELLNESS_FIELDS = {
    date: ['id'],
    ctl: ['ctl', 'icu_ctl'],
    atl: ['atl', 'icu_atl'],
} as const satisfies Record<string, FieldKeys>

export function isPresent(value: unknown): boolean {
    return value !== undefined && value !== null
}

/** First non-null value among the candidate keys, or undefined */
export function pickField(record: ProviderRecord, keys: FieldKeys): unknown {
    for (const key of keys) {
        const value = record[key]
        if (isPresent(value)) return value
    }
    return undefined
}

export function pickNumber(record: ProviderRecord, keys: FieldKeys): number | null {
    return toNumber(pickField(record, keys))
}

export function pickString(record: ProviderRecord, keys: FieldKeys): string | null {
    const value = pickField(record, keys)
    if (typeof value === 'string') return value
    if (typeof value === 'number') return String(value)
    return null
}

/** Local start date (YYYY-MM-DD) of an activity, or '' when unknown */
export function activityDate(record: ProviderRecord): string {
    return pickString(record, ACTIVITY_FIELDS.startDate)?.slice(0, 10) ?? ''
}
