// Records as delivered by the training-data provider (intervals.icu).
// Field names vary between schema versions, so everything beyond the
// identifiers is optional and read through lib/context/record-fields.

export type ProviderRecord = Record<string, unknown>

export interface AthleteProfile extends ProviderRecord {
  id?: string
  name?: string | null
}

export interface Activity extends ProviderRecord {
  id: string | number
  type?: string
  name?: string | null
  start_date_local?: string
}

// Wellness entries are keyed by their ISO date
export interface WellnessEntry extends ProviderRecord {
  id: string
}

// Window the provider was queried for, not necessarily the one analyzed
export interface DateRange {
  start: string
  end: string
  days: number
}

export interface TrainingData {
  profile: AthleteProfile
  activities: Activity[]
  wellness: WellnessEntry[]
  dateRange: DateRange
}

export interface FitnessTrendPoint {
  date: string
  ctl: number | null
  atl: number | null
}
