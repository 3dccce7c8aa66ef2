export type QueryScope =
    | 'today'
    | 'yesterday'
    | 'latest'
    | 'week'
    | 'last_week'
    | 'count'
    | 'range'
    | 'all'

export type ActivityTypeFilter = 'run' | 'ride' | 'swim' | 'workout'

interface BaseIntent {
    activityTypeFilter?: ActivityTypeFilter
    scopeDescription: string
}

export interface CountIntent extends BaseIntent {
    scope: 'count'
    count: number
}

export interface WindowIntent extends BaseIntent {
    scope: Exclude<QueryScope, 'count'>
    count?: undefined
}

/** `count` only exists on the `count` scope */
export type QueryIntent = CountIntent | WindowIntent
