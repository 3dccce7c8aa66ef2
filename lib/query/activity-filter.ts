/**
 * Applies a QueryIntent to a newest-first activity list.
 *
 * Order is never changed. Date scopes compare the local start date
 * (YYYY-MM-DD) against an inclusive window computed from `now`.
 */

import { format, startOfWeek, subDays, subWeeks } from 'date-fns'
import type { Activity } from '@/types/training'
import { ACTIVITY_FIELDS, activityDate, pickString } from '../context/record-fields'
import type { ActivityTypeFilter, QueryIntent } from './types'

export interface FilterResult {
    activities: Activity[]
    description: string
}

interface DateWindow {
    start: string
    end?: string
}

const DATE_FORMAT = 'yyyy-MM-dd'

/** Case-insensitive substring match, so "ride" also keeps "VirtualRide" */
export function matchesActivityType(activity: Activity, filter: ActivityTypeFilter): boolean {
    const type = pickString(activity, ACTIVITY_FIELDS.type) ?? ''
    return type.toLowerCase().includes(filter)
}

function dateWindow(scope: QueryIntent['scope'], now: Date): DateWindow | null {
    const monday = startOfWeek(now, { weekStartsOn: 1 })

    switch (scope) {
        case 'today': {
            const today = format(now, DATE_FORMAT)
            return { start: today, end: today }
        }
        case 'yesterday': {
            const yesterday = format(subDays(now, 1), DATE_FORMAT)
            return { start: yesterday, end: yesterday }
        }
        case 'week':
            return { start: format(monday, DATE_FORMAT) }
        case 'last_week':
            return {
                start: format(subWeeks(monday, 1), DATE_FORMAT),
                end: format(subDays(monday, 1), DATE_FORMAT),
            }
        default:
            return null
    }
}

function inWindow(activity: Activity, window: DateWindow): boolean {
    const date = activityDate(activity)
    if (!date) return false
    return date >= window.start && (window.end === undefined || date <= window.end)
}

export function filterActivities(
    activities: readonly Activity[],
    intent: QueryIntent,
    now: Date = new Date()
): FilterResult {
    const description = intent.scopeDescription

    if (intent.scope === 'all' || intent.scope === 'range') {
        return { activities: [...activities], description }
    }

    const filter = intent.activityTypeFilter
    const typed = filter
        ? activities.filter(a => matchesActivityType(a, filter))
        : [...activities]

    if (intent.scope === 'latest') {
        return { activities: typed.slice(0, 1), description }
    }

    if (intent.scope === 'count') {
        return { activities: typed.slice(0, intent.count), description }
    }

    const window = dateWindow(intent.scope, now)
    return {
        activities: window ? typed.filter(a => inWindow(a, window)) : typed,
        description,
    }
}
