/**
 * Query Classifier
 *
 * Maps a free-text training question to a QueryIntent using an ordered
 * decision table. Rules are checked in order; first match wins, so the more
 * specific phrasings sit above the general ones.
 *
 * @example
 * classify("Analyze my last 5 runs")
 * // { scope: 'count', count: 5, activityTypeFilter: 'run', scopeDescription: 'last 5 runs' }
 */

import type { ActivityTypeFilter, QueryIntent } from './types'

export interface QueryClassifier {
    classify(query: string): QueryIntent
}

export interface ClassificationRule {
    name: string
    matches: (query: string) => boolean
    build: (query: string) => QueryIntent
}

const TYPE_KEYWORDS: ReadonlyArray<readonly [ActivityTypeFilter, readonly string[]]> = [
    ['run', ['run']],
    ['ride', ['ride', 'bike', 'cycle', 'cycling']],
    ['workout', ['workout']],
    ['swim', ['swim']],
]

const TYPE_NOUNS: Record<ActivityTypeFilter, { singular: string; plural: string }> = {
    run: { singular: 'run', plural: 'runs' },
    ride: { singular: 'ride', plural: 'rides' },
    workout: { singular: 'workout', plural: 'workouts' },
    swim: { singular: 'swim', plural: 'swims' },
}

const TODAY_KEYWORDS = ['today', 'todays', "today's"]
const LATEST_KEYWORDS = ['latest', 'most recent', 'last workout', 'last run', 'last ride']
const COUNT_PATTERN = /last\s+(\d+)/
// "last 2 weeks" is a date range, not a count of activities
const RANGE_UNITS = ['days', 'weeks', 'months']

function containsAny(query: string, keywords: readonly string[]): boolean {
    return keywords.some(k => query.includes(k))
}

/** First activity type (in TYPE_KEYWORDS order) whose keyword appears in the query */
export function detectActivityType(
    query: string,
    allowed: readonly ActivityTypeFilter[] = ['run', 'ride', 'workout', 'swim']
): ActivityTypeFilter | undefined {
    for (const [type, keywords] of TYPE_KEYWORDS) {
        if (allowed.includes(type) && containsAny(query, keywords)) return type
    }
    return undefined
}

function parseCount(query: string): number | null {
    if (containsAny(query, RANGE_UNITS)) return null
    const match = COUNT_PATTERN.exec(query)
    if (!match) return null
    const n = Number.parseInt(match[1], 10)
    return n > 0 ? n : null
}

function dayIntent(
    scope: 'today' | 'yesterday',
    query: string,
    allowed: readonly ActivityTypeFilter[]
): QueryIntent {
    const type = detectActivityType(query, allowed)
    return {
        scope,
        activityTypeFilter: type,
        scopeDescription: `${scope}'s ${type ? TYPE_NOUNS[type].singular : 'activities'}`,
    }
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
    {
        name: 'today',
        matches: q => containsAny(q, TODAY_KEYWORDS),
        build: q => dayIntent('today', q, ['run', 'ride', 'workout', 'swim']),
    },
    {
        name: 'yesterday',
        matches: q => q.includes('yesterday'),
        build: q => dayIntent('yesterday', q, ['run', 'ride']),
    },
    {
        name: 'latest',
        matches: q => containsAny(q, LATEST_KEYWORDS),
        build: q => {
            const type = detectActivityType(q, ['run', 'ride'])
            return {
                scope: 'latest',
                activityTypeFilter: type,
                scopeDescription: `most recent ${type ? TYPE_NOUNS[type].singular : 'activity'}`,
            }
        },
    },
    {
        name: 'this_week',
        matches: q => q.includes('this week'),
        build: () => ({ scope: 'week', scopeDescription: "this week's activities" }),
    },
    {
        name: 'last_week',
        matches: q => q.includes('last week'),
        build: () => ({ scope: 'last_week', scopeDescription: "last week's activities" }),
    },
    {
        name: 'count',
        matches: q => parseCount(q) !== null,
        build: q => {
            const count = parseCount(q) ?? 1
            const type = detectActivityType(q, ['run', 'ride'])
            return {
                scope: 'count',
                count,
                activityTypeFilter: type,
                scopeDescription: `last ${count} ${type ? TYPE_NOUNS[type].plural : 'activities'}`,
            }
        },
    },
]

export class RuleBasedQueryClassifier implements QueryClassifier {
    constructor(private readonly rules: readonly ClassificationRule[] = CLASSIFICATION_RULES) {}

    classify(query: string): QueryIntent {
        const normalized = query.toLowerCase()
        for (const rule of this.rules) {
            if (rule.matches(normalized)) return rule.build(normalized)
        }
        return { scope: 'all', scopeDescription: 'all activities' }
    }
}

const defaultClassifier = new RuleBasedQueryClassifier()

export function classify(query: string): QueryIntent {
    return defaultClassifier.classify(query)
}
