import { format, subDays } from 'date-fns'
import { z } from 'zod'
import type { Activity, AthleteProfile, TrainingData, WellnessEntry } from '@/types/training'
import { IntervalsApiError, errorMessage } from '../errors'
import { INTERVALS_BASE_URL } from '../config'
import { ActivitySchema, ActivityListSchema, AthleteProfileSchema, WellnessListSchema } from './types'

const USER_AGENT = 'training-analyst/0.1'
const DATE_FORMAT = 'yyyy-MM-dd'

/**
 * intervals.icu REST client.
 * Authenticates with HTTP Basic, username `API_KEY` and the API key as password.
 */
export class IntervalsClient {
    private authHeader: string

    constructor(
        apiKey: string,
        private readonly athleteId: string,
        private readonly baseUrl: string = INTERVALS_BASE_URL
    ) {
        this.authHeader = `Basic ${Buffer.from(`API_KEY:${apiKey}`).toString('base64')}`
    }

    /**
     * Athlete profile including current fitness metrics
     */
    async getAthleteProfile(): Promise<AthleteProfile> {
        try {
            return await this.get(`/athlete/${this.athleteId}`, AthleteProfileSchema)
        } catch (error) {
            if (error instanceof IntervalsApiError && error.status === 403) {
                throw new IntervalsApiError(
                    'Authentication failed (403 Forbidden). ' +
                    'Please check your INTERVALS_API key and ATHLETE_ID in .env file. ' +
                    `Attempted to access: ${error.url}`,
                    error.status,
                    error.url
                )
            }
            throw error
        }
    }

    /**
     * Activities in a date range (YYYY-MM-DD), newest first
     */
    async getActivities(oldest?: string, newest?: string): Promise<Activity[]> {
        const activities = await this.get(
            `/athlete/${this.athleteId}/activities`,
            ActivityListSchema,
            { oldest, newest }
        )
        return sortNewestFirst(activities)
    }

    /**
     * Full detail for a single activity
     */
    async getActivityDetail(activityId: string | number): Promise<Activity> {
        return this.get(`/activity/${activityId}`, ActivitySchema)
    }

    /**
     * Wellness entries in a date range (YYYY-MM-DD)
     */
    async getWellness(oldest?: string, newest?: string): Promise<WellnessEntry[]> {
        return this.get(`/athlete/${this.athleteId}/wellness.json`, WellnessListSchema, { oldest, newest })
    }

    /**
     * Profile, activities and wellness for the last `daysBack` days.
     * Wellness is optional: if it cannot be fetched the result carries an empty list.
     */
    async fetchTrainingData(daysBack: number = 30, now: Date = new Date()): Promise<TrainingData> {
        const start = format(subDays(now, daysBack), DATE_FORMAT)
        const end = format(now, DATE_FORMAT)

        const [profile, activities, wellness] = await Promise.all([
            this.getAthleteProfile(),
            this.getActivities(start, end),
            this.getWellness(start, end).catch((error: unknown) => {
                console.warn(`[Intervals] Wellness data unavailable: ${errorMessage(error)}`)
                return []
            }),
        ])

        return {
            profile,
            activities,
            wellness,
            dateRange: { start, end, days: daysBack },
        }
    }

    private async get<S extends z.ZodTypeAny>(
        path: string,
        schema: S,
        params: Record<string, string | undefined> = {}
    ): Promise<z.output<S>> {
        const query = new URLSearchParams()
        for (const [key, value] of Object.entries(params)) {
            if (value) query.append(key, value)
        }
        const qs = query.toString()
        const url = `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`

        const response = await fetch(url, {
            headers: {
                'Authorization': this.authHeader,
                'Accept': 'application/json',
                'User-Agent': USER_AGENT,
            },
        })

        if (!response.ok) {
            throw new IntervalsApiError(
                `intervals.icu API error: ${response.status} ${response.statusText}`,
                response.status,
                url
            )
        }

        const body: unknown = await response.json()
        const parsed = schema.safeParse(body)
        if (!parsed.success) {
            throw new IntervalsApiError(
                `Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`,
                response.status,
                url
            )
        }
        return parsed.data
    }
}

function sortNewestFirst(activities: Activity[]): Activity[] {
    return [...activities].sort((a, b) =>
        (b.start_date_local ?? '').localeCompare(a.start_date_local ?? '')
    )
}
