import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { IntervalsApiError } from '../../errors'
import { IntervalsClient } from '../client'

const BASE_URL = 'https://intervals.test/api/v1'
const NOW = new Date(2025, 9, 22, 12, 0, 0)

type Route = (url: string) => Response

function json(body: unknown, status: number = 200, statusText: string = 'OK'): Response {
  return new Response(JSON.stringify(body), { status, statusText })
}

const PROFILE = { id: 'i123', name: 'Test Athlete', icu_weight: 70 }
const ACTIVITIES = [
  { id: 'a1', type: 'Ride', name: 'Older', start_date_local: '2025-10-19T09:00:00' },
  { id: 'a2', type: 'Run', name: 'Newer', start_date_local: '2025-10-22T07:00:00', distance: 5000 }
]
const WELLNESS = [{ id: '2025-10-21', ctl: 40, atl: 35 }]

const ok: Route = url => {
  if (url.includes('/wellness.json')) return json(WELLNESS)
  if (url.includes('/activities')) return json(ACTIVITIES)
  if (url.includes('/activity/')) return json(ACTIVITIES[1])
  return json(PROFILE)
}

describe('IntervalsClient', () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>()
  const client = new IntervalsClient('test-key', 'i123', BASE_URL)

  function serve(route: Route) {
    fetchMock.mockImplementation(async input => route(input))
  }

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  it('authenticates with Basic auth as API_KEY', async () => {
    serve(ok)

    await client.getAthleteProfile()

    const expected = `Basic ${Buffer.from('API_KEY:test-key').toString('base64')}`
    expect(fetchMock).toHaveBeenCalledWith(`${BASE_URL}/athlete/i123`, {
      headers: expect.objectContaining({ Authorization: expected, Accept: 'application/json' })
    })
  })

  it('returns activities newest first with the range in the query', async () => {
    serve(ok)

    const activities = await client.getActivities('2025-10-01', '2025-10-22')

    expect(activities.map(a => a.id)).toEqual(['a2', 'a1'])
    expect(activities[0].distance).toBe(5000)
    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/athlete/i123/activities?oldest=2025-10-01&newest=2025-10-22`)
  })

  it('fetches a single activity', async () => {
    serve(ok)

    const activity = await client.getActivityDetail('a2')

    expect(activity.name).toBe('Newer')
    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/activity/a2`)
  })

  it('assembles the training payload for the lookback window', async () => {
    serve(ok)

    const data = await client.fetchTrainingData(30, NOW)

    expect(data.dateRange).toEqual({ start: '2025-09-22', end: '2025-10-22', days: 30 })
    expect(data.profile).toEqual(PROFILE)
    expect(data.activities.map(a => a.id)).toEqual(['a2', 'a1'])
    expect(data.wellness).toEqual(WELLNESS)
    const urls = fetchMock.mock.calls.map(call => call[0])
    expect(urls).toContain(`${BASE_URL}/athlete/i123/wellness.json?oldest=2025-09-22&newest=2025-10-22`)
  })

  it('continues with empty wellness when it cannot be fetched', async () => {
    serve(url => url.includes('/wellness.json') ? json({}, 500, 'Internal Server Error') : ok(url))

    const data = await client.fetchTrainingData(30, NOW)

    expect(data.wellness).toEqual([])
    expect(data.activities).toHaveLength(2)
    expect(console.warn).toHaveBeenCalledWith(
      '[Intervals] Wellness data unavailable: intervals.icu API error: 500 Internal Server Error'
    )
  })

  it('explains a forbidden profile request', async () => {
    serve(() => json({}, 403, 'Forbidden'))

    const error = await client.getAthleteProfile().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(IntervalsApiError)
    expect(error).toMatchObject({
      status: 403,
      url: `${BASE_URL}/athlete/i123`,
      message: 'Authentication failed (403 Forbidden). ' +
        'Please check your INTERVALS_API key and ATHLETE_ID in .env file. ' +
        `Attempted to access: ${BASE_URL}/athlete/i123`
    })
  })

  it('fails the whole fetch when activities fail', async () => {
    serve(url => url.includes('/activities') ? json({}, 502, 'Bad Gateway') : ok(url))

    await expect(client.fetchTrainingData(30, NOW)).rejects.toThrow('intervals.icu API error: 502 Bad Gateway')
  })

  it('rejects payloads of the wrong shape', async () => {
    serve(() => json({ activities: [] }))

    await expect(client.getActivities()).rejects.toThrow(
      'Unexpected response from /athlete/i123/activities: Expected array, received object'
    )
  })

  it('normalizes a numeric athlete id to text', async () => {
    serve(() => json({ id: 123, name: null }))

    expect(await client.getAthleteProfile()).toEqual({ id: '123', name: null })
  })
})
