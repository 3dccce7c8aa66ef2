import { describe, it, expect } from 'vitest'
import { RuleBasedQueryClassifier, classify, detectActivityType } from '../classifier'

describe('classify', () => {
  it('scopes today without a type to all of today', () => {
    expect(classify('How was my training today?')).toEqual({
      scope: 'today',
      activityTypeFilter: undefined,
      scopeDescription: "today's activities"
    })
  })

  it("narrows today's run to runs", () => {
    const intent = classify("How was today's run?")
    expect(intent.scope).toBe('today')
    expect(intent.activityTypeFilter).toBe('run')
    expect(intent.scopeDescription).toBe("today's run")
  })

  it('recognizes swims only for today', () => {
    expect(classify('today swim').activityTypeFilter).toBe('swim')
    expect(classify('yesterday swim').activityTypeFilter).toBeUndefined()
  })

  it('handles yesterday with a ride synonym', () => {
    const intent = classify('Yesterday I went cycling, thoughts?')
    expect(intent.scope).toBe('yesterday')
    expect(intent.activityTypeFilter).toBe('ride')
    expect(intent.scopeDescription).toBe("yesterday's ride")
  })

  it('picks the most recent activity for latest phrasings', () => {
    expect(classify('Tell me about my latest ride')).toEqual({
      scope: 'latest',
      activityTypeFilter: 'ride',
      scopeDescription: 'most recent ride'
    })
    expect(classify('How did my last workout feel?').scopeDescription).toBe('most recent activity')
  })

  it('does not narrow week scopes by type', () => {
    expect(classify('What about my running this week?')).toEqual({
      scope: 'week',
      scopeDescription: "this week's activities"
    })
    expect(classify('Summarize last week').scope).toBe('last_week')
  })

  it('parses an activity count', () => {
    expect(classify('Analyze my last 5 runs')).toEqual({
      scope: 'count',
      count: 5,
      activityTypeFilter: 'run',
      scopeDescription: 'last 5 runs'
    })
  })

  it('counts without a type when none is mentioned', () => {
    expect(classify('Compare my last 3 interval sessions')).toEqual({
      scope: 'count',
      count: 3,
      activityTypeFilter: undefined,
      scopeDescription: 'last 3 activities'
    })
  })

  it('leaves date ranges to the lookback parser', () => {
    expect(classify('How was the last 2 days?').scope).toBe('all')
    expect(classify('Trend over the last 6 weeks').scope).toBe('all')
  })

  it('ignores a zero count', () => {
    expect(classify('my last 0 sessions').scope).toBe('all')
  })

  it('falls back to all activities', () => {
    expect(classify('')).toEqual({ scope: 'all', scopeDescription: 'all activities' })
    expect(classify('Am I overtraining?')).toEqual({ scope: 'all', scopeDescription: 'all activities' })
  })

  it('is case-insensitive', () => {
    expect(classify('ANALYZE MY LAST 2 RIDES')).toEqual({
      scope: 'count',
      count: 2,
      activityTypeFilter: 'ride',
      scopeDescription: 'last 2 rides'
    })
  })

  it('applies the earliest matching rule', () => {
    // "today" sits above "last N"
    expect(classify('today vs my last 3 runs').scope).toBe('today')
  })

  it('returns a fresh default intent on every call', () => {
    const first = classify('anything')
    first.scopeDescription = 'changed'
    expect(classify('anything').scopeDescription).toBe('all activities')
  })
})

describe('RuleBasedQueryClassifier', () => {
  it('accepts a custom rule table', () => {
    const classifier = new RuleBasedQueryClassifier([
      {
        name: 'race',
        matches: q => q.includes('race'),
        build: () => ({ scope: 'latest', scopeDescription: 'race day' })
      }
    ])
    expect(classifier.classify('How was the RACE?')).toEqual({ scope: 'latest', scopeDescription: 'race day' })
    expect(classifier.classify('today').scope).toBe('all')
  })
})

describe('detectActivityType', () => {
  it('checks types in a fixed order', () => {
    expect(detectActivityType('run then bike')).toBe('run')
    expect(detectActivityType('bike then run')).toBe('run')
  })

  it('respects the allowed list', () => {
    expect(detectActivityType('strength workout', ['run', 'ride'])).toBeUndefined()
    expect(detectActivityType('strength workout')).toBe('workout')
  })
})
