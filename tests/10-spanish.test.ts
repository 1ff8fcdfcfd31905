/**
 * Segment 10: Spanish Language Tests
 */

import { describe, it, expect } from 'vitest'
import { scannerForLanguages } from '../src/scanner'

const scanner = scannerForLanguages(['es'])

// A Saturday and a Sunday
const saturday = new Date('2026-02-07T14:30:00Z')
const sunday = new Date('2026-02-08T12:00:00Z')

const point = (iso: string) => ({ type: 'point', at: new Date(iso) })
const range = (start: string, end: string) => ({ type: 'range', start: new Date(start), end: new Date(end) })

function only(text: string, now: Date = saturday) {
  const matches = scanner.scan(text, now)
  expect(matches).toHaveLength(1)
  const [match] = matches
  if (match === undefined) throw new Error('expected one match')
  return match
}

// ============================================================================
// 1. DAYS
// ============================================================================

describe('Day words', () => {
  it('resolves hoy, mañana and ayer', () => {
    expect(only('hoy').resolved).toEqual(range('2026-02-07T00:00:00Z', '2026-02-08T00:00:00Z'))
    expect(only('mañana').resolved).toEqual(range('2026-02-08T00:00:00Z', '2026-02-09T00:00:00Z'))
    expect(only('manana').resolved).toEqual(range('2026-02-08T00:00:00Z', '2026-02-09T00:00:00Z'))
    expect(only('Ayer').resolved).toEqual(range('2026-02-06T00:00:00Z', '2026-02-07T00:00:00Z'))
  })

  it('prefers pasado mañana over mañana', () => {
    const match = only('pasado mañana')
    expect(match.span).toEqual({ start: 0, end: 13 })
    expect(match.resolved).toEqual(range('2026-02-09T00:00:00Z', '2026-02-10T00:00:00Z'))
    expect(only('anteayer').resolved).toEqual(range('2026-02-05T00:00:00Z', '2026-02-06T00:00:00Z'))
  })
})

describe('Weekdays', () => {
  it('reads directions before and after the weekday', () => {
    const next = range('2026-02-20T00:00:00Z', '2026-02-21T00:00:00Z')
    expect(only('el próximo viernes', sunday).resolved).toEqual(next)
    expect(only('el viernes que viene', sunday).span).toEqual({ start: 0, end: 20 })
    expect(only('el viernes que viene', sunday).resolved).toEqual(next)
    expect(only('este viernes', sunday).resolved).toEqual(range('2026-02-13T00:00:00Z', '2026-02-14T00:00:00Z'))
  })

  it('reads pasado after the weekday as last week', () => {
    const match = only('el viernes pasado', sunday)
    expect(match.span).toEqual({ start: 0, end: 17 })
    expect(match.resolved).toEqual(range('2026-02-06T00:00:00Z', '2026-02-07T00:00:00Z'))
  })
})

describe('Day counts', () => {
  it('counts backward with hace and forward with en', () => {
    const past = only('hace tres días')
    expect(past.kind).toBe('relativeDayOffset')
    expect(past.resolved).toEqual(range('2026-02-04T00:00:00Z', '2026-02-05T00:00:00Z'))
    expect(only('en 4 dias').resolved).toEqual(range('2026-02-11T00:00:00Z', '2026-02-12T00:00:00Z'))
  })
})

// ============================================================================
// 2. TIMES
// ============================================================================

describe('Times of day', () => {
  it('reads a la and a las', () => {
    const match = only('a la 1')
    expect(match.span).toEqual({ start: 0, end: 6 })
    expect(match.resolved).toEqual(point('2026-02-07T01:00:00Z'))
    expect(only('a las 10:30').resolved).toEqual(point('2026-02-07T10:30:00Z'))
  })
})

describe('Hour ranges', () => {
  it('resolves entre ranges on today', () => {
    const match = only('entre las 9 y las 12')
    expect(match.kind).toBe('timeRange')
    expect(match.span).toEqual({ start: 0, end: 20 })
    expect(match.resolved).toEqual(range('2026-02-07T09:00:00Z', '2026-02-07T12:00:00Z'))
  })
})

describe('Trailing durations', () => {
  it('ends at the reference instant', () => {
    const match = only('la última hora')
    expect(match.span).toEqual({ start: 0, end: 14 })
    expect(match.resolved).toEqual(range('2026-02-07T13:30:00Z', '2026-02-07T14:30:00Z'))
    expect(only('las últimas 2 horas').resolved).toEqual(range('2026-02-07T12:30:00Z', '2026-02-07T14:30:00Z'))
  })
})

// ============================================================================
// 3. COMBINED
// ============================================================================

describe('Combined expressions', () => {
  it('anchors a time on a day word', () => {
    const match = only('ayer a las 3')
    expect(match.kind).toBe('combined')
    expect(match.span).toEqual({ start: 0, end: 12 })
    expect(match.resolved).toEqual(point('2026-02-06T03:00:00Z'))
    expect(only('mañana a las 10:30').resolved).toEqual(point('2026-02-08T10:30:00Z'))
  })

  it('keeps the day when the time is impossible', () => {
    const match = only('hoy a las 25')
    expect(match.kind).toBe('relativeDay')
    expect(match.span).toEqual({ start: 0, end: 3 })
  })
})

describe('Partial matches', () => {
  it('reports a typed range keyword as an unresolved range', () => {
    const [match] = scanner.scan('nos vemos entr', saturday)
    expect(match?.span).toEqual({ start: 10, end: 14 })
    expect(match?.kind).toBe('timeRange')
    expect(match?.resolved).toBeNull()
  })
})
