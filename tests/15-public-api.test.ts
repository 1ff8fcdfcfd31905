/**
 * Segment 15: Public API Tests
 *
 * The package entry point end to end.
 */

import { describe, it, expect } from 'vitest'
import {
  ExpressionKind,
  MatchConfidence,
  TimescanError,
  ValidationError,
  defaultScanner,
  scannerForLanguages,
  toByteSpan,
} from '../src'

describe('Segment 15: Public API', () => {
  const now = new Date('2026-02-07T14:30:00Z')

  it('scans mixed-language text through the entry point', () => {
    const text = 'Treffen morgen um 10 Uhr, then lunch tomorrow at 1pm'
    const matches = defaultScanner().scan(text, now)

    expect(matches.map(m => [m.language, m.text])).toEqual([
      ['de', 'morgen um 10 Uhr'],
      ['en', 'tomorrow at 1pm'],
    ])
    expect(matches.every(m => m.kind === ExpressionKind.Combined)).toBe(true)
    expect(matches.every(m => m.confidence === MatchConfidence.Complete)).toBe(true)
  })

  it('converts spans to UTF-8 byte offsets', () => {
    const text = 'über morgen um 9 Uhr'
    const [match] = scannerForLanguages(['de']).scan(text, now)
    expect(match?.span).toEqual({ start: 5, end: 20 })
    expect(match && toByteSpan(text, match.span)).toEqual({ start: 6, end: 21 })
  })

  it('exposes the error hierarchy', () => {
    expect(() => defaultScanner({ config: { maxMatches: -2 } })).toThrow(ValidationError)
    expect(new ValidationError('x')).toBeInstanceOf(TimescanError)
  })
})
