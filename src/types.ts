/**
 * Match Types
 *
 * The value types produced by a scan. Every TimeMatch is created fresh per
 * scan() call and frozen before it is returned.
 */

// ============================================================================
// Expression Kinds
// ============================================================================

export const ExpressionKind = {
  /** "today", "gestern", "ce vendredi": a whole calendar day. */
  RelativeDay: 'relativeDay',
  /** "in 4 days", "vor 3 Tagen": a whole day N days away. */
  RelativeDayOffset: 'relativeDayOffset',
  /** "at 3pm", "um 15 Uhr": a point on today's date. */
  TimeSpecification: 'timeSpecification',
  /** "between 9 and 12", "the last hour". */
  TimeRange: 'timeRange',
  /** A day expression followed by a time specification or range. */
  Combined: 'combined',
} as const

export type ExpressionKind = (typeof ExpressionKind)[keyof typeof ExpressionKind]

// ============================================================================
// Confidence
// ============================================================================

export const MatchConfidence = {
  /** The text ends with a prefix of a known keyword that is still being typed. */
  Partial: 'partial',
  Complete: 'complete',
} as const

export type MatchConfidence = (typeof MatchConfidence)[keyof typeof MatchConfidence]

// ============================================================================
// Spans & Resolved Times
// ============================================================================

/** Half-open `[start, end)` offsets into the scanned string (UTF-16 code units). */
export type Span = {
  readonly start: number
  readonly end: number
}

export type ResolvedPoint = {
  readonly type: 'point'
  readonly at: Date
}

/** `start` is inclusive, `end` exclusive; `start <= end` always holds. */
export type ResolvedRange = {
  readonly type: 'range'
  readonly start: Date
  readonly end: Date
}

export type ResolvedTime = ResolvedPoint | ResolvedRange

// ============================================================================
// Matches
// ============================================================================

export type TimeMatch = {
  readonly span: Span
  readonly kind: ExpressionKind
  readonly confidence: MatchConfidence
  /** Null only for partial matches the language declines to resolve. */
  readonly resolved: ResolvedTime | null
  /** The matched substring, `text.slice(span.start, span.end)`. */
  readonly text: string
  /** ISO-639-1 code of the language that produced the match. */
  readonly language: string
}

export function createMatch(
  text: string,
  start: number,
  end: number,
  fields: Pick<TimeMatch, 'kind' | 'confidence' | 'resolved' | 'language'>,
): TimeMatch {
  return Object.freeze({
    span: Object.freeze({ start, end }),
    kind: fields.kind,
    confidence: fields.confidence,
    resolved: fields.resolved,
    text: text.slice(start, end),
    language: fields.language,
  })
}
