/**
 * Expression Forms
 *
 * The day anchors, time clauses and rules every built-in language is made
 * of. A language supplies the surface pattern with the named groups each
 * form reads; the form supplies the resolution.
 *
 * Group names: `day`, `dir`, `wd` and `count` belong to anchors; `hour`,
 * `minute`, `ampm`, `from` and `to` to clauses. Keeping the two sets apart
 * lets any anchor combine with any clause in one pattern.
 */

import {
  type Captures,
  type DayAnchor,
  type GrammarRule,
  type TimeClause,
  defineRule,
  wordBounded,
} from '../grammar'
import {
  type LanguageModule,
  type PartialResolution,
  defaultPartialResolution,
} from '../language-parser'
import { createNumberLexicon, parseBounded } from '../numbers'
import {
  type DayDirection,
  type WeekDirection,
  resolveDayOffset,
  resolveLastDuration,
  resolveRelativeDay,
  resolveTimeOnDate,
  resolveTimeRangeOnDate,
  resolveWeekday,
} from '../resolve'
import { ExpressionKind } from '../types'
import type { Lexicon } from './lexicon'

/** Day counts accepted by "in N days" and its translations. */
export const MIN_DAY_COUNT = 1
export const MAX_DAY_COUNT = 30

/** Counts accepted by "the last N hours" and its translations. */
export const MAX_DURATION_COUNT = 60

const digits = createNumberLexicon({})

// ============================================================================
// Day Anchors
// ============================================================================

/** "today", "morgen", "hier": group `day`. */
export function dayWordAnchor(lexicon: Lexicon): DayAnchor {
  return {
    pattern: `(?<day>${lexicon.words.days})`,
    kind: ExpressionKind.RelativeDay,
    resolveDay: (captures, now) => {
      const offset = lexicon.dayOffset(captures.day)
      return offset === null ? null : resolveRelativeDay(offset, now)
    },
  }
}

/** "next Friday", "vendredi prochain": groups `dir` and `wd`. */
export function weekdayAnchor(
  pattern: string,
  lexicon: Lexicon,
  direction: (word: string | undefined) => WeekDirection | null,
): DayAnchor {
  return {
    pattern,
    kind: ExpressionKind.RelativeDay,
    resolveDay: (captures, now) => {
      const weekday = lexicon.weekday(captures.wd)
      const dir = direction(captures.dir)
      return weekday === null || dir === null ? null : resolveWeekday(weekday, dir, now)
    },
  }
}

/** "in 4 days", "vor drei Tagen": group `count`, 1 to 30. */
export function dayCountAnchor(pattern: string, lexicon: Lexicon, direction: DayDirection): DayAnchor {
  return {
    pattern,
    kind: ExpressionKind.RelativeDayOffset,
    resolveDay: (captures, now) => {
      const days = parseBounded(lexicon.numbers, captures.count, MIN_DAY_COUNT, MAX_DAY_COUNT)
      return days === null ? null : resolveDayOffset(days, direction, now)
    },
  }
}

// ============================================================================
// Time Clauses
// ============================================================================

export type ClockClauseOptions = {
  standalonePattern?: string
  /** Converts the written hour to 0-23, e.g. from a 12-hour clock. */
  toHour?: (hour: number, captures: Captures) => number | null
}

/** "at 3pm", "um 15:30 Uhr": groups `hour` and optional `minute`. */
export function clockClause(pattern: string, options: ClockClauseOptions = {}): TimeClause {
  const { toHour } = options
  return {
    pattern,
    standalonePattern: options.standalonePattern,
    kind: ExpressionKind.TimeSpecification,
    resolveOn: (captures, day) => {
      const written = digits.parse(captures.hour)
      if (written === null) return null
      const hour = toHour === undefined ? written : toHour(written, captures)
      if (hour === null) return null
      const minute = captures.minute === undefined ? 0 : digits.parse(captures.minute)
      return minute === null ? null : resolveTimeOnDate(day, hour, minute)
    },
  }
}

/** "between 9 and 12": groups `from` and `to`, digits or number words. */
export function hourRangeClause(pattern: string, lexicon: Lexicon): TimeClause {
  return {
    pattern,
    kind: ExpressionKind.TimeRange,
    resolveOn: (captures, day) => {
      const from = lexicon.numbers.parse(captures.from)
      const to = lexicon.numbers.parse(captures.to)
      return from === null || to === null ? null : resolveTimeRangeOnDate(day, from, to)
    },
  }
}

// ============================================================================
// Trailing Durations
// ============================================================================

/** "the last hour", "die letzten 3 Minuten": optional group `count`, group `unit`. */
export function lastDurationRule(pattern: string, lexicon: Lexicon): GrammarRule {
  return defineRule(wordBounded(pattern), ExpressionKind.TimeRange, (captures, now) => {
    const unit = lexicon.unit(captures.unit)
    if (unit === null) return null
    const count = captures.count === undefined
      ? 1
      : parseBounded(lexicon.numbers, captures.count, 1, MAX_DURATION_COUNT)
    return count === null ? null : resolveLastDuration(unit, now, count)
  })
}

// ============================================================================
// Modules
// ============================================================================

/**
 * Prefixes of a range keyword ("betw") report as a time range without a
 * resolution; every other prefix falls back to today.
 */
export function rangeAwarePartial(lexicon: Lexicon): (prefix: string, now: Date) => PartialResolution | null {
  return (prefix, now) => {
    const folded = prefix.toLowerCase()
    if (lexicon.rangeWords.some(word => word.startsWith(folded))) {
      return { kind: ExpressionKind.TimeRange, resolved: null }
    }
    return defaultPartialResolution(prefix, now)
  }
}

export function createLanguageModule(lexicon: Lexicon, rules: readonly GrammarRule[]): LanguageModule {
  return Object.freeze({
    code: lexicon.code,
    name: lexicon.name,
    keywords: lexicon.keywords,
    prefixes: lexicon.prefixes,
    rules,
    resolvePartial: rangeAwarePartial(lexicon),
  })
}
