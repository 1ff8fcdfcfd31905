/**
 * Time Resolution
 *
 * Pure functions turning a reference instant plus a day or time selector into
 * a concrete UTC point or range. Every function returns null instead of
 * throwing when the input is out of range or the result cannot be represented;
 * grammar rules turn null into "no match".
 */

import type { ResolvedPoint, ResolvedRange } from './types'
import {
  type Weekday,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  addDays,
  civilDateOf,
  dayOfWeek,
  instantOf,
  shiftInstant,
  weekdayToIndex,
} from './time-date'

// ============================================================================
// Types
// ============================================================================

export type DayDirection = 'past' | 'future'

/** -1 = last week's occurrence, 0 = this week's, 1 = next week's. */
export type WeekDirection = -1 | 0 | 1

export type DurationUnit = 'hour' | 'minute'

// Offsets beyond this cannot land inside the time value range from any valid instant.
const MAX_DAY_SHIFT = 200_000_000

const UNIT_MS: Record<DurationUnit, number> = {
  hour: MS_PER_HOUR,
  minute: MS_PER_MINUTE,
}

// ============================================================================
// Guards
// ============================================================================

function isHour(hour: number): boolean {
  return Number.isInteger(hour) && hour >= 0 && hour <= 23
}

function isMinute(minute: number): boolean {
  return Number.isInteger(minute) && minute >= 0 && minute <= 59
}

export function isWeekDirection(n: number): n is WeekDirection {
  return n === -1 || n === 0 || n === 1
}

export function isDurationUnit(value: string): value is DurationUnit {
  return value === 'hour' || value === 'minute'
}

function range(start: Date | null, end: Date | null): ResolvedRange | null {
  if (start === null || end === null) return null
  if (start.getTime() > end.getTime()) return null
  return Object.freeze({ type: 'range', start, end })
}

function point(at: Date | null): ResolvedPoint | null {
  return at === null ? null : Object.freeze({ type: 'point', at })
}

// ============================================================================
// Days
// ============================================================================

/** UTC midnight `offsetDays` days after the day `now` falls on. */
export function startOfDay(offsetDays: number, now: Date): Date | null {
  if (!Number.isSafeInteger(offsetDays) || Math.abs(offsetDays) > MAX_DAY_SHIFT) return null
  const today = civilDateOf(now)
  if (today === null) return null
  return instantOf(addDays(today, offsetDays))
}

/** The whole UTC day `offsetDays` away: `[midnight, next midnight)`. */
export function resolveRelativeDay(offsetDays: number, now: Date): ResolvedRange | null {
  const start = startOfDay(offsetDays, now)
  if (start === null) return null
  return range(start, startOfDay(offsetDays + 1, now))
}

/**
 * The whole day `days` days in the past or future. The count is not bounded
 * here; grammars restrict what they accept.
 */
export function resolveDayOffset(days: number, direction: DayDirection, now: Date): ResolvedRange | null {
  if (!Number.isSafeInteger(days)) return null
  return resolveRelativeDay(direction === 'past' ? -days : days, now)
}

// ============================================================================
// Weekdays
// ============================================================================

/**
 * Day offset from `now` to `weekday`. Direction 0 is today or the next
 * occurrence within six days; 1 and -1 shift that by a week.
 */
export function weekdayOffset(weekday: Weekday, direction: WeekDirection, now: Date): number | null {
  const today = civilDateOf(now)
  if (today === null) return null
  const current = weekdayToIndex(dayOfWeek(today))
  const target = weekdayToIndex(weekday)
  return ((target - current + 7) % 7) + 7 * direction
}

export function resolveWeekday(weekday: Weekday, direction: WeekDirection, now: Date): ResolvedRange | null {
  const offset = weekdayOffset(weekday, direction, now)
  return offset === null ? null : resolveRelativeDay(offset, now)
}

// ============================================================================
// Times of Day
// ============================================================================

/** `hour:minute` on the UTC date `day` falls on. */
export function resolveTimeOnDate(day: Date, hour: number, minute = 0): ResolvedPoint | null {
  if (!isHour(hour) || !isMinute(minute)) return null
  const date = civilDateOf(day)
  if (date === null) return null
  return point(instantOf(date, hour, minute))
}

export function resolveTimeOfDay(hour: number, minute: number, now: Date): ResolvedPoint | null {
  return resolveTimeOnDate(now, hour, minute)
}

/** Whole hours `[startHour:00, endHour:00)` on the date `day` falls on; no wraparound past midnight. */
export function resolveTimeRangeOnDate(day: Date, startHour: number, endHour: number): ResolvedRange | null {
  if (!isHour(startHour) || !isHour(endHour)) return null
  if (endHour < startHour) return null
  const date = civilDateOf(day)
  if (date === null) return null
  return range(instantOf(date, startHour), instantOf(date, endHour))
}

export function resolveTimeRange(
  startHour: number,
  endHour: number,
  now: Date,
  dayOffset = 0,
): ResolvedRange | null {
  const day = startOfDay(dayOffset, now)
  return day === null ? null : resolveTimeRangeOnDate(day, startHour, endHour)
}

/**
 * 12-hour clock to 24-hour. "12am" is midnight, "12pm" noon.
 * Hours outside 1-12 and unknown suffixes decline.
 */
export function to24Hour(hour: number, meridiem: string): number | null {
  if (!Number.isInteger(hour) || hour < 1 || hour > 12) return null
  switch (meridiem.toLowerCase()) {
    case 'am': return hour === 12 ? 0 : hour
    case 'pm': return hour === 12 ? 12 : hour + 12
    default: return null
  }
}

// ============================================================================
// Trailing Durations
// ============================================================================

/** `[now - durationMs, now)`. */
export function resolveRelativeRange(durationMs: number, now: Date): ResolvedRange | null {
  if (!Number.isFinite(durationMs) || durationMs < 0) return null
  return range(shiftInstant(now, -durationMs), shiftInstant(now, 0))
}

/** "the last hour", "the last 3 minutes". */
export function resolveLastDuration(unit: DurationUnit, now: Date, count = 1): ResolvedRange | null {
  if (!Number.isSafeInteger(count) || count < 1) return null
  return resolveRelativeRange(count * UNIT_MS[unit], now)
}
