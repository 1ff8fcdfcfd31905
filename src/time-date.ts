/**
 * Calendar Utilities
 *
 * Pure functions for proleptic Gregorian calendar arithmetic over UTC instants.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Nothing here reads the host timezone.
 */

// ============================================================================
// Types
// ============================================================================

/** A calendar date with a 1-based month. */
export type CivilDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Constants
// ============================================================================

export const MS_PER_MINUTE = 60_000
export const MS_PER_HOUR = 60 * MS_PER_MINUTE
export const MS_PER_DAY = 24 * MS_PER_HOUR

/** Largest magnitude an ECMAScript time value may take (100,000,000 days). */
export const MAX_TIME_MS = 8.64e15

const EPOCH_JDN = 2440588 // 1970-01-01

const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

export function isValidCivilDate(date: CivilDate): boolean {
  const { year, month, day } = date
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInMonth(year, month)
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): CivilDate {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Instants
// ============================================================================

export function isValidInstant(instant: Date): boolean {
  return !Number.isNaN(instant.getTime())
}

/** The calendar date `instant` falls on in UTC, or null for an invalid Date. */
export function civilDateOf(instant: Date): CivilDate | null {
  if (!isValidInstant(instant)) return null
  return jdnToDate(Math.floor(instant.getTime() / MS_PER_DAY) + EPOCH_JDN)
}

/**
 * The UTC instant at `hour:minute:second` on `date`.
 * Returns null when a component is out of range or the result is not a representable time value.
 */
export function instantOf(date: CivilDate, hour = 0, minute = 0, second = 0): Date | null {
  if (!isValidCivilDate(date)) return null
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) return null
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) return null
  if (!Number.isInteger(second) || second < 0 || second > 59) return null

  const epochDay = dateToJDN(date.year, date.month, date.day) - EPOCH_JDN
  const ms = epochDay * MS_PER_DAY + hour * MS_PER_HOUR + minute * MS_PER_MINUTE + second * 1000
  if (Math.abs(ms) > MAX_TIME_MS) return null
  return new Date(ms)
}

/** Shifts an instant by a number of milliseconds, or null if the result leaves the time value range. */
export function shiftInstant(instant: Date, ms: number): Date | null {
  const base = instant.getTime()
  if (Number.isNaN(base) || !Number.isFinite(ms)) return null
  const shifted = base + ms
  if (Math.abs(shifted) > MAX_TIME_MS) return null
  return new Date(shifted)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: CivilDate, n: number): CivilDate {
  return jdnToDate(dateToJDN(date.year, date.month, date.day) + n)
}

// ============================================================================
// Weekdays
// ============================================================================

export function dayOfWeek(date: CivilDate): Weekday {
  // JDN 0 was a Monday
  const idx = ((dateToJDN(date.year, date.month, date.day) % 7) + 7) % 7
  return WEEKDAYS[idx] ?? 'mon'
}

export function weekdayToIndex(weekday: Weekday): number {
  return WEEKDAYS.indexOf(weekday)
}

export function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some(weekday => weekday === value)
}
