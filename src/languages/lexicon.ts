/**
 * Language Lexicons
 *
 * Each built-in language keeps its word lists in a JSON file beside its
 * module: trigger keywords, typing prefixes, number words, day words,
 * weekday names, direction words and duration units. loadLexicon() checks
 * the tables and turns them into lookups and regex alternations.
 */

import { InvalidLanguageModuleError } from '../errors'
import { alternation, createLookup } from '../grammar'
import { type NumberLexicon, createNumberLexicon } from '../numbers'
import { type DurationUnit, type WeekDirection, isDurationUnit, isWeekDirection } from '../resolve'
import { type Weekday, isWeekday } from '../time-date'

// ============================================================================
// Types
// ============================================================================

/** Shape of a language's JSON word file. */
export type LexiconData = {
  readonly code: string
  readonly name: string
  readonly keywords: readonly string[]
  readonly prefixes: readonly string[]
  readonly numbers: Readonly<Record<string, number>>
  /** Day word to day offset from today. */
  readonly days: Readonly<Record<string, number>>
  /** Weekday name to `mon` .. `sun`. */
  readonly weekdays: Readonly<Record<string, string>>
  /** Direction words placed before the weekday, to -1, 0 or 1. */
  readonly directions: Readonly<Record<string, number>>
  /** Direction words placed after the weekday. */
  readonly trailingDirections?: Readonly<Record<string, number>>
  /** Unit words of trailing durations to `hour` or `minute`. */
  readonly units: Readonly<Record<string, string>>
  /** Keywords that open an hour range; their prefixes report as time ranges. */
  readonly rangeWords: readonly string[]
}

type Lookup<V> = (word: string | undefined) => V | null

export type Lexicon = {
  readonly code: string
  readonly name: string
  readonly keywords: readonly string[]
  readonly prefixes: readonly string[]
  readonly rangeWords: readonly string[]
  readonly numbers: NumberLexicon
  /** Regex alternations over each word table. */
  readonly words: {
    readonly days: string
    readonly weekdays: string
    readonly directions: string
    readonly trailingDirections: string
    readonly units: string
  }
  readonly dayOffset: Lookup<number>
  readonly weekday: Lookup<Weekday>
  readonly direction: Lookup<WeekDirection>
  readonly trailingDirection: Lookup<WeekDirection>
  readonly unit: Lookup<DurationUnit>
}

// ============================================================================
// Loading
// ============================================================================

function narrowTable<T, V extends T>(
  code: string,
  field: string,
  table: Readonly<Record<string, T>>,
  guard: (value: T) => value is V,
): Record<string, V> {
  const narrowed: Record<string, V> = {}
  for (const [word, value] of Object.entries(table)) {
    if (!guard(value)) {
      throw new InvalidLanguageModuleError(`Language '${code}' maps '${word}' in ${field} to unsupported value ${String(value)}`)
    }
    narrowed[word] = value
  }
  return narrowed
}

function isDayOffset(value: number): value is number {
  return Number.isSafeInteger(value)
}

export function loadLexicon(data: LexiconData): Lexicon {
  const { code } = data
  const days = narrowTable(code, 'days', data.days, isDayOffset)
  const weekdays = narrowTable(code, 'weekdays', data.weekdays, isWeekday)
  const directions = narrowTable(code, 'directions', data.directions, isWeekDirection)
  const trailingDirections = narrowTable(code, 'trailingDirections', data.trailingDirections ?? {}, isWeekDirection)
  const units = narrowTable(code, 'units', data.units, isDurationUnit)

  return Object.freeze({
    code,
    name: data.name,
    keywords: Object.freeze([...data.keywords]),
    prefixes: Object.freeze([...data.prefixes]),
    rangeWords: Object.freeze(data.rangeWords.map(word => word.toLowerCase())),
    numbers: createNumberLexicon(data.numbers),
    words: Object.freeze({
      days: alternation(Object.keys(days)),
      weekdays: alternation(Object.keys(weekdays)),
      directions: alternation(Object.keys(directions)),
      trailingDirections: alternation(Object.keys(trailingDirections)),
      units: alternation(Object.keys(units)),
    }),
    dayOffset: createLookup(days),
    weekday: createLookup(weekdays),
    direction: createLookup(directions),
    trailingDirection: createLookup(trailingDirections),
    unit: createLookup(units),
  })
}
