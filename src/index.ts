/**
 * timescan
 *
 * Public API exports
 */

// Error system: base class, codes and every error class
export {
  TimescanError, TimescanErrorCode,
  ValidationError, InvalidLanguageModuleError, DuplicateLanguageError, RuleFailedError,
} from './errors'
export type { TimescanErrorCode as TimescanErrorCodeType } from './errors'

// Match types
export type {
  Span, ResolvedPoint, ResolvedRange, ResolvedTime, TimeMatch,
} from './types'
export { ExpressionKind, MatchConfidence } from './types'
export { spanLength, spansOverlap, sliceSpan, toByteSpan } from './span'

// Configuration
export type { ParserConfig } from './config'
export { DEFAULT_PARSER_CONFIG, applyScanOverrides, resolveParserConfig } from './config'

// Scanner
export type { Scanner, ScannerOptions } from './scanner'
export { createScanner, scannerForLanguages, defaultScanner } from './scanner'

// Deduplication
export type { Rankable } from './dedup'
export { deduplicateMatches, dominates } from './dedup'

// Prefilter
export type { PrefilterEntry, PrefilterHit, PrefilterSource } from './prefilter'
export { KeywordPrefilter } from './prefilter'

// Language modules
export type { LanguageModule, LanguageParser, PartialResolution } from './language-parser'
export { createLanguageParser, defaultPartialResolution, MIN_PREFIX_LENGTH } from './language-parser'
export { BUILTIN_LANGUAGES, DEFAULT_LANGUAGE_CODES, english, german, french, spanish } from './languages'

// Grammar rules
export type {
  Captures, Resolver, GrammarRule, RuleErrorHandler, DayAnchor, TimeClause, GrammarParts,
} from './grammar'
export {
  defineRule, dayRule, timeRule, combinedRule, composeRules, applyRules,
  alternation, createLookup, escapeRegExp, wordBounded, wordStart, wordEnd,
} from './grammar'
export type { NumberLexicon } from './numbers'
export { createNumberLexicon, parseBounded } from './numbers'

// Time resolution
export type { DayDirection, WeekDirection, DurationUnit } from './resolve'
export {
  startOfDay, resolveRelativeDay, resolveDayOffset,
  weekdayOffset, resolveWeekday,
  resolveTimeOfDay, resolveTimeOnDate, resolveTimeRange, resolveTimeRangeOnDate,
  resolveRelativeRange, resolveLastDuration, to24Hour,
} from './resolve'

// Calendar arithmetic
export type { CivilDate, Weekday } from './time-date'
export {
  isLeapYear, daysInMonth, isValidCivilDate, civilDateOf, instantOf,
  addDays, dayOfWeek,
} from './time-date'
