/**
 * Parser Configuration
 *
 * Fixed per scanner at construction and optionally overridden per scan() call.
 */

import { ValidationError } from './errors'

export type ParserConfig = {
  /** Report partial matches for a keyword prefix at the end of the text. */
  readonly reportPartial: boolean
  /** Upper bound on matches returned by one scan() call. */
  readonly maxMatches: number
}

export const DEFAULT_PARSER_CONFIG: ParserConfig = Object.freeze({
  reportPartial: true,
  maxMatches: 10,
})

export function resolveParserConfig(
  overrides: Partial<ParserConfig> = {},
  base: ParserConfig = DEFAULT_PARSER_CONFIG,
): ParserConfig {
  const reportPartial = overrides.reportPartial ?? base.reportPartial
  const maxMatches = overrides.maxMatches ?? base.maxMatches

  if (typeof reportPartial !== 'boolean') {
    throw new ValidationError(`reportPartial must be a boolean, got ${typeof reportPartial}`)
  }
  if (!isMatchCap(maxMatches)) {
    throw new ValidationError(`maxMatches must be a non-negative integer, got ${maxMatches}`)
  }

  return Object.freeze({ reportPartial, maxMatches })
}

/**
 * Per-call overrides over an already valid config. Never throws: a field that
 * would fail validation keeps the base value.
 */
export function applyScanOverrides(overrides: Partial<ParserConfig>, base: ParserConfig): ParserConfig {
  const reportPartial = typeof overrides.reportPartial === 'boolean' ? overrides.reportPartial : base.reportPartial
  const maxMatches = isMatchCap(overrides.maxMatches) ? overrides.maxMatches : base.maxMatches
  if (reportPartial === base.reportPartial && maxMatches === base.maxMatches) return base
  return Object.freeze({ reportPartial, maxMatches })
}

function isMatchCap(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
}
