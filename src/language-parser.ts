/**
 * Language Parser
 *
 * Validates a language module against the plug-in contract and exposes the
 * uniform matching capability the scanner relies on. The scanner sees a
 * language only through this contract: its code, keywords, typing prefixes,
 * rules and partial-match policy.
 */

import { InvalidLanguageModuleError, RuleFailedError } from './errors'
import { type GrammarRule, type RuleErrorHandler, applyRules } from './grammar'
import { resolveRelativeDay } from './resolve'
import {
  type ResolvedTime,
  type TimeMatch,
  ExpressionKind,
  MatchConfidence,
  createMatch,
} from './types'

// ============================================================================
// Types
// ============================================================================

export type PartialResolution = {
  readonly kind: ExpressionKind
  readonly resolved: ResolvedTime | null
}

export type LanguageModule = {
  /** ISO-639-1 code, lower case. */
  readonly code: string
  readonly name?: string
  /** Full trigger words. Accent-free spellings are listed as entries of their own. */
  readonly keywords: readonly string[]
  /** Typing prefixes of keywords, at least MIN_PREFIX_LENGTH characters each. */
  readonly prefixes: readonly string[]
  /** Ordered with the more specific (combined) rules first. */
  readonly rules: readonly GrammarRule[]
  /**
   * Kind and best-effort resolution reported for a keyword prefix the user is
   * still typing. Returning null suppresses the partial match.
   */
  readonly resolvePartial?: (prefix: string, now: Date) => PartialResolution | null
}

export type LanguageParser = {
  readonly code: string
  readonly name: string
  readonly keywords: readonly string[]
  readonly prefixes: readonly string[]
  readonly rules: readonly GrammarRule[]
  /** Complete matches of every rule, overlaps included. */
  parse(text: string, now: Date, onRuleError: RuleErrorHandler): TimeMatch[]
  /** A partial match over `text[start, end)`, or null if the language declines it. */
  partialMatch(text: string, start: number, end: number, now: Date, onRuleError: RuleErrorHandler): TimeMatch | null
}

export const MIN_PREFIX_LENGTH = 3

/** Rule index reported when a module's partial policy throws. */
export const PARTIAL_RULE_INDEX = -1

const LANGUAGE_CODE = /^[a-z]{2}$/

// ============================================================================
// Partial Policy
// ============================================================================

/** Partial day words resolve to today until the word is complete. */
export function defaultPartialResolution(_prefix: string, now: Date): PartialResolution {
  return { kind: ExpressionKind.RelativeDay, resolved: resolveRelativeDay(0, now) }
}

// ============================================================================
// Construction
// ============================================================================

function validate(module: LanguageModule): void {
  if (!LANGUAGE_CODE.test(module.code)) {
    throw new InvalidLanguageModuleError(`Language code must be ISO-639-1 (two lower-case letters), got '${module.code}'`)
  }
  for (const keyword of module.keywords) {
    if (keyword.trim().length === 0) {
      throw new InvalidLanguageModuleError(`Language '${module.code}' declares an empty keyword`)
    }
  }
  for (const prefix of module.prefixes) {
    if (prefix.length < MIN_PREFIX_LENGTH) {
      throw new InvalidLanguageModuleError(
        `Language '${module.code}' declares prefix '${prefix}' shorter than ${MIN_PREFIX_LENGTH} characters`,
      )
    }
  }
}

export function createLanguageParser(module: LanguageModule): LanguageParser {
  validate(module)

  const { code } = module
  const rules = Object.freeze([...module.rules])
  const resolvePartial = module.resolvePartial ?? defaultPartialResolution

  return Object.freeze({
    code,
    name: module.name ?? code,
    keywords: Object.freeze([...module.keywords]),
    prefixes: Object.freeze([...module.prefixes]),
    rules,

    parse(text: string, now: Date, onRuleError: RuleErrorHandler): TimeMatch[] {
      return applyRules(rules, text, now, { language: code, onRuleError })
    },

    partialMatch(text: string, start: number, end: number, now: Date, onRuleError: RuleErrorHandler): TimeMatch | null {
      let partial: PartialResolution | null
      try {
        partial = resolvePartial(text.slice(start, end), now)
      } catch (e) {
        onRuleError(new RuleFailedError(code, PARTIAL_RULE_INDEX, e))
        return null
      }
      if (partial === null) return null
      return createMatch(text, start, end, {
        kind: partial.kind,
        confidence: MatchConfidence.Partial,
        resolved: partial.resolved,
        language: code,
      })
    },
  })
}
