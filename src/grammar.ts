/**
 * Grammar Rules
 *
 * A grammar rule pairs one compiled pattern with a pure resolver. Languages
 * build most of their rules by composing day anchors ("yesterday",
 * "next Friday") with time clauses ("at 3pm", "between 9 and 12"):
 * every anchor and every clause becomes a rule on its own, and every
 * anchor × clause pair becomes a combined rule.
 */

import { RuleFailedError } from './errors'
import { startOfDay } from './resolve'
import {
  type ResolvedRange,
  type ResolvedTime,
  type TimeMatch,
  ExpressionKind,
  MatchConfidence,
  createMatch,
} from './types'

// ============================================================================
// Types
// ============================================================================

/** Named capture groups of one pattern match. */
export type Captures = Readonly<Record<string, string | undefined>>

export type Resolver = (captures: Captures, now: Date) => ResolvedTime | null

export type GrammarRule = {
  readonly pattern: RegExp
  readonly kind: ExpressionKind
  readonly resolve: Resolver
}

export type RuleErrorHandler = (error: RuleFailedError) => void

/**
 * A day expression. `resolveDay` returns the whole day as a range;
 * combined rules anchor their time clause on its start.
 */
export type DayAnchor = {
  readonly pattern: string
  readonly kind: typeof ExpressionKind.RelativeDay | typeof ExpressionKind.RelativeDayOffset
  readonly resolveDay: (captures: Captures, now: Date) => ResolvedRange | null
}

/** A time expression resolved against the UTC midnight of some day. */
export type TimeClause = {
  readonly pattern: string
  /** Pattern used when the clause stands alone; defaults to `pattern`. */
  readonly standalonePattern?: string
  readonly kind: typeof ExpressionKind.TimeSpecification | typeof ExpressionKind.TimeRange
  readonly resolveOn: (captures: Captures, day: Date) => ResolvedTime | null
}

// ============================================================================
// Pattern Fragments
// ============================================================================

// ECMAScript \b only knows ASCII word characters, which breaks on "à" or "über".
export const wordStart = '(?<![\\p{L}\\p{N}_])'
export const wordEnd = '(?![\\p{L}\\p{N}_])'

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * `a|b|c` for a word list, longest first so that no word shadows a longer one.
 * Spaces inside a word match any run of whitespace.
 */
export function alternatives(words: readonly string[]): string {
  return [...new Set(words)]
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
    .map(word => word.split(/\s+/).map(escapeRegExp).join('\\s+'))
    .join('|')
}

export function alternation(words: readonly string[]): string {
  return `(?:${alternatives(words)})`
}

/** Case-insensitive, whitespace-normalising lookup over a word table. */
export function createLookup<V>(table: Readonly<Record<string, V>>): (word: string | undefined) => V | null {
  const entries = new Map<string, V>()
  for (const [word, value] of Object.entries(table)) {
    entries.set(normalizeWord(word), value)
  }
  return word => (word === undefined ? null : entries.get(normalizeWord(word)) ?? null)
}

export function normalizeWord(word: string): string {
  return word.trim().replace(/\s+/g, ' ').toLowerCase()
}

// ============================================================================
// Rule Construction
// ============================================================================

/**
 * Compiles a rule. String patterns get the flags `giu`; a RegExp keeps its
 * own flags and only gains `g` when it lacks it.
 */
export function defineRule(pattern: string | RegExp, kind: ExpressionKind, resolve: Resolver): GrammarRule {
  let compiled: RegExp
  if (typeof pattern === 'string') compiled = new RegExp(pattern, 'giu')
  else if (pattern.global) compiled = pattern
  else compiled = new RegExp(pattern.source, pattern.flags + 'g')
  return Object.freeze({ pattern: compiled, kind, resolve })
}

/** Wraps a pattern so that it only matches whole words. */
export function wordBounded(pattern: string): string {
  return `${wordStart}${pattern}${wordEnd}`
}

export function dayRule(anchor: DayAnchor): GrammarRule {
  return defineRule(wordBounded(anchor.pattern), anchor.kind, anchor.resolveDay)
}

export function timeRule(clause: TimeClause): GrammarRule {
  return defineRule(wordBounded(clause.standalonePattern ?? clause.pattern), clause.kind, (captures, now) => {
    const today = startOfDay(0, now)
    return today === null ? null : clause.resolveOn(captures, today)
  })
}

export function combinedRule(anchor: DayAnchor, clause: TimeClause): GrammarRule {
  return defineRule(wordBounded(`${anchor.pattern}\\s+${clause.pattern}`), ExpressionKind.Combined, (captures, now) => {
    const day = anchor.resolveDay(captures, now)
    return day === null ? null : clause.resolveOn(captures, day.start)
  })
}

export type GrammarParts = {
  readonly anchors: readonly DayAnchor[]
  readonly clauses: readonly TimeClause[]
  /** Rules that are neither anchors nor clauses, e.g. trailing durations. */
  readonly extra?: readonly GrammarRule[]
}

/** Combined rules first, then day rules, extra rules and standalone clauses. */
export function composeRules(parts: GrammarParts): GrammarRule[] {
  const rules: GrammarRule[] = []
  for (const anchor of parts.anchors) {
    for (const clause of parts.clauses) rules.push(combinedRule(anchor, clause))
  }
  for (const anchor of parts.anchors) rules.push(dayRule(anchor))
  rules.push(...(parts.extra ?? []))
  for (const clause of parts.clauses) rules.push(timeRule(clause))
  return rules
}

// ============================================================================
// Rule Application
// ============================================================================

export type ApplyContext = {
  readonly language: string
  readonly onRuleError: RuleErrorHandler
}

/**
 * Runs every rule over the whole text. Each match whose resolver returns a
 * time becomes a complete candidate; empty matches and declined resolutions
 * are dropped. Overlaps are left for deduplication.
 */
export function applyRules(
  rules: readonly GrammarRule[],
  text: string,
  now: Date,
  context: ApplyContext,
): TimeMatch[] {
  const matches: TimeMatch[] = []

  for (const [ruleIndex, rule] of rules.entries()) {
    for (const m of text.matchAll(rule.pattern)) {
      if (m.index === undefined || m[0].length === 0) continue
      const start = m.index
      const end = start + m[0].length

      let resolved: ResolvedTime | null
      try {
        resolved = rule.resolve(m.groups ?? {}, now)
      } catch (e) {
        context.onRuleError(new RuleFailedError(context.language, ruleIndex, e))
        continue
      }
      if (resolved === null) continue

      matches.push(createMatch(text, start, end, {
        kind: rule.kind,
        confidence: MatchConfidence.Complete,
        resolved,
        language: context.language,
      }))
    }
  }

  return matches
}
