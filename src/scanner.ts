/**
 * Scanner
 *
 * Orchestrates one scan: prefilter gate, every enabled language's rules,
 * the trailing partial match, then deduplication. A scanner is immutable
 * after construction; scan() keeps all of its state in locals.
 */

import { type ParserConfig, applyScanOverrides, resolveParserConfig } from './config'
import { deduplicateMatches } from './dedup'
import { DuplicateLanguageError, type RuleFailedError } from './errors'
import type { RuleErrorHandler } from './grammar'
import { type LanguageModule, type LanguageParser, createLanguageParser } from './language-parser'
import { BUILTIN_LANGUAGES, DEFAULT_LANGUAGE_CODES } from './languages'
import { KEYWORD_HIT, PREFIX_HIT, KeywordPrefilter } from './prefilter'
import type { TimeMatch } from './types'

// ============================================================================
// Types
// ============================================================================

export type ScannerOptions = {
  /** Scanner-wide configuration; unset fields take the defaults. */
  config?: Partial<ParserConfig>
  /** Receives resolver failures. Defaults to console.error. */
  onRuleError?: RuleErrorHandler
}

export type Scanner = {
  /** Codes of the enabled languages, in enable order. */
  readonly languages: readonly string[]
  readonly config: ParserConfig
  /**
   * All time expressions in `text`, resolved against `now`, sorted by start
   * and pairwise non-overlapping. Returns an empty array when nothing matches.
   */
  scan(text: string, now: Date, overrides?: Partial<ParserConfig>): readonly TimeMatch[]
}

const NO_MATCHES: readonly TimeMatch[] = Object.freeze([])

const WORD_CHAR = /[\p{L}\p{N}_]/u

function logRuleError(error: RuleFailedError): void {
  console.error(`Time expression rule error in '${error.language}':`, error)
}

function atWordStart(text: string, index: number): boolean {
  return index === 0 || !WORD_CHAR.test(text.charAt(index - 1))
}

// ============================================================================
// Construction
// ============================================================================

export function createScanner(modules: readonly LanguageModule[], options: ScannerOptions = {}): Scanner {
  const config = resolveParserConfig(options.config)
  const onRuleError = options.onRuleError ?? logRuleError

  const parsers = new Map<string, LanguageParser>()
  for (const module of modules) {
    if (parsers.has(module.code)) {
      throw new DuplicateLanguageError(`Language '${module.code}' is enabled more than once`)
    }
    parsers.set(module.code, createLanguageParser(module))
  }
  const enabled = [...parsers.values()]

  const prefilter = new KeywordPrefilter(enabled.map(parser => ({
    language: parser.code,
    keywords: parser.keywords,
    prefixes: parser.prefixes,
  })))

  /**
   * One partial match for a declared prefix that ends the text and starts a
   * word. Longer prefixes are tried first; among the languages declaring a
   * prefix, the first enabled one that accepts it wins.
   */
  function findPartial(text: string, now: Date): TimeMatch | null {
    for (const entry of prefilter.suffixEntries(text)) {
      if (entry.kind !== 'prefix') continue
      const start = text.length - entry.word.length
      if (!atWordStart(text, start)) continue

      for (const code of entry.languages) {
        const match = parsers.get(code)?.partialMatch(text, start, text.length, now, onRuleError) ?? null
        if (match !== null) return match
      }
    }
    return null
  }

  return Object.freeze({
    languages: Object.freeze(enabled.map(parser => parser.code)),
    config,

    scan(text: string, now: Date, overrides?: Partial<ParserConfig>): readonly TimeMatch[] {
      const effective = overrides === undefined ? config : applyScanOverrides(overrides, config)

      const hits = prefilter.probe(text, effective.reportPartial)
      if (hits === 0) return NO_MATCHES

      const candidates: TimeMatch[] = []

      if ((hits & KEYWORD_HIT) !== 0) {
        for (const parser of enabled) {
          candidates.push(...parser.parse(text, now, onRuleError))
        }
      }

      if (effective.reportPartial && (hits & PREFIX_HIT) !== 0) {
        const partial = findPartial(text, now)
        if (partial !== null) candidates.push(partial)
      }

      if (candidates.length === 0) return NO_MATCHES
      return deduplicateMatches(candidates, effective.maxMatches)
    },
  })
}

/**
 * Scanner over the built-in languages named in `codes`. Unknown codes are
 * skipped and repeated codes collapse; `scanner.languages` lists what was
 * enabled.
 */
export function scannerForLanguages(codes: Iterable<string>, options: ScannerOptions = {}): Scanner {
  const modules: LanguageModule[] = []
  const seen = new Set<string>()
  for (const code of codes) {
    const module = BUILTIN_LANGUAGES.get(code)
    if (module === undefined || seen.has(code)) continue
    seen.add(code)
    modules.push(module)
  }
  return createScanner(modules, options)
}

/** A fresh scanner with every built-in language enabled. */
export function defaultScanner(options: ScannerOptions = {}): Scanner {
  return scannerForLanguages(DEFAULT_LANGUAGE_CODES, options)
}
