/**
 * Number Lexicon
 *
 * Maps digit strings and a language's written number words to integers.
 */

import { alternatives, normalizeWord } from './grammar'

export type NumberLexicon = {
  /** Integer value of a digit string or known number word, else null. */
  parse(token: string | undefined): number | null
  /** Regex fragment matching any digit run or known word. */
  readonly pattern: string
}

const DIGITS = /^\d+$/

export function createNumberLexicon(words: Readonly<Record<string, number>>): NumberLexicon {
  const table = new Map<string, number>()
  for (const [word, value] of Object.entries(words)) {
    table.set(normalizeWord(word), value)
  }
  const pattern = table.size === 0 ? '\\d+' : `(?:\\d+|${alternatives([...table.keys()])})`

  return Object.freeze({
    parse(token: string | undefined): number | null {
      if (token === undefined) return null
      if (DIGITS.test(token)) {
        const n = parseInt(token, 10)
        return Number.isSafeInteger(n) ? n : null
      }
      return table.get(normalizeWord(token)) ?? null
    },
    pattern,
  })
}

/** Parses a count and keeps it only if it lies in `[min, max]`. */
export function parseBounded(lexicon: NumberLexicon, token: string | undefined, min: number, max: number): number | null {
  const n = lexicon.parse(token)
  return n !== null && n >= min && n <= max ? n : null
}
