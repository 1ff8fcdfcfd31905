/**
 * Segment 14: Language Lexicon Tests
 *
 * Loading and checking the JSON word tables behind the built-in languages.
 */

import { describe, it, expect } from 'vitest'
import { InvalidLanguageModuleError } from '../src/errors'
import { createLanguageParser } from '../src/language-parser'
import { BUILTIN_LANGUAGES, DEFAULT_LANGUAGE_CODES } from '../src/languages'
import { type LexiconData, loadLexicon } from '../src/languages/lexicon'
import { createNumberLexicon } from '../src/numbers'

const data: LexiconData = {
  code: 'xx',
  name: 'Test',
  keywords: ['soon'],
  prefixes: ['soo'],
  numbers: { uno: 1 },
  days: { soon: 1, 'right now': 0 },
  weekdays: { lun: 'mon' },
  directions: { nxt: 1 },
  units: { hr: 'hour' },
  rangeWords: ['Amid'],
}

describe('loadLexicon', () => {
  const lexicon = loadLexicon(data)

  it('builds alternations over each table, longest first', () => {
    expect(lexicon.words.days).toBe('(?:right\\s+now|soon)')
    expect(lexicon.words.units).toBe('(?:hr)')
  })

  it('looks words up ignoring case', () => {
    expect(lexicon.dayOffset('SOON')).toBe(1)
    expect(lexicon.weekday('Lun')).toBe('mon')
    expect(lexicon.direction('nxt')).toBe(1)
    expect(lexicon.unit('hr')).toBe('hour')
    expect(lexicon.numbers.parse('uno')).toBe(1)
  })

  it('reads multi-word numbers across any whitespace', () => {
    const numbers = createNumberLexicon({ 'vingt et un': 21 })
    expect(numbers.parse('vingt et un')).toBe(21)
    expect(numbers.parse('Vingt  et\nun')).toBe(21)
    expect(new RegExp(`^${numbers.pattern}$`).test('vingt\tet un')).toBe(true)
  })

  it('treats missing trailing directions as an empty table', () => {
    expect(lexicon.trailingDirection('nxt')).toBeNull()
  })

  it('lower-cases range words', () => {
    expect(lexicon.rangeWords).toEqual(['amid'])
  })

  it('rejects unknown weekdays, directions and units', () => {
    expect(() => loadLexicon({ ...data, weekdays: { lun: 'monday' } }))
      .toThrow("Language 'xx' maps 'lun' in weekdays to unsupported value monday")
    expect(() => loadLexicon({ ...data, directions: { nxt: 2 } })).toThrow(InvalidLanguageModuleError)
    expect(() => loadLexicon({ ...data, units: { hr: 'day' } })).toThrow(InvalidLanguageModuleError)
    expect(() => loadLexicon({ ...data, days: { soon: 0.5 } })).toThrow(InvalidLanguageModuleError)
  })
})

describe('Built-in languages', () => {
  it('enables English, German, French and Spanish by default', () => {
    expect(DEFAULT_LANGUAGE_CODES).toEqual(['en', 'de', 'fr', 'es'])
    expect([...BUILTIN_LANGUAGES.keys()]).toEqual(['en', 'de', 'fr', 'es'])
  })

  it.each([...BUILTIN_LANGUAGES.values()])('$code passes module validation', module => {
    const parser = createLanguageParser(module)
    expect(parser.code).toBe(module.code)
    expect(parser.rules.length).toBeGreaterThan(0)
  })

  it.each([...BUILTIN_LANGUAGES.values()])('$code declares each prefix as a prefix of a keyword', module => {
    for (const prefix of module.prefixes) {
      expect(module.keywords.some(keyword => keyword.startsWith(prefix) && keyword !== prefix)).toBe(true)
    }
  })
})
