/**
 * Generators for scan inputs: reference instants, phrases in every built-in
 * language, filler words and synthetic dedup candidates.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { type MatchConfidence, MatchConfidence as Confidence } from '../../../src/types'

// ============================================================================
// Reference Instants
// ============================================================================

/** Any valid millisecond between 1971 and 2100, UTC. */
export const instantGen: Arbitrary<Date> = fc.date({
  min: new Date(Date.UTC(1971, 0, 1)),
  max: new Date(Date.UTC(2100, 0, 1)),
  noInvalidDate: true,
})

// ============================================================================
// Text
// ============================================================================

export const phraseGen: Arbitrary<string> = fc.constantFrom(
  'today',
  'yesterday at 3pm',
  'next Friday between 9 and 12',
  'in four days',
  '3 days ago',
  'the last 2 hours',
  'gestern um 15 Uhr',
  'am nächsten Montag',
  'vor drei Tagen',
  'die letzten 10 Minuten',
  'demain à 13h',
  'vendredi prochain',
  'il y a deux jours',
  'la dernière heure',
  'ayer a las 3',
  'el viernes que viene',
  'hace tres días',
  'la última hora',
)

/** Keyword prefixes a user may still be typing. */
export const prefixGen: Arbitrary<string> = fc.constantFrom('yester', 'tomor', 'betw', 'gest', 'zwisch', 'demai', 'mañan', 'entr')

export const fillerGen: Arbitrary<string> = fc.constantFrom(
  'meeting',
  'lunch',
  'the',
  'report',
  'and',
  'Termin',
  'réunion',
  'reunión',
  '42',
  '!',
  ',',
  '😀',
)

/** Phrases and filler joined by spaces, optionally ending in a typed prefix. */
export const scanTextGen: Arbitrary<string> = fc
  .tuple(fc.array(fc.oneof(phraseGen, fillerGen), { maxLength: 8 }), fc.option(prefixGen, { nil: undefined }))
  .map(([words, prefix]) => (prefix === undefined ? words : [...words, prefix]).join(' '))

/** Text drawn from characters no keyword or prefix is made of. */
export const keywordFreeTextGen: Arbitrary<string> = fc
  .array(fc.constantFrom('0', '1', '7', ' ', '.', ',', '-', '!', '?', '\n', '€'), { maxLength: 40 })
  .map(chars => chars.join(''))

// ============================================================================
// Dedup Candidates
// ============================================================================

export type Candidate = {
  readonly id: number
  readonly span: { readonly start: number; readonly end: number }
  readonly confidence: MatchConfidence
}

/** Non-empty spans inside the first 40 positions, with unique ids. */
export const candidatesGen: Arbitrary<Candidate[]> = fc
  .array(
    fc.tuple(fc.nat({ max: 40 }), fc.integer({ min: 1, max: 12 }), fc.boolean()),
    { maxLength: 20 },
  )
  .map(tuples => tuples.map(([start, length, complete], id) => ({
    id,
    span: { start, end: start + length },
    confidence: complete ? Confidence.Complete : Confidence.Partial,
  })))
