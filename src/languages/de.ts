/**
 * German
 *
 * "gestern um 15 Uhr", "am nächsten Freitag zwischen 9 und 12",
 * "vor drei Tagen", "in 4 Tagen", "die letzten 10 Minuten".
 */

import { composeRules } from '../grammar'
import type { LanguageModule } from '../language-parser'
import data from './de.json'
import {
  clockClause,
  createLanguageModule,
  dayCountAnchor,
  dayWordAnchor,
  hourRangeClause,
  lastDurationRule,
  weekdayAnchor,
} from './forms'
import { loadLexicon } from './lexicon'

const lexicon = loadLexicon(data)
const { words } = lexicon
const num = lexicon.numbers.pattern

export const german: LanguageModule = createLanguageModule(lexicon, composeRules({
  anchors: [
    dayWordAnchor(lexicon),
    weekdayAnchor(`(?:am\\s+)?(?<dir>${words.directions})\\s+(?<wd>${words.weekdays})`, lexicon, lexicon.direction),
    dayCountAnchor(`vor\\s+(?<count>${num})\\s+Tag(?:en|e)?`, lexicon, 'past'),
    dayCountAnchor(`in\\s+(?<count>${num})\\s+Tag(?:en|e)?`, lexicon, 'future'),
  ],
  clauses: [
    clockClause(`um\\s+(?<hour>\\d{1,2})(?:[:.](?<minute>\\d{2}))?\\s*Uhr`),
    hourRangeClause(`von\\s+(?<from>${num})\\s+bis\\s+(?<to>${num})\\s*Uhr`, lexicon),
    hourRangeClause(`zwischen\\s+(?<from>${num})\\s+und\\s+(?<to>${num})(?:\\s*Uhr)?`, lexicon),
  ],
  extra: [
    lastDurationRule(`(?:die\\s+)?letzten?\\s+(?:(?<count>${num})\\s+)?(?<unit>${words.units})`, lexicon),
  ],
}))
