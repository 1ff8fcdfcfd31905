/**
 * Spanish
 *
 * "ayer a las 3", "el próximo viernes entre las 9 y las 12",
 * "hace tres días", "en 4 días", "la última hora".
 */

import { composeRules } from '../grammar'
import type { LanguageModule } from '../language-parser'
import data from './es.json'
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

export const spanish: LanguageModule = createLanguageModule(lexicon, composeRules({
  anchors: [
    dayWordAnchor(lexicon),
    weekdayAnchor(`(?:el\\s+)?(?<dir>${words.directions})\\s+(?<wd>${words.weekdays})`, lexicon, lexicon.direction),
    weekdayAnchor(`(?:el\\s+)?(?<wd>${words.weekdays})\\s+(?<dir>${words.trailingDirections})`, lexicon, lexicon.trailingDirection),
    dayCountAnchor(`hace\\s+(?<count>${num})\\s+d[ií]as?`, lexicon, 'past'),
    dayCountAnchor(`en\\s+(?<count>${num})\\s+d[ií]as?`, lexicon, 'future'),
  ],
  clauses: [
    clockClause(`a\\s+las?\\s+(?<hour>\\d{1,2})(?::(?<minute>\\d{2}))?`),
    hourRangeClause(`entre\\s+las?\\s+(?<from>${num})\\s+y\\s+las?\\s+(?<to>${num})`, lexicon),
  ],
  extra: [
    lastDurationRule(`(?:(?:la|el|las|los)\\s+)?[úu]ltim[ao]s?\\s+(?:(?<count>${num})\\s+)?(?<unit>${words.units})`, lexicon),
  ],
}))
