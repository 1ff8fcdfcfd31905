/**
 * French
 *
 * "demain à 13h", "vendredi prochain entre 9 et 12 heures",
 * "il y a trois jours", "dans 4 jours", "la dernière heure".
 */

import { composeRules } from '../grammar'
import type { LanguageModule } from '../language-parser'
import data from './fr.json'
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

// "13h", "13h30", "13 heures"
const clock = `(?<hour>\\d{1,2})(?:\\s*h(?<minute>\\d{2})?|\\s+heures?)`

export const french: LanguageModule = createLanguageModule(lexicon, composeRules({
  anchors: [
    dayWordAnchor(lexicon),
    weekdayAnchor(`(?<dir>${words.directions})\\s+(?<wd>${words.weekdays})`, lexicon, lexicon.direction),
    weekdayAnchor(`(?<wd>${words.weekdays})\\s+(?<dir>${words.trailingDirections})`, lexicon, lexicon.trailingDirection),
    dayCountAnchor(`il\\s+y\\s+a\\s+(?<count>${num})\\s+jours?`, lexicon, 'past'),
    dayCountAnchor(`dans\\s+(?<count>${num})\\s+jours?`, lexicon, 'future'),
  ],
  clauses: [
    // Unaccented "a" only after a day word; alone it is too common to trigger on.
    clockClause(`[àa]\\s+${clock}`, { standalonePattern: `à\\s+${clock}` }),
    hourRangeClause(`entre\\s+(?<from>${num})\\s+et\\s+(?<to>${num})(?:\\s*(?:heures?|h))?`, lexicon),
  ],
  extra: [
    lastDurationRule(`(?:la\\s+)?derni[èe]re\\s+(?<unit>${words.units})`, lexicon),
    lastDurationRule(`(?:les\\s+)?(?<count>${num})\\s+derni[èe]res\\s+(?<unit>${words.units})`, lexicon),
  ],
}))
