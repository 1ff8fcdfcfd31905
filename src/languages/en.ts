/**
 * English
 *
 * "yesterday at 3pm", "next Friday between 9 and 12", "in four days",
 * "3 days ago", "the last 2 hours".
 */

import { type Captures, composeRules } from '../grammar'
import type { LanguageModule } from '../language-parser'
import { to24Hour } from '../resolve'
import data from './en.json'
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
const oclock = `o['’]?clock`

/** "3pm" is 15:00, "13 o'clock" is 13:00. */
function meridiemHour(hour: number, captures: Captures): number | null {
  const suffix = captures.ampm
  if (suffix === undefined) return null
  return /^o/i.test(suffix) ? hour : to24Hour(hour, suffix)
}

export const english: LanguageModule = createLanguageModule(lexicon, composeRules({
  anchors: [
    dayWordAnchor(lexicon),
    weekdayAnchor(`(?<dir>${words.directions})\\s+(?<wd>${words.weekdays})`, lexicon, lexicon.direction),
    dayCountAnchor(`in\\s+(?<count>${num})\\s+days?`, lexicon, 'future'),
    dayCountAnchor(`(?<count>${num})\\s+days?\\s+ago`, lexicon, 'past'),
  ],
  clauses: [
    clockClause(
      `(?:at\\s+)?(?<hour>\\d{1,2})(?::(?<minute>\\d{2}))?\\s*(?<ampm>am|pm|${oclock})`,
      { toHour: meridiemHour },
    ),
    hourRangeClause(`between\\s+(?<from>${num})\\s+and\\s+(?<to>${num})(?:\\s*${oclock})?`, lexicon),
    hourRangeClause(`from\\s+(?<from>${num})\\s+to\\s+(?<to>${num})(?:\\s*${oclock})?`, lexicon),
  ],
  extra: [
    lastDurationRule(`(?:the\\s+)?(?:last|past)\\s+(?:(?<count>${num})\\s+)?(?<unit>${words.units})`, lexicon),
  ],
}))
