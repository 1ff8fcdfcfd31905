/**
 * Built-in languages, keyed by ISO-639-1 code.
 */

import type { LanguageModule } from '../language-parser'
import { german } from './de'
import { english } from './en'
import { spanish } from './es'
import { french } from './fr'

export { english, german, french, spanish }

export const BUILTIN_LANGUAGES: ReadonlyMap<string, LanguageModule> = new Map([
  [english.code, english],
  [german.code, german],
  [french.code, french],
  [spanish.code, spanish],
])

/** Enable order of the default scanner. Earlier languages win partial-match ties. */
export const DEFAULT_LANGUAGE_CODES: readonly string[] = Object.freeze(['en', 'de', 'fr', 'es'])
