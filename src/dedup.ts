/**
 * Deduplication & Ranking
 *
 * Reduces the raw candidates of one scan to a non-overlapping set with a
 * single left-to-right sweep. Overlaps are settled pairwise against the
 * matches accepted so far; the sweep never merges, splits or re-optimises
 * accepted matches, so three candidates chained by overlap are resolved in
 * sweep order rather than globally.
 */

import { spanLength, spansOverlap } from './span'
import { type MatchConfidence, type Span, MatchConfidence as Confidence } from './types'

/** The parts of a match the ranking looks at. */
export type Rankable = {
  readonly span: Span
  readonly confidence: MatchConfidence
}

function confidenceRank(confidence: MatchConfidence): number {
  return confidence === Confidence.Complete ? 1 : 0
}

/**
 * Strict preference: complete over partial, then the longer span, then the
 * earlier start. Equal candidates do not dominate each other.
 */
export function dominates(candidate: Rankable, incumbent: Rankable): boolean {
  const byConfidence = confidenceRank(candidate.confidence) - confidenceRank(incumbent.confidence)
  if (byConfidence !== 0) return byConfidence > 0
  const byLength = spanLength(candidate.span) - spanLength(incumbent.span)
  if (byLength !== 0) return byLength > 0
  return candidate.span.start < incumbent.span.start
}

/** Candidates by start, longer first on equal start. Stable, so input order breaks full ties. */
export function sortCandidates<T extends Rankable>(candidates: readonly T[]): T[] {
  return [...candidates].sort((a, b) => a.span.start - b.span.start || b.span.end - a.span.end)
}

export function deduplicateMatches<T extends Rankable>(candidates: readonly T[], maxMatches: number): T[] {
  const accepted: T[] = []

  for (const candidate of sortCandidates(candidates)) {
    let overlapIndex = -1
    let overlapCount = 0
    for (const [i, existing] of accepted.entries()) {
      if (!spansOverlap(candidate.span, existing.span)) continue
      overlapCount++
      overlapIndex = i
      if (overlapCount > 1) break
    }

    if (overlapCount === 0) {
      accepted.push(candidate)
    } else if (overlapCount === 1) {
      const incumbent = accepted[overlapIndex]
      if (incumbent !== undefined && dominates(candidate, incumbent)) {
        accepted[overlapIndex] = candidate
      }
    }
  }

  return accepted
    .sort((a, b) => a.span.start - b.span.start)
    .slice(0, maxMatches)
}
