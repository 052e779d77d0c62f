/**
 * Near-duplicate detection for description lines, scored 0-100 by fuzzball.
 */

import * as fuzz from 'fuzzball'
import { SIMILARITY_DEFAULTS } from '../config/constants'

export interface SimilarityOptions {
  ratioThreshold: number
  partialRatioThreshold: number
  minComparableLength: number
}

export const DEFAULT_SIMILARITY: SimilarityOptions = {
  ratioThreshold: SIMILARITY_DEFAULTS.RATIO_THRESHOLD,
  partialRatioThreshold: SIMILARITY_DEFAULTS.PARTIAL_RATIO_THRESHOLD,
  minComparableLength: SIMILARITY_DEFAULTS.MIN_COMPARABLE_LENGTH,
}

// Lines are lower-cased before scoring; fuzzball's own processing would also
// drop punctuation.
const SCORING = { full_process: false }

/**
 * Removes a leading bullet ("-", "•", "*") or ordinal ("1.") marker.
 */
export function stripListMarker(line: string): string {
  return line
    .trim()
    .replace(/^[-•*]\s*/, '')
    .replace(/^\d+\.\s*/, '')
}

/**
 * Whether `candidate` repeats content already present in `existing`:
 * close to one existing line, close to all of them joined, or containing
 * one of them almost verbatim. Lines shorter than the minimum comparable
 * length never count as duplicates and are never compared against.
 */
export function isEssentiallySame(
  candidate: string,
  existing: readonly string[],
  options: SimilarityOptions = DEFAULT_SIMILARITY,
): boolean {
  const normalized = stripListMarker(candidate).toLowerCase()
  if (normalized.length < options.minComparableLength) return false

  const comparable = existing
    .map((line) => stripListMarker(line).toLowerCase())
    .filter((line) => line.length >= options.minComparableLength)
  if (comparable.length === 0) return false

  const closeTo = (line: string): boolean =>
    fuzz.ratio(normalized, line, SCORING) >= options.ratioThreshold

  if (comparable.some(closeTo) || closeTo(comparable.join(' '))) return true

  return comparable.some(
    (line) =>
      fuzz.partial_ratio(line, normalized, SCORING) >=
      options.partialRatioThreshold,
  )
}
