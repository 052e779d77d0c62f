import type { Locator } from 'playwright'
import { AriaTextExtractor } from './aria-extractor'
import { RawTextExtractor } from './raw-text-extractor'
import type { ExtractedText, TextExtractor } from './types'

export { AriaTextExtractor } from './aria-extractor'
export { RawTextExtractor } from './raw-text-extractor'
export type { ExtractedLink, ExtractedText, TextExtractor } from './types'

export const DEFAULT_TEXT_EXTRACTORS: readonly TextExtractor[] = [
  new AriaTextExtractor(),
  new RawTextExtractor(),
]

const CONFIDENCE_THRESHOLD = 0.3

/**
 * Tries extractors in priority order. The first result at or above the
 * confidence threshold wins; otherwise the most confident result is used.
 */
export async function extractEntry(
  element: Locator,
  extractors: readonly TextExtractor[] = DEFAULT_TEXT_EXTRACTORS,
): Promise<ExtractedText | null> {
  const ordered = [...extractors].sort((a, b) => a.priority - b.priority)
  let best: ExtractedText | null = null

  for (const extractor of ordered) {
    if (!(await extractor.canHandle(element))) continue

    const result = await extractor.extract(element)
    if (!result) continue
    if (result.confidence >= CONFIDENCE_THRESHOLD) return result
    if (!best || result.confidence > best.confidence) best = result
  }

  return best
}
