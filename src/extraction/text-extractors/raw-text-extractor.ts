import type { Locator } from 'playwright'
import { SCRAPING_CONSTANTS } from '../../config/constants'
import { log } from '../../utils/logger'
import { splitSummaryAndDetails } from '../parsers/shared'
import { extractLinksFromElement, innerTextLines } from './shared'
import type { ExtractedText, TextExtractor } from './types'

/**
 * Fallback for layouts without aria spans: the element's visible lines.
 */
export class RawTextExtractor implements TextExtractor {
  readonly name = 'raw-text'
  readonly priority = 3

  async canHandle(element: Locator): Promise<boolean> {
    const text = await element.innerText().catch(() => '')
    return text.trim().length > 0
  }

  async extract(element: Locator): Promise<ExtractedText | null> {
    try {
      const lines = (await innerTextLines(element)).filter(
        (line) => line.length < SCRAPING_CONSTANTS.MAX_FALLBACK_TEXT_LENGTH,
      )
      if (lines.length === 0) {
        return null
      }

      const { summary, details } = splitSummaryAndDetails(lines)
      return {
        texts: summary,
        links: await extractLinksFromElement(element),
        details,
        confidence: computeConfidence(summary),
      }
    } catch (e) {
      log.debug(`RawTextExtractor.extract error: ${e}`)
      return null
    }
  }
}

function computeConfidence(texts: string[]): number {
  if (texts.length >= 4) return 0.4
  if (texts.length >= 2) return 0.3
  if (texts.length >= 1) return 0.15
  return 0
}
