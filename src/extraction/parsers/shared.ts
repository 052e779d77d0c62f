import { SCRAPING_CONSTANTS } from '../../config/constants'
import { cleanSingleStringDuplicates } from '../../utils/text'
import type { TextNode } from '../description'
import { isSkillsLine } from '../description'
import type { ExtractedLink } from '../text-extractors/types'

const MAX_SUMMARY_TOKENS = 4
const MAX_SUMMARY_TOKEN_LENGTH = 120

/**
 * Folds doubled renderings inside each token and drops exact repeats.
 */
export function cleanTokens(texts: readonly string[]): string[] {
  const tokens: string[] = []
  for (const text of texts) {
    const token = cleanSingleStringDuplicates(text)
    if (
      token &&
      token.length <= SCRAPING_CONSTANTS.MAX_FALLBACK_TEXT_LENGTH &&
      !tokens.includes(token)
    ) {
      tokens.push(token)
    }
  }
  return tokens
}

/**
 * Splits the flat lines of an entry into leading summary tokens and the
 * trailing description lines. The summary ends at the first long line, the
 * first skills line, or after four tokens.
 */
export function splitSummaryAndDetails(lines: readonly string[]): {
  summary: string[]
  details: TextNode[]
} {
  const summary: string[] = []
  let idx = 0
  for (; idx < lines.length && summary.length < MAX_SUMMARY_TOKENS; idx++) {
    const line = lines[idx]
    if (line === undefined) continue
    if (isSkillsLine(line) || line.length > MAX_SUMMARY_TOKEN_LENGTH) break
    summary.push(line)
  }

  return {
    summary,
    details: lines.slice(idx).map((text) => ({ text })),
  }
}

export function firstLinkMatching(
  links: readonly ExtractedLink[],
  predicate: (url: string) => boolean,
): ExtractedLink | undefined {
  return links.find((link) => predicate(link.url))
}

/**
 * Empty strings become undefined so optional record fields stay absent.
 */
export function presentOrUndefined(
  value: string | undefined | null,
): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}
