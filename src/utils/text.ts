/**
 * Text Normalizer
 *
 * The page renders most strings twice (once for assistive technology, once
 * visually), so raw element text arrives as "Manager\nManager" or
 * "Acme CorpAcme Corp". These helpers fold those copies back to one.
 */

import { SCRAPING_CONSTANTS } from '../config/constants'

const MIN_REPEATED_HALF_LENGTH = 3

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
}

/**
 * Returns the first half of a string that is an exact doubling of itself,
 * either glued ("FooFoo") or separated by one whitespace ("Foo Foo").
 */
export function halveRepeated(text: string): string {
  const value = text.trim()
  const length = value.length

  if (length % 2 === 0) {
    const half = value.slice(0, length / 2)
    if (
      half.length >= MIN_REPEATED_HALF_LENGTH &&
      half === value.slice(length / 2)
    ) {
      return half
    }
    return value
  }

  const mid = (length - 1) / 2
  const separator = value.charAt(mid)
  if (/\s/.test(separator)) {
    const half = value.slice(0, mid)
    if (
      half.length >= MIN_REPEATED_HALF_LENGTH &&
      half === value.slice(mid + 1)
    ) {
      return half
    }
  }
  return value
}

function uniqueLines(text: string): string[] {
  const unique: string[] = []
  for (const line of splitLines(text)) {
    const cleaned = halveRepeated(line)
    if (!unique.includes(cleaned)) unique.push(cleaned)
  }
  return unique
}

/**
 * Collapses one element's text to a single line. Repeated lines are
 * dropped and the remaining lines are joined with a space.
 *
 * @example
 * cleanSingleStringDuplicates('Manager\nManager') // 'Manager'
 * cleanSingleStringDuplicates('Senior Engineer\nFull-time') // 'Senior Engineer Full-time'
 */
export function cleanSingleStringDuplicates(text: string): string {
  if (text.trim().length < SCRAPING_CONSTANTS.MIN_DUPLICATE_CHECK_LENGTH) {
    return text.trim()
  }

  const lines = uniqueLines(text)
  return lines.length > 0 ? lines.join(' ') : text.trim()
}

/**
 * Like {@link cleanSingleStringDuplicates} but keeps line structure.
 */
export function cleanDuplicatedText(text: string): string {
  return uniqueLines(text).join('\n')
}

/**
 * Drops empty, over-long, repeated and substring-duplicated tokens while
 * keeping first-seen order.
 */
export function deduplicateTexts(
  texts: readonly string[],
  maxLength: number = SCRAPING_CONSTANTS.MAX_FALLBACK_TEXT_LENGTH,
): string[] {
  const seen = new Set<string>()
  const deduplicated: string[] = []

  for (const rawText of texts) {
    const text = halveRepeated(rawText)
    if (!text || text.length > maxLength || seen.has(text)) {
      continue
    }

    let isSubstring = false
    for (const existing of seen) {
      if (
        (existing.length > 3 && text.includes(existing)) ||
        (text.length > 3 && existing.includes(text))
      ) {
        isSubstring = true
        break
      }
    }

    if (!isSubstring) {
      seen.add(text)
      deduplicated.push(text)
    }
  }

  return deduplicated
}

/**
 * Pulls the first run of digits (with thousands separators) out of a string.
 *
 * @example
 * parseCount('1,234 followers') // 1234
 */
export function parseCount(text: string): number | undefined {
  const match = text.match(/\d[\d,.]*/)
  if (!match) return undefined
  const digits = match[0].replace(/[,.]/g, '')
  const value = Number.parseInt(digits, 10)
  return Number.isNaN(value) ? undefined : value
}

export function containsKeyword(
  text: string,
  keywords: readonly string[],
): boolean {
  const lower = text.toLowerCase()
  return keywords.some((keyword) => lower.includes(keyword))
}
