import type { Locator } from 'playwright'
import { SITE_ORIGIN } from '../../config/constants'
import { log } from '../../utils/logger'
import { splitLines } from '../../utils/text'
import { splitSummaryAndDetails } from '../parsers/shared'
import type { ExtractedLink, ExtractedText } from './types'

export async function extractLinksFromElement(
  element: Locator,
): Promise<ExtractedLink[]> {
  const anchors = await element.locator('a[href]').all()
  const links: ExtractedLink[] = []

  for (const anchor of anchors) {
    const href = await anchor.getAttribute('href').catch((e: unknown) => {
      log.debug(`Could not read link href: ${e}`)
      return null
    })
    if (!href) {
      continue
    }

    const text = await anchor.textContent().catch(() => null)
    links.push({
      url: href,
      text: text?.trim() ?? '',
      isExternal: /^https?:\/\//.test(href) && !href.startsWith(SITE_ORIGIN),
    })
  }

  return links
}

/**
 * Nested positions under one organization render as a second-level list.
 * Fewer than two nested entries means the list is a description, not roles.
 */
export async function detectSubItems(
  element: Locator,
  textExtractFn: (el: Locator) => Promise<string[]>,
): Promise<ExtractedText[]> {
  const nestedUl = element.locator('ul').first()
  if ((await nestedUl.count()) === 0) {
    return []
  }

  const nestedLis = await nestedUl.locator('> li').all()
  if (nestedLis.length <= 1) {
    return []
  }

  const subItems: ExtractedText[] = []
  for (const li of nestedLis) {
    const { summary, details } = splitSummaryAndDetails(await textExtractFn(li))
    if (summary.length === 0) {
      continue
    }

    subItems.push({
      texts: summary,
      links: await extractLinksFromElement(li),
      details,
      confidence: summary.length >= 2 ? 0.8 : 0.5,
    })
  }

  return subItems
}

/**
 * Visible lines of an element, consecutive repeats folded.
 */
export async function innerTextLines(element: Locator): Promise<string[]> {
  const rawText = await element.innerText()
  const lines: string[] = []
  for (const line of splitLines(rawText)) {
    if (lines[lines.length - 1] !== line) {
      lines.push(line)
    }
  }
  return lines
}
