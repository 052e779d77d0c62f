import type { Locator, Page } from 'playwright'
import type { ProgressCallback } from '../callbacks'
import { COMMON_SELECTORS, SCRAPING_CONSTANTS } from '../config/constants'
import type { SelectorGroup } from '../config/selectors'
import { DETAILS_ITEM_SELECTORS } from '../config/selectors'
import {
  AuthenticationError,
  NavigationError,
  RateLimitError,
  errorMessage,
} from '../exceptions'
import type { ParseInput, Parser } from '../extraction/parsers/types'
import { parseValid, toParseInput } from '../extraction/parsers/types'
import { extractEntry } from '../extraction/text-extractors'
import { sleep } from '../utils/async'
import { log } from '../utils/logger'
import { trySelectorsForAll } from '../utils/selector-utils'
import { profileSectionUrl } from '../utils/url'

const RATE_LIMIT_PHRASES = [
  'too many requests',
  'rate limit',
  'slow down',
  'try again later',
]

const LOGIN_PATH_REGEX = /\/(?:login|uas\/login|signup)(?:[/?#]|$)/

/**
 * Throws AuthenticationError on a sign-in redirect, and RateLimitError when
 * the page shows a checkpoint, a CAPTCHA or a rate-limit message.
 */
export async function detectRateLimit(page: Page): Promise<void> {
  const currentUrl = page.url()

  if (LOGIN_PATH_REGEX.test(currentUrl)) {
    throw new AuthenticationError(
      'Redirected to the sign-in page. The browser session is not logged in.',
    )
  }

  if (currentUrl.includes('/checkpoint') || currentUrl.includes('authwall')) {
    throw new RateLimitError(
      'Security checkpoint detected. ' +
        'You may need to verify your identity or wait before continuing.',
      3600,
    )
  }

  const captchaCount = await page
    .locator('iframe[title*="captcha" i], iframe[src*="captcha" i]')
    .count()
    .catch(() => 0)
  if (captchaCount > 0) {
    throw new RateLimitError(
      'CAPTCHA challenge detected. Manual intervention required.',
      3600,
    )
  }

  const bodyText = await page
    .locator('body')
    .textContent({ timeout: 1000 })
    .catch(() => null)
  const bodyLower = bodyText?.toLowerCase() ?? ''
  if (RATE_LIMIT_PHRASES.some((phrase) => bodyLower.includes(phrase))) {
    throw new RateLimitError('Rate limit message detected on page.', 1800)
  }
}

/**
 * Navigates to a URL and waits for the page to load.
 * Also checks for rate limiting after navigation.
 */
export async function navigateAndWait(
  page: Page,
  url: string,
  callback?: ProgressCallback,
  waitUntil: 'domcontentloaded' | 'networkidle' | 'load' = 'domcontentloaded',
  timeout: number = SCRAPING_CONSTANTS.NAVIGATION_TIMEOUT_MS,
): Promise<void> {
  if (callback) await callback.onInfo(`Navigating to: ${url}`)

  const response = await page
    .goto(url, { waitUntil, timeout })
    .catch((e: unknown) => {
      throw new NavigationError(
        `Failed to navigate to ${url}: ${errorMessage(e)}`,
      )
    })

  if (response?.status() === 429) {
    throw new RateLimitError(`Too many requests while loading ${url}`, 1800)
  }
  await detectRateLimit(page)
}

/**
 * Waits for a duration and brings the page to front.
 */
export async function waitAndFocus(
  page: Page,
  duration: number = 1.0,
): Promise<void> {
  await sleep(duration)
  await page.bringToFront().catch((e: unknown) => {
    log.debug(`Could not bring page to front: ${e}`)
  })
}

export async function scrollToHalf(page: Page): Promise<void> {
  await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight / 2))
}

/**
 * Scrolls until the document height stays the same for three checks or
 * `maxScrolls` is spent.
 */
export async function scrollToBottom(
  page: Page,
  pauseTime: number = SCRAPING_CONSTANTS.SECTION_SCROLL_PAUSE,
  maxScrolls: number = SCRAPING_CONSTANTS.SECTION_MAX_SCROLLS,
): Promise<void> {
  const stabilityThreshold = 3
  let stableCount = 0

  for (let i = 0; i < maxScrolls; i++) {
    const before = await page.evaluate(() => document.body.scrollHeight)
    await page.evaluate(() =>
      window.scrollTo(0, document.documentElement.scrollHeight),
    )
    await page.mouse.wheel(0, 3000)
    await sleep(pauseTime)
    const after = await page.evaluate(() => document.body.scrollHeight)

    stableCount = after === before ? stableCount + 1 : 0
    if (stableCount >= stabilityThreshold) {
      log.debug(`Reached end of page after ${i + 1} scrolls`)
      break
    }
  }
}

/**
 * Expands collapsed text ("see more") inside the given scope.
 * Returns the number of buttons clicked.
 */
export async function clickSeeMoreButtons(
  scope: Page | Locator,
  maxAttempts: number = 10,
): Promise<number> {
  let clicked = 0
  for (let i = 0; i < maxAttempts; i++) {
    const seeMore = scope
      .locator('button:has-text("See more"), button:has-text("…see more")')
      .first()
    if (!(await seeMore.isVisible().catch(() => false))) break

    const ok = await seeMore
      .click({ timeout: 1000 })
      .then(() => true)
      .catch((e: unknown) => {
        log.debug(`Could not expand text: ${e}`)
        return false
      })
    if (!ok) break
    clicked++
    await sleep(0.5)
  }

  if (clicked > 0) {
    log.debug(`Clicked ${clicked} 'see more' buttons`)
  }
  return clicked
}

/**
 * Attempts to close any modal dialogs on the page.
 * Returns true if a modal was closed.
 */
export async function closeModals(page: Page): Promise<boolean> {
  const closeButton = page.locator(COMMON_SELECTORS.MODAL_DISMISS).first()
  if (!(await closeButton.isVisible().catch(() => false))) return false

  await closeButton.click({ timeout: 1000 })
  await sleep(0.5)
  log.debug('Closed modal')
  return true
}

/**
 * Safely extracts text from an element, returning a default value if not found.
 */
export async function extractTextSafe(
  scope: Page | Locator,
  selector: string,
  defaultValue: string = '',
  timeout: number = SCRAPING_CONSTANTS.ELEMENT_TEXT_TIMEOUT_MS,
): Promise<string> {
  const text = await scope
    .locator(selector)
    .first()
    .innerText({ timeout })
    .catch(() => null)
  if (text === null) {
    log.debug(`Element not found: ${selector}`)
    return defaultValue
  }
  return text.trim() || defaultValue
}

/**
 * Opens a profile details page (`/details/<section>/`) and scrolls it so
 * lazy-loaded entries render.
 */
export async function openDetailsPage(
  page: Page,
  profileUrl: string,
  section: string,
  callback?: ProgressCallback,
): Promise<void> {
  await navigateAndWait(page, profileSectionUrl(profileUrl, section), callback)
  await page.waitForSelector(COMMON_SELECTORS.MAIN, {
    timeout: SCRAPING_CONSTANTS.MAIN_SELECTOR_TIMEOUT_MS,
  })
  await waitAndFocus(page, SCRAPING_CONSTANTS.SECTION_FOCUS_WAIT)
  await scrollToHalf(page)
  await scrollToBottom(page)
  await clickSeeMoreButtons(page)
}

/**
 * Details pages render a placeholder instead of an empty list.
 */
export async function isEmptySection(page: Page): Promise<boolean> {
  const count = await page
    .locator(COMMON_SELECTORS.EMPTY_SECTION)
    .count()
    .catch(() => 0)
  return count > 0
}

/**
 * Top-level list entries of the current page. Entries nested in another
 * entry belong to their parent and are left out.
 */
export async function findListEntries(
  scope: Page | Locator,
  group: SelectorGroup = DETAILS_ITEM_SELECTORS,
): Promise<Locator[]> {
  const result = await trySelectorsForAll(scope, group)
  const entries: Locator[] = []
  for (const item of result.value) {
    const nested = await item
      .locator('xpath=ancestor::li')
      .count()
      .catch(() => 0)
    if (nested === 0) entries.push(item)
  }
  return entries
}

export async function readEntry(
  element: Locator,
  context: Record<string, string> = {},
): Promise<ParseInput | null> {
  const extracted = await extractEntry(element)
  return extracted ? toParseInput(extracted, context) : null
}

/**
 * Reads one entry and runs the parser over it; null when either finds
 * nothing usable.
 */
export async function parseEntry<T>(
  element: Locator,
  parser: Parser<T>,
  context: Record<string, string> = {},
): Promise<T | null> {
  const input = await readEntry(element, context)
  return input ? parseValid(parser, input) : null
}
