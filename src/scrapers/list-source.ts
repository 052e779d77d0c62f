import type { Locator, Page } from 'playwright'
import { COMMON_SELECTORS, SCRAPING_CONSTANTS } from '../config/constants'
import { PROFILE_LINK_SELECTOR } from '../config/selectors'
import type { ListPageSource } from '../extraction/collector'
import { sleep } from '../utils/async'
import { log } from '../utils/logger'

async function clickIfVisible(
  control: Locator,
  timeoutMs: number,
): Promise<boolean> {
  const visible = await control
    .waitFor({ state: 'visible', timeout: timeoutMs })
    .then(() => true)
    .catch(() => false)
  if (!visible) return false

  await control.click({ timeout: timeoutMs })
  return true
}

/**
 * Search-results style list: one page of cards at a time, a "Next" button
 * loads the following page in place.
 */
export class NextButtonListSource implements ListPageSource<Locator> {
  constructor(
    private readonly page: Page,
    private readonly itemSelector: string,
    private readonly settleSeconds: number = SCRAPING_CONSTANTS.PAGINATION_SETTLE_WAIT,
  ) {}

  async waitForEntries(timeoutMs: number): Promise<boolean> {
    return await this.page
      .waitForSelector(this.itemSelector, { timeout: timeoutMs })
      .then(() => true)
      .catch((e: unknown) => {
        log.debug(`No entries for ${this.itemSelector}: ${e}`)
        return false
      })
  }

  async visibleEntries(): Promise<readonly Locator[]> {
    return await this.page.locator(this.itemSelector).all()
  }

  async advance(timeoutMs: number): Promise<boolean> {
    const next = this.page.locator(COMMON_SELECTORS.NEXT_BUTTON).last()
    if (!(await clickIfVisible(next, timeoutMs))) return false
    await sleep(this.settleSeconds)
    return true
  }
}

/**
 * Overlay list that grows in place: "Show more results" appends entries
 * below the ones already rendered.
 */
export class ShowMoreListSource implements ListPageSource<Locator> {
  constructor(
    private readonly container: Locator,
    private readonly itemSelector: string,
    private readonly settleSeconds: number = SCRAPING_CONSTANTS.PAGINATION_SETTLE_WAIT,
  ) {}

  async waitForEntries(timeoutMs: number): Promise<boolean> {
    return await this.container
      .locator(this.itemSelector)
      .first()
      .waitFor({ state: 'attached', timeout: timeoutMs })
      .then(() => true)
      .catch((e: unknown) => {
        log.debug(`No entries for ${this.itemSelector}: ${e}`)
        return false
      })
  }

  async visibleEntries(): Promise<readonly Locator[]> {
    return await this.container.locator(this.itemSelector).all()
  }

  async advance(timeoutMs: number): Promise<boolean> {
    const more = this.container.locator(COMMON_SELECTORS.SHOW_MORE_BUTTON).first()
    if (!(await clickIfVisible(more, timeoutMs))) return false
    await sleep(this.settleSeconds)
    return true
  }
}

/**
 * Profile link of a person card; cards without one (ads, placeholders) have
 * no identity.
 */
export async function profileUrlOf(entry: Locator): Promise<string | undefined> {
  const href = await entry
    .locator(PROFILE_LINK_SELECTOR)
    .first()
    .getAttribute('href', { timeout: SCRAPING_CONSTANTS.ELEMENT_TEXT_TIMEOUT_MS })
    .catch(() => null)
  return href ?? undefined
}
