import type { Page } from 'playwright'
import { COMMON_SELECTORS, SCRAPING_CONSTANTS } from '../../config/constants'
import {
  CONNECTIONS_SELECTORS,
  CONTACT_INFO_SELECTORS,
} from '../../config/selectors'
import { collectPaginated } from '../../extraction/collector'
import {
  parseConnectionCount,
  parseContactInfo,
} from '../../extraction/parsers/contact-parser'
import { ConnectionParser } from '../../extraction/parsers/people-parser'
import { attempt } from '../../extraction/orchestrator'
import type { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import { CanonicalUrlSet, stripUrl } from '../../utils/url'
import { NextButtonListSource, profileUrlOf } from '../list-source'
import type { ScrapeContext } from '../options'
import {
  closeModals,
  extractTextSafe,
  navigateAndWait,
  parseEntry,
  waitAndFocus,
} from '../utils'

export interface ConnectionBudget {
  maxPages: number
  maxRecords?: number
}

async function openContactInfo(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  const { page } = context
  const link = page
    .locator(`${CONTACT_INFO_SELECTORS.LINK}, ${CONTACT_INFO_SELECTORS.BUTTON}`)
    .first()

  if (await link.isVisible().catch(() => false)) {
    await link.click()
  } else {
    await navigateAndWait(
      page,
      `${stripUrl(person.linkedinUrl)}/overlay/contact-info/`,
      context.callback,
    )
  }
  await waitAndFocus(page, 1)
}

async function scrapeContactInfo(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  await openContactInfo(context, person)

  const modalText = await extractTextSafe(
    context.page,
    CONTACT_INFO_SELECTORS.MODAL,
    '',
    context.waitTimeoutMs,
  )
  const contactInfo = parseContactInfo(modalText)
  if (contactInfo) {
    person.setContactInfo(contactInfo)
    log.debug('Got contact info')
  } else {
    log.skip('Contact info overlay shows no email, phone or website')
  }

  await closeModals(context.page)
}

async function scrapeConnectionCount(
  page: Page,
  person: PersonAggregate,
): Promise<void> {
  const text = await extractTextSafe(page, CONNECTIONS_SELECTORS.COUNT)
  const count = parseConnectionCount(text)
  if (count !== undefined) person.setConnectionCount(count)
}

/**
 * Follows the profile's connections link to the people search and walks its
 * pages within the budget. A profile that does not expose its connections
 * yields none.
 */
async function scrapeConnectionList(
  context: ScrapeContext,
  person: PersonAggregate,
  budget: ConnectionBudget,
): Promise<void> {
  const { page } = context
  const link = page.locator(CONNECTIONS_SELECTORS.PROFILE_LINK).first()
  if (!(await link.isVisible().catch(() => false))) {
    log.skip('Connections are not visible on this profile')
    return
  }

  await link.click()
  await waitAndFocus(page, SCRAPING_CONSTANTS.PAGINATION_SETTLE_WAIT)
  if (!page.url().includes('/search/results/people')) {
    log.skip(`Connections link led to ${page.url()}`)
    return
  }

  const seen = new CanonicalUrlSet()
  seen.add(person.linkedinUrl)
  const parser = new ConnectionParser()

  const result = await collectPaginated(
    new NextButtonListSource(page, CONNECTIONS_SELECTORS.SEARCH_RESULT_ITEM),
    {
      section: 'connections',
      maxPages: budget.maxPages,
      maxRecords: budget.maxRecords,
      waitTimeoutMs: context.waitTimeoutMs,
      seen,
      urlOf: profileUrlOf,
      extract: async (entry) => {
        const connection = await parseEntry(entry, parser)
        return connection && person.addConnection(connection)
          ? connection
          : null
      },
    },
  )

  for (const [key, message] of Object.entries(result.errors)) {
    person.recordError(key, message)
  }
  log.success(
    `Parsed ${result.items.length} connections over ` +
      `${result.pagesVisited} pages (${result.state})`,
  )
}

/**
 * Contact-info overlay, connection count and connection list. Each part
 * fails on its own; the others still run.
 */
export async function scrapeContacts(
  context: ScrapeContext,
  person: PersonAggregate,
  budget: ConnectionBudget,
): Promise<void> {
  const { page } = context
  await navigateAndWait(page, person.linkedinUrl, context.callback)
  await page.waitForSelector(COMMON_SELECTORS.MAIN, {
    timeout: SCRAPING_CONSTANTS.MAIN_SELECTOR_TIMEOUT_MS,
  })

  const parts: Array<[string, () => Promise<void>]> = [
    ['connection_count', () => scrapeConnectionCount(page, person)],
    ['contact_info', () => scrapeContactInfo(context, person)],
    ['connections', () => scrapeConnectionList(context, person, budget)],
  ]

  for (const [name, run] of parts) {
    const outcome = await attempt(run)
    if (!outcome.ok) {
      person.recordError(name, outcome.error)
      log.warning(`Could not scrape ${name}: ${outcome.error}`)
    }
  }
}
