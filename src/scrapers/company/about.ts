import type { Page } from 'playwright'
import { COMPANY_SELECTORS } from '../../config/selectors'
import { ElementNotFoundError } from '../../exceptions'
import type { DefinitionPair } from '../../extraction/parsers/company-parser'
import {
  parseCompanyDetails,
  parseSeeAllEmployees,
  parseTopCardInfo,
} from '../../extraction/parsers/company-parser'
import type { CompanyAggregate } from '../../models/company'
import { log } from '../../utils/logger'
import { collapseWhitespace } from '../../utils/text'
import type { ScrapeContext } from '../options'
import { extractTextSafe } from '../utils'

/**
 * Header of the about page: name, then the info line items (industry,
 * headquarters, followers, employee band).
 */
export async function scrapeCompanyBasicInfo(
  context: ScrapeContext,
  company: CompanyAggregate,
): Promise<void> {
  const { page } = context
  await page
    .locator(COMPANY_SELECTORS.NAME)
    .first()
    .waitFor({ state: 'visible', timeout: context.waitTimeoutMs })

  const name = await extractTextSafe(page, COMPANY_SELECTORS.NAME)
  if (!name) {
    throw new ElementNotFoundError('Company name not found in the page header')
  }

  const items: string[] = []
  for (const item of await page.locator(COMPANY_SELECTORS.TOP_CARD_INFO).all()) {
    const text = await item.innerText().catch(() => '')
    if (text.trim()) items.push(text.replace(/^[\s·]+/, ''))
  }

  company.mergeDetails({ name, ...parseTopCardInfo(items) })
  log.debug(`Got company name: ${name}`)
}

async function readDefinitionPairs(page: Page): Promise<DefinitionPair[]> {
  return await page.evaluate((): DefinitionPair[] =>
    Array.from(document.querySelectorAll('dt')).map((dt) => {
      const definitions: string[] = []
      let sibling = dt.nextElementSibling
      while (sibling instanceof HTMLElement && sibling.tagName === 'DD') {
        definitions.push(sibling.innerText.trim())
        sibling = sibling.nextElementSibling
      }
      return { term: dt.textContent?.trim() ?? '', definitions }
    }),
  )
}

/**
 * Overview paragraph, the dt/dd details grid, and the exact headcount from
 * the "See all N employees" link.
 */
export async function scrapeCompanyDetails(
  context: ScrapeContext,
  company: CompanyAggregate,
): Promise<void> {
  const { page } = context

  const aboutUs = await extractTextSafe(page, COMPANY_SELECTORS.OVERVIEW)
  const pairs = await readDefinitionPairs(page)
  log.debug(`Found ${pairs.length} company detail rows`)

  company.mergeDetails({
    aboutUs: aboutUs || undefined,
    ...parseCompanyDetails(pairs),
  })

  const employeesLink = await extractTextSafe(
    page,
    COMPANY_SELECTORS.SEE_ALL_EMPLOYEES,
  )
  const headcount = parseSeeAllEmployees(collapseWhitespace(employeesLink))
  if (headcount !== undefined) company.setHeadcount(headcount)
}
