import { COMMON_SELECTORS, SCRAPING_CONSTANTS } from '../../config/constants'
import { COMPANY_SELECTORS } from '../../config/selectors'
import { collectPaginated } from '../../extraction/collector'
import { EmployeeParser } from '../../extraction/parsers/people-parser'
import type { CompanyAggregate } from '../../models/company'
import { log } from '../../utils/logger'
import { companyPageUrl } from '../../utils/url'
import { NextButtonListSource, profileUrlOf } from '../list-source'
import type { ScrapeContext } from '../options'
import { navigateAndWait, parseEntry, waitAndFocus } from '../utils'

/**
 * Walks the company's people search results with "Next" pagination. A
 * restricted people page that never reaches the search yields no employees.
 */
export async function scrapeEmployees(
  context: ScrapeContext,
  company: CompanyAggregate,
  maxPages: number,
): Promise<void> {
  const { page } = context
  await navigateAndWait(
    page,
    companyPageUrl(company.linkedinUrl, 'people'),
    context.callback,
  )
  await page.waitForSelector(COMMON_SELECTORS.MAIN, {
    timeout: SCRAPING_CONSTANTS.MAIN_SELECTOR_TIMEOUT_MS,
  })

  const employeesLink = page.locator(COMPANY_SELECTORS.EMPLOYEES_LINK).first()
  if (await employeesLink.isVisible().catch(() => false)) {
    await employeesLink.click()
    await waitAndFocus(page, SCRAPING_CONSTANTS.PAGINATION_SETTLE_WAIT)
  }

  if (!page.url().includes('/search/results/people')) {
    log.skip('Employee search results are not available for this company')
    return
  }

  const parser = new EmployeeParser()
  const result = await collectPaginated(
    new NextButtonListSource(page, COMPANY_SELECTORS.EMPLOYEE_ITEM),
    {
      section: 'employees',
      maxPages,
      waitTimeoutMs: context.waitTimeoutMs,
      urlOf: profileUrlOf,
      extract: async (entry) => {
        const employee = await parseEntry(entry, parser)
        return employee && company.addEmployee(employee) ? employee : null
      },
    },
  )

  for (const [key, message] of Object.entries(result.errors)) {
    company.recordError(key, message)
  }
  log.success(
    `Parsed ${result.items.length} employees over ` +
      `${result.pagesVisited} pages (${result.state})`,
  )
}
