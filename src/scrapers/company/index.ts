import type { Page } from 'playwright'
import { CompanyField, hasField } from '../../config/fields'
import type { ExtractionStep } from '../../extraction/orchestrator'
import { runSteps } from '../../extraction/orchestrator'
import type { CompanyData } from '../../models/company'
import { CompanyAggregate } from '../../models/company'
import { log } from '../../utils/logger'
import { assertCompanyUrl, companyPageUrl } from '../../utils/url'
import type { CompanyScraperOptions } from '../options'
import { CompanyScraperOptionsSchema, createScrapeContext } from '../options'
import { navigateAndWait, waitAndFocus } from '../utils'
import { scrapeCompanyBasicInfo, scrapeCompanyDetails } from './about'
import { scrapeAffiliatedPages } from './affiliated'
import { scrapeEmployees } from './employees'
import { scrapeFollowers } from './followers'

export type { CompanyScraperOptions } from '../options'

/**
 * Scrapes a company page, starting from its `/about/` tab.
 *
 * Invalid URLs, a failed first navigation and rate limiting are thrown;
 * later failures land in `scrapingErrors`.
 */
export async function scrapeCompany(
  page: Page,
  linkedinUrl: string,
  options: CompanyScraperOptions = {},
): Promise<CompanyData> {
  const resolved = CompanyScraperOptionsSchema.parse(options)
  const companyUrl = assertCompanyUrl(linkedinUrl)
  const context = createScrapeContext(page, resolved)
  const { callback } = context

  await callback.onStart('company', companyUrl)
  await navigateAndWait(page, companyPageUrl(companyUrl, 'about'), callback)
  await waitAndFocus(page, 1)

  const company = new CompanyAggregate(companyUrl)
  const fields = resolved.fields

  const steps: Array<ExtractionStep<CompanyAggregate>> = [
    {
      name: 'basic_info',
      run: (c) => scrapeCompanyBasicInfo(context, c),
    },
    {
      name: 'details',
      run: (c) => scrapeCompanyDetails(context, c),
    },
    {
      name: 'affiliated_pages',
      enabled:
        hasField(fields, CompanyField.SHOWCASE_PAGES) ||
        hasField(fields, CompanyField.AFFILIATED_COMPANIES),
      run: (c) => scrapeAffiliatedPages(context, c, fields),
    },
    {
      name: 'employees',
      enabled: resolved.employeePages > 0,
      run: (c) => scrapeEmployees(context, c, resolved.employeePages),
    },
    {
      name: 'followers',
      enabled: resolved.followerPages > 0,
      run: (c) => scrapeFollowers(context, c, resolved.followerPages),
    },
  ]

  const report = await runSteps(company, steps, {
    signal: resolved.signal,
    callback,
    pauseBetweenSteps: resolved.sectionPauseMs / 1000,
  })

  log.debug(
    `Company scrape complete: ${report.completed.length} steps done, ` +
      `${report.failed.length} failed${report.cancelled ? ', cancelled' : ''}`,
  )

  const data = company.toJSON()
  await callback.onComplete('company', data)
  return data
}
