import { CompanyField, hasField } from '../../config/fields'
import { COMPANY_SELECTORS } from '../../config/selectors'
import { CompanySummaryParser } from '../../extraction/parsers/company-parser'
import { collectItems } from '../../extraction/orchestrator'
import type { CompanyAggregate } from '../../models/company'
import { log } from '../../utils/logger'
import type { ScrapeContext } from '../options'
import { parseEntry } from '../utils'

/**
 * The "Affiliated pages" section lists showcase pages and affiliated
 * companies together; each entry goes to the list the field mask asks for.
 */
export async function scrapeAffiliatedPages(
  context: ScrapeContext,
  company: CompanyAggregate,
  fields: number,
): Promise<void> {
  const { page } = context
  const heading = page.locator(COMPANY_SELECTORS.AFFILIATED_HEADING).first()
  if ((await heading.count()) === 0) {
    log.skip('No affiliated pages section')
    return
  }

  const section = heading.locator('xpath=ancestor::section[1]')
  const showAll = section.locator('button:has-text("Show all")').first()
  if (await showAll.isVisible().catch(() => false)) {
    await showAll.click()
  }

  const entries = await section.locator('ul').first().locator('> li').all()
  const wantShowcase = hasField(fields, CompanyField.SHOWCASE_PAGES)
  const wantAffiliated = hasField(fields, CompanyField.AFFILIATED_COMPANIES)
  const parser = new CompanySummaryParser()

  const report = await collectItems(entries, {
    section: 'affiliated_pages',
    sink: company,
    parse: async (entry) => {
      const parsed = await parseEntry(entry, parser)
      if (!parsed) return null
      if (parsed.kind === 'showcase' && !wantShowcase) return null
      if (parsed.kind === 'affiliated' && !wantAffiliated) return null
      return parsed
    },
    append: ({ kind, summary }) =>
      kind === 'showcase'
        ? company.addShowcasePage(summary)
        : company.addAffiliatedCompany(summary),
  })

  log.success(`Parsed ${report.appended} affiliated pages`)
}
