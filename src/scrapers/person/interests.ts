import type { Locator } from 'playwright'
import { INTEREST_TAB_SELECTOR } from '../../config/selectors'
import { InterestParser } from '../../extraction/parsers/interest-parser'
import { collectItems } from '../../extraction/orchestrator'
import type { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import type { ScrapeContext } from '../options'
import {
  findListEntries,
  isEmptySection,
  openDetailsPage,
  parseEntry,
  waitAndFocus,
} from '../utils'

const parser = new InterestParser()

async function collectInterests(
  person: PersonAggregate,
  entries: Locator[],
  section: string,
  category: string,
): Promise<number> {
  const report = await collectItems(entries, {
    section,
    sink: person,
    parse: (entry) => parseEntry(entry, parser, { category }),
    append: (interest) => person.addInterest(interest),
  })
  return report.appended
}

/**
 * Reads `/details/interests/`. Each tab (companies, groups, newsletters,
 * schools, top voices) lists its own cards; the tab name types a card whose
 * URL does not.
 */
export async function scrapeInterests(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  const { page } = context
  await openDetailsPage(page, person.linkedinUrl, 'interests', context.callback)
  if (await isEmptySection(page)) {
    log.skip('No interests')
    return
  }

  const tabs = await page.locator(INTEREST_TAB_SELECTOR).all()
  if (tabs.length === 0) {
    const appended = await collectInterests(
      person,
      await findListEntries(page),
      'interests',
      '',
    )
    log.success(`Parsed ${appended} interests`)
    return
  }

  let total = 0
  for (const tab of tabs) {
    const category = (await tab.innerText()).trim()
    if (!category) continue

    await tab.click()
    await waitAndFocus(page, 0.5)

    const panel = page.locator('[role="tabpanel"]').first()
    const section = `interests_${category.toLowerCase().replace(/\s+/g, '_')}`
    total += await collectInterests(
      person,
      await findListEntries(panel),
      section,
      category,
    )
  }

  log.success(`Parsed ${total} interests across ${tabs.length} tabs`)
}
