import { EducationParser } from '../../extraction/parsers/education-parser'
import { collectItems } from '../../extraction/orchestrator'
import type { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import type { ScrapeContext } from '../options'
import { findListEntries, isEmptySection, openDetailsPage, parseEntry } from '../utils'

export async function scrapeEducations(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  const { page } = context
  await openDetailsPage(page, person.linkedinUrl, 'education', context.callback)
  if (await isEmptySection(page)) {
    log.skip('No education entries')
    return
  }

  const entries = await findListEntries(page)
  const parser = new EducationParser(context.splitter)

  const report = await collectItems(entries, {
    section: 'education',
    sink: person,
    parse: (entry) => parseEntry(entry, parser),
    append: (education) => person.addEducation(education),
  })

  log.success(`Parsed ${report.appended} education entries`)
}
