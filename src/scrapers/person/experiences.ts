import { ExperienceParser } from '../../extraction/parsers/experience-parser'
import { collectItems } from '../../extraction/orchestrator'
import type { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import type { ScrapeContext } from '../options'
import { findListEntries, isEmptySection, openDetailsPage, parseEntry } from '../utils'

/**
 * Reads `/details/experience/`. An organization with nested roles appends
 * one record per role.
 */
export async function scrapeExperiences(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  const { page } = context
  await openDetailsPage(page, person.linkedinUrl, 'experience', context.callback)
  if (await isEmptySection(page)) {
    log.skip('No experience entries')
    return
  }

  const entries = await findListEntries(page)
  const parser = new ExperienceParser(context.splitter)

  const report = await collectItems(entries, {
    section: 'experience',
    sink: person,
    parse: (entry) => parseEntry(entry, parser),
    append: (positions) =>
      positions
        .map((position) => person.addExperience(position))
        .some(Boolean),
  })

  log.success(`Parsed ${report.appended} experience entries`)
}
