import type { SelectorGroup } from '../../config/selectors'
import {
  PROFILE_HONORS_SECTION_SELECTORS,
  PROFILE_LANGUAGES_SECTION_SELECTORS,
  PROFILE_SECTION_ITEM_SELECTORS,
} from '../../config/selectors'
import type { Parser } from '../../extraction/parsers/types'
import {
  HonorParser,
  LanguageParser,
} from '../../extraction/parsers/accomplishment-parser'
import { collectItems } from '../../extraction/orchestrator'
import type { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import { trySelectors } from '../../utils/selector-utils'
import type { ScrapeContext } from '../options'
import {
  findListEntries,
  isEmptySection,
  openDetailsPage,
  parseEntry,
  scrollToBottom,
} from '../utils'

async function scrapeDetailsList<T>(
  context: ScrapeContext,
  person: PersonAggregate,
  section: 'honors' | 'languages',
  parser: Parser<T>,
  append: (item: T) => boolean,
): Promise<void> {
  const { page } = context
  await openDetailsPage(page, person.linkedinUrl, section, context.callback)
  if (await isEmptySection(page)) {
    log.skip(`No ${section}`)
    return
  }

  const report = await collectItems(await findListEntries(page), {
    section,
    sink: person,
    parse: (entry) => parseEntry(entry, parser),
    append,
  })
  log.success(`Parsed ${report.appended} ${section}`)
}

async function scrapeProfileSection<T>(
  context: ScrapeContext,
  person: PersonAggregate,
  section: string,
  group: SelectorGroup,
  parser: Parser<T>,
  append: (item: T) => boolean,
): Promise<void> {
  const found = await trySelectors(context.page, group)
  if (!found.value) {
    log.skip(`No ${section} section`)
    return
  }

  const report = await collectItems(
    await findListEntries(found.value, PROFILE_SECTION_ITEM_SELECTORS),
    {
      section,
      sink: person,
      parse: (entry) => parseEntry(entry, parser),
      append,
    },
  )
  log.success(`Parsed ${report.appended} ${section}`)
}

/**
 * Honors and languages previewed on the profile page that is already
 * loaded. The details pages read afterwards add what the preview cuts off;
 * the aggregate drops the repeats.
 */
export async function scrapeProfileAccomplishments(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  await scrollToBottom(context.page)

  await scrapeProfileSection(
    context,
    person,
    'profile_honors',
    PROFILE_HONORS_SECTION_SELECTORS,
    new HonorParser(),
    (honor) => person.addHonor(honor),
  )
  await scrapeProfileSection(
    context,
    person,
    'profile_languages',
    PROFILE_LANGUAGES_SECTION_SELECTORS,
    new LanguageParser(),
    (language) => person.addLanguage(language),
  )
}

export async function scrapeHonors(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  await scrapeDetailsList(context, person, 'honors', new HonorParser(), (honor) =>
    person.addHonor(honor),
  )
}

export async function scrapeLanguages(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  await scrapeDetailsList(
    context,
    person,
    'languages',
    new LanguageParser(),
    (language) => person.addLanguage(language),
  )
}
