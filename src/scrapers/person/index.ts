import type { Page } from 'playwright'
import { COMMON_SELECTORS, SCRAPING_CONSTANTS } from '../../config/constants'
import { PersonField, hasField } from '../../config/fields'
import type { ExtractionStep } from '../../extraction/orchestrator'
import { runSteps } from '../../extraction/orchestrator'
import type { PersonData } from '../../models/person'
import { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import { assertProfileUrl } from '../../utils/url'
import type { PersonScraperOptions, ScrapeContext } from '../options'
import { PersonScraperOptionsSchema, createScrapeContext } from '../options'
import { navigateAndWait, waitAndFocus } from '../utils'
import {
  scrapeHonors,
  scrapeLanguages,
  scrapeProfileAccomplishments,
} from './accomplishments'
import { scrapeContacts } from './contacts'
import { scrapeEducations } from './educations'
import { scrapeExperiences } from './experiences'
import { scrapeInterests } from './interests'
import { scrapeBasicInfo } from './profile'

export type { PersonScraperOptions } from '../options'

/**
 * Scrapes a person profile.
 *
 * Invalid URLs, a failed first navigation and rate limiting are thrown.
 * Anything that fails after that lands in `scrapingErrors` and the rest of
 * the profile is still returned.
 *
 * @example
 * ```typescript
 * const person = await scrapePerson(page, 'https://www.linkedin.com/in/someone/', {
 *   fields: PERSON_PRESETS.CAREER,
 * })
 * ```
 */
export async function scrapePerson(
  page: Page,
  linkedinUrl: string,
  options: PersonScraperOptions = {},
): Promise<PersonData> {
  const resolved = PersonScraperOptionsSchema.parse(options)
  const profileUrl = assertProfileUrl(linkedinUrl)
  const context: ScrapeContext = createScrapeContext(page, resolved)
  const { callback } = context

  await callback.onStart('person', profileUrl)

  await navigateAndWait(page, profileUrl, callback)
  await page.waitForSelector(COMMON_SELECTORS.MAIN, {
    timeout: SCRAPING_CONSTANTS.MAIN_SELECTOR_TIMEOUT_MS,
  })
  await waitAndFocus(page, 1)
  log.debug('Navigated to profile')

  const person = new PersonAggregate(profileUrl)
  const fields = resolved.fields
  const accomplishments = hasField(fields, PersonField.ACCOMPLISHMENTS)

  const steps: Array<ExtractionStep<PersonAggregate>> = [
    {
      name: 'basic_info',
      enabled: hasField(fields, PersonField.BASIC_INFO),
      run: (p) => scrapeBasicInfo(context, p),
    },
    {
      // Reads the profile page, so it runs before any details page opens.
      name: 'accomplishments',
      enabled: accomplishments,
      run: (p) => scrapeProfileAccomplishments(context, p),
    },
    {
      name: 'experience',
      enabled: hasField(fields, PersonField.EXPERIENCE),
      run: (p) => scrapeExperiences(context, p),
    },
    {
      name: 'education',
      enabled: hasField(fields, PersonField.EDUCATION),
      run: (p) => scrapeEducations(context, p),
    },
    {
      name: 'interests',
      enabled: hasField(fields, PersonField.INTERESTS),
      run: (p) => scrapeInterests(context, p),
    },
    {
      name: 'honors',
      enabled: accomplishments,
      run: (p) => scrapeHonors(context, p),
    },
    {
      name: 'languages',
      enabled: accomplishments,
      run: (p) => scrapeLanguages(context, p),
    },
    {
      name: 'contacts',
      enabled: hasField(fields, PersonField.CONTACTS),
      run: (p) =>
        scrapeContacts(context, p, {
          maxPages: resolved.connectionPages,
          maxRecords: resolved.maxConnections,
        }),
    },
  ]

  const report = await runSteps(person, steps, {
    signal: resolved.signal,
    callback,
    pauseBetweenSteps: resolved.sectionPauseMs / 1000,
  })

  log.debug(
    `Scraping complete: ${report.completed.length} steps done, ` +
      `${report.failed.length} failed${report.cancelled ? ', cancelled' : ''}`,
  )

  const data = person.toJSON()
  await callback.onComplete('person', data)
  return data
}
