import type { Page } from 'playwright'
import { COMMON_SELECTORS } from '../../config/constants'
import {
  ABOUT_SELECTORS,
  OPEN_TO_WORK_IMAGE,
  PROFILE_HEADLINE_SELECTORS,
  PROFILE_LOCATION_SELECTORS,
  TOP_CARD_SELECTORS,
} from '../../config/selectors'
import { ElementNotFoundError } from '../../exceptions'
import { AboutParser } from '../../extraction/parsers/about-parser'
import {
  TopCardParser,
  isOpenToWork,
} from '../../extraction/parsers/top-card-parser'
import { parseValid } from '../../extraction/parsers/types'
import type { PersonAggregate } from '../../models/person'
import { log } from '../../utils/logger'
import { trySelectors, trySelectorsForText } from '../../utils/selector-utils'
import { splitLines } from '../../utils/text'
import type { ScrapeContext } from '../options'
import { extractTextSafe } from '../utils'

async function checkOpenToWork(page: Page): Promise<boolean> {
  const imgTitle = await page
    .locator(OPEN_TO_WORK_IMAGE)
    .first()
    .getAttribute('title', { timeout: 1000 })
    .catch(() => null)
  if (imgTitle?.toUpperCase().includes('#OPEN_TO_WORK')) return true

  const topCard = await trySelectors(page, TOP_CARD_SELECTORS)
  const text = topCard.value
    ? await topCard.value.innerText().catch(() => '')
    : ''
  return isOpenToWork(splitLines(text))
}

/**
 * Name, headline, location, open-to-work flag and the about text of the
 * profile page that is already loaded.
 */
export async function scrapeBasicInfo(
  context: ScrapeContext,
  person: PersonAggregate,
): Promise<void> {
  const { page } = context

  const name = await extractTextSafe(page, COMMON_SELECTORS.TOP_CARD_NAME)
  if (!name) {
    throw new ElementNotFoundError('Profile name not found on the top card')
  }

  const headline = await trySelectorsForText(page, PROFILE_HEADLINE_SELECTORS)
  const location = await trySelectorsForText(page, PROFILE_LOCATION_SELECTORS)
  if (location.usedFallback) {
    log.warning(`Location found using fallback selector: ${location.usedSelector}`)
  }

  const identity = parseValid(new TopCardParser(), {
    texts: [name, headline.value, location.value],
    links: [],
    context: {},
  })
  if (identity) {
    person.setIdentity({
      ...identity,
      openToWork: identity.openToWork || (await checkOpenToWork(page)),
    })
    log.debug(`Got name: ${identity.name}`)
  }

  const aboutText = await trySelectorsForText(page, ABOUT_SELECTORS)
  const about = parseValid(new AboutParser(), {
    texts: splitLines(aboutText.value),
    links: [],
    context: {},
  })
  if (about) {
    person.addAbout(about)
    log.debug('Got about section')
  }
}
