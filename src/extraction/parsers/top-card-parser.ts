import { SCRAPING_CONSTANTS } from '../../config/constants'
import type { PersonIdentity } from '../../models/person'
import { cleanSingleStringDuplicates } from '../../utils/text'
import type { ParseInput, Parser } from './types'

const CONTACT_INFO_SUFFIX = /\s*[·•]?\s*Contact info\b.*$/i
const OPEN_TO_WORK_REGEX = /open to work|#opentowork/i

/**
 * Top card tokens in fixed positions: name, headline, location (empty
 * strings for the ones not found). A headline equal to the name or too
 * short to be one is dropped.
 */
export class TopCardParser implements Parser<PersonIdentity> {
  readonly sectionName = 'basic_info'

  parse(input: ParseInput): PersonIdentity | null {
    const [name, headline, location] = input.texts.map((text) =>
      cleanSingleStringDuplicates(text),
    )
    if (!name) return null

    return {
      name,
      headline:
        headline &&
        headline !== name &&
        headline.length > SCRAPING_CONSTANTS.MIN_HEADLINE_LENGTH
          ? headline
          : undefined,
      location: location?.replace(CONTACT_INFO_SUFFIX, '').trim() || undefined,
      openToWork: isOpenToWork(input.texts),
    }
  }

  validate(item: PersonIdentity): boolean {
    return !!item.name
  }
}

export function isOpenToWork(texts: readonly string[]): boolean {
  return texts.some((text) => OPEN_TO_WORK_REGEX.test(text))
}
