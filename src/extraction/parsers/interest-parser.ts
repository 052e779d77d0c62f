import type { Interest, InterestType } from '../../models/person'
import { cleanTokens } from './shared'
import type { ParseInput, Parser } from './types'

const URL_TYPES: ReadonlyArray<[RegExp, InterestType]> = [
  [/\/in\//i, 'influencer'],
  [/\/company\//i, 'company'],
  [/\/showcase\//i, 'company'],
  [/\/groups\//i, 'group'],
  [/\/newsletters\//i, 'newsletter'],
  [/\/school\//i, 'school'],
]

const TAB_TYPES: Record<string, InterestType> = {
  'top voices': 'influencer',
  influencers: 'influencer',
  companies: 'company',
  groups: 'group',
  newsletters: 'newsletter',
  schools: 'school',
}

const AUDIENCE_REGEX = /([\d.,]+\s*[KkMm]?)\s+(?:followers|members|subscribers)/i

export function interestTypeFromUrl(url: string): InterestType | undefined {
  return URL_TYPES.find(([pattern]) => pattern.test(url))?.[1]
}

/**
 * @example
 * parseAudience('1,029,906 followers') // '1029906'
 */
export function parseAudience(text: string): string | undefined {
  const match = text.match(AUDIENCE_REGEX)
  return match?.[1]?.replace(/[,\s]/g, '')
}

/**
 * Interest cards: name first, audience size somewhere below. The type comes
 * from the URL shape, or from the tab the card was listed under.
 */
export class InterestParser implements Parser<Interest> {
  readonly sectionName = 'interest'

  parse(input: ParseInput): Interest | null {
    const texts = cleanTokens(input.texts)
    const name = texts[0]
    if (!name) return null

    const url = input.links[0]?.url
    const category = input.context.category?.trim().toLowerCase() ?? ''
    const type =
      (url ? interestTypeFromUrl(url) : undefined) ?? TAB_TYPES[category]
    if (!type) return null

    let followers: string | undefined
    for (const text of texts.slice(1)) {
      followers = parseAudience(text)
      if (followers) break
    }

    return { name, type, url, followers }
  }

  validate(item: Interest): boolean {
    return !!item.name && !!item.type
  }
}
