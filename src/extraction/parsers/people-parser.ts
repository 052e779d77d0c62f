import type { Connection } from '../../models/common'
import type { Employee, Follower } from '../../models/company'
import { isProfileUrl } from '../../utils/url'
import { cleanTokens, firstLinkMatching } from './shared'
import type { ParseInput, Parser } from './types'

const NOISE_PATTERNS: readonly RegExp[] = [
  /degree connection/i,
  /mutual connection/i,
  /^[·•]?\s*(?:1st|2nd|3rd\+?)$/i,
  /^(?:connect|message|follow|following|pending|remove)$/i,
  /^view .+ profile$/i,
  /^status is /i,
  /^connected /i,
]

const DEGREE_SUFFIX_REGEX = /\s*[·•]\s*(?:1st|2nd|3rd\+?)\s*$/i
const MAX_NAME_WORDS = 6
const HIDDEN_MEMBER = 'LinkedIn Member'

function isNoise(text: string): boolean {
  return NOISE_PATTERNS.some((pattern) => pattern.test(text))
}

export interface PersonCard {
  name: string
  headline?: string
  linkedinUrl?: string
}

/**
 * Reads a person card (search result, connection, follower): the first
 * short line that is not a degree badge or button label is the name, the
 * next meaningful line the headline.
 */
export function parsePersonCard(input: ParseInput): PersonCard | null {
  const texts = cleanTokens(input.texts)
    .map((text) => text.replace(DEGREE_SUFFIX_REGEX, '').trim())
    .filter((text) => text.length > 0 && !isNoise(text))

  const nameIndex = texts.findIndex(
    (text) => text.split(/\s+/).length <= MAX_NAME_WORDS,
  )
  const name = texts[nameIndex]
  if (!name || name === HIDDEN_MEMBER) return null

  const headline = texts.slice(nameIndex + 1).find((text) => text !== name)

  return {
    name,
    headline,
    linkedinUrl: firstLinkMatching(input.links, isProfileUrl)?.url,
  }
}

export class ConnectionParser implements Parser<Connection> {
  readonly sectionName = 'connections'

  parse(input: ParseInput): Connection | null {
    return parsePersonCard(input)
  }

  validate(item: Connection): boolean {
    return !!item.name && !!item.linkedinUrl
  }
}

export class EmployeeParser implements Parser<Employee> {
  readonly sectionName = 'employees'

  parse(input: ParseInput): Employee | null {
    const card = parsePersonCard(input)
    if (!card) return null
    return {
      name: card.name,
      position: card.headline,
      linkedinUrl: card.linkedinUrl,
    }
  }

  validate(item: Employee): boolean {
    return !!item.name
  }
}

export class FollowerParser implements Parser<Follower> {
  readonly sectionName = 'followers'

  parse(input: ParseInput): Follower | null {
    return parsePersonCard(input)
  }

  validate(item: Follower): boolean {
    return !!item.name && !!item.linkedinUrl
  }
}
