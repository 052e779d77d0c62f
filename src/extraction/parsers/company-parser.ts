import type { CompanyDetails, CompanySummary } from '../../models/company'
import { isCompanyUrl } from '../../utils/url'
import { parseCount } from '../../utils/text'
import { parseAudience } from './interest-parser'
import { cleanTokens, firstLinkMatching, presentOrUndefined } from './shared'
import type { ParseInput, Parser } from './types'

export interface DefinitionPair {
  term: string
  definitions: string[]
}

export type CompanySummaryKind = 'showcase' | 'affiliated'

export interface ClassifiedCompanySummary {
  kind: CompanySummaryKind
  summary: CompanySummary
}

const SHOWCASE_MARKER = /showcase page/i
const SEE_ALL_EMPLOYEES_REGEX = /See all ([\d,.]+) employees/i
const EMPLOYEES_REGEX = /\bemployees\b/i

/**
 * Headcount from a size band such as "1,001-5,000 employees", "10,001+" or
 * "10K+ employees": the first number, K/M suffixes expanded.
 */
export function parseHeadcount(text: string): number | undefined {
  const match = text.match(/(\d[\d,]*(?:\.\d+)?)\s*([KkMm])?\b/)
  if (!match?.[1]) return undefined
  const value = Number.parseFloat(match[1].replace(/,/g, ''))
  if (Number.isNaN(value)) return undefined

  const suffix = match[2]?.toLowerCase()
  const multiplier = suffix === 'k' ? 1_000 : suffix === 'm' ? 1_000_000 : 1
  return Math.round(value * multiplier)
}

/**
 * "See all 1,234 employees on LinkedIn" link text.
 */
export function parseSeeAllEmployees(text: string): number | undefined {
  const match = text.match(SEE_ALL_EMPLOYEES_REGEX)
  return match?.[1] ? parseCount(match[1]) : undefined
}

/**
 * Reads the about page's dt/dd grid. Unknown terms are ignored; a term
 * with several definitions uses the first.
 */
export function parseCompanyDetails(
  pairs: readonly DefinitionPair[],
): CompanyDetails {
  const details: CompanyDetails = {}

  for (const pair of pairs) {
    const value = presentOrUndefined(pair.definitions[0])
    if (!value) continue

    switch (pair.term.trim().toLowerCase()) {
      case 'website':
        details.website = value
        break
      case 'phone':
        details.phone = value.split('\n')[0]?.trim()
        break
      case 'industry':
        details.industry = value
        break
      case 'company size':
        details.companySize = value
        details.headcount = parseHeadcount(value)
        break
      case 'headquarters':
        details.headquarters = value
        break
      case 'founded':
        details.founded = value
        break
      case 'type':
        details.companyType = value
        break
      case 'specialties':
        details.specialties = value
          .split(',')
          .map((specialty) => specialty.trim())
          .filter(Boolean)
        break
    }
  }

  return details
}

/**
 * Top card info line items: industry, headquarters, follower count and
 * employee band, in no fixed order.
 */
export function parseTopCardInfo(items: readonly string[]): CompanyDetails {
  const details: CompanyDetails = {}

  for (const item of cleanTokens(items)) {
    if (EMPLOYEES_REGEX.test(item)) {
      details.companySize ??= item
      details.headcount ??= parseHeadcount(item)
      continue
    }
    if (/followers/i.test(item)) continue
    if (item.includes(',')) {
      details.headquarters ??= item
      continue
    }
    details.industry ??= item
  }

  return details
}

/**
 * Entries of the "Affiliated pages" section. Showcase pages are marked
 * with a "Showcase page" line; everything else is an affiliated company.
 */
export class CompanySummaryParser
  implements Parser<ClassifiedCompanySummary>
{
  readonly sectionName = 'affiliated_pages'

  parse(input: ParseInput): ClassifiedCompanySummary | null {
    const texts = cleanTokens(input.texts)
    const name = texts[0]
    const link = firstLinkMatching(input.links, isCompanyUrl)
    if (!name && !link) return null

    const isShowcase =
      texts.some((text) => SHOWCASE_MARKER.test(text)) ||
      /\/showcase\//i.test(link?.url ?? '')

    const followersLine = texts.find((text) => /followers/i.test(text))

    return {
      kind: isShowcase ? 'showcase' : 'affiliated',
      summary: {
        name,
        linkedinUrl: link?.url,
        followers: followersLine ? parseAudience(followersLine) : undefined,
      },
    }
  }

  validate(item: ClassifiedCompanySummary): boolean {
    return !!item.summary.name || !!item.summary.linkedinUrl
  }
}
