import { DATE_PATTERNS } from '../../config/constants'
import type { Education } from '../../models/person'
import { isCompanyUrl } from '../../utils/url'
import { isDateRange, parseDateRange } from '../dates'
import type { SplitterOptions } from '../description'
import { extractDescriptionAndSkillsFromLists } from '../description'
import { cleanTokens, firstLinkMatching, presentOrUndefined } from './shared'
import type { ParseInput, Parser } from './types'

const SINGLE_YEAR_REGEX = /^\d{4}$/

function findDates(
  token: string,
): { fromDate?: string; toDate?: string } | null {
  for (const part of token.split(DATE_PATTERNS.SEGMENT_SEPARATOR_REGEX)) {
    const segment = part.trim()
    if (isDateRange(segment)) {
      const range = parseDateRange(segment)
      if (!range.from) return null
      return { fromDate: range.from, toDate: range.to || undefined }
    }
    if (SINGLE_YEAR_REGEX.test(segment)) {
      return { fromDate: segment, toDate: segment }
    }
  }
  return null
}

/**
 * Education entries read institution, then degree, then dates. Lines after
 * the dates (grade, activities) join the description.
 */
export class EducationParser implements Parser<Education> {
  readonly sectionName = 'education'

  constructor(private readonly splitter: SplitterOptions = {}) {}

  parse(input: ParseInput): Education | null {
    const texts = cleanTokens(input.texts)
    const institutionName = texts[0]
    if (!institutionName) return null

    let degree: string | undefined
    let dates: { fromDate?: string; toDate?: string } = {}
    const extras: string[] = []

    for (const token of texts.slice(1)) {
      const found = dates.fromDate ? null : findDates(token)
      if (found) {
        dates = found
      } else if (!degree && !dates.fromDate) {
        degree = token
      } else {
        extras.push(token)
      }
    }

    const { description, skills } = extractDescriptionAndSkillsFromLists(
      [
        ...extras.map((text) => ({ text })),
        ...(input.details ?? []),
        ...(input.subItems ?? []).flatMap((sub) => sub.details ?? []),
      ],
      this.splitter,
    )

    return {
      institutionName,
      linkedinUrl:
        firstLinkMatching(input.links, isCompanyUrl)?.url ??
        input.links[0]?.url,
      degree,
      ...dates,
      description: presentOrUndefined(description),
      skills,
    }
  }

  validate(item: Education): boolean {
    return !!item.institutionName
  }
}
