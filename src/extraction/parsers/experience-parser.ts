import type { Experience } from '../../models/person'
import { isCompanyUrl } from '../../utils/url'
import type { EntrySummary } from '../classifier'
import { summarizeEntry } from '../classifier'
import type { SplitterOptions, TextNode } from '../description'
import { extractDescriptionAndSkillsFromLists } from '../description'
import { cleanTokens, firstLinkMatching, presentOrUndefined } from './shared'
import type { ParseInput, Parser } from './types'

/**
 * One details-page experience entry. A single role yields one record; an
 * organization header with nested roles yields one record per role, each
 * carrying the organization's name and URL.
 */
export class ExperienceParser implements Parser<Experience[]> {
  readonly sectionName = 'experience'

  constructor(private readonly splitter: SplitterOptions = {}) {}

  parse(input: ParseInput): Experience[] | null {
    const texts = cleanTokens(input.texts)
    if (texts.length === 0) return null

    const organizationUrl =
      firstLinkMatching(input.links, isCompanyUrl)?.url ?? input.links[0]?.url
    const subItems = input.subItems ?? []

    if (subItems.length > 1) {
      const header = summarizeEntry(texts)
      const institutionName = header.organization ?? texts[0]

      const positions = subItems
        .map((sub) => {
          const tokens = cleanTokens(sub.texts)
          if (tokens.length === 0) return null
          const summary = summarizeEntry(tokens, { layout: 'titleLed' })
          return this.toExperience(
            {
              ...summary,
              organization: institutionName,
              employmentType: summary.employmentType ?? header.employmentType,
              location: summary.location ?? header.location,
            },
            organizationUrl,
            sub.details ?? [],
          )
        })
        .filter((position): position is Experience => position !== null)

      return positions.length > 0 ? positions : null
    }

    const summary = summarizeEntry(texts)
    const details = [
      ...(input.details ?? []),
      ...subItems.flatMap((sub) => [
        ...sub.texts.map((text) => ({ text })),
        ...(sub.details ?? []),
      ]),
    ]

    return [
      this.toExperience(
        {
          ...summary,
          organization:
            summary.organization ?? presentOrUndefined(input.links[0]?.text),
        },
        organizationUrl,
        details,
      ),
    ]
  }

  validate(items: Experience[]): boolean {
    return (
      items.length > 0 &&
      items.every((item) => !!item.positionTitle || !!item.institutionName)
    )
  }

  private toExperience(
    summary: EntrySummary,
    organizationUrl: string | undefined,
    details: readonly TextNode[],
  ): Experience {
    const { description, skills } = extractDescriptionAndSkillsFromLists(
      details,
      this.splitter,
    )

    return {
      institutionName: summary.organization,
      linkedinUrl: organizationUrl,
      positionTitle: summary.title,
      employmentType: summary.employmentType,
      fromDate: summary.fromDate,
      toDate: summary.toDate,
      duration: summary.duration,
      location: summary.location,
      description: presentOrUndefined(description),
      skills,
    }
  }
}
