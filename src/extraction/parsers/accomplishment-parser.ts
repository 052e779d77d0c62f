import type { Honor, Language } from '../../models/person'
import { DATE_PATTERNS } from '../../config/constants'
import { cleanTokens, presentOrUndefined } from './shared'
import type { ParseInput, Parser } from './types'

const ISSUED_BY_REGEX = /^Issued by\s+(.+)$/i
const ISSUED_ON_REGEX = /^Issued\s+(.+)$/i
const ASSOCIATED_REGEX = /^Associated with\s+(.+)$/i
const DOCUMENT_URL_REGEX = /single-media-viewer|type=DOCUMENT/i

/**
 * Honors and awards: "Issued by X · Jan 2020", "Associated with Y", and an
 * optional attached document.
 */
export class HonorParser implements Parser<Honor> {
  readonly sectionName = 'honors'

  parse(input: ParseInput): Honor | null {
    const texts = cleanTokens(input.texts)
    const title = texts[0]
    if (!title) return null

    const honor: Honor = { title }
    for (const text of texts.slice(1)) {
      const issuedBy = text.match(ISSUED_BY_REGEX)
      if (issuedBy?.[1] && !honor.issuer) {
        const [issuer, date] = issuedBy[1].split(
          DATE_PATTERNS.SEGMENT_SEPARATOR_REGEX,
        )
        honor.issuer = presentOrUndefined(issuer)
        honor.date ??= presentOrUndefined(date)
        continue
      }

      const associated = text.match(ASSOCIATED_REGEX)
      if (associated?.[1] && !honor.associatedWith) {
        honor.associatedWith = associated[1].trim()
        continue
      }

      const issuedOn = text.match(ISSUED_ON_REGEX)
      if (issuedOn?.[1] && !honor.date) {
        honor.date = issuedOn[1].trim()
      }
    }

    honor.documentUrl = input.links.find((link) =>
      DOCUMENT_URL_REGEX.test(link.url),
    )?.url

    return honor
  }

  validate(item: Honor): boolean {
    return !!item.title
  }
}

/**
 * Languages: the name, then a proficiency line when the profile states one.
 */
export class LanguageParser implements Parser<Language> {
  readonly sectionName = 'languages'

  parse(input: ParseInput): Language | null {
    const texts = cleanTokens(input.texts)
    const name = texts[0]
    if (!name) return null

    const rest = texts.slice(1)
    const proficiency =
      rest.find((text) => /proficiency/i.test(text)) ?? rest[0]

    return { name, proficiency }
  }

  validate(item: Language): boolean {
    return !!item.name
  }
}
