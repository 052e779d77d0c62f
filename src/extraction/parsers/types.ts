import type { TextNode } from '../description'
import type { ExtractedLink, ExtractedText } from '../text-extractors/types'

export interface ParseInput {
  texts: string[]
  links: ExtractedLink[]
  subItems?: ParseInput[]
  details?: TextNode[]
  context: Record<string, string>
}

export interface Parser<T> {
  readonly sectionName: string
  parse(input: ParseInput): T | null
  validate(item: T): boolean
}

export function toParseInput(
  extracted: ExtractedText,
  context: Record<string, string> = {},
): ParseInput {
  return {
    texts: extracted.texts,
    links: extracted.links,
    subItems: extracted.subItems?.map((sub) => toParseInput(sub, context)),
    details: extracted.details,
    context,
  }
}

/**
 * Runs a parser and keeps the result only when it validates.
 */
export function parseValid<T>(parser: Parser<T>, input: ParseInput): T | null {
  const item = parser.parse(input)
  return item !== null && parser.validate(item) ? item : null
}
