import type { ParseInput } from '../src/extraction/parsers/types'
import type { ExtractedLink } from '../src/extraction/text-extractors/types'

export function link(url: string, text = ''): ExtractedLink {
  return { url, text, isExternal: false }
}

export function parseInput(
  texts: string[],
  overrides: Partial<ParseInput> = {},
): ParseInput {
  return { texts, links: [], context: {}, ...overrides }
}
