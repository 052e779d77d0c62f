import type { Locator } from 'playwright'
import type { TextNode } from '../description'

export interface ExtractedLink {
  url: string
  text: string
  isExternal: boolean
}

/**
 * Raw text of one list entry, independent of the layout that rendered it.
 * `texts` are the summary tokens, `details` the nested description lists.
 */
export interface ExtractedText {
  texts: string[]
  links: ExtractedLink[]
  subItems?: ExtractedText[]
  details?: TextNode[]
  confidence: number
}

export interface TextExtractor {
  readonly name: string
  readonly priority: number
  canHandle(element: Locator): Promise<boolean>
  extract(element: Locator): Promise<ExtractedText | null>
}
