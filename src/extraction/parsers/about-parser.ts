import { cleanDuplicatedText } from '../../utils/text'
import type { ParseInput, Parser } from './types'

const SEE_MORE_SUFFIX = /\s*…?\s*see more$/i

export class AboutParser implements Parser<string> {
  readonly sectionName = 'about'

  parse(input: ParseInput): string | null {
    const texts = input.texts
      .map((text) => text.replace(SEE_MORE_SUFFIX, '').trim())
      .filter(Boolean)
      .filter((text) => text.toLowerCase() !== 'about')

    if (texts.length === 0) {
      return null
    }

    return cleanDuplicatedText(texts.join('\n')) || null
  }

  validate(item: string): boolean {
    return item.length > 0
  }
}
