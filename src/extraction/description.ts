/**
 * Description/Skills Splitter
 *
 * Separates narrative text from the "Skills: a · b · c" line the site
 * appends to positions and degrees. Nested sub-lists often repeat the same
 * sentence (truncated, then full), so description lines are fuzzy-deduped
 * while skills use exact matching.
 */

import { INSTITUTION_KEYWORDS, SKILLS_MARKER } from '../config/constants'
import type { SimilarityOptions } from '../utils/fuzzy'
import { DEFAULT_SIMILARITY, isEssentiallySame } from '../utils/fuzzy'
import { cleanDuplicatedText, containsKeyword, splitLines } from '../utils/text'

export interface DescriptionAndSkills {
  description: string
  skills: string[]
}

export interface SplitterOptions {
  similarity?: SimilarityOptions
  institutionKeywords?: readonly string[]
}

/**
 * One rendered list item and the sub-list nested under it.
 */
export interface TextNode {
  text: string
  children?: readonly TextNode[]
}

export function isSkillsLine(line: string): boolean {
  return line.trim().startsWith(SKILLS_MARKER)
}

/**
 * Splits a skills block on "·" (or "," when no "·" is present). Fragments
 * spanning a line break or naming an institution are bleed-through from the
 * neighbouring entry and are dropped.
 *
 * @example
 * parseSkillsLine('Skills: Java · Python · University of Example') // ['Java', 'Python']
 */
export function parseSkillsLine(
  text: string,
  institutionKeywords: readonly string[] = INSTITUTION_KEYWORDS,
): string[] {
  const body = text.trim().slice(SKILLS_MARKER.length).trim()
  if (!body) return []

  const separator = body.includes('·') ? '·' : ','
  return body
    .split(separator)
    .map((skill) => skill.trim())
    .filter(
      (skill) =>
        skill.length > 0 &&
        !skill.includes('\n') &&
        !containsKeyword(skill, institutionKeywords),
    )
}

class SplitAccumulator {
  private readonly descriptionLines: string[] = []
  private readonly skills: string[] = []

  constructor(private readonly options: SplitterOptions) {}

  addSkills(skills: readonly string[]): void {
    for (const skill of skills) {
      if (!this.skills.includes(skill)) this.skills.push(skill)
    }
  }

  addLine(line: string): void {
    if (isSkillsLine(line)) {
      this.addSkills(parseSkillsLine(line, this.options.institutionKeywords))
      return
    }

    if (this.descriptionLines.includes(line)) return
    if (
      isEssentiallySame(
        line,
        this.descriptionLines,
        this.options.similarity ?? DEFAULT_SIMILARITY,
      )
    ) {
      return
    }
    this.descriptionLines.push(line)
  }

  result(): DescriptionAndSkills {
    return {
      description: this.descriptionLines.join('\n'),
      skills: [...this.skills],
    }
  }
}

/**
 * @example
 * extractDescriptionAndSkills('Built the billing platform.\nSkills: Go, SQL')
 * // { description: 'Built the billing platform.', skills: ['Go', 'SQL'] }
 */
export function extractDescriptionAndSkills(
  text: string,
  options: SplitterOptions = {},
): DescriptionAndSkills {
  const accumulator = new SplitAccumulator(options)
  if (!text.trim()) return accumulator.result()

  // A block that opens with the marker is skills only, line breaks included.
  if (isSkillsLine(text)) {
    accumulator.addSkills(parseSkillsLine(text, options.institutionKeywords))
    return accumulator.result()
  }

  for (const line of splitLines(text)) accumulator.addLine(line)
  return accumulator.result()
}

/**
 * Same split over a forest of nested list items, walked depth-first. Each
 * item's own doubled lines are folded before its lines are compared with
 * what earlier items contributed.
 */
export function extractDescriptionAndSkillsFromLists(
  forest: readonly TextNode[],
  options: SplitterOptions = {},
): DescriptionAndSkills {
  const accumulator = new SplitAccumulator(options)

  const visit = (nodes: readonly TextNode[]): void => {
    for (const node of nodes) {
      for (const line of splitLines(cleanDuplicatedText(node.text))) {
        accumulator.addLine(line)
      }
      if (node.children) visit(node.children)
    }
  }

  visit(forest)
  return accumulator.result()
}
