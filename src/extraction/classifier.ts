/**
 * Token Classifier
 *
 * Assigns a role to each short token of one list entry's summary
 * (e.g. `["Acme Corp · Contract", "Jan 2020 - Dec 2021 · 2 yrs", "Berlin, Germany"]`).
 * Content signals (dates, durations, employment types, locations) are applied
 * first; whatever is left falls back to positional priors anchored on where
 * the date-range token sits. A token in title position is read by position.
 */

import {
  DATE_PATTERNS,
  EMPLOYMENT_TYPES,
  LOCATION_INDICATORS,
} from '../config/constants'
import {
  hasDateFragment,
  isDateRange,
  isDuration,
  parseDateRange,
} from './dates'

export type TokenRole =
  | 'title'
  | 'organization'
  | 'dateRange'
  | 'duration'
  | 'location'
  | 'employmentType'
  | 'unknown'

export interface ClassifiedPart {
  text: string
  role: TokenRole
}

export interface ClassifiedToken {
  index: number
  text: string
  role: TokenRole
  parts: ClassifiedPart[]
}

/**
 * `auto` infers title/organization from the date token position.
 * `titleLed` is for nested positions under an organization header: token 0
 * is always the title and nothing is an organization.
 */
export type EntryLayout = 'auto' | 'titleLed'

export interface ClassifyOptions {
  layout?: EntryLayout
}

export interface EntrySummary {
  title?: string
  organization?: string
  employmentType?: string
  fromDate?: string
  toDate?: string
  duration?: string
  location?: string
}

const EMPLOYMENT_TYPE_SET: ReadonlySet<string> = new Set(EMPLOYMENT_TYPES)

const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')

const EMPLOYMENT_TYPE_REGEX = new RegExp(
  `(?:^|[^\\w-])(${EMPLOYMENT_TYPES.map(escapeRegex).join('|')})(?=$|[^\\w-])`,
  'i',
)

const LOCATION_REGEX = new RegExp(
  `(?:^|[^\\w-])(?:${LOCATION_INDICATORS.map(escapeRegex).join('|')})(?=$|[^\\w-])`,
  'i',
)

const SUB_SEPARATORS = ['·', '•', ',', ' - ', '-'] as const

function joinerFor(separator: string): string {
  if (separator === ',') return ', '
  if (separator.trim() === '-') return ' - '
  return ` ${separator} `
}

function normalizeKey(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ')
}

export function isExactEmploymentType(text: string): boolean {
  return EMPLOYMENT_TYPE_SET.has(normalizeKey(text))
}

/**
 * Exact vocabulary match, or the vocabulary term appearing as a whole word.
 */
export function isEmploymentType(text: string): boolean {
  return isExactEmploymentType(text) || EMPLOYMENT_TYPE_REGEX.test(text)
}

/**
 * The vocabulary term contained in `text`, as written there.
 */
export function findEmploymentType(text: string): string | undefined {
  return EMPLOYMENT_TYPE_REGEX.exec(text)?.[1]
}

/**
 * Finds an employment type embedded in a compound string such as
 * "Acme Corp · Contract" and returns it with the remaining text.
 */
export function extractEmploymentType(
  text: string,
): { employmentType: string; remainder: string } | null {
  const trimmed = text.trim()
  if (isExactEmploymentType(trimmed)) {
    return { employmentType: trimmed, remainder: '' }
  }

  for (const separator of SUB_SEPARATORS) {
    if (!trimmed.includes(separator)) continue

    const pieces = trimmed.split(separator).map((piece) => piece.trim())
    const hit = pieces.findIndex((piece) => isExactEmploymentType(piece))
    if (hit < 0) continue

    const remainder = pieces
      .filter((piece, index) => index !== hit && piece.length > 0)
      .join(joinerFor(separator))
    return { employmentType: pieces[hit] ?? trimmed, remainder }
  }

  return null
}

function hasLocationSignal(text: string): boolean {
  return text.includes(',') || LOCATION_REGEX.test(text)
}

/**
 * Location heuristic: a comma or a location keyword, and no employment-type
 * signal.
 */
export function isGeographicLocation(text: string): boolean {
  return !isEmploymentType(text) && hasLocationSignal(text)
}

interface PendingPart {
  text: string
  role: TokenRole | null
}

interface PendingToken {
  index: number
  text: string
  parts: PendingPart[]
}

function locationPart(text: string): PendingPart {
  return { text, role: hasDateFragment(text) ? 'unknown' : 'location' }
}

/**
 * Content-only classification of one separator-free segment. A part left
 * with a null role carries no content signal and is settled by position.
 */
function classifyByContent(text: string): PendingPart[] {
  if (isDateRange(text)) return [{ text, role: 'dateRange' }]
  if (isDuration(text)) return [{ text, role: 'duration' }]
  if (isExactEmploymentType(text)) return [{ text, role: 'employmentType' }]

  if (isEmploymentType(text)) {
    const embedded = extractEmploymentType(text)
    if (embedded) {
      const rest = embedded.remainder
        ? classifyByContent(embedded.remainder)
        : []
      return [
        ...rest,
        { text: embedded.employmentType, role: 'employmentType' },
      ]
    }
    // Ties go to location unless the employment type matched exactly.
    if (hasLocationSignal(text)) return [locationPart(text)]
    return [{ text: findEmploymentType(text) ?? text, role: 'employmentType' }]
  }

  if (hasLocationSignal(text)) return [locationPart(text)]
  return [{ text, role: null }]
}

function segmentsOf(text: string): string[] {
  return text
    .split(DATE_PATTERNS.SEGMENT_SEPARATOR_REGEX)
    .map((segment) => segment.trim())
    .filter(Boolean)
}

function splitToken(text: string, index: number): PendingToken {
  const parts = segmentsOf(text).flatMap((segment) =>
    classifyByContent(segment),
  )
  return { index, text: text.trim(), parts }
}

/**
 * Whether token 0 sits where the layout puts a position title.
 */
function isTitlePosition(
  dateIndex: number,
  tokens: PendingToken[],
  layout: EntryLayout,
): boolean {
  if (layout === 'titleLed' || dateIndex >= 2) return true
  if (dateIndex >= 0) return false
  return tokens.length > 1 && tokens[1]?.parts[0]?.role === null
}

/**
 * A title keeps its text even when it reads like an employment type or a
 * location ("Volunteer Coordinator", "Senior Engineer, Platform"). Only an
 * exact date range or an exact employment type displaces it.
 */
function asTitleToken(token: PendingToken): PendingToken {
  const [first, ...rest] = segmentsOf(token.text)
  if (!first || isDateRange(first) || isExactEmploymentType(first)) {
    return token
  }
  return {
    ...token,
    parts: [
      { text: first, role: 'title' },
      ...rest.flatMap((segment) => classifyByContent(segment)),
    ],
  }
}

function positionalRole(
  tokenIndex: number,
  dateIndex: number,
  tokens: PendingToken[],
  layout: EntryLayout,
): TokenRole {
  if (layout === 'titleLed') return tokenIndex === 0 ? 'title' : 'unknown'

  if (dateIndex >= 2) {
    if (tokenIndex === 0) return 'title'
    if (tokenIndex === 1) return 'organization'
    return 'unknown'
  }

  if (dateIndex >= 0) {
    // Organization header followed directly by its dates.
    return tokenIndex === 0 || (dateIndex === 0 && tokenIndex === 1)
      ? 'organization'
      : 'unknown'
  }

  const second = tokens[1]
  const secondIsOpen = !!second && second.parts[0]?.role === null
  if (tokenIndex === 0) return secondIsOpen ? 'title' : 'organization'
  if (tokenIndex === 1) return 'organization'
  return 'unknown'
}

/**
 * Classifies every token of one entry. Each token is split on "·"/"•" first
 * and each part is classified independently; a token containing a date
 * range is a date-range token.
 */
export function classifyTokens(
  tokens: readonly string[],
  options: ClassifyOptions = {},
): ClassifiedToken[] {
  const layout = options.layout ?? 'auto'
  const pending = tokens
    .map((token, index) => splitToken(token, index))
    .filter((token) => token.parts.length > 0)

  const dateIndex = pending.findIndex((token) =>
    token.parts.some((part) => part.role === 'dateRange'),
  )
  const titleFirst = isTitlePosition(dateIndex, pending, layout)

  return pending.map((pendingToken, position) => {
    const token =
      position === 0 && titleFirst ? asTitleToken(pendingToken) : pendingToken
    const parts: ClassifiedPart[] = token.parts.map((part, partIndex) => {
      if (part.role !== null) return { text: part.text, role: part.role }
      if (partIndex > 0) return { text: part.text, role: 'unknown' }
      return {
        text: part.text,
        role: positionalRole(position, dateIndex, pending, layout),
      }
    })

    const role: TokenRole = parts.some((part) => part.role === 'dateRange')
      ? 'dateRange'
      : (parts[0]?.role ?? 'unknown')

    return { index: token.index, text: token.text, role, parts }
  })
}

/**
 * Folds classified tokens into entry fields, keeping the first non-empty
 * value per role.
 *
 * @example
 * summarizeEntry(['Acme Corp · Contract', 'Jan 2020 - Dec 2021 · 2 yrs', 'Berlin, Germany'])
 * // { organization: 'Acme Corp', employmentType: 'Contract', fromDate: 'Jan 2020',
 * //   toDate: 'Dec 2021', duration: '2 yrs', location: 'Berlin, Germany' }
 */
export function summarizeEntry(
  tokens: readonly string[],
  options: ClassifyOptions = {},
): EntrySummary {
  const summary: EntrySummary = {}

  for (const token of classifyTokens(tokens, options)) {
    for (const part of token.parts) {
      switch (part.role) {
        case 'title':
          summary.title ??= part.text
          break
        case 'organization':
          summary.organization ??= part.text
          break
        case 'employmentType':
          summary.employmentType ??= part.text
          break
        case 'duration':
          summary.duration ??= part.text
          break
        case 'location':
          summary.location ??= part.text
          break
        case 'dateRange': {
          if (summary.fromDate !== undefined) break
          const range = parseDateRange(part.text)
          if (range.from) {
            summary.fromDate = range.from
            if (range.to) summary.toDate = range.to
          }
          break
        }
        case 'unknown':
          break
      }
    }
  }

  return summary
}
