/**
 * Date-Range Parser
 *
 * Summary lines carry dates as "Jan 2020 - Dec 2021 · 2 yrs". The range and
 * the duration annotation are parsed separately.
 */

import { DATE_PATTERNS } from '../config/constants'

export interface DateRange {
  from: string
  to: string
}

export interface WorkTimes extends DateRange {
  duration: string
}

const EMPTY_RANGE: DateRange = { from: '', to: '' }

/**
 * @example
 * isDateRange('Oct 2024 - Apr 2025') // true
 * isDateRange('2015 -') // true
 * isDateRange('Bachelor of Science') // false
 */
export function isDateRange(text: string): boolean {
  return DATE_PATTERNS.DATE_RANGE_REGEX.test(text.trim())
}

export function isDuration(text: string): boolean {
  return DATE_PATTERNS.DURATION_REGEX.test(text.trim())
}

export function hasDateFragment(text: string): boolean {
  return DATE_PATTERNS.DATE_FRAGMENT_REGEX.test(text)
}

/**
 * Splits on the first dash and validates both sides. An empty `to` with a
 * non-empty `from` is an ongoing range; `{ from: '', to: '' }` is a failed
 * parse. "present" in any case comes back as "Present".
 *
 * @example
 * parseDateRange('May 2024 - Present') // { from: 'May 2024', to: 'Present' }
 * parseDateRange('2015 -') // { from: '2015', to: '' }
 */
export function parseDateRange(text: string): DateRange {
  const dash = text.search(DATE_PATTERNS.DASH_REGEX)
  if (dash < 0) return { ...EMPTY_RANGE }

  const from = text.slice(0, dash).trim()
  const to = text.slice(dash + 1).trim()

  if (!DATE_PATTERNS.DATE_POINT_REGEX.test(from)) return { ...EMPTY_RANGE }
  if (!to) return { from, to: '' }
  if (DATE_PATTERNS.PRESENT_REGEX.test(to)) {
    return { from, to: DATE_PATTERNS.PRESENT }
  }
  if (DATE_PATTERNS.DATE_POINT_REGEX.test(to)) return { from, to }

  return { ...EMPTY_RANGE }
}

export function isOngoing(range: DateRange): boolean {
  return (
    range.from !== '' && (range.to === '' || range.to === DATE_PATTERNS.PRESENT)
  )
}

/**
 * Parses a full work-times line, keeping the duration apart from the range.
 *
 * @example
 * splitWorkTimes('Jan 2020 - Present · 4 yrs 2 mos')
 * // { from: 'Jan 2020', to: 'Present', duration: '4 yrs 2 mos' }
 */
export function splitWorkTimes(text: string): WorkTimes {
  const result: WorkTimes = { from: '', to: '', duration: '' }

  for (const part of text.split(DATE_PATTERNS.SEGMENT_SEPARATOR_REGEX)) {
    const segment = part.trim()
    if (!segment) continue

    if (!result.from && isDateRange(segment)) {
      const range = parseDateRange(segment)
      result.from = range.from
      result.to = range.to
    } else if (!result.duration && isDuration(segment)) {
      result.duration = segment
    }
  }

  return result
}
