/**
 * Deduplicating URL Normalizer
 *
 * Canonical URLs are the identity key for every entity list: absolute,
 * without query or fragment, without trailing slash, lower-cased.
 */

import { SITE_ORIGIN } from '../config/constants'
import { InvalidUrlError } from '../exceptions'

const SCHEME_REGEX = /^[a-z][a-z\d+.-]*:\/\//i
const BARE_HOST_REGEX = /^[\w-]+(?:\.[\w-]+)+(?:\/|$)/

function toAbsolute(raw: string, origin: string): string {
  if (SCHEME_REGEX.test(raw)) return raw
  if (raw.startsWith('//')) return `https:${raw}`
  if (BARE_HOST_REGEX.test(raw)) return `https://${raw}`
  const base = origin.replace(/\/+$/, '')
  return raw.startsWith('/') ? `${base}${raw}` : `${base}/${raw}`
}

/**
 * Absolute URL without query, fragment or trailing slash. Case is kept, so
 * the result is suitable for navigation.
 */
export function stripUrl(raw: string, origin: string = SITE_ORIGIN): string {
  const trimmed = raw.trim()
  if (!trimmed) return ''
  return toAbsolute(trimmed, origin)
    .replace(/[?#].*$/, '')
    .replace(/\/+$/, '')
}

/**
 * @example
 * canonicalizeUrl('/in/Jane-Doe/?miniProfileUrn=abc#top')
 * // 'https://www.linkedin.com/in/jane-doe'
 */
export function canonicalizeUrl(
  raw: string,
  origin: string = SITE_ORIGIN,
): string {
  return stripUrl(raw, origin).toLowerCase()
}

/**
 * Scrape-call scoped seen-set keyed by canonical URL.
 */
export class CanonicalUrlSet {
  private readonly seen = new Set<string>()

  constructor(private readonly origin: string = SITE_ORIGIN) {}

  /**
   * Records the URL. Returns false when an equivalent URL was already seen
   * or the input is empty.
   */
  add(raw: string): boolean {
    const key = canonicalizeUrl(raw, this.origin)
    if (!key || this.seen.has(key)) return false
    this.seen.add(key)
    return true
  }

  has(raw: string): boolean {
    return this.seen.has(canonicalizeUrl(raw, this.origin))
  }

  get size(): number {
    return this.seen.size
  }

  values(): string[] {
    return [...this.seen]
  }
}

export function isProfileUrl(url: string): boolean {
  return /\/in\/[^/?#]+/i.test(url)
}

export function isCompanyUrl(url: string): boolean {
  return /\/(?:company|showcase)\/[^/?#]+/i.test(url)
}

const PROFILE_ROOT_REGEX = /^.*?\/in\/[^/]+/i
const COMPANY_ROOT_REGEX = /^.*?\/(?:company|showcase)\/[^/]+/i

/**
 * Validates a profile URL and returns its root, without sub-pages such as
 * `/details/experience`.
 */
export function assertProfileUrl(url: string): string {
  const root = stripUrl(url).match(PROFILE_ROOT_REGEX)?.[0]
  if (!isProfileUrl(url) || !root) {
    throw new InvalidUrlError(
      `Not a profile URL (expected a /in/ path): ${url}`,
    )
  }
  return root
}

/**
 * @example
 * assertCompanyUrl('https://www.linkedin.com/company/acme/about/')
 * // 'https://www.linkedin.com/company/acme'
 */
export function assertCompanyUrl(url: string): string {
  const root = stripUrl(url).match(COMPANY_ROOT_REGEX)?.[0]
  if (!isCompanyUrl(url) || !root) {
    throw new InvalidUrlError(
      `Not a company URL (expected a /company/ path): ${url}`,
    )
  }
  return root
}

/**
 * @example
 * profileSectionUrl('https://www.linkedin.com/in/jane-doe/', 'experience')
 * // 'https://www.linkedin.com/in/jane-doe/details/experience/'
 */
export function profileSectionUrl(profileUrl: string, section: string): string {
  return `${stripUrl(profileUrl)}/details/${section}/`
}

export function companyPageUrl(companyUrl: string, page: string): string {
  return `${stripUrl(companyUrl)}/${page}/`
}
