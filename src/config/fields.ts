/**
 * Field-selection bitmasks. Callers combine flags with `|` to choose which
 * sections a scrape visits.
 */

export const PersonField = {
  NONE: 0,
  BASIC_INFO: 1 << 0,
  EXPERIENCE: 1 << 1,
  EDUCATION: 1 << 2,
  INTERESTS: 1 << 3,
  ACCOMPLISHMENTS: 1 << 4,
  CONTACTS: 1 << 5,
} as const

export const PERSON_PRESETS = {
  MINIMAL: PersonField.BASIC_INFO,
  CAREER:
    PersonField.BASIC_INFO | PersonField.EXPERIENCE | PersonField.EDUCATION,
  ALL:
    PersonField.BASIC_INFO |
    PersonField.EXPERIENCE |
    PersonField.EDUCATION |
    PersonField.INTERESTS |
    PersonField.ACCOMPLISHMENTS |
    PersonField.CONTACTS,
} as const

export const CompanyField = {
  NONE: 0,
  SHOWCASE_PAGES: 1 << 0,
  AFFILIATED_COMPANIES: 1 << 1,
} as const

export const COMPANY_PRESETS = {
  MINIMAL: CompanyField.NONE,
  ALL: CompanyField.SHOWCASE_PAGES | CompanyField.AFFILIATED_COMPANIES,
} as const

export function hasField(mask: number, field: number): boolean {
  return field !== 0 && (mask & field) === field
}

/**
 * Lists the names of the flags set in a mask, in declaration order.
 */
export function describeFields(
  mask: number,
  flags: Readonly<Record<string, number>>,
): string[] {
  return Object.entries(flags)
    .filter(([, value]) => hasField(mask, value))
    .map(([name]) => name)
}
