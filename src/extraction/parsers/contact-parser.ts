import type { ContactInfo } from '../../models/common'

const CONNECTION_COUNT_REGEX = /(\d[\d,]*)\+?\s*connections/i

/**
 * @example
 * parseConnectionCount('500+ connections') // 500
 */
export function parseConnectionCount(text: string): number | undefined {
  const match = text.match(CONNECTION_COUNT_REGEX)
  if (!match?.[1]) return undefined
  const value = Number.parseInt(match[1].replace(/,/g, ''), 10)
  return Number.isNaN(value) ? undefined : value
}

function labelledValue(text: string, label: string): string | undefined {
  const match = text.match(new RegExp(`${label}\\s*\\n\\s*([^\\n]+)`))
  return match?.[1]?.trim() || undefined
}

/**
 * Reads the contact-info overlay's text, where each value sits on the line
 * after its label. Returns null when the overlay shows no email, phone or
 * website.
 */
export function parseContactInfo(modalText: string): ContactInfo | null {
  const contact: ContactInfo = {}

  const email = labelledValue(modalText, 'Email')
  if (email?.includes('@')) contact.email = email

  const website = labelledValue(modalText, 'Website')
    ?.replace(/\s*\([^)]*\)/g, '')
    .trim()
  if (website) {
    contact.website = /^https?:\/\//i.test(website)
      ? website
      : `https://${website}`
  }

  const phone = labelledValue(modalText, 'Phone')
  if (phone) contact.phone = phone

  const profile = modalText.match(/linkedin\.com\/in\/[^\s]+/i)?.[0]
  if (profile) {
    contact.linkedinUrl = profile.startsWith('http')
      ? profile
      : `https://${profile}`
  }

  if (!contact.email && !contact.phone && !contact.website) return null
  return contact
}
