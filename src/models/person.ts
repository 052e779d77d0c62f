import { z } from 'zod'
import { canonicalizeUrl, isProfileUrl } from '../utils/url'
import {
  AppendOnlyList,
  canonicalOrUndefined,
  entityKey,
  freezeRecord,
} from './aggregate'
import type { Connection, ContactInfo, ScrapingErrors } from './common'
import {
  ConnectionSchema,
  ContactInfoSchema,
  InstitutionSchema,
  ScrapingErrorsSchema,
} from './common'

export const ExperienceSchema = InstitutionSchema.extend({
  positionTitle: z.string().optional(),
  fromDate: z.string().optional(),
  toDate: z.string().optional(),
  duration: z.string().optional(),
  location: z.string().optional(),
  employmentType: z.string().optional(),
  description: z.string().optional(),
  skills: z.array(z.string()).default([]),
})

export type Experience = z.infer<typeof ExperienceSchema>

export const EducationSchema = InstitutionSchema.extend({
  degree: z.string().optional(),
  fromDate: z.string().optional(),
  toDate: z.string().optional(),
  description: z.string().optional(),
  skills: z.array(z.string()).default([]),
})

export type Education = z.infer<typeof EducationSchema>

export const INTEREST_TYPES = [
  'influencer',
  'company',
  'group',
  'newsletter',
  'school',
] as const

export const InterestSchema = z.object({
  name: z.string().min(1),
  type: z.enum(INTEREST_TYPES),
  url: z.string().optional(),
  followers: z.string().optional(),
})

export type Interest = z.infer<typeof InterestSchema>
export type InterestType = Interest['type']

export const HonorSchema = z.object({
  title: z.string().min(1),
  issuer: z.string().optional(),
  date: z.string().optional(),
  associatedWith: z.string().optional(),
  documentUrl: z.string().optional(),
})

export type Honor = z.infer<typeof HonorSchema>

export const LanguageSchema = z.object({
  name: z.string().min(1),
  proficiency: z.string().optional(),
})

export type Language = z.infer<typeof LanguageSchema>

export const PersonSchema = z.object({
  linkedinUrl: z.string().refine(isProfileUrl, {
    message: 'Must be a profile URL (contains /in/)',
  }),
  name: z.string().optional(),
  headline: z.string().optional(),
  location: z.string().optional(),
  about: z.array(z.string()).default([]),
  openToWork: z.boolean().optional(),
  experiences: z.array(ExperienceSchema).default([]),
  educations: z.array(EducationSchema).default([]),
  interests: z.array(InterestSchema).default([]),
  honors: z.array(HonorSchema).default([]),
  languages: z.array(LanguageSchema).default([]),
  connections: z.array(ConnectionSchema).default([]),
  connectionCount: z.number().int().nonnegative().optional(),
  contactInfo: ContactInfoSchema.optional(),
  scrapingErrors: ScrapingErrorsSchema.default({}),
})

export type PersonData = z.infer<typeof PersonSchema>

export type PersonIdentity = Pick<
  PersonData,
  'name' | 'headline' | 'location' | 'openToWork'
>

/**
 * Factory function to create and validate a Person data object
 */
export function createPerson(data: z.input<typeof PersonSchema>): PersonData {
  return PersonSchema.parse(data)
}

/**
 * Company name from the person's most recent experience
 */
export function getPersonCompany(person: PersonData): string | undefined {
  return person.experiences[0]?.institutionName
}

/**
 * Job title from the person's most recent experience
 */
export function getPersonJobTitle(person: PersonData): string | undefined {
  return person.experiences[0]?.positionTitle
}

export function personToString(person: PersonData): string {
  return (
    `<Person ${person.name}\n` +
    `  Company: ${getPersonCompany(person)}\n` +
    `  Title: ${getPersonJobTitle(person)}\n` +
    `  Location: ${person.location}\n` +
    `  Experiences: ${person.experiences.length}\n` +
    `  Education: ${person.educations.length}>`
  )
}

/**
 * Position identity within one organization: several roles legitimately
 * share the same organization URL.
 */
function institutionKey(
  url: string | undefined,
  label: string | undefined,
  fromDate: string | undefined,
): string {
  return [url ?? '', (label ?? '').toLowerCase(), fromDate ?? ''].join('|')
}

/**
 * The person record assembled by one scrape call. Lists only grow, and every
 * appended entry is validated, URL-canonicalized and frozen.
 */
export class PersonAggregate {
  readonly linkedinUrl: string
  private identity: PersonIdentity = {}
  private readonly about: string[] = []
  private connectionCount: number | undefined
  private contactInfo: ContactInfo | undefined
  private readonly errors: ScrapingErrors = {}

  private readonly experiences = new AppendOnlyList(ExperienceSchema, (e) =>
    institutionKey(e.linkedinUrl, e.positionTitle, e.fromDate),
  )
  private readonly educations = new AppendOnlyList(EducationSchema, (e) =>
    institutionKey(
      e.linkedinUrl ?? e.institutionName?.toLowerCase(),
      e.degree,
      e.fromDate,
    ),
  )
  private readonly interests = new AppendOnlyList(InterestSchema, entityKey)
  private readonly honors = new AppendOnlyList(HonorSchema, (h) =>
    h.title.toLowerCase(),
  )
  private readonly languages = new AppendOnlyList(LanguageSchema, (l) =>
    l.name.toLowerCase(),
  )
  private readonly connections = new AppendOnlyList(ConnectionSchema, entityKey)

  constructor(linkedinUrl: string) {
    this.linkedinUrl = PersonSchema.shape.linkedinUrl.parse(
      canonicalizeUrl(linkedinUrl),
    )
  }

  setIdentity(identity: PersonIdentity): void {
    this.identity = { ...this.identity, ...identity }
  }

  addAbout(text: string): void {
    const value = text.trim()
    if (value && !this.about.includes(value)) this.about.push(value)
  }

  addExperience(experience: z.input<typeof ExperienceSchema>): boolean {
    return this.experiences.append({
      ...experience,
      linkedinUrl: canonicalOrUndefined(experience.linkedinUrl),
    })
  }

  addEducation(education: z.input<typeof EducationSchema>): boolean {
    return this.educations.append({
      ...education,
      linkedinUrl: canonicalOrUndefined(education.linkedinUrl),
    })
  }

  addInterest(interest: Interest): boolean {
    return this.interests.append({
      ...interest,
      url: canonicalOrUndefined(interest.url),
    })
  }

  /**
   * `documentUrl` is stored as read: its query names the media item.
   */
  addHonor(honor: Honor): boolean {
    return this.honors.append(honor)
  }

  addLanguage(language: Language): boolean {
    return this.languages.append(language)
  }

  addConnection(connection: Connection): boolean {
    return this.connections.append({
      ...connection,
      linkedinUrl: canonicalOrUndefined(connection.linkedinUrl),
    })
  }

  hasConnection(url: string): boolean {
    const canonical = canonicalOrUndefined(url)
    return !!canonical && this.connections.has(`url:${canonical}`)
  }

  get connectionTotal(): number {
    return this.connections.length
  }

  setConnectionCount(count: number): void {
    this.connectionCount = count
  }

  setContactInfo(contactInfo: ContactInfo): void {
    this.contactInfo = freezeRecord(
      ContactInfoSchema.parse({
        ...contactInfo,
        linkedinUrl: canonicalOrUndefined(contactInfo.linkedinUrl),
      }),
    )
  }

  recordError(section: string, message: string): void {
    this.errors[section] = message
  }

  get scrapingErrors(): Readonly<ScrapingErrors> {
    return this.errors
  }

  toJSON(): PersonData {
    return {
      linkedinUrl: this.linkedinUrl,
      ...this.identity,
      about: [...this.about],
      experiences: this.experiences.toArray(),
      educations: this.educations.toArray(),
      interests: this.interests.toArray(),
      honors: this.honors.toArray(),
      languages: this.languages.toArray(),
      connections: this.connections.toArray(),
      connectionCount: this.connectionCount,
      contactInfo: this.contactInfo,
      scrapingErrors: { ...this.errors },
    }
  }

  toString(): string {
    return personToString(this.toJSON())
  }
}
