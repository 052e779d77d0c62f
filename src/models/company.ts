import { z } from 'zod'
import { canonicalizeUrl, isCompanyUrl } from '../utils/url'
import { AppendOnlyList, canonicalOrUndefined, entityKey } from './aggregate'
import type { ScrapingErrors } from './common'
import { ScrapingErrorsSchema } from './common'

export const CompanySummarySchema = z.object({
  linkedinUrl: z.string().optional(),
  name: z.string().optional(),
  followers: z.string().optional(),
})

export type CompanySummary = z.infer<typeof CompanySummarySchema>

export const EmployeeSchema = z.object({
  name: z.string().min(1),
  position: z.string().optional(),
  linkedinUrl: z.string().optional(),
})

export type Employee = z.infer<typeof EmployeeSchema>

export const FollowerSchema = z.object({
  name: z.string().min(1),
  headline: z.string().optional(),
  linkedinUrl: z.string().optional(),
})

export type Follower = z.infer<typeof FollowerSchema>

export const CompanySchema = z.object({
  linkedinUrl: z.string().refine(isCompanyUrl, {
    message: 'Must be a company URL (contains /company/)',
  }),
  name: z.string().optional(),
  aboutUs: z.string().optional(),
  website: z.string().optional(),
  phone: z.string().optional(),
  headquarters: z.string().optional(),
  founded: z.string().optional(),
  industry: z.string().optional(),
  companyType: z.string().optional(),
  companySize: z.string().optional(),
  specialties: z.array(z.string()).default([]),
  headcount: z.number().int().nonnegative().optional(),
  showcasePages: z.array(CompanySummarySchema).default([]),
  affiliatedCompanies: z.array(CompanySummarySchema).default([]),
  employees: z.array(EmployeeSchema).default([]),
  followers: z.array(FollowerSchema).default([]),
  scrapingErrors: ScrapingErrorsSchema.default({}),
})

export type CompanyData = z.infer<typeof CompanySchema>

export type CompanyDetails = Partial<
  Pick<
    CompanyData,
    | 'name'
    | 'aboutUs'
    | 'website'
    | 'phone'
    | 'headquarters'
    | 'founded'
    | 'industry'
    | 'companyType'
    | 'companySize'
    | 'specialties'
    | 'headcount'
  >
>

export function companyToString(company: CompanyData): string {
  return (
    `<Company ${company.name}\n` +
    `  Industry: ${company.industry}\n` +
    `  Size: ${company.companySize}\n` +
    `  Headquarters: ${company.headquarters}\n` +
    `  Employees: ${company.employees.length}>`
  )
}

/**
 * The company record assembled by one scrape call.
 */
export class CompanyAggregate {
  readonly linkedinUrl: string
  private details: CompanyDetails = {}
  private readonly errors: ScrapingErrors = {}

  private readonly showcasePages = new AppendOnlyList(
    CompanySummarySchema,
    entityKey,
  )
  private readonly affiliatedCompanies = new AppendOnlyList(
    CompanySummarySchema,
    entityKey,
  )
  private readonly employees = new AppendOnlyList(EmployeeSchema, entityKey)
  private readonly followers = new AppendOnlyList(FollowerSchema, entityKey)

  constructor(linkedinUrl: string) {
    this.linkedinUrl = CompanySchema.shape.linkedinUrl.parse(
      canonicalizeUrl(linkedinUrl),
    )
  }

  /**
   * Fills fields not yet observed; a value already set is kept.
   */
  mergeDetails(details: CompanyDetails): void {
    const merged: CompanyDetails = { ...this.details }
    for (const [key, value] of Object.entries(details)) {
      if (value === undefined || value === '') continue
      if (Array.isArray(value) && value.length === 0) continue
      if (Object.prototype.hasOwnProperty.call(merged, key)) continue
      Object.assign(merged, { [key]: value })
    }
    this.details = merged
  }

  /**
   * The exact employee count from the people link wins over the size band.
   */
  setHeadcount(headcount: number): void {
    this.details = { ...this.details, headcount }
  }

  get name(): string | undefined {
    return this.details.name
  }

  addShowcasePage(summary: CompanySummary): boolean {
    return this.showcasePages.append({
      ...summary,
      linkedinUrl: canonicalOrUndefined(summary.linkedinUrl),
    })
  }

  addAffiliatedCompany(summary: CompanySummary): boolean {
    return this.affiliatedCompanies.append({
      ...summary,
      linkedinUrl: canonicalOrUndefined(summary.linkedinUrl),
    })
  }

  addEmployee(employee: Employee): boolean {
    return this.employees.append({
      ...employee,
      linkedinUrl: canonicalOrUndefined(employee.linkedinUrl),
    })
  }

  addFollower(follower: Follower): boolean {
    return this.followers.append({
      ...follower,
      linkedinUrl: canonicalOrUndefined(follower.linkedinUrl),
    })
  }

  recordError(section: string, message: string): void {
    this.errors[section] = message
  }

  get scrapingErrors(): Readonly<ScrapingErrors> {
    return this.errors
  }

  toJSON(): CompanyData {
    return {
      linkedinUrl: this.linkedinUrl,
      ...this.details,
      specialties: [...(this.details.specialties ?? [])],
      showcasePages: this.showcasePages.toArray(),
      affiliatedCompanies: this.affiliatedCompanies.toArray(),
      employees: this.employees.toArray(),
      followers: this.followers.toArray(),
      scrapingErrors: { ...this.errors },
    }
  }

  toString(): string {
    return companyToString(this.toJSON())
  }
}
