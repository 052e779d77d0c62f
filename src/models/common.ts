import { z } from 'zod'

export const InstitutionSchema = z.object({
  institutionName: z.string().optional(),
  linkedinUrl: z.string().optional(),
})

export type Institution = z.infer<typeof InstitutionSchema>

export const ConnectionSchema = z.object({
  name: z.string().min(1),
  headline: z.string().optional(),
  linkedinUrl: z.string().optional(),
})

export type Connection = z.infer<typeof ConnectionSchema>

export const ContactInfoSchema = z.object({
  email: z.string().optional(),
  phone: z.string().optional(),
  website: z.string().optional(),
  linkedinUrl: z.string().optional(),
})

export type ContactInfo = z.infer<typeof ContactInfoSchema>

export const ScrapingErrorsSchema = z.record(z.string(), z.string())

export type ScrapingErrors = z.infer<typeof ScrapingErrorsSchema>
