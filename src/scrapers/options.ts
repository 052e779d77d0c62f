import type { Page } from 'playwright'
import { z } from 'zod'
import type { ProgressCallback } from '../callbacks'
import { createSilentCallback } from '../callbacks'
import { SCRAPING_CONSTANTS } from '../config/constants'
import { COMPANY_PRESETS, PERSON_PRESETS } from '../config/fields'
import type { SplitterOptions } from '../extraction/description'
import { DEFAULT_SIMILARITY } from '../utils/fuzzy'

function isProgressCallback(value: unknown): value is ProgressCallback {
  return (
    typeof value === 'object' &&
    value !== null &&
    'onProgress' in value &&
    typeof value.onProgress === 'function'
  )
}

const SimilaritySchema = z
  .object({
    ratioThreshold: z.number().min(0).max(100),
    partialRatioThreshold: z.number().min(0).max(100),
    minComparableLength: z.number().int().min(0),
  })
  .partial()

const BaseScraperOptionsSchema = z.object({
  /** Per-wait budget for lists and overlays */
  waitTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(SCRAPING_CONSTANTS.LIST_WAIT_TIMEOUT_MS),
  /** Pause between consecutive extraction steps */
  sectionPauseMs: z.number().int().min(0).default(0),
  signal: z
    .custom<AbortSignal>((value) => value instanceof AbortSignal)
    .optional(),
  callback: z.custom<ProgressCallback>(isProgressCallback).optional(),
  similarity: SimilaritySchema.optional(),
})

export const PersonScraperOptionsSchema = BaseScraperOptionsSchema.extend({
  fields: z.number().int().min(0).default(PERSON_PRESETS.ALL),
  connectionPages: z
    .number()
    .int()
    .min(1)
    .default(SCRAPING_CONSTANTS.DEFAULT_CONNECTION_PAGES),
  maxConnections: z
    .number()
    .int()
    .min(1)
    .default(SCRAPING_CONSTANTS.DEFAULT_MAX_CONNECTIONS),
})

export type PersonScraperOptions = z.input<typeof PersonScraperOptionsSchema>
export type ResolvedPersonOptions = z.output<typeof PersonScraperOptionsSchema>

export const CompanyScraperOptionsSchema = BaseScraperOptionsSchema.extend({
  fields: z.number().int().min(0).default(COMPANY_PRESETS.MINIMAL),
  /** 0 skips the employee list */
  employeePages: z
    .number()
    .int()
    .min(0)
    .default(SCRAPING_CONSTANTS.DEFAULT_EMPLOYEE_PAGES),
  /** 0 skips the follower list */
  followerPages: z
    .number()
    .int()
    .min(0)
    .default(SCRAPING_CONSTANTS.DEFAULT_FOLLOWER_PAGES),
})

export type CompanyScraperOptions = z.input<typeof CompanyScraperOptionsSchema>
export type ResolvedCompanyOptions = z.output<
  typeof CompanyScraperOptionsSchema
>

/**
 * What every section scraper needs from one scrape call.
 */
export interface ScrapeContext {
  page: Page
  callback: ProgressCallback
  waitTimeoutMs: number
  splitter: SplitterOptions
}

export function createScrapeContext(
  page: Page,
  options: z.output<typeof BaseScraperOptionsSchema>,
): ScrapeContext {
  return {
    page,
    callback: options.callback ?? createSilentCallback(),
    waitTimeoutMs: options.waitTimeoutMs,
    splitter: {
      similarity: { ...DEFAULT_SIMILARITY, ...options.similarity },
    },
  }
}
