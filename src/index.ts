// Scrape operations
export * from './scrapers'

// Records and aggregates
export * from './models'

// Configuration
export {
  COMMON_SELECTORS,
  EMPLOYMENT_TYPES,
  SCRAPING_CONSTANTS,
  SIMILARITY_DEFAULTS,
  SITE_ORIGIN,
} from './config/constants'
export {
  COMPANY_PRESETS,
  CompanyField,
  PERSON_PRESETS,
  PersonField,
  describeFields,
  hasField,
} from './config/fields'

// Extraction engine
export * from './extraction/classifier'
export * from './extraction/collector'
export * from './extraction/dates'
export * from './extraction/description'
export * from './extraction/orchestrator'
export {
  CanonicalUrlSet,
  canonicalizeUrl,
  companyPageUrl,
  isCompanyUrl,
  isProfileUrl,
  profileSectionUrl,
  stripUrl,
} from './utils/url'
export {
  cleanDuplicatedText,
  cleanSingleStringDuplicates,
  collapseWhitespace,
  deduplicateTexts,
} from './utils/text'
export type { SimilarityOptions } from './utils/fuzzy'
export { isEssentiallySame, stripListMarker } from './utils/fuzzy'

// Ambient
export * from './callbacks'
export * from './exceptions'
export { log, setLogLevel } from './utils/logger'
export type { LogLevel } from './utils/logger'
