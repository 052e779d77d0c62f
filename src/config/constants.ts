/**
 * Scraping Constants
 *
 * Centralized configuration for magic numbers, thresholds, and vocabularies used across
 * the extraction engine and section scrapers. When the site's markup or wording changes,
 * update values here.
 */

export const SITE_ORIGIN = 'https://www.linkedin.com'

export const SCRAPING_CONSTANTS = {
  // Text length thresholds for field detection
  MAX_UNIQUE_TEXT_LENGTH: 200,
  MAX_FALLBACK_TEXT_LENGTH: 500,
  MIN_HEADLINE_LENGTH: 5,
  MIN_DUPLICATE_CHECK_LENGTH: 5,

  // Scrolling behavior (pause in seconds, max scroll attempts)
  SECTION_SCROLL_PAUSE: 0.5,
  SECTION_MAX_SCROLLS: 5,

  // Wait times (seconds) before reading a freshly loaded section
  SECTION_FOCUS_WAIT: 1.5,
  PAGINATION_SETTLE_WAIT: 2,

  // Playwright timeouts (milliseconds)
  NAVIGATION_TIMEOUT_MS: 60000,
  MAIN_SELECTOR_TIMEOUT_MS: 10000,
  LIST_WAIT_TIMEOUT_MS: 5000,
  ADVANCE_TIMEOUT_MS: 2000,
  ELEMENT_TEXT_TIMEOUT_MS: 2000,

  // Default page/record budgets for paginated lists
  DEFAULT_CONNECTION_PAGES: 1,
  DEFAULT_MAX_CONNECTIONS: 20,
  DEFAULT_EMPLOYEE_PAGES: 1,
  DEFAULT_FOLLOWER_PAGES: 0,
} as const

/**
 * Fuzzy-similarity tuning for description de-duplication. Tuned empirically
 * against one rendering of the site; override through scraper options.
 */
export const SIMILARITY_DEFAULTS = {
  RATIO_THRESHOLD: 80,
  PARTIAL_RATIO_THRESHOLD: 90,
  MIN_COMPARABLE_LENGTH: 20,
} as const

/**
 * Date parsing patterns and keywords
 */
const MONTH = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)'

export const DATE_PATTERNS = {
  PRESENT: 'Present',

  // Separators seen in summary lines
  SEGMENT_SEPARATOR_REGEX: /\s*[·•]\s*/,
  DASH_REGEX: /[-–—]/,

  // "Jan 2020 - Dec 2021", "2015 -", "May 2024 - Present"
  DATE_RANGE_REGEX: new RegExp(
    `^\\s*(?:${MONTH}\\s+)?\\d{4}\\s*[-–—]\\s*(?:(?:${MONTH}\\s+)?\\d{4}|Present)?\\s*$`,
    'i',
  ),
  DATE_POINT_REGEX: new RegExp(`^(?:${MONTH}\\s+)?\\d{4}$`, 'i'),
  PRESENT_REGEX: /^Present$/i,

  // "2 yrs 3 mos", "11 mos", "1 yr"
  DURATION_REGEX: /^(?:less than a year|\d+\s+(?:yrs?|mos?)(?:\s+\d+\s+(?:yrs?|mos?))?)$/i,

  // Any year or month-year fragment, used to reject date-tainted locations
  DATE_FRAGMENT_REGEX: new RegExp(`\\b(?:${MONTH}\\s+)?(?:19|20)\\d{2}\\b`, 'i'),
} as const

/**
 * Employment types the site renders next to a position, longest first so that
 * containment checks prefer "contract full-time" over "contract".
 */
export const EMPLOYMENT_TYPES = [
  'contract full-time',
  'contract part-time',
  'permanent full-time',
  'permanent part-time',
  'casual / on-call',
  'self-employed',
  'apprenticeship',
  'internship',
  'work study',
  'freelance',
  'full-time',
  'part-time',
  'temporary',
  'volunteer',
  'seasonal',
  'contract',
  'co-op',
] as const

export const LOCATION_INDICATORS = [
  'area',
  'region',
  'metropolitan',
  'greater',
  'remote',
  'on-site',
  'hybrid',
  'city',
  'state',
  'province',
  'country',
  'district',
  'county',
  'germany',
  'austria',
  'switzerland',
  'france',
  'canada',
  'usa',
  'united states',
  'united kingdom',
  'uk',
] as const

/**
 * Words that betray institution text bleeding into a skills list.
 */
export const INSTITUTION_KEYWORDS = [
  'university',
  'universität',
  'universidad',
  'université',
  'college',
  'school',
  'institute',
  'hochschule',
  'technische',
] as const

export const SKILLS_MARKER = 'Skills:'

/**
 * Common CSS selectors used across multiple section scrapers
 */
export const COMMON_SELECTORS = {
  MAIN: 'main',
  TOP_CARD_NAME: 'main h1',

  // Entity collection items on details pages (experiences, education, etc.)
  ENTITY_COLLECTION_ITEM: '[componentkey^="entity-collection-item"]',
  LEGACY_LIST_ITEM: '.pvs-list__paged-list-item',
  DETAILS_LIST_ITEM: 'main section ul > li',

  // Expandable text boxes for descriptions
  EXPANDABLE_TEXT: '[data-testid="expandable-text-box"]',

  // Pagination controls
  NEXT_BUTTON: 'button:has-text("Next"):not([disabled])',
  SHOW_MORE_BUTTON: 'button:has-text("Show more results")',

  // Details page without entries
  EMPTY_SECTION: 'text="Nothing to see for now"',

  // Overlays
  MODAL: '[role="dialog"]',
  MODAL_DISMISS:
    'button[aria-label="Dismiss"], button[aria-label="Close"], button.artdeco-modal__dismiss',
} as const
