/**
 * Selector groups for the page-layout adapters. Each group lists the
 * selectors for the current layout first and older layouts as fallback.
 */

export interface SelectorConfig {
  selector: string
  description?: string
}

export interface SelectorGroup {
  primary: SelectorConfig[]
  fallback?: SelectorConfig[]
}

export const DETAILS_ITEM_SELECTORS: SelectorGroup = {
  primary: [
    {
      selector: '[componentkey^="entity-collection-item"]',
      description: 'entity collection item',
    },
    {
      selector: 'div[data-view-name="profile-component-entity"]',
      description: 'profile component entity',
    },
  ],
  fallback: [
    { selector: '.pvs-list__paged-list-item', description: 'paged list item' },
    { selector: 'li.artdeco-list__item', description: 'artdeco list item' },
    { selector: 'main section ul > li', description: 'generic list item' },
  ],
}

export const TOP_CARD_SELECTORS: SelectorGroup = {
  primary: [
    { selector: 'section.artdeco-card:has(h1)', description: 'top card' },
  ],
  fallback: [
    { selector: 'main section:first-of-type', description: 'first section' },
  ],
}

export const OPEN_TO_WORK_IMAGE = '.pv-top-card-profile-picture img'

export const PROFILE_HEADLINE_SELECTORS: SelectorGroup = {
  primary: [
    {
      selector: 'main section div.text-body-medium.break-words',
      description: 'headline under the name',
    },
  ],
  fallback: [
    { selector: 'main section div.text-body-medium', description: 'medium text' },
  ],
}

export const PROFILE_LOCATION_SELECTORS: SelectorGroup = {
  primary: [
    {
      selector: '.pv-text-details__left-panel span.text-body-small',
      description: 'location line',
    },
  ],
  fallback: [
    { selector: 'main section span.text-body-small', description: 'small text' },
  ],
}

export const ABOUT_SELECTORS: SelectorGroup = {
  primary: [
    {
      selector: 'section:has(#about) [data-testid="expandable-text-box"]',
      description: 'expandable about text',
    },
    {
      selector: 'section:has(#about) .inline-show-more-text',
      description: 'inline show-more text',
    },
  ],
  fallback: [
    {
      selector: 'section:has(#about) span[aria-hidden="true"]',
      description: 'about aria spans',
    },
  ],
}

export const INTEREST_TAB_SELECTOR = 'main [role="tablist"] [role="tab"]'

export const CONTACT_INFO_SELECTORS = {
  LINK: 'a[href*="overlay/contact-info"]',
  BUTTON: 'button:has-text("Contact info")',
  MODAL: '.artdeco-modal__content, [role="dialog"]',
} as const

export const CONNECTIONS_SELECTORS = {
  COUNT: 'span:has-text("connections")',
  PROFILE_LINK:
    'a[href*="/search/results/people"][href*="connectionOf"], a:has-text("connections")',
  SEARCH_RESULT_ITEM: 'main [role="list"] > li, li.reusable-search__result-container',
  NETWORK_CARD: '.mn-connection-card',
} as const

export const COMPANY_SELECTORS = {
  NAME: 'h1',
  TOP_CARD_INFO:
    '.org-top-card-summary-info-list__info-item, .org-top-card-summary-info-list > *',
  OVERVIEW: 'h2:has-text("Overview") ~ p',
  DEFINITION_TERM: 'dt',
  SEE_ALL_EMPLOYEES: 'a:has-text("employees on LinkedIn")',
  EMPLOYEES_LINK: 'a:has-text("employees")',
  AFFILIATED_HEADING: 'h3:has-text("Affiliated pages"), h2:has-text("Affiliated pages")',
  EMPLOYEE_ITEM: 'main [role="list"] > li',
  FOLLOWER_ITEM: 'li',
} as const

export const PROFILE_LINK_SELECTOR = 'a[href*="/in/"]'

export const PROFILE_HONORS_SECTION_SELECTORS: SelectorGroup = {
  primary: [
    { selector: 'section:has(#honors_and_awards)', description: 'honors anchor' },
  ],
  fallback: [
    {
      selector: 'main section:has(h2:has-text("Honors & awards"))',
      description: 'honors heading',
    },
  ],
}

export const PROFILE_LANGUAGES_SECTION_SELECTORS: SelectorGroup = {
  primary: [
    { selector: 'section:has(#languages)', description: 'languages anchor' },
  ],
  fallback: [
    {
      selector: 'main section:has(h2:has-text("Languages"))',
      description: 'languages heading',
    },
  ],
}

/** Entries of a main-profile section preview */
export const PROFILE_SECTION_ITEM_SELECTORS: SelectorGroup = {
  primary: [
    { selector: 'li.artdeco-list__item', description: 'artdeco list item' },
  ],
  fallback: [{ selector: 'ul > li', description: 'generic list item' }],
}
