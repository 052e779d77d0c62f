import type { Locator, Page } from 'playwright'
import type { SelectorConfig, SelectorGroup } from '../config/selectors'
import { log } from './logger'

/**
 * Result from attempting to find an element with multiple selectors
 */
export interface SelectorResult<T> {
  /** The value extracted/found */
  value: T
  /** Which selector succeeded */
  usedSelector: string
  /** Whether this was from primary or fallback selectors */
  usedFallback: boolean
}

type Scope = Page | Locator

function describe(config: SelectorConfig): string {
  return config.description
    ? `${config.selector} (${config.description})`
    : config.selector
}

function* candidates(
  group: SelectorGroup,
): Generator<{ config: SelectorConfig; usedFallback: boolean }> {
  for (const config of group.primary) yield { config, usedFallback: false }
  for (const config of group.fallback ?? []) {
    yield { config, usedFallback: true }
  }
}

/**
 * Tries multiple selectors in order until one matches
 *
 * @param validator Optional check on the first match; a rejected match moves on
 */
export async function trySelectors(
  scope: Scope,
  selectorGroup: SelectorGroup,
  validator?: (locator: Locator) => Promise<boolean>,
): Promise<SelectorResult<Locator | null>> {
  for (const { config, usedFallback } of candidates(selectorGroup)) {
    const locator = scope.locator(config.selector).first()
    if ((await locator.count()) === 0) continue
    if (validator && !(await validator(locator))) continue

    log.debug(
      `${usedFallback ? '⚠ Using fallback' : '✓ Found element with primary'} selector: ${describe(config)}`,
    )
    return { value: locator, usedSelector: config.selector, usedFallback }
  }

  log.debug('✗ No selector found in group')
  return { value: null, usedSelector: '', usedFallback: false }
}

/**
 * Text of the first selector in the group that renders non-empty text
 */
export async function trySelectorsForText(
  scope: Scope,
  selectorGroup: SelectorGroup,
  defaultValue: string = '',
  timeout: number = 2000,
): Promise<SelectorResult<string>> {
  const result = await trySelectors(scope, selectorGroup, async (locator) => {
    const text = await locator
      .textContent({ timeout: 1000 })
      .catch(() => null)
    return !!text?.trim()
  })

  if (!result.value) {
    return { value: defaultValue, usedSelector: '', usedFallback: false }
  }

  const text = await result.value.innerText({ timeout }).catch((e: unknown) => {
    log.debug(`Could not read text for ${result.usedSelector}: ${e}`)
    return null
  })
  return {
    value: text?.trim() || defaultValue,
    usedSelector: result.usedSelector,
    usedFallback: result.usedFallback,
  }
}

/**
 * All matches of the first selector in the group with at least `minCount`
 * matches
 */
export async function trySelectorsForAll(
  scope: Scope,
  selectorGroup: SelectorGroup,
  minCount: number = 1,
): Promise<SelectorResult<Locator[]>> {
  for (const { config, usedFallback } of candidates(selectorGroup)) {
    const locators = await scope.locator(config.selector).all()
    if (locators.length < minCount) continue

    log.debug(
      `${usedFallback ? '⚠' : '✓'} Found ${locators.length} elements with selector: ${describe(config)}`,
    )
    return { value: locators, usedSelector: config.selector, usedFallback }
  }

  log.debug(`✗ No selector found matching ${minCount}+ elements`)
  return { value: [], usedSelector: '', usedFallback: false }
}
