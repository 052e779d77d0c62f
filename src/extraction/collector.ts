/**
 * Paginated List Collector
 *
 * AwaitingList → LoadingPage → Extracting → (LoadingPage | Exhausted | BudgetReached)
 *
 * Walks the visible entries of a paginated list, skipping any whose canonical
 * URL was already seen, then advances ("Next" / "Show more results") until the
 * list runs out or the page/record budget is spent. Both terminal states are
 * successful and carry everything collected so far.
 */

import { z } from 'zod'
import { SCRAPING_CONSTANTS } from '../config/constants'
import { withTimeout } from '../utils/async'
import { log } from '../utils/logger'
import { CanonicalUrlSet } from '../utils/url'
import { attempt, itemErrorKey } from './orchestrator'

export type CollectorState =
  | 'AwaitingList'
  | 'LoadingPage'
  | 'Extracting'
  | 'Exhausted'
  | 'BudgetReached'

export type TerminalState = Extract<
  CollectorState,
  'Exhausted' | 'BudgetReached'
>

/**
 * Page-layout adapter behind the collector. Implementations drive the
 * browser; tests supply an in-memory list.
 */
export interface ListPageSource<E> {
  /** Resolves false when no entries show up within the timeout */
  waitForEntries(timeoutMs: number): Promise<boolean>
  /** Entries currently rendered, in page order */
  visibleEntries(): Promise<readonly E[]>
  /** Moves to the next batch; false when no control can be used */
  advance(timeoutMs: number): Promise<boolean>
}

const BudgetSchema = z.object({
  maxPages: z.number().int().min(1),
  maxRecords: z.number().int().min(1).optional(),
})

export interface CollectorOptions<E, T> {
  /** Section name, used for logging and item error keys */
  section: string
  /** Mandatory page budget, at least 1 */
  maxPages: number
  maxRecords?: number
  /** Identity of an entry; entries without one are skipped */
  urlOf: (entry: E) => Promise<string | undefined> | string | undefined
  /** Builds the record; null skips the entry */
  extract: (entry: E, url: string) => Promise<T | null> | T | null
  waitTimeoutMs?: number
  advanceTimeoutMs?: number
  /** Seen-set shared with other passes of the same scrape call */
  seen?: CanonicalUrlSet
  onTransition?: (from: CollectorState, to: CollectorState) => void
}

export interface CollectorResult<T> {
  items: T[]
  state: TerminalState
  pagesVisited: number
  /** Per-entry failures keyed `${section}_item_${ordinal}` */
  errors: Record<string, string>
}

const TIMEOUT_GRACE_MS = 1000

export class PaginatedListCollector<E, T> {
  private current: CollectorState = 'AwaitingList'

  constructor(
    private readonly source: ListPageSource<E>,
    private readonly options: CollectorOptions<E, T>,
  ) {
    BudgetSchema.parse({
      maxPages: options.maxPages,
      maxRecords: options.maxRecords,
    })
  }

  get state(): CollectorState {
    return this.current
  }

  private transition(next: CollectorState): void {
    log.debug(`${this.options.section} collector: ${this.current} → ${next}`)
    this.options.onTransition?.(this.current, next)
    this.current = next
  }

  async collect(): Promise<CollectorResult<T>> {
    const {
      section,
      maxPages,
      maxRecords,
      waitTimeoutMs = SCRAPING_CONSTANTS.LIST_WAIT_TIMEOUT_MS,
      advanceTimeoutMs = SCRAPING_CONSTANTS.ADVANCE_TIMEOUT_MS,
    } = this.options
    const seen = this.options.seen ?? new CanonicalUrlSet()
    const items: T[] = []
    const errors: Record<string, string> = {}
    let pagesVisited = 0
    let ordinal = 0

    this.transition('LoadingPage')

    for (;;) {
      const ready = await attempt(() =>
        withTimeout(
          this.source.waitForEntries(waitTimeoutMs),
          waitTimeoutMs + TIMEOUT_GRACE_MS,
          `${section} list`,
        ),
      )
      if (!ready.ok || !ready.value) {
        if (!ready.ok) {
          log.debug(`${section} list did not load: ${ready.error}`)
        }
        this.transition('Exhausted')
        break
      }

      this.transition('Extracting')
      pagesVisited++

      const visible = await attempt(() => this.source.visibleEntries())
      if (!visible.ok) {
        log.debug(`${section} entries could not be read: ${visible.error}`)
        this.transition('Exhausted')
        break
      }

      for (const entry of visible.value) {
        if (maxRecords !== undefined && items.length >= maxRecords) break

        const outcome = await attempt(async () => {
          const url = await this.options.urlOf(entry)
          if (!url || seen.has(url)) return null
          seen.add(url)

          const index = ordinal++
          const record = await attempt(() => this.options.extract(entry, url))
          if (!record.ok) {
            errors[itemErrorKey(section, index)] = record.error
            log.debug(
              `Error extracting ${section} entry ${index}: ${record.error}`,
            )
            return null
          }
          return record.value
        })

        if (!outcome.ok) {
          log.debug(`Could not read ${section} entry: ${outcome.error}`)
          continue
        }
        if (outcome.value !== null) items.push(outcome.value)
      }

      const recordsSpent =
        maxRecords !== undefined && items.length >= maxRecords
      if (recordsSpent || pagesVisited >= maxPages) {
        this.transition('BudgetReached')
        break
      }

      const advanced = await attempt(() =>
        withTimeout(
          this.source.advance(advanceTimeoutMs),
          advanceTimeoutMs + TIMEOUT_GRACE_MS,
          `${section} pagination`,
        ),
      )
      if (!advanced.ok || !advanced.value) {
        this.transition('Exhausted')
        break
      }

      this.transition('LoadingPage')
    }

    log.debug(
      `${section}: collected ${items.length} entries over ` +
        `${pagesVisited} pages (${this.current})`,
    )

    return {
      items,
      state: this.current === 'BudgetReached' ? 'BudgetReached' : 'Exhausted',
      pagesVisited,
      errors,
    }
  }
}

/**
 * Convenience wrapper for a single collection run.
 */
export async function collectPaginated<E, T>(
  source: ListPageSource<E>,
  options: CollectorOptions<E, T>,
): Promise<CollectorResult<T>> {
  return await new PaginatedListCollector(source, options).collect()
}
