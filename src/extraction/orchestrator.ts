/**
 * Partial-Failure Orchestrator
 *
 * Runs independent extraction steps against one aggregate. A failing step
 * becomes a `scrapingErrors[step]` entry and the next step still runs; list
 * steps further isolate each item under an item-indexed key.
 */

import type { ProgressCallback } from '../callbacks'
import { createSilentCallback } from '../callbacks'
import { errorMessage } from '../exceptions'
import { sleep } from '../utils/async'
import { log } from '../utils/logger'

export type StepOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; cause: unknown }

export interface ErrorSink {
  recordError(section: string, message: string): void
}

export async function attempt<T>(
  fn: () => Promise<T> | T,
): Promise<StepOutcome<T>> {
  try {
    return { ok: true, value: await fn() }
  } catch (e) {
    return { ok: false, error: errorMessage(e), cause: e }
  }
}

export interface ExtractionStep<A> {
  /** Key used in the aggregate's error map */
  name: string
  run(aggregate: A): Promise<void>
  /** Steps switched off by the caller's field mask are skipped */
  enabled?: boolean
}

export interface RunStepsOptions {
  /** Aborting stops further steps; the aggregate keeps what it has */
  signal?: AbortSignal
  callback?: ProgressCallback
  /** Pause between consecutive steps, in seconds */
  pauseBetweenSteps?: number
}

export interface RunReport {
  completed: string[]
  failed: string[]
  skipped: string[]
  cancelled: boolean
}

export async function runSteps<A extends ErrorSink>(
  aggregate: A,
  steps: ReadonlyArray<ExtractionStep<A>>,
  options: RunStepsOptions = {},
): Promise<RunReport> {
  const callback = options.callback ?? createSilentCallback()
  const report: RunReport = {
    completed: [],
    failed: [],
    skipped: [],
    cancelled: false,
  }

  for (let idx = 0; idx < steps.length; idx++) {
    const step = steps[idx]
    if (!step) continue

    if (options.signal?.aborted) {
      report.cancelled = true
      report.skipped.push(...steps.slice(idx).map((s) => s.name))
      log.skip(`Scrape cancelled before ${step.name}`)
      break
    }

    if (step.enabled === false) {
      report.skipped.push(step.name)
      continue
    }

    log.debug(`Running step: ${step.name}`)
    const outcome = await attempt(() => step.run(aggregate))
    const percent = Math.round(((idx + 1) / steps.length) * 100)

    if (outcome.ok) {
      report.completed.push(step.name)
      await callback.onProgress(`Completed ${step.name}`, percent)
    } else {
      report.failed.push(step.name)
      aggregate.recordError(step.name, outcome.error)
      log.warning(`Step ${step.name} failed: ${outcome.error}`)
      await callback.onWarning(`${step.name}: ${outcome.error}`)
    }

    const isLast = idx === steps.length - 1
    if (!isLast && options.pauseBetweenSteps && !options.signal?.aborted) {
      await sleep(options.pauseBetweenSteps)
    }
  }

  return report
}

export function itemErrorKey(section: string, index: number): string {
  return `${section}_item_${index}`
}

/**
 * Options for collecting items with per-item isolation
 */
export interface CollectItemsOptions<I, T> {
  /** Section name, used for logging and item error keys */
  section: string

  /** Receives per-item error entries */
  sink: ErrorSink

  /** Turns one raw item into a record; null skips the item without error */
  parse: (item: I, index: number) => Promise<T | null> | T | null

  /** Stores the record; returning false marks it as a duplicate */
  append: (value: T, index: number) => boolean

  /** Optional predicate to skip items before parsing */
  shouldSkip?: (item: I, index: number) => Promise<boolean> | boolean
}

type ItemResult = 'appended' | 'duplicate' | 'skipped'

export interface CollectItemsReport {
  appended: number
  duplicates: number
  skipped: number
  failed: number[]
}

/**
 * Parses and appends every item, isolating failures. A throwing item is
 * recorded under `${section}_item_${index}` and the rest still land.
 *
 * @example
 * ```typescript
 * await collectItems(entries, {
 *   section: 'education',
 *   sink: person,
 *   parse: (entry) => parseEducationEntry(entry),
 *   append: (record) => person.addEducation(record),
 * })
 * ```
 */
export async function collectItems<I, T>(
  items: readonly I[],
  options: CollectItemsOptions<I, T>,
): Promise<CollectItemsReport> {
  const report: CollectItemsReport = {
    appended: 0,
    duplicates: 0,
    skipped: 0,
    failed: [],
  }

  for (let idx = 0; idx < items.length; idx++) {
    const item = items[idx]
    if (item === undefined) continue

    const outcome = await attempt(async (): Promise<ItemResult> => {
      if (options.shouldSkip && (await options.shouldSkip(item, idx))) {
        return 'skipped'
      }
      const value = await options.parse(item, idx)
      if (value === null) return 'skipped'
      return options.append(value, idx) ? 'appended' : 'duplicate'
    })

    if (!outcome.ok) {
      report.failed.push(idx)
      options.sink.recordError(itemErrorKey(options.section, idx), outcome.error)
      log.debug(
        `Error parsing ${options.section} at index ${idx}: ${outcome.error}`,
      )
      continue
    }

    switch (outcome.value) {
      case 'appended':
        report.appended++
        break
      case 'duplicate':
        report.duplicates++
        break
      case 'skipped':
        report.skipped++
        log.skip(`Skipped ${options.section} at index ${idx}`)
        break
    }
  }

  log.debug(
    `${options.section}: ${report.appended} appended, ` +
      `${report.duplicates} duplicates, ${report.skipped} skipped, ` +
      `${report.failed.length} failed`,
  )
  return report
}
