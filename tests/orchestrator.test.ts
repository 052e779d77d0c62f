import { describe, expect, test, vi } from 'vitest'
import type { ProgressCallback } from '../src/callbacks'
import { createSilentCallback } from '../src/callbacks'
import type { ErrorSink, ExtractionStep } from '../src/extraction/orchestrator'
import {
  attempt,
  collectItems,
  itemErrorKey,
  runSteps,
} from '../src/extraction/orchestrator'

class RecordingSink implements ErrorSink {
  readonly errors: Record<string, string> = {}
  readonly ran: string[] = []

  recordError(section: string, message: string): void {
    this.errors[section] = message
  }
}

const step = (
  name: string,
  run: (sink: RecordingSink) => void = () => {},
  enabled?: boolean,
): ExtractionStep<RecordingSink> => ({
  name,
  enabled,
  run: async (sink) => {
    sink.ran.push(name)
    run(sink)
  },
})

describe('attempt', () => {
  test('wraps a value', async () => {
    expect(await attempt(() => 3)).toEqual({ ok: true, value: 3 })
  })

  test('turns a thrown value into an error string', async () => {
    const outcome = await attempt(() => {
      throw 'plain failure'
    })
    expect(outcome).toEqual({
      ok: false,
      error: 'plain failure',
      cause: 'plain failure',
    })
  })
})

describe('runSteps', () => {
  test('a failing step is recorded and later steps still run', async () => {
    const sink = new RecordingSink()

    const report = await runSteps(sink, [
      step('basic_info'),
      step('experience', () => {
        throw new Error('list never rendered')
      }),
      step('education'),
    ])

    expect(report).toEqual({
      completed: ['basic_info', 'education'],
      failed: ['experience'],
      skipped: [],
      cancelled: false,
    })
    expect(sink.errors).toEqual({ experience: 'list never rendered' })
    expect(sink.ran).toEqual(['basic_info', 'experience', 'education'])
  })

  test('disabled steps are skipped without an error', async () => {
    const sink = new RecordingSink()

    const report = await runSteps(sink, [
      step('basic_info'),
      step('interests', undefined, false),
    ])

    expect(report.skipped).toEqual(['interests'])
    expect(sink.ran).toEqual(['basic_info'])
    expect(sink.errors).toEqual({})
  })

  test('cancellation stops issuing steps and keeps partial work', async () => {
    const sink = new RecordingSink()
    const controller = new AbortController()

    const report = await runSteps(
      sink,
      [
        step('basic_info', () => controller.abort()),
        step('experience'),
        step('education'),
      ],
      { signal: controller.signal, pauseBetweenSteps: 5 },
    )

    expect(report.cancelled).toBe(true)
    expect(report.completed).toEqual(['basic_info'])
    expect(report.skipped).toEqual(['experience', 'education'])
    expect(sink.ran).toEqual(['basic_info'])
  })

  test('reports progress and warnings through the callback', async () => {
    const callback: ProgressCallback = {
      ...createSilentCallback(),
      onProgress: vi.fn(),
      onWarning: vi.fn(),
    }

    await runSteps(
      new RecordingSink(),
      [
        step('details'),
        step('employees', () => {
          throw new Error('boom')
        }),
      ],
      { callback },
    )

    expect(callback.onProgress).toHaveBeenCalledWith('Completed details', 50)
    expect(callback.onWarning).toHaveBeenCalledWith('employees: boom')
  })
})

describe('collectItems', () => {
  test('isolates a failing item and counts duplicates and skips', async () => {
    const sink = new RecordingSink()
    const stored = new Set<string>()

    const report = await collectItems(['a', 'b', 'boom', 'a', 'skip'], {
      section: 'letters',
      sink,
      parse: (item) => {
        if (item === 'boom') throw new Error('bad item')
        return item === 'skip' ? null : item.toUpperCase()
      },
      append: (value) => {
        if (stored.has(value)) return false
        stored.add(value)
        return true
      },
    })

    expect(report).toEqual({
      appended: 2,
      duplicates: 1,
      skipped: 1,
      failed: [2],
    })
    expect(sink.errors).toEqual({ letters_item_2: 'bad item' })
    expect([...stored]).toEqual(['A', 'B'])
  })

  test('shouldSkip runs before parsing', async () => {
    const parse = vi.fn((item: number) => item)

    const report = await collectItems([1, 2, 3], {
      section: 'numbers',
      sink: new RecordingSink(),
      parse,
      append: () => true,
      shouldSkip: (item) => item === 2,
    })

    expect(report.appended).toBe(2)
    expect(report.skipped).toBe(1)
    expect(parse).toHaveBeenCalledTimes(2)
  })

  test('item keys are zero-based ordinals under the section', () => {
    expect(itemErrorKey('experience', 0)).toBe('experience_item_0')
  })
})
