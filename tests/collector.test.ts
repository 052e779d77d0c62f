import { describe, expect, test } from 'vitest'
import type {
  CollectorState,
  ListPageSource,
} from '../src/extraction/collector'
import {
  collectPaginated,
  PaginatedListCollector,
} from '../src/extraction/collector'
import { CanonicalUrlSet } from '../src/utils/url'

interface FakeEntry {
  name: string
  url?: string
  fails?: boolean
}

class InMemoryListSource implements ListPageSource<FakeEntry> {
  private page = 0
  advances = 0

  constructor(private readonly pages: FakeEntry[][]) {}

  async waitForEntries(): Promise<boolean> {
    return (this.pages[this.page]?.length ?? 0) > 0
  }

  async visibleEntries(): Promise<readonly FakeEntry[]> {
    return this.pages[this.page] ?? []
  }

  async advance(): Promise<boolean> {
    if (this.page + 1 >= this.pages.length) return false
    this.page++
    this.advances++
    return true
  }
}

const entry = (name: string, fails = false): FakeEntry => ({
  name,
  url: `/in/${name}`,
  fails,
})

const pagesOf = (count: number, perPage: number): FakeEntry[][] =>
  Array.from({ length: count }, (_, page) =>
    Array.from({ length: perPage }, (_, idx) => entry(`p${page}-e${idx}`)),
  )

const baseOptions = {
  section: 'connections',
  urlOf: (e: FakeEntry) => e.url,
  extract: (e: FakeEntry) => {
    if (e.fails) throw new Error(`could not read ${e.name}`)
    return e.name
  },
}

describe('PaginatedListCollector', () => {
  test('skips entries whose URL differs only by query string', async () => {
    const source = new InMemoryListSource([
      [
        { name: 'a', url: '/in/a?x=1' },
        { name: 'b', url: '/in/b' },
      ],
      [
        { name: 'a-again', url: 'https://www.linkedin.com/in/a/?y=2' },
        { name: 'c', url: '/in/c' },
      ],
    ])

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 5,
    })

    expect(result.items).toEqual(['a', 'b', 'c'])
    expect(result.state).toBe('Exhausted')
    expect(result.pagesVisited).toBe(2)
  })

  test('stops at the page budget with BudgetReached', async () => {
    const source = new InMemoryListSource(pagesOf(5, 2))

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 2,
    })

    expect(result.state).toBe('BudgetReached')
    expect(result.pagesVisited).toBe(2)
    expect(result.items).toEqual(['p0-e0', 'p0-e1', 'p1-e0', 'p1-e1'])
    expect(source.advances).toBe(1)
  })

  test('stops at the record budget mid-page', async () => {
    const source = new InMemoryListSource(pagesOf(3, 4))

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 3,
      maxRecords: 3,
    })

    expect(result.state).toBe('BudgetReached')
    expect(result.items).toEqual(['p0-e0', 'p0-e1', 'p0-e2'])
    expect(result.pagesVisited).toBe(1)
  })

  test('isolates a failing entry under its ordinal', async () => {
    const page = Array.from({ length: 10 }, (_, idx) =>
      entry(`person-${idx}`, idx === 2),
    )
    const source = new InMemoryListSource([page])

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 1,
    })

    expect(result.items).toHaveLength(9)
    expect(result.items).not.toContain('person-2')
    expect(result.errors).toEqual({
      connections_item_2: 'could not read person-2',
    })
  })

  test('skips entries without a URL and returns null records', async () => {
    const source = new InMemoryListSource([
      [{ name: 'anonymous' }, entry('kept'), entry('dropped')],
    ])

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 1,
      extract: (e: FakeEntry) => (e.name === 'dropped' ? null : e.name),
    })

    expect(result.items).toEqual(['kept'])
    expect(result.errors).toEqual({})
  })

  test('honours a seen-set shared with earlier passes', async () => {
    const seen = new CanonicalUrlSet()
    seen.add('https://www.linkedin.com/in/self/')
    const source = new InMemoryListSource([[entry('self'), entry('other')]])

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 1,
      seen,
    })

    expect(result.items).toEqual(['other'])
    expect(seen.size).toBe(2)
  })

  test('an empty list is exhausted without visiting a page', async () => {
    const result = await collectPaginated(new InMemoryListSource([[]]), {
      ...baseOptions,
      maxPages: 3,
    })

    expect(result).toEqual({
      items: [],
      state: 'Exhausted',
      pagesVisited: 0,
      errors: {},
    })
  })

  test('a list that fails to load is exhausted', async () => {
    const source: ListPageSource<FakeEntry> = {
      waitForEntries: async () => {
        throw new Error('detached')
      },
      visibleEntries: async () => [],
      advance: async () => false,
    }

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 1,
    })
    expect(result.state).toBe('Exhausted')
    expect(result.items).toEqual([])
  })

  test('keeps earlier pages when entries stop being readable', async () => {
    const pages = [[entry('a'), entry('b', true), entry('c')], [entry('d')]]
    let reads = 0
    let page = 0
    const source: ListPageSource<FakeEntry> = {
      waitForEntries: async () => true,
      visibleEntries: async () => {
        if (reads++ > 0) throw new Error('detached')
        return pages[page] ?? []
      },
      advance: async () => {
        page++
        return true
      },
    }

    const result = await collectPaginated(source, {
      ...baseOptions,
      maxPages: 5,
    })

    expect(result).toEqual({
      items: ['a', 'c'],
      state: 'Exhausted',
      pagesVisited: 2,
      errors: { connections_item_1: 'could not read b' },
    })
  })

  test('walks the documented states', async () => {
    const transitions: string[] = []
    const collector = new PaginatedListCollector(
      new InMemoryListSource(pagesOf(2, 1)),
      {
        ...baseOptions,
        maxPages: 1,
        onTransition: (from: CollectorState, to: CollectorState) =>
          transitions.push(`${from}>${to}`),
      },
    )

    expect(collector.state).toBe('AwaitingList')
    await collector.collect()

    expect(transitions).toEqual([
      'AwaitingList>LoadingPage',
      'LoadingPage>Extracting',
      'Extracting>BudgetReached',
    ])
    expect(collector.state).toBe('BudgetReached')
  })

  test('rejects a page budget below one', () => {
    expect(
      () =>
        new PaginatedListCollector(new InMemoryListSource([]), {
          ...baseOptions,
          maxPages: 0,
        }),
    ).toThrow()
  })
})
