import type { z } from 'zod'
import { canonicalizeUrl } from '../utils/url'

/**
 * Shallow-freezes a record together with its array-valued fields.
 */
export function freezeRecord<T extends object>(record: T): Readonly<T> {
  for (const value of Object.values(record)) {
    if (Array.isArray(value)) Object.freeze(value)
  }
  return Object.freeze(record)
}

export function canonicalOrUndefined(url: string | undefined): string | undefined {
  if (!url) return undefined
  return canonicalizeUrl(url) || undefined
}

/**
 * Append-only list of schema-validated, frozen entries. An entry whose
 * identity key was already appended is rejected.
 */
export class AppendOnlyList<S extends z.ZodTypeAny> {
  private readonly items: Array<Readonly<z.output<S>>> = []
  private readonly keys = new Set<string>()

  constructor(
    private readonly schema: S,
    private readonly keyOf: (item: z.output<S>) => string,
  ) {}

  /**
   * Returns false when an entry with the same identity is already present.
   */
  append(input: z.input<S>): boolean {
    const item: z.output<S> = this.schema.parse(input)
    const key = this.keyOf(item)
    if (this.keys.has(key)) return false

    this.keys.add(key)
    this.items.push(freezeRecord(item))
    return true
  }

  has(key: string): boolean {
    return this.keys.has(key)
  }

  get length(): number {
    return this.items.length
  }

  values(): ReadonlyArray<Readonly<z.output<S>>> {
    return this.items
  }

  toArray(): Array<z.output<S>> {
    return [...this.items]
  }
}

/**
 * Entity identity: canonical URL when there is one, otherwise the name.
 */
export function entityKey(item: {
  linkedinUrl?: string
  url?: string
  name?: string
}): string {
  const url = item.linkedinUrl ?? item.url
  if (url) return `url:${url}`
  return `name:${(item.name ?? '').toLowerCase()}`
}
