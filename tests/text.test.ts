import { describe, expect, test } from 'vitest'
import {
  cleanDuplicatedText,
  cleanSingleStringDuplicates,
  collapseWhitespace,
  containsKeyword,
  deduplicateTexts,
  halveRepeated,
  parseCount,
  splitLines,
} from '../src/utils/text'

describe('halveRepeated', () => {
  test('folds a string glued to its own copy', () => {
    expect(halveRepeated('Acme CorpAcme Corp')).toBe('Acme Corp')
  })

  test('folds a copy separated by one space', () => {
    expect(halveRepeated('Manager Manager')).toBe('Manager')
  })

  test('leaves short repeats alone', () => {
    expect(halveRepeated('abab')).toBe('abab')
  })

  test('leaves text that is not a doubling alone', () => {
    expect(halveRepeated('Senior Engineer')).toBe('Senior Engineer')
  })
})

describe('cleanSingleStringDuplicates', () => {
  test('collapses a line rendered twice', () => {
    expect(cleanSingleStringDuplicates('Manager\nManager')).toBe('Manager')
  })

  test('joins distinct lines with a space', () => {
    expect(cleanSingleStringDuplicates('Senior Engineer\nFull-time')).toBe(
      'Senior Engineer Full-time',
    )
  })

  test('returns very short text trimmed and untouched', () => {
    expect(cleanSingleStringDuplicates('  Dev ')).toBe('Dev')
  })

  test('folds glued copies on each line', () => {
    expect(cleanSingleStringDuplicates('Acme CorpAcme Corp\nAcme Corp')).toBe(
      'Acme Corp',
    )
  })
})

describe('cleanDuplicatedText', () => {
  test('keeps unique lines on separate lines', () => {
    expect(
      cleanDuplicatedText('Line one\nLine one\nLine twoLine two'),
    ).toBe('Line one\nLine two')
  })

  test('returns an empty string for blank input', () => {
    expect(cleanDuplicatedText(' \n \n')).toBe('')
  })
})

describe('deduplicateTexts', () => {
  test('drops empty, repeated and substring tokens in first-seen order', () => {
    expect(
      deduplicateTexts(['Acme', 'Acme Corp', '', 'Berlin', 'Berlin']),
    ).toEqual(['Acme', 'Berlin'])
  })

  test('drops tokens longer than the limit', () => {
    expect(deduplicateTexts(['abcdefghijklmnop'], 10)).toEqual([])
  })

  test('halves doubled tokens before comparing', () => {
    expect(deduplicateTexts(['Berlin Berlin', 'Berlin'])).toEqual(['Berlin'])
  })
})

describe('small helpers', () => {
  test('collapseWhitespace squeezes runs of whitespace', () => {
    expect(collapseWhitespace('  a \n b\t c ')).toBe('a b c')
  })

  test('splitLines trims and drops blank lines', () => {
    expect(splitLines(' one \n\n  two\n')).toEqual(['one', 'two'])
  })

  test('parseCount reads digits with separators', () => {
    expect(parseCount('1,234 followers')).toBe(1234)
    expect(parseCount('no digits here')).toBeUndefined()
  })

  test('containsKeyword matches case-insensitively', () => {
    expect(containsKeyword('Example University', ['university'])).toBe(true)
    expect(containsKeyword('Example Labs', ['university'])).toBe(false)
  })
})
