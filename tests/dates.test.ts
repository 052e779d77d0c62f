import { describe, expect, test } from 'vitest'
import {
  isDateRange,
  isDuration,
  isOngoing,
  parseDateRange,
  splitWorkTimes,
} from '../src/extraction/dates'

describe('isDateRange', () => {
  test('accepts month-year, year-only and open ranges', () => {
    expect(isDateRange('Oct 2024 - Apr 2025')).toBe(true)
    expect(isDateRange('May 2024 - Present')).toBe(true)
    expect(isDateRange('2015 -')).toBe(true)
  })

  test('rejects ordinary text', () => {
    expect(isDateRange('Bachelor of Science')).toBe(false)
  })
})

describe('parseDateRange', () => {
  test('splits a closed range', () => {
    expect(parseDateRange('Jan 2020 - Dec 2021')).toEqual({
      from: 'Jan 2020',
      to: 'Dec 2021',
    })
  })

  test('splits a year-only range', () => {
    expect(parseDateRange('2015 - 2019')).toEqual({ from: '2015', to: '2019' })
  })

  test('accepts an en dash', () => {
    expect(parseDateRange('Jan 2020 – Dec 2021')).toEqual({
      from: 'Jan 2020',
      to: 'Dec 2021',
    })
  })

  test('normalises present in any case', () => {
    expect(parseDateRange('May 2024 - present')).toEqual({
      from: 'May 2024',
      to: 'Present',
    })
  })

  test('keeps an empty end for an ongoing range', () => {
    expect(parseDateRange('2015 -')).toEqual({ from: '2015', to: '' })
  })

  test('fails with two empty sides', () => {
    expect(parseDateRange('Bachelor - Science')).toEqual({ from: '', to: '' })
    expect(parseDateRange('2015')).toEqual({ from: '', to: '' })
  })
})

describe('isOngoing', () => {
  test('is true for open and present ranges only', () => {
    expect(isOngoing({ from: '2015', to: '' })).toBe(true)
    expect(isOngoing({ from: 'Jan 2020', to: 'Present' })).toBe(true)
    expect(isOngoing({ from: 'Jan 2020', to: 'Dec 2021' })).toBe(false)
    expect(isOngoing({ from: '', to: '' })).toBe(false)
  })
})

describe('splitWorkTimes', () => {
  test('separates the duration annotation', () => {
    expect(splitWorkTimes('Jan 2020 - Present · 4 yrs 2 mos')).toEqual({
      from: 'Jan 2020',
      to: 'Present',
      duration: '4 yrs 2 mos',
    })
  })

  test('leaves the duration empty when absent', () => {
    expect(splitWorkTimes('Jan 2020 - Dec 2021')).toEqual({
      from: 'Jan 2020',
      to: 'Dec 2021',
      duration: '',
    })
  })

  test('isDuration reads the site wording', () => {
    expect(isDuration('11 mos')).toBe(true)
    expect(isDuration('less than a year')).toBe(true)
    expect(isDuration('Berlin')).toBe(false)
  })
})
