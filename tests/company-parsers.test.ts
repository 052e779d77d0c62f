import { describe, expect, test } from 'vitest'
import {
  CompanySummaryParser,
  parseCompanyDetails,
  parseHeadcount,
  parseSeeAllEmployees,
  parseTopCardInfo,
} from '../src/extraction/parsers/company-parser'
import {
  ConnectionParser,
  EmployeeParser,
  parsePersonCard,
} from '../src/extraction/parsers/people-parser'
import { parseValid } from '../src/extraction/parsers/types'
import { link, parseInput } from './helpers'

describe('headcount', () => {
  test('takes the first number of a band and expands suffixes', () => {
    expect(parseHeadcount('10K+')).toBe(10000)
    expect(parseHeadcount('1,001-5,000 employees')).toBe(1001)
    expect(parseHeadcount('10,001+ employees')).toBe(10001)
    expect(parseHeadcount('2.5M followers')).toBe(2500000)
    expect(parseHeadcount('Self-employed')).toBeUndefined()
  })

  test('reads the see-all employees link', () => {
    expect(parseSeeAllEmployees('See all 1,234 employees on LinkedIn')).toBe(
      1234,
    )
    expect(parseSeeAllEmployees('See all employees')).toBeUndefined()
  })
})

describe('parseCompanyDetails', () => {
  test('maps known terms and ignores the rest', () => {
    expect(
      parseCompanyDetails([
        { term: 'Website', definitions: ['https://acme.example'] },
        { term: 'Phone', definitions: ['+00 000\nPhone number is verified'] },
        { term: 'Industry', definitions: ['Software Development'] },
        { term: 'Company size', definitions: ['1,001-5,000 employees'] },
        { term: 'Headquarters', definitions: ['Berlin, Germany'] },
        { term: 'Founded', definitions: ['2009'] },
        { term: 'Specialties', definitions: ['Payments, Billing , ,Analytics'] },
        { term: 'Unknown', definitions: ['ignored'] },
        { term: 'Type', definitions: [''] },
      ]),
    ).toEqual({
      website: 'https://acme.example',
      phone: '+00 000',
      industry: 'Software Development',
      companySize: '1,001-5,000 employees',
      headcount: 1001,
      headquarters: 'Berlin, Germany',
      founded: '2009',
      specialties: ['Payments', 'Billing', 'Analytics'],
    })
  })
})

describe('parseTopCardInfo', () => {
  test('sorts the info items by shape', () => {
    expect(
      parseTopCardInfo([
        'Software Development',
        'Berlin, Germany',
        '12K followers',
        '10K+ employees',
      ]),
    ).toEqual({
      industry: 'Software Development',
      headquarters: 'Berlin, Germany',
      companySize: '10K+ employees',
      headcount: 10000,
    })
  })
})

describe('CompanySummaryParser', () => {
  const parser = new CompanySummaryParser()

  test('marks showcase pages', () => {
    expect(
      parser.parse(
        parseInput(
          ['Acme Labs', 'Showcase page', 'Software Development', '5,000 followers'],
          { links: [link('https://www.linkedin.com/showcase/acme-labs/')] },
        ),
      ),
    ).toEqual({
      kind: 'showcase',
      summary: {
        name: 'Acme Labs',
        linkedinUrl: 'https://www.linkedin.com/showcase/acme-labs/',
        followers: '5000',
      },
    })
  })

  test('everything else is an affiliated company', () => {
    expect(
      parser.parse(
        parseInput(['Acme Payments', 'Financial Services'], {
          links: [link('https://www.linkedin.com/company/acme-payments/')],
        }),
      )?.kind,
    ).toBe('affiliated')
  })
})

describe('person cards', () => {
  const card = parseInput(
    ['Sam Lee', '• 2nd', 'Engineer at Example Labs', 'Connect'],
    { links: [link('https://www.linkedin.com/in/sam-lee?miniProfile=x')] },
  )

  test('drop badges and buttons around name and headline', () => {
    expect(parsePersonCard(card)).toEqual({
      name: 'Sam Lee',
      headline: 'Engineer at Example Labs',
      linkedinUrl: 'https://www.linkedin.com/in/sam-lee?miniProfile=x',
    })
  })

  test('strip a degree suffix from the name', () => {
    expect(parsePersonCard(parseInput(['Sam Lee · 2nd']))?.name).toBe('Sam Lee')
  })

  test('hidden members are skipped', () => {
    expect(parsePersonCard(parseInput(['LinkedIn Member', 'Engineer']))).toBeNull()
  })

  test('employees carry the headline as position', () => {
    expect(new EmployeeParser().parse(card)).toEqual({
      name: 'Sam Lee',
      position: 'Engineer at Example Labs',
      linkedinUrl: 'https://www.linkedin.com/in/sam-lee?miniProfile=x',
    })
  })

  test('connections without a profile link do not validate', () => {
    const parser = new ConnectionParser()
    expect(parseValid(parser, parseInput(['Sam Lee', 'Engineer']))).toBeNull()
    expect(parseValid(parser, card)?.name).toBe('Sam Lee')
  })
})
