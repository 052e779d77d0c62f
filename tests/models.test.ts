import { describe, expect, test } from 'vitest'
import {
  CompanyAggregate,
  getPersonCompany,
  getPersonJobTitle,
  PersonAggregate,
} from '../src/models'

const PROFILE = 'https://www.linkedin.com/in/Jane-Doe/?trk=feed'

describe('PersonAggregate', () => {
  test('stores the canonical profile URL', () => {
    expect(new PersonAggregate(PROFILE).linkedinUrl).toBe(
      'https://www.linkedin.com/in/jane-doe',
    )
  })

  test('rejects a URL that is not a profile', () => {
    expect(
      () => new PersonAggregate('https://www.linkedin.com/company/acme'),
    ).toThrow()
  })

  test('connections are unique by canonical URL', () => {
    const person = new PersonAggregate(PROFILE)

    expect(person.addConnection({ name: 'Sam Lee', linkedinUrl: '/in/sam?x=1' })).toBe(true)
    expect(
      person.addConnection({
        name: 'Sam Lee',
        linkedinUrl: 'https://www.linkedin.com/in/SAM/',
      }),
    ).toBe(false)
    expect(person.hasConnection('/in/sam')).toBe(true)
    expect(person.connectionTotal).toBe(1)
    expect(person.toJSON().connections).toEqual([
      { name: 'Sam Lee', linkedinUrl: 'https://www.linkedin.com/in/sam' },
    ])
  })

  test('several positions may share one organization URL', () => {
    const person = new PersonAggregate(PROFILE)
    const base = {
      institutionName: 'Acme Corp',
      linkedinUrl: '/company/acme/',
      fromDate: 'Jan 2020',
    }

    expect(person.addExperience({ ...base, positionTitle: 'Engineer' })).toBe(true)
    expect(
      person.addExperience({ ...base, positionTitle: 'Senior Engineer' }),
    ).toBe(true)
    expect(person.addExperience({ ...base, positionTitle: 'engineer' })).toBe(
      false,
    )

    const [first] = person.toJSON().experiences
    expect(first?.linkedinUrl).toBe('https://www.linkedin.com/company/acme')
    expect(first?.skills).toEqual([])
  })

  test('appended entries are frozen', () => {
    const person = new PersonAggregate(PROFILE)
    person.addEducation({ institutionName: 'Example University', skills: ['Go'] })

    const [education] = person.toJSON().educations
    expect(Object.isFrozen(education)).toBe(true)
    expect(Object.isFrozen(education?.skills)).toBe(true)
  })

  test('invalid entries are refused', () => {
    const person = new PersonAggregate(PROFILE)
    expect(() => person.addLanguage({ name: '' })).toThrow()
    expect(person.toJSON().languages).toEqual([])
  })

  test('identity merges and errors land in scrapingErrors', () => {
    const person = new PersonAggregate(PROFILE)
    person.setIdentity({ name: 'Jane Doe' })
    person.setIdentity({ headline: 'Engineer at Acme' })
    person.addAbout('Builds things.')
    person.addAbout('Builds things.')
    person.recordError('experience', 'list never rendered')

    const json = person.toJSON()
    expect(json.name).toBe('Jane Doe')
    expect(json.headline).toBe('Engineer at Acme')
    expect(json.about).toEqual(['Builds things.'])
    expect(json.scrapingErrors).toEqual({ experience: 'list never rendered' })
  })

  test('toJSON hands out copies', () => {
    const person = new PersonAggregate(PROFILE)
    person.addAbout('First')

    person.toJSON().about.push('Injected')
    expect(person.toJSON().about).toEqual(['First'])
  })

  test('contact info URL is canonicalized', () => {
    const person = new PersonAggregate(PROFILE)
    person.setContactInfo({
      email: 'jane@example.test',
      linkedinUrl: 'https://www.linkedin.com/in/Jane-Doe/',
    })

    expect(person.toJSON().contactInfo).toEqual({
      email: 'jane@example.test',
      linkedinUrl: 'https://www.linkedin.com/in/jane-doe',
    })
  })

  test('an honor previewed on the profile is not added again from details', () => {
    const person = new PersonAggregate(PROFILE)
    const documentUrl =
      'https://www.linkedin.com/in/jane-doe/details/honors/single-media-viewer?type=DOCUMENT&mediaUrn=ABC'

    expect(person.addHonor({ title: 'Best Paper Award' })).toBe(true)
    expect(
      person.addHonor({
        title: 'best paper award',
        issuer: 'Example Society',
        documentUrl,
      }),
    ).toBe(false)
    expect(
      person.addHonor({ title: 'Teaching Award', documentUrl }),
    ).toBe(true)

    expect(person.toJSON().honors).toEqual([
      { title: 'Best Paper Award' },
      { title: 'Teaching Award', documentUrl },
    ])
  })

  test('a language repeated across sources is stored once', () => {
    const person = new PersonAggregate(PROFILE)
    person.addLanguage({ name: 'German' })
    person.addLanguage({ name: 'German', proficiency: 'Native or bilingual proficiency' })

    expect(person.toJSON().languages).toEqual([{ name: 'German' }])
  })

  test('current company and title come from the first experience', () => {
    const person = new PersonAggregate(PROFILE)
    person.addExperience({
      institutionName: 'Acme Corp',
      positionTitle: 'Staff Engineer',
    })

    const json = person.toJSON()
    expect(getPersonCompany(json)).toBe('Acme Corp')
    expect(getPersonJobTitle(json)).toBe('Staff Engineer')
  })
})

describe('CompanyAggregate', () => {
  test('details keep the first observed value', () => {
    const company = new CompanyAggregate('https://www.linkedin.com/company/acme/')
    company.mergeDetails({ name: 'Acme', industry: '' })
    company.mergeDetails({
      name: 'Acme Holdings',
      industry: 'Software Development',
      specialties: [],
    })

    const json = company.toJSON()
    expect(json.name).toBe('Acme')
    expect(json.industry).toBe('Software Development')
    expect(json.specialties).toEqual([])
  })

  test('an exact headcount overrides the size band estimate', () => {
    const company = new CompanyAggregate('https://www.linkedin.com/company/acme')
    company.mergeDetails({ headcount: 1001 })
    company.setHeadcount(1234)

    expect(company.toJSON().headcount).toBe(1234)
  })

  test('entity lists dedupe by URL, or by name without one', () => {
    const company = new CompanyAggregate('https://www.linkedin.com/company/acme')

    expect(company.addEmployee({ name: 'Sam Lee', linkedinUrl: '/in/sam' })).toBe(true)
    expect(
      company.addEmployee({ name: 'Samuel Lee', linkedinUrl: '/in/sam?x=2' }),
    ).toBe(false)
    expect(company.addFollower({ name: 'Alex Kim' })).toBe(true)
    expect(company.addFollower({ name: 'alex kim' })).toBe(false)
  })

  test('showcase pages and affiliated companies are separate lists', () => {
    const company = new CompanyAggregate('https://www.linkedin.com/company/acme')
    const summary = { name: 'Acme Labs', linkedinUrl: '/showcase/acme-labs/' }

    expect(company.addShowcasePage(summary)).toBe(true)
    expect(company.addAffiliatedCompany(summary)).toBe(true)
    expect(company.toJSON().showcasePages).toEqual([
      { name: 'Acme Labs', linkedinUrl: 'https://www.linkedin.com/showcase/acme-labs' },
    ])
  })
})
