import { describe, expect, test } from 'vitest'
import { AboutParser } from '../src/extraction/parsers/about-parser'
import {
  HonorParser,
  LanguageParser,
} from '../src/extraction/parsers/accomplishment-parser'
import {
  parseConnectionCount,
  parseContactInfo,
} from '../src/extraction/parsers/contact-parser'
import { EducationParser } from '../src/extraction/parsers/education-parser'
import { ExperienceParser } from '../src/extraction/parsers/experience-parser'
import {
  InterestParser,
  interestTypeFromUrl,
  parseAudience,
} from '../src/extraction/parsers/interest-parser'
import { TopCardParser } from '../src/extraction/parsers/top-card-parser'
import { link, parseInput } from './helpers'

const ACME_URL = 'https://www.linkedin.com/company/acme/'

describe('TopCardParser', () => {
  const parser = new TopCardParser()

  test('reads name, headline and location by position', () => {
    expect(
      parser.parse(
        parseInput([
          'Jane DoeJane Doe',
          'Engineer at Acme',
          'Berlin, Germany · Contact info',
        ]),
      ),
    ).toEqual({
      name: 'Jane Doe',
      headline: 'Engineer at Acme',
      location: 'Berlin, Germany',
      openToWork: false,
    })
  })

  test('drops a headline equal to the name or too short', () => {
    expect(parser.parse(parseInput(['Jane Doe', 'Jane Doe']))?.headline).toBeUndefined()
    expect(parser.parse(parseInput(['Jane Doe', 'CTO', '']))).toEqual({
      name: 'Jane Doe',
      headline: undefined,
      location: undefined,
      openToWork: false,
    })
  })

  test('detects the open-to-work badge', () => {
    expect(
      parser.parse(parseInput(['Jane Doe', 'Engineer', 'Berlin', '#OpenToWork']))
        ?.openToWork,
    ).toBe(true)
  })

  test('returns null without a name', () => {
    expect(parser.parse(parseInput(['', 'Engineer at Acme']))).toBeNull()
  })
})

describe('AboutParser', () => {
  test('strips the header and the see-more control', () => {
    expect(
      new AboutParser().parse(
        parseInput(['About', 'Builds payment systems.…see more']),
      ),
    ).toBe('Builds payment systems.')
  })
})

describe('contact info', () => {
  test('reads the value under each label', () => {
    const text = [
      'Contact Info',
      'Profile',
      'linkedin.com/in/jane-doe',
      'Website',
      'example.test (Personal)',
      'Phone',
      '+00 000 0000 (Mobile)',
      'Email',
      'jane@example.test',
    ].join('\n')

    expect(parseContactInfo(text)).toEqual({
      email: 'jane@example.test',
      website: 'https://example.test',
      phone: '+00 000 0000 (Mobile)',
      linkedinUrl: 'https://linkedin.com/in/jane-doe',
    })
  })

  test('ignores an email line without an at sign', () => {
    expect(parseContactInfo('Email\nnot shared')).toBeNull()
  })

  test('returns null when only the profile link is shown', () => {
    expect(parseContactInfo('Profile\nlinkedin.com/in/jane-doe')).toBeNull()
  })

  test('parseConnectionCount reads the badge', () => {
    expect(parseConnectionCount('500+ connections')).toBe(500)
    expect(parseConnectionCount('1,234 connections')).toBe(1234)
    expect(parseConnectionCount('Followers')).toBeUndefined()
  })
})

describe('ExperienceParser', () => {
  test('parses a single-position entry with description and skills', () => {
    const result = new ExperienceParser().parse(
      parseInput(
        [
          'Senior Engineer',
          'Acme Corp · Full-time',
          'Jan 2020 - Present · 4 yrs',
          'Berlin, Germany',
        ],
        {
          links: [link(ACME_URL, 'Acme Corp')],
          details: [{ text: 'Built the billing platform.\nSkills: Go · SQL' }],
        },
      ),
    )

    expect(result).toEqual([
      {
        institutionName: 'Acme Corp',
        linkedinUrl: ACME_URL,
        positionTitle: 'Senior Engineer',
        employmentType: 'Full-time',
        fromDate: 'Jan 2020',
        toDate: 'Present',
        duration: '4 yrs',
        location: 'Berlin, Germany',
        description: 'Built the billing platform.',
        skills: ['Go', 'SQL'],
      },
    ])
  })

  test('splits nested positions and inherits the header fields', () => {
    const result = new ExperienceParser().parse(
      parseInput(['Acme Corp', 'Full-time · 5 yrs', 'Berlin, Germany'], {
        links: [link(ACME_URL)],
        subItems: [
          parseInput(['Staff Engineer', 'Jan 2022 - Present · 2 yrs'], {
            details: [{ text: 'Led the platform team' }],
          }),
          parseInput(['Senior Engineer', 'Jan 2019 - Dec 2021 · 3 yrs']),
        ],
      }),
    )

    expect(result).toHaveLength(2)
    expect(result?.[0]).toEqual({
      institutionName: 'Acme Corp',
      linkedinUrl: ACME_URL,
      positionTitle: 'Staff Engineer',
      employmentType: 'Full-time',
      fromDate: 'Jan 2022',
      toDate: 'Present',
      duration: '2 yrs',
      location: 'Berlin, Germany',
      description: 'Led the platform team',
      skills: [],
    })
    expect(result?.[1]).toMatchObject({
      institutionName: 'Acme Corp',
      positionTitle: 'Senior Engineer',
      fromDate: 'Jan 2019',
      toDate: 'Dec 2021',
    })
  })

  test('keeps a self-employed role whose title names an employment type', () => {
    const parser = new ExperienceParser()
    const result = parser.parse(
      parseInput(['Freelance Writer', 'Self-employed', 'Jan 2020 - Present']),
    )

    expect(result).toHaveLength(1)
    expect(result?.[0]).toMatchObject({
      positionTitle: 'Freelance Writer',
      employmentType: 'Self-employed',
      fromDate: 'Jan 2020',
      toDate: 'Present',
    })
    expect(result?.[0]?.institutionName).toBeUndefined()
    expect(parser.validate(result ?? [])).toBe(true)
  })

  test('returns null for an empty entry', () => {
    expect(new ExperienceParser().parse(parseInput(['', ' ']))).toBeNull()
  })
})

describe('EducationParser', () => {
  const parser = new EducationParser()

  test('reads institution, degree, dates and trailing lines', () => {
    expect(
      parser.parse(
        parseInput(
          [
            'Example University',
            'Master of Science, Computer Science',
            '2015 - 2017',
            'Grade: 1.3',
          ],
          {
            links: [link('https://www.linkedin.com/school/example-university/')],
            details: [{ text: 'Skills: Python · Statistics' }],
          },
        ),
      ),
    ).toEqual({
      institutionName: 'Example University',
      linkedinUrl: 'https://www.linkedin.com/school/example-university/',
      degree: 'Master of Science, Computer Science',
      fromDate: '2015',
      toDate: '2017',
      description: 'Grade: 1.3',
      skills: ['Python', 'Statistics'],
    })
  })

  test('a single year is both start and end', () => {
    expect(parser.parse(parseInput(['Example College', '2019']))).toMatchObject({
      institutionName: 'Example College',
      fromDate: '2019',
      toDate: '2019',
      skills: [],
    })
  })
})

describe('InterestParser', () => {
  const parser = new InterestParser()

  test('types the interest from its URL', () => {
    expect(
      parser.parse(
        parseInput(['Example Org', '1,029,906 followers'], {
          links: [link('https://www.linkedin.com/company/example-org/')],
        }),
      ),
    ).toEqual({
      name: 'Example Org',
      type: 'company',
      url: 'https://www.linkedin.com/company/example-org/',
      followers: '1029906',
    })
  })

  test('falls back to the tab the card was listed under', () => {
    expect(
      parser.parse(
        parseInput(['Weekly Notes', '12K subscribers'], {
          context: { category: 'Newsletters' },
        }),
      ),
    ).toEqual({
      name: 'Weekly Notes',
      type: 'newsletter',
      url: undefined,
      followers: '12K',
    })
  })

  test('returns null when the type cannot be told', () => {
    expect(parser.parse(parseInput(['Mystery']))).toBeNull()
  })

  test('helpers read URL shape and audience', () => {
    expect(interestTypeFromUrl('https://www.linkedin.com/groups/123/')).toBe(
      'group',
    )
    expect(parseAudience('1,029,906 followers')).toBe('1029906')
  })
})

describe('accomplishments', () => {
  test('HonorParser reads issuer, date, association and document', () => {
    const documentUrl =
      'https://www.linkedin.com/in/jane/details/honors/single-media-viewer?type=DOCUMENT'

    expect(
      new HonorParser().parse(
        parseInput(
          [
            'Best Paper Award',
            'Issued by Example Society · Jun 2021',
            'Associated with Example University',
            'For work on caching',
          ],
          { links: [link(documentUrl)] },
        ),
      ),
    ).toEqual({
      title: 'Best Paper Award',
      issuer: 'Example Society',
      date: 'Jun 2021',
      associatedWith: 'Example University',
      documentUrl,
    })
  })

  test('HonorParser reads an issue date without issuer', () => {
    expect(
      new HonorParser().parse(parseInput(["Dean's List", 'Issued Dec 2019'])),
    ).toEqual({ title: "Dean's List", date: 'Dec 2019', documentUrl: undefined })
  })

  test('LanguageParser picks the proficiency line', () => {
    const parser = new LanguageParser()
    expect(
      parser.parse(parseInput(['German', 'Native or bilingual proficiency'])),
    ).toEqual({ name: 'German', proficiency: 'Native or bilingual proficiency' })
    expect(parser.parse(parseInput(['Spanish']))).toEqual({
      name: 'Spanish',
      proficiency: undefined,
    })
  })
})
