import { describe, expect, test } from 'vitest'
import { EntityIndex } from '../src/extraction/components/entity-index'
import { decodeElement } from '../src/extraction/components/nodes'
import { EducationParser } from '../src/extraction/parsers/education-parser'
import { createDecodeContext } from '../src/extraction/parsers/types'
import {
  entityElement,
  fixedListElement,
  logoEntity,
  textElement,
} from './helpers'

const parser = new EducationParser()

describe('EducationParser', () => {
  test('returns null when the element holds no entity', () => {
    expect(
      parser.parse(decodeElement(textElement('loose')), createDecodeContext()),
    ).toBeNull()
  })

  test('decodes degree, school, years and positional sub-components', () => {
    const index = EntityIndex.build([logoEntity('urn:li:fsd_school:3003', [200, 400])])
    const element = decodeElement(
      entityElement({
        title: 'Master of Science - MS',
        subtitle: 'Example University',
        caption: '2018 - 2020',
        actionTarget: 'https://www.linkedin.com/school/3003/',
        subComponents: [
          fixedListElement([textElement('Computer Science')]),
          textElement('Activities and societies: Chess club'),
          textElement('Ignored third block'),
        ],
      }),
    )

    expect(parser.parse(element, createDecodeContext(index))).toEqual({
      school: 'Example University',
      schoolId: '3003',
      schoolUrl: 'https://www.linkedin.com/school/3003/',
      schoolLogo: 'https://media.example.com/logo_200.png',
      degree: 'Master of Science - MS',
      fieldOfStudy: 'Computer Science',
      startYear: 2018,
      endYear: 2020,
      description: 'Activities and societies: Chess club',
    })
  })

  test('reads sub-components by position, not by content', () => {
    const education = parser.parse(
      decodeElement(
        entityElement({
          subComponents: [
            entityElement({ metadata: 'no text here' }),
            textElement('Graduated with distinction in Jan 2020, top of the cohort'),
          ],
        }),
      ),
      createDecodeContext(),
    )
    expect(education?.fieldOfStudy).toBeNull()
    expect(education?.description).toBe(
      'Graduated with distinction in Jan 2020, top of the cohort',
    )
  })

  test('prefers the indexed school name and strips its suffix', () => {
    const index = EntityIndex.build([
      logoEntity('urn:li:fsd_school:8', [100], { name: 'Sample Institute · Online' }),
    ])
    const education = parser.parse(
      decodeElement(
        entityElement({
          subtitle: 'Fallback Name',
          actionTarget: 'https://www.linkedin.com/school/8/',
        }),
      ),
      createDecodeContext(index),
    )
    expect(education?.school).toBe('Sample Institute')
    expect(education?.schoolLogo).toBe('https://media.example.com/logo_100.png')
  })

  test('keeps only the start year of an ongoing programme', () => {
    const education = parser.parse(
      decodeElement(entityElement({ caption: 'Sep 2012 - Present' })),
      createDecodeContext(),
    )
    expect(education?.startYear).toBe(2012)
    expect(education?.endYear).toBeNull()
  })

  test('validate requires a school or degree', () => {
    const base = parser.parse(decodeElement(entityElement({})), createDecodeContext())
    expect(base && parser.validate(base)).toBe(false)
    expect(base && parser.validate({ ...base, degree: 'BSc' })).toBe(true)
    expect(base && parser.validate({ ...base, school: 'Example University' })).toBe(true)
  })
})
