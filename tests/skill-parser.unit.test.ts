import { describe, expect, test } from 'vitest'
import { COMPONENT_TYPES } from '../src/config/constants'
import { EntityIndex } from '../src/extraction/components/entity-index'
import { decodeElement } from '../src/extraction/components/nodes'
import { SkillParser, skillKey } from '../src/extraction/parsers/skill-parser'
import { createDecodeContext } from '../src/extraction/parsers/types'
import { entityElement, textElement } from './helpers'

const ENDORSEMENT_URN = 'urn:li:fsd_endorsedSkill:(ACoAAtest,4)'

function endorseElement(urn: string) {
  return {
    components: {
      actionComponent: {
        action: { endorsedSkillAction: { '*endorsedSkill': urn } },
      },
    },
  }
}

const parser = new SkillParser()

describe('SkillParser', () => {
  test('reads the endorsement the action references', () => {
    const index = EntityIndex.build([
      {
        $type: COMPONENT_TYPES.ENDORSED_SKILL,
        entityUrn: ENDORSEMENT_URN,
        endorsementCount: 7,
        endorsedByViewer: false,
      },
    ])
    const skill = parser.parse(
      decodeElement(
        entityElement({
          title: ' GraphQL ',
          subComponents: [endorseElement(ENDORSEMENT_URN)],
        }),
      ),
      createDecodeContext(index),
    )
    expect(skill).toEqual({
      name: 'GraphQL',
      entityUrn: ENDORSEMENT_URN,
      endorsementCount: 7,
      endorsedByViewer: false,
    })
  })

  test('ignores referenced entities of another type', () => {
    const index = EntityIndex.build([
      {
        $type: 'com.linkedin.voyager.dash.organization.Company',
        entityUrn: ENDORSEMENT_URN,
        endorsementCount: 99,
      },
    ])
    const skill = parser.parse(
      decodeElement(
        entityElement({ title: 'Rust', subComponents: [endorseElement(ENDORSEMENT_URN)] }),
      ),
      createDecodeContext(index),
    )
    expect(skill?.endorsementCount).toBe(0)
    expect(skill?.entityUrn).toBe(ENDORSEMENT_URN)
  })

  test('defaults the counts without an endorsement action', () => {
    expect(
      parser.parse(decodeElement(entityElement({ title: 'Go' })), createDecodeContext()),
    ).toEqual({
      name: 'Go',
      entityUrn: null,
      endorsementCount: 0,
      endorsedByViewer: false,
    })
  })

  test('returns null without a name', () => {
    const context = createDecodeContext()
    expect(parser.parse(decodeElement(entityElement({ title: '  ' })), context)).toBeNull()
    expect(parser.parse(decodeElement(textElement('Go')), context)).toBeNull()
  })

  test('skillKey prefers the endorsement URN', () => {
    expect(
      skillKey({ name: 'Go', entityUrn: ENDORSEMENT_URN, endorsementCount: 0, endorsedByViewer: false }),
    ).toBe(ENDORSEMENT_URN)
    expect(
      skillKey({ name: 'Go', entityUrn: null, endorsementCount: 0, endorsedByViewer: false }),
    ).toBe('go')
  })
})
