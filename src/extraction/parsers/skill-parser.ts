import { COMPONENT_TYPES } from '../../config/constants'
import type { Skill } from '../../models'
import {
  type ComponentNode,
  type EntityNode,
  directNodes,
  entityOf,
} from '../components/nodes'
import { readNumber } from '../components/raw'
import type { Reference } from '../components/references'
import type { DecodeContext, SectionParser } from './types'

export class SkillParser implements SectionParser<Skill> {
  readonly sectionName = 'skills'

  parse(element: ComponentNode, context: DecodeContext): Skill | null {
    const entity = entityOf(element)
    const name = entity?.title?.trim()
    if (!entity || !name) {
      return null
    }

    const endorsementRef = findEndorsementReference(entity)
    const endorsed = context.index.resolve(endorsementRef?.urn)
    const endorsement =
      endorsed?.$type === COMPONENT_TYPES.ENDORSED_SKILL ? endorsed : undefined

    return {
      name,
      entityUrn: endorsementRef?.urn ?? null,
      endorsementCount: readNumber(endorsement?.endorsementCount) ?? 0,
      endorsedByViewer: endorsement?.endorsedByViewer === true,
    }
  }

  validate(item: Skill): boolean {
    return item.name.length > 0
  }
}

function findEndorsementReference(entity: EntityNode): Reference | undefined {
  for (const subComponent of entity.subComponents) {
    for (const node of directNodes(subComponent)) {
      if (node.kind === 'action' && node.target) return node.target
    }
  }
  return undefined
}

export function skillKey(skill: Skill): string {
  return skill.entityUrn ?? skill.name.toLowerCase()
}
