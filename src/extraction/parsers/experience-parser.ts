import type { DecoderOptions } from '../../config/options'
import type { Experience } from '../../models'
import { resolveOrganization } from '../components/entity-index'
import { extractEntityId } from '../components/identifiers'
import { type ComponentNode, type EntityNode, entityOf } from '../components/nodes'
import { findAllTexts } from '../components/text-locator'
import { containsMonthToken, normalizeDateRange } from '../date-range'
import { expandPositionGroup } from './position-group'
import type { DecodeContext, SectionParser } from './types'
import { organizationName, splitSkillList, textOrNull } from './utils'

export class ExperienceParser implements SectionParser<Experience> {
  readonly sectionName = 'experience'

  parse(element: ComponentNode, context: DecodeContext): Experience | null {
    const entity = entityOf(element)
    if (!entity) {
      return null
    }

    const { index, options } = context
    const companyUrl = textOrNull(entity.actionTarget)
    const companyId = extractEntityId(companyUrl, 'company')
    const organization = resolveOrganization(
      index,
      'company',
      companyId,
      options.preferredLogoWidth,
    )

    const { description, skills } = scanSubComponents(entity, options)
    const dates = normalizeDateRange(entity.caption)

    return {
      title: textOrNull(entity.title),
      // The index rarely carries a name; the subtitle is the usual source
      company: organizationName(organization.name, entity.subtitle),
      companyId,
      companyUrl,
      companyLogo: organization.logoUrl,
      startDate: dates.start,
      endDate: dates.end,
      isCurrent: dates.isCurrent,
      location: findLocation(entity),
      description,
      skills,
    }
  }

  expand(element: ComponentNode, context: DecodeContext): Experience[] | null {
    return expandPositionGroup(element, context, (nested, nestedContext) =>
      this.parse(nested, nestedContext),
    )
  }

  validate(item: Experience): boolean {
    return !!item.title || !!item.company || !!item.startDate
  }
}

/**
 * Description is the first long text that is not date-like; a text opening
 * with the skills prefix holds the skill list.
 */
function scanSubComponents(
  entity: EntityNode,
  options: DecoderOptions,
): { description: string | null; skills: string[] } {
  let description: string | null = null
  let skills: string[] = []

  for (const subComponent of entity.subComponents) {
    for (const text of findAllTexts(subComponent)) {
      if (!text) continue

      if (text.startsWith(options.skillsPrefix)) {
        skills = splitSkillList(text.slice(options.skillsPrefix.length))
      } else if (
        !description &&
        characterCount(text) > options.descriptionMinLength &&
        !containsMonthToken(text)
      ) {
        description = text
      }
    }
  }

  return { description, skills }
}

// Code points, so astral characters such as emoji count once
function characterCount(text: string): number {
  return [...text].length
}

/**
 * Location sits in a sibling entity's metadata. Date-like metadata is
 * ignored so a shifted layout does not turn a date into a place.
 */
function findLocation(entity: EntityNode): string | null {
  for (const subComponent of entity.subComponents) {
    const metadata = entityOf(subComponent)?.metadata
    if (metadata && !containsMonthToken(metadata)) {
      return metadata
    }
  }
  return null
}
