import type { Education } from '../../models'
import { resolveOrganization } from '../components/entity-index'
import { extractEntityId } from '../components/identifiers'
import { type ComponentNode, entityOf } from '../components/nodes'
import { findText } from '../components/text-locator'
import { normalizeYearRange } from '../date-range'
import type { DecodeContext, SectionParser } from './types'
import { organizationName, textOrNull } from './utils'

export class EducationParser implements SectionParser<Education> {
  readonly sectionName = 'education'

  parse(element: ComponentNode, context: DecodeContext): Education | null {
    const entity = entityOf(element)
    if (!entity) {
      return null
    }

    const schoolUrl = textOrNull(entity.actionTarget)
    const schoolId = extractEntityId(schoolUrl, 'school')
    const organization = resolveOrganization(
      context.index,
      'school',
      schoolId,
      context.options.preferredLogoWidth,
    )
    const years = normalizeYearRange(entity.caption)

    // Positional: field of study first, then description/activities
    const [first, second] = entity.subComponents
    const fieldOfStudy = first ? textOrNull(findText(first)) : null
    const description = second ? textOrNull(findText(second)) : null

    return {
      school: organizationName(organization.name, entity.subtitle),
      schoolId,
      schoolUrl,
      schoolLogo: organization.logoUrl,
      degree: textOrNull(entity.title),
      fieldOfStudy,
      startYear: years.start,
      endYear: years.end,
      description,
    }
  }

  validate(item: Education): boolean {
    return !!item.school || !!item.degree
  }
}
