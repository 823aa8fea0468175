export { EducationParser } from './education-parser'
export { ExperienceParser } from './experience-parser'
export {
  expandPositionGroup,
  findPositionGroupReference,
  isPositionGroup,
} from './position-group'
export {
  extractCompanyFromJobTitle,
  extractConnectionDegree,
  extractImageUrl,
  extractMemberId,
  extractMutualConnections,
  extractPremiumStatus,
  extractRingStatus,
  parseSearchResult,
} from './search-result-parser'
export { SkillParser, skillKey } from './skill-parser'
export type { DecodeContext, SectionParser } from './types'
export { createDecodeContext } from './types'
export {
  cleanOrganizationName,
  organizationName,
  splitSkillList,
} from './utils'
