/**
 * Profile Components Decoding Constants
 *
 * Centralized vocabulary for the component-tree responses: type tags, URN
 * prefixes, thresholds and text patterns. When the upstream payloads change
 * shape, update values here.
 */

export const COMPONENT_TYPES = {
  PAGED_LIST:
    'com.linkedin.voyager.dash.identity.profile.tetris.PagedListComponent',
  ENDORSED_SKILL: 'com.linkedin.voyager.dash.identity.profile.EndorsedSkill',
} as const

/**
 * Keys of the `components` map inside a tree element
 */
export const COMPONENT_KEYS = {
  ENTITY: 'entityComponent',
  TEXT: 'textComponent',
  FIXED_LIST: 'fixedListComponent',
  PAGED_LIST: 'pagedListComponent',
  ACTION: 'actionComponent',
} as const

export const URN_PREFIXES = {
  company: 'urn:li:fsd_company:',
  school: 'urn:li:fsd_school:',
} as const

export type OrganizationKind = keyof typeof URN_PREFIXES

export const DECODING_CONSTANTS = {
  // Text longer than this is a description candidate
  DESCRIPTION_MIN_LENGTH: 50,
  PREFERRED_LOGO_WIDTH: 200,
  SKILLS_PREFIX: 'Skills:',
  // Separates skills, and a name from its employment-type suffix
  MIDDLE_DOT: '·',
  // Nested list-root URNs of multi-role employers carry this token
  POSITION_GROUP_MARKER: 'profilePositionGroup',
  // Share of incomplete items above which a section is degraded
  DEGRADED_INCOMPLETE_RATIO: 0.5,
} as const

/**
 * Date parsing patterns and keywords
 */
export const DATE_PATTERNS = {
  CURRENT_KEYWORDS: ['present', 'current'] as const,
  CURRENT_REGEX: /present|current/i,

  // "Jan 2020 - Present · 3 yrs": everything after the dot is a duration
  DURATION_SEPARATOR: '·',
  RANGE_SEPARATOR_REGEX: /[-–]/,

  MONTH_YEAR_REGEX: /^([A-Za-z]+)\s+(\d{4})/,
  YEAR_REGEX: /\d{4}/,

  // Case-sensitive substrings that mark text as date-like
  MONTH_TOKENS: [
    'Jan',
    'Feb',
    'Mar',
    'Apr',
    'May',
    'Jun',
    'Jul',
    'Aug',
    'Sep',
    'Oct',
    'Nov',
    'Dec',
  ] as const,

  MONTH_NAMES: [
    'january',
    'february',
    'march',
    'april',
    'may',
    'june',
    'july',
    'august',
    'september',
    'october',
    'november',
    'december',
  ] as const,
} as const

export const SEARCH_PATTERNS = {
  MUTUAL_CONNECTIONS_REGEX: /(\d+)\s+mutual\s+connection/i,
  CONNECTION_DEGREE_REGEX: /(\d+)(st|nd|rd|th)/,
  PUBLIC_IDENTIFIER_REGEX: /\/in\/([^?]+)/,
  MEMBER_ID_REGEX: /member:(\d+)/,
  PREMIUM_ICON_TOKEN: 'PREMIUM',
  OUT_OF_NETWORK: 'OUT_OF_NETWORK',
  // Tried in order, first match wins
  COMPANY_FROM_TITLE_REGEXES: [
    /\s*@\s+(.+)$/,
    /\s+at\s+(.+)$/,
    /\s+At\s+(.+)$/,
    /\s+AT\s+(.+)$/,
  ] as const,
} as const
