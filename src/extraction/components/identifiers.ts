import { type OrganizationKind, SEARCH_PATTERNS } from '../../config/constants'

const ENTITY_ID_PATTERNS: Record<OrganizationKind, RegExp> = {
  company: /\/company\/(\d+)\/?/,
  school: /\/school\/(\d+)\/?/,
}

/**
 * Numeric organization id from a URL such as
 * `https://www.linkedin.com/company/143650/`
 */
export function extractEntityId(
  url: string | null | undefined,
  kind: OrganizationKind,
): string | null {
  if (!url) return null
  return ENTITY_ID_PATTERNS[kind].exec(url)?.[1] ?? null
}

export function extractCompanyId(url: string | null | undefined): string | null {
  return extractEntityId(url, 'company')
}

export function extractSchoolId(url: string | null | undefined): string | null {
  return extractEntityId(url, 'school')
}

/**
 * Vanity slug of a profile URL: `/in/jane-doe-1a2b3c?mini=…` → `jane-doe-1a2b3c`
 */
export function extractPublicIdentifier(
  profileUrl: string | null | undefined,
): string | null {
  if (!profileUrl) return null
  return SEARCH_PATTERNS.PUBLIC_IDENTIFIER_REGEX.exec(profileUrl)?.[1] ?? null
}

export function extractMemberIdFromUrn(
  trackingUrn: string | null | undefined,
): number | null {
  if (!trackingUrn) return null
  const digits = SEARCH_PATTERNS.MEMBER_ID_REGEX.exec(trackingUrn)?.[1]
  return digits ? Number.parseInt(digits, 10) : null
}

/**
 * Inner URN of a compound one:
 * `urn:li:fsd_entityResultViewModel:(urn:li:fsd_profile:ABC,SEARCH_SRP,DEFAULT)`
 * → `urn:li:fsd_profile:ABC`
 */
export function getUrnFromRawUpdate(
  raw: string | null | undefined,
): string | null {
  if (!raw) return null
  const open = raw.indexOf('(')
  if (open === -1) return null
  const inner = raw.slice(open + 1).split(',')[0]?.trim()
  return inner || null
}

/**
 * Id segment of a URN: `urn:li:fsd_profile:ABC` → `ABC`
 */
export function getIdFromUrn(urn: string | null | undefined): string | null {
  if (!urn) return null
  return urn.split(':')[3] || null
}
