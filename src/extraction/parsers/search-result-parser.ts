import { SEARCH_PATTERNS } from '../../config/constants'
import { InvalidSearchHitError } from '../../exceptions'
import type { MutualConnections, RingStatus, SearchResult } from '../../models'
import { readVectorImage } from '../components/entity-index'
import {
  extractMemberIdFromUrn,
  extractPublicIdentifier,
  getIdFromUrn,
  getUrnFromRawUpdate,
} from '../components/identifiers'
import {
  type RawRecord,
  asArray,
  asRecord,
  isRecord,
  readPath,
  readString,
  readTextValue,
} from '../components/raw'

/**
 * "55 mutual connections" → 55, with the insight's navigation URL
 */
export function extractMutualConnections(item: RawRecord): MutualConnections {
  const [firstInsight] = asArray(item.insightsResolutionResults)
  const insight = asRecord(readPath(firstInsight, 'simpleInsight'))
  if (!insight) {
    return { mutualConnectionsCount: 0, mutualConnectionsUrl: null }
  }

  const title = readTextValue(insight.title) ?? ''
  const count = SEARCH_PATTERNS.MUTUAL_CONNECTIONS_REGEX.exec(title)?.[1]

  return {
    mutualConnectionsCount: count ? Number.parseInt(count, 10) : 0,
    mutualConnectionsUrl: readString(insight.navigationUrl) ?? null,
  }
}

/**
 * "• 2nd" → "2nd"
 */
export function extractConnectionDegree(item: RawRecord): string | null {
  const badgeText = readTextValue(item.badgeText) ?? ''
  return SEARCH_PATTERNS.CONNECTION_DEGREE_REGEX.exec(badgeText)?.[0] ?? null
}

export function extractPremiumStatus(item: RawRecord): boolean {
  const [firstAttribute] = asArray(readPath(item, 'badgeIcon', 'attributes'))
  const icon = readString(readPath(firstAttribute, 'detailData', 'icon'))
  return !!icon && icon.includes(SEARCH_PATTERNS.PREMIUM_ICON_TOKEN)
}

/**
 * Company named in a headline: "Engineer @ Acme", "Recruiter at Acme"
 */
export function extractCompanyFromJobTitle(
  jobTitle: string | null | undefined,
): string | null {
  if (!jobTitle) return null

  for (const pattern of SEARCH_PATTERNS.COMPANY_FROM_TITLE_REGEXES) {
    const company = pattern.exec(jobTitle)?.[1]?.trim()
    if (company) return company
  }
  return null
}

export function extractRingStatus(item: RawRecord): RingStatus {
  const [firstAttribute] = asArray(readPath(item, 'image', 'attributes'))
  const ringStatus =
    readString(
      readPath(
        firstAttribute,
        'detailData',
        'nonEntityProfilePicture',
        'ringStatus',
      ),
    ) ?? null

  return {
    profileRingStatus: ringStatus,
    isHiring: ringStatus === 'HIRING',
    isOpenToWork: ringStatus === 'OPEN_TO_WORK',
  }
}

export function extractMemberId(item: RawRecord): number | null {
  return extractMemberIdFromUrn(readString(item.trackingUrn))
}

/**
 * Path segment of the first profile picture artifact of the first attribute
 * that has one. The segment is returned as is, without the image's root URL.
 */
export function extractImageUrl(item: RawRecord): string | null {
  for (const attribute of asArray(readPath(item, 'image', 'attributes'))) {
    const image = readVectorImage(
      readPath(
        attribute,
        'detailData',
        'nonEntityProfilePicture',
        'vectorImage',
      ),
    )
    const [artifact] = image?.artifacts ?? []
    if (artifact) {
      return artifact.fileIdentifyingUrlPathSegment || null
    }
  }
  return null
}

/**
 * Composes every field extractor into one record. Missing sub-structures
 * give null, 0 or false.
 * @throws InvalidSearchHitError when the hit is not an object
 */
export function parseSearchResult(item: unknown): SearchResult {
  if (!isRecord(item)) {
    const received =
      item === null ? 'null' : Array.isArray(item) ? 'array' : typeof item
    throw new InvalidSearchHitError(
      `Invalid search result item: expected object, got ${received}`,
    )
  }

  const jobTitle = readTextValue(item.primarySubtitle) ?? null
  const profileUrl =
    readString(readPath(item, 'navigationContext', 'url')) ?? null

  return {
    urnId: getIdFromUrn(getUrnFromRawUpdate(readString(item.entityUrn))),
    name: readTextValue(item.title) ?? null,
    jobTitle,
    location: readTextValue(item.secondarySubtitle) ?? null,
    profileUrl,
    imageUrl: extractImageUrl(item),
    distance:
      readString(readPath(item, 'entityCustomTrackingInfo', 'memberDistance')) ??
      null,
    publicIdentifier: extractPublicIdentifier(profileUrl),
    connectionDegree: extractConnectionDegree(item),
    ...extractMutualConnections(item),
    isPremium: extractPremiumStatus(item),
    company: extractCompanyFromJobTitle(jobTitle),
    memberId: extractMemberId(item),
    ...extractRingStatus(item),
  }
}
