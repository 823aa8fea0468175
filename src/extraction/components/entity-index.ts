import { z } from 'zod'
import {
  DECODING_CONSTANTS,
  type OrganizationKind,
  URN_PREFIXES,
} from '../../config/constants'
import { isRecord, readPath, readString } from './raw'

/**
 * A flat record from a document's `included` list, addressed by URN
 */
export interface AuxiliaryEntity {
  $type?: string
  entityUrn: string
  [key: string]: unknown
}

const VectorImageSchema = z.object({
  rootUrl: z.string().catch(''),
  artifacts: z
    .array(
      z.object({
        width: z.number().optional().catch(undefined),
        fileIdentifyingUrlPathSegment: z.string().catch(''),
      }),
    )
    .catch([]),
})

export type VectorImage = z.infer<typeof VectorImageSchema>

function isAuxiliaryEntity(value: unknown): value is AuxiliaryEntity {
  return isRecord(value) && typeof value.entityUrn === 'string'
}

/**
 * URN → entity lookup over a document's `included` list. Built once per
 * decode and read-only afterwards.
 */
export class EntityIndex {
  private readonly byUrn: Map<string, AuxiliaryEntity>

  private constructor(entities: AuxiliaryEntity[]) {
    // Later duplicates overwrite earlier ones
    this.byUrn = new Map(entities.map((entity) => [entity.entityUrn, entity]))
  }

  static build(included: unknown[]): EntityIndex {
    return new EntityIndex(included.filter(isAuxiliaryEntity))
  }

  static empty(): EntityIndex {
    return new EntityIndex([])
  }

  get size(): number {
    return this.byUrn.size
  }

  resolve(urn: string | null | undefined): AuxiliaryEntity | undefined {
    return urn ? this.byUrn.get(urn) : undefined
  }
}

export function readVectorImage(value: unknown): VectorImage | null {
  if (!isRecord(value)) return null
  const result = VectorImageSchema.safeParse(value)
  return result.success ? result.data : null
}

/**
 * Full URL of the artifact with `preferredWidth`, else of the first artifact
 */
export function vectorImageUrl(
  image: VectorImage,
  preferredWidth?: number,
): string | null {
  const preferred =
    preferredWidth === undefined
      ? undefined
      : image.artifacts.find((artifact) => artifact.width === preferredWidth)
  const artifact = preferred ?? image.artifacts[0]
  return artifact
    ? image.rootUrl + artifact.fileIdentifyingUrlPathSegment
    : null
}

export function resolveLogoUrl(
  entity: AuxiliaryEntity,
  preferredWidth: number = DECODING_CONSTANTS.PREFERRED_LOGO_WIDTH,
): string | null {
  const image = readVectorImage(
    readPath(entity, 'logoResolutionResult', 'vectorImage'),
  )
  return image ? vectorImageUrl(image, preferredWidth) : null
}

export function organizationUrn(kind: OrganizationKind, id: string): string {
  return `${URN_PREFIXES[kind]}${id}`
}

export interface OrganizationData {
  name: string | null
  logoUrl: string | null
}

/**
 * Name and logo of a company or school. Most responses carry only the
 * logo, so a null name is the common case.
 */
export function resolveOrganization(
  index: EntityIndex,
  kind: OrganizationKind,
  id: string | null,
  preferredLogoWidth?: number,
): OrganizationData {
  const entity = id ? index.resolve(organizationUrn(kind, id)) : undefined
  if (!entity) return { name: null, logoUrl: null }

  return {
    name: readString(entity.name) || null,
    logoUrl: resolveLogoUrl(entity, preferredLogoWidth),
  }
}
