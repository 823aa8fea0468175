import { fileURLToPath } from 'node:url'
import { COMPONENT_TYPES } from '../src/config/constants'
import type { RawRecord } from '../src/extraction/components/raw'

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url))
}

export function textElement(text: string): RawRecord {
  return { components: { textComponent: { text: { text } } } }
}

export function fixedListElement(children: RawRecord[]): RawRecord {
  return { components: { fixedListComponent: { components: children } } }
}

export function metadataElement(metadata: string): RawRecord {
  return { components: { entityComponent: { metadata: { text: metadata } } } }
}

export function pagedListReferenceElement(urn: string): RawRecord {
  return { components: { '*pagedListComponent': urn } }
}

export interface RawEntityFields {
  title?: string
  subtitle?: string
  caption?: string
  metadata?: string
  actionTarget?: string
  subComponents?: RawRecord[]
}

export function entityElement(fields: RawEntityFields): RawRecord {
  const entity: RawRecord = {}
  if (fields.title !== undefined) entity.titleV2 = { text: { text: fields.title } }
  if (fields.subtitle !== undefined) entity.subtitle = { text: fields.subtitle }
  if (fields.caption !== undefined) entity.caption = { text: fields.caption }
  if (fields.metadata !== undefined) entity.metadata = { text: fields.metadata }
  if (fields.actionTarget !== undefined) {
    entity.textActionTarget = fields.actionTarget
  }
  if (fields.subComponents !== undefined) {
    entity.subComponents = { components: fields.subComponents }
  }
  return { components: { entityComponent: entity } }
}

export function listRootEntity(
  entityUrn: string,
  elements: RawRecord[],
  total?: number,
): RawRecord {
  return {
    $type: COMPONENT_TYPES.PAGED_LIST,
    entityUrn,
    components: {
      elements,
      ...(total === undefined ? {} : { paging: { start: 0, total } }),
    },
  }
}

export function logoEntity(
  entityUrn: string,
  widths: number[],
  extra: RawRecord = {},
): RawRecord {
  return {
    entityUrn,
    ...extra,
    logoResolutionResult: {
      vectorImage: {
        rootUrl: 'https://media.example.com/',
        artifacts: widths.map((width) => ({
          width,
          fileIdentifyingUrlPathSegment: `logo_${width}.png`,
        })),
      },
    },
  }
}
