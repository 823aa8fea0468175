import { createLogger } from '../../utils/logger'
import { readListRoot } from '../components/list-root'
import {
  type ComponentNode,
  type EntityNode,
  directNodes,
  entityOf,
} from '../components/nodes'
import type { Reference } from '../components/references'
import type { DecodeContext } from './types'
import { notNull } from './utils'

const logger = createLogger('position-group')

/**
 * Reference to the nested list of roles when `entity` is an employer with
 * several positions. Only direct sub-components are inspected.
 */
export function findPositionGroupReference(
  entity: EntityNode,
  marker: string,
): Reference | undefined {
  for (const subComponent of entity.subComponents) {
    for (const node of directNodes(subComponent)) {
      if (
        node.kind === 'pagedList' &&
        node.list.kind === 'reference' &&
        node.list.urn.includes(marker)
      ) {
        return node.list
      }
    }
  }
  return undefined
}

export function isPositionGroup(
  element: ComponentNode,
  context: DecodeContext,
): boolean {
  const entity = entityOf(element)
  return (
    !!entity &&
    !!findPositionGroupReference(entity, context.options.positionGroupMarker)
  )
}

/**
 * Expands a position group into one record per nested role, in the nested
 * list's order. Returns null when `element` is not a group and an empty list
 * when the nested list is missing from the document.
 */
export function expandPositionGroup<T>(
  element: ComponentNode,
  context: DecodeContext,
  extract: (nested: ComponentNode, context: DecodeContext) => T | null,
): T[] | null {
  const entity = entityOf(element)
  if (!entity) return null

  const groupRef = findPositionGroupReference(
    entity,
    context.options.positionGroupMarker,
  )
  if (!groupRef) return null

  const nested = context.index.resolve(groupRef.urn)
  if (!nested) {
    logger.debug(`Unresolved position group ${groupRef.urn}, skipping`)
    return []
  }

  return readListRoot(nested)
    .elements.map((nestedElement) => extract(nestedElement, context))
    .filter(notNull)
}
