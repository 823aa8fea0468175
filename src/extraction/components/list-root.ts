import { COMPONENT_TYPES } from '../../config/constants'
import { type ComponentNode, decodeElement, readListElements } from './nodes'
import { type RawRecord, isRecord, readNumber, readPath, readString } from './raw'

/**
 * A paged list of tree elements: the record set of one section
 */
export interface ListRoot {
  /** Null for a root carried without a URN */
  entityUrn: string | null
  elements: ComponentNode[]
  /** Total declared by the paging metadata, 0 when absent */
  total: number
}

export function readListRoot(entity: RawRecord): ListRoot {
  return {
    entityUrn: readString(entity.entityUrn) ?? null,
    elements: readListElements(entity).map(decodeElement),
    total: readNumber(readPath(entity, 'components', 'paging', 'total')) ?? 0,
  }
}

function isListRootRecord(value: unknown): value is RawRecord {
  return isRecord(value) && value.$type === COMPONENT_TYPES.PAGED_LIST
}

/**
 * Every list root of the document's `included` list, in document order.
 * Roots are matched by type tag alone, so one without a URN still counts.
 */
export function findListRoots(included: unknown[]): ListRoot[] {
  return included.filter(isListRootRecord).map(readListRoot)
}

/**
 * The list root holding the section's records. Nested roots used by position
 * groups are smaller than the outer one, so the root with most elements wins,
 * then the larger declared total, then the earlier one.
 */
export function selectListRoot(included: unknown[]): ListRoot | null {
  return pickPrimaryListRoot(findListRoots(included))
}

export function pickPrimaryListRoot(roots: ListRoot[]): ListRoot | null {
  let selected: ListRoot | null = null

  for (const candidate of roots) {
    if (!selected || compareListRoots(candidate, selected) > 0) {
      selected = candidate
    }
  }

  return selected
}

function compareListRoots(a: ListRoot, b: ListRoot): number {
  if (a.elements.length !== b.elements.length) {
    return a.elements.length - b.elements.length
  }
  return a.total - b.total
}
