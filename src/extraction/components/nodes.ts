import { COMPONENT_KEYS } from '../../config/constants'
import {
  asArray,
  asRecord,
  isRecord,
  readPath,
  readString,
  readTextValue,
} from './raw'
import {
  type Field,
  type Reference,
  firstReference,
  inline,
  parseFieldKey,
  reference,
} from './references'

export interface TextNode {
  kind: 'text'
  text: string
}

export interface EntityNode {
  kind: 'entity'
  title?: string
  subtitle?: string
  /** Usually the date range, e.g. "Jan 2020 - Present · 3 yrs" */
  caption?: string
  metadata?: string
  /** Organization URL the entity links to */
  actionTarget?: string
  subComponents: ComponentNode[]
}

export interface FixedListNode {
  kind: 'fixedList'
  children: ComponentNode[]
}

export interface PagedListNode {
  kind: 'pagedList'
  list: Field<ComponentNode[]>
}

export interface ActionNode {
  kind: 'action'
  actionType?: string
  target?: Reference
}

/**
 * Any wrapper kind without dedicated handling. Keeps the elements nested
 * under it so their text stays reachable.
 */
export interface ContainerNode {
  kind: 'container'
  componentType: string
  children: ComponentNode[]
}

export interface EmptyNode {
  kind: 'empty'
}

export type ComponentNode =
  | TextNode
  | EntityNode
  | FixedListNode
  | PagedListNode
  | ActionNode
  | ContainerNode
  | EmptyNode

/** Component type of the container built when one element holds several components */
export const MIXED_COMPONENT_TYPE = 'components'

const EMPTY_NODE: EmptyNode = { kind: 'empty' }

function isElement(value: unknown): boolean {
  return isRecord(value) && isRecord(value.components)
}

/**
 * Decodes one raw tree element (`{ components: { <kind>: ... } }`) into a
 * node variant. Never throws: unknown shapes decode to `empty` or `container`.
 */
export function decodeElement(raw: unknown): ComponentNode {
  const components = asRecord(readPath(raw, 'components'))
  if (!components) return EMPTY_NODE

  const nodes: ComponentNode[] = []
  for (const [key, value] of Object.entries(components)) {
    if (value === null || value === undefined) continue
    const node = decodeComponent(key, value)
    if (node) nodes.push(node)
  }

  if (nodes.length === 0) return EMPTY_NODE
  if (nodes.length === 1 && nodes[0]) return nodes[0]
  return {
    kind: 'container',
    componentType: MIXED_COMPONENT_TYPE,
    children: nodes,
  }
}

export function decodeElements(raw: unknown): ComponentNode[] {
  return asArray(raw).map(decodeElement)
}

/**
 * Elements of a paged list, whether it comes from `included` (elements under
 * `components`) or sits inline in the tree
 */
export function readListElements(raw: unknown): unknown[] {
  const nested = readPath(raw, 'components', 'elements')
  return Array.isArray(nested) ? nested : asArray(readPath(raw, 'elements'))
}

function decodeComponent(key: string, value: unknown): ComponentNode | undefined {
  const { name, isReference } = parseFieldKey(key)

  if (isReference) {
    const urn = readString(value)
    if (urn && name === COMPONENT_KEYS.PAGED_LIST) {
      return { kind: 'pagedList', list: reference(urn) }
    }
    return undefined
  }

  switch (name) {
    case COMPONENT_KEYS.ENTITY:
      return decodeEntity(value)
    case COMPONENT_KEYS.TEXT: {
      const text = readTextValue(value)
      return text === undefined ? undefined : { kind: 'text', text }
    }
    case COMPONENT_KEYS.FIXED_LIST:
      return {
        kind: 'fixedList',
        children: decodeElements(readPath(value, 'components')),
      }
    case COMPONENT_KEYS.PAGED_LIST:
      return {
        kind: 'pagedList',
        list: inline(readListElements(value).map(decodeElement)),
      }
    case COMPONENT_KEYS.ACTION:
      return decodeAction(value)
    default:
      return isRecord(value)
        ? {
            kind: 'container',
            componentType: name,
            children: collectNestedElements(value),
          }
        : undefined
  }
}

function decodeEntity(value: unknown): EntityNode | undefined {
  const entity = asRecord(value)
  if (!entity) return undefined

  return {
    kind: 'entity',
    title: readTextValue(entity.titleV2) ?? readTextValue(entity.title),
    subtitle: readTextValue(entity.subtitle),
    caption: readTextValue(entity.caption),
    metadata: readTextValue(entity.metadata),
    actionTarget: readString(entity.textActionTarget),
    subComponents: decodeElements(
      readPath(entity, 'subComponents', 'components'),
    ),
  }
}

function decodeAction(value: unknown): ActionNode {
  const action = asRecord(readPath(value, 'action'))
  if (!action) return { kind: 'action' }

  for (const [actionType, payload] of Object.entries(action)) {
    const payloadRecord = asRecord(payload)
    const target = payloadRecord ? firstReference(payloadRecord) : undefined
    if (target) return { kind: 'action', actionType, target }
  }
  return { kind: 'action' }
}

function collectNestedElements(record: Record<string, unknown>): ComponentNode[] {
  const children: ComponentNode[] = []

  for (const nested of Object.values(record)) {
    if (Array.isArray(nested)) {
      for (const item of nested) {
        if (isElement(item)) children.push(decodeElement(item))
        else if (isRecord(item)) children.push(...collectNestedElements(item))
      }
    } else if (isElement(nested)) {
      children.push(decodeElement(nested))
    } else if (isRecord(nested)) {
      children.push(...collectNestedElements(nested))
    }
  }

  return children
}

/**
 * The nodes one element stands for: the parts of a mixed container, or the
 * node itself
 */
export function directNodes(node: ComponentNode): ComponentNode[] {
  return node.kind === 'container' &&
    node.componentType === MIXED_COMPONENT_TYPE
    ? node.children
    : [node]
}

/**
 * Entity carried by an element, looking through a mixed container
 */
export function entityOf(node: ComponentNode): EntityNode | undefined {
  return directNodes(node).find(
    (candidate): candidate is EntityNode => candidate.kind === 'entity',
  )
}

/**
 * Children of a node in document order. References, actions, text and
 * empty nodes have none.
 */
export function childNodes(node: ComponentNode): ComponentNode[] {
  switch (node.kind) {
    case 'entity':
      return node.subComponents
    case 'fixedList':
    case 'container':
      return node.children
    case 'pagedList':
      return node.list.kind === 'value' ? node.list.value : []
    case 'text':
    case 'action':
    case 'empty':
      return []
  }
}
