import { type RawRecord, readString } from './raw'

/**
 * Keys written as `*name` hold the URN of a node listed elsewhere in the
 * document instead of the node itself.
 */
export const REFERENCE_PREFIX = '*'

export interface InlineValue<T> {
  kind: 'value'
  value: T
}

export interface Reference {
  kind: 'reference'
  urn: string
}

export type Field<T> = InlineValue<T> | Reference

export function reference(urn: string): Reference {
  return { kind: 'reference', urn }
}

export function inline<T>(value: T): InlineValue<T> {
  return { kind: 'value', value }
}

/**
 * Splits a raw key into its field name and whether it is a reference marker
 */
export function parseFieldKey(key: string): { name: string; isReference: boolean } {
  return key.startsWith(REFERENCE_PREFIX)
    ? { name: key.slice(REFERENCE_PREFIX.length), isReference: true }
    : { name: key, isReference: false }
}

/**
 * First `*`-prefixed key of `record` holding a URN string
 */
export function firstReference(record: RawRecord): Reference | undefined {
  for (const [key, value] of Object.entries(record)) {
    const urn = readString(value)
    if (urn && parseFieldKey(key).isReference) return reference(urn)
  }
  return undefined
}
