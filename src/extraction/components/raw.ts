/**
 * Narrowing helpers for untyped JSON values. Every read returns `undefined`
 * instead of throwing when the shape is not what was asked for.
 */

export type RawRecord = Record<string, unknown>

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asRecord(value: unknown): RawRecord | undefined {
  return isRecord(value) ? value : undefined
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

export function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

export function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

/**
 * Walks `keys` from `root`, stopping at the first non-object
 */
export function readPath(root: unknown, ...keys: string[]): unknown {
  let current: unknown = root
  for (const key of keys) {
    if (!isRecord(current)) return undefined
    current = current[key]
  }
  return current
}

/**
 * Reads a text-bearing wrapper. Accepts a bare string, `{ text: string }` and
 * `{ text: { text: string } }`.
 */
export function readTextValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (!isRecord(value)) return undefined

  const inner = value.text
  if (typeof inner === 'string') return inner
  if (isRecord(inner)) return readString(inner.text)
  return undefined
}
