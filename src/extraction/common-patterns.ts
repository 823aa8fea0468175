import { log } from '../utils/logger'

/**
 * Options for decoding list elements with standard error handling
 */
export interface ParseOptions {
  /** Type of item being decoded (for logging) */
  itemType: string

  /** Whether to log elements that produced no record */
  logSkipped?: boolean

  /** Optional callback for decoding errors */
  onError?: (error: unknown, index: number) => void
}

/**
 * Decodes every element, flattening the records each one yields. A failing
 * element is logged and reported through `onError`; the others still decode.
 *
 * @example
 * ```typescript
 * const experiences = parseItems(
 *   listRoot.elements,
 *   (element) => decodeExperience(element),
 *   { itemType: 'experience', logSkipped: true }
 * )
 * ```
 */
export function parseItems<E, T>(
  elements: E[],
  parser: (element: E, index: number) => T[],
  options: ParseOptions,
): T[] {
  const results: T[] = []

  elements.forEach((element, idx) => {
    try {
      const parsed = parser(element, idx)
      if (parsed.length === 0 && options.logSkipped) {
        log.skip(`Skipped ${options.itemType} at index ${idx}`)
      }
      results.push(...parsed)
    } catch (e) {
      log.debug(`Error parsing ${options.itemType} at index ${idx}: ${e}`)
      options.onError?.(e, idx)
    }
  })

  return results
}

/**
 * Deduplicates items based on a key extractor function.
 *
 * @returns Deduplicated array (first occurrence of each key is kept)
 *
 * @example
 * ```typescript
 * const uniqueSkills = deduplicateItems(skills, (skill) => skill.name)
 * ```
 */
export function deduplicateItems<T>(
  items: T[],
  keyExtractor: (item: T) => string,
): T[] {
  const seen = new Set<string>()
  return items.filter((item) => {
    const key = keyExtractor(item)
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}
