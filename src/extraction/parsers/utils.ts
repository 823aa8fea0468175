import { DECODING_CONSTANTS } from '../../config/constants'

/**
 * Drops an employment-type suffix: "Acme Inc. · Full-time" → "Acme Inc.".
 * Names without a suffix come back unchanged.
 */
export function cleanOrganizationName(name: string): string {
  if (!name.includes(DECODING_CONSTANTS.MIDDLE_DOT)) return name
  return name.split(DECODING_CONSTANTS.MIDDLE_DOT)[0]?.trim() ?? ''
}

/**
 * Organization name from the entity index, else from the subtitle, without
 * its employment-type suffix
 */
export function organizationName(
  indexedName: string | null,
  subtitle: string | undefined,
): string | null {
  const raw = indexedName ?? textOrNull(subtitle)
  return raw === null ? null : textOrNull(cleanOrganizationName(raw))
}

/**
 * "React · TypeScript · Node.js" → ["React", "TypeScript", "Node.js"]
 */
export function splitSkillList(text: string): string[] {
  return text
    .split(DECODING_CONSTANTS.MIDDLE_DOT)
    .map((skill) => skill.trim())
    .filter(Boolean)
}

export function textOrNull(text: string | null | undefined): string | null {
  return text ? text : null
}

export function notNull<T>(value: T | null): value is T {
  return value !== null
}
