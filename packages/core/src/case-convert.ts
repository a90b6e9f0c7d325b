/**
 * Case conversion for identity provider payloads
 *
 * OAuth endpoints answer in snake_case (`access_token`, `expires_in`).
 * TypeScript code uses camelCase per JS conventions.
 */

import type { CamelCasedPropertiesDeep } from 'type-fest'

/**
 * Convert a string from snake_case to camelCase
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())
}

/**
 * Recursively convert object keys from snake_case to camelCase
 */
export function snakeToCamelDeep<T>(obj: T): CamelCasedPropertiesDeep<T> {
  if (obj === null || obj === undefined) {
    return obj as CamelCasedPropertiesDeep<T>
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => snakeToCamelDeep(item)) as CamelCasedPropertiesDeep<T>
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      result[snakeToCamel(key)] = snakeToCamelDeep(value)
    }
    return result as CamelCasedPropertiesDeep<T>
  }

  return obj as CamelCasedPropertiesDeep<T>
}

export type { CamelCasedPropertiesDeep }
