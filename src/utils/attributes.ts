/**
 * Attribute map utility functions for copying, building, and reading multi-valued attributes.
 * Provides a consistent interface for attribute map manipulation across services.
 */

import { AttributeMap, AttributeValue, AttributeValues, ReadonlyAttributeMap } from '../model/person'

// ============================================================================
// Types
// ============================================================================

/** Factory used to allocate the maps produced while merging. */
export type AttributeMapFactory = (expectedSize: number) => AttributeMap

// ============================================================================
// Attribute Map Construction
// ============================================================================

/**
 * Allocates an empty attribute map. `Map` keeps insertion order, which makes merge output deterministic.
 * `Map` takes no capacity, so the expected size is only a hint for alternative factories.
 */
export function newAttributeMap(_expectedSize: number): AttributeMap {
    return new Map()
}

/**
 * Copies an attribute map so that in-place edits on the copy never reach the source.
 * Keys keep their order, value lists are copied (their elements are not), and `null` lists stay `null`.
 *
 * @example
 * const copy = copyMutableAttributeMap(new Map([['mail', ['a@example.com']], ['phone', null]]))
 * copy.get('mail')?.push('b@example.com') // source is unchanged
 */
export function copyMutableAttributeMap(
    source: ReadonlyAttributeMap,
    createMap: AttributeMapFactory = newAttributeMap
): AttributeMap {
    const copy = createMap(source.size)

    for (const [key, values] of source) {
        copy.set(key, values === null ? null : [...values])
    }

    return copy
}

/**
 * Builds the one-entry seed query used to look up a single identity by name.
 */
export function toSeedMap(attribute: string, value: AttributeValue): AttributeMap {
    return new Map<string, AttributeValues>([[attribute, [value]]])
}

/**
 * Converts a single-valued query object to an attribute map.
 * Arrays become value lists, `null`/`undefined` become `null`, anything else a one-element list.
 *
 * @example
 * toMultivaluedMap({ username: 'alice', groups: ['eng', 'ops'], phone: null })
 * // Map { 'username' => ['alice'], 'groups' => ['eng', 'ops'], 'phone' => null }
 */
export function toMultivaluedMap(query: Record<string, unknown>): AttributeMap {
    const entries = Object.entries(query)
    const map = newAttributeMap(entries.length)

    for (const [key, value] of entries) {
        map.set(key, toAttributeValues(value))
    }

    return map
}

function toAttributeValues(value: unknown): AttributeValues {
    if (value === null || value === undefined) return null
    if (Array.isArray(value)) {
        return value.filter(isAttributeValue)
    }
    return isAttributeValue(value) ? [value] : null
}

/**
 * Checks that a value can be stored in an attribute list (anything but null, undefined, symbols and functions).
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
        case 'bigint':
            return true
        case 'object':
            return value !== null
        default:
            return false
    }
}

// ============================================================================
// Attribute Extraction
// ============================================================================

/**
 * Gets the first value of an attribute, or undefined if the attribute is missing or has no values.
 */
export function getFirstAttributeValue(attributes: ReadonlyAttributeMap, name: string): AttributeValue | undefined {
    const values = attributes.get(name)
    return values && values.length > 0 ? values[0] : undefined
}

/**
 * Converts an attribute map to a plain object, for logging and serialization.
 */
export function attributeMapToObject(attributes: ReadonlyAttributeMap): Record<string, AttributeValues> {
    return Object.fromEntries(attributes)
}
