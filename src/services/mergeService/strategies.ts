import { AttributeMap, ReadonlyAttributeMap } from '../../model/person'
import { AttributeMergeName } from '../../model/config'
import { InvalidArgumentError } from '../../utils/errors'
import { MergePersonAttributes, MergeStrategyOptions } from './types'

/**
 * Collects values from both sides: each incoming list is appended to the existing list for its key.
 * A key only present on the incoming side is added with a copy of its values (an empty list if they are null).
 * A null incoming list leaves an existing key as it is, including an existing null.
 */
export function listMerge(options: MergeStrategyOptions = {}): MergePersonAttributes {
    const distinctValues = options.distinctValues ?? false

    return (toModify: AttributeMap, toConsider: ReadonlyAttributeMap): AttributeMap => {
        for (const [key, incoming] of toConsider) {
            if (!incoming) {
                if (!toModify.has(key)) toModify.set(key, [])
                continue
            }

            let current = toModify.get(key)
            if (!current) {
                current = []
                toModify.set(key, current)
            }

            for (const value of incoming) {
                if (distinctValues && current.includes(value)) continue
                current.push(value)
            }
        }
        return toModify
    }
}

/**
 * Incoming attributes overwrite existing ones with the same key.
 */
export const replaceMerge: MergePersonAttributes = (toModify, toConsider) => {
    for (const [key, incoming] of toConsider) {
        toModify.set(key, incoming === null ? null : [...incoming])
    }
    return toModify
}

/**
 * Keeps what is already there; incoming attributes are only added for keys not yet present.
 */
export const firstMerge: MergePersonAttributes = (toModify, toConsider) => {
    for (const [key, incoming] of toConsider) {
        if (!toModify.has(key)) {
            toModify.set(key, incoming === null ? null : [...incoming])
        }
    }
    return toModify
}

/**
 * Resolves a configured strategy name to its merge function.
 *
 * @throws {InvalidArgumentError} If the name is not a known strategy
 */
export function createMergeStrategy(name: AttributeMergeName, options: MergeStrategyOptions = {}): MergePersonAttributes {
    switch (name) {
        case 'list':
            return listMerge(options)
        case 'first':
            return firstMerge
        case 'replace':
            return replaceMerge
        default:
            throw new InvalidArgumentError(`Unknown attribute merge strategy: ${String(name)}`)
    }
}
