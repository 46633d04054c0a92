/**
 * Collection helpers shared by the sources.
 */

import { IncorrectResultSizeError } from './errors'

/**
 * Returns the only element of a collection, or undefined when it is empty.
 *
 * @throws {IncorrectResultSizeError} If the collection holds more than one element
 */
export function singleResult<T>(items: Iterable<T>): T | undefined {
    const values = Array.from(items)
    if (values.length > 1) {
        throw new IncorrectResultSizeError(
            `Incorrect result size: expected 1, actual ${values.length}`,
            1,
            values.length
        )
    }
    return values[0]
}

