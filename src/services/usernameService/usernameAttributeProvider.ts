import { ReadonlyAttributeMap } from '../../model/person'
import { getFirstAttributeValue } from '../../utils/attributes'

/**
 * Tells lookups which attribute carries the username.
 */
export interface UsernameAttributeProvider {
    /** Name of the username attribute used in seed queries */
    getUsernameAttribute(): string
    /** The username a query asks for, or undefined when it does not name exactly one user */
    getUsernameFromQuery(query: ReadonlyAttributeMap): string | undefined
}

const WILDCARD = '*'

/**
 * Provider backed by a fixed attribute name, "username" unless configured otherwise.
 */
export class SimpleUsernameAttributeProvider implements UsernameAttributeProvider {
    constructor(private readonly usernameAttribute: string = 'username') {}

    getUsernameAttribute(): string {
        return this.usernameAttribute
    }

    /**
     * Reads the first value of the username attribute. Blank values and wildcard patterns yield undefined.
     */
    getUsernameFromQuery(query: ReadonlyAttributeMap): string | undefined {
        const value = getFirstAttributeValue(query, this.usernameAttribute)
        if (value === undefined) return undefined

        const username = String(value).trim()
        if (username.length === 0 || username.includes(WILDCARD)) {
            return undefined
        }
        return username
    }
}
