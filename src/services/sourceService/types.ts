import { PersonAttributes, PersonAttributesSet, ReadonlyAttributeMap } from '../../model/person'

// ============================================================================
// Type Definitions — Source Service
// ============================================================================

/**
 * A backing store of person attributes (a directory, a database, a static list).
 * Lookups are asynchronous since real stores do I/O.
 */
export interface PersonAttributeSource {
    /**
     * Finds every person matching a multi-valued query.
     */
    getPeopleWithMultivaluedAttributes(query: ReadonlyAttributeMap): Promise<PersonAttributesSet>

    /**
     * Finds every person matching a single-valued query.
     */
    getPeople(query: Record<string, unknown>): Promise<PersonAttributesSet>

    /**
     * Finds the one person with the given username.
     */
    getPerson(uid: string): Promise<PersonAttributes | undefined>

    /**
     * Names of the attributes this source can return, or undefined if unknown.
     */
    getPossibleUserAttributeNames(): Set<string> | undefined

    /**
     * Names of the attributes this source can be queried by, or undefined if unknown.
     */
    getAvailableQueryAttributes(): Set<string> | undefined
}
