import { AttributeMap, NamedPerson, PersonAttributes, PersonAttributesSet, ReadonlyAttributeMap } from '../../model/person'
import { toMultivaluedMap, toSeedMap } from '../../utils/attributes'
import { assert } from '../../utils/assert'
import { singleResult } from '../../utils/collections'
import { LogService } from '../logService'
import { SimpleUsernameAttributeProvider, UsernameAttributeProvider } from '../usernameService'
import { PersonAttributeSource } from './types'

// ============================================================================
// DefaultAttributeSource Class
// ============================================================================

/**
 * Base source that answers single-person and single-valued lookups by delegating to
 * {@link getPeopleWithMultivaluedAttributes}. Subclasses only implement the multi-valued query.
 *
 * A single-person lookup builds a seed query `{ <username attribute>: [uid] }`, where the
 * username attribute comes from the configured {@link UsernameAttributeProvider}.
 */
export abstract class DefaultAttributeSource implements PersonAttributeSource {
    private usernames: UsernameAttributeProvider

    /**
     * @param log - Logger instance
     * @param usernameAttributeProvider - Provider of the username attribute, "username" by default
     */
    constructor(
        protected log: LogService,
        usernameAttributeProvider: UsernameAttributeProvider = new SimpleUsernameAttributeProvider()
    ) {
        this.usernames = usernameAttributeProvider
    }

    // ------------------------------------------------------------------------
    // Public Properties/Getters
    // ------------------------------------------------------------------------

    public get usernameAttributeProvider(): UsernameAttributeProvider {
        return this.usernames
    }

    public set usernameAttributeProvider(provider: UsernameAttributeProvider) {
        assert(provider, 'usernameAttributeProvider cannot be null')
        this.usernames = provider
    }

    // ------------------------------------------------------------------------
    // Lookups
    // ------------------------------------------------------------------------

    public abstract getPeopleWithMultivaluedAttributes(query: ReadonlyAttributeMap): Promise<PersonAttributesSet>

    public abstract getPossibleUserAttributeNames(): Set<string> | undefined

    public abstract getAvailableQueryAttributes(): Set<string> | undefined

    /**
     * Looks up the one person with the given username.
     * When the source does not report a name for the match, the result is named after `uid`.
     *
     * @returns The person, or undefined when nobody matches
     * @throws {InvalidArgumentError} If `uid` is missing
     * @throws {IncorrectResultSizeError} If more than one person matches
     */
    public async getPerson(uid: string | null | undefined): Promise<PersonAttributes | undefined> {
        assert(uid, 'uid may not be null')

        const seed = this.toSeedMap(uid)
        const people = await this.getPeopleWithMultivaluedAttributes(seed)

        const person = singleResult(people)
        if (!person) {
            return undefined
        }

        if (person.name === undefined) {
            return new NamedPerson(uid, person.attributes)
        }

        return person
    }

    /**
     * Runs a single-valued query by converting it to its multi-valued form.
     */
    public async getPeople(query: Record<string, unknown>): Promise<PersonAttributesSet> {
        assert(query, 'query may not be null')
        return this.getPeopleWithMultivaluedAttributes(toMultivaluedMap(query))
    }

    /**
     * Builds the seed query for a username.
     */
    protected toSeedMap(uid: string): AttributeMap {
        const seed = toSeedMap(this.usernames.getUsernameAttribute(), uid)
        this.log.debug(`Created seed map for uid '${uid}'`, seed)
        return seed
    }
}
