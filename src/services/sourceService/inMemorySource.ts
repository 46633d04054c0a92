import { NamedPerson, PersonAttributes, PersonAttributesSet, ReadonlyAttributeMap } from '../../model/person'
import { toMultivaluedMap } from '../../utils/attributes'
import { assert } from '../../utils/assert'
import { LogService } from '../logService'
import { UsernameAttributeProvider } from '../usernameService'
import { DefaultAttributeSource } from './defaultAttributeSource'

/**
 * Source answering lookups from a fixed map of username to attributes.
 * Only queries naming a single username (through the username attribute) match anything.
 */
export class InMemoryPersonAttributeSource extends DefaultAttributeSource {
    private readonly people: ReadonlyMap<string, ReadonlyAttributeMap>
    private readonly possibleUserAttributeNames: Set<string>

    /**
     * @param log - Logger instance
     * @param people - Attributes keyed by username
     * @param usernameAttributeProvider - Provider of the username attribute
     */
    constructor(
        log: LogService,
        people: ReadonlyMap<string, ReadonlyAttributeMap>,
        usernameAttributeProvider?: UsernameAttributeProvider
    ) {
        super(log, usernameAttributeProvider)
        this.people = people
        this.possibleUserAttributeNames = new Set()
        for (const attributes of people.values()) {
            for (const name of attributes.keys()) {
                this.possibleUserAttributeNames.add(name)
            }
        }
    }

    /**
     * Builds a source from plain objects, e.g. `{ alice: { mail: 'alice@example.com', groups: ['eng'] } }`.
     */
    static fromRecords(
        log: LogService,
        records: Record<string, Record<string, unknown>>,
        usernameAttributeProvider?: UsernameAttributeProvider
    ): InMemoryPersonAttributeSource {
        const people = new Map<string, ReadonlyAttributeMap>(
            Object.entries(records).map(([username, attributes]) => [username, toMultivaluedMap(attributes)])
        )
        return new InMemoryPersonAttributeSource(log, people, usernameAttributeProvider)
    }

    public async getPeopleWithMultivaluedAttributes(query: ReadonlyAttributeMap): Promise<PersonAttributesSet> {
        assert(query, 'query may not be null')

        const username = this.usernameAttributeProvider.getUsernameFromQuery(query)
        if (username === undefined) {
            this.log.debug('Query does not name a single user, no results')
            return new Set<PersonAttributes>()
        }

        const attributes = this.people.get(username)
        if (!attributes) {
            this.log.debug(`No attributes found for ${username}`)
            return new Set<PersonAttributes>()
        }

        return new Set<PersonAttributes>([new NamedPerson(username, attributes)])
    }

    public getPossibleUserAttributeNames(): Set<string> {
        return new Set(this.possibleUserAttributeNames)
    }

    public getAvailableQueryAttributes(): Set<string> {
        return new Set([this.usernameAttributeProvider.getUsernameAttribute()])
    }
}
