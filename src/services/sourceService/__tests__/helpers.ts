import { AttributeValues, NamedPerson, PersonAttributes, PersonAttributesSet, ReadonlyAttributeMap } from '../../../model/person'
import { LogService } from '../../logService'
import { UsernameAttributeProvider } from '../../usernameService'
import { DefaultAttributeSource } from '../defaultAttributeSource'

export const attrs = (values: Record<string, AttributeValues>): Map<string, AttributeValues> =>
    new Map(Object.entries(values))

export const person = (name: string | undefined, values: Record<string, AttributeValues>): NamedPerson =>
    new NamedPerson(name, attrs(values))

/**
 * Source returning a fixed result for every query and recording the queries it receives.
 */
export class FixedResultSource extends DefaultAttributeSource {
    public queries: ReadonlyAttributeMap[] = []

    constructor(
        log: LogService,
        private readonly results: readonly PersonAttributes[],
        private readonly names?: Set<string>,
        usernameAttributeProvider?: UsernameAttributeProvider
    ) {
        super(log, usernameAttributeProvider)
    }

    public async getPeopleWithMultivaluedAttributes(query: ReadonlyAttributeMap): Promise<PersonAttributesSet> {
        this.queries.push(query)
        return new Set(this.results)
    }

    public getPossibleUserAttributeNames(): Set<string> | undefined {
        return this.names
    }

    public getAvailableQueryAttributes(): Set<string> | undefined {
        return this.names ? new Set([this.usernameAttributeProvider.getUsernameAttribute()]) : undefined
    }
}

/**
 * Source whose queries always reject.
 */
export class FailingSource extends FixedResultSource {
    constructor(
        log: LogService,
        private readonly error: Error
    ) {
        super(log, [])
    }

    public async getPeopleWithMultivaluedAttributes(query: ReadonlyAttributeMap): Promise<PersonAttributesSet> {
        this.queries.push(query)
        throw this.error
    }
}
