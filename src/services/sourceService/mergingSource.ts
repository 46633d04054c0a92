import { PersonAttributes, PersonAttributesSet, ReadonlyAttributeMap } from '../../model/person'
import { assert, softAssert } from '../../utils/assert'
import { LogService } from '../logService'
import { AdditiveAttributeMerger } from '../mergeService'
import { UsernameAttributeProvider } from '../usernameService'
import { DefaultAttributeSource } from './defaultAttributeSource'
import { PersonAttributeSource } from './types'

export type MergingSourceOptions = {
    /** Log and skip a failing source instead of rejecting (default: true) */
    recoverExceptions?: boolean
    /** Stop after the first source that returns at least one person (default: false) */
    stopOnSuccess?: boolean
}

// ============================================================================
// MergingPersonAttributeSource Class
// ============================================================================

/**
 * Source that queries several child sources in order and merges what they return
 * with an {@link AdditiveAttributeMerger}. Earlier sources form the base, later ones are
 * merged into it.
 */
export class MergingPersonAttributeSource extends DefaultAttributeSource {
    private readonly recoverExceptions: boolean
    private readonly stopOnSuccess: boolean

    /**
     * @param log - Logger instance
     * @param merger - Merger combining the results of the child sources
     * @param sources - Child sources, queried in order
     * @param options - Failure and short-circuit behaviour
     * @param usernameAttributeProvider - Provider of the username attribute
     */
    constructor(
        log: LogService,
        private readonly merger: AdditiveAttributeMerger,
        private readonly sources: readonly PersonAttributeSource[],
        options: MergingSourceOptions = {},
        usernameAttributeProvider?: UsernameAttributeProvider
    ) {
        super(log, usernameAttributeProvider)
        this.recoverExceptions = options.recoverExceptions ?? true
        this.stopOnSuccess = options.stopOnSuccess ?? false
        softAssert(sources.length > 0, 'No sources configured - lookups will return no results')
    }

    public async getPeopleWithMultivaluedAttributes(query: ReadonlyAttributeMap): Promise<PersonAttributesSet> {
        assert(query, 'query may not be null')

        let result: PersonAttributesSet | undefined

        for (const [index, source] of this.sources.entries()) {
            const label = `${source.constructor.name}#${index}`

            let people: PersonAttributesSet
            try {
                people = await source.getPeopleWithMultivaluedAttributes(query)
            } catch (error) {
                if (!this.recoverExceptions) {
                    this.log.error(`Source ${label} failed`, error)
                    throw error
                }
                this.log.warn(`Source ${label} failed, continuing with the remaining sources`, error)
                continue
            }

            this.log.debug(`Source ${label} returned ${people.size} result(s)`)
            // The first result set is copied so the child's own set is never modified
            result = result ? this.merger.mergeResults(result, people) : new Set<PersonAttributes>(people)

            if (this.stopOnSuccess && people.size > 0) {
                this.log.debug(`Stopping after ${label}, stopOnSuccess is enabled`)
                break
            }
        }

        return result ?? new Set<PersonAttributes>()
    }

    /**
     * Union of the attribute names the child sources can return; undefined if no child knows its own.
     */
    public getPossibleUserAttributeNames(): Set<string> | undefined {
        let names: Set<string> | undefined
        for (const source of this.sources) {
            const sourceNames = source.getPossibleUserAttributeNames()
            if (sourceNames) {
                names = this.merger.mergePossibleUserAttributeNames(names ?? new Set<string>(), sourceNames)
            }
        }
        return names
    }

    /**
     * Union of the attribute names the child sources can be queried by; undefined if no child knows its own.
     */
    public getAvailableQueryAttributes(): Set<string> | undefined {
        let names: Set<string> | undefined
        for (const source of this.sources) {
            const sourceNames = source.getAvailableQueryAttributes()
            if (sourceNames) {
                names = this.merger.mergeAvailableQueryAttributes(names ?? new Set<string>(), sourceNames)
            }
        }
        return names
    }
}
