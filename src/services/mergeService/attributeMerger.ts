import { AttributeMap, NamedPerson, PersonAttributes, PersonAttributesSet, ReadonlyAttributeMap } from '../../model/person'
import { attributeMapToObject, copyMutableAttributeMap, newAttributeMap } from '../../utils/attributes'
import { assert } from '../../utils/assert'
import { LogService } from '../logService'
import { MergePersonAttributes } from './types'

// ============================================================================
// AdditiveAttributeMerger Class
// ============================================================================

/**
 * Merges sets of person records additively.
 *
 * People present in only one set pass through untouched. People present in both (same name)
 * are combined by the injected {@link MergePersonAttributes} strategy into a new record that
 * replaces the original. The merger owns name matching, copy safety and set bookkeeping;
 * the strategy only decides how two attribute maps combine.
 *
 * The query and user attribute name sets are merged as a plain union.
 */
export class AdditiveAttributeMerger {
    /**
     * @param mergePersonAttributes - Strategy combining the attributes of one person from two sources
     * @param log - Optional logger for debug output
     */
    constructor(
        private readonly mergePersonAttributes: MergePersonAttributes,
        private readonly log?: LogService
    ) {}

    // ------------------------------------------------------------------------
    // Public Merge Methods
    // ------------------------------------------------------------------------

    /**
     * Adds the names in `toConsider` to `toModify` and returns `toModify`.
     */
    public mergeAvailableQueryAttributes(toModify: Set<string>, toConsider: ReadonlySet<string>): Set<string> {
        for (const name of toConsider) {
            toModify.add(name)
        }
        return toModify
    }

    /**
     * Adds the names in `toConsider` to `toModify` and returns `toModify`.
     */
    public mergePossibleUserAttributeNames(toModify: Set<string>, toConsider: ReadonlySet<string>): Set<string> {
        for (const name of toConsider) {
            toModify.add(name)
        }
        return toModify
    }

    /**
     * Merges `toConsider` into `toModify` and returns `toModify` (the same container).
     * `toConsider` is left as it was.
     *
     * Records without a name never match anything: they are carried over as distinct people.
     *
     * @throws {InvalidArgumentError} If either set is missing; nothing is modified in that case
     */
    public mergeResults(
        toModify: PersonAttributesSet | null | undefined,
        toConsider: ReadonlySet<PersonAttributes> | null | undefined
    ): PersonAttributesSet {
        assert(toModify, 'toModify cannot be null')
        assert(toConsider, 'toConsider cannot be null')

        const peopleByName = new Map<string, PersonAttributes>()
        for (const person of toModify) {
            if (person.name !== undefined) {
                peopleByName.set(person.name, person)
            }
        }

        for (const person of toConsider) {
            if (person.name === undefined) {
                toModify.add(person)
                continue
            }

            const match = peopleByName.get(person.name)
            if (!match) {
                toModify.add(person)
                peopleByName.set(person.name, person)
                continue
            }

            const attributes = this.buildMutableAttributeMap(match.attributes)
            const merged = new NamedPerson(person.name, this.mergePersonAttributes(attributes, person.attributes))

            // Records are immutable: replace rather than edit
            toModify.delete(match)
            toModify.add(merged)
            peopleByName.set(person.name, merged)

            this.log?.debug(`Merged attributes for ${person.name}`, attributeMapToObject(merged.attributes))
        }

        return toModify
    }

    /**
     * Applies the merge strategy directly to two attribute maps, bypassing the record wrapper.
     * `toModify` is handed to the strategy as is and may be modified.
     *
     * @throws {InvalidArgumentError} If either map is missing
     */
    public mergeAttributes(
        toModify: AttributeMap | null | undefined,
        toConsider: ReadonlyAttributeMap | null | undefined
    ): AttributeMap {
        assert(toModify, 'toModify cannot be null')
        assert(toConsider, 'toConsider cannot be null')
        return this.mergePersonAttributes(toModify, toConsider)
    }

    // ------------------------------------------------------------------------
    // Map Factories
    // ------------------------------------------------------------------------

    /**
     * Copies an attribute map so the strategy can modify it freely.
     */
    protected buildMutableAttributeMap(attributes: ReadonlyAttributeMap): AttributeMap {
        return copyMutableAttributeMap(attributes, (size) => this.createMutableAttributeMap(size))
    }

    /**
     * Creates the map used when merging attributes. Override to use a different map representation.
     */
    protected createMutableAttributeMap(size: number): AttributeMap {
        return newAttributeMap(size)
    }
}
