import { AttributeMap, ReadonlyAttributeMap } from '../../model/person'

// ============================================================================
// Type Definitions — Merge Service
// ============================================================================

/**
 * Combines the attributes of one person as reported by two sources.
 *
 * `toModify` is always an independent mutable copy owned by the caller, so a strategy may edit
 * and return it. `toConsider` belongs to someone else: it must not be modified, and its value
 * lists must not end up in the returned map.
 */
export type MergePersonAttributes = (toModify: AttributeMap, toConsider: ReadonlyAttributeMap) => AttributeMap

/** Options for the built-in strategies */
export type MergeStrategyOptions = {
    /** Skip values already present when collecting as list */
    distinctValues?: boolean
}
