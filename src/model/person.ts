// ============================================================================
// Type Definitions — Person Attributes
// ============================================================================

/** A single attribute value. Values are never null; a missing list is modelled on the list itself. */
export type AttributeValue = string | number | boolean | bigint | object

/** The ordered values of one attribute, or `null` when the source reported the key without values. */
export type AttributeValues = AttributeValue[] | null

/** Attribute name to ordered values. Iteration follows insertion order. */
export type AttributeMap = Map<string, AttributeValues>

/** Read-only view of an attribute map, as handed out by sources and records. */
export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValues>

/**
 * One identity's resolved attributes.
 * `name` is undefined when the backing source did not report it.
 */
export interface PersonAttributes {
    readonly name: string | undefined
    readonly attributes: ReadonlyAttributeMap
}

/** An unordered collection of person records, compared by reference. */
export type PersonAttributesSet = Set<PersonAttributes>

// ============================================================================
// Record Implementations
// ============================================================================

/**
 * Person record with an explicitly supplied name.
 * Records are treated as immutable once constructed; merging produces new records.
 */
export class NamedPerson implements PersonAttributes {
    constructor(
        public readonly name: string | undefined,
        public readonly attributes: ReadonlyAttributeMap
    ) {}
}
