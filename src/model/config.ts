import { LogLevel } from '../services/logService'

/** Names of the built-in attribute merge strategies. */
export type AttributeMergeName = 'list' | 'first' | 'replace'

/**
 * Person directory configuration.
 * Raw values may be partial; {@link resolveConfig} fills defaults and validates.
 */
export interface PersonDirectoryConfig {
    /** Attribute holding the username in seed queries (default "username") */
    usernameAttribute: string
    /** How attributes of the same person from different sources are combined: collect as list, keep first, or replace */
    attributeMerge: AttributeMergeName
    /** Drop duplicate values when collecting as list */
    distinctValues: boolean
    /** Log and skip a failing source instead of failing the whole lookup */
    recoverExceptions: boolean
    /** Stop querying sources once one of them returned a result */
    stopOnSuccess: boolean
    logLevel?: LogLevel
    spConnDebugLoggingEnabled: boolean
}
