import { ConnectorError, ConnectorErrorType } from '@sailpoint/connector-sdk'
import { PersonDirectoryConfig } from '../model/config'
import { LogService } from './logService'
import { AdditiveAttributeMerger, createMergeStrategy, MergePersonAttributes } from './mergeService'
import { SimpleUsernameAttributeProvider, UsernameAttributeProvider } from './usernameService'

/** Services that may be supplied instead of the defaults built from the configuration. */
export type ServiceOverrides = {
    log?: LogService
    usernames?: UsernameAttributeProvider
    mergeStrategy?: MergePersonAttributes
    merger?: AdditiveAttributeMerger
}

/**
 * Dependency container for the directory services.
 *
 * Builds the services from the configuration in dependency order; each one can be
 * overridden (useful for testing). A static reference tracks the "current" registry so
 * that deeply-nested code can reach the logger without prop-drilling.
 */
export class ServiceRegistry {
    private static current?: ServiceRegistry
    public log: LogService
    public usernames: UsernameAttributeProvider
    public merger: AdditiveAttributeMerger

    /**
     * @param config - The resolved directory configuration
     * @param overrides - Pre-built services replacing the defaults
     */
    constructor(
        public config: PersonDirectoryConfig,
        overrides: ServiceOverrides = {}
    ) {
        this.log = overrides.log ?? new LogService(config)
        this.usernames = overrides.usernames ?? new SimpleUsernameAttributeProvider(config.usernameAttribute)

        const strategy =
            overrides.mergeStrategy ??
            createMergeStrategy(config.attributeMerge, { distinctValues: config.distinctValues })
        this.merger = overrides.merger ?? new AdditiveAttributeMerger(strategy, this.log)
    }

    /**
     * Sets the active registry.
     */
    static setCurrent(reg: ServiceRegistry) {
        this.current = reg
    }

    /**
     * Retrieves the active registry.
     *
     * @throws {ConnectorError} If no registry has been set via {@link setCurrent}
     */
    static getCurrent(): ServiceRegistry {
        if (!this.current) {
            throw new ConnectorError('ServiceRegistry not found', ConnectorErrorType.Generic)
        }
        return this.current
    }

    /**
     * Retrieves the active registry, if there is one.
     */
    static peekCurrent(): ServiceRegistry | undefined {
        return this.current
    }

    /**
     * Clears the active registry, releasing all service references.
     */
    static clear() {
        this.current = undefined
    }
}
