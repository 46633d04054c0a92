import { safeReadConfig, resolveConfig } from './data/config'
import { PersonDirectoryConfig } from './model/config'
import { ServiceOverrides, ServiceRegistry } from './services/serviceRegistry'
import { MergingPersonAttributeSource, PersonAttributeSource } from './services/sourceService'

/**
 * Builds a directory over the given sources. Lookups query every source and merge the
 * people they return according to the configured attribute merge strategy.
 * The registry built here becomes the current one.
 *
 * @param config - Resolved configuration, see {@link resolveConfig}
 * @param sources - Backing sources, queried in order
 * @param overrides - Services replacing the defaults built from `config`
 * @returns A source merging the results of all `sources`
 */
export const createPersonDirectory = (
    config: PersonDirectoryConfig,
    sources: readonly PersonAttributeSource[],
    overrides: ServiceOverrides = {}
): MergingPersonAttributeSource => {
    const serviceRegistry = new ServiceRegistry(config, overrides)
    ServiceRegistry.setCurrent(serviceRegistry)

    serviceRegistry.log.info(
        `Person directory ready with ${sources.length} source(s), "${config.attributeMerge}" attribute merge`
    )

    return new MergingPersonAttributeSource(
        serviceRegistry.log,
        serviceRegistry.merger,
        sources,
        { recoverExceptions: config.recoverExceptions, stopOnSuccess: config.stopOnSuccess },
        serviceRegistry.usernames
    )
}

/**
 * Same as {@link createPersonDirectory}, reading the configuration through the connector SDK.
 */
export const connectPersonDirectory = async (
    sources: readonly PersonAttributeSource[],
    overrides: ServiceOverrides = {}
): Promise<MergingPersonAttributeSource> => {
    const config = await safeReadConfig()
    return createPersonDirectory(config, sources, overrides)
}

export { resolveConfig, safeReadConfig }
export type { AttributeMergeName, PersonDirectoryConfig } from './model/config'
export * from './model/person'
export { LogService } from './services/logService'
export type { LogLevel } from './services/logService'
export * from './services/mergeService'
export * from './services/sourceService'
export * from './services/usernameService'
export { ServiceRegistry } from './services/serviceRegistry'
export type { ServiceOverrides } from './services/serviceRegistry'
export * from './utils/attributes'
export { IncorrectResultSizeError, InvalidArgumentError } from './utils/errors'
