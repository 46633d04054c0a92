import { logger, readConfig } from '@sailpoint/connector-sdk'
import { AttributeMergeName, PersonDirectoryConfig } from '../model/config'
import { LOG_LEVELS, LogLevel } from '../services/logService'
import { InvalidArgumentError } from '../utils/errors'

const ATTRIBUTE_MERGE_NAMES: readonly AttributeMergeName[] = ['list', 'first', 'replace']

const defaults: PersonDirectoryConfig = {
    usernameAttribute: 'username',
    attributeMerge: 'list',
    distinctValues: false,
    recoverExceptions: true,
    stopOnSuccess: false,
    spConnDebugLoggingEnabled: false,
}

/**
 * Hard assertion for configuration values. Uses the default SDK logger since
 * no service registry exists while the configuration is being read.
 */
function assert(condition: boolean, message: string): asserts condition {
    if (!condition) {
        logger.error(`resolveConfig: ${message}`)
        throw new InvalidArgumentError(message)
    }
}

function isAttributeMergeName(value: unknown): value is AttributeMergeName {
    return ATTRIBUTE_MERGE_NAMES.some((name) => name === value)
}

function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value)
}

function readBoolean(raw: Record<string, unknown>, key: keyof PersonDirectoryConfig, fallback: boolean): boolean {
    const value = raw[key]
    if (value === undefined || value === null) return fallback
    assert(typeof value === 'boolean', `${key} must be a boolean`)
    return value
}

/**
 * Applies defaults to a raw configuration object and validates it.
 *
 * @param raw - Configuration as read from the environment or supplied by the caller
 * @throws {InvalidArgumentError} If a value has the wrong type or an unknown merge strategy is named
 */
export function resolveConfig(raw: Record<string, unknown> = {}): PersonDirectoryConfig {
    const usernameAttribute = raw.usernameAttribute ?? defaults.usernameAttribute
    assert(
        typeof usernameAttribute === 'string' && usernameAttribute.trim().length > 0,
        'usernameAttribute must be a non-empty string'
    )

    const attributeMerge = raw.attributeMerge ?? defaults.attributeMerge
    assert(
        isAttributeMergeName(attributeMerge),
        `attributeMerge must be one of: ${ATTRIBUTE_MERGE_NAMES.join(', ')}`
    )

    const config: PersonDirectoryConfig = {
        usernameAttribute: usernameAttribute.trim(),
        attributeMerge,
        distinctValues: readBoolean(raw, 'distinctValues', defaults.distinctValues),
        recoverExceptions: readBoolean(raw, 'recoverExceptions', defaults.recoverExceptions),
        stopOnSuccess: readBoolean(raw, 'stopOnSuccess', defaults.stopOnSuccess),
        spConnDebugLoggingEnabled: readBoolean(raw, 'spConnDebugLoggingEnabled', defaults.spConnDebugLoggingEnabled),
    }

    const logLevel = raw.logLevel
    if (logLevel !== undefined && logLevel !== null) {
        assert(isLogLevel(logLevel), `logLevel must be one of: ${LOG_LEVELS.join(', ')}`)
        config.logLevel = logLevel
    }

    if (config.distinctValues && config.attributeMerge !== 'list') {
        logger.warn(`resolveConfig: distinctValues only applies to the "list" merge, ignored for "${attributeMerge}"`)
    }

    return config
}

/**
 * Reads the configuration through the connector SDK and resolves it.
 */
export const safeReadConfig = async (): Promise<PersonDirectoryConfig> => {
    logger.debug('Reading person directory configuration')
    const raw: unknown = await readConfig()
    assert(typeof raw === 'object' && raw !== null, 'Failed to read configuration')

    const config = resolveConfig({ ...raw })
    logger.info('Configuration validation completed successfully')
    return config
}
