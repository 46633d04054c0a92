import { ConnectorError, ConnectorErrorType, logger } from '@sailpoint/connector-sdk'

type Logger = typeof logger

/**
 * Log levels in order of priority (lowest to highest)
 * debug < info < warn < error
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export type LogConfig = {
    spConnDebugLoggingEnabled: boolean
    logLevel?: LogLevel
}

/**
 * Public entry points of the directory. Callers matching these are shown in brackets.
 */
const OPERATION_NAMES = new Set([
    'getPerson',
    'getPeople',
    'getPeopleWithMultivaluedAttributes',
    'mergeResults',
    'mergeAttributes',
])

/**
 * Extracts the caller class and method name from the stack trace
 * @param skipFrames Number of stack frames to skip (default: 2 to skip this function and the logging method)
 * @returns An object with origin (formatted string) and isOperation (boolean)
 */
export function getCallerInfo(skipFrames: number = 2): { origin: string; isOperation: boolean } {
    try {
        const stack = new Error().stack
        if (!stack) return { origin: 'unknown', isOperation: false }

        const lines = stack.split('\n')
        // Skip the Error header line as well as the requested frames
        const callerLine = lines[skipFrames + 1]
        if (!callerLine) return { origin: 'unknown', isOperation: false }

        // - "    at ClassName.methodName (file:line:col)"
        // - "    at async ClassName.methodName (file:line:col)"
        // - "    at functionName (file:line:col)"
        const classMethodMatch = callerLine.match(/at\s+(?:async\s+)?(\w+)\.(\w+)\s*\(/)
        if (classMethodMatch) {
            const [, className, methodName] = classMethodMatch
            const isOperation = OPERATION_NAMES.has(methodName)
            if (className !== 'Object') {
                const origin = `${className}>${methodName}`
                return { origin: isOperation ? `[${origin}]` : origin, isOperation }
            }
            return { origin: isOperation ? `[${methodName}]` : methodName, isOperation }
        }

        const functionMatch = callerLine.match(/at\s+(?:async\s+)?(?:new\s+)?(\w+)\s*\(/)
        if (functionMatch) {
            const functionName = functionMatch[1]
            const isOperation = OPERATION_NAMES.has(functionName)
            return { origin: isOperation ? `[${functionName}]` : functionName, isOperation }
        }

        // Anonymous frames: fall back to the file name
        const fileMatch = callerLine.match(/[/\\]([^/\\]+)\.(?:ts|js)/)
        if (fileMatch) {
            return { origin: fileMatch[1], isOperation: false }
        }

        return { origin: 'unknown', isOperation: false }
    } catch {
        return { origin: 'unknown', isOperation: false }
    }
}

export function getCallerFunctionName(skipFrames: number = 2): string | undefined {
    return getCallerInfo(skipFrames).origin
}

/**
 * Structured logging service wrapping the SailPoint SDK logger.
 *
 * Features:
 * - Configurable log levels (debug, info, warn, error)
 * - Caller origin detection via stack trace analysis, only paid for at debug level
 * - Assertion-style logging (similar to `console.assert`)
 * - Crash method that logs and throws a ConnectorError
 */
export class LogService {
    private logger: Logger
    private configuredLevel: LogLevel

    /**
     * @param config - Logging configuration, either an explicit level or the SDK debug flag
     */
    constructor(config: LogConfig) {
        this.logger = logger
        // Explicit logLevel > debug flag > default 'info'
        if (config.logLevel) {
            this.configuredLevel = config.logLevel
        } else if (config.spConnDebugLoggingEnabled) {
            this.configuredLevel = 'debug'
        } else {
            this.configuredLevel = 'info'
        }

        logger.level = this.configuredLevel
    }

    /**
     * Formats a log message with caller origin and optional data payload.
     * Handles Error objects, Maps and Sets, primitives, and JSON-serializable objects.
     *
     * @param message - The base log message
     * @param data - Optional data to append
     * @param origin - The caller origin string (e.g. "AdditiveAttributeMerger>mergeResults")
     */
    private formatMessage(message: string, data?: unknown, origin?: string): string {
        const prefix = origin ? `${origin}: ` : ''

        if (data === undefined || data === null) {
            return `${prefix}${message}`
        }

        if (data instanceof Error) {
            return `${prefix}${message} [Error: ${data.name}: ${data.message}${data.stack ? ' | Stack: ' + data.stack : ''}]`
        }

        if (['string', 'number', 'boolean', 'bigint', 'symbol'].includes(typeof data)) {
            return `${prefix}${message} ${String(data)}`
        }

        try {
            return `${prefix}${message} ${JSON.stringify(data, replacer)}`
        } catch (e) {
            return `${prefix}${message} [Unserializable data] ${e}`
        }
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        // Stack capture is expensive; only pay for it when debugging
        const origin = this.configuredLevel === 'debug' ? getCallerInfo(3).origin : undefined
        this.logger[level](this.formatMessage(message, data, origin))
    }

    /**
     * Logs an informational message. Used for significant milestones.
     */
    info(message: string, data?: unknown): void {
        this.log('info', message, data)
    }

    /**
     * Logs a debug message. Only output when log level is "debug".
     */
    debug(message: string, data?: unknown): void {
        this.log('debug', message, data)
    }

    /**
     * Logs a warning message. Used for recoverable issues that deserve attention.
     */
    warn(message: string, data?: unknown): void {
        this.log('warn', message, data)
    }

    /**
     * Logs an error message. Used for failures that don't warrant an exception.
     */
    error(message: string, data?: unknown): void {
        this.log('error', message, data)
    }

    /**
     * Logs a message at the specified level only if the condition is false.
     * Similar to console.assert()
     * @param condition If false, the message will be logged
     * @param message The message to log
     * @param data Optional data to include
     * @param level The log level to use (default: 'error')
     */
    assert(condition: boolean, message: string, data?: unknown, level: LogLevel = 'error'): void {
        if (!condition) {
            const { origin } = getCallerInfo(2)
            this.logger[level](this.formatMessage(`Assertion failed: ${message}`, data, origin))
        }
    }

    /**
     * Logs an error message and immediately throws.
     * Used for unrecoverable failures that should halt the current operation.
     *
     * @param message - The error message
     * @param data - Optional error or structured data to attach
     * @param error - The error to throw; a generic {@link ConnectorError} carrying `message` by default
     */
    crash(message: string, data?: unknown, error?: ConnectorError): never {
        const { origin } = getCallerInfo(2)
        this.logger.error(this.formatMessage(message, data, origin))

        throw error ?? new ConnectorError(message, ConnectorErrorType.Generic)
    }

    /**
     * Gets the currently configured log level
     */
    getLogLevel(): LogLevel {
        return this.configuredLevel
    }

    /**
     * Sets the log level at runtime
     */
    setLogLevel(level: LogLevel): void {
        this.configuredLevel = level
        this.logger.level = level
    }
}

function replacer(_key: string, value: unknown): unknown {
    if (value instanceof Map) return Object.fromEntries(value)
    if (value instanceof Set) return Array.from(value)
    if (typeof value === 'bigint') return value.toString()
    return value
}
