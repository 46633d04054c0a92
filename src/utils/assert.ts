import { ServiceRegistry } from '../services/serviceRegistry'
import { getCallerFunctionName } from '../services/logService'
import { InvalidArgumentError } from './errors'

/**
 * Hard assertion for required arguments - throws {@link InvalidArgumentError} if the condition
 * is false or the value is null/undefined. Logs through the active registry when there is one.
 *
 * Supports two patterns:
 * 1. Direct value: assert(value, 'message') - narrows value to non-null/non-undefined
 * 2. Boolean expression: assert(condition, 'message') - checks condition is true
 */
export function assert<T>(value: T | null | undefined, message: string): asserts value is T
export function assert(condition: boolean, message: string): asserts condition
export function assert<T>(
    valueOrCondition: T | null | undefined | boolean,
    message: string
): asserts valueOrCondition is T {
    const isNullish = valueOrCondition === null || valueOrCondition === undefined
    const isFalse = valueOrCondition === false

    if (isNullish || isFalse) {
        const log = ServiceRegistry.peekCurrent()?.log
        if (log) {
            log.crash(message, undefined, new InvalidArgumentError(message))
        }

        const functionName = getCallerFunctionName(3) || 'unknown'
        throw new InvalidArgumentError(`${functionName}: ${message}`)
    }
}

/**
 * Soft assertion - logs a warning/error but doesn't throw
 * @returns true if assertion passed, false if it failed
 */
export function softAssert<T>(
    valueOrCondition: T | null | undefined,
    message: string,
    level: 'warn' | 'error' = 'warn'
): valueOrCondition is NonNullable<T> {
    const isNullish = valueOrCondition === null || valueOrCondition === undefined
    const isFalse = valueOrCondition === false

    if (isNullish || isFalse) {
        const log = ServiceRegistry.peekCurrent()?.log
        if (log) {
            log[level](message)
        } else {
            const functionName = getCallerFunctionName(3) || 'unknown'
            console.warn(`${functionName}: ${message}`)
        }
    }
    return !(isNullish || isFalse)
}
