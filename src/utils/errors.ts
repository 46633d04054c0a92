import { ConnectorError, ConnectorErrorType } from '@sailpoint/connector-sdk'

/**
 * Raised when a required argument is missing or malformed.
 * Indicates a programming error in the caller; never retried.
 */
export class InvalidArgumentError extends ConnectorError {
    constructor(message: string) {
        super(message, ConnectorErrorType.Generic)
        this.name = 'InvalidArgumentError'
    }
}

/**
 * Raised when a lookup that must yield at most one record yields more.
 * Signals inconsistent data in the backing source.
 */
export class IncorrectResultSizeError extends ConnectorError {
    constructor(
        message: string,
        public readonly expectedSize: number,
        public readonly actualSize: number
    ) {
        super(message, ConnectorErrorType.Generic)
        this.name = 'IncorrectResultSizeError'
    }
}
