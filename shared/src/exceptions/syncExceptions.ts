/**
 * Domain exceptions for CHPP access and sync persistence.
 *
 * Every failure surfaced by the sync runtime is one of these, discriminated by `kind`,
 * so callers (retry policy, orchestrator, CLI) can branch without string matching.
 */

export type SyncErrorKind = 'network' | 'parse' | 'auth' | 'chpp-api' | 'storage'

/**
 * Base class for all sync domain exceptions.
 */
export abstract class SyncException extends Error {
    abstract readonly kind: SyncErrorKind

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * Transport-level failure (DNS, connection reset, timeout, unexpected HTTP status).
 * Retryable.
 */
export class NetworkException extends SyncException {
    readonly kind = 'network' as const

    constructor(
        message: string,
        public readonly httpStatus?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}

/**
 * A response could not be decoded into the expected document shape.
 */
export class ParseException extends SyncException {
    readonly kind = 'parse' as const

    constructor(
        message: string,
        public readonly document?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}

/**
 * OAuth handshake, signature or credential failure.
 */
export class AuthException extends SyncException {
    readonly kind = 'auth' as const
}

/**
 * Structured error document returned by the CHPP service.
 * Codes 503 and 429 are retryable by default.
 */
export class ChppApiException extends SyncException {
    readonly kind = 'chpp-api' as const

    constructor(
        message: string,
        public readonly code: number,
        public readonly errorGuid: string | null = null,
        public readonly request: string | null = null,
        public readonly lineNumber: number | null = null
    ) {
        super(message)
    }
}

/**
 * Persistence failure. Always fatal to the running sync.
 */
export class StorageException extends SyncException {
    readonly kind = 'storage' as const

    constructor(
        message: string,
        public readonly operation?: string,
        public readonly statusCode?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}

export const DEFAULT_RETRYABLE_CHPP_CODES: readonly number[] = [503, 429]

/**
 * Classify an error for the retry policy. Network failures and CHPP error codes in
 * `retryableCodes` are retryable; everything else (including unknown thrown values) is fatal.
 */
export function isRetryableSyncError(error: unknown, retryableCodes: readonly number[] = DEFAULT_RETRYABLE_CHPP_CODES): boolean {
    if (error instanceof NetworkException) return true
    if (error instanceof ChppApiException) return retryableCodes.includes(error.code)
    return false
}

function readStatusCode(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
    return typeof error.code === 'number' ? error.code : undefined
}

/**
 * Translate a raw storage SDK error (a Cosmos DB ErrorResponse, say) to a StorageException.
 * @param error - Error thrown by the SDK
 * @param context - Operation name used as message prefix
 */
export function translateStorageError(error: unknown, context?: string): StorageException {
    if (error instanceof StorageException) return error
    const statusCode = readStatusCode(error)
    const message = error instanceof Error && error.message ? error.message : 'Unknown storage error'
    const contextPrefix = context ? `${context}: ` : ''
    return new StorageException(`${contextPrefix}${message}`, context, statusCode, { cause: error })
}

/** Human readable one-liner used in telemetry and fetch logs */
export function describeError(error: unknown): string {
    if (error instanceof ChppApiException) return `CHPP error ${error.code}: ${error.message}`
    if (error instanceof Error) return error.message
    return String(error)
}
