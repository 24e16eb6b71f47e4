/**
 * Domain exceptions for CHPP access and persistence.
 */

export {
    AuthException,
    ChppApiException,
    DEFAULT_RETRYABLE_CHPP_CODES,
    describeError,
    isRetryableSyncError,
    NetworkException,
    ParseException,
    StorageException,
    SyncException,
    translateStorageError
} from './syncExceptions.js'
export type { SyncErrorKind } from './syncExceptions.js'
