import assert from 'node:assert'
import { describe, test } from 'node:test'
import {
    AuthException,
    ChppApiException,
    describeError,
    isRetryableSyncError,
    NetworkException,
    ParseException,
    StorageException,
    translateStorageError
} from '../src/exceptions/syncExceptions.js'

describe('isRetryableSyncError', () => {
    test('network failures are retryable', () => {
        assert.strictEqual(isRetryableSyncError(new NetworkException('connection reset')), true)
    })

    test('CHPP 503 and 429 are retryable by default', () => {
        assert.strictEqual(isRetryableSyncError(new ChppApiException('busy', 503)), true)
        assert.strictEqual(isRetryableSyncError(new ChppApiException('slow down', 429)), true)
    })

    test('other CHPP codes are fatal', () => {
        assert.strictEqual(isRetryableSyncError(new ChppApiException('bad file', 90)), false)
    })

    test('retryable codes are configurable', () => {
        assert.strictEqual(isRetryableSyncError(new ChppApiException('busy', 503), [500]), false)
        assert.strictEqual(isRetryableSyncError(new ChppApiException('oops', 500), [500]), true)
    })

    test('auth, parse, storage and unknown errors are fatal', () => {
        assert.strictEqual(isRetryableSyncError(new AuthException('bad signature')), false)
        assert.strictEqual(isRetryableSyncError(new ParseException('bad xml', 'players')), false)
        assert.strictEqual(isRetryableSyncError(new StorageException('down')), false)
        assert.strictEqual(isRetryableSyncError(new Error('boom')), false)
        assert.strictEqual(isRetryableSyncError('boom'), false)
    })
})

describe('exception hierarchy', () => {
    test('kind and name are set per subclass', () => {
        const err = new ChppApiException('Server busy', 503, 'guid-1', 'file=players', 12)
        assert.strictEqual(err.kind, 'chpp-api')
        assert.strictEqual(err.name, 'ChppApiException')
        assert.strictEqual(err.errorGuid, 'guid-1')
        assert.strictEqual(err.request, 'file=players')
        assert.strictEqual(err.lineNumber, 12)
        assert.ok(err instanceof Error)
    })

    test('network exception keeps http status and cause', () => {
        const cause = new Error('socket hang up')
        const err = new NetworkException('GET failed', 502, { cause })
        assert.strictEqual(err.httpStatus, 502)
        assert.strictEqual(err.cause, cause)
    })
})

describe('translateStorageError', () => {
    test('wraps SDK errors with status code and context', () => {
        const sdkError = Object.assign(new Error('Request rate is large'), { code: 429 })
        const translated = translateStorageError(sdkError, 'syncRecords.Upsert')

        assert.ok(translated instanceof StorageException)
        assert.strictEqual(translated.message, 'syncRecords.Upsert: Request rate is large')
        assert.strictEqual(translated.statusCode, 429)
        assert.strictEqual(translated.operation, 'syncRecords.Upsert')
    })

    test('passes StorageException through', () => {
        const original = new StorageException('already translated')
        assert.strictEqual(translateStorageError(original, 'ctx'), original)
    })

    test('handles non-error values', () => {
        const translated = translateStorageError({ code: 'ECONNRESET' })
        assert.strictEqual(translated.message, 'Unknown storage error')
        assert.strictEqual(translated.statusCode, undefined)
    })
})

test('describeError formats CHPP errors with their code', () => {
    assert.strictEqual(describeError(new ChppApiException('Server busy', 503)), 'CHPP error 503: Server busy')
    assert.strictEqual(describeError(new NetworkException('timeout')), 'timeout')
    assert.strictEqual(describeError(42), '42')
})
