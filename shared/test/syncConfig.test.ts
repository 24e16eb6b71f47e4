import assert from 'node:assert'
import { describe, test } from 'node:test'
import { DEFAULT_USER_AGENT, loadSyncConfig } from '../src/config/syncConfig.js'

describe('loadSyncConfig', () => {
    test('applies defaults', () => {
        const config = loadSyncConfig({})

        assert.deepStrictEqual(config.consumer, { key: '', secret: '' })
        assert.strictEqual(config.userAgent, DEFAULT_USER_AGENT)
        assert.deepStrictEqual(config.retry, { maxRetries: 3, initialBackoffMs: 1000, maxBackoffMs: 32000, retryableCodes: [503, 429] })
    })

    test('reads consumer credentials and retry overrides', () => {
        const config = loadSyncConfig({
            CHPP_CONSUMER_KEY: ' test-key ',
            CHPP_CONSUMER_SECRET: 'test-secret',
            CHPP_USER_AGENT: 'Tester/2.0',
            CHPP_MAX_RETRIES: '0',
            CHPP_INITIAL_BACKOFF_MS: '250',
            CHPP_MAX_BACKOFF_MS: '500',
            CHPP_RETRYABLE_CODES: '503, 429,500'
        })

        assert.deepStrictEqual(config.consumer, { key: 'test-key', secret: 'test-secret' })
        assert.strictEqual(config.userAgent, 'Tester/2.0')
        assert.deepStrictEqual(config.retry, { maxRetries: 0, initialBackoffMs: 250, maxBackoffMs: 500, retryableCodes: [503, 429, 500] })
    })

    test('blank values fall back to the defaults', () => {
        const config = loadSyncConfig({
            CHPP_USER_AGENT: '',
            CHPP_MAX_RETRIES: '',
            CHPP_INITIAL_BACKOFF_MS: ' ',
            CHPP_MAX_BACKOFF_MS: '',
            CHPP_RETRYABLE_CODES: ''
        })

        assert.strictEqual(config.userAgent, DEFAULT_USER_AGENT)
        assert.deepStrictEqual(config.retry, { maxRetries: 3, initialBackoffMs: 1000, maxBackoffMs: 32000, retryableCodes: [503, 429] })
    })

    test('rejects a negative retry count naming the variable', () => {
        assert.throws(() => loadSyncConfig({ CHPP_MAX_RETRIES: '-1' }), /CHPP_MAX_RETRIES/)
    })

    test('rejects an initial backoff above the cap', () => {
        assert.throws(() => loadSyncConfig({ CHPP_INITIAL_BACKOFF_MS: '5000', CHPP_MAX_BACKOFF_MS: '1000' }), /CHPP_INITIAL_BACKOFF_MS: must not exceed CHPP_MAX_BACKOFF_MS/)
    })

    test('rejects malformed retryable codes', () => {
        assert.throws(() => loadSyncConfig({ CHPP_RETRYABLE_CODES: '503,abc' }), /CHPP_RETRYABLE_CODES/)
    })
})
