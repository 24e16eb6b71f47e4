import assert from 'node:assert'
import { describe, test } from 'node:test'
import { AccessTokenCredentialSource, generateNonce, SigningContextBuilder } from '../src/oauth/signingContext.js'
import { FakeClock } from '../src/time/IClock.js'

const consumer = { key: 'test-consumer-key', secret: 'test-consumer-secret' }

describe('SigningContextBuilder', () => {
    test('two builds with identical inputs produce different nonces', () => {
        const builder = new SigningContextBuilder(consumer, { token: 'test-token', secret: 'test-token-secret' }, { clock: new FakeClock() })
        const first = builder.build()
        const second = builder.build()

        assert.notStrictEqual(first.nonce, second.nonce)
        assert.strictEqual(first.timestamp, second.timestamp)
    })

    test('timestamp is whole seconds from the clock', () => {
        const clock = new FakeClock(new Date('2023-11-14T22:13:20.750Z'))
        const ctx = new SigningContextBuilder(consumer, null, { clock }).build()

        assert.strictEqual(ctx.timestamp, '1700000000')
        assert.strictEqual(ctx.signatureMethod, 'HMAC-SHA1')
        assert.strictEqual(ctx.token, null)
    })

    test('contexts are frozen', () => {
        const ctx = new SigningContextBuilder(consumer).build()
        assert.ok(Object.isFrozen(ctx))
    })

    test('withToken leaves the original builder untouched', () => {
        const base = new SigningContextBuilder(consumer)
        const withToken = base.withToken({ token: 'test-token', secret: 'test-token-secret' })

        assert.strictEqual(base.build().token, null)
        assert.deepStrictEqual(withToken.build().token, { token: 'test-token', secret: 'test-token-secret' })
    })
})

describe('AccessTokenCredentialSource', () => {
    test('mints a fresh context per call', () => {
        let n = 0
        const source = new AccessTokenCredentialSource(
            consumer,
            { token: 'test-token', secret: 'test-token-secret' },
            { nonceFactory: () => `nonce-${++n}` }
        )

        assert.strictEqual(source.nextContext().nonce, 'nonce-1')
        assert.strictEqual(source.nextContext().nonce, 'nonce-2')
    })
})

test('generateNonce returns 32 hex characters', () => {
    assert.match(generateNonce(), /^[0-9a-f]{32}$/)
})
