/**
 * Per-request signing material.
 *
 * A SigningContext is an immutable value; the builder mints a new nonce and timestamp on every
 * `build()` call. Contexts must never be reused across requests (the server rejects replays).
 */
import { randomBytes } from 'node:crypto'
import type { IClock } from '../time/IClock.js'
import { SystemClock } from '../time/IClock.js'
import type { AccessToken, ConsumerCredentials, TokenCredentials } from './credentials.js'

export const SIGNATURE_METHOD = 'HMAC-SHA1'
export const OAUTH_VERSION = '1.0'

export interface SigningContext {
    readonly consumer: ConsumerCredentials
    /** Absent during the request-token leg */
    readonly token: TokenCredentials | null
    readonly nonce: string
    /** Seconds since the Unix epoch */
    readonly timestamp: string
    readonly signatureMethod: typeof SIGNATURE_METHOD
}

export interface SigningContextOptions {
    clock?: IClock
    nonceFactory?: () => string
}

export function generateNonce(): string {
    return randomBytes(16).toString('hex')
}

export class SigningContextBuilder {
    private readonly clock: IClock
    private readonly nonceFactory: () => string

    constructor(
        private readonly consumer: ConsumerCredentials,
        private readonly token: TokenCredentials | null = null,
        options: SigningContextOptions = {}
    ) {
        this.clock = options.clock ?? new SystemClock()
        this.nonceFactory = options.nonceFactory ?? generateNonce
    }

    /** Returns a new builder bound to the given token; this builder is unchanged. */
    withToken(token: TokenCredentials): SigningContextBuilder {
        return new SigningContextBuilder(this.consumer, token, { clock: this.clock, nonceFactory: this.nonceFactory })
    }

    build(): SigningContext {
        return Object.freeze({
            consumer: this.consumer,
            token: this.token,
            nonce: this.nonceFactory(),
            timestamp: String(Math.floor(this.clock.now().getTime() / 1000)),
            signatureMethod: SIGNATURE_METHOD
        })
    }
}

/**
 * Produces fresh signing material on demand. Passed explicitly to anything that signs,
 * including the retry policy (which asks again before every attempt).
 */
export interface CredentialSource {
    nextContext(): SigningContext
}

export class AccessTokenCredentialSource implements CredentialSource {
    private readonly builder: SigningContextBuilder

    constructor(consumer: ConsumerCredentials, accessToken: AccessToken, options: SigningContextOptions = {}) {
        this.builder = new SigningContextBuilder(consumer, accessToken, options)
    }

    nextContext(): SigningContext {
        return this.builder.build()
    }
}
