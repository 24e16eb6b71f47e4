/** OAuth 1.0a credential value objects */

/** Issued out-of-band by the API provider. */
export interface ConsumerCredentials {
    readonly key: string
    readonly secret: string
}

/** A token/secret pair: the temporary request token or the long-lived access token. */
export interface TokenCredentials {
    readonly token: string
    readonly secret: string
}

export type RequestToken = TokenCredentials
export type AccessToken = TokenCredentials

export function hasConsumerCredentials(consumer: ConsumerCredentials | null | undefined): consumer is ConsumerCredentials {
    return !!consumer && consumer.key.trim() !== '' && consumer.secret.trim() !== ''
}

export function hasTokenCredentials(token: TokenCredentials | null | undefined): token is TokenCredentials {
    return !!token && token.token.trim() !== '' && token.secret.trim() !== ''
}
