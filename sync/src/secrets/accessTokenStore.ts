import type { AccessToken } from '@touchline/shared'
import { AuthException, hasTokenCredentials } from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { ISecretStore } from './secretStore.js'

const TOKEN_KEY = 'chpp-access-token'
const SECRET_KEY = 'chpp-access-secret'

/**
 * Reads and writes the long-lived access token pair. A pair with either half missing
 * is reported as no credentials.
 */
@injectable()
export class AccessTokenStore {
    constructor(@inject(TOKENS.SecretStore) private readonly secrets: ISecretStore) {}

    async load(): Promise<AccessToken | null> {
        const token = await this.secrets.get(TOKEN_KEY)
        const secret = await this.secrets.get(SECRET_KEY)
        if (!token || !secret) return null
        return { token, secret }
    }

    async save(accessToken: AccessToken): Promise<void> {
        if (!hasTokenCredentials(accessToken)) {
            throw new AuthException('Refusing to store an empty access token')
        }
        await this.secrets.set(TOKEN_KEY, accessToken.token)
        await this.secrets.set(SECRET_KEY, accessToken.secret)
    }

    async clear(): Promise<void> {
        await this.secrets.delete(TOKEN_KEY)
        await this.secrets.delete(SECRET_KEY)
    }
}
