/**
 * Three-legged OAuth 1.0a handshake against the CHPP token endpoints.
 *
 *   Unauthenticated → RequestTokenObtained → (user authorizes in browser) → AccessTokenObtained
 *
 * The service performs only the two token calls; ordinary API calls build their own
 * SigningContext from the stored access token.
 */
import type { AccessToken, ConsumerCredentials, IClock, RequestToken, SyncConfig } from '@touchline/shared'
import {
    AuthException,
    buildAuthorizationUrl,
    CHPP_ACCESS_TOKEN_URL,
    CHPP_REQUEST_TOKEN_URL,
    hasConsumerCredentials,
    hasTokenCredentials,
    parseTokenResponse,
    sign,
    SigningContextBuilder
} from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { IHttpTransport } from './httpTransport.js'

export interface AuthorizationRequest {
    /** URL the user opens to approve access; the site then shows a verification code */
    authorizationUrl: string
    requestToken: RequestToken
}

export interface IOAuthHandshake {
    obtainRequestToken(consumer: ConsumerCredentials): Promise<AuthorizationRequest>
    exchangeVerificationCode(verifier: string, requestToken: RequestToken, consumer: ConsumerCredentials): Promise<AccessToken>
}

@injectable()
export class OAuthHandshakeService implements IOAuthHandshake {
    constructor(
        @inject(TOKENS.HttpTransport) private readonly transport: IHttpTransport,
        @inject(TOKENS.SyncConfig) private readonly config: SyncConfig,
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    async obtainRequestToken(consumer: ConsumerCredentials): Promise<AuthorizationRequest> {
        if (!hasConsumerCredentials(consumer)) {
            throw new AuthException('Consumer key and secret are required to request a token')
        }

        try {
            const context = new SigningContextBuilder(consumer, null, { clock: this.clock }).build()
            const body = await this.post(CHPP_REQUEST_TOKEN_URL, sign('POST', CHPP_REQUEST_TOKEN_URL, { oauth_callback: 'oob' }, context))
            const requestToken = parseTokenResponse(body, 'request')
            this.telemetry.trackSyncEventStrict('OAuth.RequestToken.Obtained', {})
            return { authorizationUrl: buildAuthorizationUrl(requestToken.token), requestToken }
        } catch (error) {
            this.telemetry.trackSyncEventStrict('OAuth.RequestToken.Failed', { errorKind: error instanceof Error ? error.name : typeof error })
            throw error
        }
    }

    async exchangeVerificationCode(verifier: string, requestToken: RequestToken, consumer: ConsumerCredentials): Promise<AccessToken> {
        if (!hasConsumerCredentials(consumer)) {
            throw new AuthException('Consumer key and secret are required to exchange a verification code')
        }
        if (!hasTokenCredentials(requestToken)) {
            throw new AuthException('A request token is required to exchange a verification code')
        }
        const code = verifier.trim()
        if (code === '') {
            throw new AuthException('Verification code is empty')
        }

        try {
            const context = new SigningContextBuilder(consumer, requestToken, { clock: this.clock }).build()
            const body = await this.post(CHPP_ACCESS_TOKEN_URL, sign('POST', CHPP_ACCESS_TOKEN_URL, { oauth_verifier: code }, context))
            const accessToken = parseTokenResponse(body, 'access')
            this.telemetry.trackSyncEventStrict('OAuth.AccessToken.Obtained', {})
            return accessToken
        } catch (error) {
            this.telemetry.trackSyncEventStrict('OAuth.AccessToken.Failed', { errorKind: error instanceof Error ? error.name : typeof error })
            throw error
        }
    }

    // OAuth parameters travel in the Authorization header only; the body stays empty.
    private async post(url: string, authorization: string): Promise<string> {
        const response = await this.transport.send({
            method: 'POST',
            url,
            headers: {
                Authorization: authorization,
                'Content-Length': '0',
                'User-Agent': this.config.userAgent
            }
        })
        if (response.status === 401 || response.status === 403) {
            throw new AuthException(`Token endpoint rejected the request (HTTP ${response.status})`)
        }
        if (response.status < 200 || response.status >= 300) {
            throw new AuthException(`Token endpoint returned HTTP ${response.status}`)
        }
        return response.body
    }
}
