import { AuthException } from '../exceptions/syncExceptions.js'
import { CHPP_AUTHORIZE_URL, CHPP_SCOPES } from '../chpp/endpoints.js'
import type { TokenCredentials } from './credentials.js'

/**
 * Parse a form-encoded token response (`oauth_token=...&oauth_token_secret=...`).
 *
 * The provider answers failures with an HTML page and a 200 status, so a body missing
 * either parameter is an AuthException, never an empty token.
 */
export function parseTokenResponse(body: string, leg: 'request' | 'access'): TokenCredentials {
    const params = new URLSearchParams(body.trim())
    const token = params.get('oauth_token')
    const secret = params.get('oauth_token_secret')
    if (!token || !secret) {
        const preview = body.trim().slice(0, 80)
        throw new AuthException(`Unparsable ${leg} token response: ${preview || '<empty>'}`)
    }
    return { token, secret }
}

export function buildAuthorizationUrl(requestToken: string, scopes: readonly string[] = CHPP_SCOPES, authorizeUrl = CHPP_AUTHORIZE_URL): string {
    return `${authorizeUrl}?oauth_token=${encodeURIComponent(requestToken)}&scope=${scopes.join(',')}`
}
