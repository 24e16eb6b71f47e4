/**
 * OAuth 1.0a HMAC-SHA1 request signing (RFC 5849 §3.4).
 *
 * Pure functions: freshness comes from the SigningContext handed in, never from state held here.
 */
import { createHmac } from 'node:crypto'
import type { SigningContext } from './signingContext.js'
import { OAUTH_VERSION } from './signingContext.js'

export type HttpMethod = 'GET' | 'POST'
export type RequestParameters = Readonly<Record<string, string>>
export type AuthorizationHeaderValue = string

/** RFC 3986 unreserved-set encoding (encodeURIComponent leaves !'()* alone) */
export function percentEncode(value: string): string {
    return encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
}

/** Scheme, host and path only; lowercased scheme/host, default port dropped, query removed. */
export function normalizeUrl(url: string): string {
    const parsed = new URL(url)
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`
}

export function oauthProtocolParameters(context: SigningContext): Record<string, string> {
    const params: Record<string, string> = {
        oauth_consumer_key: context.consumer.key,
        oauth_nonce: context.nonce,
        oauth_signature_method: context.signatureMethod,
        oauth_timestamp: context.timestamp,
        oauth_version: OAUTH_VERSION
    }
    if (context.token) {
        params.oauth_token = context.token.token
    }
    return params
}

/**
 * Encoded key=value pairs sorted by encoded key, then encoded value.
 */
export function normalizeParameters(params: Array<[string, string]>): string {
    return params
        .map(([k, v]): [string, string] => [percentEncode(k), percentEncode(v)])
        .sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)))
        .map(([k, v]) => `${k}=${v}`)
        .join('&')
}

function compare(a: string, b: string): number {
    if (a < b) return -1
    return a > b ? 1 : 0
}

export function buildSignatureBaseString(method: HttpMethod, url: string, params: Array<[string, string]>): string {
    const queryParams = Array.from(new URL(url).searchParams.entries())
    return [method.toUpperCase(), percentEncode(normalizeUrl(url)), percentEncode(normalizeParameters([...queryParams, ...params]))].join('&')
}

export function computeSignature(baseString: string, consumerSecret: string, tokenSecret = ''): string {
    const key = `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`
    return createHmac('sha1', key).update(baseString).digest('base64')
}

export function buildAuthorizationHeader(oauthParams: Record<string, string>): AuthorizationHeaderValue {
    const pairs = Object.keys(oauthParams)
        .sort()
        .map((k) => `${percentEncode(k)}="${percentEncode(oauthParams[k] ?? '')}"`)
    return `OAuth ${pairs.join(', ')}`
}

/**
 * Sign a request and return the Authorization header value.
 * @param parameters - Endpoint parameters (query or form). Any `oauth_*` entries
 *   (callback, verifier) are signed and also emitted in the header.
 */
export function sign(method: HttpMethod, url: string, parameters: RequestParameters, context: SigningContext): AuthorizationHeaderValue {
    const protocol = oauthProtocolParameters(context)
    const extraOauth = Object.fromEntries(Object.entries(parameters).filter(([k]) => k.startsWith('oauth_')))
    const baseString = buildSignatureBaseString(method, url, [...Object.entries(protocol), ...Object.entries(parameters)])
    const signature = computeSignature(baseString, context.consumer.secret, context.token?.secret ?? '')
    return buildAuthorizationHeader({ ...protocol, ...extraOauth, oauth_signature: signature })
}
