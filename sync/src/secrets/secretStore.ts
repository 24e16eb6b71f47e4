/** Secret storage seam for the CHPP access token pair */

/** Allowlisted secret keys */
export const ALLOWED_SECRET_KEYS = ['chpp-access-token', 'chpp-access-secret'] as const

export type AllowedSecretKey = (typeof ALLOWED_SECRET_KEYS)[number]

/**
 * Validate that the secret key is in the allowlist
 */
export function validateSecretKey(key: string): asserts key is AllowedSecretKey {
    if (!(ALLOWED_SECRET_KEYS as readonly string[]).includes(key)) {
        throw new Error(`Secret key "${key}" is not in allowlist. Allowed keys: ${ALLOWED_SECRET_KEYS.join(', ')}`)
    }
}

export interface ISecretStore {
    /** @returns the stored value, or null when the secret does not exist */
    get(key: string): Promise<string | null>
    set(key: string, value: string): Promise<void>
    /** Deleting a missing secret is not an error */
    delete(key: string): Promise<void>
}
