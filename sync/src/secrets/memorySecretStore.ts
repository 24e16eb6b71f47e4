import type { AllowedSecretKey, ISecretStore } from './secretStore.js'
import { validateSecretKey } from './secretStore.js'

const ENV_FALLBACKS: Record<AllowedSecretKey, string> = {
    'chpp-access-token': 'CHPP_ACCESS_TOKEN',
    'chpp-access-secret': 'CHPP_ACCESS_SECRET'
}

/**
 * Process-local secret store for development and tests.
 */
export class MemorySecretStore implements ISecretStore {
    private readonly values = new Map<AllowedSecretKey, string>()

    constructor(seed: Partial<Record<AllowedSecretKey, string>> = {}) {
        for (const [key, value] of Object.entries(seed)) {
            validateSecretKey(key)
            if (value) this.values.set(key, value)
        }
    }

    /**
     * Seed from CHPP_ACCESS_TOKEN / CHPP_ACCESS_SECRET.
     * @throws when those variables are set while NODE_ENV is production
     */
    static fromEnvironment(env: Record<string, string | undefined> = process.env): MemorySecretStore {
        const seed: Partial<Record<AllowedSecretKey, string>> = {}
        const nodeEnv = env.NODE_ENV || 'development'
        for (const [key, envVarName] of Object.entries(ENV_FALLBACKS)) {
            validateSecretKey(key)
            const value = env[envVarName]
            if (!value) continue
            if (nodeEnv === 'production') {
                throw new Error(`Refusing to use local environment variable ${envVarName} in production. Configure Key Vault properly.`)
            }
            seed[key] = value
        }
        return new MemorySecretStore(seed)
    }

    async get(key: string): Promise<string | null> {
        validateSecretKey(key)
        return this.values.get(key) ?? null
    }

    async set(key: string, value: string): Promise<void> {
        validateSecretKey(key)
        this.values.set(key, value)
    }

    async delete(key: string): Promise<void> {
        validateSecretKey(key)
        this.values.delete(key)
    }
}
