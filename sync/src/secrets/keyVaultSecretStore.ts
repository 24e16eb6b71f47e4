/** Azure Key Vault secret store with retry on reads and telemetry */

import { DefaultAzureCredential } from '@azure/identity'
import { SecretClient } from '@azure/keyvault-secrets'
import type { IClock } from '@touchline/shared'
import type { TelemetryService } from '../telemetry/TelemetryService.js'
import type { ISecretStore } from './secretStore.js'
import { validateSecretKey } from './secretStore.js'

/** The subset of SecretClient this store calls */
export interface KeyVaultSecretOperations {
    getSecret(name: string): Promise<{ value?: string }>
    setSecret(name: string, value: string): Promise<unknown>
    beginDeleteSecret(name: string): Promise<{ pollUntilDone(): Promise<unknown> }>
    beginRecoverDeletedSecret(name: string): Promise<{ pollUntilDone(): Promise<unknown> }>
}

export interface KeyVaultSecretStoreOptions {
    /** Retries after the first read attempt (default: 3) */
    maxRetries?: number
    /** Initial retry delay in ms, doubled per attempt (default: 1000) */
    initialRetryDelayMs?: number
}

function hasStatus(error: unknown, statusCode: number): boolean {
    return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === statusCode
}

export class KeyVaultSecretStore implements ISecretStore {
    private readonly maxRetries: number
    private readonly initialRetryDelayMs: number

    constructor(
        private readonly client: KeyVaultSecretOperations,
        private readonly clock: IClock,
        private readonly telemetry: TelemetryService,
        options: KeyVaultSecretStoreOptions = {}
    ) {
        this.maxRetries = options.maxRetries ?? 3
        this.initialRetryDelayMs = options.initialRetryDelayMs ?? 1000
    }

    async get(key: string): Promise<string | null> {
        validateSecretKey(key)
        let lastError: unknown = null

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            try {
                const secret = await this.client.getSecret(key)
                this.telemetry.trackSyncEventStrict('Secret.Fetch.Success', { secretKey: key, source: 'keyvault' })
                return secret.value || null
            } catch (err) {
                if (hasStatus(err, 404)) {
                    this.telemetry.trackSyncEventStrict('Secret.Fetch.Success', { secretKey: key, source: 'keyvault', found: false })
                    return null
                }
                lastError = err
                if (attempt < this.maxRetries) {
                    const delayMs = this.initialRetryDelayMs * Math.pow(2, attempt)
                    this.telemetry.trace(`Secret ${key} fetch failed, retrying in ${delayMs} ms`, 'warning', { secretKey: key, attempt })
                    await this.clock.sleep(delayMs)
                }
            }
        }

        const message = lastError instanceof Error ? lastError.message : String(lastError)
        this.telemetry.trackSyncEventStrict('Secret.Fetch.Failure', { secretKey: key, source: 'keyvault', error: message })
        throw new Error(`Failed to fetch secret ${key} after ${this.maxRetries + 1} attempts: ${message}`, { cause: lastError })
    }

    /**
     * Write a secret. Soft delete keeps a deleted name reserved (setSecret answers 409 Conflict)
     * until it is recovered or purged, so a deleted secret is recovered first and then overwritten.
     */
    async set(key: string, value: string): Promise<void> {
        validateSecretKey(key)
        try {
            await this.client.setSecret(key, value)
        } catch (err) {
            if (!hasStatus(err, 409)) throw err
            this.telemetry.trace(`Secret ${key} is soft-deleted, recovering before overwrite`, 'information', { secretKey: key })
            const poller = await this.client.beginRecoverDeletedSecret(key)
            await poller.pollUntilDone()
            await this.client.setSecret(key, value)
        }
        this.telemetry.trackSyncEventStrict('Secret.Store.Updated', { secretKey: key })
    }

    async delete(key: string): Promise<void> {
        validateSecretKey(key)
        try {
            const poller = await this.client.beginDeleteSecret(key)
            await poller.pollUntilDone()
        } catch (err) {
            if (!hasStatus(err, 404)) throw err
        }
        this.telemetry.trackSyncEventStrict('Secret.Store.Deleted', { secretKey: key })
    }
}

/**
 * Key Vault store authenticated with Managed Identity (DefaultAzureCredential)
 */
export function createKeyVaultSecretStore(keyVaultName: string, clock: IClock, telemetry: TelemetryService): KeyVaultSecretStore {
    const client = new SecretClient(`https://${keyVaultName}.vault.azure.net`, new DefaultAzureCredential())
    return new KeyVaultSecretStore(client, clock, telemetry)
}
