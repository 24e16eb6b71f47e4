import 'reflect-metadata'
import { Container } from 'inversify'
import assert from 'node:assert'
import { afterEach, beforeEach, describe, test } from 'node:test'
import { TOKENS } from '../../src/di/tokens.js'
import { setupContainer } from '../../src/inversify.config.js'
import type { IPersistenceConfig } from '../../src/persistenceConfig.js'
import { MemorySyncRepository } from '../../src/repos/syncRepository.memory.js'
import { AccessTokenStore } from '../../src/secrets/accessTokenStore.js'
import { ChppRetryPolicy } from '../../src/services/ChppRetryPolicy.js'
import { SyncOrchestrator } from '../../src/services/SyncOrchestrator.js'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from '../../src/telemetry/NullTelemetryClient.js'

describe('setupContainer', () => {
    let container: Container

    beforeEach(() => {
        container = new Container()
    })

    afterEach(() => {
        container.unbindAll()
    })

    test('memory mode resolves the whole sync graph', async () => {
        await setupContainer(container, { NODE_ENV: 'test', CHPP_CONSUMER_KEY: 'test-consumer-key', CHPP_CONSUMER_SECRET: 'test-consumer-secret' })

        assert.strictEqual(container.get<IPersistenceConfig>(TOKENS.PersistenceConfig).mode, 'memory')
        assert.ok(container.get<ITelemetryClient>(TOKENS.TelemetryClient) instanceof NullTelemetryClient)
        assert.ok(container.get(SyncOrchestrator) instanceof SyncOrchestrator)
        assert.strictEqual(container.get(TOKENS.SyncRepository), container.get(MemorySyncRepository))
        assert.strictEqual(container.get(ChppRetryPolicy), container.get(ChppRetryPolicy))
    })

    test('access token is seeded from the environment outside production', async () => {
        await setupContainer(container, { NODE_ENV: 'test', CHPP_ACCESS_TOKEN: 'test-token', CHPP_ACCESS_SECRET: 'test-token-secret' })

        assert.deepStrictEqual(await container.get(AccessTokenStore).load(), { token: 'test-token', secret: 'test-token-secret' })
    })

    test('invalid sync configuration fails at startup', async () => {
        await assert.rejects(setupContainer(container, { NODE_ENV: 'test', CHPP_MAX_RETRIES: 'many' }), /Invalid sync configuration\. CHPP_MAX_RETRIES/)
    })

    test('cosmos mode binds the Cosmos repository', async () => {
        await setupContainer(container, {
            NODE_ENV: 'test',
            PERSISTENCE_MODE: 'cosmos',
            COSMOS_SQL_ENDPOINT: 'https://example.documents.azure.com:443/',
            COSMOS_SQL_DATABASE: 'touchline'
        })

        assert.strictEqual(container.get<IPersistenceConfig>(TOKENS.PersistenceConfig).mode, 'cosmos')
        assert.ok(container.isBound(TOKENS.CosmosDbSqlClient))
        assert.strictEqual(container.get<string>(TOKENS.CosmosContainerFetchLog), 'syncFetchLog')
        assert.ok(!container.isBound(MemorySyncRepository))
    })
})
