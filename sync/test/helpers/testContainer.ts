/**
 * Test container: the production service graph with in-process doubles for time, HTTP,
 * telemetry, secrets and (optionally) Cosmos.
 */
import 'reflect-metadata'
import { FakeClock, type IClock } from '@touchline/shared'
import { Container } from 'inversify'
import type { IHttpTransport } from '../../src/chpp/httpTransport.js'
import { TOKENS } from '../../src/di/tokens.js'
import { bindSyncServices } from '../../src/inversify.config.js'
import { bindCosmosSyncRepository } from '../../src/inversify.cosmos.config.js'
import { bindMemoryPersistence } from '../../src/inversify.memory.config.js'
import type { EnvMap, IPersistenceConfig } from '../../src/persistenceConfig.js'
import type { ICosmosDbSqlClient } from '../../src/repos/base/cosmosDbSqlClient.js'
import { MemorySecretStore } from '../../src/secrets/memorySecretStore.js'
import type { AllowedSecretKey, ISecretStore } from '../../src/secrets/secretStore.js'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'
import { FakeHttpTransport } from '../mocks/FakeHttpTransport.js'
import { createMockCosmosDbSqlClient, type MockCosmosDbSqlClient } from '../mocks/mockCosmosDbSqlClient.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

export const TEST_ENV: EnvMap = {
    NODE_ENV: 'test',
    CHPP_CONSUMER_KEY: 'test-consumer-key',
    CHPP_CONSUMER_SECRET: 'test-consumer-secret'
}

export const TEST_CONTAINERS = { syncRecords: 'syncRecords', generations: 'syncGenerations', fetchLog: 'syncFetchLog' }

export interface TestContainerOptions {
    mode?: 'memory' | 'cosmos'
    env?: EnvMap
    /** Seed for the secret store; omit for a store with no access token */
    secrets?: Partial<Record<AllowedSecretKey, string>>
}

export interface TestHarness {
    container: Container
    clock: FakeClock
    transport: FakeHttpTransport
    telemetry: MockTelemetryClient
    secrets: MemorySecretStore
    /** Only set in cosmos mode */
    cosmos: MockCosmosDbSqlClient | null
}

export const TEST_ACCESS_SECRETS: Record<AllowedSecretKey, string> = { 'chpp-access-token': 'test-token', 'chpp-access-secret': 'test-token-secret' }

export function createTestContainer(options: TestContainerOptions = {}): TestHarness {
    const mode = options.mode ?? 'memory'
    const container = new Container()
    const clock = new FakeClock()
    const transport = new FakeHttpTransport()
    const telemetry = new MockTelemetryClient()
    const secrets = new MemorySecretStore(options.secrets ?? {})

    container.bind<IPersistenceConfig>(TOKENS.PersistenceConfig).toConstantValue({ mode })
    container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(telemetry)
    bindSyncServices(container, { ...TEST_ENV, ...options.env })

    container.rebind<IClock>(TOKENS.Clock).toConstantValue(clock)
    container.rebind<IHttpTransport>(TOKENS.HttpTransport).toConstantValue(transport)
    container.rebind<ISecretStore>(TOKENS.SecretStore).toConstantValue(secrets)

    let cosmos: MockCosmosDbSqlClient | null = null
    if (mode === 'cosmos') {
        cosmos = createMockCosmosDbSqlClient()
        container.bind<ICosmosDbSqlClient>(TOKENS.CosmosDbSqlClient).toConstantValue(cosmos)
        bindCosmosSyncRepository(container, TEST_CONTAINERS)
    } else {
        bindMemoryPersistence(container)
    }

    return { container, clock, transport, telemetry, secrets, cosmos }
}
