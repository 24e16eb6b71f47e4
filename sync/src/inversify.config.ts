/**
 * Container configuration for the sync runtime.
 *
 * Persistence follows PERSISTENCE_MODE (memory | cosmos); the secret store follows KEYVAULT_NAME
 * (Key Vault when set, otherwise a memory store seeded from CHPP_ACCESS_TOKEN / CHPP_ACCESS_SECRET).
 *
 * In test mode (NODE_ENV=test) the NullTelemetryClient is always used.
 */
import 'reflect-metadata'
import type { IClock, SyncConfig } from '@touchline/shared'
import { loadSyncConfig, SystemClock } from '@touchline/shared'
import type { Container } from 'inversify'
import type { IChppClient } from './chpp/ChppClient.js'
import { ChppHttpClient } from './chpp/ChppClient.js'
import { FetchHttpTransport, type IHttpTransport } from './chpp/httpTransport.js'
import { type IOAuthHandshake, OAuthHandshakeService } from './chpp/OAuthHandshakeService.js'
import { TOKENS } from './di/tokens.js'
import { bindCosmosPersistence } from './inversify.cosmos.config.js'
import { bindMemoryPersistence } from './inversify.memory.config.js'
import { type EnvMap, type IPersistenceConfig, loadPersistenceConfig } from './persistenceConfig.js'
import { AccessTokenStore } from './secrets/accessTokenStore.js'
import { createKeyVaultSecretStore } from './secrets/keyVaultSecretStore.js'
import { MemorySecretStore } from './secrets/memorySecretStore.js'
import type { ISecretStore } from './secrets/secretStore.js'
import { ChppRetryPolicy } from './services/ChppRetryPolicy.js'
import { LatestSyncReader } from './services/LatestSyncReader.js'
import { SyncOrchestrator } from './services/SyncOrchestrator.js'
import { SyncPersistenceService } from './services/SyncPersistenceService.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
import { TelemetryService } from './telemetry/TelemetryService.js'

async function resolveTelemetryClient(env: EnvMap): Promise<ITelemetryClient> {
    // Never load real Application Insights in test mode (keeps the process alive)
    if (env.NODE_ENV === 'test') return new NullTelemetryClient()

    const connectionString = env.APPLICATIONINSIGHTS_CONNECTION_STRING
    if (!connectionString) return new NullTelemetryClient()

    const appInsightsModule = await import('applicationinsights')
    const appInsights = appInsightsModule.default
    appInsights.setup(connectionString).setAutoCollectConsole(false).start()
    return appInsights.defaultClient
}

/**
 * Bind services shared by every persistence mode. Does not bind persistence or telemetry.
 */
export function bindSyncServices(container: Container, env: EnvMap = process.env): void {
    container.bind<SyncConfig>(TOKENS.SyncConfig).toConstantValue(loadSyncConfig(env))
    container.bind<IClock>(TOKENS.Clock).toConstantValue(new SystemClock())

    // Consistency policy: concrete services use class-based injection only (no string token).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()

    container
        .bind<IHttpTransport>(TOKENS.HttpTransport)
        .toDynamicValue(() => new FetchHttpTransport())
        .inSingletonScope()
    container.bind<IChppClient>(TOKENS.ChppClient).to(ChppHttpClient).inSingletonScope()
    container.bind<IOAuthHandshake>(TOKENS.OAuthHandshake).to(OAuthHandshakeService).inSingletonScope()

    const keyVaultName = env.KEYVAULT_NAME
    if (keyVaultName) {
        container
            .bind<ISecretStore>(TOKENS.SecretStore)
            .toDynamicValue((ctx) => createKeyVaultSecretStore(keyVaultName, ctx.container.get<IClock>(TOKENS.Clock), ctx.container.get(TelemetryService)))
            .inSingletonScope()
    } else {
        container.bind<ISecretStore>(TOKENS.SecretStore).toConstantValue(MemorySecretStore.fromEnvironment(env))
    }
    container.bind(AccessTokenStore).toSelf().inSingletonScope()

    container.bind(ChppRetryPolicy).toSelf().inSingletonScope()
    container.bind(SyncPersistenceService).toSelf().inSingletonScope()
    container.bind(SyncOrchestrator).toSelf().inSingletonScope()
    container.bind(LatestSyncReader).toSelf().inSingletonScope()
}

export const setupContainer = async (container: Container, env: EnvMap = process.env): Promise<Container> => {
    const config = loadPersistenceConfig(env)
    container.bind<IPersistenceConfig>(TOKENS.PersistenceConfig).toConstantValue(config)

    container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(await resolveTelemetryClient(env))
    bindSyncServices(container, env)

    if (config.mode === 'cosmos') {
        bindCosmosPersistence(container, config)
    } else {
        bindMemoryPersistence(container)
    }

    return container
}
