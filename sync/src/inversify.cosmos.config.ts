import type { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import type { IPersistenceConfig } from './persistenceConfig.js'
import { CosmosDbSqlClient, type CosmosDbSqlClientConfig, type ICosmosDbSqlClient } from './repos/base/cosmosDbSqlClient.js'
import { CosmosFetchLogStore, CosmosGenerationStore, CosmosSyncRecordStore, CosmosSyncRepository } from './repos/syncRepository.cosmos.js'
import type { ISyncRepository } from './repos/syncRepository.js'

/**
 * Cosmos persistence bindings.
 *
 * Note: common bindings (telemetry, clock, CHPP access, services) are registered by setupContainer.
 */
export function bindCosmosPersistence(container: Container, config: IPersistenceConfig): void {
    if (config.mode !== 'cosmos' || !config.cosmosSql) {
        throw new Error('Cosmos SQL API configuration incomplete. Required: COSMOS_SQL_ENDPOINT, COSMOS_SQL_DATABASE')
    }
    const { endpoint, database, key, containers } = config.cosmosSql

    container.bind<CosmosDbSqlClientConfig>(TOKENS.CosmosDbSqlConfig).toConstantValue({ endpoint, database, key })
    container.bind<ICosmosDbSqlClient>(TOKENS.CosmosDbSqlClient).to(CosmosDbSqlClient).inSingletonScope()

    bindCosmosSyncRepository(container, containers)
}

/** Repository bindings on top of an already bound CosmosDbSqlClient (tests bind a mock client) */
export function bindCosmosSyncRepository(container: Container, containers: { syncRecords: string; generations: string; fetchLog: string }): void {
    container.bind<string>(TOKENS.CosmosContainerSyncRecords).toConstantValue(containers.syncRecords)
    container.bind<string>(TOKENS.CosmosContainerGenerations).toConstantValue(containers.generations)
    container.bind<string>(TOKENS.CosmosContainerFetchLog).toConstantValue(containers.fetchLog)

    container.bind(CosmosGenerationStore).toSelf().inSingletonScope()
    container.bind(CosmosSyncRecordStore).toSelf().inSingletonScope()
    container.bind(CosmosFetchLogStore).toSelf().inSingletonScope()
    container.bind<ISyncRepository>(TOKENS.SyncRepository).to(CosmosSyncRepository).inSingletonScope()
}
