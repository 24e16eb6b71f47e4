/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Keeping them in one place reduces drift and typos across container configs and @inject decorators.
 */
export const TOKENS = {
    // Core
    PersistenceConfig: 'PersistenceConfig',
    SyncConfig: 'SyncConfig',
    TelemetryClient: 'ITelemetryClient',
    Clock: 'IClock',

    // CHPP access
    HttpTransport: 'IHttpTransport',
    ChppClient: 'IChppClient',
    OAuthHandshake: 'IOAuthHandshake',

    // Cosmos SQL
    CosmosDbSqlConfig: 'CosmosDbSqlConfig',
    CosmosDbSqlClient: 'CosmosDbSqlClient',
    CosmosContainerSyncRecords: 'CosmosContainer:SyncRecords',
    CosmosContainerGenerations: 'CosmosContainer:Generations',
    CosmosContainerFetchLog: 'CosmosContainer:FetchLog',

    // Repositories & stores
    SyncRepository: 'ISyncRepository',
    SecretStore: 'ISecretStore'
} as const
