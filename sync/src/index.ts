// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'

export { type IChppClient, ChppHttpClient } from './chpp/ChppClient.js'
export { decodeChppDocument, extractChppError, parseChppXml } from './chpp/chppDocumentDecoder.js'
export { FetchHttpTransport, type HttpRequest, type HttpResponse, type IHttpTransport } from './chpp/httpTransport.js'
export { type AuthorizationRequest, type IOAuthHandshake, OAuthHandshakeService } from './chpp/OAuthHandshakeService.js'
export { TOKENS } from './di/tokens.js'
export { bindSyncServices, setupContainer } from './inversify.config.js'
export { type IPersistenceConfig, loadPersistenceConfig, type PersistenceMode } from './persistenceConfig.js'
export type { ISyncRepository } from './repos/syncRepository.js'
export { MemorySyncRepository } from './repos/syncRepository.memory.js'
export { CosmosSyncRepository } from './repos/syncRepository.cosmos.js'
export { AccessTokenStore } from './secrets/accessTokenStore.js'
export { KeyVaultSecretStore } from './secrets/keyVaultSecretStore.js'
export { MemorySecretStore } from './secrets/memorySecretStore.js'
export { ALLOWED_SECRET_KEYS, type ISecretStore } from './secrets/secretStore.js'
export { ChppRetryPolicy, RetryFailure } from './services/ChppRetryPolicy.js'
export { type LatestSnapshot, LatestSyncReader } from './services/LatestSyncReader.js'
export { type CompletedSync, ProgressReporter, selectPrimaryTeam, SyncOrchestrator } from './services/SyncOrchestrator.js'
export { SyncPersistenceService } from './services/SyncPersistenceService.js'
export type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
export { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
export { TelemetryService } from './telemetry/TelemetryService.js'
