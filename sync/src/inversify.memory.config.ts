import type { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import type { ISyncRepository } from './repos/syncRepository.js'
import { MemorySyncRepository } from './repos/syncRepository.memory.js'

/**
 * In-memory persistence bindings for local runs and tests.
 *
 * Note: common bindings (telemetry, clock, CHPP access, services) are registered by setupContainer.
 */
export function bindMemoryPersistence(container: Container): void {
    container.bind(MemorySyncRepository).toSelf().inSingletonScope()
    container.bind<ISyncRepository>(TOKENS.SyncRepository).toService(MemorySyncRepository)
}
