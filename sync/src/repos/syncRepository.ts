import type { FetchLogEntry, SyncGeneration, SyncRecordKind, SyncRecordMap } from '@touchline/shared'

/**
 * Storage for sync generations, the records written under them and the fetch audit log.
 *
 * Records are keyed by (kind, natural id, generation id); writing an existing key replaces it.
 * Implementations translate backend failures to StorageException.
 */
export interface ISyncRepository {
    /** Allocate the next generation id (greater than every existing one) with status `in_progress` */
    createGeneration(startedUtc: string): Promise<SyncGeneration>
    completeGeneration(id: number, completedUtc: string): Promise<SyncGeneration>
    getGeneration(id: number): Promise<SyncGeneration | null>
    /** Highest generation id whose status is `completed`, or null when none exists */
    getLatestCompletedGenerationId(): Promise<number | null>

    upsertRecords<K extends SyncRecordKind>(kind: K, generationId: number, records: readonly SyncRecordMap[K][]): Promise<void>
    listRecords<K extends SyncRecordKind>(kind: K, generationId: number): Promise<SyncRecordMap[K][]>

    recordFetch(entry: FetchLogEntry): Promise<void>
    listFetchLog(generationId: number): Promise<FetchLogEntry[]>
}
