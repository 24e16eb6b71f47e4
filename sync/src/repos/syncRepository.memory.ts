import type { FetchLogEntry, SyncGeneration, SyncRecordKind, SyncRecordMap } from '@touchline/shared'
import { naturalIdOf, StorageException } from '@touchline/shared'
import { injectable } from 'inversify'
import type { ISyncRepository } from './syncRepository.js'

type RecordTables = { [K in SyncRecordKind]: Map<number, Map<string, SyncRecordMap[K]>> }

function emptyTables(): RecordTables {
    return {
        language: new Map(),
        currency: new Map(),
        country: new Map(),
        region: new Map(),
        league: new Map(),
        cup: new Map(),
        user: new Map(),
        team: new Map(),
        player: new Map()
    }
}

/**
 * In-memory sync repository for local runs and tests. Records are copied on the way in and out.
 */
@injectable()
export class MemorySyncRepository implements ISyncRepository {
    private generations = new Map<number, SyncGeneration>()
    private tables: RecordTables = emptyTables()
    private fetchLog: FetchLogEntry[] = []

    async createGeneration(startedUtc: string): Promise<SyncGeneration> {
        const id = Math.max(0, ...this.generations.keys()) + 1
        const generation: SyncGeneration = { id, startedUtc, status: 'in_progress', completedUtc: null }
        this.generations.set(id, generation)
        return { ...generation }
    }

    async completeGeneration(id: number, completedUtc: string): Promise<SyncGeneration> {
        const existing = this.generations.get(id)
        if (!existing) {
            throw new StorageException(`Generation ${id} not found`, 'completeGeneration', 404)
        }
        const completed: SyncGeneration = { ...existing, status: 'completed', completedUtc }
        this.generations.set(id, completed)
        return { ...completed }
    }

    async getGeneration(id: number): Promise<SyncGeneration | null> {
        const generation = this.generations.get(id)
        return generation ? { ...generation } : null
    }

    async getLatestCompletedGenerationId(): Promise<number | null> {
        let latest: number | null = null
        for (const generation of this.generations.values()) {
            if (generation.status === 'completed' && (latest === null || generation.id > latest)) {
                latest = generation.id
            }
        }
        return latest
    }

    async upsertRecords<K extends SyncRecordKind>(kind: K, generationId: number, records: readonly SyncRecordMap[K][]): Promise<void> {
        const table: Map<number, Map<string, SyncRecordMap[K]>> = this.tables[kind]
        let rows = table.get(generationId)
        if (!rows) {
            rows = new Map()
            table.set(generationId, rows)
        }
        for (const record of records) {
            rows.set(naturalIdOf(kind, record), structuredClone(record))
        }
    }

    async listRecords<K extends SyncRecordKind>(kind: K, generationId: number): Promise<SyncRecordMap[K][]> {
        const table: Map<number, Map<string, SyncRecordMap[K]>> = this.tables[kind]
        const rows = table.get(generationId)
        return rows ? Array.from(rows.values(), (record) => structuredClone(record)) : []
    }

    async recordFetch(entry: FetchLogEntry): Promise<void> {
        this.fetchLog.push({ ...entry })
    }

    async listFetchLog(generationId: number): Promise<FetchLogEntry[]> {
        return this.fetchLog.filter((e) => e.generationId === generationId).map((e) => ({ ...e }))
    }

    /** Reset all state (for tests) */
    clear(): void {
        this.generations.clear()
        this.tables = emptyTables()
        this.fetchLog = []
    }
}
