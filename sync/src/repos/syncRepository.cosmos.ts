/**
 * Cosmos SQL implementation of the sync repository.
 *
 * Three containers, each partitioned on `/id`:
 * - generations: one document per sync run
 * - records: every synced entity, id `${kind}:${naturalId}:${generationId}`
 * - fetch log: one document per CHPP fetch
 */
import type { FetchLogEntry, GenerationStatus, SyncGeneration, SyncRecordKind, SyncRecordMap } from '@touchline/shared'
import { naturalIdOf, StorageException } from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { CosmosDbSqlRepository } from './base/CosmosDbSqlRepository.js'
import type { ICosmosDbSqlClient } from './base/cosmosDbSqlClient.js'
import type { ISyncRepository } from './syncRepository.js'

export interface GenerationDocument {
    id: string
    generationId: number
    startedUtc: string
    status: GenerationStatus
    completedUtc: string | null
}

export interface SyncRecordDocument<K extends SyncRecordKind = SyncRecordKind> {
    id: string
    kind: K
    naturalId: string
    generationId: number
    record: SyncRecordMap[K]
}

export type FetchLogDocument = FetchLogEntry & { id: string }

function isDocumentOfKind<K extends SyncRecordKind>(doc: SyncRecordDocument, kind: K): doc is SyncRecordDocument<K> {
    return doc.kind === kind
}

function toGeneration(doc: GenerationDocument): SyncGeneration {
    return { id: doc.generationId, startedUtc: doc.startedUtc, status: doc.status, completedUtc: doc.completedUtc }
}

function toFetchLogEntry({ id: _id, ...entry }: FetchLogDocument): FetchLogEntry {
    return entry
}

@injectable()
export class CosmosGenerationStore extends CosmosDbSqlRepository<GenerationDocument> {
    constructor(
        @inject(TOKENS.CosmosDbSqlClient) client: ICosmosDbSqlClient,
        @inject(TOKENS.CosmosContainerGenerations) containerName: string,
        @inject(TelemetryService) telemetry: TelemetryService
    ) {
        super(client, containerName, telemetry)
    }

    async insert(doc: GenerationDocument): Promise<GenerationDocument> {
        return this.create(doc)
    }

    async save(doc: GenerationDocument): Promise<GenerationDocument> {
        return this.upsert(doc)
    }

    async find(generationId: number): Promise<GenerationDocument | null> {
        return this.getById(String(generationId))
    }

    async list(): Promise<GenerationDocument[]> {
        return this.query('SELECT * FROM c')
    }

    async listByStatus(status: GenerationStatus): Promise<GenerationDocument[]> {
        const docs = await this.query('SELECT * FROM c WHERE c.status = @status', [{ name: '@status', value: status }])
        return docs.filter((d) => d.status === status)
    }
}

@injectable()
export class CosmosSyncRecordStore extends CosmosDbSqlRepository<SyncRecordDocument> {
    constructor(
        @inject(TOKENS.CosmosDbSqlClient) client: ICosmosDbSqlClient,
        @inject(TOKENS.CosmosContainerSyncRecords) containerName: string,
        @inject(TelemetryService) telemetry: TelemetryService
    ) {
        super(client, containerName, telemetry)
    }

    async save(doc: SyncRecordDocument): Promise<void> {
        await this.upsert(doc)
    }

    async list<K extends SyncRecordKind>(kind: K, generationId: number): Promise<SyncRecordMap[K][]> {
        const docs = await this.query('SELECT * FROM c WHERE c.kind = @kind AND c.generationId = @generationId', [
            { name: '@kind', value: kind },
            { name: '@generationId', value: generationId }
        ])
        const records: SyncRecordMap[K][] = []
        for (const doc of docs) {
            if (isDocumentOfKind(doc, kind) && doc.generationId === generationId) {
                records.push(doc.record)
            }
        }
        return records
    }
}

@injectable()
export class CosmosFetchLogStore extends CosmosDbSqlRepository<FetchLogDocument> {
    constructor(
        @inject(TOKENS.CosmosDbSqlClient) client: ICosmosDbSqlClient,
        @inject(TOKENS.CosmosContainerFetchLog) containerName: string,
        @inject(TelemetryService) telemetry: TelemetryService
    ) {
        super(client, containerName, telemetry)
    }

    async append(entry: FetchLogEntry): Promise<void> {
        await this.create({ id: randomUUID(), ...entry })
    }

    async list(generationId: number): Promise<FetchLogEntry[]> {
        const docs = await this.query('SELECT * FROM c WHERE c.generationId = @generationId', [
            { name: '@generationId', value: generationId }
        ])
        return docs
            .filter((d) => d.generationId === generationId)
            .sort((a, b) => a.fetchedUtc.localeCompare(b.fetchedUtc))
            .map(toFetchLogEntry)
    }
}

@injectable()
export class CosmosSyncRepository implements ISyncRepository {
    constructor(
        @inject(CosmosGenerationStore) private readonly generations: CosmosGenerationStore,
        @inject(CosmosSyncRecordStore) private readonly records: CosmosSyncRecordStore,
        @inject(CosmosFetchLogStore) private readonly fetchLog: CosmosFetchLogStore
    ) {}

    // Callers serialize syncs; two processes allocating at once would collide on create (409).
    async createGeneration(startedUtc: string): Promise<SyncGeneration> {
        const existing = await this.generations.list()
        const generationId = Math.max(0, ...existing.map((d) => d.generationId)) + 1
        const doc = await this.generations.insert({
            id: String(generationId),
            generationId,
            startedUtc,
            status: 'in_progress',
            completedUtc: null
        })
        return toGeneration(doc)
    }

    async completeGeneration(id: number, completedUtc: string): Promise<SyncGeneration> {
        const existing = await this.generations.find(id)
        if (!existing) {
            throw new StorageException(`Generation ${id} not found`, 'completeGeneration', 404)
        }
        const doc = await this.generations.save({ ...existing, status: 'completed', completedUtc })
        return toGeneration(doc)
    }

    async getGeneration(id: number): Promise<SyncGeneration | null> {
        const doc = await this.generations.find(id)
        return doc ? toGeneration(doc) : null
    }

    async getLatestCompletedGenerationId(): Promise<number | null> {
        const completed = await this.generations.listByStatus('completed')
        if (completed.length === 0) return null
        return Math.max(...completed.map((d) => d.generationId))
    }

    async upsertRecords<K extends SyncRecordKind>(kind: K, generationId: number, records: readonly SyncRecordMap[K][]): Promise<void> {
        for (const record of records) {
            const naturalId = naturalIdOf(kind, record)
            const doc: SyncRecordDocument<K> = { id: `${kind}:${naturalId}:${generationId}`, kind, naturalId, generationId, record }
            await this.records.save(doc)
        }
    }

    listRecords<K extends SyncRecordKind>(kind: K, generationId: number): Promise<SyncRecordMap[K][]> {
        return this.records.list(kind, generationId)
    }

    recordFetch(entry: FetchLogEntry): Promise<void> {
        return this.fetchLog.append(entry)
    }

    listFetchLog(generationId: number): Promise<FetchLogEntry[]> {
        return this.fetchLog.list(generationId)
    }
}
