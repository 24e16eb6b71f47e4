/**
 * Abstract base class for Cosmos DB SQL API repositories.
 * Provides the CRUD primitives the sync repositories need, with storage telemetry and
 * translation of SDK failures to StorageException.
 *
 * Concrete repositories receive the client, their container name and TelemetryService via DI.
 */

import type { Container, FeedResponse, ItemResponse, SqlParameter } from '@azure/cosmos'
import { translateStorageError } from '@touchline/shared'
import { injectable } from 'inversify'
import type { TelemetryService } from '../../telemetry/TelemetryService.js'
import type { ICosmosDbSqlClient } from './cosmosDbSqlClient.js'

function statusCodeOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
    return typeof error.code === 'number' ? error.code : undefined
}

/**
 * Base repository for SQL API operations. Every container uses `/id` as its partition key.
 */
@injectable()
export abstract class CosmosDbSqlRepository<T extends { id: string }> {
    protected container: Container
    protected containerName: string

    constructor(
        protected client: ICosmosDbSqlClient,
        containerName: string,
        protected telemetry: TelemetryService
    ) {
        this.containerName = containerName
        this.container = client.getContainer(containerName)
    }

    /**
     * Get entity by ID
     * @returns Entity or null if not found
     */
    protected async getById(id: string): Promise<T | null> {
        const operationName = `${this.containerName}.GetById`
        const startTime = Date.now()

        try {
            const response: ItemResponse<T> = await this.container.item(id, id).read<T>()
            this.trackQuery(operationName, startTime, response.requestCharge, response.resource ? 1 : 0)
            return response.resource ?? null
        } catch (error) {
            // 404 is expected for not found, don't throw
            if (statusCodeOf(error) === 404) {
                this.trackQuery(operationName, startTime, 0, 0)
                return null
            }
            throw this.failure(operationName, startTime, error)
        }
    }

    /**
     * Create a new entity (insert only, fails if exists)
     */
    protected async create(entity: T): Promise<T> {
        const operationName = `${this.containerName}.Create`
        const startTime = Date.now()

        try {
            const response: ItemResponse<T> = await this.container.items.create<T>(entity)
            this.trackUpsert(operationName, startTime, response.requestCharge)
            return response.resource ?? entity
        } catch (error) {
            throw this.failure(operationName, startTime, error)
        }
    }

    /**
     * Upsert an entity (create or replace)
     */
    protected async upsert(entity: T): Promise<T> {
        const operationName = `${this.containerName}.Upsert`
        const startTime = Date.now()

        try {
            const response: ItemResponse<T> = await this.container.items.upsert<T>(entity)
            this.trackUpsert(operationName, startTime, response.requestCharge)
            return response.resource ?? entity
        } catch (error) {
            throw this.failure(operationName, startTime, error)
        }
    }

    /**
     * Query entities using SQL query, draining every page
     */
    protected async query(query: string, parameters: SqlParameter[] = []): Promise<T[]> {
        const operationName = `${this.containerName}.Query`
        const startTime = Date.now()
        let totalRU = 0

        try {
            const iterator = this.container.items.query<T>({ query, parameters })
            const results: T[] = []
            let hasMoreResults = iterator.hasMoreResults()

            while (hasMoreResults) {
                const response: FeedResponse<T> = await iterator.fetchNext()
                totalRU += response.requestCharge
                if (response.resources) {
                    results.push(...response.resources)
                }
                hasMoreResults = iterator.hasMoreResults()
            }

            this.trackQuery(operationName, startTime, totalRU, results.length)
            return results
        } catch (error) {
            throw this.failure(operationName, startTime, error)
        }
    }

    private trackQuery(operationName: string, startTime: number, ruCharge: number, resultCount: number): void {
        this.telemetry.trackSyncEventStrict('Storage.Query.Executed', {
            operationName,
            latencyMs: Date.now() - startTime,
            ruCharge,
            resultCount,
            containerName: this.containerName
        })
    }

    private trackUpsert(operationName: string, startTime: number, ruCharge: number): void {
        this.telemetry.trackSyncEventStrict('Storage.Upsert.Executed', {
            operationName,
            latencyMs: Date.now() - startTime,
            ruCharge,
            containerName: this.containerName
        })
    }

    private failure(operationName: string, startTime: number, error: unknown): Error {
        this.telemetry.trackSyncEventStrict('Storage.Operation.Failed', {
            operationName,
            latencyMs: Date.now() - startTime,
            httpStatusCode: statusCodeOf(error),
            containerName: this.containerName
        })
        return translateStorageError(error, operationName)
    }
}
