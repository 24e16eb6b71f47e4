/**
 * Cosmos DB SQL API client interface and implementation.
 *
 * Wraps the @azure/cosmos SDK and hands out containers to the repositories.
 */

import { CosmosClient, type Container, type Database } from '@azure/cosmos'
import { DefaultAzureCredential } from '@azure/identity'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../../di/tokens.js'

export interface CosmosDbSqlClientConfig {
    endpoint: string
    database: string
    /** Account key; managed identity is used when absent */
    key?: string
}

export interface ICosmosDbSqlClient {
    /**
     * @param containerName - e.g. 'syncRecords', 'syncGenerations'
     */
    getContainer(containerName: string): Container

    getDatabase(): Database
}

/**
 * Uses Managed Identity (DefaultAzureCredential) for authentication unless a key is configured.
 */
@injectable()
export class CosmosDbSqlClient implements ICosmosDbSqlClient {
    private client: CosmosClient
    private database: Database

    constructor(@inject(TOKENS.CosmosDbSqlConfig) config: CosmosDbSqlClientConfig) {
        if (config.key) {
            this.client = new CosmosClient({ endpoint: config.endpoint, key: config.key })
        } else {
            this.client = new CosmosClient({ endpoint: config.endpoint, aadCredentials: new DefaultAzureCredential() })
        }
        this.database = this.client.database(config.database)
    }

    getContainer(containerName: string): Container {
        return this.database.container(containerName)
    }

    getDatabase(): Database {
        return this.database
    }
}
