/** Persistence configuration & mode resolution */

export type PersistenceMode = 'memory' | 'cosmos'

export interface IPersistenceConfig {
    mode: PersistenceMode
    cosmosSql?: {
        endpoint: string
        database: string
        /** Account key; managed identity is used when absent */
        key?: string
        containers: {
            syncRecords: string
            generations: string
            fetchLog: string
        }
    }
}

export type EnvMap = Record<string, string | undefined>

export function resolvePersistenceMode(env: EnvMap = process.env): PersistenceMode {
    const m = (env.PERSISTENCE_MODE || 'memory').toLowerCase()
    return m === 'cosmos' ? 'cosmos' : 'memory'
}

/**
 * Load persistence configuration from the environment.
 *
 * Cosmos mode with an incomplete configuration throws under PERSISTENCE_STRICT and otherwise
 * falls back to memory mode with a warning.
 */
export function loadPersistenceConfig(env: EnvMap = process.env, warn: (message: string) => void = console.warn): IPersistenceConfig {
    const mode = resolvePersistenceMode(env)
    if (mode !== 'cosmos') return { mode: 'memory' }

    const strict = env.PERSISTENCE_STRICT === '1' || env.PERSISTENCE_STRICT === 'true'
    const endpoint = env.COSMOS_SQL_ENDPOINT?.trim()
    const database = env.COSMOS_SQL_DATABASE?.trim()

    if (!endpoint || !database) {
        const missingVars: string[] = []
        if (!endpoint) missingVars.push('COSMOS_SQL_ENDPOINT')
        if (!database) missingVars.push('COSMOS_SQL_DATABASE')

        if (strict) {
            throw new Error(`PERSISTENCE_STRICT enabled but Cosmos SQL API configuration incomplete. Missing: ${missingVars.join(', ')}`)
        }
        warn(`[persistenceConfig] Cosmos SQL API configuration incomplete (missing ${missingVars.join(', ')}); falling back to memory mode.`)
        return { mode: 'memory' }
    }

    return {
        mode,
        cosmosSql: {
            endpoint,
            database,
            key: env.COSMOS_SQL_KEY || undefined,
            containers: {
                syncRecords: env.COSMOS_SQL_CONTAINER_SYNC || 'syncRecords',
                generations: env.COSMOS_SQL_CONTAINER_GENERATIONS || 'syncGenerations',
                fetchLog: env.COSMOS_SQL_CONTAINER_FETCH_LOG || 'syncFetchLog'
            }
        }
    }
}
