/** Sync run models: generations, progress reporting, outcomes and the fetch audit log */

export type GenerationStatus = 'in_progress' | 'completed'

/**
 * One sync run. Every record written during the run carries its id; readers only trust
 * the latest generation whose status is `completed`.
 */
export interface SyncGeneration {
    /** Totally ordered, positive */
    id: number
    startedUtc: string
    status: GenerationStatus
    completedUtc: string | null
}

/**
 * Progress observer. Called synchronously at stage boundaries with a strictly
 * non-decreasing fraction in [0, 1]. Advisory only.
 */
export type ProgressListener = (fraction: number, message: string) => void

export const SYNC_PROGRESS = {
    checkingCredentials: { fraction: 0, message: 'Checking credentials...' },
    begin: { fraction: 0, message: 'Creating sync generation...' },
    teamDetails: { fraction: 0.1, message: 'Fetching user data...' },
    worldDetails: { fraction: 0.3, message: 'Fetching world details...' },
    players: { fraction: 0.6, message: 'Fetching players...' },
    savePlayers: { fraction: 0.85, message: 'Saving players...' },
    finalize: { fraction: 0.9, message: 'Finalizing...' },
    done: { fraction: 1, message: 'Done.' }
} as const

const PLAYER_DETAIL_SPAN = 0.2

/** Per-player detail fetches advance from the roster checkpoint towards (never reaching) the save checkpoint. */
export function playerDetailProgress(index: number, total: number): number {
    const start = SYNC_PROGRESS.players.fraction
    if (total <= 0) return start
    return start + (PLAYER_DETAIL_SPAN * (index + 1)) / total
}

export type SyncOutcome =
    | { status: 'completed'; generationId: number; playerCount: number; detailFallbacks: number }
    | { status: 'no-credentials' }

export type FetchStatus = 'success' | 'error'

/** Audit row written for every CHPP document fetched during a sync. */
export interface FetchLogEntry {
    generationId: number
    document: string
    version: string
    status: FetchStatus
    retryCount: number
    errorMessage: string | null
    fetchedUtc: string
}
