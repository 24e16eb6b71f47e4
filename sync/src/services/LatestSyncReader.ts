import type { PlayerRecord, TeamRecord, UserRecord } from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { ISyncRepository } from '../repos/syncRepository.js'

export interface LatestSnapshot {
    generationId: number
    user: UserRecord | null
    teams: TeamRecord[]
    players: PlayerRecord[]
}

/**
 * Read model over the latest completed generation. Records of generations still in progress
 * (or abandoned) are never returned.
 */
@injectable()
export class LatestSyncReader {
    constructor(@inject(TOKENS.SyncRepository) private readonly repository: ISyncRepository) {}

    async getLatestSnapshot(): Promise<LatestSnapshot | null> {
        const generationId = await this.repository.getLatestCompletedGenerationId()
        if (generationId === null) return null

        const [users, teams, players] = await Promise.all([
            this.repository.listRecords('user', generationId),
            this.repository.listRecords('team', generationId),
            this.repository.listRecords('player', generationId)
        ])
        return { generationId, user: users[0] ?? null, teams, players: players.sort((a, b) => a.playerId - b.playerId) }
    }

    async getLatestPlayers(): Promise<PlayerRecord[]> {
        const snapshot = await this.getLatestSnapshot()
        return snapshot ? snapshot.players : []
    }

    async getLatestTeams(): Promise<TeamRecord[]> {
        const snapshot = await this.getLatestSnapshot()
        return snapshot ? snapshot.teams : []
    }

    async getLatestUser(): Promise<UserRecord | null> {
        const snapshot = await this.getLatestSnapshot()
        return snapshot ? snapshot.user : null
    }
}
