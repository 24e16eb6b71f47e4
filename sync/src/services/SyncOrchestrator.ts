/**
 * Sync pipeline.
 *
 *   begin → team/user → world details → roster → per-player detail → save players → finalize
 *
 * Stages run strictly in sequence. Any failure outside the per-player detail loop aborts the
 * run and leaves its generation `in_progress`; a detail fetch that fails is replaced by the
 * player's basic view. Storage failures are fatal everywhere.
 */
import type {
    ChppDocumentKey,
    ChppTeam,
    CredentialSource,
    FetchStatus,
    IClock,
    MergedPlayer,
    ProgressListener,
    SigningContext,
    SyncConfig,
    SyncOutcome
} from '@touchline/shared'
import {
    AccessTokenCredentialSource,
    AuthException,
    CHPP_DOCUMENTS,
    describeError,
    hasConsumerCredentials,
    mergePlayer,
    ParseException,
    playerDetailProgress,
    StorageException,
    SYNC_PROGRESS
} from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import type { IChppClient } from '../chpp/ChppClient.js'
import { TOKENS } from '../di/tokens.js'
import { AccessTokenStore } from '../secrets/accessTokenStore.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { ChppRetryPolicy, RetryFailure } from './ChppRetryPolicy.js'
import { SyncPersistenceService } from './SyncPersistenceService.js'

export type CompletedSync = Extract<SyncOutcome, { status: 'completed' }>

type SyncStage = 'begin' | 'teamDetails' | 'worldDetails' | 'players' | 'playerDetails' | 'savePlayers' | 'finalize'

/** Forwards progress to a listener, never letting the fraction go backwards or leave [0, 1] */
export class ProgressReporter {
    private last = 0

    constructor(private readonly listener: ProgressListener) {}

    report(fraction: number, message: string): void {
        this.last = Math.min(1, Math.max(this.last, fraction))
        this.listener(this.last, message)
    }
}

/** The primary club, otherwise the first team listed */
export function selectPrimaryTeam(teams: readonly ChppTeam[]): ChppTeam {
    const primary = teams.find((t) => t.isPrimaryClub === true) ?? teams[0]
    if (!primary) {
        throw new ParseException('teamdetails response contained no teams', 'teamdetails')
    }
    return primary
}

@injectable()
export class SyncOrchestrator {
    constructor(
        @inject(TOKENS.ChppClient) private readonly chpp: IChppClient,
        @inject(ChppRetryPolicy) private readonly retryPolicy: ChppRetryPolicy,
        @inject(SyncPersistenceService) private readonly persistence: SyncPersistenceService,
        @inject(AccessTokenStore) private readonly tokenStore: AccessTokenStore,
        @inject(TOKENS.SyncConfig) private readonly config: SyncConfig,
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * Run a sync with stored credentials. Missing access credentials are an outcome, not an
     * error, so callers can start the OAuth handshake instead.
     * @throws AuthException when the consumer key or secret is not configured
     */
    async performSyncWithStoredCredentials(onProgress: ProgressListener = () => {}): Promise<SyncOutcome> {
        onProgress(SYNC_PROGRESS.checkingCredentials.fraction, SYNC_PROGRESS.checkingCredentials.message)

        const accessToken = await this.tokenStore.load()
        if (!accessToken) {
            this.telemetry.trackSyncEventStrict('Sync.Credentials.Missing', {})
            return { status: 'no-credentials' }
        }
        if (!hasConsumerCredentials(this.config.consumer)) {
            throw new AuthException('CHPP consumer key and secret are not configured')
        }

        return this.performSync(new AccessTokenCredentialSource(this.config.consumer, accessToken, { clock: this.clock }), onProgress)
    }

    async performSync(credentials: CredentialSource, onProgress: ProgressListener = () => {}): Promise<CompletedSync> {
        const progress = new ProgressReporter(onProgress)
        const correlationId = randomUUID()
        const startTime = Date.now()
        let stage: SyncStage = 'begin'
        let generationId: number | null = null

        this.telemetry.trackSyncEventStrict('Sync.Run.Started', {}, { correlationId })

        try {
            progress.report(SYNC_PROGRESS.begin.fraction, SYNC_PROGRESS.begin.message)
            const generation = await this.persistence.beginGeneration()
            generationId = generation.id
            const genId = generation.id
            this.stageCompleted(stage, genId, correlationId)

            stage = 'teamDetails'
            progress.report(SYNC_PROGRESS.teamDetails.fraction, SYNC_PROGRESS.teamDetails.message)
            const { user, teams } = await this.fetchWithLog(genId, 'teamDetails', credentials, (ctx) => this.chpp.teamDetails(ctx))
            const primaryTeam = selectPrimaryTeam(teams)
            for (const team of teams) {
                await this.persistence.saveTeam(user, team, genId)
            }
            this.stageCompleted(stage, genId, correlationId)

            stage = 'worldDetails'
            progress.report(SYNC_PROGRESS.worldDetails.fraction, SYNC_PROGRESS.worldDetails.message)
            const world = await this.fetchWithLog(genId, 'worldDetails', credentials, (ctx) => this.chpp.worldDetails(ctx))
            await this.persistence.saveWorldDetails(world, genId)
            this.stageCompleted(stage, genId, correlationId)

            stage = 'players'
            progress.report(SYNC_PROGRESS.players.fraction, SYNC_PROGRESS.players.message)
            const roster = await this.fetchWithLog(genId, 'players', credentials, (ctx) => this.chpp.players(ctx, primaryTeam.teamId))
            if (roster.players === null) {
                throw new ParseException(`players response for team ${primaryTeam.teamId} contained no player list`, 'players')
            }
            this.stageCompleted(stage, genId, correlationId)

            stage = 'playerDetails'
            const merged: MergedPlayer[] = []
            let detailFallbacks = 0
            const total = roster.players.length
            for (const [index, basic] of roster.players.entries()) {
                try {
                    const detailed = await this.fetchWithLog(genId, 'playerDetails', credentials, (ctx) =>
                        this.chpp.playerDetails(ctx, basic.playerId)
                    )
                    merged.push(mergePlayer(basic, detailed))
                } catch (error) {
                    if (error instanceof StorageException) throw error
                    detailFallbacks++
                    this.telemetry.trackSyncEventStrict(
                        'Sync.Player.DetailFallback',
                        { generationId: genId, playerId: basic.playerId, error: describeError(error) },
                        { correlationId }
                    )
                    merged.push(mergePlayer(basic, null))
                }
                progress.report(playerDetailProgress(index, total), `Fetching player details (${index + 1}/${total})...`)
            }
            this.stageCompleted(stage, genId, correlationId)

            stage = 'savePlayers'
            progress.report(SYNC_PROGRESS.savePlayers.fraction, SYNC_PROGRESS.savePlayers.message)
            await this.persistence.savePlayers(merged, primaryTeam.teamId, genId)
            this.stageCompleted(stage, genId, correlationId)

            stage = 'finalize'
            progress.report(SYNC_PROGRESS.finalize.fraction, SYNC_PROGRESS.finalize.message)
            await this.persistence.completeGeneration(genId)
            progress.report(SYNC_PROGRESS.done.fraction, SYNC_PROGRESS.done.message)

            this.telemetry.trackSyncEventStrict(
                'Sync.Run.Completed',
                { generationId: genId, playerCount: merged.length, detailFallbacks, latencyMs: Date.now() - startTime },
                { correlationId }
            )
            return { status: 'completed', generationId: genId, playerCount: merged.length, detailFallbacks }
        } catch (error) {
            this.telemetry.trackSyncEventStrict(
                'Sync.Run.Failed',
                {
                    generationId,
                    stage,
                    errorKind: error instanceof Error ? error.name : typeof error,
                    error: describeError(error),
                    latencyMs: Date.now() - startTime
                },
                { correlationId }
            )
            if (error instanceof Error) {
                this.telemetry.trackException(error, { stage, generationId, correlationId })
            }
            throw error
        }
    }

    /**
     * Fetch one document through the retry policy and record the outcome in the fetch log.
     * Rejects with the error of the last attempt.
     */
    private async fetchWithLog<T>(
        generationId: number,
        document: ChppDocumentKey,
        credentials: CredentialSource,
        fetch: (context: SigningContext) => Promise<T>
    ): Promise<T> {
        const { file, version } = CHPP_DOCUMENTS[document]
        try {
            const { value, attempts } = await this.retryPolicy.retryWithAttempts(file, credentials, (ctx) => fetch(ctx))
            await this.logFetch(generationId, file, version, 'success', attempts - 1, null)
            return value
        } catch (error) {
            if (!(error instanceof RetryFailure)) throw error
            await this.logFetch(generationId, file, version, 'error', error.attempts - 1, describeError(error.lastError))
            throw error.lastError
        }
    }

    private logFetch(
        generationId: number,
        document: string,
        version: string,
        status: FetchStatus,
        retryCount: number,
        errorMessage: string | null
    ): Promise<void> {
        return this.persistence.recordFetch({
            generationId,
            document,
            version,
            status,
            retryCount,
            errorMessage,
            fetchedUtc: this.clock.nowIso()
        })
    }

    private stageCompleted(stage: SyncStage, generationId: number, correlationId: string): void {
        this.telemetry.trackSyncEventStrict('Sync.Stage.Completed', { stage, generationId }, { correlationId })
        this.telemetry.trace(`Sync stage ${stage} completed`, 'information', { stage, generationId })
    }
}
