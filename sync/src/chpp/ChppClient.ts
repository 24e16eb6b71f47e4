/**
 * CHPP client facade: one method per document the sync pipeline needs.
 *
 * Every call is a signed GET against the data endpoint and takes a freshly built SigningContext;
 * the facade itself holds no credentials or nonce state.
 */
import type {
    ChppDocumentKey,
    DetailedPlayer,
    PlayerList,
    SigningContext,
    SyncConfig,
    TeamDetails,
    WorldDetails
} from '@touchline/shared'
import {
    AuthException,
    CHPP_ACCEPT_HEADER,
    CHPP_ACCEPT_LANGUAGE,
    CHPP_DATA_URL,
    CHPP_DOCUMENTS,
    NetworkException,
    ParseException,
    PlayerDetailsDocumentSchema,
    PlayersDocumentSchema,
    sign,
    TeamDetailsDocumentSchema,
    WorldDetailsDocumentSchema
} from '@touchline/shared'
import { inject, injectable } from 'inversify'
import type { z } from 'zod'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { decodeChppDocument, tryExtractChppError } from './chppDocumentDecoder.js'
import type { IHttpTransport } from './httpTransport.js'

export interface IChppClient {
    worldDetails(context: SigningContext): Promise<WorldDetails>
    /** Omit `teamId` for the authenticated user's own teams */
    teamDetails(context: SigningContext, teamId?: string): Promise<TeamDetails>
    players(context: SigningContext, teamId: string): Promise<PlayerList>
    playerDetails(context: SigningContext, playerId: number): Promise<DetailedPlayer>
}

@injectable()
export class ChppHttpClient implements IChppClient {
    constructor(
        @inject(TOKENS.HttpTransport) private readonly transport: IHttpTransport,
        @inject(TOKENS.SyncConfig) private readonly config: SyncConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    worldDetails(context: SigningContext): Promise<WorldDetails> {
        return this.fetchDocument('worldDetails', {}, context, WorldDetailsDocumentSchema)
    }

    teamDetails(context: SigningContext, teamId?: string): Promise<TeamDetails> {
        return this.fetchDocument('teamDetails', teamId ? { teamID: teamId } : {}, context, TeamDetailsDocumentSchema)
    }

    players(context: SigningContext, teamId: string): Promise<PlayerList> {
        return this.fetchDocument('players', { teamID: teamId, actionType: 'view', includeMatchInfo: 'true' }, context, PlayersDocumentSchema)
    }

    playerDetails(context: SigningContext, playerId: number): Promise<DetailedPlayer> {
        return this.fetchDocument('playerDetails', { playerID: String(playerId) }, context, PlayerDetailsDocumentSchema)
    }

    private async fetchDocument<T>(
        key: ChppDocumentKey,
        params: Record<string, string>,
        context: SigningContext,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>
    ): Promise<T> {
        const { file, version } = CHPP_DOCUMENTS[key]
        const query: Record<string, string> = { file, version, ...params }
        const startTime = Date.now()

        try {
            const response = await this.transport.send({
                method: 'GET',
                url: `${CHPP_DATA_URL}?${new URLSearchParams(query).toString()}`,
                headers: {
                    Authorization: sign('GET', CHPP_DATA_URL, query, context),
                    'Content-Length': '0',
                    'User-Agent': this.config.userAgent,
                    'Accept-Language': CHPP_ACCEPT_LANGUAGE,
                    Accept: CHPP_ACCEPT_HEADER
                }
            })

            if (response.status < 200 || response.status >= 300) {
                throw this.httpFailure(response.status, response.body, file)
            }

            const document = decodeChppDocument(response.body, schema, file)
            this.telemetry.trackSyncEventStrict('Chpp.Request.Succeeded', {
                document: file,
                version,
                latencyMs: Date.now() - startTime,
                httpStatus: response.status
            })
            return document
        } catch (error) {
            this.telemetry.trackSyncEventStrict('Chpp.Request.Failed', {
                document: file,
                version,
                latencyMs: Date.now() - startTime,
                errorKind: error instanceof Error ? error.name : typeof error
            })
            throw error
        }
    }

    private httpFailure(status: number, body: string, document: string): Error {
        const apiError = tryExtractChppError(body, document)
        if (apiError) return apiError
        if (status === 401 || status === 403) {
            return new AuthException(`CHPP rejected credentials for ${document} (HTTP ${status})`)
        }
        // Only throttling and server-side failures are worth another attempt
        if (status === 429 || status >= 500) {
            return new NetworkException(`CHPP ${document} request failed with HTTP ${status}`, status)
        }
        return new ParseException(`CHPP ${document} answered HTTP ${status} without a CHPP document`, document)
    }
}
