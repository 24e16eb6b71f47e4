/**
 * Persistence gateway used by the sync pipeline.
 *
 * Maps decoded CHPP documents to records and writes them through ISyncRepository in
 * dependency order (reference data before the entities that point at it, players last).
 * Ordering is this service's job; the repository writes whatever it is given.
 */
import type {
    ChppTeam,
    ChppUser,
    CountryRecord,
    CurrencyRecord,
    FetchLogEntry,
    IClock,
    LanguageRecord,
    LeagueRecord,
    MergedPlayer,
    PlayerRecord,
    SyncGeneration,
    TeamRecord,
    WorldDetails,
    WorldLeague
} from '@touchline/shared'
import { NO_PLAYER_NUMBER, UNKNOWN_COUNTRY_ID } from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { ISyncRepository } from '../repos/syncRepository.js'

/** Parse a CHPP decimal ("10,5" or "10.5"); null when absent or not a number */
export function parseCurrencyRate(raw: string | null): number | null {
    if (raw === null || raw.trim() === '') return null
    const rate = Number(raw.trim().replace(',', '.'))
    return Number.isNaN(rate) ? null : rate
}

function worldLeagueRecords(league: WorldLeague): {
    language: LanguageRecord | null
    currency: CurrencyRecord | null
    country: CountryRecord | null
    league: LeagueRecord
} {
    const { country } = league
    const countryId = country.countryId
    // The currency has no id of its own; it is keyed by the country that uses it.
    const currency: CurrencyRecord | null =
        countryId !== null && country.currencyName !== null
            ? { currencyId: countryId, currencyName: country.currencyName, rate: parseCurrencyRate(country.currencyRate), symbol: null }
            : null

    return {
        language:
            league.languageId !== null && league.languageName !== null
                ? { languageId: league.languageId, languageName: league.languageName }
                : null,
        currency,
        country:
            countryId !== null
                ? {
                      countryId,
                      countryName: country.countryName ?? league.leagueName,
                      currencyId: currency ? currency.currencyId : null,
                      countryCode: country.countryCode,
                      dateFormat: country.dateFormat,
                      timeFormat: country.timeFormat
                  }
                : null,
        league: {
            leagueId: league.leagueId,
            leagueName: league.leagueName,
            countryId,
            languageId: league.languageId,
            shortName: league.shortName,
            continent: league.continent,
            zoneName: league.zoneName,
            englishName: league.englishName,
            season: league.season,
            seasonOffset: league.seasonOffset,
            matchRound: league.matchRound,
            nationalTeamId: league.nationalTeamId,
            u20TeamId: league.u20TeamId,
            activeTeams: league.activeTeams,
            activeUsers: league.activeUsers,
            numberOfLevels: league.numberOfLevels
        }
    }
}

export function toPlayerRecord(player: MergedPlayer, teamId: string): PlayerRecord {
    return {
        ...player,
        teamId,
        playerNumber: player.playerNumber ?? NO_PLAYER_NUMBER,
        countryId: player.countryId ?? UNKNOWN_COUNTRY_ID
    }
}

function toTeamRecord(user: ChppUser, team: ChppTeam): TeamRecord {
    return {
        teamId: team.teamId,
        userId: user.userId,
        teamName: team.teamName,
        isPrimaryClub: team.isPrimaryClub ?? false,
        arenaId: team.arena?.arenaId ?? null,
        leagueId: team.league?.leagueId ?? null,
        countryId: team.country?.countryId ?? null,
        regionId: team.region?.regionId ?? null,
        cupId: team.cup?.cupId ?? null,
        details: team
    }
}

@injectable()
export class SyncPersistenceService {
    constructor(
        @inject(TOKENS.SyncRepository) private readonly repository: ISyncRepository,
        @inject(TOKENS.Clock) private readonly clock: IClock
    ) {}

    beginGeneration(): Promise<SyncGeneration> {
        return this.repository.createGeneration(this.clock.nowIso())
    }

    completeGeneration(generationId: number): Promise<SyncGeneration> {
        return this.repository.completeGeneration(generationId, this.clock.nowIso())
    }

    recordFetch(entry: FetchLogEntry): Promise<void> {
        return this.repository.recordFetch(entry)
    }

    /** Per league: language, currency, country, then the league itself */
    async saveWorldDetails(world: WorldDetails, generationId: number): Promise<void> {
        for (const league of world.leagues) {
            const records = worldLeagueRecords(league)
            if (records.language) await this.repository.upsertRecords('language', generationId, [records.language])
            if (records.currency) await this.repository.upsertRecords('currency', generationId, [records.currency])
            if (records.country) await this.repository.upsertRecords('country', generationId, [records.country])
            await this.repository.upsertRecords('league', generationId, [records.league])
        }
    }

    /** User (and their language), then the team's country, region, league and cup, then the team */
    async saveTeam(user: ChppUser, team: ChppTeam, generationId: number): Promise<void> {
        await this.repository.upsertRecords('language', generationId, [user.language])
        await this.repository.upsertRecords('user', generationId, [
            {
                userId: user.userId,
                name: user.name,
                loginName: user.loginName,
                languageId: user.language.languageId,
                supporterTier: user.supporterTier,
                signupDate: user.signupDate,
                activationDate: user.activationDate,
                lastLoginDate: user.lastLoginDate,
                hasManagerLicense: user.hasManagerLicense
            }
        ])

        if (team.country) {
            await this.repository.upsertRecords('country', generationId, [
                {
                    countryId: team.country.countryId,
                    countryName: team.country.countryName,
                    currencyId: null,
                    countryCode: null,
                    dateFormat: null,
                    timeFormat: null
                }
            ])
        }
        if (team.region) {
            await this.repository.upsertRecords('region', generationId, [
                { regionId: team.region.regionId, regionName: team.region.regionName, countryId: team.country?.countryId ?? null }
            ])
        }
        if (team.league) {
            await this.repository.upsertRecords('league', generationId, [
                {
                    leagueId: team.league.leagueId,
                    leagueName: team.league.leagueName,
                    countryId: team.country?.countryId ?? null,
                    languageId: null,
                    shortName: null,
                    continent: null,
                    zoneName: null,
                    englishName: null,
                    season: null,
                    seasonOffset: null,
                    matchRound: null,
                    nationalTeamId: null,
                    u20TeamId: null,
                    activeTeams: null,
                    activeUsers: null,
                    numberOfLevels: null
                }
            ])
        }
        if (team.cup && team.cup.cupId !== null) {
            await this.repository.upsertRecords('cup', generationId, [
                {
                    cupId: team.cup.cupId,
                    cupName: team.cup.cupName,
                    cupLeagueLevel: team.cup.cupLeagueLevel,
                    cupLevel: team.cup.cupLevel,
                    cupLevelIndex: team.cup.cupLevelIndex
                }
            ])
        }

        await this.repository.upsertRecords('team', generationId, [toTeamRecord(user, team)])
    }

    async savePlayers(players: readonly MergedPlayer[], teamId: string, generationId: number): Promise<void> {
        await this.repository.upsertRecords(
            'player',
            generationId,
            players.map((p) => toPlayerRecord(p, teamId))
        )
    }

    getLatestCompletedGenerationId(): Promise<number | null> {
        return this.repository.getLatestCompletedGenerationId()
    }

    /** Same as getLatestCompletedGenerationId */
    getLatestDownloadId(): Promise<number | null> {
        return this.getLatestCompletedGenerationId()
    }
}
