/**
 * Persisted record shapes, one per entity kind.
 *
 * Each record is stored under (kind, natural id, generation id); writing the same key again replaces it.
 */
import type { ChppTeam, MergedPlayer, SupporterTier } from '../chpp/models.js'

export interface LanguageRecord {
    languageId: number
    languageName: string
}

export interface CurrencyRecord {
    currencyId: number
    currencyName: string
    rate: number | null
    symbol: string | null
}

export interface CountryRecord {
    countryId: number
    countryName: string
    currencyId: number | null
    countryCode: string | null
    dateFormat: string | null
    timeFormat: string | null
}

export interface RegionRecord {
    regionId: number
    regionName: string
    countryId: number | null
}

export interface LeagueRecord {
    leagueId: number
    leagueName: string
    countryId: number | null
    languageId: number | null
    shortName: string | null
    continent: string | null
    zoneName: string | null
    englishName: string | null
    season: number | null
    seasonOffset: number | null
    matchRound: number | null
    nationalTeamId: number | null
    u20TeamId: number | null
    activeTeams: number | null
    activeUsers: number | null
    numberOfLevels: number | null
}

export interface CupRecord {
    cupId: number
    cupName: string | null
    cupLeagueLevel: number | null
    cupLevel: number | null
    cupLevelIndex: number | null
}

export interface UserRecord {
    userId: number
    name: string
    loginName: string
    languageId: number
    supporterTier: SupporterTier
    signupDate: string
    activationDate: string
    lastLoginDate: string
    hasManagerLicense: boolean
}

export interface TeamRecord {
    teamId: string
    userId: number
    teamName: string
    isPrimaryClub: boolean
    arenaId: number | null
    leagueId: number | null
    countryId: number | null
    regionId: number | null
    cupId: number | null
    /** The decoded teamdetails entry as served */
    details: ChppTeam
}

export type PlayerRecord = Omit<MergedPlayer, 'playerNumber' | 'countryId'> & {
    teamId: string
    /** 100 when the player has no shirt number */
    playerNumber: number
    /** 0 when unknown */
    countryId: number
}

export interface SyncRecordMap {
    language: LanguageRecord
    currency: CurrencyRecord
    country: CountryRecord
    region: RegionRecord
    league: LeagueRecord
    cup: CupRecord
    user: UserRecord
    team: TeamRecord
    player: PlayerRecord
}

export type SyncRecordKind = keyof SyncRecordMap

export const NO_PLAYER_NUMBER = 100
export const UNKNOWN_COUNTRY_ID = 0

type NaturalIdExtractors = { [K in SyncRecordKind]: (record: SyncRecordMap[K]) => string | number }

const NATURAL_IDS: NaturalIdExtractors = {
    language: (r) => r.languageId,
    currency: (r) => r.currencyId,
    country: (r) => r.countryId,
    region: (r) => r.regionId,
    league: (r) => r.leagueId,
    cup: (r) => r.cupId,
    user: (r) => r.userId,
    team: (r) => r.teamId,
    player: (r) => r.playerId
}

export function naturalIdOf<K extends SyncRecordKind>(kind: K, record: SyncRecordMap[K]): string {
    const extract: NaturalIdExtractors[K] = NATURAL_IDS[kind]
    return String(extract(record))
}
