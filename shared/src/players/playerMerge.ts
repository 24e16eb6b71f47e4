/**
 * Player merge: reconcile the basic (`players`) view of a player with the optional
 * detailed (`playerdetails`) view into the single record that gets persisted.
 *
 * Rules:
 * - no detailed record: the basic record is returned as is
 * - otherwise the detailed record wins; every nullable field it lacks is backfilled from basic
 * - skills only ever come from the detailed record
 * - a country id still missing after backfill falls back to the native country id
 */
import type { BasicPlayer, DetailedPlayer, MergedPlayer, PlayerProfile } from '../chpp/models.js'

type NullableKeys<T> = { [K in keyof T]-?: null extends T[K] ? K : never }[keyof T]

export type NullablePlayerField = NullableKeys<PlayerProfile>

export const PLAYER_BACKFILL_FIELDS = [
    'nickName',
    'playerNumber',
    'ageDays',
    'statement',
    'referencePlayerId',
    'leagueGoals',
    'cupGoals',
    'friendliesGoals',
    'careerGoals',
    'careerHattricks',
    'careerAssists',
    'speciality',
    'nationalTeamId',
    'countryId',
    'caps',
    'capsU20',
    'cards',
    'injuryLevel',
    'sticker',
    'flag',
    'arrivalDate',
    'playerCategoryId',
    'motherClub',
    'nativeCountryId',
    'nativeLeagueId',
    'nativeLeagueName',
    'matchesCurrentTeam',
    'goalsCurrentTeam',
    'assistsCurrentTeam',
    'lastMatch',
    'genderId'
] as const satisfies readonly NullablePlayerField[]

type AssertNever<T extends never> = T
/** Compile-time guard: adding a nullable field to PlayerProfile without listing it above fails the build. */
export type UnlistedBackfillField = AssertNever<Exclude<NullablePlayerField, (typeof PLAYER_BACKFILL_FIELDS)[number]>>

function backfill<K extends NullablePlayerField>(target: PlayerProfile, source: PlayerProfile, key: K): void {
    if (target[key] === null && source[key] !== null) {
        target[key] = source[key]
    }
}

export function mergePlayer(basic: BasicPlayer, detailed: DetailedPlayer | null | undefined): MergedPlayer {
    if (!detailed) {
        return { ...basic }
    }

    const merged: DetailedPlayer = { ...detailed }
    for (const field of PLAYER_BACKFILL_FIELDS) {
        backfill(merged, basic, field)
    }

    // Players abroad are sometimes reported without a current country.
    if (merged.countryId === null && merged.nativeCountryId !== null) {
        merged.countryId = merged.nativeCountryId
    }

    return merged
}
