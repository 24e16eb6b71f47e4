/**
 * Typed CHPP records.
 *
 * These are the decoded (camelCase) shapes of the XML documents served by the CHPP data endpoint.
 * Optional elements are modelled as `T | null` so that "absent" is always an explicit value.
 */

export const SUPPORTER_TIERS = ['none', 'silver', 'gold', 'platinum', 'diamond'] as const

export type SupporterTier = (typeof SUPPORTER_TIERS)[number]

export interface ChppLanguage {
    languageId: number
    languageName: string
}

export interface ChppUser {
    userId: number
    language: ChppLanguage
    name: string
    loginName: string
    supporterTier: SupporterTier
    signupDate: string
    activationDate: string
    lastLoginDate: string
    hasManagerLicense: boolean
}

export interface ChppArena {
    arenaId: number
    arenaName: string
}

export interface ChppLeague {
    leagueId: number
    leagueName: string
    shortName: string | null
    continent: string | null
    season: number | null
    seasonOffset: number | null
    matchRound: number | null
    zoneName: string | null
    englishName: string | null
    languageId: number | null
    nationalTeamId: number | null
    u20TeamId: number | null
    activeTeams: number | null
    activeUsers: number | null
    numberOfLevels: number | null
}

export interface ChppCurrency {
    currencyId: number
    currencyName: string
    /** Exchange rate relative to SEK */
    rate: number | null
    symbol: string | null
}

export interface ChppCountry {
    countryId: number
    countryName: string
    currency: ChppCurrency | null
    countryCode: string | null
    dateFormat: string | null
    timeFormat: string | null
}

export interface ChppRegion {
    regionId: number
    regionName: string
}

export interface ChppCup {
    stillInCup: boolean | null
    cupId: number | null
    cupName: string | null
    /** 0 = national, 7-9 = divisional */
    cupLeagueLevel: number | null
    /** 1 = national/divisional, 2 = challenger, 3 = consolation */
    cupLevel: number | null
    cupLevelIndex: number | null
    matchRound: number | null
    matchRoundsLeft: number | null
}

export interface ChppLeagueLevelUnit {
    leagueLevelUnitId: number
    leagueLevelUnitName: string
    leagueLevel: number
}

export interface ChppPowerRating {
    globalRanking: number
    leagueRanking: number
    regionRanking: number
    powerRating: number
}

export interface ChppFanclub {
    fanclubId: number
    fanclubName: string
    fanclubSize: number
}

export interface ChppTeamColors {
    backgroundColor: string
    color: string
}

export interface ChppBotStatus {
    isBot: boolean
    botSince: string | null
}

export interface ChppTeam {
    /** Kept as a string: the id is echoed verbatim into follow-up requests */
    teamId: string
    teamName: string
    shortTeamName: string | null
    isPrimaryClub: boolean | null
    foundedDate: string | null
    isDeactivated: boolean | null
    arena: ChppArena | null
    league: Pick<ChppLeague, 'leagueId' | 'leagueName'> | null
    country: Pick<ChppCountry, 'countryId' | 'countryName'> | null
    region: ChppRegion | null
    trainerPlayerId: number | null
    homePage: string | null
    cup: ChppCup | null
    powerRating: ChppPowerRating | null
    friendlyTeamId: number | null
    leagueLevelUnit: ChppLeagueLevelUnit | null
    numberOfVictories: number | null
    numberOfUndefeated: number | null
    fanclub: ChppFanclub | null
    logoUrl: string | null
    teamColors: ChppTeamColors | null
    dressUri: string | null
    dressAlternateUri: string | null
    botStatus: ChppBotStatus | null
    teamRank: number | null
    youthTeamId: number | null
    youthTeamName: string | null
    numberOfVisits: number | null
    possibleToChallengeMidweek: boolean | null
    possibleToChallengeWeekend: boolean | null
    genderId: number | null
}

/** Result of the `teamdetails` document: the authenticated user and every team they manage. */
export interface TeamDetails {
    user: ChppUser
    teams: ChppTeam[]
}

export interface PlayerSkills {
    stamina: number
    keeper: number
    playmaker: number
    scorer: number
    passing: number
    winger: number
    defender: number
    setPieces: number
}

export interface ChppMotherClub {
    teamId: number
    teamName: string
}

export interface ChppLastMatch {
    date: string
    matchId: number
    positionCode: number
    playedMinutes: number
    rating: number | null
    ratingEndOfMatch: number | null
}

/**
 * Fields shared by every view of a player. The `players` document (visible for any team)
 * yields exactly this shape.
 */
export interface PlayerProfile {
    playerId: number
    firstName: string
    lastName: string
    nickName: string | null
    playerNumber: number | null
    age: number
    ageDays: number | null
    tsi: number
    playerForm: number
    statement: string | null
    experience: number
    loyalty: number
    referencePlayerId: number | null
    motherClubBonus: boolean
    leadership: number
    salary: number
    isAbroad: boolean
    agreeability: number
    aggressiveness: number
    honesty: number
    leagueGoals: number | null
    cupGoals: number | null
    friendliesGoals: number | null
    careerGoals: number | null
    careerHattricks: number | null
    careerAssists: number | null
    speciality: number | null
    transferListed: boolean
    nationalTeamId: number | null
    countryId: number | null
    caps: number | null
    capsU20: number | null
    cards: number | null
    /** -1 = healthy, 0 = bruised, >0 = weeks out */
    injuryLevel: number | null
    sticker: string | null
    flag: string | null
    arrivalDate: string | null
    playerCategoryId: number | null
    motherClub: ChppMotherClub | null
    nativeCountryId: number | null
    nativeLeagueId: number | null
    nativeLeagueName: string | null
    matchesCurrentTeam: number | null
    goalsCurrentTeam: number | null
    assistsCurrentTeam: number | null
    lastMatch: ChppLastMatch | null
    genderId: number | null
}

export type BasicPlayer = PlayerProfile

/** The `playerdetails` view. Skills are only populated for the caller's own players. */
export interface DetailedPlayer extends PlayerProfile {
    skills: PlayerSkills | null
}

/** The persisted view. `skills` is only present when a detailed record contributed it. */
export type MergedPlayer = PlayerProfile & { skills?: PlayerSkills | null }

/** Result of the `players` document. `players` is null when the document has no player list at all. */
export interface PlayerList {
    teamId: string
    teamName: string
    players: BasicPlayer[] | null
}

export interface WorldCountry {
    countryId: number | null
    countryName: string | null
    currencyName: string | null
    /** Raw rate as served; uses a comma as decimal separator */
    currencyRate: string | null
    countryCode: string | null
    dateFormat: string | null
    timeFormat: string | null
}

export interface WorldLeague {
    leagueId: number
    leagueName: string
    country: WorldCountry
    season: number | null
    seasonOffset: number | null
    matchRound: number | null
    shortName: string | null
    continent: string | null
    zoneName: string | null
    englishName: string | null
    languageId: number | null
    languageName: string | null
    nationalTeamId: number | null
    u20TeamId: number | null
    activeTeams: number | null
    activeUsers: number | null
    numberOfLevels: number | null
}

export interface WorldDetails {
    leagues: WorldLeague[]
}

/** Structured error document returned in place of the requested one. */
export interface ChppErrorDocument {
    error: string
    errorCode: number
    errorGuid: string | null
    request: string | null
    lineNumber: number | null
}
