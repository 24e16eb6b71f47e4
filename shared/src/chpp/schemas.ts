/**
 * CHPP document schemas (Zod validation)
 *
 * Input is the tree produced by an XML parser that keeps every tag value as a string.
 * CHPP conventions handled here:
 * - empty tags mean "absent"
 * - booleans are True/False (or 1/0); an empty boolean tag is false
 * - PlayerNumber 100 means the player has no shirt number
 * - decimals may use a comma separator
 */
import { z } from 'zod'
import type {
    BasicPlayer,
    ChppErrorDocument,
    ChppTeam,
    ChppUser,
    DetailedPlayer,
    PlayerList,
    PlayerSkills,
    SupporterTier,
    TeamDetails,
    WorldDetails,
    WorldLeague
} from './models.js'
import { SUPPORTER_TIERS } from './models.js'

function isAbsent(value: unknown): boolean {
    return value === undefined || value === null || value === ''
}

function emptyToNull(value: unknown): unknown {
    return isAbsent(value) ? null : value
}

function commaDecimal(value: unknown): unknown {
    return typeof value === 'string' ? value.replace(',', '.') : value
}

function toArray(value: unknown): unknown {
    if (isAbsent(value)) return []
    return Array.isArray(value) ? value : [value]
}

const text = z.string()
const optText = z.preprocess(emptyToNull, z.string().nullable())
const int = z.preprocess((v) => (isAbsent(v) ? undefined : v), z.coerce.number().int())
const optInt = z.preprocess(emptyToNull, z.coerce.number().int().nullable())
const optDecimal = z.preprocess((v) => commaDecimal(emptyToNull(v)), z.coerce.number().finite().nullable())

const bool = z.preprocess((v) => {
    if (isAbsent(v)) return false
    const s = String(v).trim().toLowerCase()
    if (s === 'true' || s === '1') return true
    if (s === 'false' || s === '0') return false
    return v
}, z.boolean())

const optBool = z.preprocess((v) => {
    if (isAbsent(v)) return null
    const s = String(v).trim().toLowerCase()
    if (s === 'true' || s === '1') return true
    if (s === 'false' || s === '0') return false
    return null
}, z.boolean().nullable())

const playerNumber = z.preprocess((v) => (isAbsent(v) || v === '100' ? null : v), z.coerce.number().int().nullable())

function optObject<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(emptyToNull, schema.nullable())
}

const supporterTier = z.preprocess(
    (v) => (isAbsent(v) ? 'none' : String(v).trim().toLowerCase()),
    z.enum(SUPPORTER_TIERS)
)

export const ChppErrorDocumentSchema = z
    .object({
        Error: text,
        ErrorCode: int,
        ErrorGUID: optText,
        Request: optText,
        LineNumber: optInt
    })
    .transform(
        (e): ChppErrorDocument => ({
            error: e.Error,
            errorCode: e.ErrorCode,
            errorGuid: e.ErrorGUID,
            request: e.Request,
            lineNumber: e.LineNumber
        })
    )

export const UserSchema = z
    .object({
        UserID: int,
        Language: z.object({ LanguageID: int, LanguageName: text }),
        Name: text,
        Loginname: text,
        SupporterTier: supporterTier,
        SignupDate: text,
        ActivationDate: text,
        LastLoginDate: text,
        HasManagerLicense: bool
    })
    .transform(
        (u): ChppUser => ({
            userId: u.UserID,
            language: { languageId: u.Language.LanguageID, languageName: u.Language.LanguageName },
            name: u.Name,
            loginName: u.Loginname,
            supporterTier: u.SupporterTier satisfies SupporterTier,
            signupDate: u.SignupDate,
            activationDate: u.ActivationDate,
            lastLoginDate: u.LastLoginDate,
            hasManagerLicense: u.HasManagerLicense
        })
    )

export const TeamSchema = z
    .object({
        TeamID: text,
        TeamName: text,
        ShortTeamName: optText,
        IsPrimaryClub: optBool,
        FoundedDate: optText,
        IsDeactivated: optBool,
        Arena: optObject(z.object({ ArenaID: int, ArenaName: text })),
        League: optObject(z.object({ LeagueID: int, LeagueName: text })),
        Country: optObject(z.object({ CountryID: int, CountryName: text })),
        Region: optObject(z.object({ RegionID: int, RegionName: text })),
        Trainer: optObject(z.object({ PlayerID: int })),
        HomePage: optText,
        Cup: optObject(
            z.object({
                StillInCup: optBool,
                CupID: optInt,
                CupName: optText,
                CupLeagueLevel: optInt,
                CupLevel: optInt,
                CupLevelIndex: optInt,
                MatchRound: optInt,
                MatchRoundsLeft: optInt
            })
        ),
        PowerRating: optObject(z.object({ GlobalRanking: int, LeagueRanking: int, RegionRanking: int, PowerRating: int })),
        FriendlyTeamID: optInt,
        LeagueLevelUnit: optObject(z.object({ LeagueLevelUnitID: int, LeagueLevelUnitName: text, LeagueLevel: int })),
        NumberOfVictories: optInt,
        NumberOfUndefeated: optInt,
        Fanclub: optObject(z.object({ FanclubID: int, FanclubName: z.string().default(''), FanclubSize: int })),
        LogoURL: optText,
        TeamColors: optObject(z.object({ BackgroundColor: z.string().default(''), Color: z.string().default('') })),
        DressURI: optText,
        DressAlternateURI: optText,
        BotStatus: optObject(z.object({ IsBot: bool, BotSince: optText })),
        TeamRank: optInt,
        YouthTeamID: optInt,
        YouthTeamName: optText,
        NumberOfVisits: optInt,
        PossibleToChallengeMidweek: optBool,
        PossibleToChallengeWeekend: optBool,
        GenderID: optInt
    })
    .transform(
        (t): ChppTeam => ({
            teamId: t.TeamID,
            teamName: t.TeamName,
            shortTeamName: t.ShortTeamName,
            isPrimaryClub: t.IsPrimaryClub,
            foundedDate: t.FoundedDate,
            isDeactivated: t.IsDeactivated,
            arena: t.Arena && { arenaId: t.Arena.ArenaID, arenaName: t.Arena.ArenaName },
            league: t.League && { leagueId: t.League.LeagueID, leagueName: t.League.LeagueName },
            country: t.Country && { countryId: t.Country.CountryID, countryName: t.Country.CountryName },
            region: t.Region && { regionId: t.Region.RegionID, regionName: t.Region.RegionName },
            trainerPlayerId: t.Trainer?.PlayerID ?? null,
            homePage: t.HomePage,
            cup: t.Cup && {
                stillInCup: t.Cup.StillInCup,
                cupId: t.Cup.CupID,
                cupName: t.Cup.CupName,
                cupLeagueLevel: t.Cup.CupLeagueLevel,
                cupLevel: t.Cup.CupLevel,
                cupLevelIndex: t.Cup.CupLevelIndex,
                matchRound: t.Cup.MatchRound,
                matchRoundsLeft: t.Cup.MatchRoundsLeft
            },
            powerRating: t.PowerRating && {
                globalRanking: t.PowerRating.GlobalRanking,
                leagueRanking: t.PowerRating.LeagueRanking,
                regionRanking: t.PowerRating.RegionRanking,
                powerRating: t.PowerRating.PowerRating
            },
            friendlyTeamId: t.FriendlyTeamID,
            leagueLevelUnit: t.LeagueLevelUnit && {
                leagueLevelUnitId: t.LeagueLevelUnit.LeagueLevelUnitID,
                leagueLevelUnitName: t.LeagueLevelUnit.LeagueLevelUnitName,
                leagueLevel: t.LeagueLevelUnit.LeagueLevel
            },
            numberOfVictories: t.NumberOfVictories,
            numberOfUndefeated: t.NumberOfUndefeated,
            fanclub: t.Fanclub && { fanclubId: t.Fanclub.FanclubID, fanclubName: t.Fanclub.FanclubName, fanclubSize: t.Fanclub.FanclubSize },
            logoUrl: t.LogoURL,
            teamColors: t.TeamColors && { backgroundColor: t.TeamColors.BackgroundColor, color: t.TeamColors.Color },
            dressUri: t.DressURI,
            dressAlternateUri: t.DressAlternateURI,
            botStatus: t.BotStatus && { isBot: t.BotStatus.IsBot, botSince: t.BotStatus.BotSince },
            teamRank: t.TeamRank,
            youthTeamId: t.YouthTeamID,
            youthTeamName: t.YouthTeamName,
            numberOfVisits: t.NumberOfVisits,
            possibleToChallengeMidweek: t.PossibleToChallengeMidweek,
            possibleToChallengeWeekend: t.PossibleToChallengeWeekend,
            genderId: t.GenderID
        })
    )

const playerFields = {
    PlayerID: int,
    FirstName: text,
    LastName: text,
    NickName: optText,
    PlayerNumber: playerNumber,
    Age: int,
    AgeDays: optInt,
    TSI: int,
    PlayerForm: int,
    Statement: optText,
    Experience: int,
    Loyalty: int,
    ReferencePlayerID: optInt,
    MotherClubBonus: bool,
    Leadership: int,
    Salary: int,
    IsAbroad: bool,
    Agreeability: int,
    Aggressiveness: int,
    Honesty: int,
    LeagueGoals: optInt,
    CupGoals: optInt,
    FriendliesGoals: optInt,
    CareerGoals: optInt,
    CareerHattricks: optInt,
    CareerAssists: optInt,
    Specialty: optInt,
    TransferListed: bool,
    NationalTeamID: optInt,
    CountryID: optInt,
    Caps: optInt,
    CapsU20: optInt,
    Cards: optInt,
    InjuryLevel: optInt,
    Sticker: optText,
    Flag: optText,
    ArrivalDate: optText,
    PlayerCategoryId: optInt,
    MotherClub: optObject(z.object({ TeamID: int, TeamName: text })),
    NativeCountryID: optInt,
    NativeLeagueID: optInt,
    NativeLeagueName: optText,
    MatchesCurrentTeam: optInt,
    GoalsCurrentTeam: optInt,
    AssistsCurrentTeam: optInt,
    LastMatch: optObject(
        z.object({
            Date: text,
            MatchId: int,
            PositionCode: int,
            PlayedMinutes: int,
            Rating: optDecimal,
            RatingEndOfMatch: optDecimal
        })
    ),
    GenderID: optInt
}

type RawPlayer = z.output<z.ZodObject<typeof playerFields>>

function toProfile(p: RawPlayer): BasicPlayer {
    return {
        playerId: p.PlayerID,
        firstName: p.FirstName,
        lastName: p.LastName,
        nickName: p.NickName,
        playerNumber: p.PlayerNumber,
        age: p.Age,
        ageDays: p.AgeDays,
        tsi: p.TSI,
        playerForm: p.PlayerForm,
        statement: p.Statement,
        experience: p.Experience,
        loyalty: p.Loyalty,
        referencePlayerId: p.ReferencePlayerID,
        motherClubBonus: p.MotherClubBonus,
        leadership: p.Leadership,
        salary: p.Salary,
        isAbroad: p.IsAbroad,
        agreeability: p.Agreeability,
        aggressiveness: p.Aggressiveness,
        honesty: p.Honesty,
        leagueGoals: p.LeagueGoals,
        cupGoals: p.CupGoals,
        friendliesGoals: p.FriendliesGoals,
        careerGoals: p.CareerGoals,
        careerHattricks: p.CareerHattricks,
        careerAssists: p.CareerAssists,
        speciality: p.Specialty,
        transferListed: p.TransferListed,
        nationalTeamId: p.NationalTeamID,
        countryId: p.CountryID,
        caps: p.Caps,
        capsU20: p.CapsU20,
        cards: p.Cards,
        injuryLevel: p.InjuryLevel,
        sticker: p.Sticker,
        flag: p.Flag,
        arrivalDate: p.ArrivalDate,
        playerCategoryId: p.PlayerCategoryId,
        motherClub: p.MotherClub && { teamId: p.MotherClub.TeamID, teamName: p.MotherClub.TeamName },
        nativeCountryId: p.NativeCountryID,
        nativeLeagueId: p.NativeLeagueID,
        nativeLeagueName: p.NativeLeagueName,
        matchesCurrentTeam: p.MatchesCurrentTeam,
        goalsCurrentTeam: p.GoalsCurrentTeam,
        assistsCurrentTeam: p.AssistsCurrentTeam,
        lastMatch: p.LastMatch && {
            date: p.LastMatch.Date,
            matchId: p.LastMatch.MatchId,
            positionCode: p.LastMatch.PositionCode,
            playedMinutes: p.LastMatch.PlayedMinutes,
            rating: p.LastMatch.Rating,
            ratingEndOfMatch: p.LastMatch.RatingEndOfMatch
        },
        genderId: p.GenderID
    }
}

/** Basic view: any skill elements present in the document are ignored. */
export const BasicPlayerSchema = z.object(playerFields).transform(toProfile)

export const PlayerSkillsSchema = z
    .object({
        StaminaSkill: int,
        KeeperSkill: int,
        PlaymakerSkill: int,
        ScorerSkill: int,
        PassingSkill: int,
        WingerSkill: int,
        DefenderSkill: int,
        SetPiecesSkill: int
    })
    .transform(
        (s): PlayerSkills => ({
            stamina: s.StaminaSkill,
            keeper: s.KeeperSkill,
            playmaker: s.PlaymakerSkill,
            scorer: s.ScorerSkill,
            passing: s.PassingSkill,
            winger: s.WingerSkill,
            defender: s.DefenderSkill,
            setPieces: s.SetPiecesSkill
        })
    )

export const DetailedPlayerSchema = z
    .object({ ...playerFields, PlayerSkills: optObject(PlayerSkillsSchema) })
    .transform((p): DetailedPlayer => ({ ...toProfile(p), skills: p.PlayerSkills }))

export const WorldLeagueSchema = z
    .object({
        LeagueID: int,
        LeagueName: text,
        Country: z.preprocess(
            (v) => (isAbsent(v) ? {} : v),
            z.object({
                CountryID: optInt,
                CountryName: optText,
                CurrencyName: optText,
                CurrencyRate: optText,
                CountryCode: optText,
                DateFormat: optText,
                TimeFormat: optText
            })
        ),
        Season: optInt,
        SeasonOffset: optInt,
        MatchRound: optInt,
        ShortName: optText,
        Continent: optText,
        ZoneName: optText,
        EnglishName: optText,
        // Lowercase "d" is how worlddetails spells it.
        LanguageId: optInt,
        LanguageName: optText,
        NationalTeamId: optInt,
        U20TeamId: optInt,
        ActiveTeams: optInt,
        ActiveUsers: optInt,
        NumberOfLevels: optInt
    })
    .transform(
        (l): WorldLeague => ({
            leagueId: l.LeagueID,
            leagueName: l.LeagueName,
            country: {
                countryId: l.Country.CountryID,
                countryName: l.Country.CountryName,
                currencyName: l.Country.CurrencyName,
                currencyRate: l.Country.CurrencyRate,
                countryCode: l.Country.CountryCode,
                dateFormat: l.Country.DateFormat,
                timeFormat: l.Country.TimeFormat
            },
            season: l.Season,
            seasonOffset: l.SeasonOffset,
            matchRound: l.MatchRound,
            shortName: l.ShortName,
            continent: l.Continent,
            zoneName: l.ZoneName,
            englishName: l.EnglishName,
            languageId: l.LanguageId,
            languageName: l.LanguageName,
            nationalTeamId: l.NationalTeamId,
            u20TeamId: l.U20TeamId,
            activeTeams: l.ActiveTeams,
            activeUsers: l.ActiveUsers,
            numberOfLevels: l.NumberOfLevels
        })
    )

/** Root-level schemas, one per document. */
export const TeamDetailsDocumentSchema = z
    .object({
        HattrickData: z.object({
            User: UserSchema,
            Teams: z.object({ Team: z.preprocess(toArray, z.array(TeamSchema)) })
        })
    })
    .transform((d): TeamDetails => ({ user: d.HattrickData.User, teams: d.HattrickData.Teams.Team }))

export const PlayersDocumentSchema = z
    .object({
        HattrickData: z.object({
            Team: z.object({
                TeamID: text,
                TeamName: text,
                PlayerList: z.preprocess(
                    (v) => (v === undefined || v === null ? null : v === '' ? {} : v),
                    z.object({ Player: z.preprocess(toArray, z.array(BasicPlayerSchema)) }).nullable()
                )
            })
        })
    })
    .transform(
        (d): PlayerList => ({
            teamId: d.HattrickData.Team.TeamID,
            teamName: d.HattrickData.Team.TeamName,
            players: d.HattrickData.Team.PlayerList?.Player ?? null
        })
    )

export const PlayerDetailsDocumentSchema = z
    .object({ HattrickData: z.object({ Player: DetailedPlayerSchema }) })
    .transform((d): DetailedPlayer => d.HattrickData.Player)

export const WorldDetailsDocumentSchema = z
    .object({
        HattrickData: z.object({
            LeagueList: z.object({ League: z.preprocess(toArray, z.array(WorldLeagueSchema)) })
        })
    })
    .transform((d): WorldDetails => ({ leagues: d.HattrickData.LeagueList.League }))

export const ErrorDocumentSchema = z.object({ HattrickData: ChppErrorDocumentSchema }).transform((d) => d.HattrickData)
