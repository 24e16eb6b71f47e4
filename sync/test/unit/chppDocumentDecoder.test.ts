import { ChppApiException, ParseException, PlayersDocumentSchema, TeamDetailsDocumentSchema, WorldDetailsDocumentSchema } from '@touchline/shared'
import assert from 'node:assert'
import { describe, test } from 'node:test'
import { decodeChppDocument, parseChppXml, tryExtractChppError } from '../../src/chpp/chppDocumentDecoder.js'
import { chppErrorXml, playersXml, teamDetailsXml, worldDetailsXml } from '../helpers/chppXml.js'

describe('chppDocumentDecoder', () => {
    test('decodes a single team as a one-element list', () => {
        const details = decodeChppDocument(teamDetailsXml([{ teamId: '123', teamName: 'Test United', isPrimaryClub: true }]), TeamDetailsDocumentSchema, 'teamdetails')

        assert.strictEqual(details.teams.length, 1)
        assert.strictEqual(details.teams[0]?.teamId, '123')
        assert.strictEqual(details.teams[0]?.isPrimaryClub, true)
        assert.strictEqual(details.teams[0]?.cup?.cupId, 31)
        assert.strictEqual(details.teams[0]?.homePage, null)
        assert.strictEqual(details.user.userId, 5000)
        assert.strictEqual(details.user.supporterTier, 'gold')
        assert.strictEqual(details.user.hasManagerLicense, true)
    })

    test('keeps every team when the user manages several', () => {
        const details = decodeChppDocument(
            teamDetailsXml([
                { teamId: '123', teamName: 'Test United' },
                { teamId: '456', teamName: 'Second Side', isPrimaryClub: true }
            ]),
            TeamDetailsDocumentSchema,
            'teamdetails'
        )

        assert.deepStrictEqual(
            details.teams.map((t) => t.teamId),
            ['123', '456']
        )
    })

    test('maps shirt number 100 and empty tags to null', () => {
        const list = decodeChppDocument(
            playersXml('123', 'Test United', [
                { playerId: 1, firstName: 'Ada', lastName: 'Ames', playerNumber: 100 },
                { playerId: 2, firstName: 'Ben', lastName: 'Burke', playerNumber: 7, countryId: 20 }
            ]),
            PlayersDocumentSchema,
            'players'
        )

        assert.strictEqual(list.teamId, '123')
        assert.strictEqual(list.players?.length, 2)
        assert.strictEqual(list.players?.[0]?.playerNumber, null)
        assert.strictEqual(list.players?.[0]?.countryId, null)
        assert.strictEqual(list.players?.[0]?.nickName, null)
        assert.strictEqual(list.players?.[1]?.playerNumber, 7)
        assert.strictEqual(list.players?.[1]?.countryId, 20)
        assert.strictEqual(list.players?.[1]?.transferListed, false)
    })

    test('a roster without a player list decodes to null players', () => {
        const list = decodeChppDocument(playersXml('123', 'Test United', null), PlayersDocumentSchema, 'players')
        assert.strictEqual(list.players, null)
    })

    test('keeps the raw currency rate and tolerates an empty country', () => {
        const world = decodeChppDocument(
            worldDetailsXml([
                { leagueId: 10, leagueName: 'Testland', countryId: 20, countryName: 'Testland', currencyName: 'T$', currencyRate: '2,5', languageId: 2, languageName: 'English' },
                { leagueId: 11, leagueName: 'Nowhere', countryId: null }
            ]),
            WorldDetailsDocumentSchema,
            'worlddetails'
        )

        assert.strictEqual(world.leagues.length, 2)
        assert.strictEqual(world.leagues[0]?.country.currencyRate, '2,5')
        assert.strictEqual(world.leagues[0]?.languageId, 2)
        assert.strictEqual(world.leagues[1]?.country.countryId, null)
        assert.strictEqual(world.leagues[1]?.languageName, null)
    })

    test('an error document decodes to ChppApiException', () => {
        assert.throws(
            () => decodeChppDocument(chppErrorXml(503, 'Server busy'), PlayersDocumentSchema, 'players'),
            (error: unknown) =>
                error instanceof ChppApiException &&
                error.code === 503 &&
                error.message === 'Server busy' &&
                error.errorGuid === 'test-error-guid' &&
                error.lineNumber === 0
        )
    })

    test('malformed XML is a ParseException', () => {
        assert.throws(
            () => parseChppXml('<HattrickData><Team></HattrickData>', 'players'),
            (error: unknown) => error instanceof ParseException && error.document === 'players' && error.message.startsWith('Malformed players response:')
        )
    })

    test('a document missing required fields is a ParseException naming the field', () => {
        const xml = '<HattrickData><Team><TeamName>No Id</TeamName></Team></HattrickData>'
        assert.throws(
            () => decodeChppDocument(xml, PlayersDocumentSchema, 'players'),
            (error: unknown) =>
                error instanceof ParseException && error.message.startsWith('Unexpected players document:') && error.message.includes('HattrickData.Team.TeamID')
        )
    })

    describe('tryExtractChppError', () => {
        test('returns the error carried by an XML body', () => {
            const error = tryExtractChppError(chppErrorXml(429, 'Too many requests'), 'players')
            assert.ok(error instanceof ChppApiException)
            assert.strictEqual(error.code, 429)
        })

        test('returns null for HTML or regular documents', () => {
            assert.strictEqual(tryExtractChppError('<html><body>Bad gateway<br></body></html>', 'players'), null)
            assert.strictEqual(tryExtractChppError('Service Unavailable', 'players'), null)
            assert.strictEqual(tryExtractChppError(playersXml('1', 'A', []), 'players'), null)
        })
    })
})
