import 'reflect-metadata'
import type { CountryRecord, FetchLogEntry } from '@touchline/shared'
import { StorageException } from '@touchline/shared'
import assert from 'node:assert'
import { beforeEach, describe, test } from 'node:test'
import { TOKENS } from '../../src/di/tokens.js'
import type { ISyncRepository } from '../../src/repos/syncRepository.js'
import { createTestContainer, type TestHarness } from '../helpers/testContainer.js'

function country(countryId: number, countryName: string): CountryRecord {
    return { countryId, countryName, currencyId: null, countryCode: null, dateFormat: null, timeFormat: null }
}

function fetchEntry(generationId: number, document: string, fetchedUtc: string): FetchLogEntry {
    return { generationId, document, version: '1.0', status: 'success', retryCount: 0, errorMessage: null, fetchedUtc }
}

for (const mode of ['memory', 'cosmos'] as const) {
    describe(`SyncRepository (${mode})`, () => {
        let repo: ISyncRepository

        beforeEach(() => {
            repo = createTestContainer({ mode }).container.get<ISyncRepository>(TOKENS.SyncRepository)
        })

        test('allocates increasing generation ids starting at 1', async () => {
            const first = await repo.createGeneration('2025-01-01T00:00:00.000Z')
            const second = await repo.createGeneration('2025-01-01T01:00:00.000Z')

            assert.deepStrictEqual(first, { id: 1, startedUtc: '2025-01-01T00:00:00.000Z', status: 'in_progress', completedUtc: null })
            assert.strictEqual(second.id, 2)
        })

        test('only completed generations count as latest', async () => {
            assert.strictEqual(await repo.getLatestCompletedGenerationId(), null)

            const first = await repo.createGeneration('2025-01-01T00:00:00.000Z')
            await repo.completeGeneration(first.id, '2025-01-01T00:05:00.000Z')
            await repo.createGeneration('2025-01-02T00:00:00.000Z')

            assert.strictEqual(await repo.getLatestCompletedGenerationId(), first.id)
            assert.deepStrictEqual(await repo.getGeneration(first.id), {
                id: 1,
                startedUtc: '2025-01-01T00:00:00.000Z',
                status: 'completed',
                completedUtc: '2025-01-01T00:05:00.000Z'
            })
            assert.strictEqual((await repo.getGeneration(2))?.status, 'in_progress')
        })

        test('completing an unknown generation is a StorageException', async () => {
            await assert.rejects(repo.completeGeneration(99, '2025-01-01T00:00:00.000Z'), (error: unknown) => error instanceof StorageException && error.statusCode === 404)
        })

        test('returns null for an unknown generation', async () => {
            assert.strictEqual(await repo.getGeneration(7), null)
        })

        test('upserting the same natural id within a generation replaces the record', async () => {
            const gen = await repo.createGeneration('2025-01-01T00:00:00.000Z')
            await repo.upsertRecords('country', gen.id, [country(20, 'Testland')])
            await repo.upsertRecords('country', gen.id, [country(20, 'Testland Republic'), country(21, 'Otherland')])

            const rows = await repo.listRecords('country', gen.id)
            assert.deepStrictEqual(rows.map((r) => r.countryName).sort(), ['Otherland', 'Testland Republic'])
        })

        test('records are scoped by generation and kind', async () => {
            const first = await repo.createGeneration('2025-01-01T00:00:00.000Z')
            const second = await repo.createGeneration('2025-01-02T00:00:00.000Z')
            await repo.upsertRecords('country', first.id, [country(20, 'Old name')])
            await repo.upsertRecords('country', second.id, [country(20, 'New name')])
            await repo.upsertRecords('language', second.id, [{ languageId: 20, languageName: 'Testish' }])

            assert.deepStrictEqual(await repo.listRecords('country', first.id), [country(20, 'Old name')])
            assert.deepStrictEqual(await repo.listRecords('country', second.id), [country(20, 'New name')])
            assert.deepStrictEqual(await repo.listRecords('language', second.id), [{ languageId: 20, languageName: 'Testish' }])
            assert.deepStrictEqual(await repo.listRecords('player', second.id), [])
        })

        test('fetch log entries are listed per generation', async () => {
            await repo.recordFetch(fetchEntry(1, 'teamdetails', '2025-01-01T00:00:01.000Z'))
            await repo.recordFetch(fetchEntry(2, 'teamdetails', '2025-01-01T00:00:02.000Z'))
            await repo.recordFetch(fetchEntry(1, 'worlddetails', '2025-01-01T00:00:03.000Z'))

            const log = await repo.listFetchLog(1)
            assert.deepStrictEqual(
                log.map((e) => e.document),
                ['teamdetails', 'worlddetails']
            )
            assert.deepStrictEqual(log[0], fetchEntry(1, 'teamdetails', '2025-01-01T00:00:01.000Z'))
        })
    })
}

describe('SyncRepository (cosmos specifics)', () => {
    let harness: TestHarness
    let repo: ISyncRepository

    beforeEach(() => {
        harness = createTestContainer({ mode: 'cosmos' })
        repo = harness.container.get<ISyncRepository>(TOKENS.SyncRepository)
    })

    test('stores records under kind, natural id and generation', async () => {
        const gen = await repo.createGeneration('2025-01-01T00:00:00.000Z')
        await repo.upsertRecords('team', gen.id, [
            {
                teamId: '123',
                userId: 5000,
                teamName: 'Test United',
                isPrimaryClub: true,
                arenaId: null,
                leagueId: null,
                countryId: null,
                regionId: null,
                cupId: null,
                details: {
                    teamId: '123',
                    teamName: 'Test United',
                    shortTeamName: null,
                    isPrimaryClub: true,
                    foundedDate: null,
                    isDeactivated: null,
                    arena: null,
                    league: null,
                    country: null,
                    region: null,
                    trainerPlayerId: null,
                    homePage: null,
                    cup: null,
                    powerRating: null,
                    friendlyTeamId: null,
                    leagueLevelUnit: null,
                    numberOfVictories: null,
                    numberOfUndefeated: null,
                    fanclub: null,
                    logoUrl: null,
                    teamColors: null,
                    dressUri: null,
                    dressAlternateUri: null,
                    botStatus: null,
                    teamRank: null,
                    youthTeamId: null,
                    youthTeamName: null,
                    numberOfVisits: null,
                    possibleToChallengeMidweek: null,
                    possibleToChallengeWeekend: null,
                    genderId: null
                }
            }
        ])

        const ids = harness.cosmos?.items('syncRecords').map((d) => d.id)
        assert.deepStrictEqual(ids, ['team:123:1'])
        assert.deepStrictEqual(
            harness.cosmos?.items('syncGenerations').map((d) => d.id),
            ['1']
        )
    })

    test('emits storage telemetry with the container name', async () => {
        await repo.createGeneration('2025-01-01T00:00:00.000Z')

        const upsert = harness.telemetry.eventsNamed('Storage.Upsert.Executed')[0]
        assert.strictEqual(upsert?.properties?.operationName, 'syncGenerations.Create')
        assert.strictEqual(upsert?.properties?.containerName, 'syncGenerations')
        assert.strictEqual(harness.telemetry.eventsNamed('Storage.Query.Executed')[0]?.properties?.operationName, 'syncGenerations.Query')
    })

    test('SDK failures surface as StorageException', async () => {
        harness.cosmos?.failOn('upsert', 503)
        const gen = await repo.createGeneration('2025-01-01T00:00:00.000Z')

        await assert.rejects(
            repo.upsertRecords('language', gen.id, [{ languageId: 2, languageName: 'English' }]),
            (error: unknown) =>
                error instanceof StorageException &&
                error.statusCode === 503 &&
                error.operation === 'syncRecords.Upsert' &&
                error.message === 'syncRecords.Upsert: Injected upsert failure'
        )
        const [failed] = harness.telemetry.eventsNamed('Storage.Operation.Failed')
        assert.strictEqual(failed?.properties?.httpStatusCode, 503)
    })

    test('a failing query during generation allocation is a StorageException', async () => {
        harness.cosmos?.failOn('query', 429)

        await assert.rejects(repo.createGeneration('2025-01-01T00:00:00.000Z'), StorageException)
    })
})
