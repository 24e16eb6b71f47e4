#!/usr/bin/env node
/**
 * Sync CHPP data for the authenticated user.
 *
 * Runs a sync with the stored access token. When no token is stored (or --reauth is given) the
 * OAuth handshake runs first: the authorization URL is printed, the verification code shown by
 * the site is read from standard input and the resulting access token is stored.
 *
 * Usage:
 *   npm run sync
 *   npm run sync -- --reauth
 *
 * Options:
 *   --reauth   Authorize again and replace the stored access token
 *   --help     Show this message
 *
 * Environment:
 *   CHPP_CONSUMER_KEY / CHPP_CONSUMER_SECRET are required.
 *   PERSISTENCE_MODE=cosmos with COSMOS_SQL_* stores results in Cosmos DB (memory otherwise).
 *   KEYVAULT_NAME stores the access token in Key Vault (CHPP_ACCESS_TOKEN / CHPP_ACCESS_SECRET otherwise).
 */
import 'reflect-metadata'
import type { SyncConfig } from '@touchline/shared'
import { describeError, SERVICE_SYNC_CLI } from '@touchline/shared'
import { Container } from 'inversify'
import { stdin as input, stdout as output } from 'node:process'
import { createInterface } from 'node:readline/promises'
import type { IOAuthHandshake } from '../src/chpp/OAuthHandshakeService.js'
import { TOKENS } from '../src/di/tokens.js'
import { setupContainer } from '../src/inversify.config.js'
import { AccessTokenStore } from '../src/secrets/accessTokenStore.js'
import { SyncOrchestrator } from '../src/services/SyncOrchestrator.js'
import type { ITelemetryClient } from '../src/telemetry/ITelemetryClient.js'

interface CliOptions {
    reauth: boolean
    help: boolean
}

/**
 * Parse command line arguments
 */
function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = { reauth: false, help: false }
    for (const arg of args) {
        if (arg === '--reauth') {
            options.reauth = true
        } else if (arg === '--help' || arg === '-h') {
            options.help = true
        } else {
            throw new Error(`Unknown option: ${arg}`)
        }
    }
    return options
}

function printUsage(): void {
    console.log('Usage: npm run sync [-- --reauth]')
    console.log('  --reauth   Authorize again and replace the stored access token')
    console.log('  --help     Show this message')
}

async function authorize(container: Container): Promise<void> {
    const handshake = container.get<IOAuthHandshake>(TOKENS.OAuthHandshake)
    const { consumer } = container.get<SyncConfig>(TOKENS.SyncConfig)

    const { authorizationUrl, requestToken } = await handshake.obtainRequestToken(consumer)
    console.log('Open this URL in a browser and approve access:')
    console.log(`  ${authorizationUrl}`)

    const rl = createInterface({ input, output })
    try {
        const verifier = await rl.question('Verification code: ')
        const accessToken = await handshake.exchangeVerificationCode(verifier, requestToken, consumer)
        await container.get(AccessTokenStore).save(accessToken)
        console.log('✅ Access token stored')
    } finally {
        rl.close()
    }
}

async function main(): Promise<number> {
    let options: CliOptions
    try {
        options = parseArgs(process.argv.slice(2))
    } catch (error) {
        console.error(`❌ ${describeError(error)}`)
        printUsage()
        return 2
    }
    if (options.help) {
        printUsage()
        return 0
    }

    process.env.TOUCHLINE_SERVICE_NAME ||= SERVICE_SYNC_CLI
    const container = await setupContainer(new Container())
    const orchestrator = container.get(SyncOrchestrator)
    const onProgress = (fraction: number, message: string): void => {
        console.log(`[${String(Math.round(fraction * 100)).padStart(3)}%] ${message}`)
    }

    try {
        // Overwrites the stored pair in place
        if (options.reauth) {
            await authorize(container)
        }

        let outcome = await orchestrator.performSyncWithStoredCredentials(onProgress)
        if (outcome.status === 'no-credentials') {
            console.log('No stored access token; starting authorization.')
            await authorize(container)
            outcome = await orchestrator.performSyncWithStoredCredentials(onProgress)
        }

        if (outcome.status === 'no-credentials') {
            console.error('❌ Access token was not stored; sync skipped')
            return 1
        }
        console.log(
            `✅ Generation ${outcome.generationId} completed: ${outcome.playerCount} players (${outcome.detailFallbacks} without details)`
        )
        return 0
    } catch (error) {
        console.error(`❌ Sync failed: ${describeError(error)}`)
        return 1
    } finally {
        const telemetry = container.get<ITelemetryClient>(TOKENS.TelemetryClient)
        await new Promise<void>((resolve) => telemetry.flush({ callback: () => resolve() }))
    }
}

main().then(
    (code) => process.exit(code),
    (error: unknown) => {
        console.error(`❌ ${describeError(error)}`)
        process.exit(1)
    }
)
