/**
 * Environment configuration for the sync runtime.
 *
 * Validated once at startup; every downstream component receives typed values.
 */
import { z } from 'zod'
import type { ConsumerCredentials } from '../oauth/credentials.js'
import type { RetryConfig } from '../retry/retryConfig.js'
import { DEFAULT_RETRY_CONFIG } from '../retry/retryConfig.js'

export const DEFAULT_USER_AGENT = 'Touchline/1.0'

// `VAR=` in a .env file arrives as '' and must not coerce to 0
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema)

const nonNegativeInt = (fallback: number) => blankAsUnset(z.coerce.number().int().nonnegative().default(fallback))
const positiveInt = (fallback: number) => blankAsUnset(z.coerce.number().int().positive().default(fallback))

const codeList = blankAsUnset(
    z
        .string()
        .default(DEFAULT_RETRY_CONFIG.retryableCodes.join(','))
        .transform((raw, ctx) => {
            const codes = raw
                .split(',')
                .map((c) => c.trim())
                .filter((c) => c !== '')
                .map(Number)
            if (codes.some((c) => !Number.isInteger(c))) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a comma separated list of integers: "${raw}"` })
                return z.NEVER
            }
            return codes
        })
)

export const SyncEnvSchema = z
    .object({
        CHPP_CONSUMER_KEY: z.string().default(''),
        CHPP_CONSUMER_SECRET: z.string().default(''),
        CHPP_USER_AGENT: blankAsUnset(z.string().min(1).default(DEFAULT_USER_AGENT)),
        CHPP_MAX_RETRIES: nonNegativeInt(DEFAULT_RETRY_CONFIG.maxRetries),
        CHPP_INITIAL_BACKOFF_MS: positiveInt(DEFAULT_RETRY_CONFIG.initialBackoffMs),
        CHPP_MAX_BACKOFF_MS: positiveInt(DEFAULT_RETRY_CONFIG.maxBackoffMs),
        CHPP_RETRYABLE_CODES: codeList
    })
    .superRefine((env, ctx) => {
        if (env.CHPP_INITIAL_BACKOFF_MS > env.CHPP_MAX_BACKOFF_MS) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['CHPP_INITIAL_BACKOFF_MS'],
                message: 'must not exceed CHPP_MAX_BACKOFF_MS'
            })
        }
    })

export interface SyncConfig {
    consumer: ConsumerCredentials
    userAgent: string
    retry: RetryConfig
}

/**
 * Load and validate configuration from an environment map (defaults to process.env).
 * @throws Error naming every invalid variable
 */
export function loadSyncConfig(env: Record<string, string | undefined> = process.env): SyncConfig {
    const result = SyncEnvSchema.safeParse(env)
    if (!result.success) {
        const problems = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        throw new Error(`Invalid sync configuration. ${problems.join('; ')}`)
    }
    const e = result.data
    return {
        consumer: { key: e.CHPP_CONSUMER_KEY.trim(), secret: e.CHPP_CONSUMER_SECRET.trim() },
        userAgent: e.CHPP_USER_AGENT,
        retry: {
            maxRetries: e.CHPP_MAX_RETRIES,
            initialBackoffMs: e.CHPP_INITIAL_BACKOFF_MS,
            maxBackoffMs: e.CHPP_MAX_BACKOFF_MS,
            retryableCodes: e.CHPP_RETRYABLE_CODES
        }
    }
}
