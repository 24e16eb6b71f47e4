/**
 * Retry configuration for signed CHPP calls.
 *
 * Pure exponential doubling without jitter, capped at `maxBackoffMs`.
 * The retryable CHPP error codes are configuration; 503 and 429 are the defaults.
 */
import { DEFAULT_RETRYABLE_CHPP_CODES } from '../exceptions/syncExceptions.js'

export interface RetryConfig {
    /** Retries after the first attempt; total attempts = maxRetries + 1 */
    maxRetries: number
    initialBackoffMs: number
    maxBackoffMs: number
    retryableCodes: readonly number[]
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
    maxRetries: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 32_000,
    retryableCodes: DEFAULT_RETRYABLE_CHPP_CODES
})

export function nextBackoff(currentMs: number, config: Pick<RetryConfig, 'maxBackoffMs'>): number {
    return Math.min(currentMs * 2, config.maxBackoffMs)
}

/** Delays slept between attempts when every attempt fails retryably. */
export function backoffSchedule(config: RetryConfig): number[] {
    const delays: number[] = []
    let backoff = Math.min(config.initialBackoffMs, config.maxBackoffMs)
    for (let i = 0; i < config.maxRetries; i++) {
        delays.push(backoff)
        backoff = nextBackoff(backoff, config)
    }
    return delays
}
