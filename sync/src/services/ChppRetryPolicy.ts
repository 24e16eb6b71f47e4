/**
 * Retry policy for signed CHPP calls.
 *
 * Each attempt receives a brand-new SigningContext from the CredentialSource; a nonce is never
 * resent. Network failures and CHPP error codes listed in `retryableCodes` are retried with
 * capped exponential backoff; any other failure is returned immediately.
 */
import type { CredentialSource, IClock, RetryConfig, SigningContext, SyncConfig } from '@touchline/shared'
import { describeError, isRetryableSyncError, nextBackoff } from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

export type SignedOperation<T> = (context: SigningContext, attempt: number) => Promise<T>

/** Successful result plus the number of attempts it took */
export interface RetryOutcome<T> {
    value: T
    attempts: number
}

export class RetryFailure extends Error {
    constructor(
        public readonly lastError: unknown,
        public readonly attempts: number
    ) {
        super(describeError(lastError), { cause: lastError })
        this.name = 'RetryFailure'
    }
}

@injectable()
export class ChppRetryPolicy {
    constructor(
        @inject(TOKENS.SyncConfig) private readonly syncConfig: SyncConfig,
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * Run `operation` until it succeeds, fails fatally or the retry budget is spent.
     * @returns the operation's result; rejects with the last error seen
     */
    async retry<T>(operationName: string, credentials: CredentialSource, operation: SignedOperation<T>, config?: RetryConfig): Promise<T> {
        try {
            const outcome = await this.retryWithAttempts(operationName, credentials, operation, config)
            return outcome.value
        } catch (error) {
            throw error instanceof RetryFailure ? error.lastError : error
        }
    }

    /**
     * Same as `retry` but reports the attempt count, and wraps the final error in a RetryFailure
     * so callers auditing each fetch can record how many attempts were spent.
     */
    async retryWithAttempts<T>(
        operationName: string,
        credentials: CredentialSource,
        operation: SignedOperation<T>,
        config: RetryConfig = this.syncConfig.retry
    ): Promise<RetryOutcome<T>> {
        let backoffMs = Math.min(config.initialBackoffMs, config.maxBackoffMs)

        for (let attempt = 0; ; attempt++) {
            try {
                const value = await operation(credentials.nextContext(), attempt)
                return { value, attempts: attempt + 1 }
            } catch (error) {
                if (!isRetryableSyncError(error, config.retryableCodes)) {
                    this.telemetry.trace(`${operationName} failed fatally on attempt ${attempt + 1}: ${describeError(error)}`, 'warning', {
                        operationName,
                        attempt
                    })
                    throw new RetryFailure(error, attempt + 1)
                }

                if (attempt >= config.maxRetries) {
                    this.telemetry.trackSyncEventStrict('Chpp.Retry.Exhausted', {
                        operationName,
                        attempts: attempt + 1,
                        error: describeError(error)
                    })
                    throw new RetryFailure(error, attempt + 1)
                }

                this.telemetry.trackSyncEventStrict('Chpp.Retry.Scheduled', {
                    operationName,
                    attempt: attempt + 1,
                    delayMs: backoffMs,
                    error: describeError(error)
                })
                this.telemetry.trace(`${operationName} attempt ${attempt + 1} failed, retrying in ${backoffMs} ms`, 'information', {
                    operationName,
                    attempt
                })
                await this.clock.sleep(backoffMs)
                backoffMs = nextBackoff(backoffMs, config)
            }
        }
    }
}
