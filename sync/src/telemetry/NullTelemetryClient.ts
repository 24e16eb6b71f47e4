import type { Contracts } from 'applicationinsights'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Null implementation of ITelemetryClient for local runs.
 * All telemetry operations are no-ops to avoid initialization overhead and network calls.
 */
export class NullTelemetryClient implements ITelemetryClient {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackEvent(telemetry: Contracts.EventTelemetry): void {
        // no-op
    }

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        // no-op
    }

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    trackTrace(telemetry: Contracts.TraceTelemetry): void {
        // no-op
    }

    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void {
        options?.callback?.('')
    }
}
