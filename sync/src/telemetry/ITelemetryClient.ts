import type { Contracts } from 'applicationinsights'

/**
 * Telemetry client interface for dependency injection.
 * Abstracts the Application Insights TelemetryClient for better testability.
 */
export interface ITelemetryClient {
    /**
     * Track an event with optional properties
     */
    trackEvent(telemetry: Contracts.EventTelemetry): void

    /**
     * Track an exception with optional properties
     */
    trackException(telemetry: Contracts.ExceptionTelemetry): void

    /**
     * Track a trace message
     */
    trackTrace(telemetry: Contracts.TraceTelemetry): void

    /**
     * Flush buffered telemetry
     */
    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void
}
