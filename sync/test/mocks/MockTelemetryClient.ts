import type { Contracts } from 'applicationinsights'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'

/**
 * Mock implementation of ITelemetryClient for unit tests.
 * Stores tracked telemetry for verification in tests.
 */
export class MockTelemetryClient implements ITelemetryClient {
    public events: Contracts.EventTelemetry[] = []
    public exceptions: Contracts.ExceptionTelemetry[] = []
    public traces: Contracts.TraceTelemetry[] = []
    public flushCount = 0

    trackEvent(telemetry: Contracts.EventTelemetry): void {
        this.events.push(telemetry)
    }

    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        this.exceptions.push(telemetry)
    }

    trackTrace(telemetry: Contracts.TraceTelemetry): void {
        this.traces.push(telemetry)
    }

    flush(options?: { callback?: (response: string) => void }): void {
        this.flushCount++
        options?.callback?.('')
    }

    // Test helpers
    clear(): void {
        this.events = []
        this.exceptions = []
        this.traces = []
    }

    eventNames(): string[] {
        return this.events.map((e) => e.name)
    }

    eventsNamed(name: string): Contracts.EventTelemetry[] {
        return this.events.filter((e) => e.name === name)
    }
}
