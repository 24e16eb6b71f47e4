/**
 * Telemetry Service - Central service for emitting sync telemetry events
 *
 * Provides enriched telemetry methods that wrap ITelemetryClient.
 * All services should inject this service (or ITelemetryClient directly) via DI.
 */
import type { SyncEventName } from '@touchline/shared'
import { isSyncEventName, SERVICE_SYNC } from '@touchline/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

export interface SyncTelemetryOptions {
    persistenceMode?: string | null
    serviceOverride?: string
    correlationId?: string | null
}

export type TraceLevel = 'verbose' | 'information' | 'warning' | 'error'

@injectable()
export class TelemetryService {
    constructor(@inject(TOKENS.TelemetryClient) private client: ITelemetryClient) {}

    /**
     * Track a sync event with automatic enrichment
     * @param name - Event name (should be from SYNC_EVENT_NAMES)
     */
    trackSyncEvent(name: string, properties?: Record<string, unknown>, opts?: SyncTelemetryOptions): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || this.inferService()
        }

        const pm = this.resolvePersistenceMode(opts?.persistenceMode)
        if (pm && finalProps.persistenceMode === undefined) {
            finalProps.persistenceMode = pm
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = opts?.correlationId || randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    /**
     * Track a sync event with strict name validation
     * Only accepts SyncEventName types to prevent typos
     */
    trackSyncEventStrict(name: SyncEventName, properties: Record<string, unknown>, opts?: SyncTelemetryOptions): void {
        if (!isSyncEventName(name)) {
            this.trackSyncEvent('Telemetry.EventName.Invalid', { requested: name })
            return
        }
        this.trackSyncEvent(name, properties, opts)
    }

    trackException(error: Error, properties?: Record<string, unknown>): void {
        this.client.trackException({ exception: error, properties })
    }

    /** Diagnostic log line (retry attempts, backoff waits, stage boundaries) */
    trace(message: string, level: TraceLevel = 'information', properties?: Record<string, unknown>): void {
        this.client.trackTrace({ message, properties: { ...properties, level, service: this.inferService() } })
    }

    private inferService(): string {
        return process.env.TOUCHLINE_SERVICE_NAME || SERVICE_SYNC
    }

    private resolvePersistenceMode(explicit?: string | null): string | undefined {
        if (explicit) return explicit
        return process.env.PERSISTENCE_MODE || undefined
    }
}
