// Central service naming constants used for telemetry enrichment.

export const SERVICE_SYNC = 'touchline-sync'
export const SERVICE_SYNC_CLI = 'touchline-cli'

export function serviceLabel(name: string): string {
    switch (name) {
        case SERVICE_SYNC:
            return 'Sync Runtime'
        case SERVICE_SYNC_CLI:
            return 'Sync Command Line'
        default:
            return name
    }
}
