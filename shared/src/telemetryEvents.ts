// Canonical sync telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: all event names must be referenced from this registry.

export const SYNC_EVENT_NAMES = [
    // OAuth handshake
    'OAuth.RequestToken.Obtained',
    'OAuth.RequestToken.Failed',
    'OAuth.AccessToken.Obtained',
    'OAuth.AccessToken.Failed',
    // CHPP data endpoint
    'Chpp.Request.Succeeded',
    'Chpp.Request.Failed',
    // Retry policy
    'Chpp.Retry.Scheduled',
    'Chpp.Retry.Exhausted',
    // Sync pipeline
    'Sync.Run.Started',
    'Sync.Stage.Completed',
    'Sync.Player.DetailFallback',
    'Sync.Run.Completed',
    'Sync.Run.Failed',
    'Sync.Credentials.Missing',
    // Storage
    'Storage.Upsert.Executed',
    'Storage.Query.Executed',
    'Storage.Operation.Failed',
    // Secret store
    'Secret.Fetch.Success',
    'Secret.Fetch.Failure',
    'Secret.Store.Updated',
    'Secret.Store.Deleted',
    // Telemetry self-check
    'Telemetry.EventName.Invalid'
] as const

export type SyncEventName = (typeof SYNC_EVENT_NAMES)[number]

export function isSyncEventName(name: string): name is SyncEventName {
    return (SYNC_EVENT_NAMES as readonly string[]).includes(name)
}

export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
