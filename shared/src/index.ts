// Root barrel – grouped re-exports delegate to per-directory barrels to keep exports close to implementation.

export * from './chpp/index.js'
export * from './config/syncConfig.js'
export * from './exceptions/index.js'
export * from './oauth/index.js'
export * from './players/playerMerge.js'
export * from './retry/retryConfig.js'
export * from './serviceConstants.js'
export * from './sync/syncModels.js'
export * from './sync/syncRecords.js'
export * from './telemetryEvents.js'
export * from './time/IClock.js'
