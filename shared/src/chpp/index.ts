export * from './endpoints.js'
export * from './models.js'
export * from './schemas.js'
