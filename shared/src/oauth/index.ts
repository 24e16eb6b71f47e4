export * from './credentials.js'
export * from './signing.js'
export * from './signingContext.js'
export * from './tokenResponse.js'
