// Infrastructure: database repositories and connection
// This is the canonical location for all DB access code.
export * from './connection'
export * from './schema'
export * from './masterKeyRepository'
export * from './accountRepository'
export * from './keyInstanceRepository'
export * from './txRepository'
export * from './txoRepository'
