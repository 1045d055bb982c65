/**
 * Wallet module index
 */

export { Wallet } from './core'
export type { NewAccountEntry, WalletOptions } from './core'
export { allocateKeys, createImportedKeys, deriveKeysUntil, keyScriptsFor } from './keyRegistry'
export { linkTransaction, unlinkTransaction } from './linker'
export type { LinkRequest } from './linker'
export { recordTransactionProof, revertVerifications } from './confirmations'
export type { ProofRequest } from './confirmations'
