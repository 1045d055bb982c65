/**
 * Wallet ledger and transaction-linking engine
 *
 * @example
 * ```typescript
 * const wallet = await Wallet.open({ databasePath: 'wallet.sqlite' })
 * const keystore = await instantiateKeystoreFromText('bip39_seed_words', words, password)
 * const account = await wallet.createAccountFromKeystore(keystore)
 * const [key] = await wallet.getFreshKeys(account.accountId, KEYS.RECEIVING_SUBPATH, 1)
 * ```
 */

export { KEYS, LEDGER, SECURITY, DEFAULT_WALLET_CONFIG, resolveWalletConfig } from './config'
export type { NetworkName, WalletConfig } from './config'

export * from './domain/types'
export * from './domain/transaction/flags'
export { MAINNET, TESTNET, getNetwork } from './domain/networks'
export type { NetworkParams } from './domain/networks'
export { addressFor, classifyScript, scriptFor, scriptHashOf, supportedScriptTypes } from './domain/scripts/templates'
export type { KeyMaterial } from './domain/scripts/templates'
export { parseTransaction, transactionHash } from './domain/transaction/parsing'
export type { ParsedInput, ParsedOutput, ParsedTransaction } from './domain/transaction/parsing'
export { formatDerivationPath, parseDerivationPath } from './domain/wallet/derivationPath'

export * from './services/errors'
export { CancellationController, CancellationError, TaskHandle, isCancellationError } from './services/cancellation'
export type { CancellationToken } from './services/cancellation'
export { logger } from './services/logger'
export type { LogEntry, LogLevel } from './services/logger'
export type { EncryptedData } from './services/crypto'
export type { Account, DerivingAccount, ImportedAccount } from './services/accounts'
export * from './services/keystores'
export * from './services/wallet'
export { IndexerBridge } from './services/sync/indexerBridge'
export type { ChainIndexer, IndexerBridgeOptions, IndexerEvent } from './services/sync/indexerBridge'
