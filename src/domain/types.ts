/**
 * Core domain types for the wallet ledger
 * These are pure data types with no dependencies on infrastructure
 */

// ============================================
// Result Type (Functional Error Handling)
// ============================================

/**
 * A Result type for explicit error handling without exceptions.
 * Use this for operations that can fail in expected ways.
 *
 * @example
 * ```ts
 * const result = parseAddress(text, MAINNET)
 * if (isOk(result)) {
 *   console.log(result.value.hash160)
 * } else {
 *   console.error(result.error)
 * }
 * ```
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a successful Result
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

/**
 * Create a failed Result
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * Type guard to check if a Result is successful
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

/**
 * Type guard to check if a Result is an error
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

/**
 * Unwrap a Result, throwing if it's an error.
 * Use sparingly - prefer pattern matching with isOk/isErr.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error instanceof Error ? result.error : new Error(String(result.error))
}

/**
 * Map over a successful Result's value.
 */
export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result
}

// ============================================
// Scripts
// ============================================

/**
 * Output script templates the ledger recognises. `NONE` marks a script
 * that matches no template.
 */
export type ScriptType =
  | 'NONE'
  | 'P2PKH'
  | 'P2PK'
  | 'MULTISIG_BARE'
  | 'MULTISIG_P2SH'

export const SCRIPT_TYPES: readonly ScriptType[] = [
  'NONE', 'P2PKH', 'P2PK', 'MULTISIG_BARE', 'MULTISIG_P2SH'
]

export function isScriptType(value: string): value is ScriptType {
  return SCRIPT_TYPES.some(type => type === value)
}

// ============================================
// Derivation
// ============================================

/** Path relative to the keystore root, e.g. `[0, 5]` for receiving key 5 */
export type DerivationPath = readonly number[]

/** How a master key row was created */
export type MasterKeyDerivationType = 'BIP32' | 'ELECTRUM_OLD' | 'HARDWARE' | 'MULTISIG'

/** How a single key instance is reached from its master key (or stands alone) */
export type KeyDerivationType =
  | 'BIP32_SUBPATH'
  | 'ELECTRUM_OLD_SUBPATH'
  | 'PRIVATE_KEY'
  | 'PUBLIC_KEY_HASH'

export const KeyInstanceFlags = {
  NONE: 0,
  /** Included in subscriptions and fresh-key lookups */
  ACTIVE: 1 << 0,
  /** An output paying to this key has been seen */
  USED: 1 << 1,
} as const

// ============================================
// Accounts & Keys
// ============================================

export type AccountKind =
  | 'standard'
  | 'imported_privkey'
  | 'imported_address'
  | 'multisig'
  | 'hardware'

export interface MasterKeyRecord {
  masterkeyId: number
  parentMasterkeyId: number | null
  derivationType: MasterKeyDerivationType
  /** JSON whose shape depends on `derivationType` */
  derivationData: string
}

export interface AccountRecord {
  accountId: number
  kind: AccountKind
  /** Null for imported accounts */
  defaultMasterkeyId: number | null
  defaultScriptType: ScriptType
  accountName: string
}

export interface KeyInstance {
  keyinstanceId: number
  accountId: number
  masterkeyId: number | null
  derivationType: KeyDerivationType
  /** Set for subpath derivations, null for imported keys */
  derivationPath: DerivationPath | null
  /**
   * JSON key material for imported keys: the public key and its encrypted
   * private key (PRIVATE_KEY), or the hash160 (PUBLIC_KEY_HASH).
   */
  derivationData: string | null
  scriptType: ScriptType
  flags: number
  description: string | null
}

// ============================================
// Transactions
// ============================================

export const BlockHeight = {
  /** Never broadcast, only known to this wallet */
  LOCAL: -2,
  /** Broadcast but one of its parents is unconfirmed */
  MEMPOOL_UNCONFIRMED_PARENT: -1,
  /** Broadcast, not yet mined */
  MEMPOOL: 0,
} as const

export const TxoFlags = {
  NONE: 0,
  COINBASE: 1 << 0,
} as const

export interface TransactionMetadata {
  blockHeight: number
  blockPosition: number | null
  blockHash: string | null
  feeValue: number | null
  dateMined: number | null
}

export interface TransactionOutputRecord {
  txHash: string
  txoIndex: number
  value: number
  scriptType: ScriptType
  /** sha256 of the full locking script, hex */
  scriptHash: string
  keyinstanceId: number | null
  flags: number
  spendingTxHash: string | null
  spendingTxiIndex: number | null
}

/** An owned output together with the account that owns it */
export interface AccountTransactionOutput extends TransactionOutputRecord {
  accountId: number
  keyinstanceId: number
}

export interface TransactionValue {
  accountId: number
  /** Net satoshi effect on the account: owned outputs minus owned outputs spent */
  total: number
}

export interface TransactionProof {
  /** Index of the transaction within the block */
  position: number
  /** Merkle branch from the transaction to the root, hex, leaf first */
  hashes: string[]
}

export interface BlockHeaderInfo {
  timestamp: number
  hash?: string
}

/**
 * Block metadata learned for a transaction before its body arrives
 */
export interface MissingTransactionEntry {
  blockHash: string | null
  blockHeight: number
  feeValue: number | null
  importFlags: number
}

/**
 * Filled in by the linker: which accounts and keys an import touched
 */
export interface TransactionLinkState {
  accountIds: Set<number>
  keyinstanceIds: Set<number>
}

export function createLinkState(): TransactionLinkState {
  return { accountIds: new Set(), keyinstanceIds: new Set() }
}

export interface ImportOutcome {
  txHash: string
  /** False when the hash was already live in the ledger */
  inserted: boolean
  linkState: TransactionLinkState
}

export type SubscriptionKind = 'output' | 'input'

/**
 * A key the indexer must watch for a transaction
 */
export interface KeySubscription {
  txHash: string
  kind: SubscriptionKind
  /** Output index for `output`, input index for `input` */
  putIndex: number
  keyinstanceId: number
  scriptHash: string
}

/**
 * Derived, never stored. All values in satoshis.
 */
export interface WalletBalance {
  /** Settled, mature */
  confirmed: number
  /** Broadcast, awaiting a proof */
  unconfirmed: number
  /** Settled coinbase outputs still inside the maturity window */
  unmatured: number
  /** Local-only transactions: signed, received or dispatched but not yet cleared */
  allocated: number
}

export const EMPTY_BALANCE: WalletBalance = Object.freeze({
  confirmed: 0,
  unconfirmed: 0,
  unmatured: 0,
  allocated: 0,
})
