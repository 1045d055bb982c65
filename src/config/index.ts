/**
 * Ledger Configuration
 *
 * Centralized constants for the wallet ledger. Per-wallet settings that a
 * caller may override live in {@link WalletConfig}; everything here is fixed.
 *
 * @module config
 */

// ============================================
// Security Configuration
// ============================================

export const SECURITY = {
  /** PBKDF2 iterations for keystore secret encryption (OWASP 2024 recommendation: 100,000+) */
  PBKDF2_ITERATIONS: 100000,

  /** Rounds used to stretch an old-style Electrum hex seed into its master secret */
  OLD_SEED_STRETCH_ROUNDS: 100000,

  /** PBKDF2-SHA512 rounds for Electrum seed words */
  ELECTRUM_SEED_ROUNDS: 2048,

  /** Default timeout for awaiting a password change to complete */
  PASSWORD_UPDATE_TIMEOUT_MS: 30000,
} as const

// ============================================
// Key Configuration
// ============================================

export const KEYS = {
  /** Derivation prefix for receiving keys, relative to the account keystore */
  RECEIVING_SUBPATH: [0] as readonly number[],

  /** Derivation prefix for change keys, relative to the account keystore */
  CHANGE_SUBPATH: [1] as readonly number[],

  /** Account path for BIP39 mnemonics when the caller names none */
  DEFAULT_BIP39_DERIVATION: "m/44'/236'/0'",

  /** First hardened index; non-hardened allocation stops below it */
  HARDENED_OFFSET: 0x80000000,

  /** How many unused receiving keys an account keeps ahead of the last used one */
  DEFAULT_RECEIVING_GAP: 20,

  /** How many unused change keys an account keeps ahead of the last used one */
  DEFAULT_CHANGE_GAP: 10,
} as const

// ============================================
// Ledger Configuration
// ============================================

export const LEDGER = {
  /** Blocks a coinbase output must wait before it is spendable */
  COINBASE_MATURITY: 100,

  /** Default database location when none is given (in-memory) */
  DEFAULT_DATABASE_PATH: null as string | null,

  /** How long a reader waits for queued writes before giving up */
  READ_BARRIER_TIMEOUT_MS: 30000,
} as const

// ============================================
// Wallet Configuration
// ============================================

export type NetworkName = 'mainnet' | 'testnet'

/**
 * Settings a wallet is opened with. All fields are optional; see
 * {@link resolveWalletConfig} for the defaults.
 */
export interface WalletConfig {
  network: NetworkName
  /** SQLite file to load from and flush to. `null` keeps the ledger in memory. */
  databasePath: string | null
  /** PBKDF2 iterations for newly encrypted secrets. Existing envelopes keep theirs. */
  kdfIterations: number
  receivingGap: number
  changeGap: number
}

export const DEFAULT_WALLET_CONFIG: WalletConfig = {
  network: 'mainnet',
  databasePath: LEDGER.DEFAULT_DATABASE_PATH,
  kdfIterations: SECURITY.PBKDF2_ITERATIONS,
  receivingGap: KEYS.DEFAULT_RECEIVING_GAP,
  changeGap: KEYS.DEFAULT_CHANGE_GAP,
}

/**
 * Merge caller overrides with defaults, then apply `LEDGER_NETWORK` and
 * `LEDGER_DB_PATH` from the environment where the caller gave none.
 */
export function resolveWalletConfig(
  overrides: Partial<WalletConfig> = {},
  env: Record<string, string | undefined> = process.env
): WalletConfig {
  const envNetwork = env.LEDGER_NETWORK === 'testnet' || env.LEDGER_NETWORK === 'mainnet'
    ? env.LEDGER_NETWORK
    : undefined

  const config: WalletConfig = {
    ...DEFAULT_WALLET_CONFIG,
    ...(envNetwork !== undefined && { network: envNetwork }),
    ...(env.LEDGER_DB_PATH ? { databasePath: env.LEDGER_DB_PATH } : {}),
    ...overrides,
  }

  if (!Number.isInteger(config.kdfIterations) || config.kdfIterations < 1) {
    throw new RangeError(`kdfIterations must be a positive integer, got ${config.kdfIterations}`)
  }
  if (config.receivingGap < 1 || config.changeGap < 1) {
    throw new RangeError('Key gap limits must be at least 1')
  }
  return config
}
