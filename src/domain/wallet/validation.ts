/**
 * Pure Validation Functions
 *
 * Format checks for the text a user may hand the wallet: mnemonics,
 * Electrum seeds, addresses, private keys and transaction ids. They check
 * structure only and never touch storage or the network.
 *
 * @module domain/wallet/validation
 */

import * as bip39 from 'bip39'
import { Hash, PrivateKey, Utils } from '@bsv/sdk'
import type { NetworkParams } from '../networks'
import type { Result } from '../types'
import { err, ok } from '../types'

/**
 * Result of mnemonic validation.
 */
export interface MnemonicValidationResult {
  /** Whether the mnemonic is valid */
  isValid: boolean
  /** Normalized mnemonic if valid (lowercase, single spaces) */
  normalizedMnemonic?: string
  /** Error message if invalid */
  error?: string
}

/**
 * Normalize a mnemonic phrase for consistent comparison.
 *
 * @example
 * ```typescript
 * normalizeMnemonic('  Abandon ABANDON  abandon ')
 * // Returns: 'abandon abandon abandon'
 * ```
 */
export function normalizeMnemonic(mnemonic: string): string {
  return mnemonic.toLowerCase().trim().replace(/\s+/g, ' ')
}

/**
 * Validate a BIP-39 mnemonic phrase (12 or 24 words, valid checksum).
 */
export function validateMnemonic(mnemonic: string): MnemonicValidationResult {
  const normalized = normalizeMnemonic(mnemonic)
  const words = normalized.split(' ')

  if (words.length !== 12 && words.length !== 24) {
    return {
      isValid: false,
      error: `Invalid mnemonic phrase. Expected 12 or 24 words but got ${words.length}.`
    }
  }

  if (!bip39.validateMnemonic(normalized)) {
    return {
      isValid: false,
      error: 'Invalid mnemonic phrase. Please check your words.'
    }
  }

  return {
    isValid: true,
    normalizedMnemonic: normalized
  }
}

/**
 * Electrum's seed text normalization: NFKD, lowercase, accents stripped,
 * whitespace collapsed.
 */
export function normalizeElectrumText(text: string): string {
  return text
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .replace(/\s+/g, ' ')
}

/** Version prefix of standard Electrum seeds */
const ELECTRUM_STANDARD_PREFIX = '01'

/**
 * Whether the words form an Electrum "standard" seed. The version lives in
 * HMAC-SHA512("Seed version", words) rather than in a word-list checksum.
 */
export function isElectrumSeed(words: string): boolean {
  const normalized = normalizeElectrumText(words)
  if (normalized.split(' ').length < 12) return false
  const digest = Hash.sha512hmac(
    Utils.toArray('Seed version', 'utf8'),
    Utils.toArray(normalized, 'utf8')
  )
  return Utils.toHex(digest).startsWith(ELECTRUM_STANDARD_PREFIX)
}

/**
 * Old Electrum hex seed: 32 hex characters
 */
export function isOldHexSeed(text: string): boolean {
  return /^[0-9a-f]{32}$/.test(text.trim().toLowerCase())
}

/**
 * Old Electrum master public key: 64-byte uncompressed point, hex, no prefix
 */
export function isOldMasterPublicKey(text: string): boolean {
  return /^[0-9a-f]{128}$/.test(text.trim().toLowerCase())
}

export type AddressKind = 'P2PKH' | 'P2SH'

export interface ParsedAddress {
  kind: AddressKind
  /** 20-byte hash, hex */
  hash160: string
}

/**
 * Decode a Base58Check address for the given network.
 *
 * @example
 * ```typescript
 * const parsed = parseAddress('1A1zP1eP5QGefi2DMPTfTL5SLmv7DivfNa', MAINNET)
 * // { ok: true, value: { kind: 'P2PKH', hash160: '62e907b1...' } }
 * ```
 */
export function parseAddress(address: string, network: NetworkParams): Result<ParsedAddress, string> {
  const text = address.trim()
  if (text.length < 26 || text.length > 35) {
    return err(`Invalid address length: ${text}`)
  }

  let decoded: ReturnType<typeof Utils.fromBase58Check>
  try {
    decoded = Utils.fromBase58Check(text)
  } catch (_error) {
    return err(`Invalid address checksum: ${text}`)
  }

  const { prefix, data } = decoded
  if (!Array.isArray(prefix) || !Array.isArray(data) || data.length !== 20) {
    return err(`Invalid address payload: ${text}`)
  }

  const hash160 = Utils.toHex(data)
  if (prefix[0] === network.addressPrefix) {
    return ok({ kind: 'P2PKH', hash160 })
  }
  if (prefix[0] === network.scriptHashPrefix) {
    return ok({ kind: 'P2SH', hash160 })
  }
  return err(`Address ${text} is not for ${network.name}`)
}

/**
 * Decode a WIF private key
 */
export function parsePrivateKey(wif: string): Result<PrivateKey, string> {
  try {
    return ok(PrivateKey.fromWif(wif.trim()))
  } catch (_error) {
    return err('Invalid WIF private key')
  }
}

/**
 * Validate a transaction ID format (64 hex characters).
 */
export function isValidTxid(txid: string): boolean {
  return /^[0-9a-fA-F]{64}$/.test(txid)
}

/**
 * Validate a satoshi amount (non-negative integer within supply)
 */
export function isValidSatoshiAmount(amount: number): boolean {
  return Number.isInteger(amount) && amount >= 0 && amount <= 21_000_000_00_000_000
}
