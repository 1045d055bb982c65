/**
 * Keystore operations
 *
 * Serialization to and from masterkey derivation data, public key
 * resolution for key instances, and everything that touches the
 * encrypted secrets (password checks, re-encryption, private keys).
 */

import { Hash, PrivateKey, Utils } from '@bsv/sdk'
import type { KeyMaterial } from '../../domain/scripts/templates'
import type { KeyInstance, MasterKeyDerivationType, MasterKeyRecord } from '../../domain/types'
import { formatDerivationPath } from '../../domain/wallet/derivationPath'
import {
  deriveBip32PrivateKey,
  deriveBip32PublicKey,
  deriveOldPrivateKey,
  deriveOldPublicKey,
  encodePoint,
  stretchOldSeed
} from '../../domain/wallet/keyDerivation'
import { decrypt, encrypt, isEncryptedData } from '../crypto'
import type { EncryptedData } from '../crypto'
import {
  DecryptionError,
  IncompatibleWalletError,
  InvalidPasswordError,
  UnknownKeyInstanceError
} from '../errors'
import { keyLogger } from '../logger'
import type {
  CosignerKeyStore,
  DerivingKeyStore,
  HardwareKeyStore,
  ImportedKey,
  ImportedKeyStore,
  KeyStore,
  MultisigKeyStore
} from './types'

type JsonRecord = Record<string, unknown>

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseRecord(text: string, what: string): JsonRecord {
  const parsed: unknown = JSON.parse(text)
  if (!isRecord(parsed)) {
    throw new IncompatibleWalletError(`Malformed ${what} derivation data`)
  }
  return parsed
}

function readString(data: JsonRecord, key: string): string {
  const value = data[key]
  if (typeof value !== 'string') {
    throw new IncompatibleWalletError(`Derivation data field "${key}" must be a string`)
  }
  return value
}

function readOptionalString(data: JsonRecord, key: string): string | null {
  const value = data[key]
  if (value === null || value === undefined) return null
  if (typeof value !== 'string') {
    throw new IncompatibleWalletError(`Derivation data field "${key}" must be a string`)
  }
  return value
}

function readSecret(data: JsonRecord, key: string): EncryptedData | null {
  const value = data[key]
  if (value === null || value === undefined) return null
  if (!isEncryptedData(value)) {
    throw new IncompatibleWalletError(`Derivation data field "${key}" is not an encrypted secret`)
  }
  return value
}

// ============================================
// Serialization
// ============================================

export function keystoreDerivationType(keystore: KeyStore): MasterKeyDerivationType {
  switch (keystore.type) {
    case 'bip32':
      return 'BIP32'
    case 'electrum_old':
      return 'ELECTRUM_OLD'
    case 'hardware':
      return 'HARDWARE'
    case 'multisig':
      return 'MULTISIG'
    case 'imported':
      throw new IncompatibleWalletError('Imported keystores have no master key')
  }
}

function cosignerToData(keystore: CosignerKeyStore): JsonRecord {
  switch (keystore.type) {
    case 'bip32':
      return {
        xpub: keystore.xpub,
        xprv: keystore.xprv,
        seed: keystore.seed,
        passphrase: keystore.passphrase,
        label: keystore.label
      }
    case 'electrum_old':
      return { mpk: keystore.mpk, seed: keystore.seed }
    case 'hardware':
      return {
        hwType: keystore.hwType,
        label: keystore.label,
        derivation: keystore.derivation,
        xpub: keystore.xpub
      }
  }
}

/**
 * JSON stored in `masterkeys.derivation_data`
 */
export function keystoreToDerivationData(keystore: KeyStore): string {
  switch (keystore.type) {
    case 'multisig':
      return JSON.stringify({
        m: keystore.threshold,
        n: keystore.cosigners.length,
        cosignerKeys: keystore.cosigners.map(cosigner => ({
          derivationType: keystoreDerivationType(cosigner),
          data: cosignerToData(cosigner)
        }))
      })
    case 'imported':
      throw new IncompatibleWalletError('Imported keystores have no derivation data')
    default:
      return JSON.stringify(cosignerToData(keystore))
  }
}

function cosignerFromData(derivationType: unknown, data: JsonRecord): CosignerKeyStore {
  switch (derivationType) {
    case 'BIP32':
      return {
        type: 'bip32',
        xpub: readString(data, 'xpub'),
        xprv: readSecret(data, 'xprv'),
        seed: readSecret(data, 'seed'),
        passphrase: readSecret(data, 'passphrase'),
        label: readOptionalString(data, 'label')
      }
    case 'ELECTRUM_OLD':
      return { type: 'electrum_old', mpk: readString(data, 'mpk'), seed: readSecret(data, 'seed') }
    case 'HARDWARE':
      return {
        type: 'hardware',
        hwType: readString(data, 'hwType'),
        label: readOptionalString(data, 'label'),
        derivation: readString(data, 'derivation'),
        xpub: readString(data, 'xpub')
      }
    default:
      throw new IncompatibleWalletError(`Unsupported cosigner derivation type: ${String(derivationType)}`)
  }
}

export function keystoreFromMasterKey(record: MasterKeyRecord): KeyStore {
  const data = parseRecord(record.derivationData, record.derivationType)
  if (record.derivationType !== 'MULTISIG') {
    return cosignerFromData(record.derivationType, data)
  }

  const threshold = data.m
  const entries = data.cosignerKeys
  if (typeof threshold !== 'number' || !Array.isArray(entries)) {
    throw new IncompatibleWalletError('Malformed multisig derivation data')
  }
  const cosigners = entries.map((entry: unknown) => {
    if (!isRecord(entry) || !isRecord(entry.data)) {
      throw new IncompatibleWalletError('Malformed multisig cosigner entry')
    }
    return cosignerFromData(entry.derivationType, entry.data)
  })
  return createMultisigKeystore(threshold, cosigners)
}

/**
 * Build a multisig keystore, checking `1 <= threshold <= cosigners <= 15`
 */
export function createMultisigKeystore(threshold: number, cosigners: CosignerKeyStore[]): MultisigKeyStore {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > cosigners.length || cosigners.length > 15) {
    throw new IncompatibleWalletError(
      `Invalid multisig shape: ${threshold} of ${cosigners.length}`,
      { threshold, cosigners: cosigners.length }
    )
  }
  return { type: 'multisig', threshold, cosigners }
}

/**
 * JSON stored in `keyinstances.derivation_data` for an imported key
 */
export function importedKeyToDerivationData(key: ImportedKey): string {
  return key.kind === 'private_key'
    ? JSON.stringify({ publicKey: key.publicKey, privateKey: key.privateKey })
    : JSON.stringify({ hash160: key.hash160 })
}

export function importedKeyFromDerivationData(text: string): ImportedKey {
  const data = parseRecord(text, 'imported key')
  if ('hash160' in data) {
    return { kind: 'public_key_hash', hash160: readString(data, 'hash160') }
  }
  const privateKey = readSecret(data, 'privateKey')
  if (!privateKey) {
    throw new IncompatibleWalletError('Imported private key has no encrypted secret')
  }
  return { kind: 'private_key', publicKey: readString(data, 'publicKey'), privateKey }
}

/**
 * Rebuild an imported account's keystore from its key instances
 */
export function importedKeystoreFromKeyInstances(instances: readonly KeyInstance[]): ImportedKeyStore {
  const keys = new Map<number, ImportedKey>()
  for (const instance of instances) {
    if (instance.derivationData === null) continue
    keys.set(instance.keyinstanceId, importedKeyFromDerivationData(instance.derivationData))
  }
  return { type: 'imported', keys }
}

// ============================================
// Queries
// ============================================

export function isWatchingOnly(keystore: KeyStore): boolean {
  switch (keystore.type) {
    case 'bip32':
      return keystore.xprv === null
    case 'electrum_old':
      return keystore.seed === null
    case 'hardware':
      return false
    case 'multisig':
      return keystore.cosigners.every(isWatchingOnly)
    case 'imported':
      return ![...keystore.keys.values()].some(key => key.kind === 'private_key')
  }
}

export function hasSeed(keystore: KeyStore): boolean {
  return (keystore.type === 'bip32' || keystore.type === 'electrum_old') && keystore.seed !== null
}

/**
 * Every encrypted secret the keystore holds
 */
function encryptedSecrets(keystore: KeyStore): EncryptedData[] {
  switch (keystore.type) {
    case 'bip32':
      return [keystore.xprv, keystore.seed, keystore.passphrase].filter(isEncryptedData)
    case 'electrum_old':
      return keystore.seed ? [keystore.seed] : []
    case 'hardware':
      return []
    case 'multisig':
      return keystore.cosigners.flatMap(encryptedSecrets)
    case 'imported':
      return [...keystore.keys.values()].flatMap(key => key.kind === 'private_key' ? [key.privateKey] : [])
  }
}

async function decryptSecret(secret: EncryptedData, password: string): Promise<string> {
  try {
    return await decrypt(secret, password)
  } catch (error) {
    if (error instanceof DecryptionError) {
      keyLogger.warn('Keystore secret did not decrypt')
      throw new InvalidPasswordError()
    }
    throw error
  }
}

/**
 * Throws InvalidPasswordError unless `password` opens the keystore's secrets
 */
export async function checkPassword(keystore: KeyStore, password: string): Promise<void> {
  const [first] = encryptedSecrets(keystore)
  if (first) {
    await decryptSecret(first, password)
  }
}

async function reencryptSecret(
  secret: EncryptedData | null,
  oldPassword: string,
  newPassword: string,
  iterations: number
): Promise<EncryptedData | null> {
  if (!secret) return null
  return encrypt(await decryptSecret(secret, oldPassword), newPassword, iterations)
}

async function reencryptCosigner(
  keystore: CosignerKeyStore,
  oldPassword: string,
  newPassword: string,
  iterations: number
): Promise<CosignerKeyStore> {
  switch (keystore.type) {
    case 'bip32':
      return {
        ...keystore,
        xprv: await reencryptSecret(keystore.xprv, oldPassword, newPassword, iterations),
        seed: await reencryptSecret(keystore.seed, oldPassword, newPassword, iterations),
        passphrase: await reencryptSecret(keystore.passphrase, oldPassword, newPassword, iterations)
      }
    case 'electrum_old':
      return { ...keystore, seed: await reencryptSecret(keystore.seed, oldPassword, newPassword, iterations) }
    case 'hardware':
      return keystore
  }
}

/**
 * A copy of the keystore with every secret encrypted under `newPassword`.
 * The original is left untouched.
 */
export async function reencryptKeystore(
  keystore: KeyStore,
  oldPassword: string,
  newPassword: string,
  iterations: number
): Promise<KeyStore> {
  switch (keystore.type) {
    case 'multisig': {
      const cosigners: CosignerKeyStore[] = []
      for (const cosigner of keystore.cosigners) {
        cosigners.push(await reencryptCosigner(cosigner, oldPassword, newPassword, iterations))
      }
      return { ...keystore, cosigners }
    }
    case 'imported': {
      const keys = new Map<number, ImportedKey>()
      for (const [keyinstanceId, key] of keystore.keys) {
        if (key.kind === 'private_key') {
          const privateKey = await encrypt(await decryptSecret(key.privateKey, oldPassword), newPassword, iterations)
          keys.set(keyinstanceId, { ...key, privateKey })
        } else {
          keys.set(keyinstanceId, key)
        }
      }
      return { type: 'imported', keys }
    }
    default:
      return reencryptCosigner(keystore, oldPassword, newPassword, iterations)
  }
}

async function requireSecret(secret: EncryptedData | null, password: string, what: string): Promise<string> {
  if (!secret) {
    throw new IncompatibleWalletError(`Keystore has no ${what}`)
  }
  return decryptSecret(secret, password)
}

/**
 * Decrypted extended private key of a BIP32 keystore
 */
export async function getMasterPrivateKey(keystore: KeyStore, password: string): Promise<string> {
  if (keystore.type !== 'bip32') {
    throw new IncompatibleWalletError(`${keystore.type} keystores have no extended private key`)
  }
  return requireSecret(keystore.xprv, password, 'extended private key')
}

export async function getSeed(keystore: KeyStore, password: string): Promise<string> {
  if (keystore.type !== 'bip32' && keystore.type !== 'electrum_old') {
    throw new IncompatibleWalletError(`${keystore.type} keystores have no seed`)
  }
  return requireSecret(keystore.seed, password, 'seed')
}

export async function getPassphrase(keystore: KeyStore, password: string): Promise<string> {
  if (keystore.type !== 'bip32') {
    throw new IncompatibleWalletError(`${keystore.type} keystores have no passphrase`)
  }
  return keystore.passphrase ? decryptSecret(keystore.passphrase, password) : ''
}

// ============================================
// Keys
// ============================================

function requirePath(instance: KeyInstance): readonly number[] {
  if (instance.derivationPath === null) {
    throw new IncompatibleWalletError('Key instance has no derivation path', { keyinstanceId: instance.keyinstanceId })
  }
  return instance.derivationPath
}

function cosignerPublicKey(keystore: CosignerKeyStore, path: readonly number[]): string {
  switch (keystore.type) {
    case 'bip32':
    case 'hardware':
      return encodePoint(deriveBip32PublicKey(keystore.xpub, path), true)
    case 'electrum_old':
      return deriveOldPublicKey(keystore.mpk, path)
  }
}

/**
 * Public material at a path of a deriving keystore
 */
export function publicMaterialForPath(keystore: DerivingKeyStore, path: readonly number[]): KeyMaterial {
  if (keystore.type === 'multisig') {
    return {
      kind: 'multisig',
      threshold: keystore.threshold,
      publicKeys: keystore.cosigners.map(cosigner => cosignerPublicKey(cosigner, path))
    }
  }
  return { kind: 'public_key', publicKey: cosignerPublicKey(keystore, path) }
}

/**
 * Public material of a key instance, for script resolution
 */
export function publicMaterialFor(keystore: KeyStore, instance: KeyInstance): KeyMaterial {
  if (keystore.type !== 'imported') {
    return publicMaterialForPath(keystore, requirePath(instance))
  }
  const key = keystore.keys.get(instance.keyinstanceId)
  if (!key) throw new UnknownKeyInstanceError(instance.keyinstanceId)
  return key.kind === 'private_key'
    ? { kind: 'public_key', publicKey: key.publicKey }
    : { kind: 'public_key_hash', hash160: key.hash160 }
}

async function cosignerPrivateKey(
  keystore: CosignerKeyStore,
  path: readonly number[],
  password: string
): Promise<PrivateKey | null> {
  switch (keystore.type) {
    case 'bip32':
      return keystore.xprv ? deriveBip32PrivateKey(await decryptSecret(keystore.xprv, password), path) : null
    case 'electrum_old': {
      if (!keystore.seed) return null
      const secret = stretchOldSeed(await decryptSecret(keystore.seed, password))
      return deriveOldPrivateKey(secret, keystore.mpk, path)
    }
    case 'hardware':
      return null
  }
}

/**
 * Private keys this keystore holds for a key instance. Multisig keystores
 * return one key per software cosigner that is not watch-only.
 */
export async function privateKeysFor(
  keystore: KeyStore,
  instance: KeyInstance,
  password: string
): Promise<PrivateKey[]> {
  switch (keystore.type) {
    case 'multisig': {
      const path = requirePath(instance)
      const keys: PrivateKey[] = []
      for (const cosigner of keystore.cosigners) {
        const key = await cosignerPrivateKey(cosigner, path, password)
        if (key) keys.push(key)
      }
      return keys
    }
    case 'imported': {
      const key = keystore.keys.get(instance.keyinstanceId)
      if (!key) throw new UnknownKeyInstanceError(instance.keyinstanceId)
      if (key.kind !== 'private_key') return []
      return [PrivateKey.fromWif(await decryptSecret(key.privateKey, password))]
    }
    default: {
      const key = await cosignerPrivateKey(keystore, requirePath(instance), password)
      return key ? [key] : []
    }
  }
}

/**
 * Full device path for a hardware key instance
 */
export function hardwarePathFor(keystore: HardwareKeyStore, instance: KeyInstance): string {
  return `${keystore.derivation}/${formatDerivationPath(requirePath(instance))}`
}

export function hash160Hex(publicKeyHex: string): string {
  return Utils.toHex(Hash.hash160(Utils.toArray(publicKeyHex, 'hex')))
}

/** Short label for logs; never includes key material */
export function describeKeystore(keystore: KeyStore): string {
  switch (keystore.type) {
    case 'multisig':
      return `multisig ${keystore.threshold}/${keystore.cosigners.length}`
    case 'imported':
      return `imported (${keystore.keys.size} keys)`
    default:
      return isWatchingOnly(keystore) ? `${keystore.type} (watching)` : keystore.type
  }
}
