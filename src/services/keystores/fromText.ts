/**
 * Keystore instantiation from user-supplied text
 *
 * Seeds and extended keys become keystores that back a master key.
 * Private keys and addresses become imported key material instead, one
 * key instance per entry.
 */

import { HD } from '@bsv/sdk'
import { KEYS, SECURITY } from '../../config'
import type { NetworkParams } from '../../domain/networks'
import { isOk } from '../../domain/types'
import {
  bip39ToExtendedKey,
  electrumSeedToExtendedKey,
  encodePoint,
  oldMasterPublicKey,
  stretchOldSeed,
  toExtendedPublicKey
} from '../../domain/wallet/keyDerivation'
import {
  isElectrumSeed,
  isOldHexSeed,
  isOldMasterPublicKey,
  normalizeElectrumText,
  parseAddress,
  parsePrivateKey,
  validateMnemonic
} from '../../domain/wallet/validation'
import { isValidBip32Path } from '../../domain/wallet/derivationPath'
import { encrypt } from '../crypto'
import { DeviceUnavailableError, InvalidKeystoreTextError } from '../errors'
import { keyLogger } from '../logger'
import { hash160Hex } from './keystores'
import type { Bip32KeyStore, HardwareKeyStore, ImportedKey, OldKeyStore, SigningDevice } from './types'

export type KeystoreTextType =
  | 'bip39_seed_words'
  | 'electrum_seed_words'
  | 'electrum_old_seed'
  | 'electrum_old_mpk'
  | 'extended_public_key'
  | 'extended_private_key'

export type ImportedTextType = 'private_keys' | 'addresses'

export interface KeystoreTextOptions {
  /** BIP39 / Electrum seed extension */
  passphrase?: string
  /** BIP39 account path, defaults to {@link KEYS.DEFAULT_BIP39_DERIVATION} */
  derivation?: string
  label?: string
  /** PBKDF2 rounds for the encrypted secrets */
  iterations?: number
}

function isExtendedKey(text: string, kind: 'pub' | 'prv'): boolean {
  if (!new RegExp(`^[xt]${kind}`).test(text)) return false
  try {
    HD.fromString(text)
    return true
  } catch (_error) {
    return false
  }
}

/**
 * Build a keystore from seed words or an extended / master key.
 *
 * @throws InvalidKeystoreTextError when the text does not parse as `textType`
 */
export async function instantiateKeystoreFromText(
  textType: KeystoreTextType,
  text: string,
  password: string,
  options: KeystoreTextOptions = {}
): Promise<Bip32KeyStore | OldKeyStore> {
  const iterations = options.iterations ?? SECURITY.PBKDF2_ITERATIONS
  const passphrase = options.passphrase ?? ''
  const label = options.label ?? null

  switch (textType) {
    case 'bip39_seed_words': {
      const validation = validateMnemonic(text)
      if (!validation.isValid || !validation.normalizedMnemonic) {
        throw new InvalidKeystoreTextError(textType, validation.error ?? 'invalid mnemonic')
      }
      const derivation = options.derivation ?? KEYS.DEFAULT_BIP39_DERIVATION
      if (!isValidBip32Path(derivation)) {
        throw new InvalidKeystoreTextError(textType, `invalid derivation path ${derivation}`)
      }
      const xprv = bip39ToExtendedKey(validation.normalizedMnemonic, passphrase, derivation)
      return {
        type: 'bip32',
        xpub: toExtendedPublicKey(xprv),
        xprv: await encrypt(xprv, password, iterations),
        seed: await encrypt(validation.normalizedMnemonic, password, iterations),
        passphrase: passphrase ? await encrypt(passphrase, password, iterations) : null,
        label
      }
    }

    case 'electrum_seed_words': {
      if (!isElectrumSeed(text)) {
        throw new InvalidKeystoreTextError(textType, 'not a standard Electrum seed')
      }
      const words = normalizeElectrumText(text)
      const xprv = electrumSeedToExtendedKey(words, passphrase)
      return {
        type: 'bip32',
        xpub: toExtendedPublicKey(xprv),
        xprv: await encrypt(xprv, password, iterations),
        seed: await encrypt(words, password, iterations),
        passphrase: passphrase ? await encrypt(passphrase, password, iterations) : null,
        label
      }
    }

    case 'electrum_old_seed': {
      if (!isOldHexSeed(text)) {
        throw new InvalidKeystoreTextError(textType, 'expected 32 hex characters')
      }
      const seed = text.trim().toLowerCase()
      return {
        type: 'electrum_old',
        mpk: oldMasterPublicKey(stretchOldSeed(seed)),
        seed: await encrypt(seed, password, iterations)
      }
    }

    case 'electrum_old_mpk': {
      if (!isOldMasterPublicKey(text)) {
        throw new InvalidKeystoreTextError(textType, 'expected 128 hex characters')
      }
      return { type: 'electrum_old', mpk: text.trim().toLowerCase(), seed: null }
    }

    case 'extended_public_key': {
      const xpub = text.trim()
      if (!isExtendedKey(xpub, 'pub')) {
        throw new InvalidKeystoreTextError(textType, 'not an extended public key')
      }
      return { type: 'bip32', xpub, xprv: null, seed: null, passphrase: null, label }
    }

    case 'extended_private_key': {
      const xprv = text.trim()
      if (!isExtendedKey(xprv, 'prv')) {
        throw new InvalidKeystoreTextError(textType, 'not an extended private key')
      }
      return {
        type: 'bip32',
        xpub: toExtendedPublicKey(xprv),
        xprv: await encrypt(xprv, password, iterations),
        seed: null,
        passphrase: null,
        label
      }
    }
  }
}

/**
 * Parse private keys (WIF) or addresses into imported key material.
 * Blank lines are skipped; any other unparseable entry fails the whole set.
 */
export async function importedKeysFromText(
  textType: ImportedTextType,
  entries: readonly string[],
  password: string,
  network: NetworkParams,
  iterations: number = SECURITY.PBKDF2_ITERATIONS
): Promise<ImportedKey[]> {
  const keys: ImportedKey[] = []
  for (const entry of entries.map(value => value.trim()).filter(value => value.length > 0)) {
    if (textType === 'private_keys') {
      const parsed = parsePrivateKey(entry)
      if (!isOk(parsed)) {
        throw new InvalidKeystoreTextError(textType, parsed.error)
      }
      keys.push({
        kind: 'private_key',
        publicKey: encodePoint(parsed.value.toPublicKey(), true),
        privateKey: await encrypt(entry, password, iterations)
      })
    } else {
      const parsed = parseAddress(entry, network)
      if (!isOk(parsed)) {
        throw new InvalidKeystoreTextError(textType, parsed.error)
      }
      if (parsed.value.kind !== 'P2PKH') {
        throw new InvalidKeystoreTextError(textType, `only P2PKH addresses can be watched: ${entry}`)
      }
      keys.push({ kind: 'public_key_hash', hash160: parsed.value.hash160 })
    }
  }
  if (keys.length === 0) {
    throw new InvalidKeystoreTextError(textType, 'no entries')
  }
  return keys
}

/**
 * Hash160 the wallet matches an imported key's P2PKH output against
 */
export function importedKeyHash160(key: ImportedKey): string {
  return key.kind === 'private_key' ? hash160Hex(key.publicKey) : key.hash160
}

/**
 * Read the account xpub from a signing device
 *
 * @throws DeviceUnavailableError on any device failure
 */
export async function instantiateHardwareKeystore(
  device: SigningDevice,
  derivation: string,
  label: string | null = null
): Promise<HardwareKeyStore> {
  if (!isValidBip32Path(derivation)) {
    throw new InvalidKeystoreTextError('hardware derivation', `invalid derivation path ${derivation}`)
  }
  let xpub: string
  try {
    xpub = await device.getMasterPublicKey(derivation)
  } catch (error) {
    keyLogger.error('Signing device failed to return a public key', error, { hwType: device.hwType })
    throw new DeviceUnavailableError(device.hwType, error)
  }
  return { type: 'hardware', hwType: device.hwType, label, derivation, xpub }
}
