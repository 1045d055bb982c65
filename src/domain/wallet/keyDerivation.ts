/**
 * Pure Key Derivation Functions
 *
 * Root and child key derivation for the keystore families the ledger
 * supports: BIP39 mnemonics, Electrum seed words, and the old Electrum
 * hex-seed scheme with its master public key.
 *
 * @module domain/wallet/keyDerivation
 */

import { BigNumber, Curve, HD, Hash, Mnemonic, PrivateKey, PublicKey, Utils } from '@bsv/sdk'
import type { Point } from '@bsv/sdk'
import { SECURITY } from '../../config'
import type { DerivationPath } from '../types'
import { toBip32Path } from './derivationPath'
import { normalizeElectrumText } from './validation'

const curve = new Curve()

/**
 * Hex encoding of a curve point, compressed or not
 */
export function encodePoint(point: Point, compressed: boolean): string {
  const encoded = point.encode(compressed, 'hex')
  return typeof encoded === 'string' ? encoded : Utils.toHex(encoded)
}

// ============================================
// BIP32
// ============================================

/**
 * Extended private key for a BIP39 mnemonic at an account derivation.
 *
 * @example
 * ```typescript
 * const xprv = bip39ToExtendedKey(words, '', "m/44'/236'/0'")
 * ```
 */
export function bip39ToExtendedKey(mnemonic: string, passphrase: string, derivation: string): string {
  const seed = Mnemonic.fromString(mnemonic).toSeed(passphrase)
  const master = HD.fromSeed(seed)
  return (derivation === 'm' ? master : master.derive(derivation)).toString()
}

/**
 * Extended private key for Electrum seed words. Electrum keystores use the
 * master node directly; receiving keys live at `m/0/i`, change at `m/1/i`.
 */
export function electrumSeedToExtendedKey(words: string, passphrase: string): string {
  const mnemonic = Utils.toArray(normalizeElectrumText(words), 'utf8')
  const salt = Utils.toArray('electrum' + normalizeElectrumText(passphrase), 'utf8')
  const seed = Hash.pbkdf2(mnemonic, salt, SECURITY.ELECTRUM_SEED_ROUNDS, 64, 'sha512')
  return HD.fromSeed(seed).toString()
}

/**
 * Public extended key text for an extended private key
 */
export function toExtendedPublicKey(xprv: string): string {
  return HD.fromString(xprv).toPublic().toString()
}

export function deriveBip32PublicKey(xpub: string, path: DerivationPath): PublicKey {
  return HD.fromString(xpub).derive(toBip32Path(path)).pubKey
}

export function deriveBip32PrivateKey(xprv: string, path: DerivationPath): PrivateKey {
  return HD.fromString(xprv).derive(toBip32Path(path)).privKey
}

// ============================================
// Old Electrum
// ============================================

/**
 * Stretch an old-style hex seed into its master secret exponent:
 * `x = sha256(x || seed)` repeated, starting from `x = seed`.
 */
export function stretchOldSeed(hexSeed: string, rounds: number = SECURITY.OLD_SEED_STRETCH_ROUNDS): BigNumber {
  const seed = Utils.toArray(hexSeed, 'utf8')
  let x = seed
  for (let i = 0; i < rounds; i++) {
    x = Hash.sha256(x.concat(seed))
  }
  return new BigNumber(Utils.toHex(x), 16)
}

/**
 * Master public key (uncompressed point without the 04 prefix) for an old seed
 */
export function oldMasterPublicKey(secret: BigNumber): string {
  const publicKey = new PrivateKey(secret.umod(curve.n)).toPublicKey()
  return encodePoint(publicKey, false).slice(2)
}

/**
 * Per-key offset: sha256d(`${n}:${change}:` || mpk bytes)
 */
function oldSequence(mpk: string, path: DerivationPath): BigNumber {
  const [change, n] = path
  if (path.length !== 2 || change === undefined || n === undefined) {
    throw new RangeError(`Old Electrum paths have two components, got ${path.length}`)
  }
  const preimage = Utils.toArray(`${n}:${change}:`, 'utf8').concat(Utils.toArray(mpk, 'hex'))
  return new BigNumber(Utils.toHex(Hash.hash256(preimage)), 16)
}

/**
 * Child public key for an old Electrum master public key. Old keystores
 * use uncompressed keys, so the result is the 65-byte encoding in hex.
 */
export function deriveOldPublicKey(mpk: string, path: DerivationPath): string {
  const master = PublicKey.fromString('04' + mpk)
  const offset = new PrivateKey(oldSequence(mpk, path).umod(curve.n)).toPublicKey()
  return encodePoint(master.add(offset), false)
}

export function deriveOldPrivateKey(secret: BigNumber, mpk: string, path: DerivationPath): PrivateKey {
  return new PrivateKey(secret.add(oldSequence(mpk, path)).umod(curve.n))
}
