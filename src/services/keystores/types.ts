/**
 * Keystore types
 *
 * A keystore holds the material a family of key instances is derived
 * from. Secrets are only ever held encrypted; decrypting needs the wallet
 * password.
 */

import type { EncryptedData } from '../crypto'

/**
 * External signer for hardware accounts. Paths are full BIP32 paths,
 * e.g. `m/44'/236'/0'/0/3`.
 */
export interface SigningDevice {
  readonly hwType: string
  getMasterPublicKey(derivationPath: string): Promise<string>
  /** One DER signature (hex) per preimage, over sha256d(preimage) */
  sign(derivationPath: string, preimages: number[][]): Promise<string[]>
}

export interface Bip32KeyStore {
  type: 'bip32'
  xpub: string
  xprv: EncryptedData | null
  seed: EncryptedData | null
  passphrase: EncryptedData | null
  label: string | null
}

export interface OldKeyStore {
  type: 'electrum_old'
  /** 64-byte uncompressed master public key without the 04 prefix, hex */
  mpk: string
  /** The 32 character hex seed */
  seed: EncryptedData | null
}

export interface HardwareKeyStore {
  type: 'hardware'
  hwType: string
  label: string | null
  /** Account path on the device the xpub was read from */
  derivation: string
  xpub: string
}

export type CosignerKeyStore = Bip32KeyStore | OldKeyStore | HardwareKeyStore

export interface MultisigKeyStore {
  type: 'multisig'
  threshold: number
  /** Stored order is script order */
  cosigners: CosignerKeyStore[]
}

export type ImportedKey =
  | { kind: 'private_key'; publicKey: string; privateKey: EncryptedData }
  | { kind: 'public_key_hash'; hash160: string }

export interface ImportedKeyStore {
  type: 'imported'
  /** Keyed by key instance id */
  keys: Map<number, ImportedKey>
}

export type KeyStore =
  | Bip32KeyStore
  | OldKeyStore
  | HardwareKeyStore
  | MultisigKeyStore
  | ImportedKeyStore

/** Keystores that derive key instances by path */
export type DerivingKeyStore = Exclude<KeyStore, ImportedKeyStore>

export type KeyStoreType = KeyStore['type']

/**
 * Signatures made by one public key, one per preimage
 */
export interface KeySignatures {
  publicKey: string
  signatures: string[]
}
