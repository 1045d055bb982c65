/**
 * Cryptographic Utilities for keystore secrets
 *
 * Seeds, passphrases, extended private keys and imported private keys are
 * stored as password-encrypted envelopes:
 *
 * - **Key Derivation**: PBKDF2-SHA256, iteration count stored per envelope
 * - **Encryption**: AES-256-GCM (authenticated encryption)
 * - **Random Generation**: fresh salt and IV for every envelope
 *
 * @module services/crypto
 *
 * @example
 * ```typescript
 * import { encrypt, decrypt } from './crypto'
 *
 * const envelope = await encrypt(xprv, 'wallet-password')
 * const xprvAgain = await decrypt(envelope, 'wallet-password')
 * ```
 */

import { webcrypto } from 'node:crypto'
import { SECURITY } from '../config'
import { DecryptionError } from './errors'
import { cryptoLogger } from './logger'

const getCrypto = (): webcrypto.Crypto => webcrypto

/**
 * Encryption result containing all data needed for decryption.
 *
 * All byte data is encoded as base64 strings for safe storage.
 * The version field allows for future algorithm upgrades.
 */
export interface EncryptedData {
  /** Encryption format version */
  version: number
  /** Base64-encoded ciphertext (AES-GCM encrypted data + auth tag) */
  ciphertext: string
  /** Base64-encoded initialization vector (12 bytes for AES-GCM) */
  iv: string
  /** Base64-encoded salt for PBKDF2 key derivation (16 bytes) */
  salt: string
  /** PBKDF2 iterations used for this envelope */
  iterations: number
}

/** Current encryption format version */
const CURRENT_VERSION = 1
/** Salt length in bytes (128 bits) */
const SALT_LENGTH = 16
/** IV length in bytes (96 bits for AES-GCM) */
const IV_LENGTH = 12
/** AES key length in bits (256-bit for AES-256) */
const KEY_LENGTH = 256

function bufferToBase64(buffer: ArrayBuffer): string {
  return Buffer.from(buffer).toString('base64')
}

function base64ToBuffer(base64: string): ArrayBuffer {
  return toArrayBuffer(Buffer.from(base64, 'base64'))
}

/**
 * Node.js webcrypto requires genuine ArrayBuffer instances, not Buffer or
 * TypedArray views. This creates a fresh ArrayBuffer copy.
 */
function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buf = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buf).set(bytes)
  return buf
}

async function deriveKey(password: string, salt: Uint8Array, iterations: number): Promise<webcrypto.CryptoKey> {
  const passwordKey = await getCrypto().subtle.importKey(
    'raw',
    toArrayBuffer(new TextEncoder().encode(password)),
    'PBKDF2',
    false,
    ['deriveBits', 'deriveKey']
  )

  return getCrypto().subtle.deriveKey(
    {
      name: 'PBKDF2',
      salt: toArrayBuffer(salt),
      iterations,
      hash: 'SHA-256'
    },
    passwordKey,
    { name: 'AES-GCM', length: KEY_LENGTH },
    false,
    ['encrypt', 'decrypt']
  )
}

/**
 * Encrypt data with a password
 *
 * @param plaintext - Data to encrypt (will be JSON stringified if object)
 * @param iterations - PBKDF2 rounds; defaults to {@link SECURITY.PBKDF2_ITERATIONS}
 */
export async function encrypt(
  plaintext: string | object,
  password: string,
  iterations: number = SECURITY.PBKDF2_ITERATIONS
): Promise<EncryptedData> {
  const data = typeof plaintext === 'string' ? plaintext : JSON.stringify(plaintext)

  const salt = getCrypto().getRandomValues(new Uint8Array(SALT_LENGTH))
  const iv = getCrypto().getRandomValues(new Uint8Array(IV_LENGTH))

  const key = await deriveKey(password, salt, iterations)

  const ciphertext = await getCrypto().subtle.encrypt(
    { name: 'AES-GCM', iv: toArrayBuffer(iv) },
    key,
    toArrayBuffer(new TextEncoder().encode(data))
  )

  return {
    version: CURRENT_VERSION,
    ciphertext: bufferToBase64(ciphertext),
    iv: bufferToBase64(toArrayBuffer(iv)),
    salt: bufferToBase64(toArrayBuffer(salt)),
    iterations
  }
}

/**
 * Decrypt data with a password
 *
 * @throws DecryptionError if the password is wrong or the envelope is corrupted
 */
export async function decrypt(encryptedData: EncryptedData, password: string): Promise<string> {
  if (encryptedData.version !== CURRENT_VERSION) {
    cryptoLogger.warn(`Encrypted data version ${encryptedData.version}, current is ${CURRENT_VERSION}`)
  }

  const ciphertext = base64ToBuffer(encryptedData.ciphertext)
  const iv = new Uint8Array(base64ToBuffer(encryptedData.iv))
  const salt = new Uint8Array(base64ToBuffer(encryptedData.salt))

  const key = await deriveKey(password, salt, encryptedData.iterations)

  try {
    const plaintext = await getCrypto().subtle.decrypt(
      { name: 'AES-GCM', iv: toArrayBuffer(iv) },
      key,
      ciphertext
    )

    return new TextDecoder().decode(plaintext)
  } catch (_error) {
    throw new DecryptionError()
  }
}

/**
 * Check if data looks like our encrypted format
 */
export function isEncryptedData(data: unknown): data is EncryptedData {
  if (typeof data !== 'object' || data === null) return false
  return (
    'version' in data && typeof data.version === 'number' &&
    'ciphertext' in data && typeof data.ciphertext === 'string' &&
    'iv' in data && typeof data.iv === 'string' &&
    'salt' in data && typeof data.salt === 'string' &&
    'iterations' in data && typeof data.iterations === 'number'
  )
}
