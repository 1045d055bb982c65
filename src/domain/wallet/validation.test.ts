import { describe, it, expect } from 'vitest'
import {
  normalizeMnemonic,
  validateMnemonic,
  normalizeElectrumText,
  isElectrumSeed,
  isOldHexSeed,
  isOldMasterPublicKey,
  parseAddress,
  parsePrivateKey,
  isValidTxid,
  isValidSatoshiAmount
} from './validation'
import { MAINNET, TESTNET } from '../networks'
import { isErr, isOk } from '../types'

const VALID_MNEMONIC = 'accident access abuse absurd abstract absorb absent above about able ability abandon'
const ELECTRUM_SEED = 'orbit lantern meadow copper ribbon glance velvet harbor pencil summit thimble dune bravo pepper'

const TEST_WIF = 'KwqMAaexGDkoaAMCudQDT7f66e1HdHYV8hujStEmz2s4G8mByN9N'
const TEST_PUBLIC_KEY = '0299a30a2242e9bc529287860a0424d13b88c8cce8f452daf5a4c308212e49d149'
const TEST_ADDRESS = '1E52aZnscrdjTqWg5MjnkwriPwXeaERUE5'
const TEST_TESTNET_ADDRESS = 'mtayscsrRt4zEwzHnviAas53Fw8MQc9J7t'
const TEST_HASH160 = '8f5c9debd2653e437f3893ec859c954224d80663'

describe('Wallet Validation', () => {
  describe('normalizeMnemonic', () => {
    it('should lowercase, trim and collapse spaces', () => {
      expect(normalizeMnemonic('  ABANDON   Abandon   ABANDON  ')).toBe('abandon abandon abandon')
    })
  })

  describe('validateMnemonic', () => {
    it('should accept a mnemonic with a valid checksum', () => {
      const result = validateMnemonic(VALID_MNEMONIC)
      expect(result.isValid).toBe(true)
      expect(result.normalizedMnemonic).toBe(VALID_MNEMONIC)
    })

    it('should normalize before checking', () => {
      const result = validateMnemonic(`  ${VALID_MNEMONIC.toUpperCase()}  `)
      expect(result.isValid).toBe(true)
      expect(result.normalizedMnemonic).toBe(VALID_MNEMONIC)
    })

    it('should reject the wrong word count', () => {
      const result = validateMnemonic('abandon ability able')
      expect(result.isValid).toBe(false)
      expect(result.error).toBe('Invalid mnemonic phrase. Expected 12 or 24 words but got 3.')
    })

    it('should reject a bad checksum', () => {
      const result = validateMnemonic(VALID_MNEMONIC.replace(/abandon$/, 'ability'))
      expect(result.isValid).toBe(false)
      expect(result.error).toBe('Invalid mnemonic phrase. Please check your words.')
    })
  })

  describe('Electrum seeds', () => {
    it('should normalize case, accents and whitespace', () => {
      expect(normalizeElectrumText('  Café   Noir ')).toBe('cafe noir')
    })

    it('should recognise a standard seed version', () => {
      expect(isElectrumSeed(ELECTRUM_SEED)).toBe(true)
      expect(isElectrumSeed(`  ${ELECTRUM_SEED.toUpperCase()} `)).toBe(true)
    })

    it('should reject words without the seed version', () => {
      expect(isElectrumSeed(ELECTRUM_SEED.replace('dune bravo pepper', 'acorn alpha kettle'))).toBe(false)
    })

    it('should reject short phrases', () => {
      expect(isElectrumSeed('orbit lantern meadow')).toBe(false)
    })
  })

  describe('old seeds and master public keys', () => {
    it('should accept 32 hex characters as an old seed', () => {
      expect(isOldHexSeed('0123456789abcdef0123456789ABCDEF')).toBe(true)
      expect(isOldHexSeed('0123456789abcdef')).toBe(false)
      expect(isOldHexSeed('z123456789abcdef0123456789abcdef')).toBe(false)
    })

    it('should accept 128 hex characters as a master public key', () => {
      expect(isOldMasterPublicKey('ab'.repeat(64))).toBe(true)
      expect(isOldMasterPublicKey('ab'.repeat(33))).toBe(false)
    })
  })

  describe('parseAddress', () => {
    it('should decode a mainnet P2PKH address', () => {
      const result = parseAddress(TEST_ADDRESS, MAINNET)
      expect(isOk(result) && result.value).toEqual({ kind: 'P2PKH', hash160: TEST_HASH160 })
    })

    it('should decode the same hash on testnet', () => {
      const result = parseAddress(TEST_TESTNET_ADDRESS, TESTNET)
      expect(isOk(result) && result.value).toEqual({ kind: 'P2PKH', hash160: TEST_HASH160 })
    })

    it('should reject an address for the other network', () => {
      const result = parseAddress(TEST_TESTNET_ADDRESS, MAINNET)
      expect(isErr(result) && result.error).toBe(`Address ${TEST_TESTNET_ADDRESS} is not for mainnet`)
    })

    it('should reject a corrupted checksum', () => {
      const corrupted = TEST_ADDRESS.slice(0, -1) + '6'
      expect(isErr(parseAddress(corrupted, MAINNET))).toBe(true)
    })

    it('should reject text of the wrong length', () => {
      const result = parseAddress('1abc', MAINNET)
      expect(isErr(result) && result.error).toBe('Invalid address length: 1abc')
    })
  })

  describe('parsePrivateKey', () => {
    it('should decode a compressed WIF key', () => {
      const result = parsePrivateKey(TEST_WIF)
      expect(isOk(result) && result.value.toPublicKey().toString()).toBe(TEST_PUBLIC_KEY)
    })

    it('should reject garbage', () => {
      const result = parsePrivateKey('not-a-key')
      expect(isErr(result) && result.error).toBe('Invalid WIF private key')
    })
  })

  describe('isValidTxid', () => {
    it('should accept 64 hex characters', () => {
      expect(isValidTxid('a'.repeat(64))).toBe(true)
      expect(isValidTxid('A1'.repeat(32))).toBe(true)
    })

    it('should reject other lengths and characters', () => {
      expect(isValidTxid('a'.repeat(63))).toBe(false)
      expect(isValidTxid('g'.repeat(64))).toBe(false)
    })
  })

  describe('isValidSatoshiAmount', () => {
    it('should accept integers within supply', () => {
      expect(isValidSatoshiAmount(0)).toBe(true)
      expect(isValidSatoshiAmount(2_100_000_000_000_000)).toBe(true)
    })

    it('should reject fractions, negatives and overflow', () => {
      expect(isValidSatoshiAmount(1.5)).toBe(false)
      expect(isValidSatoshiAmount(-1)).toBe(false)
      expect(isValidSatoshiAmount(2_100_000_000_000_001)).toBe(false)
    })
  })
})
