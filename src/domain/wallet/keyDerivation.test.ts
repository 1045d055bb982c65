import { describe, it, expect } from 'vitest'
import { BigNumber } from '@bsv/sdk'
import {
  bip39ToExtendedKey,
  electrumSeedToExtendedKey,
  toExtendedPublicKey,
  deriveBip32PublicKey,
  deriveBip32PrivateKey,
  stretchOldSeed,
  oldMasterPublicKey,
  deriveOldPublicKey,
  deriveOldPrivateKey,
  encodePoint
} from './keyDerivation'

const MNEMONIC = 'accident access abuse absurd abstract absorb absent above about able ability abandon'
const MNEMONIC_MASTER_XPRV =
  'xprv9s21ZrQH143K4F89k1SkKp27EGPFDWd6pj1RgBmWRGrtfPzDb9bB7QxMPmQkb71bPDXfsf5SEirVX5pVDA5RuLMqnLMuaV96jcSnG3iP4XC'
const MNEMONIC_ACCOUNT_XPRV =
  'xprv9xznnKRLpvN72yDvdJtRF14meM2FScYW1AfCg1iy6wEC7uDW6Y5d29Zz2PZzUqKTggnoy8UCXyMpWcxrv9Y4q1Uh9E6Kq1YcDgyd8fPzwX7'
const MNEMONIC_ACCOUNT_XPUB =
  'xpub6Bz9BpxEfHvQFTJPjLRRc91WCNrjr5GMNPaoUQ8afGmAzhYee5PsZwtTsfVd3sEdES5AYWDEyhfJ5YYDFhWjwYHfvWLeBqmLdwmE6NpLUS3'
const MNEMONIC_RECEIVING_0 = '03ccbb99f329d2b7d686322d4edb97c8f7655b9bf9fab4fe1030a7fe9c4ca8eabb'

const ELECTRUM_SEED = 'orbit lantern meadow copper ribbon glance velvet harbor pencil summit thimble dune bravo pepper'
const ELECTRUM_XPRV =
  'xprv9s21ZrQH143K2jwKE2JRgMTUUoFw7cfVz1yhVANnFvXnHm1KADqxoNSR7nXYhAt6uFswXt2YHsWTaDphFCJjjn7VMT112gcAFdjqSjaf57p'
const ELECTRUM_RECEIVING_0 = '02ae4f25c32386015f06b32be359bf0d5633501a851f2d64663700de446dc8980c'

const OLD_SEED = '00112233445566778899aabbccddeeff'
const OLD_SECRET_3_ROUNDS = '8dbec0f3040c3071bc4519a72726c66f52d7875c9f381fbb92251e875bad210b'
const OLD_MPK =
  'c3d698c198bcd28bf19630b9d0d896c0725064a39653e22686b519944413d7fefb696c17b0dfe4a7a89b613a66003032cd2b1b06bbecb9c36f0218511cc6713b'
const OLD_RECEIVING_1 =
  '041fb0e03aa9db8b448a73e2e9ea3be4f39c64f60405b4527291ce53e7ce9a2d010a0c23a4c969466998032428d7b907520774cba3f0744d5b3e1eb00696d42ebf'

describe('BIP32 derivation', () => {
  it('should derive the master key for a mnemonic', () => {
    expect(bip39ToExtendedKey(MNEMONIC, '', 'm')).toBe(MNEMONIC_MASTER_XPRV)
  })

  it('should derive the account key at a hardened path', () => {
    expect(bip39ToExtendedKey(MNEMONIC, '', "m/44'/236'/0'")).toBe(MNEMONIC_ACCOUNT_XPRV)
  })

  it('should mix the passphrase into the seed', () => {
    expect(bip39ToExtendedKey(MNEMONIC, 'test-secret', 'm')).not.toBe(MNEMONIC_MASTER_XPRV)
  })

  it('should produce the matching public extended key', () => {
    expect(toExtendedPublicKey(MNEMONIC_ACCOUNT_XPRV)).toBe(MNEMONIC_ACCOUNT_XPUB)
  })

  it('should derive child public keys from the xpub', () => {
    expect(deriveBip32PublicKey(MNEMONIC_ACCOUNT_XPUB, [0, 0]).toString()).toBe(MNEMONIC_RECEIVING_0)
  })

  it('should derive private keys matching the public keys', () => {
    const privateKey = deriveBip32PrivateKey(MNEMONIC_ACCOUNT_XPRV, [1, 7])
    const publicKey = deriveBip32PublicKey(MNEMONIC_ACCOUNT_XPUB, [1, 7])
    expect(privateKey.toPublicKey().toString()).toBe(publicKey.toString())
  })
})

describe('Electrum seed derivation', () => {
  it('should derive the master key from seed words', () => {
    expect(electrumSeedToExtendedKey(ELECTRUM_SEED, '')).toBe(ELECTRUM_XPRV)
  })

  it('should normalize the words first', () => {
    expect(electrumSeedToExtendedKey(`  ${ELECTRUM_SEED.toUpperCase()}  `, '')).toBe(ELECTRUM_XPRV)
  })

  it('should use receiving keys under m/0', () => {
    const xpub = toExtendedPublicKey(ELECTRUM_XPRV)
    expect(deriveBip32PublicKey(xpub, [0, 0]).toString()).toBe(ELECTRUM_RECEIVING_0)
  })
})

describe('old Electrum derivation', () => {
  it('should stretch the hex seed text', () => {
    expect(stretchOldSeed(OLD_SEED, 3).toString(16)).toBe(OLD_SECRET_3_ROUNDS)
  })

  it('should compute the master public key without the 04 prefix', () => {
    const secret = new BigNumber(OLD_SECRET_3_ROUNDS, 16)
    expect(oldMasterPublicKey(secret)).toBe(OLD_MPK)
  })

  it('should derive uncompressed child public keys', () => {
    expect(deriveOldPublicKey(OLD_MPK, [0, 1])).toBe(OLD_RECEIVING_1)
  })

  it('should derive private keys matching the public keys', () => {
    const secret = new BigNumber(OLD_SECRET_3_ROUNDS, 16)
    const privateKey = deriveOldPrivateKey(secret, OLD_MPK, [0, 1])
    expect(encodePoint(privateKey.toPublicKey(), false)).toBe(OLD_RECEIVING_1)
  })

  it('should keep change keys apart from receiving keys', () => {
    expect(deriveOldPublicKey(OLD_MPK, [1, 1])).not.toBe(OLD_RECEIVING_1)
  })

  it('should reject paths without two components', () => {
    expect(() => deriveOldPublicKey(OLD_MPK, [3])).toThrow(RangeError)
  })
})
