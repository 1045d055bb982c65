/**
 * Tests for ledger configuration
 */

import { describe, it, expect } from 'vitest'
import { DEFAULT_WALLET_CONFIG, KEYS, LEDGER, SECURITY, resolveWalletConfig } from './index'

describe('config', () => {
  describe('constants', () => {
    it('should stop key allocation below the hardened range', () => {
      expect(KEYS.HARDENED_OFFSET).toBe(2 ** 31)
      expect(KEYS.RECEIVING_SUBPATH).toEqual([0])
      expect(KEYS.CHANGE_SUBPATH).toEqual([1])
    })

    it('should use a strong default key derivation', () => {
      expect(SECURITY.PBKDF2_ITERATIONS).toBeGreaterThanOrEqual(100000)
      expect(LEDGER.COINBASE_MATURITY).toBe(100)
    })
  })

  describe('resolveWalletConfig', () => {
    it('should return the defaults with no overrides or environment', () => {
      expect(resolveWalletConfig({}, {})).toEqual(DEFAULT_WALLET_CONFIG)
      expect(DEFAULT_WALLET_CONFIG.databasePath).toBeNull()
    })

    it('should read the network and database path from the environment', () => {
      const config = resolveWalletConfig({}, { LEDGER_NETWORK: 'testnet', LEDGER_DB_PATH: '/tmp/ledger.sqlite' })
      expect(config.network).toBe('testnet')
      expect(config.databasePath).toBe('/tmp/ledger.sqlite')
    })

    it('should ignore unknown networks in the environment', () => {
      expect(resolveWalletConfig({}, { LEDGER_NETWORK: 'regtest' }).network).toBe('mainnet')
    })

    it('should prefer explicit overrides to the environment', () => {
      const config = resolveWalletConfig(
        { network: 'mainnet', databasePath: null, kdfIterations: 5000 },
        { LEDGER_NETWORK: 'testnet', LEDGER_DB_PATH: '/tmp/ledger.sqlite' }
      )
      expect(config).toEqual({ ...DEFAULT_WALLET_CONFIG, kdfIterations: 5000 })
    })

    it('should reject invalid iteration counts and gaps', () => {
      expect(() => resolveWalletConfig({ kdfIterations: 0 }, {})).toThrow(RangeError)
      expect(() => resolveWalletConfig({ kdfIterations: 1.5 }, {})).toThrow('kdfIterations must be a positive integer, got 1.5')
      expect(() => resolveWalletConfig({ receivingGap: 0 }, {})).toThrow('Key gap limits must be at least 1')
    })
  })
})
