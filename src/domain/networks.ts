/**
 * Network parameters
 *
 * Threaded explicitly into whatever needs address version bytes or chain
 * constants. There is no process-wide "current network".
 *
 * @module domain/networks
 */

import type { NetworkName } from '../config'
import { LEDGER } from '../config'

export interface NetworkParams {
  name: NetworkName
  /** Base58Check version byte for P2PKH addresses */
  addressPrefix: number
  /** Base58Check version byte for P2SH addresses */
  scriptHashPrefix: number
  /** Base58Check version byte for WIF private keys */
  wifPrefix: number
  coinbaseMaturity: number
}

export const MAINNET: NetworkParams = Object.freeze({
  name: 'mainnet',
  addressPrefix: 0x00,
  scriptHashPrefix: 0x05,
  wifPrefix: 0x80,
  coinbaseMaturity: LEDGER.COINBASE_MATURITY,
})

export const TESTNET: NetworkParams = Object.freeze({
  name: 'testnet',
  addressPrefix: 0x6f,
  scriptHashPrefix: 0xc4,
  wifPrefix: 0xef,
  coinbaseMaturity: LEDGER.COINBASE_MATURITY,
})

export function getNetwork(name: NetworkName): NetworkParams {
  switch (name) {
    case 'mainnet':
      return MAINNET
    case 'testnet':
      return TESTNET
  }
}
