/**
 * Transaction parsing for the linker
 *
 * Flattens an @bsv/sdk Transaction into the outpoints and output scripts
 * the ledger records.
 *
 * @module domain/transaction/parsing
 */

import { Transaction, Utils } from '@bsv/sdk'
import { classifyScript, scriptHashOf } from '../scripts/templates'
import type { ScriptType } from '../types'

const NULL_HASH = '0'.repeat(64)
const COINBASE_INDEX = 0xffffffff

export interface ParsedInput {
  txiIndex: number
  spentTxHash: string
  spentTxoIndex: number
}

export interface ParsedOutput {
  txoIndex: number
  value: number
  scriptHex: string
  scriptHash: string
  scriptType: ScriptType
}

export interface ParsedTransaction {
  txHash: string
  rawHex: string
  isCoinbase: boolean
  /** Coinbase transactions have none */
  inputs: ParsedInput[]
  outputs: ParsedOutput[]
}

/**
 * Transaction id (display byte order) as hex
 */
export function transactionHash(tx: Transaction): string {
  const id = tx.id('hex')
  return typeof id === 'string' ? id : Utils.toHex(id)
}

/**
 * Accepts a Transaction, its hex serialization, or its raw bytes
 */
export function toTransaction(source: Transaction | string | number[]): Transaction {
  if (source instanceof Transaction) return source
  return typeof source === 'string' ? Transaction.fromHex(source) : Transaction.fromBinary(source)
}

export function parseTransaction(source: Transaction | string | number[]): ParsedTransaction {
  const tx = toTransaction(source)

  const first = tx.inputs[0]
  const isCoinbase = tx.inputs.length === 1 &&
    first !== undefined &&
    first.sourceTXID === NULL_HASH &&
    first.sourceOutputIndex === COINBASE_INDEX

  const inputs: ParsedInput[] = isCoinbase
    ? []
    : tx.inputs.map((input, txiIndex) => {
      const spentTxHash = input.sourceTXID ?? input.sourceTransaction?.id('hex')
      if (typeof spentTxHash !== 'string') {
        throw new Error(`Input ${txiIndex} does not name the transaction it spends`)
      }
      return { txiIndex, spentTxHash, spentTxoIndex: input.sourceOutputIndex }
    })

  const outputs: ParsedOutput[] = tx.outputs.map((output, txoIndex) => {
    const scriptHex = output.lockingScript.toHex()
    return {
      txoIndex,
      value: output.satoshis ?? 0,
      scriptHex,
      scriptHash: scriptHashOf(output.lockingScript),
      scriptType: classifyScript(scriptHex),
    }
  })

  return {
    txHash: transactionHash(tx),
    rawHex: tx.toHex(),
    isCoinbase,
    inputs,
    outputs,
  }
}
