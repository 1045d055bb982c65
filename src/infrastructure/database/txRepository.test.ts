import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { WalletDatabase } from './connection'
import { createAccounts } from './accountRepository'
import {
  insertTransaction,
  markTransactionRemoved,
  readSettledAtOrAbove,
  readTransactionData,
  readTransactionFlags,
  readTransactionHashes,
  readTransactionMetadata,
  readTransactionState,
  readUnverifiedTransactions,
  restoreTransaction,
  setTransactionDescription,
  settleTransaction,
  unsettleFromHeight,
  type NewTransaction,
  type ProofUpdate
} from './txRepository'
import { linkAccountTransaction } from './txoRepository'
import { TxFlags } from '../../domain/transaction/flags'
import { BlockHeight } from '../../domain/types'

function newTransaction(txHash: string, overrides: Partial<NewTransaction> = {}): NewTransaction {
  return {
    txHash,
    rawHex: `raw-${txHash}`,
    flags: TxFlags.STATE_CLEARED,
    blockHeight: BlockHeight.MEMPOOL,
    blockHash: null,
    feeValue: null,
    ...overrides
  }
}

function proofFor(txHash: string, blockHeight: number, blockPosition: number): ProofUpdate {
  return {
    txHash,
    blockHeight,
    blockPosition,
    blockHash: `block-${blockHeight}`,
    dateMined: 1700000000,
    feeValue: 250,
    proof: { position: blockPosition, hashes: ['aa', 'bb'] }
  }
}

interface ProofRow {
  proof_data: string | null
}

describe('txRepository', () => {
  let db: WalletDatabase

  beforeEach(async () => {
    db = await WalletDatabase.open()
  })

  afterEach(async () => {
    await db.close()
  })

  it('should store bytes, flags and metadata', async () => {
    await insertTransaction(db, newTransaction('tx-a', { flags: TxFlags.STATE_SIGNED, blockHeight: BlockHeight.LOCAL, feeValue: 90 }))

    expect(await readTransactionData(db, 'tx-a')).toBe('raw-tx-a')
    expect(await readTransactionFlags(db, 'tx-a')).toBe(TxFlags.STATE_SIGNED)
    expect(await readTransactionState(db, 'tx-a')).toEqual({ flags: TxFlags.STATE_SIGNED, fee_value: 90, block_hash: null })
    expect(await readTransactionMetadata(db, 'tx-a')).toEqual({
      blockHeight: BlockHeight.LOCAL,
      blockPosition: null,
      blockHash: null,
      feeValue: 90,
      dateMined: null
    })
  })

  it('should return null for unknown hashes', async () => {
    expect(await readTransactionData(db, 'missing')).toBeNull()
    expect(await readTransactionFlags(db, 'missing')).toBeNull()
    expect(await readTransactionState(db, 'missing')).toBeNull()
    expect(await readTransactionMetadata(db, 'missing')).toBeNull()
  })

  it('should settle a transaction with its proof', async () => {
    await insertTransaction(db, newTransaction('tx-a'))

    expect(await settleTransaction(db, proofFor('tx-a', 1000, 3))).toBe(true)

    expect(await readTransactionFlags(db, 'tx-a')).toBe(TxFlags.STATE_SETTLED)
    expect(await readTransactionMetadata(db, 'tx-a')).toEqual({
      blockHeight: 1000,
      blockPosition: 3,
      blockHash: 'block-1000',
      feeValue: 250,
      dateMined: 1700000000
    })
    const rows = await db.select<ProofRow[]>('SELECT proof_data FROM transactions WHERE tx_hash = $1', ['tx-a'])
    expect(JSON.parse(rows[0]?.proof_data ?? 'null')).toEqual({ position: 3, hashes: ['aa', 'bb'] })
  })

  it('should not settle a removed transaction', async () => {
    await insertTransaction(db, newTransaction('tx-a'))
    await markTransactionRemoved(db, 'tx-a')

    expect(await settleTransaction(db, proofFor('tx-a', 1000, 3))).toBe(false)
    expect(await readTransactionFlags(db, 'tx-a')).toBe(TxFlags.STATE_CLEARED | TxFlags.REMOVED)
  })

  it('should revert settlements at or above a height', async () => {
    await insertTransaction(db, newTransaction('tx-999'))
    await insertTransaction(db, newTransaction('tx-1000'))
    await insertTransaction(db, newTransaction('tx-1001'))
    await settleTransaction(db, proofFor('tx-999', 999, 0))
    await settleTransaction(db, proofFor('tx-1000', 1000, 1))
    await settleTransaction(db, proofFor('tx-1001', 1001, 0))

    expect(await readSettledAtOrAbove(db, 1000)).toEqual(['tx-1000', 'tx-1001'])
    expect(await unsettleFromHeight(db, 1000)).toBe(2)

    expect(await readTransactionFlags(db, 'tx-999')).toBe(TxFlags.STATE_SETTLED)
    expect(await readTransactionFlags(db, 'tx-1000')).toBe(TxFlags.STATE_CLEARED)
    expect(await readTransactionMetadata(db, 'tx-1001')).toEqual({
      blockHeight: BlockHeight.MEMPOOL,
      blockPosition: null,
      blockHash: null,
      feeValue: null,
      dateMined: null
    })
  })

  it('should list cleared transactions with a known block but no proof', async () => {
    await insertTransaction(db, newTransaction('mempool'))
    await insertTransaction(db, newTransaction('known-500', { blockHeight: 500 }))
    await insertTransaction(db, newTransaction('known-700', { blockHeight: 700 }))
    await insertTransaction(db, newTransaction('signed', { flags: TxFlags.STATE_SIGNED, blockHeight: 400 }))
    await insertTransaction(db, newTransaction('settled'))
    await settleTransaction(db, proofFor('settled', 450, 2))

    const unverified = await readUnverifiedTransactions(db, 600)
    expect([...unverified.entries()]).toEqual([['known-500', 500]])
  })

  it('should list live hashes in import order, optionally per account', async () => {
    const [account] = await createAccounts(db, [
      { kind: 'imported_address', defaultMasterkeyId: null, defaultScriptType: 'P2PKH', accountName: 'Watch' }
    ])
    const accountId = account?.accountId ?? -1
    await insertTransaction(db, newTransaction('first'))
    await insertTransaction(db, newTransaction('second'))
    await insertTransaction(db, newTransaction('third'))
    await linkAccountTransaction(db, accountId, 'third')
    await linkAccountTransaction(db, accountId, 'first')
    await markTransactionRemoved(db, 'second')

    expect(await readTransactionHashes(db)).toEqual(['first', 'third'])
    expect(await readTransactionHashes(db, accountId)).toEqual(['first', 'third'])
    expect(await readTransactionHashes(db, accountId + 1)).toEqual([])
  })

  it('should restore a removed transaction with fresh metadata', async () => {
    await insertTransaction(db, newTransaction('tx-a'))
    await settleTransaction(db, proofFor('tx-a', 800, 4))
    await markTransactionRemoved(db, 'tx-a')

    await restoreTransaction(db, newTransaction('tx-a', { flags: TxFlags.STATE_SIGNED, blockHeight: BlockHeight.LOCAL }))

    expect(await readTransactionFlags(db, 'tx-a')).toBe(TxFlags.STATE_SIGNED)
    expect(await readTransactionMetadata(db, 'tx-a')).toEqual({
      blockHeight: BlockHeight.LOCAL,
      blockPosition: null,
      blockHash: null,
      feeValue: null,
      dateMined: null
    })
  })

  it('should set descriptions on known transactions only', async () => {
    await insertTransaction(db, newTransaction('tx-a'))
    expect(await setTransactionDescription(db, 'tx-a', 'rent')).toBe(true)
    expect(await setTransactionDescription(db, 'unknown', 'rent')).toBe(false)
  })
})
