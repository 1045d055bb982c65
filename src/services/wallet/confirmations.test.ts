import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { recordTransactionProof, revertVerifications } from './confirmations'
import type { ProofRequest } from './confirmations'
import {
  WalletDatabase,
  insertTransaction,
  markTransactionRemoved,
  readTransactionFlags,
  readTransactionMetadata
} from '../../infrastructure/database'
import { TxFlags } from '../../domain/transaction/flags'
import { BlockHeight } from '../../domain/types'
import { InvalidTransactionStateError, TransactionNotFoundError } from '../errors'
import { logger } from '../logger'

function proofRequest(txHash: string, blockHeight: number, overrides: Partial<ProofRequest> = {}): ProofRequest {
  return {
    txHash,
    blockHeight,
    header: { timestamp: 1700000600, hash: `header-${blockHeight}` },
    blockPosition: 2,
    proofIndex: 2,
    proofHashes: ['aa'],
    ...overrides
  }
}

describe('confirmations', () => {
  let db: WalletDatabase

  async function addCleared(txHash: string, feeValue: number | null = null, blockHash: string | null = null): Promise<void> {
    await insertTransaction(db, {
      txHash,
      rawHex: '00',
      flags: TxFlags.STATE_CLEARED,
      blockHeight: BlockHeight.MEMPOOL,
      blockHash,
      feeValue
    })
  }

  beforeEach(async () => {
    db = await WalletDatabase.open()
  })

  afterEach(async () => {
    await db.close()
  })

  describe('recordTransactionProof', () => {
    it('should settle a cleared transaction', async () => {
      await addCleared('tx-a', 300)

      await recordTransactionProof(db, proofRequest('tx-a', 1000))

      expect(await readTransactionFlags(db, 'tx-a')).toBe(TxFlags.STATE_SETTLED)
      expect(await readTransactionMetadata(db, 'tx-a')).toEqual({
        blockHeight: 1000,
        blockPosition: 2,
        blockHash: 'header-1000',
        feeValue: 300,
        dateMined: 1700000600
      })
    })

    it('should fall back to the known block hash and pending fee', async () => {
      await addCleared('tx-a', null, 'known-block')

      await recordTransactionProof(db, proofRequest('tx-a', 1000, {
        header: { timestamp: 1700000600 },
        missing: { blockHash: null, blockHeight: 1000, feeValue: 75, importFlags: TxFlags.STATE_CLEARED }
      }))

      const metadata = await readTransactionMetadata(db, 'tx-a')
      expect(metadata?.blockHash).toBe('known-block')
      expect(metadata?.feeValue).toBe(75)
    })

    it('should reject unknown and removed transactions', async () => {
      await expect(recordTransactionProof(db, proofRequest('missing', 1000)))
        .rejects.toBeInstanceOf(TransactionNotFoundError)

      await addCleared('tx-a')
      await markTransactionRemoved(db, 'tx-a')
      await expect(recordTransactionProof(db, proofRequest('tx-a', 1000)))
        .rejects.toBeInstanceOf(InvalidTransactionStateError)
    })
  })

  describe('revertVerifications', () => {
    beforeEach(async () => {
      await addCleared('tx-999')
      await addCleared('tx-1000')
      await recordTransactionProof(db, proofRequest('tx-999', 999))
      await recordTransactionProof(db, proofRequest('tx-1000', 1000))
    })

    it('should revert nothing above the highest settled block', async () => {
      expect(await revertVerifications(db, 1001)).toEqual([])
      expect(logger.getLogs('warn')).toEqual([])
    })

    it('should revert settlements at the reorg height and above', async () => {
      expect(await revertVerifications(db, 1000)).toEqual(['tx-1000'])

      expect(await readTransactionFlags(db, 'tx-1000')).toBe(TxFlags.STATE_CLEARED)
      expect((await readTransactionMetadata(db, 'tx-1000'))?.blockHeight).toBe(BlockHeight.MEMPOOL)
      expect(await readTransactionFlags(db, 'tx-999')).toBe(TxFlags.STATE_SETTLED)
      expect(logger.getLogs('warn').map(entry => entry.context?.count)).toEqual([1])
    })
  })
})
