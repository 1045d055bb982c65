/**
 * Confirmation Tracker
 *
 * Moves transactions between CLEARED and SETTLED as proofs arrive and
 * reorgs undo them.
 */

import { isRemoved } from '../../domain/transaction/flags'
import type { BlockHeaderInfo, MissingTransactionEntry, TransactionProof } from '../../domain/types'
import type { SqlExecutor } from '../../infrastructure/database'
import {
  readSettledAtOrAbove,
  readTransactionState,
  settleTransaction,
  unsettleFromHeight
} from '../../infrastructure/database'
import { DatabaseError, InvalidTransactionStateError, TransactionNotFoundError } from '../errors'
import { syncLogger } from '../logger'

export interface ProofRequest {
  txHash: string
  blockHeight: number
  header: BlockHeaderInfo
  /** Position of the transaction in the block */
  blockPosition: number
  proofIndex: number
  proofHashes: string[]
  /** Pending entry whose fee is used when the transaction has none */
  missing?: MissingTransactionEntry
}

/**
 * Settle a transaction with its merkle proof
 *
 * @throws InvalidTransactionStateError when the transaction is removed
 */
export async function recordTransactionProof(db: SqlExecutor, request: ProofRequest): Promise<void> {
  await db.withTransaction(async scope => {
    const state = await readTransactionState(scope, request.txHash)
    if (!state) {
      throw new TransactionNotFoundError(request.txHash)
    }
    if (isRemoved(state.flags)) {
      throw new InvalidTransactionStateError(request.txHash, state.flags, 'settle')
    }

    const proof: TransactionProof = { position: request.proofIndex, hashes: request.proofHashes }
    const settled = await settleTransaction(scope, {
      txHash: request.txHash,
      blockHeight: request.blockHeight,
      blockPosition: request.blockPosition,
      blockHash: request.header.hash ?? state.block_hash,
      dateMined: request.header.timestamp,
      feeValue: state.fee_value ?? request.missing?.feeValue ?? null,
      proof
    })
    if (!settled) {
      throw new DatabaseError(`Transaction ${request.txHash} was not settled`, 'recordTransactionProof')
    }
    syncLogger.info('Transaction settled', {
      txHash: request.txHash,
      height: request.blockHeight,
      position: request.blockPosition
    })
  })
}

/**
 * Revert every settled transaction at or above `height` to CLEARED.
 * Returns the reverted hashes, lowest block first.
 */
export async function revertVerifications(db: SqlExecutor, height: number): Promise<string[]> {
  return db.withTransaction(async scope => {
    const hashes = await readSettledAtOrAbove(scope, height)
    if (hashes.length === 0) return hashes

    const reverted = await unsettleFromHeight(scope, height)
    if (reverted !== hashes.length) {
      throw new DatabaseError(`Expected to revert ${hashes.length} transactions, reverted ${reverted}`, 'undoVerifications')
    }
    syncLogger.warn('Reorg reverted settled transactions', { height, count: reverted })
    return hashes
  })
}
