/**
 * Transaction Repository
 *
 * The `transactions` table: raw bytes, state flags and block metadata.
 * State transitions (proofs, reorg rollback, removal) are single
 * statements here; callers decide when they are allowed.
 */

import type { TransactionMetadata, TransactionProof } from '../../domain/types'
import { BlockHeight } from '../../domain/types'
import { MASK_STATE, TxFlags } from '../../domain/transaction/flags'
import type { SqlExecutor } from './connection'
import type {
  TransactionDataRow,
  TransactionFlagsRow,
  TransactionHashRow,
  TransactionHeightRow,
  TransactionMetadataRow,
  TransactionStateRow
} from './row-types'

export interface NewTransaction {
  txHash: string
  rawHex: string
  flags: number
  blockHeight: number
  blockHash: string | null
  feeValue: number | null
}

export async function insertTransaction(db: SqlExecutor, tx: NewTransaction): Promise<void> {
  const now = Date.now()
  await db.execute(
    `INSERT INTO transactions (tx_hash, tx_data, flags, block_height, block_hash, fee_value, date_created, date_updated)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $7)`,
    [tx.txHash, tx.rawHex, tx.flags, tx.blockHeight, tx.blockHash, tx.feeValue, now]
  )
}

/**
 * Bring a removed transaction back as if freshly imported
 */
export async function restoreTransaction(db: SqlExecutor, tx: NewTransaction): Promise<void> {
  await db.execute(
    `UPDATE transactions
     SET flags = $1, block_height = $2, block_hash = $3, fee_value = $4,
         block_position = NULL, date_mined = NULL, proof_data = NULL, date_updated = $5
     WHERE tx_hash = $6`,
    [tx.flags, tx.blockHeight, tx.blockHash, tx.feeValue, Date.now(), tx.txHash]
  )
}

export async function readTransactionFlags(db: SqlExecutor, txHash: string): Promise<number | null> {
  const rows = await db.select<TransactionFlagsRow[]>(
    'SELECT flags FROM transactions WHERE tx_hash = $1',
    [txHash]
  )
  return rows[0]?.flags ?? null
}

export async function readTransactionState(db: SqlExecutor, txHash: string): Promise<TransactionStateRow | null> {
  const rows = await db.select<TransactionStateRow[]>(
    'SELECT flags, fee_value, block_hash FROM transactions WHERE tx_hash = $1',
    [txHash]
  )
  return rows[0] ?? null
}

export async function readTransactionMetadata(db: SqlExecutor, txHash: string): Promise<TransactionMetadata | null> {
  const rows = await db.select<TransactionMetadataRow[]>(
    `SELECT block_height, block_position, block_hash, fee_value, date_mined
     FROM transactions WHERE tx_hash = $1`,
    [txHash]
  )
  const row = rows[0]
  if (!row) return null
  return {
    blockHeight: row.block_height,
    blockPosition: row.block_position,
    blockHash: row.block_hash,
    feeValue: row.fee_value,
    dateMined: row.date_mined
  }
}

export async function readTransactionData(db: SqlExecutor, txHash: string): Promise<string | null> {
  const rows = await db.select<TransactionDataRow[]>(
    'SELECT tx_data FROM transactions WHERE tx_hash = $1',
    [txHash]
  )
  return rows[0]?.tx_data ?? null
}

/**
 * Hashes of live transactions, optionally only those linked to an account,
 * in import order
 */
export async function readTransactionHashes(db: SqlExecutor, accountId?: number): Promise<string[]> {
  const rows = accountId === undefined
    ? await db.select<TransactionHashRow[]>(
      `SELECT tx_hash FROM transactions WHERE (flags & $1) = 0 ORDER BY rowid`,
      [TxFlags.REMOVED]
    )
    : await db.select<TransactionHashRow[]>(
      `SELECT T.tx_hash FROM transactions T
       INNER JOIN account_transactions ATX ON ATX.tx_hash = T.tx_hash
       WHERE ATX.account_id = $1 AND (T.flags & $2) = 0
       ORDER BY T.rowid`,
      [accountId, TxFlags.REMOVED]
    )
  return rows.map(row => row.tx_hash)
}

export interface ProofUpdate {
  txHash: string
  blockHeight: number
  blockPosition: number
  blockHash: string | null
  dateMined: number
  feeValue: number | null
  proof: TransactionProof
}

/**
 * Mark a transaction SETTLED with its block metadata and proof
 */
export async function settleTransaction(db: SqlExecutor, update: ProofUpdate): Promise<boolean> {
  const result = await db.execute(
    `UPDATE transactions
     SET flags = (flags & $1) | $2, block_height = $3, block_position = $4, block_hash = $5,
         date_mined = $6, fee_value = $7, proof_data = $8, date_updated = $9
     WHERE tx_hash = $10 AND (flags & $11) = 0`,
    [~MASK_STATE, TxFlags.STATE_SETTLED, update.blockHeight, update.blockPosition, update.blockHash,
      update.dateMined, update.feeValue, JSON.stringify(update.proof), Date.now(),
      update.txHash, TxFlags.REMOVED]
  )
  return result.rowsAffected === 1
}

/**
 * Settled, live transactions mined at or above `height`
 */
export async function readSettledAtOrAbove(db: SqlExecutor, height: number): Promise<string[]> {
  const rows = await db.select<TransactionHashRow[]>(
    `SELECT tx_hash FROM transactions
     WHERE (flags & $1) != 0 AND (flags & $2) = 0 AND block_height >= $3
     ORDER BY block_height, block_position`,
    [TxFlags.STATE_SETTLED, TxFlags.REMOVED, height]
  )
  return rows.map(row => row.tx_hash)
}

/**
 * Revert settled transactions at or above `height` to CLEARED with the
 * block metadata wiped. Returns how many were reverted.
 */
export async function unsettleFromHeight(db: SqlExecutor, height: number): Promise<number> {
  const result = await db.execute(
    `UPDATE transactions
     SET flags = (flags & $1) | $2, block_height = $3, block_position = NULL, block_hash = NULL,
         fee_value = NULL, date_mined = NULL, proof_data = NULL, date_updated = $4
     WHERE (flags & $5) != 0 AND (flags & $6) = 0 AND block_height >= $7`,
    [~MASK_STATE, TxFlags.STATE_CLEARED, BlockHeight.MEMPOOL, Date.now(),
      TxFlags.STATE_SETTLED, TxFlags.REMOVED, height]
  )
  return result.rowsAffected
}

/**
 * Cleared transactions whose block is known locally but which have no proof yet
 */
export async function readUnverifiedTransactions(db: SqlExecutor, localHeight: number): Promise<Map<string, number>> {
  const rows = await db.select<TransactionHeightRow[]>(
    `SELECT tx_hash, block_height FROM transactions
     WHERE (flags & $1) != 0 AND (flags & $2) = 0
       AND block_height > 0 AND block_height <= $3 AND block_position IS NULL
     ORDER BY block_height, rowid`,
    [TxFlags.STATE_CLEARED, TxFlags.REMOVED, localHeight]
  )
  return new Map(rows.map(row => [row.tx_hash, row.block_height]))
}

export async function markTransactionRemoved(db: SqlExecutor, txHash: string): Promise<void> {
  await db.execute(
    'UPDATE transactions SET flags = flags | $1, date_updated = $2 WHERE tx_hash = $3',
    [TxFlags.REMOVED, Date.now(), txHash]
  )
}

export async function setTransactionDescription(
  db: SqlExecutor,
  txHash: string,
  description: string | null
): Promise<boolean> {
  const result = await db.execute(
    'UPDATE transactions SET description = $1, date_updated = $2 WHERE tx_hash = $3',
    [description, Date.now(), txHash]
  )
  return result.rowsAffected === 1
}
