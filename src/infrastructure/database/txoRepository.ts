/**
 * Transaction Output / Input Repository
 *
 * Inputs and outputs of every imported transaction, the spend links
 * between them, and the balance and value projections computed from them.
 *
 * An output counts as spent only while its spender is live. Removing the
 * spender hands the link to the latest live input still spending the
 * outpoint, or clears it when there is none.
 */

import type {
  AccountTransactionOutput,
  KeySubscription,
  TransactionOutputRecord,
  TransactionValue,
  WalletBalance
} from '../../domain/types'
import { TxoFlags, isScriptType } from '../../domain/types'
import { MASK_STATE_LOCAL, TxFlags } from '../../domain/transaction/flags'
import { DatabaseError } from '../../services/errors'
import type { SqlExecutor } from './connection'
import type {
  AccountTransactionOutputRow,
  BalanceRow,
  KeyLinkRow,
  KeySubscriptionRow,
  OutpointRow,
  OutputOwnerRow,
  RecordedSpendRow,
  SpenderRow,
  TransactionOutputRow,
  TransactionValueRow
} from './row-types'

const OUTPUT_COLUMNS = `TXO.tx_hash, TXO.txo_index, TXO.value, TXO.script_type, TXO.script_hash,
  TXO.keyinstance_id, TXO.flags, TXO.spending_tx_hash, TXO.spending_txi_index`

export interface NewTransactionOutput {
  txHash: string
  txoIndex: number
  value: number
  scriptType: string
  scriptHash: string
  keyinstanceId: number | null
  flags: number
}

export interface NewTransactionInput {
  txHash: string
  txiIndex: number
  spentTxHash: string
  spentTxoIndex: number
}

function mapOutputRow(row: TransactionOutputRow): TransactionOutputRecord {
  if (!isScriptType(row.script_type)) {
    throw new DatabaseError(`Unknown script type: ${row.script_type}`, 'readTransactionOutputs')
  }
  return {
    txHash: row.tx_hash,
    txoIndex: row.txo_index,
    value: row.value,
    scriptType: row.script_type,
    scriptHash: row.script_hash,
    keyinstanceId: row.keyinstance_id,
    flags: row.flags,
    spendingTxHash: row.spending_tx_hash,
    spendingTxiIndex: row.spending_txi_index
  }
}

// ---------- writes ----------

/**
 * Record an output. An existing row keeps its values, except that an
 * unowned output picks up the owner it was given.
 */
export async function upsertTransactionOutput(db: SqlExecutor, output: NewTransactionOutput): Promise<void> {
  await db.execute(
    `INSERT INTO transaction_outputs (tx_hash, txo_index, value, script_type, script_hash, keyinstance_id, flags)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     ON CONFLICT (tx_hash, txo_index) DO UPDATE
       SET keyinstance_id = excluded.keyinstance_id
       WHERE transaction_outputs.keyinstance_id IS NULL AND excluded.keyinstance_id IS NOT NULL`,
    [output.txHash, output.txoIndex, output.value, output.scriptType, output.scriptHash,
      output.keyinstanceId, output.flags]
  )
}

export async function insertTransactionInput(db: SqlExecutor, input: NewTransactionInput): Promise<void> {
  await db.execute(
    `INSERT OR IGNORE INTO transaction_inputs (tx_hash, txi_index, spent_tx_hash, spent_txo_index)
     VALUES ($1, $2, $3, $4)`,
    [input.txHash, input.txiIndex, input.spentTxHash, input.spentTxoIndex]
  )
}

/**
 * Point an output at the input spending it
 */
export async function setOutputSpender(
  db: SqlExecutor,
  txHash: string,
  txoIndex: number,
  spendingTxHash: string,
  spendingTxiIndex: number
): Promise<boolean> {
  const result = await db.execute(
    `UPDATE transaction_outputs SET spending_tx_hash = $1, spending_txi_index = $2
     WHERE tx_hash = $3 AND txo_index = $4`,
    [spendingTxHash, spendingTxiIndex, txHash, txoIndex]
  )
  return result.rowsAffected === 1
}

/**
 * Release every spend link held by the inputs of `spendingTxHash`.
 *
 * An outpoint that another live transaction also spends passes to the
 * latest such spender; the rest are left unspent.
 */
export async function clearSpendsBy(db: SqlExecutor, spendingTxHash: string): Promise<number> {
  const outpoints = await db.select<OutpointRow[]>(
    'SELECT tx_hash, txo_index FROM transaction_outputs WHERE spending_tx_hash = $1',
    [spendingTxHash]
  )
  for (const outpoint of outpoints) {
    const spends = await readRecordedSpends(db, outpoint.tx_hash, outpoint.txo_index)
    const remaining = spends.filter(spend => spend.tx_hash !== spendingTxHash)
    const latest = remaining[remaining.length - 1]
    await db.execute(
      `UPDATE transaction_outputs SET spending_tx_hash = $1, spending_txi_index = $2
       WHERE tx_hash = $3 AND txo_index = $4`,
      [latest?.tx_hash ?? null, latest?.txi_index ?? null, outpoint.tx_hash, outpoint.txo_index]
    )
  }
  return outpoints.length
}

export async function linkAccountTransaction(db: SqlExecutor, accountId: number, txHash: string): Promise<void> {
  await db.execute(
    `INSERT OR IGNORE INTO account_transactions (account_id, tx_hash, date_created) VALUES ($1, $2, $3)`,
    [accountId, txHash, Date.now()]
  )
}

export async function unlinkAccountTransactions(db: SqlExecutor, txHash: string): Promise<number> {
  const result = await db.execute('DELETE FROM account_transactions WHERE tx_hash = $1', [txHash])
  return result.rowsAffected
}

// ---------- reads used while linking ----------

export async function readOutputOwner(
  db: SqlExecutor,
  txHash: string,
  txoIndex: number
): Promise<OutputOwnerRow | null> {
  const rows = await db.select<OutputOwnerRow[]>(
    `SELECT TXO.keyinstance_id, KI.account_id, TXO.spending_tx_hash, TXO.spending_txi_index
     FROM transaction_outputs TXO
     LEFT JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
     WHERE TXO.tx_hash = $1 AND TXO.txo_index = $2`,
    [txHash, txoIndex]
  )
  return rows[0] ?? null
}

/**
 * Inputs of live transactions that spend a given outpoint, oldest first
 */
export async function readRecordedSpends(
  db: SqlExecutor,
  spentTxHash: string,
  spentTxoIndex: number
): Promise<RecordedSpendRow[]> {
  return db.select<RecordedSpendRow[]>(
    `SELECT TXI.tx_hash, TXI.txi_index
     FROM transaction_inputs TXI
     INNER JOIN transactions T ON T.tx_hash = TXI.tx_hash
     WHERE TXI.spent_tx_hash = $1 AND TXI.spent_txo_index = $2 AND (T.flags & $3) = 0
     ORDER BY T.rowid`,
    [spentTxHash, spentTxoIndex, TxFlags.REMOVED]
  )
}

/**
 * Outputs of `txHash` spent by any live transaction other than `txHash`
 * itself, including spenders that lost a double spend
 */
export async function readLiveSpenders(db: SqlExecutor, txHash: string): Promise<SpenderRow[]> {
  return db.select<SpenderRow[]>(
    `SELECT TXI.spent_txo_index AS txo_index, TXI.tx_hash AS spending_tx_hash
     FROM transaction_inputs TXI
     INNER JOIN transactions T ON T.tx_hash = TXI.tx_hash
     WHERE TXI.spent_tx_hash = $1 AND TXI.tx_hash != $1 AND (T.flags & $2) = 0
     ORDER BY TXI.spent_txo_index, T.rowid`,
    [txHash, TxFlags.REMOVED]
  )
}

/**
 * Wallet keys a transaction touches, through the owned outputs it creates
 * and the owned outputs its inputs spend
 */
export async function readTransactionKeyLinks(db: SqlExecutor, txHash: string): Promise<KeyLinkRow[]> {
  return db.select<KeyLinkRow[]>(
    `SELECT DISTINCT account_id, keyinstance_id FROM (
       SELECT KI.account_id AS account_id, KI.keyinstance_id AS keyinstance_id
       FROM transaction_outputs TXO
       INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
       WHERE TXO.tx_hash = $1
       UNION ALL
       SELECT KI.account_id AS account_id, KI.keyinstance_id AS keyinstance_id
       FROM transaction_inputs TXI
       INNER JOIN transaction_outputs TXO
         ON TXO.tx_hash = TXI.spent_tx_hash AND TXO.txo_index = TXI.spent_txo_index
       INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
       WHERE TXI.tx_hash = $1
     )
     ORDER BY account_id, keyinstance_id`,
    [txHash]
  )
}

// ---------- projections ----------

/**
 * Every output of a transaction, owned or not, in index order
 */
export async function readTransactionOutputsFull(db: SqlExecutor, txHash: string): Promise<TransactionOutputRecord[]> {
  const rows = await db.select<TransactionOutputRow[]>(
    `SELECT ${OUTPUT_COLUMNS} FROM transaction_outputs TXO WHERE TXO.tx_hash = $1 ORDER BY TXO.txo_index`,
    [txHash]
  )
  return rows.map(mapOutputRow)
}

/**
 * Wallet-owned outputs of a transaction with the owning account
 */
export async function readTransactionOutputsExplicit(
  db: SqlExecutor,
  txHash: string
): Promise<AccountTransactionOutput[]> {
  const rows = await db.select<AccountTransactionOutputRow[]>(
    `SELECT ${OUTPUT_COLUMNS}, KI.account_id
     FROM transaction_outputs TXO
     INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
     WHERE TXO.tx_hash = $1
     ORDER BY TXO.txo_index`,
    [txHash]
  )
  return rows.map(row => ({
    ...mapOutputRow(row),
    accountId: row.account_id,
    keyinstanceId: row.keyinstance_id
  }))
}

/**
 * Net value a transaction carries for each account it touches: owned
 * outputs it creates minus owned outputs its inputs spend.
 */
export async function readTransactionValues(
  db: SqlExecutor,
  txHash: string,
  accountId?: number
): Promise<TransactionValue[]> {
  const rows = await db.select<TransactionValueRow[]>(
    `SELECT account_id, SUM(value) AS total FROM (
       SELECT KI.account_id AS account_id, TXO.value AS value
       FROM transaction_outputs TXO
       INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
       WHERE TXO.tx_hash = $1
       UNION ALL
       SELECT KI.account_id AS account_id, -TXO.value AS value
       FROM transaction_inputs TXI
       INNER JOIN transaction_outputs TXO
         ON TXO.tx_hash = TXI.spent_tx_hash AND TXO.txo_index = TXI.spent_txo_index
       INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
       WHERE TXI.tx_hash = $1
     )
     WHERE ($2 IS NULL OR account_id = $2)
     GROUP BY account_id
     ORDER BY account_id`,
    [txHash, accountId ?? null]
  )
  return rows.map(row => ({ accountId: row.account_id, total: row.total }))
}

/**
 * Sum live unspent owned outputs into balance buckets.
 *
 * Settled coinbase outputs stay `unmatured` until `localHeight` reaches
 * their height plus `coinbaseMaturity`.
 */
export async function readBalance(
  db: SqlExecutor,
  localHeight: number,
  coinbaseMaturity: number,
  accountId?: number
): Promise<WalletBalance> {
  const rows = await db.select<BalanceRow[]>(
    `SELECT
       COALESCE(SUM(CASE WHEN (T.flags & $1) != 0
         AND NOT ((TXO.flags & $2) != 0 AND T.block_height + $3 > $4) THEN TXO.value ELSE 0 END), 0) AS confirmed,
       COALESCE(SUM(CASE WHEN (T.flags & $5) != 0 THEN TXO.value ELSE 0 END), 0) AS unconfirmed,
       COALESCE(SUM(CASE WHEN (T.flags & $1) != 0
         AND (TXO.flags & $2) != 0 AND T.block_height + $3 > $4 THEN TXO.value ELSE 0 END), 0) AS unmatured,
       COALESCE(SUM(CASE WHEN (T.flags & $6) != 0 THEN TXO.value ELSE 0 END), 0) AS allocated
     FROM transaction_outputs TXO
     INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
     INNER JOIN transactions T ON T.tx_hash = TXO.tx_hash
     LEFT JOIN transactions S ON S.tx_hash = TXO.spending_tx_hash
     WHERE (T.flags & $7) = 0
       AND (S.tx_hash IS NULL OR (S.flags & $7) != 0)
       AND ($8 IS NULL OR KI.account_id = $8)`,
    [TxFlags.STATE_SETTLED, TxoFlags.COINBASE, coinbaseMaturity, localHeight,
      TxFlags.STATE_CLEARED, MASK_STATE_LOCAL, TxFlags.REMOVED, accountId ?? null]
  )
  const row = rows[0]
  return {
    confirmed: row?.confirmed ?? 0,
    unconfirmed: row?.unconfirmed ?? 0,
    unmatured: row?.unmatured ?? 0,
    allocated: row?.allocated ?? 0
  }
}

/**
 * Keys the indexer must keep watching for a transaction that is not yet
 * settled: the keys its owned outputs pay to and the keys of the owned
 * outputs its inputs spend.
 */
export async function readKeysForTransactionSubscriptions(
  db: SqlExecutor,
  accountId: number,
  txHash?: string
): Promise<KeySubscription[]> {
  const rows = await db.select<KeySubscriptionRow[]>(
    `SELECT * FROM (
       SELECT TXO.tx_hash AS tx_hash, 'output' AS kind, TXO.txo_index AS put_index,
              TXO.keyinstance_id AS keyinstance_id, TXO.script_hash AS script_hash
       FROM transaction_outputs TXO
       INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
       INNER JOIN transactions T ON T.tx_hash = TXO.tx_hash
       WHERE KI.account_id = $1 AND (T.flags & $2) = 0
       UNION ALL
       SELECT TXI.tx_hash AS tx_hash, 'input' AS kind, TXI.txi_index AS put_index,
              TXO.keyinstance_id AS keyinstance_id, TXO.script_hash AS script_hash
       FROM transaction_inputs TXI
       INNER JOIN transaction_outputs TXO
         ON TXO.tx_hash = TXI.spent_tx_hash AND TXO.txo_index = TXI.spent_txo_index
       INNER JOIN keyinstances KI ON KI.keyinstance_id = TXO.keyinstance_id
       INNER JOIN transactions T ON T.tx_hash = TXI.tx_hash
       WHERE KI.account_id = $1 AND (T.flags & $2) = 0
     )
     WHERE ($3 IS NULL OR tx_hash = $3)
     ORDER BY tx_hash, kind DESC, put_index`,
    [accountId, TxFlags.STATE_SETTLED | TxFlags.REMOVED, txHash ?? null]
  )
  return rows.map(row => ({
    txHash: row.tx_hash,
    kind: row.kind === 'input' ? 'input' : 'output',
    putIndex: row.put_index,
    keyinstanceId: row.keyinstance_id,
    scriptHash: row.script_hash
  }))
}
