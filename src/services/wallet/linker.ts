/**
 * Transaction Linker
 *
 * Records a transaction's inputs and outputs and ties them to wallet keys.
 * Everything for one transaction happens in a single write unit, so a
 * failed or cancelled import leaves no trace.
 */

import type { ParsedTransaction } from '../../domain/transaction/parsing'
import { MASK_STATE_LOCAL, isRemoved, isValidImportState } from '../../domain/transaction/flags'
import type { ImportOutcome, MissingTransactionEntry, TransactionLinkState } from '../../domain/types'
import { BlockHeight, KeyInstanceFlags, TxoFlags } from '../../domain/types'
import type { SqlExecutor } from '../../infrastructure/database'
import {
  addKeyInstanceFlags,
  clearSpendsBy,
  findKeyByScriptHash,
  insertTransaction,
  insertTransactionInput,
  linkAccountTransaction,
  markTransactionRemoved,
  readLiveSpenders,
  readOutputOwner,
  readRecordedSpends,
  readTransactionFlags,
  readTransactionKeyLinks,
  restoreTransaction,
  setOutputSpender,
  unlinkAccountTransactions,
  upsertTransactionOutput
} from '../../infrastructure/database'
import type { CancellationToken } from '../cancellation'
import {
  InvalidTransactionStateError,
  TransactionNotFoundError,
  TransactionRemovalError
} from '../errors'
import { linkLogger } from '../logger'

export interface LinkRequest {
  parsed: ParsedTransaction
  /** Exactly one STATE_* flag */
  flags: number
  /** Block metadata learned before the body arrived */
  missing?: MissingTransactionEntry
  linkState: TransactionLinkState
  token: CancellationToken
}

function initialHeight(flags: number, missing: MissingTransactionEntry | undefined): number {
  if (missing) return missing.blockHeight
  return (flags & MASK_STATE_LOCAL) !== 0 ? BlockHeight.LOCAL : BlockHeight.MEMPOOL
}

async function noteKey(
  scope: SqlExecutor,
  linkState: TransactionLinkState,
  accountId: number,
  keyinstanceId: number
): Promise<void> {
  linkState.accountIds.add(accountId)
  if (!linkState.keyinstanceIds.has(keyinstanceId)) {
    linkState.keyinstanceIds.add(keyinstanceId)
    await addKeyInstanceFlags(scope, keyinstanceId, KeyInstanceFlags.USED)
  }
}

async function linkInputs(scope: SqlExecutor, request: LinkRequest): Promise<void> {
  const { parsed, linkState } = request
  for (const input of parsed.inputs) {
    await insertTransactionInput(scope, {
      txHash: parsed.txHash,
      txiIndex: input.txiIndex,
      spentTxHash: input.spentTxHash,
      spentTxoIndex: input.spentTxoIndex
    })

    const owner = await readOutputOwner(scope, input.spentTxHash, input.spentTxoIndex)
    if (!owner) continue

    if (owner.spending_tx_hash !== null && owner.spending_tx_hash !== parsed.txHash) {
      const spenderFlags = await readTransactionFlags(scope, owner.spending_tx_hash)
      if (spenderFlags !== null && !isRemoved(spenderFlags)) {
        linkLogger.warn('Double spend, replacing the recorded spender', {
          outpoint: `${input.spentTxHash}:${input.spentTxoIndex}`,
          previous: owner.spending_tx_hash,
          replacement: parsed.txHash
        })
      }
    }
    await setOutputSpender(scope, input.spentTxHash, input.spentTxoIndex, parsed.txHash, input.txiIndex)

    if (owner.keyinstance_id !== null && owner.account_id !== null) {
      await noteKey(scope, linkState, owner.account_id, owner.keyinstance_id)
    }
  }
}

async function linkOutputs(scope: SqlExecutor, request: LinkRequest): Promise<void> {
  const { parsed, linkState } = request
  const outputFlags = parsed.isCoinbase ? TxoFlags.COINBASE : TxoFlags.NONE

  for (const output of parsed.outputs) {
    const match = await findKeyByScriptHash(scope, output.scriptHash)
    await upsertTransactionOutput(scope, {
      txHash: parsed.txHash,
      txoIndex: output.txoIndex,
      value: output.value,
      scriptType: output.scriptType,
      scriptHash: output.scriptHash,
      keyinstanceId: match?.keyinstance_id ?? null,
      flags: outputFlags
    })

    // Ownership is set once; a restored transaction keeps what it had
    const owner = await readOutputOwner(scope, parsed.txHash, output.txoIndex)
    const ownerAccountId = owner?.account_id ?? null
    if (owner && owner.keyinstance_id !== null && ownerAccountId !== null) {
      await noteKey(scope, linkState, ownerAccountId, owner.keyinstance_id)
    }

    // Children imported before this transaction already spend the output
    const spends = await readRecordedSpends(scope, parsed.txHash, output.txoIndex)
    const latest = spends[spends.length - 1]
    if (!latest) continue
    if (spends.length > 1) {
      linkLogger.warn('Double spend recorded before its parent arrived', {
        outpoint: `${parsed.txHash}:${output.txoIndex}`,
        spenders: spends.map(spend => spend.tx_hash),
        kept: latest.tx_hash
      })
    }
    await setOutputSpender(scope, parsed.txHash, output.txoIndex, latest.tx_hash, latest.txi_index)
    if (ownerAccountId !== null) {
      await linkAccountTransaction(scope, ownerAccountId, latest.tx_hash)
    }
  }
}

/**
 * Import a transaction and link it to the wallet's keys.
 *
 * Importing a hash that is already live changes nothing and reports
 * `inserted: false`, with `linkState` filled from the stored links. A
 * removed transaction is brought back with the new state. Cancellation is
 * honoured until the write unit commits.
 */
export async function linkTransaction(db: SqlExecutor, request: LinkRequest): Promise<ImportOutcome> {
  const { parsed, flags, missing, linkState, token } = request
  if (!isValidImportState(flags)) {
    throw new InvalidTransactionStateError(parsed.txHash, flags, 'import')
  }

  return db.withTransaction(async scope => {
    const existing = await readTransactionFlags(scope, parsed.txHash)
    if (existing !== null && !isRemoved(existing)) {
      for (const link of await readTransactionKeyLinks(scope, parsed.txHash)) {
        linkState.accountIds.add(link.account_id)
        linkState.keyinstanceIds.add(link.keyinstance_id)
      }
      linkLogger.debug('Transaction already imported', { txHash: parsed.txHash })
      return { txHash: parsed.txHash, inserted: false, linkState }
    }

    const row = {
      txHash: parsed.txHash,
      rawHex: parsed.rawHex,
      flags,
      blockHeight: initialHeight(flags, missing),
      blockHash: missing?.blockHash ?? null,
      feeValue: missing?.feeValue ?? null
    }
    if (existing === null) {
      await insertTransaction(scope, row)
    } else {
      await restoreTransaction(scope, row)
    }

    await linkInputs(scope, request)
    await linkOutputs(scope, request)
    for (const accountId of linkState.accountIds) {
      await linkAccountTransaction(scope, accountId, parsed.txHash)
    }

    token.throwIfCancelled()
    linkLogger.info('Imported transaction', {
      txHash: parsed.txHash,
      accounts: [...linkState.accountIds],
      restored: existing !== null
    })
    return { txHash: parsed.txHash, inserted: true, linkState }
  })
}

/**
 * Soft delete a transaction. Its outputs keep their owners, but spends it
 * made are released and it no longer belongs to any account.
 *
 * @throws TransactionRemovalError when a live transaction spends one of its outputs
 */
export async function unlinkTransaction(db: SqlExecutor, txHash: string): Promise<void> {
  await db.withTransaction(async scope => {
    const flags = await readTransactionFlags(scope, txHash)
    if (flags === null) {
      throw new TransactionNotFoundError(txHash)
    }
    if (isRemoved(flags)) {
      throw new InvalidTransactionStateError(txHash, flags, 'remove')
    }

    const spenders = await readLiveSpenders(scope, txHash)
    if (spenders.length > 0) {
      throw new TransactionRemovalError(txHash, [...new Set(spenders.map(row => row.spending_tx_hash))])
    }

    await markTransactionRemoved(scope, txHash)
    const unlinked = await unlinkAccountTransactions(scope, txHash)
    const released = await clearSpendsBy(scope, txHash)
    linkLogger.info('Removed transaction', { txHash, accounts: unlinked, releasedOutputs: released })
  })
}
