/**
 * Indexer Bridge
 *
 * Routes a chain indexer's push notifications into the wallet ledger and
 * publishes back the keys the indexer should watch. Notifications are
 * handled one at a time, in arrival order.
 */

import type { Transaction } from '@bsv/sdk'
import { TxFlags } from '../../domain/transaction/flags'
import type { BlockHeaderInfo, ImportOutcome, MissingTransactionEntry, KeySubscription } from '../../domain/types'
import { AsyncMutex, CancellationController, isCancellationError } from '../cancellation'
import type { TaskHandle } from '../cancellation'
import { syncLogger } from '../logger'
import type { Wallet } from '../wallet/core'

export type IndexerEvent =
  | { type: 'transaction'; tx: Transaction | string | number[] }
  | {
    type: 'proof'
    txHash: string
    blockHeight: number
    header: BlockHeaderInfo
    blockPosition: number
    proofIndex: number
    proofHashes: string[]
  }
  | { type: 'missing'; txHash: string; entry: MissingTransactionEntry }
  | { type: 'reorg'; height: number }
  | { type: 'tip'; height: number }

/**
 * The remote indexing service, as the bridge sees it
 */
export interface ChainIndexer {
  /** Returns an unsubscribe function */
  subscribe(listener: (event: IndexerEvent) => void): () => void
  /** Replace the watched keys for an account */
  watchKeys(accountId: number, subscriptions: KeySubscription[]): Promise<void>
}

export interface IndexerBridgeOptions {
  /** Called with every notification that failed to apply */
  onError?: (error: unknown, event: IndexerEvent) => void
}

export class IndexerBridge {
  // Account sync lock: one notification at a time
  private readonly syncLock = new AsyncMutex()
  private readonly inFlight = new Set<Promise<void>>()
  private controller = new CancellationController()
  private currentImport: TaskHandle<ImportOutcome> | null = null
  private unsubscribe: (() => void) | null = null
  private tipHeight = 0

  constructor(
    private readonly wallet: Wallet,
    private readonly indexer: ChainIndexer,
    private readonly options: IndexerBridgeOptions = {}
  ) {}

  /** Highest block the indexer has reported */
  get localHeight(): number {
    return this.tipHeight
  }

  get isRunning(): boolean {
    return this.unsubscribe !== null
  }

  /**
   * Subscribe to the indexer and publish every account's watched keys
   */
  async start(): Promise<void> {
    if (this.unsubscribe) return
    this.controller = new CancellationController()
    this.unsubscribe = this.indexer.subscribe(event => this.enqueue(event))
    for (const account of this.wallet.getAccounts()) {
      await this.publish(account.accountId)
    }
    syncLogger.info('Indexer bridge started', { accounts: this.wallet.getAccounts().length })
  }

  /**
   * Stop listening, cancel the import in progress and wait for queued work
   */
  async stop(): Promise<void> {
    if (!this.unsubscribe) return
    this.unsubscribe()
    this.unsubscribe = null
    this.controller.cancel()
    this.currentImport?.cancel()
    await this.idle()
    syncLogger.info('Indexer bridge stopped')
  }

  /**
   * Resolves once every notification received so far is handled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  private enqueue(event: IndexerEvent): void {
    const work = this.syncLock.run(() => this.apply(event)).catch((error: unknown) => {
      if (isCancellationError(error)) {
        syncLogger.info('Indexer notification cancelled', { type: event.type })
        return
      }
      syncLogger.error('Failed to apply indexer notification', error, { type: event.type })
      this.options.onError?.(error, event)
    })
    this.inFlight.add(work)
    void work.finally(() => this.inFlight.delete(work))
  }

  private async apply(event: IndexerEvent): Promise<void> {
    this.controller.token.throwIfCancelled()

    switch (event.type) {
      case 'transaction': {
        this.currentImport = this.wallet.importTransaction(event.tx, TxFlags.STATE_CLEARED)
        try {
          const outcome = await this.currentImport
          for (const accountId of outcome.linkState.accountIds) {
            await this.publish(accountId)
          }
        } finally {
          this.currentImport = null
        }
        return
      }

      case 'proof': {
        const touched = await this.wallet.getTransactionValues(event.txHash)
        await this.wallet.addTransactionProof(
          event.txHash,
          event.blockHeight,
          event.header,
          event.blockPosition,
          event.proofIndex,
          event.proofHashes
        )
        for (const value of touched) {
          await this.publish(value.accountId)
        }
        return
      }

      case 'missing':
        this.wallet.addMissingTransaction(event.txHash, event.entry)
        return

      case 'reorg': {
        const reverted = await this.wallet.undoVerifications(event.height)
        this.tipHeight = Math.min(this.tipHeight, event.height - 1)
        if (reverted.length > 0) {
          for (const account of this.wallet.getAccounts()) {
            await this.publish(account.accountId)
          }
        }
        return
      }

      case 'tip':
        this.tipHeight = Math.max(this.tipHeight, event.height)
        return
    }
  }

  private async publish(accountId: number): Promise<void> {
    const subscriptions = await this.wallet.getKeysForTransactionSubscriptions(accountId)
    await this.indexer.watchKeys(accountId, subscriptions)
  }
}
