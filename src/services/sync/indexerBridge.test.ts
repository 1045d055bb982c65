import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Transaction } from '@bsv/sdk'
import { IndexerBridge } from './indexerBridge'
import type { IndexerEvent } from './indexerBridge'
import { Wallet } from '../wallet/core'
import { TxFlags } from '../../domain/transaction/flags'
import { transactionHash } from '../../domain/transaction/parsing'
import { TransactionNotFoundError } from '../errors'
import { FakeIndexer, TEST_ITERATIONS, createFundingTransaction, createTestKeystore } from '../../test/factories'

describe('IndexerBridge', () => {
  let wallet: Wallet
  let indexer: FakeIndexer
  let accountId: number
  let keyinstanceId: number

  function proofEvent(txHash: string, blockHeight: number): IndexerEvent {
    return {
      type: 'proof',
      txHash,
      blockHeight,
      header: { timestamp: 1700000000, hash: `block-${blockHeight}` },
      blockPosition: 1,
      proofIndex: 1,
      proofHashes: ['aa']
    }
  }

  async function fundingFor(satoshis: number, label?: string): Promise<Transaction> {
    return createFundingTransaction([{ lockingScript: await wallet.getScript(keyinstanceId), satoshis }], label)
  }

  beforeEach(async () => {
    wallet = await Wallet.open({ databasePath: null, kdfIterations: TEST_ITERATIONS })
    const account = await wallet.createAccountFromKeystore(await createTestKeystore())
    accountId = account.accountId
    const [key] = await wallet.getFreshKeys(accountId, [0], 1)
    keyinstanceId = key?.keyinstanceId ?? -1
    indexer = new FakeIndexer()
  })

  afterEach(async () => {
    await wallet.close()
  })

  it('should publish every account when started', async () => {
    const bridge = new IndexerBridge(wallet, indexer)

    await bridge.start()
    await bridge.start()

    expect(bridge.isRunning).toBe(true)
    expect(indexer.listenerCount).toBe(1)
    expect(indexer.watched.get(accountId)).toEqual([])
    await bridge.stop()
  })

  it('should import pushed transactions and watch their keys', async () => {
    const bridge = new IndexerBridge(wallet, indexer)
    await bridge.start()
    const funding = await fundingFor(2500)
    const txHash = transactionHash(funding)

    indexer.push({ type: 'transaction', tx: funding.toHex() })
    await bridge.idle()

    expect(await wallet.getTransactionFlags(txHash)).toBe(TxFlags.STATE_CLEARED)
    expect(indexer.watched.get(accountId)?.map(entry => [entry.txHash, entry.kind, entry.keyinstanceId]))
      .toEqual([[txHash, 'output', keyinstanceId]])
    await bridge.stop()
  })

  it('should settle on a proof and unsettle on a reorg', async () => {
    const bridge = new IndexerBridge(wallet, indexer)
    await bridge.start()
    const funding = await fundingFor(2500)
    const txHash = transactionHash(funding)

    indexer.push({ type: 'transaction', tx: funding })
    indexer.push({ type: 'tip', height: 1005 })
    indexer.push(proofEvent(txHash, 1000))
    await bridge.idle()

    expect(bridge.localHeight).toBe(1005)
    expect(await wallet.getTransactionFlags(txHash)).toBe(TxFlags.STATE_SETTLED)
    expect(indexer.watched.get(accountId)).toEqual([])

    indexer.push({ type: 'reorg', height: 1000 })
    await bridge.idle()

    expect(bridge.localHeight).toBe(999)
    expect(await wallet.getTransactionFlags(txHash)).toBe(TxFlags.STATE_CLEARED)
    expect(indexer.watched.get(accountId)).toHaveLength(1)
    await bridge.stop()
  })

  it('should apply notifications in arrival order', async () => {
    const bridge = new IndexerBridge(wallet, indexer)
    await bridge.start()
    const funding = await fundingFor(900, 'ordered')
    const txHash = transactionHash(funding)

    indexer.push({
      type: 'missing',
      txHash,
      entry: { blockHash: 'block-800', blockHeight: 800, feeValue: 50, importFlags: TxFlags.STATE_CLEARED }
    })
    indexer.push({ type: 'transaction', tx: funding.toBinary() })
    await bridge.idle()

    expect((await wallet.getTransactionMetadata(txHash))?.blockHeight).toBe(800)
    expect(wallet.getMissingTransactions().size).toBe(0)
    await bridge.stop()
  })

  it('should report failed notifications and keep going', async () => {
    const onError = vi.fn()
    const bridge = new IndexerBridge(wallet, indexer, { onError })
    await bridge.start()
    const funding = await fundingFor(1200)

    const failing = proofEvent('ee'.repeat(32), 1000)
    indexer.push(failing)
    indexer.push({ type: 'transaction', tx: funding })
    await bridge.idle()

    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(TransactionNotFoundError)
    expect(onError.mock.calls[0]?.[1]).toBe(failing)
    expect(await wallet.getTransactionFlags(transactionHash(funding))).toBe(TxFlags.STATE_CLEARED)
    await bridge.stop()
  })

  it('should stop listening when stopped', async () => {
    const bridge = new IndexerBridge(wallet, indexer)
    await bridge.start()
    await bridge.stop()
    const funding = await fundingFor(1200)

    indexer.push({ type: 'transaction', tx: funding })
    await bridge.idle()

    expect(bridge.isRunning).toBe(false)
    expect(indexer.listenerCount).toBe(0)
    expect(await wallet.getTransactionFlags(transactionHash(funding))).toBeNull()
  })
})
