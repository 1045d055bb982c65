/**
 * Transaction state flags
 *
 * A transaction carries exactly one STATE_* bit while live. REMOVED is a
 * soft delete layered on top: the state bit it had stays set so a removal
 * can be inspected afterwards.
 *
 * @module domain/transaction/flags
 */

export const TxFlags = {
  UNSET: 0,

  /** Mined, with a proof */
  STATE_SETTLED: 1 << 20,
  /** Broadcast and seen in the mempool */
  STATE_CLEARED: 1 << 21,
  /** Received from another party, not yet broadcast */
  STATE_RECEIVED: 1 << 22,
  /** Signed locally, not yet broadcast */
  STATE_SIGNED: 1 << 23,
  /** Handed to a broadcaster, not yet seen */
  STATE_DISPATCHED: 1 << 24,

  /** Soft deleted */
  REMOVED: 1 << 30,
} as const

export const MASK_STATE =
  TxFlags.STATE_SETTLED |
  TxFlags.STATE_CLEARED |
  TxFlags.STATE_RECEIVED |
  TxFlags.STATE_SIGNED |
  TxFlags.STATE_DISPATCHED

/** States that only this wallet knows about */
export const MASK_STATE_LOCAL =
  TxFlags.STATE_RECEIVED |
  TxFlags.STATE_SIGNED |
  TxFlags.STATE_DISPATCHED

export type TransactionState =
  | 'settled'
  | 'cleared'
  | 'received'
  | 'signed'
  | 'dispatched'
  | 'unset'

const STATE_NAMES: ReadonlyArray<[number, TransactionState]> = [
  [TxFlags.STATE_SETTLED, 'settled'],
  [TxFlags.STATE_CLEARED, 'cleared'],
  [TxFlags.STATE_RECEIVED, 'received'],
  [TxFlags.STATE_SIGNED, 'signed'],
  [TxFlags.STATE_DISPATCHED, 'dispatched'],
]

export function getTransactionState(flags: number): TransactionState {
  for (const [bit, name] of STATE_NAMES) {
    if ((flags & bit) !== 0) return name
  }
  return 'unset'
}

export function isRemoved(flags: number): boolean {
  return (flags & TxFlags.REMOVED) !== 0
}

export function isSettled(flags: number): boolean {
  return (flags & TxFlags.STATE_SETTLED) !== 0
}

/**
 * An import must name exactly one state and nothing else
 */
export function isValidImportState(flags: number): boolean {
  if ((flags & ~MASK_STATE) !== 0) return false
  const state = flags & MASK_STATE
  return state !== 0 && (state & (state - 1)) === 0
}

/**
 * Replace the state bit, keeping any other flags
 */
export function withState(flags: number, state: number): number {
  return (flags & ~MASK_STATE) | state
}

/**
 * Human-readable flag list, e.g. `"signed|removed"`
 */
export function describeFlags(flags: number): string {
  const parts: string[] = []
  const state = getTransactionState(flags)
  if (state !== 'unset') parts.push(state)
  if (isRemoved(flags)) parts.push('removed')
  return parts.length > 0 ? parts.join('|') : 'unset'
}
