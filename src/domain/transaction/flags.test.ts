import { describe, it, expect } from 'vitest'
import {
  TxFlags,
  MASK_STATE,
  MASK_STATE_LOCAL,
  getTransactionState,
  isRemoved,
  isSettled,
  isValidImportState,
  withState,
  describeFlags
} from './flags'

describe('transaction flags', () => {
  it('should keep the state bits where stored rows expect them', () => {
    expect(TxFlags.STATE_SETTLED).toBe(0x100000)
    expect(TxFlags.STATE_CLEARED).toBe(0x200000)
    expect(TxFlags.STATE_RECEIVED).toBe(0x400000)
    expect(TxFlags.STATE_SIGNED).toBe(0x800000)
    expect(TxFlags.STATE_DISPATCHED).toBe(0x1000000)
    expect(TxFlags.REMOVED).toBe(0x40000000)
  })

  it('should not include REMOVED in the state mask', () => {
    expect(MASK_STATE & TxFlags.REMOVED).toBe(0)
  })

  it('should treat only local states as local', () => {
    expect(MASK_STATE_LOCAL & TxFlags.STATE_SIGNED).not.toBe(0)
    expect(MASK_STATE_LOCAL & TxFlags.STATE_CLEARED).toBe(0)
    expect(MASK_STATE_LOCAL & TxFlags.STATE_SETTLED).toBe(0)
  })

  describe('getTransactionState', () => {
    it('should name each state', () => {
      expect(getTransactionState(TxFlags.STATE_SETTLED)).toBe('settled')
      expect(getTransactionState(TxFlags.STATE_CLEARED)).toBe('cleared')
      expect(getTransactionState(TxFlags.STATE_RECEIVED)).toBe('received')
      expect(getTransactionState(TxFlags.STATE_SIGNED)).toBe('signed')
      expect(getTransactionState(TxFlags.STATE_DISPATCHED)).toBe('dispatched')
    })

    it('should report unset when no state bit is present', () => {
      expect(getTransactionState(TxFlags.UNSET)).toBe('unset')
      expect(getTransactionState(TxFlags.REMOVED)).toBe('unset')
    })

    it('should see through the REMOVED bit', () => {
      expect(getTransactionState(TxFlags.STATE_CLEARED | TxFlags.REMOVED)).toBe('cleared')
    })
  })

  it('should detect removal and settlement', () => {
    expect(isRemoved(TxFlags.STATE_SIGNED | TxFlags.REMOVED)).toBe(true)
    expect(isRemoved(TxFlags.STATE_SIGNED)).toBe(false)
    expect(isSettled(TxFlags.STATE_SETTLED)).toBe(true)
    expect(isSettled(TxFlags.STATE_CLEARED)).toBe(false)
  })

  describe('isValidImportState', () => {
    it('should accept a single state', () => {
      expect(isValidImportState(TxFlags.STATE_SIGNED)).toBe(true)
      expect(isValidImportState(TxFlags.STATE_SETTLED)).toBe(true)
    })

    it('should reject no state', () => {
      expect(isValidImportState(TxFlags.UNSET)).toBe(false)
    })

    it('should reject two states at once', () => {
      expect(isValidImportState(TxFlags.STATE_SIGNED | TxFlags.STATE_CLEARED)).toBe(false)
    })

    it('should reject non-state bits', () => {
      expect(isValidImportState(TxFlags.STATE_CLEARED | TxFlags.REMOVED)).toBe(false)
      expect(isValidImportState(TxFlags.STATE_CLEARED | 1)).toBe(false)
    })
  })

  it('should replace the state while keeping other bits', () => {
    const flags = TxFlags.STATE_CLEARED | TxFlags.REMOVED
    expect(withState(flags, TxFlags.STATE_SETTLED)).toBe(TxFlags.STATE_SETTLED | TxFlags.REMOVED)
  })

  it('should describe flags for logs', () => {
    expect(describeFlags(TxFlags.STATE_SIGNED | TxFlags.REMOVED)).toBe('signed|removed')
    expect(describeFlags(TxFlags.STATE_CLEARED)).toBe('cleared')
    expect(describeFlags(0)).toBe('unset')
  })
})
