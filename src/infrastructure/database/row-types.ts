/**
 * Database Row Types for the wallet ledger
 *
 * These interfaces represent the raw database row structures returned from SQL queries.
 * They map directly to the database schema with snake_case column names.
 * Use these types with database.select<T[]>() to ensure type safety.
 */

export type { SqlParams } from './connection'

// ============================================
// Key Tables
// ============================================

export interface MasterKeyRow {
  masterkey_id: number
  parent_masterkey_id: number | null
  derivation_type: string
  derivation_data: string
}

export interface AccountRow {
  account_id: number
  default_masterkey_id: number | null
  default_script_type: string
  account_name: string
  account_kind: string
}

export interface KeyInstanceRow {
  keyinstance_id: number
  account_id: number
  masterkey_id: number | null
  derivation_type: string
  derivation_path: string | null
  derivation_data: string | null
  script_type: string
  flags: number
  description: string | null
}

/**
 * Key instance found by script hash
 */
export interface KeyScriptMatchRow {
  keyinstance_id: number
  account_id: number
  script_type: string
}

export interface WatermarkRow {
  next_index: number
}

// ============================================
// Transaction Tables
// ============================================

export interface TransactionFlagsRow {
  flags: number
}

export interface TransactionStateRow {
  flags: number
  fee_value: number | null
  block_hash: string | null
}

export interface TransactionMetadataRow {
  block_height: number
  block_position: number | null
  block_hash: string | null
  fee_value: number | null
  date_mined: number | null
}

export interface TransactionDataRow {
  tx_data: string
}

export interface TransactionHashRow {
  tx_hash: string
}

export interface TransactionHeightRow {
  tx_hash: string
  block_height: number
}

export interface TransactionOutputRow {
  tx_hash: string
  txo_index: number
  value: number
  script_type: string
  script_hash: string
  keyinstance_id: number | null
  flags: number
  spending_tx_hash: string | null
  spending_txi_index: number | null
}

export interface AccountTransactionOutputRow extends TransactionOutputRow {
  account_id: number
  keyinstance_id: number
}

export interface SpenderRow {
  txo_index: number
  spending_tx_hash: string
}

export interface RecordedSpendRow {
  tx_hash: string
  txi_index: number
}

export interface OutpointRow {
  tx_hash: string
  txo_index: number
}

export interface KeyLinkRow {
  account_id: number
  keyinstance_id: number
}

export interface OutputOwnerRow {
  keyinstance_id: number | null
  account_id: number | null
  spending_tx_hash: string | null
  spending_txi_index: number | null
}

export interface TransactionValueRow {
  account_id: number
  total: number
}

export interface KeySubscriptionRow {
  tx_hash: string
  kind: string
  put_index: number
  keyinstance_id: number
  script_hash: string
}

export interface BalanceRow {
  confirmed: number
  unconfirmed: number
  unmatured: number
  allocated: number
}
