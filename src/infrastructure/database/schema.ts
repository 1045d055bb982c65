/**
 * Ledger schema and migrations
 *
 * Each migration is a list of single statements applied in one transaction;
 * `PRAGMA user_version` records how far a database has been migrated.
 */

import type { SqlExecutor } from './connection'
import { dbLogger } from '../../services/logger'

const MIGRATION_1: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS masterkeys (
    masterkey_id INTEGER PRIMARY KEY,
    parent_masterkey_id INTEGER DEFAULT NULL REFERENCES masterkeys (masterkey_id),
    derivation_type TEXT NOT NULL,
    derivation_data TEXT NOT NULL,
    date_created INTEGER NOT NULL,
    date_updated INTEGER NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS accounts (
    account_id INTEGER PRIMARY KEY,
    default_masterkey_id INTEGER DEFAULT NULL REFERENCES masterkeys (masterkey_id),
    default_script_type TEXT NOT NULL,
    account_name TEXT NOT NULL,
    account_kind TEXT NOT NULL,
    date_created INTEGER NOT NULL,
    date_updated INTEGER NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS keyinstances (
    keyinstance_id INTEGER PRIMARY KEY,
    account_id INTEGER NOT NULL REFERENCES accounts (account_id),
    masterkey_id INTEGER DEFAULT NULL REFERENCES masterkeys (masterkey_id),
    derivation_type TEXT NOT NULL,
    derivation_path TEXT DEFAULT NULL,
    derivation_data TEXT DEFAULT NULL,
    script_type TEXT NOT NULL,
    flags INTEGER NOT NULL DEFAULT 0,
    description TEXT DEFAULT NULL,
    date_created INTEGER NOT NULL,
    date_updated INTEGER NOT NULL
  )`,

  `CREATE UNIQUE INDEX IF NOT EXISTS idx_keyinstances_path
    ON keyinstances (account_id, masterkey_id, derivation_path)
    WHERE derivation_path IS NOT NULL`,

  `CREATE TABLE IF NOT EXISTS keyinstance_scripts (
    keyinstance_id INTEGER NOT NULL REFERENCES keyinstances (keyinstance_id),
    script_type TEXT NOT NULL,
    script_hash TEXT NOT NULL,
    PRIMARY KEY (keyinstance_id, script_type)
  )`,

  `CREATE INDEX IF NOT EXISTS idx_keyinstance_scripts_hash ON keyinstance_scripts (script_hash)`,

  `CREATE TABLE IF NOT EXISTS keyinstance_watermarks (
    account_id INTEGER NOT NULL REFERENCES accounts (account_id),
    masterkey_id INTEGER NOT NULL REFERENCES masterkeys (masterkey_id),
    path_prefix TEXT NOT NULL,
    next_index INTEGER NOT NULL,
    PRIMARY KEY (account_id, masterkey_id, path_prefix)
  )`,

  `CREATE TABLE IF NOT EXISTS transactions (
    tx_hash TEXT PRIMARY KEY,
    tx_data TEXT NOT NULL,
    flags INTEGER NOT NULL,
    block_height INTEGER NOT NULL,
    block_position INTEGER DEFAULT NULL,
    block_hash TEXT DEFAULT NULL,
    fee_value INTEGER DEFAULT NULL,
    date_mined INTEGER DEFAULT NULL,
    proof_data TEXT DEFAULT NULL,
    description TEXT DEFAULT NULL,
    date_created INTEGER NOT NULL,
    date_updated INTEGER NOT NULL
  )`,

  `CREATE TABLE IF NOT EXISTS transaction_inputs (
    tx_hash TEXT NOT NULL REFERENCES transactions (tx_hash),
    txi_index INTEGER NOT NULL,
    spent_tx_hash TEXT NOT NULL,
    spent_txo_index INTEGER NOT NULL,
    PRIMARY KEY (tx_hash, txi_index)
  )`,

  `CREATE INDEX IF NOT EXISTS idx_transaction_inputs_spent
    ON transaction_inputs (spent_tx_hash, spent_txo_index)`,

  `CREATE TABLE IF NOT EXISTS transaction_outputs (
    tx_hash TEXT NOT NULL REFERENCES transactions (tx_hash),
    txo_index INTEGER NOT NULL,
    value INTEGER NOT NULL,
    script_type TEXT NOT NULL,
    script_hash TEXT NOT NULL,
    keyinstance_id INTEGER DEFAULT NULL REFERENCES keyinstances (keyinstance_id),
    flags INTEGER NOT NULL DEFAULT 0,
    spending_tx_hash TEXT DEFAULT NULL REFERENCES transactions (tx_hash),
    spending_txi_index INTEGER DEFAULT NULL,
    PRIMARY KEY (tx_hash, txo_index)
  )`,

  `CREATE INDEX IF NOT EXISTS idx_transaction_outputs_keyinstance
    ON transaction_outputs (keyinstance_id)`,

  `CREATE TABLE IF NOT EXISTS account_transactions (
    account_id INTEGER NOT NULL REFERENCES accounts (account_id),
    tx_hash TEXT NOT NULL REFERENCES transactions (tx_hash),
    date_created INTEGER NOT NULL,
    PRIMARY KEY (account_id, tx_hash)
  )`,
]

const MIGRATIONS: ReadonlyArray<readonly string[]> = [MIGRATION_1]

export const SCHEMA_VERSION = MIGRATIONS.length

/**
 * Bring a database up to {@link SCHEMA_VERSION}
 */
export async function migrate(scope: SqlExecutor): Promise<number> {
  const rows = await scope.select<{ user_version: number }[]>('PRAGMA user_version')
  const current = rows[0]?.user_version ?? 0

  for (let version = current; version < MIGRATIONS.length; version++) {
    for (const statement of MIGRATIONS[version] ?? []) {
      await scope.execute(statement)
    }
    dbLogger.info('Applied migration', { version: version + 1 })
  }

  if (current < MIGRATIONS.length) {
    await scope.execute(`PRAGMA user_version = ${MIGRATIONS.length}`)
  }
  return MIGRATIONS.length
}
