/**
 * Master Key Repository
 *
 * Rows for key-derivation roots. The derivation data is opaque JSON owned
 * by the keystore layer.
 */

import type { MasterKeyDerivationType, MasterKeyRecord } from '../../domain/types'
import { DatabaseError } from '../../services/errors'
import type { SqlExecutor } from './connection'
import type { MasterKeyRow } from './row-types'

const DERIVATION_TYPES: readonly MasterKeyDerivationType[] = ['BIP32', 'ELECTRUM_OLD', 'HARDWARE', 'MULTISIG']

function toDerivationType(value: string): MasterKeyDerivationType {
  const match = DERIVATION_TYPES.find(type => type === value)
  if (!match) {
    throw new DatabaseError(`Unknown masterkey derivation type: ${value}`, 'readMasterKeys')
  }
  return match
}

function mapRow(row: MasterKeyRow): MasterKeyRecord {
  return {
    masterkeyId: row.masterkey_id,
    parentMasterkeyId: row.parent_masterkey_id,
    derivationType: toDerivationType(row.derivation_type),
    derivationData: row.derivation_data
  }
}

export async function createMasterKey(
  db: SqlExecutor,
  entry: Omit<MasterKeyRecord, 'masterkeyId'>
): Promise<MasterKeyRecord> {
  const now = Date.now()
  const result = await db.execute(
    `INSERT INTO masterkeys (parent_masterkey_id, derivation_type, derivation_data, date_created, date_updated)
     VALUES ($1, $2, $3, $4, $4)`,
    [entry.parentMasterkeyId, entry.derivationType, entry.derivationData, now]
  )
  return { ...entry, masterkeyId: result.lastInsertId }
}

export async function readMasterKeys(db: SqlExecutor): Promise<MasterKeyRecord[]> {
  const rows = await db.select<MasterKeyRow[]>(
    `SELECT masterkey_id, parent_masterkey_id, derivation_type, derivation_data
     FROM masterkeys ORDER BY masterkey_id`
  )
  return rows.map(mapRow)
}

export async function updateMasterKeyDerivationData(
  db: SqlExecutor,
  masterkeyId: number,
  derivationData: string
): Promise<void> {
  const result = await db.execute(
    'UPDATE masterkeys SET derivation_data = $1, date_updated = $2 WHERE masterkey_id = $3',
    [derivationData, Date.now(), masterkeyId]
  )
  if (result.rowsAffected !== 1) {
    throw new DatabaseError(`Masterkey ${masterkeyId} not found`, 'updateMasterKeyDerivationData')
  }
}
