/**
 * Key Instance Repository
 *
 * Key instances, the scripts registered for them, and per-prefix
 * allocation watermarks. Key instances are never deleted.
 */

import { formatDerivationPath, isPathUnder, parseDerivationPath } from '../../domain/wallet/derivationPath'
import type { DerivationPath, KeyDerivationType, KeyInstance, ScriptType } from '../../domain/types'
import { KeyInstanceFlags, isOk, isScriptType } from '../../domain/types'
import { DatabaseError } from '../../services/errors'
import type { SqlExecutor } from './connection'
import type { KeyInstanceRow, KeyScriptMatchRow, WatermarkRow } from './row-types'

const KEY_DERIVATION_TYPES: readonly KeyDerivationType[] = [
  'BIP32_SUBPATH', 'ELECTRUM_OLD_SUBPATH', 'PRIVATE_KEY', 'PUBLIC_KEY_HASH'
]

const KEYINSTANCE_COLUMNS = `keyinstance_id, account_id, masterkey_id, derivation_type, derivation_path,
  derivation_data, script_type, flags, description`

export interface KeyScript {
  scriptType: ScriptType
  scriptHash: string
}

export interface NewKeyInstance {
  accountId: number
  masterkeyId: number | null
  derivationType: KeyDerivationType
  derivationPath: DerivationPath | null
  derivationData: string | null
  scriptType: ScriptType
  /** Every script this key can be paid to */
  scripts: KeyScript[]
}

function mapRow(row: KeyInstanceRow): KeyInstance {
  const derivationType = KEY_DERIVATION_TYPES.find(type => type === row.derivation_type)
  if (!derivationType) {
    throw new DatabaseError(`Unknown key derivation type: ${row.derivation_type}`, 'readKeyInstances')
  }
  if (!isScriptType(row.script_type)) {
    throw new DatabaseError(`Unknown script type: ${row.script_type}`, 'readKeyInstances')
  }

  let derivationPath: DerivationPath | null = null
  if (row.derivation_path !== null) {
    const parsed = parseDerivationPath(row.derivation_path)
    if (!isOk(parsed)) {
      throw new DatabaseError(parsed.error, 'readKeyInstances')
    }
    derivationPath = parsed.value
  }

  return {
    keyinstanceId: row.keyinstance_id,
    accountId: row.account_id,
    masterkeyId: row.masterkey_id,
    derivationType,
    derivationPath,
    derivationData: row.derivation_data,
    scriptType: row.script_type,
    flags: row.flags,
    description: row.description
  }
}

/**
 * Insert key instances and their scripts, in input order
 */
export async function createKeyInstances(db: SqlExecutor, entries: NewKeyInstance[]): Promise<KeyInstance[]> {
  return db.withTransaction(async scope => {
    const now = Date.now()
    const created: KeyInstance[] = []
    for (const entry of entries) {
      const derivationPath = entry.derivationPath === null ? null : formatDerivationPath(entry.derivationPath)
      const result = await scope.execute(
        `INSERT INTO keyinstances (account_id, masterkey_id, derivation_type, derivation_path, derivation_data,
           script_type, flags, description, date_created, date_updated)
         VALUES ($1, $2, $3, $4, $5, $6, $7, NULL, $8, $8)`,
        [entry.accountId, entry.masterkeyId, entry.derivationType, derivationPath, entry.derivationData,
          entry.scriptType, KeyInstanceFlags.ACTIVE, now]
      )
      const keyinstanceId = result.lastInsertId
      for (const script of entry.scripts) {
        await scope.execute(
          'INSERT INTO keyinstance_scripts (keyinstance_id, script_type, script_hash) VALUES ($1, $2, $3)',
          [keyinstanceId, script.scriptType, script.scriptHash]
        )
      }
      created.push({
        keyinstanceId,
        accountId: entry.accountId,
        masterkeyId: entry.masterkeyId,
        derivationType: entry.derivationType,
        derivationPath: entry.derivationPath,
        derivationData: entry.derivationData,
        scriptType: entry.scriptType,
        flags: KeyInstanceFlags.ACTIVE,
        description: null
      })
    }
    return created
  })
}

export async function readKeyInstance(db: SqlExecutor, keyinstanceId: number): Promise<KeyInstance | null> {
  const rows = await db.select<KeyInstanceRow[]>(
    `SELECT ${KEYINSTANCE_COLUMNS} FROM keyinstances WHERE keyinstance_id = $1`,
    [keyinstanceId]
  )
  const row = rows[0]
  return row ? mapRow(row) : null
}

export async function readAccountKeyInstances(db: SqlExecutor, accountId: number): Promise<KeyInstance[]> {
  const rows = await db.select<KeyInstanceRow[]>(
    `SELECT ${KEYINSTANCE_COLUMNS} FROM keyinstances WHERE account_id = $1 ORDER BY keyinstance_id`,
    [accountId]
  )
  return rows.map(mapRow)
}

/**
 * Unused keys directly under `prefix`, in creation order
 */
export async function readFreshKeyInstances(
  db: SqlExecutor,
  accountId: number,
  masterkeyId: number,
  prefix: DerivationPath,
  limit: number
): Promise<KeyInstance[]> {
  if (limit <= 0) return []
  const rows = await db.select<KeyInstanceRow[]>(
    `SELECT ${KEYINSTANCE_COLUMNS} FROM keyinstances
     WHERE account_id = $1 AND masterkey_id = $2 AND derivation_path LIKE $3
       AND (flags & $4) = 0 AND (flags & $5) != 0
     ORDER BY keyinstance_id`,
    [accountId, masterkeyId, `${formatDerivationPath(prefix)}/%`, KeyInstanceFlags.USED, KeyInstanceFlags.ACTIVE]
  )
  return rows
    .map(mapRow)
    .filter(key => key.derivationPath !== null && isPathUnder(key.derivationPath, prefix))
    .slice(0, limit)
}

/**
 * Next index to allocate under a prefix; 0 when nothing was allocated yet
 */
export async function readWatermark(
  db: SqlExecutor,
  accountId: number,
  masterkeyId: number,
  prefix: DerivationPath
): Promise<number> {
  const rows = await db.select<WatermarkRow[]>(
    `SELECT next_index FROM keyinstance_watermarks
     WHERE account_id = $1 AND masterkey_id = $2 AND path_prefix = $3`,
    [accountId, masterkeyId, formatDerivationPath(prefix)]
  )
  return rows[0]?.next_index ?? 0
}

export async function writeWatermark(
  db: SqlExecutor,
  accountId: number,
  masterkeyId: number,
  prefix: DerivationPath,
  nextIndex: number
): Promise<void> {
  await db.execute(
    `INSERT INTO keyinstance_watermarks (account_id, masterkey_id, path_prefix, next_index)
     VALUES ($1, $2, $3, $4)
     ON CONFLICT (account_id, masterkey_id, path_prefix) DO UPDATE SET next_index = excluded.next_index`,
    [accountId, masterkeyId, formatDerivationPath(prefix), nextIndex]
  )
}

/**
 * The key instance a script hash was registered for, if any
 */
export async function findKeyByScriptHash(db: SqlExecutor, scriptHash: string): Promise<KeyScriptMatchRow | null> {
  const rows = await db.select<KeyScriptMatchRow[]>(
    `SELECT KS.keyinstance_id, KI.account_id, KS.script_type
     FROM keyinstance_scripts KS
     INNER JOIN keyinstances KI ON KI.keyinstance_id = KS.keyinstance_id
     WHERE KS.script_hash = $1
     ORDER BY KS.keyinstance_id
     LIMIT 1`,
    [scriptHash]
  )
  return rows[0] ?? null
}

export async function setKeyInstanceDescription(
  db: SqlExecutor,
  keyinstanceId: number,
  description: string | null
): Promise<boolean> {
  const result = await db.execute(
    'UPDATE keyinstances SET description = $1, date_updated = $2 WHERE keyinstance_id = $3',
    [description, Date.now(), keyinstanceId]
  )
  return result.rowsAffected === 1
}

/**
 * OR flags into a key instance
 */
export async function addKeyInstanceFlags(db: SqlExecutor, keyinstanceId: number, flags: number): Promise<void> {
  await db.execute(
    `UPDATE keyinstances SET flags = flags | $1, date_updated = $2
     WHERE keyinstance_id = $3 AND (flags & $1) != $1`,
    [flags, Date.now(), keyinstanceId]
  )
}

export async function updateKeyInstanceDerivationData(
  db: SqlExecutor,
  keyinstanceId: number,
  derivationData: string
): Promise<void> {
  const result = await db.execute(
    'UPDATE keyinstances SET derivation_data = $1, date_updated = $2 WHERE keyinstance_id = $3',
    [derivationData, Date.now(), keyinstanceId]
  )
  if (result.rowsAffected !== 1) {
    throw new DatabaseError(`Key instance ${keyinstanceId} not found`, 'updateKeyInstanceDerivationData')
  }
}
