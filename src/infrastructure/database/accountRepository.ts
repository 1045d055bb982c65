/**
 * Account Repository
 *
 * CRUD operations for account rows. Accounts are never deleted.
 */

import type { AccountKind, AccountRecord } from '../../domain/types'
import { isScriptType } from '../../domain/types'
import { DatabaseError } from '../../services/errors'
import type { SqlExecutor } from './connection'
import type { AccountRow } from './row-types'

const ACCOUNT_KINDS: readonly AccountKind[] = [
  'standard', 'imported_privkey', 'imported_address', 'multisig', 'hardware'
]

function mapRow(row: AccountRow): AccountRecord {
  const kind = ACCOUNT_KINDS.find(value => value === row.account_kind)
  if (!kind) {
    throw new DatabaseError(`Unknown account kind: ${row.account_kind}`, 'readAccounts')
  }
  if (!isScriptType(row.default_script_type)) {
    throw new DatabaseError(`Unknown script type: ${row.default_script_type}`, 'readAccounts')
  }
  return {
    accountId: row.account_id,
    kind,
    defaultMasterkeyId: row.default_masterkey_id,
    defaultScriptType: row.default_script_type,
    accountName: row.account_name
  }
}

const ACCOUNT_COLUMNS = 'account_id, default_masterkey_id, default_script_type, account_name, account_kind'

/**
 * Insert accounts, returning them with their assigned ids in input order
 */
export async function createAccounts(
  db: SqlExecutor,
  entries: Omit<AccountRecord, 'accountId'>[]
): Promise<AccountRecord[]> {
  return db.withTransaction(async scope => {
    const now = Date.now()
    const created: AccountRecord[] = []
    for (const entry of entries) {
      const result = await scope.execute(
        `INSERT INTO accounts (default_masterkey_id, default_script_type, account_name, account_kind, date_created, date_updated)
         VALUES ($1, $2, $3, $4, $5, $5)`,
        [entry.defaultMasterkeyId, entry.defaultScriptType, entry.accountName, entry.kind, now]
      )
      created.push({ ...entry, accountId: result.lastInsertId })
    }
    return created
  })
}

export async function readAccounts(db: SqlExecutor): Promise<AccountRecord[]> {
  const rows = await db.select<AccountRow[]>(
    `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY account_id`
  )
  return rows.map(mapRow)
}

export async function readAccount(db: SqlExecutor, accountId: number): Promise<AccountRecord | null> {
  const rows = await db.select<AccountRow[]>(
    `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE account_id = $1`,
    [accountId]
  )
  const row = rows[0]
  return row ? mapRow(row) : null
}

export async function updateAccountName(db: SqlExecutor, accountId: number, name: string): Promise<boolean> {
  const result = await db.execute(
    'UPDATE accounts SET account_name = $1, date_updated = $2 WHERE account_id = $3',
    [name, Date.now(), accountId]
  )
  return result.rowsAffected === 1
}
