import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { WalletDatabase } from './connection'
import { SCHEMA_VERSION } from './schema'
import { DatabaseError } from '../../services/errors'

interface NameRow {
  name: string
}

const now = 1700000000

async function insertAccount(db: WalletDatabase, name: string): Promise<number> {
  const result = await db.execute(
    `INSERT INTO accounts (default_masterkey_id, default_script_type, account_name, account_kind, date_created, date_updated)
     VALUES (NULL, 'P2PKH', $1, 'imported_address', $2, $2)`,
    [name, now]
  )
  return result.lastInsertId
}

async function accountNames(db: WalletDatabase): Promise<string[]> {
  const rows = await db.select<NameRow[]>('SELECT account_name AS name FROM accounts ORDER BY account_id')
  return rows.map(row => row.name)
}

describe('WalletDatabase', () => {
  let db: WalletDatabase

  beforeEach(async () => {
    db = await WalletDatabase.open()
  })

  afterEach(async () => {
    await db.close()
  })

  it('should migrate a new database to the current schema version', async () => {
    const rows = await db.select<{ user_version: number }[]>('PRAGMA user_version')
    expect(rows[0]?.user_version).toBe(SCHEMA_VERSION)
  })

  it('should report rows affected and the inserted id', async () => {
    const first = await insertAccount(db, 'first')
    const second = await insertAccount(db, 'second')
    expect(second).toBe(first + 1)

    const update = await db.execute('UPDATE accounts SET account_name = $1', ['renamed'])
    expect(update.rowsAffected).toBe(2)
  })

  it('should commit a successful transaction', async () => {
    await db.withTransaction(async scope => {
      await scope.execute(
        `INSERT INTO accounts (default_script_type, account_name, account_kind, date_created, date_updated)
         VALUES ('P2PKH', 'inside', 'imported_address', $1, $1)`,
        [now]
      )
    })
    expect(await accountNames(db)).toEqual(['inside'])
  })

  it('should roll back everything when a transaction throws', async () => {
    await expect(db.withTransaction(async scope => {
      await scope.execute(
        `INSERT INTO accounts (default_script_type, account_name, account_kind, date_created, date_updated)
         VALUES ('P2PKH', 'lost', 'imported_address', $1, $1)`,
        [now]
      )
      throw new Error('abort')
    })).rejects.toThrow('abort')

    expect(await accountNames(db)).toEqual([])
  })

  it('should roll back only the failed savepoint in a nested transaction', async () => {
    await db.withTransaction(async scope => {
      await scope.execute(
        `INSERT INTO accounts (default_script_type, account_name, account_kind, date_created, date_updated)
         VALUES ('P2PKH', 'outer', 'imported_address', $1, $1)`,
        [now]
      )
      await expect(scope.withTransaction(async inner => {
        await inner.execute(
          `INSERT INTO accounts (default_script_type, account_name, account_kind, date_created, date_updated)
           VALUES ('P2PKH', 'inner', 'imported_address', $1, $1)`,
          [now]
        )
        throw new Error('inner failure')
      })).rejects.toThrow('inner failure')
    })

    expect(await accountNames(db)).toEqual(['outer'])
  })

  it('should serialize concurrent transactions', async () => {
    const order: string[] = []
    await Promise.all([
      db.withTransaction(async () => {
        order.push('a:start')
        await new Promise(resolve => setTimeout(resolve, 10))
        order.push('a:end')
      }),
      db.withTransaction(async () => {
        order.push('b:start')
        order.push('b:end')
      })
    ])
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
  })

  it('should wrap SQL errors in DatabaseError', async () => {
    await expect(db.select('SELECT * FROM no_such_table')).rejects.toBeInstanceOf(DatabaseError)
    await expect(db.execute('INSERT INTO accounts (account_name) VALUES ($1)', ['x']))
      .rejects.toBeInstanceOf(DatabaseError)
  })

  it('should enforce foreign keys', async () => {
    await expect(db.execute(
      `INSERT INTO keyinstances (account_id, derivation_type, script_type, date_created, date_updated)
       VALUES (999, 'PUBLIC_KEY_HASH', 'P2PKH', $1, $1)`,
      [now]
    )).rejects.toThrow(DatabaseError)
  })

  it('should keep foreign keys on after an export', async () => {
    db.export()
    await expect(db.execute(
      `INSERT INTO keyinstances (account_id, derivation_type, script_type, date_created, date_updated)
       VALUES (999, 'PUBLIC_KEY_HASH', 'P2PKH', $1, $1)`,
      [now]
    )).rejects.toThrow(DatabaseError)
  })

  it('should refuse queries once closed', async () => {
    const other = await WalletDatabase.open()
    await other.close()
    await expect(other.select('SELECT 1')).rejects.toThrow('Database is closed')
  })

  it('should start from serialized data', async () => {
    await insertAccount(db, 'carried')
    const copy = await WalletDatabase.open({ data: db.export() })
    expect(await accountNames(copy)).toEqual(['carried'])
    await copy.close()
  })
})

describe('WalletDatabase on disk', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-db-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should flush committed transactions and reload them', async () => {
    const path = join(dir, 'wallet.sqlite')
    const db = await WalletDatabase.open({ path })
    await insertAccount(db, 'persisted')
    await db.close()

    const reopened = await WalletDatabase.open({ path })
    expect(await accountNames(reopened)).toEqual(['persisted'])
    await reopened.close()
  })
})
