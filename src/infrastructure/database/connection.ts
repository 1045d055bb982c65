/**
 * Database Connection Management
 *
 * Wraps an sql.js (SQLite compiled to WebAssembly) database behind the
 * async `select`/`execute` surface the repositories are written against.
 *
 * All writes go through a single serialized queue: `withTransaction` runs
 * BEGIN … COMMIT in its slot, nested calls on the scope it hands out use
 * SAVEPOINTs. Reads issued outside a scope wait for the queue to drain, so
 * they only ever observe committed state. Code running inside a scope must
 * use the scope it was given, never the outer database.
 *
 * When opened with a path, the database is loaded from that file and
 * flushed back to it after every committed top-level transaction.
 */

import initSqlJs from 'sql.js'
import type { Database, ParamsObject, SqlJsStatic, SqlValue, Statement } from 'sql.js'
import { readFile, writeFile } from 'node:fs/promises'
import { DatabaseError } from '../../services/errors'
import { dbLogger } from '../../services/logger'
import { migrate } from './schema'

export type SqlParams = SqlValue[]

export interface QueryResult {
  rowsAffected: number
  lastInsertId: number
}

/**
 * What repositories need from a connection or an open transaction scope
 */
export interface SqlExecutor {
  select<T>(query: string, bindValues?: SqlParams): Promise<T>
  execute(query: string, bindValues?: SqlParams): Promise<QueryResult>
  withTransaction<T>(operations: (scope: SqlExecutor) => Promise<T>): Promise<T>
}

export interface OpenDatabaseOptions {
  /** File to load from and flush to; omitted or null keeps the database in memory */
  path?: string | null
  /** Serialized database to start from (ignored when `path` exists on disk) */
  data?: Uint8Array
}

let sqlInstance: SqlJsStatic | null = null

/**
 * Initialize the sql.js WebAssembly module. Cached for the process.
 */
async function getSqlJs(): Promise<SqlJsStatic> {
  if (!sqlInstance) {
    sqlInstance = await initSqlJs()
  }
  return sqlInstance
}

function toBindParams(values: SqlParams): ParamsObject {
  const params: ParamsObject = {}
  values.forEach((value, i) => {
    params[`$${i + 1}`] = value
  })
  return params
}

function describeQuery(query: string): string {
  return query.trim().split(/\s+/).slice(0, 4).join(' ')
}

async function readIfExists(path: string): Promise<Uint8Array | undefined> {
  try {
    return new Uint8Array(await readFile(path))
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }
    throw error
  }
}

/**
 * Runs statements against the underlying sql.js handle. Shared by the
 * database and every transaction scope.
 */
class StatementRunner {
  constructor(private readonly db: Database) {}

  select<T>(query: string, bindValues: SqlParams = []): T {
    const stmt = this.prepare(query)
    try {
      stmt.bind(toBindParams(bindValues))
      const rows: ParamsObject[] = []
      while (stmt.step()) {
        rows.push(stmt.getAsObject())
      }
      // Row shapes are fixed by the query text; callers name them
      return rows as T
    } catch (error) {
      throw this.wrap(error, query)
    } finally {
      stmt.free()
    }
  }

  execute(query: string, bindValues: SqlParams = []): QueryResult {
    try {
      this.db.run(query, toBindParams(bindValues))
      const rowsAffected = this.db.getRowsModified()
      const idResult = this.db.exec('SELECT last_insert_rowid()')
      const lastInsertId = Number(idResult[0]?.values[0]?.[0] ?? 0)
      return { rowsAffected, lastInsertId }
    } catch (error) {
      throw this.wrap(error, query)
    }
  }

  private prepare(query: string): Statement {
    try {
      return this.db.prepare(query)
    } catch (error) {
      throw this.wrap(error, query)
    }
  }

  private wrap(error: unknown, query: string): DatabaseError {
    if (error instanceof DatabaseError) return error
    const message = error instanceof Error ? error.message : String(error)
    return new DatabaseError(message, describeQuery(query))
  }
}

/**
 * An open transaction. Nested `withTransaction` calls become SAVEPOINTs.
 */
class TransactionScope implements SqlExecutor {
  private savepointDepth = 0

  constructor(private readonly runner: StatementRunner) {}

  async select<T>(query: string, bindValues?: SqlParams): Promise<T> {
    return this.runner.select<T>(query, bindValues)
  }

  async execute(query: string, bindValues?: SqlParams): Promise<QueryResult> {
    return this.runner.execute(query, bindValues)
  }

  async withTransaction<T>(operations: (scope: SqlExecutor) => Promise<T>): Promise<T> {
    const depth = ++this.savepointDepth
    this.runner.execute(`SAVEPOINT sp_${depth}`)
    try {
      const result = await operations(this)
      this.runner.execute(`RELEASE SAVEPOINT sp_${depth}`)
      return result
    } catch (error) {
      try {
        this.runner.execute(`ROLLBACK TO SAVEPOINT sp_${depth}`)
        this.runner.execute(`RELEASE SAVEPOINT sp_${depth}`)
      } catch (rollbackError) {
        dbLogger.error('Failed to rollback savepoint', rollbackError)
      }
      throw error
    } finally {
      this.savepointDepth = depth - 1
    }
  }
}

export class WalletDatabase implements SqlExecutor {
  // Serializes all writers
  private transactionQueue: Promise<unknown> = Promise.resolve()
  private readonly runner: StatementRunner
  private closed = false

  private constructor(
    private readonly db: Database,
    private readonly path: string | null
  ) {
    this.runner = new StatementRunner(db)
  }

  /**
   * Open (and migrate) a database
   */
  static async open(options: OpenDatabaseOptions = {}): Promise<WalletDatabase> {
    const SQL = await getSqlJs()
    const path = options.path ?? null
    const fromDisk = path ? await readIfExists(path) : undefined
    const database = new WalletDatabase(new SQL.Database(fromDisk ?? options.data), path)

    database.enableForeignKeys()
    await database.withTransaction(scope => migrate(scope))
    dbLogger.info('Database initialized', { path: path ?? ':memory:' })
    return database
  }

  private enableForeignKeys(): void {
    this.db.run('PRAGMA foreign_keys = ON')
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new DatabaseError('Database is closed')
    }
  }

  /**
   * Read committed state. Waits for queued writes first.
   */
  async select<T>(query: string, bindValues?: SqlParams): Promise<T> {
    await this.transactionQueue
    this.ensureOpen()
    return this.runner.select<T>(query, bindValues)
  }

  /**
   * A single statement as its own transaction
   */
  async execute(query: string, bindValues?: SqlParams): Promise<QueryResult> {
    return this.withTransaction(scope => scope.execute(query, bindValues))
  }

  /**
   * Execute multiple database operations within a transaction.
   * Top-level calls are serialized through the queue.
   */
  withTransaction<T>(operations: (scope: SqlExecutor) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.transactionQueue = this.transactionQueue.then(async () => {
        try {
          resolve(await this.executeTransaction(operations))
        } catch (e) {
          reject(e)
        }
      })
    })
  }

  private async executeTransaction<T>(operations: (scope: SqlExecutor) => Promise<T>): Promise<T> {
    this.ensureOpen()
    this.runner.execute('BEGIN TRANSACTION')
    let result: T
    try {
      result = await operations(new TransactionScope(this.runner))
      this.runner.execute('COMMIT')
    } catch (error) {
      try {
        this.runner.execute('ROLLBACK')
      } catch (rollbackError) {
        dbLogger.error('Failed to rollback', rollbackError)
      }
      throw error
    }
    await this.flush()
    return result
  }

  /**
   * Serialize the whole database
   */
  export(): Uint8Array {
    this.ensureOpen()
    const data = this.db.export()
    // sql.js resets connection pragmas on export
    this.enableForeignKeys()
    return data
  }

  private async flush(): Promise<void> {
    if (!this.path) return
    await writeFile(this.path, this.export())
  }

  /**
   * Wait for queued writes, then close the connection
   */
  async close(): Promise<void> {
    if (this.closed) return
    await this.transactionQueue
    this.closed = true
    this.db.close()
    dbLogger.info('Database connection closed')
  }
}
