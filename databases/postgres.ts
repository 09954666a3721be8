/**
 * PostgreSQL store over a `pg` connection pool.
 *
 * Every statement carries a server-side `statement_timeout`. A transaction
 * given a `timeoutMs` also gets it as `SET LOCAL statement_timeout`, and its
 * connection is destroyed when the budget runs out, so Postgres rolls it back
 * instead of committing it after the caller has given up.
 */

import pg from 'pg'
import type { PoolClient, QueryResult as PgQueryResult } from 'pg'
import { Deadline, type TimeoutError } from './retry'
import type { QueryResult, Row, Store, TransactionOptions } from './types'

const { Pool } = pg

export interface PostgresStoreOptions {
  connectionString: string
  /** Pool size (default: 4) */
  maxConnections?: number
  /** Milliseconds to wait for a pooled connection (default: 5000) */
  connectionTimeoutMs?: number
  /** Server-side statement timeout in milliseconds (default: 30000) */
  statementTimeoutMs?: number
}

const DEFAULT_OPTIONS = {
  maxConnections: 4,
  connectionTimeoutMs: 5000,
  statementTimeoutMs: 30000,
}

function toResult<T extends Row>(result: PgQueryResult<T>): QueryResult<T> {
  return {
    rows: result.rows,
    rowCount: result.rowCount ?? result.rows.length,
    fields: result.fields.map((f) => ({ name: f.name, dataTypeID: f.dataTypeID })),
  }
}

function clientStore(client: PoolClient): Store {
  return {
    backend: 'postgres',
    async query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
      return toResult(await client.query<T>(sql, params))
    },
    transaction: () => {
      throw new Error('Nested transactions not supported')
    },
    close: async () => {},
  }
}

/**
 * Create a store backed by a `pg` pool.
 */
export function createPostgresStore(options: PostgresStoreOptions): Store {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? DEFAULT_OPTIONS.maxConnections,
    connectionTimeoutMillis: options.connectionTimeoutMs ?? DEFAULT_OPTIONS.connectionTimeoutMs,
    statement_timeout: options.statementTimeoutMs ?? DEFAULT_OPTIONS.statementTimeoutMs,
  })

  return {
    backend: 'postgres',

    async query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
      return toResult(await pool.query<T>(sql, params))
    },

    async transaction<T>(fn: (tx: Store) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
      const deadline = new Deadline(options.timeoutMs ?? 0, options.label ?? 'transaction')
      const client = await pool.connect()

      // On expiry the connection is destroyed, which makes the server roll back
      const expiry: { error?: TimeoutError } = {}
      let timer: NodeJS.Timeout | undefined
      if (deadline.timeoutMs > 0) {
        timer = setTimeout(() => {
          expiry.error = deadline.error()
          client.release(expiry.error)
        }, deadline.remaining())
      }

      try {
        await client.query('BEGIN')
        if (deadline.timeoutMs > 0) {
          await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.ceil(deadline.remaining()))}`)
        }
        const result = await fn(clientStore(client))
        deadline.check()
        // A COMMIT that is under way is not interrupted
        clearTimeout(timer)
        await client.query('COMMIT')
        return result
      } catch (error) {
        if (expiry.error) throw expiry.error
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          if (error instanceof Error) error.cause ??= rollbackError
        })
        throw error
      } finally {
        clearTimeout(timer)
        if (!expiry.error) client.release()
      }
    },

    async close(): Promise<void> {
      await pool.end()
    },
  }
}
