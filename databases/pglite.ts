/**
 * Embedded Postgres store using PGLite WASM.
 *
 * Used by the test suite and for local runs without a server
 * (`pglite://memory`, or `pglite:<dir>` for an on-disk data directory).
 * WASM is lazy-loaded on first use.
 *
 * Example:
 * ```typescript
 * const store = await createPGliteStore()
 * await applySchema(store)
 * ```
 */

import type { PGlite, Transaction } from '@electric-sql/pglite'
import { Deadline } from './retry'
import type { QueryResult, Row, Store, TransactionOptions } from './types'

export interface PGliteStoreOptions {
  /** Data directory; omitted means in-memory */
  dataDir?: string
}

type Queryable = Pick<Transaction, 'query'>

async function runQuery<T extends Row>(db: Queryable, sql: string, params?: unknown[]): Promise<QueryResult<T>> {
  const result = await db.query<T>(sql, params)
  return {
    rows: result.rows,
    // PGLite reports 0 affected rows for SELECT
    rowCount: result.affectedRows || result.rows.length,
    fields: result.fields.map((f) => ({ name: f.name, dataTypeID: f.dataTypeID })),
  }
}

/**
 * Create a Store from an existing PGLite instance
 */
export function createStoreFromInstance(db: PGlite): Store {
  return {
    backend: 'pglite',

    query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
      return runQuery<T>(db, sql, params)
    },

    async transaction<T>(fn: (tx: Store) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
      // Queries run in-process and cannot be cancelled, so the budget is
      // checked before every statement and once more before COMMIT
      const deadline = new Deadline(options.timeoutMs ?? 0, options.label ?? 'transaction')
      return db.transaction(async (tx) => {
        const txStore: Store = {
          backend: 'pglite',
          query: <R extends Row = Row>(sql: string, params?: unknown[]) => {
            if (deadline.expired) return Promise.reject(deadline.error())
            return runQuery<R>(tx, sql, params)
          },
          transaction: () => {
            throw new Error('Nested transactions not supported')
          },
          close: async () => {},
        }
        const result = await fn(txStore)
        deadline.check()
        return result
      })
    },

    async close(): Promise<void> {
      await db.close()
    },
  }
}

/**
 * Create a new PGLite-backed store.
 */
export async function createPGliteStore(options: PGliteStoreOptions = {}): Promise<Store> {
  let db: PGlite
  try {
    const { PGlite } = await import('@electric-sql/pglite')
    db = new PGlite(options.dataDir)
    await db.waitReady
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(
      `Failed to create PGLite: ${message}. ` +
        'Ensure @electric-sql/pglite is installed. ' +
        'Install with: npm install @electric-sql/pglite'
    )
  }

  return createStoreFromInstance(db)
}
