/**
 * Store abstraction shared by every component.
 *
 * The generator, verifier and benchmark harness only need parameterized
 * statements and transactions, so both backends (a `pg` pool against a real
 * server, and embedded PGLite) are wrapped behind this interface.
 */

export type Row = Record<string, unknown>

export interface QueryResult<T extends Row = Row> {
  rows: T[]
  /** Rows returned, or rows written for INSERT/UPDATE/DELETE */
  rowCount: number
  fields: { name: string; dataTypeID: number }[]
}

export interface TransactionOptions {
  /**
   * Bound on the whole transaction, COMMIT included. Once it passes the
   * transaction is rolled back and `TimeoutError` thrown; 0 disables it.
   */
  timeoutMs?: number
  /** Names the transaction in the timeout error (default: `transaction`) */
  label?: string
}

export interface Store {
  /** Short backend label used in reports (`postgres`, `pglite`) */
  readonly backend: string

  // SQL query execution
  query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<QueryResult<T>>

  // Transaction support; throwing from `fn` rolls the transaction back
  transaction<T>(fn: (tx: Store) => Promise<T>, options?: TransactionOptions): Promise<T>

  // Lifecycle
  close(): Promise<void>
}

/**
 * Connection roles. Each role may be given its own connection string so the
 * verifier and benchmark can run on a read-only login.
 */
export type StoreRole = 'admin' | 'writer' | 'reader'
