/**
 * Store factory, error classification, retry and timeout
 */

import { describe, it, expect } from 'vitest'
import { constraintViolationOf, errorMessage } from '../databases/errors'
import { openStore, resolveConnectionString } from '../databases/index'
import { createPGliteStore } from '../databases/pglite'
import { backoffDelay, RetryExhaustedError, sleep, TimeoutError, withRetry, withTimeout } from '../databases/retry'

const NO_DELAY = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 }

class PgError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly constraint?: string
  ) {
    super(message)
  }
}

describe('resolveConnectionString', () => {
  it('should prefer the role variable', () => {
    const env = { WRITER_DATABASE_URL: 'pglite://memory', DATABASE_URL: 'postgres://localhost/chat' }

    expect(resolveConnectionString('writer', env)).toBe('pglite://memory')
    expect(resolveConnectionString('reader', env)).toBe('postgres://localhost/chat')
  })

  it('should explain which variables are missing', () => {
    expect(() => resolveConnectionString('admin', {})).toThrow(
      'No connection string for role "admin": set ADMIN_DATABASE_URL or DATABASE_URL'
    )
  })
})

describe('openStore', () => {
  it('should open an in-memory PGLite store', async () => {
    const store = await openStore('pglite://memory')
    try {
      const result = await store.query<{ one: number }>('SELECT 1 AS one')
      expect(store.backend).toBe('pglite')
      expect(result.rows).toEqual([{ one: 1 }])
    } finally {
      await store.close()
    }
  })

  it('should reject an unknown scheme', async () => {
    await expect(openStore('mysql://localhost/chat')).rejects.toThrow('Unsupported connection string: mysql:')
  })
})

describe('transaction timeout', () => {
  it('should roll back a transaction that outlives its bound', async () => {
    const store = await createPGliteStore()
    try {
      await store.query('CREATE TABLE notes (id int PRIMARY KEY)')

      const slow = store.transaction(
        async (tx) => {
          await tx.query('INSERT INTO notes (id) VALUES (1)')
          await sleep(50)
          return 'committed'
        },
        { timeoutMs: 20, label: 'slow insert' }
      )

      await expect(slow).rejects.toThrow('slow insert timed out after 20ms')
      const result = await store.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM notes')
      expect(result.rows[0].n).toBe(0)
    } finally {
      await store.close()
    }
  })

  it('should refuse statements once the bound has passed', async () => {
    const store = await createPGliteStore()
    try {
      await store.query('CREATE TABLE notes (id int PRIMARY KEY)')

      const late = store.transaction(
        async (tx) => {
          await sleep(30)
          await tx.query('INSERT INTO notes (id) VALUES (1)')
        },
        { timeoutMs: 10 }
      )

      await expect(late).rejects.toThrow('transaction timed out after 10ms')
      const result = await store.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM notes')
      expect(result.rows[0].n).toBe(0)
    } finally {
      await store.close()
    }
  })

  it('should commit a prompt transaction', async () => {
    const store = await createPGliteStore()
    try {
      await store.query('CREATE TABLE notes (id int PRIMARY KEY)')

      await store.transaction((tx) => tx.query('INSERT INTO notes (id) VALUES (1)'), { timeoutMs: 5000 })

      const result = await store.query<{ n: number }>('SELECT COUNT(*)::int AS n FROM notes')
      expect(result.rows[0].n).toBe(1)
    } finally {
      await store.close()
    }
  })
})

describe('constraintViolationOf', () => {
  it('should classify by SQLSTATE', () => {
    expect(constraintViolationOf(new PgError('duplicate key', '23505', 'users_username_key'))).toEqual({
      code: '23505',
      kind: 'unique',
      constraint: 'users_username_key',
      detail: undefined,
    })
    expect(constraintViolationOf(new PgError('fk', '23503'))?.kind).toBe('foreign-key')
  })

  it('should follow the cause chain', () => {
    const wrapped = new Error('batch failed', { cause: new Error('flush', { cause: new PgError('check', '23514') }) })

    expect(constraintViolationOf(wrapped)?.kind).toBe('check')
  })

  it('should ignore other errors', () => {
    expect(constraintViolationOf(new PgError('syntax', '42601'))).toBeUndefined()
    expect(constraintViolationOf('boom')).toBeUndefined()
    expect(errorMessage('boom')).toBe('boom')
  })
})

describe('withRetry', () => {
  it('should retry until the operation succeeds', async () => {
    const seen: number[] = []
    const result = await withRetry(NO_DELAY, async (attempt) => {
      seen.push(attempt)
      if (attempt < 2) throw new Error('connection reset')
      return 'ok'
    })

    expect(result).toBe('ok')
    expect(seen).toEqual([0, 1, 2])
  })

  it('should wrap the last error once attempts run out', async () => {
    const error = await withRetry(NO_DELAY, async () => {
      throw new Error('connection reset')
    }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RetryExhaustedError)
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3)
      expect(error.message).toBe('Failed after 3 attempt(s): connection reset')
    }
  })

  it('should stop when shouldRetry declines', async () => {
    let calls = 0
    const retries: number[] = []
    await expect(
      withRetry(
        NO_DELAY,
        async () => {
          calls++
          throw new PgError('duplicate key', '23505')
        },
        { shouldRetry: () => false, onRetry: (attempt) => retries.push(attempt) }
      )
    ).rejects.toThrow('Failed after 1 attempt(s): duplicate key')

    expect(calls).toBe(1)
    expect(retries).toEqual([])
  })

  it('should double the delay up to the cap', () => {
    const policy = { maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 300, jitterMs: 50 }

    expect(backoffDelay(policy, 0, () => 0)).toBe(100)
    expect(backoffDelay(policy, 1, () => 0)).toBe(200)
    expect(backoffDelay(policy, 2, () => 0.5)).toBe(325)
  })
})

describe('withTimeout', () => {
  it('should pass through a prompt result', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'fast')).resolves.toBe(7)
  })

  it('should reject a promise that never settles', async () => {
    const never = new Promise<never>(() => {})

    await expect(withTimeout(never, 10, 'slow query')).rejects.toThrow(TimeoutError)
    await expect(withTimeout(never, 10, 'slow query')).rejects.toThrow('slow query timed out after 10ms')
  })

  it('should not bound a zero timeout', async () => {
    await expect(withTimeout(Promise.resolve('done'), 0, 'unbounded')).resolves.toBe('done')
  })
})
