/**
 * Generator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createPGliteStore } from '../databases/pglite'
import type { Row, Store } from '../databases/types'
import { applySchema } from '../datasets/chat/schema'
import { ConfigError, expectationsFor, generateDataset, parseGeneratorConfig } from '../generator'
import type { Progress } from '../generator/context'
import type { Logger } from '../instrumentation/logger'
import { failingStore, flakyStore, recordingStore, stallingStore } from './support/fake-stores'

const NO_DELAY = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 }

type CountRow = { n: number }

async function count(store: Store, table: string): Promise<number> {
  const result = await store.query<CountRow>(`SELECT COUNT(*)::int AS n FROM ${table}`)
  return result.rows[0].n
}

async function counts(store: Store) {
  return {
    user: await count(store, 'users'),
    chat: await count(store, 'chats'),
    membership: await count(store, 'memberships'),
    message: await count(store, 'messages'),
  }
}

async function freshStore(): Promise<Store> {
  const store = await createPGliteStore()
  await applySchema(store)
  return store
}

const FIXTURE_COUNTS = { user: 5, chat: 4, membership: 10, message: 16 }

describe('generateDataset', () => {
  let store: Store

  beforeEach(async () => {
    store = await freshStore()
  })

  afterEach(async () => {
    await store.close()
  })

  describe('fixture strategy', () => {
    it('should write the fixture dataset', async () => {
      const report = await generateDataset(store, { strategy: 'fixture' })

      expect(report.status).toBe('success')
      expect(report.strategy).toBe('fixture')
      expect(report.idMode).toBe('hashed')
      expect(report.batches).toBe(1)
      expect(report.generated).toEqual(FIXTURE_COUNTS)
      expect(report.inserted).toEqual(FIXTURE_COUNTS)
      expect(report.failure).toBeUndefined()
      expect(await counts(store)).toEqual(FIXTURE_COUNTS)
    })

    it('should report the expectations of the configuration', async () => {
      const report = await generateDataset(store, { strategy: 'fixture' })

      expect(report.expectations).toEqual(expectationsFor(parseGeneratorConfig({ strategy: 'fixture' })))
      expect(report.expectations.directChats).toEqual({ min: 2, max: 2 })
      expect(report.expectations.groupChats).toEqual({ min: 2, max: 2 })
      expect(report.expectations.activity).toBeNull()
    })

    it('should be a no-op when run again on the same store', async () => {
      await generateDataset(store, { strategy: 'fixture' })
      const second = await generateDataset(store, { strategy: 'fixture' })

      expect(second.status).toBe('success')
      expect(second.generated).toEqual(FIXTURE_COUNTS)
      expect(second.inserted).toEqual({ user: 0, chat: 0, membership: 0, message: 0 })
      expect(await counts(store)).toEqual(FIXTURE_COUNTS)
    })

    it('should log the rows each table accepted', async () => {
      await generateDataset(store, { strategy: 'fixture' })
      const lines: string[] = []
      const logger: Logger = { info: () => {}, warn: () => {}, error: () => {}, debug: (message) => lines.push(message) }

      await generateDataset(store, { strategy: 'fixture' }, { logger })

      expect(lines).toEqual([
        'users: 0 of 5 rows inserted',
        'chats: 0 of 4 rows inserted',
        'memberships: 0 of 10 rows inserted',
        'messages: 0 of 16 rows inserted',
      ])
    })

    it('should produce identical rows in two stores', async () => {
      const other = await freshStore()
      try {
        await generateDataset(store, { strategy: 'fixture', batchSize: 7 })
        await generateDataset(other, { strategy: 'fixture' })

        for (const sql of [
          'SELECT * FROM users ORDER BY id',
          'SELECT * FROM chats ORDER BY id',
          'SELECT * FROM memberships ORDER BY chat_id, user_id',
          'SELECT * FROM messages ORDER BY id',
        ]) {
          const a = await store.query(sql)
          const b = await other.query(sql)
          expect(a.rows).toEqual(b.rows)
        }
      } finally {
        await other.close()
      }
    })

    it('should place timestamps relative to the anchor', async () => {
      await generateDataset(store, { strategy: 'fixture', anchor: '2024-06-03T12:00:00.000Z' })

      const result = await store.query<{ first: Date; last: Date }>(
        'SELECT MIN(created_at) AS first, MAX(created_at) AS last FROM messages'
      )
      expect(result.rows[0].first.toISOString()).toBe('2024-06-03T10:00:00.000Z')
      expect(result.rows[0].last.toISOString()).toBe('2024-06-03T11:45:00.000Z')
    })

    it('should store direct-chat keys as the ordered member pair', async () => {
      await generateDataset(store, { strategy: 'fixture' })

      const result = await store.query<{ dm_key: string; members: string }>(`
        SELECT c.dm_key, string_agg(mb.user_id::text, ':' ORDER BY mb.user_id) AS members
        FROM chats c JOIN memberships mb ON mb.chat_id = c.id
        WHERE c.type = 'direct'
        GROUP BY c.id, c.dm_key
      `)
      expect(result.rows).toHaveLength(2)
      for (const row of result.rows) {
        expect(row.dm_key).toBe(row.members.replace(':', '::'))
      }
    })
  })

  describe('sampling strategy', () => {
    const small = {
      strategy: 'sampling' as const,
      seed: 42,
      anchor: '2024-06-03T12:00:00.000Z',
      users: 20,
      directChats: 10,
      groupChats: 3,
      groupSize: { min: 3, max: 5 },
      messages: 200,
      batchSize: 50,
    }

    it('should write the requested counts', async () => {
      const report = await generateDataset(store, small)

      expect(report.status).toBe('success')
      expect(report.seed).toBe(42)
      expect(report.idMode).toBe('seeded')
      expect(report.inserted.user).toBe(20)
      expect(report.inserted.chat).toBe(13)
      expect(report.inserted.message).toBe(200)
      expect(report.inserted.membership).toBeGreaterThanOrEqual(2 * 10 + 3 * 3)
      expect(report.inserted.membership).toBeLessThanOrEqual(2 * 10 + 5 * 3)
      expect(await counts(store)).toEqual(report.inserted)
    })

    it('should reproduce the same rows from the same seed', async () => {
      const other = await freshStore()
      try {
        await generateDataset(store, small)
        await generateDataset(other, small)

        const a = await store.query('SELECT * FROM messages ORDER BY id')
        const b = await other.query('SELECT * FROM messages ORDER BY id')
        expect(a.rows).toHaveLength(200)
        expect(a.rows).toEqual(b.rows)
      } finally {
        await other.close()
      }
    })

    it('should allow a run without messages', async () => {
      const report = await generateDataset(store, { ...small, messages: 0 })

      expect(report.status).toBe('success')
      expect(report.inserted.message).toBe(0)
      expect(report.inserted.chat).toBe(13)
      expect(report.messagesPerSecond).toBe(0)
      expect(await count(store, 'messages')).toBe(0)
    })

    it('should retry a unique violation and then fail with it', async () => {
      await generateDataset(store, small)
      const replay = await generateDataset(store, { ...small, retry: NO_DELAY })

      expect(replay.status).toBe('failure')
      expect(replay.failure?.batchIndex).toBe(0)
      expect(replay.failure?.attempts).toBe(3)
      expect(replay.failure?.violation?.kind).toBe('unique')
      expect(replay.failure?.violation?.code).toBe('23505')
      expect(replay.inserted).toEqual({ user: 0, chat: 0, membership: 0, message: 0 })
    })

    it('should roll back a flush that outlives the timeout and count only the retry', async () => {
      const stalling = stallingStore(store, 1, 300)

      const report = await generateDataset(stalling, { ...small, retry: NO_DELAY, roundTripTimeoutMs: 100 })

      expect(report.status).toBe('success')
      expect(report.inserted.user).toBe(20)
      expect(report.inserted.message).toBe(200)
      expect(stalling.transactions).toBe(report.batches + 1)
      expect(await counts(store)).toEqual(report.inserted)
    })
  })

  describe('configuration', () => {
    it('should reject an invalid configuration before touching the store', async () => {
      const recording = recordingStore()

      const run = generateDataset(recording, { strategy: 'sampling', groupSize: { min: 1, max: 3 } })

      await expect(run).rejects.toBeInstanceOf(ConfigError)
      await expect(run).rejects.toMatchObject({ issues: ['groupSize.min: group chats need at least 2 members'] })
      expect(recording.calls).toBe(0)
    })

    it('should reject more direct chats than user pairs', async () => {
      const recording = recordingStore()

      await expect(
        generateDataset(recording, { strategy: 'sampling', users: 3, directChats: 4, groupChats: 0 })
      ).rejects.toMatchObject({ issues: ['directChats: 4 direct chats requested but 3 users only form 3 pairs'] })
      expect(recording.calls).toBe(0)
    })
  })

  describe('failure handling', () => {
    it('should retry a failed flush', async () => {
      const flaky = flakyStore(store, 2)

      const report = await generateDataset(flaky, { strategy: 'fixture', retry: NO_DELAY })

      expect(report.status).toBe('success')
      expect(flaky.attempts).toBe(3)
      expect(report.inserted).toEqual(FIXTURE_COUNTS)
    })

    it('should stop with the failing batch once attempts run out', async () => {
      const report = await generateDataset(failingStore(), { strategy: 'fixture', batchSize: 10, retry: NO_DELAY })

      expect(report.status).toBe('failure')
      expect(report.batches).toBe(0)
      expect(report.failure).toEqual({
        batchIndex: 0,
        attempts: 3,
        cause: 'connection reset',
        violation: undefined,
      })
    })

    it('should count a batch once when it commits on the retry after a timeout', async () => {
      const stalling = stallingStore(store, 1, 300)

      const report = await generateDataset(stalling, { strategy: 'fixture', retry: NO_DELAY, roundTripTimeoutMs: 100 })

      expect(report.status).toBe('success')
      expect(stalling.transactions).toBe(2)
      expect(report.inserted).toEqual(FIXTURE_COUNTS)
      expect(await counts(store)).toEqual(FIXTURE_COUNTS)
    })

    it('should leave nothing behind when every attempt times out', async () => {
      const stalling = stallingStore(store, 3, 150)

      const report = await generateDataset(stalling, { strategy: 'fixture', retry: NO_DELAY, roundTripTimeoutMs: 50 })

      expect(report.status).toBe('failure')
      expect(report.failure).toEqual({
        batchIndex: 0,
        attempts: 3,
        cause: 'batch 0 timed out after 50ms',
        violation: undefined,
      })
      expect(report.inserted).toEqual({ user: 0, chat: 0, membership: 0, message: 0 })
      expect(await counts(store)).toEqual({ user: 0, chat: 0, membership: 0, message: 0 })
    })

    it('should keep committed batches when a later batch fails', async () => {
      // First transaction commits, every later one fails
      let transactions = 0
      const partial: Store = {
        backend: store.backend,
        query: <T extends Row = Row>(sql: string, params?: unknown[]) => store.query<T>(sql, params),
        transaction: <T>(fn: (tx: Store) => Promise<T>): Promise<T> => {
          transactions++
          return transactions === 1 ? store.transaction(fn) : Promise.reject(new Error('connection reset'))
        },
        close: async () => {},
      }

      const report = await generateDataset(partial, { strategy: 'fixture', batchSize: 10, retry: NO_DELAY })

      expect(report.status).toBe('failure')
      expect(report.batches).toBe(1)
      expect(report.failure?.batchIndex).toBe(1)
      expect(report.inserted).toEqual({ user: 5, chat: 1, membership: 2, message: 2 })
      expect(await counts(store)).toEqual({ user: 5, chat: 1, membership: 2, message: 2 })
    })

    it('should stop before the next batch when cancelled', async () => {
      const controller = new AbortController()
      const seen: number[] = []

      const report = await generateDataset(
        store,
        { strategy: 'fixture', batchSize: 10 },
        {
          signal: controller.signal,
          onProgress: (progress: Progress) => {
            seen.push(progress.batchesCommitted)
            controller.abort()
          },
        }
      )

      expect(report.status).toBe('cancelled')
      expect(seen).toEqual([1])
      expect(report.batches).toBe(1)
      expect(report.inserted).toEqual({ user: 5, chat: 1, membership: 2, message: 2 })
      expect(await count(store, 'messages')).toBe(2)
    })
  })
})
