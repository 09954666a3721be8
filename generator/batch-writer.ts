/**
 * Batched, transactional writes of generated entities.
 *
 * Entities are buffered up to `batchSize` and each full buffer is written
 * in one store transaction: one multi-row INSERT per table, parents before
 * children. The next batch is generated while the current one is being
 * flushed, but a flush only starts once the previous batch has committed.
 */

import { constraintViolationOf } from '../databases/errors'
import { RetryExhaustedError, withRetry, type RetryPolicy } from '../databases/retry'
import type { Store } from '../databases/types'
import {
  emptyCounts,
  ENTITY_KINDS,
  type ChatRow,
  type Entity,
  type EntityCounts,
  type EntityKind,
  type MembershipRow,
  type MessageRow,
  type UserRow,
} from '../datasets/chat/model'
import { countGenerated, type Progress, type RunContext } from './context'
import { BatchFlushError, CancelledError } from './errors'

export type ConflictPolicy = 'skip' | 'fail'

export interface BatchWriterOptions {
  batchSize: number
  /** `skip` adds ON CONFLICT DO NOTHING, making replays of a fixed dataset no-ops */
  conflict: ConflictPolicy
  retry: RetryPolicy
  /** Bound on a single flush transaction, COMMIT included; 0 disables it */
  timeoutMs: number
  onProgress?: (progress: Progress) => void
}

interface InsertSpec<R> {
  table: string
  columns: string[]
  values(row: R): unknown[]
}

const users: InsertSpec<UserRow> = {
  table: 'users',
  columns: ['id', 'username', 'display_name', 'password_hash', 'status', 'created_at'],
  values: (r) => [r.id, r.username, r.displayName, r.passwordHash, r.status, r.createdAt.toISOString()],
}

const chats: InsertSpec<ChatRow> = {
  table: 'chats',
  columns: ['id', 'type', 'topic', 'dm_key', 'created_at'],
  values: (r) => [r.id, r.kind, r.topic, r.directKey, r.createdAt.toISOString()],
}

const memberships: InsertSpec<MembershipRow> = {
  table: 'memberships',
  columns: ['chat_id', 'user_id', 'role', 'joined_at'],
  values: (r) => [r.chatId, r.userId, r.role, r.joinedAt.toISOString()],
}

const messages: InsertSpec<MessageRow> = {
  table: 'messages',
  columns: ['id', 'chat_id', 'sender_id', 'content', 'created_at'],
  values: (r) => [r.id, r.chatId, r.senderId, r.content, r.createdAt.toISOString()],
}

/**
 * Multi-row INSERT with numbered placeholders.
 */
export function buildInsert<R>(spec: InsertSpec<R>, rows: R[], conflict: ConflictPolicy): { sql: string; params: unknown[] } {
  const params: unknown[] = []
  const tuples = rows.map((row) => {
    const values = spec.values(row)
    const placeholders = values.map((value) => {
      params.push(value)
      return `$${params.length}`
    })
    return `(${placeholders.join(', ')})`
  })

  let sql = `INSERT INTO ${spec.table} (${spec.columns.join(', ')}) VALUES ${tuples.join(', ')}`
  if (conflict === 'skip') sql += ' ON CONFLICT DO NOTHING'
  return { sql, params }
}

interface GroupedBatch {
  user: UserRow[]
  chat: ChatRow[]
  membership: MembershipRow[]
  message: MessageRow[]
}

function groupBatch(batch: Entity[]): GroupedBatch {
  const grouped: GroupedBatch = { user: [], chat: [], membership: [], message: [] }
  for (const entity of batch) {
    switch (entity.kind) {
      case 'user':
        grouped.user.push(entity.row)
        break
      case 'chat':
        grouped.chat.push(entity.row)
        break
      case 'membership':
        grouped.membership.push(entity.row)
        break
      case 'message':
        grouped.message.push(entity.row)
        break
    }
  }
  return grouped
}

export class BatchWriter {
  private batchIndex = 0

  constructor(
    private readonly store: Store,
    private readonly ctx: RunContext,
    private readonly options: BatchWriterOptions
  ) {}

  /**
   * Consume `entities` to the end, flushing every `batchSize` entities.
   * Throws `BatchFlushError` or `CancelledError`; batches committed before
   * the failure stay committed.
   */
  async writeAll(entities: Iterable<Entity>): Promise<void> {
    let pending: Promise<void> | null = null
    let buffer: Entity[] = []

    try {
      for (const entity of entities) {
        buffer.push(entity)
        countGenerated(this.ctx, entity.kind)

        if (buffer.length >= this.options.batchSize) {
          const previous = pending
          pending = null
          if (previous) await previous
          pending = this.flush(buffer)
          buffer = []
        }
      }
    } catch (error) {
      // Let the in-flight batch settle before surfacing the generation failure
      const inFlight = pending
      pending = null
      if (inFlight) {
        await inFlight.catch((flushError: unknown) => this.ctx.logger.error('in-flight batch failed', flushError))
      }
      throw error
    }

    if (pending) await pending
    if (buffer.length > 0) await this.flush(buffer)
  }

  private async flush(batch: Entity[]): Promise<void> {
    const index = this.batchIndex++
    const { logger, signal, progress } = this.ctx

    if (signal?.aborted) throw new CancelledError(index)

    const grouped = groupBatch(batch)
    let inserted: EntityCounts
    try {
      inserted = await withRetry(
        this.options.retry,
        // The store rolls back a transaction that outlives the timeout, so a
        // retried batch never lands on top of a late commit
        () =>
          this.store.transaction((tx) => this.insertBatch(tx, grouped), {
            timeoutMs: this.options.timeoutMs,
            label: `batch ${index}`,
          }),
        {
          onRetry: (attempt, error, delayMs) =>
            logger.warn(`batch ${index} attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`),
        }
      )
    } catch (error) {
      const last = error instanceof RetryExhaustedError ? error.lastError : error instanceof Error ? error : new Error(String(error))
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1
      throw new BatchFlushError(index, attempts, last, constraintViolationOf(last))
    }

    progress.batchesCommitted++
    for (const kind of ENTITY_KINDS) progress.inserted[kind] += inserted[kind]

    logger.info(
      `batch ${index} committed: ${batch.length} entities ` +
        `(users ${progress.inserted.user}, chats ${progress.inserted.chat}, ` +
        `memberships ${progress.inserted.membership}, messages ${progress.inserted.message})`
    )
    this.options.onProgress?.(progress)
  }

  private async insertBatch(tx: Store, grouped: GroupedBatch): Promise<EntityCounts> {
    const counts = emptyCounts()
    const write = async <R>(kind: EntityKind, spec: InsertSpec<R>, rows: R[]) => {
      if (rows.length === 0) return
      const { sql, params } = buildInsert(spec, rows, this.options.conflict)
      const result = await tx.query(sql, params)
      counts[kind] = result.rowCount
      this.ctx.logger.debug(`${spec.table}: ${result.rowCount} of ${rows.length} rows inserted`)
    }

    await write('user', users, grouped.user)
    await write('chat', chats, grouped.chat)
    await write('membership', memberships, grouped.membership)
    await write('message', messages, grouped.message)
    return counts
  }
}
