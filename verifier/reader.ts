/**
 * Read-only `StoreReader` over SQL.
 *
 * Every invariant is evaluated by the store; only offender samples and
 * aggregates cross the wire. Each round-trip is bounded by the timeout and
 * retried under the retry policy.
 */

import { DEFAULT_RETRY_POLICY, withRetry, withTimeout, type RetryPolicy } from '../databases/retry'
import type { Row, Store } from '../databases/types'
import type {
  ActivityHistogram,
  DirectChatMembers,
  InspectedChat,
  InspectedMessage,
  InspectedUser,
  Offenders,
  StoredCounts,
  StoreReader,
} from './types'

export interface SqlStoreReaderOptions {
  /** Offender identifiers returned per query (default: 10) */
  sampleLimit?: number
  retry?: RetryPolicy
  /** Per round-trip; 0 disables (default: 30000) */
  timeoutMs?: number
}

type OffenderRow = { id: string; total: number }

type CountsRow = {
  users: number
  chats: number
  direct_chats: number
  group_chats: number
  memberships: number
  messages: number
}

type DirectChatRow = { chat_id: string; dm_key: string | null; member_ids: string }

type HistogramRow = { total: number; business_hours: number; weekdays: number }

type SampleUserRow = { username: string; status: string; created_at: Date }

type ChatStructureRow = { type: string; name: string; members: number; messages: number }

type RecentMessageRow = { created_at: Date; sender: string; chat: string; content: string }

// Group topic, or the member usernames of a direct chat
const chatName = (alias: string) => `
  CASE WHEN ${alias}.type = 'group' THEN COALESCE(${alias}.topic, '')
       ELSE COALESCE((
         SELECT string_agg(u.username, ' & ' ORDER BY u.username)
         FROM memberships mb JOIN users u ON u.id = mb.user_id
         WHERE mb.chat_id = ${alias}.id
       ), '')
  END`

export class SqlStoreReader implements StoreReader {
  readonly sampleLimit: number
  private readonly retry: RetryPolicy
  private readonly timeoutMs: number

  constructor(
    private readonly store: Store,
    options: SqlStoreReaderOptions = {}
  ) {
    this.sampleLimit = options.sampleLimit ?? 10
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? 30000
  }

  private async rows<T extends Row>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await withRetry(this.retry, () =>
      withTimeout(this.store.query<T>(sql, params), this.timeoutMs, 'verification query')
    )
    return result.rows
  }

  /**
   * `sql` must select a single text column named `id`.
   */
  private async offenders(sql: string, params: unknown[] = []): Promise<Offenders> {
    const rows = await this.rows<OffenderRow>(
      `SELECT id, COUNT(*) OVER ()::int AS total
       FROM (${sql}) offenders
       ORDER BY id
       LIMIT $${params.length + 1}`,
      [...params, this.sampleLimit]
    )
    return { total: rows[0]?.total ?? 0, sample: rows.map((r) => r.id) }
  }

  async countEntities(): Promise<StoredCounts> {
    const [row] = await this.rows<CountsRow>(`
      SELECT
        (SELECT COUNT(*) FROM users)::int AS users,
        (SELECT COUNT(*) FROM chats)::int AS chats,
        (SELECT COUNT(*) FROM chats WHERE type = 'direct')::int AS direct_chats,
        (SELECT COUNT(*) FROM chats WHERE type = 'group')::int AS group_chats,
        (SELECT COUNT(*) FROM memberships)::int AS memberships,
        (SELECT COUNT(*) FROM messages)::int AS messages
    `)
    return {
      users: row.users,
      chats: row.chats,
      directChats: row.direct_chats,
      groupChats: row.group_chats,
      memberships: row.memberships,
      messages: row.messages,
    }
  }

  // ==========================================================================
  // Uniqueness
  // ==========================================================================

  duplicatePrimaryKeys(): Promise<Offenders> {
    return this.offenders(`
      SELECT 'users:' || id::text AS id FROM users GROUP BY id HAVING COUNT(*) > 1
      UNION ALL
      SELECT 'chats:' || id::text FROM chats GROUP BY id HAVING COUNT(*) > 1
      UNION ALL
      SELECT 'messages:' || id::text FROM messages GROUP BY id HAVING COUNT(*) > 1
    `)
  }

  duplicateUsernames(): Promise<Offenders> {
    return this.offenders(`
      SELECT lower(username) AS id FROM users GROUP BY lower(username) HAVING COUNT(*) > 1
    `)
  }

  duplicateMemberships(): Promise<Offenders> {
    return this.offenders(`
      SELECT chat_id::text || ':' || user_id::text AS id
      FROM memberships
      GROUP BY chat_id, user_id
      HAVING COUNT(*) > 1
    `)
  }

  duplicateDirectKeys(): Promise<Offenders> {
    return this.offenders(`
      SELECT dm_key AS id FROM chats
      WHERE dm_key IS NOT NULL
      GROUP BY dm_key
      HAVING COUNT(*) > 1
    `)
  }

  // ==========================================================================
  // Referential integrity
  // ==========================================================================

  orphanMemberships(): Promise<Offenders> {
    return this.offenders(`
      SELECT mb.chat_id::text || ':' || mb.user_id::text AS id
      FROM memberships mb
      LEFT JOIN chats c ON c.id = mb.chat_id
      LEFT JOIN users u ON u.id = mb.user_id
      WHERE c.id IS NULL OR u.id IS NULL
    `)
  }

  orphanMessages(): Promise<Offenders> {
    return this.offenders(`
      SELECT m.id::text AS id
      FROM messages m
      LEFT JOIN chats c ON c.id = m.chat_id
      LEFT JOIN users u ON u.id = m.sender_id
      WHERE c.id IS NULL OR u.id IS NULL
    `)
  }

  messagesFromNonMembers(): Promise<Offenders> {
    return this.offenders(`
      SELECT m.id::text AS id
      FROM messages m
      WHERE NOT EXISTS (
        SELECT 1 FROM memberships mb
        WHERE mb.chat_id = m.chat_id
          AND mb.user_id = m.sender_id
          AND mb.joined_at <= m.created_at
      )
    `)
  }

  // ==========================================================================
  // Cardinality
  // ==========================================================================

  directChatsWithoutTwoMembers(): Promise<Offenders> {
    return this.offenders(`
      SELECT c.id::text AS id
      FROM chats c
      LEFT JOIN memberships mb ON mb.chat_id = c.id
      WHERE c.type = 'direct'
      GROUP BY c.id
      HAVING COUNT(mb.user_id) <> 2
    `)
  }

  groupChatsBelow(minMembers: number): Promise<Offenders> {
    return this.offenders(
      `SELECT c.id::text AS id
       FROM chats c
       LEFT JOIN memberships mb ON mb.chat_id = c.id
       WHERE c.type = 'group'
       GROUP BY c.id
       HAVING COUNT(mb.user_id) < $1`,
      [minMembers]
    )
  }

  // ==========================================================================
  // Format
  // ==========================================================================

  async directChatMembers(afterId: string | null, limit: number): Promise<DirectChatMembers[]> {
    const rows = await this.rows<DirectChatRow>(
      `SELECT c.id::text AS chat_id, c.dm_key,
              COALESCE(string_agg(mb.user_id::text, ','), '') AS member_ids
       FROM chats c
       LEFT JOIN memberships mb ON mb.chat_id = c.id
       WHERE c.type = 'direct' AND ($1::uuid IS NULL OR c.id > $1::uuid)
       GROUP BY c.id, c.dm_key
       ORDER BY c.id
       LIMIT $2`,
      [afterId, limit]
    )
    return rows.map((r) => ({
      chatId: r.chat_id,
      dmKey: r.dm_key,
      memberIds: r.member_ids === '' ? [] : r.member_ids.split(','),
    }))
  }

  chatKindMismatches(): Promise<Offenders> {
    return this.offenders(`
      SELECT id::text AS id FROM chats
      WHERE (type = 'direct' AND (dm_key IS NULL OR topic IS NOT NULL))
         OR (type = 'group' AND dm_key IS NOT NULL)
         OR type NOT IN ('direct', 'group')
    `)
  }

  malformedUsernames(): Promise<Offenders> {
    return this.offenders(`
      SELECT id::text AS id FROM users
      WHERE btrim(username) = '' OR username <> lower(username)
    `)
  }

  emptyMessages(): Promise<Offenders> {
    return this.offenders(`
      SELECT id::text AS id FROM messages WHERE btrim(content) = ''
    `)
  }

  // ==========================================================================
  // Temporal
  // ==========================================================================

  messagesBeforeChatCreation(): Promise<Offenders> {
    return this.offenders(`
      SELECT m.id::text AS id
      FROM messages m
      JOIN chats c ON c.id = m.chat_id
      WHERE m.created_at < c.created_at
    `)
  }

  membershipsBeforeChatCreation(): Promise<Offenders> {
    return this.offenders(`
      SELECT mb.chat_id::text || ':' || mb.user_id::text AS id
      FROM memberships mb
      JOIN chats c ON c.id = mb.chat_id
      WHERE mb.joined_at < c.created_at
    `)
  }

  async activityHistogram(businessHours: { start: number; end: number }): Promise<ActivityHistogram> {
    const [row] = await this.rows<HistogramRow>(
      `SELECT
         COUNT(*)::int AS total,
         (COUNT(*) FILTER (
           WHERE EXTRACT(HOUR FROM created_at AT TIME ZONE 'UTC') >= $1
             AND EXTRACT(HOUR FROM created_at AT TIME ZONE 'UTC') < $2
         ))::int AS business_hours,
         (COUNT(*) FILTER (
           WHERE EXTRACT(ISODOW FROM created_at AT TIME ZONE 'UTC') < 6
         ))::int AS weekdays
       FROM messages`,
      [businessHours.start, businessHours.end]
    )
    return { total: row.total, businessHours: row.business_hours, weekdays: row.weekdays }
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  async sampleUsers(limit: number): Promise<InspectedUser[]> {
    const rows = await this.rows<SampleUserRow>(
      `SELECT username, status, created_at FROM users ORDER BY created_at, username LIMIT $1`,
      [limit]
    )
    return rows.map((r) => ({ username: r.username, status: r.status, createdAt: r.created_at.toISOString() }))
  }

  async chatStructure(limit: number): Promise<InspectedChat[]> {
    const rows = await this.rows<ChatStructureRow>(
      `SELECT c.type, ${chatName('c')} AS name,
              (SELECT COUNT(*) FROM memberships mb WHERE mb.chat_id = c.id)::int AS members,
              (SELECT COUNT(*) FROM messages m WHERE m.chat_id = c.id)::int AS messages
       FROM chats c
       ORDER BY c.type, name, c.id
       LIMIT $1`,
      [limit]
    )
    return rows.map((r) => ({ kind: r.type, name: r.name, members: r.members, messages: r.messages }))
  }

  async recentMessages(limit: number): Promise<InspectedMessage[]> {
    const rows = await this.rows<RecentMessageRow>(
      `SELECT m.created_at, u.username AS sender, ${chatName('c')} AS chat, m.content
       FROM messages m
       JOIN users u ON u.id = m.sender_id
       JOIN chats c ON c.id = m.chat_id
       ORDER BY m.created_at DESC, m.id
       LIMIT $1`,
      [limit]
    )
    return rows.map((r) => ({
      createdAt: r.created_at.toISOString(),
      sender: r.sender,
      chat: r.chat,
      content: r.content,
    }))
  }
}
