/**
 * Read-path benchmark catalogue for the messaging schema.
 *
 * Add a query by appending an entry; the harness needs no changes.
 */

import type { BenchmarkQuery, QueryParameter } from '../types'

// ============================================================================
// Parameter probes
// ============================================================================

export const busiestChat: Extract<QueryParameter, { type: 'probe' }> = {
  type: 'probe',
  sql: `SELECT chat_id FROM messages
        GROUP BY chat_id
        ORDER BY COUNT(*) DESC, chat_id
        LIMIT 1`,
}

export const firstUser: QueryParameter = {
  type: 'probe',
  sql: `SELECT id FROM users ORDER BY created_at, id LIMIT 1`,
}

// ============================================================================
// Benchmark Queries
// ============================================================================

export const benchmarkQueries: BenchmarkQuery[] = [
  // Timelines
  {
    name: 'chat_timeline',
    description: 'Latest page of a chat timeline, newest first',
    category: 'timeline',
    sql: `SELECT m.id, m.content, m.created_at, u.username
          FROM messages m
          JOIN users u ON m.sender_id = u.id
          WHERE m.chat_id = $1
          ORDER BY m.created_at DESC
          LIMIT 50`,
    parameters: [busiestChat],
    thresholdMs: 10,
  },
  {
    name: 'chat_timeline_page_3',
    description: 'Third page of a chat timeline (offset pagination)',
    category: 'timeline',
    sql: `SELECT m.id, m.content, m.created_at, m.sender_id
          FROM messages m
          WHERE m.chat_id = $1
          ORDER BY m.created_at DESC
          LIMIT 50 OFFSET 100`,
    parameters: [busiestChat],
    thresholdMs: 10,
  },

  // Search
  {
    name: 'chat_message_search',
    description: 'Substring search over the message bodies of one chat',
    category: 'search',
    sql: `SELECT m.id, m.content, m.created_at
          FROM messages m
          WHERE m.chat_id = $1
            AND m.content ILIKE $2
          ORDER BY m.created_at DESC
          LIMIT 20`,
    parameters: [busiestChat, { type: 'literal', value: '%the%' }],
    thresholdMs: 25,
  },
  {
    name: 'user_prefix_search',
    description: 'Case-insensitive username prefix lookup',
    category: 'lookup',
    sql: `SELECT id, username, created_at
          FROM users
          WHERE username ILIKE $1
          ORDER BY username
          LIMIT 20`,
    parameters: [{ type: 'literal', value: 'a%' }],
    thresholdMs: 5,
  },

  // Membership
  {
    name: 'user_chats',
    description: 'Chats a user belongs to, newest chat first',
    category: 'membership',
    sql: `SELECT c.id, c.type, COALESCE(c.topic, c.dm_key) AS name, mb.role
          FROM memberships mb
          JOIN chats c ON c.id = mb.chat_id
          WHERE mb.user_id = $1
          ORDER BY c.created_at DESC`,
    parameters: [firstUser],
    thresholdMs: 10,
  },
  {
    name: 'chat_members',
    description: 'Members of a chat with their handles',
    category: 'membership',
    sql: `SELECT u.id, u.username, mb.role, mb.joined_at
          FROM memberships mb
          JOIN users u ON u.id = mb.user_id
          WHERE mb.chat_id = $1
          ORDER BY mb.joined_at`,
    parameters: [busiestChat],
    thresholdMs: 10,
  },

  // Joins and aggregates
  {
    name: 'recent_activity',
    description: "Latest messages across a user's chats, with sender and chat",
    category: 'join',
    sql: `SELECT c.id, c.type, COALESCE(c.topic, c.dm_key) AS chat_name,
                 m.content, m.created_at, sender.username
          FROM memberships mb
          JOIN chats c ON c.id = mb.chat_id
          JOIN messages m ON m.chat_id = c.id
          JOIN users sender ON sender.id = m.sender_id
          WHERE mb.user_id = $1
          ORDER BY m.created_at DESC
          LIMIT 100`,
    parameters: [firstUser],
    thresholdMs: 50,
  },
  {
    name: 'chat_message_counts',
    description: 'Chats ranked by message volume',
    category: 'aggregate',
    sql: `SELECT c.id, c.type, COALESCE(c.topic, c.dm_key) AS chat_name,
                 COUNT(m.id)::int AS message_count
          FROM chats c
          LEFT JOIN messages m ON m.chat_id = c.id
          GROUP BY c.id, c.type, c.topic, c.dm_key
          ORDER BY message_count DESC, c.id
          LIMIT 20`,
    thresholdMs: 100,
  },
]
