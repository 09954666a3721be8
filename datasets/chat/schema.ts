/**
 * Messaging schema: users, chats, memberships, messages.
 *
 * The production schema is owned by whoever provisions the store; this copy
 * bootstraps embedded stores and the test suite.
 */

import type { Store } from '../../databases/types'
import { generateIndexDDL, generateTableDDL, type TableConfig } from '../types'

export const tables: TableConfig[] = [
  {
    name: 'users',
    columns: [
      { name: 'id', type: 'uuid', primaryKey: true },
      { name: 'username', type: 'string', maxLength: 64, unique: true },
      { name: 'display_name', type: 'string', maxLength: 128 },
      { name: 'password_hash', type: 'text' },
      { name: 'status', type: 'string', maxLength: 16, default: 'active', oneOf: ['active', 'disabled'] },
      { name: 'created_at', type: 'timestamp' },
    ],
    indexes: [{ name: 'idx_users_created_at', columns: ['created_at'] }],
  },
  {
    name: 'chats',
    columns: [
      { name: 'id', type: 'uuid', primaryKey: true },
      { name: 'type', type: 'string', maxLength: 16, oneOf: ['direct', 'group'] },
      { name: 'topic', type: 'string', maxLength: 200, nullable: true },
      { name: 'dm_key', type: 'string', maxLength: 80, nullable: true, unique: true },
      { name: 'created_at', type: 'timestamp' },
    ],
  },
  {
    name: 'memberships',
    columns: [
      { name: 'chat_id', type: 'uuid', references: { table: 'chats', column: 'id' } },
      { name: 'user_id', type: 'uuid', references: { table: 'users', column: 'id' } },
      { name: 'role', type: 'string', maxLength: 16, default: 'member', oneOf: ['admin', 'member'] },
      { name: 'joined_at', type: 'timestamp' },
    ],
    indexes: [
      { name: 'uq_memberships_chat_user', columns: ['chat_id', 'user_id'], unique: true },
      { name: 'idx_memberships_user', columns: ['user_id'] },
    ],
  },
  {
    name: 'messages',
    columns: [
      { name: 'id', type: 'uuid', primaryKey: true },
      { name: 'chat_id', type: 'uuid', references: { table: 'chats', column: 'id' } },
      { name: 'sender_id', type: 'uuid', references: { table: 'users', column: 'id' } },
      { name: 'content', type: 'text' },
      { name: 'created_at', type: 'timestamp' },
    ],
    indexes: [
      { name: 'idx_messages_chat_created', columns: ['chat_id', 'created_at'] },
      { name: 'idx_messages_sender_created', columns: ['sender_id', 'created_at'] },
    ],
  },
]

/**
 * Create tables and indexes if they do not exist.
 */
export async function applySchema(store: Store): Promise<void> {
  await store.transaction(async (tx) => {
    for (const table of tables) {
      await tx.query(generateTableDDL(table))
      for (const ddl of generateIndexDDL(table)) {
        await tx.query(ddl)
      }
    }
  })
}

export type CleanReport = Record<string, number>

/**
 * Delete every row, children before parents, in one transaction.
 */
export async function cleanDataset(store: Store): Promise<CleanReport> {
  return store.transaction(async (tx) => {
    const deleted: CleanReport = {}
    for (const table of [...tables].reverse()) {
      const result = await tx.query(`DELETE FROM ${table.name}`)
      deleted[table.name] = result.rowCount
    }
    return deleted
  })
}
