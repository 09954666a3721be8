/**
 * Messaging entities as the generator produces them.
 */

export type ChatKind = 'direct' | 'group'
export type MemberRole = 'admin' | 'member'
export type UserStatus = 'active' | 'disabled'

export type UserRow = {
  id: string
  username: string
  displayName: string
  passwordHash: string
  status: UserStatus
  createdAt: Date
}

export type ChatRow = {
  id: string
  kind: ChatKind
  topic: string | null
  directKey: string | null
  createdAt: Date
}

export type MembershipRow = {
  chatId: string
  userId: string
  role: MemberRole
  joinedAt: Date
}

export type MessageRow = {
  id: string
  chatId: string
  senderId: string
  content: string
  createdAt: Date
}

export type Entity =
  | { kind: 'user'; row: UserRow }
  | { kind: 'chat'; row: ChatRow }
  | { kind: 'membership'; row: MembershipRow }
  | { kind: 'message'; row: MessageRow }

export type EntityKind = Entity['kind']

export const ENTITY_KINDS: readonly EntityKind[] = ['user', 'chat', 'membership', 'message']

export type EntityCounts = Record<EntityKind, number>

export function emptyCounts(): EntityCounts {
  return { user: 0, chat: 0, membership: 0, message: 0 }
}

export const DIRECT_KEY_SEPARATOR = '::'

/**
 * Order-independent key for the direct chat between two users.
 */
export function directChatKey(a: string, b: string): string {
  return a < b ? `${a}${DIRECT_KEY_SEPARATOR}${b}` : `${b}${DIRECT_KEY_SEPARATOR}${a}`
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

/**
 * True when `key` is two lowercase UUIDs joined by the separator, lower id first.
 */
export function isWellFormedDirectKey(key: string): boolean {
  const parts = key.split(DIRECT_KEY_SEPARATOR)
  if (parts.length !== 2) return false
  const [first, second] = parts
  return UUID.test(first) && UUID.test(second) && first < second
}
