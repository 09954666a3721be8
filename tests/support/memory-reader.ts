/**
 * In-memory StoreReader over plain row arrays, for exercising checks
 * against hand-built (and deliberately broken) datasets.
 */

import type { ChatRow, MembershipRow, MessageRow, UserRow } from '../../datasets/chat/model'
import type {
  ActivityHistogram,
  DirectChatMembers,
  InspectedChat,
  InspectedMessage,
  InspectedUser,
  Offenders,
  StoredCounts,
  StoreReader,
} from '../../verifier/types'

export interface MemoryDataset {
  users: UserRow[]
  chats: ChatRow[]
  memberships: MembershipRow[]
  messages: MessageRow[]
}

export function emptyDataset(): MemoryDataset {
  return { users: [], chats: [], memberships: [], messages: [] }
}

function byKey<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => (key(a) < key(b) ? -1 : key(a) > key(b) ? 1 : 0)
}

function duplicates(keys: string[]): string[] {
  const seen = new Map<string, number>()
  for (const key of keys) seen.set(key, (seen.get(key) ?? 0) + 1)
  return [...seen].filter(([, n]) => n > 1).map(([key]) => key)
}

export class MemoryStoreReader implements StoreReader {
  constructor(
    readonly data: MemoryDataset,
    private readonly sampleLimit = 10
  ) {}

  private offenders(ids: string[]): Offenders {
    const sorted = [...ids].sort()
    return { total: sorted.length, sample: sorted.slice(0, this.sampleLimit) }
  }

  private members(chatId: string): MembershipRow[] {
    return this.data.memberships.filter((m) => m.chatId === chatId)
  }

  private chat(chatId: string): ChatRow | undefined {
    return this.data.chats.find((c) => c.id === chatId)
  }

  async countEntities(): Promise<StoredCounts> {
    const { users, chats, memberships, messages } = this.data
    return {
      users: users.length,
      chats: chats.length,
      directChats: chats.filter((c) => c.kind === 'direct').length,
      groupChats: chats.filter((c) => c.kind === 'group').length,
      memberships: memberships.length,
      messages: messages.length,
    }
  }

  async duplicatePrimaryKeys(): Promise<Offenders> {
    return this.offenders([
      ...duplicates(this.data.users.map((u) => u.id)).map((id) => `users:${id}`),
      ...duplicates(this.data.chats.map((c) => c.id)).map((id) => `chats:${id}`),
      ...duplicates(this.data.messages.map((m) => m.id)).map((id) => `messages:${id}`),
    ])
  }

  async duplicateUsernames(): Promise<Offenders> {
    return this.offenders(duplicates(this.data.users.map((u) => u.username.toLowerCase())))
  }

  async duplicateMemberships(): Promise<Offenders> {
    return this.offenders(duplicates(this.data.memberships.map((m) => `${m.chatId}:${m.userId}`)))
  }

  async duplicateDirectKeys(): Promise<Offenders> {
    const keys = this.data.chats.flatMap((c) => (c.directKey === null ? [] : [c.directKey]))
    return this.offenders(duplicates(keys))
  }

  async orphanMemberships(): Promise<Offenders> {
    const userIds = new Set(this.data.users.map((u) => u.id))
    return this.offenders(
      this.data.memberships
        .filter((m) => !this.chat(m.chatId) || !userIds.has(m.userId))
        .map((m) => `${m.chatId}:${m.userId}`)
    )
  }

  async orphanMessages(): Promise<Offenders> {
    const userIds = new Set(this.data.users.map((u) => u.id))
    return this.offenders(
      this.data.messages.filter((m) => !this.chat(m.chatId) || !userIds.has(m.senderId)).map((m) => m.id)
    )
  }

  async messagesFromNonMembers(): Promise<Offenders> {
    return this.offenders(
      this.data.messages
        .filter(
          (m) =>
            !this.members(m.chatId).some(
              (mb) => mb.userId === m.senderId && mb.joinedAt.getTime() <= m.createdAt.getTime()
            )
        )
        .map((m) => m.id)
    )
  }

  async directChatsWithoutTwoMembers(): Promise<Offenders> {
    return this.offenders(
      this.data.chats.filter((c) => c.kind === 'direct' && this.members(c.id).length !== 2).map((c) => c.id)
    )
  }

  async groupChatsBelow(minMembers: number): Promise<Offenders> {
    return this.offenders(
      this.data.chats.filter((c) => c.kind === 'group' && this.members(c.id).length < minMembers).map((c) => c.id)
    )
  }

  async directChatMembers(afterId: string | null, limit: number): Promise<DirectChatMembers[]> {
    return this.data.chats
      .filter((c) => c.kind === 'direct' && (afterId === null || c.id > afterId))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, limit)
      .map((c) => ({ chatId: c.id, dmKey: c.directKey, memberIds: this.members(c.id).map((m) => m.userId) }))
  }

  async chatKindMismatches(): Promise<Offenders> {
    return this.offenders(
      this.data.chats
        .filter(
          (c) =>
            (c.kind === 'direct' && (c.directKey === null || c.topic !== null)) ||
            (c.kind === 'group' && c.directKey !== null)
        )
        .map((c) => c.id)
    )
  }

  async malformedUsernames(): Promise<Offenders> {
    return this.offenders(
      this.data.users.filter((u) => u.username.trim() === '' || u.username !== u.username.toLowerCase()).map((u) => u.id)
    )
  }

  async emptyMessages(): Promise<Offenders> {
    return this.offenders(this.data.messages.filter((m) => m.content.trim() === '').map((m) => m.id))
  }

  async messagesBeforeChatCreation(): Promise<Offenders> {
    return this.offenders(
      this.data.messages
        .filter((m) => {
          const chat = this.chat(m.chatId)
          return chat !== undefined && m.createdAt.getTime() < chat.createdAt.getTime()
        })
        .map((m) => m.id)
    )
  }

  async membershipsBeforeChatCreation(): Promise<Offenders> {
    return this.offenders(
      this.data.memberships
        .filter((mb) => {
          const chat = this.chat(mb.chatId)
          return chat !== undefined && mb.joinedAt.getTime() < chat.createdAt.getTime()
        })
        .map((mb) => `${mb.chatId}:${mb.userId}`)
    )
  }

  async activityHistogram(businessHours: { start: number; end: number }): Promise<ActivityHistogram> {
    let business = 0
    let weekdays = 0
    for (const m of this.data.messages) {
      const hour = m.createdAt.getUTCHours()
      const day = m.createdAt.getUTCDay()
      if (hour >= businessHours.start && hour < businessHours.end) business++
      if (day !== 0 && day !== 6) weekdays++
    }
    return { total: this.data.messages.length, businessHours: business, weekdays }
  }

  private chatName(chat: ChatRow): string {
    if (chat.kind === 'group') return chat.topic ?? ''
    return this.members(chat.id)
      .flatMap((m) => this.data.users.filter((u) => u.id === m.userId).map((u) => u.username))
      .sort()
      .join(' & ')
  }

  async sampleUsers(limit: number): Promise<InspectedUser[]> {
    return [...this.data.users]
      .sort(byKey<UserRow>((u) => `${u.createdAt.toISOString()} ${u.username}`))
      .slice(0, limit)
      .map((u) => ({ username: u.username, status: u.status, createdAt: u.createdAt.toISOString() }))
  }

  async chatStructure(limit: number): Promise<InspectedChat[]> {
    return this.data.chats
      .map((c) => ({
        kind: c.kind,
        name: this.chatName(c),
        members: this.members(c.id).length,
        messages: this.data.messages.filter((m) => m.chatId === c.id).length,
      }))
      .sort(byKey<InspectedChat>((c) => `${c.kind} ${c.name}`))
      .slice(0, limit)
  }

  async recentMessages(limit: number): Promise<InspectedMessage[]> {
    return [...this.data.messages]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || byKey<MessageRow>((m) => m.id)(a, b))
      .slice(0, limit)
      .map((m) => {
        const chat = this.chat(m.chatId)
        return {
          createdAt: m.createdAt.toISOString(),
          sender: this.data.users.find((u) => u.id === m.senderId)?.username ?? '',
          chat: chat ? this.chatName(chat) : '',
          content: m.content,
        }
      })
  }
}
