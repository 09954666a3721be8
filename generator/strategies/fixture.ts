/**
 * Fixed-fixture strategy.
 *
 * Reads a small catalogue of named users and scripted conversations and
 * writes them verbatim. Ids are derived from logical names and timestamps
 * from the configured anchor, so two runs produce identical rows.
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { directChatKey, type ChatRow, type Entity, type MemberRole } from '../../datasets/chat/model'
import type { CountExpectations } from '../../verifier/types'
import { ConfigError, type FixtureConfig } from '../config'
import type { RunContext } from '../context'
import { hashPassword } from '../credentials'
import type { GenerationStrategy } from './types'

const MINUTE_MS = 60 * 1000
const DAY_MS = 24 * 60 * MINUTE_MS

// Offsets relative to the anchor
const USER_CREATED_OFFSET = -30 * DAY_MS
const CHAT_CREATED_OFFSET = -150 * MINUTE_MS
const MEMBER_JOINED_OFFSET = -140 * MINUTE_MS

export const DEFAULT_FIXTURE_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../datasets/chat/fixtures'
)

const fixtureUserSchema = z.object({
  username: z.string().regex(/^[a-z0-9._-]+$/, 'usernames are lowercase handles'),
  displayName: z.string().min(1),
})

const fixtureMessageSchema = z.object({
  sender: z.string(),
  content: z.string().min(1),
  offsetMinutes: z.number().int().min(MEMBER_JOINED_OFFSET / MINUTE_MS, 'messages cannot predate their members joining'),
})

const fixtureConversationSchema = z.object({
  type: z.enum(['direct', 'group']),
  topic: z.string().min(1).optional(),
  participants: z.array(z.string()).min(2),
  messages: z.array(fixtureMessageSchema).default([]),
})

export type FixtureUser = z.infer<typeof fixtureUserSchema>
export type FixtureConversation = z.infer<typeof fixtureConversationSchema>

export interface Fixtures {
  users: FixtureUser[]
  conversations: FixtureConversation[]
}

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError([`fixtures: cannot read ${file}: ${message}`])
  }
}

function issuesOf(file: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => `${file}[${issue.path.join('.')}]: ${issue.message}`)
}

/**
 * Check the cross-references zod cannot express on its own.
 */
export function validateFixtures(fixtures: Fixtures): string[] {
  const issues: string[] = []
  const usernames = new Set<string>()
  for (const user of fixtures.users) {
    if (usernames.has(user.username)) issues.push(`users: duplicate username "${user.username}"`)
    usernames.add(user.username)
  }

  const chatNames = new Set<string>()
  fixtures.conversations.forEach((conv, i) => {
    const where = `conversations[${i}]`
    const participants = new Set(conv.participants)

    for (const name of conv.participants) {
      if (!usernames.has(name)) issues.push(`${where}: unknown participant "${name}"`)
    }
    if (participants.size !== conv.participants.length) {
      issues.push(`${where}: participants repeat`)
    }
    if (conv.type === 'direct' && conv.participants.length !== 2) {
      issues.push(`${where}: direct chats have exactly 2 participants`)
    }
    if (conv.type === 'direct' && conv.topic !== undefined) {
      issues.push(`${where}: direct chats have no topic`)
    }
    if (conv.type === 'group' && conv.topic === undefined) {
      issues.push(`${where}: group chats need a topic`)
    }

    const name = chatLogicalName(conv)
    if (chatNames.has(name)) issues.push(`${where}: duplicate chat ${name}`)
    chatNames.add(name)

    conv.messages.forEach((msg, j) => {
      if (!participants.has(msg.sender)) {
        issues.push(`${where}.messages[${j}]: sender "${msg.sender}" is not a participant`)
      }
    })
  })

  return issues
}

export function loadFixtures(dir: string = DEFAULT_FIXTURE_DIR): Fixtures {
  const usersFile = path.join(dir, 'users.json')
  const conversationsFile = path.join(dir, 'conversations.json')

  const users = z.array(fixtureUserSchema).safeParse(readJson(usersFile))
  const conversations = z.array(fixtureConversationSchema).safeParse(readJson(conversationsFile))

  const issues = [
    ...(users.success ? [] : issuesOf('users.json', users.error)),
    ...(conversations.success ? [] : issuesOf('conversations.json', conversations.error)),
  ]
  if (!users.success || !conversations.success) throw new ConfigError(issues)

  const fixtures = { users: users.data, conversations: conversations.data }
  const crossIssues = validateFixtures(fixtures)
  if (crossIssues.length > 0) throw new ConfigError(crossIssues)
  return fixtures
}

function chatLogicalName(conv: FixtureConversation): string {
  if (conv.type === 'direct') {
    const [a, b] = [...conv.participants].sort()
    return `chat:direct:${a}:${b}`
  }
  return `chat:group:${conv.topic}`
}

export class FixtureStrategy implements GenerationStrategy {
  readonly name = 'fixture'
  readonly idempotent = true
  readonly defaultIdMode = 'hashed'

  constructor(
    private readonly config: FixtureConfig,
    readonly fixtures: Fixtures = loadFixtures(config.fixtureDir)
  ) {}

  expectations(): CountExpectations {
    const exact = (n: number) => ({ min: n, max: n })
    const direct = this.fixtures.conversations.filter((c) => c.type === 'direct')
    const groups = this.fixtures.conversations.filter((c) => c.type === 'group')
    const memberships = this.fixtures.conversations.reduce((sum, c) => sum + c.participants.length, 0)
    const messages = this.fixtures.conversations.reduce((sum, c) => sum + c.messages.length, 0)

    return {
      users: exact(this.fixtures.users.length),
      chats: exact(this.fixtures.conversations.length),
      directChats: exact(direct.length),
      groupChats: exact(groups.length),
      memberships: exact(memberships),
      messages: exact(messages),
      groupMinMembers: 2,
      activity: null,
    }
  }

  *entities(ctx: RunContext): Iterable<Entity> {
    const anchor = ctx.anchor.getTime()
    const userIds = new Map<string, string>()

    for (const user of this.fixtures.users) {
      const id = ctx.ids.issue(`user:${user.username}`)
      userIds.set(user.username, id)
      yield {
        kind: 'user',
        row: {
          id,
          username: user.username,
          displayName: user.displayName,
          passwordHash: hashPassword(this.config.password, id),
          status: 'active',
          createdAt: new Date(anchor + USER_CREATED_OFFSET),
        },
      }
    }

    const idOf = (username: string): string => {
      const id = userIds.get(username)
      if (!id) throw new ConfigError([`fixtures: unknown user "${username}"`])
      return id
    }

    for (const conv of this.fixtures.conversations) {
      const logicalName = chatLogicalName(conv)
      const chatId = ctx.ids.issue(logicalName)
      const memberIds = conv.participants.map(idOf)

      const chat: ChatRow = {
        id: chatId,
        kind: conv.type,
        topic: conv.type === 'group' ? (conv.topic ?? null) : null,
        directKey: conv.type === 'direct' ? directChatKey(memberIds[0], memberIds[1]) : null,
        createdAt: new Date(anchor + CHAT_CREATED_OFFSET),
      }
      yield { kind: 'chat', row: chat }

      for (const [i, userId] of memberIds.entries()) {
        const role: MemberRole = conv.type === 'group' && i === 0 ? 'admin' : 'member'
        yield {
          kind: 'membership',
          row: { chatId, userId, role, joinedAt: new Date(anchor + MEMBER_JOINED_OFFSET) },
        }
      }

      for (const [i, msg] of conv.messages.entries()) {
        yield {
          kind: 'message',
          row: {
            id: ctx.ids.issue(`message:${logicalName}:${i}`),
            chatId,
            senderId: idOf(msg.sender),
            content: msg.content,
            createdAt: new Date(anchor + msg.offsetMinutes * MINUTE_MS),
          },
        }
      }
    }
  }
}
