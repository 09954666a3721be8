/**
 * Distribution-sampling strategy for scale datasets.
 *
 * Users get handles built from a vocabulary, direct chats pair distinct
 * users (never the same pair twice), group chats draw a size from the
 * configured range, and messages land in chats weighted by member count
 * with timestamps from the activity model.
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import { directChatKey, type Entity, type MemberRole } from '../../datasets/chat/model'
import type { CountExpectations } from '../../verifier/types'
import { ConfigError, type SamplingConfig } from '../config'
import type { RunContext } from '../context'
import { hashPassword } from '../credentials'
import { GenerationError } from '../errors'
import { pick, pickWeightedIndex, randomInt, sampleDistinct, shuffle, type Rng } from '../rng'
import { ActivityModel } from '../temporal'
import type { GenerationStrategy } from './types'

const MINUTE_MS = 60 * 1000
const DAY_MS = 24 * 60 * MINUTE_MS

// Accounts exist for up to this long before the history window opens
const ACCOUNT_LEAD_MS = 60 * DAY_MS
const MAX_JOIN_DELAY_MS = 60 * MINUTE_MS

const VOCABULARY_FILE = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../datasets/chat/data/vocabulary.json'
)

const wordList = z.array(z.string().min(1)).min(1)

const vocabularySchema = z.object({
  firstNames: wordList,
  lastNames: wordList,
  handleSuffixes: wordList,
  teamTypes: wordList,
  projects: wordList,
  departments: wordList,
  casualGroups: wordList,
  messageTemplates: wordList,
})

export type Vocabulary = z.infer<typeof vocabularySchema>

export function loadVocabulary(file: string = VOCABULARY_FILE): Vocabulary {
  const parsed = vocabularySchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')))
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `vocabulary[${i.path.join('.')}]: ${i.message}`))
  }
  return parsed.data
}

interface Member {
  userId: string
  joinedAt: Date
}

interface ChatPlan {
  id: string
  createdAt: Date
  members: Member[]
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

/**
 * Take `base`, or `base2`, `base3`... whichever is not yet in `taken`.
 */
function uniqueName(base: string, taken: Set<string>, separator = ''): string {
  let name = base
  for (let n = 2; taken.has(name); n++) {
    name = `${base}${separator}${n}`
  }
  taken.add(name)
  return name
}

export class SamplingStrategy implements GenerationStrategy {
  readonly name = 'sampling'
  readonly idempotent = false
  readonly defaultIdMode = 'seeded'

  constructor(
    private readonly config: SamplingConfig,
    private readonly vocabulary: Vocabulary = loadVocabulary()
  ) {}

  expectations(): CountExpectations {
    const { users, directChats, groupChats, groupSize, messages } = this.config
    const exact = (n: number) => ({ min: n, max: n })
    const largestGroup = Math.min(groupSize.max, users)

    return {
      users: exact(users),
      chats: exact(directChats + groupChats),
      directChats: exact(directChats),
      groupChats: exact(groupChats),
      memberships: {
        min: 2 * directChats + groupSize.min * groupChats,
        max: 2 * directChats + largestGroup * groupChats,
      },
      messages: exact(messages),
      groupMinMembers: groupSize.min,
      activity: this.config.activity,
    }
  }

  *entities(ctx: RunContext): Iterable<Entity> {
    const { rng } = ctx
    const anchor = ctx.anchor.getTime()
    const windowStart = anchor - this.config.historyDays * DAY_MS
    const activity = new ActivityModel(new Date(windowStart), ctx.anchor, this.config.activity)

    // Users
    const handles = new Set<string>()
    const userIds: string[] = []
    const usernames = new Map<string, string>()
    for (let i = 0; i < this.config.users; i++) {
      const first = pick(this.vocabulary.firstNames, rng)
      const last = pick(this.vocabulary.lastNames, rng)
      const username = uniqueName(this.generateHandle(first, last, rng), handles)
      const id = ctx.ids.issue(`user:${username}`)
      userIds.push(id)
      usernames.set(id, username)

      yield {
        kind: 'user',
        row: {
          id,
          username,
          displayName: `${capitalize(first)} ${capitalize(last)}`,
          passwordHash: hashPassword(this.config.password, id),
          status: 'active',
          createdAt: new Date(windowStart - Math.floor(rng() * ACCOUNT_LEAD_MS) - 1),
        },
      }
    }

    const activeCount = Math.max(1, Math.round(userIds.length * this.config.activeUserRatio))
    const activeUsers = new Set(sampleDistinct(userIds, activeCount, rng))

    // Chats open in the first half of the window so every chat has history
    const chatCreatedAt = () => new Date(windowStart + Math.floor(rng() * (this.config.historyDays * DAY_MS) / 2))
    const chats: ChatPlan[] = []

    const openChat = function* (
      id: string,
      kind: 'direct' | 'group',
      memberIds: string[],
      topic: string | null,
      roles: MemberRole[]
    ): Generator<Entity> {
      const createdAt = chatCreatedAt()
      const directKey = kind === 'direct' ? directChatKey(memberIds[0], memberIds[1]) : null
      yield { kind: 'chat', row: { id, kind, topic, directKey, createdAt } }

      const members: Member[] = []
      for (const [i, userId] of memberIds.entries()) {
        const joinedAt = new Date(createdAt.getTime() + Math.floor(rng() * MAX_JOIN_DELAY_MS))
        members.push({ userId, joinedAt })
        yield { kind: 'membership', row: { chatId: id, userId, role: roles[i], joinedAt } }
      }
      chats.push({ id, createdAt, members })
    }

    // Direct chats
    for (const [a, b] of this.samplePairs(userIds, rng)) {
      const [ha, hb] = [usernames.get(a) ?? a, usernames.get(b) ?? b].sort()
      const id = ctx.ids.issue(`chat:direct:${ha}:${hb}`)
      yield* openChat(id, 'direct', [a, b], null, ['member', 'member'])
    }

    // Group chats
    const topics = new Set<string>()
    const maxSize = Math.min(this.config.groupSize.max, userIds.length)
    for (let i = 0; i < this.config.groupChats; i++) {
      const size = randomInt(this.config.groupSize.min, maxSize, rng)
      const memberIds = sampleDistinct(userIds, size, rng)
      const roles = memberIds.map((_, j): MemberRole =>
        j === 0 || rng() < this.config.adminPromotionChance ? 'admin' : 'member'
      )
      const topic = uniqueName(this.generateTopic(rng), topics, ' ')
      const id = ctx.ids.issue(`chat:group:${topic}`)
      yield* openChat(id, 'group', memberIds, topic, roles)
    }

    // Messages
    if (this.config.messages === 0) return
    const cumulative: number[] = []
    let total = 0
    for (const chat of chats) {
      total += Math.max(1, Math.floor(chat.members.length / 2))
      cumulative.push(total)
    }

    for (let i = 0; i < this.config.messages; i++) {
      const chat = chats[pickWeightedIndex(cumulative, rng)]
      const active = chat.members.filter((m) => activeUsers.has(m.userId))
      const sender = pick(active.length > 0 ? active : chat.members, rng)

      yield {
        kind: 'message',
        row: {
          id: ctx.ids.issue(`message:${i}`),
          chatId: chat.id,
          senderId: sender.userId,
          content: pick(this.vocabulary.messageTemplates, rng),
          createdAt: activity.sample(rng, sender.joinedAt),
        },
      }
    }
  }

  private generateHandle(first: string, last: string, rng: Rng): string {
    const patterns = [
      `${first}${last}`,
      `${first}_${last}`,
      `${first}.${last.charAt(0)}`,
      `${first}_${pick(this.vocabulary.handleSuffixes, rng)}`,
      `${first}${randomInt(1, 999, rng)}`,
    ]
    return pick(patterns, rng).toLowerCase()
  }

  private generateTopic(rng: Rng): string {
    const v = this.vocabulary
    const patterns = [
      () => `${pick(v.teamTypes, rng)} Team`,
      () => `Project ${pick(v.projects, rng)}`,
      () => `${pick(v.departments, rng)} - ${pick(v.teamTypes, rng)}`,
      () => pick(v.casualGroups, rng),
    ]
    return pick(patterns, rng)()
  }

  /**
   * Distinct unordered user pairs, deduplicated by direct-chat key.
   * Dense requests enumerate every pair instead of rejection sampling.
   */
  private samplePairs(userIds: string[], rng: Rng): Array<[string, string]> {
    const count = this.config.directChats
    const n = userIds.length
    const maxPairs = (n * (n - 1)) / 2

    if (count > maxPairs / 2) {
      const all: Array<[string, string]> = []
      for (let i = 0; i < n; i++) {
        for (let j = i + 1; j < n; j++) all.push([userIds[i], userIds[j]])
      }
      return shuffle(all, rng).slice(0, count)
    }

    const seen = new Set<string>()
    const pairs: Array<[string, string]> = []
    const maxAttempts = count * 10 + 100
    for (let attempt = 0; pairs.length < count && attempt < maxAttempts; attempt++) {
      const [a, b] = sampleDistinct(userIds, 2, rng)
      const key = directChatKey(a, b)
      if (seen.has(key)) continue
      seen.add(key)
      pairs.push([a, b])
    }

    if (pairs.length < count) {
      throw new GenerationError(`Only found ${pairs.length} of ${count} distinct direct-chat pairs`)
    }
    return pairs
  }
}
