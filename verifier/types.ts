/**
 * Verifier contracts.
 *
 * Checks see the store only through `StoreReader`, so each one can be run
 * against a live database (`SqlStoreReader`) or a fabricated in-memory
 * snapshot.
 */

import type { ActivityWeighting } from '../generator/temporal'

export interface CountRange {
  min: number
  max: number
}

export interface CountExpectations {
  users: CountRange
  chats: CountRange
  directChats: CountRange
  groupChats: CountRange
  memberships: CountRange
  messages: CountRange
  /** Smallest allowed group chat */
  groupMinMembers: number
  /** Weighting the message timestamps were drawn with, if any */
  activity: ActivityWeighting | null
}

export interface StoredCounts {
  users: number
  chats: number
  directChats: number
  groupChats: number
  memberships: number
  messages: number
}

/**
 * Rows breaking an invariant: how many there are, and a bounded sample of
 * their identifiers.
 */
export interface Offenders {
  total: number
  sample: string[]
}

export interface DirectChatMembers {
  chatId: string
  dmKey: string | null
  memberIds: string[]
}

export interface ActivityHistogram {
  total: number
  /** Messages sent inside the business-hours window (UTC) */
  businessHours: number
  /** Messages sent Monday to Friday (UTC) */
  weekdays: number
}

export interface InspectedUser {
  username: string
  status: string
  createdAt: string
}

export interface InspectedChat {
  kind: string
  /** Topic of a group; member usernames of a direct chat */
  name: string
  members: number
  messages: number
}

export interface InspectedMessage {
  createdAt: string
  sender: string
  chat: string
  content: string
}

/**
 * A readable sample of the dataset, printed beside the check verdicts.
 */
export interface DatasetInspection {
  users: InspectedUser[]
  chats: InspectedChat[]
  recentMessages: InspectedMessage[]
}

export interface InspectionLimits {
  users: number
  chats: number
  messages: number
}

export interface StoreReader {
  countEntities(): Promise<StoredCounts>

  // Uniqueness
  duplicatePrimaryKeys(): Promise<Offenders>
  duplicateUsernames(): Promise<Offenders>
  duplicateMemberships(): Promise<Offenders>
  duplicateDirectKeys(): Promise<Offenders>

  // Referential integrity
  orphanMemberships(): Promise<Offenders>
  orphanMessages(): Promise<Offenders>
  /** Messages whose sender had not joined the chat when the message was sent */
  messagesFromNonMembers(): Promise<Offenders>

  // Cardinality
  directChatsWithoutTwoMembers(): Promise<Offenders>
  groupChatsBelow(minMembers: number): Promise<Offenders>

  // Format
  /** Direct chats ordered by id, `limit` at a time after `afterId` */
  directChatMembers(afterId: string | null, limit: number): Promise<DirectChatMembers[]>
  chatKindMismatches(): Promise<Offenders>
  malformedUsernames(): Promise<Offenders>
  emptyMessages(): Promise<Offenders>

  // Temporal
  messagesBeforeChatCreation(): Promise<Offenders>
  membershipsBeforeChatCreation(): Promise<Offenders>
  activityHistogram(businessHours: { start: number; end: number }): Promise<ActivityHistogram>

  // Inspection
  /** Oldest users first */
  sampleUsers(limit: number): Promise<InspectedUser[]>
  /** Direct chats, then groups, by name */
  chatStructure(limit: number): Promise<InspectedChat[]>
  /** Newest messages first */
  recentMessages(limit: number): Promise<InspectedMessage[]>
}

export type CheckName = 'row-counts' | 'uniqueness' | 'referential-integrity' | 'cardinality' | 'format' | 'temporal'

export type CheckStatus = 'pass' | 'fail' | 'inconclusive'

export interface CheckResult {
  name: CheckName
  status: CheckStatus
  summary: string
  /** Bounded sample of offending row identifiers */
  offenders: string[]
  totalOffenders: number
  details?: Record<string, unknown>
  durationMs: number
}

export interface CheckOptions {
  expectations?: CountExpectations
  /** Below this many messages the distribution check is inconclusive */
  minSamples: number
  /** Cap on offenders reported per check */
  sampleLimit: number
}

export type Check = (reader: StoreReader, options: CheckOptions) => Promise<Omit<CheckResult, 'durationMs'>>

export interface VerificationReport {
  kind: 'verification'
  status: 'pass' | 'fail'
  startedAt: string
  durationMs: number
  checks: CheckResult[]
  /** Absent when disabled or when the store could not be sampled */
  inspection?: DatasetInspection
}
