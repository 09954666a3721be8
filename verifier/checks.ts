/**
 * Verifier checks.
 *
 * Each check is a function of a `StoreReader` and returns its own verdict;
 * none depends on another's outcome or on how the data was produced.
 */

import { directChatKey, isWellFormedDirectKey } from '../datasets/chat/model'
import { expectedShares } from '../generator/temporal'
import type {
  Check,
  CheckName,
  CheckOptions,
  CheckResult,
  CountRange,
  DirectChatMembers,
  Offenders,
  StoredCounts,
  StoreReader,
} from './types'

type Verdict = Omit<CheckResult, 'durationMs'>

const DIRECT_CHAT_PAGE = 500

/**
 * Merge labelled offender sets into one verdict.
 */
function fromOffenders(
  name: CheckName,
  options: CheckOptions,
  parts: Record<string, Offenders>,
  passSummary: string
): Verdict {
  const failing = Object.entries(parts).filter(([, o]) => o.total > 0)
  const totalOffenders = failing.reduce((sum, [, o]) => sum + o.total, 0)
  const offenders = [...new Set(failing.flatMap(([, o]) => o.sample))].slice(0, options.sampleLimit)
  const details = Object.fromEntries(Object.entries(parts).map(([label, o]) => [label, o.total]))

  if (failing.length === 0) {
    return { name, status: 'pass', summary: passSummary, offenders: [], totalOffenders: 0, details }
  }
  return {
    name,
    status: 'fail',
    summary: failing.map(([label, o]) => `${o.total} ${label}`).join(', '),
    offenders,
    totalOffenders,
    details,
  }
}

function outside(value: number, range: CountRange): boolean {
  return value < range.min || value > range.max
}

function describeRange(range: CountRange): string {
  return range.min === range.max ? `${range.min}` : `${range.min}..${range.max}`
}

// ============================================================================
// 1. Row counts
// ============================================================================

export const rowCounts: Check = async (reader, options) => {
  const counts = await reader.countEntities()
  const expectations = options.expectations
  const problems: string[] = []

  if (expectations) {
    const keys: Array<keyof StoredCounts> = ['users', 'chats', 'directChats', 'groupChats', 'memberships', 'messages']
    for (const key of keys) {
      if (outside(counts[key], expectations[key])) {
        problems.push(`${key}=${counts[key]} (expected ${describeRange(expectations[key])})`)
      }
    }
  } else {
    if (counts.chats !== counts.directChats + counts.groupChats) {
      problems.push(`chats=${counts.chats} but direct+group=${counts.directChats + counts.groupChats}`)
    }
    if (counts.memberships < 2 * counts.chats) {
      problems.push(`memberships=${counts.memberships} is fewer than two per chat`)
    }
  }

  const summary = `users=${counts.users} chats=${counts.chats} memberships=${counts.memberships} messages=${counts.messages}`
  return {
    name: 'row-counts',
    status: problems.length === 0 ? 'pass' : 'fail',
    summary: problems.length === 0 ? summary : problems.join('; '),
    offenders: [],
    totalOffenders: problems.length,
    details: { ...counts },
  }
}

// ============================================================================
// 2. Uniqueness
// ============================================================================

export const uniqueness: Check = async (reader, options) => {
  return fromOffenders(
    'uniqueness',
    options,
    {
      'duplicate ids': await reader.duplicatePrimaryKeys(),
      'duplicate usernames': await reader.duplicateUsernames(),
      'duplicate memberships': await reader.duplicateMemberships(),
      'duplicate direct-chat keys': await reader.duplicateDirectKeys(),
    },
    'ids, usernames, memberships and direct-chat keys are unique'
  )
}

// ============================================================================
// 3. Referential integrity
// ============================================================================

export const referentialIntegrity: Check = async (reader, options) => {
  return fromOffenders(
    'referential-integrity',
    options,
    {
      'orphan memberships': await reader.orphanMemberships(),
      'orphan messages': await reader.orphanMessages(),
      'messages from non-members': await reader.messagesFromNonMembers(),
    },
    'every membership and message points at existing rows; senders are members'
  )
}

// ============================================================================
// 4. Cardinality
// ============================================================================

export const cardinality: Check = async (reader, options) => {
  const minMembers = options.expectations?.groupMinMembers ?? 2
  return fromOffenders(
    'cardinality',
    options,
    {
      'direct chats without exactly 2 members': await reader.directChatsWithoutTwoMembers(),
      [`group chats with fewer than ${minMembers} members`]: await reader.groupChatsBelow(minMembers),
    },
    `direct chats have 2 members; groups have at least ${minMembers}`
  )
}

// ============================================================================
// 5. Format
// ============================================================================

async function malformedDirectKeys(reader: StoreReader, sampleLimit: number): Promise<Offenders> {
  const sample: string[] = []
  let total = 0
  let afterId: string | null = null

  for (;;) {
    const page: DirectChatMembers[] = await reader.directChatMembers(afterId, DIRECT_CHAT_PAGE)
    for (const chat of page) {
      // A missing key is a kind mismatch
      if (chat.dmKey === null) continue
      const [a, b] = chat.memberIds
      // The members only pin the key down when there are exactly two;
      // other member counts belong to the cardinality check
      const mismatched = chat.memberIds.length === 2 && chat.dmKey !== directChatKey(a, b)
      if (!isWellFormedDirectKey(chat.dmKey) || mismatched) {
        total++
        if (sample.length < sampleLimit) sample.push(chat.chatId)
      }
    }
    if (page.length < DIRECT_CHAT_PAGE) break
    afterId = page[page.length - 1].chatId
  }

  return { total, sample }
}

export const format: Check = async (reader, options) => {
  return fromOffenders(
    'format',
    options,
    {
      'malformed direct-chat keys': await malformedDirectKeys(reader, options.sampleLimit),
      'chats with columns not matching their kind': await reader.chatKindMismatches(),
      'empty or non-lowercase usernames': await reader.malformedUsernames(),
      'empty messages': await reader.emptyMessages(),
    },
    'direct-chat keys match their members; chat kinds, usernames and bodies are well-formed'
  )
}

// ============================================================================
// 6. Temporal
// ============================================================================

/**
 * Observed share counts as "weighted" when it sits closer to the weighted
 * expectation than to the flat one.
 */
function closerToWeighted(observed: number, weighted: number, uniform: number): boolean {
  return Math.abs(observed - weighted) < Math.abs(observed - uniform)
}

export const temporal: Check = async (reader, options) => {
  const ordering = fromOffenders(
    'temporal',
    options,
    {
      'messages before chat creation': await reader.messagesBeforeChatCreation(),
      'memberships before chat creation': await reader.membershipsBeforeChatCreation(),
    },
    'no message or membership predates its chat'
  )
  if (ordering.status === 'fail') return ordering

  const activity = options.expectations?.activity ?? null
  const histogram = await reader.activityHistogram(activity?.businessHours ?? { start: 9, end: 18 })
  const base = { name: 'temporal' as const, offenders: [], totalOffenders: 0 }

  if (histogram.total === 0) {
    return { ...base, status: 'inconclusive', summary: 'no messages to check', details: { ...histogram } }
  }
  if (!activity) return { ...ordering, details: { ...ordering.details, ...histogram } }

  if (histogram.total < options.minSamples) {
    return {
      ...base,
      status: 'inconclusive',
      summary: `${histogram.total} messages is below the ${options.minSamples} needed for the distribution check`,
      details: { ...histogram },
    }
  }

  const shares = expectedShares(activity)
  const observedBusiness = histogram.businessHours / histogram.total
  const observedWeekdays = histogram.weekdays / histogram.total
  const details = {
    ...histogram,
    observedBusinessShare: observedBusiness,
    expectedBusinessShare: shares.businessHours,
    observedWeekdayShare: observedWeekdays,
    expectedWeekdayShare: shares.weekdays,
  }

  if (shares.businessHours === shares.uniformBusinessHours && shares.weekdays === shares.uniformWeekdays) {
    return { ...base, status: 'inconclusive', summary: 'configured weighting is flat; nothing to compare', details }
  }

  const problems: string[] = []
  if (
    shares.businessHours !== shares.uniformBusinessHours &&
    !closerToWeighted(observedBusiness, shares.businessHours, shares.uniformBusinessHours)
  ) {
    problems.push(`business-hour share ${observedBusiness.toFixed(3)} (expected ~${shares.businessHours.toFixed(3)})`)
  }
  if (
    shares.weekdays !== shares.uniformWeekdays &&
    !closerToWeighted(observedWeekdays, shares.weekdays, shares.uniformWeekdays)
  ) {
    problems.push(`weekday share ${observedWeekdays.toFixed(3)} (expected ~${shares.weekdays.toFixed(3)})`)
  }

  if (problems.length > 0) {
    return { ...base, status: 'fail', summary: problems.join('; '), totalOffenders: problems.length, details }
  }
  return {
    ...base,
    status: 'pass',
    summary:
      `ordering holds; business-hour share ${observedBusiness.toFixed(3)}, ` +
      `weekday share ${observedWeekdays.toFixed(3)}`,
    details,
  }
}

export const checks: Array<{ name: CheckName; run: Check }> = [
  { name: 'row-counts', run: rowCounts },
  { name: 'uniqueness', run: uniqueness },
  { name: 'referential-integrity', run: referentialIntegrity },
  { name: 'cardinality', run: cardinality },
  { name: 'format', run: format },
  { name: 'temporal', run: temporal },
]
