/**
 * Check that the store enforces the constraints the generator relies on.
 *
 * Each probe inserts a row that must be rejected, inside a transaction that
 * is always rolled back, so the store is left unchanged either way.
 */

import { constraintViolationOf, errorMessage } from '../databases/errors'
import type { Store } from '../databases/types'
import { directChatKey } from '../datasets/chat/model'
import { hashedUuid } from './identity'

export interface ConstraintProbe {
  name: string
  description: string
  /** Statements run in order; the last one is expected to fail */
  statements: Array<{ sql: string; params: unknown[] }>
  expected: 'unique' | 'foreign-key'
}

export interface ConstraintProbeResult {
  name: string
  enforced: boolean
  detail: string
}

export interface ConstraintProbeReport {
  kind: 'constraint-probe'
  enforced: boolean
  probes: ConstraintProbeResult[]
}

class ProbeRollback extends Error {
  readonly name = 'ProbeRollback'
}

const NOW = '2024-01-01T00:00:00.000Z'

function probeIds() {
  const id = (name: string) => hashedUuid('constraint-probe', name)
  return { a: id('user-a'), b: id('user-b'), chat: id('chat'), missing: id('missing') }
}

export function constraintProbes(): ConstraintProbe[] {
  const { a, b, chat, missing } = probeIds()
  const user = (id: string, username: string) => ({
    sql: `INSERT INTO users (id, username, display_name, password_hash, status, created_at)
          VALUES ($1, $2, $3, 'x', 'active', $4)`,
    params: [id, username, username, NOW],
  })
  const directChat = (id: string) => ({
    sql: `INSERT INTO chats (id, type, topic, dm_key, created_at) VALUES ($1, 'direct', NULL, $2, $3)`,
    params: [id, directChatKey(a, b), NOW],
  })
  const membership = (userId: string) => ({
    sql: `INSERT INTO memberships (chat_id, user_id, role, joined_at) VALUES ($1, $2, 'member', $3)`,
    params: [chat, userId, NOW],
  })

  return [
    {
      name: 'unique_username',
      description: 'two users cannot share a username',
      statements: [user(a, 'probe_user'), user(b, 'probe_user')],
      expected: 'unique',
    },
    {
      name: 'unique_dm_key',
      description: 'one direct chat per user pair',
      statements: [directChat(chat), directChat(missing)],
      expected: 'unique',
    },
    {
      name: 'unique_membership',
      description: 'a user joins a chat once',
      statements: [user(a, 'probe_user'), directChat(chat), membership(a), membership(a)],
      expected: 'unique',
    },
    {
      name: 'membership_user_fk',
      description: 'memberships reference existing users',
      statements: [directChat(chat), membership(missing)],
      expected: 'foreign-key',
    },
    {
      name: 'message_chat_fk',
      description: 'messages reference existing chats',
      statements: [
        user(a, 'probe_user'),
        {
          sql: `INSERT INTO messages (id, chat_id, sender_id, content, created_at) VALUES ($1, $2, $3, 'probe', $4)`,
          params: [b, missing, a, NOW],
        },
      ],
      expected: 'foreign-key',
    },
  ]
}

async function runProbe(store: Store, probe: ConstraintProbe): Promise<ConstraintProbeResult> {
  let outcome: ConstraintProbeResult | undefined
  try {
    await store.transaction(async (tx) => {
      const setup = probe.statements.slice(0, -1)
      const violating = probe.statements[probe.statements.length - 1]
      for (const stmt of setup) await tx.query(stmt.sql, stmt.params)

      try {
        await tx.query(violating.sql, violating.params)
        outcome = { name: probe.name, enforced: false, detail: `violating insert accepted (${probe.description})` }
      } catch (error) {
        const violation = constraintViolationOf(error)
        outcome = {
          name: probe.name,
          enforced: violation?.kind === probe.expected,
          detail: violation
            ? `rejected: ${violation.constraint ?? violation.code}`
            : `unexpected error: ${errorMessage(error)}`,
        }
      }
      throw new ProbeRollback('rollback')
    })
  } catch (error) {
    if (!(error instanceof ProbeRollback)) {
      return { name: probe.name, enforced: false, detail: `setup failed: ${errorMessage(error)}` }
    }
  }
  return outcome ?? { name: probe.name, enforced: false, detail: 'probe did not run' }
}

export async function probeConstraintEnforcement(store: Store): Promise<ConstraintProbeReport> {
  const probes: ConstraintProbeResult[] = []
  for (const probe of constraintProbes()) {
    probes.push(await runProbe(store, probe))
  }
  return { kind: 'constraint-probe', enforced: probes.every((p) => p.enforced), probes }
}
