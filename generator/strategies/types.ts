import type { Entity } from '../../datasets/chat/model'
import type { CountExpectations } from '../../verifier/types'
import type { RunContext } from '../context'
import type { IdMode } from '../identity'

/**
 * A way of producing a dataset.
 *
 * `entities` yields rows in dependency order: every user before any chat,
 * each chat before its memberships, and memberships before messages that
 * reference them. The batch writer relies on that order.
 */
export interface GenerationStrategy {
  readonly name: 'fixture' | 'sampling'
  /** Re-running against a store that already holds the output changes nothing */
  readonly idempotent: boolean
  readonly defaultIdMode: IdMode
  expectations(): CountExpectations
  entities(ctx: RunContext): Iterable<Entity>
}
