/**
 * Run-scoped generation state.
 *
 * Everything mutable that outlives a single batch (id bookkeeping, progress
 * counters) lives here, one instance per run.
 */

import * as crypto from 'crypto'
import { emptyCounts, type EntityCounts, type EntityKind } from '../datasets/chat/model'
import type { Logger } from '../instrumentation/logger'
import { IdentityFactory, type IdMode } from './identity'
import { createRng, type Rng } from './rng'

export interface Progress {
  batchesCommitted: number
  /** Entities produced by the strategy so far */
  generated: EntityCounts
  /** Rows the store reports as written in committed batches */
  inserted: EntityCounts
}

export interface RunContext {
  readonly runId: string
  readonly seed: number
  readonly rng: Rng
  readonly ids: IdentityFactory
  readonly anchor: Date
  readonly logger: Logger
  readonly signal?: AbortSignal
  readonly progress: Progress
}

export interface RunContextOptions {
  seed: number
  idMode: IdMode
  anchor: Date
  logger: Logger
  signal?: AbortSignal
  runId?: string
}

export function createRunContext(options: RunContextOptions): RunContext {
  const rng = createRng(options.seed)
  return {
    runId: options.runId ?? crypto.randomUUID(),
    seed: options.seed,
    rng,
    ids: new IdentityFactory(options.idMode, rng),
    anchor: options.anchor,
    logger: options.logger,
    signal: options.signal,
    progress: {
      batchesCommitted: 0,
      generated: emptyCounts(),
      inserted: emptyCounts(),
    },
  }
}

export function countGenerated(ctx: RunContext, kind: EntityKind): void {
  ctx.progress.generated[kind]++
}
