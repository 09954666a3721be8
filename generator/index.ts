/**
 * Dataset generator.
 *
 * Usage:
 * ```typescript
 * const store = await openStore(resolveConnectionString('writer'))
 * const report = await generateDataset(store, { strategy: 'fixture' })
 * console.log(formatGenerationReport(report))
 * ```
 *
 * Configuration problems throw `ConfigError` before the store is touched.
 * Everything after that ends in a report whose `status` says how the run
 * went; batches committed before a failure are listed in `inserted`.
 */

import * as crypto from 'crypto'
import type { ConstraintViolation } from '../databases/errors'
import type { Store } from '../databases/types'
import type { EntityCounts } from '../datasets/chat/model'
import { silentLogger, type Logger } from '../instrumentation/logger'
import type { CountExpectations } from '../verifier/types'
import { BatchWriter } from './batch-writer'
import { parseGeneratorConfig, type GeneratorConfig } from './config'
import { createRunContext, type Progress } from './context'
import { BatchFlushError, CancelledError } from './errors'
import type { IdMode } from './identity'
import { selectStrategy } from './strategies'

export type GenerationStatus = 'success' | 'failure' | 'cancelled'

export interface GenerationFailure {
  batchIndex: number
  attempts: number
  cause: string
  violation?: ConstraintViolation
}

export interface GenerationReport {
  kind: 'generation'
  runId: string
  strategy: GeneratorConfig['strategy']
  status: GenerationStatus
  seed: number
  idMode: IdMode
  startedAt: string
  durationMs: number
  batches: number
  generated: EntityCounts
  inserted: EntityCounts
  messagesPerSecond: number
  expectations: CountExpectations
  failure?: GenerationFailure
}

export interface GenerateOptions {
  logger?: Logger
  signal?: AbortSignal
  onProgress?: (progress: Progress) => void
  runId?: string
}

export async function generateDataset(
  store: Store,
  input: unknown,
  options: GenerateOptions = {}
): Promise<GenerationReport> {
  const config = parseGeneratorConfig(input)
  const strategy = selectStrategy(config)
  const expectations = strategy.expectations()
  const logger = options.logger ?? silentLogger

  const seed = config.strategy === 'sampling' ? (config.seed ?? crypto.randomInt(0, 2 ** 31 - 1)) : 0
  const idMode = config.idMode ?? strategy.defaultIdMode
  const ctx = createRunContext({
    seed,
    idMode,
    anchor: new Date(config.anchor),
    logger,
    signal: options.signal,
    runId: options.runId,
  })

  const writer = new BatchWriter(store, ctx, {
    batchSize: config.batchSize,
    conflict: strategy.idempotent ? 'skip' : 'fail',
    retry: config.retry,
    timeoutMs: config.roundTripTimeoutMs,
    onProgress: options.onProgress,
  })

  const startedAt = new Date()
  const start = performance.now()
  logger.info(`run ${ctx.runId}: ${strategy.name} strategy, seed ${seed}, ${idMode} ids, batch size ${config.batchSize}`)

  let status: GenerationStatus = 'success'
  let failure: GenerationFailure | undefined

  try {
    await writer.writeAll(strategy.entities(ctx))
  } catch (error) {
    if (error instanceof CancelledError) {
      status = 'cancelled'
      logger.warn(`${error.message}; ${ctx.progress.batchesCommitted} batch(es) committed`)
    } else if (error instanceof BatchFlushError) {
      status = 'failure'
      failure = {
        batchIndex: error.batchIndex,
        attempts: error.attempts,
        cause: error.lastError.message,
        violation: error.violation,
      }
      logger.error(error.message, error)
    } else {
      status = 'failure'
      failure = {
        batchIndex: ctx.progress.batchesCommitted,
        attempts: 0,
        cause: error instanceof Error ? error.message : String(error),
      }
      logger.error(`generation stopped: ${failure.cause}`, error)
    }
  }

  const durationMs = performance.now() - start
  const { progress } = ctx

  return {
    kind: 'generation',
    runId: ctx.runId,
    strategy: strategy.name,
    status,
    seed,
    idMode,
    startedAt: startedAt.toISOString(),
    durationMs,
    batches: progress.batchesCommitted,
    generated: { ...progress.generated },
    inserted: { ...progress.inserted },
    messagesPerSecond: durationMs > 0 ? (progress.inserted.message / durationMs) * 1000 : 0,
    expectations,
    failure,
  }
}

export { ConfigError, parseGeneratorConfig, presetConfig } from './config'
export type { GeneratorConfig, GeneratorConfigInput } from './config'
export { expectationsFor, selectStrategy } from './strategies'
