/**
 * Query benchmark harness.
 *
 * Runs every catalogue entry for a warm-up trial (discarded) plus the
 * configured number of measured trials, and compares the mean latency with
 * the entry's threshold. Regressions and failed trials are reported, never
 * thrown: the whole catalogue always runs.
 *
 * Usage:
 * ```typescript
 * const report = await runBenchmark(store, { trials: 5 })
 * console.log(formatBenchmarkReport(report))
 * ```
 */

import { errorMessage } from '../databases/errors'
import { DEFAULT_RETRY_POLICY, withRetry, withTimeout, type RetryPolicy } from '../databases/retry'
import type { Store } from '../databases/types'
import { benchmarkQueries } from '../datasets/chat/queries'
import type { BenchmarkQuery, QueryParameter } from '../datasets/types'
import { silentLogger, type Logger } from '../instrumentation/logger'
import { calculateStats, measure, type LatencyStats } from '../instrumentation/stats'

export interface BenchmarkOptions {
  catalogue?: BenchmarkQuery[]
  /** Measured trials per query (default: 5) */
  trials?: number
  /** Discarded trials before measuring (default: 1) */
  warmupTrials?: number
  /** Per trial; 0 disables (default: 10000) */
  timeoutMs?: number
  /** Multiplies every threshold, for slower hardware (default: 1) */
  thresholdScale?: number
  /** Applied to parameter probes and the dataset census, not to timed trials */
  retry?: RetryPolicy
  logger?: Logger
}

export type QueryStatus = 'ok' | 'regression' | 'failed'

export interface QueryBenchmarkResult {
  index: number
  name: string
  category: BenchmarkQuery['category']
  description: string
  thresholdMs: number
  trials: number
  failedTrials: number
  rows: number
  stats: LatencyStats
  status: QueryStatus
  error?: string
}

export interface DatasetCensus {
  users: number
  chats: number
  memberships: number
  messages: number
}

export interface BenchmarkReport {
  kind: 'benchmark'
  status: 'success' | 'success-with-warnings' | 'failure'
  startedAt: string
  durationMs: number
  backend: string
  dataset: DatasetCensus | null
  warnings: string[]
  queries: QueryBenchmarkResult[]
  failure?: { queryIndex: number; queryName: string; cause: string }
}

const DEFAULT_OPTIONS = {
  trials: 5,
  warmupTrials: 1,
  timeoutMs: 10000,
  thresholdScale: 1,
}

// Below this many messages latency numbers say little about indexing
const SMALL_DATASET_MESSAGES = 1000

type CensusRow = { users: number; chats: number; memberships: number; messages: number }

class ParameterResolver {
  private readonly probes = new Map<string, unknown>()

  constructor(
    private readonly store: Store,
    private readonly retry: RetryPolicy,
    private readonly timeoutMs: number
  ) {}

  async resolve(parameters: QueryParameter[] = []): Promise<unknown[]> {
    const values: unknown[] = []
    for (const param of parameters) {
      values.push(param.type === 'literal' ? param.value : await this.probe(param.sql))
    }
    return values
  }

  private async probe(sql: string): Promise<unknown> {
    if (this.probes.has(sql)) return this.probes.get(sql)

    const result = await withRetry(this.retry, () => withTimeout(this.store.query(sql), this.timeoutMs, 'parameter probe'))
    const first = result.rows[0]
    const value = first ? (Object.values(first)[0] ?? null) : null
    this.probes.set(sql, value)
    return value
  }
}

async function census(store: Store, retry: RetryPolicy, timeoutMs: number): Promise<DatasetCensus> {
  const result = await withRetry(retry, () =>
    withTimeout(
      store.query<CensusRow>(`
        SELECT
          (SELECT COUNT(*) FROM users)::int AS users,
          (SELECT COUNT(*) FROM chats)::int AS chats,
          (SELECT COUNT(*) FROM memberships)::int AS memberships,
          (SELECT COUNT(*) FROM messages)::int AS messages
      `),
      timeoutMs,
      'dataset census'
    )
  )
  const [row] = result.rows
  return { users: row.users, chats: row.chats, memberships: row.memberships, messages: row.messages }
}

export async function runBenchmark(store: Store, options: BenchmarkOptions = {}): Promise<BenchmarkReport> {
  const trials = options.trials ?? DEFAULT_OPTIONS.trials
  const warmupTrials = options.warmupTrials ?? DEFAULT_OPTIONS.warmupTrials
  const timeoutMs = options.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs
  const thresholdScale = options.thresholdScale ?? DEFAULT_OPTIONS.thresholdScale
  const retry = options.retry ?? DEFAULT_RETRY_POLICY
  const catalogue = options.catalogue ?? benchmarkQueries
  const logger = options.logger ?? silentLogger

  const startedAt = new Date()
  const start = performance.now()
  const warnings: string[] = []

  let dataset: DatasetCensus | null = null
  try {
    dataset = await census(store, retry, timeoutMs)
    if (dataset.messages < SMALL_DATASET_MESSAGES) {
      warnings.push(`only ${dataset.messages} messages in the store; results may not be representative`)
    }
  } catch (error) {
    warnings.push(`could not count dataset rows: ${errorMessage(error)}`)
  }

  const resolver = new ParameterResolver(store, retry, timeoutMs)
  const queries: QueryBenchmarkResult[] = []

  for (const [index, query] of catalogue.entries()) {
    const result = await benchmarkQuery(store, query, index, resolver, logger, {
      trials,
      warmupTrials,
      timeoutMs,
      thresholdScale,
    })

    const line =
      `${query.name}: mean ${result.stats.mean.toFixed(2)}ms ` +
      `(min ${result.stats.min.toFixed(2)}, max ${result.stats.max.toFixed(2)}, threshold ${result.thresholdMs}ms) ${result.status}`
    if (result.status === 'ok') {
      logger.info(line)
    } else {
      logger.warn(result.error ? `${line}: ${result.error}` : line)
    }
    queries.push(result)
  }

  const failed = queries.find((q) => q.status === 'failed')
  const degraded = queries.some((q) => q.status === 'regression' || q.failedTrials > 0)

  return {
    kind: 'benchmark',
    status: failed ? 'failure' : degraded ? 'success-with-warnings' : 'success',
    startedAt: startedAt.toISOString(),
    durationMs: performance.now() - start,
    backend: store.backend,
    dataset,
    warnings,
    queries,
    failure: failed ? { queryIndex: failed.index, queryName: failed.name, cause: failed.error ?? 'all trials failed' } : undefined,
  }
}

async function benchmarkQuery(
  store: Store,
  query: BenchmarkQuery,
  index: number,
  resolver: ParameterResolver,
  logger: Logger,
  opts: typeof DEFAULT_OPTIONS
): Promise<QueryBenchmarkResult> {
  const thresholdMs = query.thresholdMs * opts.thresholdScale
  const base = {
    index,
    name: query.name,
    category: query.category,
    description: query.description,
    thresholdMs,
    trials: opts.trials,
  }

  let params: unknown[]
  try {
    params = await resolver.resolve(query.parameters)
  } catch (error) {
    return {
      ...base,
      failedTrials: opts.trials,
      rows: 0,
      stats: calculateStats([]),
      status: 'failed',
      error: `parameter resolution failed: ${errorMessage(error)}`,
    }
  }

  if (params.length > 0) logger.debug(`${query.name} parameters: ${params.map(String).join(', ')}`)

  const run = () => withTimeout(store.query(query.sql, params), opts.timeoutMs, `query ${query.name}`)

  for (let i = 0; i < opts.warmupTrials; i++) {
    // Warm-up failures surface again in the measured trials
    await run().catch(() => undefined)
  }

  const samples: number[] = []
  let rows = 0
  let lastError: string | undefined
  for (let i = 0; i < opts.trials; i++) {
    try {
      const { result, elapsedMs } = await measure(run)
      samples.push(elapsedMs)
      rows = result.rows.length
    } catch (error) {
      lastError = errorMessage(error)
    }
  }

  const stats = calculateStats(samples)
  const failedTrials = opts.trials - samples.length
  const status: QueryStatus = samples.length === 0 ? 'failed' : stats.mean > thresholdMs ? 'regression' : 'ok'

  return { ...base, failedTrials, rows, stats, status, error: lastError }
}
