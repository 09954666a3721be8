/**
 * Dataset verifier.
 *
 * Usage:
 * ```typescript
 * const reader = new SqlStoreReader(store)
 * const report = await runVerification(reader, { expectations: expectationsFor(config) })
 * if (report.status === 'fail') process.exitCode = 1
 * ```
 *
 * All checks always run. A check that cannot complete (store error,
 * timeout) is recorded as failed with the error as its summary.
 */

import { errorMessage } from '../databases/errors'
import { silentLogger, type Logger } from '../instrumentation/logger'
import { checks as defaultChecks } from './checks'
import type {
  Check,
  CheckName,
  CheckOptions,
  CheckResult,
  CountExpectations,
  DatasetInspection,
  InspectionLimits,
  StoreReader,
  VerificationReport,
} from './types'

export interface VerifyOptions {
  expectations?: CountExpectations
  minSamples?: number
  sampleLimit?: number
  logger?: Logger
  checks?: Array<{ name: CheckName; run: Check }>
  /** Sample sizes for the readable dataset sample; `false` skips it */
  inspection?: Partial<InspectionLimits> | false
}

export const DEFAULT_MIN_SAMPLES = 100
export const DEFAULT_SAMPLE_LIMIT = 10

export const DEFAULT_INSPECTION_LIMITS: InspectionLimits = {
  users: 5,
  chats: 8,
  messages: 10,
}

async function inspect(reader: StoreReader, limits: InspectionLimits): Promise<DatasetInspection> {
  return {
    users: await reader.sampleUsers(limits.users),
    chats: await reader.chatStructure(limits.chats),
    recentMessages: await reader.recentMessages(limits.messages),
  }
}

export async function runVerification(reader: StoreReader, options: VerifyOptions = {}): Promise<VerificationReport> {
  const logger = options.logger ?? silentLogger
  const checkOptions: CheckOptions = {
    expectations: options.expectations,
    minSamples: options.minSamples ?? DEFAULT_MIN_SAMPLES,
    sampleLimit: options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT,
  }

  const startedAt = new Date()
  const start = performance.now()
  const results: CheckResult[] = []

  for (const check of options.checks ?? defaultChecks) {
    const checkStart = performance.now()
    let result: CheckResult
    try {
      const verdict = await check.run(reader, checkOptions)
      result = { ...verdict, durationMs: performance.now() - checkStart }
    } catch (error) {
      result = {
        name: check.name,
        status: 'fail',
        summary: `check could not complete: ${errorMessage(error)}`,
        offenders: [],
        totalOffenders: 0,
        durationMs: performance.now() - checkStart,
      }
    }

    const line = `${result.name}: ${result.status} - ${result.summary}`
    if (result.status === 'fail') {
      logger.error(line)
    } else if (result.status === 'inconclusive') {
      logger.warn(line)
    } else {
      logger.info(line)
    }
    results.push(result)
  }

  // The sample is informational; failing to take it never fails the run
  let inspection: DatasetInspection | undefined
  if (options.inspection !== false) {
    try {
      inspection = await inspect(reader, { ...DEFAULT_INSPECTION_LIMITS, ...options.inspection })
    } catch (error) {
      logger.warn(`dataset inspection skipped: ${errorMessage(error)}`)
    }
  }

  return {
    kind: 'verification',
    status: results.some((r) => r.status === 'fail') ? 'fail' : 'pass',
    startedAt: startedAt.toISOString(),
    durationMs: performance.now() - start,
    checks: results,
    inspection,
  }
}

export { checks } from './checks'
export { SqlStoreReader, type SqlStoreReaderOptions } from './reader'
export type * from './types'
