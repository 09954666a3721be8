/**
 * Run instrumentation: prefixed logging, latency statistics, console
 * summaries and JSONL report output.
 *
 * Usage:
 * ```typescript
 * import { ConsoleLogger, createWriter, formatBenchmarkReport } from '../instrumentation'
 *
 * const logger = new ConsoleLogger('bench')
 * const writer = createWriter('./results/run.jsonl')
 * const report = await runBenchmark(store, { logger })
 * console.log(formatBenchmarkReport(report))
 * await writer.write(report)
 * await writer.close()
 * ```
 */

// Logging
export { ConsoleLogger, silentLogger, type ConsoleLoggerOptions, type Logger } from './logger'

// Latency statistics
export { calculateStats, measure, type LatencyStats } from './stats'

// Console summaries
export {
  formatBenchmarkReport,
  formatConstraintProbeReport,
  formatGenerationReport,
  formatVerificationReport,
} from './format'

// JSONL output
export { JSONLWriter, createWriter, type RunReport, type WriterOptions } from './writer'
