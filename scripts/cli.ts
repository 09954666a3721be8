#!/usr/bin/env tsx
/**
 * Command line entry point.
 *
 * Usage:
 *   tsx scripts/cli.ts schema
 *   tsx scripts/cli.ts generate --fixture
 *   tsx scripts/cli.ts generate --preset=large --seed=42
 *   tsx scripts/cli.ts verify --preset=large
 *   tsx scripts/cli.ts bench --trials=10 --out=results/bench.jsonl
 *   tsx scripts/cli.ts probe
 *   tsx scripts/cli.ts clean
 *   tsx scripts/cli.ts run --database=pglite://memory --preset=dev
 *
 * Connection strings come from WRITER_DATABASE_URL / READER_DATABASE_URL /
 * ADMIN_DATABASE_URL (falling back to DATABASE_URL), or --database.
 *
 * Options:
 *   --database=<url>        Override the connection string for every role
 *   --fixture               Deterministic fixture dataset
 *   --preset=<name>         Scale preset (dev, large, xl)
 *   --config=<file>         Generator configuration as JSON
 *   --seed=<n>              Sampling seed
 *   --users=<n>  --direct-chats=<n>  --group-chats=<n>  --messages=<n>
 *   --batch-size=<n>        Rows per transaction
 *   --id-mode=<mode>        hashed | seeded
 *   --min-samples=<n>       Messages needed for the distribution check
 *   --trials=<n>  --warmup=<n>  --threshold-scale=<x>  --timeout=<ms>
 *   --out=<file>            Append reports as JSON Lines
 *   --verbose               Debug logging
 */

import { readFile } from 'node:fs/promises'
import { runBenchmark } from '../benchmarks/harness'
import { openStore, resolveConnectionString, type Store, type StoreRole } from '../databases'
import { errorMessage } from '../databases/errors'
import { applySchema, cleanDataset } from '../datasets/chat/schema'
import { probeConstraintEnforcement } from '../generator/constraints'
import {
  ConfigError,
  expectationsFor,
  generateDataset,
  parseGeneratorConfig,
  presetConfig,
  type GeneratorConfig,
  type GeneratorConfigInput,
} from '../generator'
import type { IdMode } from '../generator/identity'
import {
  ConsoleLogger,
  createWriter,
  formatBenchmarkReport,
  formatConstraintProbeReport,
  formatGenerationReport,
  formatVerificationReport,
  type JSONLWriter,
  type RunReport,
} from '../instrumentation'
import { runVerification, SqlStoreReader } from '../verifier'

// ============================================================================
// Arguments
// ============================================================================

const COMMANDS = ['schema', 'generate', 'verify', 'bench', 'probe', 'clean', 'run'] as const
type Command = (typeof COMMANDS)[number]

interface CliArgs {
  command: Command
  options: Map<string, string>
  flags: Set<string>
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value)
}

function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv
  if (!isCommand(command)) {
    throw new UsageError(command ? `Unknown command: ${command}` : 'No command given')
  }

  const options = new Map<string, string>()
  const flags = new Set<string>()
  for (const arg of rest) {
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`)
    }
    const eq = arg.indexOf('=')
    if (eq === -1) {
      flags.add(arg.slice(2))
    } else {
      options.set(arg.slice(2, eq), arg.slice(eq + 1))
    }
  }

  return { command, options, flags }
}

class UsageError extends Error {
  readonly name = 'UsageError'
}

function intOption(args: CliArgs, key: string): number | undefined {
  const raw = args.options.get(key)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new UsageError(`--${key} must be an integer, got "${raw}"`)
  }
  return value
}

function numberOption(args: CliArgs, key: string): number | undefined {
  const raw = args.options.get(key)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new UsageError(`--${key} must be a number, got "${raw}"`)
  }
  return value
}

// ============================================================================
// Configuration
// ============================================================================

type SamplingOverrides = Partial<Extract<GeneratorConfigInput, { strategy: 'sampling' }>>

const ID_MODES = ['hashed', 'seeded'] as const

function idModeOption(args: CliArgs): IdMode | undefined {
  const raw = args.options.get('id-mode')
  if (raw === undefined) return undefined
  const mode = ID_MODES.find((m) => m === raw)
  if (!mode) throw new UsageError(`--id-mode must be one of ${ID_MODES.join(', ')}, got "${raw}"`)
  return mode
}

/**
 * Overrides given on the command line, without keys that were not passed.
 */
function samplingOverrides(args: CliArgs): SamplingOverrides {
  const values: SamplingOverrides = {
    seed: intOption(args, 'seed'),
    users: intOption(args, 'users'),
    directChats: intOption(args, 'direct-chats'),
    groupChats: intOption(args, 'group-chats'),
    messages: intOption(args, 'messages'),
    historyDays: intOption(args, 'history-days'),
    batchSize: intOption(args, 'batch-size'),
    idMode: idModeOption(args),
    anchor: args.options.get('anchor'),
  }
  const overrides: SamplingOverrides = {}
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) Object.assign(overrides, { [key]: value })
  }
  return overrides
}

async function generatorConfig(args: CliArgs): Promise<GeneratorConfig> {
  const configPath = args.options.get('config')
  if (configPath) {
    const parsed: unknown = JSON.parse(await readFile(configPath, 'utf-8'))
    return parseGeneratorConfig(parsed)
  }

  const overrides = samplingOverrides(args)

  if (args.flags.has('fixture')) {
    const { batchSize, idMode, anchor, ...scale } = overrides
    if (Object.keys(scale).length > 0) {
      throw new UsageError(`--fixture has fixed counts; drop ${Object.keys(scale).join(', ')}`)
    }
    return parseGeneratorConfig({ strategy: 'fixture', batchSize, idMode, anchor })
  }

  const preset = args.options.get('preset')
  if (preset) {
    return presetConfig(preset, overrides)
  }

  return parseGeneratorConfig({ ...overrides, strategy: 'sampling' })
}

/**
 * Expectations for `verify`: only when the command line says which dataset to expect.
 */
async function verifyExpectations(args: CliArgs) {
  if (args.options.has('config') || args.flags.has('fixture') || args.options.has('preset')) {
    return expectationsFor(await generatorConfig(args))
  }
  return undefined
}

// ============================================================================
// Commands
// ============================================================================

interface Session {
  args: CliArgs
  logger: ConsoleLogger
  writer: JSONLWriter | null
  stores: Map<string, Store>
}

async function storeFor(session: Session, role: StoreRole): Promise<Store> {
  const url = session.args.options.get('database') ?? resolveConnectionString(role)
  // One store per URL, so an in-memory database is shared by every step of `run`
  const existing = session.stores.get(url)
  if (existing) return existing

  const store = await openStore(url, { statementTimeoutMs: intOption(session.args, 'timeout') })
  session.stores.set(url, store)
  return store
}

async function record(session: Session, report: RunReport): Promise<void> {
  if (session.writer) await session.writer.write(report)
}

async function schemaCommand(session: Session): Promise<boolean> {
  await applySchema(await storeFor(session, 'admin'))
  session.logger.info('schema applied')
  return true
}

async function generateCommand(session: Session): Promise<boolean> {
  const config = await generatorConfig(session.args)
  const store = await storeFor(session, 'writer')

  const controller = new AbortController()
  const onSignal = () => {
    session.logger.warn('interrupt received; stopping after the in-flight batch')
    controller.abort()
  }
  process.once('SIGINT', onSignal)

  try {
    const report = await generateDataset(store, config, {
      logger: session.logger.child('generate'),
      signal: controller.signal,
    })
    console.log(formatGenerationReport(report))
    await record(session, report)
    return report.status === 'success'
  } finally {
    process.off('SIGINT', onSignal)
  }
}

async function verifyCommand(session: Session): Promise<boolean> {
  const reader = new SqlStoreReader(await storeFor(session, 'reader'), {
    timeoutMs: intOption(session.args, 'timeout'),
  })
  const report = await runVerification(reader, {
    expectations: await verifyExpectations(session.args),
    minSamples: intOption(session.args, 'min-samples'),
    logger: session.logger.child('verify'),
  })
  console.log(formatVerificationReport(report))
  await record(session, report)
  return report.status === 'pass'
}

async function benchCommand(session: Session): Promise<boolean> {
  const report = await runBenchmark(await storeFor(session, 'reader'), {
    trials: intOption(session.args, 'trials'),
    warmupTrials: intOption(session.args, 'warmup'),
    timeoutMs: intOption(session.args, 'timeout'),
    thresholdScale: numberOption(session.args, 'threshold-scale'),
    logger: session.logger.child('bench'),
  })
  console.log(formatBenchmarkReport(report))
  await record(session, report)
  return report.status !== 'failure'
}

async function probeCommand(session: Session): Promise<boolean> {
  const report = await probeConstraintEnforcement(await storeFor(session, 'admin'))
  console.log(formatConstraintProbeReport(report))
  await record(session, report)
  return report.enforced
}

async function cleanCommand(session: Session): Promise<boolean> {
  const deleted = await cleanDataset(await storeFor(session, 'admin'))
  for (const [table, rows] of Object.entries(deleted)) {
    session.logger.info(`${table}: ${rows} row(s) deleted`)
  }
  return true
}

async function runCommand(session: Session): Promise<boolean> {
  await schemaCommand(session)
  if (!(await generateCommand(session))) return false
  const verified = await verifyCommand(session)
  const benchmarked = await benchCommand(session)
  return verified && benchmarked
}

const handlers: Record<Command, (session: Session) => Promise<boolean>> = {
  schema: schemaCommand,
  generate: generateCommand,
  verify: verifyCommand,
  bench: benchCommand,
  probe: probeCommand,
  clean: cleanCommand,
  run: runCommand,
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  let args: CliArgs
  try {
    args = parseArgs(process.argv.slice(2))
  } catch (error) {
    console.error(errorMessage(error))
    console.error(`Commands: ${COMMANDS.join(', ')}`)
    process.exitCode = 2
    return
  }

  const logger = new ConsoleLogger('chatbench', { verbose: args.flags.has('verbose') })
  const out = args.options.get('out')
  const session: Session = {
    args,
    logger,
    writer: out ? createWriter(out) : null,
    stores: new Map(),
  }

  try {
    const ok = await handlers[args.command](session)
    if (!ok) process.exitCode = 1
  } catch (error) {
    if (error instanceof ConfigError || error instanceof UsageError) {
      logger.error(error.message)
      process.exitCode = 2
    } else {
      logger.error(`${args.command} failed: ${errorMessage(error)}`, error)
      process.exitCode = 1
    }
  } finally {
    if (session.writer) {
      await session.writer.close()
      logger.info(`reports written to ${session.writer.getOutputPath()}`)
    }
    for (const store of session.stores.values()) {
      await store.close()
    }
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
