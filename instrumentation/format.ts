/**
 * Console summaries for generation, verification and benchmark reports.
 */

import type { BenchmarkReport } from '../benchmarks/harness'
import { ENTITY_KINDS } from '../datasets/chat/model'
import type { ConstraintProbeReport } from '../generator/constraints'
import type { GenerationReport } from '../generator'
import type { DatasetInspection, VerificationReport } from '../verifier/types'

const RULE = '='.repeat(60)
const PREVIEW_LENGTH = 50

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`
}

export function formatGenerationReport(report: GenerationReport): string {
  const lines = [
    RULE,
    `GENERATION ${report.status.toUpperCase()}`,
    RULE,
    `Run ID: ${report.runId}`,
    `Strategy: ${report.strategy} (seed ${report.seed}, ${report.idMode} ids)`,
    `Batches committed: ${report.batches}`,
    `Duration: ${seconds(report.durationMs)}`,
    `Messages/s: ${report.messagesPerSecond.toFixed(0)}`,
    '',
    `  ${'entity'.padEnd(12)} ${'generated'.padStart(10)} ${'inserted'.padStart(10)}`,
  ]

  for (const kind of ENTITY_KINDS) {
    lines.push(
      `  ${kind.padEnd(12)} ${String(report.generated[kind]).padStart(10)} ${String(report.inserted[kind]).padStart(10)}`
    )
  }

  if (report.failure) {
    lines.push('')
    lines.push(`Failed at batch ${report.failure.batchIndex} after ${report.failure.attempts} attempt(s):`)
    lines.push(`  ${report.failure.cause}`)
    if (report.failure.violation) {
      const v = report.failure.violation
      lines.push(`  ${v.kind} violation (${v.code})${v.constraint ? ` on ${v.constraint}` : ''}`)
    }
  }

  lines.push(RULE)
  return lines.join('\n')
}

function preview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content
}

function formatInspection(inspection: DatasetInspection): string[] {
  const lines = ['', 'Users:']
  for (const u of inspection.users) {
    lines.push(`  - ${u.username} (${u.status}), created ${u.createdAt}`)
  }
  lines.push('', 'Chats:')
  for (const c of inspection.chats) {
    lines.push(`  ${c.kind.padEnd(7)} ${c.name} (${c.members} members, ${c.messages} messages)`)
  }
  lines.push('', `Recent messages (last ${inspection.recentMessages.length}):`)
  for (const m of inspection.recentMessages) {
    lines.push(`  ${m.createdAt} | ${m.sender} in ${m.chat}: ${preview(m.content)}`)
  }
  lines.push('')
  return lines
}

export function formatVerificationReport(report: VerificationReport): string {
  const lines = [RULE, `VERIFICATION ${report.status.toUpperCase()}`, RULE]

  for (const check of report.checks) {
    lines.push(`  ${check.name.padEnd(24)} ${check.status.padEnd(13)} ${check.summary}`)
    if (check.offenders.length > 0) {
      const more = check.totalOffenders - check.offenders.length
      lines.push(`    offenders: ${check.offenders.join(', ')}${more > 0 ? ` ... and ${more} more` : ''}`)
    }
  }

  if (report.inspection) lines.push(...formatInspection(report.inspection))

  lines.push(`Duration: ${seconds(report.durationMs)}`)
  lines.push(RULE)
  return lines.join('\n')
}

export function formatBenchmarkReport(report: BenchmarkReport): string {
  const lines = [RULE, `BENCHMARK ${report.status.toUpperCase()}`, RULE, `Backend: ${report.backend}`]

  if (report.dataset) {
    const d = report.dataset
    lines.push(`Dataset: ${d.users} users, ${d.chats} chats, ${d.memberships} memberships, ${d.messages} messages`)
  }
  for (const warning of report.warnings) {
    lines.push(`Warning: ${warning}`)
  }
  lines.push('')

  for (const q of report.queries) {
    const timing =
      q.status === 'failed'
        ? (q.error ?? 'all trials failed')
        : `mean: ${q.stats.mean.toFixed(2)}ms, min: ${q.stats.min.toFixed(2)}ms, max: ${q.stats.max.toFixed(2)}ms, ` +
          `p99: ${q.stats.p99.toFixed(2)}ms, threshold: ${q.thresholdMs}ms`
    const trials = q.failedTrials > 0 && q.status !== 'failed' ? ` (${q.failedTrials}/${q.trials} trials failed)` : ''
    lines.push(`  ${q.name.padEnd(28)} ${q.status.padEnd(10)} ${timing}${trials}`)
  }

  lines.push(`Duration: ${seconds(report.durationMs)}`)
  lines.push(RULE)
  return lines.join('\n')
}

export function formatConstraintProbeReport(report: ConstraintProbeReport): string {
  const lines = [RULE, `CONSTRAINTS ${report.enforced ? 'ENFORCED' : 'NOT ENFORCED'}`, RULE]
  for (const probe of report.probes) {
    lines.push(`  ${probe.name.padEnd(24)} ${(probe.enforced ? 'enforced' : 'missing').padEnd(9)} ${probe.detail}`)
  }
  lines.push(RULE)
  return lines.join('\n')
}
