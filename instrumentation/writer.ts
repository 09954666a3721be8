/**
 * JSONL Writer for run reports
 *
 * Appends generation, verification, benchmark and constraint-probe reports
 * to a newline-delimited JSON file, one report per line.
 *
 * @example
 * ```typescript
 * const writer = new JSONLWriter({ outputPath: './results/run.jsonl' })
 * await writer.write(generationReport)
 * await writer.write(verificationReport)
 * await writer.close()
 * ```
 */

import { appendFile, mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { BenchmarkReport } from '../benchmarks/harness'
import type { ConstraintProbeReport } from '../generator/constraints'
import type { GenerationReport } from '../generator'
import type { VerificationReport } from '../verifier/types'

export type RunReport = GenerationReport | VerificationReport | BenchmarkReport | ConstraintProbeReport

export interface WriterOptions {
  outputPath: string
  /** Keep existing lines (default: true) */
  append?: boolean
  /** Reports held before a write (default: 100) */
  bufferSize?: number
}

const DEFAULT_OPTIONS: Required<Omit<WriterOptions, 'outputPath'>> = {
  append: true,
  bufferSize: 100,
}

export class JSONLWriter {
  private options: Required<WriterOptions>
  private buffer: RunReport[] = []
  private initialized = false
  private writePromise: Promise<void> | null = null
  private totalWritten = 0

  constructor(options: WriterOptions) {
    this.options = {
      outputPath: options.outputPath,
      append: options.append ?? DEFAULT_OPTIONS.append,
      bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
    }
  }

  /**
   * Creates the output directory and, when not appending, truncates the file.
   */
  async init(): Promise<void> {
    if (this.initialized) return

    await mkdir(dirname(this.options.outputPath), { recursive: true })
    if (!this.options.append) {
      await writeFile(this.options.outputPath, '', 'utf-8')
    }

    this.initialized = true
  }

  /**
   * Buffer a report; returns once any resulting flush has been started.
   * Call `flush()` or `close()` to make sure it reached the file.
   */
  write(report: RunReport): Promise<void> {
    this.buffer.push(report)
    if (this.buffer.length >= this.options.bufferSize) {
      return this.flush()
    }
    return Promise.resolve()
  }

  async flush(): Promise<void> {
    if (this.writePromise) {
      await this.writePromise
    }
    if (this.buffer.length === 0) return

    const toWrite = this.buffer
    this.buffer = []
    const content = toWrite.map((report) => JSON.stringify(report)).join('\n') + '\n'

    this.writePromise = this.doWrite(content)
    try {
      await this.writePromise
    } finally {
      this.writePromise = null
    }
    this.totalWritten += toWrite.length
  }

  private async doWrite(content: string): Promise<void> {
    await this.init()
    await appendFile(this.options.outputPath, content, 'utf-8')
  }

  getWrittenCount(): number {
    return this.totalWritten
  }

  getOutputPath(): string {
    return this.options.outputPath
  }

  async close(): Promise<void> {
    await this.flush()
  }
}

export function createWriter(outputPath: string, options: Omit<WriterOptions, 'outputPath'> = {}): JSONLWriter {
  return new JSONLWriter({ outputPath, ...options })
}
