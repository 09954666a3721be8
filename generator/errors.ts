import type { ConstraintViolation } from '../databases/errors'

export class GenerationError extends Error {
  readonly name: string = 'GenerationError'
}

/**
 * A batch could not be committed within the retry policy.
 */
export class BatchFlushError extends GenerationError {
  readonly name = 'BatchFlushError'

  constructor(
    readonly batchIndex: number,
    readonly attempts: number,
    readonly lastError: Error,
    readonly violation?: ConstraintViolation
  ) {
    super(
      `Batch ${batchIndex} failed after ${attempts} attempt(s): ${lastError.message}` +
        (violation?.detail ? ` (${violation.detail})` : ''),
      { cause: lastError }
    )
  }
}

export class CancelledError extends GenerationError {
  readonly name = 'CancelledError'

  constructor(readonly batchIndex: number) {
    super(`Run cancelled before batch ${batchIndex}`)
  }
}
