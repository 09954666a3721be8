/**
 * Retry and timeout policy for store round-trips.
 *
 * Batch flushes, verification queries and benchmark parameter probes all go
 * through `withRetry`/`withTimeout` instead of looping at the call site.
 */

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number
  /** Delay before the first retry; doubles per attempt (default: 200ms) */
  baseDelayMs: number
  /** Upper bound on a single delay (default: 5000ms) */
  maxDelayMs: number
  /** Random extra delay in [0, jitterMs) (default: 100ms) */
  jitterMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  jitterMs: 100,
}

export class TimeoutError extends Error {
  readonly name = 'TimeoutError'

  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`)
  }
}

/**
 * Wall-clock budget for a unit of work that cannot be interrupted from
 * outside, such as an open transaction. Callers check it between steps.
 */
export class Deadline {
  private readonly expiresAt: number

  constructor(
    readonly timeoutMs: number,
    readonly label: string
  ) {
    this.expiresAt = timeoutMs > 0 ? Date.now() + timeoutMs : Number.POSITIVE_INFINITY
  }

  get expired(): boolean {
    return Date.now() >= this.expiresAt
  }

  /** Milliseconds left; Infinity when unbounded */
  remaining(): number {
    return Math.max(0, this.expiresAt - Date.now())
  }

  error(): TimeoutError {
    return new TimeoutError(this.label, this.timeoutMs)
  }

  check(): void {
    if (this.expired) throw this.error()
  }
}

export class RetryExhaustedError extends Error {
  readonly name = 'RetryExhaustedError'

  constructor(
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(`Failed after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError })
  }
}

export interface RetryHooks {
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
  /** Return false to stop retrying immediately */
  shouldRetry?: (error: Error) => boolean
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Delay before retry number `attempt` (0-based).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs)
  return exponential + Math.floor(random() * policy.jitterMs)
}

/**
 * Execute an operation with retry logic.
 * Throws `RetryExhaustedError` wrapping the last failure.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  let lastError: Error | undefined
  let attempt = 0

  while (attempt < policy.maxAttempts) {
    try {
      return await operation(attempt)
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))
      attempt++

      if (hooks.shouldRetry && !hooks.shouldRetry(lastError)) break

      if (attempt < policy.maxAttempts) {
        const delay = backoffDelay(policy, attempt - 1)
        hooks.onRetry?.(attempt, lastError, delay)
        await sleep(delay)
      }
    }
  }

  throw new RetryExhaustedError(attempt, lastError ?? new Error('Operation failed after retries'))
}

/**
 * Reject with `TimeoutError` if `promise` has not settled within `timeoutMs`.
 * A non-positive timeout disables the bound.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) return promise

  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs)
  })

  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
