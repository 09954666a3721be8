/**
 * Prefixed console logging.
 *
 * Output looks like `[GENERATE] batch 3 committed` and
 * `[VERIFY:WARN] temporal check inconclusive`.
 */

export interface Logger {
  info(message: string): void
  debug(message: string): void
  warn(message: string): void
  error(message: string, error?: unknown): void
}

export interface ConsoleLoggerOptions {
  /** Print debug lines and error stacks */
  verbose?: boolean
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string
  private readonly verbose: boolean

  constructor(scope: string, options: ConsoleLoggerOptions = {}) {
    this.prefix = scope.toUpperCase()
    this.verbose = options.verbose ?? false
  }

  info(message: string): void {
    console.log(`[${this.prefix}] ${message}`)
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(`[${this.prefix}:DEBUG] ${message}`)
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`[${this.prefix}:ERROR] ${message}`)
    if (error !== undefined && this.verbose) {
      console.error(error)
    }
  }

  warn(message: string): void {
    console.warn(`[${this.prefix}:WARN] ${message}`)
  }

  /**
   * Logger for a sub-component, e.g. `GENERATE:WRITER`.
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix}:${scope}`, { verbose: this.verbose })
  }
}

export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
}
