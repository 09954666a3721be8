/**
 * Classification of errors raised by `pg` and PGLite.
 * Both surface the Postgres SQLSTATE as `code` on the thrown error.
 */

export interface ConstraintViolation {
  /** SQLSTATE: 23505 unique, 23503 foreign key, 23514 check */
  code: string
  kind: 'unique' | 'foreign-key' | 'check' | 'not-null'
  constraint?: string
  detail?: string
}

const CONSTRAINT_CODES: Record<string, ConstraintViolation['kind']> = {
  '23505': 'unique',
  '23503': 'foreign-key',
  '23514': 'check',
  '23502': 'not-null',
}

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' ? field : undefined
}

/**
 * Extract the constraint violation from a store error, following `cause` chains.
 */
export function constraintViolationOf(error: unknown): ConstraintViolation | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    const code = stringField(current, 'code')
    const kind = code ? CONSTRAINT_CODES[code] : undefined
    if (code && kind) {
      return {
        code,
        kind,
        constraint: stringField(current, 'constraint'),
        detail: stringField(current, 'detail'),
      }
    }
    current = Reflect.get(current, 'cause')
  }
  return undefined
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
