/**
 * Dataset Types
 *
 * Table definitions, benchmark query definitions and scale presets are plain
 * data. DDL is rendered from the table definitions; the benchmark harness
 * executes the query definitions without knowing what any of them do.
 */

// Column data types
export type ColumnType = 'uuid' | 'string' | 'text' | 'integer' | 'timestamp'

// Column definition
export interface ColumnConfig {
  name: string
  type: ColumnType
  nullable?: boolean
  primaryKey?: boolean
  unique?: boolean
  default?: string | number
  // For string types
  maxLength?: number
  // Allowed values, rendered as a CHECK constraint
  oneOf?: string[]
  // For foreign keys
  references?: {
    table: string
    column: string
  }
}

// Index definition
export interface IndexConfig {
  name: string
  columns: string[]
  unique?: boolean
  where?: string // Partial index condition
}

// Table definition
export interface TableConfig {
  name: string
  columns: ColumnConfig[]
  indexes?: IndexConfig[]
}

// Benchmark query parameter source
export type QueryParameter =
  | { type: 'literal'; value: string | number | boolean | null }
  // First column of the first row returned, or null for an empty result
  | { type: 'probe'; sql: string }

export type QueryCategory = 'timeline' | 'search' | 'lookup' | 'membership' | 'join' | 'aggregate'

// Benchmark query definition
export interface BenchmarkQuery {
  name: string
  description: string
  category: QueryCategory
  // SQL query with $n placeholders
  sql: string
  // Values for $1..$n, in order
  parameters?: QueryParameter[]
  // Mean latency above this is flagged as a regression
  thresholdMs: number
}

// Scale preset
export interface ScalePreset {
  name: string
  description: string
  users: number
  directChats: number
  groupChats: number
  messages: number
}

const TYPE_MAP: Record<ColumnType, string> = {
  uuid: 'UUID',
  string: 'VARCHAR',
  text: 'TEXT',
  integer: 'INTEGER',
  timestamp: 'TIMESTAMPTZ',
}

/**
 * Generate Postgres DDL for a table
 */
export function generateTableDDL(table: TableConfig): string {
  const columnDefs = table.columns.map((col) => {
    let typeDef = TYPE_MAP[col.type]

    if (col.type === 'string' && col.maxLength) {
      typeDef = `${typeDef}(${col.maxLength})`
    }

    const parts = [col.name, typeDef]

    if (col.primaryKey) parts.push('PRIMARY KEY')
    if (!col.nullable && !col.primaryKey) parts.push('NOT NULL')
    if (col.unique && !col.primaryKey) parts.push('UNIQUE')
    if (col.default !== undefined) {
      parts.push(`DEFAULT ${typeof col.default === 'string' ? `'${col.default}'` : col.default}`)
    }
    if (col.oneOf) {
      parts.push(`CHECK (${col.name} IN (${col.oneOf.map((v) => `'${v}'`).join(', ')}))`)
    }
    if (col.references) {
      parts.push(`REFERENCES ${col.references.table}(${col.references.column})`)
    }

    return parts.join(' ')
  })

  return `CREATE TABLE IF NOT EXISTS ${table.name} (\n  ${columnDefs.join(',\n  ')}\n)`
}

/**
 * Generate Postgres DDL for indexes
 */
export function generateIndexDDL(table: TableConfig): string[] {
  if (!table.indexes) return []

  return table.indexes.map((idx) => {
    const unique = idx.unique ? 'UNIQUE ' : ''
    const columns = idx.columns.join(', ')
    let ddl = `CREATE ${unique}INDEX IF NOT EXISTS ${idx.name} ON ${table.name} (${columns})`

    if (idx.where) {
      ddl += ` WHERE ${idx.where}`
    }

    return ddl
  })
}
