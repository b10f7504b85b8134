/**
 * SQLite connection abstraction with retry on transient lock errors
 */

import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'

/**
 * Minimal logger interface for dependency injection
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void
  error(message: string, meta?: Record<string, unknown>): void
}

const noopLogger: Logger = {
  info: () => {},
  error: () => {},
}

/**
 * Database connection interface
 */
export interface DbConnection {
  readonly dbType: 'sqlite'

  /**
   * Execute SQL without returning results (DDL, INSERT, UPDATE, DELETE).
   * Without params the SQL may hold several statements.
   */
  exec(sql: string, params?: unknown[]): Promise<void>

  /**
   * Execute SQL and return results (SELECT)
   */
  query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>

  /**
   * Execute a function within a transaction
   * Automatically commits on success, rolls back on error
   */
  transaction<T>(fn: (db: DbConnection) => Promise<T>): Promise<T>

  close(): Promise<void>
}

export interface ConnectOptions {
  logger?: Logger
  /**
   * Retry configuration (applied to SQLITE_BUSY / SQLITE_LOCKED)
   */
  retry?: {
    maxRetries?: number
    initialDelayMs?: number
    backoffMultiplier?: number
    jitterPercent?: number
  }
}

const DEFAULT_RETRY = {
  maxRetries: 3,
  initialDelayMs: 100,
  backoffMultiplier: 2,
  jitterPercent: 25,
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Apply jitter to delay (±jitterPercent%)
 */
function applyJitter(delayMs: number, jitterPercent: number): number {
  const jitter = delayMs * (jitterPercent / 100)
  return delayMs + (Math.random() * 2 - 1) * jitter
}

export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false

  const code = 'code' in err ? String(err.code) : ''
  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') return true

  return err.message.includes('SQLITE_BUSY') || err.message.includes('SQLITE_LOCKED')
}

/**
 * Retry wrapper for functions
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: ConnectOptions,
  operation: string
): Promise<T> {
  const retry = { ...DEFAULT_RETRY, ...options.retry }
  const logger = options.logger || noopLogger
  let lastError: unknown

  for (let attempt = 0; attempt <= retry.maxRetries; attempt++) {
    try {
      return await fn()
    } catch (err) {
      lastError = err

      if (!isRetryableError(err) || attempt === retry.maxRetries) {
        throw err
      }

      const baseDelay = retry.initialDelayMs * Math.pow(retry.backoffMultiplier, attempt)
      const delayMs = applyJitter(baseDelay, retry.jitterPercent)

      logger.info(`Retrying ${operation} after transient error`, {
        attempt: attempt + 1,
        maxRetries: retry.maxRetries,
        delayMs: Math.round(delayMs),
        error: String(err),
      })

      await sleep(delayMs)
    }
  }

  throw lastError
}

/**
 * SQLite connection wrapper
 */
class SqliteConnection implements DbConnection {
  readonly dbType = 'sqlite' as const

  constructor(
    private db: Database.Database,
    private logger: Logger
  ) {}

  async exec(sql: string, params?: unknown[]): Promise<void> {
    if (params === undefined) {
      this.db.exec(sql)
      return
    }
    this.db.prepare(sql).run(...params)
  }

  async query<T = unknown>(sql: string, params: unknown[] = []): Promise<T[]> {
    const stmt = this.db.prepare(sql)
    return stmt.all(...params) as T[]
  }

  async transaction<T>(fn: (db: DbConnection) => Promise<T>): Promise<T> {
    // Nested calls join the outer transaction
    if (this.db.inTransaction) {
      return fn(this)
    }

    this.db.exec('BEGIN IMMEDIATE')
    try {
      const result = await fn(this)
      this.db.exec('COMMIT')
      return result
    } catch (error) {
      this.db.exec('ROLLBACK')
      this.logger.error('SQLite transaction rolled back', { error: String(error) })
      throw error
    }
  }

  async close(): Promise<void> {
    this.db.close()
    this.logger.info('SQLite connection closed')
  }
}

/**
 * Resolve a database URL to a SQLite file path (or ":memory:")
 */
export function parseConnectionString(databaseUrl: string): string {
  if (databaseUrl.startsWith('sqlite:')) {
    return databaseUrl.replace(/^sqlite:/, '')
  }

  if (databaseUrl === ':memory:' || databaseUrl.endsWith('.db') || databaseUrl.endsWith('.sqlite')) {
    return databaseUrl
  }

  throw new Error(
    `Unsupported database URL format: ${databaseUrl}. ` + `Expected sqlite:path/to/db.db or a .db file path`
  )
}

/**
 * Connect to a SQLite database
 *
 * @param databaseUrl - Connection string (e.g., "sqlite::memory:" or "data/market_hours.db")
 *
 * @example
 * const db = await connect('sqlite::memory:')
 * const db = await connect('sqlite:data/market_hours.db')
 */
export async function connect(databaseUrl: string, options: ConnectOptions = {}): Promise<DbConnection> {
  const logger = options.logger || noopLogger
  const file = parseConnectionString(databaseUrl)

  return withRetry(
    async () => {
      logger.info('Connecting to SQLite', { path: file })
      if (file !== ':memory:') {
        fs.mkdirSync(path.dirname(file), { recursive: true })
      }
      const db = new Database(file)
      db.pragma('journal_mode = WAL')
      return new SqliteConnection(db, logger)
    },
    options,
    'database connection'
  )
}
