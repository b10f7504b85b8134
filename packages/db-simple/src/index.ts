/**
 * @market-hours/db-simple
 *
 * Minimal SQLite connection with transactions and retry
 */

export {
  connect,
  withRetry,
  isRetryableError,
  parseConnectionString,
  type DbConnection,
  type Logger,
  type ConnectOptions,
} from './connect.js'
