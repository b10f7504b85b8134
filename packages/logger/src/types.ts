/**
 * @fileoverview Type definitions for the calendar logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity written by a logger.
 * - 'error': failures that need attention (e.g. upstream format changed)
 * - 'warn': degraded but serving (e.g. refresh failed, stale calendar kept)
 * - 'info': normal lifecycle events
 * - 'debug': request and parsing detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: true,
 *   filePath: './logs/market-hours.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of the pretty printer.
   * @default true when NODE_ENV is production
   */
  json?: boolean;

  /**
   * Optional log file, written in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to write to the console.
   * @default true
   */
  console?: boolean;

  /**
   * Send console output of every level to stderr, keeping stdout for
   * command output.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Structured log entry with the standard fields used across packages.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Correlation id of the CLI invocation or refresh job */
  request_id?: string;
  /** Component name, set by child loggers (e.g. 'refresh', 'scheduler') */
  component?: string;
  /** Operation name (e.g. 'refresh_cycle', 'fetch_schedule') */
  operation?: string;
  /** Acquisition source name (e.g. 'nyse', 'fixture') */
  source?: string;
  duration_ms?: number;
  /** Outcome (e.g. 'success', 'failure') */
  result?: string;
  /** Failure category of a refresh cycle */
  error_kind?: string;
  count?: number;
  [key: string]: unknown;
}

/**
 * Context fields bound to a child logger.
 *
 * @example
 * ```typescript
 * const storeLogger = logger.child({ component: 'calendar-store' });
 * storeLogger.info('Snapshot published'); // includes component
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  source?: string;
  operation?: string;
  request_id?: string;
  [key: string]: unknown;
}

/**
 * Winston's logger, re-exported so consumers do not import winston directly.
 */
export type Logger = WinstonLogger;
