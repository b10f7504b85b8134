/**
 * Error handling for CLI commands
 *
 * Maps calendar errors to stable command error codes and friendly messages.
 */

import { isCalendarError, isInvalidInputError, isNoUpcomingSessionError } from '@market-hours/contracts';

export enum CommandErrorCode {
  /** Invalid command arguments */
  INVALID_ARGS = 'INVALID_ARGS',
  /** No session inside the lookahead window */
  NO_UPCOMING_SESSION = 'NO_UPCOMING_SESSION',
  /** Refresh pipeline or scheduler error */
  REFRESH_ERROR = 'REFRESH_ERROR',
  /** Unknown command name */
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',
  /** Internal command error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const ERROR_MESSAGES: Record<CommandErrorCode, string> = {
  [CommandErrorCode.INVALID_ARGS]: 'Invalid command arguments provided',
  [CommandErrorCode.NO_UPCOMING_SESSION]: 'No upcoming session found',
  [CommandErrorCode.REFRESH_ERROR]: 'Calendar refresh failed',
  [CommandErrorCode.UNKNOWN_COMMAND]: 'Unknown command',
  [CommandErrorCode.INTERNAL_ERROR]: 'Internal command error',
};

/**
 * Command error with a structured code and context
 */
export class CommandError extends Error {
  readonly code: CommandErrorCode;
  readonly context?: Record<string, unknown>;
  override cause?: Error;

  constructor(code: CommandErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'CommandError';
    this.code = code;
    this.context = context;
    this.cause = cause;
    Error.captureStackTrace(this, CommandError);
  }

  /**
   * Format error for display
   */
  format(verbose = false): string {
    const lines: string[] = [`Error: ${this.message}`, `Code: ${this.code}`];

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (verbose && this.cause) {
      lines.push('Caused by:');
      lines.push(`  ${this.cause.message}`);
    }

    if (verbose && this.stack) {
      lines.push('Stack trace:');
      lines.push(this.stack);
    }

    return lines.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }
}

/**
 * Wrap any thrown value as a CommandError, keeping calendar error codes
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): CommandError {
  if (error instanceof CommandError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));

  if (isInvalidInputError(error)) {
    return new CommandError(CommandErrorCode.INVALID_ARGS, error.message, context, cause);
  }
  if (isNoUpcomingSessionError(error)) {
    return new CommandError(CommandErrorCode.NO_UPCOMING_SESSION, error.message, context, cause);
  }
  if (isCalendarError(error)) {
    return new CommandError(CommandErrorCode.REFRESH_ERROR, error.message, { ...context, calendarCode: error.code }, cause);
  }
  return new CommandError(CommandErrorCode.INTERNAL_ERROR, cause.message, context, cause);
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose = false): string {
  return wrapError(error).format(verbose);
}
