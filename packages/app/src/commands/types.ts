/**
 * Command types and interfaces
 */

export type OutputFormat = 'json' | 'text';

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
  /** Reference instant (ISO 8601 with Z or offset) */
  at?: string;
  /** Boundary to search for */
  direction?: 'open' | 'close';
  from?: string;
  to?: string;
  start?: string;
  limit?: number;
}

/**
 * Base command interface
 */
export interface Command {
  name: string;
  description: string;
  aliases?: string[];
  execute(args: string[], options: CommandOptions): Promise<CommandResult>;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  /** Rendered output in the requested format */
  output: string;
  error?: Error;
  duration?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Command registry interface
 */
export interface CommandRegistry {
  register(command: Command): void;
  get(name: string): Command | undefined;
  list(): Command[];
  execute(name: string, args: string[], options: CommandOptions): Promise<CommandResult>;
}
