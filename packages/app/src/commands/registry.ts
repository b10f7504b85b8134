/**
 * In-memory command registry with alias lookup
 */

import type { Command, CommandOptions, CommandRegistry, CommandResult } from './types.js';
import { CommandError, CommandErrorCode } from './errors.js';

export class DefaultCommandRegistry implements CommandRegistry {
  private commands = new Map<string, Command>();
  private aliases = new Map<string, string>();

  /**
   * @throws Error when the name or an alias is already taken
   */
  register(command: Command): void {
    for (const key of [command.name, ...(command.aliases ?? [])]) {
      if (this.commands.has(key) || this.aliases.has(key)) {
        throw new Error(`Command name already registered: ${key}`);
      }
    }

    this.commands.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      this.aliases.set(alias, command.name);
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name) ?? this.commands.get(this.aliases.get(name) ?? '');
  }

  list(): Command[] {
    return [...this.commands.values()];
  }

  async execute(name: string, args: string[], options: CommandOptions): Promise<CommandResult> {
    const command = this.get(name);
    if (!command) {
      const error = new CommandError(CommandErrorCode.UNKNOWN_COMMAND, `Unknown command: ${name}`, {
        available: this.list().map((c) => c.name),
      });
      return { success: false, output: error.format(), error };
    }
    return command.execute(args, options);
  }
}
