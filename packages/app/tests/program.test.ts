/**
 * Tests for the commander program definition
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Command as Program } from 'commander';
import { createProgram } from '../src/program.js';
import type { CommandOptions } from '../src/commands/types.js';

interface RunCall {
  name: string;
  args: string[];
  options: CommandOptions;
}

describe('createProgram', () => {
  let calls: RunCall[];
  let served: number;

  beforeEach(() => {
    calls = [];
    served = 0;
  });

  // commander keeps option values on a program between parses, so each parse gets its own
  function parse(argv: string[]): Promise<Program> {
    const program = createProgram({
      run: async (name, args, options) => {
        calls.push({ name, args, options });
        return { success: true, output: '' };
      },
      serve: async () => {
        served++;
      },
    });

    for (const command of [program, ...program.commands]) {
      command.exitOverride();
      command.configureOutput({ writeErr: () => {}, writeOut: () => {} });
    }

    return program.parseAsync(argv, { from: 'user' });
  }

  it('passes status options with output defaults', async () => {
    await parse(['status', '--at', '2024-11-25T15:00:00Z']);

    expect(calls).toEqual([
      { name: 'status', args: [], options: { at: '2024-11-25T15:00:00Z', format: 'text', verbose: false } },
    ]);
  });

  it('accepts a direction and json output for next', async () => {
    await parse(['next', '--direction', 'close', '--format', 'json', '-v']);

    expect(calls[0]).toEqual({ name: 'next', args: [], options: { direction: 'close', format: 'json', verbose: true } });
  });

  it('rejects an unknown direction', async () => {
    await expect(parse(['next', '--direction', 'sideways'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(calls).toHaveLength(0);
  });

  it('requires both ends of a holiday range', async () => {
    await expect(parse(['holidays', '--from', '2024-12-01'])).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
  });

  it('parses the history limit', async () => {
    await parse(['history']);
    await parse(['history', '--limit', '5']);

    expect(calls.map((c) => c.options.limit)).toEqual([20, 5]);
    await expect(parse(['history', '--limit', '0'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });

  it('starts the daemon for serve', async () => {
    await parse(['serve']);

    expect(served).toBe(1);
    expect(calls).toHaveLength(0);
  });
});
