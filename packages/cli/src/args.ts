/**
 * Command-line arguments
 */

import type { CommandName } from './commands.js';
import { COMMANDS, isCommandName } from './commands.js';

export interface CliArgs {
  command: CommandName;
  configPath: string;
}

export const USAGE = `Usage: schemabridge <${COMMANDS.join('|')}> --config <config.json>`;

/**
 * Parse `<command> --config <file>` (or `--config=<file>`).
 * Returns null when the arguments do not form a valid invocation.
 */
export function parseArgs(args: readonly string[]): CliArgs | null {
  let command: CommandName | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === '--config') {
      configPath = args[i + 1];
      i++;
    } else if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
    } else if (command === undefined && isCommandName(arg)) {
      command = arg;
    } else {
      return null;
    }
  }

  if (!command || !configPath) return null;
  return { command, configPath };
}
