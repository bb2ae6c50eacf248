/**
 * Command registry for the post-thumbs CLI.
 *
 * Each top-level command owns a set of subcommands. Registration goes through
 * registerCommandSafely(), so one command failing to register leaves the rest
 * of the CLI usable.
 */

import type { ParsedArgs } from './args.js';
import { logger } from '../lib/logger.js';

export interface Subcommand {
  /** Usage line shown in help, e.g. "set [--all] [--amount=<n>]" */
  synopsis: string;
  description: string;
  /** Option names the subcommand accepts besides the global ones */
  options?: readonly string[];
  run(args: ParsedArgs): Promise<void>;
}

export interface CommandDefinition {
  name: string;
  description: string;
  subcommands: Record<string, Subcommand>;
}

const COMMAND_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDefinition>();

  /**
   * Register a command. Throws on an invalid or already registered name, or a
   * command without subcommands.
   */
  add(definition: CommandDefinition): void {
    if (!COMMAND_NAME_PATTERN.test(definition.name)) {
      throw new Error(`Invalid command name "${definition.name}"`);
    }
    if (this.commands.has(definition.name)) {
      throw new Error(`Command "${definition.name}" is already registered`);
    }
    if (Object.keys(definition.subcommands).length === 0) {
      throw new Error(`Command "${definition.name}" has no subcommands`);
    }
    this.commands.set(definition.name, definition);
  }

  get(name: string): CommandDefinition | undefined {
    return this.commands.get(name);
  }

  list(): CommandDefinition[] {
    return [...this.commands.values()];
  }
}

/**
 * Register a command on a best-effort basis: a failure is logged as a warning
 * and reported through the return value instead of being thrown.
 */
export function registerCommandSafely(registry: CommandRegistry, definition: CommandDefinition): boolean {
  try {
    registry.add(definition);
    return true;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`⚠️  Could not register command "${definition.name}": ${reason}`);
    return false;
  }
}

/**
 * Usage text for one command, or for all of them.
 */
export function formatUsage(binName: string, commands: CommandDefinition[]): string {
  const lines: string[] = [`Usage:`];
  for (const command of commands) {
    lines.push('', `  ${command.name} - ${command.description}`);
    for (const sub of Object.values(command.subcommands)) {
      lines.push(`    ${binName} ${command.name} ${sub.synopsis}`);
      lines.push(`        ${sub.description}`);
    }
  }
  lines.push(
    '',
    'Global options:',
    '  --verbose, -V   Show API traffic and per-post details',
    '  --version, -v   Show version',
  );
  return lines.join('\n');
}
