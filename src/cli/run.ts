/**
 * post-thumbs CLI dispatcher. Resolves to a process exit code:
 * 0 on success, 1 when a command fails, 2 on invalid usage.
 */

import fs from 'fs';
import path from 'path';
import { parseArgs, rejectUnknownOptions } from './args.js';
import { CommandRegistry, formatUsage, registerCommandSafely } from './registry.js';
import { createThumbnailCommand, type ThumbnailCommandContext } from './thumbnail.js';
import { loadConfig, type PostThumbsConfig } from '../lib/config.js';
import type { ContentStore } from '../lib/content-store.js';
import { UsageError } from '../lib/errors.js';
import { initVerboseFromArgs, logger } from '../lib/logger.js';
import { createContentStore } from '../lib/store-factory.js';
import { ThumbnailCommand } from '../scripts/thumbnail-command.js';

export const BIN_NAME = 'post-thumbs';

/** Accepted by every subcommand */
const GLOBAL_OPTIONS = ['verbose', 'V'] as const;

export interface CliDependencies {
  /** Use this configuration instead of loading one */
  config?: PostThumbsConfig;
  /** Use this store instead of creating one from the configuration */
  store?: ContentStore;
}

export function getVersion(): string {
  try {
    const packageJsonPath = path.join(__dirname, '../../package.json');
    const packageJson: { version?: unknown } = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
    return typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

function buildRegistry(deps: CliDependencies): CommandRegistry {
  let context: ThumbnailCommandContext | undefined;
  const getContext = (): ThumbnailCommandContext => {
    if (!context) {
      const config = deps.config ?? loadConfig();
      const store = deps.store ?? createContentStore(config);
      context = { config, command: new ThumbnailCommand(store, { attachmentLimit: config.attachmentLimit }) };
    }
    return context;
  };

  const registry = new CommandRegistry();
  registerCommandSafely(registry, createThumbnailCommand(getContext));
  return registry;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  initVerboseFromArgs(argv);
  const args = parseArgs(argv);
  const [commandName, subcommandName, ...rest] = args.positional;

  if (args.options.version || args.options.v || commandName === 'version') {
    logger.log(`${BIN_NAME} v${getVersion()}`);
    return 0;
  }

  const registry = buildRegistry(deps);

  if (!commandName || commandName === 'help' || args.options.help) {
    logger.log(`${BIN_NAME} v${getVersion()}\n\n${formatUsage(BIN_NAME, registry.list())}`);
    return 0;
  }

  const command = registry.get(commandName);
  if (!command) {
    logger.error(`Unknown command: ${commandName}`);
    logger.log(formatUsage(BIN_NAME, registry.list()));
    return 2;
  }

  const subcommand = subcommandName !== undefined && Object.hasOwn(command.subcommands, subcommandName)
    ? command.subcommands[subcommandName]
    : undefined;
  if (!subcommand) {
    const available = Object.keys(command.subcommands).join(', ');
    logger.error(subcommandName === undefined
      ? `Missing subcommand for "${command.name}". Available: ${available}`
      : `Unknown subcommand "${command.name} ${subcommandName}". Available: ${available}`);
    logger.log(formatUsage(BIN_NAME, [command]));
    return 2;
  }

  try {
    rejectUnknownOptions(
      args.options,
      [...GLOBAL_OPTIONS, ...(subcommand.options ?? [])],
      `${command.name} ${subcommandName}`,
    );
    await subcommand.run({ positional: rest, options: args.options });
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      logger.log(formatUsage(BIN_NAME, [command]));
      return 2;
    }
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
