/**
 * `thumbnail` CLI command: set, show and cleanup.
 */

import { getStringOption, resolveAmount, type ParsedArgs } from './args.js';
import type { CommandDefinition } from './registry.js';
import type { PostThumbsConfig } from '../lib/config.js';
import { UsageError } from '../lib/errors.js';
import { isVerbose } from '../lib/logger.js';
import { startSpinner, type Spinner } from '../lib/spinner.js';
import { isShowMode, SHOW_MODES, ThumbnailCommand } from '../scripts/thumbnail-command.js';

export interface ThumbnailCommandContext {
  config: PostThumbsConfig;
  command: ThumbnailCommand;
}

function rejectExtraArgs(args: ParsedArgs, expected: number, subcommand: string): void {
  if (args.positional.length > expected) {
    throw new UsageError(`Unexpected argument for "thumbnail ${subcommand}": ${args.positional[expected]}`);
  }
}

/**
 * Build the command definition. The context is resolved only when a
 * subcommand runs, so help and usage errors need no configuration.
 */
export function createThumbnailCommand(getContext: () => ThumbnailCommandContext): CommandDefinition {
  return {
    name: 'thumbnail',
    description: 'Set featured images from attached images',
    subcommands: {
      set: {
        synopsis: 'set [--all] [--amount=<amount>] [--post_type=<post_type>]',
        description: 'Set featured images on posts that have none, using their first attached image',
        options: ['all', 'amount', 'post_type'],
        async run(args) {
          rejectExtraArgs(args, 0, 'set');
          const { config, command } = getContext();
          const amount = resolveAmount(args.options, config.batchSize);
          const postType = getStringOption(args.options, 'post_type') ?? config.postType;

          let spinner: Spinner | undefined;
          await command.set({
            postType,
            amount,
            onProgress(done, total) {
              if (isVerbose()) return;
              spinner ??= startSpinner('Setting featured images…');
              spinner.tick(done, total);
              if (done === total) spinner.stop();
            },
          }).finally(() => spinner?.stop());
        },
      },
      show: {
        synopsis: 'show <unset|multiple> [--post_type=<post_type>]',
        description: 'List processed posts with no thumbnail (unset) or with multiple candidate images (multiple)',
        options: ['post_type'],
        async run(args) {
          const mode = args.positional[0];
          if (mode === undefined || !isShowMode(mode)) {
            throw new UsageError(`"thumbnail show" expects one of: ${SHOW_MODES.join(', ')}`);
          }
          rejectExtraArgs(args, 1, 'show');
          const { config, command } = getContext();
          const postType = getStringOption(args.options, 'post_type') ?? config.postType;
          await command.show(mode, { postType });
        },
      },
      cleanup: {
        synopsis: 'cleanup [--post_type=<post_type>]',
        description: 'Delete the metadata written by "thumbnail set" (all post types unless --post_type is given)',
        options: ['post_type'],
        async run(args) {
          rejectExtraArgs(args, 0, 'cleanup');
          const { command } = getContext();
          await command.cleanup({ postType: getStringOption(args.options, 'post_type') });
        },
      },
    },
  };
}
