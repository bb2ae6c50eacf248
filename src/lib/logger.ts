/**
 * Centralized logger for the post-thumbs CLI.
 *
 * - verbose messages (API traffic, query details) only with --verbose
 * - info/success/warn/error are always shown
 *
 * Usage:
 *   import { logger } from '../lib/logger.js';
 *   logger.verbose('[QUERY] ...');   // only shown with --verbose
 *   logger.success('Done!');         // always shown
 */

import { colorConsole } from './console-colors.js';

let _verbose = false;

/**
 * Enable or disable verbose logging.
 */
export function setVerbose(value: boolean): void {
  _verbose = value;
}

export function isVerbose(): boolean {
  return _verbose;
}

export const logger = {
  setVerbose,
  isVerbose,

  /** Only printed when verbose mode is active */
  verbose: (message: string, ...args: unknown[]): void => {
    if (_verbose) {
      colorConsole.debug(message, ...args);
    }
  },

  info: (message: string, ...args: unknown[]): void => {
    colorConsole.info(message, ...args);
  },

  success: (message: string, ...args: unknown[]): void => {
    colorConsole.success(message, ...args);
  },

  warn: (message: string, ...args: unknown[]): void => {
    colorConsole.warn(message, ...args);
  },

  error: (message: string, ...args: unknown[]): void => {
    colorConsole.error(message, ...args);
  },

  /** Plain, uncolored output for command results (ID lists and the like) */
  log: (message: string, ...args: unknown[]): void => {
    console.log(message, ...args);
  },
};

/**
 * Activate verbose mode from --verbose / -V or POST_THUMBS_VERBOSE=true.
 * Returns whether verbose mode ended up enabled.
 */
export function initVerboseFromArgs(args: string[] = process.argv): boolean {
  if (args.includes('--verbose') || args.includes('-V') || process.env.POST_THUMBS_VERBOSE === 'true') {
    setVerbose(true);
  }
  return _verbose;
}
