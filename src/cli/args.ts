/**
 * Command-line argument parsing.
 *
 * Options take the form `--key=value`; a bare `--flag` (or `-f`) is `true`.
 * Everything else is positional, as is anything after `--`.
 */

import type { PageSize } from '../lib/content-store.js';
import { UsageError } from '../lib/errors.js';

export type OptionValue = string | true;

export interface ParsedArgs {
  positional: string[];
  options: Record<string, OptionValue>;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const options: Record<string, OptionValue> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith('--') && arg.length > 2) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq === -1) {
        options[body] = true;
      } else {
        options[body.slice(0, eq)] = body.slice(eq + 1);
      }
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      options[arg.slice(1)] = true;
      continue;
    }

    positional.push(arg);
  }

  return { positional, options };
}

/**
 * Throw a usage error for the first option not in `allowed`.
 */
export function rejectUnknownOptions(
  options: Record<string, OptionValue>,
  allowed: readonly string[],
  label: string,
): void {
  const unknown = Object.keys(options).find(name => !allowed.includes(name));
  if (unknown !== undefined) {
    const flag = unknown.length === 1 ? `-${unknown}` : `--${unknown}`;
    throw new UsageError(`Unknown option for "${label}": ${flag}`);
  }
}

/**
 * Read a string-valued option; a bare flag without a value is a usage error.
 */
export function getStringOption(options: Record<string, OptionValue>, name: string): string | undefined {
  const value = options[name];
  if (value === undefined) return undefined;
  if (value === true || value === '') {
    throw new UsageError(`--${name} requires a value, e.g. --${name}=<value>`);
  }
  return value;
}

/**
 * Resolve the number of records to process: --all wins, then --amount, then
 * the configured batch size.
 */
export function resolveAmount(options: Record<string, OptionValue>, defaultAmount: number): PageSize {
  if (options.all !== undefined) {
    return 'all';
  }

  const raw = getStringOption(options, 'amount');
  if (raw === undefined) {
    return defaultAmount;
  }

  if (!/^[-+]?\d+$/.test(raw.trim())) {
    throw new UsageError(`--amount must be an integer, got "${raw}"`);
  }

  const amount = Math.abs(parseInt(raw, 10));
  if (amount === 0) {
    throw new UsageError('--amount must be greater than zero (use --all to process every post)');
  }
  return amount;
}
