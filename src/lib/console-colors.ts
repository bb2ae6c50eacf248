/**
 * Console color utilities for CLI output
 * Uses ANSI escape codes for terminal colors
 */

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be used (disabled for NO_COLOR and non-TTY output)
 */
export function shouldUseColors(): boolean {
  if (process.env.NO_COLOR) {
    return false;
  }

  if (typeof process.stdout.isTTY === 'boolean') {
    return process.stdout.isTTY;
  }

  return true;
}

function colorize(text: string, color: string): string {
  return shouldUseColors() ? `${color}${text}${colors.reset}` : text;
}

export const colorConsole = {
  // Success messages (green)
  success: (message: unknown, ...args: unknown[]) => {
    console.log(colorize(String(message), colors.green), ...args);
  },

  // Error messages (red)
  error: (message: unknown, ...args: unknown[]) => {
    console.error(colorize(String(message), colors.red), ...args);
  },

  // Warning messages (yellow)
  warn: (message: unknown, ...args: unknown[]) => {
    console.warn(colorize(String(message), colors.yellow), ...args);
  },

  // Info messages (cyan)
  info: (message: unknown, ...args: unknown[]) => {
    console.log(colorize(String(message), colors.cyan), ...args);
  },

  // Debug messages (gray)
  debug: (message: unknown, ...args: unknown[]) => {
    console.log(colorize(String(message), colors.gray), ...args);
  },
};
