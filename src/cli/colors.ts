/**
 * ANSI color utilities for CLI output
 *
 * Disabled when NO_COLOR is set or stdout is not a terminal.
 */

const enabled = !process.env.NO_COLOR && process.stdout.isTTY === true;

const code = (value: string): string => (enabled ? value : '');

export const colors = {
  reset: code('\x1b[0m'),
  bold: code('\x1b[1m'),
  dim: code('\x1b[2m'),
  green: code('\x1b[32m'),
  yellow: code('\x1b[33m'),
  blue: code('\x1b[34m'),
  magenta: code('\x1b[35m'),
  cyan: code('\x1b[36m'),
  white: code('\x1b[37m'),
  gray: code('\x1b[90m'),
  bgRed: code('\x1b[41m'),
};

/**
 * Semantic color helpers
 */
export const c = {
  title: (s: string) => `${colors.bold}${colors.cyan}${s}${colors.reset}`,
  header: (s: string) => `${colors.bold}${colors.cyan}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  error: (s: string) => enabled ? `${colors.bgRed}${colors.white} ${s} ${colors.reset}` : s,
  info: (s: string) => `${colors.blue}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  file: (s: string) => `${colors.magenta}${s}${colors.reset}`,
  path: (s: string) => `${colors.gray}${s}${colors.reset}`,
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
};
