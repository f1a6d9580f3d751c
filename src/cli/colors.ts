/**
 * ANSI color utilities for CLI output
 *
 * Disabled when stdout is not a terminal or NO_COLOR is set, so piped
 * output stays plain.
 */

const enabled = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function code(value: string): string {
  return enabled ? value : '';
}

export const colors = {
  reset: code('\x1b[0m'),
  bold: code('\x1b[1m'),
  dim: code('\x1b[2m'),
  italic: code('\x1b[3m'),
  green: code('\x1b[32m'),
  yellow: code('\x1b[33m'),
  blue: code('\x1b[34m'),
  magenta: code('\x1b[35m'),
  cyan: code('\x1b[36m'),
  gray: code('\x1b[90m'),
  red: code('\x1b[31m'),
};

/**
 * Semantic color helpers
 */
export const c = {
  title: (s: string) => `${colors.bold}${colors.cyan}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${s}${colors.reset}`,
  info: (s: string) => `${colors.blue}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  file: (s: string) => `${colors.magenta}${s}${colors.reset}`,
  path: (s: string) => `${colors.gray}${s}${colors.reset}`,
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
  hashtag: (s: string) => `${colors.cyan}#${s.replace(/^#/, '')}${colors.reset}`,
  quote: (s: string) => `${colors.dim}${colors.italic}${s}${colors.reset}`,
  list: (s: string) => `${colors.yellow}•${colors.reset} ${s}`,
};

export const RULE = '━'.repeat(60);
