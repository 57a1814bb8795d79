/**
 * ANSI color utilities for CLI output
 */

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const enabled = (): boolean => process.stdout.isTTY === true && !process.env.NO_COLOR;

const paint = (codes: string, s: string): string => (enabled() ? `${codes}${s}${colors.reset}` : s);

export const c = {
  title: (s: string) => paint(`${colors.bold}${colors.cyan}`, s),
  success: (s: string) => paint(colors.green, s),
  warning: (s: string) => paint(colors.yellow, s),
  error: (s: string) => paint(`${colors.bgRed}${colors.white}`, s),
  info: (s: string) => paint(colors.blue, s),
  dim: (s: string) => paint(colors.dim, s),
  file: (s: string) => paint(colors.magenta, s),
  time: (s: string) => paint(colors.gray, s),
};
