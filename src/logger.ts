/**
 * Cloud Billing — Logging & Terminal Output
 *
 * Library code logs through an injected BillingLogger and is silent by
 * default. The CLI supplies a stderr logger so stdout stays clean for data.
 */

import type { BillingLogger } from "./types.js";

export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  info: (s: string) => `\x1b[34m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

export const noopLogger: BillingLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type ConsoleLoggerOptions = {
  /** Emit debug lines (default: false). */
  verbose?: boolean;
  /** Wrap levels in ANSI colors (default: true when stderr is a TTY). */
  color?: boolean;
  write?: (line: string) => void;
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): BillingLogger {
  const color = options.color ?? Boolean(process.stderr.isTTY);
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const paint = (fn: (s: string) => string, s: string) => (color ? fn(s) : s);

  return {
    debug: (message) => {
      if (options.verbose) write(paint(theme.muted, `[debug] ${message}`));
    },
    info: (message) => write(`${paint(theme.info, "[info]")} ${message}`),
    warn: (message) => write(`${paint(theme.warn, "[warn]")} ${message}`),
    error: (message) => write(`${paint(theme.error, "[error]")} ${message}`),
  };
}
