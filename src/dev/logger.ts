/**
 * Centralized logger interface
 * - Keeps production builds silent for debug/warn/info messages
 * - Prefixes every line so host output can be told apart from runtime output
 * - Protects against missing `console` in some environments
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const PREFIX = '[prism]';

function callConsole(method: keyof Logger, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn = console[method];
  if (typeof fn !== 'function') return;
  try {
    fn.apply(console, [PREFIX, ...args]);
  } catch {
    // ignore logging errors
  }
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export const logger: Logger = {
  debug: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};
