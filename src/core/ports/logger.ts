/**
 * Core Ports - Logger
 *
 * Structurally satisfied by `console`, which is the default everywhere.
 */
export interface Logger {
  log(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}
