/**
 * @module common
 * Common primitive types used across all packages.
 */

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}

/** Log severity, most severe first. */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Scoped diagnostic sink. Every level writes to standard error. */
export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}
