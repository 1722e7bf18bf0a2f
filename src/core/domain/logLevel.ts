/**
 * Filename: src/core/domain/logLevel.ts
 * Purpose: Define the ordered severity levels a log record can carry.
 * Date: 2025-11-02
 * License: MIT
 */

export const LOG_LEVELS = ['debug', 'info', 'notice', 'warn', 'error', 'critical'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);

/**
 * Compares two levels by severity. Negative when `a` is less severe than `b`.
 */
export const compareLogLevels = (a: LogLevel, b: LogLevel): number =>
  LOG_LEVELS.indexOf(a) - LOG_LEVELS.indexOf(b);
