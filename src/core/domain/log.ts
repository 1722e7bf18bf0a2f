import type { LogLevel } from './logLevel';

export type LogAttributes = Record<string, unknown>;

export type LogError = {
  kind: string;
  message: string;
  stack?: string;
};

/**
 * Canonical record of a single logging call. Built once per write and never mutated.
 */
export type Log = {
  readonly date: Date;
  readonly status: LogLevel;
  readonly message: string;
  readonly error?: LogError;
  readonly serviceName: string;
  readonly loggerName: string;
  readonly loggerVersion: string;
  readonly applicationVersion: string;
  readonly attributes: Readonly<LogAttributes>;
  readonly tags: ReadonlySet<string>;
};
