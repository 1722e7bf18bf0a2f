import type { Log, LogAttributes, LogError, LogLevel } from '@core/domain';

/** Raw inputs of a single write call, before they become a canonical {@link Log}. */
export type LogWriteRequest = {
  level: LogLevel;
  message: string;
  date: Date;
  attributes: LogAttributes;
  tags: ReadonlySet<string>;
  error?: LogError;
};

export interface LogBuilder {
  createLogWith(request: LogWriteRequest): Log;
}
