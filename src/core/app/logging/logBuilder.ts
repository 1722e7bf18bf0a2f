import type { Log } from '@core/domain';

import type { LogBuilder, LogWriteRequest } from '../ports/logBuilder';
import { sanitizeAttributes, sanitizeTags } from './logSanitizer';

export type LogBuilderOptions = {
  serviceName: string;
  loggerName: string;
  loggerVersion: string;
  applicationVersion: string;
  /** Adds an `env:<environment>` tag to every log when set. */
  environment?: string;
};

/**
 * Turns raw write requests into frozen {@link Log} records stamped with the logger's identity.
 */
export class DefaultLogBuilder implements LogBuilder {
  constructor(private readonly options: LogBuilderOptions) {}

  createLogWith(request: LogWriteRequest): Log {
    const tags = this.options.environment
      ? [...request.tags, `env:${this.options.environment}`]
      : request.tags;

    const log: Log = {
      date: new Date(request.date.getTime()),
      status: request.level,
      message: request.message,
      serviceName: this.options.serviceName,
      loggerName: this.options.loggerName,
      loggerVersion: this.options.loggerVersion,
      applicationVersion: this.options.applicationVersion,
      attributes: Object.freeze(sanitizeAttributes(request.attributes)),
      tags: sanitizeTags(tags),
      ...(request.error ? { error: Object.freeze({ ...request.error }) } : {}),
    };

    return Object.freeze(log);
  }
}
