import type { LogLevel } from '@core/domain';

import type { ConsoleLogType, ConsoleSink } from '../ports/consoleSink';
import type { LogBuilder, LogWriteRequest } from '../ports/logBuilder';
import type { LogOutput } from '../ports/logOutput';
import type { ConsoleLogFormat } from './consoleLogFormat';
import { createConsoleLogFormatter, type ConsoleLogFormatter } from './consoleLogFormatter';

const consoleLogTypes: Record<LogLevel, ConsoleLogType> = {
  debug: 'debug',
  info: 'info',
  notice: 'default',
  warn: 'error',
  error: 'error',
  critical: 'fault',
};

export const consoleLogTypeFor = (level: LogLevel): ConsoleLogType => consoleLogTypes[level];

export type LogConsoleOutputOptions = {
  logBuilder: LogBuilder;
  format: ConsoleLogFormat;
  /** IANA time zone used by the short formats. */
  timeZone: string;
  sink: ConsoleSink;
};

/**
 * `LogOutput` which prints logs to console: one synchronous sink call per write.
 */
export class LogConsoleOutput implements LogOutput {
  private readonly logBuilder: LogBuilder;
  private readonly formatter: ConsoleLogFormatter;
  private readonly sink: ConsoleSink;

  constructor(options: LogConsoleOutputOptions) {
    this.logBuilder = options.logBuilder;
    this.formatter = createConsoleLogFormatter(options.format, options.timeZone);
    this.sink = options.sink;
  }

  writeLog(request: LogWriteRequest): void {
    const log = this.logBuilder.createLogWith(request);
    const message = this.formatter.format(log);
    this.sink.emit(consoleLogTypeFor(request.level), message);
  }
}
