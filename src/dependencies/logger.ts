import {
  DefaultLogBuilder,
  LogConsoleOutput,
  OutputLogger,
  type ConsoleSink,
  type Logger,
} from '@core/app';
import { NodeConsoleSink, createPinoConsoleSink } from '@core/infra';
import type { LoggingEnvironmentConfig } from '@/config/environment';

export const LOGGER_VERSION = '0.1.0';

export const createConsoleSink = (config: Pick<LoggingEnvironmentConfig, 'sink'>): ConsoleSink =>
  config.sink === 'pino' ? createPinoConsoleSink() : new NodeConsoleSink();

export const createApplicationLogger = (
  config: LoggingEnvironmentConfig,
  sink: ConsoleSink = createConsoleSink(config),
): Logger => {
  const logBuilder = new DefaultLogBuilder({
    serviceName: config.serviceName,
    loggerName: config.loggerName,
    loggerVersion: LOGGER_VERSION,
    applicationVersion: config.applicationVersion,
    ...(config.environment ? { environment: config.environment } : {}),
  });

  const output = new LogConsoleOutput({
    logBuilder,
    format: config.format,
    timeZone: config.timeZone,
    sink,
  });

  return new OutputLogger(output);
};
