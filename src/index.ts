export * from '@core/domain';
export * from '@core/app';
export * from '@core/infra';
export {
  EnvironmentValidationError,
  parseLoggingEnvironment,
  resolveConsoleLogFormat,
  type ConsoleSinkKind,
  type EnvIssue,
  type LoggingEnvironmentConfig,
} from '@/config/environment';
export { LOGGER_VERSION, createApplicationLogger, createConsoleSink } from '@/dependencies/logger';
