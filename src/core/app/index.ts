export * from './ports/consoleSink';
export * from './ports/logBuilder';
export * from './ports/logger';
export * from './ports/logOutput';
export * from './errors/logEncodingError';
export * from './logging/consoleLogFormat';
export * from './logging/consoleLogFormatter';
export * from './logging/logBuilder';
export * from './logging/logConsoleOutput';
export * from './logging/logEncoder';
export * from './logging/logSanitizer';
export * from './logging/outputLogger';
