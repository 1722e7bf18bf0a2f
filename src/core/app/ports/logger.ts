export type LoggerContext = {
  /**
   * Optional error instance or metadata. Serialised into the `error.*` fields of the log
   * rather than into its attributes.
   */
  error?: unknown;
  /** Additional structured properties to enrich the log entry. */
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  notice(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string, context?: LoggerContext): void;
  critical(message: string, context?: LoggerContext): void;
  withContext(context: LoggerContext): Logger;
  withTags(...tags: string[]): Logger;
}
