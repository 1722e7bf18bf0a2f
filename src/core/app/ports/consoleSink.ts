/**
 * Severity tags understood by the platform console. `default` is the
 * facility's normal level and `fault` its highest.
 */
export type ConsoleLogType = 'debug' | 'info' | 'default' | 'error' | 'fault';

export interface ConsoleSink {
  emit(type: ConsoleLogType, message: string): void;
}
