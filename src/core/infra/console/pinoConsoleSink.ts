import pino, { type DestinationStream, type Level, type Logger as PinoInstance } from 'pino';

import type { ConsoleLogType, ConsoleSink } from '@core/app';

export type CreatePinoConsoleSinkOptions = {
  /** Defaults to a synchronous stdout destination. */
  destination?: DestinationStream;
};

const pinoLevels: Record<ConsoleLogType, Level> = {
  debug: 'debug',
  info: 'info',
  default: 'info',
  error: 'error',
  fault: 'fatal',
};

class PinoConsoleSink implements ConsoleSink {
  constructor(private readonly instance: PinoInstance) {}

  emit(type: ConsoleLogType, message: string): void {
    this.instance[pinoLevels[type]](message);
  }
}

export const createPinoConsoleSink = (options: CreatePinoConsoleSinkOptions = {}): ConsoleSink => {
  const destination = options.destination ?? pino.destination({ dest: 1, sync: true });

  // Lowest level emitted by this sink; it never filters.
  const instance = pino(
    {
      level: 'debug',
      base: null,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    destination,
  );

  return new PinoConsoleSink(instance);
};
