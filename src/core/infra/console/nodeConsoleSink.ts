/**
 * Filename: src/core/infra/console/nodeConsoleSink.ts
 * Purpose: Emit formatted log text through the Node.js console, choosing the method by severity.
 * Date: 2025-11-02
 * License: MIT
 */

import type { ConsoleLogType, ConsoleSink } from '@core/app';

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

export type ConsoleTarget = Pick<Console, 'debug' | 'info' | 'log' | 'error'>;

const consoleMethodFor = (target: ConsoleTarget): Record<ConsoleLogType, ConsoleMethod> => ({
  debug: target.debug.bind(target),
  info: target.info.bind(target),
  default: target.log.bind(target),
  error: target.error.bind(target),
  fault: target.error.bind(target),
});

export class NodeConsoleSink implements ConsoleSink {
  private readonly methods: Record<ConsoleLogType, ConsoleMethod>;

  constructor(target: ConsoleTarget = console) {
    this.methods = consoleMethodFor(target);
  }

  emit(type: ConsoleLogType, message: string): void {
    this.methods[type](message);
  }
}
