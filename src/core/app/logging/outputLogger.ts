import type { LogAttributes, LogError, LogLevel } from '@core/domain';
import { toLogError } from '@/lib/logging/error';

import type { Logger, LoggerContext } from '../ports/logger';
import type { LogOutput } from '../ports/logOutput';

export type OutputLoggerOptions = {
  clock?: () => Date;
  attributes?: LogAttributes;
  tags?: Iterable<string>;
};

type SplitContext = {
  attributes: LogAttributes;
  error?: LogError;
};

const splitContext = (context?: LoggerContext): SplitContext => {
  const attributes = new Map<string, unknown>();
  let error: LogError | undefined;

  if (!context) {
    return { attributes: {} };
  }

  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'undefined') {
      continue;
    }

    if (key === 'error') {
      error = toLogError(value);
      continue;
    }

    attributes.set(key, value);
  }

  // fromEntries keeps `__proto__` as an own attribute.
  const entries = Object.fromEntries(attributes);
  return error ? { attributes: entries, error } : { attributes: entries };
};

/**
 * Logger facade that turns level calls into write requests for a {@link LogOutput}.
 * Bound context and tags are copied into each request; call-site context wins on key clashes.
 */
export class OutputLogger implements Logger {
  private readonly clock: () => Date;
  private readonly attributes: LogAttributes;
  private readonly tags: ReadonlySet<string>;

  constructor(
    private readonly output: LogOutput,
    options: OutputLoggerOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.attributes = { ...options.attributes };
    this.tags = new Set(options.tags);
  }

  debug(message: string, context?: LoggerContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write('info', message, context);
  }

  notice(message: string, context?: LoggerContext): void {
    this.write('notice', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write('error', message, context);
  }

  critical(message: string, context?: LoggerContext): void {
    this.write('critical', message, context);
  }

  withContext(context: LoggerContext): Logger {
    const { attributes } = splitContext(context);
    return new OutputLogger(this.output, {
      clock: this.clock,
      attributes: { ...this.attributes, ...attributes },
      tags: this.tags,
    });
  }

  withTags(...tags: string[]): Logger {
    return new OutputLogger(this.output, {
      clock: this.clock,
      attributes: this.attributes,
      tags: [...this.tags, ...tags],
    });
  }

  private write(level: LogLevel, message: string, context?: LoggerContext) {
    const { attributes, error } = splitContext(context);

    this.output.writeLog({
      level,
      message,
      date: this.clock(),
      attributes: { ...this.attributes, ...attributes },
      tags: new Set(this.tags),
      ...(error ? { error } : {}),
    });
  }
}
