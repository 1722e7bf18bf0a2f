/**
 * Filename: src/core/app/logging/consoleLogFormatter.ts
 * Purpose: Render canonical logs as console text in the short or JSON layout.
 * Date: 2025-11-02
 * License: MIT
 */

import type { Log } from '@core/domain';
import { describeError } from '@/lib/errors/ensureError';

import type { ConsoleLogFormat } from './consoleLogFormat';
import { encodeLog } from './logEncoder';

/** Formats logs printed to console. Implementations never throw. */
export interface ConsoleLogFormatter {
  format(log: Log): string;
}

const INVALID_TIME = 'Invalid Date';
const UNPRINTABLE_ERROR = 'LogEncodingError: unprintable error';

const createPresentationTimeFormatter = (timeZone: string): Intl.DateTimeFormat =>
  new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });

/**
 * `HH:mm:ss.SSS` in the formatter's time zone. Milliseconds are read from the epoch value
 * directly since zone offsets are whole minutes.
 */
export const formatPresentationTime = (formatter: Intl.DateTimeFormat, date: Date): string => {
  const epochMs = date.getTime();
  if (Number.isNaN(epochMs)) {
    return INVALID_TIME;
  }

  const parts = formatter.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    (parts.find((entry) => entry.type === type)?.value ?? '').padStart(2, '0');
  const milliseconds = String(((epochMs % 1000) + 1000) % 1000).padStart(3, '0');

  return `${part('hour')}:${part('minute')}:${part('second')}.${milliseconds}`;
};

/** Formats log as custom short string. */
export class ShortLogFormatter implements ConsoleLogFormatter {
  private readonly timeFormatter: Intl.DateTimeFormat;

  constructor(
    timeZone: string,
    private readonly prefix = '',
  ) {
    this.timeFormatter = createPresentationTimeFormatter(timeZone);
  }

  format(log: Log): string {
    const time = formatPresentationTime(this.timeFormatter, log.date);
    const status = log.status.toUpperCase();
    return `${this.prefix}${time} [${status}] ${log.message}`;
  }
}

// Thrown values may carry throwing `name` or `message` getters.
const describeFormatError = (error: unknown): string => {
  try {
    return describeError(error);
  } catch {
    return UNPRINTABLE_ERROR;
  }
};

/** Formats log as pretty-printed JSON. */
export class JSONLogFormatter implements ConsoleLogFormatter {
  constructor(private readonly prefix = '') {}

  format(log: Log): string {
    try {
      return `${this.prefix}${JSON.stringify(encodeLog(log), null, 2)}`;
    } catch (error) {
      return describeFormatError(error);
    }
  }
}

export const createConsoleLogFormatter = (
  format: ConsoleLogFormat,
  timeZone: string,
): ConsoleLogFormatter => {
  switch (format.kind) {
    case 'short':
      return new ShortLogFormatter(timeZone);
    case 'shortWith':
      return new ShortLogFormatter(timeZone, format.prefix);
    case 'json':
      return new JSONLogFormatter();
    case 'jsonWith':
      return new JSONLogFormatter(format.prefix);
  }
};
