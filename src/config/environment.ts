/**
 * Filename: src/config/environment.ts
 * Purpose: Parse and validate process environment variables into the console logging configuration.
 * Date: 2025-11-02
 * License: MIT
 */

import { z } from 'zod';

import { ConsoleLogFormat } from '@core/app';

export type ConsoleSinkKind = 'console' | 'pino';

export type LoggingEnvironmentConfig = {
  format: ConsoleLogFormat;
  timeZone: string;
  sink: ConsoleSinkKind;
  serviceName: string;
  loggerName: string;
  applicationVersion: string;
  environment?: string;
};

export type EnvIssue = {
  key: string;
  message: string;
};

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super('Environment configuration is invalid.');
    this.name = 'EnvironmentValidationError';
  }
}

type Env = Record<string, string | undefined>;

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const resolveHostTimeZone = (): string => Intl.DateTimeFormat().resolvedOptions().timeZone;

const blankToUndefined = (value: unknown) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const lowercased = (value: unknown) => {
  const normalised = blankToUndefined(value);
  return typeof normalised === 'string' ? normalised.toLowerCase() : normalised;
};

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const stringWithDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().default(fallback));

const environmentSchema = z.object({
  CONSOLE_LOG_FORMAT: z.preprocess(
    lowercased,
    z
      .enum(['short', 'json'], {
        errorMap: () => ({ message: 'CONSOLE_LOG_FORMAT must be "short" or "json".' }),
      })
      .default('short'),
  ),
  // Kept verbatim: surrounding whitespace is part of a prefix.
  CONSOLE_LOG_PREFIX: z.string().optional(),
  CONSOLE_LOG_TIMEZONE: z.preprocess(
    blankToUndefined,
    z
      .string()
      .refine(isValidTimeZone, {
        message: 'CONSOLE_LOG_TIMEZONE must be a valid IANA time zone.',
      })
      .optional(),
  ),
  CONSOLE_LOG_SINK: z.preprocess(
    lowercased,
    z
      .enum(['console', 'pino'], {
        errorMap: () => ({ message: 'CONSOLE_LOG_SINK must be "console" or "pino".' }),
      })
      .default('console'),
  ),
  LOG_SERVICE_NAME: stringWithDefault('app'),
  LOG_LOGGER_NAME: stringWithDefault('console'),
  LOG_ENVIRONMENT: optionalString,
  APP_VERSION: stringWithDefault('0.0.0'),
});

export const resolveConsoleLogFormat = (
  format: 'short' | 'json',
  prefix: string | undefined,
): ConsoleLogFormat => {
  if (!prefix) {
    return format === 'short' ? ConsoleLogFormat.short : ConsoleLogFormat.json;
  }

  return format === 'short' ? ConsoleLogFormat.shortWith(prefix) : ConsoleLogFormat.jsonWith(prefix);
};

const toEnvIssues = (error: z.ZodError): EnvIssue[] => {
  const issues = new Map<string, EnvIssue>();

  for (const issue of error.issues) {
    const key = String(issue.path[0] ?? 'environment');
    if (!issues.has(key)) {
      issues.set(key, { key, message: issue.message });
    }
  }

  return [...issues.values()];
};

export const parseLoggingEnvironment = (env: Env): LoggingEnvironmentConfig => {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    throw new EnvironmentValidationError(toEnvIssues(result.error));
  }

  const parsed = result.data;
  const config: LoggingEnvironmentConfig = {
    format: resolveConsoleLogFormat(parsed.CONSOLE_LOG_FORMAT, parsed.CONSOLE_LOG_PREFIX),
    timeZone: parsed.CONSOLE_LOG_TIMEZONE ?? resolveHostTimeZone(),
    sink: parsed.CONSOLE_LOG_SINK,
    serviceName: parsed.LOG_SERVICE_NAME,
    loggerName: parsed.LOG_LOGGER_NAME,
    applicationVersion: parsed.APP_VERSION,
  };

  if (parsed.LOG_ENVIRONMENT) {
    config.environment = parsed.LOG_ENVIRONMENT;
  }

  return config;
};
