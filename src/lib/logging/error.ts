import type { LogError } from '@core/domain';

export const toLogError = (error: unknown): LogError => {
  if (error instanceof Error) {
    const logError: LogError = {
      kind: error.name,
      message: error.message,
    };

    if (error.stack) {
      logError.stack = error.stack;
    }

    return logError;
  }

  return {
    kind: 'UnknownError',
    message: typeof error === 'string' ? error : 'Unknown error',
  };
};
