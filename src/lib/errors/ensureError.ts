export const ensureError = (value: unknown, fallbackMessage = 'Unknown error'): Error => {
  if (value instanceof Error) {
    return value;
  }

  if (value && typeof value === 'object' && 'message' in value) {
    const { message } = value;
    return new Error(typeof message === 'string' ? message : fallbackMessage);
  }

  return new Error(typeof value === 'string' ? value : fallbackMessage);
};

/**
 * Renders any thrown value as `"{name}: {message}"`, the form printed in place of a log
 * payload that could not be produced.
 */
export const describeError = (value: unknown): string => {
  const error = ensureError(value);
  return error.message ? `${error.name}: ${error.message}` : error.name;
};
