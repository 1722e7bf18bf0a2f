/**
 * How a console output renders logs. Chosen once when the output is built.
 */
export type ConsoleLogFormat =
  | { kind: 'short' }
  | { kind: 'shortWith'; prefix: string }
  | { kind: 'json' }
  | { kind: 'jsonWith'; prefix: string };

const short: ConsoleLogFormat = { kind: 'short' };
const json: ConsoleLogFormat = { kind: 'json' };

export const ConsoleLogFormat = {
  /** `HH:mm:ss.SSS [STATUS] message` */
  short,
  shortWith: (prefix: string): ConsoleLogFormat => ({ kind: 'shortWith', prefix }),
  /** Pretty-printed JSON of the whole log. */
  json,
  /** The prefix is prepended to the JSON text and is not part of the document. */
  jsonWith: (prefix: string): ConsoleLogFormat => ({ kind: 'jsonWith', prefix }),
} as const;
