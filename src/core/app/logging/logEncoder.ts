/**
 * Filename: src/core/app/logging/logEncoder.ts
 * Purpose: Convert a canonical log into the JSON-ready object emitted by the JSON console format.
 * Date: 2025-11-02
 * License: MIT
 */

import type { Log } from '@core/domain';

import { LogEncodingError } from '../errors/logEncodingError';

export type EncodedValue =
  | null
  | boolean
  | number
  | string
  | EncodedValue[]
  | { [key: string]: EncodedValue };

export type EncodedLog = { [key: string]: EncodedValue };

/** Root keys written by the encoder itself. Attributes never override them. */
export const RESERVED_LOG_KEYS = [
  'date',
  'status',
  'message',
  'service',
  'logger.name',
  'logger.version',
  'version',
  'ddtags',
  'error.kind',
  'error.message',
  'error.stack',
] as const;

const compareKeys = ([a]: [string, EncodedValue], [b]: [string, EncodedValue]): number => {
  if (a < b) {
    return -1;
  }

  return a > b ? 1 : 0;
};

// fromEntries keeps `__proto__` as an own data property.
const toSortedObject = (entries: Iterable<[string, EncodedValue]>): { [key: string]: EncodedValue } =>
  Object.fromEntries([...entries].sort(compareKeys));

const encodeDate = (value: Date, path: string): string => {
  if (Number.isNaN(value.getTime())) {
    throw new LogEncodingError(path, 'invalid dates are not supported');
  }

  return value.toISOString();
};

const childPath = (path: string, key: string | number) => `${path}.${key}`;

const encodeValue = (
  value: unknown,
  path: string,
  ancestors: Set<object>,
): EncodedValue | undefined => {
  if (value === undefined) {
    return undefined;
  }

  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new LogEncodingError(path, 'non-finite numbers are not supported');
    }
    return value;
  }

  if (typeof value !== 'object') {
    // bigint, symbol, function
    throw new LogEncodingError(path, `${typeof value} values are not supported`);
  }

  if (value instanceof Date) {
    return encodeDate(value, path);
  }

  if (ancestors.has(value)) {
    throw new LogEncodingError(path, 'circular references are not supported');
  }

  ancestors.add(value);
  try {
    return encodeObject(value, path, ancestors);
  } finally {
    ancestors.delete(value);
  }
};

const encodeObject = (value: object, path: string, ancestors: Set<object>): EncodedValue => {
  if (Array.isArray(value)) {
    return value.map(
      (item: unknown, index) => encodeValue(item, childPath(path, index), ancestors) ?? null,
    );
  }

  if (value instanceof Set) {
    return [...value].map(
      (item: unknown, index) => encodeValue(item, childPath(path, index), ancestors) ?? null,
    );
  }

  if (value instanceof Map) {
    const entries: Array<[string, EncodedValue]> = [];
    for (const [key, item] of value) {
      if (typeof key !== 'string') {
        throw new LogEncodingError(path, 'map keys must be strings');
      }
      const encoded = encodeValue(item, childPath(path, key), ancestors);
      if (encoded !== undefined) {
        entries.push([key, encoded]);
      }
    }
    return toSortedObject(entries);
  }

  if (value instanceof Error) {
    const entries: Array<[string, EncodedValue]> = [
      ['name', value.name],
      ['message', value.message],
    ];
    if (value.stack) {
      entries.push(['stack', value.stack]);
    }
    return toSortedObject(entries);
  }

  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON();
    return encodeValue(json, path, ancestors) ?? null;
  }

  const entries: Array<[string, EncodedValue]> = [];
  for (const [key, item] of Object.entries(value)) {
    const encoded = encodeValue(item, childPath(path, key), ancestors);
    if (encoded !== undefined) {
      entries.push([key, encoded]);
    }
  }

  return toSortedObject(entries);
};

/**
 * Produces the wire object for a log: reserved fields and attributes share the root, keys are
 * sorted at every level, tags are joined into `ddtags`.
 *
 * @throws LogEncodingError when an attribute holds a value JSON cannot represent.
 */
export const encodeLog = (log: Log): EncodedLog => {
  const fields = new Map<string, EncodedValue>();

  for (const [key, value] of Object.entries(log.attributes)) {
    const encoded = encodeValue(value, key, new Set());
    if (encoded !== undefined) {
      fields.set(key, encoded);
    }
  }

  fields.set('date', encodeDate(log.date, 'date'));
  fields.set('status', log.status);
  fields.set('message', log.message);
  fields.set('service', log.serviceName);
  fields.set('logger.name', log.loggerName);
  fields.set('logger.version', log.loggerVersion);
  fields.set('version', log.applicationVersion);
  fields.set('ddtags', [...log.tags].sort().join(','));

  if (log.error) {
    fields.set('error.kind', log.error.kind);
    fields.set('error.message', log.error.message);
    if (log.error.stack) {
      fields.set('error.stack', log.error.stack);
    }
  }

  return toSortedObject(fields);
};
