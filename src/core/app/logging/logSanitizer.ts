import type { LogAttributes } from '@core/domain';

import { RESERVED_LOG_KEYS } from './logEncoder';

export const MAX_ATTRIBUTE_NAME_SEGMENTS = 10;
export const MAX_ATTRIBUTES = 256;
export const MAX_TAG_LENGTH = 200;
export const MAX_TAGS = 1000;

const RESERVED_ATTRIBUTE_NAMES: ReadonlySet<string> = new Set<string>([
  ...RESERVED_LOG_KEYS,
  'host',
  'source',
  'logger.thread_name',
]);

const RESERVED_TAG_KEYS: ReadonlySet<string> = new Set(['host', 'device', 'source', 'service']);

const INVALID_TAG_CHARACTERS = /[^a-z0-9_:./-]/gu;

/**
 * Caps the nesting expressed by dots in an attribute name: segments past the limit are folded
 * into the last allowed segment with `_`.
 */
export const sanitizeAttributeName = (name: string): string => {
  const segments = name.split('.');
  if (segments.length <= MAX_ATTRIBUTE_NAME_SEGMENTS) {
    return name;
  }

  const kept = segments.slice(0, MAX_ATTRIBUTE_NAME_SEGMENTS - 1);
  const folded = segments.slice(MAX_ATTRIBUTE_NAME_SEGMENTS - 1).join('_');
  return [...kept, folded].join('.');
};

export const sanitizeAttributes = (attributes: LogAttributes): LogAttributes => {
  const sanitized = new Map<string, unknown>();

  for (const [name, value] of Object.entries(attributes)) {
    if (RESERVED_ATTRIBUTE_NAMES.has(name)) {
      continue;
    }

    const sanitizedName = sanitizeAttributeName(name);
    if (sanitized.size >= MAX_ATTRIBUTES && !sanitized.has(sanitizedName)) {
      continue;
    }

    sanitized.set(sanitizedName, value);
  }

  return Object.fromEntries(sanitized);
};

/** Returns the normalised tag, or `undefined` when the tag must be dropped. */
export const sanitizeTag = (tag: string): string | undefined => {
  const lowercased = tag.toLowerCase();
  if (!/^[a-z]/.test(lowercased)) {
    return undefined;
  }

  const normalised = lowercased
    .replace(INVALID_TAG_CHARACTERS, '_')
    .slice(0, MAX_TAG_LENGTH)
    .replace(/:+$/, '');

  const [key] = normalised.split(':');
  if (RESERVED_TAG_KEYS.has(key)) {
    return undefined;
  }

  return normalised;
};

export const sanitizeTags = (tags: Iterable<string>): Set<string> => {
  const sanitized = new Set<string>();

  for (const tag of tags) {
    if (sanitized.size >= MAX_TAGS) {
      break;
    }

    const normalised = sanitizeTag(tag);
    if (normalised !== undefined) {
      sanitized.add(normalised);
    }
  }

  return sanitized;
};
