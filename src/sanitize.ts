import { toNode } from './json';
import type { JsonObject, JsonValue } from './json';

// MongoDB rejects field names containing "." or a "$"
const FORBIDDEN_KEY_CHARS = /[.$]/g;

const sanitizeKey = (key: string): string => key.replace(FORBIDDEN_KEY_CHARS, '_');

/**
 * Rewrite every mapping key at every depth so the value can be stored as a
 * MongoDB document.
 *
 * Containers are always rebuilt, so the result shares no object or array
 * with the input. When two keys collapse to the same name the later one wins.
 */
const sanitize = (value: JsonValue): JsonValue => {
  const node = toNode(value);
  switch (node._tag) {
    case 'Mapping':
      return sanitizeObject(node.value);
    case 'Sequence':
      return node.value.map(sanitize);
    case 'Scalar':
      return node.value;
  }
};

// Object.fromEntries defines own properties, so a "__proto__" key stays data
const sanitizeObject = (value: JsonObject): JsonObject =>
  Object.fromEntries(
    Object.entries(value).map(([key, child]): [string, JsonValue] => [sanitizeKey(key), sanitize(child)])
  );

export { sanitize, sanitizeKey, sanitizeObject };
