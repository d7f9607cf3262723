import { Clock, Effect, pipe } from 'effect';
import { TransformError } from './errors';
import { isJsonObject, toNode } from './json';
import type { JsonObject, JsonValue } from './json';
import { sanitizeObject } from './sanitize';

const RECORDS_FIELD = 'vulnerabilities';
const INGESTED_AT_FIELD = 'ingested_at';

/**
 * Pull the record list out of the feed payload. A missing field means an
 * empty feed; anything that is present but not a list of objects fails.
 */
const recordsOf = (payload: JsonValue): Effect.Effect<ReadonlyArray<JsonObject>, TransformError> => {
  const node = toNode(payload);
  if (node._tag !== 'Mapping') {
    return Effect.fail(
      new TransformError({ message: `Expected the payload to be an object, got ${describeValue(payload)}` })
    );
  }
  if (!Object.hasOwn(node.value, RECORDS_FIELD)) {
    return Effect.succeed([]);
  }
  const records = node.value[RECORDS_FIELD];
  if (!Array.isArray(records)) {
    return Effect.fail(
      new TransformError({
        message: `Expected "${RECORDS_FIELD}" to be an array, got ${describeValue(records)}`,
      })
    );
  }
  return Effect.forEach(records, (record, index) =>
    isJsonObject(record)
      ? Effect.succeed(record)
      : Effect.fail(
          new TransformError({
            message: `Expected record ${index} to be an object, got ${describeValue(record)}`,
            index,
          })
        )
  );
};

const describeValue = (value: JsonValue): string => {
  const node = toNode(value);
  switch (node._tag) {
    case 'Mapping':
      return 'an object';
    case 'Sequence':
      return 'an array';
    case 'Scalar':
      return node.value === null ? 'null' : typeof node.value;
  }
};

// The timestamp is read from the Clock per record, not once per batch
const stamp = (record: JsonObject): Effect.Effect<JsonObject> =>
  Effect.map(Clock.currentTimeMillis, (now) => ({
    ...record,
    [INGESTED_AT_FIELD]: toUtcOffsetIso(now),
  }));

// ISO-8601 with an explicit "+00:00" offset instead of "Z"
const toUtcOffsetIso = (millis: number): string =>
  new Date(millis).toISOString().replace(/Z$/, '+00:00');

const transform = (payload: JsonValue): Effect.Effect<ReadonlyArray<JsonObject>, TransformError> =>
  pipe(
    Effect.logInfo('Transforming data...'),
    Effect.zipRight(recordsOf(payload)),
    Effect.flatMap((records) => Effect.forEach(records, (record) => stamp(sanitizeObject(record))))
  );

export { transform, recordsOf };
