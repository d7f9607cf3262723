type JsonScalar = string | number | boolean | null;

interface JsonObject {
  [key: string]: JsonValue;
}

type JsonValue = JsonScalar | JsonValue[] | JsonObject;

// Tagged view over a JSON value, so recursive walks can switch on _tag
// instead of repeating typeof / Array.isArray checks.
type JsonNode =
  | { readonly _tag: 'Mapping'; readonly value: JsonObject }
  | { readonly _tag: 'Sequence'; readonly value: JsonValue[] }
  | { readonly _tag: 'Scalar'; readonly value: JsonScalar };

const toNode = (value: JsonValue): JsonNode => {
  if (Array.isArray(value)) {
    return { _tag: 'Sequence', value };
  }
  if (value !== null && typeof value === 'object') {
    return { _tag: 'Mapping', value };
  }
  return { _tag: 'Scalar', value };
};

const isJsonObject = (value: JsonValue): value is JsonObject =>
  toNode(value)._tag === 'Mapping';

export { toNode, isJsonObject };
export type { JsonScalar, JsonObject, JsonValue, JsonNode };
