import { z } from "zod";

// ---------------------------------------------------------------------------
// JSON values (what every backend can store)
// ---------------------------------------------------------------------------

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodLazy<z.ZodType<JsonValue>> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

export function isJsonObject(value: unknown): value is JsonObject {
  return JsonObjectSchema.safeParse(value).success;
}

/**
 * Deep copy. Records never share references with the store they came from.
 */
export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Serialize with object keys sorted, so structurally equal values produce
 * identical strings regardless of insertion order.
 */
export function stableStringify(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => {
      const item = value[key];
      return item === undefined ? undefined : `${JSON.stringify(key)}:${stableStringify(item)}`;
    })
    .filter((entry): entry is string => entry !== undefined);
  return `{${entries.join(",")}}`;
}

export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  return stableStringify(a) === stableStringify(b);
}
