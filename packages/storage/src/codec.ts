import { type JsonObject, JsonObjectSchema } from "@meridian/core";
import { InternalError } from "@meridian/errors";

export function encodeRecord(record: JsonObject): string {
  return JSON.stringify(record);
}

/**
 * Decode a stored value. Text columns hold JSON strings; JSON/JSONB columns
 * come back from the driver already parsed.
 */
export function decodeRecord(raw: unknown): JsonObject {
  const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
  const parsed = JsonObjectSchema.safeParse(value);
  if (!parsed.success) {
    throw new InternalError("Stored value is not a JSON object");
  }
  return parsed.data;
}
