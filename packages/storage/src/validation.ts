import { ValidationError } from "@meridian/errors";

const COLLECTION_PATTERN = /^[a-z][a-z0-9_]{0,63}$/;
const MAX_KEY_LENGTH = 255;

export function assertCollection(collection: string): void {
  if (!COLLECTION_PATTERN.test(collection)) {
    throw new ValidationError(`Invalid collection name "${collection}"`, [
      {
        field: "collection",
        message: "Must match /^[a-z][a-z0-9_]{0,63}$/",
        code: "invalid_string",
        value: collection,
      },
    ]);
  }
}

export function assertKey(key: string): void {
  if (key.length === 0 || key.length > MAX_KEY_LENGTH) {
    throw new ValidationError(`Invalid key of length ${key.length}`, [
      {
        field: "key",
        message: `Must be 1-${MAX_KEY_LENGTH} characters`,
        code: "invalid_string",
        value: key,
      },
    ]);
  }
}

/** Code-point order, identical on every backend regardless of collation. */
export function compareKeys(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
