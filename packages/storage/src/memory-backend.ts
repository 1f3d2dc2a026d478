import type { JsonObject } from "@meridian/core";
import { StorageUnavailableError } from "@meridian/errors";
import { decodeRecord, encodeRecord } from "./codec.js";
import type { PersistenceBackend, PutIfAbsentResult, RecordPredicate } from "./types.js";
import { assertCollection, assertKey, compareKeys } from "./validation.js";

/**
 * In-process backend. Records are held as encoded JSON, so reads never alias
 * stored state and every value takes the same round trip as on disk.
 *
 * `putIfAbsent` checks and inserts without yielding to the event loop, which
 * is what makes it atomic within one process.
 */
export class MemoryBackend implements PersistenceBackend {
  readonly kind = "memory" as const;
  private readonly collections = new Map<string, Map<string, string>>();
  private closed = false;

  async put(collection: string, key: string, record: JsonObject): Promise<void> {
    this.bucket(collection, key).set(key, encodeRecord(record));
  }

  async get(collection: string, key: string): Promise<JsonObject | null> {
    const stored = this.bucket(collection, key).get(key);
    return stored === undefined ? null : decodeRecord(stored);
  }

  async putIfAbsent(
    collection: string,
    key: string,
    record: JsonObject,
  ): Promise<PutIfAbsentResult> {
    const bucket = this.bucket(collection, key);
    const existing = bucket.get(key);
    if (existing !== undefined) {
      return { record: decodeRecord(existing), created: false };
    }
    const encoded = encodeRecord(record);
    bucket.set(key, encoded);
    return { record: decodeRecord(encoded), created: true };
  }

  async query(collection: string, predicate?: RecordPredicate): Promise<JsonObject[]> {
    assertCollection(collection);
    this.assertOpen();
    const bucket = this.collections.get(collection);
    if (!bucket) {
      return [];
    }
    const records = [...bucket.entries()]
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([, value]) => decodeRecord(value));
    return predicate ? records.filter(predicate) : records;
  }

  async delete(collection: string, key: string): Promise<boolean> {
    return this.bucket(collection, key).delete(key);
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.collections.clear();
  }

  private bucket(collection: string, key: string): Map<string, string> {
    assertCollection(collection);
    assertKey(key);
    this.assertOpen();
    let bucket = this.collections.get(collection);
    if (!bucket) {
      bucket = new Map();
      this.collections.set(collection, bucket);
    }
    return bucket;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageUnavailableError(this.kind, "access after close");
    }
  }
}
