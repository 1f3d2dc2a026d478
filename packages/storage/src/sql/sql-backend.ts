import {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  defaultSleep,
  type JsonObject,
  jsonEquals,
  type RetryPolicy,
  type Sleep,
} from "@meridian/core";
import { getErrorMessage, StorageUnavailableError } from "@meridian/errors";
import { decodeRecord, encodeRecord } from "../codec.js";
import type {
  BackendKind,
  PersistenceBackend,
  PutIfAbsentResult,
  RecordPredicate,
} from "../types.js";
import { assertCollection, assertKey, compareKeys } from "../validation.js";
import type { SqlClient, SqlDialect } from "./sql-client.js";

/** Claim rounds before giving up on a key that keeps disappearing under us. */
const MAX_CLAIM_ROUNDS = 3;

export interface SqlBackendOptions {
  readonly kind: Exclude<BackendKind, "memory">;
  readonly client: SqlClient;
  readonly dialect: SqlDialect;
  readonly retry?: RetryPolicy;
  readonly sleep?: Sleep;
}

/**
 * Relational backend over a single `(bucket, key, value)` table.
 *
 * Shared by the embedded SQLite file and the two server databases: they
 * differ only in dialect and driver. Driver failures are retried with
 * bounded exponential backoff, then surfaced as StorageUnavailableError.
 */
export class SqlBackend implements PersistenceBackend {
  readonly kind: Exclude<BackendKind, "memory">;
  private readonly client: SqlClient;
  private readonly dialect: SqlDialect;
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep;
  private schema: Promise<void> | undefined;
  private closed = false;

  constructor(options: SqlBackendOptions) {
    this.kind = options.kind;
    this.client = options.client;
    this.dialect = options.dialect;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async put(collection: string, key: string, record: JsonObject): Promise<void> {
    assertCollection(collection);
    assertKey(key);
    await this.execute("put", () =>
      this.client.run(this.dialect.upsert, [collection, key, encodeRecord(record)]),
    );
  }

  async get(collection: string, key: string): Promise<JsonObject | null> {
    assertCollection(collection);
    assertKey(key);
    return this.read(collection, key);
  }

  async putIfAbsent(
    collection: string,
    key: string,
    record: JsonObject,
  ): Promise<PutIfAbsentResult> {
    assertCollection(collection);
    assertKey(key);
    const encoded = encodeRecord(record);
    const ours = decodeRecord(encoded);

    for (let round = 0; round < MAX_CLAIM_ROUNDS; round++) {
      let tries = 0;
      const inserted = await this.execute("putIfAbsent", () => {
        tries += 1;
        return this.client.run(this.dialect.insertIfAbsent, [collection, key, encoded]);
      });
      if (inserted.affectedRows > 0) {
        return { record: ours, created: true };
      }

      const existing = await this.read(collection, key);
      if (existing) {
        // A retried insert may have committed before its connection dropped.
        return { record: existing, created: tries > 1 && jsonEquals(existing, ours) };
      }
      // The incumbent was deleted between our insert and our read: claim again.
    }
    throw new StorageUnavailableError(this.kind, "putIfAbsent");
  }

  async query(collection: string, predicate?: RecordPredicate): Promise<JsonObject[]> {
    assertCollection(collection);
    const result = await this.execute("query", () =>
      this.client.run(this.dialect.selectBucket, [collection]),
    );
    const records = result.rows
      .map((row) => ({ key: String(row.key), value: row.value }))
      .sort((a, b) => compareKeys(a.key, b.key))
      .map((row) => decodeRecord(row.value));
    return predicate ? records.filter(predicate) : records;
  }

  async delete(collection: string, key: string): Promise<boolean> {
    assertCollection(collection);
    assertKey(key);
    const result = await this.execute("delete", () =>
      this.client.run(this.dialect.deleteOne, [collection, key]),
    );
    return result.affectedRows > 0;
  }

  async ping(): Promise<void> {
    await this.execute("ping", () => this.client.run(this.dialect.ping, []));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.close();
  }

  private async read(collection: string, key: string): Promise<JsonObject | null> {
    const result = await this.execute("get", () =>
      this.client.run(this.dialect.selectOne, [collection, key]),
    );
    const row = result.rows[0];
    return row === undefined ? null : decodeRecord(row.value);
  }

  private async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    await this.ensureSchema();
    return this.withRetry(operation, fn);
  }

  private ensureSchema(): Promise<void> {
    if (!this.schema) {
      this.schema = this.withRetry("createTable", () =>
        this.client.run(this.dialect.createTable, []),
      ).then(
        () => undefined,
        (error: unknown) => {
          this.schema = undefined;
          throw error;
        },
      );
    }
    return this.schema;
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new StorageUnavailableError(this.kind, operation);
    }
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.retry.maxAttempts) {
          throw new StorageUnavailableError(this.kind, operation, error);
        }
        const delay = backoffDelay(this.retry, attempt);
        console.warn(
          `[Storage] ${this.kind} ${operation} failed (attempt ${attempt}/${this.retry.maxAttempts}), retrying in ${delay}ms: ${getErrorMessage(error)}`,
        );
        await this.sleep(delay);
      }
    }
  }
}
